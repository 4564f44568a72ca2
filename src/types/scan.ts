/**
 * Scan artifacts: the persisted summary and chat thread for one scan
 */

export type ChatRole = 'user' | 'assistant'

export interface ChatTurn {
  role: ChatRole
  content: string
}

export interface ModelMeta {
  model: string
  tokens: number
}

export interface ScanArtifact extends ModelMeta {
  scanId: string
  timestamp: string
  detectionContext: string
  summary: string
  chatHistory: ChatTurn[]
}
