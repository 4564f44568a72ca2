/**
 * Event log row types. The persisted column names live in lib/eventLog.
 */
import type { RiskTier } from '@/types/detection'
import type { ThreatLevel } from '@/types/threat'

export type LoggedRisk = RiskTier | 'none'

export interface EventLogRow {
  timestamp: string
  imageId: string
  threatLevel: ThreatLevel
  totalDetections: number
  highRiskCount: number
  className: string
  confidence: number
  riskLevel: LoggedRisk
  boxX1: number
  boxY1: number
  boxX2: number
  boxY2: number
  inferenceMs: number
}
