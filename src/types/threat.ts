/**
 * Threat assessment types
 */
import type { Detection } from '@/types/detection'

export type ThreatLevel = 'CLEAR' | 'LOW' | 'ELEVATED' | 'HIGH' | 'CRITICAL'

export interface ThreatLevelMeta {
  label: string
  description: string
  color: string
  icon: string
}

export interface ThreatStats {
  total: number
  highRisk: number
  mediumRisk: number
  lowRisk: number
  avgConfidence: number
  maxConfidence: number
  classCounts: Record<string, number>
}

export interface ThreatReport extends ThreatLevelMeta {
  threatLevel: ThreatLevel
  highRiskHits: string[]
  stats: ThreatStats
}

export type AssessedDetections = {
  detections: Detection[]
  report: ThreatReport
}
