/**
 * Dashboard snapshot returned by the analytics engine
 */
import type { RiskTier } from '@/types/detection'
import type { EventLogRow } from '@/types/eventLog'
import type { ThreatLevel } from '@/types/threat'

export type WeekdayKey = 'Mon' | 'Tue' | 'Wed' | 'Thu' | 'Fri' | 'Sat' | 'Sun'

export interface DashboardSummary {
  totalScans: number
  totalDetections: number
  criticalToday: number
  mostDetectedClass: string
}

export interface DailyCount {
  date: string
  count: number
}

export interface ClassCount {
  className: string
  count: number
  risk: RiskTier
}

export interface HistogramBin {
  bin: string
  count: number
}

export interface DashboardSnapshot {
  summary: DashboardSummary
  threatDistribution: Record<ThreatLevel, number>
  detectionsOverTime: DailyCount[]
  topClasses: ClassCount[]
  hourlyHeatmap: Record<WeekdayKey, number[]>
  confidenceHistogram: HistogramBin[]
  recentRows: EventLogRow[]
}
