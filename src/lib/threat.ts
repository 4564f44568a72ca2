/**
 * Threat assessment: folds a detection set into one ThreatReport
 */
import type { Detection } from '@/types/detection'
import type { ThreatLevel, ThreatLevelMeta, ThreatReport, ThreatStats } from '@/types/threat'
import { countBy, roundTo } from '@/lib/utils'

export const THREAT_LEVELS: Record<ThreatLevel, ThreatLevelMeta> = {
  CRITICAL: {
    label: 'CRITICAL THREAT',
    description: 'High-risk military target(s) detected. Immediate action required.',
    color: '#ff1744',
    icon: '☢',
  },
  HIGH: {
    label: 'HIGH ALERT',
    description: 'Multiple concerning objects detected in the area.',
    color: '#ff6d00',
    icon: '⚠',
  },
  ELEVATED: {
    label: 'ELEVATED RISK',
    description: 'Suspicious activity or equipment detected. Monitor closely.',
    color: '#ffd600',
    icon: '🔶',
  },
  LOW: {
    label: 'LOW RISK',
    description: 'No immediate threats detected. Routine surveillance.',
    color: '#00e676',
    icon: '✔',
  },
  CLEAR: {
    label: 'ALL CLEAR',
    description: 'No objects detected in image.',
    color: '#40c4ff',
    icon: '✔',
  },
}

// Severity order, most severe first
export const THREAT_LEVEL_ORDER: ThreatLevel[] = ['CRITICAL', 'HIGH', 'ELEVATED', 'LOW', 'CLEAR']

export function resolveThreatLevel(total: number, highCount: number, mediumCount: number): ThreatLevel {
  if (total === 0) return 'CLEAR'
  if (highCount >= 2) return 'CRITICAL'
  if (highCount === 1) return 'HIGH'
  if (mediumCount >= 2) return 'ELEVATED'
  return 'LOW'
}

export function computeStats(detections: Detection[]): ThreatStats {
  const riskCounts = { high: 0, medium: 0, low: 0 }
  let sum = 0
  let max = 0

  for (const detection of detections) {
    riskCounts[detection.riskLevel] += 1
    sum += detection.confidence
    max = Math.max(max, detection.confidence)
  }

  return {
    total: detections.length,
    highRisk: riskCounts.high,
    mediumRisk: riskCounts.medium,
    lowRisk: riskCounts.low,
    avgConfidence: detections.length ? roundTo(sum / detections.length, 4) : 0,
    maxConfidence: roundTo(max, 4),
    classCounts: Object.fromEntries(countBy(detections, (d) => d.className)),
  }
}

export function assessThreat(detections: Detection[]): ThreatReport {
  const stats = computeStats(detections)
  const threatLevel = resolveThreatLevel(stats.total, stats.highRisk, stats.mediumRisk)

  return {
    threatLevel,
    ...THREAT_LEVELS[threatLevel],
    highRiskHits: detections.filter((d) => d.riskLevel === 'high').map((d) => d.className),
    stats,
  }
}
