import type { RiskTier } from '@/types/detection'
import type { LoggedRisk } from '@/types/eventLog'

const riskColorMap: Record<RiskTier, string> = {
  high: '#ff0000',
  medium: '#ff8c00',
  low: '#50c800',
}

export const LABEL_TEXT_COLOR = '#ffffff'

export function getRiskColor(risk: LoggedRisk): string {
  return risk === 'none' ? '#9e9e9e' : riskColorMap[risk]
}
