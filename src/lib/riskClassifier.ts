import type { BuiltinRiskProfile, RiskProfile, RiskTier, RiskVocabulary } from '@/types/detection'
import riskProfiles from '@/data/riskProfiles.json'

const builtinProfiles: Record<BuiltinRiskProfile, { high: string[]; medium: string[] }> = riskProfiles

export function normalizeClassName(name: string): string {
  return name.toLowerCase().replace(/ /g, '_')
}

/**
 * Resolve a profile into the concrete high/medium sets once, at startup.
 * Entries are stored normalized so lookups never re-normalize the vocabulary.
 */
export function resolveRiskVocabulary(profile: RiskProfile): RiskVocabulary {
  const lists = profile.kind === 'custom' ? profile : builtinProfiles[profile.kind]
  return {
    high: new Set(lists.high.map(normalizeClassName)),
    medium: new Set(lists.medium.map(normalizeClassName)),
  }
}

export function classifyRisk(className: string, vocabulary: RiskVocabulary): RiskTier {
  const name = normalizeClassName(className)
  if (vocabulary.high.has(name)) return 'high'
  if (vocabulary.medium.has(name)) return 'medium'
  return 'low'
}

export const RISK_PRIORITY: Record<RiskTier, number> = {
  high: 0,
  medium: 1,
  low: 2,
}
