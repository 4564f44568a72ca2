/**
 * Detection types for the threat pipeline
 */

export type RiskTier = 'high' | 'medium' | 'low'

export interface BoundingBox {
  x1: number
  y1: number
  x2: number
  y2: number
  width: number
  height: number
  cx: number
  cy: number
}

export interface Detection {
  id: number
  className: string
  confidence: number
  riskLevel: RiskTier
  box: BoundingBox
}

/**
 * Per-instance output of an external detector for one image.
 * The arrays are parallel: entry i of each describes instance i.
 */
export interface RawDetectorOutput {
  boxes: Array<[number, number, number, number]>
  scores: number[]
  classIds: number[]
  names: Record<number, string>
}

export interface RiskVocabulary {
  high: ReadonlySet<string>
  medium: ReadonlySet<string>
}

export type BuiltinRiskProfile = 'military' | 'dota' | 'coco'

export type RiskProfile =
  | { kind: BuiltinRiskProfile }
  | { kind: 'custom'; high: string[]; medium: string[] }

export interface ImageSize {
  width: number
  height: number
}
