import type { Detection, RawDetectorOutput, RiskVocabulary } from '@/types/detection'
import { DetectorOutputError } from '@/lib/errors'
import { RISK_PRIORITY, classifyRisk } from '@/lib/riskClassifier'
import { roundTo } from '@/lib/utils'

function checkShape(raw: RawDetectorOutput) {
  const count = raw.boxes.length
  if (raw.scores.length !== count || raw.classIds.length !== count) {
    throw new DetectorOutputError(
      `Detector returned ${count} boxes, ${raw.scores.length} scores and ${raw.classIds.length} class ids`
    )
  }
  raw.boxes.forEach((box, index) => {
    if (!box.every(Number.isFinite)) {
      throw new DetectorOutputError(`Box ${index} has non-finite coordinates`)
    }
  })
  raw.scores.forEach((score, index) => {
    if (!Number.isFinite(score) || score < 0 || score > 1) {
      throw new DetectorOutputError(`Score ${index} is outside [0, 1]: ${score}`)
    }
  })
}

/**
 * Convert one image's raw detector output into Detection records,
 * ordered high risk first and most confident first within a tier.
 */
export function normalizeDetections(raw: RawDetectorOutput, vocabulary: RiskVocabulary): Detection[] {
  checkShape(raw)

  const detections = raw.boxes.map((box, index): Detection => {
    const [ax, ay, bx, by] = box.map(Math.trunc)
    const x1 = Math.min(ax, bx)
    const x2 = Math.max(ax, bx)
    const y1 = Math.min(ay, by)
    const y2 = Math.max(ay, by)
    const classId = raw.classIds[index]
    const className = raw.names[classId] ?? `class_${classId}`

    return {
      id: index,
      className,
      confidence: roundTo(raw.scores[index], 4),
      riskLevel: classifyRisk(className, vocabulary),
      box: {
        x1,
        y1,
        x2,
        y2,
        width: x2 - x1,
        height: y2 - y1,
        cx: Math.floor((x1 + x2) / 2),
        cy: Math.floor((y1 + y2) / 2),
      },
    }
  })

  // Array.prototype.sort is stable, so equal keys keep detector order
  return detections.sort(
    (a, b) => RISK_PRIORITY[a.riskLevel] - RISK_PRIORITY[b.riskLevel] || b.confidence - a.confidence
  )
}
