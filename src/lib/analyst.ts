/**
 * Situation reports and follow-up chat, written by an LLM from detection data.
 * Nothing here throws: failures come back as `unavailable` results.
 */
import type { Detection, ImageSize } from '@/types/detection'
import type { ThreatReport } from '@/types/threat'
import type { ChatTurn } from '@/types/scan'
import type { ChatResult, SitrepResult } from '@/types'
import type { LlmClient } from '@/lib/llm'
import { errorMessage } from '@/lib/errors'
import { silentLogger, type Logger } from '@/lib/logger'

export const SYSTEM_PROMPT = `You are a tactical analyst attached to an image surveillance system.
You read object detection results (class names, confidence scores, positions, risk levels and
the overall threat assessment) and turn them into short situation reports for human operators.

Situation report format:
- One-sentence executive summary first.
- Detected objects grouped by risk level, HIGH before MEDIUM before LOW, with confidence.
- A recommendation when the threat level is ELEVATED or higher.
- Under 200 words, present tense, factual. Never speculate beyond the data.

For follow-up questions, refer to specific detections and say so when the data is insufficient.
You are looking at a single image scan with no history beyond what is provided.`

export type ScanContextInput = {
  detections: Detection[]
  threat: ThreatReport
  imageSize: ImageSize
  inferenceMs: number
}

export function framePosition(detection: Detection, size: ImageSize): string {
  const { cx, cy } = detection.box
  const horizontal = cx < size.width * 0.33 ? 'left' : cx > size.width * 0.67 ? 'right' : 'center'
  const vertical = cy < size.height * 0.33 ? 'top' : cy > size.height * 0.67 ? 'bottom' : 'middle'
  return vertical === 'middle' && horizontal === 'center' ? 'center' : `${vertical}-${horizontal}`
}

/** Compact plain-text rendering of one scan for the model to read. */
export function buildDetectionContext({ detections, threat, imageSize, inferenceMs }: ScanContextInput): string {
  const { stats } = threat
  const lines = [
    'IMAGE SCAN ANALYSIS',
    `Resolution: ${imageSize.width}×${imageSize.height} pixels`,
    `Inference time: ${inferenceMs}ms`,
    '',
    'THREAT ASSESSMENT:',
    `  Level: ${threat.threatLevel}`,
    `  Label: ${threat.label}`,
    `  Description: ${threat.description}`,
    `  Total detections: ${stats.total}`,
    `  High-risk: ${stats.highRisk}`,
    `  Medium-risk: ${stats.mediumRisk}`,
    `  Low-risk: ${stats.lowRisk}`,
    '',
  ]

  if (detections.length === 0) {
    lines.push('DETECTED OBJECTS: None')
    return lines.join('\n')
  }

  lines.push(`DETECTED OBJECTS (${detections.length} total):`)
  detections.forEach((detection, index) => {
    lines.push(
      `  ${index + 1}. ${detection.className.toUpperCase()} [${detection.riskLevel.toUpperCase()} RISK]`,
      `     Confidence: ${(detection.confidence * 100).toFixed(1)}%`,
      `     Position: ${framePosition(detection, imageSize)} of frame`,
      `     Size: ${detection.box.width}×${detection.box.height} pixels`
    )
  })
  return lines.join('\n')
}

export type ChatRequest = {
  scanId: string
  message: string
  detectionContext: string
  sitrep: string
  history: ChatTurn[]
}

export type Analyst = {
  enabled: boolean
  generateSitrep: (context: string) => Promise<SitrepResult>
  chat: (request: ChatRequest) => Promise<ChatResult>
}

export function createAnalyst(deps: { client?: LlmClient; provider: string; logger?: Logger }): Analyst {
  const logger = deps.logger ?? silentLogger
  const { client } = deps
  const disabledError = `AI analyst disabled - ${deps.provider.toUpperCase()} API key not configured`

  return {
    enabled: client !== undefined,

    generateSitrep: async (context) => {
      if (!client) return { status: 'disabled', error: disabledError }
      try {
        logger.info(`Generating sitrep with ${deps.provider} (${client.model})`)
        const response = await client.generate({
          systemPrompt: SYSTEM_PROMPT,
          userMessage: `Generate a tactical SITREP for this detection scan:\n\n${context}`,
        })
        logger.info(`Sitrep generated (${response.tokensUsed} tokens)`)
        return { status: 'ok', sitrep: response.text, model: response.model, tokens: response.tokensUsed }
      } catch (error) {
        logger.error(`LLM error: ${errorMessage(error)}`)
        return { status: 'unavailable', error: `LLM error: ${errorMessage(error)}` }
      }
    },

    chat: async ({ scanId, message, detectionContext, sitrep, history }) => {
      if (!client) return { status: 'disabled', error: disabledError }
      const systemPrompt = [
        SYSTEM_PROMPT,
        '',
        `CURRENT SCAN CONTEXT (Scan ID: ${scanId}):`,
        '',
        detectionContext,
        '',
        'PREVIOUSLY GENERATED SITREP:',
        sitrep,
        '',
        'The operator is asking follow-up questions about this scan. Answer from the detection data above.',
      ].join('\n')

      try {
        logger.info(`Processing chat question for scan ${scanId}`)
        const response = await client.generate({ systemPrompt, userMessage: message, history })
        logger.info(`Chat response generated (${response.tokensUsed} tokens)`)
        return { status: 'ok', answer: response.text, tokens: response.tokensUsed }
      } catch (error) {
        logger.error(`LLM error in chat: ${errorMessage(error)}`)
        return { status: 'unavailable', error: `LLM error: ${errorMessage(error)}` }
      }
    },
  }
}
