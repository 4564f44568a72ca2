/**
 * Detector adapters. The model itself runs elsewhere; this side only
 * ships the image over and checks that the answer has the agreed shape.
 */
import { z } from 'zod'
import type { RawDetectorOutput } from '@/types/detection'
import type { DetectorConfig } from '@/lib/config'
import { DetectorError, DetectorOutputError } from '@/lib/errors'
import { HttpRequestError, describeFailure, requestJson } from '@/lib/http'

export type DetectorImage = {
  path: string
  fileName: string
  data: Buffer
}

export interface Detector {
  detect: (image: DetectorImage, signal?: AbortSignal) => Promise<RawDetectorOutput>
}

const detectorResponseSchema = z.object({
  boxes: z.array(z.tuple([z.number(), z.number(), z.number(), z.number()])),
  scores: z.array(z.number()),
  class_ids: z.array(z.number().int()),
  names: z.record(z.string(), z.string()),
})

export type DetectorResponse = z.input<typeof detectorResponseSchema>

/** Validate a detector's JSON answer (snake_case wire format). */
export function parseDetectorResponse(payload: unknown): RawDetectorOutput {
  const result = detectorResponseSchema.safeParse(payload)
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new DetectorOutputError(
      `Detector response is malformed at ${issue.path.join('.') || '<root>'}: ${issue.message}`
    )
  }

  const names: Record<number, string> = {}
  for (const [key, name] of Object.entries(result.data.names)) {
    const index = Number(key)
    if (Number.isInteger(index)) names[index] = name
  }

  return {
    boxes: result.data.boxes,
    scores: result.data.scores,
    classIds: result.data.class_ids,
    names,
  }
}

const MIME_TYPES: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  bmp: 'image/bmp',
  webp: 'image/webp',
  tiff: 'image/tiff',
}

function mimeTypeOf(fileName: string): string {
  const extension = fileName.split('.').pop()?.toLowerCase() ?? ''
  return MIME_TYPES[extension] ?? 'application/octet-stream'
}

/**
 * Posts the image to an inference server as multipart form data.
 */
export class HttpDetector implements Detector {
  constructor(private config: DetectorConfig) {}

  async detect(image: DetectorImage, signal?: AbortSignal): Promise<RawDetectorOutput> {
    const formData = new FormData()
    formData.append('image', new Blob([new Uint8Array(image.data)], { type: mimeTypeOf(image.fileName) }), image.fileName)
    formData.append('conf', String(this.config.confidence))
    formData.append('iou', String(this.config.iou))
    formData.append('max_det', String(this.config.maxDetections))

    let payload: unknown
    try {
      payload = await requestJson(
        this.config.url,
        { method: 'POST', body: formData, signal },
        this.config.timeoutMs
      )
    } catch (error) {
      if (error instanceof HttpRequestError) {
        const { failure } = error
        throw new DetectorError(
          `Detection ${failure.kind === 'canceled' ? 'canceled' : 'failed'}: ${describeFailure(failure, error.timeoutMs)}`,
          failure.kind === 'status' ? failure.status : undefined,
          failure.kind === 'timeout',
          failure.kind === 'canceled'
        )
      }
      throw error
    }

    return parseDetectorResponse(payload)
  }
}

/** Replays a recorded detector answer, whatever the image. */
export function createStaticDetector(output: RawDetectorOutput): Detector {
  return {
    detect: async () => output,
  }
}
