/**
 * Draws risk-colored boxes and label pills over a copy of the source image.
 */
import sharp from 'sharp'
import type { Detection, ImageSize } from '@/types/detection'
import { LABEL_TEXT_COLOR, getRiskColor } from '@/lib/riskColors'

export const ANNOTATED_JPEG_QUALITY = 92

export type LabelStyle = {
  fontScale: number
  thickness: number
  textHeight: number
  baseline: number
  charWidth: number
}

export function labelStyle({ width, height }: ImageSize): LabelStyle {
  const shortSide = Math.min(width, height)
  const fontScale = Math.max(0.4, shortSide / 1200)
  return {
    fontScale,
    thickness: Math.max(1, Math.trunc(shortSide / 400)),
    textHeight: Math.round(22 * fontScale),
    baseline: Math.round(10 * fontScale),
    charWidth: Math.round(13 * fontScale),
  }
}

export function labelText(detection: Detection): string {
  return `${detection.className}  ${Math.round(detection.confidence * 100)}%`
}

export type LabelPill = {
  x: number
  y: number
  width: number
  height: number
  textX: number
  textY: number
}

/** The pill sits above the box and is pushed down to y=0 at the top edge. */
export function labelPill(detection: Detection, style: LabelStyle): LabelPill {
  const { x1, y1 } = detection.box
  const textWidth = labelText(detection).length * style.charWidth
  const top = Math.max(y1 - style.textHeight - style.baseline - 6, 0)
  const bottom = Math.max(y1, style.textHeight + style.baseline + 6)
  return {
    x: x1,
    y: top,
    width: textWidth + 8,
    height: bottom - top,
    textX: x1 + 4,
    textY: bottom - style.baseline - 2,
  }
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
}

export function buildOverlaySvg(size: ImageSize, detections: Detection[]): string {
  const style = labelStyle(size)
  const strokeWidth = style.thickness + 1
  const fontSize = style.textHeight + style.baseline

  const shapes = detections.map((detection) => {
    const color = getRiskColor(detection.riskLevel)
    const { x1, y1, width, height } = detection.box
    const pill = labelPill(detection, style)
    return [
      `<rect x="${x1}" y="${y1}" width="${width}" height="${height}" fill="none" stroke="${color}" stroke-width="${strokeWidth}"/>`,
      `<rect x="${pill.x}" y="${pill.y}" width="${pill.width}" height="${pill.height}" fill="${color}"/>`,
      `<text x="${pill.textX}" y="${pill.textY}" font-family="monospace" font-size="${fontSize}" fill="${LABEL_TEXT_COLOR}">${escapeXml(labelText(detection))}</text>`,
    ].join('')
  })

  return `<svg xmlns="http://www.w3.org/2000/svg" width="${size.width}" height="${size.height}">${shapes.join('')}</svg>`
}

/**
 * Returns a new JPEG; `source` is only read. Detections are painted in list order.
 */
export async function annotateImage(source: Buffer, detections: Detection[]): Promise<Buffer> {
  const image = sharp(source)
  const metadata = await image.metadata()
  const size = { width: metadata.width ?? 0, height: metadata.height ?? 0 }

  return image
    .composite([{ input: Buffer.from(buildOverlaySvg(size, detections)), top: 0, left: 0 }])
    .jpeg({ quality: ANNOTATED_JPEG_QUALITY })
    .toBuffer()
}
