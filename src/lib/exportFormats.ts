import type { Detection, ImageSize } from '@/types/detection'
import type { EventLogRow } from '@/types/eventLog'
import type { ScanResult } from '@/types'
import { encodeCsv } from '@/lib/csv'
import { EVENT_LOG_COLUMNS, rowToCells } from '@/lib/eventLog'

export type ExportFormat = 'json' | 'yolo' | 'coco' | 'labelme'

export const EXPORT_FORMATS: readonly ExportFormat[] = ['json', 'yolo', 'coco', 'labelme']

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value)
}

/** Class names sorted alphabetically, each mapped to its zero-based index. */
export function buildClassIndex(detections: Detection[]): { classNames: string[]; classIdMap: Map<string, number> } {
  const classNames = Array.from(new Set(detections.map((d) => d.className))).sort()
  const classIdMap = new Map(classNames.map((name, index) => [name, index]))
  return { classNames, classIdMap }
}

export function exportYolo(detections: Detection[], { width, height }: ImageSize, classIdMap: Map<string, number>): string {
  if (width <= 0 || height <= 0) return ''
  const lines = detections.map(({ className, box }) => {
    const classId = classIdMap.get(className) ?? 0
    const xCenter = (box.x1 + box.width / 2) / width
    const yCenter = (box.y1 + box.height / 2) / height
    const w = box.width / width
    const h = box.height / height
    return `${classId} ${xCenter.toFixed(6)} ${yCenter.toFixed(6)} ${w.toFixed(6)} ${h.toFixed(6)}`
  })
  return lines.join('\n') + (lines.length ? '\n' : '')
}

export function exportCoco(detections: Detection[], { width, height }: ImageSize, fileName: string, now = new Date()) {
  const imageId = 1
  const { classNames, classIdMap } = buildClassIndex(detections)

  return {
    info: {
      description: 'Threat scan export',
      version: '1.0',
      year: now.getUTCFullYear(),
    },
    images: [{ id: imageId, file_name: fileName, width, height }],
    annotations: detections.map(({ className, confidence, riskLevel, box }, idx) => ({
      id: idx + 1,
      image_id: imageId,
      category_id: classIdMap.get(className) ?? 0,
      bbox: [box.x1, box.y1, box.width, box.height],
      area: box.width * box.height,
      iscrowd: 0,
      score: confidence,
      risk_level: riskLevel,
    })),
    categories: classNames.map((name, id) => ({ id, name, supercategory: 'object' })),
  }
}

export function exportLabelMe(detections: Detection[], { width, height }: ImageSize, imagePath: string) {
  return {
    version: '5.0.1',
    flags: {},
    shapes: detections.map(({ className, riskLevel, box }) => ({
      label: className,
      points: [
        [box.x1, box.y1],
        [box.x2, box.y2],
      ],
      group_id: null,
      shape_type: 'rectangle',
      flags: {},
      description: `risk: ${riskLevel}`,
    })),
    imagePath,
    imageData: null,
    imageHeight: height,
    imageWidth: width,
  }
}

/** The scan as the JSON document the CLI prints, minus local file paths. */
export function exportScanJson(scan: ScanResult) {
  return {
    scan_id: scan.scanId,
    image_id: scan.imageId,
    threat: {
      level: scan.threat.threatLevel,
      label: scan.threat.label,
      description: scan.threat.description,
      high_risk_hits: scan.threat.highRiskHits,
      stats: {
        total: scan.threat.stats.total,
        high_risk: scan.threat.stats.highRisk,
        medium_risk: scan.threat.stats.mediumRisk,
        low_risk: scan.threat.stats.lowRisk,
        avg_confidence: scan.threat.stats.avgConfidence,
        max_confidence: scan.threat.stats.maxConfidence,
        class_counts: scan.threat.stats.classCounts,
      },
    },
    detections: scan.detections.map(({ id, className, confidence, riskLevel, box }) => ({
      id,
      class_name: className,
      confidence,
      risk_level: riskLevel,
      bbox: box,
    })),
    inference_ms: scan.inferenceMs,
    image_size: scan.imageSize,
    geo: scan.geo,
  }
}

/** Serialize one scan in the requested format. Returns the file body and a suggested extension. */
export function exportScan(scan: ScanResult, format: ExportFormat): { body: string; extension: string } {
  switch (format) {
    case 'json':
      return { body: JSON.stringify(exportScanJson(scan), null, 2), extension: 'json' }
    case 'yolo': {
      const { classNames, classIdMap } = buildClassIndex(scan.detections)
      const labels = exportYolo(scan.detections, scan.imageSize, classIdMap)
      return { body: `# classes: ${classNames.join(', ')}\n${labels}`, extension: 'txt' }
    }
    case 'coco':
      return { body: JSON.stringify(exportCoco(scan.detections, scan.imageSize, scan.imageId), null, 2), extension: 'coco.json' }
    case 'labelme':
      return {
        body: JSON.stringify(exportLabelMe(scan.detections, scan.imageSize, scan.imageId), null, 2),
        extension: 'labelme.json',
      }
  }
}

/** Event log rows as CSV, header included, in the same layout as the log file. */
export function exportEventRowsCsv(rows: readonly EventLogRow[]): string {
  return encodeCsv([[...EVENT_LOG_COLUMNS], ...rows.map(rowToCells)])
}
