import type { Detection, ImageSize } from '@/types/detection'
import type { EventLogRow } from '@/types/eventLog'
import type { ThreatReport } from '@/types/threat'

export type UploadInput = {
  fileName: string
  data: Buffer
}

export type GeoInfo = {
  latitude: number
  longitude: number
  locationName: string
  altitude: number | null
  mapsLink: string
}

export type SitrepResult =
  | { status: 'ok'; sitrep: string; model: string; tokens: number }
  | { status: 'disabled'; error: string }
  | { status: 'unavailable'; error: string }

export type ChatResult =
  | { status: 'ok'; answer: string; tokens: number }
  | { status: 'disabled'; error: string }
  | { status: 'unavailable'; error: string }

export type AuditStatus =
  | { status: 'logged'; rows: EventLogRow[] }
  | { status: 'failed'; error: string }

export type ScanResult = {
  scanId: string
  imageId: string
  detections: Detection[]
  threat: ThreatReport
  originalPath: string
  annotatedPath: string
  inferenceMs: number
  imageSize: ImageSize
  geo: GeoInfo | null
  sitrep: SitrepResult
  audit: AuditStatus
}
