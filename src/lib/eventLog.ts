/**
 * Append-only detection event log.
 *
 * The CSV file is the durable record; the zustand store in `store` is the
 * read path. Appends and file reads both run inside one mutex, so a batch of
 * rows is written by a single appendFile call that never interleaves with
 * another batch, and a reader always sees whole batches. Writes also hold
 * the log's file lock, which orders them against other processes.
 */
import { promises as fs } from 'fs'
import path from 'path'
import { z } from 'zod'
import type { Detection } from '@/types/detection'
import type { EventLogRow } from '@/types/eventLog'
import type { ThreatReport } from '@/types/threat'
import { AuditLogWriteError, EventLogReadError, errorMessage, hasErrorCode } from '@/lib/errors'
import { encodeCsv, encodeCsvRow, parseCsv, type CsvCell } from '@/lib/csv'
import { createMutex } from '@/lib/mutex'
import { replaceFile, withFileLock } from '@/lib/fileLock'
import { silentLogger, type Logger } from '@/lib/logger'
import { roundTo } from '@/lib/utils'
import { createEventLogStore, type EventLogStore } from '@/stores/eventLogStore'

export const EVENT_LOG_COLUMNS = [
  'timestamp',
  'image_filename',
  'threat_level',
  'total_detections',
  'high_risk_count',
  'class_name',
  'confidence',
  'risk_level',
  'box_x1',
  'box_y1',
  'box_x2',
  'box_y2',
  'inference_ms',
] as const

export const SENTINEL_CLASS = 'NONE'

const HEADER_LINE = `${encodeCsvRow([...EVENT_LOG_COLUMNS])}\r\n`
const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/

const pad = (value: number) => String(value).padStart(2, '0')

/** UTC `YYYY-MM-DD HH:MM:SS` */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  )
}

export function parseTimestamp(value: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(value)
  if (!match) return null
  const [, year, month, day, hour, minute, second] = match.map(Number)
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second))
  return date.getUTCDate() === day ? date : null
}

const rowSchema = z.object({
  timestamp: z.string().refine((value) => parseTimestamp(value) !== null, 'invalid timestamp'),
  image_filename: z.string().min(1),
  threat_level: z.enum(['CLEAR', 'LOW', 'ELEVATED', 'HIGH', 'CRITICAL']),
  total_detections: z.coerce.number().int().nonnegative(),
  high_risk_count: z.coerce.number().int().nonnegative(),
  class_name: z.string(),
  confidence: z.coerce.number().finite(),
  risk_level: z.enum(['high', 'medium', 'low', 'none']),
  box_x1: z.coerce.number().finite(),
  box_y1: z.coerce.number().finite(),
  box_x2: z.coerce.number().finite(),
  box_y2: z.coerce.number().finite(),
  inference_ms: z.coerce.number().finite(),
})

function recordToRow(record: string[]): EventLogRow | null {
  if (record.length !== EVENT_LOG_COLUMNS.length) return null
  const fields = Object.fromEntries(EVENT_LOG_COLUMNS.map((column, index) => [column, record[index]]))
  const result = rowSchema.safeParse(fields)
  if (!result.success) return null
  const value = result.data
  return {
    timestamp: value.timestamp,
    imageId: value.image_filename,
    threatLevel: value.threat_level,
    totalDetections: value.total_detections,
    highRiskCount: value.high_risk_count,
    className: value.class_name,
    confidence: value.confidence,
    riskLevel: value.risk_level,
    boxX1: value.box_x1,
    boxY1: value.box_y1,
    boxX2: value.box_x2,
    boxY2: value.box_y2,
    inferenceMs: value.inference_ms,
  }
}

export function rowToCells(row: EventLogRow): CsvCell[] {
  return [
    row.timestamp,
    row.imageId,
    row.threatLevel,
    row.totalDetections,
    row.highRiskCount,
    row.className,
    row.confidence.toFixed(4),
    row.riskLevel,
    row.boxX1,
    row.boxY1,
    row.boxX2,
    row.boxY2,
    row.inferenceMs,
  ]
}

export function isSentinelRow(row: EventLogRow): boolean {
  return row.className === SENTINEL_CLASS && row.riskLevel === 'none'
}

/**
 * One row per detection, or a single sentinel row when nothing was found,
 * so that every processed image leaves a trace.
 */
export function buildLogRows(
  imageId: string,
  report: ThreatReport,
  detections: Detection[],
  inferenceMs: number,
  timestamp: string
): EventLogRow[] {
  const base = {
    timestamp,
    imageId,
    threatLevel: report.threatLevel,
    inferenceMs: roundTo(inferenceMs, 1),
  }

  if (detections.length === 0) {
    return [
      {
        ...base,
        totalDetections: 0,
        highRiskCount: 0,
        className: SENTINEL_CLASS,
        confidence: 0,
        riskLevel: 'none',
        boxX1: 0,
        boxY1: 0,
        boxX2: 0,
        boxY2: 0,
      },
    ]
  }

  return detections.map((detection) => ({
    ...base,
    totalDetections: report.stats.total,
    highRiskCount: report.stats.highRisk,
    className: detection.className,
    confidence: detection.confidence,
    riskLevel: detection.riskLevel,
    boxX1: detection.box.x1,
    boxY1: detection.box.y1,
    boxX2: detection.box.x2,
    boxY2: detection.box.y2,
  }))
}

export function parseEventLog(text: string): { rows: EventLogRow[]; skipped: number } {
  let records: string[][]
  try {
    records = parseCsv(text)
  } catch (error) {
    throw new EventLogReadError(`Event log is not valid CSV: ${errorMessage(error)}`, { cause: error })
  }
  if (records.length === 0) return { rows: [], skipped: 0 }

  const [header, ...body] = records
  if (header.join(',') !== EVENT_LOG_COLUMNS.join(',')) {
    throw new EventLogReadError(`Unexpected event log header: ${header.join(',')}`)
  }

  const rows: EventLogRow[] = []
  let skipped = 0
  for (const record of body) {
    const row = recordToRow(record)
    if (row) {
      rows.push(row)
    } else {
      skipped++
    }
  }
  return { rows, skipped }
}

const isMissingFile = (error: unknown) => hasErrorCode(error, 'ENOENT')

export type EventLogOptions = {
  path: string
  logger?: Logger
  clock?: () => Date
}

export class EventLog {
  readonly path: string
  readonly store: EventLogStore
  private readonly logger: Logger
  private readonly clock: () => Date
  private readonly mutex = createMutex()

  constructor(options: EventLogOptions) {
    this.path = options.path
    this.logger = options.logger ?? silentLogger
    this.clock = options.clock ?? (() => new Date())
    this.store = createEventLogStore()
  }

  /** Create the log file with its header if it does not exist yet. */
  async init(): Promise<void> {
    await this.mutex.runExclusive(() => withFileLock(this.path, () => this.ensureFile()))
  }

  /**
   * Append every row for one image, or none of them.
   * Rejects with AuditLogWriteError when the write fails.
   */
  async append(
    imageId: string,
    report: ThreatReport,
    detections: Detection[],
    inferenceMs: number
  ): Promise<EventLogRow[]> {
    const rows = buildLogRows(imageId, report, detections, inferenceMs, formatTimestamp(this.clock()))
    const text = encodeCsv(rows.map(rowToCells))

    await this.mutex.runExclusive(async () => {
      try {
        await withFileLock(this.path, async () => {
          await this.ensureFile()
          const sizeBefore = (await fs.stat(this.path)).size
          // A crash can leave the last line unterminated; start a fresh line
          // so the first row of this batch is not merged into it.
          const prefix = (await this.endsWithLineBreak(sizeBefore)) ? '' : '\r\n'
          try {
            await fs.appendFile(this.path, prefix + text, 'utf-8')
          } catch (error) {
            await this.rollback(sizeBefore)
            throw error
          }
        })
      } catch (error) {
        throw new AuditLogWriteError(
          `Failed to write ${rows.length} event log rows for ${imageId}: ${errorMessage(error)}`,
          imageId,
          { cause: error }
        )
      }

      const state = this.store.getState()
      if (state.hydrated) state.appendRows(rows)
    })

    this.logger.info(`Logged ${rows.length} detection rows for ${imageId}`)
    return rows
  }

  /**
   * Every valid row in file order. The in-memory copy is loaded on first use;
   * `fresh` re-reads the file, picking up rows written by other processes.
   */
  async readAll(options: { fresh?: boolean } = {}): Promise<readonly EventLogRow[]> {
    return this.mutex.runExclusive(async () => {
      if (options.fresh || !this.store.getState().hydrated) {
        await this.hydrateFromDisk()
      }
      return this.store.getState().rows
    })
  }

  /** The last `limit` rows, oldest first. */
  async readRecent(limit = 50): Promise<EventLogRow[]> {
    const rows = await this.readAll()
    return limit > 0 ? rows.slice(-limit) : []
  }

  async exportCsv(): Promise<string> {
    return this.mutex.runExclusive(async () => {
      try {
        return await fs.readFile(this.path, 'utf-8')
      } catch (error) {
        if (isMissingFile(error)) return HEADER_LINE
        throw new EventLogReadError(`Cannot read event log: ${errorMessage(error)}`, { cause: error })
      }
    })
  }

  /**
   * Retention: drop rows older than `olderThanDays`. This is the only
   * operation that rewrites the file and it is never run by an append.
   */
  async compact(options: { olderThanDays: number; now?: Date }): Promise<{ kept: number; removed: number }> {
    const now = options.now ?? this.clock()
    const cutoff = now.getTime() - options.olderThanDays * 24 * 60 * 60 * 1000

    return this.mutex.runExclusive(() =>
      withFileLock(this.path, async () => {
        await this.hydrateFromDisk()
        const { rows, skippedRows } = this.store.getState()
        const kept = rows.filter((row) => {
          const date = parseTimestamp(row.timestamp)
          return date !== null && date.getTime() >= cutoff
        })

        await replaceFile(this.path, HEADER_LINE + encodeCsv(kept.map(rowToCells)))
        this.store.getState().hydrate(kept, 0)

        const removed = rows.length - kept.length + skippedRows
        this.logger.info(`Compacted event log: kept ${kept.length} rows, removed ${removed}`)
        return { kept: kept.length, removed }
      })
    )
  }

  private async ensureFile(): Promise<void> {
    try {
      const stats = await fs.stat(this.path)
      if (stats.size === 0) await fs.appendFile(this.path, HEADER_LINE, 'utf-8')
    } catch (error) {
      if (!isMissingFile(error)) throw error
      await fs.mkdir(path.dirname(this.path), { recursive: true })
      await fs.writeFile(this.path, HEADER_LINE, 'utf-8')
    }
  }

  private async endsWithLineBreak(size: number): Promise<boolean> {
    if (size === 0) return true
    const handle = await fs.open(this.path, 'r')
    try {
      const { bytesRead, buffer } = await handle.read(Buffer.alloc(1), 0, 1, size - 1)
      return bytesRead === 1 && buffer[0] === 0x0a
    } finally {
      await handle.close()
    }
  }

  private async rollback(size: number): Promise<void> {
    try {
      await fs.truncate(this.path, size)
    } catch (error) {
      this.logger.error(`Could not roll back partial append to ${this.path}`, error)
    }
  }

  private async hydrateFromDisk(): Promise<void> {
    let text: string
    try {
      text = await fs.readFile(this.path, 'utf-8')
    } catch (error) {
      if (!isMissingFile(error)) {
        throw new EventLogReadError(`Cannot read event log: ${errorMessage(error)}`, { cause: error })
      }
      text = ''
    }

    const { rows, skipped } = parseEventLog(text)
    if (skipped > 0) {
      this.logger.warn(`Skipped ${skipped} malformed event log rows in ${this.path}`)
    }
    this.store.getState().hydrate(rows, skipped)
  }
}
