/**
 * Dashboard analytics: a read-only fold over the event log.
 *
 * All calendar arithmetic is UTC, the zone the log timestamps are written in.
 */
import type { RiskVocabulary } from '@/types/detection'
import type {
  ClassCount,
  DailyCount,
  DashboardSnapshot,
  HistogramBin,
  WeekdayKey,
} from '@/types/analytics'
import type { EventLogRow } from '@/types/eventLog'
import type { ThreatLevel } from '@/types/threat'
import { isSentinelRow, parseTimestamp, type EventLog } from '@/lib/eventLog'
import { classifyRisk } from '@/lib/riskClassifier'
import { silentLogger, type Logger } from '@/lib/logger'
import { countBy } from '@/lib/utils'

export const WEEKDAYS: WeekdayKey[] = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun']
export const NO_CLASS_PLACEHOLDER = 'None'

const SERIES_DAYS = 30
const TOP_CLASS_LIMIT = 10
const RECENT_ROW_LIMIT = 25
const HISTOGRAM_BINS = 10
const DAY_MS = 24 * 60 * 60 * 1000

export type AnalyticsOptions = {
  now: Date
  vocabulary: RiskVocabulary
}

function dayKey(date: Date): string {
  return date.toISOString().slice(0, 10)
}

// getUTCDay() counts from Sunday
function weekdayOf(date: Date): WeekdayKey {
  return WEEKDAYS[(date.getUTCDay() + 6) % 7]
}

export function binLabel(index: number): string {
  return `${(index / HISTOGRAM_BINS).toFixed(1)}-${((index + 1) / HISTOGRAM_BINS).toFixed(1)}`
}

/**
 * Bins are right-closed, (0.1, 0.2], except the first which also takes 0.
 * Confidence is stored with four decimals, so compare on the integer scale
 * to avoid float error at the edges.
 */
export function confidenceBin(confidence: number): number | null {
  if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) return null
  const scaled = Math.round(confidence * 10000)
  return Math.max(0, Math.ceil(scaled / (10000 / HISTOGRAM_BINS)) - 1)
}

function emptyThreatDistribution(): Record<ThreatLevel, number> {
  return { CRITICAL: 0, HIGH: 0, ELEVATED: 0, LOW: 0, CLEAR: 0 }
}

function emptyHeatmap(): Record<WeekdayKey, number[]> {
  const hours = () => new Array<number>(24).fill(0)
  return { Mon: hours(), Tue: hours(), Wed: hours(), Thu: hours(), Fri: hours(), Sat: hours(), Sun: hours() }
}

function seriesDays(now: Date): string[] {
  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate())
  return Array.from({ length: SERIES_DAYS }, (_, i) =>
    dayKey(new Date(today - (SERIES_DAYS - 1 - i) * DAY_MS))
  )
}

export function emptySnapshot(now: Date): DashboardSnapshot {
  return {
    summary: {
      totalScans: 0,
      totalDetections: 0,
      criticalToday: 0,
      mostDetectedClass: NO_CLASS_PLACEHOLDER,
    },
    threatDistribution: emptyThreatDistribution(),
    detectionsOverTime: seriesDays(now).map((date) => ({ date, count: 0 })),
    topClasses: [],
    hourlyHeatmap: emptyHeatmap(),
    confidenceHistogram: Array.from({ length: HISTOGRAM_BINS }, (_, i) => ({ bin: binLabel(i), count: 0 })),
    recentRows: [],
  }
}

type DatedRow = { row: EventLogRow; date: Date }

export function computeSnapshot(rows: readonly EventLogRow[], options: AnalyticsOptions): DashboardSnapshot {
  const dated: DatedRow[] = []
  for (const row of rows) {
    const date = parseTimestamp(row.timestamp)
    if (date) dated.push({ row, date })
  }
  if (dated.length === 0) return emptySnapshot(options.now)

  const real = dated.filter(({ row }) => !isSentinelRow(row))
  const today = dayKey(options.now)

  // Summary and distribution are per image: first recorded level wins
  const levelByImage = new Map<string, ThreatLevel>()
  const criticalToday = new Set<string>()
  for (const { row, date } of dated) {
    if (!levelByImage.has(row.imageId)) levelByImage.set(row.imageId, row.threatLevel)
    if (row.threatLevel === 'CRITICAL' && dayKey(date) === today) criticalToday.add(row.imageId)
  }

  const threatDistribution = emptyThreatDistribution()
  for (const level of levelByImage.values()) threatDistribution[level] += 1

  const classCounts = Array.from(countBy(real, ({ row }) => row.className).entries())
    // sort is stable: ties keep first-seen order
    .sort((a, b) => b[1] - a[1])

  const dailyCounts = countBy(real, ({ date }) => dayKey(date))
  const detectionsOverTime: DailyCount[] = seriesDays(options.now).map((date) => ({
    date,
    count: dailyCounts.get(date) ?? 0,
  }))

  const topClasses: ClassCount[] = classCounts.slice(0, TOP_CLASS_LIMIT).map(([className, count]) => ({
    className,
    count,
    risk: classifyRisk(className, options.vocabulary),
  }))

  const hourlyHeatmap = emptyHeatmap()
  for (const { date } of real) hourlyHeatmap[weekdayOf(date)][date.getUTCHours()] += 1

  const histogram = new Array<number>(HISTOGRAM_BINS).fill(0)
  for (const { row } of real) {
    const bin = confidenceBin(row.confidence)
    if (bin !== null) histogram[bin] += 1
  }
  const confidenceHistogram: HistogramBin[] = histogram.map((count, i) => ({ bin: binLabel(i), count }))

  return {
    summary: {
      totalScans: levelByImage.size,
      totalDetections: real.length,
      criticalToday: criticalToday.size,
      mostDetectedClass: classCounts.length > 0 ? classCounts[0][0] : NO_CLASS_PLACEHOLDER,
    },
    threatDistribution,
    detectionsOverTime,
    topClasses,
    hourlyHeatmap,
    confidenceHistogram,
    recentRows: dated.slice(-RECENT_ROW_LIMIT).map(({ row }) => ({ ...row })).reverse(),
  }
}

export type AnalyticsEngine = {
  compute: () => Promise<DashboardSnapshot>
}

export function createAnalyticsEngine(deps: {
  eventLog: EventLog
  vocabulary: RiskVocabulary
  clock?: () => Date
  logger?: Logger
}): AnalyticsEngine {
  const clock = deps.clock ?? (() => new Date())
  const logger = deps.logger ?? silentLogger

  return {
    compute: async () => {
      const now = clock()
      let rows: readonly EventLogRow[]
      try {
        rows = await deps.eventLog.readAll()
      } catch (error) {
        logger.error('Event log unreadable, serving empty dashboard', error)
        return emptySnapshot(now)
      }
      return computeSnapshot(rows, { now, vocabulary: deps.vocabulary })
    },
  }
}
