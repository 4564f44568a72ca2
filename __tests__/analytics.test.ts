import { promises as fs } from 'fs'
import path from 'path'
import type { EventLogRow } from '@/types/eventLog'
import {
  binLabel,
  computeSnapshot,
  confidenceBin,
  createAnalyticsEngine,
  emptySnapshot,
  NO_CLASS_PLACEHOLDER,
} from '@/lib/analytics'
import { EventLog } from '@/lib/eventLog'
import { resolveRiskVocabulary } from '@/lib/riskClassifier'
import { assessThreat } from '@/lib/threat'
import { makeLogger, makeTempDir, removeDir } from './helpers/fixtures'

const vocabulary = resolveRiskVocabulary({ kind: 'military' })
// A Wednesday
const now = new Date('2024-05-15T12:00:00Z')

function row(overrides: Partial<EventLogRow>): EventLogRow {
  return {
    timestamp: '2024-05-15 09:10:00',
    imageId: 'img.jpg',
    threatLevel: 'LOW',
    totalDetections: 1,
    highRiskCount: 0,
    className: 'car',
    confidence: 0.5,
    riskLevel: 'low',
    boxX1: 0,
    boxY1: 0,
    boxX2: 10,
    boxY2: 10,
    inferenceMs: 20,
    ...overrides,
  }
}

const sentinel = (timestamp: string, imageId: string) =>
  row({ timestamp, imageId, threatLevel: 'CLEAR', totalDetections: 0, className: 'NONE', confidence: 0, riskLevel: 'none' })

describe('confidenceBin', () => {
  it('uses right-closed bins with zero in the first', () => {
    expect(confidenceBin(0)).toBe(0)
    expect(confidenceBin(0.1)).toBe(0)
    expect(confidenceBin(0.1001)).toBe(1)
    expect(confidenceBin(0.9)).toBe(8)
    expect(confidenceBin(0.95)).toBe(9)
    expect(confidenceBin(1)).toBe(9)
  })

  it('ignores values outside [0, 1]', () => {
    expect(confidenceBin(-0.1)).toBeNull()
    expect(confidenceBin(1.5)).toBeNull()
  })

  it('labels bins by their edges', () => {
    expect(binLabel(0)).toBe('0.0-0.1')
    expect(binLabel(9)).toBe('0.9-1.0')
  })
})

describe('computeSnapshot', () => {
  const rows = [
    sentinel('2024-05-08 03:00:00', 'a.jpg'),
    sentinel('2024-05-08 04:00:00', 'b.jpg'),
    row({ imageId: 'crit.jpg', threatLevel: 'CRITICAL', totalDetections: 2, highRiskCount: 2, className: 'tank', confidence: 0.95, riskLevel: 'high' }),
    row({ imageId: 'crit.jpg', threatLevel: 'CRITICAL', totalDetections: 2, highRiskCount: 2, className: 'tank', confidence: 0.9, riskLevel: 'high' }),
  ]

  it('counts one critical image today against two clear images last week', () => {
    const snapshot = computeSnapshot(rows, { now, vocabulary })
    expect(snapshot.summary).toEqual({
      totalScans: 3,
      totalDetections: 2,
      criticalToday: 1,
      mostDetectedClass: 'tank',
    })
    expect(snapshot.threatDistribution).toEqual({ CRITICAL: 1, HIGH: 0, ELEVATED: 0, LOW: 0, CLEAR: 2 })
  })

  it('builds a 30 day series ending today', () => {
    const { detectionsOverTime } = computeSnapshot(rows, { now, vocabulary })
    expect(detectionsOverTime).toHaveLength(30)
    expect(detectionsOverTime[0]).toEqual({ date: '2024-04-16', count: 0 })
    expect(detectionsOverTime[29]).toEqual({ date: '2024-05-15', count: 2 })
    // sentinel rows are not detections
    expect(detectionsOverTime.find((day) => day.date === '2024-05-08')).toEqual({ date: '2024-05-08', count: 0 })
  })

  it('ranks classes, buckets confidences and fills the heatmap from real detections', () => {
    const snapshot = computeSnapshot(rows, { now, vocabulary })
    expect(snapshot.topClasses).toEqual([{ className: 'tank', count: 2, risk: 'high' }])
    expect(snapshot.confidenceHistogram[8]).toEqual({ bin: '0.8-0.9', count: 1 })
    expect(snapshot.confidenceHistogram[9]).toEqual({ bin: '0.9-1.0', count: 1 })
    expect(snapshot.confidenceHistogram.reduce((sum, bin) => sum + bin.count, 0)).toBe(2)
    expect(snapshot.hourlyHeatmap.Wed[9]).toBe(2)
    expect(Object.values(snapshot.hourlyHeatmap).flat().reduce((a, b) => a + b, 0)).toBe(2)
  })

  it('lists recent rows newest first', () => {
    const { recentRows } = computeSnapshot(rows, { now, vocabulary })
    expect(recentRows.map((r) => [r.imageId, r.confidence])).toEqual([
      ['crit.jpg', 0.9],
      ['crit.jpg', 0.95],
      ['b.jpg', 0],
      ['a.jpg', 0],
    ])
  })

  it('only counts critical images from the current UTC day', () => {
    const snapshot = computeSnapshot(
      [row({ timestamp: '2024-05-14 23:59:59', threatLevel: 'CRITICAL', className: 'tank', riskLevel: 'high' })],
      { now, vocabulary }
    )
    expect(snapshot.summary.criticalToday).toBe(0)
    expect(snapshot.threatDistribution.CRITICAL).toBe(1)
  })

  it('breaks ties on class counts by first appearance', () => {
    const snapshot = computeSnapshot(
      [row({ className: 'radar_station' }), row({ className: 'tank' }), row({ className: 'tank' }), row({ className: 'bunker' })],
      { now, vocabulary }
    )
    expect(snapshot.topClasses.map((c) => [c.className, c.count, c.risk])).toEqual([
      ['tank', 2, 'high'],
      ['radar_station', 1, 'medium'],
      ['bunker', 1, 'medium'],
    ])
  })

  it('reports no class when only sentinel rows exist', () => {
    const snapshot = computeSnapshot([sentinel('2024-05-15 01:00:00', 'x.jpg')], { now, vocabulary })
    expect(snapshot.summary.mostDetectedClass).toBe(NO_CLASS_PLACEHOLDER)
    expect(snapshot.summary.totalScans).toBe(1)
    expect(snapshot.topClasses).toEqual([])
  })

  it('returns the empty snapshot for an empty log', () => {
    expect(computeSnapshot([], { now, vocabulary })).toEqual(emptySnapshot(now))
    expect(emptySnapshot(now).summary.mostDetectedClass).toBe('None')
    expect(emptySnapshot(now).hourlyHeatmap.Sun).toHaveLength(24)
  })
})

describe('createAnalyticsEngine', () => {
  let dir: string

  beforeEach(async () => {
    dir = await makeTempDir()
  })

  afterEach(async () => {
    await removeDir(dir)
  })

  it('computes from the event log', async () => {
    const eventLog = new EventLog({ path: path.join(dir, 'log.csv'), clock: () => now })
    await eventLog.append('clear.jpg', assessThreat([]), [], 3)

    const engine = createAnalyticsEngine({ eventLog, vocabulary, clock: () => now })
    const snapshot = await engine.compute()
    expect(snapshot.summary.totalScans).toBe(1)
    expect(snapshot.threatDistribution.CLEAR).toBe(1)
  })

  it('hands out copies of the logged rows', async () => {
    const eventLog = new EventLog({ path: path.join(dir, 'log.csv'), clock: () => now })
    await eventLog.append('clear.jpg', assessThreat([]), [], 3)

    const snapshot = await createAnalyticsEngine({ eventLog, vocabulary, clock: () => now }).compute()
    snapshot.recentRows[0].imageId = 'changed.jpg'

    expect((await eventLog.readAll()).map((r) => r.imageId)).toEqual(['clear.jpg'])
  })

  it('degrades to the empty snapshot when the log cannot be read', async () => {
    const logPath = path.join(dir, 'log.csv')
    await fs.writeFile(logPath, 'not,the,header\r\n')
    const logger = makeLogger()
    const engine = createAnalyticsEngine({
      eventLog: new EventLog({ path: logPath }),
      vocabulary,
      clock: () => now,
      logger,
    })

    await expect(engine.compute()).resolves.toEqual(emptySnapshot(now))
    expect(logger.error).toHaveBeenCalledWith('Event log unreadable, serving empty dashboard', expect.any(Error))
  })
})
