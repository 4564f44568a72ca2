import { promises as fs } from 'fs'
import path from 'path'
import sharp from 'sharp'
import type { RawDetectorOutput } from '@/types/detection'
import type { LlmClient } from '@/lib/llm'
import { createPipeline, type PipelineDeps } from '@/lib/pipeline'
import { createStaticDetector } from '@/lib/detector'
import { EventLog } from '@/lib/eventLog'
import { ScanArtifactStore } from '@/lib/scanArtifacts'
import { createAnalyst } from '@/lib/analyst'
import { coordinateGeocoder } from '@/lib/geo'
import { resolveRiskVocabulary } from '@/lib/riskClassifier'
import { uniqueFileName } from '@/lib/upload'
import {
  AuditLogWriteError,
  DetectionFailedError,
  ScanNotFoundError,
  UploadRejectedError,
} from '@/lib/errors'
import { makeLogger, makeTempDir, removeDir } from './helpers/fixtures'

const now = new Date('2024-05-15T12:00:00Z')

const twoTanks: RawDetectorOutput = {
  boxes: [
    [10, 10, 60, 60],
    [100, 100, 150, 150],
  ],
  scores: [0.8, 0.9],
  classIds: [0, 0],
  names: { 0: 'tank' },
}

function fakeClient(): LlmClient & { generate: jest.Mock } {
  return {
    model: 'fake-model',
    generate: jest.fn().mockResolvedValue({ text: 'Two tanks in the open.', tokensUsed: 30, model: 'fake-model' }),
  }
}

describe('pipeline', () => {
  let dir: string
  let png: Buffer
  let eventLog: EventLog
  let scanStore: ScanArtifactStore

  beforeAll(async () => {
    png = await sharp({ create: { width: 200, height: 200, channels: 3, background: { r: 40, g: 40, b: 40 } } })
      .png()
      .toBuffer()
  })

  beforeEach(async () => {
    dir = await makeTempDir()
    eventLog = new EventLog({ path: path.join(dir, 'logs', 'detections.csv'), clock: () => now })
    scanStore = new ScanArtifactStore({ path: path.join(dir, 'logs', 'sitreps.json'), clock: () => now })
  })

  afterEach(async () => {
    jest.restoreAllMocks()
    await removeDir(dir)
  })

  function build(overrides: Partial<PipelineDeps> = {}) {
    let counter = 0
    return createPipeline({
      uploadDir: path.join(dir, 'uploads'),
      maxUploadBytes: 1024 * 1024,
      vocabulary: resolveRiskVocabulary({ kind: 'military' }),
      detector: createStaticDetector(twoTanks),
      eventLog,
      scanStore,
      analyst: createAnalyst({ client: fakeClient(), provider: 'openai' }),
      geocoder: coordinateGeocoder,
      clock: () => now,
      fileNameFor: (name) => uniqueFileName(name, `scan000${counter++}`),
      ...overrides,
    })
  }

  it('turns an upload into a report, an annotated image, log rows and a sitrep', async () => {
    const pipeline = build()
    const result = await pipeline.processUpload({ fileName: 'Site Photo.png', data: png })

    expect(result.scanId).toBe('scan0000')
    expect(result.imageId).toBe('scan0000_Site_Photo.png')
    expect(result.imageSize).toEqual({ width: 200, height: 200 })
    expect(result.threat.threatLevel).toBe('CRITICAL')
    expect(result.detections.map((d) => [d.id, d.confidence])).toEqual([
      [1, 0.9],
      [0, 0.8],
    ])
    expect(result.geo).toBeNull()

    expect(result.originalPath).toBe(path.join(dir, 'uploads', 'scan0000_Site_Photo.png'))
    expect(result.annotatedPath).toBe(path.join(dir, 'uploads', 'annotated_scan0000_Site_Photo.jpg'))
    await expect(fs.readFile(result.originalPath)).resolves.toEqual(png)
    expect((await sharp(await fs.readFile(result.annotatedPath)).metadata()).format).toBe('jpeg')

    expect(result.audit.status).toBe('logged')
    const rows = await eventLog.readAll({ fresh: true })
    expect(rows.map((row) => [row.imageId, row.threatLevel, row.className, row.confidence])).toEqual([
      ['scan0000_Site_Photo.png', 'CRITICAL', 'tank', 0.9],
      ['scan0000_Site_Photo.png', 'CRITICAL', 'tank', 0.8],
    ])

    expect(result.sitrep).toEqual({ status: 'ok', sitrep: 'Two tanks in the open.', model: 'fake-model', tokens: 30 })
    const artifact = await scanStore.get('scan0000')
    expect(artifact?.summary).toBe('Two tanks in the open.')
    expect(artifact?.detectionContext).toContain('Level: CRITICAL')
  })

  it('logs a sentinel row for an empty scene', async () => {
    const pipeline = build({ detector: createStaticDetector({ boxes: [], scores: [], classIds: [], names: {} }) })
    const result = await pipeline.processUpload({ fileName: 'empty.png', data: png })

    expect(result.threat.threatLevel).toBe('CLEAR')
    const rows = await eventLog.readAll()
    expect(rows).toHaveLength(1)
    expect(rows[0]).toMatchObject({ className: 'NONE', riskLevel: 'none', threatLevel: 'CLEAR' })
  })

  it('rejects unsupported and unreadable uploads before detection', async () => {
    const detect = jest.fn()
    const pipeline = build({ detector: { detect } })

    await expect(pipeline.processUpload({ fileName: 'notes.txt', data: png })).rejects.toMatchObject({
      reason: 'unsupported_type',
    })
    await expect(pipeline.processUpload({ fileName: 'fake.png', data: Buffer.from('nope') })).rejects.toThrow(
      UploadRejectedError
    )
    expect(detect).not.toHaveBeenCalled()
  })

  it('writes nothing to the log when detection fails', async () => {
    const pipeline = build({
      detector: { detect: jest.fn().mockRejectedValue(new Error('inference server down')) },
    })

    await expect(pipeline.processUpload({ fileName: 'a.png', data: png })).rejects.toThrow(DetectionFailedError)
    await expect(pipeline.processUpload({ fileName: 'a.png', data: png })).rejects.toThrow(
      'Detection failed: inference server down'
    )
    expect(await eventLog.readAll()).toEqual([])
    await expect(scanStore.get('scan0000')).resolves.toBeUndefined()
  })

  it('treats malformed detector output as a detection failure', async () => {
    const pipeline = build({
      detector: createStaticDetector({ boxes: [[0, 0, 1, 1]], scores: [], classIds: [0], names: {} }),
    })
    await expect(pipeline.processUpload({ fileName: 'a.png', data: png })).rejects.toThrow(DetectionFailedError)
  })

  it('still returns the report when the audit write fails', async () => {
    const logger = makeLogger()
    jest
      .spyOn(eventLog, 'append')
      .mockRejectedValue(new AuditLogWriteError('Failed to write 2 event log rows for x: disk full', 'x'))
    const pipeline = build({ logger })

    const result = await pipeline.processUpload({ fileName: 'a.png', data: png })
    expect(result.threat.threatLevel).toBe('CRITICAL')
    expect(result.audit).toEqual({ status: 'failed', error: 'Failed to write 2 event log rows for x: disk full' })
    expect(logger.error).toHaveBeenCalledWith(
      'Audit log write failed for scan0000_a.png: Failed to write 2 event log rows for x: disk full'
    )
  })

  it('skips the sitrep when the analyst is disabled', async () => {
    const pipeline = build({ analyst: createAnalyst({ provider: 'gemini' }) })
    const result = await pipeline.processUpload({ fileName: 'a.png', data: png })

    expect(result.sitrep).toEqual({ status: 'disabled', error: 'AI analyst disabled - GEMINI API key not configured' })
    await expect(scanStore.get('scan0000')).resolves.toBeUndefined()
  })

  it('keeps concurrent uploads as separate contiguous batches', async () => {
    const pipeline = build()
    await Promise.all([
      pipeline.processUpload({ fileName: 'one.png', data: png }),
      pipeline.processUpload({ fileName: 'two.png', data: png }),
      pipeline.processUpload({ fileName: 'three.png', data: png }),
    ])

    const ids = (await eventLog.readAll({ fresh: true })).map((row) => row.imageId)
    expect(ids).toHaveLength(6)
    for (let i = 0; i < 6; i += 2) expect(ids[i]).toBe(ids[i + 1])
    expect(new Set(ids).size).toBe(3)
  })

  it('answers follow-up questions and records the exchange', async () => {
    const client = fakeClient()
    const pipeline = build({ analyst: createAnalyst({ client, provider: 'openai' }) })
    await pipeline.processUpload({ fileName: 'a.png', data: png })

    client.generate.mockResolvedValueOnce({ text: 'Both are in the north-west.', tokensUsed: 8, model: 'fake-model' })
    await expect(pipeline.chat('scan0000', 'where are they?')).resolves.toEqual({
      status: 'ok',
      answer: 'Both are in the north-west.',
      tokens: 8,
    })
    await expect(scanStore.chatHistory('scan0000')).resolves.toEqual([
      { role: 'user', content: 'where are they?' },
      { role: 'assistant', content: 'Both are in the north-west.' },
    ])
  })

  it('does not record an exchange the analyst could not answer', async () => {
    const client = fakeClient()
    const pipeline = build({ analyst: createAnalyst({ client, provider: 'openai' }) })
    await pipeline.processUpload({ fileName: 'a.png', data: png })

    client.generate.mockRejectedValueOnce(new Error('timeout'))
    await expect(pipeline.chat('scan0000', 'still there?')).resolves.toEqual({
      status: 'unavailable',
      error: 'LLM error: timeout',
    })
    await expect(scanStore.chatHistory('scan0000')).resolves.toEqual([])
  })

  it('rejects chat for an unknown scan', async () => {
    await expect(build().chat('missing', 'hello')).rejects.toThrow(ScanNotFoundError)
  })

  it('serves the dashboard from the event log', async () => {
    const pipeline = build()
    await pipeline.processUpload({ fileName: 'a.png', data: png })

    const snapshot = await pipeline.dashboard()
    expect(snapshot.summary).toEqual({ totalScans: 1, totalDetections: 2, criticalToday: 1, mostDetectedClass: 'tank' })
    expect(await pipeline.recentLogs(1)).toHaveLength(1)
  })
})
