/**
 * Detection-to-intelligence pipeline.
 *
 * Each upload runs as its own computation; the event log and the scan
 * store are the only shared state and they serialize their own writes.
 * No lock is held while the detector, the LLM or the geocoder is working.
 */
import { promises as fs } from 'fs'
import path from 'path'
import { performance } from 'perf_hooks'
import type { Detection, RawDetectorOutput, RiskVocabulary } from '@/types/detection'
import type { DashboardSnapshot } from '@/types/analytics'
import type { EventLogRow } from '@/types/eventLog'
import type { ScanArtifact } from '@/types/scan'
import type { AuditStatus, ChatResult, GeoInfo, ScanResult, SitrepResult, UploadInput } from '@/types'
import type { AppConfig } from '@/lib/config'
import { HttpDetector, type Detector } from '@/lib/detector'
import { EventLog } from '@/lib/eventLog'
import { ScanArtifactStore } from '@/lib/scanArtifacts'
import { createAnalyticsEngine, type AnalyticsEngine } from '@/lib/analytics'
import { createAnalyst, buildDetectionContext, type Analyst } from '@/lib/analyst'
import { createLlmClient } from '@/lib/llm'
import { NominatimGeocoder, coordinateGeocoder, locateImage, type Geocoder } from '@/lib/geo'
import { normalizeDetections } from '@/lib/normalize'
import { assessThreat } from '@/lib/threat'
import { annotateImage } from '@/lib/annotate'
import { readImageInfo, scanIdFromFileName, uniqueFileName, validateUpload } from '@/lib/upload'
import { resolveRiskVocabulary } from '@/lib/riskClassifier'
import { AuditLogWriteError, DetectionFailedError, ScanNotFoundError, errorMessage } from '@/lib/errors'
import { createLogger, silentLogger, type Logger } from '@/lib/logger'
import { roundTo } from '@/lib/utils'

export type PipelineDeps = {
  uploadDir: string
  maxUploadBytes: number
  vocabulary: RiskVocabulary
  detector: Detector
  eventLog: EventLog
  scanStore: ScanArtifactStore
  analyst: Analyst
  geocoder: Geocoder
  logger?: Logger
  clock?: () => Date
  fileNameFor?: (fileName: string) => string
}

export type Pipeline = {
  processUpload: (input: UploadInput, signal?: AbortSignal) => Promise<ScanResult>
  chat: (scanId: string, message: string) => Promise<ChatResult>
  getScan: (scanId: string) => Promise<ScanArtifact | undefined>
  dashboard: () => Promise<DashboardSnapshot>
  recentLogs: (limit?: number) => Promise<EventLogRow[]>
  analytics: AnalyticsEngine
}

export function annotatedFileName(uniqueName: string): string {
  return `annotated_${path.parse(uniqueName).name}.jpg`
}

export function createPipeline(deps: PipelineDeps): Pipeline {
  const logger = deps.logger ?? silentLogger
  const fileNameFor = deps.fileNameFor ?? ((name: string) => uniqueFileName(name))
  const analytics = createAnalyticsEngine({
    eventLog: deps.eventLog,
    vocabulary: deps.vocabulary,
    clock: deps.clock,
    logger: logger.child('analytics'),
  })

  const locate = async (data: Buffer): Promise<GeoInfo | null> => {
    try {
      return await locateImage(data, deps.geocoder, logger.child('geo'))
    } catch (error) {
      logger.warn(`Geolocation unavailable: ${errorMessage(error)}`)
      return null
    }
  }

  const detect = async (
    input: UploadInput,
    savePath: string,
    signal?: AbortSignal
  ): Promise<{ raw: RawDetectorOutput; inferenceMs: number }> => {
    const started = performance.now()
    try {
      const raw = await deps.detector.detect({ path: savePath, fileName: input.fileName, data: input.data }, signal)
      return { raw, inferenceMs: roundTo(performance.now() - started, 1) }
    } catch (error) {
      throw new DetectionFailedError(`Detection failed: ${errorMessage(error)}`, { cause: error })
    }
  }

  const summarize = async (scanId: string, context: string): Promise<SitrepResult> => {
    const sitrep = await deps.analyst.generateSitrep(context)
    if (sitrep.status === 'ok') {
      try {
        await deps.scanStore.create(scanId, context, sitrep.sitrep, { model: sitrep.model, tokens: sitrep.tokens })
      } catch (error) {
        logger.error(`Could not store sitrep for scan ${scanId}: ${errorMessage(error)}`)
      }
    }
    return sitrep
  }

  const processUpload = async (input: UploadInput, signal?: AbortSignal): Promise<ScanResult> => {
    validateUpload(input.fileName, input.data.length, deps.maxUploadBytes)
    const imageSize = await readImageInfo(input.data)

    const imageId = fileNameFor(input.fileName)
    const scanId = scanIdFromFileName(imageId)
    const originalPath = path.join(deps.uploadDir, imageId)
    const annotatedPath = path.join(deps.uploadDir, annotatedFileName(imageId))

    await fs.mkdir(deps.uploadDir, { recursive: true })
    await fs.writeFile(originalPath, input.data)
    logger.info(`Image saved: ${originalPath}`)

    const [{ raw, inferenceMs }, geo] = await Promise.all([
      detect(input, originalPath, signal),
      locate(input.data),
    ])

    let detections: Detection[]
    try {
      detections = normalizeDetections(raw, deps.vocabulary)
    } catch (error) {
      throw new DetectionFailedError(`Detection failed: ${errorMessage(error)}`, { cause: error })
    }
    const threat = assessThreat(detections)

    try {
      await fs.writeFile(annotatedPath, await annotateImage(input.data, detections))
    } catch (error) {
      throw new DetectionFailedError(`Annotation failed: ${errorMessage(error)}`, { cause: error })
    }
    logger.info(`Detection complete | ${detections.length} objects found | ${inferenceMs} ms | image=${imageId}`)

    let audit: AuditStatus
    try {
      const rows = await deps.eventLog.append(imageId, threat, detections, inferenceMs)
      audit = { status: 'logged', rows }
    } catch (error) {
      if (!(error instanceof AuditLogWriteError)) throw error
      // The caller still gets the report; the gap shows up in `audit`
      logger.error(`Audit log write failed for ${imageId}: ${error.message}`)
      audit = { status: 'failed', error: error.message }
    }

    const context = buildDetectionContext({ detections, threat, imageSize, inferenceMs })
    const sitrep = await summarize(scanId, context)

    return {
      scanId,
      imageId,
      detections,
      threat,
      originalPath,
      annotatedPath,
      inferenceMs,
      imageSize: { width: imageSize.width, height: imageSize.height },
      geo,
      sitrep,
      audit,
    }
  }

  const chat = async (scanId: string, message: string): Promise<ChatResult> => {
    const artifact = await deps.scanStore.get(scanId)
    if (!artifact) throw new ScanNotFoundError(scanId)

    const result = await deps.analyst.chat({
      scanId,
      message,
      detectionContext: artifact.detectionContext,
      sitrep: artifact.summary,
      history: artifact.chatHistory,
    })
    if (result.status === 'ok') {
      await deps.scanStore.appendExchange(scanId, message, result.answer)
    }
    return result
  }

  return {
    processUpload,
    chat,
    getScan: (scanId) => deps.scanStore.get(scanId),
    dashboard: () => analytics.compute(),
    recentLogs: (limit = 50) => deps.eventLog.readRecent(limit),
    analytics,
  }
}

export type Services = {
  config: AppConfig
  logger: Logger
  eventLog: EventLog
  scanStore: ScanArtifactStore
  pipeline: Pipeline
}

/**
 * Build the production object graph once, at process start.
 * `detector` overrides the HTTP detector (for replaying recorded output).
 */
export async function createServices(config: AppConfig, overrides: { detector?: Detector } = {}): Promise<Services> {
  const logger = createLogger('threatlens', { level: config.logLevel })
  const eventLog = new EventLog({ path: config.logPath, logger: logger.child('event-log') })
  const scanStore = new ScanArtifactStore({ path: config.scanStorePath, logger: logger.child('scan-store') })
  await eventLog.init()

  const analyst = createAnalyst({
    client: createLlmClient(config.llm),
    provider: config.llm.provider,
    logger: logger.child('analyst'),
  })
  const geocoder = config.geocoder.enabled
    ? new NominatimGeocoder({ userAgent: config.geocoder.userAgent, logger: logger.child('geocoder') })
    : coordinateGeocoder

  const pipeline = createPipeline({
    uploadDir: config.uploadDir,
    maxUploadBytes: config.maxUploadBytes,
    vocabulary: resolveRiskVocabulary(config.riskProfile),
    detector: overrides.detector ?? new HttpDetector(config.detector),
    eventLog,
    scanStore,
    analyst,
    geocoder,
    logger: logger.child('pipeline'),
  })

  return { config, logger, eventLog, scanStore, pipeline }
}
