import { promises as fs } from 'fs'
import os from 'os'
import path from 'path'
import type { Detection, RiskTier } from '@/types/detection'
import type { ScanResult } from '@/types'
import type { Logger } from '@/lib/logger'
import { assessThreat } from '@/lib/threat'

export function makeDetection(
  className: string,
  confidence: number,
  riskLevel: RiskTier,
  [x1, y1, x2, y2]: [number, number, number, number] = [10, 20, 110, 220],
  id = 0
): Detection {
  return {
    id,
    className,
    confidence,
    riskLevel,
    box: {
      x1,
      y1,
      x2,
      y2,
      width: x2 - x1,
      height: y2 - y1,
      cx: Math.floor((x1 + x2) / 2),
      cy: Math.floor((y1 + y2) / 2),
    },
  }
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'threatlens-'))
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true })
}

export type RecordingLogger = Logger & {
  debug: jest.Mock
  info: jest.Mock
  warn: jest.Mock
  error: jest.Mock
}

/** Logger whose calls can be asserted on; children share the same mocks. */
export function makeLogger(): RecordingLogger {
  const logger: RecordingLogger = {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    child: () => logger,
  }
  return logger
}

export function makeScanResult(detections: Detection[], overrides: Partial<ScanResult> = {}): ScanResult {
  return {
    scanId: 'feedface',
    imageId: 'feedface_site.png',
    detections,
    threat: assessThreat(detections),
    originalPath: '/data/uploads/feedface_site.png',
    annotatedPath: '/data/uploads/annotated_feedface_site.jpg',
    inferenceMs: 48.2,
    imageSize: { width: 200, height: 400 },
    geo: null,
    sitrep: { status: 'disabled', error: 'AI analyst disabled - OPENROUTER API key not configured' },
    audit: { status: 'logged', rows: [] },
    ...overrides,
  }
}
