/**
 * Application configuration, read from the environment
 */
import path from 'path'
import { z } from 'zod'
import type { RiskProfile } from '@/types/detection'
import type { LogLevel } from '@/lib/logger'
import { ConfigError } from '@/lib/errors'
import { normalizeClassName } from '@/lib/riskClassifier'

export type LlmProvider = 'openrouter' | 'openai' | 'groq' | 'anthropic' | 'gemini'

export type LlmConfig = {
  provider: LlmProvider
  model: string
  baseUrl: string
  apiKey: string
  maxTokens: number
  temperature: number
}

export type DetectorConfig = {
  url: string
  timeoutMs: number
  confidence: number
  iou: number
  maxDetections: number
}

export type AppConfig = {
  riskProfile: RiskProfile
  uploadDir: string
  logPath: string
  scanStorePath: string
  maxUploadBytes: number
  detector: DetectorConfig
  llm: LlmConfig
  analystEnabled: boolean
  geocoder: { enabled: boolean; userAgent: string }
  scanRetention: number
  logLevel: LogLevel
}

const PROVIDER_DEFAULTS: Record<LlmProvider, { model: string; baseUrl: string; keyVar: string }> = {
  openrouter: {
    model: 'meta-llama/llama-3.2-3b-instruct:free',
    baseUrl: 'https://openrouter.ai/api/v1',
    keyVar: 'OPENROUTER_API_KEY',
  },
  openai: { model: 'gpt-4o-mini', baseUrl: 'https://api.openai.com/v1', keyVar: 'OPENAI_API_KEY' },
  groq: { model: 'llama-3.1-8b-instant', baseUrl: 'https://api.groq.com/openai/v1', keyVar: 'GROQ_API_KEY' },
  anthropic: {
    model: 'claude-3-5-haiku-latest',
    baseUrl: 'https://api.anthropic.com/v1',
    keyVar: 'ANTHROPIC_API_KEY',
  },
  gemini: { model: 'gemini-2.5-flash', baseUrl: '', keyVar: 'GEMINI_API_KEY' },
}

const classList = z
  .string()
  .default('')
  .transform((value) =>
    value
      .split(',')
      .map((item) => normalizeClassName(item.trim()))
      .filter(Boolean)
  )

const booleanFlag = z
  .string()
  .default('true')
  .transform((value) => ['true', '1', 'yes'].includes(value.toLowerCase()))

const envSchema = z.object({
  MODEL_TYPE: z.enum(['auto', 'military', 'dota', 'coco', 'custom']).default('auto'),
  RISK_HIGH_CLASSES: classList,
  RISK_MEDIUM_CLASSES: classList,
  DATA_DIR: z.string().min(1).default('./data'),
  UPLOAD_DIR: z.string().optional(),
  LOG_PATH: z.string().optional(),
  SCAN_STORE_PATH: z.string().optional(),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(32 * 1024 * 1024),
  DETECTOR_URL: z.string().url().default('http://localhost:8001/predict'),
  DETECTOR_TIMEOUT_MS: z.coerce.number().int().positive().default(300000),
  CONFIDENCE_THRESH: z.coerce.number().min(0).max(1).default(0.25),
  IOU_THRESH: z.coerce.number().min(0).max(1).default(0.45),
  MAX_DETECTIONS: z.coerce.number().int().positive().default(100),
  LLM_PROVIDER: z.enum(['openrouter', 'openai', 'groq', 'anthropic', 'gemini']).default('openrouter'),
  LLM_MODEL: z.string().optional(),
  LLM_BASE_URL: z.string().optional(),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2048),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  GEOCODER_ENABLED: booleanFlag,
  GEOCODER_USER_AGENT: z.string().min(1).default('threatlens-geo'),
  SCAN_RETENTION: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
})

type Env = Record<string, string | undefined>

// Empty strings count as unset, like an unfilled line in a .env file.
function withoutBlanks(env: Env): Env {
  const result: Env = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value
    }
  }
  return result
}

function resolveRiskProfile(parsed: z.infer<typeof envSchema>): RiskProfile {
  switch (parsed.MODEL_TYPE) {
    case 'military':
    case 'dota':
    case 'coco':
      return { kind: parsed.MODEL_TYPE }
    case 'custom':
      return { kind: 'custom', high: parsed.RISK_HIGH_CLASSES, medium: parsed.RISK_MEDIUM_CLASSES }
    case 'auto':
      return { kind: 'coco' }
  }
}

export function loadConfig(rawEnv: Env = process.env): AppConfig {
  const env = withoutBlanks(rawEnv)
  const result = envSchema.safeParse(env)
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    )
  }
  const parsed = result.data

  if (parsed.MODEL_TYPE === 'custom') {
    const issues: string[] = []
    if (parsed.RISK_HIGH_CLASSES.length === 0) {
      issues.push('RISK_HIGH_CLASSES: required when MODEL_TYPE=custom')
    }
    const overlap = parsed.RISK_HIGH_CLASSES.filter((name) => parsed.RISK_MEDIUM_CLASSES.includes(name))
    if (overlap.length > 0) {
      issues.push(`RISK_MEDIUM_CLASSES: also listed as high risk (${overlap.join(', ')})`)
    }
    if (issues.length > 0) throw new ConfigError(issues)
  }

  const dataDir = path.resolve(parsed.DATA_DIR)
  const provider = parsed.LLM_PROVIDER
  const defaults = PROVIDER_DEFAULTS[provider]
  const apiKey = env[defaults.keyVar] ?? ''

  return Object.freeze({
    riskProfile: resolveRiskProfile(parsed),
    uploadDir: path.resolve(parsed.UPLOAD_DIR ?? path.join(dataDir, 'uploads')),
    logPath: path.resolve(parsed.LOG_PATH ?? path.join(dataDir, 'logs', 'detections.csv')),
    scanStorePath: path.resolve(parsed.SCAN_STORE_PATH ?? path.join(dataDir, 'logs', 'sitreps.json')),
    maxUploadBytes: parsed.MAX_UPLOAD_BYTES,
    detector: {
      url: parsed.DETECTOR_URL,
      timeoutMs: parsed.DETECTOR_TIMEOUT_MS,
      confidence: parsed.CONFIDENCE_THRESH,
      iou: parsed.IOU_THRESH,
      maxDetections: parsed.MAX_DETECTIONS,
    },
    llm: {
      provider,
      model: parsed.LLM_MODEL ?? defaults.model,
      baseUrl: parsed.LLM_BASE_URL ?? defaults.baseUrl,
      apiKey,
      maxTokens: parsed.LLM_MAX_TOKENS,
      temperature: parsed.LLM_TEMPERATURE,
    },
    analystEnabled: apiKey !== '',
    geocoder: { enabled: parsed.GEOCODER_ENABLED, userAgent: parsed.GEOCODER_USER_AGENT },
    scanRetention: parsed.SCAN_RETENTION,
    logLevel: parsed.LOG_LEVEL,
  })
}
