/**
 * Persistent store of scan artifacts: the generated situation report,
 * the detection context it was written from, and the follow-up chat.
 *
 * The whole store is one JSON document. Every mutation is a
 * read-modify-write inside the store mutex and the store's file lock, and
 * the document is replaced through a temp file and rename so readers never
 * see half a write.
 */
import { promises as fs } from 'fs'
import { z } from 'zod'
import type { ChatRole, ChatTurn, ModelMeta, ScanArtifact } from '@/types/scan'
import { ScanConflictError, ScanStoreCorruptError, errorMessage, hasErrorCode } from '@/lib/errors'
import { createMutex } from '@/lib/mutex'
import { replaceFile, withFileLock } from '@/lib/fileLock'
import { silentLogger, type Logger } from '@/lib/logger'

const chatTurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
})

const storedArtifactSchema = z.object({
  timestamp: z.string(),
  detection_context: z.string(),
  sitrep: z.string(),
  model: z.string(),
  tokens: z.number().int().nonnegative(),
  chat_history: z.array(chatTurnSchema),
})

const storeSchema = z.record(z.string(), storedArtifactSchema)

type StoredArtifact = z.infer<typeof storedArtifactSchema>
type StoreDocument = z.infer<typeof storeSchema>

function toArtifact(scanId: string, stored: StoredArtifact): ScanArtifact {
  return {
    scanId,
    timestamp: stored.timestamp,
    detectionContext: stored.detection_context,
    summary: stored.sitrep,
    model: stored.model,
    tokens: stored.tokens,
    chatHistory: stored.chat_history.map((turn) => ({ ...turn })),
  }
}

export type ScanArtifactStoreOptions = {
  path: string
  logger?: Logger
  clock?: () => Date
}

export class ScanArtifactStore {
  readonly path: string
  private readonly logger: Logger
  private readonly clock: () => Date
  private readonly mutex = createMutex()

  constructor(options: ScanArtifactStoreOptions) {
    this.path = options.path
    this.logger = options.logger ?? silentLogger
    this.clock = options.clock ?? (() => new Date())
  }

  /** Record a new scan. A scan id is created exactly once. */
  async create(scanId: string, context: string, summary: string, meta: ModelMeta): Promise<ScanArtifact> {
    return this.update((store) => {
      if (Object.hasOwn(store, scanId)) throw new ScanConflictError(scanId)
      const stored: StoredArtifact = {
        timestamp: this.clock().toISOString(),
        detection_context: context,
        sitrep: summary,
        model: meta.model,
        tokens: meta.tokens,
        chat_history: [],
      }
      store[scanId] = stored
      this.logger.info(`Saved sitrep for scan ${scanId}`)
      return toArtifact(scanId, stored)
    })
  }

  async get(scanId: string): Promise<ScanArtifact | undefined> {
    return this.mutex.runExclusive(async () => {
      let store: StoreDocument
      try {
        store = await this.readStore()
      } catch (error) {
        if (!(error instanceof ScanStoreCorruptError)) throw error
        this.logger.warn(`Could not read scan store, treating ${scanId} as absent`, error)
        return undefined
      }
      return Object.hasOwn(store, scanId) ? toArtifact(scanId, store[scanId]) : undefined
    })
  }

  /**
   * Append one chat turn. An unknown scan id is logged and ignored;
   * returns whether the turn was stored.
   */
  async appendChatTurn(scanId: string, role: ChatRole, content: string): Promise<boolean> {
    return this.appendTurns(scanId, [{ role, content }])
  }

  /** Append a question and its answer in a single write. */
  async appendExchange(scanId: string, question: string, answer: string): Promise<boolean> {
    return this.appendTurns(scanId, [
      { role: 'user', content: question },
      { role: 'assistant', content: answer },
    ])
  }

  async chatHistory(scanId: string): Promise<ChatTurn[]> {
    const artifact = await this.get(scanId)
    return artifact?.chatHistory ?? []
  }

  /** Keep the `keepLastN` most recently created artifacts. Returns how many were evicted. */
  async prune(keepLastN: number): Promise<number> {
    return this.update((store) => {
      const entries = Object.entries(store)
      if (entries.length <= keepLastN) return 0

      const evicted = entries
        .sort((a, b) => a[1].timestamp.localeCompare(b[1].timestamp))
        .slice(0, entries.length - Math.max(0, keepLastN))
      for (const [scanId] of evicted) delete store[scanId]

      this.logger.info(`Pruned ${evicted.length} old scans, kept ${entries.length - evicted.length}`)
      return evicted.length
    })
  }

  private async appendTurns(scanId: string, turns: ChatTurn[]): Promise<boolean> {
    return this.update((store) => {
      if (!Object.hasOwn(store, scanId)) {
        this.logger.warn(`Scan ${scanId} not found, cannot add chat message`)
        return false
      }
      store[scanId].chat_history.push(...turns)
      this.logger.debug(`Added ${turns.length} chat turns to scan ${scanId}`)
      return true
    })
  }

  private async update<T>(mutate: (store: StoreDocument) => T): Promise<T> {
    return this.mutex.runExclusive(() =>
      withFileLock(this.path, async () => {
        const store = await this.readStore()
        const result = mutate(store)
        await replaceFile(this.path, JSON.stringify(store, null, 2))
        return result
      })
    )
  }

  private async readStore(): Promise<StoreDocument> {
    let text: string
    try {
      text = await fs.readFile(this.path, 'utf-8')
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return {}
      throw error
    }
    if (text.trim() === '') return {}

    let parsed: unknown
    try {
      parsed = JSON.parse(text)
    } catch (error) {
      throw new ScanStoreCorruptError(`Scan store ${this.path} is not valid JSON: ${errorMessage(error)}`, {
        cause: error,
      })
    }
    const result = storeSchema.safeParse(parsed)
    if (!result.success) {
      throw new ScanStoreCorruptError(`Scan store ${this.path} has an unexpected shape`, { cause: result.error })
    }
    return result.data
  }
}
