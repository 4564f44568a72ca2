import { promises as fs } from 'fs'
import path from 'path'
import { ScanArtifactStore } from '@/lib/scanArtifacts'
import { ScanConflictError, ScanStoreCorruptError } from '@/lib/errors'
import { makeLogger, makeTempDir, removeDir } from './helpers/fixtures'

const meta = { model: 'test-model', tokens: 120 }

describe('ScanArtifactStore', () => {
  let dir: string
  let storePath: string

  beforeEach(async () => {
    dir = await makeTempDir()
    storePath = path.join(dir, 'logs', 'sitreps.json')
  })

  afterEach(async () => {
    await removeDir(dir)
  })

  it('creates and reads back an artifact', async () => {
    const store = new ScanArtifactStore({ path: storePath, clock: () => new Date('2024-02-01T10:00:00Z') })
    const created = await store.create('a1b2c3d4', 'context text', 'sitrep text', meta)

    expect(created).toEqual({
      scanId: 'a1b2c3d4',
      timestamp: '2024-02-01T10:00:00.000Z',
      detectionContext: 'context text',
      summary: 'sitrep text',
      model: 'test-model',
      tokens: 120,
      chatHistory: [],
    })
    await expect(store.get('a1b2c3d4')).resolves.toEqual(created)
    await expect(store.get('missing')).resolves.toBeUndefined()
  })

  it('persists with the snake_case document layout', async () => {
    const store = new ScanArtifactStore({ path: storePath, clock: () => new Date('2024-02-01T10:00:00Z') })
    await store.create('scan1', 'ctx', 'summary', meta)

    expect(JSON.parse(await fs.readFile(storePath, 'utf-8'))).toEqual({
      scan1: {
        timestamp: '2024-02-01T10:00:00.000Z',
        detection_context: 'ctx',
        sitrep: 'summary',
        model: 'test-model',
        tokens: 120,
        chat_history: [],
      },
    })
  })

  it('refuses to create the same scan twice', async () => {
    const store = new ScanArtifactStore({ path: storePath })
    await store.create('dup', 'ctx', 'first', meta)
    await expect(store.create('dup', 'ctx', 'second', meta)).rejects.toThrow(ScanConflictError)
    expect((await store.get('dup'))?.summary).toBe('first')
  })

  it('appends chat turns in order', async () => {
    const store = new ScanArtifactStore({ path: storePath })
    await store.create('s', 'ctx', 'sum', meta)

    await expect(store.appendChatTurn('s', 'user', 'how many tanks?')).resolves.toBe(true)
    await expect(store.appendChatTurn('s', 'assistant', 'two')).resolves.toBe(true)
    await store.appendExchange('s', 'where?', 'north-east')

    await expect(store.chatHistory('s')).resolves.toEqual([
      { role: 'user', content: 'how many tanks?' },
      { role: 'assistant', content: 'two' },
      { role: 'user', content: 'where?' },
      { role: 'assistant', content: 'north-east' },
    ])
  })

  it('ignores chat turns for unknown scans with a warning', async () => {
    const logger = makeLogger()
    const store = new ScanArtifactStore({ path: storePath, logger })

    await expect(store.appendChatTurn('ghost', 'user', 'hello')).resolves.toBe(false)
    expect(logger.warn).toHaveBeenCalledWith('Scan ghost not found, cannot add chat message')
    await expect(store.chatHistory('ghost')).resolves.toEqual([])
  })

  it('does not lose turns appended concurrently', async () => {
    const store = new ScanArtifactStore({ path: storePath })
    await store.create('s', 'ctx', 'sum', meta)

    await Promise.all(Array.from({ length: 8 }, (_, i) => store.appendExchange('s', `q${i}`, `a${i}`)))

    const history = await store.chatHistory('s')
    expect(history).toHaveLength(16)
    for (let i = 0; i < 8; i++) {
      const index = history.findIndex((turn) => turn.content === `q${i}`)
      expect(history[index + 1]).toEqual({ role: 'assistant', content: `a${i}` })
    }
  })

  it('does not lose turns from two stores sharing one file', async () => {
    const first = new ScanArtifactStore({ path: storePath })
    const second = new ScanArtifactStore({ path: storePath })
    await first.create('scan1', 'ctx', 'sum', meta)

    await Promise.all([
      first.appendChatTurn('scan1', 'user', 'from first'),
      second.appendChatTurn('scan1', 'user', 'from second'),
      first.appendExchange('scan1', 'q', 'a'),
      second.appendExchange('scan1', 'q2', 'a2'),
    ])

    const contents = (await second.chatHistory('scan1')).map((turn) => turn.content)
    expect([...contents].sort()).toEqual(['a', 'a2', 'from first', 'from second', 'q', 'q2'])
    expect(contents[contents.indexOf('q') + 1]).toBe('a')
    expect(contents[contents.indexOf('q2') + 1]).toBe('a2')
    await expect(fs.readdir(path.dirname(storePath))).resolves.toEqual(['sitreps.json'])
  })

  it('prunes all but the newest artifacts', async () => {
    let now = new Date('2024-01-01T00:00:00Z')
    const store = new ScanArtifactStore({ path: storePath, clock: () => now })
    for (const [scanId, day] of [
      ['c', 3],
      ['a', 1],
      ['b', 2],
    ] as const) {
      now = new Date(Date.UTC(2024, 0, day))
      await store.create(scanId, 'ctx', 'sum', meta)
    }

    await expect(store.prune(2)).resolves.toBe(1)
    await expect(store.get('a')).resolves.toBeUndefined()
    expect(await store.get('b')).toBeDefined()
    expect(await store.get('c')).toBeDefined()
    await expect(store.prune(5)).resolves.toBe(0)
  })

  it('treats a corrupt document as absent on read and refuses to overwrite it', async () => {
    await fs.mkdir(path.dirname(storePath), { recursive: true })
    await fs.writeFile(storePath, '{ not json')
    const logger = makeLogger()
    const store = new ScanArtifactStore({ path: storePath, logger })

    await expect(store.get('x')).resolves.toBeUndefined()
    expect(logger.warn).toHaveBeenCalled()
    await expect(store.create('x', 'ctx', 'sum', meta)).rejects.toThrow(ScanStoreCorruptError)
    await expect(fs.readFile(storePath, 'utf-8')).resolves.toBe('{ not json')
  })
})
