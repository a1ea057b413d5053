import fs from 'fs-extra'
import path from 'path'

import { PersistenceError } from '../core/errors.js'
import { readFileIfExists, removeDirIfEmpty, restoreFile, writeFileAtomic } from '../core/fs-ops.js'
import { BackendName, errorMessage, Logger, silentLogger } from '../types.js'

export const STATE_DIR = '.devstrap'
export const STATE_FILE = 'state.json'
export const HISTORY_LIMIT = 20

export interface RunStateRecord {
  version: 1
  runId: string
  template: string
  templateName: string
  pythonVersion: string
  backend?: BackendName
  sandboxPath: string
  interpreterPath: string
  packages: string[]
  installed: string[]
  editorFiles: string[]
  projectFiles: string[]
  createdAt: string
}

export interface HistoryEntry {
  id: string
  targetPath: string
  template: string
  backend?: BackendName
  packageCount: number
  durationMs: number
  createdAt: string
}

export interface RunStateReceipt {
  path: string
  previous: Buffer | undefined
  createdDir: boolean
}

export interface HistoryReceipt {
  id: string
  previous: Buffer | undefined
  /**
   * Bytes written by the append; if the file still holds exactly these, the
   * previous bytes are put back verbatim.
   */
  written: Buffer
  /**
   * Oldest entries pushed out by the cap, as they were stored.
   */
  dropped: unknown[]
}

/**
 * Per-project run state plus the per-user history. Every write returns a
 * receipt that the matching remove operation takes to undo it.
 */
export interface StateStore {
  writeRunState(targetPath: string, record: RunStateRecord): Promise<RunStateReceipt>
  deleteRunState(receipt: RunStateReceipt): Promise<void>
  readRunState(targetPath: string): Promise<RunStateRecord | undefined>
  appendHistory(entry: HistoryEntry): Promise<HistoryReceipt>
  removeHistoryEntry(receipt: HistoryReceipt): Promise<void>
  readHistory(): Promise<HistoryEntry[]>
}

export function runStatePath(targetPath: string): string {
  return path.join(targetPath, STATE_DIR, STATE_FILE)
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === 'object' && !Array.isArray(v)
}

function isHistoryEntry(v: unknown): v is HistoryEntry {
  return isRecord(v)
    && typeof v.id === 'string'
    && typeof v.targetPath === 'string'
    && typeof v.template === 'string'
    && typeof v.packageCount === 'number'
    && typeof v.durationMs === 'number'
    && typeof v.createdAt === 'string'
}

function isRunStateRecord(v: unknown): v is RunStateRecord {
  return isRecord(v)
    && v.version === 1
    && typeof v.runId === 'string'
    && typeof v.template === 'string'
    && typeof v.sandboxPath === 'string'
    && Array.isArray(v.installed)
}

function toJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`
}

/**
 * Stored entries as they are. Entries this version cannot read are kept so a
 * later append does not lose them.
 */
function parseHistory(file: string, bytes: Buffer | undefined): unknown[] {
  if (bytes === undefined) return []
  let raw: unknown
  try {
    raw = JSON.parse(bytes.toString('utf8'))
  } catch (e) {
    throw new PersistenceError(`history file is corrupt: ${file}: ${errorMessage(e)}`, { cause: e })
  }
  if (!isRecord(raw) || !Array.isArray(raw.entries)) {
    throw new PersistenceError(`history file is corrupt: ${file}: expected { entries: [...] }`)
  }
  return raw.entries
}

function entryId(entry: unknown): unknown {
  return isRecord(entry) ? entry.id : undefined
}

async function guard<T>(what: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn()
  } catch (e) {
    if (e instanceof PersistenceError) throw e
    throw new PersistenceError(`${what}: ${errorMessage(e)}`, { cause: e })
  }
}

export interface JsonStateStoreOptions {
  historyPath: string
  historyLimit?: number
  logger?: Logger
}

/**
 * JSON files written through temp file + rename.
 */
export class JsonStateStore implements StateStore {
  readonly historyPath: string
  private readonly limit: number
  private readonly logger: Logger

  constructor(opts: JsonStateStoreOptions) {
    this.historyPath = opts.historyPath
    this.limit = Math.max(1, opts.historyLimit ?? HISTORY_LIMIT)
    this.logger = opts.logger ?? silentLogger()
  }

  async writeRunState(targetPath: string, record: RunStateRecord): Promise<RunStateReceipt> {
    const file = runStatePath(targetPath)
    return await guard('cannot write run state', async () => {
      const createdDir = !await fs.pathExists(path.dirname(file))
      const previous = await readFileIfExists(file)
      await writeFileAtomic(file, toJson(record))
      return { path: file, previous, createdDir }
    })
  }

  async deleteRunState(receipt: RunStateReceipt): Promise<void> {
    await guard('cannot remove run state', async () => {
      await restoreFile(receipt.path, receipt.previous)
      if (receipt.createdDir) await removeDirIfEmpty(path.dirname(receipt.path))
    })
  }

  async readRunState(targetPath: string): Promise<RunStateRecord | undefined> {
    const file = runStatePath(targetPath)
    return await guard('cannot read run state', async () => {
      const bytes = await readFileIfExists(file)
      if (bytes === undefined) return undefined
      const raw: unknown = JSON.parse(bytes.toString('utf8'))
      if (!isRunStateRecord(raw)) throw new PersistenceError(`run state is corrupt: ${file}`)
      return raw
    })
  }

  async appendHistory(entry: HistoryEntry): Promise<HistoryReceipt> {
    return await guard('cannot update history', async () => {
      const previous = await readFileIfExists(this.historyPath)
      const entries = parseHistory(this.historyPath, previous)
      entries.push(entry)
      const dropped = entries.length > this.limit ? entries.splice(0, entries.length - this.limit) : []
      const written = Buffer.from(toJson({ entries }), 'utf8')
      await writeFileAtomic(this.historyPath, written)
      return { id: entry.id, previous, written, dropped }
    })
  }

  async removeHistoryEntry(receipt: HistoryReceipt): Promise<void> {
    await guard('cannot remove history entry', async () => {
      const current = await readFileIfExists(this.historyPath)
      if (current !== undefined && current.equals(receipt.written)) {
        await restoreFile(this.historyPath, receipt.previous)
        return
      }
      // Someone else wrote in between: drop only our entry.
      const entries = parseHistory(this.historyPath, current).filter(e => entryId(e) !== receipt.id)
      const restored = [...receipt.dropped, ...entries]
      if (restored.length === 0 && receipt.previous === undefined) {
        await restoreFile(this.historyPath, undefined)
        return
      }
      await writeFileAtomic(this.historyPath, toJson({ entries: restored }))
    })
  }

  async readHistory(): Promise<HistoryEntry[]> {
    return await guard('cannot read history', async () => {
      const raw = parseHistory(this.historyPath, await readFileIfExists(this.historyPath))
      const entries = raw.filter(isHistoryEntry)
      const skipped = raw.length - entries.length
      if (skipped) this.logger.warn(`[devstrap] ${this.historyPath}: skipped ${skipped} unreadable history entries`)
      return entries
    })
  }
}
