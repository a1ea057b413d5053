import fs from 'fs-extra'
import jsonc from 'jsonc-parser'
import type { ParseError } from 'jsonc-parser'
import path from 'path'

import { ConfigMergeError } from '../core/errors.js'
import { readFileIfExists, removePath, restoreSnapshots, writeFileAtomic } from '../core/fs-ops.js'
import { detectOverrides, isMergeObject, mergeByKey, MergeDocument, MergeObject, mergeObjects, toMergeDocument } from '../core/merge.js'
import type { EditorTemplate } from '../template/types.js'
import { errorMessage, FileSnapshot, Logger, silentLogger } from '../types.js'

export const EDITOR_DIR = '.vscode'
export const INTERPRETER_SETTING = 'python.defaultInterpreterPath'

export interface EditorWriteRequest {
  targetPath: string
  editor: EditorTemplate
  /**
   * Absolute path of the sandbox runtime; written relative to the workspace.
   */
  interpreterPath: string
}

export interface EditorWriteResult {
  dir: string
  createdDir: boolean
  snapshots: FileSnapshot[]
  /**
   * Written files, relative to the target.
   */
  files: string[]
  warnings: string[]
}

interface PendingFile {
  name: string
  abs: string
  previous: Buffer | undefined
  build: (existing: MergeObject) => MergeObject
}

export interface EditorConfigWriterOptions {
  logger?: Logger
}

function readDocument(abs: string, previous: Buffer | undefined): MergeObject {
  if (previous === undefined) return {}
  const text = previous.toString('utf8')
  if (!text.trim()) return {}

  const errors: ParseError[] = []
  const raw: unknown = jsonc.parse(text, errors, { allowTrailingComma: true, disallowComments: false })
  if (errors.length) {
    const first = errors[0]
    throw new ConfigMergeError(`cannot parse existing file (${jsonc.printParseErrorCode(first.error)} at offset ${first.offset})`, abs)
  }
  const doc = toMergeDocument(raw)
  if (!isMergeObject(doc)) throw new ConfigMergeError('existing file is not a JSON object', abs)
  return doc
}

function serialize(doc: MergeDocument): string {
  return `${JSON.stringify(doc, null, 4)}\n`
}

function describe(value: MergeDocument): string {
  return JSON.stringify(value)
}

/**
 * Writes `.vscode/settings.json`, `extensions.json` and `launch.json` by merging
 * the template's overlay into whatever the project already has.
 */
export class EditorConfigWriter implements EditorWriter {
  private readonly logger: Logger

  constructor(opts: EditorConfigWriterOptions = {}) {
    this.logger = opts.logger ?? silentLogger()
  }

  interpreterSetting(targetPath: string, interpreterPath: string): string {
    const rel = path.relative(targetPath, interpreterPath).split(path.sep).join('/')
    return `\${workspaceFolder}/${rel}`
  }

  async write(req: EditorWriteRequest): Promise<EditorWriteResult> {
    const dir = path.join(req.targetPath, EDITOR_DIR)
    const warnings: string[] = []

    const settingsOverlay: MergeObject = {
      ...req.editor.settings,
      [INTERPRETER_SETTING]: this.interpreterSetting(req.targetPath, req.interpreterPath),
    }

    const plan: Array<Omit<PendingFile, 'abs' | 'previous'>> = [{
      name: 'settings.json',
      build: existing => {
        for (const o of detectOverrides(existing, settingsOverlay)) {
          warnings.push(`Setting "${o.path}" changed from ${describe(o.before)} to ${describe(o.after)}`)
        }
        return mergeObjects(existing, settingsOverlay)
      },
    }]
    if (req.editor.extensions.length) {
      plan.push({
        name: 'extensions.json',
        build: existing => mergeObjects(existing, { recommendations: [...req.editor.extensions] }),
      })
    }
    if (req.editor.launch.length) {
      plan.push({
        name: 'launch.json',
        build: existing => {
          const configurations = Array.isArray(existing.configurations) ? existing.configurations : []
          const version = typeof existing.version === 'string' ? existing.version : '0.2.0'
          return {
            ...mergeObjects(existing, { version }),
            configurations: mergeByKey(configurations, req.editor.launch, 'name'),
          }
        },
      })
    }

    // Capture every file and parse it before touching anything.
    const pending: PendingFile[] = []
    for (const item of plan) {
      const abs = path.join(dir, item.name)
      pending.push({ ...item, abs, previous: await readFileIfExists(abs) })
    }
    const docs = pending.map(p => p.build(readDocument(p.abs, p.previous)))

    const result: EditorWriteResult = {
      dir,
      createdDir: !await fs.pathExists(dir),
      snapshots: [],
      files: [],
      warnings,
    }

    try {
      await fs.ensureDir(dir)
      for (let i = 0; i < pending.length; i++) {
        const p = pending[i]
        result.snapshots.push({ path: p.abs, previous: p.previous })
        await writeFileAtomic(p.abs, serialize(docs[i]))
        result.files.push(path.relative(req.targetPath, p.abs).split(path.sep).join('/'))
        this.logger.info(`[devstrap] wrote ${p.abs}`)
      }
    } catch (e) {
      this.logger.error(`[devstrap] editor config write failed: ${errorMessage(e)}`)
      try {
        await this.restore(result)
      } catch (restoreError) {
        this.logger.warn(`[devstrap] could not restore editor config: ${errorMessage(restoreError)}`)
      }
      throw e
    }

    for (const w of warnings) this.logger.warn(`[devstrap] ${w}`)
    return result
  }

  /**
   * Put every touched file back to its captured bytes, newest write first.
   */
  async restore(result: EditorWriteResult): Promise<void> {
    await restoreSnapshots(result.snapshots)
    if (result.createdDir) await removePath(result.dir)
  }
}

/**
 * What the orchestrator needs from an editor config writer.
 */
export interface EditorWriter {
  write(req: EditorWriteRequest): Promise<EditorWriteResult>
  restore(result: EditorWriteResult): Promise<void>
}
