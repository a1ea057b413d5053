import { randomUUID } from 'crypto'
import fs from 'fs-extra'
import path from 'path'

import type { EditorWriteResult, EditorWriter } from '../editor/settings.js'
import { selectStrategy } from '../install/select.js'
import { DEFAULT_INSTALL_TIMEOUT_MS, InstallStrategy } from '../install/strategies/base.js'
import type { Sandbox, SandboxHandle } from '../sandbox/types.js'
import type { ProjectWriter, ProjectWriteResult } from '../project/files.js'
import type { HistoryEntry, HistoryReceipt, RunStateReceipt, StateStore } from '../state/store.js'
import { selectPackages, SetupTemplate } from '../template/types.js'
import {
  BackendName,
  errorMessage,
  InstallResult,
  Logger,
  Phase,
  PhaseName,
  PhaseRecord,
  RollbackFailure,
  RunState,
  SetupResult,
  silentLogger,
} from '../types.js'
import {
  ConfigMergeError,
  DevstrapError,
  InstallationError,
  PersistenceError,
  SandboxCreationError,
  SetupCancelledError,
  SetupRunError,
  TerminalInstallationError,
} from './errors.js'
import { removeDirIfEmpty, removePath, restoreSnapshots } from './fs-ops.js'
import { RollbackAction, RollbackLedger } from './ledger.js'

export const SANDBOX_DIR = '.venv'

export type SetupEvent =
  | { type: 'phase:start'; phase: PhaseName; label: string; ordinal: number }
  | { type: 'phase:commit'; phase: PhaseName; label: string; durationMs: number }
  | { type: 'phase:fail'; phase: PhaseName; label: string; error: string }
  | { type: 'rollback:start'; actions: number }
  | { type: 'rollback:action'; label: string; ok: boolean; error?: string }
  | { type: 'rollback:done'; complete: boolean }

export interface SetupCollaborators {
  sandbox: Sandbox
  strategies: InstallStrategy[]
  project: ProjectWriter
  editor: EditorWriter
  store: StateStore
}

export interface SetupOptions {
  targetPath: string
  template: SetupTemplate
  /**
   * Preferred backend; falls back in the fixed order when unavailable.
   */
  backend?: BackendName
  /**
   * Optional dependency groups to install on top of the core groups.
   */
  groups?: string[]
  timeoutMs?: number
  signal?: AbortSignal
  logger?: Logger
  onEvent?: (event: SetupEvent) => void
  runId?: string
  now?: () => Date
}

/**
 * Mutable state of one run, owned by its orchestrator.
 */
export interface SetupRunContext {
  readonly targetPath: string
  readonly template: SetupTemplate
  readonly packages: string[]
  readonly groups: string[]
  backend?: BackendName
  /**
   * Phases committed so far; reported as SetupResult.committedPhases.
   */
  committed: number
  createdTarget: boolean
  sandbox?: SandboxHandle
  interpreterPath?: string
  install?: InstallResult
  project?: ProjectWriteResult
  editor?: EditorWriteResult
  warnings: string[]
  /**
   * Cleanup that failed inside a failing phase, before its undo action existed.
   */
  cleanupFailures: RollbackFailure[]
}

interface PhaseDefinition extends Phase {
  label: string
  /**
   * Runs the forward effect and returns the action that undoes it.
   */
  forward: (ctx: SetupRunContext) => Promise<RollbackAction>
  wrap: (error: unknown, ctx: SetupRunContext) => DevstrapError
}

export const PHASES: readonly (Phase & { label: string })[] = [
  { name: 'sandbox', ordinal: 0, idempotent: false, label: 'sandbox creation' },
  { name: 'install', ordinal: 1, idempotent: true, label: 'dependency install' },
  { name: 'project-files', ordinal: 2, idempotent: false, label: 'project file generation' },
  { name: 'editor-config', ordinal: 3, idempotent: false, label: 'editor config generation' },
  { name: 'persist-state', ordinal: 4, idempotent: false, label: 'state persistence' },
]

function phaseInfo(name: PhaseName): Phase & { label: string } {
  const found = PHASES.find(p => p.name === name)
  if (!found) throw new Error(`unknown phase: ${name}`)
  return found
}

/**
 * Runs the setup phases in order. After each phase commits its undo action
 * goes on the ledger; a failure (or a cancellation seen between phases) unwinds
 * the ledger and surfaces the original error as a SetupRunError.
 *
 * One orchestrator drives exactly one run.
 */
export class SetupOrchestrator {
  private readonly deps: SetupCollaborators
  private readonly opts: SetupOptions
  private readonly logger: Logger
  private readonly ledger: RollbackLedger
  private readonly now: () => Date
  private readonly runId: string
  private startedMs = 0
  private _state: RunState = 'pending'
  private _phaseIndex = -1
  private started = false

  constructor(deps: SetupCollaborators, opts: SetupOptions) {
    this.deps = deps
    this.opts = opts
    this.logger = opts.logger ?? silentLogger()
    this.ledger = new RollbackLedger(this.logger)
    this.now = opts.now ?? (() => new Date())
    this.runId = opts.runId ?? randomUUID()
  }

  get state(): RunState {
    return this._state
  }

  /**
   * Index of the running phase, -1 before the run starts.
   */
  get phaseIndex(): number {
    return this._phaseIndex
  }

  private emit(event: SetupEvent) {
    try {
      this.opts.onEvent?.(event)
    } catch (e) {
      this.logger.warn(`[devstrap] event listener failed: ${errorMessage(e)}`)
    }
  }

  private definitions(): PhaseDefinition[] {
    return [
      { ...phaseInfo('sandbox'), forward: ctx => this.createSandbox(ctx), wrap: e => new SandboxCreationError(errorMessage(e), 'other', { cause: e }) },
      { ...phaseInfo('install'), forward: ctx => this.installDependencies(ctx), wrap: (e, ctx) => this.wrapInstallError(e, ctx) },
      { ...phaseInfo('project-files'), forward: ctx => this.writeProjectFiles(ctx), wrap: e => new PersistenceError(errorMessage(e), { cause: e }) },
      {
        ...phaseInfo('editor-config'),
        forward: ctx => this.writeEditorConfig(ctx),
        wrap: (e, ctx) => new ConfigMergeError(errorMessage(e), path.join(ctx.targetPath, '.vscode'), { cause: e }),
      },
      { ...phaseInfo('persist-state'), forward: ctx => this.persistState(ctx), wrap: e => new PersistenceError(errorMessage(e), { cause: e }) },
    ]
  }

  private async createSandbox(ctx: SetupRunContext): Promise<RollbackAction> {
    const root = path.join(ctx.targetPath, SANDBOX_DIR)
    ctx.createdTarget = !await fs.pathExists(ctx.targetPath)
    await fs.ensureDir(ctx.targetPath)

    let handle: SandboxHandle
    try {
      handle = await this.deps.sandbox.create(root, ctx.template.pythonVersion)
    } catch (e) {
      if (ctx.createdTarget) await this.cleanup(ctx, `remove empty target ${ctx.targetPath}`, () => removeDirIfEmpty(ctx.targetPath))
      throw e
    }
    ctx.sandbox = handle
    ctx.interpreterPath = this.deps.sandbox.resolveRuntimeExecutable(handle)
    this.logger.info(`[devstrap] sandbox ready: ${root} (python ${handle.runtimeVersion})`)

    const createdTarget = ctx.createdTarget
    return {
      label: `delete sandbox ${root}`,
      run: async () => {
        await removePath(root)
        if (createdTarget) await removeDirIfEmpty(ctx.targetPath)
      },
    }
  }

  private candidateStrategies(ctx: SetupRunContext): InstallStrategy[] {
    const supported = ctx.template.backends
    if (!supported?.length) return this.deps.strategies
    return this.deps.strategies.filter(s => supported.includes(s.name))
  }

  private async installDependencies(ctx: SetupRunContext): Promise<RollbackAction> {
    const sandbox = ctx.sandbox
    const runtimeExecutable = ctx.interpreterPath
    if (!sandbox || !runtimeExecutable) throw new Error('install phase needs a sandbox')

    const preferred = this.opts.backend ?? ctx.template.backends?.[0]
    const request = {
      packages: ctx.packages,
      sandbox,
      runtimeExecutable,
      projectPath: ctx.targetPath,
      timeoutMs: this.opts.timeoutMs ?? DEFAULT_INSTALL_TIMEOUT_MS,
    }

    let result: InstallResult
    try {
      const { strategy, warnings } = await selectStrategy(this.candidateStrategies(ctx), request, preferred, this.logger)
      ctx.backend = strategy.name
      ctx.warnings.push(...warnings)
      result = await strategy.install(request)
      result.warnings.unshift(...warnings)
    } catch (e) {
      if (e instanceof InstallationError) {
        ctx.install = e.result
        // Files a failed attempt changed outside the sandbox have no undo action yet.
        const artifacts = e.result.artifacts
        if (artifacts.length) {
          await this.cleanup(ctx, `restore ${artifacts.map(a => path.basename(a.path)).join(', ')}`, () => restoreSnapshots(artifacts))
        }
      }
      throw e
    }

    ctx.install = result
    ctx.warnings.push(...result.warnings.filter(w => !ctx.warnings.includes(w)))
    this.logger.info(`[devstrap] installed ${result.installed.length} package(s) with ${result.backend}`)

    const artifacts = [...result.artifacts]
    return {
      label: `delete sandbox ${sandbox.root} (installed packages)`,
      run: async () => {
        await removePath(sandbox.root)
        await restoreSnapshots(artifacts)
      },
    }
  }

  private wrapInstallError(e: unknown, ctx: SetupRunContext): DevstrapError {
    return new TerminalInstallationError(errorMessage(e), ctx.install ?? {
      ok: false,
      backend: ctx.backend ?? this.opts.backend ?? 'uv',
      requested: [...ctx.packages],
      installed: [],
      durationMs: 0,
      attempts: 0,
      warnings: [],
      artifacts: [],
      failure: { kind: 'terminal', message: errorMessage(e), output: '', timedOut: false },
    })
  }

  private async writeProjectFiles(ctx: SetupRunContext): Promise<RollbackAction> {
    const written = await this.deps.project.write({
      targetPath: ctx.targetPath,
      template: ctx.template,
      groups: ctx.groups,
    })
    ctx.project = written

    return {
      label: `restore project files (${written.files.join(', ') || 'none written'})`,
      run: () => this.deps.project.restore(written),
    }
  }

  private async writeEditorConfig(ctx: SetupRunContext): Promise<RollbackAction> {
    const interpreterPath = ctx.interpreterPath
    if (!interpreterPath) throw new Error('editor config phase needs a sandbox')

    const written = await this.deps.editor.write({
      targetPath: ctx.targetPath,
      editor: ctx.template.editor,
      interpreterPath,
    })
    ctx.editor = written
    ctx.warnings.push(...written.warnings)

    return {
      label: `restore editor config (${written.files.join(', ')})`,
      run: () => this.deps.editor.restore(written),
    }
  }

  private async persistState(ctx: SetupRunContext): Promise<RollbackAction> {
    const sandbox = ctx.sandbox
    const interpreterPath = ctx.interpreterPath
    if (!sandbox || !interpreterPath) throw new Error('state persistence needs a sandbox')

    const createdAt = this.now().toISOString()
    const stateReceipt: RunStateReceipt = await this.deps.store.writeRunState(ctx.targetPath, {
      version: 1,
      runId: this.runId,
      template: ctx.template.slug,
      templateName: ctx.template.name,
      pythonVersion: sandbox.runtimeVersion,
      backend: ctx.backend,
      sandboxPath: sandbox.root,
      interpreterPath,
      packages: [...ctx.packages],
      installed: ctx.install?.installed ?? [],
      editorFiles: ctx.editor?.files ?? [],
      projectFiles: ctx.project?.files ?? [],
      createdAt,
    })

    const entry: HistoryEntry = {
      id: this.runId,
      targetPath: ctx.targetPath,
      template: ctx.template.slug,
      backend: ctx.backend,
      packageCount: ctx.packages.length,
      durationMs: Date.now() - this.startedMs,
      createdAt,
    }
    let historyReceipt: HistoryReceipt
    try {
      historyReceipt = await this.deps.store.appendHistory(entry)
    } catch (e) {
      await this.cleanup(ctx, 'remove run state', () => this.deps.store.deleteRunState(stateReceipt))
      throw e
    }

    return {
      label: 'remove history entry and run state',
      run: async () => {
        await this.deps.store.removeHistoryEntry(historyReceipt)
        await this.deps.store.deleteRunState(stateReceipt)
      },
    }
  }

  /**
   * Undo work of a failing phase. A failure here is recorded, never thrown, so
   * the phase error stays the reported cause.
   */
  private async cleanup(ctx: SetupRunContext, label: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn()
    } catch (e) {
      ctx.cleanupFailures.push({ label, error: errorMessage(e) })
      this.logger.error(`[devstrap] cleanup failed: ${label} - ${errorMessage(e)}`)
    }
  }

  private register(action: RollbackAction) {
    this.ledger.register({
      label: action.label,
      run: async () => {
        try {
          await action.run()
          this.emit({ type: 'rollback:action', label: action.label, ok: true })
        } catch (e) {
          this.emit({ type: 'rollback:action', label: action.label, ok: false, error: errorMessage(e) })
          throw e
        }
      },
    })
  }

  async run(): Promise<SetupResult> {
    if (this.started) throw new DevstrapError('run', 'SetupOrchestrator.run() can only be called once')
    this.started = true

    const targetPath = path.resolve(this.opts.targetPath)
    const template = this.opts.template
    const startedAt = this.now().toISOString()
    this.startedMs = Date.now()

    const groups = [...(this.opts.groups ?? [])]
    const ctx: SetupRunContext = {
      targetPath,
      template,
      // Unknown groups raise TemplateError here, before any phase starts.
      packages: selectPackages(template, groups),
      groups,
      backend: undefined,
      committed: 0,
      createdTarget: false,
      warnings: [],
      cleanupFailures: [],
    }
    const phases: PhaseRecord[] = []
    const buildResult = (): SetupResult => ({
      ok: this._state === 'committed',
      state: this._state,
      runId: this.runId,
      targetPath,
      template: template.slug,
      backend: ctx.backend,
      startedAt,
      finishedAt: this.now().toISOString(),
      durationMs: Date.now() - this.startedMs,
      phases,
      committedPhases: ctx.committed,
      warnings: [...ctx.warnings],
      errors: [],
      rolledBack: [],
      rollbackFailures: [],
      install: ctx.install,
      editorFiles: ctx.editor?.files ?? [],
      projectFiles: ctx.project?.files ?? [],
    })

    this._state = 'running'
    this.logger.info(`[devstrap] setup ${template.slug} -> ${targetPath}`)

    for (const [index, phase] of this.definitions().entries()) {
      this._phaseIndex = index
      const phaseStarted = Date.now()
      const record: PhaseRecord = { name: phase.name, label: phase.label, status: 'executed', startedAt: this.now().toISOString(), durationMs: 0 }

      if (this.opts.signal?.aborted) {
        record.status = 'skipped'
        record.error = 'cancelled'
        phases.push(record)
        return await this.fail(phase, new SetupCancelledError(), ctx, buildResult)
      }

      this.emit({ type: 'phase:start', phase: phase.name, label: phase.label, ordinal: phase.ordinal })
      let undo: RollbackAction
      try {
        undo = await phase.forward(ctx)
      } catch (e) {
        const error = e instanceof DevstrapError ? e : phase.wrap(e, ctx)
        record.status = 'failed'
        record.error = error.message
        record.durationMs = Date.now() - phaseStarted
        phases.push(record)
        this.emit({ type: 'phase:fail', phase: phase.name, label: phase.label, error: error.message })
        return await this.fail(phase, error, ctx, buildResult)
      }

      this.register(undo)
      ctx.committed++
      record.durationMs = Date.now() - phaseStarted
      phases.push(record)
      this.emit({ type: 'phase:commit', phase: phase.name, label: phase.label, durationMs: record.durationMs })
    }

    this.ledger.discard()
    this._state = 'committed'
    const result = buildResult()
    this.logger.info(`[devstrap] setup committed (${result.durationMs}ms)`)
    return result
  }

  private async fail(
    phase: PhaseDefinition,
    error: DevstrapError,
    ctx: SetupRunContext,
    buildResult: () => SetupResult,
  ): Promise<never> {
    this.logger.error(`[devstrap] ${phase.label} failed: ${error.message}`)

    this._state = 'rolled_back'
    this.emit({ type: 'rollback:start', actions: this.ledger.size })
    const report = await this.ledger.unwind()
    this.emit({ type: 'rollback:done', complete: report.complete })
    this._state = 'failed'

    const failures = [...ctx.cleanupFailures, ...report.failures]
    const cleanupComplete = failures.length === 0
    const result = buildResult()
    result.failedPhase = phase.name
    result.errors.push(error.message)
    result.cleanupComplete = cleanupComplete
    result.rolledBack = report.executed
    result.rollbackFailures = failures
    for (const f of failures) result.warnings.push(`Rollback action failed: ${f.label}: ${f.error}`)
    // The files of a rolled-back run are gone.
    result.editorFiles = []
    result.projectFiles = []

    throw new SetupRunError({
      phase: phase.name,
      phaseLabel: phase.label,
      cause: error,
      cleanupComplete,
      rollbackFailures: failures,
      result,
    })
  }
}
