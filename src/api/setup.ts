import path from 'path'

import { ConfigEnv, getHistoryPath, readGlobalConfig } from '../cli/config.js'
import { SetupRunError, TemplateError } from '../core/errors.js'
import { SetupCollaborators, SetupEvent, SetupOrchestrator } from '../core/orchestrator.js'
import { ExecaProcessRunner, ProcessRunner } from '../core/process.js'
import { EditorConfigWriter } from '../editor/settings.js'
import { createStrategies, DEFAULT_INSTALL_TIMEOUT_MS, DEFAULT_RETRY_POLICY } from '../install/strategies/index.js'
import { ProjectFileWriter } from '../project/files.js'
import { VenvSandbox } from '../sandbox/venv.js'
import { JsonStateStore } from '../state/store.js'
import { loadTemplate } from '../template/load.js'
import type { SetupTemplate } from '../template/types.js'
import { BackendName, Logger, SetupResult, silentLogger } from '../types.js'

export interface SetupCommandOptions extends ConfigEnv {
  /**
   * Template file or bundled template name. Falls back to the configured default.
   */
  template?: string | SetupTemplate
  backend?: BackendName
  groups?: string[]
  timeoutMs?: number
  maxAttempts?: number
  backoffMs?: number
  signal?: AbortSignal
  logger?: Logger
  onEvent?: (event: SetupEvent) => void
  runner?: ProcessRunner
  /**
   * Replace individual collaborators, mostly for tests.
   */
  collaborators?: Partial<SetupCollaborators>
}

export interface SetupOutcome {
  result: SetupResult
  /**
   * Set when the run failed; carries the phase and cleanup status.
   */
  error?: SetupRunError
}

async function resolveTemplate(opts: SetupCommandOptions, fallback: string | undefined): Promise<SetupTemplate> {
  const t = opts.template ?? fallback
  if (t === undefined) {
    throw new TemplateError('No template specified. Pass --template <file> or run `devstrap template set <file>`.')
  }
  return typeof t === 'string' ? await loadTemplate(t) : t
}

/**
 * Load the template, wire the default collaborators and drive one orchestrator run.
 * Template problems throw before anything is touched; a failed run resolves
 * with the rolled-back result and the SetupRunError.
 */
export async function setup(targetPath: string, opts: SetupCommandOptions = {}): Promise<SetupOutcome> {
  const logger = opts.logger ?? silentLogger()
  const config = await readGlobalConfig(opts)
  const template = await resolveTemplate(opts, config.defaultTemplate)

  const runner = opts.runner ?? new ExecaProcessRunner({ logger })
  const retry = {
    maxAttempts: opts.maxAttempts ?? config.install?.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
    backoffMs: opts.backoffMs ?? config.install?.backoffMs ?? DEFAULT_RETRY_POLICY.backoffMs,
  }
  const collaborators: SetupCollaborators = {
    sandbox: opts.collaborators?.sandbox ?? new VenvSandbox(runner, { logger }),
    strategies: opts.collaborators?.strategies ?? createStrategies(runner, { retry, logger }),
    project: opts.collaborators?.project ?? new ProjectFileWriter({ logger }),
    editor: opts.collaborators?.editor ?? new EditorConfigWriter({ logger }),
    store: opts.collaborators?.store ?? new JsonStateStore({ historyPath: getHistoryPath(opts), logger }),
  }

  const orchestrator = new SetupOrchestrator(collaborators, {
    targetPath: path.resolve(targetPath),
    template,
    backend: opts.backend ?? config.preferredBackend,
    groups: opts.groups,
    timeoutMs: opts.timeoutMs ?? config.install?.timeoutMs ?? DEFAULT_INSTALL_TIMEOUT_MS,
    signal: opts.signal,
    logger,
    onEvent: opts.onEvent,
  })

  try {
    return { result: await orchestrator.run() }
  } catch (e) {
    if (e instanceof SetupRunError) return { result: e.result, error: e }
    throw e
  }
}

/**
 * Human summary of a run: phase, reason and cleanup status on failure.
 */
export function formatSummary(outcome: SetupOutcome): string {
  const { result, error } = outcome
  const lines: string[] = []
  if (result.ok) {
    lines.push(`Setup committed: ${result.targetPath} (template ${result.template}, backend ${result.backend ?? 'none'}, ${result.durationMs}ms)`)
    const installed = result.install?.installed.length ?? 0
    lines.push(`- ${installed} package(s) installed`)
    if (result.projectFiles.length) lines.push(`- project files: ${result.projectFiles.join(', ')}`)
    if (result.editorFiles.length) lines.push(`- editor files: ${result.editorFiles.join(', ')}`)
  } else {
    const phase = result.phases.find(p => p.name === result.failedPhase)
    lines.push(`Setup failed during ${phase?.label ?? result.failedPhase ?? 'unknown phase'}`)
    lines.push(`- reason: ${error?.cause instanceof Error ? error.cause.message : result.errors[0] ?? 'unknown'}`)
    if (result.cleanupComplete) {
      lines.push('- cleanup: complete, no partial state was left')
    } else {
      lines.push('- cleanup: INCOMPLETE, manual cleanup may be needed')
      for (const f of result.rollbackFailures) lines.push(`  - ${f.label}: ${f.error}`)
    }
  }
  for (const w of result.warnings) lines.push(`warning: ${w}`)
  return lines.join('\n')
}
