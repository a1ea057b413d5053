import { TerminalInstallationError, TransientInstallationError } from '../../core/errors.js'
import type { ProcessOutcome, ProcessRunner, RunOptions } from '../../core/process.js'
import type { SandboxHandle } from '../../sandbox/types.js'
import { BackendName, errorMessage, FileSnapshot, InstallFailure, InstallResult, Logger, silentLogger } from '../../types.js'
import { classifyFailure, packageName, parseInstalledPackages } from '../classify.js'

export interface InstallRequest {
  packages: string[]
  sandbox: SandboxHandle
  /**
   * Runtime executable inside the sandbox.
   */
  runtimeExecutable: string
  projectPath: string
  /**
   * Hard upper bound per attempt.
   */
  timeoutMs: number
}

export interface RetryPolicy {
  maxAttempts: number
  /**
   * Attempt n waits `backoffMs * n` before attempt n + 1.
   */
  backoffMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = { maxAttempts: 3, backoffMs: 1000 }

export const DEFAULT_INSTALL_TIMEOUT_MS = 600_000

export interface InstallStrategy {
  readonly name: BackendName
  readonly executable: string
  isAvailable(request: Pick<InstallRequest, 'runtimeExecutable'>): Promise<boolean>
  install(request: InstallRequest): Promise<InstallResult>
}

export interface StrategyOptions {
  retry?: Partial<RetryPolicy>
  logger?: Logger
  sleep?: (ms: number) => Promise<void>
}

export interface BackendCommand {
  command: string
  args: string[]
  opts?: Omit<RunOptions, 'timeoutMs'>
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

/**
 * Shared attempt/retry loop. Subclasses only describe their command line.
 *
 * Exit 0 is success. A transient failure (network signature or per-attempt
 * timeout) is retried up to `maxAttempts` with linear backoff; a terminal one
 * is never retried.
 */
export abstract class BaseInstallStrategy implements InstallStrategy {
  abstract readonly name: BackendName
  abstract readonly executable: string

  protected readonly runner: ProcessRunner
  protected readonly logger: Logger
  protected readonly retry: RetryPolicy
  private readonly sleep: (ms: number) => Promise<void>

  constructor(runner: ProcessRunner, opts: StrategyOptions = {}) {
    this.runner = runner
    this.logger = opts.logger ?? silentLogger()
    this.retry = {
      maxAttempts: Math.max(1, opts.retry?.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts),
      backoffMs: Math.max(0, opts.retry?.backoffMs ?? DEFAULT_RETRY_POLICY.backoffMs),
    }
    this.sleep = opts.sleep ?? defaultSleep
  }

  protected abstract buildCommand(request: InstallRequest): BackendCommand

  /**
   * Hook run once before the first attempt. Throwing here is a terminal failure.
   */
  protected async prepare(_request: InstallRequest): Promise<void> {}

  /**
   * Files the backend changed outside the sandbox, with their earlier bytes;
   * rollback restores them.
   */
  protected async artifacts(_request: InstallRequest): Promise<FileSnapshot[]> {
    return []
  }

  /**
   * Packages reported for a successful attempt. pip and uv print nothing for
   * requirements that were already satisfied, so the requested names stand in.
   */
  protected confirmInstalled(parsed: string[], request: InstallRequest): string[] {
    return parsed.length ? parsed : request.packages.map(packageName)
  }

  protected versionCommand(_request: Pick<InstallRequest, 'runtimeExecutable'>): BackendCommand {
    return { command: this.executable, args: ['--version'] }
  }

  async isAvailable(request: Pick<InstallRequest, 'runtimeExecutable'>): Promise<boolean> {
    const check = this.versionCommand(request)
    try {
      const res = await this.runner.run(check.command, check.args, { ...check.opts, timeoutMs: 15_000 })
      return res.exitCode === 0 && !res.timedOut
    } catch (e) {
      this.logger.debug?.(`[devstrap] availability check for ${this.name} failed: ${errorMessage(e)}`)
      return false
    }
  }

  async install(request: InstallRequest): Promise<InstallResult> {
    const started = Date.now()
    const result: InstallResult = {
      ok: false,
      backend: this.name,
      requested: [...request.packages],
      installed: [],
      durationMs: 0,
      attempts: 0,
      warnings: [],
      artifacts: [],
    }

    if (request.packages.length === 0) {
      this.logger.warn(`[devstrap] ${this.name}: no packages to install`)
      result.ok = true
      return result
    }

    try {
      await this.prepare(request)
    } catch (e) {
      const message = errorMessage(e)
      result.failure = { kind: 'terminal', message, output: '', timedOut: false }
      result.artifacts = await this.artifacts(request)
      result.durationMs = Date.now() - started
      throw new TerminalInstallationError(`${this.name} install failed: ${message}`, result)
    }
    const { command, args, opts } = this.buildCommand(request)

    let last: InstallFailure | undefined
    for (let attempt = 1; attempt <= this.retry.maxAttempts; attempt++) {
      result.attempts = attempt
      this.logger.info(`[devstrap] ${this.name}: installing ${request.packages.length} package(s) (attempt ${attempt}/${this.retry.maxAttempts})`)
      const outcome: ProcessOutcome = await this.runner.run(command, args, { ...opts, timeoutMs: request.timeoutMs })

      if (outcome.exitCode === 0 && !outcome.timedOut) {
        result.ok = true
        result.installed = this.confirmInstalled(parseInstalledPackages(outcome.output), request)
        result.failure = undefined
        result.artifacts = await this.artifacts(request)
        result.durationMs = Date.now() - started
        return result
      }

      last = classifyFailure({ ...outcome, timeoutMs: request.timeoutMs })
      result.failure = last
      if (last.kind === 'terminal') break

      this.logger.warn(`[devstrap] ${this.name}: ${last.message}`)
      if (attempt < this.retry.maxAttempts) {
        await this.sleep(this.retry.backoffMs * attempt)
      }
    }

    result.artifacts = await this.artifacts(request)
    result.durationMs = Date.now() - started
    const detail = last ? `${last.message}\n${last.output.trim()}` : 'unknown failure'
    if (last?.kind === 'transient') {
      throw new TransientInstallationError(`${this.name} install failed after ${result.attempts} attempt(s): ${detail}`, result)
    }
    throw new TerminalInstallationError(`${this.name} install failed: ${detail}`, result)
  }
}
