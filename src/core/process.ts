import path from 'path'
import { execa } from 'execa'

import { CommandNotAllowedError } from './errors.js'
import { Logger, silentLogger } from '../types.js'

export interface RunOptions {
  cwd?: string
  /**
   * Hard upper bound for the process; it is killed when exceeded.
   */
  timeoutMs?: number
  env?: Record<string, string>
}

export interface ProcessOutcome {
  exitCode: number
  /**
   * Interleaved stdout and stderr.
   */
  output: string
  timedOut: boolean
  durationMs: number
}

/**
 * Runs an executable with an argument list. Never goes through a shell.
 */
export interface ProcessRunner {
  run(command: string, args: string[], opts?: RunOptions): Promise<ProcessOutcome>
}

/**
 * Exit code reported when the executable could not be spawned at all.
 */
export const SPAWN_FAILED_EXIT_CODE = 127

const ALLOWED_EXECUTABLES = [
  /^uv$/,
  /^pip3?$/,
  /^poetry$/,
  /^python(3(\.\d+)?)?$/,
]

// win32.basename splits on both separators.
export function isAllowedCommand(command: string): boolean {
  const base = path.win32.basename(command).replace(/\.exe$/i, '')
  return ALLOWED_EXECUTABLES.some(re => re.test(base))
}

export interface ExecaRunnerOptions {
  logger?: Logger
}

export class ExecaProcessRunner implements ProcessRunner {
  private readonly logger: Logger

  constructor(opts: ExecaRunnerOptions = {}) {
    this.logger = opts.logger ?? silentLogger()
  }

  async run(command: string, args: string[], opts: RunOptions = {}): Promise<ProcessOutcome> {
    if (!isAllowedCommand(command)) {
      throw new CommandNotAllowedError(command)
    }
    this.logger.debug?.(`[devstrap] exec: ${command} ${args.join(' ')}`)
    const started = Date.now()
    const res = await execa(command, args, {
      cwd: opts.cwd,
      timeout: opts.timeoutMs,
      env: opts.env,
      all: true,
      reject: false,
      shell: false,
      stdin: 'ignore',
    })
    const spawned = typeof res.exitCode === 'number'
    let output = res.all ?? ''
    if (!spawned && !output) {
      output = 'message' in res && typeof res.message === 'string' ? res.message : `Failed to spawn ${command}`
    }
    return {
      exitCode: spawned ? res.exitCode : SPAWN_FAILED_EXIT_CODE,
      output,
      timedOut: res.timedOut,
      durationMs: Date.now() - started,
    }
  }
}
