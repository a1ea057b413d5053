import fs from 'fs-extra'
import path from 'path'
import semver from 'semver'

import { SandboxCreationError } from '../core/errors.js'
import { removePath } from '../core/fs-ops.js'
import type { ProcessRunner } from '../core/process.js'
import { Logger, silentLogger } from '../types.js'
import type { Sandbox, SandboxHandle } from './types.js'
import { interpreterCandidates, parseInterpreterVersion, toSemverRange } from './version.js'

export interface VenvSandboxOptions {
  logger?: Logger
  platform?: NodeJS.Platform
  /**
   * Per-command timeout for probing and creating the venv.
   */
  timeoutMs?: number
}

function classifyCreationFailure(output: string): SandboxCreationError['reason'] {
  if (/permission denied|EACCES|EPERM/i.test(output)) return 'permission'
  if (/no space left|ENOSPC|disk quota/i.test(output)) return 'disk'
  return 'other'
}

/**
 * Python virtual environments built with `<python> -m venv`.
 */
export class VenvSandbox implements Sandbox {
  private readonly runner: ProcessRunner
  private readonly logger: Logger
  private readonly platform: NodeJS.Platform
  private readonly timeoutMs: number

  constructor(runner: ProcessRunner, opts: VenvSandboxOptions = {}) {
    this.runner = runner
    this.logger = opts.logger ?? silentLogger()
    this.platform = opts.platform ?? process.platform
    this.timeoutMs = opts.timeoutMs ?? 120_000
  }

  resolveRuntimeExecutable(handle: SandboxHandle): string {
    return this.platform === 'win32'
      ? path.join(handle.root, 'Scripts', 'python.exe')
      : path.join(handle.root, 'bin', 'python')
  }

  async discoverInterpreter(versionConstraint: string): Promise<{ executable: string; version: string }> {
    const range = toSemverRange(versionConstraint)
    if (!range) {
      throw new SandboxCreationError(`Unrecognised interpreter version constraint: ${versionConstraint}`, 'version')
    }

    const seen: string[] = []
    for (const candidate of interpreterCandidates(range)) {
      const res = await this.runner.run(candidate, ['--version'], { timeoutMs: 10_000 })
      if (res.exitCode !== 0) continue
      const version = parseInterpreterVersion(res.output)
      if (!version) continue
      seen.push(`${candidate} (${version})`)
      if (semver.satisfies(version, range)) {
        this.logger.debug?.(`[devstrap] using interpreter ${candidate} ${version}`)
        return { executable: candidate, version }
      }
    }

    const found = seen.length ? `found: ${seen.join(', ')}` : 'no interpreter found on PATH'
    throw new SandboxCreationError(`No interpreter satisfies ${versionConstraint} (${found})`, 'version')
  }

  async create(root: string, versionConstraint: string): Promise<SandboxHandle> {
    if (await fs.pathExists(root)) {
      throw new SandboxCreationError(`Sandbox directory already exists: ${root}`, 'other')
    }

    const { executable, version } = await this.discoverInterpreter(versionConstraint)

    try {
      await fs.ensureDir(path.dirname(root))
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e)
      throw new SandboxCreationError(`Cannot create parent of ${root}: ${msg}`, classifyCreationFailure(msg), { cause: e })
    }

    const res = await this.runner.run(executable, ['-m', 'venv', root], { timeoutMs: this.timeoutMs })
    if (res.exitCode !== 0 || res.timedOut) {
      await removePath(root)
      const detail = res.timedOut ? 'timed out' : res.output.trim()
      throw new SandboxCreationError(`${executable} -m venv failed: ${detail}`, classifyCreationFailure(res.output))
    }

    const handle: SandboxHandle = { root, runtimeVersion: version, baseInterpreter: executable }
    if (!await fs.pathExists(this.resolveRuntimeExecutable(handle))) {
      await removePath(root)
      throw new SandboxCreationError(`Sandbox at ${root} has no runtime executable`, 'other')
    }
    return handle
  }
}
