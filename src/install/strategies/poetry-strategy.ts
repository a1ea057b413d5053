import path from 'path'

import { captureFile, readFileIfExists, sameBytes, writeFileAtomic } from '../../core/fs-ops.js'
import { projectName, PYPROJECT_FILE, renderPyproject } from '../../project/files.js'
import type { FileSnapshot } from '../../types.js'
import { BaseInstallStrategy, BackendCommand, InstallRequest } from './base.js'

export const POETRY_LOCK_FILE = 'poetry.lock'

/**
 * `poetry add` of the requested packages, pointed at the sandbox through
 * VIRTUAL_ENV so poetry never creates an environment of its own. A project
 * without pyproject.toml gets a bare one first.
 */
export class PoetryInstallStrategy extends BaseInstallStrategy {
  readonly name = 'poetry' as const
  readonly executable = 'poetry'

  private readonly captured = new Map<string, FileSnapshot[]>()

  protected async prepare(request: InstallRequest): Promise<void> {
    const snapshots = [
      await captureFile(path.join(request.projectPath, PYPROJECT_FILE)),
      await captureFile(path.join(request.projectPath, POETRY_LOCK_FILE)),
    ]
    this.captured.set(request.projectPath, snapshots)

    const [pyproject] = snapshots
    if (pyproject.previous === undefined) {
      const [major, minor] = request.sandbox.runtimeVersion.split('.')
      await writeFileAtomic(pyproject.path, renderPyproject({
        name: projectName(request.projectPath),
        requiresPython: minor === undefined ? undefined : `>=${major}.${minor}`,
        dependencies: [],
      }))
      this.logger.info(`[devstrap] poetry: created ${pyproject.path}`)
    }
  }

  protected async artifacts(request: InstallRequest): Promise<FileSnapshot[]> {
    const snapshots = this.captured.get(request.projectPath) ?? []
    this.captured.delete(request.projectPath)
    const changed: FileSnapshot[] = []
    for (const snap of snapshots) {
      if (!sameBytes(await readFileIfExists(snap.path), snap.previous)) changed.push(snap)
    }
    return changed
  }

  /**
   * Only what poetry reports; a package it skipped is not installed by this run.
   */
  protected confirmInstalled(parsed: string[]): string[] {
    return parsed
  }

  protected buildCommand(request: InstallRequest): BackendCommand {
    return {
      command: this.executable,
      args: ['add', '--no-interaction', ...request.packages],
      opts: {
        cwd: request.projectPath,
        env: {
          VIRTUAL_ENV: request.sandbox.root,
          POETRY_VIRTUALENVS_CREATE: 'false',
        },
      },
    }
  }
}
