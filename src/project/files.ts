import path from 'path'
import * as TOML from 'smol-toml'

import { captureFile, restoreSnapshots, writeFileAtomic } from '../core/fs-ops.js'
import { toRequiresPython } from '../sandbox/version.js'
import type { SetupTemplate } from '../template/types.js'
import { errorMessage, FileSnapshot, Logger, silentLogger } from '../types.js'

export const PYPROJECT_FILE = 'pyproject.toml'
export const GITIGNORE_FILE = '.gitignore'

/**
 * Entries an existing .gitignore gets when it lacks them.
 */
export const REQUIRED_IGNORES = ['.venv/', '.devstrap/']

const GITIGNORE_SECTIONS: Array<[string, string[]]> = [
  ['Python', ['__pycache__/', '*.py[cod]', '*$py.class', '*.so']],
  ['Virtual environments', ['.venv/', 'venv/', 'env/', '*.egg-info/']],
  ['Distribution', ['dist/', 'build/', '*.egg']],
  ['Testing', ['.pytest_cache/', '.coverage', 'htmlcov/', '.tox/', '.nox/']],
  ['Editors', ['.idea/', '*.swp', '*.swo']],
  ['OS', ['.DS_Store', 'Thumbs.db']],
  ['devstrap', ['.devstrap/']],
]

export interface PyprojectMetadata {
  name: string
  description?: string
  requiresPython?: string
  dependencies: string[]
  optionalDependencies?: Record<string, string[]>
}

/**
 * Distribution name for a project directory: "My Service" -> "my-service".
 */
export function projectName(targetPath: string): string {
  const name = path.basename(path.resolve(targetPath))
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, '-')
    .replace(/^[^a-z0-9]+|[^a-z0-9]+$/g, '')
  return name || 'project'
}

export function renderPyproject(meta: PyprojectMetadata): string {
  const project: Record<string, string | string[] | Record<string, string[]>> = {
    name: meta.name,
    version: '0.1.0',
    description: meta.description ?? '',
  }
  if (meta.requiresPython) project['requires-python'] = meta.requiresPython
  project.dependencies = [...meta.dependencies]
  if (meta.optionalDependencies && Object.keys(meta.optionalDependencies).length) {
    project['optional-dependencies'] = meta.optionalDependencies
  }
  const text = TOML.stringify({ project })
  return text.endsWith('\n') ? text : `${text}\n`
}

export function renderGitignore(): string {
  return `${GITIGNORE_SECTIONS.map(([title, lines]) => [`# ${title}`, ...lines].join('\n')).join('\n\n')}\n`
}

/**
 * `existing` with the missing required entries appended, or undefined when
 * nothing is missing.
 */
export function extendGitignore(existing: string): string | undefined {
  const present = new Set(existing.split(/\r?\n/).map(l => l.trim()))
  const missing = REQUIRED_IGNORES.filter(e => !present.has(e) && !present.has(e.slice(0, -1)))
  if (!missing.length) return undefined
  const sep = existing === '' || existing.endsWith('\n') ? '' : '\n'
  return `${existing}${sep}\n# devstrap\n${missing.join('\n')}\n`
}

export interface ProjectWriteRequest {
  targetPath: string
  template: SetupTemplate
  /**
   * Optional dependency groups selected for the run.
   */
  groups: string[]
}

export interface ProjectWriteResult {
  snapshots: FileSnapshot[]
  /**
   * Written files, relative to the target.
   */
  files: string[]
}

/**
 * Core groups become `dependencies`; selected optional groups become extras.
 */
export function pyprojectFor(req: ProjectWriteRequest): PyprojectMetadata {
  const dependencies: string[] = []
  const optionalDependencies: Record<string, string[]> = {}
  for (const group of req.template.dependencies) {
    if (group.kind === 'core') {
      for (const pkg of group.packages) {
        if (!dependencies.includes(pkg)) dependencies.push(pkg)
      }
    } else if (req.groups.includes(group.name)) {
      optionalDependencies[group.name] = [...group.packages]
    }
  }
  return {
    name: projectName(req.targetPath),
    description: req.template.description,
    requiresPython: toRequiresPython(req.template.pythonVersion),
    dependencies,
    optionalDependencies,
  }
}

/**
 * What the orchestrator needs from a project file writer.
 */
export interface ProjectWriter {
  write(req: ProjectWriteRequest): Promise<ProjectWriteResult>
  restore(result: ProjectWriteResult): Promise<void>
}

export interface ProjectFileWriterOptions {
  logger?: Logger
}

/**
 * Generates pyproject.toml when the project has none, and creates or extends
 * .gitignore. An existing pyproject.toml is never rewritten.
 */
export class ProjectFileWriter implements ProjectWriter {
  private readonly logger: Logger

  constructor(opts: ProjectFileWriterOptions = {}) {
    this.logger = opts.logger ?? silentLogger()
  }

  async write(req: ProjectWriteRequest): Promise<ProjectWriteResult> {
    const pyproject = await captureFile(path.join(req.targetPath, PYPROJECT_FILE))
    const gitignore = await captureFile(path.join(req.targetPath, GITIGNORE_FILE))

    const pending: Array<{ snap: FileSnapshot; content: string }> = []
    if (pyproject.previous === undefined) {
      pending.push({ snap: pyproject, content: renderPyproject(pyprojectFor(req)) })
    } else {
      this.logger.info(`[devstrap] ${pyproject.path} exists; left unchanged`)
    }
    const ignore = gitignore.previous === undefined
      ? renderGitignore()
      : extendGitignore(gitignore.previous.toString('utf8'))
    if (ignore !== undefined) pending.push({ snap: gitignore, content: ignore })

    const result: ProjectWriteResult = { snapshots: [], files: [] }
    try {
      for (const p of pending) {
        result.snapshots.push(p.snap)
        await writeFileAtomic(p.snap.path, p.content)
        result.files.push(path.basename(p.snap.path))
        this.logger.info(`[devstrap] wrote ${p.snap.path}`)
      }
    } catch (e) {
      this.logger.error(`[devstrap] project file write failed: ${errorMessage(e)}`)
      try {
        await this.restore(result)
      } catch (restoreError) {
        this.logger.warn(`[devstrap] could not restore project files: ${errorMessage(restoreError)}`)
      }
      throw e
    }
    return result
  }

  async restore(result: ProjectWriteResult): Promise<void> {
    await restoreSnapshots(result.snapshots)
  }
}
