export type BackendName = 'uv' | 'pip' | 'poetry'

export type PhaseName = 'sandbox' | 'install' | 'project-files' | 'editor-config' | 'persist-state'

export type RunState = 'pending' | 'running' | 'committed' | 'rolled_back' | 'failed'

export interface Phase {
  name: PhaseName
  ordinal: number
  /**
   * Whether re-running the forward action against its own output is safe.
   * Descriptive only: a run never repeats a phase.
   */
  idempotent: boolean
}

export interface PhaseRecord {
  name: PhaseName
  label: string
  status: 'executed' | 'failed' | 'skipped'
  startedAt: string
  durationMs: number
  error?: string
}

/**
 * Bytes of a file before a write, so the write can be undone exactly.
 */
export interface FileSnapshot {
  path: string
  /**
   * Undefined when the file did not exist.
   */
  previous: Buffer | undefined
}

export interface InstallFailure {
  kind: 'transient' | 'terminal'
  message: string
  /**
   * Combined stdout/stderr of the last attempt.
   */
  output: string
  exitCode?: number
  timedOut: boolean
}

export interface InstallResult {
  ok: boolean
  /**
   * The backend that actually ran, after availability fallback.
   */
  backend: BackendName
  requested: string[]
  installed: string[]
  durationMs: number
  attempts: number
  warnings: string[]
  /**
   * Files the backend changed outside the sandbox (e.g. a lock file), with
   * their bytes from before the install.
   */
  artifacts: FileSnapshot[]
  failure?: InstallFailure
}

export interface RollbackFailure {
  label: string
  error: string
}

export interface SetupResult {
  ok: boolean
  state: RunState
  runId: string
  targetPath: string
  template: string
  backend?: BackendName
  startedAt: string
  finishedAt: string
  durationMs: number
  phases: PhaseRecord[]
  /**
   * Phases whose forward effect completed, whether or not they were later undone.
   */
  committedPhases: number
  warnings: string[]
  errors: string[]
  failedPhase?: PhaseName
  /**
   * Set when a rollback ran: true if every compensating action succeeded.
   */
  cleanupComplete?: boolean
  rolledBack: string[]
  rollbackFailures: RollbackFailure[]
  install?: InstallResult
  /**
   * Files written by the editor config phase, relative to the target.
   */
  editorFiles: string[]
  /**
   * Project files (pyproject.toml, .gitignore) written, relative to the target.
   */
  projectFiles: string[]
}

export interface Logger {
  info(msg: string): void
  warn(msg: string): void
  error(msg: string): void
  debug?(msg: string): void
}

export function silentLogger(): Logger {
  return {
    info: () => {},
    warn: () => {},
    error: () => {},
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message
  return String(e)
}
