import type { InstallResult, PhaseName, RollbackFailure, SetupResult } from '../types.js'

export type ErrorKind =
  | 'template'
  | 'sandbox'
  | 'install'
  | 'config-merge'
  | 'persistence'
  | 'cancelled'
  | 'process'
  | 'ledger'
  | 'run'

export class DevstrapError extends Error {
  readonly kind: ErrorKind

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.kind = kind
    this.name = new.target.name
  }
}

export class TemplateError extends DevstrapError {
  readonly templatePath?: string

  constructor(message: string, templatePath?: string, options?: { cause?: unknown }) {
    super('template', templatePath ? `${templatePath}: ${message}` : message, options)
    this.templatePath = templatePath
  }
}

export class SandboxCreationError extends DevstrapError {
  readonly reason: 'version' | 'permission' | 'disk' | 'other'

  constructor(message: string, reason: SandboxCreationError['reason'] = 'other', options?: { cause?: unknown }) {
    super('sandbox', message, options)
    this.reason = reason
  }
}

export class InstallationError extends DevstrapError {
  readonly result: InstallResult
  readonly transient: boolean

  constructor(message: string, result: InstallResult, transient: boolean) {
    super('install', message)
    this.result = result
    this.transient = transient
  }
}

export class TransientInstallationError extends InstallationError {
  constructor(message: string, result: InstallResult) {
    super(message, result, true)
  }
}

export class TerminalInstallationError extends InstallationError {
  constructor(message: string, result: InstallResult) {
    super(message, result, false)
  }
}

export class BackendUnavailableError extends TerminalInstallationError {}

export class ConfigMergeError extends DevstrapError {
  readonly filePath: string

  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super('config-merge', `${filePath}: ${message}`, options)
    this.filePath = filePath
  }
}

export class PersistenceError extends DevstrapError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('persistence', message, options)
  }
}

export class SetupCancelledError extends DevstrapError {
  constructor(message = 'Setup cancelled') {
    super('cancelled', message)
  }
}

export class CommandNotAllowedError extends DevstrapError {
  readonly command: string

  constructor(command: string) {
    super('process', `Refusing to run non-allow-listed command: ${command}`)
    this.command = command
  }
}

export class LedgerClosedError extends DevstrapError {
  constructor() {
    super('ledger', 'Rollback ledger is closed; create a new one per run')
  }
}

/**
 * Raised by the orchestrator after rollback. `cause` is always the original
 * phase error; compensating-action failures only show up in `rollbackFailures`.
 */
export class SetupRunError extends DevstrapError {
  readonly phase: PhaseName
  readonly phaseLabel: string
  readonly cleanupComplete: boolean
  readonly rollbackFailures: RollbackFailure[]
  readonly result: SetupResult

  constructor(input: {
    phase: PhaseName
    phaseLabel: string
    cause: unknown
    cleanupComplete: boolean
    rollbackFailures: RollbackFailure[]
    result: SetupResult
  }) {
    const reason = input.cause instanceof Error ? input.cause.message : String(input.cause)
    super('run', `Setup failed during ${input.phaseLabel}: ${reason}`, { cause: input.cause })
    this.phase = input.phase
    this.phaseLabel = input.phaseLabel
    this.cleanupComplete = input.cleanupComplete
    this.rollbackFailures = input.rollbackFailures
    this.result = input.result
  }
}
