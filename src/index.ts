export type {
  BackendName,
  FileSnapshot,
  InstallFailure,
  InstallResult,
  Logger,
  Phase,
  PhaseName,
  PhaseRecord,
  RollbackFailure,
  RunState,
  SetupResult,
} from './types.js'

export * from './core/errors.js'
export { RollbackLedger } from './core/ledger.js'
export type { RollbackAction, UnwindReport } from './core/ledger.js'
export { cloneDocument, detectOverrides, documentsEqual, mergeByKey, mergeDocuments, mergeObjects, toMergeDocument } from './core/merge.js'
export type { MergeArray, MergeDocument, MergeObject, MergeScalar, Override } from './core/merge.js'
export { ExecaProcessRunner, isAllowedCommand } from './core/process.js'
export type { ProcessOutcome, ProcessRunner, RunOptions } from './core/process.js'
export { PHASES, SetupOrchestrator } from './core/orchestrator.js'
export type { SetupCollaborators, SetupEvent, SetupOptions, SetupRunContext } from './core/orchestrator.js'

export {
  BACKEND_ORDER,
  BaseInstallStrategy,
  createStrategies,
  PipInstallStrategy,
  PoetryInstallStrategy,
  UvInstallStrategy,
} from './install/strategies/index.js'
export type { InstallRequest, InstallStrategy, RetryPolicy, StrategyOptions } from './install/strategies/index.js'
export { selectStrategy } from './install/select.js'

export { VenvSandbox } from './sandbox/venv.js'
export type { Sandbox, SandboxHandle } from './sandbox/types.js'
export { ProjectFileWriter, renderGitignore, renderPyproject } from './project/files.js'
export type { ProjectWriter, ProjectWriteRequest, ProjectWriteResult, PyprojectMetadata } from './project/files.js'
export { EditorConfigWriter } from './editor/settings.js'
export type { EditorWriter, EditorWriteRequest, EditorWriteResult } from './editor/settings.js'
export { JsonStateStore } from './state/store.js'
export type { HistoryEntry, RunStateRecord, StateStore } from './state/store.js'
export { listBundledTemplates, loadBundledTemplates, loadTemplate, parseTemplate } from './template/load.js'
export { normalizeTemplate, selectPackages } from './template/types.js'
export type { DependencyGroup, EditorTemplate, SetupTemplate } from './template/types.js'

export { formatSummary, setup } from './api/setup.js'
export type { SetupCommandOptions, SetupOutcome } from './api/setup.js'
