import type { ProcessRunner } from '../../core/process.js'
import type { BackendName } from '../../types.js'
import type { InstallStrategy, StrategyOptions } from './base.js'
import { PipInstallStrategy } from './pip-strategy.js'
import { PoetryInstallStrategy } from './poetry-strategy.js'
import { UvInstallStrategy } from './uv-strategy.js'

export * from './base.js'
export { PipInstallStrategy } from './pip-strategy.js'
export { PoetryInstallStrategy } from './poetry-strategy.js'
export { UvInstallStrategy } from './uv-strategy.js'

/**
 * Fallback order when the preferred backend is missing.
 */
export const BACKEND_ORDER: readonly BackendName[] = ['uv', 'pip', 'poetry']

export function isBackendName(v: unknown): v is BackendName {
  return typeof v === 'string' && BACKEND_ORDER.some(b => b === v)
}

export function createStrategies(runner: ProcessRunner, opts?: StrategyOptions): InstallStrategy[] {
  return [
    new UvInstallStrategy(runner, opts),
    new PipInstallStrategy(runner, opts),
    new PoetryInstallStrategy(runner, opts),
  ]
}
