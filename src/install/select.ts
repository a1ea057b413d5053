import { BackendUnavailableError } from '../core/errors.js'
import type { BackendName, Logger } from '../types.js'
import type { InstallRequest, InstallStrategy } from './strategies/base.js'
import { BACKEND_ORDER } from './strategies/index.js'

export interface StrategySelection {
  strategy: InstallStrategy
  warnings: string[]
}

/**
 * Candidate order: the preferred backend first, then the fixed fallback order.
 */
export function backendPreference(preferred?: BackendName): BackendName[] {
  if (!preferred) return [...BACKEND_ORDER]
  return [preferred, ...BACKEND_ORDER.filter(b => b !== preferred)]
}

/**
 * Pick the first available backend. Falling back is never silent: every skipped
 * backend produces a warning, and the chosen strategy's name is what ends up in
 * InstallResult.backend.
 */
export async function selectStrategy(
  strategies: InstallStrategy[],
  request: Pick<InstallRequest, 'runtimeExecutable' | 'packages'>,
  preferred?: BackendName,
  logger?: Logger,
): Promise<StrategySelection> {
  const warnings: string[] = []
  for (const name of backendPreference(preferred)) {
    const strategy = strategies.find(s => s.name === name)
    if (!strategy) continue
    if (await strategy.isAvailable(request)) {
      if (preferred && name !== preferred) {
        const msg = `Preferred backend ${preferred} is unavailable; falling back to ${name}`
        warnings.push(msg)
        logger?.warn(`[devstrap] ${msg}`)
      }
      return { strategy, warnings }
    }
    const msg = `Backend ${name} is not available (${strategy.executable} could not be resolved)`
    warnings.push(msg)
    logger?.warn(`[devstrap] ${msg}`)
  }

  throw new BackendUnavailableError(`No install backend available (tried ${backendPreference(preferred).join(', ')})`, {
    ok: false,
    backend: preferred ?? BACKEND_ORDER[0],
    requested: [...request.packages],
    installed: [],
    durationMs: 0,
    attempts: 0,
    warnings,
    artifacts: [],
    failure: { kind: 'terminal', message: 'No install backend available', output: '', timedOut: false },
  })
}
