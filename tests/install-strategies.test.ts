import fs from 'fs-extra'
import path from 'node:path'
import * as TOML from 'smol-toml'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import {
  BackendUnavailableError,
  TerminalInstallationError,
  TransientInstallationError,
} from '../src/core/errors.js'
import { selectStrategy } from '../src/install/select.js'
import {
  createStrategies,
  InstallRequest,
  PipInstallStrategy,
  PoetryInstallStrategy,
  UvInstallStrategy,
} from '../src/install/strategies/index.js'
import { projectName } from '../src/project/files.js'
import { FakeRunner, makeTmpDir } from './helpers.js'

const NETWORK_OUTPUT = 'WARNING: Retrying after connection broken by ConnectionResetError: Connection reset by peer'
const NOT_FOUND_OUTPUT = 'ERROR: No matching distribution found for does-not-exist'

function request(overrides: Partial<InstallRequest> = {}): InstallRequest {
  return {
    packages: ['requests>=2.31', 'click'],
    sandbox: { root: '/work/.venv', runtimeVersion: '3.11.4', baseInterpreter: 'python3.11' },
    runtimeExecutable: '/work/.venv/bin/python',
    projectPath: '/work',
    timeoutMs: 5000,
    ...overrides,
  }
}

describe('install strategies: commands', () => {
  it('uv installs into the sandbox interpreter', async () => {
    const runner = new FakeRunner(() => ({ output: ' + requests==2.31.0\n + click==8.1.7\n' }))
    const res = await new UvInstallStrategy(runner).install(request())

    expect(runner.calls).toEqual([{
      command: 'uv',
      args: ['pip', 'install', '--python', '/work/.venv/bin/python', 'requests>=2.31', 'click'],
      opts: { cwd: '/work', timeoutMs: 5000 },
    }])
    expect(res.ok).toBe(true)
    expect(res.backend).toBe('uv')
    expect(res.attempts).toBe(1)
    expect(res.installed).toEqual(['requests==2.31.0', 'click==8.1.7'])
  })

  it('pip runs as a module of the sandbox interpreter', async () => {
    const runner = new FakeRunner(() => ({ output: 'Successfully installed click-8.1.7 requests-2.31.0\n' }))
    const res = await new PipInstallStrategy(runner).install(request())

    expect(runner.calls[0].command).toBe('/work/.venv/bin/python')
    expect(runner.calls[0].args).toEqual(['-m', 'pip', 'install', '--disable-pip-version-check', 'requests>=2.31', 'click'])
    expect(res.installed).toEqual(['click==8.1.7', 'requests==2.31.0'])
  })

  it('reports requested names when the output lists nothing', async () => {
    const runner = new FakeRunner(() => ({ output: 'Requirement already satisfied' }))
    const res = await new PipInstallStrategy(runner).install(request({ packages: ['uvicorn[standard]>=0.24'] }))
    expect(res.installed).toEqual(['uvicorn'])
  })

  it('does not spawn anything for an empty package list', async () => {
    const runner = new FakeRunner()
    const res = await new UvInstallStrategy(runner).install(request({ packages: [] }))
    expect(res.ok).toBe(true)
    expect(res.attempts).toBe(0)
    expect(runner.calls).toEqual([])
  })
})

describe('install strategies: retry policy', () => {
  it('retries a transient failure exactly maxAttempts times with linear backoff', async () => {
    const runner = new FakeRunner(() => ({ exitCode: 1, output: NETWORK_OUTPUT }))
    const sleep = vi.fn(async (_ms: number) => {})
    const strategy = new UvInstallStrategy(runner, { retry: { maxAttempts: 3, backoffMs: 100 }, sleep })

    const err = await strategy.install(request()).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(TransientInstallationError)
    expect(runner.calls).toHaveLength(3)
    expect(sleep.mock.calls.map(c => c[0])).toEqual([100, 200])
    if (err instanceof TransientInstallationError) {
      expect(err.result.ok).toBe(false)
      expect(err.result.attempts).toBe(3)
      expect(err.result.failure?.kind).toBe('transient')
      expect(err.result.failure?.output).toBe(NETWORK_OUTPUT)
    }
  })

  it('attempts a terminal failure exactly once', async () => {
    const runner = new FakeRunner(() => ({ exitCode: 1, output: NOT_FOUND_OUTPUT }))
    const sleep = vi.fn(async (_ms: number) => {})
    const strategy = new PipInstallStrategy(runner, { retry: { maxAttempts: 5 }, sleep })

    const err = await strategy.install(request()).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(TerminalInstallationError)
    expect(runner.calls).toHaveLength(1)
    expect(sleep).not.toHaveBeenCalled()
    if (err instanceof TerminalInstallationError) {
      expect(err.result.failure).toEqual({
        kind: 'terminal',
        message: 'Installation failed (exit code 1)',
        output: NOT_FOUND_OUTPUT,
        exitCode: 1,
        timedOut: false,
      })
    }
  })

  it('treats a timed-out attempt as transient and recovers on retry', async () => {
    let n = 0
    const runner = new FakeRunner(() => {
      n++
      return n === 1 ? { exitCode: 143, timedOut: true } : { output: 'Successfully installed click-8.1.7' }
    })
    const res = await new UvInstallStrategy(runner, { retry: { backoffMs: 0 }, sleep: async () => {} }).install(request())

    expect(res.ok).toBe(true)
    expect(res.attempts).toBe(2)
    expect(res.failure).toBeUndefined()
  })
})

describe('poetry strategy', () => {
  let dir: string

  beforeEach(async () => {
    dir = await makeTmpDir()
  })

  afterEach(async () => {
    await fs.remove(dir)
  })

  it('creates a bare pyproject.toml and adds the requested packages', async () => {
    const runner = new FakeRunner(async () => {
      await fs.writeFile(path.join(dir, 'poetry.lock'), '# lock\n')
      return { output: '  - Installing fastapi (0.110.0)\n  - Installing uvicorn (0.27.1)\n' }
    })
    const res = await new PoetryInstallStrategy(runner).install(request({
      packages: ['fastapi>=0.110', 'uvicorn[standard]'],
      projectPath: dir,
      sandbox: { root: '/sb', runtimeVersion: '3.11.4', baseInterpreter: 'python3' },
    }))

    expect(runner.calls).toEqual([{
      command: 'poetry',
      args: ['add', '--no-interaction', 'fastapi>=0.110', 'uvicorn[standard]'],
      opts: { cwd: dir, env: { VIRTUAL_ENV: '/sb', POETRY_VIRTUALENVS_CREATE: 'false' }, timeoutMs: 5000 },
    }])
    expect(res.installed).toEqual(['fastapi==0.110.0', 'uvicorn==0.27.1'])
    expect(TOML.parse(await fs.readFile(path.join(dir, 'pyproject.toml'), 'utf8'))).toEqual({
      project: { name: projectName(dir), version: '0.1.0', description: '', 'requires-python': '>=3.11', dependencies: [] },
    })
    expect(res.artifacts).toEqual([
      { path: path.join(dir, 'pyproject.toml'), previous: undefined },
      { path: path.join(dir, 'poetry.lock'), previous: undefined },
    ])
  })

  it('reports only the packages poetry says it installed', async () => {
    await fs.writeFile(path.join(dir, 'pyproject.toml'), '[project]\nname = "x"\n')
    const runner = new FakeRunner(() => ({ output: 'No dependencies to install or update\n' }))
    const res = await new PoetryInstallStrategy(runner).install(request({ packages: ['fastapi>=0.110'], projectPath: dir }))

    expect(runner.calls[0].args).toEqual(['add', '--no-interaction', 'fastapi>=0.110'])
    expect(res.ok).toBe(true)
    expect(res.installed).toEqual([])
    expect(res.artifacts).toEqual([])
  })

  it('captures the earlier bytes of files poetry rewrites', async () => {
    await fs.writeFile(path.join(dir, 'pyproject.toml'), '[project]\nname = "x"\n')
    await fs.writeFile(path.join(dir, 'poetry.lock'), '# old lock\n')
    const runner = new FakeRunner(async () => {
      await fs.writeFile(path.join(dir, 'poetry.lock'), '# new lock\n')
      return {}
    })
    const res = await new PoetryInstallStrategy(runner).install(request({ projectPath: dir }))

    expect(res.artifacts).toEqual([{ path: path.join(dir, 'poetry.lock'), previous: Buffer.from('# old lock\n') }])
  })

  it('hands back the files it created when the install fails', async () => {
    const runner = new FakeRunner(() => ({ exitCode: 1, output: NOT_FOUND_OUTPUT }))
    const err = await new PoetryInstallStrategy(runner).install(request({ projectPath: dir })).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(TerminalInstallationError)
    if (err instanceof TerminalInstallationError) {
      expect(err.result.artifacts).toEqual([{ path: path.join(dir, 'pyproject.toml'), previous: undefined }])
    }
  })
})

describe('selectStrategy', () => {
  it('uses the preferred backend when it is available', async () => {
    const runner = new FakeRunner()
    const { strategy, warnings } = await selectStrategy(createStrategies(runner), request(), 'pip')
    expect(strategy.name).toBe('pip')
    expect(warnings).toEqual([])
    expect(runner.calls).toEqual([
      { command: '/work/.venv/bin/python', args: ['-m', 'pip', '--version'], opts: { timeoutMs: 15_000 } },
    ])
  })

  it('falls back in order and says so', async () => {
    const runner = new FakeRunner(({ command }) => (command === 'uv' ? { exitCode: 127 } : {}))
    const warn = vi.fn()
    const { strategy, warnings } = await selectStrategy(
      createStrategies(runner),
      request(),
      'uv',
      { info: vi.fn(), warn, error: vi.fn() },
    )

    expect(strategy.name).toBe('pip')
    expect(warnings).toEqual([
      'Backend uv is not available (uv could not be resolved)',
      'Preferred backend uv is unavailable; falling back to pip',
    ])
    expect(warn).toHaveBeenCalledTimes(2)
  })

  it('treats a runner that throws as unavailable', async () => {
    const runner = new FakeRunner(({ command }) => {
      if (command === 'uv') throw new Error('spawn uv ENOENT')
      return {}
    })
    const { strategy } = await selectStrategy(createStrategies(runner), request())
    expect(strategy.name).toBe('pip')
  })

  it('throws BackendUnavailableError when nothing can run', async () => {
    const runner = new FakeRunner(() => ({ exitCode: 127 }))
    const err = await selectStrategy(createStrategies(runner), request(), 'poetry').catch((e: unknown) => e)

    expect(err).toBeInstanceOf(BackendUnavailableError)
    expect(err).toBeInstanceOf(TerminalInstallationError)
    if (err instanceof BackendUnavailableError) {
      expect(err.message).toBe('No install backend available (tried poetry, uv, pip)')
      expect(err.result.warnings).toHaveLength(3)
    }
  })
})
