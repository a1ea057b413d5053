import fs from 'fs-extra'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { SandboxCreationError } from '../src/core/errors.js'
import { interpreterCandidates, parseInterpreterVersion, toRequiresPython, toSemverRange } from '../src/sandbox/version.js'
import { VenvSandbox } from '../src/sandbox/venv.js'
import { FakeRunner, makeTmpDir, RecordedCall } from './helpers.js'

describe('interpreter version constraints', () => {
  it('maps template constraints to semver ranges', () => {
    expect(toSemverRange('3.11')).toBe('>=3.11.0')
    expect(toSemverRange('3.10+')).toBe('>=3.10.0')
    expect(toSemverRange('3.10-3.12')).toBe('>=3.10.0 <3.13.0')
    expect(toSemverRange('>=3.9.0')).toBe('>=3.9.0')
    expect(toSemverRange('latest please')).toBeUndefined()
  })

  it('maps template constraints to requires-python specifiers', () => {
    expect(toRequiresPython('3.11')).toBe('>=3.11')
    expect(toRequiresPython('3.10+')).toBe('>=3.10')
    expect(toRequiresPython('3.10-3.12')).toBe('>=3.10,<3.13')
    expect(toRequiresPython('^3.11')).toBe('>=3.11')
    expect(toRequiresPython('latest please')).toBeUndefined()
  })

  it('parses interpreter version output', () => {
    expect(parseInterpreterVersion('Python 3.12.1\n')).toBe('3.12.1')
    expect(parseInterpreterVersion('Python 3.9')).toBe('3.9.0')
    expect(parseInterpreterVersion('bash: python: not found')).toBeUndefined()
  })

  it('looks for the most specific interpreter first', () => {
    expect(interpreterCandidates('>=3.10.0')).toEqual(['python3.10', 'python3', 'python'])
  })
})

describe('VenvSandbox', () => {
  let dir: string

  beforeEach(async () => {
    dir = await makeTmpDir()
  })

  afterEach(async () => {
    await fs.remove(dir)
  })

  // Answers `--version` per interpreter and lays out a venv for `-m venv`.
  function fakePythons(versions: Record<string, string>, venv: (call: RecordedCall) => Promise<{ exitCode?: number; output?: string }> = async (call) => {
    const root = call.args[2]
    await fs.ensureDir(path.join(root, 'bin'))
    await fs.writeFile(path.join(root, 'bin', 'python'), '')
    return {}
  }) {
    return new FakeRunner(async (call) => {
      if (call.args[0] === '--version') {
        const v = versions[call.command]
        return v ? { output: `Python ${v}` } : { exitCode: 127 }
      }
      return await venv(call)
    })
  }

  it('creates a venv with the first interpreter that satisfies the constraint', async () => {
    const runner = fakePythons({ python3: '3.9.18', python: '3.12.1' })
    const sandbox = new VenvSandbox(runner, { platform: 'linux' })
    const root = path.join(dir, '.venv')

    const handle = await sandbox.create(root, '3.10+')
    expect(handle).toEqual({ root, runtimeVersion: '3.12.1', baseInterpreter: 'python' })
    expect(sandbox.resolveRuntimeExecutable(handle)).toBe(path.join(root, 'bin', 'python'))
    expect(runner.calls.map(c => c.command)).toEqual(['python3.10', 'python3', 'python', 'python'])
    expect(runner.calls[3].args).toEqual(['-m', 'venv', root])
  })

  it('fails with reason "version" when nothing matches and creates nothing', async () => {
    const sandbox = new VenvSandbox(fakePythons({ python3: '3.8.10' }))
    const root = path.join(dir, '.venv')

    const err = await sandbox.create(root, '3.11').catch((e: unknown) => e)
    expect(err).toBeInstanceOf(SandboxCreationError)
    if (err instanceof SandboxCreationError) {
      expect(err.reason).toBe('version')
      expect(err.message).toBe('No interpreter satisfies 3.11 (found: python3 (3.8.10))')
    }
    expect(await fs.pathExists(root)).toBe(false)
  })

  it('classifies a permission failure and removes the partial directory', async () => {
    const runner = fakePythons({ python3: '3.11.2' }, async (call) => {
      await fs.ensureDir(call.args[2])
      return { exitCode: 1, output: 'Error: [Errno 13] Permission denied' }
    })
    const root = path.join(dir, '.venv')

    const err = await new VenvSandbox(runner).create(root, '3.11').catch((e: unknown) => e)
    expect(err).toBeInstanceOf(SandboxCreationError)
    if (err instanceof SandboxCreationError) expect(err.reason).toBe('permission')
    expect(await fs.pathExists(root)).toBe(false)
  })

  it('refuses to reuse an existing directory', async () => {
    const root = path.join(dir, '.venv')
    await fs.ensureDir(root)
    await fs.writeFile(path.join(root, 'keep.txt'), 'user data')

    await expect(new VenvSandbox(fakePythons({ python3: '3.11.2' })).create(root, '3.11')).rejects.toBeInstanceOf(SandboxCreationError)
    expect(await fs.readFile(path.join(root, 'keep.txt'), 'utf8')).toBe('user data')
  })

  it('resolves the Windows layout', () => {
    const sandbox = new VenvSandbox(new FakeRunner(), { platform: 'win32' })
    expect(sandbox.resolveRuntimeExecutable({ root: 'C:/p/.venv', runtimeVersion: '3.11.0', baseInterpreter: 'python' }))
      .toBe(path.join('C:/p/.venv', 'Scripts', 'python.exe'))
  })
})
