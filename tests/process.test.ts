import { beforeEach, describe, expect, it, vi } from 'vitest'

vi.mock('execa', () => ({ execa: vi.fn() }))

import { execa } from 'execa'

import { CommandNotAllowedError } from '../src/core/errors.js'
import { ExecaProcessRunner, isAllowedCommand, SPAWN_FAILED_EXIT_CODE } from '../src/core/process.js'

describe('isAllowedCommand', () => {
  it('allows the backend executables by base name', () => {
    for (const cmd of ['uv', 'pip', 'pip3', 'poetry', 'python', 'python3', 'python3.12', '/p/.venv/bin/python', 'C:\\p\\.venv\\Scripts\\python.exe']) {
      expect(isAllowedCommand(cmd)).toBe(true)
    }
  })

  it('rejects anything else', () => {
    for (const cmd of ['sh', 'bash', 'rm', 'npm', 'python-evil', 'uvx']) {
      expect(isAllowedCommand(cmd)).toBe(false)
    }
  })
})

describe('ExecaProcessRunner', () => {
  beforeEach(() => {
    vi.resetAllMocks()
  })

  it('runs without a shell and returns combined output', async () => {
    vi.mocked(execa).mockResolvedValue({ exitCode: 0, all: 'ok\nwarn', timedOut: false } as never)
    const runner = new ExecaProcessRunner()

    const res = await runner.run('uv', ['pip', 'install', 'click'], { cwd: '/work', timeoutMs: 1000 })
    expect(res.exitCode).toBe(0)
    expect(res.output).toBe('ok\nwarn')
    expect(res.timedOut).toBe(false)
    expect(vi.mocked(execa).mock.calls[0]).toEqual([
      'uv',
      ['pip', 'install', 'click'],
      { cwd: '/work', timeout: 1000, env: undefined, all: true, reject: false, shell: false, stdin: 'ignore' },
    ])
  })

  it('reports a spawn failure as exit code 127', async () => {
    vi.mocked(execa).mockResolvedValue({ exitCode: undefined, all: undefined, timedOut: false, message: 'spawn poetry ENOENT' } as never)
    const res = await new ExecaProcessRunner().run('poetry', ['--version'])
    expect(res.exitCode).toBe(SPAWN_FAILED_EXIT_CODE)
    expect(res.output).toBe('spawn poetry ENOENT')
  })

  it('refuses commands outside the allow-list before spawning', async () => {
    await expect(new ExecaProcessRunner().run('bash', ['-c', 'echo hi'])).rejects.toBeInstanceOf(CommandNotAllowedError)
    expect(execa).not.toHaveBeenCalled()
  })
})
