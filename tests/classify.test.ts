import { describe, expect, it } from 'vitest'

import { classifyFailure, packageName, parseInstalledPackages } from '../src/install/classify.js'

describe('classifyFailure', () => {
  it('classifies network signatures as transient', () => {
    for (const output of [
      'Connection reset by peer',
      'ReadTimeoutError: HTTPSConnectionPool: Read timed out.',
      'Temporary failure in name resolution',
      'error: Request failed after 3 retries: ECONNREFUSED',
    ]) {
      expect(classifyFailure({ exitCode: 1, output, timedOut: false }).kind).toBe('transient')
    }
  })

  it('prefers the network signature over a resolution failure', () => {
    const output = 'Connection refused\nERROR: No matching distribution found for flask'
    expect(classifyFailure({ exitCode: 1, output, timedOut: false })).toEqual({
      kind: 'transient',
      message: 'Network error (exit code 1)',
      output,
      exitCode: 1,
      timedOut: false,
    })
  })

  it('classifies everything else as terminal', () => {
    expect(classifyFailure({ exitCode: 2, output: 'No solution found when resolving dependencies', timedOut: false }).kind).toBe('terminal')
  })

  it('reports a timeout with its limit', () => {
    expect(classifyFailure({ exitCode: 143, output: '', timedOut: true, timeoutMs: 500 }).message).toBe('Attempt exceeded 500ms timeout')
  })
})

describe('packageName', () => {
  it('strips extras, version specifiers and markers', () => {
    expect(packageName('uvicorn[standard]>=0.24.0')).toBe('uvicorn')
    expect(packageName('numpy~=1.26')).toBe('numpy')
    expect(packageName('pywin32; sys_platform == "win32"')).toBe('pywin32')
  })
})

describe('parseInstalledPackages', () => {
  it('reads pip, uv and poetry output without duplicates', () => {
    const output = [
      'Successfully installed idna-3.6 requests-2.31.0',
      ' + idna==3.6',
      '  - Installing rich (13.7.0)',
    ].join('\n')
    expect(parseInstalledPackages(output)).toEqual(['idna==3.6', 'requests==2.31.0', 'rich==13.7.0'])
  })
})
