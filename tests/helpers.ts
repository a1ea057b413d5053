import fs from 'fs-extra'
import os from 'node:os'
import path from 'node:path'

import type { ProcessOutcome, ProcessRunner, RunOptions } from '../src/core/process.js'
import type { Sandbox, SandboxHandle } from '../src/sandbox/types.js'
import type { SetupTemplate } from '../src/template/types.js'

export interface RecordedCall {
  command: string
  args: string[]
  opts?: RunOptions
}

export type RunHandler = (call: RecordedCall) => Partial<ProcessOutcome> | Promise<Partial<ProcessOutcome>>

/**
 * In-process ProcessRunner: records every call and answers from a handler.
 */
export class FakeRunner implements ProcessRunner {
  readonly calls: RecordedCall[] = []
  private readonly handler: RunHandler

  constructor(handler: RunHandler = () => ({})) {
    this.handler = handler
  }

  async run(command: string, args: string[], opts?: RunOptions): Promise<ProcessOutcome> {
    const call = { command, args, opts }
    this.calls.push(call)
    const res = await this.handler(call)
    return { exitCode: 0, output: '', timedOut: false, durationMs: 1, ...res }
  }

  /**
   * Calls that were not availability checks.
   */
  installCalls(): RecordedCall[] {
    return this.calls.filter(c => !c.args.includes('--version'))
  }
}

/**
 * Sandbox that only makes the directory layout of a venv.
 */
export class FakeSandbox implements Sandbox {
  readonly created: string[] = []
  failWith?: Error

  async create(root: string, _versionConstraint: string): Promise<SandboxHandle> {
    if (this.failWith) throw this.failWith
    await fs.ensureDir(path.join(root, 'bin'))
    await fs.writeFile(path.join(root, 'bin', 'python'), '')
    this.created.push(root)
    return { root, runtimeVersion: '3.11.4', baseInterpreter: 'python3.11' }
  }

  resolveRuntimeExecutable(handle: SandboxHandle): string {
    return path.join(handle.root, 'bin', 'python')
  }
}

export async function makeTmpDir(prefix = 'devstrap-test-'): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), prefix))
}

export function makeTemplate(overrides: Partial<SetupTemplate> = {}): SetupTemplate {
  return {
    name: 'Sample Service',
    slug: 'sample',
    pythonVersion: '3.10+',
    dependencies: [
      { name: 'core', kind: 'core', packages: ['requests>=2.31', 'click'] },
      { name: 'dev', kind: 'optional', packages: ['pytest'] },
    ],
    editor: {
      settings: { 'editor.formatOnSave': true },
      extensions: ['ms-python.python'],
      launch: [],
    },
    ...overrides,
  }
}

/**
 * Every file under `dir` with its bytes, for before/after comparisons.
 */
export async function snapshotTree(dir: string): Promise<Record<string, string>> {
  const out: Record<string, string> = {}
  if (!await fs.pathExists(dir)) return out
  const walk = async (rel: string) => {
    const abs = path.join(dir, rel)
    const stat = await fs.stat(abs)
    if (stat.isDirectory()) {
      out[`${rel}/`] = ''
      for (const entry of (await fs.readdir(abs)).sort()) await walk(rel ? path.join(rel, entry) : entry)
      return
    }
    out[rel] = (await fs.readFile(abs)).toString('base64')
  }
  for (const entry of (await fs.readdir(dir)).sort()) await walk(entry)
  return out
}
