#!/usr/bin/env node
import path from 'path'
import { fileURLToPath } from 'url'

import { formatSummary, setup } from './api/setup.js'
import {
  clearDefaultTemplate,
  getDefaultTemplate,
  getHistoryPath,
  getPreferredBackend,
  setDefaultTemplate,
  setPreferredBackend,
} from './cli/config.js'
import { DevstrapError } from './core/errors.js'
import { isBackendName } from './install/strategies/index.js'
import { JsonStateStore } from './state/store.js'
import { loadBundledTemplates } from './template/load.js'
import type { BackendName, Logger } from './types.js'

type Argv = string[]

class CliExit extends Error {
  exitCode: number
  constructor(message: string, exitCode = 1) {
    super(message)
    this.exitCode = exitCode
  }
}

function die(msg: string, code = 1): never {
  throw new CliExit(msg, code)
}

function popFlagValue(args: Argv, names: string[]): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const a = args[i]
    if (!names.includes(a)) continue
    const v = args[i + 1]
    if (!v || v.startsWith('-')) die(`${a} requires a value`)
    args.splice(i, 2)
    return v
  }
  return undefined
}

function hasFlag(args: Argv, names: string[]): boolean {
  const idx = args.findIndex(a => names.includes(a))
  if (idx >= 0) {
    args.splice(idx, 1)
    return true
  }
  return false
}

function popIntFlag(args: Argv, names: string[], min: number): number | undefined {
  const v = popFlagValue(args, names)
  if (v === undefined) return undefined
  const n = Number(v)
  if (!Number.isInteger(n) || n < min) die(`Invalid ${names[names.length - 1]}: ${v} (expected an integer >= ${min})`)
  return n
}

function parseBackend(v: string | undefined): BackendName | undefined {
  if (v === undefined) return undefined
  if (!isBackendName(v)) die(`Invalid backend: ${v} (expected uv|pip|poetry)`)
  return v
}

function stderrLogger(verbose: boolean): Logger {
  const write = (msg: string) => process.stderr.write(msg + '\n')
  return {
    info: write,
    warn: write,
    error: write,
    debug: verbose ? write : undefined,
  }
}

function printHelp(): void {
  const msg = `
devstrap

Usage:
  devstrap setup <path> [-t|--template <file|name>] [-b|--backend uv|pip|poetry]
                        [-g|--group <name>]... [--timeout <ms>] [--retries <n>] [--verbose]

  devstrap list

  devstrap template set <file>
  devstrap template show
  devstrap template clear

  devstrap backend set <uv|pip|poetry>
  devstrap backend show

  devstrap history [--limit <n>]
`
  process.stdout.write(msg.trimStart())
  process.stdout.write('\n')
}

async function runSetup(args: Argv): Promise<number> {
  const template = popFlagValue(args, ['-t', '--template'])
  const backend = parseBackend(popFlagValue(args, ['-b', '--backend']))
  const timeoutMs = popIntFlag(args, ['--timeout'], 1)
  const maxAttempts = popIntFlag(args, ['--retries'], 1)
  const verbose = hasFlag(args, ['-v', '--verbose'])
  const groups: string[] = []
  for (let g = popFlagValue(args, ['-g', '--group']); g !== undefined; g = popFlagValue(args, ['-g', '--group'])) {
    groups.push(g)
  }
  const target = args.shift()
  if (!target) die('setup requires <path>')
  if (args.length) die(`Unknown arguments: ${args.join(' ')}`)

  const controller = new AbortController()
  const onSigint = () => {
    process.stderr.write('Cancelling after the current phase...\n')
    controller.abort()
  }
  process.once('SIGINT', onSigint)

  try {
    const outcome = await setup(target, {
      template,
      backend,
      groups,
      timeoutMs,
      maxAttempts,
      signal: controller.signal,
      logger: stderrLogger(verbose),
    })
    process.stdout.write(JSON.stringify(outcome.result, null, 2) + '\n')
    process.stderr.write(formatSummary(outcome) + '\n')
    return outcome.result.ok ? 0 : 1
  } finally {
    process.removeListener('SIGINT', onSigint)
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const args = [...argv]
    if (args.length === 0 || hasFlag(args, ['-h', '--help'])) {
      printHelp()
      return 0
    }

    const cmd = args.shift()
    if (!cmd) {
      printHelp()
      return 1
    }

    if (cmd === 'template') {
      const sub = args.shift()
      if (sub === 'set') {
        const p = args.shift()
        if (!p) die('template set requires a path')
        const abs = await setDefaultTemplate(p)
        process.stdout.write(abs + '\n')
        return 0
      }
      if (sub === 'show') {
        const p = await getDefaultTemplate()
        if (!p) die('No default template set. Run `devstrap template set <file>`.', 2)
        process.stdout.write(p + '\n')
        return 0
      }
      if (sub === 'clear') {
        await clearDefaultTemplate()
        return 0
      }
      die('Unknown template subcommand. Expected: set|show|clear')
    }

    if (cmd === 'backend') {
      const sub = args.shift()
      if (sub === 'set') {
        const name = parseBackend(args.shift())
        if (!name) die('backend set requires a name (uv|pip|poetry)')
        await setPreferredBackend(name)
        process.stdout.write(name + '\n')
        return 0
      }
      if (sub === 'show') {
        const name = await getPreferredBackend()
        if (!name) die('No preferred backend set. Run `devstrap backend set <name>`.', 2)
        process.stdout.write(name + '\n')
        return 0
      }
      die('Unknown backend subcommand. Expected: set|show')
    }

    if (cmd === 'list') {
      if (args.length) die(`Unknown arguments: ${args.join(' ')}`)
      for (const t of await loadBundledTemplates()) {
        const groups = t.dependencies.filter(g => g.kind === 'optional').map(g => g.name)
        const line = [
          `${t.slug}\t${t.name} (python ${t.pythonVersion})`,
          t.description ? ` - ${t.description}` : '',
          groups.length ? ` [groups: ${groups.join(', ')}]` : '',
        ].join('')
        process.stdout.write(line + '\n')
      }
      return 0
    }

    if (cmd === 'history') {
      const limit = popIntFlag(args, ['--limit'], 1)
      if (args.length) die(`Unknown arguments: ${args.join(' ')}`)
      const entries = await new JsonStateStore({ historyPath: getHistoryPath(), logger: stderrLogger(false) }).readHistory()
      const shown = limit === undefined ? entries : entries.slice(-limit)
      for (const e of shown) process.stdout.write(JSON.stringify(e) + '\n')
      return 0
    }

    if (cmd === 'setup') {
      return await runSetup(args)
    }

    die(`Unknown command: ${cmd}`)
  } catch (e) {
    if (e instanceof CliExit) {
      const msg = e.message || 'Command failed'
      process.stderr.write(msg.endsWith('\n') ? msg : msg + '\n')
      return e.exitCode
    }
    if (e instanceof DevstrapError) {
      process.stderr.write(`${e.name}: ${e.message}\n`)
      return 1
    }
    throw e
  }
}

// Only run when executed as a script, not when imported (e.g., tests).
const isEntry =
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))

if (isEntry) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      const msg = err instanceof Error && err.stack ? err.stack : String(err)
      process.stderr.write(msg.endsWith('\n') ? msg : msg + '\n')
      process.exit(1)
    },
  )
}
