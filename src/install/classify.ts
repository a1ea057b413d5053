import type { InstallFailure } from '../types.js'

const TRANSIENT_SIGNATURES: RegExp[] = [
  /connection (was )?(reset|refused|aborted|broken)/i,
  /\bECONNRESET\b|\bECONNREFUSED\b|\bETIMEDOUT\b|\bEAI_AGAIN\b/,
  /timed out/i,
  /temporary failure in name resolution/i,
  /network is unreachable/i,
  /max retries exceeded/i,
  /remote end closed connection/i,
  /\b50[234]\b.*(bad gateway|service unavailable|gateway time-?out)/i,
]

export function isTransientOutput(output: string): boolean {
  return TRANSIENT_SIGNATURES.some(re => re.test(output))
}

/**
 * Classify a non-zero exit. Network signatures win over "not found" ones:
 * pip reports an unreachable index as "No matching distribution found" after
 * its own connection retries.
 */
export function classifyFailure(input: { exitCode: number; output: string; timedOut: boolean; timeoutMs?: number }): InstallFailure {
  if (input.timedOut) {
    return {
      kind: 'transient',
      message: `Attempt exceeded ${input.timeoutMs ?? '?'}ms timeout`,
      output: input.output,
      exitCode: input.exitCode,
      timedOut: true,
    }
  }
  const transient = isTransientOutput(input.output)
  return {
    kind: transient ? 'transient' : 'terminal',
    message: `${transient ? 'Network error' : 'Installation failed'} (exit code ${input.exitCode})`,
    output: input.output,
    exitCode: input.exitCode,
    timedOut: false,
  }
}

/**
 * "uvicorn[standard]>=0.24.0" -> "uvicorn"
 */
export function packageName(spec: string): string {
  return spec.replace(/\[.*?\]/g, '').split(/[<>=!~;@\s]/)[0].trim()
}

/**
 * Installed packages as "name==version", read from backend output.
 */
export function parseInstalledPackages(output: string): string[] {
  const out: string[] = []
  const add = (name: string, version: string) => {
    const entry = `${name}==${version}`
    if (!out.includes(entry)) out.push(entry)
  }

  for (const line of output.split(/\r?\n/)) {
    const pip = /Successfully installed (.+)/.exec(line)
    if (pip) {
      for (const item of pip[1].trim().split(/\s+/)) {
        const dash = item.lastIndexOf('-')
        if (dash > 0) add(item.slice(0, dash), item.slice(dash + 1))
      }
      continue
    }
    const uv = /^\s*\+\s+(\S+?)==(\S+)/.exec(line)
    if (uv) {
      add(uv[1], uv[2])
      continue
    }
    const poetry = /Installing\s+(\S+)\s+\(([^)\s]+)\)/.exec(line)
    if (poetry) add(poetry[1], poetry[2])
  }
  return out
}
