import semver from 'semver'

/**
 * Translate a template's interpreter constraint into a semver range.
 *
 *   "3.11"       -> ">=3.11.0"        (a bare version is a minimum)
 *   "3.10+"      -> ">=3.10.0"
 *   "3.10-3.12"  -> ">=3.10.0 <3.13.0"
 *
 * Anything else must already be a valid semver range ("^3.11", ">=3.9 <3.13").
 * Returns undefined for constraints that cannot be understood.
 */
export function toSemverRange(constraint: string): string | undefined {
  const c = constraint.trim()
  const plus = /^(\d+)\.(\d+)\+$/.exec(c)
  if (plus) return `>=${plus[1]}.${plus[2]}.0`

  const bare = /^(\d+)\.(\d+)$/.exec(c)
  if (bare) return `>=${bare[1]}.${bare[2]}.0`

  const span = /^(\d+)\.(\d+)\s*-\s*(\d+)\.(\d+)$/.exec(c)
  if (span) return `>=${span[1]}.${span[2]}.0 <${span[3]}.${Number(span[4]) + 1}.0`

  return semver.validRange(c) ?? undefined
}

/**
 * "Python 3.11.4" -> "3.11.4"
 */
export function parseInterpreterVersion(output: string): string | undefined {
  const m = /Python\s+(\d+\.\d+(?:\.\d+)?)/.exec(output)
  if (!m) return undefined
  return semver.coerce(m[1])?.version
}

/**
 * Interpreter executables to look for a range, most specific first.
 */
export function interpreterCandidates(range: string): string[] {
  const out: string[] = []
  const min = semver.minVersion(range)
  if (min) {
    out.push(`python${min.major}.${min.minor}`, `python${min.major}`)
  }
  for (const generic of ['python3', 'python']) {
    if (!out.includes(generic)) out.push(generic)
  }
  return out
}

/**
 * A template constraint as a `requires-python` specifier.
 *
 *   "3.10+"      -> ">=3.10"
 *   "3.10-3.12"  -> ">=3.10,<3.13"
 *   "^3.11"      -> ">=3.11"   (semver ranges keep only their minimum)
 */
export function toRequiresPython(constraint: string): string | undefined {
  const c = constraint.trim()
  const span = /^(\d+)\.(\d+)\s*-\s*(\d+)\.(\d+)$/.exec(c)
  if (span) return `>=${span[1]}.${span[2]},<${span[3]}.${Number(span[4]) + 1}`

  const range = toSemverRange(c)
  const min = range ? semver.minVersion(range) : null
  if (!min) return undefined
  return `>=${min.major}.${min.minor}`
}
