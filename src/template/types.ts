import { TemplateError } from '../core/errors.js'
import { isMergeObject, MergeArray, MergeObject, toMergeDocument } from '../core/merge.js'
import { isBackendName } from '../install/strategies/index.js'
import { toSemverRange } from '../sandbox/version.js'
import type { BackendName } from '../types.js'

export type DependencyKind = 'core' | 'optional'

export interface DependencyGroup {
  name: string
  kind: DependencyKind
  packages: string[]
}

export interface EditorTemplate {
  /**
   * Overlay merged on top of the project's existing settings.
   */
  settings: MergeObject
  extensions: string[]
  /**
   * Debug launch configurations, merged by `name`.
   */
  launch: MergeArray
}

export interface SetupTemplate {
  name: string
  slug: string
  description?: string
  /**
   * Interpreter version constraint: "3.11", "3.10+", "3.10-3.12" or a semver range.
   */
  pythonVersion: string
  backends?: BackendName[]
  dependencies: DependencyGroup[]
  editor: EditorTemplate
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === 'object' && !Array.isArray(v)
}

function isDependencyKind(v: unknown): v is DependencyKind {
  return v === 'core' || v === 'optional'
}

function requireString(obj: Record<string, unknown>, key: string, source?: string): string {
  const v = obj[key]
  if (typeof v !== 'string' || !v.trim()) {
    throw new TemplateError(`"${key}" must be a non-empty string`, source)
  }
  return v.trim()
}

function stringList(v: unknown, what: string, source?: string): string[] {
  if (v === undefined || v === null) return []
  if (!Array.isArray(v) || !v.every(item => typeof item === 'string' && item.trim())) {
    throw new TemplateError(`${what} must be a list of non-empty strings`, source)
  }
  return v.map(item => String(item).trim())
}

function normalizeGroups(raw: unknown, source?: string): DependencyGroup[] {
  if (!isRecord(raw)) throw new TemplateError('"dependencies" must be a mapping of group name to packages', source)

  const groups: DependencyGroup[] = []
  for (const [name, value] of Object.entries(raw)) {
    const defaultKind: DependencyKind = name === 'core' ? 'core' : 'optional'
    if (Array.isArray(value)) {
      groups.push({ name, kind: defaultKind, packages: stringList(value, `dependencies.${name}`, source) })
      continue
    }
    if (!isRecord(value)) throw new TemplateError(`dependencies.${name} must be a list or a mapping`, source)
    const kind = value.kind ?? defaultKind
    if (!isDependencyKind(kind)) {
      throw new TemplateError(`dependencies.${name}.kind must be "core" or "optional"`, source)
    }
    groups.push({ name, kind, packages: stringList(value.packages, `dependencies.${name}.packages`, source) })
  }

  if (!groups.some(g => g.kind === 'core' && g.packages.length > 0)) {
    throw new TemplateError('at least one core dependency group with packages is required', source)
  }
  return groups
}

function normalizeEditor(raw: unknown, source?: string): EditorTemplate {
  if (raw === undefined || raw === null) return { settings: {}, extensions: [], launch: [] }
  if (!isRecord(raw)) throw new TemplateError('"editor" must be a mapping', source)
  const obj = raw

  const settings = obj.settings === undefined ? {} : toMergeDocument(obj.settings)
  if (!isMergeObject(settings)) throw new TemplateError('editor.settings must be a mapping', source)

  const extensions = stringList(obj.extensions, 'editor.extensions', source)
  for (const ext of extensions) {
    if (!/^[\w-]+\.[\w.-]+$/.test(ext)) {
      throw new TemplateError(`invalid extension id "${ext}" (expected publisher.name)`, source)
    }
  }

  const launch = obj.launch === undefined ? [] : toMergeDocument(obj.launch)
  if (!Array.isArray(launch) || !launch.every(isMergeObject)) {
    throw new TemplateError('editor.launch must be a list of mappings', source)
  }
  return { settings, extensions, launch }
}

/**
 * Validate a parsed template document. Throws TemplateError on the first problem.
 */
export function normalizeTemplate(raw: unknown, source?: string): SetupTemplate {
  if (!isRecord(raw)) throw new TemplateError('template must be a mapping', source)
  const obj = raw

  const name = requireString(obj, 'name', source)
  const slug = obj.slug === undefined ? name.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-|-$/g, '') : requireString(obj, 'slug', source)
  if (!/^[a-z0-9-]+$/.test(slug)) throw new TemplateError(`invalid slug "${slug}"`, source)

  const pythonVersion = requireString(obj, 'python', source)
  if (!toSemverRange(pythonVersion)) {
    throw new TemplateError(`unrecognised python version constraint "${pythonVersion}"`, source)
  }

  let backends: BackendName[] | undefined
  if (obj.backends !== undefined) {
    const list = stringList(obj.backends, 'backends', source)
    const bad = list.find(b => !isBackendName(b))
    if (bad !== undefined) throw new TemplateError(`unknown backend "${bad}" (expected uv, pip or poetry)`, source)
    backends = list.filter(isBackendName)
  }

  return {
    name,
    slug,
    description: typeof obj.description === 'string' ? obj.description : undefined,
    pythonVersion,
    backends,
    dependencies: normalizeGroups(obj.dependencies, source),
    editor: normalizeEditor(obj.editor, source),
  }
}

/**
 * Packages for a run: every core group plus the requested optional groups.
 */
export function selectPackages(template: SetupTemplate, optionalGroups: string[] = []): string[] {
  const unknown = optionalGroups.filter(g => !template.dependencies.some(d => d.name === g))
  if (unknown.length) {
    throw new TemplateError(`unknown dependency group(s): ${unknown.join(', ')}`, template.slug)
  }
  const out: string[] = []
  for (const group of template.dependencies) {
    if (group.kind !== 'core' && !optionalGroups.includes(group.name)) continue
    for (const pkg of group.packages) {
      if (!out.includes(pkg)) out.push(pkg)
    }
  }
  return out
}
