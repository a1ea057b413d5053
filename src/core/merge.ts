export type MergeScalar = string | number | boolean | null
export type MergeObject = { [key: string]: MergeDocument }
export type MergeArray = MergeDocument[]
export type MergeDocument = MergeScalar | MergeArray | MergeObject

export type NodeType = 'object' | 'array' | 'scalar'

export function nodeType(node: MergeDocument): NodeType {
  if (Array.isArray(node)) return 'array'
  if (node !== null && typeof node === 'object') return 'object'
  return 'scalar'
}

export function isMergeObject(node: MergeDocument | undefined): node is MergeObject {
  return node !== undefined && nodeType(node) === 'object'
}

function isScalar(node: MergeDocument): node is MergeScalar {
  return nodeType(node) === 'scalar'
}

/**
 * Structural copy, so merged output never aliases input nodes.
 */
export function cloneDocument(node: MergeDocument): MergeDocument {
  if (Array.isArray(node)) return node.map(item => cloneDocument(item))
  if (isMergeObject(node)) {
    const out: MergeObject = {}
    for (const [k, v] of Object.entries(node)) setKey(out, k, cloneDocument(v))
    return out
  }
  return node
}

// A plain assignment to "__proto__" would rewrite the prototype instead of adding a key.
function setKey(obj: MergeObject, key: string, value: MergeDocument): void {
  if (key === '__proto__') {
    Object.defineProperty(obj, key, { value, enumerable: true, writable: true, configurable: true })
  } else {
    obj[key] = value
  }
}

function hasKey(obj: MergeObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key)
}

function mergeArrays(base: MergeArray, overlay: MergeArray): MergeArray {
  const out: MergeArray = []
  const seen = new Set<string>()
  for (const item of [...base, ...overlay]) {
    if (isScalar(item)) {
      // typeof keeps 1 and "1" apart
      const key = `${typeof item}:${String(item)}`
      if (seen.has(key)) continue
      seen.add(key)
      out.push(item)
    } else {
      out.push(cloneDocument(item))
    }
  }
  return out
}

/**
 * Deep-merge `overlay` on top of `base`.
 *
 * - object + object: per-key merge, base keys first, new keys appended
 * - array + array: concatenation, duplicate scalars dropped (first occurrence wins);
 *   object and array elements are never deduplicated
 * - anything else: overlay replaces base
 *
 * Neither input is mutated.
 */
export function mergeDocuments(base: MergeDocument | undefined, overlay: MergeDocument | undefined): MergeDocument | undefined {
  if (overlay === undefined) return base === undefined ? undefined : cloneDocument(base)
  if (base === undefined) return cloneDocument(overlay)

  if (isMergeObject(base) && isMergeObject(overlay)) {
    const out: MergeObject = {}
    for (const [k, v] of Object.entries(base)) setKey(out, k, cloneDocument(v))
    for (const [k, v] of Object.entries(overlay)) {
      const merged = mergeDocuments(hasKey(base, k) ? base[k] : undefined, v)
      if (merged !== undefined) setKey(out, k, merged)
    }
    return out
  }

  if (Array.isArray(base) && Array.isArray(overlay)) {
    return mergeArrays(base, overlay)
  }

  return cloneDocument(overlay)
}

/**
 * Object-level entry point used for settings files.
 */
export function mergeObjects(base: MergeObject, overlay: MergeObject | undefined): MergeObject {
  const merged = mergeDocuments(base, overlay)
  return isMergeObject(merged) ? merged : {}
}

export interface Override {
  path: string
  before: MergeDocument
  after: MergeDocument
}

/**
 * Paths where the overlay replaces an existing, different value.
 * Array paths are not reported: arrays are unioned, not replaced.
 */
export function detectOverrides(base: MergeObject, overlay: MergeObject, prefix = ''): Override[] {
  const out: Override[] = []
  for (const [key, after] of Object.entries(overlay)) {
    if (!hasKey(base, key)) continue
    const before = base[key]
    const path = prefix ? `${prefix}.${key}` : key
    if (isMergeObject(before) && isMergeObject(after)) {
      out.push(...detectOverrides(before, after, path))
      continue
    }
    if (Array.isArray(before) && Array.isArray(after)) continue
    if (!documentsEqual(before, after)) out.push({ path, before, after })
  }
  return out
}

/**
 * Merge two arrays of objects keyed on `key`. An overlay entry replaces the base
 * entry with the same key in place; entries without the key are appended.
 */
export function mergeByKey(base: MergeArray, overlay: MergeArray, key: string): MergeArray {
  const out = base.map(item => cloneDocument(item))
  const index = new Map<string, number>()
  out.forEach((item, i) => {
    if (isMergeObject(item) && typeof item[key] === 'string') index.set(String(item[key]), i)
  })
  for (const item of overlay) {
    const id = isMergeObject(item) && typeof item[key] === 'string' ? String(item[key]) : undefined
    const at = id === undefined ? undefined : index.get(id)
    if (at !== undefined) {
      out[at] = cloneDocument(item)
    } else {
      if (id !== undefined) index.set(id, out.length)
      out.push(cloneDocument(item))
    }
  }
  return out
}

/**
 * Structural equality; object key order is ignored.
 */
export function documentsEqual(a: MergeDocument, b: MergeDocument): boolean {
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false
    return a.every((item, i) => documentsEqual(item, b[i]))
  }
  if (isMergeObject(a) || isMergeObject(b)) {
    if (!isMergeObject(a) || !isMergeObject(b)) return false
    const ka = Object.keys(a)
    if (ka.length !== Object.keys(b).length) return false
    return ka.every(k => hasKey(b, k) && documentsEqual(a[k], b[k]))
  }
  return a === b
}

/**
 * Narrow an arbitrary parsed value (JSON, JSONC, YAML) to a MergeDocument.
 * Returns undefined for values that have no document representation.
 */
export function toMergeDocument(value: unknown): MergeDocument | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined
  if (Array.isArray(value)) {
    const out: MergeArray = []
    for (const item of value) {
      const doc = toMergeDocument(item)
      if (doc === undefined) return undefined
      out.push(doc)
    }
    return out
  }
  if (typeof value === 'object') {
    const out: MergeObject = {}
    for (const [k, v] of Object.entries(value)) {
      const doc = toMergeDocument(v)
      if (doc === undefined) return undefined
      setKey(out, k, doc)
    }
    return out
  }
  return undefined
}
