import fs from 'fs-extra'
import path from 'path'

import type { FileSnapshot } from '../types.js'

function rand() {
  return Math.random().toString(16).slice(2)
}

export function tmpPathFor(targetAbs: string) {
  return `${targetAbs}.tmp.${rand()}`
}

export async function ensureParentDir(p: string) {
  await fs.ensureDir(path.dirname(p))
}

export async function removePath(p: string) {
  await fs.remove(p)
}

/**
 * Write through a sibling temp file and rename over the target, so a crash
 * mid-write never leaves a truncated file behind.
 */
export async function writeFileAtomic(p: string, content: string | Buffer) {
  await ensureParentDir(p)
  const tmp = tmpPathFor(p)
  try {
    await fs.writeFile(tmp, content)
    await fs.rename(tmp, p)
  } catch (e) {
    await fs.remove(tmp)
    throw e
  }
}

/**
 * Raw bytes of a file, or undefined when it does not exist.
 */
export async function readFileIfExists(p: string): Promise<Buffer | undefined> {
  if (!await fs.pathExists(p)) return undefined
  return await fs.readFile(p)
}

/**
 * Put a file back to a captured state: rewrite the bytes, or delete the file
 * when it did not exist before.
 */
export async function restoreFile(p: string, previous: Buffer | undefined) {
  if (previous === undefined) {
    await fs.remove(p)
    return
  }
  await writeFileAtomic(p, previous)
}

export async function captureFile(p: string): Promise<FileSnapshot> {
  return { path: p, previous: await readFileIfExists(p) }
}

export function sameBytes(a: Buffer | undefined, b: Buffer | undefined): boolean {
  if (a === undefined || b === undefined) return a === b
  return a.equals(b)
}

/**
 * Restore snapshots newest first.
 */
export async function restoreSnapshots(snapshots: FileSnapshot[]) {
  for (const snap of [...snapshots].reverse()) {
    await restoreFile(snap.path, snap.previous)
  }
}

/**
 * Remove a directory only when nothing is left in it.
 */
export async function removeDirIfEmpty(dir: string) {
  if (!await fs.pathExists(dir)) return
  const entries = await fs.readdir(dir)
  if (entries.length === 0) await fs.rmdir(dir)
}
