import fs from 'fs-extra'
import os from 'os'
import path from 'path'

import { isBackendName } from '../install/strategies/index.js'
import type { BackendName } from '../types.js'

export interface InstallConfig {
  maxAttempts?: number
  backoffMs?: number
  timeoutMs?: number
}

export interface DevstrapConfig {
  defaultTemplate?: string
  preferredBackend?: BackendName
  install?: InstallConfig
}

export interface ConfigEnv {
  env?: NodeJS.ProcessEnv
  /**
   * For tests or embedding, override home dir (default: os.homedir()).
   */
  homeDir?: string
}

export function getConfigDir(opts: ConfigEnv = {}): string {
  const env = opts.env ?? process.env
  if (env.DEVSTRAP_CONFIG_HOME) return path.resolve(env.DEVSTRAP_CONFIG_HOME)
  const base = env.XDG_CONFIG_HOME || path.join(opts.homeDir ?? os.homedir(), '.config')
  return path.join(base, 'devstrap')
}

export function getGlobalConfigPath(opts: ConfigEnv = {}): string {
  return path.join(getConfigDir(opts), 'config.json')
}

export function getHistoryPath(opts: ConfigEnv = {}): string {
  return path.join(getConfigDir(opts), 'history.json')
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === 'object' && !Array.isArray(v)
}

function positiveInt(v: unknown, min: number): number | undefined {
  return typeof v === 'number' && Number.isInteger(v) && v >= min ? v : undefined
}

/**
 * Keep only the fields that validate; anything else is ignored.
 */
export function normalizeConfig(json: unknown): DevstrapConfig {
  if (!isRecord(json)) return {}
  const out: DevstrapConfig = {}
  if (typeof json.defaultTemplate === 'string' && json.defaultTemplate) out.defaultTemplate = json.defaultTemplate
  if (isBackendName(json.preferredBackend)) out.preferredBackend = json.preferredBackend
  if (isRecord(json.install)) {
    const install: InstallConfig = {}
    const maxAttempts = positiveInt(json.install.maxAttempts, 1)
    const backoffMs = positiveInt(json.install.backoffMs, 0)
    const timeoutMs = positiveInt(json.install.timeoutMs, 1)
    if (maxAttempts !== undefined) install.maxAttempts = maxAttempts
    if (backoffMs !== undefined) install.backoffMs = backoffMs
    if (timeoutMs !== undefined) install.timeoutMs = timeoutMs
    if (Object.keys(install).length) out.install = install
  }
  return out
}

export async function readGlobalConfig(opts: ConfigEnv = {}): Promise<DevstrapConfig> {
  const p = getGlobalConfigPath(opts)
  if (!await fs.pathExists(p)) return {}
  const json: unknown = await fs.readJson(p)
  return normalizeConfig(json)
}

export async function writeGlobalConfig(config: DevstrapConfig, opts: ConfigEnv = {}): Promise<void> {
  const p = getGlobalConfigPath(opts)
  await fs.ensureDir(path.dirname(p))
  await fs.writeJson(p, config, { spaces: 2 })
}

async function updateGlobalConfig(patch: (cfg: DevstrapConfig) => DevstrapConfig, opts: ConfigEnv): Promise<DevstrapConfig> {
  const next = patch(await readGlobalConfig(opts))
  await writeGlobalConfig(next, opts)
  return next
}

export async function setDefaultTemplate(templatePath: string, opts: ConfigEnv = {}): Promise<string> {
  const abs = path.resolve(templatePath)
  await updateGlobalConfig(cfg => ({ ...cfg, defaultTemplate: abs }), opts)
  return abs
}

export async function getDefaultTemplate(opts: ConfigEnv = {}): Promise<string | undefined> {
  const cfg = await readGlobalConfig(opts)
  return cfg.defaultTemplate
}

export async function clearDefaultTemplate(opts: ConfigEnv = {}): Promise<void> {
  if (!await fs.pathExists(getGlobalConfigPath(opts))) return
  await updateGlobalConfig(({ defaultTemplate: _dropped, ...rest }) => rest, opts)
}

export async function setPreferredBackend(backend: BackendName, opts: ConfigEnv = {}): Promise<void> {
  await updateGlobalConfig(cfg => ({ ...cfg, preferredBackend: backend }), opts)
}

export async function getPreferredBackend(opts: ConfigEnv = {}): Promise<BackendName | undefined> {
  const cfg = await readGlobalConfig(opts)
  return cfg.preferredBackend
}
