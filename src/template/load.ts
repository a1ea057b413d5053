import fs from 'fs-extra'
import * as yaml from 'js-yaml'
import path from 'path'
import { fileURLToPath } from 'url'

import { TemplateError } from '../core/errors.js'
import { errorMessage } from '../types.js'
import { normalizeTemplate, SetupTemplate } from './types.js'

/**
 * Directory of the templates shipped with the package (`<root>/templates`).
 */
export function bundledTemplatesDir(): string {
  const here = path.dirname(fileURLToPath(import.meta.url))
  return path.resolve(here, '..', '..', 'templates')
}

export function parseTemplate(text: string, source?: string): SetupTemplate {
  let raw: unknown
  try {
    raw = yaml.load(text)
  } catch (e) {
    throw new TemplateError(`invalid YAML: ${errorMessage(e)}`, source, { cause: e })
  }
  return normalizeTemplate(raw, source)
}

/**
 * Resolve a template argument: an existing file path, or the name of a bundled
 * template ("fastapi" -> templates/fastapi.yaml).
 */
export async function resolveTemplatePath(nameOrPath: string, cwd = process.cwd()): Promise<string> {
  const direct = path.resolve(cwd, nameOrPath)
  if (await fs.pathExists(direct)) return direct

  if (/^[a-z0-9-]+$/.test(nameOrPath)) {
    for (const ext of ['.yaml', '.yml']) {
      const bundled = path.join(bundledTemplatesDir(), `${nameOrPath}${ext}`)
      if (await fs.pathExists(bundled)) return bundled
    }
  }
  throw new TemplateError(`template not found: ${nameOrPath}`)
}

export async function loadTemplate(nameOrPath: string, cwd?: string): Promise<SetupTemplate> {
  const file = await resolveTemplatePath(nameOrPath, cwd)
  let text: string
  try {
    text = await fs.readFile(file, 'utf8')
  } catch (e) {
    throw new TemplateError(`cannot read template: ${errorMessage(e)}`, file, { cause: e })
  }
  return parseTemplate(text, file)
}

async function bundledTemplateFiles(): Promise<string[]> {
  const dir = bundledTemplatesDir()
  if (!await fs.pathExists(dir)) return []
  const entries = await fs.readdir(dir)
  return entries.filter(e => /\.ya?ml$/.test(e)).sort().map(e => path.join(dir, e))
}

export async function listBundledTemplates(): Promise<string[]> {
  return (await bundledTemplateFiles()).map(f => path.basename(f).replace(/\.ya?ml$/, ''))
}

/**
 * Every bundled template, parsed, in file name order.
 */
export async function loadBundledTemplates(): Promise<SetupTemplate[]> {
  const out: SetupTemplate[] = []
  for (const file of await bundledTemplateFiles()) {
    out.push(parseTemplate(await fs.readFile(file, 'utf8'), file))
  }
  return out
}
