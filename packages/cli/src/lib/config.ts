import { readFile, access } from 'node:fs/promises'
import { dirname, join, resolve } from 'node:path'
import { parse as parseYaml } from 'yaml'
import { ctplConfigSchema } from 'shared'
import type { Result } from 'shared'
import { createAjv, describeValidationErrors, toValidationErrors } from './ajv.js'
import type { DefinitionScheme } from './crd/scheme.js'
import { KUBERNETES_TARGET, TargetRegistry, loadKubernetesTarget, loadMatchSchemaFile } from './targets.js'
import type { MatchSchemaProvider } from './targets.js'

export interface CtplConfig {
  targets?: Record<string, string>  // target name -> match schema file, or 'builtin'
}

export interface LoadedConfig {
  config: CtplConfig
  baseDir: string
}

export const CONFIG_FILE = 'ctpl.yaml'
export const BUILTIN_SOURCE = 'builtin'

const validateConfig = createAjv().compile<CtplConfig>(ctplConfigSchema)

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

/**
 * Load ctpl.yaml. An explicit path (option or CTPL_CONFIG) must exist; the
 * default file in the project root is optional.
 */
export async function loadConfig(projectRoot: string, configPath?: string): Promise<Result<LoadedConfig, string>> {
  const explicit = configPath ?? process.env.CTPL_CONFIG
  const path = explicit ? resolve(projectRoot, explicit) : join(projectRoot, CONFIG_FILE)

  if (!(await fileExists(path))) {
    if (explicit) return { ok: false, error: `Config file not found: ${path}` }
    return { ok: true, value: { config: {}, baseDir: projectRoot } }
  }

  let parsed: unknown
  try {
    const content = await readFile(path, 'utf-8')
    parsed = parseYaml(content)
  } catch (error) {
    return { ok: false, error: `Failed to parse ${path}: ${error}` }
  }

  if (parsed === null || parsed === undefined) {
    return { ok: true, value: { config: {}, baseDir: dirname(path) } }
  }
  if (!validateConfig(parsed)) {
    return { ok: false, error: `Invalid ${path}: ${describeValidationErrors(toValidationErrors(validateConfig.errors))}` }
  }
  return { ok: true, value: { config: parsed, baseDir: dirname(path) } }
}

/**
 * Register the built-in Kubernetes target plus every target the config names.
 * Relative schema paths resolve against the config file's directory.
 */
export async function buildTargetRegistry(loaded: LoadedConfig, scheme: DefinitionScheme): Promise<Result<TargetRegistry, string>> {
  const registry = new TargetRegistry()
  const entries = { [KUBERNETES_TARGET]: BUILTIN_SOURCE, ...loaded.config.targets }

  for (const [name, source] of Object.entries(entries)) {
    let provider: Result<MatchSchemaProvider, string>
    if (source === BUILTIN_SOURCE) {
      if (name !== KUBERNETES_TARGET) {
        return { ok: false, error: `No built-in match schema for target "${name}"` }
      }
      provider = await loadKubernetesTarget(scheme)
    } else {
      provider = await loadMatchSchemaFile(name, resolve(loaded.baseDir, source), scheme)
    }
    if (!provider.ok) return provider

    const registered = registry.register(provider.value)
    if (!registered.ok) return registered
  }

  return { ok: true, value: registry }
}
