import type { Result } from 'shared'
import { TemplateClient } from './client.js'
import { buildTargetRegistry, loadConfig } from './config.js'
import { CrdHelper } from './crd/crd-helper.js'
import { DefinitionScheme } from './crd/scheme.js'
import type { TargetRegistry } from './targets.js'

export interface Toolchain {
  scheme: DefinitionScheme
  targets: TargetRegistry
  client: TemplateClient
}

/**
 * Build the shared scheme, target registry and client from the project config.
 */
export async function createToolchain(projectRoot: string, configPath?: string): Promise<Result<Toolchain, string>> {
  const loaded = await loadConfig(projectRoot, configPath)
  if (!loaded.ok) return loaded

  const scheme = new DefinitionScheme()
  const targets = await buildTargetRegistry(loaded.value, scheme)
  if (!targets.ok) return targets

  const client = new TemplateClient(targets.value, new CrdHelper({ scheme }))
  return { ok: true, value: { scheme, targets: targets.value, client } }
}
