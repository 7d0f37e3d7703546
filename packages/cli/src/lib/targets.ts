import { readFile } from 'node:fs/promises'
import { parse as parseYaml } from 'yaml'
import { copyJSONSchemaProps, pipelineError } from 'shared'
import type { ConstraintTemplate, JSONSchemaProps, PipelineError, Result } from 'shared'
import { validateTargets } from './crd/crd-helper.js'
import type { DefinitionScheme } from './crd/scheme.js'

export const KUBERNETES_TARGET = 'admission.k8s.gatekeeper.sh'

const kubernetesMatchSchemaUrl = new URL('./match-schemas/kubernetes.json', import.meta.url)

/**
 * Supplies the "match" schema fragment for one target. The fragment is opaque
 * to schema composition.
 */
export interface MatchSchemaProvider {
  readonly name: string
  matchSchema(): JSONSchemaProps
}

export class StaticMatchSchemaProvider implements MatchSchemaProvider {
  private readonly schema: JSONSchemaProps

  constructor(readonly name: string, schema: JSONSchemaProps) {
    this.schema = copyJSONSchemaProps(schema)
  }

  matchSchema(): JSONSchemaProps {
    return copyJSONSchemaProps(this.schema)
  }
}

export function parseMatchSchema(name: string, document: unknown, scheme: DefinitionScheme): Result<MatchSchemaProvider, string> {
  const converted = scheme.convertSchema(document)
  if (!converted.ok) {
    return { ok: false, error: `Match schema for target "${name}": ${converted.error}` }
  }
  return { ok: true, value: new StaticMatchSchemaProvider(name, converted.value) }
}

/**
 * Load a match schema from a JSON or YAML file
 */
export async function loadMatchSchemaFile(name: string, filePath: string | URL, scheme: DefinitionScheme): Promise<Result<MatchSchemaProvider, string>> {
  let document: unknown
  try {
    const content = await readFile(filePath, 'utf-8')
    document = parseYaml(content)
  } catch (error) {
    return { ok: false, error: `Failed to read match schema for target "${name}": ${error}` }
  }
  return parseMatchSchema(name, document, scheme)
}

export async function loadKubernetesTarget(scheme: DefinitionScheme): Promise<Result<MatchSchemaProvider, string>> {
  return loadMatchSchemaFile(KUBERNETES_TARGET, kubernetesMatchSchemaUrl, scheme)
}

/**
 * Match schema providers by target name. Populate it before handing it to
 * concurrent readers.
 */
export class TargetRegistry {
  private readonly providers = new Map<string, MatchSchemaProvider>()

  register(provider: MatchSchemaProvider): Result<void, string> {
    if (this.providers.has(provider.name)) {
      return { ok: false, error: `Target "${provider.name}" is already registered` }
    }
    this.providers.set(provider.name, provider)
    return { ok: true, value: undefined }
  }

  get(name: string): MatchSchemaProvider | undefined {
    return this.providers.get(name)
  }

  names(): string[] {
    return [...this.providers.keys()].sort()
  }

  /** Finds the provider for the template's single target. */
  resolve(templ: ConstraintTemplate): Result<MatchSchemaProvider, PipelineError> {
    const target = validateTargets(templ)
    if (!target.ok) return target
    const provider = this.providers.get(target.value)
    if (!provider) {
      return { ok: false, error: pipelineError('TargetNotFound', `Target "${target.value}" not found`) }
    }
    return { ok: true, value: provider }
  }
}
