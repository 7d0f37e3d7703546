import { resolve } from 'node:path'
import { stringify as stringifyYaml } from 'yaml'
import type { CustomResourceDefinitionV1Beta1, Result } from 'shared'
import { loadTemplate } from '../lib/loader.js'
import { createToolchain } from '../lib/setup.js'

export interface CompileOptions {
  json?: boolean
  config?: string
}

export async function compileCommand(path: string, options: CompileOptions): Promise<Result<CustomResourceDefinitionV1Beta1, string>> {
  const toolchain = await createToolchain(process.cwd(), options.config)
  if (!toolchain.ok) return toolchain
  const { client, scheme } = toolchain.value

  const loaded = await loadTemplate(resolve(path))
  if (!loaded.ok) {
    return { ok: false, error: loaded.error.map(e => `${e.path}: ${e.message}`).join('\n') }
  }

  const crd = client.createCRD(loaded.value)
  if (!crd.ok) return { ok: false, error: `[${crd.error.kind}] ${crd.error.message}` }

  const manifest = scheme.toExternal(crd.value)
  if (!manifest.ok) return manifest

  if (options.json) {
    console.log(JSON.stringify(manifest.value, null, 2))
  } else {
    console.log(stringifyYaml(manifest.value))
  }
  return manifest
}
