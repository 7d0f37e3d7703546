import type { Result } from 'shared'
import { createToolchain } from '../lib/setup.js'

export interface TargetsOptions {
  json?: boolean
  config?: string
}

export async function targetsCommand(options: TargetsOptions): Promise<Result<string[], string>> {
  const toolchain = await createToolchain(process.cwd(), options.config)
  if (!toolchain.ok) return toolchain

  const names = toolchain.value.targets.names()
  if (options.json) {
    console.log(JSON.stringify(names, null, 2))
  } else {
    for (const name of names) console.log(name)
  }
  return { ok: true, value: names }
}
