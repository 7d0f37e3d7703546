import { resolve } from 'node:path'
import type { Result } from 'shared'
import { createToolchain } from '../lib/setup.js'
import { verifyTemplate, type VerificationResult } from '../lib/verifier/template.js'

export interface VerifyOptions {
  json?: boolean
  config?: string
}

export async function verifyCommand(path: string, options: VerifyOptions): Promise<Result<VerificationResult, string>> {
  const toolchain = await createToolchain(process.cwd(), options.config)
  if (!toolchain.ok) return toolchain

  const result = await verifyTemplate(resolve(path), toolchain.value.client)

  if (options.json) {
    console.log(JSON.stringify(result, null, 2))
  } else {
    const subject = result.kind ? ` ${result.kind}` : ''
    console.error(`\nTemplate${subject}: ${result.passed ? '✅ PASSED' : '❌ FAILED'}\n`)
    for (const issue of result.issues) {
      const icon = issue.severity === 'error' ? '✗' : '⚠'
      console.error(`  ${icon} [${issue.code}] ${issue.message}`)
    }
    if (result.passed && result.crdName) {
      console.error(`  Definition ${result.crdName} is valid.`)
    }
    console.error('')
  }

  return { ok: true, value: result }
}
