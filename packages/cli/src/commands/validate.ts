import { resolve } from 'node:path'
import type { PipelineErrorKind, Result } from 'shared'
import { getKind, getName } from '../lib/crd/unstructured.js'
import { loadDocuments, loadTemplate } from '../lib/loader.js'
import { createToolchain } from '../lib/setup.js'

export interface ValidateOptions {
  template: string
  json?: boolean
  config?: string
}

export interface ConstraintResult {
  name: string
  kind: string
  valid: boolean
  errorKind?: PipelineErrorKind
  message?: string
}

export interface ValidateReport {
  timestamp: string
  summary: { valid: number; invalid: number }
  results: ConstraintResult[]
}

export async function validateCommand(path: string, options: ValidateOptions): Promise<Result<ValidateReport, string>> {
  const toolchain = await createToolchain(process.cwd(), options.config)
  if (!toolchain.ok) return toolchain
  const { client } = toolchain.value

  const template = await loadTemplate(resolve(options.template))
  if (!template.ok) {
    return { ok: false, error: template.error.map(e => `${e.path}: ${e.message}`).join('\n') }
  }
  const registered = client.addTemplate(template.value)
  if (!registered.ok) {
    return { ok: false, error: `Template rejected: [${registered.error.kind}] ${registered.error.message}` }
  }

  const documents = await loadDocuments(resolve(path))
  if (!documents.ok) {
    return { ok: false, error: documents.error.map(e => `${e.path}: ${e.message}`).join('\n') }
  }

  const results: ConstraintResult[] = documents.value.map(doc => {
    const outcome = client.validateConstraint(doc)
    const base = { name: getName(doc), kind: getKind(doc) }
    return outcome.ok
      ? { ...base, valid: true }
      : { ...base, valid: false, errorKind: outcome.error.kind, message: outcome.error.message }
  })

  const report: ValidateReport = {
    timestamp: new Date().toISOString(),
    summary: {
      valid: results.filter(r => r.valid).length,
      invalid: results.filter(r => !r.valid).length,
    },
    results,
  }

  if (options.json) {
    console.log(JSON.stringify(report, null, 2))
  } else {
    for (const r of results) {
      const label = `${r.kind || '<no kind>'}/${r.name || '<no name>'}`
      if (r.valid) {
        console.error(`  ✅ ${label}`)
      } else {
        console.error(`  ✗ ${label} [${r.errorKind}] ${r.message}`)
      }
    }
    console.error(`\n${report.summary.valid} valid, ${report.summary.invalid} invalid\n`)
  }

  return { ok: true, value: report }
}
