import { formatFieldError } from 'shared'
import type { PipelineError, PipelineErrorKind } from 'shared'
import type { TemplateClient } from '../client.js'
import { loadTemplate } from '../loader.js'

export interface VerificationIssue {
  severity: 'error' | 'warning'
  code: string
  message: string
  file?: string
  path?: string
}

export interface VerificationResult {
  passed: boolean
  kind?: string
  crdName?: string
  issues: VerificationIssue[]
  timestamp: string
}

/** "DefinitionValidation" -> "DEFINITION-VALIDATION" */
export function issueCode(kind: PipelineErrorKind): string {
  return kind.replace(/([a-z])([A-Z])/g, '$1-$2').toUpperCase()
}

export function issuesFromError(error: PipelineError, file?: string): VerificationIssue[] {
  const code = issueCode(error.kind)
  if (error.fieldErrors && error.fieldErrors.length > 0) {
    return error.fieldErrors.map(fe => ({
      severity: 'error' as const,
      code,
      message: formatFieldError(fe),
      file,
      path: fe.field,
    }))
  }
  return [{ severity: 'error', code, message: error.message, file }]
}

/**
 * Registration-time checks for a template file: document shape, target,
 * schema synthesis and structural validation of the resulting definition.
 */
export async function verifyTemplate(filePath: string, client: TemplateClient): Promise<VerificationResult> {
  const issues: VerificationIssue[] = []
  const timestamp = new Date().toISOString()

  const loaded = await loadTemplate(filePath)
  if (!loaded.ok) {
    for (const err of loaded.error) {
      issues.push({ severity: 'error', code: 'TEMPLATE-INVALID', message: `${err.path}: ${err.message}`, file: filePath })
    }
    return { passed: false, issues, timestamp }
  }

  const template = loaded.value
  const kind = template.spec.crd.spec.names.kind
  const name = template.metadata.name
  if (name !== undefined && name !== kind.toLowerCase()) {
    issues.push({
      severity: 'warning',
      code: 'TEMPLATE-NAME',
      message: `Template name "${name}" differs from the lower-cased kind "${kind.toLowerCase()}"`,
      file: filePath,
      path: 'metadata.name',
    })
  }

  const crd = client.createCRD(template)
  if (!crd.ok) {
    issues.push(...issuesFromError(crd.error, filePath))
    return { passed: false, kind, issues, timestamp }
  }

  const hasErrors = issues.some(i => i.severity === 'error')
  return { passed: !hasErrors, kind, crdName: crd.value.metadata.name, issues, timestamp }
}
