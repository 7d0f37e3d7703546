import { readFile, access } from 'node:fs/promises'
import { parseAllDocuments } from 'yaml'
import { constraintTemplateSchema } from 'shared'
import type { ConstraintTemplate, Result, ValidationError } from 'shared'
import { createAjv, toValidationErrors } from './ajv.js'

const ajv = createAjv()
const validateTemplateDocument = ajv.compile<ConstraintTemplate>(constraintTemplateSchema)

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

/**
 * Read every document in a YAML (or JSON) file. Empty documents are skipped.
 */
export async function loadDocuments(filePath: string): Promise<Result<unknown[], ValidationError[]>> {
  if (!(await fileExists(filePath))) {
    return { ok: false, error: [{ path: filePath, message: `File not found: ${filePath}` }] }
  }

  let content: string
  try {
    content = await readFile(filePath, 'utf-8')
  } catch (error) {
    return { ok: false, error: [{ path: filePath, message: `Failed to read ${filePath}: ${error}` }] }
  }

  const errors: ValidationError[] = []
  const documents: unknown[] = []
  let index = 0
  for (const doc of parseAllDocuments(content)) {
    const position = index++
    if (doc.errors.length > 0) {
      for (const err of doc.errors) {
        errors.push({ path: `${filePath}#${position}`, message: `Failed to parse: ${err.message}` })
      }
      continue
    }
    const value: unknown = doc.toJS()
    if (value === null || value === undefined) continue
    documents.push(value)
  }

  if (errors.length > 0) {
    return { ok: false, error: errors }
  }
  return { ok: true, value: documents }
}

/**
 * Check a parsed document against the ConstraintTemplate shape.
 */
export function parseTemplate(document: unknown, source = 'template'): Result<ConstraintTemplate, ValidationError[]> {
  if (!validateTemplateDocument(document)) {
    return { ok: false, error: toValidationErrors(validateTemplateDocument.errors, source) }
  }
  return { ok: true, value: document }
}

export async function loadTemplate(filePath: string): Promise<Result<ConstraintTemplate, ValidationError[]>> {
  const loaded = await loadDocuments(filePath)
  if (!loaded.ok) return loaded

  const [document, ...rest] = loaded.value
  if (document === undefined) {
    return { ok: false, error: [{ path: filePath, message: 'No ConstraintTemplate found' }] }
  }
  if (rest.length > 0) {
    return { ok: false, error: [{ path: filePath, message: `Expected one ConstraintTemplate, found ${loaded.value.length} documents` }] }
  }
  return parseTemplate(document, filePath)
}
