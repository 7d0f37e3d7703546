import { Ajv } from 'ajv'
import type { ErrorObject } from 'ajv'
import { jsonSchemaPropsSchema } from 'shared'
import type { ValidationError } from 'shared'

/** Ajv instance that resolves references to the schema-document shape. */
export function createAjv(): Ajv {
  const ajv = new Ajv({ allErrors: true })
  ajv.addSchema(jsonSchemaPropsSchema)
  return ajv
}

export function toValidationErrors(errors: ErrorObject[] | null | undefined, prefix = ''): ValidationError[] {
  return (errors ?? []).map(e => ({
    path: `${prefix}${e.instancePath}`,
    message: e.message ?? 'Unknown validation error',
  }))
}

export function describeValidationErrors(errors: ValidationError[]): string {
  return errors.map(e => `${e.path || '/'}: ${e.message}`).join(', ')
}
