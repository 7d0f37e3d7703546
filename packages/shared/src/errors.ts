import type { FieldError, FieldErrorType, PipelineError, PipelineErrorKind } from './types.js'

const typeLabels: Record<FieldErrorType, string> = {
  FieldValueRequired: 'Required value',
  FieldValueInvalid: 'Invalid value',
  FieldValueNotSupported: 'Unsupported value',
  FieldValueForbidden: 'Forbidden',
  FieldValueDuplicate: 'Duplicate value',
}

/** Joins a field path segment onto its parent ("spec" + "names" -> "spec.names"). */
export function childPath(parent: string, name: string): string {
  return parent ? `${parent}.${name}` : name
}

export function indexPath(parent: string, index: number | string): string {
  return `${parent}[${index}]`
}

export function requiredError(field: string, detail?: string): FieldError {
  return { type: 'FieldValueRequired', field, detail }
}

export function invalidError(field: string, badValue: unknown, detail: string): FieldError {
  return { type: 'FieldValueInvalid', field, badValue, detail }
}

export function notSupportedError(field: string, badValue: unknown, supported: string[]): FieldError {
  return { type: 'FieldValueNotSupported', field, badValue, supported }
}

export function forbiddenError(field: string, detail: string): FieldError {
  return { type: 'FieldValueForbidden', field, detail }
}

export function duplicateError(field: string, badValue: unknown): FieldError {
  return { type: 'FieldValueDuplicate', field, badValue }
}

function formatValue(value: unknown): string {
  if (value === undefined) return 'undefined'
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  return JSON.stringify(value)
}

export function formatFieldError(error: FieldError): string {
  let message = `${error.field}: ${typeLabels[error.type]}`
  const showsValue = error.type !== 'FieldValueRequired' && error.type !== 'FieldValueForbidden'
  if (showsValue) {
    message += `: ${formatValue(error.badValue)}`
  }
  if (error.type === 'FieldValueNotSupported' && error.supported) {
    message += `: supported values: ${error.supported.map(v => `"${v}"`).join(', ')}`
  } else if (error.detail) {
    message += `: ${error.detail}`
  }
  return message
}

/** One message stays as-is; several render as "[a, b, c]". */
export function aggregateMessages(messages: string[]): string {
  if (messages.length === 1) return messages[0] ?? ''
  return `[${messages.join(', ')}]`
}

export function pipelineError(kind: PipelineErrorKind, message: string, extra: Partial<Omit<PipelineError, 'kind' | 'message'>> = {}): PipelineError {
  return { kind, message, ...extra }
}

export function aggregateFieldErrors(kind: PipelineErrorKind, fieldErrors: FieldError[]): PipelineError {
  return {
    kind,
    message: aggregateMessages(fieldErrors.map(formatFieldError)),
    fieldErrors,
  }
}
