import { Ajv } from 'ajv'
import ajvFormats from 'ajv-formats'
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv'
import { childPath, forbiddenError, indexPath, invalidError, notSupportedError, requiredError, setEntry } from 'shared'
import type { CustomResourceValidation, FieldError, JSONSchemaProps, JSONSchemaPropsOrBool, Result } from 'shared'
import { isUnstructured } from './unstructured.js'

// CommonJS package: under NodeNext its plugin is the `default` member.
const addFormats = ajvFormats.default

export interface SchemaValidator {
  /** Returns every field error found in the document; empty when it conforms. */
  validate(document: unknown): FieldError[]
}

/**
 * Builds validators for a definition's schema. Kept behind an interface so
 * callers can swap in a lighter implementation.
 */
export interface SchemaValidatorFactory {
  buildValidator(validation: CustomResourceValidation | undefined): Result<SchemaValidator, string>
}

const acceptAll: SchemaValidator = {
  validate: () => [],
}

/** Decides whether a `format` is checked; formats it rejects are dropped. */
export type FormatFilter = (format: string) => boolean

const noFormats: FormatFilter = () => false

function orBoolToJsonSchema(value: JSONSchemaPropsOrBool, formats: FormatFilter): SchemaObject | boolean {
  return value.schema ? toJsonSchema(value.schema, formats) : value.allows
}

function recordToJsonSchema(schemas: Record<string, JSONSchemaProps>, formats: FormatFilter): Record<string, SchemaObject> {
  const out: Record<string, SchemaObject> = {}
  for (const [key, child] of Object.entries(schemas)) setEntry(out, key, toJsonSchema(child, formats))
  return out
}

/**
 * Translates an internal schema to the JSON Schema dialect Ajv evaluates.
 * Annotations, platform extensions and formats outside `formats` carry no
 * validation and are dropped.
 */
export function toJsonSchema(schema: JSONSchemaProps, formats: FormatFilter = noFormats): SchemaObject {
  const out: SchemaObject = {}
  const types = schema.xIntOrString ? ['integer', 'string'] : schema.type ? [schema.type] : []
  if (types.length > 0) {
    if (schema.nullable) types.push('null')
    out.type = types.length === 1 ? types[0] : types
  }
  if (schema.format && formats(schema.format)) out.format = schema.format

  if (schema.maximum !== undefined) {
    if (schema.exclusiveMaximum) out.exclusiveMaximum = schema.maximum
    else out.maximum = schema.maximum
  }
  if (schema.minimum !== undefined) {
    if (schema.exclusiveMinimum) out.exclusiveMinimum = schema.minimum
    else out.minimum = schema.minimum
  }
  for (const key of ['maxLength', 'minLength', 'pattern', 'maxItems', 'minItems', 'uniqueItems', 'multipleOf', 'maxProperties', 'minProperties'] as const) {
    if (schema[key] !== undefined) out[key] = schema[key]
  }
  if (schema.enum) out.enum = schema.enum
  if (schema.required) out.required = schema.required

  const convert = (child: JSONSchemaProps): SchemaObject => toJsonSchema(child, formats)
  if (schema.items?.schema) out.items = convert(schema.items.schema)
  else if (schema.items?.jsonSchemas) out.items = schema.items.jsonSchemas.map(convert)
  if (schema.additionalItems) out.additionalItems = orBoolToJsonSchema(schema.additionalItems, formats)

  if (schema.properties) out.properties = recordToJsonSchema(schema.properties, formats)
  if (schema.patternProperties) out.patternProperties = recordToJsonSchema(schema.patternProperties, formats)
  if (schema.additionalProperties) out.additionalProperties = orBoolToJsonSchema(schema.additionalProperties, formats)

  if (schema.allOf) out.allOf = schema.allOf.map(convert)
  if (schema.oneOf) out.oneOf = schema.oneOf.map(convert)
  if (schema.anyOf) out.anyOf = schema.anyOf.map(convert)
  if (schema.not) out.not = convert(schema.not)
  return out
}

/**
 * "/spec/parameters/labels/0" -> "spec.parameters.labels[0]". A segment is an
 * index only where the document holds an array.
 */
export function pointerToFieldPath(pointer: string, document: unknown): string {
  let path = ''
  let current = document
  for (const raw of pointer.split('/').slice(1)) {
    const segment = raw.replace(/~1/g, '/').replace(/~0/g, '~')
    if (Array.isArray(current)) {
      path = indexPath(path, segment)
      current = current[Number(segment)]
    } else {
      path = childPath(path, segment)
      current = isUnstructured(current) && Object.hasOwn(current, segment) ? current[segment] : undefined
    }
  }
  return path
}

function formatAllowed(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value)
}

export function toFieldError(error: ErrorObject, document: unknown): FieldError {
  const field = pointerToFieldPath(error.instancePath, document)
  const message = error.message ?? 'is invalid'
  switch (error.keyword) {
    case 'type': {
      const expected: unknown = error.params.type
      const types = Array.isArray(expected) ? expected.map(String) : typeof expected === 'string' ? expected.split(',') : []
      return invalidError(field, error.data, types.length > 1 ? `must be ${types.join(' or ')}` : message)
    }
    case 'required': {
      const missing: unknown = error.params.missingProperty
      return requiredError(typeof missing === 'string' ? childPath(field, missing) : field)
    }
    case 'additionalProperties': {
      const extra: unknown = error.params.additionalProperty
      return forbiddenError(typeof extra === 'string' ? childPath(field, extra) : field, 'field not declared in schema')
    }
    case 'enum': {
      const allowed: unknown = error.params.allowedValues
      const supported = Array.isArray(allowed) ? allowed.map(formatAllowed) : []
      return notSupportedError(field, error.data, supported)
    }
    default:
      return invalidError(field, error.data, message)
  }
}

class AjvSchemaValidator implements SchemaValidator {
  constructor(private readonly validateFn: ValidateFunction) {}

  validate(document: unknown): FieldError[] {
    if (this.validateFn(document)) return []
    return (this.validateFn.errors ?? []).map(error => toFieldError(error, document))
  }
}

/** Compiles definition schemas with Ajv, once per schema object. */
export class AjvSchemaValidatorFactory implements SchemaValidatorFactory {
  private readonly ajv = new Ajv({ allErrors: true, strict: false, verbose: true })
  private readonly knownFormats: FormatFilter = format => this.ajv.formats[format] !== undefined
  private readonly compiled = new WeakMap<JSONSchemaProps, SchemaValidator>()

  constructor() {
    addFormats(this.ajv)
  }

  buildValidator(validation: CustomResourceValidation | undefined): Result<SchemaValidator, string> {
    const schema = validation?.openAPIV3Schema
    if (!schema) return { ok: true, value: acceptAll }

    const cached = this.compiled.get(schema)
    if (cached) return { ok: true, value: cached }

    const jsonSchema = toJsonSchema(schema, this.knownFormats)
    let validateFn: ValidateFunction
    try {
      validateFn = this.ajv.compile(jsonSchema)
    } catch (error) {
      return { ok: false, error: `Failed to compile schema: ${error instanceof Error ? error.message : String(error)}` }
    }
    // The compiled function stays usable; only Ajv's own cache entry goes.
    this.ajv.removeSchema(jsonSchema)

    const validator = new AjvSchemaValidator(validateFn)
    this.compiled.set(schema, validator)
    return { ok: true, value: validator }
  }
}
