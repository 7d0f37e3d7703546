import type { Ajv, ValidateFunction } from 'ajv'
import {
  JSON_SCHEMA_PROPS_ID,
  copyExternalJSONSchemaProps,
  copyObjectMeta,
  copySchemaCommon,
  mapRecord,
  setEntry,
} from 'shared'
import type {
  CustomResourceConversion,
  CustomResourceDefinition,
  CustomResourceDefinitionNames,
  CustomResourceDefinitionNamesV1Beta1,
  CustomResourceDefinitionV1Beta1,
  ExternalJSONSchemaProps,
  JSONSchemaProps,
  JSONSchemaPropsOrBool,
  Result,
} from 'shared'
import { createAjv, describeValidationErrors, toValidationErrors } from '../ajv.js'
import { CRD_API_VERSION, CRD_KIND } from './constants.js'

const DEFAULT_WEBHOOK_PORT = 443

// ---------------------------------------------------------------------------
// Schema documents
// ---------------------------------------------------------------------------

function schemaOrBoolToInternal(value: boolean | ExternalJSONSchemaProps): JSONSchemaPropsOrBool {
  return typeof value === 'boolean' ? { allows: value } : { allows: true, schema: schemaToInternal(value) }
}

/** Maps an already shape-checked authored schema onto the internal form. */
function schemaToInternal(source: ExternalJSONSchemaProps): JSONSchemaProps {
  const {
    items, allOf, oneOf, anyOf, not, properties, patternProperties, additionalProperties, additionalItems,
    'x-kubernetes-preserve-unknown-fields': preserveUnknownFields,
    'x-kubernetes-embedded-resource': embeddedResource,
    'x-kubernetes-int-or-string': intOrString,
    'x-kubernetes-list-map-keys': listMapKeys,
    'x-kubernetes-list-type': listType,
    ...common
  } = source
  const out: JSONSchemaProps = copySchemaCommon(common)
  if (items) {
    out.items = Array.isArray(items) ? { jsonSchemas: items.map(schemaToInternal) } : { schema: schemaToInternal(items) }
  }
  if (allOf) out.allOf = allOf.map(schemaToInternal)
  if (oneOf) out.oneOf = oneOf.map(schemaToInternal)
  if (anyOf) out.anyOf = anyOf.map(schemaToInternal)
  if (not) out.not = schemaToInternal(not)
  if (properties) out.properties = mapRecord(properties, schemaToInternal)
  if (patternProperties) out.patternProperties = mapRecord(patternProperties, schemaToInternal)
  if (additionalProperties !== undefined) out.additionalProperties = schemaOrBoolToInternal(additionalProperties)
  if (additionalItems !== undefined) out.additionalItems = schemaOrBoolToInternal(additionalItems)
  if (preserveUnknownFields !== undefined) out.xPreserveUnknownFields = preserveUnknownFields
  if (embeddedResource !== undefined) out.xEmbeddedResource = embeddedResource
  if (intOrString !== undefined) out.xIntOrString = intOrString
  if (listMapKeys) out.xListMapKeys = [...listMapKeys]
  if (listType !== undefined) out.xListType = listType
  return out
}

type ExternalResult = Result<ExternalJSONSchemaProps, string>

function schemaOrBoolToExternal(value: JSONSchemaPropsOrBool, path: string): Result<boolean | ExternalJSONSchemaProps, string> {
  if (!value.schema) return { ok: true, value: value.allows }
  if (!value.allows) {
    return { ok: false, error: `${path}: a schema cannot be combined with allows=false` }
  }
  return schemaToExternal(value.schema, path)
}

function listToExternal(schemas: JSONSchemaProps[], path: string): Result<ExternalJSONSchemaProps[], string> {
  const out: ExternalJSONSchemaProps[] = []
  for (const [i, schema] of schemas.entries()) {
    const converted = schemaToExternal(schema, `${path}[${i}]`)
    if (!converted.ok) return converted
    out.push(converted.value)
  }
  return { ok: true, value: out }
}

function recordToExternal(schemas: Record<string, JSONSchemaProps>, path: string): Result<Record<string, ExternalJSONSchemaProps>, string> {
  const out: Record<string, ExternalJSONSchemaProps> = {}
  for (const [key, schema] of Object.entries(schemas)) {
    const converted = schemaToExternal(schema, `${path}[${key}]`)
    if (!converted.ok) return converted
    setEntry(out, key, converted.value)
  }
  return { ok: true, value: out }
}

function schemaToExternal(source: JSONSchemaProps, path: string): ExternalResult {
  const {
    items, allOf, oneOf, anyOf, not, properties, patternProperties, additionalProperties, additionalItems,
    xPreserveUnknownFields, xEmbeddedResource, xIntOrString, xListMapKeys, xListType,
    ...common
  } = source
  const out: ExternalJSONSchemaProps = copySchemaCommon(common)

  if (items) {
    if (items.schema && items.jsonSchemas) {
      return { ok: false, error: `${path}.items: holds both a schema and a list of schemas` }
    }
    if (items.schema) {
      const converted = schemaToExternal(items.schema, `${path}.items`)
      if (!converted.ok) return converted
      out.items = converted.value
    } else if (items.jsonSchemas) {
      const converted = listToExternal(items.jsonSchemas, `${path}.items`)
      if (!converted.ok) return converted
      out.items = converted.value
    }
  }
  const combinators = { allOf, oneOf, anyOf }
  for (const key of ['allOf', 'oneOf', 'anyOf'] as const) {
    const list = combinators[key]
    if (!list) continue
    const converted = listToExternal(list, `${path}.${key}`)
    if (!converted.ok) return converted
    out[key] = converted.value
  }
  if (not) {
    const converted = schemaToExternal(not, `${path}.not`)
    if (!converted.ok) return converted
    out.not = converted.value
  }
  if (properties) {
    const converted = recordToExternal(properties, `${path}.properties`)
    if (!converted.ok) return converted
    out.properties = converted.value
  }
  if (patternProperties) {
    const converted = recordToExternal(patternProperties, `${path}.patternProperties`)
    if (!converted.ok) return converted
    out.patternProperties = converted.value
  }
  if (additionalProperties) {
    const converted = schemaOrBoolToExternal(additionalProperties, `${path}.additionalProperties`)
    if (!converted.ok) return converted
    out.additionalProperties = converted.value
  }
  if (additionalItems) {
    const converted = schemaOrBoolToExternal(additionalItems, `${path}.additionalItems`)
    if (!converted.ok) return converted
    out.additionalItems = converted.value
  }
  if (xPreserveUnknownFields !== undefined) out['x-kubernetes-preserve-unknown-fields'] = xPreserveUnknownFields
  if (xEmbeddedResource !== undefined) out['x-kubernetes-embedded-resource'] = xEmbeddedResource
  if (xIntOrString !== undefined) out['x-kubernetes-int-or-string'] = xIntOrString
  if (xListMapKeys) out['x-kubernetes-list-map-keys'] = [...xListMapKeys]
  if (xListType !== undefined) out['x-kubernetes-list-type'] = xListType
  return { ok: true, value: out }
}

// ---------------------------------------------------------------------------
// Definitions
// ---------------------------------------------------------------------------

function copyConversion(source: CustomResourceConversion): CustomResourceConversion {
  const out: CustomResourceConversion = { strategy: source.strategy }
  const webhook = source.webhookClientConfig
  if (webhook) {
    out.webhookClientConfig = { ...webhook }
    if (webhook.service) out.webhookClientConfig.service = { ...webhook.service }
  }
  return out
}

function namesToExternal(names: CustomResourceDefinitionNamesV1Beta1): CustomResourceDefinitionNamesV1Beta1 {
  const out: CustomResourceDefinitionNamesV1Beta1 = { ...names }
  if (names.shortNames) out.shortNames = [...names.shortNames]
  if (names.categories) out.categories = [...names.categories]
  return out
}

function namesToInternal(names: CustomResourceDefinitionNamesV1Beta1, path: string): Result<CustomResourceDefinitionNames, string> {
  const { singular, listKind } = names
  if (singular === undefined) return { ok: false, error: `${path}.singular: not set` }
  if (listKind === undefined) return { ok: false, error: `${path}.listKind: not set` }
  const out: CustomResourceDefinitionNames = { ...names, singular, listKind }
  if (names.shortNames) out.shortNames = [...names.shortNames]
  if (names.categories) out.categories = [...names.categories]
  return { ok: true, value: out }
}

/**
 * Conversion and defaulting between the internal definition form and the
 * apiextensions v1beta1 form. Built once and shared; holds no mutable state
 * after construction.
 */
export class DefinitionScheme {
  private readonly validateSchemaDocument: ValidateFunction<ExternalJSONSchemaProps>

  constructor(ajv: Ajv = createAjv()) {
    this.validateSchemaDocument = ajv.compile<ExternalJSONSchemaProps>({ $ref: JSON_SCHEMA_PROPS_ID })
  }

  /** Converts an authored schema document to the internal schema form. */
  convertSchema(document: unknown): Result<JSONSchemaProps, string> {
    if (!this.validateSchemaDocument(document)) {
      const errors = toValidationErrors(this.validateSchemaDocument.errors)
      return { ok: false, error: `invalid schema document: ${describeValidationErrors(errors)}` }
    }
    return { ok: true, value: schemaToInternal(document) }
  }

  /** Converts an internal schema back to its authored form. */
  schemaToExternal(schema: JSONSchemaProps): Result<ExternalJSONSchemaProps, string> {
    return schemaToExternal(schema, 'openAPIV3Schema')
  }

  toExternal(crd: CustomResourceDefinition): Result<CustomResourceDefinitionV1Beta1, string> {
    const { names, validation, versions, conversion, ...scalars } = crd.spec
    const out: CustomResourceDefinitionV1Beta1 = {
      apiVersion: CRD_API_VERSION,
      kind: CRD_KIND,
      metadata: copyObjectMeta(crd.metadata),
      spec: {
        ...scalars,
        names: namesToExternal(names),
        versions: versions.map(v => ({ ...v })),
      },
      status: { storedVersions: [...crd.status.storedVersions] },
    }
    if (validation) {
      out.spec.validation = {}
      if (validation.openAPIV3Schema) {
        const schema = schemaToExternal(validation.openAPIV3Schema, 'spec.validation.openAPIV3Schema')
        if (!schema.ok) return schema
        out.spec.validation.openAPIV3Schema = schema.value
      }
    }
    if (conversion) out.spec.conversion = copyConversion(conversion)
    if (crd.status.acceptedNames && out.status) out.status.acceptedNames = namesToExternal(crd.status.acceptedNames)
    return { ok: true, value: out }
  }

  /** Returns a new v1beta1 definition with every version-specific default filled in. */
  applyDefaults(crd: CustomResourceDefinitionV1Beta1): CustomResourceDefinitionV1Beta1 {
    const spec = crd.spec
    let versions = (spec.versions ?? []).map(v => ({ ...v }))
    if (versions.length === 0 && spec.version) {
      versions = [{ name: spec.version, served: true, storage: true }]
    }
    const version = spec.version || versions[0]?.name

    const names = namesToExternal({
      ...spec.names,
      singular: spec.names.singular || spec.names.kind.toLowerCase(),
      listKind: spec.names.listKind || (spec.names.kind ? `${spec.names.kind}List` : ''),
    })

    const conversion: CustomResourceConversion = spec.conversion ? copyConversion(spec.conversion) : { strategy: 'None' }
    const service = conversion.webhookClientConfig?.service
    if (service && service.port === undefined) service.port = DEFAULT_WEBHOOK_PORT

    const storedVersions = crd.status?.storedVersions?.length
      ? [...crd.status.storedVersions]
      : versions.filter(v => v.storage).map(v => v.name)

    const out: CustomResourceDefinitionV1Beta1 = {
      apiVersion: crd.apiVersion,
      kind: crd.kind,
      metadata: copyObjectMeta(crd.metadata),
      spec: {
        group: spec.group,
        names,
        scope: spec.scope || 'Namespaced',
        versions,
        conversion,
        preserveUnknownFields: spec.preserveUnknownFields ?? true,
      },
      status: { storedVersions },
    }
    if (version) out.spec.version = version
    if (spec.validation) {
      out.spec.validation = {}
      if (spec.validation.openAPIV3Schema) {
        out.spec.validation.openAPIV3Schema = copyExternalJSONSchemaProps(spec.validation.openAPIV3Schema)
      }
    }
    if (crd.status?.acceptedNames && out.status) out.status.acceptedNames = namesToExternal(crd.status.acceptedNames)
    return out
  }

  toInternal(crd: CustomResourceDefinitionV1Beta1): Result<CustomResourceDefinition, string> {
    if (crd.apiVersion !== CRD_API_VERSION || crd.kind !== CRD_KIND) {
      return { ok: false, error: `cannot convert ${crd.apiVersion}, Kind=${crd.kind} to ${CRD_KIND}` }
    }
    const { names, validation, versions, conversion, version, scope, ...scalars } = crd.spec
    if (version === undefined) return { ok: false, error: 'spec.version: not set' }
    if (scope === undefined) return { ok: false, error: 'spec.scope: not set' }
    const internalNames = namesToInternal(names, 'spec.names')
    if (!internalNames.ok) return internalNames

    const out: CustomResourceDefinition = {
      metadata: copyObjectMeta(crd.metadata),
      spec: {
        ...scalars,
        version,
        scope,
        names: internalNames.value,
        versions: (versions ?? []).map(v => ({ ...v })),
      },
      status: { storedVersions: [...(crd.status?.storedVersions ?? [])] },
    }
    if (validation) {
      out.spec.validation = {}
      if (validation.openAPIV3Schema) {
        const schema = this.convertSchema(validation.openAPIV3Schema)
        if (!schema.ok) return { ok: false, error: `spec.validation.openAPIV3Schema: ${schema.error}` }
        out.spec.validation.openAPIV3Schema = schema.value
      }
    }
    if (conversion) out.spec.conversion = copyConversion(conversion)
    const accepted = crd.status?.acceptedNames
    if (accepted) {
      const acceptedNames = namesToInternal(accepted, 'status.acceptedNames')
      if (!acceptedNames.ok) return acceptedNames
      out.status.acceptedNames = acceptedNames.value
    }
    return { ok: true, value: out }
  }
}
