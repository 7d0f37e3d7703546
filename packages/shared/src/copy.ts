import type {
  ConstraintTemplate,
  ConstraintTemplateList,
  ConstraintTemplateSpec,
  ConstraintTemplateStatus,
  CRD,
  CRDNames,
  CRDSpec,
  CustomResourceDefinition,
  CustomResourceDefinitionNames,
  CustomResourceDefinitionSpec,
  ExternalJSONSchemaProps,
  JSONSchemaProps,
  JSONSchemaPropsOrBool,
  JSONValue,
  ObjectMeta,
  SchemaCommon,
  Target,
  Validation,
} from './types.js'

// Every copy allocates fresh containers all the way down. Absent optional
// fields stay absent in the copy.

/**
 * Adds an own enumerable entry. Plain assignment would treat a "__proto__"
 * key as the prototype setter.
 */
export function setEntry<T>(record: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(record, key, { value, enumerable: true, writable: true, configurable: true })
}

export function mapRecord<T, U>(record: Record<string, T>, fn: (value: T) => U): Record<string, U> {
  const out: Record<string, U> = {}
  for (const [key, value] of Object.entries(record)) {
    setEntry(out, key, fn(value))
  }
  return out
}

export function copyJSONValue(value: JSONValue): JSONValue {
  if (Array.isArray(value)) return value.map(copyJSONValue)
  if (value !== null && typeof value === 'object') return mapRecord(value, copyJSONValue)
  return value
}

export function copySchemaCommon(source: SchemaCommon): SchemaCommon {
  const { default: defaultValue, enum: enumValues, example, required, externalDocs, ...scalars } = source
  const out: SchemaCommon = { ...scalars }
  if (defaultValue !== undefined) out.default = copyJSONValue(defaultValue)
  if (enumValues) out.enum = enumValues.map(copyJSONValue)
  if (example !== undefined) out.example = copyJSONValue(example)
  if (required) out.required = [...required]
  if (externalDocs) out.externalDocs = { ...externalDocs }
  return out
}

function copySchemaOrBool(source: JSONSchemaPropsOrBool): JSONSchemaPropsOrBool {
  const out: JSONSchemaPropsOrBool = { allows: source.allows }
  if (source.schema) out.schema = copyJSONSchemaProps(source.schema)
  return out
}

export function copyJSONSchemaProps(source: JSONSchemaProps): JSONSchemaProps {
  const {
    items, allOf, oneOf, anyOf, not, properties, patternProperties,
    additionalProperties, additionalItems, xListMapKeys, ...common
  } = source
  const out: JSONSchemaProps = copySchemaCommon(common)
  if (items) {
    out.items = {}
    if (items.schema) out.items.schema = copyJSONSchemaProps(items.schema)
    if (items.jsonSchemas) out.items.jsonSchemas = items.jsonSchemas.map(copyJSONSchemaProps)
  }
  if (allOf) out.allOf = allOf.map(copyJSONSchemaProps)
  if (oneOf) out.oneOf = oneOf.map(copyJSONSchemaProps)
  if (anyOf) out.anyOf = anyOf.map(copyJSONSchemaProps)
  if (not) out.not = copyJSONSchemaProps(not)
  if (properties) out.properties = mapRecord(properties, copyJSONSchemaProps)
  if (patternProperties) out.patternProperties = mapRecord(patternProperties, copyJSONSchemaProps)
  if (additionalProperties) out.additionalProperties = copySchemaOrBool(additionalProperties)
  if (additionalItems) out.additionalItems = copySchemaOrBool(additionalItems)
  if (xListMapKeys) out.xListMapKeys = [...xListMapKeys]
  return out
}

function copyExternalSchemaOrBool(source: boolean | ExternalJSONSchemaProps): boolean | ExternalJSONSchemaProps {
  return typeof source === 'boolean' ? source : copyExternalJSONSchemaProps(source)
}

export function copyExternalJSONSchemaProps(source: ExternalJSONSchemaProps): ExternalJSONSchemaProps {
  const {
    items, allOf, oneOf, anyOf, not, properties, patternProperties,
    additionalProperties, additionalItems, 'x-kubernetes-list-map-keys': listMapKeys, ...common
  } = source
  const out: ExternalJSONSchemaProps = copySchemaCommon(common)
  if (items) {
    out.items = Array.isArray(items) ? items.map(copyExternalJSONSchemaProps) : copyExternalJSONSchemaProps(items)
  }
  if (allOf) out.allOf = allOf.map(copyExternalJSONSchemaProps)
  if (oneOf) out.oneOf = oneOf.map(copyExternalJSONSchemaProps)
  if (anyOf) out.anyOf = anyOf.map(copyExternalJSONSchemaProps)
  if (not) out.not = copyExternalJSONSchemaProps(not)
  if (properties) out.properties = mapRecord(properties, copyExternalJSONSchemaProps)
  if (patternProperties) out.patternProperties = mapRecord(patternProperties, copyExternalJSONSchemaProps)
  if (additionalProperties !== undefined) out.additionalProperties = copyExternalSchemaOrBool(additionalProperties)
  if (additionalItems !== undefined) out.additionalItems = copyExternalSchemaOrBool(additionalItems)
  if (listMapKeys) out['x-kubernetes-list-map-keys'] = [...listMapKeys]
  return out
}

export function copyObjectMeta(source: ObjectMeta): ObjectMeta {
  const out: ObjectMeta = {}
  if (source.name !== undefined) out.name = source.name
  if (source.labels) out.labels = { ...source.labels }
  if (source.annotations) out.annotations = { ...source.annotations }
  return out
}

// ---------------------------------------------------------------------------
// ConstraintTemplate
// ---------------------------------------------------------------------------

export function copyCRDNames(source: CRDNames): CRDNames {
  return { kind: source.kind }
}

export function copyValidation(source: Validation): Validation {
  const out: Validation = {}
  if (source.openAPIV3Schema) out.openAPIV3Schema = copyExternalJSONSchemaProps(source.openAPIV3Schema)
  return out
}

export function copyCRDSpec(source: CRDSpec): CRDSpec {
  const out: CRDSpec = { names: copyCRDNames(source.names) }
  if (source.validation) out.validation = copyValidation(source.validation)
  return out
}

export function copyCRD(source: CRD): CRD {
  return { spec: copyCRDSpec(source.spec) }
}

export function copyTarget(source: Target): Target {
  const out: Target = {}
  if (source.rego !== undefined) out.rego = source.rego
  if (source.libs) out.libs = [...source.libs]
  return out
}

export function copyConstraintTemplateSpec(source: ConstraintTemplateSpec): ConstraintTemplateSpec {
  const out: ConstraintTemplateSpec = { crd: copyCRD(source.crd) }
  if (source.targets) out.targets = mapRecord(source.targets, copyTarget)
  return out
}

export function copyConstraintTemplateStatus(source: ConstraintTemplateStatus): ConstraintTemplateStatus {
  return { ...source }
}

export function copyConstraintTemplate(source: ConstraintTemplate): ConstraintTemplate {
  const out: ConstraintTemplate = {
    apiVersion: source.apiVersion,
    kind: source.kind,
    metadata: copyObjectMeta(source.metadata),
    spec: copyConstraintTemplateSpec(source.spec),
  }
  if (source.status) out.status = copyConstraintTemplateStatus(source.status)
  return out
}

export function copyConstraintTemplateList(source: ConstraintTemplateList): ConstraintTemplateList {
  return {
    apiVersion: source.apiVersion,
    kind: source.kind,
    metadata: { ...source.metadata },
    items: source.items.map(copyConstraintTemplate),
  }
}

// ---------------------------------------------------------------------------
// CustomResourceDefinition
// ---------------------------------------------------------------------------

function copyDefinitionNames(source: CustomResourceDefinitionNames): CustomResourceDefinitionNames {
  const out: CustomResourceDefinitionNames = { ...source }
  if (source.shortNames) out.shortNames = [...source.shortNames]
  if (source.categories) out.categories = [...source.categories]
  return out
}

function copyDefinitionSpec(source: CustomResourceDefinitionSpec): CustomResourceDefinitionSpec {
  const { names, validation, versions, conversion, ...scalars } = source
  const out: CustomResourceDefinitionSpec = {
    ...scalars,
    names: copyDefinitionNames(names),
    versions: versions.map(v => ({ ...v })),
  }
  if (validation) {
    out.validation = {}
    if (validation.openAPIV3Schema) out.validation.openAPIV3Schema = copyJSONSchemaProps(validation.openAPIV3Schema)
  }
  if (conversion) {
    out.conversion = { strategy: conversion.strategy }
    const webhook = conversion.webhookClientConfig
    if (webhook) {
      out.conversion.webhookClientConfig = { ...webhook }
      if (webhook.service) out.conversion.webhookClientConfig.service = { ...webhook.service }
    }
  }
  return out
}

export function copyCustomResourceDefinition(source: CustomResourceDefinition): CustomResourceDefinition {
  const out: CustomResourceDefinition = {
    metadata: copyObjectMeta(source.metadata),
    spec: copyDefinitionSpec(source.spec),
    status: { storedVersions: [...source.status.storedVersions] },
  }
  if (source.status.acceptedNames) out.status.acceptedNames = copyDefinitionNames(source.status.acceptedNames)
  return out
}
