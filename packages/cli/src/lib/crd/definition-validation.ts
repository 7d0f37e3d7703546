import {
  childPath,
  duplicateError,
  forbiddenError,
  indexPath,
  invalidError,
  notSupportedError,
  requiredError,
} from 'shared'
import type {
  CustomResourceConversion,
  CustomResourceDefinition,
  CustomResourceDefinitionNames,
  CustomResourceDefinitionSpec,
  FieldError,
  JSONSchemaProps,
} from 'shared'
import { isDNS1035Label, isDNS1123Subdomain } from './names.js'

const SUPPORTED_SCOPES = ['Cluster', 'Namespaced']
const SUPPORTED_CONVERSION_STRATEGIES = ['None', 'Webhook']

function nameErrors(field: string, value: string, check: (v: string) => string[]): FieldError[] {
  return check(value).map(msg => invalidError(field, value, msg))
}

function validateNames(names: CustomResourceDefinitionNames, fldPath: string): FieldError[] {
  const errs: FieldError[] = []

  if (!names.plural) {
    errs.push(requiredError(childPath(fldPath, 'plural')))
  } else {
    errs.push(...nameErrors(childPath(fldPath, 'plural'), names.plural, isDNS1035Label))
  }
  if (!names.singular) {
    errs.push(requiredError(childPath(fldPath, 'singular')))
  } else {
    errs.push(...nameErrors(childPath(fldPath, 'singular'), names.singular, isDNS1035Label))
  }

  if (!names.kind) {
    errs.push(requiredError(childPath(fldPath, 'kind')))
  } else if (isDNS1035Label(names.kind.toLowerCase()).length > 0) {
    errs.push(invalidError(childPath(fldPath, 'kind'), names.kind, 'may have mixed case, but should otherwise match: [a-z]([-a-z0-9]*[a-z0-9])?'))
  }
  if (!names.listKind) {
    errs.push(requiredError(childPath(fldPath, 'listKind')))
  } else if (isDNS1035Label(names.listKind.toLowerCase()).length > 0) {
    errs.push(invalidError(childPath(fldPath, 'listKind'), names.listKind, 'may have mixed case, but should otherwise match: [a-z]([-a-z0-9]*[a-z0-9])?'))
  }
  if (names.kind && names.kind === names.listKind) {
    errs.push(invalidError(childPath(fldPath, 'listKind'), names.listKind, 'kind and listKind may not be the same'))
  }

  const seen = new Set<string>()
  for (const [i, category] of (names.categories ?? []).entries()) {
    const field = indexPath(childPath(fldPath, 'categories'), i)
    errs.push(...nameErrors(field, category, isDNS1035Label))
    if (seen.has(category)) errs.push(duplicateError(field, category))
    seen.add(category)
  }
  return errs
}

function validateVersions(spec: CustomResourceDefinitionSpec, fldPath: string): FieldError[] {
  const errs: FieldError[] = []
  const versionsPath = childPath(fldPath, 'versions')
  if (spec.versions.length === 0) {
    errs.push(invalidError(versionsPath, spec.versions, 'must have exactly one version marked as storage version'))
    return errs
  }

  const seen = new Set<string>()
  let storageCount = 0
  for (const [i, version] of spec.versions.entries()) {
    const namePath = childPath(indexPath(versionsPath, i), 'name')
    if (!version.name) {
      errs.push(requiredError(namePath))
    } else {
      errs.push(...nameErrors(namePath, version.name, isDNS1035Label))
      if (seen.has(version.name)) errs.push(duplicateError(namePath, version.name))
      seen.add(version.name)
    }
    if (version.storage) storageCount++
  }
  if (storageCount !== 1) {
    errs.push(invalidError(versionsPath, spec.versions, 'must have exactly one version marked as storage version'))
  }
  const first = spec.versions[0]
  if (first && spec.version !== first.name) {
    errs.push(invalidError(childPath(fldPath, 'version'), spec.version, 'must match the first version in spec.versions'))
  }
  return errs
}

function validateConversion(conversion: CustomResourceConversion | undefined, fldPath: string): FieldError[] {
  if (!conversion) return []
  const errs: FieldError[] = []
  if (!SUPPORTED_CONVERSION_STRATEGIES.includes(conversion.strategy)) {
    errs.push(notSupportedError(childPath(fldPath, 'strategy'), conversion.strategy, SUPPORTED_CONVERSION_STRATEGIES))
  }
  if (conversion.strategy !== 'Webhook' && conversion.webhookClientConfig) {
    errs.push(forbiddenError(childPath(fldPath, 'webhookClientConfig'), 'should not be set when strategy is not set to Webhook'))
  }
  return errs
}

interface SchemaOptions {
  allowDefaults: boolean
}

function validateSchemaList(schemas: JSONSchemaProps[] | undefined, fldPath: string, opts: SchemaOptions): FieldError[] {
  return (schemas ?? []).flatMap((schema, i) => validateSchema(schema, indexPath(fldPath, i), opts))
}

function validateSchema(schema: JSONSchemaProps, fldPath: string, opts: SchemaOptions): FieldError[] {
  const errs: FieldError[] = []

  if (schema.$ref !== undefined) errs.push(forbiddenError(childPath(fldPath, '$ref'), '$ref is not supported'))
  if (schema.id !== undefined) errs.push(forbiddenError(childPath(fldPath, 'id'), 'id is not supported'))
  if (schema.patternProperties) errs.push(forbiddenError(childPath(fldPath, 'patternProperties'), 'patternProperties is not supported'))
  if (schema.additionalItems) errs.push(forbiddenError(childPath(fldPath, 'additionalItems'), 'additionalItems is not supported'))
  if (schema.uniqueItems) {
    errs.push(forbiddenError(childPath(fldPath, 'uniqueItems'), 'uniqueItems cannot be set to true since the runtime complexity becomes quadratic'))
  }
  if (schema.properties && schema.additionalProperties) {
    errs.push(forbiddenError(childPath(fldPath, 'additionalProperties'), 'additionalProperties and properties are mutual exclusive'))
  }
  if (schema.items?.jsonSchemas) {
    errs.push(forbiddenError(childPath(fldPath, 'items'), 'items must be a schema object and not an array'))
  }
  if (schema.xPreserveUnknownFields === false) {
    errs.push(invalidError(childPath(fldPath, 'x-kubernetes-preserve-unknown-fields'), false, 'must be true or undefined'))
  }
  if (schema.xIntOrString && schema.type) {
    errs.push(invalidError(childPath(fldPath, 'type'), schema.type, 'must be empty when x-kubernetes-int-or-string is true'))
  }
  if (schema.xEmbeddedResource && schema.type !== 'object') {
    errs.push(invalidError(childPath(fldPath, 'type'), schema.type ?? '', 'must be object if x-kubernetes-embedded-resource is true'))
  }
  if (schema.default !== undefined && !opts.allowDefaults) {
    errs.push(forbiddenError(childPath(fldPath, 'default'), 'must not be set when preserveUnknownFields is true'))
  }

  for (const [key, child] of Object.entries(schema.properties ?? {})) {
    errs.push(...validateSchema(child, indexPath(childPath(fldPath, 'properties'), key), opts))
  }
  if (schema.additionalProperties?.schema) {
    errs.push(...validateSchema(schema.additionalProperties.schema, childPath(fldPath, 'additionalProperties'), opts))
  }
  if (schema.items?.schema) {
    errs.push(...validateSchema(schema.items.schema, childPath(fldPath, 'items'), opts))
  }
  errs.push(...validateSchemaList(schema.allOf, childPath(fldPath, 'allOf'), opts))
  errs.push(...validateSchemaList(schema.oneOf, childPath(fldPath, 'oneOf'), opts))
  errs.push(...validateSchemaList(schema.anyOf, childPath(fldPath, 'anyOf'), opts))
  if (schema.not) errs.push(...validateSchema(schema.not, childPath(fldPath, 'not'), opts))
  return errs
}

function validateRootSchema(schema: JSONSchemaProps, fldPath: string, opts: SchemaOptions): FieldError[] {
  const errs: FieldError[] = []
  if (schema.type && schema.type !== 'object') {
    errs.push(invalidError(childPath(fldPath, 'type'), schema.type, 'must be object at the root'))
  }
  errs.push(...validateSchema(schema, fldPath, opts))
  return errs
}

/**
 * Structural checks the platform applies to an apiextensions v1beta1
 * resource definition. Returns every violation found.
 */
export function validateCustomResourceDefinition(crd: CustomResourceDefinition): FieldError[] {
  const errs: FieldError[] = []
  const spec = crd.spec
  const specPath = 'spec'

  const expectedName = `${spec.names.plural}.${spec.group}`
  if (crd.metadata.name !== expectedName) {
    errs.push(invalidError('metadata.name', crd.metadata.name ?? '', `must be spec.names.plural+"."+spec.group`))
  }

  if (!spec.group) {
    errs.push(requiredError(childPath(specPath, 'group')))
  } else {
    errs.push(...nameErrors(childPath(specPath, 'group'), spec.group, isDNS1123Subdomain))
    if (spec.group.split('.').length < 2) {
      errs.push(invalidError(childPath(specPath, 'group'), spec.group, 'should be a domain with at least one dot'))
    }
  }

  if (!SUPPORTED_SCOPES.includes(spec.scope)) {
    errs.push(notSupportedError(childPath(specPath, 'scope'), spec.scope, SUPPORTED_SCOPES))
  }

  errs.push(...validateNames(spec.names, childPath(specPath, 'names')))
  errs.push(...validateVersions(spec, specPath))
  errs.push(...validateConversion(spec.conversion, childPath(specPath, 'conversion')))

  const schema = spec.validation?.openAPIV3Schema
  if (schema) {
    const opts: SchemaOptions = { allowDefaults: spec.preserveUnknownFields === false }
    errs.push(...validateRootSchema(schema, childPath(childPath(specPath, 'validation'), 'openAPIV3Schema'), opts))
  }

  const versionNames = new Set(spec.versions.map(v => v.name))
  const storedPath = 'status.storedVersions'
  for (const [i, stored] of crd.status.storedVersions.entries()) {
    if (!versionNames.has(stored)) {
      errs.push(invalidError(indexPath(storedPath, i), stored, 'must appear in spec.versions'))
    }
  }
  const storage = spec.versions.find(v => v.storage)
  if (storage && !crd.status.storedVersions.includes(storage.name)) {
    errs.push(invalidError(storedPath, crd.status.storedVersions, `must have the storage version ${storage.name}`))
  }

  return errs
}
