export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

export type ValidationError = {
  path: string
  message: string
}

export type JSONValue = string | number | boolean | null | JSONValue[] | { [key: string]: JSONValue }

export interface ObjectMeta {
  name?: string
  labels?: Record<string, string>
  annotations?: Record<string, string>
}

// ---------------------------------------------------------------------------
// Schema documents
// ---------------------------------------------------------------------------

export interface ExternalDocumentation {
  description?: string
  url?: string
}

/** Fields shared verbatim by the internal and the versioned schema forms. */
export interface SchemaCommon {
  id?: string
  $schema?: string
  $ref?: string
  description?: string
  type?: string
  format?: string
  title?: string
  default?: JSONValue
  maximum?: number
  exclusiveMaximum?: boolean
  minimum?: number
  exclusiveMinimum?: boolean
  maxLength?: number
  minLength?: number
  pattern?: string
  maxItems?: number
  minItems?: number
  uniqueItems?: boolean
  multipleOf?: number
  enum?: JSONValue[]
  maxProperties?: number
  minProperties?: number
  required?: string[]
  example?: JSONValue
  nullable?: boolean
  externalDocs?: ExternalDocumentation
}

/**
 * Internal schema representation used throughout the pipeline.
 * `items`, `additionalProperties` and `additionalItems` are normalised into
 * tagged wrappers and the `x-kubernetes-*` extensions become plain fields.
 */
export interface JSONSchemaProps extends SchemaCommon {
  items?: JSONSchemaPropsOrArray
  allOf?: JSONSchemaProps[]
  oneOf?: JSONSchemaProps[]
  anyOf?: JSONSchemaProps[]
  not?: JSONSchemaProps
  properties?: Record<string, JSONSchemaProps>
  patternProperties?: Record<string, JSONSchemaProps>
  additionalProperties?: JSONSchemaPropsOrBool
  additionalItems?: JSONSchemaPropsOrBool
  xPreserveUnknownFields?: boolean
  xEmbeddedResource?: boolean
  xIntOrString?: boolean
  xListMapKeys?: string[]
  xListType?: string
}

export interface JSONSchemaPropsOrArray {
  schema?: JSONSchemaProps
  jsonSchemas?: JSONSchemaProps[]
}

export interface JSONSchemaPropsOrBool {
  allows: boolean
  schema?: JSONSchemaProps
}

/** The authored (apiextensions v1beta1) form of a schema document. */
export interface ExternalJSONSchemaProps extends SchemaCommon {
  items?: ExternalJSONSchemaProps | ExternalJSONSchemaProps[]
  allOf?: ExternalJSONSchemaProps[]
  oneOf?: ExternalJSONSchemaProps[]
  anyOf?: ExternalJSONSchemaProps[]
  not?: ExternalJSONSchemaProps
  properties?: Record<string, ExternalJSONSchemaProps>
  patternProperties?: Record<string, ExternalJSONSchemaProps>
  additionalProperties?: boolean | ExternalJSONSchemaProps
  additionalItems?: boolean | ExternalJSONSchemaProps
  'x-kubernetes-preserve-unknown-fields'?: boolean
  'x-kubernetes-embedded-resource'?: boolean
  'x-kubernetes-int-or-string'?: boolean
  'x-kubernetes-list-map-keys'?: string[]
  'x-kubernetes-list-type'?: string
}

// ---------------------------------------------------------------------------
// ConstraintTemplate
// ---------------------------------------------------------------------------

export interface ConstraintTemplate {
  apiVersion: string
  kind: string
  metadata: ObjectMeta
  spec: ConstraintTemplateSpec
  status?: ConstraintTemplateStatus
}

export interface ListMeta {
  resourceVersion?: string
  continue?: string
}

export interface ConstraintTemplateList {
  apiVersion: string
  kind: string
  metadata: ListMeta
  items: ConstraintTemplate[]
}

export interface ConstraintTemplateSpec {
  crd: CRD
  targets?: Record<string, Target>
}

export interface CRD {
  spec: CRDSpec
}

export interface CRDSpec {
  names: CRDNames
  validation?: Validation
}

export interface CRDNames {
  kind: string
}

export interface Validation {
  openAPIV3Schema?: ExternalJSONSchemaProps
}

/** Policy source for one target. Opaque to schema synthesis. */
export interface Target {
  rego?: string
  libs?: string[]
}

export interface ConstraintTemplateStatus {
  created?: boolean
}

// ---------------------------------------------------------------------------
// CustomResourceDefinition, internal form
// ---------------------------------------------------------------------------

export interface CustomResourceDefinition {
  metadata: ObjectMeta
  spec: CustomResourceDefinitionSpec
  status: CustomResourceDefinitionStatus
}

export interface CustomResourceDefinitionSpec {
  group: string
  version: string
  names: CustomResourceDefinitionNames
  scope: string
  validation?: CustomResourceValidation
  versions: CustomResourceDefinitionVersion[]
  conversion?: CustomResourceConversion
  preserveUnknownFields?: boolean
}

export interface CustomResourceDefinitionNames {
  plural: string
  singular: string
  shortNames?: string[]
  kind: string
  listKind: string
  categories?: string[]
}

export interface CustomResourceValidation {
  openAPIV3Schema?: JSONSchemaProps
}

export interface CustomResourceDefinitionVersion {
  name: string
  served: boolean
  storage: boolean
}

export interface CustomResourceConversion {
  strategy: string
  webhookClientConfig?: WebhookClientConfig
}

export interface WebhookClientConfig {
  url?: string
  service?: ServiceReference
  caBundle?: string
}

export interface ServiceReference {
  namespace: string
  name: string
  path?: string
  port?: number
}

export interface CustomResourceDefinitionStatus {
  acceptedNames?: CustomResourceDefinitionNames
  storedVersions: string[]
}

// ---------------------------------------------------------------------------
// CustomResourceDefinition, apiextensions.k8s.io/v1beta1 form
// ---------------------------------------------------------------------------

export interface CustomResourceDefinitionV1Beta1 {
  apiVersion: string
  kind: string
  metadata: ObjectMeta
  spec: CustomResourceDefinitionSpecV1Beta1
  status?: CustomResourceDefinitionStatusV1Beta1
}

export interface CustomResourceDefinitionSpecV1Beta1 {
  group: string
  version?: string
  names: CustomResourceDefinitionNamesV1Beta1
  scope?: string
  validation?: { openAPIV3Schema?: ExternalJSONSchemaProps }
  versions?: CustomResourceDefinitionVersion[]
  conversion?: CustomResourceConversion
  preserveUnknownFields?: boolean
}

export interface CustomResourceDefinitionNamesV1Beta1 {
  plural: string
  singular?: string
  shortNames?: string[]
  kind: string
  listKind?: string
  categories?: string[]
}

export interface CustomResourceDefinitionStatusV1Beta1 {
  acceptedNames?: CustomResourceDefinitionNamesV1Beta1
  storedVersions?: string[]
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export type FieldErrorType =
  | 'FieldValueRequired'
  | 'FieldValueInvalid'
  | 'FieldValueNotSupported'
  | 'FieldValueForbidden'
  | 'FieldValueDuplicate'

export interface FieldError {
  type: FieldErrorType
  field: string
  badValue?: unknown
  detail?: string
  supported?: string[]
}

export type PipelineErrorKind =
  | 'TargetCardinality'
  | 'TargetNotFound'
  | 'SchemaConversion'
  | 'DefinitionRoundTrip'
  | 'DefinitionValidation'
  | 'ValidatorConstruction'
  | 'InstanceSchema'
  | 'InstanceName'
  | 'InstanceKind'
  | 'InstanceGroup'
  | 'InstanceVersion'

export interface PipelineError {
  kind: PipelineErrorKind
  message: string
  fieldErrors?: FieldError[]
  details?: string[]
}
