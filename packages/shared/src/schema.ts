export const JSON_SCHEMA_PROPS_ID = 'https://ctpl.dev/schemas/json-schema-props.json'

const schemaRef = { $ref: JSON_SCHEMA_PROPS_ID } as const

const schemaOrBool = {
  anyOf: [{ type: 'boolean' }, schemaRef],
} as const

const schemaList = {
  type: 'array',
  items: schemaRef,
} as const

const schemaMap = {
  type: 'object',
  additionalProperties: schemaRef,
} as const

const stringList = {
  type: 'array',
  items: { type: 'string' },
} as const

/**
 * Structural shape of an authored OpenAPI v3 schema document
 * (apiextensions v1beta1 JSONSchemaProps).
 */
export const jsonSchemaPropsSchema = {
  $id: JSON_SCHEMA_PROPS_ID,
  type: 'object',
  properties: {
    id: { type: 'string' },
    $schema: { type: 'string' },
    $ref: { type: 'string' },
    description: { type: 'string' },
    type: { type: 'string' },
    format: { type: 'string' },
    title: { type: 'string' },
    default: {},
    maximum: { type: 'number' },
    exclusiveMaximum: { type: 'boolean' },
    minimum: { type: 'number' },
    exclusiveMinimum: { type: 'boolean' },
    maxLength: { type: 'integer', minimum: 0 },
    minLength: { type: 'integer', minimum: 0 },
    pattern: { type: 'string' },
    maxItems: { type: 'integer', minimum: 0 },
    minItems: { type: 'integer', minimum: 0 },
    uniqueItems: { type: 'boolean' },
    multipleOf: { type: 'number' },
    enum: { type: 'array' },
    maxProperties: { type: 'integer', minimum: 0 },
    minProperties: { type: 'integer', minimum: 0 },
    required: stringList,
    items: {
      anyOf: [schemaRef, schemaList],
    },
    allOf: schemaList,
    oneOf: schemaList,
    anyOf: schemaList,
    not: schemaRef,
    properties: schemaMap,
    patternProperties: schemaMap,
    additionalProperties: schemaOrBool,
    additionalItems: schemaOrBool,
    externalDocs: {
      type: 'object',
      properties: {
        description: { type: 'string' },
        url: { type: 'string' },
      },
      additionalProperties: false,
    },
    example: {},
    nullable: { type: 'boolean' },
    'x-kubernetes-preserve-unknown-fields': { type: 'boolean' },
    'x-kubernetes-embedded-resource': { type: 'boolean' },
    'x-kubernetes-int-or-string': { type: 'boolean' },
    'x-kubernetes-list-map-keys': stringList,
    'x-kubernetes-list-type': { type: 'string' },
  },
  additionalProperties: false,
} as const

const stringMap = {
  type: 'object',
  additionalProperties: { type: 'string' },
} as const

export const constraintTemplateSchema = {
  type: 'object',
  required: ['apiVersion', 'kind', 'metadata', 'spec'],
  properties: {
    apiVersion: {
      type: 'string',
      pattern: '^templates\\.gatekeeper\\.sh/v1(alpha1|beta1)$',
    },
    kind: { const: 'ConstraintTemplate' },
    metadata: {
      type: 'object',
      properties: {
        name: { type: 'string' },
        labels: stringMap,
        annotations: stringMap,
      },
    },
    spec: {
      type: 'object',
      required: ['crd'],
      properties: {
        crd: {
          type: 'object',
          required: ['spec'],
          properties: {
            spec: {
              type: 'object',
              required: ['names'],
              properties: {
                names: {
                  type: 'object',
                  required: ['kind'],
                  properties: {
                    kind: { type: 'string', minLength: 1 },
                  },
                  additionalProperties: false,
                },
                validation: {
                  type: 'object',
                  properties: {
                    openAPIV3Schema: schemaRef,
                  },
                  additionalProperties: false,
                },
              },
              additionalProperties: false,
            },
          },
          additionalProperties: false,
        },
        targets: {
          type: 'object',
          additionalProperties: {
            type: 'object',
            properties: {
              rego: { type: 'string' },
              libs: stringList,
            },
            additionalProperties: false,
          },
        },
      },
      additionalProperties: false,
    },
    status: {
      type: 'object',
      properties: {
        created: { type: 'boolean' },
      },
    },
  },
} as const

export const ctplConfigSchema = {
  type: 'object',
  properties: {
    targets: {
      type: 'object',
      additionalProperties: { type: 'string', minLength: 1 },
    },
  },
  additionalProperties: false,
} as const
