import { describe, it, expect, beforeAll } from 'vitest'
import type { CustomResourceDefinition, JSONSchemaProps } from 'shared'
import type { SchemaValidator } from '../src/lib/crd/schema-validator.js'
import { CrdHelper, validateTargets } from '../src/lib/crd/crd-helper.js'
import { loadKubernetesTarget } from '../src/lib/targets.js'
import type { MatchSchemaProvider } from '../src/lib/targets.js'
import { DefinitionScheme } from '../src/lib/crd/scheme.js'
import { makeConstraint, makeTarget, makeTemplate } from './fixtures.js'

function mustCreateCRD(helper: CrdHelper, target: MatchSchemaProvider, kind?: string): CustomResourceDefinition {
  const templ = makeTemplate({ kind })
  const schema = helper.createSchema(templ, target)
  if (!schema.ok) throw new Error(schema.error.message)
  const crd = helper.createCRD(templ, schema.value)
  if (!crd.ok) throw new Error(crd.error.message)
  return crd.value
}

describe('validateTargets', () => {
  it('returns the single target name', () => {
    const result = validateTargets(makeTemplate())
    expect(result).toEqual({ ok: true, value: 'admission.k8s.gatekeeper.sh' })
  })

  it('rejects more than one target', () => {
    const result = validateTargets(makeTemplate({ targets: { a: {}, b: {} } }))
    expect(result).toEqual({
      ok: false,
      error: { kind: 'TargetCardinality', message: 'Multi-target templates are not currently supported' },
    })
  })

  it('rejects a missing targets field', () => {
    const result = validateTargets(makeTemplate({ targets: undefined }))
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('Field "targets" not specified in ConstraintTemplate spec')
  })

  it('rejects an empty targets map', () => {
    const result = validateTargets(makeTemplate({ targets: {} }))
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('No targets specified. ConstraintTemplate must specify one target')
  })
})

describe('CrdHelper.createSchema', () => {
  const helper = new CrdHelper()

  it('places match, enforcementAction and parameters under spec', () => {
    const result = helper.createSchema(makeTemplate(), makeTarget())
    expect(result.ok).toBe(true)
    if (!result.ok) return
    const props = result.value.properties?.spec?.properties
    expect(Object.keys(props ?? {})).toEqual(['match', 'enforcementAction', 'parameters'])
    expect(props?.enforcementAction).toEqual({ type: 'string' })
    expect(props?.parameters).toEqual({
      properties: {
        labels: { type: 'array', items: { schema: { type: 'string' } } },
      },
    })
    expect(props?.match).toEqual(makeTarget().matchSchema())
  })

  it('omits parameters when the template declares no schema', () => {
    const result = helper.createSchema(makeTemplate({ parameters: null }), makeTarget())
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(Object.keys(result.value.properties?.spec?.properties ?? {})).toEqual(['match', 'enforcementAction'])
  })

  it('checks the target count before anything else', () => {
    const result = helper.createSchema(makeTemplate({ targets: {}, parameters: JSON.parse('{"type": 5}') }), makeTarget())
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.kind).toBe('TargetCardinality')
  })

  it('reports a malformed parameter schema', () => {
    const templ = makeTemplate()
    templ.spec.crd.spec.validation = { openAPIV3Schema: JSON.parse('{"type": 5}') }
    const result = helper.createSchema(templ, makeTarget())
    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'SchemaConversion',
        message: 'spec.crd.spec.validation.openAPIV3Schema: invalid schema document: /type: must be string',
      },
    })
  })

  it('keeps a parameter named __proto__', () => {
    const templ = makeTemplate({ parameters: JSON.parse('{"properties": {"__proto__": {"type": "string"}}}') })
    const result = helper.createSchema(templ, makeTarget())
    expect(result.ok).toBe(true)
    if (!result.ok) return
    const parameters = result.value.properties?.spec?.properties?.parameters
    expect(Object.keys(parameters?.properties ?? {})).toEqual(['__proto__'])
    expect(parameters?.properties?.['__proto__']).toEqual({ type: 'string' })
  })

  it('does not share the match schema with the provider', () => {
    const target = makeTarget()
    const result = helper.createSchema(makeTemplate(), target)
    if (!result.ok) throw new Error(result.error.message)
    const match = result.value.properties?.spec?.properties?.match
    if (match) match.type = 'string'
    expect(target.matchSchema().type).toBe('object')
  })
})

describe('CrdHelper.createCRD', () => {
  const helper = new CrdHelper()

  it('builds a cluster-scoped definition in the constraints group', () => {
    const crd = mustCreateCRD(helper, makeTarget())
    expect(crd.metadata.name).toBe('k8srequiredlabels.constraints.gatekeeper.sh')
    expect(crd.spec.group).toBe('constraints.gatekeeper.sh')
    expect(crd.spec.scope).toBe('Cluster')
    expect(crd.spec.names).toEqual({
      kind: 'K8sRequiredLabels',
      listKind: 'K8sRequiredLabelsList',
      plural: 'k8srequiredlabels',
      singular: 'k8srequiredlabels',
      categories: ['all', 'constraint'],
    })
  })

  it('serves v1beta1 as storage and v1alpha1 as legacy', () => {
    const crd = mustCreateCRD(helper, makeTarget())
    expect(crd.spec.version).toBe('v1beta1')
    expect(crd.spec.versions).toEqual([
      { name: 'v1beta1', served: true, storage: true },
      { name: 'v1alpha1', served: true, storage: false },
    ])
  })

  it('applies platform defaults during the round trip', () => {
    const crd = mustCreateCRD(helper, makeTarget())
    expect(crd.spec.conversion).toEqual({ strategy: 'None' })
    expect(crd.spec.preserveUnknownFields).toBe(true)
    expect(crd.status.storedVersions).toEqual(['v1beta1'])
  })

  it('produces equal definitions for equal input', () => {
    expect(mustCreateCRD(helper, makeTarget())).toEqual(mustCreateCRD(helper, makeTarget()))
  })

  it('leaves the template and the composed schema untouched', () => {
    const templ = makeTemplate()
    const schema = helper.createSchema(templ, makeTarget())
    if (!schema.ok) throw new Error(schema.error.message)
    const templBefore = JSON.stringify(templ)
    const schemaBefore = JSON.stringify(schema.value)

    const crd = helper.createCRD(templ, schema.value)
    expect(crd.ok).toBe(true)
    if (!crd.ok) return
    expect(JSON.stringify(templ)).toBe(templBefore)
    expect(JSON.stringify(schema.value)).toBe(schemaBefore)
    expect(crd.value.spec.validation?.openAPIV3Schema).not.toBe(schema.value)
    expect(crd.value.spec.validation?.openAPIV3Schema).toEqual(schema.value)
  })

  it('reports a schema the external form cannot express', () => {
    const schema: JSONSchemaProps = {
      items: { schema: { type: 'string' }, jsonSchemas: [{ type: 'string' }] },
    }
    const result = helper.createCRD(makeTemplate(), schema)
    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'DefinitionRoundTrip',
        message: 'converting to v1beta1: spec.validation.openAPIV3Schema.items: holds both a schema and a list of schemas',
      },
    })
  })
})

describe('CrdHelper.validateCRD', () => {
  const helper = new CrdHelper()

  it('accepts a synthesized definition', () => {
    expect(helper.validateCRD(mustCreateCRD(helper, makeTarget()))).toEqual({ ok: true, value: undefined })
  })

  it('rejects kinds that do not yield valid resource names', () => {
    const result = helper.validateCRD(mustCreateCRD(helper, makeTarget(), 'Bad_Kind'))
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('DefinitionValidation')
    expect(result.error.fieldErrors?.map(e => e.field)).toEqual([
      'spec.names.plural',
      'spec.names.singular',
      'spec.names.kind',
      'spec.names.listKind',
    ])
    expect(result.error.message.startsWith('[spec.names.plural: Invalid value: "bad_kind": ')).toBe(true)
  })
})

describe('CrdHelper.validateCR', () => {
  const helper = new CrdHelper()
  let crd: CustomResourceDefinition

  beforeAll(async () => {
    const target = await loadKubernetesTarget(new DefinitionScheme())
    if (!target.ok) throw new Error(target.error)
    crd = mustCreateCRD(helper, target.value)
  })

  it('accepts a conforming constraint', () => {
    expect(helper.validateCR(makeConstraint(), crd)).toEqual({ ok: true, value: undefined })
  })

  it('accepts the legacy version', () => {
    const cr = makeConstraint({ apiVersion: 'constraints.gatekeeper.sh/v1alpha1' })
    expect(helper.validateCR(cr, crd).ok).toBe(true)
  })

  it('accepts a constraint without a spec', () => {
    const cr = makeConstraint()
    delete cr.spec
    expect(helper.validateCR(cr, crd).ok).toBe(true)
  })

  it('reports parameters of the wrong type', () => {
    const cr = makeConstraint({ spec: { parameters: { labels: 'owner' } } })
    const result = helper.validateCR(cr, crd)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('InstanceSchema')
    expect(result.error.message).toBe('spec.parameters.labels: Invalid value: "owner": must be array')
  })

  it('reports a non-string enforcementAction', () => {
    const result = helper.validateCR(makeConstraint({ spec: { enforcementAction: 5 } }), crd)
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('spec.enforcementAction: Invalid value: 5: must be string')
  })

  it('reports an unsupported match scope', () => {
    const result = helper.validateCR(makeConstraint({ spec: { match: { scope: 'Everything' } } }), crd)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe(
        'spec.match.scope: Unsupported value: "Everything": supported values: "*", "Cluster", "Namespaced"',
      )
    }
  })

  it('aggregates several schema errors', () => {
    const cr = makeConstraint({ spec: { enforcementAction: 5, parameters: { labels: 'owner' } } })
    const result = helper.validateCR(cr, crd)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.fieldErrors).toHaveLength(2)
    expect(result.error.message.startsWith('[')).toBe(true)
    expect(result.error.message.endsWith(']')).toBe(true)
  })

  it('checks a parameter named __proto__', () => {
    const templ = makeTemplate({ kind: 'ProtoCheck', parameters: JSON.parse('{"properties": {"__proto__": {"type": "string"}}}') })
    const schema = helper.createSchema(templ, makeTarget())
    if (!schema.ok) throw new Error(schema.error.message)
    const protoCRD = helper.createCRD(templ, schema.value)
    if (!protoCRD.ok) throw new Error(protoCRD.error.message)

    const cr = makeConstraint({ kind: 'ProtoCheck', spec: { parameters: JSON.parse('{"__proto__": 5}') } })
    const result = helper.validateCR(cr, protoCRD.value)
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('spec.parameters.__proto__: Invalid value: 5: must be string')
  })

  it('reports a malformed date-time parameter', () => {
    const templ = makeTemplate({ kind: 'SinceCheck', parameters: { properties: { since: { type: 'string', format: 'date-time' } } } })
    const schema = helper.createSchema(templ, makeTarget())
    if (!schema.ok) throw new Error(schema.error.message)
    const sinceCRD = helper.createCRD(templ, schema.value)
    if (!sinceCRD.ok) throw new Error(sinceCRD.error.message)

    const valid = makeConstraint({ kind: 'SinceCheck', spec: { parameters: { since: '2024-05-01T10:00:00Z' } } })
    expect(helper.validateCR(valid, sinceCRD.value).ok).toBe(true)

    const invalid = makeConstraint({ kind: 'SinceCheck', spec: { parameters: { since: 'not-a-date' } } })
    const result = helper.validateCR(invalid, sinceCRD.value)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('InstanceSchema')
      expect(result.error.message).toBe('spec.parameters.since: Invalid value: "not-a-date": must match format "date-time"')
    }
  })

  it('reports an invalid name with every violation', () => {
    const result = helper.validateCR(makeConstraint({ name: 'Bad_Name' }), crd)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('InstanceName')
    expect(result.error.details).toHaveLength(2)
    expect(result.error.details?.[1]).toBe('contains disallowed characters: "B", "_", "N"')
    expect(result.error.message).toBe(`Invalid Name: ${result.error.details?.join('\n')}`)
  })

  it('reports a missing name', () => {
    const cr = makeConstraint()
    cr.metadata = {}
    const result = helper.validateCR(cr, crd)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('InstanceName')
      expect(result.error.details).toHaveLength(1)
    }
  })

  it('reports the wrong kind', () => {
    const result = helper.validateCR(makeConstraint({ kind: 'OtherKind' }), crd)
    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'InstanceKind',
        message: 'Wrong kind for constraint must-have-owner. Have OtherKind, want K8sRequiredLabels',
      },
    })
  })

  it('reports the wrong group', () => {
    const result = helper.validateCR(makeConstraint({ apiVersion: 'example.com/v1beta1' }), crd)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('InstanceGroup')
      expect(result.error.message).toBe('Wrong group for constraint must-have-owner. Have example.com, want constraints.gatekeeper.sh')
    }
  })

  it('reports an unsupported version', () => {
    const result = helper.validateCR(makeConstraint({ apiVersion: 'constraints.gatekeeper.sh/v1' }), crd)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('InstanceVersion')
      expect(result.error.message).toBe('Wrong version for constraint must-have-owner. Have v1, supported: v1beta1, v1alpha1')
    }
  })

  it('checks the schema before the name', () => {
    const cr = makeConstraint({ name: 'Bad_Name', spec: { enforcementAction: 5 } })
    const result = helper.validateCR(cr, crd)
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.kind).toBe('InstanceSchema')
  })

  it('checks the name before the kind', () => {
    const result = helper.validateCR(makeConstraint({ name: 'Bad_Name', kind: 'OtherKind' }), crd)
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.kind).toBe('InstanceName')
  })

  it('checks the kind before the group', () => {
    const result = helper.validateCR(makeConstraint({ kind: 'OtherKind', apiVersion: 'example.com/v1' }), crd)
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.kind).toBe('InstanceKind')
  })

  it('reports a validator that cannot be built', () => {
    const failing = new CrdHelper({
      validatorFactory: { buildValidator: () => ({ ok: false, error: 'Failed to compile schema: test' }) },
    })
    expect(failing.validateCR(makeConstraint(), crd)).toEqual({
      ok: false,
      error: { kind: 'ValidatorConstruction', message: 'Failed to compile schema: test' },
    })
  })

  it('uses the injected validator factory', () => {
    const seen: unknown[] = []
    const recording: SchemaValidator = { validate: doc => { seen.push(doc); return [] } }
    const custom = new CrdHelper({ validatorFactory: { buildValidator: () => ({ ok: true, value: recording }) } })
    const cr = makeConstraint({ spec: { enforcementAction: 5 } })
    expect(custom.validateCR(cr, crd).ok).toBe(true)
    expect(seen).toEqual([cr])
  })
})
