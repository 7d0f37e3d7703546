import { aggregateFieldErrors, copyJSONSchemaProps, pipelineError } from 'shared'
import type {
  ConstraintTemplate,
  CustomResourceDefinition,
  JSONSchemaProps,
  PipelineError,
  Result,
} from 'shared'
import type { MatchSchemaProvider } from '../targets.js'
import {
  CONSTRAINT_CATEGORIES,
  CONSTRAINT_GROUP,
  LEGACY_VERSION,
  STORAGE_VERSION,
  SUPPORTED_VERSIONS,
} from './constants.js'
import { validateCustomResourceDefinition } from './definition-validation.js'
import { isDNS1123Subdomain } from './names.js'
import { DefinitionScheme } from './scheme.js'
import { AjvSchemaValidatorFactory, type SchemaValidatorFactory } from './schema-validator.js'
import { getAPIVersion, getKind, getName, parseGroupVersion } from './unstructured.js'

/**
 * Ensures the template declares exactly one target and returns its name.
 */
export function validateTargets(templ: ConstraintTemplate): Result<string, PipelineError> {
  const targets = templ.spec.targets
  const names = Object.keys(targets ?? {})
  if (names.length > 1) {
    return { ok: false, error: pipelineError('TargetCardinality', 'Multi-target templates are not currently supported') }
  }
  if (targets === undefined) {
    return { ok: false, error: pipelineError('TargetCardinality', 'Field "targets" not specified in ConstraintTemplate spec') }
  }
  const [name] = names
  if (name === undefined) {
    return { ok: false, error: pipelineError('TargetCardinality', 'No targets specified. ConstraintTemplate must specify one target') }
  }
  return { ok: true, value: name }
}

export interface CrdHelperOptions {
  scheme?: DefinitionScheme
  validatorFactory?: SchemaValidatorFactory
}

/**
 * Turns templates into constraint resource definitions and checks
 * constraints against them. Build it once and share it; it never mutates the
 * templates, schemas or definitions passed in.
 */
export class CrdHelper {
  private readonly scheme: DefinitionScheme
  private readonly validatorFactory: SchemaValidatorFactory

  constructor(options: CrdHelperOptions = {}) {
    this.scheme = options.scheme ?? new DefinitionScheme()
    this.validatorFactory = options.validatorFactory ?? new AjvSchemaValidatorFactory()
  }

  /**
   * Combines the target's match schema with the template's parameters to form
   * the schema of the constraint resource.
   */
  createSchema(templ: ConstraintTemplate, target: MatchSchemaProvider): Result<JSONSchemaProps, PipelineError> {
    const targets = validateTargets(templ)
    if (!targets.ok) return targets

    const props: Record<string, JSONSchemaProps> = {
      match: copyJSONSchemaProps(target.matchSchema()),
      enforcementAction: { type: 'string' },
    }
    const parameters = templ.spec.crd.spec.validation?.openAPIV3Schema
    if (parameters) {
      const converted = this.scheme.convertSchema(parameters)
      if (!converted.ok) {
        return {
          ok: false,
          error: pipelineError('SchemaConversion', `spec.crd.spec.validation.openAPIV3Schema: ${converted.error}`),
        }
      }
      props.parameters = converted.value
    }

    return {
      ok: true,
      value: {
        properties: {
          spec: { properties: props },
        },
      },
    }
  }

  /** Wraps a composed schema in a resource definition with platform defaults applied. */
  createCRD(templ: ConstraintTemplate, schema: JSONSchemaProps): Result<CustomResourceDefinition, PipelineError> {
    const kind = templ.spec.crd.spec.names.kind
    const crd: CustomResourceDefinition = {
      metadata: {},
      spec: {
        group: CONSTRAINT_GROUP,
        names: {
          kind,
          listKind: `${kind}List`,
          plural: kind.toLowerCase(),
          singular: kind.toLowerCase(),
          categories: [...CONSTRAINT_CATEGORIES],
        },
        validation: { openAPIV3Schema: schema },
        scope: 'Cluster',
        version: STORAGE_VERSION,
        versions: [
          { name: STORAGE_VERSION, served: true, storage: true },
          { name: LEGACY_VERSION, served: true, storage: false },
        ],
      },
      status: { storedVersions: [] },
    }

    // Defaulting only exists for the v1beta1 form
    const external = this.scheme.toExternal(crd)
    if (!external.ok) {
      return { ok: false, error: pipelineError('DefinitionRoundTrip', `converting to ${STORAGE_VERSION}: ${external.error}`) }
    }
    const defaulted = this.scheme.applyDefaults(external.value)
    const internal = this.scheme.toInternal(defaulted)
    if (!internal.ok) {
      return { ok: false, error: pipelineError('DefinitionRoundTrip', `converting from ${STORAGE_VERSION}: ${internal.error}`) }
    }

    const result = internal.value
    result.metadata.name = `${crd.spec.names.plural}.${CONSTRAINT_GROUP}`
    return { ok: true, value: result }
  }

  validateCRD(crd: CustomResourceDefinition): Result<void, PipelineError> {
    const errs = validateCustomResourceDefinition(crd)
    if (errs.length > 0) {
      return { ok: false, error: aggregateFieldErrors('DefinitionValidation', errs) }
    }
    return { ok: true, value: undefined }
  }

  /** Validates a constraint document against the definition minted for its kind. */
  validateCR(cr: unknown, crd: CustomResourceDefinition): Result<void, PipelineError> {
    const validator = this.validatorFactory.buildValidator(crd.spec.validation)
    if (!validator.ok) {
      return { ok: false, error: pipelineError('ValidatorConstruction', validator.error) }
    }
    const schemaErrs = validator.value.validate(cr)
    if (schemaErrs.length > 0) {
      return { ok: false, error: aggregateFieldErrors('InstanceSchema', schemaErrs) }
    }

    const name = getName(cr)
    const nameErrs = isDNS1123Subdomain(name)
    if (nameErrs.length > 0) {
      return {
        ok: false,
        error: pipelineError('InstanceName', `Invalid Name: ${nameErrs.join('\n')}`, { details: nameErrs }),
      }
    }

    const kind = getKind(cr)
    if (kind !== crd.spec.names.kind) {
      return {
        ok: false,
        error: pipelineError('InstanceKind', `Wrong kind for constraint ${name}. Have ${kind}, want ${crd.spec.names.kind}`),
      }
    }

    const { group, version } = parseGroupVersion(getAPIVersion(cr))
    if (group !== CONSTRAINT_GROUP) {
      return {
        ok: false,
        error: pipelineError('InstanceGroup', `Wrong group for constraint ${name}. Have ${group}, want ${CONSTRAINT_GROUP}`),
      }
    }
    if (!SUPPORTED_VERSIONS.includes(version)) {
      return {
        ok: false,
        error: pipelineError('InstanceVersion', `Wrong version for constraint ${name}. Have ${version}, supported: ${SUPPORTED_VERSIONS.join(', ')}`),
      }
    }
    return { ok: true, value: undefined }
  }
}
