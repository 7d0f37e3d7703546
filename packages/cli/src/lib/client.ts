import { copyConstraintTemplate, copyConstraintTemplateList, copyCustomResourceDefinition, pipelineError } from 'shared'
import type { ConstraintTemplate, ConstraintTemplateList, CustomResourceDefinition, PipelineError, Result } from 'shared'
import { TEMPLATE_API_VERSION, TEMPLATE_LIST_KIND } from './crd/constants.js'
import { CrdHelper } from './crd/crd-helper.js'
import { getKind } from './crd/unstructured.js'
import type { TargetRegistry } from './targets.js'

interface TemplateEntry {
  template: ConstraintTemplate
  crd: CustomResourceDefinition
  target: string
}

/**
 * Registered templates keyed by the constraint kind they mint. Stored values
 * are private copies; everything handed out is a copy as well.
 */
export class TemplateClient {
  private readonly entries = new Map<string, TemplateEntry>()

  constructor(
    private readonly targets: TargetRegistry,
    private readonly helper: CrdHelper = new CrdHelper(),
  ) {}

  private compile(templ: ConstraintTemplate): Result<Omit<TemplateEntry, 'template'>, PipelineError> {
    const target = this.targets.resolve(templ)
    if (!target.ok) return target

    const schema = this.helper.createSchema(templ, target.value)
    if (!schema.ok) return schema

    const crd = this.helper.createCRD(templ, schema.value)
    if (!crd.ok) return crd

    const valid = this.helper.validateCRD(crd.value)
    if (!valid.ok) return valid

    return { ok: true, value: { crd: crd.value, target: target.value.name } }
  }

  /** Runs every registration-time check and returns the definition without storing it. */
  createCRD(templ: ConstraintTemplate): Result<CustomResourceDefinition, PipelineError> {
    const compiled = this.compile(templ)
    if (!compiled.ok) return compiled
    return { ok: true, value: compiled.value.crd }
  }

  addTemplate(templ: ConstraintTemplate): Result<CustomResourceDefinition, PipelineError> {
    const compiled = this.compile(templ)
    if (!compiled.ok) return compiled

    const { crd, target } = compiled.value
    this.entries.set(crd.spec.names.kind, { template: copyConstraintTemplate(templ), crd, target })
    return { ok: true, value: copyCustomResourceDefinition(crd) }
  }

  removeTemplate(kind: string): boolean {
    return this.entries.delete(kind)
  }

  getTemplate(kind: string): ConstraintTemplate | undefined {
    const entry = this.entries.get(kind)
    return entry ? copyConstraintTemplate(entry.template) : undefined
  }

  getCRD(kind: string): CustomResourceDefinition | undefined {
    const entry = this.entries.get(kind)
    return entry ? copyCustomResourceDefinition(entry.crd) : undefined
  }

  getTarget(kind: string): string | undefined {
    return this.entries.get(kind)?.target
  }

  listKinds(): string[] {
    return [...this.entries.keys()].sort()
  }

  /** Every registered template, ordered by kind. */
  listTemplates(): ConstraintTemplateList {
    return copyConstraintTemplateList({
      apiVersion: TEMPLATE_API_VERSION,
      kind: TEMPLATE_LIST_KIND,
      metadata: {},
      items: this.listKinds().flatMap(kind => {
        const entry = this.entries.get(kind)
        return entry ? [entry.template] : []
      }),
    })
  }

  /** Validates a constraint against the definition registered for its kind. */
  validateConstraint(cr: unknown): Result<void, PipelineError> {
    const kind = getKind(cr)
    const entry = this.entries.get(kind)
    if (!entry) {
      return { ok: false, error: pipelineError('InstanceKind', `Constraint kind ${kind || '<empty>'} is not recognized`) }
    }
    return this.helper.validateCR(cr, entry.crd)
  }
}
