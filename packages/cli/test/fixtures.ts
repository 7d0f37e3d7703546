import { mkdtemp, mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import type { ConstraintTemplate, ExternalJSONSchemaProps } from 'shared'
import { StaticMatchSchemaProvider } from '../src/lib/targets.js'

export const TARGET = 'admission.k8s.gatekeeper.sh'

export const LABELS_PARAMETERS: ExternalJSONSchemaProps = {
  properties: {
    labels: {
      type: 'array',
      items: { type: 'string' },
    },
  },
}

export function makeTemplate(overrides: { kind?: string; parameters?: ExternalJSONSchemaProps | null; targets?: ConstraintTemplate['spec']['targets'] } = {}): ConstraintTemplate {
  const kind = overrides.kind ?? 'K8sRequiredLabels'
  const template: ConstraintTemplate = {
    apiVersion: 'templates.gatekeeper.sh/v1beta1',
    kind: 'ConstraintTemplate',
    metadata: { name: kind.toLowerCase() },
    spec: {
      crd: { spec: { names: { kind } } },
      targets: 'targets' in overrides ? overrides.targets : { [TARGET]: { rego: 'package k8srequiredlabels' } },
    },
  }
  if (overrides.parameters !== null) {
    template.spec.crd.spec.validation = { openAPIV3Schema: overrides.parameters ?? LABELS_PARAMETERS }
  }
  return template
}

export function makeTarget(name = TARGET): StaticMatchSchemaProvider {
  return new StaticMatchSchemaProvider(name, {
    type: 'object',
    properties: {
      namespaces: { type: 'array', items: { schema: { type: 'string' } } },
      scope: { type: 'string', enum: ['*', 'Cluster', 'Namespaced'] },
    },
  })
}

export function makeConstraint(overrides: { apiVersion?: string; kind?: string; name?: string; spec?: unknown } = {}): Record<string, unknown> {
  return {
    apiVersion: overrides.apiVersion ?? 'constraints.gatekeeper.sh/v1beta1',
    kind: overrides.kind ?? 'K8sRequiredLabels',
    metadata: { name: overrides.name ?? 'must-have-owner' },
    spec: overrides.spec ?? { parameters: { labels: ['owner'] } },
  }
}

export const TEMPLATE_YAML = `
apiVersion: templates.gatekeeper.sh/v1beta1
kind: ConstraintTemplate
metadata:
  name: k8srequiredlabels
spec:
  crd:
    spec:
      names:
        kind: K8sRequiredLabels
      validation:
        openAPIV3Schema:
          properties:
            labels:
              type: array
              items:
                type: string
  targets:
    admission.k8s.gatekeeper.sh:
      rego: |
        package k8srequiredlabels
        violation[{"msg": msg}] { false }
`

export async function createWorkDir(files: Record<string, string>): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'ctpl-test-'))
  for (const [filePath, content] of Object.entries(files)) {
    const fullPath = join(dir, filePath)
    const parentDir = fullPath.substring(0, fullPath.lastIndexOf('/'))
    await mkdir(parentDir, { recursive: true })
    await writeFile(fullPath, content)
  }
  return dir
}
