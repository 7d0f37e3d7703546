import { describe, it, expect, afterEach, vi } from 'vitest'
import { rm } from 'node:fs/promises'
import { join } from 'node:path'
import { parse as parseYaml } from 'yaml'
import { compileCommand } from '../src/commands/compile.js'
import { targetsCommand } from '../src/commands/targets.js'
import { validateCommand } from '../src/commands/validate.js'
import { verifyCommand } from '../src/commands/verify.js'
import { TEMPLATE_YAML, createWorkDir } from './fixtures.js'

const CONSTRAINTS_YAML = `
apiVersion: constraints.gatekeeper.sh/v1beta1
kind: K8sRequiredLabels
metadata:
  name: must-have-owner
spec:
  parameters:
    labels: ["owner"]
---
apiVersion: constraints.gatekeeper.sh/v1beta1
kind: K8sRequiredLabels
metadata:
  name: broken
spec:
  parameters:
    labels: owner
`

describe('commands', () => {
  const dirs: string[] = []

  afterEach(async () => {
    vi.restoreAllMocks()
    for (const d of dirs) await rm(d, { recursive: true, force: true })
    dirs.length = 0
  })

  async function workDir(files: Record<string, string>): Promise<string> {
    const dir = await createWorkDir(files)
    dirs.push(dir)
    vi.spyOn(process, 'cwd').mockReturnValue(dir)
    vi.spyOn(console, 'error').mockImplementation(() => {})
    return dir
  }

  describe('compile', () => {
    it('prints the definition as YAML', async () => {
      const dir = await workDir({ 'template.yaml': TEMPLATE_YAML })
      const log = vi.spyOn(console, 'log').mockImplementation(() => {})
      const result = await compileCommand(join(dir, 'template.yaml'), {})
      expect(result.ok).toBe(true)
      if (!result.ok) return
      expect(result.value.metadata.name).toBe('k8srequiredlabels.constraints.gatekeeper.sh')
      expect(log).toHaveBeenCalledTimes(1)
      expect(parseYaml(String(log.mock.calls[0]?.[0]))).toEqual(result.value)
    })

    it('prints JSON on request', async () => {
      const dir = await workDir({ 'template.yaml': TEMPLATE_YAML })
      const log = vi.spyOn(console, 'log').mockImplementation(() => {})
      const result = await compileCommand(join(dir, 'template.yaml'), { json: true })
      if (!result.ok) throw new Error(result.error)
      expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toEqual(result.value)
    })

    it('reports a missing template', async () => {
      const dir = await workDir({})
      const path = join(dir, 'missing.yaml')
      expect(await compileCommand(path, {})).toEqual({ ok: false, error: `${path}: File not found: ${path}` })
    })

    it('reports pipeline errors with their kind', async () => {
      const dir = await workDir({ 'template.yaml': TEMPLATE_YAML.replace('admission.k8s.gatekeeper.sh:', 'other.target:') })
      expect(await compileCommand(join(dir, 'template.yaml'), {})).toEqual({
        ok: false,
        error: '[TargetNotFound] Target "other.target" not found',
      })
    })
  })

  describe('verify', () => {
    it('returns the verification result', async () => {
      const dir = await workDir({ 'template.yaml': TEMPLATE_YAML })
      const result = await verifyCommand(join(dir, 'template.yaml'), {})
      expect(result.ok).toBe(true)
      if (result.ok) expect(result.value.passed).toBe(true)
    })

    it('reports config errors before verifying', async () => {
      const dir = await workDir({ 'template.yaml': TEMPLATE_YAML })
      const result = await verifyCommand(join(dir, 'template.yaml'), { config: 'nope.yaml' })
      expect(result).toEqual({ ok: false, error: `Config file not found: ${join(dir, 'nope.yaml')}` })
    })
  })

  describe('validate', () => {
    it('validates every constraint in the file', async () => {
      const dir = await workDir({ 'template.yaml': TEMPLATE_YAML, 'constraints.yaml': CONSTRAINTS_YAML })
      const result = await validateCommand(join(dir, 'constraints.yaml'), { template: join(dir, 'template.yaml') })
      expect(result.ok).toBe(true)
      if (!result.ok) return
      expect(result.value.summary).toEqual({ valid: 1, invalid: 1 })
      expect(result.value.results).toEqual([
        { name: 'must-have-owner', kind: 'K8sRequiredLabels', valid: true },
        {
          name: 'broken',
          kind: 'K8sRequiredLabels',
          valid: false,
          errorKind: 'InstanceSchema',
          message: 'spec.parameters.labels: Invalid value: "owner": must be array',
        },
      ])
    })

    it('rejects a template that fails registration', async () => {
      const dir = await workDir({
        'template.yaml': TEMPLATE_YAML.replace('admission.k8s.gatekeeper.sh:', 'other.target:'),
        'constraints.yaml': CONSTRAINTS_YAML,
      })
      const result = await validateCommand(join(dir, 'constraints.yaml'), { template: join(dir, 'template.yaml') })
      expect(result).toEqual({ ok: false, error: 'Template rejected: [TargetNotFound] Target "other.target" not found' })
    })
  })

  describe('targets', () => {
    it('lists the built-in and configured targets', async () => {
      await workDir({
        'ctpl.yaml': 'targets:\n  custom.target: custom.yaml\n',
        'custom.yaml': 'type: object\n',
      })
      const log = vi.spyOn(console, 'log').mockImplementation(() => {})
      const result = await targetsCommand({})
      expect(result).toEqual({ ok: true, value: ['admission.k8s.gatekeeper.sh', 'custom.target'] })
      expect(log.mock.calls.map(c => c[0])).toEqual(['admission.k8s.gatekeeper.sh', 'custom.target'])
    })
  })
})
