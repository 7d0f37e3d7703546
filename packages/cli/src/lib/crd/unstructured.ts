// Accessors for untyped resource documents such as submitted constraints.

export type Unstructured = Record<string, unknown>

export function isUnstructured(value: unknown): value is Unstructured {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function stringField(obj: unknown, ...path: string[]): string {
  let current: unknown = obj
  for (const key of path) {
    if (!isUnstructured(current)) return ''
    current = current[key]
  }
  return typeof current === 'string' ? current : ''
}

export function getName(obj: unknown): string {
  return stringField(obj, 'metadata', 'name')
}

export function getKind(obj: unknown): string {
  return stringField(obj, 'kind')
}

export function getAPIVersion(obj: unknown): string {
  return stringField(obj, 'apiVersion')
}

export interface GroupVersion {
  group: string
  version: string
}

/** "group/version" or a bare "version" for the core group; anything else is empty. */
export function parseGroupVersion(apiVersion: string): GroupVersion {
  const parts = apiVersion.split('/')
  if (parts.length === 1) return { group: '', version: apiVersion }
  if (parts.length === 2) return { group: parts[0] ?? '', version: parts[1] ?? '' }
  return { group: '', version: '' }
}
