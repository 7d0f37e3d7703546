/** API group every synthesized constraint kind is registered under. */
export const CONSTRAINT_GROUP = 'constraints.gatekeeper.sh'

/** Served and storage version of synthesized constraint kinds. */
export const STORAGE_VERSION = 'v1beta1'

/** Still served for constraints written against the earlier API. */
export const LEGACY_VERSION = 'v1alpha1'

export const SUPPORTED_VERSIONS: readonly string[] = [STORAGE_VERSION, LEGACY_VERSION]

export const CRD_API_VERSION = 'apiextensions.k8s.io/v1beta1'
export const CRD_KIND = 'CustomResourceDefinition'

export const CONSTRAINT_CATEGORIES: readonly string[] = ['all', 'constraint']

export const TEMPLATE_API_VERSION = 'templates.gatekeeper.sh/v1beta1'
export const TEMPLATE_LIST_KIND = 'ConstraintTemplateList'
