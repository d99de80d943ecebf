import type { V1ObjectMeta, V1OwnerReference } from '@kubernetes/client-node'

export const DBAAS_GROUP = 'dbaas.io'
export const DBAAS_VERSION = 'v1alpha1'
export const DBAAS_API_VERSION = `${DBAAS_GROUP}/${DBAAS_VERSION}`

export type ObjectMeta = V1ObjectMeta
export type OwnerReference = V1OwnerReference

/** Untyped object as it travels to and from the API server. */
export type KubeObject = {
  apiVersion?: string
  kind?: string
  metadata?: ObjectMeta
  [region: string]: unknown
}

export type ObjectType = {
  apiVersion: string
  kind: string
}

export type ObjectRef = ObjectType & {
  name: string
  namespace?: string
}

/** Handle for a child object whose kind is only known at runtime. */
export type DynamicObject = KubeObject & {
  apiVersion: string
  kind: string
  metadata: ObjectMeta & { name: string }
}

export const asString = (value: unknown) => (typeof value === 'string' && value.trim().length > 0 ? value.trim() : null)

export const asRecord = (value: unknown) =>
  value && typeof value === 'object' && !Array.isArray(value) ? (value as Record<string, unknown>) : null

export const readNested = (value: unknown, path: string[]) => {
  let cursor: unknown = value
  for (const key of path) {
    if (!cursor || typeof cursor !== 'object' || Array.isArray(cursor)) return null
    cursor = (cursor as Record<string, unknown>)[key]
  }
  return cursor ?? null
}

export const isKubeObject = (value: unknown): value is KubeObject => {
  const record = asRecord(value)
  if (!record) return false
  if (record.apiVersion !== undefined && typeof record.apiVersion !== 'string') return false
  if (record.kind !== undefined && typeof record.kind !== 'string') return false
  return record.metadata === undefined || asRecord(record.metadata) !== null
}

export const groupOf = (apiVersion: string) => {
  const slash = apiVersion.indexOf('/')
  return slash === -1 ? '' : apiVersion.slice(0, slash)
}

export const versionOf = (apiVersion: string) => {
  const slash = apiVersion.indexOf('/')
  return slash === -1 ? apiVersion : apiVersion.slice(slash + 1)
}

export const describeRef = (ref: ObjectRef) =>
  ref.namespace ? `${ref.kind} ${ref.namespace}/${ref.name}` : `${ref.kind} ${ref.name}`

export const describeObject = (object: KubeObject) => {
  const kind = object.kind ?? 'object'
  const name = object.metadata?.name ?? '<unnamed>'
  return object.metadata?.namespace ? `${kind} ${object.metadata.namespace}/${name}` : `${kind} ${name}`
}

export const objectRef = (object: KubeObject): ObjectRef => {
  const apiVersion = asString(object.apiVersion)
  const kind = asString(object.kind)
  const name = asString(object.metadata?.name)
  if (!apiVersion || !kind || !name) {
    throw new Error(`${describeObject(object)} is missing apiVersion, kind or metadata.name`)
  }
  const namespace = asString(object.metadata?.namespace)
  return namespace ? { apiVersion, kind, name, namespace } : { apiVersion, kind, name }
}

export const newDynamicObject = (kind: string, owner: KubeObject, apiVersion = DBAAS_API_VERSION): DynamicObject => {
  const name = owner.metadata?.name ?? ''
  const namespace = owner.metadata?.namespace
  return {
    apiVersion,
    kind,
    metadata: namespace ? { name, namespace } : { name },
  }
}

export const getRegion = (object: KubeObject, region: string): unknown => object[region]

export const setRegion = (object: KubeObject, region: string, value: unknown) => {
  object[region] = value
}

// Swaps the contents of `target` in place so closures holding it observe the new state.
export const replaceContents = (target: KubeObject, source: KubeObject) => {
  for (const key of Object.keys(target)) {
    delete target[key]
  }
  Object.assign(target, source)
}
