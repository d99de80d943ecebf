import { AlreadyExistsError, NotFoundError, TransportError } from '~/errors'
import { type KubernetesClient, withSignal } from '~/kube/client'
import {
  describeRef,
  getRegion,
  groupOf,
  type KubeObject,
  type ObjectRef,
  type ObjectType,
  objectRef,
} from '~/kube/objects'
import type { ResolvedResource, WatchEvent, WatchEventType, WatchOptions } from '~/kube/watch'
import { DbaasKinds, RbacKinds } from '~/resources'
import { stableEqual } from '~/utils/stable-json'

export type FakeVerb = 'read' | 'list' | 'create' | 'replace' | 'replaceStatus'

export type WriteRecord = {
  verb: 'create' | 'replace' | 'replaceStatus'
  kind: string
  namespace?: string
  name: string
}

type Failure = {
  verb: FakeVerb
  kind?: string
  error: Error
}

const typeKey = (type: ObjectType) => `${type.kind}.${groupOf(type.apiVersion)}`

const objectKey = (ref: ObjectRef) => `${typeKey(ref)}|${ref.namespace ?? ''}|${ref.name}`

const defaultPlural = (kind: string) => `${kind.toLowerCase()}s`

const NAMESPACED_DEFAULTS: Array<[ObjectType, boolean]> = [
  [DbaasKinds.Provider, false],
  [DbaasKinds.Inventory, true],
  [DbaasKinds.Connection, true],
  [DbaasKinds.Instance, true],
  [DbaasKinds.Tenant, false],
  [RbacKinds.ClusterRole, false],
  [RbacKinds.ClusterRoleBinding, false],
  [RbacKinds.Role, true],
  [RbacKinds.RoleBinding, true],
]

/**
 * In-process API server stand-in. Assigns uids and resource versions, rejects
 * stale writes with a 409, keeps status out of ordinary replaces and treats a
 * write that changes nothing as a no-op without a watch event.
 */
export const createFakeKube = () => {
  const objects = new Map<string, KubeObject>()
  const resources = new Map<string, ResolvedResource>()
  const watchers = new Set<WatchOptions>()
  const failures: Failure[] = []
  const writes: WriteRecord[] = []
  let sequence = 0

  const registerResource = (type: ObjectType, namespaced: boolean, plural = defaultPlural(type.kind)) => {
    resources.set(typeKey(type), { apiVersion: type.apiVersion, kind: type.kind, plural, namespaced })
  }

  for (const [type, namespaced] of NAMESPACED_DEFAULTS) {
    registerResource(type, namespaced)
  }

  const failNext = (verb: FakeVerb, error: Error, kind?: string) => {
    failures.push({ verb, kind, error })
  }

  const takeFailure = (verb: FakeVerb, kind: string) => {
    const index = failures.findIndex((failure) => failure.verb === verb && (!failure.kind || failure.kind === kind))
    if (index === -1) return
    const [failure] = failures.splice(index, 1)
    throw failure.error
  }

  const emit = (type: WatchEventType, object: KubeObject) => {
    const ref = objectRef(object)
    for (const options of watchers) {
      if (typeKey(options.resource) !== typeKey(ref)) continue
      if (options.namespace && options.namespace !== ref.namespace) continue
      const event: WatchEvent = { type, object: structuredClone(object) }
      options.onEvent(event)
    }
  }

  const nextVersion = () => {
    sequence += 1
    return sequence
  }

  const record = (verb: WriteRecord['verb'], ref: ObjectRef) => {
    writes.push(
      ref.namespace
        ? { verb, kind: ref.kind, namespace: ref.namespace, name: ref.name }
        : { verb, kind: ref.kind, name: ref.name },
    )
  }

  const insert = (object: KubeObject) => {
    const ref = objectRef(object)
    const key = objectKey(ref)
    if (objects.has(key)) {
      throw new AlreadyExistsError(`${describeRef(ref)} already exists`)
    }
    const version = nextVersion()
    const stored: KubeObject = structuredClone(object)
    stored.metadata = {
      ...stored.metadata,
      uid: `uid-${version}`,
      resourceVersion: String(version),
      generation: 1,
    }
    objects.set(key, stored)
    emit('ADDED', stored)
    return structuredClone(stored)
  }

  const loadForWrite = (object: KubeObject) => {
    const ref = objectRef(object)
    const stored = objects.get(objectKey(ref))
    if (!stored) {
      throw new NotFoundError(`${describeRef(ref)} not found`)
    }
    const expected = object.metadata?.resourceVersion
    if (expected && expected !== stored.metadata?.resourceVersion) {
      throw new TransportError(`replace ${describeRef(ref)} failed: the object has been modified (status=409)`, {
        statusCode: 409,
      })
    }
    return { ref, stored }
  }

  const commit = (ref: ObjectRef, stored: KubeObject, next: KubeObject, bumpGeneration: boolean) => {
    next.metadata = { ...next.metadata, uid: stored.metadata?.uid, resourceVersion: stored.metadata?.resourceVersion }
    if (stableEqual(next, stored)) {
      return structuredClone(stored)
    }
    const generation = stored.metadata?.generation ?? 1
    next.metadata = {
      ...next.metadata,
      resourceVersion: String(nextVersion()),
      generation: bumpGeneration ? generation + 1 : generation,
    }
    objects.set(objectKey(ref), next)
    emit('MODIFIED', next)
    return structuredClone(next)
  }

  const client: KubernetesClient = {
    read: (ref, signal) =>
      withSignal(signal, async () => {
        takeFailure('read', ref.kind)
        const stored = objects.get(objectKey(ref))
        if (!stored) {
          throw new NotFoundError(`${describeRef(ref)} not found`)
        }
        return structuredClone(stored)
      }),
    list: (type, namespace, signal) =>
      withSignal(signal, async () => {
        takeFailure('list', type.kind)
        return [...objects.values()]
          .filter((object) => typeKey(objectRef(object)) === typeKey(type))
          .filter((object) => !namespace || object.metadata?.namespace === namespace)
          .map((object) => structuredClone(object))
      }),
    create: (object, signal) =>
      withSignal(signal, async () => {
        const ref = objectRef(object)
        takeFailure('create', ref.kind)
        record('create', ref)
        return insert(object)
      }),
    replace: (object, signal) =>
      withSignal(signal, async () => {
        const ref = objectRef(object)
        takeFailure('replace', ref.kind)
        record('replace', ref)
        const { stored } = loadForWrite(object)
        const next: KubeObject = structuredClone(object)
        const status = getRegion(stored, 'status')
        if (status === undefined) {
          delete next.status
        } else {
          next.status = structuredClone(status)
        }
        return commit(ref, stored, next, !stableEqual(getRegion(next, 'spec'), getRegion(stored, 'spec')))
      }),
    replaceStatus: (object, signal) =>
      withSignal(signal, async () => {
        const ref = objectRef(object)
        takeFailure('replaceStatus', ref.kind)
        record('replaceStatus', ref)
        const { stored } = loadForWrite(object)
        const next: KubeObject = structuredClone(stored)
        next.status = structuredClone(getRegion(object, 'status'))
        return commit(ref, stored, next, false)
      }),
    resolveResource: (type, signal) =>
      withSignal(signal, async () => {
        const resource = resources.get(typeKey(type))
        if (!resource) {
          throw new NotFoundError(`no API resource serves ${type.kind} (${type.apiVersion})`)
        }
        return resource
      }),
    watch: (options) => {
      watchers.add(options)
      return {
        stop: () => {
          watchers.delete(options)
        },
      }
    },
  }

  return {
    client,
    writes,
    registerResource,
    failNext,
    /** Stores `object` directly, as another writer would. */
    seed: (object: KubeObject) => insert(object),
    get: (ref: ObjectRef) => {
      const stored = objects.get(objectKey(ref))
      return stored ? structuredClone(stored) : undefined
    },
    remove: (ref: ObjectRef) => {
      const key = objectKey(ref)
      const stored = objects.get(key)
      if (!stored) return false
      objects.delete(key)
      emit('DELETED', stored)
      return true
    },
    /** Overwrites a stored object as another writer would, bumping its resource version. */
    update: (ref: ObjectRef, change: (object: KubeObject) => void) => {
      const key = objectKey(ref)
      const stored = objects.get(key)
      if (!stored) {
        throw new NotFoundError(`${describeRef(ref)} not found`)
      }
      const next = structuredClone(stored)
      change(next)
      next.metadata = { ...next.metadata, resourceVersion: String(nextVersion()) }
      objects.set(key, next)
      emit('MODIFIED', next)
      return structuredClone(next)
    },
    watcherCount: () => watchers.size,
    clearWrites: () => {
      writes.length = 0
    },
  }
}

export type FakeKube = ReturnType<typeof createFakeKube>
