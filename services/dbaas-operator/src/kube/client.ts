import { ApiException, CustomObjectsApi, KubeConfig, KubernetesObjectApi } from '@kubernetes/client-node'

import {
  AlreadyExistsError,
  abortedError,
  formatError,
  isStoreError,
  NotFoundError,
  TransportError,
} from '~/errors'
import {
  describeObject,
  describeRef,
  groupOf,
  isKubeObject,
  type KubeObject,
  type ObjectRef,
  type ObjectType,
  objectRef,
  versionOf,
} from '~/kube/objects'
import { type ResolvedResource, startResourceWatch, type WatchHandle, type WatchOptions } from '~/kube/watch'

/**
 * Declarative store surface the operator depends on. Every call is a fresh
 * round trip; conflicts and staleness come back as ordinary errors.
 */
export type KubernetesClient = {
  read: (ref: ObjectRef, signal?: AbortSignal) => Promise<KubeObject>
  list: (type: ObjectType, namespace?: string | null, signal?: AbortSignal) => Promise<KubeObject[]>
  create: (object: KubeObject, signal?: AbortSignal) => Promise<KubeObject>
  replace: (object: KubeObject, signal?: AbortSignal) => Promise<KubeObject>
  replaceStatus: (object: KubeObject, signal?: AbortSignal) => Promise<KubeObject>
  resolveResource: (type: ObjectType, signal?: AbortSignal) => Promise<ResolvedResource>
  watch: (options: WatchOptions) => WatchHandle
}

type Verb = 'read' | 'list' | 'create' | 'replace' | 'replace status' | 'discover'

const getStatusCode = (error: unknown): number | null => {
  if (error instanceof ApiException) return error.code
  if (!(error instanceof Error)) return null
  if ('code' in error && typeof error.code === 'number') return error.code
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode
  return null
}

export const toStoreError = (error: unknown, verb: Verb, target: string): Error => {
  if (isStoreError(error)) return error
  const statusCode = getStatusCode(error)
  if (statusCode === 404) {
    return new NotFoundError(`${target} not found`, { cause: error })
  }
  if (statusCode === 409 && verb === 'create') {
    return new AlreadyExistsError(`${target} already exists`, { cause: error })
  }
  const suffix = statusCode ? ` (status=${statusCode})` : ''
  return new TransportError(`${verb} ${target} failed: ${formatError(error)}${suffix}`, {
    cause: error,
    statusCode,
  })
}

/**
 * Rejects as soon as `signal` aborts. The underlying request is abandoned,
 * not cancelled: a write already sent may still be committed by the API
 * server, and the next reconcile observes whatever it stored.
 */
export const withSignal = async <T>(signal: AbortSignal | undefined, run: () => Promise<T>): Promise<T> => {
  if (!signal) return run()
  if (signal.aborted) throw abortedError(signal)
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortedError(signal))
    signal.addEventListener('abort', onAbort, { once: true })
    void run()
      .then(resolve, reject)
      .finally(() => signal.removeEventListener('abort', onAbort))
  })
}

const requireObject = (value: unknown, context: string): KubeObject => {
  if (isKubeObject(value)) return value
  throw new TransportError(`${context} returned an unexpected payload`)
}

const loadDefaultKubeConfig = () => {
  const kubeConfig = new KubeConfig()
  kubeConfig.loadFromDefault()
  return kubeConfig
}

export const createKubernetesClient = (kubeConfig: KubeConfig = loadDefaultKubeConfig()): KubernetesClient => {
  const objects = KubernetesObjectApi.makeApiClient(kubeConfig)
  const customObjects = kubeConfig.makeApiClient(CustomObjectsApi)

  const call = async <T>(verb: Verb, target: string, signal: AbortSignal | undefined, run: () => Promise<T>) => {
    try {
      return await withSignal(signal, run)
    } catch (error) {
      throw toStoreError(error, verb, target)
    }
  }

  const resolveResource = async (type: ObjectType, signal?: AbortSignal): Promise<ResolvedResource> => {
    const target = `${type.kind} (${type.apiVersion})`
    const resource = await call('discover', target, signal, () => objects.resource(type.apiVersion, type.kind))
    if (!resource) {
      throw new NotFoundError(`no API resource serves ${target}`)
    }
    return { apiVersion: type.apiVersion, kind: type.kind, plural: resource.name, namespaced: resource.namespaced }
  }

  return {
    read: async (ref, signal) => {
      const target = describeRef(ref)
      const metadata = ref.namespace ? { name: ref.name, namespace: ref.namespace } : { name: ref.name }
      const object = await call('read', target, signal, () =>
        objects.read<KubeObject>({ apiVersion: ref.apiVersion, kind: ref.kind, metadata }),
      )
      return requireObject(object, `read ${target}`)
    },
    list: async (type, namespace, signal) => {
      const target = namespace ? `${type.kind} in ${namespace}` : type.kind
      const list = await call('list', target, signal, () =>
        objects.list<KubeObject>(type.apiVersion, type.kind, namespace ?? undefined),
      )
      return list.items.filter(isKubeObject)
    },
    create: async (object, signal) => {
      const target = describeObject(object)
      const created = await call('create', target, signal, () => objects.create(object))
      return requireObject(created, `create ${target}`)
    },
    replace: async (object, signal) => {
      const target = describeObject(object)
      const replaced = await call('replace', target, signal, () => objects.replace(object))
      return requireObject(replaced, `replace ${target}`)
    },
    replaceStatus: async (object, signal) => {
      const ref = objectRef(object)
      const target = describeRef(ref)
      const resource = await resolveResource(ref, signal)
      const group = groupOf(ref.apiVersion)
      const version = versionOf(ref.apiVersion)
      const stored: unknown = await call('replace status', target, signal, () =>
        resource.namespaced && ref.namespace
          ? customObjects.replaceNamespacedCustomObjectStatus({
              group,
              version,
              namespace: ref.namespace,
              plural: resource.plural,
              name: ref.name,
              body: object,
            })
          : customObjects.replaceClusterCustomObjectStatus({
              group,
              version,
              plural: resource.plural,
              name: ref.name,
              body: object,
            }),
      )
      return requireObject(stored, `replace status ${target}`)
    },
    resolveResource,
    watch: (options) => startResourceWatch(kubeConfig, options),
  }
}

export const __test = {
  getStatusCode,
}
