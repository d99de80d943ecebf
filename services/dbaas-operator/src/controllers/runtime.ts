import { formatError } from '~/errors'
import type { KubernetesClient } from '~/kube/client'
import type { KubeObject, ObjectType } from '~/kube/objects'
import type { WatchEvent, WatchHandle } from '~/kube/watch'
import { type Logger, logger as rootLogger } from '~/logger'
import { recordReconcile } from '~/metrics'

export type ReconcileRequest = {
  namespace: string
  name: string
}

export type Reconciler = (request: ReconcileRequest, signal: AbortSignal) => Promise<void>

export type WatchRegistration = ObjectType & {
  /** May look up related objects; a failed lookup is logged and the event is dropped. */
  toRequests: (event: WatchEvent) => ReconcileRequest[] | Promise<ReconcileRequest[]>
}

export type Controller = {
  name: string
  enqueue: (request: ReconcileRequest) => void
  /** Resolves to `false` when the kind is already watched by this controller. */
  watch: (registration: WatchRegistration) => Promise<boolean>
  watchedKinds: () => string[]
  idle: () => Promise<void>
  stop: () => void
}

export type ControllerOptions = {
  name: string
  kube: KubernetesClient
  reconcile: Reconciler
  namespaces: string[] | null
  requeueDelayMs: number
  watchRestartDelayMs: number
  log?: Logger
}

export const requestKey = (request: ReconcileRequest) =>
  request.namespace ? `${request.namespace}/${request.name}` : request.name

export const requestForObject = (object: KubeObject): ReconcileRequest[] => {
  const name = object.metadata?.name
  if (!name) return []
  return [{ namespace: object.metadata?.namespace ?? '', name }]
}

const watchKey = (type: ObjectType) => `${type.kind}.${type.apiVersion}`

/**
 * Work queue for one reconciler. Requests for the same object run one at a
 * time and collapse while waiting; different objects run concurrently. A
 * failed request is enqueued again after a fixed delay.
 */
export const createController = (options: ControllerOptions): Controller => {
  const { name, kube, reconcile, namespaces, requeueDelayMs, watchRestartDelayMs } = options
  const log = (options.log ?? rootLogger).child({ controller: name })

  const queues = new Map<string, Promise<void>>()
  const pending = new Set<string>()
  const mappings = new Set<Promise<void>>()
  const watches = new Map<string, WatchHandle[]>()
  const requeueTimers = new Set<NodeJS.Timeout>()
  const lifecycle = new AbortController()
  let stopped = false

  const scheduleRequeue = (request: ReconcileRequest) => {
    const timer = setTimeout(() => {
      requeueTimers.delete(timer)
      enqueue(request)
    }, requeueDelayMs)
    requeueTimers.add(timer)
  }

  const run = async (request: ReconcileRequest) => {
    pending.delete(requestKey(request))
    if (stopped) return
    try {
      await reconcile(request, lifecycle.signal)
      recordReconcile(name, 'success')
    } catch (error) {
      recordReconcile(name, 'error')
      if (stopped) return
      log.warn({ err: error, request: requestKey(request) }, `reconcile failed: ${formatError(error)}`)
      scheduleRequeue(request)
    }
  }

  const enqueue = (request: ReconcileRequest) => {
    if (stopped) return
    const key = requestKey(request)
    if (pending.has(key)) return
    pending.add(key)
    const current = queues.get(key) ?? Promise.resolve()
    const next = current.then(() => run(request))
    queues.set(key, next)
    void next.finally(() => {
      if (queues.get(key) === next) queues.delete(key)
    })
  }

  const enqueueAll = (requests: ReconcileRequest[]) => {
    for (const request of requests) enqueue(request)
  }

  const mapEvent = (registration: WatchRegistration, event: WatchEvent) => {
    const onError = (error: unknown) =>
      log.warn({ err: error, kind: registration.kind }, `mapping watch event failed: ${formatError(error)}`)
    let mapped: ReconcileRequest[] | Promise<ReconcileRequest[]>
    try {
      mapped = registration.toRequests(event)
    } catch (error) {
      onError(error)
      return
    }
    if (Array.isArray(mapped)) {
      enqueueAll(mapped)
      return
    }
    const pendingMapping = mapped.then(enqueueAll, onError)
    mappings.add(pendingMapping)
    void pendingMapping.finally(() => mappings.delete(pendingMapping))
  }

  const watch = async (registration: WatchRegistration) => {
    const key = watchKey(registration)
    if (stopped || watches.has(key)) return false
    watches.set(key, [])
    try {
      const resource = await kube.resolveResource(registration, lifecycle.signal)
      const scopes: Array<string | undefined> = resource.namespaced && namespaces ? namespaces : [undefined]
      const handles = scopes.map((namespace) =>
        kube.watch({
          resource,
          namespace,
          restartDelayMs: watchRestartDelayMs,
          onEvent: (event) => mapEvent(registration, event),
          onError: (error) => log.warn({ err: error, kind: registration.kind }, 'watch failed'),
        }),
      )
      if (stopped) {
        for (const handle of handles) handle.stop()
        return false
      }
      watches.set(key, handles)
      log.info({ kind: registration.kind, namespaces: namespaces ?? ['*'] }, 'watch started')
      return true
    } catch (error) {
      watches.delete(key)
      throw error
    }
  }

  const idle = async () => {
    while (queues.size > 0 || mappings.size > 0) {
      await Promise.all([...mappings, ...queues.values()])
    }
  }

  const stop = () => {
    stopped = true
    lifecycle.abort(new Error(`controller ${name} stopped`))
    for (const timer of requeueTimers) clearTimeout(timer)
    requeueTimers.clear()
    for (const handles of watches.values()) {
      for (const handle of handles) handle.stop()
    }
    watches.clear()
    pending.clear()
  }

  return {
    name,
    enqueue,
    watch,
    watchedKinds: () => [...watches.keys()],
    idle,
    stop,
  }
}
