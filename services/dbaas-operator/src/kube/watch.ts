import { type KubeConfig, Watch } from '@kubernetes/client-node'

import { isKubeObject, type KubeObject } from '~/kube/objects'

export type ResolvedResource = {
  apiVersion: string
  kind: string
  plural: string
  namespaced: boolean
}

export type WatchEventType = 'ADDED' | 'MODIFIED' | 'DELETED'

export type WatchEvent = {
  type: WatchEventType
  object: KubeObject
}

export type WatchOptions = {
  resource: ResolvedResource
  namespace?: string
  restartDelayMs?: number
  onEvent: (event: WatchEvent) => void
  onError?: (error: Error) => void
}

export type WatchHandle = {
  stop: () => void
}

const DEFAULT_RESTART_DELAY_MS = 2_000

const WATCH_EVENT_TYPES: readonly string[] = ['ADDED', 'MODIFIED', 'DELETED']

const isWatchEventType = (value: string): value is WatchEventType => WATCH_EVENT_TYPES.includes(value)

const toError = (error: unknown) => (error instanceof Error ? error : new Error(String(error)))

export const buildResourcePath = (resource: ResolvedResource, namespace?: string) => {
  const base = resource.apiVersion.includes('/') ? `/apis/${resource.apiVersion}` : `/api/${resource.apiVersion}`
  if (resource.namespaced && namespace) {
    return `${base}/namespaces/${namespace}/${resource.plural}`
  }
  return `${base}/${resource.plural}`
}

export const startResourceWatch = (kubeConfig: KubeConfig, options: WatchOptions): WatchHandle => {
  const { resource, namespace, restartDelayMs = DEFAULT_RESTART_DELAY_MS, onEvent, onError } = options
  const watcher = new Watch(kubeConfig)
  const path = buildResourcePath(resource, namespace)

  let stopped = false
  let request: AbortController | null = null
  let restartTimer: NodeJS.Timeout | null = null

  const scheduleRestart = () => {
    if (stopped) return
    if (restartTimer) clearTimeout(restartTimer)
    restartTimer = setTimeout(() => {
      restartTimer = null
      start()
    }, restartDelayMs)
  }

  const handleEvent = (phase: string, payload: unknown) => {
    if (phase === 'BOOKMARK') return
    if (!isWatchEventType(phase)) {
      onError?.(new Error(`${resource.kind} watch (${path}) received ${phase}: ${JSON.stringify(payload)}`))
      return
    }
    if (!isKubeObject(payload)) return
    onEvent({ type: phase, object: payload })
  }

  const start = () => {
    if (stopped) return
    void watcher
      .watch(path, { allowWatchBookmarks: true }, handleEvent, (error: unknown) => {
        request = null
        if (stopped) return
        if (error) {
          onError?.(toError(error))
        }
        scheduleRestart()
      })
      .then((controller) => {
        if (stopped) {
          controller.abort()
          return
        }
        request = controller
      })
      .catch((error: unknown) => {
        onError?.(toError(error))
        scheduleRestart()
      })
  }

  start()

  return {
    stop: () => {
      stopped = true
      if (restartTimer) clearTimeout(restartTimer)
      restartTimer = null
      if (request) {
        request.abort()
        request = null
      }
    },
  }
}
