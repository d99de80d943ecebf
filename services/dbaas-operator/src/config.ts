import { ConfigurationError, formatError } from '~/errors'
import { dedupPreserveOrder } from '~/utils/string-lists'

export const INSTALL_NAMESPACE_ENV = 'INSTALL_NAMESPACE'
export const WATCH_NAMESPACES_ENV = 'DBAAS_WATCH_NAMESPACES'

export type OperatorConfig = {
  installNamespace: string
  /** `null` watches every namespace. */
  watchNamespaces: string[] | null
  requeueDelayMs: number
  watchRestartDelayMs: number
}

const DEFAULT_REQUEUE_DELAY_MS = 5_000
const DEFAULT_WATCH_RESTART_DELAY_MS = 2_000

const DNS_LABEL_REGEX = /^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/

export const isValidDnsLabel = (value: string) => DNS_LABEL_REGEX.test(value)

const parseNumberEnv = (value: string | undefined, fallback: number, min = 0) => {
  if (!value) return fallback
  const parsed = Number.parseInt(value, 10)
  if (!Number.isFinite(parsed) || parsed < min) return fallback
  return parsed
}

const parseNamespacesJson = (raw: string): string[] => {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new ConfigurationError(`invalid ${WATCH_NAMESPACES_ENV} JSON: ${formatError(error)}`)
  }
  if (!Array.isArray(parsed) || parsed.some((item) => typeof item !== 'string')) {
    throw new ConfigurationError(`${WATCH_NAMESPACES_ENV} must be a JSON array of strings`)
  }
  return parsed
    .filter((item): item is string => typeof item === 'string')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
}

const parseNamespacesCsv = (raw: string) =>
  raw
    .split(',')
    .map((value) => value.trim())
    .filter((value) => value.length > 0)

const parseWatchNamespaces = (raw: string | undefined): string[] | null => {
  if (raw == null) return null
  const trimmed = raw.trim()
  if (trimmed === '') {
    throw new ConfigurationError(`${WATCH_NAMESPACES_ENV} is set but empty`)
  }
  const namespaces = dedupPreserveOrder(
    trimmed.startsWith('[') ? parseNamespacesJson(trimmed) : parseNamespacesCsv(trimmed),
  )
  if (namespaces.length === 0) {
    throw new ConfigurationError(`${WATCH_NAMESPACES_ENV} namespaces cannot be empty`)
  }
  if (namespaces.includes('*')) {
    if (namespaces.length > 1) {
      throw new ConfigurationError(`${WATCH_NAMESPACES_ENV} cannot mix '*' with named namespaces`)
    }
    return null
  }
  for (const namespace of namespaces) {
    if (!isValidDnsLabel(namespace)) {
      throw new ConfigurationError(`${WATCH_NAMESPACES_ENV} namespace '${namespace}' must be a valid DNS label`)
    }
  }
  return namespaces
}

const resolveInstallNamespace = (env: NodeJS.ProcessEnv) => {
  const raw = env[INSTALL_NAMESPACE_ENV]
  if (raw === undefined) {
    throw new ConfigurationError(`${INSTALL_NAMESPACE_ENV} must be set`)
  }
  const namespace = raw.trim()
  if (!isValidDnsLabel(namespace)) {
    throw new ConfigurationError(`${INSTALL_NAMESPACE_ENV} '${raw}' must be a valid DNS label`)
  }
  return namespace
}

/** Reads the operator settings once at startup. */
export const loadOperatorConfig = (env: NodeJS.ProcessEnv = process.env): OperatorConfig => ({
  installNamespace: resolveInstallNamespace(env),
  watchNamespaces: parseWatchNamespaces(env[WATCH_NAMESPACES_ENV]),
  requeueDelayMs: parseNumberEnv(env.DBAAS_REQUEUE_DELAY_MS, DEFAULT_REQUEUE_DELAY_MS),
  watchRestartDelayMs: parseNumberEnv(env.DBAAS_WATCH_RESTART_DELAY_MS, DEFAULT_WATCH_RESTART_DELAY_MS),
})
