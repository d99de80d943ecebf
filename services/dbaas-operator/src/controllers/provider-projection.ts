import type { Schema } from 'effect'

import { reconcileChild } from '~/engine/projection'
import { getProvider, type ProviderRole, resolveProviderKind } from '~/engine/provider-registry'
import { decodeObject, syncStatus } from '~/engine/status'
import { isNotFound } from '~/errors'
import type { KubernetesClient } from '~/kube/client'
import { describeObject, type KubeObject, setRegion } from '~/kube/objects'
import type { Logger } from '~/logger'
import type { DBaaSProvider } from '~/resources'

type ProjectionInput<A extends { readonly status?: unknown }, I> = {
  kube: KubernetesClient
  owner: KubeObject
  desiredSpec: unknown
  provider: DBaaSProvider
  role: ProviderRole
  childSchema: Schema.Schema<A, I, never>
  signal?: AbortSignal
  log: Logger
}

export const loadProvider = async (kube: KubernetesClient, name: string, log: Logger, signal?: AbortSignal) => {
  try {
    return await getProvider(kube, name, signal)
  } catch (error) {
    if (isNotFound(error)) {
      log.info({ provider: name }, 'provider not yet available')
    }
    throw error
  }
}

/**
 * Projects the owner's spec onto its provider object for `role` and copies
 * the provider object's status back onto the owner.
 */
export const projectToProvider = async <A extends { readonly status?: unknown }, I>(
  input: ProjectionInput<A, I>,
) => {
  const { kube, owner, desiredSpec, provider, role, childSchema, signal, log } = input
  const kind = resolveProviderKind(provider, role)
  const { result, object } = await reconcileChild(kube, owner, desiredSpec, kind, signal)
  if (result !== 'unchanged') {
    log.info({ owner: describeObject(owner), kind, result }, 'provider object reconciled')
  }
  await syncStatus(
    kube,
    owner,
    () => {
      const providerObject = decodeObject(object, childSchema)
      setRegion(owner, 'status', providerObject.status ?? {})
    },
    signal,
  )
  return result
}
