import type { KubernetesClient } from '~/kube/client'
import { DbaasKinds, type DBaaSProvider, ProviderSchema, readResource } from '~/resources'

export type ProviderRole = 'inventory' | 'connection' | 'instance'

/**
 * Reads the provider registration by name. Nothing is cached: a provider that
 * registers later is picked up by the next call.
 */
export const getProvider = (kube: KubernetesClient, name: string, signal?: AbortSignal): Promise<DBaaSProvider> =>
  readResource(kube, { ...DbaasKinds.Provider, name }, ProviderSchema, signal)

export const resolveProviderKind = (provider: DBaaSProvider, role: ProviderRole) => {
  switch (role) {
    case 'inventory':
      return provider.spec.inventoryKind
    case 'connection':
      return provider.spec.connectionKind
    case 'instance':
      return provider.spec.instanceKind
  }
}
