import type { Controller, Reconciler } from '~/controllers/runtime'
import { getProvider, type ProviderRole, resolveProviderKind } from '~/engine/provider-registry'
import { type OwnerType, watchOwnedKind } from '~/engine/watch-binder'
import { isNotFound } from '~/errors'
import type { KubernetesClient } from '~/kube/client'
import { type Logger, logger as rootLogger } from '~/logger'
import { DbaasKinds, type DBaaSProvider } from '~/resources'

export const OwnerTypes = {
  Inventory: { ...DbaasKinds.Inventory, namespaced: true },
  Connection: { ...DbaasKinds.Connection, namespaced: true },
  Instance: { ...DbaasKinds.Instance, namespaced: true },
  Tenant: { ...DbaasKinds.Tenant, namespaced: false },
} satisfies Record<string, OwnerType>

export type ProjectionControllers = Record<ProviderRole, Controller>

export type ProviderReconcilerDeps = {
  kube: KubernetesClient
  controllers: ProjectionControllers
  log?: Logger
}

const OWNER_TYPES: Record<ProviderRole, OwnerType> = {
  inventory: OwnerTypes.Inventory,
  connection: OwnerTypes.Connection,
  instance: OwnerTypes.Instance,
}

const ROLES: ProviderRole[] = ['inventory', 'connection', 'instance']

/**
 * Each registered provider names the kinds that back inventories, connections
 * and instances. Those kinds only become watchable once a provider declares
 * them, so watches are bound here rather than at startup.
 */
export const createProviderReconciler = (deps: ProviderReconcilerDeps): Reconciler => {
  const { kube, controllers } = deps
  const log = (deps.log ?? rootLogger).child({ reconciler: 'provider' })

  return async (request, signal) => {
    let provider: DBaaSProvider
    try {
      provider = await getProvider(kube, request.name, signal)
    } catch (error) {
      if (isNotFound(error)) {
        log.debug({ request }, 'provider deleted')
        return
      }
      throw error
    }

    for (const role of ROLES) {
      const controller = controllers[role]
      const kind = resolveProviderKind(provider, role)
      const bound = await watchOwnedKind(controller, OWNER_TYPES[role], kind)
      if (bound) {
        log.info({ provider: request.name, kind, controller: controller.name }, 'watching provider kind')
      }
    }
  }
}
