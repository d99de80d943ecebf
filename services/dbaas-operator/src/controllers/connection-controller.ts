import { readReferencedInventory } from '~/controllers/inventory-ref'
import { loadProvider, projectToProvider } from '~/controllers/provider-projection'
import type { Reconciler } from '~/controllers/runtime'
import { isNotFound } from '~/errors'
import type { KubernetesClient } from '~/kube/client'
import { type Logger, logger as rootLogger } from '~/logger'
import {
  ConnectionSchema,
  DbaasKinds,
  type DBaaSConnection,
  ProviderConnectionSchema,
  readResource,
} from '~/resources'

export type ConnectionReconcilerDeps = {
  kube: KubernetesClient
  log?: Logger
}

export const createConnectionReconciler = (deps: ConnectionReconcilerDeps): Reconciler => {
  const { kube } = deps
  const log = (deps.log ?? rootLogger).child({ reconciler: 'connection' })

  return async (request, signal) => {
    let connection: DBaaSConnection
    try {
      connection = await readResource(
        kube,
        { ...DbaasKinds.Connection, name: request.name, namespace: request.namespace },
        ConnectionSchema,
        signal,
      )
    } catch (error) {
      if (isNotFound(error)) {
        log.debug({ request }, 'connection deleted')
        return
      }
      throw error
    }

    const inventory = await readReferencedInventory(kube, connection.spec.inventoryRef, request.namespace, signal)
    const provider = await loadProvider(kube, inventory.spec.providerRef.name, log, signal)
    await projectToProvider({
      kube,
      owner: connection,
      desiredSpec: connection.spec,
      provider,
      role: 'connection',
      childSchema: ProviderConnectionSchema,
      signal,
      log,
    })
  }
}
