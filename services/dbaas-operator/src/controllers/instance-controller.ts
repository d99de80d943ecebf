import { readReferencedInventory } from '~/controllers/inventory-ref'
import { loadProvider, projectToProvider } from '~/controllers/provider-projection'
import type { Reconciler } from '~/controllers/runtime'
import { isNotFound } from '~/errors'
import type { KubernetesClient } from '~/kube/client'
import { type Logger, logger as rootLogger } from '~/logger'
import { DbaasKinds, type DBaaSInstance, InstanceSchema, ProviderInstanceSchema, readResource } from '~/resources'

export type InstanceReconcilerDeps = {
  kube: KubernetesClient
  log?: Logger
}

export const createInstanceReconciler = (deps: InstanceReconcilerDeps): Reconciler => {
  const { kube } = deps
  const log = (deps.log ?? rootLogger).child({ reconciler: 'instance' })

  return async (request, signal) => {
    let instance: DBaaSInstance
    try {
      instance = await readResource(
        kube,
        { ...DbaasKinds.Instance, name: request.name, namespace: request.namespace },
        InstanceSchema,
        signal,
      )
    } catch (error) {
      if (isNotFound(error)) {
        log.debug({ request }, 'instance deleted')
        return
      }
      throw error
    }

    const inventory = await readReferencedInventory(kube, instance.spec.inventoryRef, request.namespace, signal)
    const provider = await loadProvider(kube, inventory.spec.providerRef.name, log, signal)
    await projectToProvider({
      kube,
      owner: instance,
      desiredSpec: instance.spec,
      provider,
      role: 'instance',
      childSchema: ProviderInstanceSchema,
      signal,
      log,
    })
  }
}
