import type { KubernetesClient } from '~/kube/client'
import { DbaasKinds, type DBaaSInventory, InventorySchema, readResource } from '~/resources'

type InventoryReference = {
  readonly name: string
  readonly namespace?: string
}

/** Loads the inventory a connection or instance points at; the namespace defaults to the referrer's. */
export const readReferencedInventory = (
  kube: KubernetesClient,
  reference: InventoryReference,
  referrerNamespace: string,
  signal?: AbortSignal,
): Promise<DBaaSInventory> =>
  readResource(
    kube,
    { ...DbaasKinds.Inventory, name: reference.name, namespace: reference.namespace || referrerNamespace },
    InventorySchema,
    signal,
  )
