import type { OperatorConfig } from '~/config'
import { upsertCondition } from '~/controllers/conditions'
import { loadProvider, projectToProvider } from '~/controllers/provider-projection'
import { type Reconciler, type ReconcileRequest, requestForObject } from '~/controllers/runtime'
import { syncStatus } from '~/engine/status'
import { isNotFound } from '~/errors'
import type { KubernetesClient } from '~/kube/client'
import { asString, type KubeObject, readNested, setRegion } from '~/kube/objects'
import { type Logger, logger as rootLogger } from '~/logger'
import {
  DbaasKinds,
  type DBaaSInventory,
  InventorySchema,
  ProviderInventorySchema,
  readResource,
} from '~/resources'
import { stableEqual } from '~/utils/stable-json'
import { contains, dedupPreserveOrder } from '~/utils/string-lists'

export const SPEC_SYNCED_CONDITION = 'SpecSynced'
export const INVALID_NAMESPACE_REASON = 'InvalidNamespace'

export type InventoryReconcilerDeps = {
  kube: KubernetesClient
  config: OperatorConfig
  log?: Logger
  nowIso?: () => string
}

/** Namespaces where inventories may live: the install namespace plus every tenant's inventory namespace. */
export const listInventoryNamespaces = async (
  kube: KubernetesClient,
  installNamespace: string,
  signal?: AbortSignal,
) => {
  const tenants = await kube.list(DbaasKinds.Tenant, null, signal)
  const tenantNamespaces = tenants
    .map((tenant) => asString(readNested(tenant, ['spec', 'inventoryNamespace'])))
    .filter((namespace): namespace is string => namespace !== null)
  return dedupPreserveOrder([installNamespace, ...tenantNamespaces])
}

/**
 * Maps a tenant change to the inventories in its inventory namespace, whose
 * admission depends on the tenant.
 */
export const inventoryRequestsForTenant = async (
  kube: KubernetesClient,
  config: OperatorConfig,
  tenant: KubeObject,
  signal?: AbortSignal,
): Promise<ReconcileRequest[]> => {
  const namespace = asString(readNested(tenant, ['spec', 'inventoryNamespace']))
  if (!namespace) return []
  if (config.watchNamespaces && !contains(config.watchNamespaces, namespace)) return []
  const inventories = await kube.list(DbaasKinds.Inventory, namespace, signal)
  return inventories.flatMap(requestForObject)
}

const rejectNamespace = async (
  kube: KubernetesClient,
  inventory: DBaaSInventory,
  nowIso: (() => string) | undefined,
  signal: AbortSignal,
) => {
  const conditions = upsertCondition(
    inventory.status?.conditions,
    {
      type: SPEC_SYNCED_CONDITION,
      status: 'False',
      reason: INVALID_NAMESPACE_REASON,
      message: `namespace ${inventory.metadata.namespace ?? ''} is not the install namespace or a tenant inventory namespace`,
    },
    nowIso,
  )
  const nextStatus = { ...inventory.status, conditions }
  if (stableEqual(inventory.status ?? {}, nextStatus)) return
  await syncStatus(kube, inventory, () => setRegion(inventory, 'status', nextStatus), signal)
}

export const createInventoryReconciler = (deps: InventoryReconcilerDeps): Reconciler => {
  const { kube, config, nowIso } = deps
  const log = (deps.log ?? rootLogger).child({ reconciler: 'inventory' })

  return async (request, signal) => {
    let inventory: DBaaSInventory
    try {
      inventory = await readResource(
        kube,
        { ...DbaasKinds.Inventory, name: request.name, namespace: request.namespace },
        InventorySchema,
        signal,
      )
    } catch (error) {
      if (isNotFound(error)) {
        log.debug({ request }, 'inventory deleted')
        return
      }
      throw error
    }

    const allowed = await listInventoryNamespaces(kube, config.installNamespace, signal)
    if (!contains(allowed, request.namespace)) {
      log.info({ namespace: request.namespace, name: request.name }, 'inventory namespace not allowed')
      await rejectNamespace(kube, inventory, nowIso, signal)
      return
    }

    const provider = await loadProvider(kube, inventory.spec.providerRef.name, log, signal)
    await projectToProvider({
      kube,
      owner: inventory,
      desiredSpec: { credentialsRef: inventory.spec.credentialsRef },
      provider,
      role: 'inventory',
      childSchema: ProviderInventorySchema,
      signal,
      log,
    })
  }
}
