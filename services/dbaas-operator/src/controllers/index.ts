import { Context, Effect, Layer } from 'effect'

import type { OperatorConfig } from '~/config'
import { createConnectionReconciler } from '~/controllers/connection-controller'
import { createInstanceReconciler } from '~/controllers/instance-controller'
import { createInventoryReconciler, inventoryRequestsForTenant } from '~/controllers/inventory-controller'
import { createProviderReconciler, OwnerTypes } from '~/controllers/provider-controller'
import { type Controller, type ControllerOptions, createController, requestForObject } from '~/controllers/runtime'
import { createTenantReconciler } from '~/controllers/tenant-controller'
import { watchOwnedKind } from '~/engine/watch-binder'
import type { KubernetesClient } from '~/kube/client'
import { type Logger, logger as rootLogger } from '~/logger'
import { DbaasKinds, RbacKinds } from '~/resources'

export type OperatorHealth = {
  started: boolean
  installNamespace: string
  watchNamespaces: string[] | null
  controllers: Array<{ name: string; watches: string[] }>
}

export type Operator = {
  controllers: {
    provider: Controller
    inventory: Controller
    connection: Controller
    instance: Controller
    tenant: Controller
  }
  start: () => Promise<void>
  stop: () => void
  getHealth: () => OperatorHealth
}

/**
 * Wires one controller per owner kind. Owner kinds are watched from the start;
 * provider kinds are bound as providers register.
 */
export const createOperator = (kube: KubernetesClient, config: OperatorConfig, log: Logger = rootLogger): Operator => {
  const base: Omit<ControllerOptions, 'name' | 'reconcile'> = {
    kube,
    namespaces: config.watchNamespaces,
    requeueDelayMs: config.requeueDelayMs,
    watchRestartDelayMs: config.watchRestartDelayMs,
    log,
  }

  const inventory = createController({
    ...base,
    name: 'inventory',
    reconcile: createInventoryReconciler({ kube, config, log }),
  })
  const connection = createController({ ...base, name: 'connection', reconcile: createConnectionReconciler({ kube, log }) })
  const instance = createController({ ...base, name: 'instance', reconcile: createInstanceReconciler({ kube, log }) })
  // Tenant roles land in inventory namespaces that may sit outside the watched set.
  const tenant = createController({
    ...base,
    namespaces: null,
    name: 'tenant',
    reconcile: createTenantReconciler({ kube, log }),
  })
  const provider = createController({
    ...base,
    name: 'provider',
    reconcile: createProviderReconciler({ kube, controllers: { inventory, connection, instance }, log }),
  })

  const controllers = { provider, inventory, connection, instance, tenant }
  const all = [provider, inventory, connection, instance, tenant]
  let started = false

  const start = async () => {
    if (started) return
    await inventory.watch({ ...DbaasKinds.Inventory, toRequests: (event) => requestForObject(event.object) })
    await inventory.watch({
      ...DbaasKinds.Tenant,
      toRequests: (event) => inventoryRequestsForTenant(kube, config, event.object),
    })
    await connection.watch({ ...DbaasKinds.Connection, toRequests: (event) => requestForObject(event.object) })
    await instance.watch({ ...DbaasKinds.Instance, toRequests: (event) => requestForObject(event.object) })
    await tenant.watch({ ...DbaasKinds.Tenant, toRequests: (event) => requestForObject(event.object) })
    for (const type of Object.values(RbacKinds)) {
      await watchOwnedKind(tenant, OwnerTypes.Tenant, type.kind, type.apiVersion)
    }
    await provider.watch({ ...DbaasKinds.Provider, toRequests: (event) => requestForObject(event.object) })
    started = true
    log.info({ installNamespace: config.installNamespace, namespaces: config.watchNamespaces ?? ['*'] }, 'operator started')
  }

  const stop = () => {
    for (const controller of all) controller.stop()
    started = false
  }

  const getHealth = (): OperatorHealth => ({
    started,
    installNamespace: config.installNamespace,
    watchNamespaces: config.watchNamespaces,
    controllers: all.map((controller) => ({ name: controller.name, watches: controller.watchedKinds() })),
  })

  return { controllers, start, stop, getHealth }
}

export type DbaasOperatorService = {
  start: Effect.Effect<void, Error>
  stop: Effect.Effect<void, never>
  getHealth: Effect.Effect<OperatorHealth, never>
}

export class DbaasOperator extends Context.Tag('DbaasOperator')<DbaasOperator, DbaasOperatorService>() {}

export const makeDbaasOperatorLayer = (kube: KubernetesClient, config: OperatorConfig, log: Logger = rootLogger) =>
  Layer.scoped(
    DbaasOperator,
    Effect.gen(function* () {
      const operator = createOperator(kube, config, log)
      yield* Effect.addFinalizer(() => Effect.sync(() => operator.stop()))
      return {
        start: Effect.tryPromise({
          try: () => operator.start(),
          catch: (error) => (error instanceof Error ? error : new Error(String(error))),
        }),
        stop: Effect.sync(() => {
          operator.stop()
        }),
        getHealth: Effect.sync(() => operator.getHealth()),
      } satisfies DbaasOperatorService
    }),
  )

export const startDbaasOperatorEffect = Effect.flatMap(DbaasOperator, (service) => service.start)
export const stopDbaasOperatorEffect = Effect.flatMap(DbaasOperator, (service) => service.stop)
export const getDbaasOperatorHealthEffect = Effect.flatMap(DbaasOperator, (service) => service.getHealth)
