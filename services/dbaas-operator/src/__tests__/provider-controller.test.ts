import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { createProviderReconciler, type ProjectionControllers } from '~/controllers/provider-controller'
import { createController } from '~/controllers/runtime'
import { createFakeKube, type FakeKube } from '~/test-utils/fake-kube'
import { providerObject, registerMongoKinds, signal } from '~/test-utils/fixtures'

let fake: FakeKube
let controllers: ProjectionControllers

const makeController = (name: string) =>
  createController({
    name,
    kube: fake.client,
    reconcile: async () => undefined,
    namespaces: null,
    requeueDelayMs: 10,
    watchRestartDelayMs: 10,
  })

const reconcile = (name = 'mongo') =>
  createProviderReconciler({ kube: fake.client, controllers })({ namespace: '', name }, signal())

beforeEach(() => {
  fake = createFakeKube()
  controllers = {
    inventory: makeController('inventory'),
    connection: makeController('connection'),
    instance: makeController('instance'),
  }
})

afterEach(() => {
  for (const controller of Object.values(controllers)) controller.stop()
})

describe('provider reconciler', () => {
  it('binds each provider kind to the controller of its role', async () => {
    registerMongoKinds(fake)
    fake.seed(providerObject())

    await reconcile()

    expect(controllers.inventory.watchedKinds()).toEqual(['MongoInventory.dbaas.io/v1alpha1'])
    expect(controllers.connection.watchedKinds()).toEqual(['MongoConnection.dbaas.io/v1alpha1'])
    expect(controllers.instance.watchedKinds()).toEqual(['MongoInstance.dbaas.io/v1alpha1'])
    expect(fake.watcherCount()).toBe(3)
  })

  it('does not bind the same kinds twice', async () => {
    registerMongoKinds(fake)
    fake.seed(providerObject())

    await reconcile()
    await reconcile()

    expect(fake.watcherCount()).toBe(3)
  })

  it('does nothing for a provider that is gone', async () => {
    await expect(reconcile('missing')).resolves.toBeUndefined()
    expect(fake.watcherCount()).toBe(0)
  })

  it('fails while the provider kinds are not served', async () => {
    fake.seed(providerObject())
    await expect(reconcile()).rejects.toThrow('no API resource serves MongoInventory (dbaas.io/v1alpha1)')
    expect(controllers.inventory.watchedKinds()).toEqual([])
  })
})
