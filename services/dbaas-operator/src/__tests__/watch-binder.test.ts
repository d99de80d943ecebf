import { describe, expect, it } from 'vitest'

import { OwnerTypes } from '~/controllers/provider-controller'
import { createController, type ReconcileRequest } from '~/controllers/runtime'
import { ownerRequests, watchOwnedKind } from '~/engine/watch-binder'
import { createFakeKube } from '~/test-utils/fake-kube'

const CHILD = { apiVersion: 'dbaas.io/v1alpha1', kind: 'MongoInventory' }

const ownedBy = (kind: string, apiVersion: string, namespace?: string) => ({
  ...CHILD,
  metadata: {
    name: 'inv',
    namespace,
    ownerReferences: [{ apiVersion, kind, name: 'inv', uid: 'uid-1', controller: true }],
  },
})

describe('ownerRequests', () => {
  it('routes a child to its controlling owner', () => {
    expect(ownerRequests(OwnerTypes.Inventory, ownedBy('DBaaSInventory', 'dbaas.io/v1alpha1', 'team-a'))).toEqual([
      { namespace: 'team-a', name: 'inv' },
    ])
  })

  it('matches the owner group across versions', () => {
    expect(ownerRequests(OwnerTypes.Inventory, ownedBy('DBaaSInventory', 'dbaas.io/v1beta1', 'team-a'))).toHaveLength(1)
  })

  it('ignores children owned by another kind or with no controller', () => {
    expect(ownerRequests(OwnerTypes.Inventory, ownedBy('DBaaSConnection', 'dbaas.io/v1alpha1', 'team-a'))).toEqual([])
    expect(ownerRequests(OwnerTypes.Inventory, { ...CHILD, metadata: { name: 'inv' } })).toEqual([])
  })

  it('uses an empty namespace for cluster-scoped owners', () => {
    expect(ownerRequests(OwnerTypes.Tenant, ownedBy('DBaaSTenant', 'dbaas.io/v1alpha1', 'team-a'))).toEqual([
      { namespace: '', name: 'inv' },
    ])
  })
})

describe('watchOwnedKind', () => {
  const setup = () => {
    const fake = createFakeKube()
    fake.registerResource(CHILD, true)
    const requests: ReconcileRequest[] = []
    const controller = createController({
      name: 'inventory',
      kube: fake.client,
      namespaces: null,
      requeueDelayMs: 1000,
      watchRestartDelayMs: 1000,
      reconcile: async (request) => {
        requests.push(request)
      },
    })
    return { fake, controller, requests }
  }

  it('binds a kind once and routes child events to the owner', async () => {
    const { fake, controller, requests } = setup()

    await expect(watchOwnedKind(controller, OwnerTypes.Inventory, CHILD.kind)).resolves.toBe(true)
    await expect(watchOwnedKind(controller, OwnerTypes.Inventory, CHILD.kind)).resolves.toBe(false)
    expect(fake.watcherCount()).toBe(1)

    fake.seed(ownedBy('DBaaSInventory', 'dbaas.io/v1alpha1', 'team-a'))
    await controller.idle()
    expect(requests).toEqual([{ namespace: 'team-a', name: 'inv' }])
    controller.stop()
  })

  it('fails for a kind the API server does not serve and allows a retry', async () => {
    const { fake, controller } = setup()

    await expect(watchOwnedKind(controller, OwnerTypes.Inventory, 'UnknownInventory')).rejects.toThrow(
      'no API resource serves UnknownInventory (dbaas.io/v1alpha1)',
    )
    fake.registerResource({ apiVersion: 'dbaas.io/v1alpha1', kind: 'UnknownInventory' }, true)
    await expect(watchOwnedKind(controller, OwnerTypes.Inventory, 'UnknownInventory')).resolves.toBe(true)
    controller.stop()
  })
})
