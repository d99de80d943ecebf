import { beforeEach, describe, expect, it } from 'vitest'

import { createConnectionReconciler } from '~/controllers/connection-controller'
import { createInstanceReconciler } from '~/controllers/instance-controller'
import { NotFoundError } from '~/errors'
import { DbaasKinds } from '~/resources'
import { createFakeKube, type FakeKube } from '~/test-utils/fake-kube'
import {
  INSTALL_NAMESPACE,
  inventoryObject,
  MongoKinds,
  providerObject,
  registerMongoKinds,
  signal,
} from '~/test-utils/fixtures'

let fake: FakeKube

beforeEach(() => {
  fake = createFakeKube()
  registerMongoKinds(fake)
  fake.seed(providerObject())
})

describe('connection reconciler', () => {
  const connectionRef = { ...DbaasKinds.Connection, name: 'orders', namespace: 'team-a' }
  const reconcile = () => createConnectionReconciler({ kube: fake.client })({ namespace: 'team-a', name: 'orders' }, signal())

  it('projects the connection spec through the inventory provider', async () => {
    fake.seed(inventoryObject())
    fake.seed({
      ...DbaasKinds.Connection,
      metadata: { name: 'orders', namespace: 'team-a' },
      spec: { inventoryRef: { name: 'inv', namespace: INSTALL_NAMESPACE }, instanceID: 'db-1' },
    })

    await reconcile()

    expect(fake.get({ ...MongoKinds.Connection, name: 'orders', namespace: 'team-a' })?.spec).toEqual({
      inventoryRef: { name: 'inv', namespace: INSTALL_NAMESPACE },
      instanceID: 'db-1',
    })
  })

  it('copies the credentials and connection info references back', async () => {
    fake.seed(inventoryObject())
    fake.seed({
      ...DbaasKinds.Connection,
      metadata: { name: 'orders', namespace: 'team-a' },
      spec: { inventoryRef: { name: 'inv', namespace: INSTALL_NAMESPACE }, instanceID: 'db-1' },
    })
    await reconcile()

    fake.update({ ...MongoKinds.Connection, name: 'orders', namespace: 'team-a' }, (object) => {
      object.status = { credentialsRef: { name: 'orders-user' }, connectionInfoRef: { name: 'orders-info' } }
    })
    await reconcile()

    expect(fake.get(connectionRef)?.status).toEqual({
      credentialsRef: { name: 'orders-user' },
      connectionInfoRef: { name: 'orders-info' },
    })
  })

  it('fails when the referenced inventory is missing', async () => {
    fake.seed({
      ...DbaasKinds.Connection,
      metadata: { name: 'orders', namespace: 'team-a' },
      spec: { inventoryRef: { name: 'gone' }, instanceID: 'db-1' },
    })
    await expect(reconcile()).rejects.toThrow('DBaaSInventory team-a/gone not found')
  })
})

describe('instance reconciler', () => {
  const instanceRef = { ...DbaasKinds.Instance, name: 'orders', namespace: 'team-a' }
  const reconcile = () => createInstanceReconciler({ kube: fake.client })({ namespace: 'team-a', name: 'orders' }, signal())

  it('resolves the inventory in its own namespace by default', async () => {
    fake.seed(inventoryObject('team-a'))
    fake.seed({
      ...DbaasKinds.Instance,
      metadata: { name: 'orders', namespace: 'team-a' },
      spec: { inventoryRef: { name: 'inv' }, name: 'orders', cloudProvider: 'aws', cloudRegion: 'us-east-1' },
    })

    await reconcile()

    expect(fake.get({ ...MongoKinds.Instance, name: 'orders', namespace: 'team-a' })?.spec).toEqual({
      inventoryRef: { name: 'inv' },
      name: 'orders',
      cloudProvider: 'aws',
      cloudRegion: 'us-east-1',
    })
  })

  it('copies the instance phase and info back', async () => {
    fake.seed(inventoryObject('team-a'))
    fake.seed({
      ...DbaasKinds.Instance,
      metadata: { name: 'orders', namespace: 'team-a' },
      spec: { inventoryRef: { name: 'inv' }, name: 'orders' },
    })
    await reconcile()

    fake.update({ ...MongoKinds.Instance, name: 'orders', namespace: 'team-a' }, (object) => {
      object.status = { instanceID: 'db-9', phase: 'Ready', instanceInfo: { host: 'orders.internal' } }
    })
    await reconcile()

    expect(fake.get(instanceRef)?.status).toEqual({
      instanceID: 'db-9',
      phase: 'Ready',
      instanceInfo: { host: 'orders.internal' },
    })
  })

  it('fails when the inventory names an unknown provider', async () => {
    fake.seed(inventoryObject('team-a', 'inv', 'postgres'))
    fake.seed({
      ...DbaasKinds.Instance,
      metadata: { name: 'orders', namespace: 'team-a' },
      spec: { inventoryRef: { name: 'inv' }, name: 'orders' },
    })
    await expect(reconcile()).rejects.toThrow(NotFoundError)
    expect(fake.get({ ...MongoKinds.Instance, name: 'orders', namespace: 'team-a' })).toBeUndefined()
  })
})
