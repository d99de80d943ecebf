import { beforeEach, describe, expect, it } from 'vitest'

import { createOrUpdate, OperationResult } from '~/engine/create-or-update'
import { reconcileChild } from '~/engine/projection'
import { OwnershipError } from '~/errors'
import { type KubeObject, newDynamicObject } from '~/kube/objects'
import { createFakeKube, type FakeKube } from '~/test-utils/fake-kube'

const CHILD = { apiVersion: 'dbaas.io/v1alpha1', kind: 'MongoInventory' }

const childRef = { ...CHILD, name: 'inv', namespace: 'team-a' }

let fake: FakeKube
let owner: KubeObject

const childWrites = () => fake.writes.filter((write) => write.kind === CHILD.kind)

beforeEach(() => {
  fake = createFakeKube()
  fake.registerResource(CHILD, true)
  owner = fake.seed({
    apiVersion: 'dbaas.io/v1alpha1',
    kind: 'DBaaSInventory',
    metadata: { name: 'inv', namespace: 'team-a' },
    spec: { providerRef: { name: 'mongo' }, credentialsRef: { name: 'creds' } },
  })
})

describe('reconcileChild', () => {
  it('creates the child with the desired spec and a controller reference', async () => {
    const outcome = await reconcileChild(fake.client, owner, { credentialsRef: { name: 'creds' } }, CHILD.kind)

    expect(outcome.result).toBe(OperationResult.Created)
    const stored = fake.get(childRef)
    expect(stored?.spec).toEqual({ credentialsRef: { name: 'creds' } })
    expect(stored?.metadata?.ownerReferences).toEqual([
      {
        apiVersion: 'dbaas.io/v1alpha1',
        kind: 'DBaaSInventory',
        name: 'inv',
        uid: owner.metadata?.uid,
        controller: true,
        blockOwnerDeletion: true,
      },
    ])
    expect(outcome.object.metadata?.uid).toBe(stored?.metadata?.uid)
  })

  it('reports unchanged and issues no write when the child already matches', async () => {
    await reconcileChild(fake.client, owner, { size: 'small' }, CHILD.kind)
    fake.clearWrites()

    const outcome = await reconcileChild(fake.client, owner, { size: 'small' }, CHILD.kind)

    expect(outcome.result).toBe(OperationResult.Unchanged)
    expect(childWrites()).toEqual([])
  })

  it('updates a drifted spec and settles afterwards', async () => {
    await reconcileChild(fake.client, owner, { size: 'small' }, CHILD.kind)

    const updated = await reconcileChild(fake.client, owner, { size: 'large' }, CHILD.kind)
    expect(updated.result).toBe(OperationResult.Updated)
    expect(fake.get(childRef)?.spec).toEqual({ size: 'large' })

    fake.clearWrites()
    const settled = await reconcileChild(fake.client, owner, { size: 'large' }, CHILD.kind)
    expect(settled.result).toBe(OperationResult.Unchanged)
    expect(childWrites()).toEqual([])
  })

  it('drops stale owner references and keeps the status the provider wrote', async () => {
    fake.seed({
      ...CHILD,
      metadata: {
        name: 'inv',
        namespace: 'team-a',
        ownerReferences: [{ apiVersion: 'v1', kind: 'ConfigMap', name: 'old', uid: 'uid-old', controller: true }],
      },
      spec: { size: 'small' },
      status: { instances: [{ instanceID: 'db-1' }] },
    })

    const outcome = await reconcileChild(fake.client, owner, { size: 'small' }, CHILD.kind)

    expect(outcome.result).toBe(OperationResult.Updated)
    const stored = fake.get(childRef)
    expect(stored?.metadata?.ownerReferences?.map((reference) => reference.uid)).toEqual([owner.metadata?.uid])
    expect(stored?.status).toEqual({ instances: [{ instanceID: 'db-1' }] })
  })

  it('surfaces store failures from the write', async () => {
    fake.failNext('create', new Error('etcd unavailable'), CHILD.kind)
    await expect(reconcileChild(fake.client, owner, { size: 'small' }, CHILD.kind)).rejects.toThrow('etcd unavailable')
    expect(fake.get(childRef)).toBeUndefined()
  })
})

describe('createOrUpdate', () => {
  it('rejects mutations that rename the object', async () => {
    fake.seed({ ...CHILD, metadata: { name: 'inv', namespace: 'team-a' }, spec: {} })
    const object = newDynamicObject(CHILD.kind, owner)
    await expect(
      createOrUpdate(fake.client, object, () => {
        object.metadata = { ...object.metadata, name: 'renamed' }
      }),
    ).rejects.toThrow('create-or-update mutation must not change the object name or namespace')
  })

  it('propagates mutation errors without writing', async () => {
    const object = newDynamicObject(CHILD.kind, owner)
    await expect(
      createOrUpdate(fake.client, object, () => {
        throw new OwnershipError('not mine')
      }),
    ).rejects.toThrow(OwnershipError)
    expect(childWrites()).toEqual([])
  })
})
