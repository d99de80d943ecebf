import { beforeEach, describe, expect, it } from 'vitest'

import { getProvider, resolveProviderKind } from '~/engine/provider-registry'
import { DecodeError, NotFoundError } from '~/errors'
import { createFakeKube, type FakeKube } from '~/test-utils/fake-kube'

const mongoProvider = {
  apiVersion: 'dbaas.io/v1alpha1',
  kind: 'DBaaSProvider',
  metadata: { name: 'mongo' },
  spec: {
    provider: { name: 'mongo', displayName: 'Mongo Cloud' },
    inventoryKind: 'MongoInventory',
    connectionKind: 'MongoConnection',
    instanceKind: 'MongoInstance',
  },
}

let fake: FakeKube

beforeEach(() => {
  fake = createFakeKube()
})

describe('provider registry', () => {
  it('reads the provider and resolves each role to its kind', async () => {
    fake.seed(mongoProvider)
    const provider = await getProvider(fake.client, 'mongo')

    expect(provider.metadata.name).toBe('mongo')
    expect(resolveProviderKind(provider, 'inventory')).toBe('MongoInventory')
    expect(resolveProviderKind(provider, 'connection')).toBe('MongoConnection')
    expect(resolveProviderKind(provider, 'instance')).toBe('MongoInstance')
  })

  it('reports an unknown provider as not found', async () => {
    await expect(getProvider(fake.client, 'missing')).rejects.toThrow(NotFoundError)
  })

  it('sees a provider registered after an earlier miss', async () => {
    await expect(getProvider(fake.client, 'mongo')).rejects.toThrow(NotFoundError)
    fake.seed(mongoProvider)
    await expect(getProvider(fake.client, 'mongo')).resolves.toMatchObject({ spec: { inventoryKind: 'MongoInventory' } })
  })

  it('rejects a provider without the kinds it must declare', async () => {
    fake.seed({ ...mongoProvider, metadata: { name: 'broken' }, spec: { provider: { name: 'broken' } } })
    await expect(getProvider(fake.client, 'broken')).rejects.toThrow(DecodeError)
  })
})
