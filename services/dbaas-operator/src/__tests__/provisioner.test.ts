import { beforeEach, describe, expect, it } from 'vitest'

import { ensureObject } from '~/engine/provisioner'
import { AlreadyExistsError, TransportError } from '~/errors'
import type { KubeObject } from '~/kube/objects'
import { createFakeKube, type FakeKube } from '~/test-utils/fake-kube'

const roleRef = { apiVersion: 'rbac.authorization.k8s.io/v1', kind: 'Role', name: 'dev', namespace: 'team-a' }

const desiredRole = (): KubeObject => ({
  apiVersion: roleRef.apiVersion,
  kind: roleRef.kind,
  metadata: { name: roleRef.name, namespace: roleRef.namespace },
  rules: [{ apiGroups: ['dbaas.io'], resources: ['dbaasinventories'], verbs: ['get'] }],
})

let fake: FakeKube
let tenant: KubeObject

beforeEach(() => {
  fake = createFakeKube()
  tenant = fake.seed({
    apiVersion: 'dbaas.io/v1alpha1',
    kind: 'DBaaSTenant',
    metadata: { name: 'acme' },
    spec: { inventoryNamespace: 'team-a' },
  })
})

describe('ensureObject', () => {
  it('creates the object under its owner the first time', async () => {
    const result = await ensureObject(fake.client, desiredRole(), tenant)

    expect(result.alreadyExisted).toBe(false)
    expect(fake.writes).toEqual([{ verb: 'create', kind: 'Role', namespace: 'team-a', name: 'dev' }])
    expect(fake.get(roleRef)?.metadata?.ownerReferences?.[0]?.name).toBe('acme')
  })

  it('returns the stored object untouched on later calls', async () => {
    await ensureObject(fake.client, desiredRole(), tenant)
    fake.clearWrites()

    const changed = desiredRole()
    changed.rules = []
    const result = await ensureObject(fake.client, changed, tenant)

    expect(result.alreadyExisted).toBe(true)
    expect(result.object.rules).toEqual(desiredRole().rules)
    expect(fake.writes).toEqual([])
  })

  it('surfaces a lost create race as AlreadyExistsError', async () => {
    fake.failNext('create', new AlreadyExistsError('Role team-a/dev already exists'))
    await expect(ensureObject(fake.client, desiredRole(), tenant)).rejects.toThrow(AlreadyExistsError)
  })

  it('propagates read failures other than not found', async () => {
    fake.failNext('read', new TransportError('forbidden', { statusCode: 403 }), 'Role')
    await expect(ensureObject(fake.client, desiredRole(), tenant)).rejects.toThrow('forbidden')
    expect(fake.writes).toEqual([])
  })
})
