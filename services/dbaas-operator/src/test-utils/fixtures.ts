import type { OperatorConfig } from '~/config'
import type { KubeObject } from '~/kube/objects'
import { DbaasKinds } from '~/resources'
import type { FakeKube } from '~/test-utils/fake-kube'

export const INSTALL_NAMESPACE = 'dbaas-system'

export const MongoKinds = {
  Inventory: { apiVersion: 'dbaas.io/v1alpha1', kind: 'MongoInventory' },
  Connection: { apiVersion: 'dbaas.io/v1alpha1', kind: 'MongoConnection' },
  Instance: { apiVersion: 'dbaas.io/v1alpha1', kind: 'MongoInstance' },
} as const

export const testConfig = (overrides: Partial<OperatorConfig> = {}): OperatorConfig => ({
  installNamespace: INSTALL_NAMESPACE,
  watchNamespaces: null,
  requeueDelayMs: 10,
  watchRestartDelayMs: 10,
  ...overrides,
})

export const registerMongoKinds = (fake: FakeKube) => {
  for (const type of Object.values(MongoKinds)) {
    fake.registerResource(type, true)
  }
}

export const providerObject = (name = 'mongo'): KubeObject => ({
  ...DbaasKinds.Provider,
  metadata: { name },
  spec: {
    provider: { name },
    inventoryKind: MongoKinds.Inventory.kind,
    connectionKind: MongoKinds.Connection.kind,
    instanceKind: MongoKinds.Instance.kind,
  },
})

export const inventoryObject = (namespace = INSTALL_NAMESPACE, name = 'inv', provider = 'mongo'): KubeObject => ({
  ...DbaasKinds.Inventory,
  metadata: { name, namespace },
  spec: { providerRef: { name: provider }, credentialsRef: { name: 'mongo-creds' } },
})

export const tenantObject = (name: string, spec: Record<string, unknown>): KubeObject => ({
  ...DbaasKinds.Tenant,
  metadata: { name },
  spec,
})

export const signal = () => new AbortController().signal
