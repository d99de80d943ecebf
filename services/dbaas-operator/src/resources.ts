import { Schema } from 'effect'

import { decodeObject } from '~/engine/status'
import { DecodeError } from '~/errors'
import type { KubernetesClient } from '~/kube/client'
import { DBAAS_API_VERSION, describeObject, type KubeObject, type ObjectMeta, type ObjectRef } from '~/kube/objects'

export const DbaasKinds = {
  Provider: { apiVersion: DBAAS_API_VERSION, kind: 'DBaaSProvider' },
  Inventory: { apiVersion: DBAAS_API_VERSION, kind: 'DBaaSInventory' },
  Connection: { apiVersion: DBAAS_API_VERSION, kind: 'DBaaSConnection' },
  Instance: { apiVersion: DBAAS_API_VERSION, kind: 'DBaaSInstance' },
  Tenant: { apiVersion: DBAAS_API_VERSION, kind: 'DBaaSTenant' },
} as const

export const RBAC_GROUP = 'rbac.authorization.k8s.io'
export const RBAC_API_VERSION = `${RBAC_GROUP}/v1`

export const RbacKinds = {
  ClusterRole: { apiVersion: RBAC_API_VERSION, kind: 'ClusterRole' },
  ClusterRoleBinding: { apiVersion: RBAC_API_VERSION, kind: 'ClusterRoleBinding' },
  Role: { apiVersion: RBAC_API_VERSION, kind: 'Role' },
  RoleBinding: { apiVersion: RBAC_API_VERSION, kind: 'RoleBinding' },
} as const

const LocalObjectReference = Schema.Struct({
  name: Schema.String,
})

const NamespacedObjectReference = Schema.Struct({
  name: Schema.String,
  namespace: Schema.optional(Schema.String),
})

const StringMap = Schema.Record({ key: Schema.String, value: Schema.String })

export const ConditionSchema = Schema.Struct({
  type: Schema.String,
  status: Schema.String,
  reason: Schema.optional(Schema.String),
  message: Schema.optional(Schema.String),
  lastTransitionTime: Schema.optional(Schema.String),
  observedGeneration: Schema.optional(Schema.Number),
})

const Conditions = Schema.optional(Schema.Array(ConditionSchema))

export const ProviderSpecSchema = Schema.Struct({
  provider: Schema.Struct({
    name: Schema.String,
    displayName: Schema.optional(Schema.String),
    displayDescription: Schema.optional(Schema.String),
  }),
  inventoryKind: Schema.String,
  connectionKind: Schema.String,
  instanceKind: Schema.String,
  credentialFields: Schema.optional(
    Schema.Array(
      Schema.Struct({
        key: Schema.String,
        displayName: Schema.optional(Schema.String),
        type: Schema.optional(Schema.String),
        required: Schema.optional(Schema.Boolean),
      }),
    ),
  ),
})

export const ProviderSchema = Schema.Struct({ spec: ProviderSpecSchema })

export const InventorySpecSchema = Schema.Struct({
  providerRef: LocalObjectReference,
  credentialsRef: LocalObjectReference,
})

export const InventoryStatusSchema = Schema.Struct({
  conditions: Conditions,
  instances: Schema.optional(
    Schema.Array(
      Schema.Struct({
        instanceID: Schema.String,
        name: Schema.optional(Schema.String),
        instanceInfo: Schema.optional(StringMap),
      }),
    ),
  ),
})

export const InventorySchema = Schema.Struct({
  spec: InventorySpecSchema,
  status: Schema.optional(InventoryStatusSchema),
})

export const ConnectionSpecSchema = Schema.Struct({
  inventoryRef: NamespacedObjectReference,
  instanceID: Schema.String,
})

export const ConnectionStatusSchema = Schema.Struct({
  conditions: Conditions,
  credentialsRef: Schema.optional(LocalObjectReference),
  connectionInfoRef: Schema.optional(LocalObjectReference),
})

export const ConnectionSchema = Schema.Struct({
  spec: ConnectionSpecSchema,
  status: Schema.optional(ConnectionStatusSchema),
})

export const InstanceSpecSchema = Schema.Struct({
  inventoryRef: NamespacedObjectReference,
  name: Schema.String,
  cloudProvider: Schema.optional(Schema.String),
  cloudRegion: Schema.optional(Schema.String),
  otherInstanceParams: Schema.optional(StringMap),
})

export const InstanceStatusSchema = Schema.Struct({
  conditions: Conditions,
  instanceID: Schema.optional(Schema.String),
  instanceInfo: Schema.optional(StringMap),
  phase: Schema.optional(Schema.String),
})

export const InstanceSchema = Schema.Struct({
  spec: InstanceSpecSchema,
  status: Schema.optional(InstanceStatusSchema),
})

const TenantAuthzSchema = Schema.Struct({
  users: Schema.optional(Schema.Array(Schema.String)),
  groups: Schema.optional(Schema.Array(Schema.String)),
})

export const TenantSpecSchema = Schema.Struct({
  inventoryNamespace: Schema.String,
  authz: Schema.optional(
    Schema.Struct({
      developer: Schema.optional(TenantAuthzSchema),
      serviceAdmin: Schema.optional(TenantAuthzSchema),
    }),
  ),
})

export const TenantSchema = Schema.Struct({ spec: TenantSpecSchema })

// Provider-side objects only contribute their status back to the owner.
export const ProviderInventorySchema = Schema.Struct({ status: Schema.optional(InventoryStatusSchema) })
export const ProviderConnectionSchema = Schema.Struct({ status: Schema.optional(ConnectionStatusSchema) })
export const ProviderInstanceSchema = Schema.Struct({ status: Schema.optional(InstanceStatusSchema) })

export type Condition = typeof ConditionSchema.Type
export type TenantAuthz = typeof TenantAuthzSchema.Type

export type Resource<A> = KubeObject & A & { metadata: ObjectMeta & { name: string } }

export type DBaaSProvider = Resource<typeof ProviderSchema.Type>
export type DBaaSInventory = Resource<typeof InventorySchema.Type>
export type DBaaSConnection = Resource<typeof ConnectionSchema.Type>
export type DBaaSInstance = Resource<typeof InstanceSchema.Type>
export type DBaaSTenant = Resource<typeof TenantSchema.Type>

/** Decodes the typed regions of `raw` while keeping its metadata untouched. */
export const decodeResource = <A, I>(raw: KubeObject, schema: Schema.Schema<A, I, never>): Resource<A> => {
  const decoded = decodeObject(raw, schema)
  const metadata = raw.metadata
  const name = metadata?.name
  if (!metadata || !name) {
    throw new DecodeError(`${describeObject(raw)} has no metadata.name`)
  }
  return { ...raw, ...decoded, metadata: { ...metadata, name } }
}

export const readResource = async <A, I>(
  kube: KubernetesClient,
  ref: ObjectRef,
  schema: Schema.Schema<A, I, never>,
  signal?: AbortSignal,
) => decodeResource(await kube.read(ref, signal), schema)
