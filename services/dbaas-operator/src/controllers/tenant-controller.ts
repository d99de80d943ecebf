import type { Reconciler } from '~/controllers/runtime'
import { ensureObject } from '~/engine/provisioner'
import { isNotFound } from '~/errors'
import type { KubernetesClient } from '~/kube/client'
import { DBAAS_GROUP, describeObject, getRegion, type KubeObject, objectRef } from '~/kube/objects'
import { type Logger, logger as rootLogger } from '~/logger'
import {
  DbaasKinds,
  type DBaaSTenant,
  RBAC_GROUP,
  RbacKinds,
  readResource,
  type TenantAuthz,
  TenantSchema,
} from '~/resources'
import { stableEqual } from '~/utils/stable-json'
import { dedupPreserveOrder } from '~/utils/string-lists'

const READ_VERBS = ['get', 'list', 'watch']

export type RbacSubject = {
  apiGroup: string
  kind: 'User' | 'Group'
  name: string
}

export type TenantRbac = {
  clusterRole: KubeObject
  clusterRoleBinding: KubeObject & { subjects: RbacSubject[] }
  role: KubeObject
  roleBinding: KubeObject & { subjects: RbacSubject[] }
}

export type TenantReconcilerDeps = {
  kube: KubernetesClient
  log?: Logger
}

export const tenantRbacName = (tenant: string, persona: 'viewer' | 'developer') => `dbaas-tenant-${tenant}-${persona}`

/** Users first, then groups, each without repeats. */
export const buildSubjects = (authz: TenantAuthz | undefined): RbacSubject[] => [
  ...dedupPreserveOrder(authz?.users ?? []).map((name) => ({ apiGroup: RBAC_GROUP, kind: 'User' as const, name })),
  ...dedupPreserveOrder(authz?.groups ?? []).map((name) => ({ apiGroup: RBAC_GROUP, kind: 'Group' as const, name })),
]

export const buildTenantRbac = (tenant: DBaaSTenant): TenantRbac => {
  const tenantName = tenant.metadata.name
  const viewer = tenantRbacName(tenantName, 'viewer')
  const developer = tenantRbacName(tenantName, 'developer')
  const namespace = tenant.spec.inventoryNamespace

  return {
    clusterRole: {
      ...RbacKinds.ClusterRole,
      metadata: { name: viewer },
      rules: [
        { apiGroups: [DBAAS_GROUP], resources: ['dbaastenants'], resourceNames: [tenantName], verbs: [...READ_VERBS] },
      ],
    },
    clusterRoleBinding: {
      ...RbacKinds.ClusterRoleBinding,
      metadata: { name: viewer },
      roleRef: { apiGroup: RBAC_GROUP, kind: 'ClusterRole', name: viewer },
      subjects: buildSubjects(tenant.spec.authz?.serviceAdmin),
    },
    role: {
      ...RbacKinds.Role,
      metadata: { name: developer, namespace },
      rules: [{ apiGroups: [DBAAS_GROUP], resources: ['dbaasinventories'], verbs: [...READ_VERBS] }],
    },
    roleBinding: {
      ...RbacKinds.RoleBinding,
      metadata: { name: developer, namespace },
      roleRef: { apiGroup: RBAC_GROUP, kind: 'Role', name: developer },
      subjects: buildSubjects(tenant.spec.authz?.developer),
    },
  }
}

/**
 * Gives each tenant a cluster-wide viewer role for service admins and a
 * developer role inside its inventory namespace. Roles are created once and
 * left alone; binding subjects follow the tenant's authz lists, including
 * when a list is emptied.
 */
export const createTenantReconciler = (deps: TenantReconcilerDeps): Reconciler => {
  const { kube } = deps
  const log = (deps.log ?? rootLogger).child({ reconciler: 'tenant' })

  return async (request, signal) => {
    let tenant: DBaaSTenant
    try {
      tenant = await readResource(kube, { ...DbaasKinds.Tenant, name: request.name }, TenantSchema, signal)
    } catch (error) {
      if (isNotFound(error)) {
        log.debug({ request }, 'tenant deleted')
        return
      }
      throw error
    }

    const syncSubjects = async (binding: KubeObject, subjects: RbacSubject[]) => {
      if (stableEqual(getRegion(binding, 'subjects') ?? [], subjects)) return
      await kube.replace({ ...binding, subjects }, signal)
      log.info({ binding: describeObject(binding), subjects: subjects.length }, 'binding subjects updated')
    }

    // An empty list never creates a binding but still revokes an existing one.
    const ensureBinding = async (binding: KubeObject & { subjects: RbacSubject[] }) => {
      if (binding.subjects.length === 0) {
        let existing: KubeObject
        try {
          existing = await kube.read(objectRef(binding), signal)
        } catch (error) {
          if (isNotFound(error)) return
          throw error
        }
        await syncSubjects(existing, binding.subjects)
        return
      }
      const { alreadyExisted, object } = await ensureObject(kube, binding, tenant, signal, log)
      if (alreadyExisted) {
        await syncSubjects(object, binding.subjects)
      }
    }

    const rbac = buildTenantRbac(tenant)
    await ensureObject(kube, rbac.clusterRole, tenant, signal, log)
    await ensureBinding(rbac.clusterRoleBinding)
    await ensureObject(kube, rbac.role, tenant, signal, log)
    await ensureBinding(rbac.roleBinding)
  }
}
