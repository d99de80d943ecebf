import type { Controller, ReconcileRequest } from '~/controllers/runtime'
import { DBAAS_API_VERSION, groupOf, type KubeObject, type ObjectType } from '~/kube/objects'
import { getControllerOf } from '~/kube/ownership'

export type OwnerType = ObjectType & {
  namespaced: boolean
}

/** Maps a child object to the request for its controlling owner of `ownerType`, if any. */
export const ownerRequests = (ownerType: OwnerType, object: KubeObject): ReconcileRequest[] => {
  const reference = getControllerOf(object)
  if (!reference) return []
  if (reference.kind !== ownerType.kind || groupOf(reference.apiVersion) !== groupOf(ownerType.apiVersion)) {
    return []
  }
  const namespace = ownerType.namespaced ? (object.metadata?.namespace ?? '') : ''
  return [{ namespace, name: reference.name }]
}

/**
 * Watches `childKind` on behalf of `controller`: any change to a child
 * re-enqueues the owner recorded as its controller. Binding a kind that the
 * controller already watches does nothing.
 */
export const watchOwnedKind = (
  controller: Controller,
  ownerType: OwnerType,
  childKind: string,
  apiVersion: string = DBAAS_API_VERSION,
) =>
  controller.watch({
    apiVersion,
    kind: childKind,
    toRequests: (event) => ownerRequests(ownerType, event.object),
  })
