import { OwnershipError } from '~/errors'
import { asString, describeObject, type KubeObject, type OwnerReference } from '~/kube/objects'

export const getControllerOf = (object: KubeObject): OwnerReference | null =>
  object.metadata?.ownerReferences?.find((reference) => reference.controller === true) ?? null

/**
 * Marks `owner` as the managing controller of `object`. The API server uses the
 * reference for cascading deletion; watches use it to route child events back
 * to the owner.
 */
export const setControllerReference = (owner: KubeObject, object: KubeObject) => {
  const apiVersion = asString(owner.apiVersion)
  const kind = asString(owner.kind)
  const name = asString(owner.metadata?.name)
  const uid = asString(owner.metadata?.uid)
  if (!apiVersion || !kind || !name || !uid) {
    throw new OwnershipError(`${describeObject(owner)} cannot own objects: apiVersion, kind, name and uid are required`)
  }

  const ownerNamespace = asString(owner.metadata?.namespace)
  const objectNamespace = asString(object.metadata?.namespace)
  if (ownerNamespace) {
    if (!objectNamespace) {
      throw new OwnershipError(
        `cluster-scoped ${describeObject(object)} must not have a namespace-scoped owner (${describeObject(owner)})`,
      )
    }
    if (objectNamespace !== ownerNamespace) {
      throw new OwnershipError(
        `cross-namespace owner references are disallowed: ${describeObject(owner)} cannot own ${describeObject(object)}`,
      )
    }
  }

  const existing = getControllerOf(object)
  if (existing && existing.uid !== uid) {
    throw new OwnershipError(`${describeObject(object)} is already owned by ${existing.kind} ${existing.name}`)
  }

  const reference: OwnerReference = {
    apiVersion,
    kind,
    name,
    uid,
    controller: true,
    blockOwnerDeletion: true,
  }
  const metadata = object.metadata ?? {}
  const others = (metadata.ownerReferences ?? []).filter((entry) => entry.uid !== uid)
  object.metadata = { ...metadata, ownerReferences: [...others, reference] }
}
