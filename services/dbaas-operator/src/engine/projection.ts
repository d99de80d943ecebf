import { createOrUpdate, type CreateOrUpdateOutcome, type MutateFn } from '~/engine/create-or-update'
import type { KubernetesClient } from '~/kube/client'
import { type DynamicObject, type KubeObject, newDynamicObject, setRegion } from '~/kube/objects'
import { setControllerReference } from '~/kube/ownership'
import { recordChildOperation } from '~/metrics'

/**
 * Replaces the child's spec with `desiredSpec` and rebuilds its owner
 * references so `owner` is the only controller, whatever was stored before.
 */
export const childMutation =
  (owner: KubeObject, child: DynamicObject, desiredSpec: unknown): MutateFn =>
  () => {
    setRegion(child, 'spec', structuredClone(desiredSpec))
    if (child.metadata) {
      delete child.metadata.ownerReferences
    }
    setControllerReference(owner, child)
  }

export const reconcileChild = async (
  kube: KubernetesClient,
  owner: KubeObject,
  desiredSpec: unknown,
  childKind: string,
  signal?: AbortSignal,
): Promise<CreateOrUpdateOutcome> => {
  const child = newDynamicObject(childKind, owner)
  const outcome = await createOrUpdate(kube, child, childMutation(owner, child, desiredSpec), signal)
  recordChildOperation(childKind, outcome.result)
  return outcome
}
