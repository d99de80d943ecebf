import { isNotFound } from '~/errors'
import type { KubernetesClient } from '~/kube/client'
import { type DynamicObject, type KubeObject, objectRef, replaceContents } from '~/kube/objects'
import { stableEqual } from '~/utils/stable-json'

export const OperationResult = {
  Created: 'created',
  Updated: 'updated',
  Unchanged: 'unchanged',
} as const

export type OperationResult = (typeof OperationResult)[keyof typeof OperationResult]

export type MutateFn = () => void

export type CreateOrUpdateOutcome = {
  result: OperationResult
  object: KubeObject
}

/**
 * Creates `object` when nothing exists at its identity, otherwise loads the
 * stored copy into `object`, applies `mutate`, and writes only when the
 * mutation changed something.
 */
export const createOrUpdate = async (
  kube: KubernetesClient,
  object: DynamicObject,
  mutate: MutateFn,
  signal?: AbortSignal,
): Promise<CreateOrUpdateOutcome> => {
  const ref = objectRef(object)

  let current: KubeObject
  try {
    current = await kube.read(ref, signal)
  } catch (error) {
    if (!isNotFound(error)) throw error
    mutate()
    const created = await kube.create(object, signal)
    replaceContents(object, created)
    return { result: OperationResult.Created, object }
  }

  const existing = structuredClone(current)
  replaceContents(object, current)
  mutate()

  if (object.metadata?.name !== ref.name || (object.metadata?.namespace || undefined) !== ref.namespace) {
    throw new Error('create-or-update mutation must not change the object name or namespace')
  }
  if (stableEqual(existing, object)) {
    return { result: OperationResult.Unchanged, object }
  }

  const updated = await kube.replace(object, signal)
  replaceContents(object, updated)
  return { result: OperationResult.Updated, object }
}
