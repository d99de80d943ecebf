import { isNotFound } from '~/errors'
import type { KubernetesClient } from '~/kube/client'
import { describeRef, type KubeObject, objectRef } from '~/kube/objects'
import { setControllerReference } from '~/kube/ownership'
import { type Logger, logger as rootLogger } from '~/logger'

export type EnsureResult = {
  alreadyExisted: boolean
  object: KubeObject
}

/**
 * Creates `desired` under `owner` unless something already sits at its
 * identity. An existing object is returned untouched. A create that loses a
 * race with another writer surfaces its AlreadyExistsError.
 */
export const ensureObject = async (
  kube: KubernetesClient,
  desired: KubeObject,
  owner: KubeObject,
  signal?: AbortSignal,
  log: Logger = rootLogger,
): Promise<EnsureResult> => {
  const ref = objectRef(desired)
  const resource = describeRef(ref)

  try {
    const existing = await kube.read(ref, signal)
    return { alreadyExisted: true, object: existing }
  } catch (error) {
    if (!isNotFound(error)) {
      log.error({ err: error, resource }, 'error getting the resource')
      throw error
    }
  }

  log.debug({ resource }, 'resource not found')
  setControllerReference(owner, desired)
  let created: KubeObject
  try {
    created = await kube.create(desired, signal)
  } catch (error) {
    log.error({ err: error, resource }, 'error creating resource')
    throw error
  }
  log.debug({ resource }, 'resource created')
  return { alreadyExisted: false, object: created }
}
