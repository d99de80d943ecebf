import { Either, ParseResult, Schema } from 'effect'

import { DecodeError, formatError } from '~/errors'
import type { KubernetesClient } from '~/kube/client'
import { describeObject, type KubeObject } from '~/kube/objects'

/**
 * Converts an untyped object into the caller's typed shape by way of its JSON
 * form. Fields the shape does not declare are dropped; a field of the wrong
 * type fails the whole conversion.
 */
export const decodeObject = <A, I>(object: KubeObject, schema: Schema.Schema<A, I, never>): A => {
  let canonical: unknown
  try {
    canonical = JSON.parse(JSON.stringify(object))
  } catch (error) {
    throw new DecodeError(`${describeObject(object)} is not serializable: ${formatError(error)}`, { cause: error })
  }
  const decoded = Schema.decodeUnknownEither(schema)(canonical)
  if (Either.isLeft(decoded)) {
    throw new DecodeError(
      `${describeObject(object)} does not match the expected shape: ${ParseResult.TreeFormatter.formatErrorSync(decoded.left)}`,
      { cause: decoded.left },
    )
  }
  return decoded.right
}

/**
 * Runs `mutate` against the owner and persists its status sub-resource only
 * when the mutation completes. Errors from either step are returned as-is.
 */
export const syncStatus = async <T extends KubeObject>(
  kube: KubernetesClient,
  owner: T,
  mutate: () => void | Promise<void>,
  signal?: AbortSignal,
) => {
  await mutate()
  return kube.replaceStatus(owner, signal)
}
