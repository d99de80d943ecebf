import type { Condition } from '~/resources'

export type ConditionUpdate = {
  type: string
  status: 'True' | 'False' | 'Unknown'
  reason: string
  message?: string
}

const defaultNowIso = () => new Date().toISOString()

export const findCondition = (conditions: readonly Condition[] | undefined, type: string) =>
  conditions?.find((condition) => condition.type === type)

/** Keeps `lastTransitionTime` unless status, reason or message actually changed. */
export const upsertCondition = (
  conditions: readonly Condition[] | undefined,
  update: ConditionUpdate,
  nowIso: () => string = defaultNowIso,
): Condition[] => {
  const next = [...(conditions ?? [])]
  const normalized = { ...update, message: update.message ?? '' }
  const index = next.findIndex((condition) => condition.type === normalized.type)
  if (index === -1) {
    next.push({ ...normalized, lastTransitionTime: nowIso() })
    return next
  }
  const existing = next[index]
  if (
    existing.status !== normalized.status ||
    existing.reason !== normalized.reason ||
    (existing.message ?? '') !== normalized.message
  ) {
    next[index] = { ...existing, ...normalized, lastTransitionTime: nowIso() }
  }
  return next
}
