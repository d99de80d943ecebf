export const stableStringify = (value: unknown): string => {
  if (value instanceof Date) {
    return JSON.stringify(value.toISOString())
  }
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null'
  }
  if (Array.isArray(value)) {
    return `[${value.map((entry) => stableStringify(entry)).join(',')}]`
  }
  const record = value as Record<string, unknown>
  const keys = Object.keys(record)
    .filter((key) => record[key] !== undefined)
    .sort()
  return `{${keys.map((key) => `${JSON.stringify(key)}:${stableStringify(record[key])}`).join(',')}}`
}

export const stableEqual = (left: unknown, right: unknown) => stableStringify(left) === stableStringify(right)
