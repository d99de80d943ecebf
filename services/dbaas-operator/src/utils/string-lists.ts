/** Removes repeated entries, keeping the first occurrence of each in its original position. */
export const dedupPreserveOrder = (items: readonly string[]): string[] => {
  const seen = new Set<string>()
  const output: string[] = []
  for (const item of items) {
    if (seen.has(item)) continue
    seen.add(item)
    output.push(item)
  }
  return output
}

export const contains = (items: readonly string[], target: string) => {
  for (const item of items) {
    if (item === target) return true
  }
  return false
}
