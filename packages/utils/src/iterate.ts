export type Many<T> = T | readonly T[] | null | undefined

function isList<T>(thing: Many<T>): thing is readonly T[] {
  return Array.isArray(thing)
}

/** Normalises an optional scalar-or-list argument into a fresh array. */
export function listify<T>(thing: Many<T>): T[] {
  if (thing === null || thing === undefined) return []
  if (isList(thing)) return [...thing]
  return [thing]
}

/** Drops repeated items, keeping the first occurrence of each key. */
export function uniques<T>(items: Iterable<T>, key: (item: T) => string = String): T[] {
  const seen = new Set<string>()
  const out: T[] = []
  for (const item of items) {
    const k = key(item)
    if (seen.has(k)) continue
    seen.add(k)
    out.push(item)
  }
  return out
}
