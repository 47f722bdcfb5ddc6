/**
 * Appends the first element of `values` until it has `length` entries.
 *
 * A single value thus applies to every target. Longer lists are left as they
 * are, and an empty list is filled with `""`.
 */
export function broadcastFirst(values: string[], length: number): string[] {
  const filled = [...values]
  const first = filled[0] ?? ""

  while (filled.length < length) {
    filled.push(first)
  }

  return filled
}
