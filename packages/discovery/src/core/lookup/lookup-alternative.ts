import { LookupError } from "../../errors/discovery-errors"
import type { CredentialMap } from "../../ports/platform-environment"

function describeType(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  return typeof value
}

/**
 * Returns the value of the first `candidates` key present in `map`, or `""`
 * when none is.
 *
 * Only the first present key is considered: a non-string value under it
 * throws {@link LookupError} rather than falling through to later candidates.
 *
 * @example
 * ```ts
 * lookupAlternative({ hostname: "10.0.0.5" }, ["host", "hostname"]) // "10.0.0.5"
 * ```
 */
export function lookupAlternative(map: CredentialMap, candidates: readonly string[]): string {
  for (const key of candidates) {
    if (!Object.hasOwn(map, key)) continue

    const value = map[key]

    if (typeof value !== "string") {
      throw new LookupError(`Credential "${key}" is a ${describeType(value)}, expected a string`, {
        code: "lookup_error",
        context: { key, actualType: describeType(value) },
      })
    }

    return value
  }

  return ""
}
