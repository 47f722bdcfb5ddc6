import type { DiscoveryResult } from "../../ports/target-source"
import type { Target, TargetLists } from "../../ports/target"

export function emptyResult(): DiscoveryResult {
  return { addrs: [], secrets: [], aliases: [], warnings: [] }
}

export function appendTarget(lists: TargetLists, target: Target): void {
  lists.addrs.push(target.address)
  lists.secrets.push(target.secret)
  lists.aliases.push(target.alias)
}

/**
 * Pairs the parallel lists into one target per address. Secrets and aliases
 * beyond the address count are dropped; missing ones read as `""`.
 */
export function zipTargets(lists: TargetLists): Target[] {
  return lists.addrs.map((address, i) => ({
    address,
    secret: lists.secrets[i] ?? "",
    alias: lists.aliases[i] ?? "",
  }))
}

/**
 * Concatenates results in the given order.
 */
export function concatResults(results: readonly DiscoveryResult[]): DiscoveryResult {
  const merged = emptyResult()

  for (const result of results) {
    merged.addrs.push(...result.addrs)
    merged.secrets.push(...result.secrets)
    merged.aliases.push(...result.aliases)
    merged.warnings.push(...result.warnings)
  }

  return merged
}
