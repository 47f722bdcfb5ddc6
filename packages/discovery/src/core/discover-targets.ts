import type { Logger } from "@cachewatch/logger"
import type { DiscoveryResult, TargetSource } from "../ports/target-source"
import { concatResults } from "./targets/targets"

export type DiscoverTargetsDeps = {
  logger: Logger
}

/**
 * Runs `sources` one after another and concatenates what they find, in
 * source order. The first source to reject aborts the run; its error is
 * logged and rethrown as is.
 */
export async function discoverTargets(
  deps: DiscoverTargetsDeps,
  sources: readonly TargetSource[],
): Promise<DiscoveryResult> {
  const results: DiscoveryResult[] = []

  for (const source of sources) {
    const log = deps.logger.child({ source: source.name })

    let result: DiscoveryResult
    try {
      result = await source.discover()
    } catch (err) {
      log.error("Target discovery failed", { err })
      throw err
    }

    log.info("Targets discovered", {
      targets: result.addrs.length,
      warnings: result.warnings.length,
    })

    results.push(result)
  }

  return concatResults(results)
}
