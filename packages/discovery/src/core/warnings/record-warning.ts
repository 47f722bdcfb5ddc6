import type { Logger } from "@cachewatch/logger"
import type { DiscoveryWarning } from "../../ports/discovery-warning"
import type { DiscoveryResult } from "../../ports/target-source"

/**
 * Adds `warning` to `result` and logs it at warn level.
 */
export function recordWarning(
  logger: Logger,
  result: DiscoveryResult,
  warning: DiscoveryWarning,
): void {
  result.warnings.push(warning)

  logger.warn(warning.message, {
    source: warning.source,
    code: warning.code,
    ...(warning.resource !== undefined && { resource: warning.resource }),
    ...(warning.cause !== undefined && { err: warning.cause }),
  })
}
