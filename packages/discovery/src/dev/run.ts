import { pathToFileURL } from "node:url"
import { serializeError } from "@cachewatch/errors"
import { type Logger, PinoLogger } from "@cachewatch/logger"
import { createTargetSources } from "../config/create-target-sources"
import { loadDiscoveryConfig } from "../config/load-discovery-config"
import { discoverTargets } from "../core/discover-targets"
import { zipTargets } from "../core/targets/targets"

/**
 * Discovers targets from the configured sources and logs them. Secrets are
 * only reported as present or absent.
 *
 * Usage: `npm run discover`
 */
export async function run(): Promise<void> {
  const config = await loadDiscoveryConfig()

  const logger: Logger = new PinoLogger(
    {},
    { level: config.log.level, prettify: config.log.prettify },
    { service: config.log.service, module: "discovery" },
  )

  try {
    const result = await discoverTargets({ logger }, createTargetSources(config, { logger }))

    for (const target of zipTargets(result)) {
      logger.info("Target", {
        address: target.address,
        alias: target.alias,
        hasSecret: target.secret !== "",
      })
    }

    logger.info("Discovery finished", {
      targets: result.addrs.length,
      warnings: result.warnings.length,
    })
  } catch (err) {
    logger.fatal("Discovery aborted", { err: serializeError(err) })
    process.exitCode = 1
  }
}

const entry = process.argv[1]

if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  run().catch((err: unknown) => {
    console.error(serializeError(err, { includeStack: true }))
    process.exitCode = 1
  })
}
