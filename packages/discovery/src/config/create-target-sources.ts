import type { Logger } from "@cachewatch/logger"
import { ArgsTargetSource } from "../adapters/args/args-target-source"
import { AzureRedisTargetSource } from "../adapters/azure/azure-redis-target-source"
import { CloudFoundryTargetSource } from "../adapters/cloud-foundry/cloud-foundry-target-source"
import { VcapEnvironment } from "../adapters/cloud-foundry/vcap-environment"
import { CsvFileTargetSource } from "../adapters/file/csv-file-target-source"
import type { AzureConnector } from "../ports/azure-redis-gateway"
import type { PlatformEnvironment } from "../ports/platform-environment"
import type { TargetSource } from "../ports/target-source"
import type { DiscoveryConfig } from "./schema"

export type TargetSourceDeps = {
  logger: Logger
  /** @default new VcapEnvironment() */
  platform?: PlatformEnvironment
  azureConnect?: AzureConnector
}

/**
 * Sources in discovery order: the targets file or, without one, the
 * separated lists, followed by the enabled cloud sources.
 */
export function createTargetSources(config: DiscoveryConfig, deps: TargetSourceDeps): TargetSource[] {
  const { logger } = deps

  const sources: TargetSource[] = [
    config.file
      ? new CsvFileTargetSource({ logger }, { path: config.file })
      : new ArgsTargetSource(config.args),
  ]

  if (config.cloudFoundry.enabled) {
    sources.push(
      new CloudFoundryTargetSource({ logger, platform: deps.platform ?? new VcapEnvironment() }),
    )
  }

  if (config.azure.enabled) {
    sources.push(
      new AzureRedisTargetSource(
        { logger, ...(deps.azureConnect && { connect: deps.azureConnect }) },
        {
          environmentName: config.azure.environmentName,
          ...(config.azure.subscriptionId && { subscriptionId: config.azure.subscriptionId }),
        },
      ),
    )
  }

  return sources
}
