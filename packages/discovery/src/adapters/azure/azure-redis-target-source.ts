import type { Logger } from "@cachewatch/logger"
import { appendTarget, emptyResult } from "../../core/targets/targets"
import { recordWarning } from "../../core/warnings/record-warning"
import { AuthError, ConfigError, QueryError } from "../../errors/discovery-errors"
import type {
  AzureConnector,
  AzureRedisCache,
  AzureRedisGateway,
  AzureResourceGroup,
} from "../../ports/azure-redis-gateway"
import type { DiscoveryResult, TargetSource } from "../../ports/target-source"
import { resolveAzureCloud } from "./azure-cloud"
import { connectAzureSdk } from "./azure-sdk-gateway"

export const AZURE_REDIS_TLS_PORT = 6380

export type AzureRedisTargetSourceDeps = {
  logger: Logger
  /** @default connectAzureSdk */
  connect?: AzureConnector
}

export type AzureRedisTargetSourceOptions = {
  /** Cloud name, e.g. "AzurePublicCloud". */
  environmentName: string
  subscriptionId?: string
}

/**
 * Address of an Azure cache: plain `redis://` when the non-TLS port is
 * enabled, `rediss://` on the TLS port otherwise.
 */
export function azureCacheAddress(hostName: string, enableNonSslPort: boolean | undefined): string {
  return enableNonSslPort === true
    ? `redis://${hostName}`
    : `rediss://${hostName}:${AZURE_REDIS_TLS_PORT}`
}

/**
 * Targets from every Azure Cache for Redis in a subscription.
 *
 * Rejects with {@link ConfigError} for an unknown cloud or a missing
 * subscription, {@link AuthError} when no session can be established, and
 * {@link QueryError} when resource groups cannot be listed. Failures on one
 * group or cache only produce warnings.
 */
export class AzureRedisTargetSource implements TargetSource {
  readonly name = "azure"
  private readonly connect: AzureConnector

  constructor(
    private readonly deps: AzureRedisTargetSourceDeps,
    private readonly options: AzureRedisTargetSourceOptions,
  ) {
    this.connect = deps.connect ?? connectAzureSdk
  }

  async discover(): Promise<DiscoveryResult> {
    const cloud = resolveAzureCloud(this.options.environmentName)
    const subscriptionId = this.options.subscriptionId?.trim() ?? ""

    if (subscriptionId === "") {
      throw new ConfigError("No Azure subscription id is configured", {
        code: "config_error",
        context: { environmentName: cloud.name },
      })
    }

    const context = { cloud: cloud.name, subscriptionId }

    let gateway: AzureRedisGateway
    try {
      gateway = await this.connect({ cloud, subscriptionId })
    } catch (err) {
      throw new AuthError(`Cannot establish an Azure session in ${cloud.name}`, {
        code: "auth_error",
        context,
        cause: err,
      })
    }

    let groups: AzureResourceGroup[]
    try {
      groups = await gateway.listResourceGroups()
    } catch (err) {
      throw new QueryError(`Cannot list resource groups of subscription ${subscriptionId}`, {
        code: "query_error",
        context,
        cause: err,
        isRetryable: true,
      })
    }

    const result = emptyResult()

    for (const group of groups) {
      if (!group.name) {
        this.warn(result, "invalid_resource", "Skipping a resource group without a name")
        continue
      }

      let caches: AzureRedisCache[]
      try {
        caches = await gateway.listCaches(group.name)
      } catch (err) {
        this.warn(result, "resource_query", `Cannot list Redis caches in ${group.name}`, {
          resource: group.name,
          cause: err,
        })
        continue
      }

      for (const cache of caches) {
        await this.addCache(result, gateway, group.name, cache)
      }
    }

    return result
  }

  private async addCache(
    result: DiscoveryResult,
    gateway: AzureRedisGateway,
    group: string,
    cache: AzureRedisCache,
  ): Promise<void> {
    if (!cache.name || !cache.hostName) {
      this.warn(result, "invalid_resource", `Skipping a Redis cache in ${group} without a name or host name`, {
        resource: cache.name ?? group,
      })
      return
    }

    let secret = ""
    try {
      const keys = await gateway.listKeys(group, cache.name)

      if (keys.primaryKey) {
        secret = keys.primaryKey
      } else {
        this.warn(result, "missing_key", `You have no rights to read redis keys for ${cache.name}`, {
          resource: cache.name,
        })
      }
    } catch (err) {
      this.warn(result, "key_fetch", `Cannot read redis keys for ${cache.name}`, {
        resource: cache.name,
        cause: err,
      })
    }

    appendTarget(result, {
      address: azureCacheAddress(cache.hostName, cache.enableNonSslPort),
      secret,
      alias: cache.name,
    })
  }

  private warn(
    result: DiscoveryResult,
    code: "invalid_resource" | "resource_query" | "key_fetch" | "missing_key",
    message: string,
    extra: { resource?: string; cause?: unknown } = {},
  ): void {
    recordWarning(this.deps.logger, result, { source: this.name, code, message, ...extra })
  }
}
