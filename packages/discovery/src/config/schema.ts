import type { LogLevelName } from "@cachewatch/logger"
import { logLevelNames } from "@cachewatch/logger"
import { z } from "zod/mini"

const flag = z._default(z.stringbool(), false)

/** Variables read from `.env` and the process environment. */
export const discoveryEnvSchema = z.object({
  REDIS_ADDR: z._default(z.string(), ""),
  REDIS_PASSWORD: z._default(z.string(), ""),
  REDIS_ALIAS: z._default(z.string(), ""),
  REDIS_EXPORTER_SEPARATOR: z._default(z.string().check(z.minLength(1)), ","),
  REDIS_FILE: z.optional(z.string()),
  REDIS_EXPORTER_USE_CF_BINDINGS: flag,
  REDIS_EXPORTER_USE_AZURE: flag,
  AZURE_ENVIRONMENT: z._default(z.string(), "AzurePublicCloud"),
  AZURE_SUBSCRIPTION_ID: z.optional(z.string()),
  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: flag,
  SERVICE_NAME: z._default(z.string(), "cache-target-discovery"),
})

export type DiscoveryEnv = z.infer<typeof discoveryEnvSchema>

export type DiscoveryConfig = {
  args: {
    addrs: string
    secrets: string
    aliases: string
    separator: string
  }
  /** Replaces the args source when set. */
  file?: string
  cloudFoundry: {
    enabled: boolean
  }
  azure: {
    enabled: boolean
    environmentName: string
    subscriptionId?: string
  }
  log: {
    level: LogLevelName
    prettify: boolean
    service: string
  }
}

export function toDiscoveryConfig(env: DiscoveryEnv): DiscoveryConfig {
  const file = env.REDIS_FILE?.trim()
  const subscriptionId = env.AZURE_SUBSCRIPTION_ID?.trim()

  return {
    args: {
      addrs: env.REDIS_ADDR,
      secrets: env.REDIS_PASSWORD,
      aliases: env.REDIS_ALIAS,
      separator: env.REDIS_EXPORTER_SEPARATOR,
    },
    ...(file && { file }),
    cloudFoundry: { enabled: env.REDIS_EXPORTER_USE_CF_BINDINGS },
    azure: {
      enabled: env.REDIS_EXPORTER_USE_AZURE,
      environmentName: env.AZURE_ENVIRONMENT,
      ...(subscriptionId && { subscriptionId }),
    },
    log: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      service: env.SERVICE_NAME,
    },
  }
}
