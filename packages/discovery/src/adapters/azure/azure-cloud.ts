import { ConfigError } from "../../errors/discovery-errors"
import type { AzureCloud } from "../../ports/azure-redis-gateway"

export const AzurePublicCloud: AzureCloud = {
  name: "AzurePublicCloud",
  resourceManagerEndpoint: "https://management.azure.com/",
  authorityHost: "https://login.microsoftonline.com",
}

export const AzureChinaCloud: AzureCloud = {
  name: "AzureChinaCloud",
  resourceManagerEndpoint: "https://management.chinacloudapi.cn/",
  authorityHost: "https://login.chinacloudapi.cn",
}

export const AzureUSGovernmentCloud: AzureCloud = {
  name: "AzureUSGovernmentCloud",
  resourceManagerEndpoint: "https://management.usgovcloudapi.net/",
  authorityHost: "https://login.microsoftonline.us",
}

export const AzureGermanCloud: AzureCloud = {
  name: "AzureGermanCloud",
  resourceManagerEndpoint: "https://management.microsoftazure.de/",
  authorityHost: "https://login.microsoftonline.de",
}

const cloudsByName: ReadonlyMap<string, AzureCloud> = new Map([
  ["AZUREPUBLICCLOUD", AzurePublicCloud],
  ["AZURECLOUD", AzurePublicCloud],
  ["AZURECHINACLOUD", AzureChinaCloud],
  ["AZUREUSGOVERNMENTCLOUD", AzureUSGovernmentCloud],
  ["AZUREUSGOVERNMENT", AzureUSGovernmentCloud],
  ["AZUREGERMANCLOUD", AzureGermanCloud],
])

/**
 * Resolves a cloud by name, case-insensitively, e.g. "AzurePublicCloud".
 *
 * @throws {@link ConfigError} for an empty or unknown name
 */
export function resolveAzureCloud(name: string): AzureCloud {
  const cloud = cloudsByName.get(name.trim().toUpperCase())

  if (!cloud) {
    throw new ConfigError(`There is no Azure cloud environment named "${name}"`, {
      code: "config_error",
      context: { environmentName: name },
    })
  }

  return cloud
}

/**
 * OAuth scope granting access to the cloud's resource manager.
 */
export function resourceManagerScope(cloud: AzureCloud): string {
  return `${cloud.resourceManagerEndpoint}.default`
}
