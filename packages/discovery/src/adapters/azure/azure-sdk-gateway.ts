import type { RedisAccessKeys, RedisResource } from "@azure/arm-rediscache"
import { RedisManagementClient } from "@azure/arm-rediscache"
import type { ResourceGroup } from "@azure/arm-resources"
import { ResourceManagementClient } from "@azure/arm-resources"
import { DefaultAzureCredential } from "@azure/identity"
import type {
  AzureConnectionTarget,
  AzureRedisCache,
  AzureRedisGateway,
  AzureRedisKeys,
  AzureResourceGroup,
} from "../../ports/azure-redis-gateway"
import { resourceManagerScope } from "./azure-cloud"

/**
 * The parts of the management clients the gateway calls. The `resourceGroups`
 * and `redis` operation groups of `ResourceManagementClient` and
 * `RedisManagementClient` satisfy it.
 */
export type AzureSdkClients = {
  resourceGroups: {
    list(): AsyncIterable<ResourceGroup>
  }
  redis: {
    listByResourceGroup(resourceGroupName: string): AsyncIterable<RedisResource>
    listKeys(resourceGroupName: string, name: string): Promise<RedisAccessKeys>
  }
}

export class AzureSdkGateway implements AzureRedisGateway {
  constructor(private readonly clients: AzureSdkClients) {}

  async listResourceGroups(): Promise<AzureResourceGroup[]> {
    const groups: AzureResourceGroup[] = []

    for await (const group of this.clients.resourceGroups.list()) {
      groups.push({ name: group.name })
    }

    return groups
  }

  async listCaches(resourceGroup: string): Promise<AzureRedisCache[]> {
    const caches: AzureRedisCache[] = []

    for await (const cache of this.clients.redis.listByResourceGroup(resourceGroup)) {
      caches.push({
        name: cache.name,
        hostName: cache.hostName,
        enableNonSslPort: cache.enableNonSslPort,
      })
    }

    return caches
  }

  async listKeys(resourceGroup: string, cacheName: string): Promise<AzureRedisKeys> {
    const keys = await this.clients.redis.listKeys(resourceGroup, cacheName)

    return { primaryKey: keys.primaryKey }
  }
}

/**
 * Signs in with `DefaultAzureCredential` (environment variables, workload or
 * managed identity, developer tools) against the cloud's authority and
 * fetches a resource manager token, so that a missing or rejected credential
 * fails here rather than on the first query.
 */
export async function connectAzureSdk(target: AzureConnectionTarget): Promise<AzureRedisGateway> {
  const { cloud, subscriptionId } = target
  const scope = resourceManagerScope(cloud)

  const credential = new DefaultAzureCredential({ authorityHost: cloud.authorityHost })
  const token = await credential.getToken(scope)

  if (!token) {
    throw new Error(`No access token was issued for ${scope}`)
  }

  const options = { endpoint: cloud.resourceManagerEndpoint, credentialScopes: [scope] }

  return new AzureSdkGateway({
    resourceGroups: new ResourceManagementClient(credential, subscriptionId, options).resourceGroups,
    redis: new RedisManagementClient(credential, subscriptionId, options).redis,
  })
}
