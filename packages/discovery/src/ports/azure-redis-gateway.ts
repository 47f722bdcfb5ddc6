export type AzureResourceGroup = Readonly<{
  name?: string
}>

export type AzureRedisCache = Readonly<{
  name?: string
  hostName?: string
  enableNonSslPort?: boolean
}>

export type AzureRedisKeys = Readonly<{
  primaryKey?: string
}>

/**
 * Read-only view of the Azure resource manager, scoped to one subscription
 * of an authenticated session.
 */
export interface AzureRedisGateway {
  listResourceGroups(): Promise<AzureResourceGroup[]>
  listCaches(resourceGroup: string): Promise<AzureRedisCache[]>
  listKeys(resourceGroup: string, cacheName: string): Promise<AzureRedisKeys>
}

export type AzureCloud = Readonly<{
  name: string
  resourceManagerEndpoint: string
  authorityHost: string
}>

export type AzureConnectionTarget = Readonly<{
  cloud: AzureCloud
  subscriptionId: string
}>

/**
 * Establishes an authenticated session. Rejects when no credential is usable.
 */
export type AzureConnector = (target: AzureConnectionTarget) => Promise<AzureRedisGateway>
