export type DiscoveryWarningCode =
  /** Platform environment or service catalog could not be read. */
  | "platform_lookup"
  /** A bound service's credentials hold a non-string value. */
  | "credential_lookup"
  /** Listing caches in one resource group failed. */
  | "resource_query"
  /** Fetching a cache's access keys failed. */
  | "key_fetch"
  /** Access keys were fetched but carry no primary key. */
  | "missing_key"
  /** A cache resource lacks its name or host name. */
  | "invalid_resource"

/**
 * A failure that degraded a discovery without aborting it. The affected
 * target was skipped or kept with an empty secret.
 */
export type DiscoveryWarning = Readonly<{
  source: string
  code: DiscoveryWarningCode
  message: string
  resource?: string
  cause?: unknown
}>
