export {
  ArgsTargetSource,
  type ArgsTargetSourceOptions,
  DEFAULT_REDIS_ADDR,
  discoverFromArgs,
} from "./adapters/args/args-target-source"
export {
  AzureChinaCloud,
  AzureGermanCloud,
  AzurePublicCloud,
  AzureUSGovernmentCloud,
  resolveAzureCloud,
  resourceManagerScope,
} from "./adapters/azure/azure-cloud"
export {
  AZURE_REDIS_TLS_PORT,
  AzureRedisTargetSource,
  type AzureRedisTargetSourceDeps,
  type AzureRedisTargetSourceOptions,
  azureCacheAddress,
} from "./adapters/azure/azure-redis-target-source"
export { type AzureSdkClients, AzureSdkGateway, connectAzureSdk } from "./adapters/azure/azure-sdk-gateway"
export {
  CloudFoundryTargetSource,
  type CloudFoundryTargetSourceDeps,
  type CloudFoundryTargetSourceOptions,
} from "./adapters/cloud-foundry/cloud-foundry-target-source"
export { VcapEnvironment, type VcapEnvironmentOptions } from "./adapters/cloud-foundry/vcap-environment"
export {
  CsvFileTargetSource,
  type CsvFileTargetSourceDeps,
  type CsvFileTargetSourceOptions,
} from "./adapters/file/csv-file-target-source"
export { createTargetSources, type TargetSourceDeps } from "./config/create-target-sources"
export { type LoadDiscoveryConfigOptions, loadDiscoveryConfig } from "./config/load-discovery-config"
export {
  type DiscoveryConfig,
  type DiscoveryEnv,
  discoveryEnvSchema,
  toDiscoveryConfig,
} from "./config/schema"
export { broadcastFirst } from "./core/broadcast/broadcast-first"
export { type DiscoverTargetsDeps, discoverTargets } from "./core/discover-targets"
export { lookupAlternative } from "./core/lookup/lookup-alternative"
export { appendTarget, concatResults, emptyResult, zipTargets } from "./core/targets/targets"
export { recordWarning } from "./core/warnings/record-warning"
export {
  AuthError,
  ConfigError,
  type DiscoveryError,
  IoError,
  LookupError,
  ParseError,
  QueryError,
} from "./errors/discovery-errors"
export type {
  AzureCloud,
  AzureConnectionTarget,
  AzureConnector,
  AzureRedisCache,
  AzureRedisGateway,
  AzureRedisKeys,
  AzureResourceGroup,
} from "./ports/azure-redis-gateway"
export type { DiscoveryWarning, DiscoveryWarningCode } from "./ports/discovery-warning"
export type {
  BoundService,
  CredentialMap,
  PlatformApplication,
  PlatformEnvironment,
} from "./ports/platform-environment"
export type { Target, TargetLists } from "./ports/target"
export type { DiscoveryResult, TargetSource } from "./ports/target-source"
