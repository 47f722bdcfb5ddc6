import { DotenvSource, EnvSource, loadConfig } from "@cachewatch/config"
import { type DiscoveryConfig, type DiscoveryEnv, discoveryEnvSchema, toDiscoveryConfig } from "./schema"

export type LoadDiscoveryConfigOptions = {
  /** @default process.env */
  env?: Record<string, string | undefined>
  /** Where `.env` is looked up. @default process.cwd() */
  cwd?: string
}

/**
 * Reads an optional `.env` file, then the environment on top of it.
 *
 * @throws ConfigValidationError when a variable has an invalid value
 */
export async function loadDiscoveryConfig(
  options: LoadDiscoveryConfigOptions = {},
): Promise<DiscoveryConfig> {
  const config = await loadConfig<DiscoveryEnv>({
    schema: discoveryEnvSchema,
    sources: [
      new DotenvSource({ file: ".env", required: false, ...(options.cwd && { cwd: options.cwd }) }),
      new EnvSource({ ...(options.env && { env: options.env }) }),
    ],
  })

  return toDiscoveryConfig(config.value)
}
