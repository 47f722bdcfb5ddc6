import { type $ZodType, prettifyError, safeParse } from "zod/v4/core"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigValidationError } from "./config-validation-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  /** A zod or zod/mini schema. */
  schema: $ZodType<T>

  /** Applied in order, later ones win. Defaults to `[new EnvSource()]`. */
  sources?: ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, string> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = safeParse(schema, merged)

  if (!result.success) {
    throw ConfigValidationError.fromIssues(prettifyError(result.error), result.error.issues)
  }

  return new Config<T>(result.data, provenance)
}
