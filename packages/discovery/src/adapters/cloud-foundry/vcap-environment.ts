import { z } from "zod/mini"
import { type $ZodType, prettifyError, safeParse } from "zod/v4/core"
import { ConfigError } from "../../errors/discovery-errors"
import type {
  PlatformApplication,
  PlatformEnvironment,
} from "../../ports/platform-environment"

const vcapApplicationSchema = z.object({
  application_name: z.optional(z.string()),
  name: z.optional(z.string()),
})

const vcapServiceSchema = z.object({
  name: z.string(),
  label: z._default(z.string(), ""),
  tags: z._default(z.array(z.string()), []),
  credentials: z._default(z.record(z.string(), z.unknown()), {}),
})

const vcapServicesSchema = z.record(z.string(), z.array(vcapServiceSchema))

export type VcapEnvironmentOptions = {
  /** Defaults to process.env. */
  env?: Record<string, string | undefined>
}

/**
 * Cloud Foundry environment read from `VCAP_APPLICATION` and
 * `VCAP_SERVICES`.
 */
export class VcapEnvironment implements PlatformEnvironment {
  private readonly env: Record<string, string | undefined>

  constructor(options: VcapEnvironmentOptions = {}) {
    this.env = options.env ?? process.env
  }

  isRunning(): boolean {
    return (this.env.VCAP_APPLICATION ?? "").trim() !== ""
  }

  async current(): Promise<PlatformApplication> {
    const application = this.parse("VCAP_APPLICATION", vcapApplicationSchema)
    const servicesByLabel = this.parse("VCAP_SERVICES", vcapServicesSchema)

    const name = application.application_name ?? application.name

    return {
      ...(name !== undefined && { name }),
      services: Object.values(servicesByLabel).flat(),
    }
  }

  private parse<T>(variable: string, schema: $ZodType<T>): T {
    const raw = (this.env[variable] ?? "").trim() || "{}"

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch (err) {
      throw this.invalid(variable, "is not valid JSON", err)
    }

    const result = safeParse(schema, json)

    if (!result.success) {
      throw this.invalid(variable, prettifyError(result.error), result.error)
    }

    return result.data
  }

  private invalid(variable: string, reason: string, cause: unknown): ConfigError {
    return new ConfigError(`${variable} ${reason}`, {
      code: "config_error",
      context: { variable },
      cause,
    })
  }
}
