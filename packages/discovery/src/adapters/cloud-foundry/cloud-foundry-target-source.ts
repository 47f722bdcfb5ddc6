import type { Logger } from "@cachewatch/logger"
import { lookupAlternative } from "../../core/lookup/lookup-alternative"
import { appendTarget, emptyResult } from "../../core/targets/targets"
import { recordWarning } from "../../core/warnings/record-warning"
import { LookupError } from "../../errors/discovery-errors"
import type { BoundService, PlatformEnvironment } from "../../ports/platform-environment"
import type { Target } from "../../ports/target"
import type { DiscoveryResult, TargetSource } from "../../ports/target-source"

export type CloudFoundryTargetSourceDeps = {
  logger: Logger
  platform: PlatformEnvironment
}

export type CloudFoundryTargetSourceOptions = {
  /**
   * Tag bound services must carry, compared case-insensitively.
   * @default "redis"
   */
  tag?: string
}

/**
 * Targets from the services bound to a Cloud Foundry application.
 *
 * Never rejects: an unreadable environment or a catalog without matching
 * services yields an empty result with a `platform_lookup` warning.
 */
export class CloudFoundryTargetSource implements TargetSource {
  readonly name = "cloud-foundry"
  private readonly tag: string

  constructor(
    private readonly deps: CloudFoundryTargetSourceDeps,
    options: CloudFoundryTargetSourceOptions = {},
  ) {
    this.tag = options.tag ?? "redis"
  }

  async discover(): Promise<DiscoveryResult> {
    const result = emptyResult()

    if (!this.deps.platform.isRunning()) return result

    let services: readonly BoundService[]
    try {
      services = (await this.deps.platform.current()).services
    } catch (err) {
      this.warn(result, "Unable to get current Cloud Foundry environment", { cause: err })
      return result
    }

    const tagged = services.filter((service) => this.hasTag(service))

    if (tagged.length === 0) {
      this.warn(result, `Error while getting ${this.tag} services: no services with tag ${this.tag}`)
      return result
    }

    for (const service of tagged) {
      let target: Target
      try {
        target = this.toTarget(service)
      } catch (err) {
        if (!(err instanceof LookupError)) throw err

        recordWarning(this.deps.logger, result, {
          source: this.name,
          code: "credential_lookup",
          message: `Skipping service ${service.name}: ${err.message}`,
          resource: service.name,
          cause: err,
        })
        continue
      }

      appendTarget(result, target)
    }

    return result
  }

  private hasTag(service: BoundService): boolean {
    const wanted = this.tag.toLowerCase()

    return service.tags.some((tag) => tag.toLowerCase() === wanted)
  }

  private toTarget(service: BoundService): Target {
    const host = lookupAlternative(service.credentials, ["host", "hostname"])
    const port = lookupAlternative(service.credentials, ["port"])
    const secret = lookupAlternative(service.credentials, ["password"])

    return { address: `${host}:${port}`, secret, alias: service.name }
  }

  private warn(result: DiscoveryResult, message: string, extra: { cause?: unknown } = {}) {
    recordWarning(this.deps.logger, result, {
      source: this.name,
      code: "platform_lookup",
      message,
      ...extra,
    })
  }
}
