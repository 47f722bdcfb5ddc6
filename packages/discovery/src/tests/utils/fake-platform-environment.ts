import type {
  BoundService,
  PlatformApplication,
  PlatformEnvironment,
} from "../../ports/platform-environment"

export type FakePlatformEnvironmentOptions = {
  running?: boolean
  services?: BoundService[]
  /** Makes current() reject with this value. */
  failure?: unknown
}

export class FakePlatformEnvironment implements PlatformEnvironment {
  currentCalls = 0

  constructor(private readonly options: FakePlatformEnvironmentOptions = {}) {}

  isRunning(): boolean {
    return this.options.running ?? true
  }

  async current(): Promise<PlatformApplication> {
    this.currentCalls++

    if (this.options.failure !== undefined) throw this.options.failure

    return { name: "exporter", services: this.options.services ?? [] }
  }
}

export function redisService(
  name: string,
  credentials: Record<string, unknown>,
  tags: string[] = ["redis"],
): BoundService {
  return { name, label: "p.redis", tags, credentials }
}
