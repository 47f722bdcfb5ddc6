import type { Logger } from "@cachewatch/logger"
import { NullLogger } from "@cachewatch/logger"
import { mock } from "vitest-mock-extended"
import { LookupError } from "../../../errors/discovery-errors"
import { FakePlatformEnvironment, redisService } from "../../../tests/utils/fake-platform-environment"
import { CloudFoundryTargetSource } from "../cloud-foundry-target-source"

describe("CloudFoundryTargetSource behavior", () => {
  it("returns nothing outside Cloud Foundry without reading the catalog", async () => {
    const platform = new FakePlatformEnvironment({ running: false })
    const source = new CloudFoundryTargetSource({ logger: new NullLogger(), platform })

    expect(await source.discover()).toEqual({ addrs: [], secrets: [], aliases: [], warnings: [] })
    expect(platform.currentCalls).toBe(0)
  })

  it("builds host:port addresses aliased by service name", async () => {
    const platform = new FakePlatformEnvironment({
      services: [
        redisService("sessions", { host: "10.0.0.5", port: "6379", password: "test-secret" }),
        redisService("jobs", { hostname: "10.0.0.6", port: "6380" }),
      ],
    })
    const source = new CloudFoundryTargetSource({ logger: new NullLogger(), platform })

    expect(await source.discover()).toEqual({
      addrs: ["10.0.0.5:6379", "10.0.0.6:6380"],
      secrets: ["test-secret", ""],
      aliases: ["sessions", "jobs"],
      warnings: [],
    })
  })

  it("only takes services tagged redis, ignoring case", async () => {
    const platform = new FakePlatformEnvironment({
      services: [
        redisService("db", { host: "10.0.0.7", port: "5432" }, ["postgres"]),
        redisService("cache", { host: "10.0.0.8", port: "6379" }, ["REDIS"]),
      ],
    })
    const source = new CloudFoundryTargetSource({ logger: new NullLogger(), platform })

    expect((await source.discover()).aliases).toEqual(["cache"])
  })

  it("honours a custom tag", async () => {
    const platform = new FakePlatformEnvironment({
      services: [redisService("kv", { host: "10.0.0.9", port: "6379" }, ["valkey"])],
    })
    const source = new CloudFoundryTargetSource({ logger: new NullLogger(), platform }, { tag: "valkey" })

    expect((await source.discover()).addrs).toEqual(["10.0.0.9:6379"])
  })

  it("warns and returns nothing when the environment cannot be read", async () => {
    const logger = mock<Logger>()
    const failure = new Error("VCAP_SERVICES is not valid JSON")
    const source = new CloudFoundryTargetSource({
      logger,
      platform: new FakePlatformEnvironment({ failure }),
    })

    const result = await source.discover()

    expect(result.addrs).toEqual([])
    expect(result.warnings).toEqual([
      {
        source: "cloud-foundry",
        code: "platform_lookup",
        message: "Unable to get current Cloud Foundry environment",
        cause: failure,
      },
    ])
    expect(logger.warn).toHaveBeenCalledWith("Unable to get current Cloud Foundry environment", {
      source: "cloud-foundry",
      code: "platform_lookup",
      err: failure,
    })
  })

  it("warns when no service carries the tag", async () => {
    const source = new CloudFoundryTargetSource({
      logger: new NullLogger(),
      platform: new FakePlatformEnvironment({ services: [] }),
    })

    expect((await source.discover()).warnings).toEqual([
      {
        source: "cloud-foundry",
        code: "platform_lookup",
        message: "Error while getting redis services: no services with tag redis",
      },
    ])
  })

  it("skips a service whose credentials hold a non-string and keeps the rest", async () => {
    const platform = new FakePlatformEnvironment({
      services: [
        redisService("broken", { host: "10.0.0.5", port: 6379 }),
        redisService("sessions", { host: "10.0.0.6", port: "6379" }),
      ],
    })
    const source = new CloudFoundryTargetSource({ logger: new NullLogger(), platform })

    const result = await source.discover()

    expect(result.aliases).toEqual(["sessions"])
    expect(result.warnings).toHaveLength(1)
    expect(result.warnings[0]).toMatchObject({
      source: "cloud-foundry",
      code: "credential_lookup",
      message: 'Skipping service broken: Credential "port" is a number, expected a string',
      resource: "broken",
    })
    expect(result.warnings[0]?.cause).toBeInstanceOf(LookupError)
  })
})
