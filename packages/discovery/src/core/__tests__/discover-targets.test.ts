import type { Logger } from "@cachewatch/logger"
import { mock } from "vitest-mock-extended"
import type { DiscoveryResult, TargetSource } from "../../ports/target-source"
import { discoverTargets } from "../discover-targets"

function fixedSource(name: string, result: DiscoveryResult): TargetSource {
  return { name, discover: async () => result }
}

function failingSource(name: string, err: unknown): TargetSource {
  return {
    name,
    discover: async () => {
      throw err
    },
  }
}

function setupLogger() {
  const logger = mock<Logger>()
  const child = mock<Logger>()
  logger.child.mockReturnValue(child)

  return { logger, child }
}

describe("discoverTargets", () => {
  it("concatenates results in source order", async () => {
    const { logger } = setupLogger()

    const result = await discoverTargets({ logger }, [
      fixedSource("args", { addrs: ["a"], secrets: ["s"], aliases: [""], warnings: [] }),
      fixedSource("cloud-foundry", {
        addrs: ["b:6379"],
        secrets: ["p"],
        aliases: ["svc"],
        warnings: [{ source: "cloud-foundry", code: "credential_lookup", message: "skipped" }],
      }),
    ])

    expect(result).toEqual({
      addrs: ["a", "b:6379"],
      secrets: ["s", "p"],
      aliases: ["", "svc"],
      warnings: [{ source: "cloud-foundry", code: "credential_lookup", message: "skipped" }],
    })
  })

  it("returns an empty result for no sources", async () => {
    const { logger } = setupLogger()

    expect(await discoverTargets({ logger }, [])).toEqual({
      addrs: [],
      secrets: [],
      aliases: [],
      warnings: [],
    })
  })

  it("logs each source's counts on a child logger", async () => {
    const { logger, child } = setupLogger()

    await discoverTargets({ logger }, [
      fixedSource("file", { addrs: ["a", "b"], secrets: ["", ""], aliases: ["", ""], warnings: [] }),
    ])

    expect(logger.child).toHaveBeenCalledWith({ source: "file" })
    expect(child.info).toHaveBeenCalledWith("Targets discovered", { targets: 2, warnings: 0 })
  })

  it("aborts on the first failing source and rethrows its error", async () => {
    const { logger, child } = setupLogger()
    const err = new Error("no such file")
    const later = { name: "azure", discover: vi.fn() }

    await expect(
      discoverTargets({ logger }, [failingSource("file", err), later]),
    ).rejects.toBe(err)

    expect(later.discover).not.toHaveBeenCalled()
    expect(child.error).toHaveBeenCalledWith("Target discovery failed", { err })
  })
})
