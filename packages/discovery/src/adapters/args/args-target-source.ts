import { broadcastFirst } from "../../core/broadcast/broadcast-first"
import type { TargetLists } from "../../ports/target"
import type { DiscoveryResult, TargetSource } from "../../ports/target-source"

export const DEFAULT_REDIS_ADDR = "redis://localhost:6379"

export type ArgsTargetSourceOptions = {
  /** Separated addresses. Empty means {@link DEFAULT_REDIS_ADDR}. */
  addrs: string
  /** Separated secrets. A single value applies to every address. */
  secrets: string
  /** Separated aliases. A single value applies to every address. */
  aliases: string
  separator: string
}

/**
 * An empty separator splits into code points, so characters outside the
 * Basic Multilingual Plane stay whole.
 */
function split(value: string, separator: string): string[] {
  return separator === "" ? Array.from(value) : value.split(separator)
}

/**
 * Splits the three strings on `separator` and broadcasts the first secret
 * and the first alias over any address that has none.
 *
 * @example
 * ```ts
 * discoverFromArgs({ addrs: "a,b,c", secrets: "x", aliases: "", separator: "," })
 * // { addrs: ["a", "b", "c"], secrets: ["x", "x", "x"], aliases: ["", "", ""] }
 * ```
 */
export function discoverFromArgs(options: ArgsTargetSourceOptions): TargetLists {
  const addrs = split(options.addrs || DEFAULT_REDIS_ADDR, options.separator)

  return {
    addrs,
    secrets: broadcastFirst(split(options.secrets, options.separator), addrs.length),
    aliases: broadcastFirst(split(options.aliases, options.separator), addrs.length),
  }
}

export class ArgsTargetSource implements TargetSource {
  readonly name = "args"

  constructor(private readonly options: ArgsTargetSourceOptions) {}

  async discover(): Promise<DiscoveryResult> {
    return { ...discoverFromArgs(this.options), warnings: [] }
  }
}
