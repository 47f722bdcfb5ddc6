import type { DiscoveryWarning } from "./discovery-warning"
import type { TargetLists } from "./target"

export type DiscoveryResult = TargetLists & {
  warnings: DiscoveryWarning[]
}

/**
 * One place monitoring targets are discovered from.
 *
 * Every call discovers afresh; nothing is cached between calls. A rejected
 * promise means the whole discovery failed. Partial failures are reported as
 * `warnings` next to the targets that could still be found.
 */
export interface TargetSource {
  /**
   * Used in logs and warnings, e.g. "args", "file", "cloud-foundry", "azure".
   */
  readonly name: string

  discover(): Promise<DiscoveryResult>
}
