/**
 * One cache instance to monitor.
 *
 * An empty `secret` means the target needs no auth. An empty `alias` leaves
 * the label to the consumer, which usually falls back to the address.
 */
export type Target = Readonly<{
  address: string
  secret: string
  alias: string
}>

/**
 * Targets as three parallel sequences, index `i` of each describing the same
 * target, in discovery order.
 */
export type TargetLists = {
  addrs: string[]
  secrets: string[]
  aliases: string[]
}
