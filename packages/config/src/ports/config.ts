/**
 * Validated configuration together with where each value came from.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ REDIS_ADDR: z._default(z.string(), "") }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.value.REDIS_ADDR        // "redis://cache-1:6379"
 * config.explain("REDIS_ADDR")   // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /**
   * Name of the source that supplied the final value of `key`, or "default"
   * when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Source names that supplied at least one schema key, without duplicates. */
  sourcesUsed(): string[]
}
