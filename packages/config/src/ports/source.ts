/**
 * A place configuration values are read from.
 *
 * A source only loads raw values. Validation, coercion and merging happen in
 * `loadConfig`; sources listed later override earlier ones key by key.
 */
export interface ConfigSource {
  /**
   * Shown by `explain()`, e.g. "env" or "dotenv:.env".
   */
  readonly name: string

  /**
   * Flat key/value pairs. An `undefined` value means "not provided" and does
   * not override an earlier source.
   */
  load(): Promise<Record<string, string | undefined>>
}
