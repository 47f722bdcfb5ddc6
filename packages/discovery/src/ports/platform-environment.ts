/**
 * Credentials of a bound service. Values are whatever the platform put in the
 * binding's JSON, so a port may arrive as a number.
 */
export type CredentialMap = Readonly<Record<string, unknown>>

export type BoundService = Readonly<{
  name: string
  label: string
  tags: readonly string[]
  credentials: CredentialMap
}>

export type PlatformApplication = Readonly<{
  name?: string
  /** Bound services in catalog order. */
  services: readonly BoundService[]
}>

/**
 * Access to the hosting platform the process runs on.
 */
export interface PlatformEnvironment {
  /** Whether the process runs inside the platform at all. */
  isRunning(): boolean

  /** Reads the current application environment. Rejects if it is unreadable. */
  current(): Promise<PlatformApplication>
}
