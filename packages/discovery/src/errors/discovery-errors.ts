import { BaseError } from "@cachewatch/errors"

/** The targets file could not be opened or read. */
export class IoError extends BaseError<"io_error"> {}

/** The targets file is not well-formed comma-separated data. */
export class ParseError extends BaseError<"parse_error"> {}

/** No authenticated cloud session could be established. */
export class AuthError extends BaseError<"auth_error"> {}

/** A cloud enumeration every later step depends on failed. */
export class QueryError extends BaseError<"query_error"> {}

/** Discovery settings are missing or name something that does not exist. */
export class ConfigError extends BaseError<"config_error"> {}

/** A credential value is present but not a string. */
export class LookupError extends BaseError<"lookup_error"> {}

export type DiscoveryError =
  | IoError
  | ParseError
  | AuthError
  | QueryError
  | ConfigError
  | LookupError
