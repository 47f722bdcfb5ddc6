import { BaseError, type ErrorContext } from "@cachewatch/errors"

export type ConfigIssue = { path: string; message: string }

export type ConfigValidationErrorContext = ErrorContext & {
  issues: ConfigIssue[]
}

type IssueLike = { path: readonly PropertyKey[]; message: string }

function formatPath(path: readonly PropertyKey[]): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }
  return out
}

export class ConfigValidationError extends BaseError<"config_invalid"> {
  declare readonly context: ConfigValidationErrorContext

  static fromIssues(summary: string, issues: readonly IssueLike[]): ConfigValidationError {
    return new ConfigValidationError(`Configuration validation failed:\n${summary}`, {
      code: "config_invalid",
      context: {
        issues: issues.map((i) => ({ path: formatPath(i.path), message: i.message })),
      },
    })
  }
}
