import { type FileHandle, open } from "node:fs/promises"
import type { Logger } from "@cachewatch/logger"
import { CsvError, parse } from "csv-parse/sync"
import { appendTarget, emptyResult } from "../../core/targets/targets"
import { IoError, ParseError } from "../../errors/discovery-errors"
import type { DiscoveryResult, TargetSource } from "../../ports/target-source"

export type CsvFileTargetSourceDeps = {
  logger: Logger
}

export type CsvFileTargetSourceOptions = {
  /** File with one `address[,secret[,alias]]` row per target. */
  path: string
}

const utf8 = new TextDecoder("utf-8", { fatal: true })

function isRow(record: unknown): record is string[] {
  return Array.isArray(record) && record.every((field) => typeof field === "string")
}

/**
 * Reads targets from a comma-separated file.
 *
 * Rows with one to three fields become targets, missing fields reading as
 * `""`. Rows with more fields are skipped. Blank lines are ignored.
 *
 * The file must be valid UTF-8; other bytes fail with {@link ParseError}
 * rather than being replaced.
 */
export class CsvFileTargetSource implements TargetSource {
  readonly name = "file"

  constructor(
    private readonly deps: CsvFileTargetSourceDeps,
    private readonly options: CsvFileTargetSourceOptions,
  ) {}

  async discover(): Promise<DiscoveryResult> {
    const rows = await this.readRows()
    const result = emptyResult()

    for (const [index, row] of rows.entries()) {
      const [address = "", secret = "", alias = ""] = row

      if (row.length < 1 || row.length > 3) {
        this.deps.logger.debug("Skipping targets file row", {
          source: this.name,
          row: index + 1,
          fields: row.length,
        })
        continue
      }

      appendTarget(result, { address, secret, alias })
    }

    return result
  }

  private async readRows(): Promise<string[][]> {
    const { path } = this.options

    let handle: FileHandle
    try {
      handle = await open(path, "r")
    } catch (err) {
      throw this.ioError(err)
    }

    try {
      let content: Buffer
      try {
        content = await handle.readFile()
      } catch (err) {
        throw this.ioError(err)
      }

      return this.parse(this.decode(content))
    } finally {
      await handle.close()
    }
  }

  private decode(content: Buffer): string {
    try {
      return utf8.decode(content)
    } catch (err) {
      throw new ParseError(`Targets file ${this.options.path} is not valid UTF-8`, {
        code: "parse_error",
        context: { path: this.options.path, encoding: "utf-8" },
        cause: err,
      })
    }
  }

  private parse(content: string): string[][] {
    try {
      const records: unknown = parse(content, {
        relax_column_count: true,
        skip_empty_lines: true,
      })

      return Array.isArray(records) ? records.filter(isRow) : []
    } catch (err) {
      if (!(err instanceof CsvError)) throw err

      throw new ParseError(`Malformed targets file ${this.options.path}: ${err.message}`, {
        code: "parse_error",
        context: { path: this.options.path, csvCode: err.code },
        cause: err,
      })
    }
  }

  private ioError(cause: unknown): IoError {
    return new IoError(`Cannot read targets file ${this.options.path}`, {
      code: "io_error",
      context: {
        path: this.options.path,
        ...(cause instanceof Error && "code" in cause && { errno: cause.code }),
      },
      cause,
    })
  }
}
