import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "cachewatch-dotenv-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("parses key=value pairs, quotes and comments", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "# targets\nREDIS_ADDR=redis://a:6379,redis://b:6379\nREDIS_ALIAS='primary,replica'\n",
    )

    const source = new DotenvSource({ file: ".env", required: true, cwd })

    expect(await source.load()).toEqual({
      REDIS_ADDR: "redis://a:6379,redis://b:6379",
      REDIS_ALIAS: "primary,replica",
    })
  })

  it("is named after its file", () => {
    expect(new DotenvSource({ file: ".env.local", required: false, cwd }).name).toBe(
      "dotenv:.env.local",
    )
  })

  it("returns an empty object when an optional file is missing", async () => {
    const source = new DotenvSource({ file: ".env", required: false, cwd })

    expect(await source.load()).toEqual({})
  })

  it("rejects when a required file is missing", async () => {
    const source = new DotenvSource({ file: ".env", required: true, cwd })

    await expect(source.load()).rejects.toMatchObject({ code: "ENOENT" })
  })
})
