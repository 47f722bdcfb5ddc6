import fs from "node:fs/promises"
import path from "node:path"
import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { DotenvSource } from "../dotenv-source"

describeConfigSourceContract({
  name: "DotenvSource",
  setup: async (cwd) => {
    await fs.writeFile(path.join(cwd, ".env"), "REDIS_FILE=/etc/targets.csv\n")
  },
  make: (cwd) => new DotenvSource({ file: ".env", required: true, cwd }),
  expectedValue: { REDIS_FILE: "/etc/targets.csv" },
})
