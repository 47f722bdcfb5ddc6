import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { EnvSource } from "../env-source"

describeConfigSourceContract({
  name: "EnvSource",
  setup: async () => {},
  make: () => new EnvSource({ env: { REDIS_ADDR: "redis://cache-1:6379" } }),
  expectedValue: { REDIS_ADDR: "redis://cache-1:6379" },
})
