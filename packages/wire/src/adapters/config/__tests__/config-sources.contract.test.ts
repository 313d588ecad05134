import { describeConfigSourceContract } from "../../../ports/__tests__/config-source.contract"
import { EnvSource } from "../env-source"
import { ObjectSource } from "../object-source"

describeConfigSourceContract({
  name: "EnvSource",
  make: () => new EnvSource({ env: { WIRE_MAX_DEPTH: "8" } }),
  expectedValue: () => ({ WIRE_MAX_DEPTH: "8" }),
})

describeConfigSourceContract({
  name: "ObjectSource",
  make: () => new ObjectSource({ WIRE_LOG_PRETTY: true }),
  expectedValue: () => ({ WIRE_LOG_PRETTY: true }),
})
