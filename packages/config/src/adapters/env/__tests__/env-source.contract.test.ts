import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { EnvSource } from "../env-source"

describeConfigSourceContract("EnvSource", async (values) => new EnvSource({ env: { ...values } }))

describeConfigSourceContract("EnvSource with prefix", async (values) => {
  const env: Record<string, string> = { PATH: "/usr/bin" }
  for (const [key, value] of Object.entries(values)) env[`STOWAGE_${key}`] = value

  return new EnvSource({ env, prefix: "STOWAGE_" })
})
