import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("returns all env vars when no prefix", async () => {
    const env = {
      TENSOR_PADDING: "reject",
      TENSOR_DOWNCAST: "false",
      LOG_LEVEL: "debug",
    }

    const result = await new EnvSource({ env }).load()

    expect(result).toEqual(env)
  })

  it("filters and strips prefix when provided", async () => {
    const env = {
      APP_TENSOR_PADDING: "reject",
      APP_LOG_LEVEL: "warn",
      OTHER_KEY: "ignored",
      PATH: "/usr/bin",
    }

    const result = await new EnvSource({ env, prefix: "APP_" }).load()

    expect(result).toEqual({
      TENSOR_PADDING: "reject",
      LOG_LEVEL: "warn",
    })
  })

  it("skips empty and undefined values", async () => {
    const result = await new EnvSource({
      env: { TENSOR_PADDING: "", LOG_LEVEL: undefined, SERVICE_NAME: "scorer" },
    }).load()

    expect(result).toEqual({ SERVICE_NAME: "scorer" })
  })

  it("falls back to process.env", async () => {
    vi.stubEnv("TENSORWIRE_TEST_FLAG", "on")

    try {
      const result = await new EnvSource({ prefix: "TENSORWIRE_TEST_" }).load()

      expect(result).toEqual({ FLAG: "on" })
    } finally {
      vi.unstubAllEnvs()
    }
  })

  it("is named env", () => {
    expect(new EnvSource({ env: {} }).name).toBe("env")
  })
})
