import { Config } from "../config"

describe("Config", () => {
  const data = { TENSOR_PADDING: "edge", TENSOR_DOWNCAST: true, LOG_LEVEL: "info" }
  const provenance = { TENSOR_PADDING: "env", TENSOR_DOWNCAST: "default", LOG_LEVEL: "object:overrides" }
  const mergedKeys = new Set(["TENSOR_PADDING", "LOG_LEVEL", "TENSOR_PADING"])

  const config = new Config(data, provenance, mergedKeys)

  it("get() returns the value for a key", () => {
    expect(config.get("TENSOR_PADDING")).toBe("edge")
    expect(config.get("TENSOR_DOWNCAST")).toBe(true)
  })

  it("value is the frozen data object", () => {
    expect(config.value).toBe(data)
    expect(Object.isFrozen(config.value)).toBe(true)
  })

  it("keys() lists schema keys only", () => {
    expect(config.keys()).toEqual(["TENSOR_PADDING", "TENSOR_DOWNCAST", "LOG_LEVEL"])
  })

  it("explain() names the providing source", () => {
    expect(config.explain("TENSOR_PADDING")).toBe("env")
    expect(config.explain("TENSOR_DOWNCAST")).toBe("default")
  })

  it("sourcesUsed() deduplicates", () => {
    expect(config.sourcesUsed()).toEqual(["env", "default", "object:overrides"])
  })

  it("unknownKeys() reports keys missing from the schema", () => {
    expect(config.unknownKeys()).toEqual(["TENSOR_PADING"])
  })
})
