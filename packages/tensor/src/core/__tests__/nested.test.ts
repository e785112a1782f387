import { flatten, inferNativeType } from "../nested"
import { captureError } from "./tensor-harness"

describe("flatten", () => {
  it("reads the shape from nesting depth and lengths", () => {
    expect(
      flatten([
        [1, 2, 3],
        [4, 5, 6],
      ]),
    ).toEqual({ shape: [2, 3], leaves: [1, 2, 3, 4, 5, 6] })
  })

  it("treats a bare value as a scalar", () => {
    expect(flatten(7)).toEqual({ shape: [], leaves: [7] })
  })

  it("keeps empty dimensions", () => {
    expect(flatten([])).toEqual({ shape: [0], leaves: [] })
    expect(flatten([[], []])).toEqual({ shape: [2, 0], leaves: [] })
  })

  it("rejects ragged nesting", () => {
    expect(captureError(() => flatten([[1, 2], [3]]))).toMatchObject({
      code: "invalid_values",
      context: { path: [1] },
    })
  })

  it("rejects a leaf where a sub-array is expected", () => {
    expect(captureError(() => flatten([[1, 2], 3]))).toMatchObject({
      code: "invalid_values",
      context: { path: [1] },
    })
  })
})

describe("inferNativeType", () => {
  it("defaults to float64 without leaves", () => {
    expect(inferNativeType([])).toBe("float64")
  })

  it("picks int64 for integers and float64 once a fraction appears", () => {
    expect(inferNativeType([1, 2, 3])).toBe("int64")
    expect(inferNativeType([1, 2.5])).toBe("float64")
  })

  it("accepts bigints next to integer numbers", () => {
    expect(inferNativeType([1, 2n])).toBe("int64")
  })

  it("widens to uint64 for non-negative values past the int64 range", () => {
    expect(inferNativeType([2n ** 63n, 1n])).toBe("uint64")
  })

  it("rejects values past both 64-bit ranges", () => {
    expect(captureError(() => inferNativeType([-1n, 2n ** 63n]))).toMatchObject({
      code: "invalid_values",
    })
  })

  it("maps booleans, byte strings and text", () => {
    expect(inferNativeType([true, false])).toBe("bool")
    expect(inferNativeType([Uint8Array.of(1)])).toBe("fixed_bytes")
    expect(inferNativeType(["a"])).toBe("str")
  })

  it("rejects mixed kinds", () => {
    expect(captureError(() => inferNativeType([1, true]))).toMatchObject({
      code: "invalid_values",
      context: { kinds: ["boolean", "number"] },
    })
  })
})
