import { f16BitsToF32, f32ToF16Bits } from "../half"

describe("half precision", () => {
  it("encodes exactly representable values", () => {
    expect(f32ToF16Bits(1)).toBe(0x3c00)
    expect(f32ToF16Bits(0.5)).toBe(0x3800)
    expect(f32ToF16Bits(-2)).toBe(0xc000)
    expect(f32ToF16Bits(65504)).toBe(0x7bff)
  })

  it("keeps signed zero", () => {
    expect(f32ToF16Bits(0)).toBe(0)
    expect(f32ToF16Bits(-0)).toBe(0x8000)
  })

  it("saturates overflow to infinity", () => {
    expect(f32ToF16Bits(1e6)).toBe(0x7c00)
    expect(f32ToF16Bits(Number.NEGATIVE_INFINITY)).toBe(0xfc00)
  })

  it("keeps NaN quiet", () => {
    expect(f32ToF16Bits(Number.NaN)).toBe(0x7e00)
    expect(f16BitsToF32(0x7e00)).toBeNaN()
  })

  it("handles subnormals", () => {
    expect(f32ToF16Bits(2 ** -24)).toBe(1)
    expect(f16BitsToF32(1)).toBe(2 ** -24)
  })

  it("rounds ties to even", () => {
    expect(f32ToF16Bits(2049)).toBe(0x6800)
    expect(f32ToF16Bits(2051)).toBe(0x6802)
    expect(f32ToF16Bits(2 ** -25)).toBe(0)
    expect(f32ToF16Bits(3 * 2 ** -25)).toBe(2)
  })

  it("rounds to the nearest half value", () => {
    expect(f32ToF16Bits(0.1)).toBe(0x2e66)
    expect(f16BitsToF32(0x2e66)).toBe(0.0999755859375)
  })

  it("carries into the exponent when the significand overflows", () => {
    expect(f32ToF16Bits(2047.9)).toBe(0x6800)
    expect(f32ToF16Bits(65519)).toBe(0x7bff)
    expect(f32ToF16Bits(65520)).toBe(0x7c00)
  })

  it("decodes normal values", () => {
    expect(f16BitsToF32(0x3c00)).toBe(1)
    expect(f16BitsToF32(0xc000)).toBe(-2)
    expect(f16BitsToF32(0x7bff)).toBe(65504)
    expect(f16BitsToF32(0x7c00)).toBe(Number.POSITIVE_INFINITY)
  })
})
