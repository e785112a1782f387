const HALF_MIN_NORMAL = 2 ** -14
/** Halfway between the largest half (65504) and 2^16; rounds up to infinity. */
const HALF_OVERFLOW = 65520

function roundHalfEven(x: number): number {
  const floor = Math.floor(x)
  const diff = x - floor
  if (diff > 0.5) return floor + 1
  if (diff < 0.5) return floor
  return floor % 2 === 0 ? floor : floor + 1
}

/**
 * Round a number to IEEE 754 half precision, ties to even, and return its bits.
 */
export function f32ToF16Bits(value: number): number {
  if (Number.isNaN(value)) return 0x7e00

  const sign = value < 0 || Object.is(value, -0) ? 0x8000 : 0
  const abs = Math.abs(value)

  if (abs >= HALF_OVERFLOW) return sign | 0x7c00
  // A carry out of the subnormal range lands on the smallest normal, 0x0400.
  if (abs < HALF_MIN_NORMAL) return sign | roundHalfEven(abs * 2 ** 24)

  let exp = Math.floor(Math.log2(abs))
  if (2 ** exp > abs) exp -= 1
  else if (2 ** (exp + 1) <= abs) exp += 1

  const significand = roundHalfEven((abs / 2 ** exp) * 1024)
  return sign | (((exp + 15) << 10) + significand - 1024)
}

export function f16BitsToF32(h: number): number {
  const sign = (h >> 15) & 0x1
  const exp = (h >> 10) & 0x1f
  const mant = h & 0x3ff

  if (exp === 0) {
    if (mant === 0) return sign ? -0 : 0
    const f = (mant / 1024) * 2 ** -14
    return sign ? -f : f
  }
  if (exp === 31) {
    return mant ? Number.NaN : sign ? -Infinity : Infinity
  }

  const f = (1 + mant / 1024) * 2 ** (exp - 15)
  return sign ? -f : f
}
