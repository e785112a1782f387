import type { NativeType, NestedValues, Scalar } from "../ports/native-type"
import { TensorError } from "./tensor-error"

export type Flattened = {
  shape: number[]
  leaves: Scalar[]
}

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n
const UINT64_MAX = 2n ** 64n - 1n

function isNested(value: NestedValues): value is readonly NestedValues[] {
  return Array.isArray(value)
}

/**
 * Flatten nested arrays in row-major order. The shape is read off the first
 * element at each depth and every sibling must match it.
 */
export function flatten(values: NestedValues): Flattened {
  const shape: number[] = []
  let probe: NestedValues | undefined = values
  while (probe !== undefined && isNested(probe)) {
    shape.push(probe.length)
    probe = probe[0]
  }

  const leaves: Scalar[] = []
  const walk = (node: NestedValues, depth: number, path: readonly number[]): void => {
    if (depth === shape.length) {
      if (isNested(node)) throw ragged(path)
      leaves.push(node)
      return
    }
    if (!isNested(node) || node.length !== shape[depth]) throw ragged(path)
    node.forEach((child, index) => walk(child, depth + 1, [...path, index]))
  }
  walk(values, 0, [])

  return { shape, leaves }
}

function ragged(path: readonly number[]): TensorError {
  return TensorError.invalidValues(`Nested values are ragged at [${path.join(", ")}]`, {
    path: [...path],
  })
}

/** Native type implied by a set of leaves when the caller names none. */
export function inferNativeType(leaves: readonly Scalar[]): NativeType {
  if (leaves.length === 0) return "float64"

  const kinds = new Set(leaves.map(kindOf))
  if (kinds.size === 1) {
    const [only] = kinds
    if (only === "boolean") return "bool"
    if (only === "bytes") return "fixed_bytes"
    if (only === "string") return "str"
  }

  const numeric = [...kinds].every((k) => k === "number" || k === "bigint")
  if (!numeric) {
    throw TensorError.invalidValues(`Cannot mix ${[...kinds].sort().join(" and ")} values`, {
      kinds: [...kinds].sort(),
    })
  }

  let integral = true
  let min = 0n
  let max = 0n
  for (const leaf of leaves) {
    if (typeof leaf === "bigint") {
      if (leaf < min) min = leaf
      if (leaf > max) max = leaf
    } else if (typeof leaf === "number" && !Number.isInteger(leaf)) {
      integral = false
    }
  }

  if (!kinds.has("bigint")) return integral ? "int64" : "float64"
  if (!integral) {
    throw TensorError.invalidValues("Cannot mix bigint values with fractional numbers")
  }
  if (min >= INT64_MIN && max <= INT64_MAX) return "int64"
  if (min >= 0n && max <= UINT64_MAX) return "uint64"
  throw TensorError.invalidValues("Integer values exceed the 64-bit range", {
    min: min.toString(),
    max: max.toString(),
  })
}

type LeafKind = "number" | "bigint" | "boolean" | "bytes" | "string"

function kindOf(leaf: Scalar): LeafKind {
  if (leaf instanceof Uint8Array) return "bytes"
  switch (typeof leaf) {
    case "number":
      return "number"
    case "bigint":
      return "bigint"
    case "boolean":
      return "boolean"
    default:
      return "string"
  }
}

/** Readable kind of an arbitrary leaf for error messages. */
export function describeLeaf(leaf: Scalar): string {
  return kindOf(leaf)
}
