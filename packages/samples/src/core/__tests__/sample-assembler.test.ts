import { MemoryLogger } from "@tensorwire/logger"
import { SampleAssembler } from "../sample-assembler"
import { captureError, column } from "./samples-harness"

describe("SampleAssembler", () => {
  const inputs = { a: column([1, 2]), b: column([3, 4]) }

  it("assembles with float64 and edge padding by default", () => {
    const assembler = new SampleAssembler()

    expect(assembler.assemble({ a: column([5], 2) }, ["a"], 1)).toEqual({
      dtype: "float64",
      shape: [2, 1],
      data: Float64Array.of(5, 5),
    })
  })

  it("uses the configured element type", () => {
    const assembler = new SampleAssembler({ elementType: "float32" })

    expect(assembler.assemble(inputs, ["a", "b"], 2).data).toEqual(Float32Array.of(1, 3, 2, 4))
  })

  it("uses the configured padding policy", () => {
    const assembler = new SampleAssembler({ padding: "reject" })

    expect(captureError(() => assembler.assemble({ a: column([5], 2) }, ["a"], 1))).toMatchObject({
      code: "truncated_payload",
    })
  })

  it("logs one debug entry per assembled request", () => {
    const logger = new MemoryLogger()
    const assembler = new SampleAssembler({}, { logger })

    assembler.assemble(inputs, ["a", "b"], 2, "req-1")

    expect(logger.entries).toEqual([
      {
        level: "debug",
        message: "Assembled sample matrix",
        fields: {
          module: "sample-assembler",
          requestId: "req-1",
          features: 2,
          samples: 2,
          nativeType: "float64",
        },
      },
    ])
  })

  it("does not log failed requests", () => {
    const logger = new MemoryLogger()
    const assembler = new SampleAssembler({}, { logger })

    captureError(() => assembler.assemble(inputs, ["missing"], 1))

    expect(logger.entries).toEqual([])
  })
})
