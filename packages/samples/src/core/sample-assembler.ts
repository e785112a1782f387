import { createNullLogger, type Logger } from "@tensorwire/logger"
import type { PaddingPolicy } from "@tensorwire/tensor"
import { assemble, type SampleElementType, type SampleMatrix } from "./assemble"
import type { RequestInputs } from "./validators"

export type SampleAssemblerSettings = {
  elementType: SampleElementType
  padding: PaddingPolicy
}

export type SampleAssemblerDeps = {
  logger?: Logger
}

const DEFAULT_SETTINGS: SampleAssemblerSettings = { elementType: "float64", padding: "edge" }

export class SampleAssembler {
  private readonly settings: SampleAssemblerSettings
  private readonly logger: Logger

  constructor(settings: Partial<SampleAssemblerSettings> = {}, deps: SampleAssemblerDeps = {}) {
    this.settings = { ...DEFAULT_SETTINGS, ...settings }
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "sample-assembler" })
  }

  assemble(
    requestInputs: RequestInputs,
    featureNames: readonly string[],
    nbFeatures: number,
    requestId?: string,
  ): SampleMatrix {
    const logger: Logger = requestId === undefined ? this.logger : this.logger.child({ requestId })

    const matrix = assemble(requestInputs, featureNames, nbFeatures, this.settings.elementType, {
      padding: this.settings.padding,
      logger,
    })

    logger.debug("Assembled sample matrix", {
      features: featureNames.length,
      samples: matrix.shape[0],
      nativeType: matrix.dtype,
    })

    return matrix
  }
}
