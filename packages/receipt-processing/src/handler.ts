import { createLogger } from "@receipt-pipeline/logging";
import { isErr } from "@receipt-pipeline/types";
import { toResponseDto } from "./application/dto/ProcessReceipt.dto.js";
import type { ProcessReceiptResponseDto } from "./application/dto/ProcessReceipt.dto.js";
import type { ProcessReceiptUseCase } from "./application/use-cases/ProcessReceipt.use-case.js";

const logger = createLogger({ service: "receipt-processing" }).child({
  module: "handler",
});

export type ReceiptHandler = (
  event: unknown,
) => Promise<ProcessReceiptResponseDto>;

/**
 * Builds a Lambda handler around a use case provider.
 * Fatal pipeline errors are thrown so the invocation is reported as failed.
 */
export function createHandler(
  getUseCase: () => ProcessReceiptUseCase,
): ReceiptHandler {
  return async (event) => {
    const result = await getUseCase().execute(event);

    if (isErr(result)) {
      logger.error("Receipt processing failed", result.error, {
        code: result.error.code,
      });
      throw result.error;
    }

    return toResponseDto(result.value);
  };
}
