import { createLogger } from "@receipt-pipeline/logging";
import { isErr } from "@receipt-pipeline/types";
import { loadPipelineConfig } from "./config/PipelineConfig.js";
import { ReceiptPipelineFactory } from "./infrastructure/factories/ReceiptPipelineFactory.js";
import { createHandler } from "./handler.js";

const logger = createLogger({ service: "receipt-processing" }).child({
  module: "lambda",
});

const config = loadPipelineConfig();

if (isErr(config)) {
  logger.fatal("Pipeline configuration is invalid", config.error, {
    variables: config.error.variables,
  });
  throw config.error;
}

const useCase = ReceiptPipelineFactory.create(config.value);

/**
 * AWS Lambda entry point (`lambda.handler`). Configuration is validated when
 * the execution environment initializes; an invalid one fails the cold start.
 */
export const handler = createHandler(() => useCase);
