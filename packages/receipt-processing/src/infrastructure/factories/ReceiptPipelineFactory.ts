import { createLogger } from "@receipt-pipeline/logging";
import { ProcessReceiptUseCase } from "../../application/use-cases/ProcessReceipt.use-case.js";
import type { PipelineConfig } from "../../config/PipelineConfig.js";
import type { ReceiptRecordRepository } from "../../domain/repositories/ReceiptRecordRepository.js";
import type { NotificationAdapter } from "../adapters/NotificationAdapter.interface.js";
import { LogNotificationAdapter } from "../adapters/LogNotificationAdapter.js";
import { SesNotificationAdapter } from "../adapters/SesNotificationAdapter.js";
import { DynamoDBClient } from "../clients/DynamoDBClient.js";
import { SESClient } from "../clients/SESClient.js";
import { DynamoDBReceiptRecordRepository } from "../repositories/DynamoDBReceiptRecordRepository.js";
import { InMemoryReceiptRecordRepository } from "../repositories/InMemoryReceiptRecordRepository.js";
import { ExtractionAdapterFactory } from "./ExtractionAdapterFactory.js";

const logger = createLogger({ service: "receipt-processing" }).child({
  module: "ReceiptPipelineFactory",
});

/**
 * Wires a validated configuration into a ready-to-run use case.
 * Every AWS client is created here, once per call.
 */
export class ReceiptPipelineFactory {
  static create(config: PipelineConfig): ProcessReceiptUseCase {
    logger.info("Creating receipt pipeline", {
      region: config.region,
      extractionAdapter: config.extractionAdapter,
      persistenceAdapter: config.persistenceAdapter,
      notificationAdapter: config.notificationAdapter,
    });

    return new ProcessReceiptUseCase({
      extractionAdapter: ExtractionAdapterFactory.create({
        type: config.extractionAdapter,
        region: config.region,
      }),
      repository: this.createRepository(config),
      notificationAdapter: this.createNotificationAdapter(config),
    });
  }

  private static createRepository(
    config: PipelineConfig,
  ): ReceiptRecordRepository {
    switch (config.persistenceAdapter) {
      case "dynamodb":
        return new DynamoDBReceiptRecordRepository(
          new DynamoDBClient(config.region),
          config.tableName,
        );

      case "memory":
        return new InMemoryReceiptRecordRepository();
    }
  }

  private static createNotificationAdapter(
    config: PipelineConfig,
  ): NotificationAdapter {
    switch (config.notificationAdapter) {
      case "ses":
        return new SesNotificationAdapter(
          new SESClient(config.region),
          config.sender,
          config.recipient,
        );

      case "log":
        return new LogNotificationAdapter(config.recipient);
    }
  }
}
