import { createLogger } from "@receipt-pipeline/logging";
import { PersistenceError, Result, isOk } from "@receipt-pipeline/types";
import type { ReceiptRecord } from "../../domain/entities/ReceiptRecord.entity.js";
import type { ReceiptRecordRepository } from "../../domain/repositories/ReceiptRecordRepository.js";
import { DynamoDBClient } from "../clients/DynamoDBClient.js";

const logger = createLogger({ service: "receipt-processing" }).child({
  module: "DynamoDBReceiptRecordRepository",
});

/**
 * DynamoDB implementation of ReceiptRecordRepository.
 * One item per record, keyed by `receipt_id`.
 */
export class DynamoDBReceiptRecordRepository implements ReceiptRecordRepository {
  constructor(
    private readonly dynamoClient: DynamoDBClient,
    private readonly tableName: string,
  ) {}

  async save(record: ReceiptRecord): Promise<Result<void, PersistenceError>> {
    const item = record.toItem();
    const result = await this.dynamoClient.putItem(this.tableName, item);

    if (isOk(result)) {
      logger.info("Receipt record stored", {
        receiptId: item.receipt_id,
        tableName: this.tableName,
        lineItemsCount: item.line_items.length,
      });
    }

    return result;
  }
}
