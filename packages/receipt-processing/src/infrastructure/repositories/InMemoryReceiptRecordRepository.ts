import { Logger, createLogger } from "@receipt-pipeline/logging";
import { PersistenceError, Result, ok } from "@receipt-pipeline/types";
import type { ReceiptRecord } from "../../domain/entities/ReceiptRecord.entity.js";
import type { ReceiptRecordRepository } from "../../domain/repositories/ReceiptRecordRepository.js";

/**
 * In-memory implementation of ReceiptRecordRepository.
 * Holds records for the lifetime of the process; used for local runs and tests.
 */
export class InMemoryReceiptRecordRepository implements ReceiptRecordRepository {
  private readonly records = new Map<string, ReceiptRecord>();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger =
      logger ||
      createLogger({ service: "receipt-processing" }).child({
        module: "InMemoryReceiptRecordRepository",
      });
  }

  async save(record: ReceiptRecord): Promise<Result<void, PersistenceError>> {
    const id = record.getId().toString();
    this.records.set(id, record);

    this.logger.debug("Receipt record stored in memory", {
      receiptId: id,
      totalRecords: this.records.size,
    });

    return ok(undefined);
  }

  findById(id: string): ReceiptRecord | undefined {
    return this.records.get(id);
  }

  count(): number {
    return this.records.size;
  }
}
