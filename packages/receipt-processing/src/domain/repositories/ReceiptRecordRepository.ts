import { Result, PersistenceError } from "@receipt-pipeline/types";
import { ReceiptRecord } from "../entities/ReceiptRecord.entity.js";

/**
 * Repository interface for receipt persistence.
 * The pipeline only ever writes; there is no read path.
 */
export interface ReceiptRecordRepository {
  /**
   * Writes the record, keyed by its receipt ID.
   */
  save(record: ReceiptRecord): Promise<Result<void, PersistenceError>>;
}
