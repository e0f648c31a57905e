import { asISODateString } from "@receipt-pipeline/types";
import type { NormalizedExpense } from "../entities/NormalizedExpense.js";
import { ReceiptRecord } from "../entities/ReceiptRecord.entity.js";
import { DocumentLocation } from "../value-objects/DocumentLocation.value-object.js";
import {
  IdGenerator,
  ReceiptId,
} from "../value-objects/ReceiptId.value-object.js";

export type Clock = () => Date;

export type BuildReceiptRecordInput = {
  location: DocumentLocation;
  expense: NormalizedExpense;
  api: string;
  documentCount: number;
};

/**
 * Domain service assembling the persistable record for one invocation.
 * Only the identifier and the timestamp are non-deterministic; both sources
 * can be replaced.
 */
export class ReceiptRecordBuilder {
  constructor(
    private readonly generateId?: IdGenerator,
    private readonly clock: Clock = () => new Date(),
  ) {}

  build(input: BuildReceiptRecordInput): ReceiptRecord {
    return ReceiptRecord.create({
      id: ReceiptId.generate(this.generateId),
      location: input.location,
      insertedAt: asISODateString(this.clock().toISOString()),
      summary: input.expense.summary,
      lineItems: input.expense.lineItems,
      provenance: {
        api: input.api,
        documentCount: input.documentCount,
      },
    });
  }
}
