import type { NormalizedSummary } from "../../domain/entities/NormalizedExpense.js";
import type { DocumentLocation } from "../../domain/value-objects/DocumentLocation.value-object.js";
import type { NotificationError } from "../../shared/errors/NotificationError.js";

export type NotificationOutcome =
  | { status: "sent"; messageId: string }
  | { status: "failed"; error: NotificationError };

/**
 * Result of one successful invocation, including how the notification went.
 */
export type ProcessReceiptOutcome = {
  receiptId: string;
  location: DocumentLocation;
  summary: NormalizedSummary;
  lineItemsCount: number;
  notification: NotificationOutcome;
};

/**
 * Wire response returned to the invoker.
 */
export type ProcessReceiptResponseDto = {
  status: "ok";
  receipt_id: string;
  summary: NormalizedSummary;
  line_items_count: number;
};

export function toResponseDto(
  outcome: ProcessReceiptOutcome,
): ProcessReceiptResponseDto {
  return {
    status: "ok",
    receipt_id: outcome.receiptId,
    summary: outcome.summary,
    line_items_count: outcome.lineItemsCount,
  };
}
