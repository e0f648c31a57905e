import type { LineItem } from "../../domain/entities/NormalizedExpense.js";

/**
 * Everything a report body needs, with vendor, date and total already resolved.
 */
export type ReceiptReport = {
  vendor: string;
  date: string;
  total: string;
  receiptId: string;
  sourceUri: string;
  insertedAt: string;
  lineItems: ReadonlyArray<Readonly<LineItem>>;
};

export interface ReportFormatter {
  format(report: ReceiptReport): string;
}
