import type { NotificationMessage } from "../../domain/entities/NotificationMessage.js";
import type { ReceiptRecord } from "../../domain/entities/ReceiptRecord.entity.js";
import { firstNonEmpty } from "../../domain/services/FieldResolver.service.js";
import { HtmlReportFormatter } from "./HtmlReportFormatter.js";
import { PlainTextReportFormatter } from "./PlainTextReportFormatter.js";
import type { ReceiptReport, ReportFormatter } from "./ReportFormatter.interface.js";

export const VENDOR_KEYS = ["VENDOR_NAME", "RECEIVER_NAME", "SUPPLIER_NAME"];
export const DATE_KEYS = ["INVOICE_RECEIPT_DATE", "INVOICE_DATE", "RECEIPT_DATE"];
export const TOTAL_KEYS = ["TOTAL", "AMOUNT_DUE", "INVOICE_TOTAL"];

/**
 * Renders the notification email for a persisted receipt record.
 * Pure: the same record always yields the same message.
 */
export class ReceiptReportRenderer {
  constructor(
    private readonly textFormatter: ReportFormatter = new PlainTextReportFormatter(),
    private readonly htmlFormatter: ReportFormatter = new HtmlReportFormatter(),
  ) {}

  render(record: ReceiptRecord): NotificationMessage {
    const report = this.toReport(record);

    return {
      subject: `Receipt processed: ${report.vendor} on ${report.date} (Total ${report.total})`,
      textBody: this.textFormatter.format(report),
      htmlBody: this.htmlFormatter.format(report),
    };
  }

  private toReport(record: ReceiptRecord): ReceiptReport {
    const summary = record.getSummary();

    return {
      vendor: firstNonEmpty(summary, VENDOR_KEYS, "Unknown vendor"),
      date: firstNonEmpty(summary, DATE_KEYS, "Unknown date"),
      total: firstNonEmpty(summary, TOTAL_KEYS, "Unknown total"),
      receiptId: record.getId().toString(),
      sourceUri: record.getLocation().toUri(),
      insertedAt: record.getInsertedAt(),
      lineItems: record.getLineItems(),
    };
  }
}
