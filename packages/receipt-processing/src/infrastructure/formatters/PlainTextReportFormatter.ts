import type { ReceiptReport, ReportFormatter } from "./ReportFormatter.interface.js";

export const TEXT_PREVIEW_LIMIT = 10;

export const NO_LINE_ITEMS = "(no line items detected)";

/**
 * Formatter producing the plain-text email body.
 * Shows at most the first ten line items.
 */
export class PlainTextReportFormatter implements ReportFormatter {
  format(report: ReceiptReport): string {
    const preview =
      report.lineItems
        .slice(0, TEXT_PREVIEW_LIMIT)
        .map(
          (item) =>
            `- ${item.description}  qty=${item.quantity}  price=${item.unitPrice}  total=${item.total}`,
        )
        .join("\n") || NO_LINE_ITEMS;

    return [
      "",
      "Your receipt has been processed.",
      "",
      `Vendor: ${report.vendor}`,
      `Date:   ${report.date}`,
      `Total:  ${report.total}`,
      "",
      "Top line items:",
      preview,
      "",
      "Metadata:",
      `- Receipt ID: ${report.receiptId}`,
      `- S3: ${report.sourceUri}`,
      `- Inserted at: ${report.insertedAt}`,
      "",
    ].join("\n");
  }
}
