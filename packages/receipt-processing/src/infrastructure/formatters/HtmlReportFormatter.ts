import { NO_LINE_ITEMS } from "./PlainTextReportFormatter.js";
import type { ReceiptReport, ReportFormatter } from "./ReportFormatter.interface.js";

export const HTML_TABLE_LIMIT = 50;

const HTML_ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ENTITIES[char] ?? char);
}

/**
 * Formatter producing the HTML email body: header, a table of up to fifty
 * line items, footer identifiers. Every interpolated value is escaped.
 */
export class HtmlReportFormatter implements ReportFormatter {
  format(report: ReceiptReport): string {
    const rows =
      report.lineItems
        .slice(0, HTML_TABLE_LIMIT)
        .map(
          (item) =>
            "<tr>" +
            [item.description, item.quantity, item.unitPrice, item.total]
              .map((cell) => `<td>${escapeHtml(cell)}</td>`)
              .join("") +
            "</tr>",
        )
        .join("") || `<tr><td colspan='4'>${NO_LINE_ITEMS}</td></tr>`;

    return [
      "<html><body>",
      "<h2>Receipt processed</h2>",
      `<p><strong>Vendor</strong>: ${escapeHtml(report.vendor)}<br/>`,
      `<strong>Date</strong>: ${escapeHtml(report.date)}<br/>`,
      `<strong>Total</strong>: ${escapeHtml(report.total)}</p>`,
      '<table border="1" cellspacing="0" cellpadding="6">',
      "<thead><tr><th>Description</th><th>Qty</th><th>Unit Price</th><th>Line Total</th></tr></thead>",
      `<tbody>${rows}</tbody>`,
      "</table>",
      `<p>Receipt ID: ${escapeHtml(report.receiptId)}<br/>`,
      `S3: ${escapeHtml(report.sourceUri)}<br/>`,
      `Inserted at: ${escapeHtml(report.insertedAt)}</p>`,
      "</body></html>",
    ].join("\n");
  }
}
