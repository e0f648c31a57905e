import { Result, ok, err } from "@receipt-pipeline/types";
import { createLogger } from "@receipt-pipeline/logging";
import type {
  LineItem,
  NormalizedExpense,
  NormalizedSummary,
  RawLineItemFields,
} from "../../domain/entities/NormalizedExpense.js";
import { firstNonEmpty } from "../../domain/services/FieldResolver.service.js";
import { ExtractionParseError } from "../../shared/errors/ExtractionParseError.js";
import {
  ExpenseDocumentShape,
  ExpenseFieldShape,
  expenseDocumentSchema,
} from "./expense-document.schema.js";

const logger = createLogger({ service: "receipt-processing" }).child({
  module: "ExpenseResponseParser",
});

const DESCRIPTION_KEYS = ["ITEM", "DESCRIPTION"] as const;
const QUANTITY_KEYS = ["QUANTITY"] as const;
const UNIT_PRICE_KEYS = ["PRICE", "UNIT_PRICE"] as const;
const LINE_TOTAL_KEYS = ["TOTAL", "LINE_TOTAL"] as const;

type LabelledValue = {
  label: string;
  value: string | null;
};

/**
 * Normalizes AnalyzeExpense documents into a flat summary and line items.
 * Only the first document is read; later documents are ignored.
 */
export class ExpenseResponseParser {
  parse(
    expenseDocuments: readonly unknown[],
  ): Result<NormalizedExpense, ExtractionParseError> {
    if (expenseDocuments.length === 0) {
      return ok({ summary: {}, lineItems: [] });
    }

    const parsed = expenseDocumentSchema.safeParse(expenseDocuments[0]);

    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
      );

      logger.error(
        "Expense document has an unexpected structure",
        parsed.error,
        { issues },
      );

      return err(
        new ExtractionParseError(
          "Expense document has an unexpected structure",
          issues,
        ),
      );
    }

    const summary = this.parseSummaryFields(parsed.data);
    const lineItems = this.parseLineItems(parsed.data);

    logger.debug("Parsed expense document", {
      summaryFieldCount: Object.keys(summary).length,
      lineItemCount: lineItems.length,
      ignoredDocumentCount: expenseDocuments.length - 1,
    });

    return ok({ summary, lineItems });
  }

  /**
   * Later fields overwrite earlier ones that resolve to the same label.
   */
  private parseSummaryFields(
    document: ExpenseDocumentShape,
  ): NormalizedSummary {
    const summary = new Map<string, string | null>();

    for (const field of document.SummaryFields ?? []) {
      const labelled = this.resolveField(field);
      if (labelled) {
        summary.set(labelled.label, labelled.value);
      }
    }

    return Object.fromEntries(summary);
  }

  private parseLineItems(document: ExpenseDocumentShape): LineItem[] {
    const items: LineItem[] = [];

    for (const group of document.LineItemGroups ?? []) {
      for (const lineItem of group.LineItems ?? []) {
        const raw = new Map<string, string | null>();

        for (const field of lineItem.LineItemExpenseFields ?? []) {
          const labelled = this.resolveField(field);
          if (labelled) {
            raw.set(labelled.label, labelled.value);
          }
        }

        items.push(this.normalizeLineItem(Object.fromEntries(raw)));
      }
    }

    return items;
  }

  private normalizeLineItem(raw: RawLineItemFields): LineItem {
    return {
      description: firstNonEmpty(raw, DESCRIPTION_KEYS, ""),
      quantity: firstNonEmpty(raw, QUANTITY_KEYS, ""),
      unitPrice: firstNonEmpty(raw, UNIT_PRICE_KEYS, ""),
      total: firstNonEmpty(raw, LINE_TOTAL_KEYS, ""),
      raw,
    };
  }

  /**
   * Label comes from the declared type, else the printed label.
   * Fields with neither are skipped.
   */
  private resolveField(field: ExpenseFieldShape): LabelledValue | null {
    const label = field.Type?.Text || field.LabelDetection?.Text;

    if (!label) {
      return null;
    }

    return { label, value: field.ValueDetection?.Text ?? null };
  }
}
