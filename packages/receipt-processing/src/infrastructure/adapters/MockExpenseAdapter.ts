import { Result, ok } from "@receipt-pipeline/types";
import { createLogger } from "@receipt-pipeline/logging";
import type { DocumentLocation } from "../../domain/value-objects/DocumentLocation.value-object.js";
import type { ExtractionServiceError } from "../../shared/errors/ExtractionServiceError.js";
import type {
  ExpenseExtraction,
  ExpenseExtractionAdapter,
} from "./ExpenseExtractionAdapter.interface.js";

const logger = createLogger({ service: "receipt-processing" }).child({
  module: "MockExpenseAdapter",
});

const field = (type: string, value: string) => ({
  Type: { Text: type, Confidence: 99 },
  ValueDetection: { Text: value, Confidence: 99 },
});

/**
 * Mock adapter for local runs and tests.
 * Returns a fixed single-receipt response without calling AWS.
 */
export class MockExpenseAdapter implements ExpenseExtractionAdapter {
  getProviderName(): string {
    return "Mock";
  }

  async analyzeExpense(
    location: DocumentLocation,
  ): Promise<Result<ExpenseExtraction, ExtractionServiceError>> {
    logger.info("Returning mock expense analysis", {
      s3Location: location.toJSON(),
    });

    return ok({
      api: "AnalyzeExpense",
      expenseDocuments: [
        {
          ExpenseIndex: 1,
          SummaryFields: [
            field("VENDOR_NAME", "Mock Market"),
            field("INVOICE_RECEIPT_DATE", "2024-01-15"),
            field("TOTAL", "12.40"),
          ],
          LineItemGroups: [
            {
              LineItemGroupIndex: 1,
              LineItems: [
                {
                  LineItemExpenseFields: [
                    field("ITEM", "Bread"),
                    field("QUANTITY", "1"),
                    field("PRICE", "3.20"),
                  ],
                },
                {
                  LineItemExpenseFields: [
                    field("ITEM", "Coffee beans"),
                    field("QUANTITY", "1"),
                    field("PRICE", "9.20"),
                  ],
                },
              ],
            },
          ],
        },
      ],
    });
  }
}
