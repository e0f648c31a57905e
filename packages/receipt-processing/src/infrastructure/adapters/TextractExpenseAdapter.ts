import { Result, map } from "@receipt-pipeline/types";
import type { DocumentLocation } from "../../domain/value-objects/DocumentLocation.value-object.js";
import type { ExtractionServiceError } from "../../shared/errors/ExtractionServiceError.js";
import { TextractClient } from "../clients/TextractClient.js";
import type {
  ExpenseExtraction,
  ExpenseExtractionAdapter,
} from "./ExpenseExtractionAdapter.interface.js";

export const ANALYZE_EXPENSE_API = "AnalyzeExpense";

/**
 * AWS Textract implementation of ExpenseExtractionAdapter.
 * One synchronous AnalyzeExpense call per document; no retries.
 */
export class TextractExpenseAdapter implements ExpenseExtractionAdapter {
  constructor(private readonly textractClient: TextractClient) {}

  getProviderName(): string {
    return "AWS Textract";
  }

  async analyzeExpense(
    location: DocumentLocation,
  ): Promise<Result<ExpenseExtraction, ExtractionServiceError>> {
    const response = await this.textractClient.analyzeExpense(location);

    return map(response, ({ expenseDocuments }) => ({
      api: ANALYZE_EXPENSE_API,
      expenseDocuments,
    }));
  }
}
