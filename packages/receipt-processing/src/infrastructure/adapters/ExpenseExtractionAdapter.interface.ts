import type { Result } from "@receipt-pipeline/types";
import type { DocumentLocation } from "../../domain/value-objects/DocumentLocation.value-object.js";
import type { ExtractionServiceError } from "../../shared/errors/ExtractionServiceError.js";

export type ExpenseExtraction = {
  /** Name of the provider operation, persisted as provenance. */
  api: string;
  /** Raw expense documents, validated later by the response parser. */
  expenseDocuments: readonly unknown[];
};

/**
 * Interface for expense extraction adapters.
 * Allows swapping the extraction service, e.g. for local runs without AWS.
 */
export interface ExpenseExtractionAdapter {
  analyzeExpense(
    location: DocumentLocation,
  ): Promise<Result<ExpenseExtraction, ExtractionServiceError>>;

  getProviderName(): string;
}
