import { ExternalServiceError } from "@receipt-pipeline/types";

/**
 * Specialized error for AWS Textract AnalyzeExpense failures.
 */
export class ExtractionServiceError extends ExternalServiceError {
  constructor(
    message: string,
    statusCode?: number,
    context?: Record<string, unknown>,
  ) {
    super("AWS Textract", message, statusCode, context);
  }
}
