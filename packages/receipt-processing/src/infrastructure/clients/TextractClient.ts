import {
  TextractClient as AWSTextractClient,
  AnalyzeExpenseCommand,
  ExpenseDocument,
} from "@aws-sdk/client-textract";
import { createLogger, normalizeError } from "@receipt-pipeline/logging";
import { Result, err, ok } from "@receipt-pipeline/types";
import type { DocumentLocation } from "../../domain/value-objects/DocumentLocation.value-object.js";
import { ExtractionServiceError } from "../../shared/errors/ExtractionServiceError.js";
import { describeAwsError } from "../../shared/utils/aws-error.js";

const logger = createLogger({ service: "receipt-processing" }).child({
  module: "TextractClient",
});

export type ExpenseAnalysisResponse = {
  expenseDocuments: ExpenseDocument[];
};

/**
 * Client for AWS Textract expense analysis.
 * Wraps AWS SDK with Result pattern and structured logging.
 */
export class TextractClient {
  private readonly client: AWSTextractClient;

  constructor(region?: string) {
    const resolvedRegion = region || process.env.AWS_REGION || "eu-central-1";
    this.client = new AWSTextractClient({ region: resolvedRegion });

    logger.info("TextractClient initialized", { region: resolvedRegion });
  }

  /**
   * Runs AnalyzeExpense synchronously on a document stored in S3.
   */
  async analyzeExpense(
    location: DocumentLocation,
  ): Promise<Result<ExpenseAnalysisResponse, ExtractionServiceError>> {
    try {
      logger.info("Analyzing expense document", {
        s3Location: location.toJSON(),
      });

      const command = new AnalyzeExpenseCommand({
        Document: {
          S3Object: {
            Bucket: location.getBucket(),
            Name: location.getKey(),
          },
        },
      });

      const response = await this.client.send(command);
      const expenseDocuments = response.ExpenseDocuments || [];

      logger.info("Expense document analyzed", {
        documentCount: expenseDocuments.length,
        pageCount: response.DocumentMetadata?.Pages,
      });

      return ok({ expenseDocuments });
    } catch (error) {
      const { error: normalizedError, message } = normalizeError(error);
      const { code, statusCode } = describeAwsError(error);

      logger.error("Failed to analyze expense document", normalizedError, {
        errorMessage: message,
        errorCode: code,
        s3Location: location.toJSON(),
      });

      return err(
        new ExtractionServiceError(
          `Failed to analyze expense document: ${message}`,
          statusCode || 500,
          { error: message, code, location: location.toUri() },
        ),
      );
    }
  }
}
