import { DynamoDBClient as AWSDynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient, PutCommand } from "@aws-sdk/lib-dynamodb";
import { createLogger, normalizeError } from "@receipt-pipeline/logging";
import { PersistenceError, Result, err, ok } from "@receipt-pipeline/types";
import { describeAwsError } from "../../shared/utils/aws-error.js";

const logger = createLogger({ service: "receipt-processing" }).child({
  module: "DynamoDBClient",
});

/**
 * Client for DynamoDB item writes through the document client,
 * so plain objects are marshalled without attribute-value boilerplate.
 */
export class DynamoDBClient {
  private readonly client: DynamoDBDocumentClient;

  constructor(region?: string) {
    const resolvedRegion = region || process.env.AWS_REGION || "eu-central-1";
    this.client = DynamoDBDocumentClient.from(
      new AWSDynamoDBClient({ region: resolvedRegion }),
      { marshallOptions: { removeUndefinedValues: true } },
    );

    logger.info("DynamoDBClient initialized", { region: resolvedRegion });
  }

  /**
   * Writes a single item. Unconditional: an existing item with the same key is replaced.
   */
  async putItem(
    tableName: string,
    item: Record<string, unknown>,
  ): Promise<Result<void, PersistenceError>> {
    try {
      logger.debug("Writing item", { tableName });

      await this.client.send(
        new PutCommand({
          TableName: tableName,
          Item: item,
        }),
      );

      logger.info("Item written", { tableName });

      return ok(undefined);
    } catch (error) {
      const { error: normalizedError, message } = normalizeError(error);
      const { code, statusCode } = describeAwsError(error);

      logger.error("Failed to write item", normalizedError, {
        tableName,
        errorCode: code,
        errorMessage: message,
      });

      return err(
        new PersistenceError(`DynamoDB put failed: ${message}`, {
          tableName,
          error: message,
          code,
          statusCode,
        }),
      );
    }
  }
}
