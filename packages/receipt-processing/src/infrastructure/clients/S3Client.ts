import {
  S3Client as AWSS3Client,
  HeadObjectCommand,
  PutObjectCommand,
} from "@aws-sdk/client-s3";
import { createLogger, normalizeError } from "@receipt-pipeline/logging";
import { InfrastructureError, Result, err, ok } from "@receipt-pipeline/types";
import type { DocumentLocation } from "../../domain/value-objects/DocumentLocation.value-object.js";
import { describeAwsError } from "../../shared/utils/aws-error.js";

const logger = createLogger({ service: "receipt-processing" }).child({
  module: "S3Client",
});

/**
 * Client for the S3 calls the local CLI makes before invoking the pipeline.
 */
export class S3Client {
  private readonly client: AWSS3Client;

  constructor(region?: string) {
    const resolvedRegion = region || process.env.AWS_REGION || "eu-central-1";
    this.client = new AWSS3Client({ region: resolvedRegion });

    logger.info("S3Client initialized", { region: resolvedRegion });
  }

  async upload(
    location: DocumentLocation,
    content: Buffer,
    contentType?: string,
  ): Promise<Result<void, InfrastructureError>> {
    const bucket = location.getBucket();
    const key = location.getKey();

    try {
      logger.info("Uploading to S3", {
        bucket,
        key,
        sizeBytes: content.length,
      });

      await this.client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: content,
          ContentType: contentType,
        }),
      );

      logger.info("Uploaded to S3", { bucket, key });

      return ok(undefined);
    } catch (error) {
      const { error: normalizedError, message } = normalizeError(error);
      const { code } = describeAwsError(error);

      logger.error("Failed to upload to S3", normalizedError, {
        bucket,
        key,
        errorCode: code,
        errorMessage: message,
      });

      return err(
        new InfrastructureError(
          `S3 upload failed: ${message}`,
          "S3_UPLOAD_ERROR",
          { bucket, key, error: message, code },
        ),
      );
    }
  }

  /**
   * Checks if an object exists in S3.
   */
  async exists(
    location: DocumentLocation,
  ): Promise<Result<boolean, InfrastructureError>> {
    const bucket = location.getBucket();
    const key = location.getKey();

    try {
      await this.client.send(
        new HeadObjectCommand({
          Bucket: bucket,
          Key: key,
        }),
      );

      return ok(true);
    } catch (error) {
      const { code, statusCode } = describeAwsError(error);
      if (code === "NotFound" || statusCode === 404) {
        return ok(false);
      }

      const { error: normalizedError, message } = normalizeError(error);

      logger.error("Failed to check S3 object existence", normalizedError, {
        bucket,
        key,
        errorMessage: message,
      });

      return err(
        new InfrastructureError(
          `Failed to check S3 object existence: ${message}`,
          "S3_HEAD_OBJECT_ERROR",
          { bucket, key, error: message },
        ),
      );
    }
  }
}
