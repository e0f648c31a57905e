import {
  InfrastructureError,
  Result,
  err,
  flatMap,
  ok,
} from "@receipt-pipeline/types";
import type { DocumentLocation } from "../domain/value-objects/DocumentLocation.value-object.js";
import type { S3Client } from "../infrastructure/clients/S3Client.js";

/**
 * Confirms an existing object before the pipeline is run against it,
 * so a mistyped key fails before Textract is called.
 */
export async function ensureReceiptExists(
  storage: Pick<S3Client, "exists">,
  location: DocumentLocation,
): Promise<Result<DocumentLocation, InfrastructureError>> {
  const found = await storage.exists(location);

  return flatMap(found, (exists) =>
    exists
      ? ok(location)
      : err(
          new InfrastructureError(
            `Receipt not found: ${location.toUri()}`,
            "S3_OBJECT_NOT_FOUND",
            { bucket: location.getBucket(), key: location.getKey() },
          ),
        ),
  );
}
