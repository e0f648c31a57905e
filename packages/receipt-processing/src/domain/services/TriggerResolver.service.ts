import { z } from "zod";
import { Result, err, flatMap, tryCatch } from "@receipt-pipeline/types";
import { DocumentLocation } from "../value-objects/DocumentLocation.value-object.js";
import { InvalidInvocationError } from "../../shared/errors/InvalidInvocationError.js";

const storageEventSchema = z.object({
  Records: z.array(z.unknown()).nonempty(),
});

const recordWithS3Schema = z.object({
  s3: z.object({}).passthrough(),
});

const s3EventRecordSchema = z.object({
  s3: z.object({
    bucket: z.object({ name: z.string().min(1) }),
    object: z.object({ key: z.string().min(1) }),
  }),
});

const manualInvocationSchema = z.object({
  bucket: z.string().min(1),
  key: z.string().min(1),
});

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
  );
}

/**
 * S3 event notifications carry URL-encoded keys with spaces as "+".
 */
export function decodeS3Key(
  key: string,
): Result<string, InvalidInvocationError> {
  return tryCatch(
    () => decodeURIComponent(key.replace(/\+/g, " ")),
    () =>
      new InvalidInvocationError("Object key is not valid URL encoding", {
        field: "key",
        value: key,
      }),
  );
}

/**
 * Resolves the source document of an invocation.
 *
 * Storage events: only the first record is used; later records are ignored.
 * Anything else is treated as a manual `{ bucket, key }` invocation.
 */
export class TriggerResolver {
  resolve(payload: unknown): Result<DocumentLocation, InvalidInvocationError> {
    const event = storageEventSchema.safeParse(payload);

    if (
      event.success &&
      recordWithS3Schema.safeParse(event.data.Records[0]).success
    ) {
      return this.fromStorageRecord(event.data.Records[0]);
    }

    const manual = manualInvocationSchema.safeParse(payload);
    if (!manual.success) {
      return err(
        new InvalidInvocationError(
          "Provide {bucket, key} when invoking manually",
          { issues: describeIssues(manual.error) },
        ),
      );
    }

    return DocumentLocation.create(manual.data);
  }

  private fromStorageRecord(
    record: unknown,
  ): Result<DocumentLocation, InvalidInvocationError> {
    const parsed = s3EventRecordSchema.safeParse(record);

    if (!parsed.success) {
      return err(
        new InvalidInvocationError(
          "Storage event record is missing the bucket name or object key",
          { issues: describeIssues(parsed.error) },
        ),
      );
    }

    const bucket = parsed.data.s3.bucket.name;

    return flatMap(decodeS3Key(parsed.data.s3.object.key), (key) =>
      DocumentLocation.create({ bucket, key }),
    );
  }
}
