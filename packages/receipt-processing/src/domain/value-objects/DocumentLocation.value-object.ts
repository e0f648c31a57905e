import { Result, ok, err } from "@receipt-pipeline/types";
import { InvalidInvocationError } from "../../shared/errors/InvalidInvocationError.js";

export type DocumentLocationProps = {
  bucket: string;
  key: string;
};

/**
 * Value object identifying a stored source document by bucket and object key.
 */
export class DocumentLocation {
  private constructor(private readonly props: DocumentLocationProps) {}

  /**
   * Creates a DocumentLocation; both parts must be non-empty.
   */
  static create(
    props: DocumentLocationProps,
  ): Result<DocumentLocation, InvalidInvocationError> {
    if (!props.bucket || props.bucket.trim().length === 0) {
      return err(
        new InvalidInvocationError("Bucket cannot be empty", {
          field: "bucket",
          value: props.bucket,
        }),
      );
    }

    if (!props.key || props.key.trim().length === 0) {
      return err(
        new InvalidInvocationError("Object key cannot be empty", {
          field: "key",
          value: props.key,
        }),
      );
    }

    return ok(new DocumentLocation({ bucket: props.bucket, key: props.key }));
  }

  getBucket(): string {
    return this.props.bucket;
  }

  getKey(): string {
    return this.props.key;
  }

  /**
   * Returns the `s3://bucket/key` form used in reports and logs.
   */
  toUri(): string {
    return `s3://${this.props.bucket}/${this.props.key}`;
  }

  toJSON(): DocumentLocationProps {
    return { ...this.props };
  }
}
