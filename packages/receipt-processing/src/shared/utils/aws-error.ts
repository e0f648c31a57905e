export type AwsErrorDetails = {
  code?: string;
  statusCode?: number;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

/**
 * Pulls the service error code and HTTP status out of an AWS SDK exception.
 */
export function describeAwsError(error: unknown): AwsErrorDetails {
  if (!isRecord(error)) {
    return {};
  }

  const code =
    typeof error.Code === "string"
      ? error.Code
      : typeof error.name === "string"
        ? error.name
        : undefined;

  const metadata = error.$metadata;
  const statusCode =
    isRecord(metadata) && typeof metadata.httpStatusCode === "number"
      ? metadata.httpStatusCode
      : undefined;

  return { code, statusCode };
}
