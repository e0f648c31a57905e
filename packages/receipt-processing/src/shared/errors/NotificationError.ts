import { ExternalServiceError } from "@receipt-pipeline/types";

/**
 * Sending the summary email failed. Logged, never fatal for an invocation.
 */
export class NotificationError extends ExternalServiceError {
  constructor(
    message: string,
    statusCode?: number,
    context?: Record<string, unknown>,
  ) {
    super("AWS SES", message, statusCode, context);
  }
}
