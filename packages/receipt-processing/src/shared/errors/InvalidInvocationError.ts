import { ValidationError } from "@receipt-pipeline/types";

/**
 * The invocation payload names no document to process.
 * Raised before any external call is made.
 */
export class InvalidInvocationError extends ValidationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context, "INVALID_INVOCATION");
  }
}
