import type { PersistenceError } from "@receipt-pipeline/types";
import type { ExtractionParseError } from "./ExtractionParseError.js";
import type { ExtractionServiceError } from "./ExtractionServiceError.js";
import type { InvalidInvocationError } from "./InvalidInvocationError.js";

/**
 * Errors that abort an invocation. Notification failures are not among them.
 */
export type ProcessReceiptError =
  | InvalidInvocationError
  | ExtractionServiceError
  | ExtractionParseError
  | PersistenceError;
