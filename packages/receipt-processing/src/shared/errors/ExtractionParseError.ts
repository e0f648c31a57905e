import { ValidationError } from "@receipt-pipeline/types";

/**
 * The expense response did not have the expected structure.
 * `issues` holds one "path: message" entry per schema violation.
 */
export class ExtractionParseError extends ValidationError {
  constructor(
    message: string,
    public readonly issues: string[],
    context?: Record<string, unknown>,
  ) {
    super(message, { ...context, issues }, "EXTRACTION_PARSE_ERROR");
  }
}
