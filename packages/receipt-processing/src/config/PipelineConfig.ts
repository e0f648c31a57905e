import { z } from "zod";
import { ConfigurationError, Result, err, ok } from "@receipt-pipeline/types";

export const DEFAULT_REGION = "eu-central-1";

const requiredString = z
  .string({ required_error: "is required" })
  .trim()
  .min(1, "is required");

const emailAddress = requiredString.email("must be an email address");

/** Blank values count as unset so the default applies. */
const blankAsUnset = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const adapterType = <T extends [string, ...string[]]>(
  values: T,
  fallback: T[number],
) =>
  z.preprocess(blankAsUnset, z.enum(values).default(fallback));

const envSchema = z.object({
  DDB_TABLE_NAME: requiredString,
  SES_SENDER: emailAddress,
  SES_RECIPIENT: emailAddress,
  AWS_REGION: z
    .string()
    .optional()
    .transform((region) => region?.trim() || DEFAULT_REGION),
  EXTRACTION_ADAPTER_TYPE: adapterType<["textract", "mock"]>(["textract", "mock"], "textract"),
  PERSISTENCE_ADAPTER_TYPE: adapterType<["dynamodb", "memory"]>(["dynamodb", "memory"], "dynamodb"),
  NOTIFICATION_ADAPTER_TYPE: adapterType<["ses", "log"]>(["ses", "log"], "ses"),
});

type PipelineEnv = z.infer<typeof envSchema>;

export type ExtractionAdapterType = PipelineEnv["EXTRACTION_ADAPTER_TYPE"];
export type PersistenceAdapterType = PipelineEnv["PERSISTENCE_ADAPTER_TYPE"];
export type NotificationAdapterType = PipelineEnv["NOTIFICATION_ADAPTER_TYPE"];

export type PipelineConfig = {
  tableName: string;
  sender: string;
  recipient: string;
  region: string;
  extractionAdapter: ExtractionAdapterType;
  persistenceAdapter: PersistenceAdapterType;
  notificationAdapter: NotificationAdapterType;
};

/**
 * Reads the pipeline configuration from environment variables.
 * Every offending variable is reported, not just the first.
 */
export function loadPipelineConfig(
  env: NodeJS.ProcessEnv = process.env,
): Result<PipelineConfig, ConfigurationError> {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")} ${issue.message}`,
    );
    const variables = [
      ...new Set(parsed.error.issues.map((issue) => String(issue.path[0]))),
    ];

    return err(
      new ConfigurationError(
        `Invalid pipeline configuration: ${problems.join("; ")}`,
        variables,
      ),
    );
  }

  const vars = parsed.data;

  return ok({
    tableName: vars.DDB_TABLE_NAME,
    sender: vars.SES_SENDER,
    recipient: vars.SES_RECIPIENT,
    region: vars.AWS_REGION,
    extractionAdapter: vars.EXTRACTION_ADAPTER_TYPE,
    persistenceAdapter: vars.PERSISTENCE_ADAPTER_TYPE,
    notificationAdapter: vars.NOTIFICATION_ADAPTER_TYPE,
  });
}
