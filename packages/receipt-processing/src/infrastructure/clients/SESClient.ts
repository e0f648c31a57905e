import {
  SESClient as AWSSESClient,
  SendEmailCommand,
} from "@aws-sdk/client-ses";
import { createLogger, normalizeError } from "@receipt-pipeline/logging";
import { Result, err, ok } from "@receipt-pipeline/types";
import { NotificationError } from "../../shared/errors/NotificationError.js";
import { describeAwsError } from "../../shared/utils/aws-error.js";

const logger = createLogger({ service: "receipt-processing" }).child({
  module: "SESClient",
});

export type SendEmailParams = {
  source: string;
  toAddresses: string[];
  subject: string;
  textBody: string;
  htmlBody: string;
};

/**
 * Client for sending email through AWS SES.
 */
export class SESClient {
  private readonly client: AWSSESClient;

  constructor(region?: string) {
    const resolvedRegion = region || process.env.AWS_REGION || "eu-central-1";
    this.client = new AWSSESClient({ region: resolvedRegion });

    logger.info("SESClient initialized", { region: resolvedRegion });
  }

  /**
   * Sends a multipart (text + HTML) email. Resolves to the SES message id.
   */
  async sendEmail(
    params: SendEmailParams,
  ): Promise<Result<string, NotificationError>> {
    try {
      const response = await this.client.send(
        new SendEmailCommand({
          Source: params.source,
          Destination: { ToAddresses: params.toAddresses },
          Message: {
            Subject: { Data: params.subject },
            Body: {
              Text: { Data: params.textBody },
              Html: { Data: params.htmlBody },
            },
          },
        }),
      );

      logger.info("Email sent", {
        messageId: response.MessageId,
        recipients: params.toAddresses,
      });

      return ok(response.MessageId || "");
    } catch (error) {
      const { error: normalizedError, message } = normalizeError(error);
      const { code, statusCode } = describeAwsError(error);

      logger.error(
        "Failed to send email. Is the identity verified and out of the sandbox?",
        normalizedError,
        { errorCode: code, errorMessage: message },
      );

      return err(
        new NotificationError(
          `SES send failed: ${message}`,
          statusCode || 500,
          { error: message, code },
        ),
      );
    }
  }
}
