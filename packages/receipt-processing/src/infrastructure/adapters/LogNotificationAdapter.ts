import { randomUUID } from "crypto";
import { Result, ok } from "@receipt-pipeline/types";
import { createLogger } from "@receipt-pipeline/logging";
import type { NotificationMessage } from "../../domain/entities/NotificationMessage.js";
import type { NotificationError } from "../../shared/errors/NotificationError.js";
import type { NotificationAdapter } from "./NotificationAdapter.interface.js";

const logger = createLogger({ service: "receipt-processing" }).child({
  module: "LogNotificationAdapter",
});

/**
 * Writes the report to the log instead of sending it.
 */
export class LogNotificationAdapter implements NotificationAdapter {
  constructor(private readonly recipient: string) {}

  getProviderName(): string {
    return "Log";
  }

  async send(
    message: NotificationMessage,
  ): Promise<Result<string, NotificationError>> {
    const messageId = `log-${randomUUID()}`;

    logger.info("Notification logged instead of sent", {
      messageId,
      recipient: this.recipient,
      subject: message.subject,
      textBody: message.textBody,
    });

    return ok(messageId);
  }
}
