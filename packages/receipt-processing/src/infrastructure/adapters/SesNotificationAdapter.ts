import type { Result } from "@receipt-pipeline/types";
import type { NotificationMessage } from "../../domain/entities/NotificationMessage.js";
import type { NotificationError } from "../../shared/errors/NotificationError.js";
import { SESClient } from "../clients/SESClient.js";
import type { NotificationAdapter } from "./NotificationAdapter.interface.js";

/**
 * Sends the report from one fixed sender to one fixed recipient via SES.
 */
export class SesNotificationAdapter implements NotificationAdapter {
  constructor(
    private readonly sesClient: SESClient,
    private readonly sender: string,
    private readonly recipient: string,
  ) {}

  getProviderName(): string {
    return "AWS SES";
  }

  send(message: NotificationMessage): Promise<Result<string, NotificationError>> {
    return this.sesClient.sendEmail({
      source: this.sender,
      toAddresses: [this.recipient],
      subject: message.subject,
      textBody: message.textBody,
      htmlBody: message.htmlBody,
    });
  }
}
