import type { Result } from "@receipt-pipeline/types";
import type { NotificationMessage } from "../../domain/entities/NotificationMessage.js";
import type { NotificationError } from "../../shared/errors/NotificationError.js";

/**
 * Delivers the rendered receipt report to the configured recipient.
 * Resolves to the provider's message id.
 */
export interface NotificationAdapter {
  send(message: NotificationMessage): Promise<Result<string, NotificationError>>;

  getProviderName(): string;
}
