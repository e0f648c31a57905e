import { Result, err, isErr, ok } from "@receipt-pipeline/types";
import { createLogger } from "@receipt-pipeline/logging";
import type { NotificationMessage } from "../../domain/entities/NotificationMessage.js";
import type { ReceiptRecordRepository } from "../../domain/repositories/ReceiptRecordRepository.js";
import { ReceiptRecordBuilder } from "../../domain/services/ReceiptRecordBuilder.service.js";
import { TriggerResolver } from "../../domain/services/TriggerResolver.service.js";
import type { ExpenseExtractionAdapter } from "../../infrastructure/adapters/ExpenseExtractionAdapter.interface.js";
import type { NotificationAdapter } from "../../infrastructure/adapters/NotificationAdapter.interface.js";
import { ReceiptReportRenderer } from "../../infrastructure/formatters/ReceiptReportRenderer.js";
import { ExpenseResponseParser } from "../../infrastructure/parsers/ExpenseResponseParser.js";
import type { ProcessReceiptError } from "../../shared/errors/ProcessReceiptError.js";
import type {
  NotificationOutcome,
  ProcessReceiptOutcome,
} from "../dto/ProcessReceipt.dto.js";

const logger = createLogger({ service: "receipt-processing" }).child({
  module: "ProcessReceiptUseCase",
});

export type ProcessReceiptDependencies = {
  extractionAdapter: ExpenseExtractionAdapter;
  repository: ReceiptRecordRepository;
  notificationAdapter: NotificationAdapter;
  triggerResolver?: TriggerResolver;
  parser?: ExpenseResponseParser;
  recordBuilder?: ReceiptRecordBuilder;
  renderer?: ReceiptReportRenderer;
};

/**
 * Use case processing one uploaded receipt:
 * resolve trigger, extract, normalize, build record, persist, render, notify.
 *
 * Any failure up to and including persistence aborts the invocation.
 * A failed notification is logged and reported in the outcome only.
 */
export class ProcessReceiptUseCase {
  private readonly extractionAdapter: ExpenseExtractionAdapter;
  private readonly repository: ReceiptRecordRepository;
  private readonly notificationAdapter: NotificationAdapter;
  private readonly triggerResolver: TriggerResolver;
  private readonly parser: ExpenseResponseParser;
  private readonly recordBuilder: ReceiptRecordBuilder;
  private readonly renderer: ReceiptReportRenderer;

  constructor(dependencies: ProcessReceiptDependencies) {
    this.extractionAdapter = dependencies.extractionAdapter;
    this.repository = dependencies.repository;
    this.notificationAdapter = dependencies.notificationAdapter;
    this.triggerResolver = dependencies.triggerResolver || new TriggerResolver();
    this.parser = dependencies.parser || new ExpenseResponseParser();
    this.recordBuilder =
      dependencies.recordBuilder || new ReceiptRecordBuilder();
    this.renderer = dependencies.renderer || new ReceiptReportRenderer();
  }

  async execute(
    payload: unknown,
  ): Promise<Result<ProcessReceiptOutcome, ProcessReceiptError>> {
    logger.info("Received event", { event: payload });

    const locationResult = this.triggerResolver.resolve(payload);
    if (isErr(locationResult)) {
      logger.error("Invalid invocation", locationResult.error, {
        context: locationResult.error.context,
      });
      return err(locationResult.error);
    }
    const location = locationResult.value;

    logger.info("Processing receipt", {
      s3Location: location.toJSON(),
      provider: this.extractionAdapter.getProviderName(),
    });

    const extractionResult =
      await this.extractionAdapter.analyzeExpense(location);
    if (isErr(extractionResult)) {
      return err(extractionResult.error);
    }
    const extraction = extractionResult.value;

    if (extraction.expenseDocuments.length === 0) {
      logger.warn("No expense documents returned by the extraction service", {
        s3Location: location.toJSON(),
      });
    }

    const expenseResult = this.parser.parse(extraction.expenseDocuments);
    if (isErr(expenseResult)) {
      return err(expenseResult.error);
    }
    const expense = expenseResult.value;

    logger.info("Expense normalized", {
      documentCount: extraction.expenseDocuments.length,
      summaryFieldCount: Object.keys(expense.summary).length,
      lineItemsCount: expense.lineItems.length,
    });

    const record = this.recordBuilder.build({
      location,
      expense,
      api: extraction.api,
      documentCount: extraction.expenseDocuments.length,
    });
    const receiptId = record.getId().toString();

    const saveResult = await this.repository.save(record);
    if (isErr(saveResult)) {
      logger.error("Failed to persist receipt record", saveResult.error, {
        receiptId,
      });
      return err(saveResult.error);
    }

    const notification = await this.notify(
      this.renderer.render(record),
      receiptId,
    );

    logger.info("Receipt processed", {
      receiptId,
      lineItemsCount: expense.lineItems.length,
      notificationStatus: notification.status,
    });

    return ok({
      receiptId,
      location,
      summary: expense.summary,
      lineItemsCount: expense.lineItems.length,
      notification,
    });
  }

  private async notify(
    message: NotificationMessage,
    receiptId: string,
  ): Promise<NotificationOutcome> {
    const sendResult = await this.notificationAdapter.send(message);

    if (isErr(sendResult)) {
      logger.error("Notification failed", sendResult.error, {
        receiptId,
        provider: this.notificationAdapter.getProviderName(),
      });
      return { status: "failed", error: sendResult.error };
    }

    logger.info("Notification sent", {
      receiptId,
      messageId: sendResult.value,
    });

    return { status: "sent", messageId: sendResult.value };
  }
}
