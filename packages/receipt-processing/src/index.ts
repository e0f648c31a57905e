/**
 * @receipt-pipeline/receipt-processing
 * Receipt pipeline: S3 trigger -> Textract AnalyzeExpense -> DynamoDB -> SES
 */

// Entry point
export { createHandler } from "./handler.js";
export type { ReceiptHandler } from "./handler.js";

// Application
export { ProcessReceiptUseCase } from "./application/use-cases/ProcessReceipt.use-case.js";
export type { ProcessReceiptDependencies } from "./application/use-cases/ProcessReceipt.use-case.js";
export { toResponseDto } from "./application/dto/ProcessReceipt.dto.js";
export type {
  NotificationOutcome,
  ProcessReceiptOutcome,
  ProcessReceiptResponseDto,
} from "./application/dto/ProcessReceipt.dto.js";

// Configuration
export { loadPipelineConfig, DEFAULT_REGION } from "./config/PipelineConfig.js";
export type {
  PipelineConfig,
  ExtractionAdapterType,
  PersistenceAdapterType,
  NotificationAdapterType,
} from "./config/PipelineConfig.js";

// Domain
export { DocumentLocation } from "./domain/value-objects/DocumentLocation.value-object.js";
export { ReceiptId } from "./domain/value-objects/ReceiptId.value-object.js";
export { ReceiptRecord } from "./domain/entities/ReceiptRecord.entity.js";
export type { ReceiptRecordItem } from "./domain/entities/ReceiptRecord.entity.js";
export type {
  LineItem,
  NormalizedExpense,
  NormalizedSummary,
} from "./domain/entities/NormalizedExpense.js";
export type { NotificationMessage } from "./domain/entities/NotificationMessage.js";
export type { ReceiptRecordRepository } from "./domain/repositories/ReceiptRecordRepository.js";
export { TriggerResolver, decodeS3Key } from "./domain/services/TriggerResolver.service.js";
export { ReceiptRecordBuilder } from "./domain/services/ReceiptRecordBuilder.service.js";
export { firstNonEmpty } from "./domain/services/FieldResolver.service.js";

// Infrastructure
export type { ExpenseExtractionAdapter } from "./infrastructure/adapters/ExpenseExtractionAdapter.interface.js";
export type { NotificationAdapter } from "./infrastructure/adapters/NotificationAdapter.interface.js";
export { TextractExpenseAdapter } from "./infrastructure/adapters/TextractExpenseAdapter.js";
export { MockExpenseAdapter } from "./infrastructure/adapters/MockExpenseAdapter.js";
export { SesNotificationAdapter } from "./infrastructure/adapters/SesNotificationAdapter.js";
export { LogNotificationAdapter } from "./infrastructure/adapters/LogNotificationAdapter.js";
export { DynamoDBReceiptRecordRepository } from "./infrastructure/repositories/DynamoDBReceiptRecordRepository.js";
export { InMemoryReceiptRecordRepository } from "./infrastructure/repositories/InMemoryReceiptRecordRepository.js";
export { ExpenseResponseParser } from "./infrastructure/parsers/ExpenseResponseParser.js";
export { ReceiptReportRenderer } from "./infrastructure/formatters/ReceiptReportRenderer.js";
export { ExtractionAdapterFactory } from "./infrastructure/factories/ExtractionAdapterFactory.js";
export { ReceiptPipelineFactory } from "./infrastructure/factories/ReceiptPipelineFactory.js";

// Errors
export { InvalidInvocationError } from "./shared/errors/InvalidInvocationError.js";
export { ExtractionServiceError } from "./shared/errors/ExtractionServiceError.js";
export { ExtractionParseError } from "./shared/errors/ExtractionParseError.js";
export { NotificationError } from "./shared/errors/NotificationError.js";
export type { ProcessReceiptError } from "./shared/errors/ProcessReceiptError.js";
