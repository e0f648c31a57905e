import {
  PersistenceError,
  Result,
  err,
  isErr,
  isOk,
  isUUID,
  ok,
} from "@receipt-pipeline/types";
import type { NotificationMessage } from "../../domain/entities/NotificationMessage.js";
import type { ReceiptRecord } from "../../domain/entities/ReceiptRecord.entity.js";
import type { ReceiptRecordRepository } from "../../domain/repositories/ReceiptRecordRepository.js";
import type { DocumentLocation } from "../../domain/value-objects/DocumentLocation.value-object.js";
import type {
  ExpenseExtraction,
  ExpenseExtractionAdapter,
} from "../../infrastructure/adapters/ExpenseExtractionAdapter.interface.js";
import type { NotificationAdapter } from "../../infrastructure/adapters/NotificationAdapter.interface.js";
import { InMemoryReceiptRecordRepository } from "../../infrastructure/repositories/InMemoryReceiptRecordRepository.js";
import { ExtractionParseError } from "../../shared/errors/ExtractionParseError.js";
import { ExtractionServiceError } from "../../shared/errors/ExtractionServiceError.js";
import { InvalidInvocationError } from "../../shared/errors/InvalidInvocationError.js";
import { NotificationError } from "../../shared/errors/NotificationError.js";
import { toResponseDto } from "../dto/ProcessReceipt.dto.js";
import { ProcessReceiptUseCase } from "./ProcessReceipt.use-case.js";

class StubExtractionAdapter implements ExpenseExtractionAdapter {
  readonly analyzed: DocumentLocation[] = [];

  constructor(
    private readonly response: Result<ExpenseExtraction, ExtractionServiceError>,
  ) {}

  getProviderName(): string {
    return "Stub";
  }

  async analyzeExpense(
    location: DocumentLocation,
  ): Promise<Result<ExpenseExtraction, ExtractionServiceError>> {
    this.analyzed.push(location);
    return this.response;
  }
}

class RecordingNotificationAdapter implements NotificationAdapter {
  readonly sent: NotificationMessage[] = [];

  constructor(
    private readonly response: Result<string, NotificationError> = ok("msg-1"),
  ) {}

  getProviderName(): string {
    return "Recording";
  }

  async send(
    message: NotificationMessage,
  ): Promise<Result<string, NotificationError>> {
    this.sent.push(message);
    return this.response;
  }
}

class FailingRepository implements ReceiptRecordRepository {
  async save(_record: ReceiptRecord): Promise<Result<void, PersistenceError>> {
    return err(new PersistenceError("DynamoDB put failed: throttled"));
  }
}

const totalOnlyDocument = {
  SummaryFields: [
    { Type: { Text: "TOTAL" }, ValueDetection: { Text: "42.00" } },
  ],
};

const extraction = (
  expenseDocuments: unknown[],
): Result<ExpenseExtraction, ExtractionServiceError> =>
  ok({ api: "AnalyzeExpense", expenseDocuments });

describe("ProcessReceiptUseCase", () => {
  let repository: InMemoryReceiptRecordRepository;
  let notifier: RecordingNotificationAdapter;

  beforeEach(() => {
    repository = new InMemoryReceiptRecordRepository();
    notifier = new RecordingNotificationAdapter();
  });

  it("should persist, notify and report a processed receipt", async () => {
    const useCase = new ProcessReceiptUseCase({
      extractionAdapter: new StubExtractionAdapter(
        extraction([totalOnlyDocument]),
      ),
      repository,
      notificationAdapter: notifier,
    });

    const result = await useCase.execute({ bucket: "b", key: "k" });

    expect(isOk(result)).toBe(true);
    if (!isOk(result)) return;

    const response = toResponseDto(result.value);
    expect(response).toEqual({
      status: "ok",
      receipt_id: result.value.receiptId,
      summary: { TOTAL: "42.00" },
      line_items_count: 0,
    });
    expect(isUUID(response.receipt_id)).toBe(true);

    const stored = repository.findById(response.receipt_id);
    expect(stored?.toItem()).toMatchObject({
      receipt_id: response.receipt_id,
      s3_bucket: "b",
      s3_key: "k",
      summary: { TOTAL: "42.00" },
      line_items: [],
      textract_meta: { api: "AnalyzeExpense", doc_count: 1 },
    });

    expect(notifier.sent).toHaveLength(1);
    expect(notifier.sent[0].subject).toContain("Total 42.00");
    expect(result.value.notification).toEqual({
      status: "sent",
      messageId: "msg-1",
    });
  });

  it("should complete with empty data when no documents are returned", async () => {
    const useCase = new ProcessReceiptUseCase({
      extractionAdapter: new StubExtractionAdapter(extraction([])),
      repository,
      notificationAdapter: notifier,
    });

    const result = await useCase.execute({ bucket: "b", key: "k" });

    expect(isOk(result)).toBe(true);
    if (!isOk(result)) return;
    expect(result.value.summary).toEqual({});
    expect(result.value.lineItemsCount).toBe(0);
    expect(
      repository.findById(result.value.receiptId)?.toItem().textract_meta,
    ).toEqual({ api: "AnalyzeExpense", doc_count: 0 });
    expect(notifier.sent[0].subject).toBe(
      "Receipt processed: Unknown vendor on Unknown date (Total Unknown total)",
    );
  });

  it("should use the first record of a storage event", async () => {
    const extractionAdapter = new StubExtractionAdapter(extraction([]));
    const useCase = new ProcessReceiptUseCase({
      extractionAdapter,
      repository,
      notificationAdapter: notifier,
    });

    await useCase.execute({
      Records: [
        { s3: { bucket: { name: "uploads" }, object: { key: "my+receipt.jpg" } } },
        { s3: { bucket: { name: "other" }, object: { key: "ignored.jpg" } } },
      ],
    });

    expect(extractionAdapter.analyzed.map((l) => l.toUri())).toEqual([
      "s3://uploads/my receipt.jpg",
    ]);
  });

  it("should reject an invalid invocation without calling any service", async () => {
    const extractionAdapter = new StubExtractionAdapter(extraction([]));
    const useCase = new ProcessReceiptUseCase({
      extractionAdapter,
      repository,
      notificationAdapter: notifier,
    });

    const result = await useCase.execute({ bucket: "b" });

    expect(isErr(result)).toBe(true);
    if (isErr(result)) {
      expect(result.error).toBeInstanceOf(InvalidInvocationError);
    }
    expect(extractionAdapter.analyzed).toHaveLength(0);
    expect(repository.count()).toBe(0);
    expect(notifier.sent).toHaveLength(0);
  });

  it("should abort when extraction fails", async () => {
    const failure = new ExtractionServiceError("Access denied", 403);
    const useCase = new ProcessReceiptUseCase({
      extractionAdapter: new StubExtractionAdapter(err(failure)),
      repository,
      notificationAdapter: notifier,
    });

    const result = await useCase.execute({ bucket: "b", key: "k" });

    expect(isErr(result)).toBe(true);
    if (isErr(result)) {
      expect(result.error).toBe(failure);
    }
    expect(repository.count()).toBe(0);
    expect(notifier.sent).toHaveLength(0);
  });

  it("should abort on a malformed extraction response", async () => {
    const useCase = new ProcessReceiptUseCase({
      extractionAdapter: new StubExtractionAdapter(
        extraction([{ LineItemGroups: {} }]),
      ),
      repository,
      notificationAdapter: notifier,
    });

    const result = await useCase.execute({ bucket: "b", key: "k" });

    expect(isErr(result)).toBe(true);
    if (isErr(result)) {
      expect(result.error).toBeInstanceOf(ExtractionParseError);
    }
    expect(repository.count()).toBe(0);
  });

  it("should not notify when persistence fails", async () => {
    const useCase = new ProcessReceiptUseCase({
      extractionAdapter: new StubExtractionAdapter(
        extraction([totalOnlyDocument]),
      ),
      repository: new FailingRepository(),
      notificationAdapter: notifier,
    });

    const result = await useCase.execute({ bucket: "b", key: "k" });

    expect(isErr(result)).toBe(true);
    if (isErr(result)) {
      expect(result.error).toBeInstanceOf(PersistenceError);
    }
    expect(notifier.sent).toHaveLength(0);
  });

  it("should still succeed when the notification fails", async () => {
    const failure = new NotificationError("SES send failed: not verified", 400);
    const failingNotifier = new RecordingNotificationAdapter(err(failure));
    const useCase = new ProcessReceiptUseCase({
      extractionAdapter: new StubExtractionAdapter(
        extraction([totalOnlyDocument]),
      ),
      repository,
      notificationAdapter: failingNotifier,
    });

    const result = await useCase.execute({ bucket: "b", key: "k" });

    expect(isOk(result)).toBe(true);
    if (!isOk(result)) return;
    expect(result.value.notification).toEqual({
      status: "failed",
      error: failure,
    });
    expect(toResponseDto(result.value)).toEqual({
      status: "ok",
      receipt_id: result.value.receiptId,
      summary: { TOTAL: "42.00" },
      line_items_count: 0,
    });
    expect(repository.count()).toBe(1);
  });

  it("should create a new record on every redelivery", async () => {
    const useCase = new ProcessReceiptUseCase({
      extractionAdapter: new StubExtractionAdapter(
        extraction([totalOnlyDocument]),
      ),
      repository,
      notificationAdapter: notifier,
    });

    const first = await useCase.execute({ bucket: "b", key: "k" });
    const second = await useCase.execute({ bucket: "b", key: "k" });

    expect(isOk(first) && isOk(second)).toBe(true);
    if (isOk(first) && isOk(second)) {
      expect(first.value.receiptId).not.toBe(second.value.receiptId);
    }
    expect(repository.count()).toBe(2);
  });
});
