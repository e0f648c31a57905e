import { randomUUID } from "crypto";

export type IdGenerator = () => string;

/**
 * Value object for the identifier of a persisted receipt record.
 * A fresh one is generated per invocation and never reused.
 */
export class ReceiptId {
  private constructor(private readonly value: string) {}

  static generate(generateId: IdGenerator = randomUUID): ReceiptId {
    return new ReceiptId(generateId());
  }

  toString(): string {
    return this.value;
  }
}
