import type { ISODateString } from "@receipt-pipeline/types";
import { DocumentLocation } from "../value-objects/DocumentLocation.value-object.js";
import { ReceiptId } from "../value-objects/ReceiptId.value-object.js";
import type {
  LineItem,
  NormalizedSummary,
  RawLineItemFields,
} from "./NormalizedExpense.js";

export type ExtractionProvenance = {
  api: string;
  documentCount: number;
};

export type ReceiptRecordProps = {
  id: ReceiptId;
  location: DocumentLocation;
  insertedAt: ISODateString;
  summary: NormalizedSummary;
  lineItems: LineItem[];
  provenance: ExtractionProvenance;
};

export type LineItemAttributes = {
  description: string;
  quantity: string;
  unit_price: string;
  total: string;
  _raw: RawLineItemFields;
};

/**
 * Shape written to the receipts table.
 */
export type ReceiptRecordItem = {
  receipt_id: string;
  s3_bucket: string;
  s3_key: string;
  inserted_at: string;
  summary: NormalizedSummary;
  line_items: LineItemAttributes[];
  textract_meta: {
    api: string;
    doc_count: number;
  };
};

/**
 * Entity representing one processed receipt.
 * Created once per invocation, written once, never updated.
 */
export class ReceiptRecord {
  private constructor(private readonly props: Readonly<ReceiptRecordProps>) {}

  /**
   * Copies the given summary and line items into a new record.
   */
  static create(props: ReceiptRecordProps): ReceiptRecord {
    return new ReceiptRecord({
      ...props,
      summary: { ...props.summary },
      lineItems: props.lineItems.map((item) => ({
        ...item,
        raw: { ...item.raw },
      })),
      provenance: { ...props.provenance },
    });
  }

  getId(): ReceiptId {
    return this.props.id;
  }

  getLocation(): DocumentLocation {
    return this.props.location;
  }

  getInsertedAt(): ISODateString {
    return this.props.insertedAt;
  }

  getSummary(): Readonly<NormalizedSummary> {
    return this.props.summary;
  }

  getLineItems(): ReadonlyArray<Readonly<LineItem>> {
    return this.props.lineItems;
  }

  getProvenance(): Readonly<ExtractionProvenance> {
    return this.props.provenance;
  }

  /**
   * Converts the record to its persisted attribute layout.
   */
  toItem(): ReceiptRecordItem {
    return {
      receipt_id: this.props.id.toString(),
      s3_bucket: this.props.location.getBucket(),
      s3_key: this.props.location.getKey(),
      inserted_at: this.props.insertedAt,
      summary: { ...this.props.summary },
      line_items: this.props.lineItems.map((item) => ({
        description: item.description,
        quantity: item.quantity,
        unit_price: item.unitPrice,
        total: item.total,
        _raw: { ...item.raw },
      })),
      textract_meta: {
        api: this.props.provenance.api,
        doc_count: this.props.provenance.documentCount,
      },
    };
  }
}
