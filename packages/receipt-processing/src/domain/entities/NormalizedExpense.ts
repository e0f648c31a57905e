/**
 * Canonical field-type label (e.g. "TOTAL", "VENDOR_NAME") to detected text.
 * `null` when the service reported the label without a value.
 */
export type NormalizedSummary = Record<string, string | null>;

/**
 * Every label/value pair detected for a single line item.
 */
export type RawLineItemFields = Record<string, string | null>;

export type LineItem = {
  description: string;
  quantity: string;
  unitPrice: string;
  total: string;
  raw: RawLineItemFields;
};

export type NormalizedExpense = {
  summary: NormalizedSummary;
  lineItems: LineItem[];
};
