import { isErr, isOk } from "@receipt-pipeline/types";
import { ExpenseResponseParser } from "./ExpenseResponseParser.js";
import { ExtractionParseError } from "../../shared/errors/ExtractionParseError.js";

const field = (type: string | undefined, value?: string, label?: string) => ({
  Type: type === undefined ? undefined : { Text: type, Confidence: 99 },
  LabelDetection: label === undefined ? undefined : { Text: label },
  ValueDetection: value === undefined ? undefined : { Text: value },
});

describe("ExpenseResponseParser", () => {
  let parser: ExpenseResponseParser;

  beforeEach(() => {
    parser = new ExpenseResponseParser();
  });

  function parseOk(documents: unknown[]) {
    const result = parser.parse(documents);
    if (!isOk(result)) {
      throw new Error(`Expected Ok, got ${result.error.message}`);
    }
    return result.value;
  }

  describe("empty responses", () => {
    it("should return an empty summary and no line items for zero documents", () => {
      expect(parseOk([])).toEqual({ summary: {}, lineItems: [] });
    });

    it("should tolerate a document without summary fields or groups", () => {
      expect(parseOk([{}])).toEqual({ summary: {}, lineItems: [] });
    });
  });

  describe("summary fields", () => {
    it("should map declared types to detected values", () => {
      const { summary } = parseOk([
        {
          SummaryFields: [
            field("VENDOR_NAME", "Corner Bakery"),
            field("TOTAL", "42.00"),
          ],
        },
      ]);

      expect(summary).toEqual({ VENDOR_NAME: "Corner Bakery", TOTAL: "42.00" });
    });

    it("should fall back to the label detection when the type is empty", () => {
      const { summary } = parseOk([
        { SummaryFields: [field("", "Table 4", "Table No")] },
      ]);

      expect(summary).toEqual({ "Table No": "Table 4" });
    });

    it("should skip fields without any label", () => {
      const { summary } = parseOk([
        { SummaryFields: [field(undefined, "orphan"), field("TAX", "1.10")] },
      ]);

      expect(summary).toEqual({ TAX: "1.10" });
    });

    it("should keep the value of the last field with a duplicated label", () => {
      const { summary } = parseOk([
        {
          SummaryFields: [
            field("TOTAL", "10.00"),
            field("SUBTOTAL", "9.00"),
            field("TOTAL", "12.50"),
          ],
        },
      ]);

      expect(summary.TOTAL).toBe("12.50");
      expect(Object.keys(summary)).toEqual(["TOTAL", "SUBTOTAL"]);
    });

    it("should record a missing value as null", () => {
      const { summary } = parseOk([{ SummaryFields: [field("INVOICE_DATE")] }]);

      expect(summary).toEqual({ INVOICE_DATE: null });
    });

    it("should only read the first document", () => {
      const { summary } = parseOk([
        { SummaryFields: [field("TOTAL", "1.00")] },
        { SummaryFields: [field("TOTAL", "2.00"), field("TAX", "0.20")] },
      ]);

      expect(summary).toEqual({ TOTAL: "1.00" });
    });
  });

  describe("line items", () => {
    it("should normalize items across groups in encounter order", () => {
      const { lineItems } = parseOk([
        {
          LineItemGroups: [
            {
              LineItems: [
                {
                  LineItemExpenseFields: [
                    field("ITEM", "Coffee"),
                    field("QUANTITY", "2"),
                    field("PRICE", "3.00"),
                    field("TOTAL", "6.00"),
                  ],
                },
              ],
            },
            {
              LineItems: [
                {
                  LineItemExpenseFields: [
                    field("DESCRIPTION", "Croissant"),
                    field("UNIT_PRICE", "2.50"),
                    field("LINE_TOTAL", "2.50"),
                  ],
                },
              ],
            },
          ],
        },
      ]);

      expect(lineItems).toEqual([
        {
          description: "Coffee",
          quantity: "2",
          unitPrice: "3.00",
          total: "6.00",
          raw: { ITEM: "Coffee", QUANTITY: "2", PRICE: "3.00", TOTAL: "6.00" },
        },
        {
          description: "Croissant",
          quantity: "",
          unitPrice: "2.50",
          total: "2.50",
          raw: {
            DESCRIPTION: "Croissant",
            UNIT_PRICE: "2.50",
            LINE_TOTAL: "2.50",
          },
        },
      ]);
    });

    it("should prefer PRICE over UNIT_PRICE", () => {
      const { lineItems } = parseOk([
        {
          LineItemGroups: [
            {
              LineItems: [
                {
                  LineItemExpenseFields: [
                    field("UNIT_PRICE", "9.99"),
                    field("PRICE", "4.00"),
                  ],
                },
              ],
            },
          ],
        },
      ]);

      expect(lineItems[0].unitPrice).toBe("4.00");
    });

    it("should default every attribute to an empty string", () => {
      const { lineItems } = parseOk([
        {
          LineItemGroups: [
            {
              LineItems: [
                { LineItemExpenseFields: [field("EXPENSE_ROW", "Tip 1.00")] },
              ],
            },
          ],
        },
      ]);

      expect(lineItems).toEqual([
        {
          description: "",
          quantity: "",
          unitPrice: "",
          total: "",
          raw: { EXPENSE_ROW: "Tip 1.00" },
        },
      ]);
    });

    it("should keep an item with no fields as an empty entry", () => {
      const { lineItems } = parseOk([
        { LineItemGroups: [{ LineItems: [{}] }] },
      ]);

      expect(lineItems).toHaveLength(1);
      expect(lineItems[0].raw).toEqual({});
    });
  });

  describe("malformed responses", () => {
    it("should fail when summary fields are not a list", () => {
      const result = parser.parse([{ SummaryFields: "TOTAL=42" }]);

      expect(isErr(result)).toBe(true);
      if (isErr(result)) {
        expect(result.error).toBeInstanceOf(ExtractionParseError);
        expect(result.error.code).toBe("EXTRACTION_PARSE_ERROR");
        expect(result.error.issues).toEqual([
          "SummaryFields: Expected array, received string",
        ]);
      }
    });

    it("should fail when the first document is not an object", () => {
      const result = parser.parse([null]);

      expect(isErr(result)).toBe(true);
      if (isErr(result)) {
        expect(result.error.issues).toEqual([
          "(root): Expected object, received null",
        ]);
      }
    });
  });
});
