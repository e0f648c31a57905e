import { unwrap } from "@receipt-pipeline/types";
import { DocumentLocation } from "../../domain/value-objects/DocumentLocation.value-object.js";
import { ExpenseResponseParser } from "../parsers/ExpenseResponseParser.js";
import { MockExpenseAdapter } from "./MockExpenseAdapter.js";

describe("MockExpenseAdapter", () => {
  it("should return a canned response the parser accepts", async () => {
    const adapter = new MockExpenseAdapter();
    const location = unwrap(DocumentLocation.create({ bucket: "b", key: "k" }));

    const extraction = unwrap(await adapter.analyzeExpense(location));
    const expense = unwrap(
      new ExpenseResponseParser().parse(extraction.expenseDocuments),
    );

    expect(extraction.api).toBe("AnalyzeExpense");
    expect(expense.summary).toEqual({
      VENDOR_NAME: "Mock Market",
      INVOICE_RECEIPT_DATE: "2024-01-15",
      TOTAL: "12.40",
    });
    expect(expense.lineItems.map((item) => item.description)).toEqual([
      "Bread",
      "Coffee beans",
    ]);
  });
});
