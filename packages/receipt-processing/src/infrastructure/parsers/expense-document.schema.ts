import { z } from "zod";

/**
 * The subset of a Textract ExpenseDocument the normalizer reads.
 * Unknown properties are stripped; every level may be absent.
 */
const expenseDetectionSchema = z.object({
  Text: z.string().nullish(),
});

export const expenseFieldSchema = z.object({
  Type: z.object({ Text: z.string().nullish() }).nullish(),
  LabelDetection: expenseDetectionSchema.nullish(),
  ValueDetection: expenseDetectionSchema.nullish(),
});

const lineItemFieldsSchema = z.object({
  LineItemExpenseFields: z.array(expenseFieldSchema).nullish(),
});

const lineItemGroupSchema = z.object({
  LineItems: z.array(lineItemFieldsSchema).nullish(),
});

export const expenseDocumentSchema = z.object({
  SummaryFields: z.array(expenseFieldSchema).nullish(),
  LineItemGroups: z.array(lineItemGroupSchema).nullish(),
});

export type ExpenseFieldShape = z.infer<typeof expenseFieldSchema>;
export type ExpenseDocumentShape = z.infer<typeof expenseDocumentSchema>;
