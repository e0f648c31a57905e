import type { ExtractionAdapterType } from "../../config/PipelineConfig.js";
import type { ExpenseExtractionAdapter } from "../adapters/ExpenseExtractionAdapter.interface.js";
import { MockExpenseAdapter } from "../adapters/MockExpenseAdapter.js";
import { TextractExpenseAdapter } from "../adapters/TextractExpenseAdapter.js";
import { TextractClient } from "../clients/TextractClient.js";

export type ExtractionAdapterConfig = {
  type: ExtractionAdapterType;
  region?: string;
};

/**
 * Factory for creating expense extraction adapters.
 */
export class ExtractionAdapterFactory {
  static create(config: ExtractionAdapterConfig): ExpenseExtractionAdapter {
    switch (config.type) {
      case "textract":
        return new TextractExpenseAdapter(new TextractClient(config.region));

      case "mock":
        return new MockExpenseAdapter();
    }
  }
}
