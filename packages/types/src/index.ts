/**
 * @receipt-pipeline/types
 * Result type, error hierarchy and branded primitives shared across packages.
 */
export * from "./result/index.js";
export * from "./utilities/index.js";
