export type { Result, Ok, Err } from "./result.js";
export { ok, err, isOk, isErr, map, flatMap, tryCatch, unwrap } from "./result.js";

export {
  BaseError,
  ValidationError,
  ConfigurationError,
  InfrastructureError,
  PersistenceError,
  ExternalServiceError,
} from "./errors.js";
