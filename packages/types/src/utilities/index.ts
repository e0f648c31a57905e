export type { UUID, ISODateString } from "./common.js";
export { isUUID, isISODateString, asISODateString } from "./guards.js";
