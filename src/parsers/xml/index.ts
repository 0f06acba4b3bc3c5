export { SaxEventSource } from "./SaxEventSource.js";
export type { SaxEventSourceOptions } from "./SaxEventSource.js";

export {
  parseFloatValue,
  parseIntegerValue,
  parseNumericValue,
  readFloatValue,
  readIntegerValue,
  readNumericValue,
  formatNumericValue,
  truncateText,
} from "./utils/xmlValueParsing.js";
export type { NumericReading } from "./utils/xmlValueParsing.js";
