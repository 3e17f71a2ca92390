// Conversion
// Value conversion and numeric range guards

export { convert, tryConvert } from "./convert";
export type { ConversionServices, ConvertOptions } from "./convert";
export { decimalToBigint, doubleToBigint, narrowInteger } from "./guard";
