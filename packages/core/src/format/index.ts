export { format } from "./formatter";
export { MAX_FRACTION_DIGITS, parseFormatSpecifier } from "./specifier";
export { groupDigits, roundDecimal, toDecimalParts } from "./decimal";
export type { DecimalParts } from "./decimal";
