export { NumericString } from "./numeric-string";
