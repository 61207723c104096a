export * from "./value";
export { formatValue } from "./format";
