export * from "./types";
export { parseIntrospection } from "./xml";
export { describeMethod, describeProperty, describeSignal } from "./describe";
