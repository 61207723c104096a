export type { TraceEvent, TraceSink } from "./types";
export type { ClockPort } from "./clock";
export { systemClock } from "./clock";
export type {
  BusPort,
  BusCallOptions,
  MethodCall,
  PropertyTarget,
  SignalMatch,
  SignalHandler,
  Unsubscribe,
} from "./bus";
export { nullTraceSink, memoryTraceSink, fileTraceSink } from "./sink";
