import { renderSignature } from "../signature/render";
import type { ArgDescriptor, MethodDescriptor, PropertyDescriptor, SignalDescriptor } from "./types";

function describeArg(arg: ArgDescriptor): string {
  const sig = renderSignature(arg.signature);
  return arg.name ? `${arg.name}: ${sig}` : sig;
}

/** `Name(in: t, ...) => out: t, ...`; the arrow is left out when nothing is returned. */
export function describeMethod(m: MethodDescriptor): string {
  const inputs = m.inArgs.map(describeArg).join(", ");
  const head = `${m.name}(${inputs})`;
  if (m.outArgs.length === 0) return head;
  return `${head} => ${m.outArgs.map(describeArg).join(", ")}`;
}

export function describeProperty(p: PropertyDescriptor): string {
  return `${p.name}: ${renderSignature(p.signature)} (${p.access})`;
}

export function describeSignal(s: SignalDescriptor): string {
  return `${s.name}(${s.args.map(describeArg).join(", ")})`;
}
