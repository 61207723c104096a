import type { TypeSignature } from "../signature/types";

export interface Annotation {
  name: string;
  value: string;
}

export interface ArgDescriptor {
  /** Introspection data does not require argument names. */
  name?: string;
  signature: TypeSignature;
}

export interface MethodDescriptor {
  name: string;
  inArgs: ArgDescriptor[];
  outArgs: ArgDescriptor[];
  annotations: Annotation[];
}

export type PropertyAccess = "read" | "write" | "readwrite";

export interface PropertyDescriptor {
  name: string;
  signature: TypeSignature;
  access: PropertyAccess;
  annotations: Annotation[];
}

export interface SignalDescriptor {
  name: string;
  args: ArgDescriptor[];
  annotations: Annotation[];
}

export interface InterfaceDescriptor {
  name: string;
  methods: MethodDescriptor[];
  properties: PropertyDescriptor[];
  signals: SignalDescriptor[];
  annotations: Annotation[];
}

/** What one Introspect round-trip tells us about one object path. */
export interface NodeDescription {
  /** Direct child path segments, in document order. */
  children: string[];
  interfaces: InterfaceDescriptor[];
}

export function isReadable(p: PropertyDescriptor): boolean {
  return p.access !== "write";
}

export function isWritable(p: PropertyDescriptor): boolean {
  return p.access !== "read";
}

export function findInterface(
  interfaces: readonly InterfaceDescriptor[],
  name: string
): InterfaceDescriptor | undefined {
  return interfaces.find((i) => i.name === name);
}
