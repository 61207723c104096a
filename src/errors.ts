/**
 * Error classes thrown at API edges that are expected to throw (signature
 * parsing, bus connection). Everything scoped to a node or a request is
 * reported as an Outcome instead.
 */

export class BusError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = "BusError";
  }
}

export type SignatureErrorKind = "MalformedSignature" | "SignatureTooDeep";

export class SignatureError extends BusError {
  constructor(
    public readonly kind: SignatureErrorKind,
    public readonly offset: number,
    public readonly detail: string
  ) {
    super(`${kind} at offset ${offset}: ${detail}`, kind === "MalformedSignature" ? "E0001" : "E0002");
    this.name = "SignatureError";
  }
}

export class ConnectionFailure extends BusError {
  constructor(
    public readonly bus: string,
    public readonly detail: string
  ) {
    super(`Cannot connect to the ${bus} bus: ${detail}`, "E0303");
    this.name = "ConnectionFailure";
  }
}

export class IntrospectionFailure extends BusError {
  constructor(
    public readonly path: string,
    public readonly detail: string
  ) {
    super(`Introspection of ${path} failed: ${detail}`, "E0304");
    this.name = "IntrospectionFailure";
  }
}

/**
 * Error reply from a peer, as raised by a BusPort implementation.
 */
export class RemoteError extends BusError {
  constructor(
    public readonly errorName: string,
    message: string
  ) {
    super(message, "E0301");
    this.name = "RemoteError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
