export * from "./types";
export {
  parseSignature,
  parseSignatureList,
  DEFAULT_MAX_DEPTH,
  MAX_SIGNATURE_LENGTH,
  type SignatureOptions,
} from "./parse";
export {
  renderSignature,
  renderSignatureList,
  signatureEquals,
  describeSignature,
} from "./render";
