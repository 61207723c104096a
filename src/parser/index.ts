export {
  parseValue,
  parseArguments,
  parseArgumentFields,
  type ParseValueOptions,
} from "./parseValue";
export { ValueParseError, parseErrorToFailure, type ValueParseErrorKind } from "./errors";
