export {
  CorpusError,
  ErrorCode,
  wrapError,
  isCorpusError,
  getErrorCode,
  type ErrorContext,
  type SerializedError,
} from "./CorpusError";

export { CorpusNetworkError } from "./NetworkError";
export { CorpusDatabaseError } from "./DatabaseError";
export { CorpusValidationError } from "./ValidationError";
