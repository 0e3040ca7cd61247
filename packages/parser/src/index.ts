// Config
export type {
  BodyMode,
  ParserConfig,
  ParserConfigOptions,
  ParserLimits,
} from "./config/parser-config.js";
export {
  defaultConfig,
  defaultLimits,
  resolveConfig,
  resolveLimits,
} from "./config/parser-config.js";
// HTTP
export { decideBodyFraming } from "./http/body-framing.js";
export { shouldKeepAlive } from "./http/connection.js";
export { Cursor } from "./http/cursor.js";
export type { HttpParseErrorCode, ParseErrorStatus } from "./http/errors.js";
export {
  HttpParseError,
  ParserMisuseError,
  STATUS_TEXT,
  statusForParseError,
} from "./http/errors.js";
export type { HttpHeader, ReadonlyHttpHeaders } from "./http/headers.js";
export { HttpHeaders } from "./http/headers.js";
export type { ParsedRequest } from "./http/parse-request.js";
export { parseRequest } from "./http/parse-request.js";
export type { RequestParserOptions } from "./http/request-parser.js";
export { RequestParser } from "./http/request-parser.js";
export type {
  HttpRequestReaderOptions,
  HttpRequestReadErrorCode,
} from "./http/request-reader.js";
export {
  HttpRequestReader,
  HttpRequestReadError,
} from "./http/request-reader.js";
export type {
  BodyStage,
  BodyStep,
  CompleteStage,
  HeaderStage,
  HeaderStep,
  RequestLineStage,
  RequestLineStep,
  StageFailure,
  StagePending,
} from "./http/request-stages.js";
export { beginRequest } from "./http/request-stages.js";
export type {
  BodyFraming,
  HeaderSection,
  HttpRequest,
  HttpRequestBody,
  HttpRequestHead,
  HttpVersion,
  ParseMilestone,
  ParseOutcome,
  ParserPhase,
  PartialHttpRequest,
  RequestLine,
} from "./http/types.js";
export { HTTP_VERSIONS } from "./http/types.js";
// Interfaces
export type { ITcpSocket } from "./interfaces/socket.js";
// Logging
export type { LogEntry, Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  LogStore,
  prefixedLogger,
  silentLogger,
  storeLogger,
} from "./logging/logger.js";
// Testing
export { InMemoryTcpSocket } from "./testing/in-memory-socket.js";
// Utils
export {
  concat,
  decodeLatin1,
  decodeToString,
  fromString,
} from "./utils/buffer.js";
