export type HttpParseErrorCode =
  | "REQUEST_LINE_TOO_LONG"
  | "MALFORMED_REQUEST_LINE"
  | "UNSUPPORTED_VERSION"
  | "INVALID_HEADER_NAME"
  | "INVALID_HEADER_VALUE"
  | "HEADER_SECTION_TOO_LARGE"
  | "TOO_MANY_HEADERS"
  | "CONFLICTING_BODY_FRAMING"
  | "UNSUPPORTED_TRANSFER_ENCODING"
  | "INVALID_CHUNK_SIZE"
  | "INVALID_CHUNK_FRAMING"
  | "BODY_TOO_LARGE"
  | "UNEXPECTED_END_OF_INPUT";

/**
 * A grammar or limit violation in the request bytes. Terminal: a parser
 * that produced one never consumes another byte.
 */
export class HttpParseError extends Error {
  constructor(
    readonly code: HttpParseErrorCode,
    message: string,
    /** Absolute stream offset at which the violation was detected. */
    readonly offset: number,
  ) {
    super(message);
    this.name = "HttpParseError";
  }
}

/**
 * The parser was driven out of order (a superseded stage handle reused,
 * bytes fed after completion). This is a bug in the caller, never a
 * property of the input.
 */
export class ParserMisuseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ParserMisuseError";
  }
}

export type ParseErrorStatus = 400 | 413 | 414 | 431 | 501 | 505;

export const STATUS_TEXT: Record<ParseErrorStatus, string> = {
  400: "Bad Request",
  413: "Content Too Large",
  414: "URI Too Long",
  431: "Request Header Fields Too Large",
  501: "Not Implemented",
  505: "HTTP Version Not Supported",
};

/** Suggested response status for a transport that answers a failed parse. */
export function statusForParseError(error: HttpParseError): ParseErrorStatus {
  switch (error.code) {
    case "BODY_TOO_LARGE":
      return 413;
    case "REQUEST_LINE_TOO_LONG":
      return 414;
    case "HEADER_SECTION_TOO_LARGE":
    case "TOO_MANY_HEADERS":
      return 431;
    case "UNSUPPORTED_TRANSFER_ENCODING":
      return 501;
    case "UNSUPPORTED_VERSION":
      return 505;
    default:
      return 400;
  }
}
