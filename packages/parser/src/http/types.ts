import type { HttpParseError } from "./errors.js";
import type { HttpHeader, ReadonlyHttpHeaders } from "./headers.js";

export const HTTP_VERSIONS = ["HTTP/1.0", "HTTP/1.1"] as const;

export type HttpVersion = (typeof HTTP_VERSIONS)[number];

export type BodyFraming =
  | { readonly type: "none" }
  | { readonly type: "fixed-length"; readonly length: number }
  | { readonly type: "chunked"; readonly codings: readonly string[] };

export type HttpRequestBody =
  | { readonly mode: "buffered"; readonly bytes: Uint8Array }
  /** Bytes went out as `body-chunk` milestones; only the total is kept. */
  | { readonly mode: "streamed"; readonly length: number };

export interface RequestLine {
  method: string;
  /** Raw request-target, one char per byte, never decoded. */
  target: string;
  version: HttpVersion;
}

export interface HttpRequestHead extends RequestLine {
  headers: ReadonlyHttpHeaders;
  framing: BodyFraming;
}

export interface HttpRequest extends HttpRequestHead {
  body: HttpRequestBody;
}

/** Whatever has been parsed so far; on failure, for diagnostics only. */
export interface PartialHttpRequest {
  readonly method?: string;
  readonly target?: string;
  readonly version?: HttpVersion;
  readonly headers: ReadonlyHttpHeaders;
  readonly framing?: BodyFraming;
  readonly bodyBytesReceived: number;
}

export type ParserPhase =
  | "start"
  | "parsing-request-line"
  | "parsing-headers"
  | "determining-body-framing"
  | "parsing-body"
  | "complete"
  | "error";

export type HeaderSection = "headers" | "trailers";

export type ParseMilestone =
  | ({ readonly type: "request-line" } & RequestLine)
  | {
      readonly type: "header";
      readonly header: HttpHeader;
      readonly section: HeaderSection;
    }
  | { readonly type: "headers-complete"; readonly framing: BodyFraming }
  | { readonly type: "body-chunk"; readonly data: Uint8Array };

export type ParseOutcome =
  | { readonly type: "need-more-input" }
  | { readonly type: "progress"; readonly milestone: ParseMilestone }
  | { readonly type: "done"; readonly request: HttpRequest }
  | { readonly type: "failed"; readonly error: HttpParseError };
