import {
  type ParserConfig,
  type ParserConfigOptions,
  resolveConfig,
} from "../config/parser-config.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import { concat, EMPTY, fromString } from "../utils/buffer.js";
import { decideBodyFraming } from "./body-framing.js";
import type { BodyReader } from "./body-reader.js";
import { ChunkedBodyReader } from "./chunked-body.js";
import { Cursor } from "./cursor.js";
import { HttpParseError, ParserMisuseError } from "./errors.js";
import { FixedLengthBodyReader } from "./fixed-length-body.js";
import { HeaderGrammar } from "./header-grammar.js";
import { HttpHeaders } from "./headers.js";
import { RequestLineGrammar } from "./request-line.js";
import type {
  BodyFraming,
  HttpRequest,
  ParseMilestone,
  ParseOutcome,
  ParserPhase,
  PartialHttpRequest,
  RequestLine,
} from "./types.js";

export interface RequestParserOptions extends ParserConfigOptions {
  logger?: Logger;
}

type ParserState =
  | { phase: "start" }
  | { phase: "parsing-request-line" }
  | { phase: "parsing-headers"; line: RequestLine }
  | { phase: "determining-body-framing"; line: RequestLine }
  | {
      phase: "parsing-body";
      line: RequestLine;
      framing: BodyFraming;
      reader: BodyReader;
    }
  | { phase: "complete"; outcome: ParseOutcome & { type: "done" } }
  | { phase: "error"; outcome: ParseOutcome & { type: "failed" } };

const NEED_MORE_INPUT: ParseOutcome = { type: "need-more-input" };

function progress(milestone: ParseMilestone): ParseOutcome {
  return { type: "progress", milestone };
}

/**
 * Incremental parser for one HTTP/1.1 request.
 *
 * `feed` buffers the bytes it is given and runs until something
 * happens: a milestone (request line, a header, end of the header
 * section, a body chunk in streaming mode), completion, failure, or the
 * buffered bytes running out. After a `progress` outcome call `feed()`
 * again, with or without new bytes, to carry on.
 *
 * The parser never reads past the end of its request; bytes of a
 * pipelined successor are left for `takeRemaining()`.
 *
 * Streamed body chunks may be views into the arrays passed to `feed`.
 * Don't write into those arrays while a chunk is in use. A buffered body
 * is always a fresh copy.
 */
export class RequestParser {
  private readonly config: ParserConfig;
  private readonly logger: Logger;
  private readonly cursor = new Cursor();
  private readonly headers = new HttpHeaders();
  private readonly requestLineGrammar: RequestLineGrammar;
  private readonly headerGrammar: HeaderGrammar;

  private state: ParserState = { phase: "start" };
  private requestLine?: RequestLine;
  private framing?: BodyFraming;
  private bodyChunks: Uint8Array[] = [];
  private bodyBytes = 0;
  /** The last outcome was `progress`, so buffered bytes may be unread. */
  private paused = false;

  constructor(options?: RequestParserOptions) {
    this.config = resolveConfig(options);
    this.logger = options?.logger ?? silentLogger();
    this.requestLineGrammar = new RequestLineGrammar(
      this.config.limits.maxRequestLineLength,
    );
    this.headerGrammar = new HeaderGrammar(this.headers, this.config.limits);
  }

  get phase(): ParserPhase {
    return this.state.phase;
  }

  /** Bytes of this request consumed so far. */
  get bytesConsumed(): number {
    return this.cursor.consumed;
  }

  get error(): HttpParseError | undefined {
    return this.state.phase === "error" ? this.state.outcome.error : undefined;
  }

  /** What has been parsed so far. Never a usable request on its own. */
  get partialRequest(): PartialHttpRequest {
    return {
      method: this.requestLine?.method,
      target: this.requestLine?.target,
      version: this.requestLine?.version,
      headers: this.headers.view,
      framing: this.framing,
      bodyBytesReceived: this.bodyBytes,
    };
  }

  feed(bytes: Uint8Array | string = EMPTY): ParseOutcome {
    const input = typeof bytes === "string" ? fromString(bytes) : bytes;

    if (this.state.phase === "error") {
      return this.state.outcome;
    }
    if (this.state.phase === "complete") {
      if (input.length > 0) {
        throw new ParserMisuseError(
          "Request is complete; feed the next request to a new parser",
        );
      }
      return this.state.outcome;
    }

    this.cursor.append(input);
    if (this.state.phase === "start") {
      this.transition({ phase: "parsing-request-line" });
    }

    let outcome: ParseOutcome;
    try {
      outcome = this.run();
    } catch (err) {
      if (!(err instanceof HttpParseError)) throw err;
      outcome = this.fail(err);
    }
    this.paused = outcome.type === "progress";
    return outcome;
  }

  /**
   * The input has ended (the transport closed). Completes nothing: a
   * request that is not already complete fails with
   * `UNEXPECTED_END_OF_INPUT`.
   */
  end(): ParseOutcome {
    if (this.state.phase === "complete" || this.state.phase === "error") {
      return this.state.outcome;
    }
    if (this.paused) {
      throw new ParserMisuseError(
        "end() called with buffered input still unread; call feed() until it needs more input",
      );
    }
    return this.fail(
      new HttpParseError(
        "UNEXPECTED_END_OF_INPUT",
        `Input ended during ${this.state.phase}`,
        this.cursor.consumed + this.cursor.available,
      ),
    );
  }

  /** Bytes received past the end of a complete request. */
  takeRemaining(): Uint8Array {
    if (this.state.phase !== "complete") {
      throw new ParserMisuseError(
        `takeRemaining() is only available once the request is complete (phase: ${this.state.phase})`,
      );
    }
    const remaining = this.cursor.remaining();
    this.cursor.clear();
    return remaining;
  }

  private run(): ParseOutcome {
    const limits = this.config.limits;

    while (true) {
      const state = this.state;
      switch (state.phase) {
        case "parsing-request-line": {
          const line = this.requestLineGrammar.parse(this.cursor);
          if (!line) return NEED_MORE_INPUT;
          this.requestLine = line;
          this.transition({ phase: "parsing-headers", line });
          return progress({ type: "request-line", ...line });
        }

        case "parsing-headers": {
          const result = this.headerGrammar.parse(this.cursor);
          if (!result) return NEED_MORE_INPUT;
          if (result.type === "header") {
            return progress({
              type: "header",
              header: result.header,
              section: "headers",
            });
          }
          this.transition({ phase: "determining-body-framing", line: state.line });
          break;
        }

        case "determining-body-framing": {
          const framing = decideBodyFraming(
            this.headers,
            limits.maxBodySize,
            this.cursor.consumed,
          );
          this.framing = framing;
          const reader =
            framing.type === "chunked"
              ? new ChunkedBodyReader(this.headers, limits)
              : new FixedLengthBodyReader(
                  framing.type === "fixed-length" ? framing.length : 0,
                );
          this.transition({
            phase: "parsing-body",
            line: state.line,
            framing,
            reader,
          });
          return progress({ type: "headers-complete", framing });
        }

        case "parsing-body": {
          const event = state.reader.read(this.cursor);
          if (!event) return NEED_MORE_INPUT;

          if (event.type === "trailer") {
            return progress({
              type: "header",
              header: event.header,
              section: "trailers",
            });
          }
          if (event.type === "data") {
            this.bodyBytes += event.data.length;
            if (this.config.bodyMode === "streaming") {
              return progress({ type: "body-chunk", data: event.data });
            }
            this.bodyChunks.push(event.data);
            break;
          }
          return this.complete(state.line, state.framing);
        }

        case "start":
        case "complete":
        case "error":
          throw new ParserMisuseError(`Nothing to parse in phase ${state.phase}`);
      }
    }
  }

  private complete(line: RequestLine, framing: BodyFraming): ParseOutcome {
    const request: HttpRequest = {
      ...line,
      headers: this.headers.view,
      framing,
      body:
        this.config.bodyMode === "streaming"
          ? { mode: "streamed", length: this.bodyBytes }
          : { mode: "buffered", bytes: this.bufferedBody() },
    };
    this.bodyChunks = [];
    const outcome = { type: "done", request } as const;
    this.transition({ phase: "complete", outcome });
    return outcome;
  }

  private bufferedBody(): Uint8Array {
    if (this.bodyChunks.length === 1) return this.bodyChunks[0].slice();
    return concat(this.bodyChunks);
  }

  private fail(error: HttpParseError): ParseOutcome {
    this.logger.debug(
      `request rejected: ${error.code} at offset ${error.offset}: ${error.message}`,
    );
    this.bodyChunks = [];
    const outcome = { type: "failed", error } as const;
    this.transition({ phase: "error", outcome });
    return outcome;
  }

  private transition(next: ParserState): void {
    this.logger.debug(`${this.state.phase} -> ${next.phase}`);
    this.state = next;
  }
}
