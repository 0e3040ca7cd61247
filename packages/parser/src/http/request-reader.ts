import type { BodyMode } from "../config/parser-config.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, EMPTY } from "../utils/buffer.js";
import { RequestParser, type RequestParserOptions } from "./request-parser.js";
import type { HttpRequest } from "./types.js";

const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

export interface HttpRequestReaderOptions
  extends Omit<RequestParserOptions, "bodyMode"> {
  /** Max time allowed for receiving one full request. Default: 5000ms */
  timeoutMs?: number;
}

export type HttpRequestReadErrorCode =
  | "IDLE_TIMEOUT"
  | "REQUEST_TIMEOUT"
  | "CONNECTION_CLOSED";

/** The connection, not the request bytes, is the problem. */
export class HttpRequestReadError extends Error {
  constructor(
    readonly code: HttpRequestReadErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "HttpRequestReadError";
  }
}

type ChunkHandler = (chunk: Uint8Array) => Promise<void> | void;

/**
 * Reads successive requests off one connection. Each request gets its
 * own parser; bytes a client pipelined past the end of one request are
 * handed to the next.
 *
 * Rejects with the parser's `HttpParseError` for bad input,
 * `HttpRequestReadError` for timeouts and idle closes, or the socket's
 * own error.
 */
export class HttpRequestReader {
  private buffer: Uint8Array = EMPTY;
  private closed = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];
  private reading = false;

  constructor(
    socket: ITcpSocket,
    private readonly options: HttpRequestReaderOptions = {},
  ) {
    socket.onData((data) => {
      this.buffer = concat([this.buffer, data]);
      this.notifyWaiters();
    });

    socket.onClose(() => {
      this.closed = true;
      this.notifyWaiters();
    });

    socket.onError((err) => {
      this.socketError = err;
      this.closed = true;
      this.notifyWaiters();
    });
  }

  /** Next request, body buffered. */
  readRequest(): Promise<HttpRequest> {
    return this.read("buffered");
  }

  /**
   * Next request, with body bytes passed to `onChunk` as they arrive.
   * The resolved request carries only the body length.
   */
  readRequestStreaming(onChunk: ChunkHandler): Promise<HttpRequest> {
    return this.read("streaming", onChunk);
  }

  private async read(
    bodyMode: BodyMode,
    onChunk?: ChunkHandler,
  ): Promise<HttpRequest> {
    if (this.reading) {
      throw new Error("A request is already being read from this connection");
    }
    this.reading = true;
    try {
      return await this.readWith(
        new RequestParser({ ...this.options, bodyMode }),
        onChunk,
      );
    } finally {
      this.reading = false;
    }
  }

  private async readWith(
    parser: RequestParser,
    onChunk?: ChunkHandler,
  ): Promise<HttpRequest> {
    const timeoutMs = this.options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    const deadline = Date.now() + timeoutMs;
    let started = false;

    while (true) {
      if (this.buffer.length > 0) {
        started = true;
        const input = this.buffer;
        this.buffer = EMPTY;

        let outcome = parser.feed(input);
        while (outcome.type === "progress") {
          if (outcome.milestone.type === "body-chunk" && onChunk) {
            await onChunk(outcome.milestone.data);
          }
          outcome = parser.feed();
        }

        if (outcome.type === "failed") throw outcome.error;
        if (outcome.type === "done") {
          this.buffer = concat([parser.takeRemaining(), this.buffer]);
          return outcome.request;
        }
        continue;
      }

      if (this.socketError) {
        throw this.socketError;
      }

      if (this.closed) {
        if (!started) {
          throw new HttpRequestReadError(
            "CONNECTION_CLOSED",
            "Connection closed",
          );
        }
        const outcome = parser.end();
        if (outcome.type === "failed") throw outcome.error;
        throw new Error(`Parser ended in unexpected state: ${outcome.type}`);
      }

      const hadActivity = await this.waitForActivity(deadline - Date.now());
      if (!hadActivity) {
        if (!started) {
          throw new HttpRequestReadError(
            "IDLE_TIMEOUT",
            "Connection idle timed out",
          );
        }

        throw new HttpRequestReadError(
          "REQUEST_TIMEOUT",
          "Request timed out before completion",
        );
      }
    }
  }

  private waitForActivity(timeoutMs: number): Promise<boolean> {
    if (timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(true);
      };

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
        resolve(false);
      }, timeoutMs);

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}
