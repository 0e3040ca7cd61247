import type { ParserLimits } from "../config/parser-config.js";
import { CR, LF } from "../utils/buffer.js";
import type { BodyEvent, BodyReader } from "./body-reader.js";
import { hexValue, SEMICOLON } from "./chars.js";
import type { Cursor } from "./cursor.js";
import { HttpParseError } from "./errors.js";
import { HeaderGrammar } from "./header-grammar.js";
import type { HttpHeaders } from "./headers.js";

type ChunkedState = "size" | "data" | "data-crlf" | "trailers" | "done";

/**
 * chunked-body = *chunk last-chunk trailer-section CRLF
 * chunk        = chunk-size [ chunk-ext ] CRLF chunk-data CRLF
 *
 * Trailer fields go through the header grammar and land in the same
 * header list as the header section.
 */
export class ChunkedBodyReader implements BodyReader {
  private state: ChunkedState = "size";
  private decoded = 0;
  private chunkRemaining = 0;

  // size line progress
  private pos = 0;
  private digits = 0;
  private size = 0;
  private inExtension = false;

  private readonly trailers: HeaderGrammar;

  constructor(
    headers: HttpHeaders,
    private readonly limits: ParserLimits,
  ) {
    this.trailers = new HeaderGrammar(headers, limits, "trailers");
  }

  get received(): number {
    return this.decoded;
  }

  read(cursor: Cursor): BodyEvent | null {
    while (true) {
      switch (this.state) {
        case "size": {
          const size = this.readSizeLine(cursor);
          if (size === null) return null;
          if (size === 0) {
            this.state = "trailers";
          } else {
            this.chunkRemaining = size;
            this.state = "data";
          }
          break;
        }

        case "data": {
          if (cursor.available === 0) return null;
          const data = cursor.take(this.chunkRemaining);
          this.chunkRemaining -= data.length;
          this.decoded += data.length;
          if (this.chunkRemaining === 0) this.state = "data-crlf";
          return { type: "data", data };
        }

        case "data-crlf": {
          const first = cursor.peek(0);
          if (first === -1) return null;
          if (first !== CR) throw this.badFraming(cursor.consumed);
          const second = cursor.peek(1);
          if (second === -1) return null;
          if (second !== LF) throw this.badFraming(cursor.consumed + 1);
          cursor.skip(2);
          this.state = "size";
          break;
        }

        case "trailers": {
          const line = this.trailers.parse(cursor);
          if (line === null) return null;
          if (line.type === "header") {
            return { type: "trailer", header: line.header };
          }
          this.state = "done";
          return { type: "end" };
        }

        case "done":
          return { type: "end" };
      }
    }
  }

  /**
   * chunk-size [ ";" chunk-ext ] CRLF. Returns the size once the line is
   * complete. The running total is checked digit by digit, so an
   * oversized chunk fails before any of its data is accepted.
   */
  private readSizeLine(cursor: Cursor): number | null {
    const start = cursor.consumed;
    const pending = cursor.view();
    const maxLine = this.limits.maxSingleHeaderBytes;

    while (this.pos < pending.length) {
      const i = this.pos;
      const byte = pending[i];

      if (byte === CR) {
        if (i + 1 >= pending.length) return null;
        if (pending[i + 1] !== LF) {
          throw this.badSize("Bare CR in chunk size line", start + i);
        }
        if (this.digits === 0) {
          throw this.badSize("Missing chunk size", start);
        }
        const size = this.size;
        cursor.skip(i + 2);
        this.pos = 0;
        this.digits = 0;
        this.size = 0;
        this.inExtension = false;
        return size;
      }

      if (i + 1 > maxLine) {
        throw this.badSize(`Chunk size line exceeds ${maxLine} bytes`, start + i);
      }

      if (this.inExtension) {
        if (byte === LF || byte === 0) {
          throw this.badSize("Invalid byte in chunk extension", start + i);
        }
      } else if (byte === SEMICOLON) {
        if (this.digits === 0) {
          throw this.badSize("Missing chunk size", start);
        }
        this.inExtension = true;
      } else {
        const digit = hexValue(byte);
        if (digit === -1) {
          throw this.badSize(
            `Invalid byte 0x${byte.toString(16)} in chunk size`,
            start + i,
          );
        }
        this.digits++;
        this.size = this.size * 16 + digit;
        if (this.decoded + this.size > this.limits.maxBodySize) {
          throw new HttpParseError(
            "BODY_TOO_LARGE",
            `Chunked body exceeds ${this.limits.maxBodySize} bytes`,
            start + i,
          );
        }
      }
      this.pos++;
    }
    return null;
  }

  private badSize(message: string, offset: number): HttpParseError {
    return new HttpParseError("INVALID_CHUNK_SIZE", message, offset);
  }

  private badFraming(offset: number): HttpParseError {
    return new HttpParseError(
      "INVALID_CHUNK_FRAMING",
      "Expected CRLF after chunk data",
      offset,
    );
  }
}
