import type { ParserLimits } from "../config/parser-config.js";
import { CR, decodeLatin1, LF } from "../utils/buffer.js";
import {
  COLON,
  isFieldValueChar,
  isTokenChar,
  isWhitespace,
} from "./chars.js";
import type { Cursor } from "./cursor.js";
import { HttpParseError } from "./errors.js";
import type { HttpHeader, HttpHeaders } from "./headers.js";
import type { HeaderSection } from "./types.js";

export type HeaderLineResult =
  | { type: "header"; header: HttpHeader }
  | { type: "end" };

type HeaderLimits = Pick<
  ParserLimits,
  "maxHeaderCount" | "maxSingleHeaderBytes" | "maxHeaderSectionBytes"
>;

/** Fields a sender may not move into the trailer section. */
const NOT_IN_TRAILERS = new Set(["content-length", "transfer-encoding", "host"]);

function trimWhitespace(bytes: Uint8Array): Uint8Array {
  let start = 0;
  let end = bytes.length;
  while (start < end && isWhitespace(bytes[start])) start++;
  while (end > start && isWhitespace(bytes[end - 1])) end--;
  return bytes.subarray(start, end);
}

/**
 * field-line = field-name ":" OWS field-value OWS CRLF
 *
 * Parses one line per `parse` call and validates every byte as it
 * arrives, so a bad name or value fails on the fragment that carries it
 * rather than when the line is finally terminated. The same grammar
 * reads the trailer section of a chunked body.
 */
export class HeaderGrammar {
  private sectionBytes = 0;
  /** Bytes of the current line already validated. */
  private pos = 0;
  private colonAt = -1;

  constructor(
    private readonly headers: HttpHeaders,
    private readonly limits: HeaderLimits,
    readonly section: HeaderSection = "headers",
  ) {}

  parse(cursor: Cursor): HeaderLineResult | null {
    const start = cursor.consumed;
    const pending = cursor.view();
    const { maxSingleHeaderBytes, maxHeaderSectionBytes } = this.limits;

    let end = -1;
    while (this.pos < pending.length) {
      const i = this.pos;
      const byte = pending[i];

      if (byte === CR) {
        if (i + 1 >= pending.length) break;
        if (pending[i + 1] !== LF) {
          throw this.colonAt === -1
            ? this.invalidName("Bare CR in header name", start + i)
            : this.invalidValue("Bare CR in header value", start + i);
        }
        end = i;
        break;
      }

      if (i + 1 > maxSingleHeaderBytes) {
        throw this.tooLarge(
          `Header line exceeds ${maxSingleHeaderBytes} bytes`,
          start + i,
        );
      }
      if (this.sectionBytes + i + 1 + 2 > maxHeaderSectionBytes) {
        throw this.tooLarge(
          `Header section exceeds ${maxHeaderSectionBytes} bytes`,
          start + i,
        );
      }

      if (this.colonAt === -1) {
        if (byte === COLON) {
          if (i === 0) throw this.invalidName("Empty header name", start);
          this.colonAt = i;
        } else if (i === 0 && isWhitespace(byte)) {
          throw this.invalidValue(
            "Obsolete line folding is not accepted",
            start,
          );
        } else if (!isTokenChar(byte)) {
          throw this.invalidName(
            `Invalid byte 0x${byte.toString(16)} in header name`,
            start + i,
          );
        }
      } else if (!isFieldValueChar(byte)) {
        throw this.invalidValue(
          `Invalid byte 0x${byte.toString(16)} in header value`,
          start + i,
        );
      }
      this.pos++;
    }

    if (end === -1) return null;

    if (this.sectionBytes + end + 2 > maxHeaderSectionBytes) {
      throw this.tooLarge(
        `Header section exceeds ${maxHeaderSectionBytes} bytes`,
        start + end,
      );
    }

    if (end === 0) {
      this.finishLine(cursor, 0);
      return { type: "end" };
    }

    if (this.colonAt === -1) {
      throw this.invalidName("Header line has no colon", start + end);
    }
    if (this.headers.size >= this.limits.maxHeaderCount) {
      throw new HttpParseError(
        "TOO_MANY_HEADERS",
        `More than ${this.limits.maxHeaderCount} header fields`,
        start,
      );
    }

    const name = decodeLatin1(pending.subarray(0, this.colonAt));
    if (this.section === "trailers" && NOT_IN_TRAILERS.has(name.toLowerCase())) {
      throw this.invalidName(`${name} is not allowed in trailers`, start);
    }
    const value = decodeLatin1(
      trimWhitespace(pending.subarray(this.colonAt + 1, end)),
    );
    const header = this.headers.append(name, value);
    this.finishLine(cursor, end);
    return { type: "header", header };
  }

  private finishLine(cursor: Cursor, end: number): void {
    cursor.skip(end + 2);
    this.sectionBytes += end + 2;
    this.pos = 0;
    this.colonAt = -1;
  }

  private invalidName(message: string, offset: number): HttpParseError {
    return new HttpParseError("INVALID_HEADER_NAME", message, offset);
  }

  private invalidValue(message: string, offset: number): HttpParseError {
    return new HttpParseError("INVALID_HEADER_VALUE", message, offset);
  }

  private tooLarge(message: string, offset: number): HttpParseError {
    return new HttpParseError("HEADER_SECTION_TOO_LARGE", message, offset);
  }
}
