import { CR, decodeLatin1, LF } from "../utils/buffer.js";
import { isCtl, isTokenChar, SP } from "./chars.js";
import type { Cursor } from "./cursor.js";
import { HttpParseError } from "./errors.js";
import { HTTP_VERSIONS, type HttpVersion, type RequestLine } from "./types.js";

function toVersion(text: string): HttpVersion | undefined {
  return HTTP_VERSIONS.find((v) => v === text);
}

/**
 * request-line = method SP request-target SP HTTP-version CRLF
 *
 * Resumable: `parse` returns null until the whole line is buffered. Each
 * byte is checked once, on the fragment that delivers it. The field count
 * and the version literal can only be judged at the CRLF.
 */
export class RequestLineGrammar {
  /** Bytes of the current line already validated. */
  private pos = 0;
  private firstSpace = -1;
  private secondSpace = -1;

  constructor(private readonly maxLength: number) {}

  parse(cursor: Cursor): RequestLine | null {
    const start = cursor.consumed;
    const pending = cursor.view();

    let end = -1;
    while (this.pos < pending.length) {
      const i = this.pos;
      const byte = pending[i];

      if (byte === CR) {
        if (i + 1 >= pending.length) break;
        if (pending[i + 1] !== LF) {
          throw malformed("Bare CR in request line", start + i);
        }
        end = i;
        break;
      }
      if (byte === LF) throw malformed("Bare LF in request line", start + i);

      if (i + 1 > this.maxLength) {
        throw new HttpParseError(
          "REQUEST_LINE_TOO_LONG",
          `Request line exceeds ${this.maxLength} bytes`,
          start + i,
        );
      }

      if (byte === SP) {
        this.space(i, start);
      } else if (this.firstSpace === -1) {
        if (!isTokenChar(byte)) {
          throw malformed("Request method is not a token", start + i);
        }
      } else if (isCtl(byte)) {
        throw malformed(
          this.secondSpace === -1
            ? "Control character in request target"
            : "Control character in HTTP version",
          start + i,
        );
      }
      this.pos++;
    }

    if (end === -1) return null;

    if (this.secondSpace === -1) {
      const fields = this.firstSpace === -1 ? 1 : 2;
      throw malformed(`Request line has ${fields} fields, expected 3`, start);
    }

    const versionText = decodeLatin1(pending.subarray(this.secondSpace + 1, end));
    const version = toVersion(versionText);
    if (!version) {
      throw new HttpParseError(
        "UNSUPPORTED_VERSION",
        `Unsupported HTTP version: ${JSON.stringify(versionText)}`,
        start + this.secondSpace + 1,
      );
    }

    const line: RequestLine = {
      method: decodeLatin1(pending.subarray(0, this.firstSpace)),
      target: decodeLatin1(pending.subarray(this.firstSpace + 1, this.secondSpace)),
      version,
    };
    cursor.skip(end + 2);
    this.pos = 0;
    this.firstSpace = -1;
    this.secondSpace = -1;
    return line;
  }

  private space(i: number, start: number): void {
    if (this.firstSpace === -1) {
      if (i === 0) throw malformed("Request method is not a token", start);
      this.firstSpace = i;
    } else if (this.secondSpace === -1) {
      if (i === this.firstSpace + 1) {
        throw malformed("Empty request target", start + i);
      }
      this.secondSpace = i;
    } else {
      throw malformed("Request line has more than 3 fields", start + i);
    }
  }
}

function malformed(message: string, offset: number): HttpParseError {
  return new HttpParseError("MALFORMED_REQUEST_LINE", message, offset);
}
