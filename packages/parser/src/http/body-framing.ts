import { HttpParseError } from "./errors.js";
import type { ReadonlyHttpHeaders } from "./headers.js";
import type { BodyFraming } from "./types.js";

const DECIMAL = /^[0-9]+$/;

function transferCodings(values: readonly string[]): string[] {
  return values
    .flatMap((value) => value.split(","))
    .map((coding) => coding.trim().toLowerCase())
    .filter((coding) => coding.length > 0);
}

/**
 * Content-Length = 1*DIGIT. No sign, no whitespace, no list syntax:
 * anything `Number.parseInt` would quietly accept is rejected here.
 */
function parseContentLength(
  value: string,
  maxBodySize: number,
  offset: number,
): number {
  if (!DECIMAL.test(value)) {
    throw new HttpParseError(
      "INVALID_HEADER_VALUE",
      `Invalid Content-Length: ${JSON.stringify(value)}`,
      offset,
    );
  }
  const length = Number(value);
  if (!Number.isSafeInteger(length) || length > maxBodySize) {
    throw new HttpParseError(
      "BODY_TOO_LARGE",
      `Content-Length ${value} exceeds ${maxBodySize} bytes`,
      offset,
    );
  }
  return length;
}

/**
 * Select exactly one body strategy from the completed header section.
 * Any ambiguity between Content-Length and Transfer-Encoding is an error,
 * never a preference: two parsers disagreeing on where a body ends is how
 * requests get smuggled.
 *
 * @param offset stream offset just past the header section, used for errors
 */
export function decideBodyFraming(
  headers: ReadonlyHttpHeaders,
  maxBodySize: number,
  offset: number,
): BodyFraming {
  const contentLengths = headers.getAll("content-length");
  const transferEncodings = headers.getAll("transfer-encoding");

  if (transferEncodings.length > 0) {
    const codings = transferCodings(transferEncodings);
    const chunkedAt = codings.indexOf("chunked");
    if (chunkedAt === -1 || chunkedAt !== codings.length - 1) {
      throw new HttpParseError(
        "UNSUPPORTED_TRANSFER_ENCODING",
        `Transfer-Encoding must end in chunked: ${JSON.stringify(transferEncodings.join(", "))}`,
        offset,
      );
    }

    if (contentLengths.length > 0) {
      throw new HttpParseError(
        "CONFLICTING_BODY_FRAMING",
        "Both Content-Length and Transfer-Encoding are present",
        offset,
      );
    }
    return { type: "chunked", codings };
  }

  if (contentLengths.length === 0) {
    return { type: "none" };
  }

  const [first] = contentLengths;
  if (contentLengths.some((value) => value !== first)) {
    throw new HttpParseError(
      "CONFLICTING_BODY_FRAMING",
      `Conflicting Content-Length values: ${contentLengths.join(", ")}`,
      offset,
    );
  }

  return {
    type: "fixed-length",
    length: parseContentLength(first, maxBodySize, offset),
  };
}
