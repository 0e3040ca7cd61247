import { describe, expect, it } from "vitest";
import { decideBodyFraming } from "./body-framing.js";
import { HttpParseError } from "./errors.js";
import { HttpHeaders } from "./headers.js";

const MAX_BODY = 1000;

function headersOf(pairs: Array<[string, string]>): HttpHeaders {
  const headers = new HttpHeaders();
  for (const [name, value] of pairs) headers.append(name, value);
  return headers;
}

function decide(pairs: Array<[string, string]>) {
  return decideBodyFraming(headersOf(pairs), MAX_BODY, 40);
}

function decideError(pairs: Array<[string, string]>): HttpParseError {
  try {
    decide(pairs);
  } catch (err) {
    if (err instanceof HttpParseError) return err;
    throw err;
  }
  throw new Error("expected a parse error");
}

describe("decideBodyFraming", () => {
  it("has no body without framing headers", () => {
    expect(decide([["Host", "a"]])).toEqual({ type: "none" });
    expect(decide([])).toEqual({ type: "none" });
  });

  it("reads a Content-Length", () => {
    expect(decide([["Content-Length", "42"]])).toEqual({
      type: "fixed-length",
      length: 42,
    });
    expect(decide([["content-length", "0"]])).toEqual({
      type: "fixed-length",
      length: 0,
    });
  });

  it("accepts a Content-Length of exactly maxBodySize", () => {
    expect(decide([["Content-Length", "1000"]])).toEqual({
      type: "fixed-length",
      length: 1000,
    });
  });

  it("accepts repeated identical Content-Length fields", () => {
    expect(
      decide([
        ["Content-Length", "5"],
        ["Content-Length", "5"],
      ]),
    ).toEqual({ type: "fixed-length", length: 5 });
  });

  it("rejects differing Content-Length fields", () => {
    const error = decideError([
      ["Content-Length", "5"],
      ["Content-Length", "6"],
    ]);
    expect(error.code).toBe("CONFLICTING_BODY_FRAMING");
    expect(error.message).toBe("Conflicting Content-Length values: 5, 6");
    expect(error.offset).toBe(40);
  });

  it.each(["-1", "+5", "0x10", "1e3", "5, 5", "", " 5", "12a"])(
    "rejects Content-Length %j",
    (value) => {
      expect(decideError([["Content-Length", value]]).code).toBe(
        "INVALID_HEADER_VALUE",
      );
    },
  );

  it("rejects a Content-Length over maxBodySize", () => {
    const error = decideError([["Content-Length", "1001"]]);
    expect(error.code).toBe("BODY_TOO_LARGE");
    expect(error.message).toBe("Content-Length 1001 exceeds 1000 bytes");
  });

  it("rejects a Content-Length beyond the safe integer range", () => {
    expect(
      decideError([["Content-Length", "99999999999999999999"]]).code,
    ).toBe("BODY_TOO_LARGE");
  });

  it("selects chunked framing", () => {
    expect(decide([["Transfer-Encoding", "chunked"]])).toEqual({
      type: "chunked",
      codings: ["chunked"],
    });
  });

  it("collects codings across fields and list items", () => {
    expect(
      decide([
        ["Transfer-Encoding", "gzip, "],
        ["transfer-encoding", " Chunked"],
      ]),
    ).toEqual({ type: "chunked", codings: ["gzip", "chunked"] });
  });

  it.each([
    ["identity", "identity"],
    ["chunked before another coding", "chunked, gzip"],
    ["chunked twice", "chunked, chunked"],
  ])("rejects %s", (_, value) => {
    expect(decideError([["Transfer-Encoding", value]]).code).toBe(
      "UNSUPPORTED_TRANSFER_ENCODING",
    );
  });

  it("rejects Content-Length with Transfer-Encoding in either order", () => {
    const length: [string, string] = ["Content-Length", "5"];
    const chunked: [string, string] = ["Transfer-Encoding", "chunked"];

    for (const pairs of [
      [length, chunked],
      [chunked, length],
    ]) {
      const error = decideError(pairs);
      expect(error.code).toBe("CONFLICTING_BODY_FRAMING");
      expect(error.message).toBe(
        "Both Content-Length and Transfer-Encoding are present",
      );
    }
  });

  it("reports an unusable Transfer-Encoding before a framing conflict", () => {
    const error = decideError([
      ["Content-Length", "5"],
      ["Transfer-Encoding", "gzip"],
    ]);
    expect(error.code).toBe("UNSUPPORTED_TRANSFER_ENCODING");
  });
});
