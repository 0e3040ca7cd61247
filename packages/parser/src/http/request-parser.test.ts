import { describe, expect, it } from "vitest";
import { LogStore, storeLogger } from "../logging/logger.js";
import { decodeToString, fromString } from "../utils/buffer.js";
import { HttpParseError, ParserMisuseError } from "./errors.js";
import { RequestParser, type RequestParserOptions } from "./request-parser.js";
import type {
  HttpRequest,
  ParseMilestone,
  ParseOutcome,
} from "./types.js";

interface Run {
  outcome: ParseOutcome;
  milestones: ParseMilestone[];
  parser: RequestParser;
}

/** Feed fragments in order, draining after each, then end the input. */
function run(
  fragments: Array<string | Uint8Array>,
  options?: RequestParserOptions,
): Run {
  const parser = new RequestParser(options);
  const milestones: ParseMilestone[] = [];
  let outcome: ParseOutcome = { type: "need-more-input" };

  for (const fragment of fragments) {
    outcome = parser.feed(fragment);
    while (outcome.type === "progress") {
      milestones.push(outcome.milestone);
      outcome = parser.feed();
    }
    if (outcome.type !== "need-more-input") break;
  }
  if (outcome.type === "need-more-input") {
    outcome = parser.end();
  }
  return { outcome, milestones, parser };
}

function parsed(
  fragments: Array<string | Uint8Array>,
  options?: RequestParserOptions,
): HttpRequest {
  const { outcome } = run(fragments, options);
  if (outcome.type !== "done") {
    throw new Error(
      `expected done, got ${outcome.type}${outcome.type === "failed" ? ` (${outcome.error.code})` : ""}`,
    );
  }
  return outcome.request;
}

function failure(
  fragments: Array<string | Uint8Array>,
  options?: RequestParserOptions,
): HttpParseError {
  const { outcome } = run(fragments, options);
  if (outcome.type !== "failed") {
    throw new Error(`expected failed, got ${outcome.type}`);
  }
  return outcome.error;
}

function bodyText(request: HttpRequest): string {
  if (request.body.mode !== "buffered") throw new Error("body not buffered");
  return decodeToString(request.body.bytes);
}

function bytewise(text: string): string[] {
  return [...text];
}

const SIMPLE_GET = "GET /index.html HTTP/1.1\r\nHost: example.com\r\n\r\n";

describe("RequestParser", () => {
  describe("request scenarios", () => {
    it("parses a simple GET request", () => {
      const request = parsed([SIMPLE_GET]);

      expect(request.method).toBe("GET");
      expect(request.target).toBe("/index.html");
      expect(request.version).toBe("HTTP/1.1");
      expect(request.headers.toJSON()).toEqual([["Host", "example.com"]]);
      expect(request.framing).toEqual({ type: "none" });
      expect(request.body).toEqual({ mode: "buffered", bytes: new Uint8Array(0) });
    });

    it("gives the same result when fed one byte at a time", () => {
      const whole = parsed([SIMPLE_GET]);
      const split = parsed(bytewise(SIMPLE_GET));

      expect(split.method).toBe(whole.method);
      expect(split.target).toBe(whole.target);
      expect(split.version).toBe(whole.version);
      expect(split.headers.toJSON()).toEqual(whole.headers.toJSON());
      expect(split.framing).toEqual(whole.framing);
      expect(bodyText(split)).toBe("");
    });

    it("reads a fixed-length body", () => {
      const request = parsed([
        "POST /submit HTTP/1.1\r\nContent-Length: 5\r\n\r\nhello",
      ]);

      expect(request.framing).toEqual({ type: "fixed-length", length: 5 });
      expect(bodyText(request)).toBe("hello");
    });

    it("decodes a chunked body", () => {
      const request = parsed([
        "POST /x HTTP/1.1\r\nTransfer-Encoding: chunked\r\n\r\n4\r\nWiki\r\n0\r\n\r\n",
      ]);

      expect(request.framing).toEqual({ type: "chunked", codings: ["chunked"] });
      expect(bodyText(request)).toBe("Wiki");
    });

    it("rejects two Content-Length headers that disagree", () => {
      const error = failure([
        "GET / HTTP/1.1\r\nContent-Length: 5\r\nContent-Length: 6\r\n\r\n",
      ]);

      expect(error.code).toBe("CONFLICTING_BODY_FRAMING");
    });

    it("decodes a chunked body on HTTP/1.0", () => {
      const request = parsed([
        "POST /x HTTP/1.0\r\nTransfer-Encoding: chunked\r\n\r\n4\r\nWiki\r\n0\r\n\r\n",
      ]);

      expect(request.version).toBe("HTTP/1.0");
      expect(request.framing).toEqual({ type: "chunked", codings: ["chunked"] });
      expect(bodyText(request)).toBe("Wiki");
    });

    it("rejects Content-Length with Transfer-Encoding on HTTP/1.0", () => {
      const error = failure([
        "POST /x HTTP/1.0\r\nContent-Length: 4\r\nTransfer-Encoding: chunked\r\n\r\nWiki",
      ]);

      expect(error.code).toBe("CONFLICTING_BODY_FRAMING");
    });
  });

  describe("header access", () => {
    it("gives a live read-only view while parsing", () => {
      const parser = new RequestParser();
      let outcome = parser.feed("GET / HTTP/1.1\r\nA: 1\r\n");
      while (outcome.type === "progress") outcome = parser.feed();

      const { headers } = parser.partialRequest;
      expect(headers.get("a")).toBe("1");
      expect("append" in headers).toBe(false);

      outcome = parser.feed("B: 2\r\n");
      while (outcome.type === "progress") outcome = parser.feed();
      expect(headers.toJSON()).toEqual([
        ["A", "1"],
        ["B", "2"],
      ]);
    });

    it("hands out copies of the field lists", () => {
      const { headers } = parsed(["GET / HTTP/1.1\r\nA: 1\r\na: 2\r\n\r\n"]);

      expect("append" in headers).toBe(false);
      expect(headers.entries()).not.toBe(headers.entries());
      expect(headers.getAll("A")).not.toBe(headers.getAll("A"));
      expect(headers.getAll("A")).toEqual(["1", "2"]);
      expect(Object.isFrozen(headers.entries()[0])).toBe(true);
    });
  });

  describe("fragmentation", () => {
    const requests = [
      SIMPLE_GET,
      "POST /upload?x=1 HTTP/1.0\r\nContent-Length: 11\r\nX-A: 1\r\nx-a: 2\r\n\r\nhello world",
      "PUT /c HTTP/1.1\r\nTransfer-Encoding: gzip, chunked\r\n\r\n3;name=v\r\nabc\r\nA\r\n0123456789\r\n0\r\nExpires: never\r\n\r\n",
    ];

    for (const raw of requests) {
      it(`parses ${JSON.stringify(raw.slice(0, 16))} identically at every split point`, () => {
        const whole = parsed([raw]);
        for (let i = 1; i < raw.length; i++) {
          const request = parsed([raw.slice(0, i), raw.slice(i)]);
          expect(request.method).toBe(whole.method);
          expect(request.target).toBe(whole.target);
          expect(request.version).toBe(whole.version);
          expect(request.headers.toJSON()).toEqual(whole.headers.toJSON());
          expect(request.framing).toEqual(whole.framing);
          expect(bodyText(request)).toBe(bodyText(whole));
        }
      });
    }

    it("keeps trailer fields after the header fields", () => {
      const request = parsed(bytewise(requests[2]));

      expect(request.headers.toJSON()).toEqual([
        ["Transfer-Encoding", "gzip, chunked"],
        ["Expires", "never"],
      ]);
      expect(request.framing).toEqual({
        type: "chunked",
        codings: ["gzip", "chunked"],
      });
      expect(bodyText(request)).toBe("abc0123456789");
    });
  });

  describe("milestones", () => {
    it("reports the request line, each header and the end of the headers", () => {
      const { milestones } = run([
        "POST /m HTTP/1.1\r\nHost: h\r\nContent-Length: 2\r\n\r\nok",
      ]);

      expect(milestones).toEqual([
        { type: "request-line", method: "POST", target: "/m", version: "HTTP/1.1" },
        { type: "header", header: { name: "Host", value: "h" }, section: "headers" },
        {
          type: "header",
          header: { name: "Content-Length", value: "2" },
          section: "headers",
        },
        { type: "headers-complete", framing: { type: "fixed-length", length: 2 } },
      ]);
    });

    it("streams body chunks as they arrive", () => {
      const { outcome, milestones } = run(
        ["POST /s HTTP/1.1\r\nContent-Length: 6\r\n\r\nabc", "def"],
        { bodyMode: "streaming" },
      );

      const chunks = milestones
        .filter((m) => m.type === "body-chunk")
        .map((m) => (m.type === "body-chunk" ? decodeToString(m.data) : ""));
      expect(chunks).toEqual(["abc", "def"]);
      expect(outcome.type).toBe("done");
      if (outcome.type === "done") {
        expect(outcome.request.body).toEqual({ mode: "streamed", length: 6 });
      }
    });

    it("tags trailer fields as trailers", () => {
      const { milestones } = run([
        "POST /t HTTP/1.1\r\nTransfer-Encoding: chunked\r\n\r\n0\r\nDigest: x\r\n\r\n",
      ]);

      expect(milestones.at(-1)).toEqual({
        type: "header",
        header: { name: "Digest", value: "x" },
        section: "trailers",
      });
    });
  });

  describe("phases", () => {
    it("moves strictly forward", () => {
      const parser = new RequestParser();
      const phases = [parser.phase];
      const record = (outcome: ParseOutcome) => {
        if (phases.at(-1) !== parser.phase) phases.push(parser.phase);
        return outcome;
      };

      let outcome = record(parser.feed("POST / HTTP/1.1\r\nContent-Length: 1\r\n\r\n"));
      while (outcome.type === "progress") outcome = record(parser.feed());
      outcome = record(parser.feed("x"));
      while (outcome.type === "progress") outcome = record(parser.feed());

      expect(phases).toEqual([
        "start",
        "parsing-headers",
        "parsing-body",
        "complete",
      ]);
    });

    it("logs every transition", () => {
      const store = new LogStore();
      parsed([SIMPLE_GET], { logger: storeLogger(store) });

      expect(store.getEntries().map((e) => e.message)).toEqual([
        "start -> parsing-request-line",
        "parsing-request-line -> parsing-headers",
        "parsing-headers -> determining-body-framing",
        "determining-body-framing -> parsing-body",
        "parsing-body -> complete",
      ]);
    });

    it("copies a buffered body out of the fed array", () => {
      const input = fromString("POST / HTTP/1.1\r\nContent-Length: 2\r\n\r\nhi");
      const request = parsed([input]);

      input.fill(0x21);
      expect(bodyText(request)).toBe("hi");
    });

    it("completes a zero-length body without more input", () => {
      const request = parsed(["POST / HTTP/1.1\r\nContent-Length: 0\r\n\r\n"]);
      expect(request.framing).toEqual({ type: "fixed-length", length: 0 });
      expect(bodyText(request)).toBe("");
    });
  });

  describe("pipelining", () => {
    it("leaves the next request untouched", () => {
      const parser = new RequestParser();
      let outcome = parser.feed(
        "POST /a HTTP/1.1\r\nContent-Length: 3\r\n\r\nabcGET /b HTTP/1.1\r\n",
      );
      while (outcome.type === "progress") outcome = parser.feed();

      expect(outcome.type).toBe("done");
      expect(parser.bytesConsumed).toBe(42);
      expect(decodeToString(parser.takeRemaining())).toBe("GET /b HTTP/1.1\r\n");
    });

    it("refuses more bytes once complete", () => {
      const { parser } = run([SIMPLE_GET]);
      expect(() => parser.feed("GET")).toThrow(ParserMisuseError);
      expect(parser.feed().type).toBe("done");
    });

    it("only gives remaining bytes after completion", () => {
      const parser = new RequestParser();
      parser.feed("GET / HT");
      expect(() => parser.takeRemaining()).toThrow(ParserMisuseError);
    });
  });

  describe("errors", () => {
    it("stops for good on the first error", () => {
      const parser = new RequestParser();
      const first = parser.feed("GET / HTTP/2.0\r\n");
      expect(first.type).toBe("failed");
      const consumed = parser.bytesConsumed;

      const again = parser.feed("Host: x\r\n\r\n");
      expect(again).toBe(first);
      expect(parser.bytesConsumed).toBe(consumed);
      expect(parser.phase).toBe("error");
      expect(parser.end()).toBe(first);
    });

    it("keeps the partial request for diagnostics", () => {
      const { parser } = run([
        "GET /p HTTP/1.1\r\nHost: a\r\nBad Name: x\r\n\r\n",
      ]);

      expect(parser.error?.code).toBe("INVALID_HEADER_NAME");
      const partial = parser.partialRequest;
      expect(partial.method).toBe("GET");
      expect(partial.target).toBe("/p");
      expect(partial.headers.toJSON()).toEqual([["Host", "a"]]);
      expect(partial.framing).toBeUndefined();
    });

    it("reports input that ends mid-request", () => {
      const error = failure(["GET / HTTP/1.1\r\nHost: a\r\n"]);
      expect(error.code).toBe("UNEXPECTED_END_OF_INPUT");
      expect(error.offset).toBe(25);
    });

    it("reports a body cut short", () => {
      const error = failure(["POST / HTTP/1.1\r\nContent-Length: 4\r\n\r\nab"]);
      expect(error.code).toBe("UNEXPECTED_END_OF_INPUT");
      expect(error.message).toBe("Input ended during parsing-body");
    });

    it("logs the rejection", () => {
      const store = new LogStore();
      failure(["GET / HTTP/1.1\r\nHostname\r\n"], {
        logger: storeLogger(store),
      });

      expect(store.getEntries().at(-2)?.message).toBe(
        "request rejected: INVALID_HEADER_NAME at offset 24: Header line has no colon",
      );
    });

    it("fails a request line ended by a bare LF", () => {
      const parser = new RequestParser();
      const outcome = parser.feed("GET / HTTP/1.1\nHost: a\n\n");

      expect(outcome.type).toBe("failed");
      expect(parser.error?.code).toBe("MALFORMED_REQUEST_LINE");
      expect(parser.error?.offset).toBe(14);
    });

    it("fails on the fragment that carries a bad method byte", () => {
      const parser = new RequestParser();
      expect(parser.feed("G").type).toBe("need-more-input");
      expect(parser.feed("\x00T / HTTP/1.1\r\n").type).toBe("failed");
      expect(parser.error?.offset).toBe(1);
    });

    it("refuses end() while buffered input is unread", () => {
      const parser = new RequestParser();
      const outcome = parser.feed(SIMPLE_GET);
      expect(outcome.type).toBe("progress");
      expect(() => parser.end()).toThrow(ParserMisuseError);
    });

    it("rejects invalid limits up front", () => {
      expect(() => new RequestParser({ limits: { maxHeaderCount: 0 } })).toThrow(
        RangeError,
      );
    });
  });

  it("accepts raw bytes with obs-text in values", () => {
    const request = parsed([
      fromString("GET / HTTP/1.1\r\nX-Name: "),
      new Uint8Array([0xe9, 0x74, 0xe9]),
      fromString("\r\n\r\n"),
    ]);
    expect(request.headers.get("x-name")).toBe("été");
  });
});
