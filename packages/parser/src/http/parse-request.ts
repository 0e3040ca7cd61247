import { concat, fromString } from "../utils/buffer.js";
import { RequestParser, type RequestParserOptions } from "./request-parser.js";
import type { HttpRequest, ParseOutcome } from "./types.js";

export interface ParsedRequest {
  request: HttpRequest;
  /** Input past the end of the request (a pipelined successor). */
  remaining: Uint8Array;
}

function drain(parser: RequestParser, outcome: ParseOutcome): ParseOutcome {
  let current = outcome;
  while (current.type === "progress") {
    current = parser.feed();
  }
  return current;
}

/**
 * Parse one request from input that is already all there. Fragments are
 * fed in order; the input is then treated as ended. The body is always
 * buffered here.
 *
 * @throws HttpParseError
 */
export function parseRequest(
  input: string | Uint8Array | Iterable<Uint8Array>,
  options?: RequestParserOptions,
): ParsedRequest {
  const fragments =
    typeof input === "string"
      ? [fromString(input)]
      : input instanceof Uint8Array
        ? [input]
        : input;

  const parser = new RequestParser({ ...options, bodyMode: "buffered" });
  const rest: Uint8Array[] = [];
  let outcome: ParseOutcome = { type: "need-more-input" };
  for (const fragment of fragments) {
    if (outcome.type === "need-more-input") {
      outcome = drain(parser, parser.feed(fragment));
    } else if (outcome.type === "done") {
      rest.push(fragment);
    }
  }
  if (outcome.type === "need-more-input") {
    outcome = parser.end();
  }

  if (outcome.type === "failed") throw outcome.error;
  if (outcome.type !== "done") {
    throw new Error(`Unexpected parser outcome: ${outcome.type}`);
  }
  return {
    request: outcome.request,
    remaining: concat([parser.takeRemaining(), ...rest]),
  };
}
