import {
  decodeToString,
  HttpParseError,
  type HttpRequest,
  type Logger,
  type ParseMilestone,
  type ParseOutcome,
  parseRequest,
  type ParserLimits,
  prefixedLogger,
  RequestParser,
  silentLogger,
  STATUS_TEXT,
  statusForParseError,
} from "@h1parse/parser";

export interface CliIo {
  version: string;
  /** Base logger for `--verbose`. */
  logger: Logger;
  /** Contents of `file`, or of stdin when no file was given. */
  readInput(file: string | undefined): Promise<Uint8Array>;
  out(line: string): void;
  err(line: string): void;
}

interface CliOptions {
  file?: string;
  fragmentSize?: number;
  stream: boolean;
  verbose: boolean;
  limits: Partial<ParserLimits>;
}

type ParsedArgs =
  | { command: "parse"; options: CliOptions }
  | { command: "help" }
  | { command: "version" }
  | { command: "invalid"; message: string };

const LIMIT_FLAGS = new Map<string, keyof ParserLimits>([
  ["--max-request-line", "maxRequestLineLength"],
  ["--max-headers", "maxHeaderCount"],
  ["--max-header-bytes", "maxSingleHeaderBytes"],
  ["--max-header-section", "maxHeaderSectionBytes"],
  ["--max-body", "maxBodySize"],
]);

const POSITIVE_INT = /^[1-9][0-9]*$/;

export function parseArgs(args: string[]): ParsedArgs {
  const options: CliOptions = { stream: false, verbose: false, limits: {} };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    const limit = LIMIT_FLAGS.get(arg);

    if (arg === "--fragment-size" || arg === "-f" || limit) {
      const value = args[++i];
      if (value === undefined) {
        return { command: "invalid", message: `Missing value for ${arg}` };
      }
      if (!POSITIVE_INT.test(value)) {
        return {
          command: "invalid",
          message: `Invalid value for ${arg}: ${value}`,
        };
      }
      if (limit) {
        options.limits[limit] = Number(value);
      } else {
        options.fragmentSize = Number(value);
      }
    } else if (arg === "--stream" || arg === "-s") {
      options.stream = true;
    } else if (arg === "--verbose") {
      options.verbose = true;
    } else if (arg === "--version" || arg === "-v") {
      return { command: "version" };
    } else if (arg === "--help" || arg === "-h") {
      return { command: "help" };
    } else if (!arg.startsWith("-") || arg === "-") {
      if (options.file !== undefined) {
        return { command: "invalid", message: `Unexpected argument: ${arg}` };
      }
      options.file = arg === "-" ? undefined : arg;
    } else {
      return { command: "invalid", message: `Unknown option: ${arg}` };
    }
    i++;
  }

  return { command: "parse", options };
}

export const HELP = `h1parse - parse a raw HTTP/1.1 request and print it as JSON

Usage: h1parse [file] [options]

Reads the request from stdin when no file (or "-") is given.

Options:
  --fragment-size, -f <n>     Feed the input in pieces of n bytes
  --stream, -s                Print one JSON event per line as parsing progresses
  --max-request-line <n>      Longest request line (default: 8192)
  --max-headers <n>           Most header fields (default: 100)
  --max-header-bytes <n>      Longest header line (default: 8192)
  --max-header-section <n>    Largest header section (default: 16384)
  --max-body <n>              Largest body (default: 10485760)
  --verbose                   Log parser state changes to stderr
  --version, -v               Show version
  --help, -h                  Show this help`;

function* fragmentsOf(
  input: Uint8Array,
  size: number | undefined,
): Generator<Uint8Array> {
  if (size === undefined || size >= input.length) {
    yield input;
    return;
  }
  for (let i = 0; i < input.length; i += size) {
    yield input.subarray(i, i + size);
  }
}

function describeRequest(request: HttpRequest, remainingBytes: number) {
  const body =
    request.body.mode === "buffered"
      ? {
          length: request.body.bytes.length,
          text: decodeToString(request.body.bytes),
        }
      : { length: request.body.length };

  return {
    method: request.method,
    target: request.target,
    version: request.version,
    headers: request.headers.toJSON(),
    framing: request.framing,
    body,
    remainingBytes,
  };
}

function describeMilestone(milestone: ParseMilestone) {
  switch (milestone.type) {
    case "request-line":
      return {
        event: milestone.type,
        method: milestone.method,
        target: milestone.target,
        version: milestone.version,
      };
    case "header":
      return {
        event: milestone.type,
        section: milestone.section,
        name: milestone.header.name,
        value: milestone.header.value,
      };
    case "headers-complete":
      return { event: milestone.type, framing: milestone.framing };
    case "body-chunk":
      return {
        event: milestone.type,
        length: milestone.data.length,
        text: decodeToString(milestone.data),
      };
  }
}

/** Print every milestone as a JSON line, then a closing `done` event. */
function streamRequest(
  input: Uint8Array,
  options: CliOptions,
  logger: Logger,
  io: CliIo,
): void {
  const parser = new RequestParser({
    limits: options.limits,
    bodyMode: "streaming",
    logger,
  });

  let outcome: ParseOutcome = { type: "need-more-input" };
  for (const fragment of fragmentsOf(input, options.fragmentSize)) {
    outcome = parser.feed(fragment);
    while (outcome.type === "progress") {
      io.out(JSON.stringify(describeMilestone(outcome.milestone)));
      outcome = parser.feed();
    }
    if (outcome.type !== "need-more-input") break;
  }
  if (outcome.type === "need-more-input") {
    outcome = parser.end();
  }

  if (outcome.type === "failed") throw outcome.error;
  if (outcome.type !== "done") {
    throw new Error(`Unexpected parser outcome: ${outcome.type}`);
  }
  const { body } = outcome.request;
  io.out(
    JSON.stringify({
      event: "done",
      bodyLength: body.mode === "streamed" ? body.length : body.bytes.length,
      remainingBytes: input.length - parser.bytesConsumed,
    }),
  );
}

/** Run the CLI. Resolves to the process exit code. */
export async function run(argv: string[], io: CliIo): Promise<number> {
  const parsed = parseArgs(argv);
  if (parsed.command === "help") {
    io.out(HELP);
    return 0;
  }
  if (parsed.command === "version") {
    io.out(io.version);
    return 0;
  }
  if (parsed.command === "invalid") {
    io.err(parsed.message);
    io.err(HELP);
    return 1;
  }

  const { options } = parsed;
  const logger = options.verbose
    ? prefixedLogger("h1parse", io.logger)
    : silentLogger();

  let input: Uint8Array;
  try {
    input = await io.readInput(options.file);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    io.err(`error: cannot read ${options.file ?? "stdin"}: ${message}`);
    return 1;
  }
  logger.info(`read ${input.length} bytes from ${options.file ?? "stdin"}`);

  try {
    if (options.stream) {
      streamRequest(input, options, logger, io);
    } else {
      const { request, remaining } = parseRequest(
        fragmentsOf(input, options.fragmentSize),
        { limits: options.limits, logger },
      );
      io.out(JSON.stringify(describeRequest(request, remaining.length), null, 2));
    }
    return 0;
  } catch (err) {
    if (err instanceof RangeError) {
      io.err(`error: ${err.message}`);
      return 1;
    }
    if (!(err instanceof HttpParseError)) throw err;
    const status = statusForParseError(err);
    io.err(`error: ${err.code} at offset ${err.offset}: ${err.message}`);
    io.err(`suggested response: ${status} ${STATUS_TEXT[status]}`);
    return 2;
  }
}
