import type { HttpParseError } from "./errors.js";
import { ParserMisuseError } from "./errors.js";
import type { ReadonlyHttpHeaders } from "./headers.js";
import { RequestParser, type RequestParserOptions } from "./request-parser.js";
import type {
  HttpRequest,
  HttpRequestHead,
  ParseOutcome,
  RequestLine,
} from "./types.js";

export interface StageFailure {
  readonly status: "failed";
  readonly error: HttpParseError;
}

/**
 * The buffered bytes ran out. `end()` is how a transport reports that no
 * more are coming; it is only offered here, where the parser is idle.
 */
export interface StagePending<Stage> {
  readonly status: "pending";
  readonly next: Stage;
  end(): StageFailure;
}

export interface RequestLineStage {
  readonly phase: "request-line";
  feed(bytes?: Uint8Array | string): RequestLineStep;
}

export type RequestLineStep =
  | StagePending<RequestLineStage>
  | {
      readonly status: "advanced";
      readonly requestLine: RequestLine;
      readonly next: HeaderStage;
    }
  | StageFailure;

export interface HeaderStage {
  readonly phase: "headers";
  readonly requestLine: RequestLine;
  /** Header fields parsed so far. */
  readonly headers: ReadonlyHttpHeaders;
  feed(bytes?: Uint8Array | string): HeaderStep;
}

export type HeaderStep =
  | StagePending<HeaderStage>
  | {
      readonly status: "advanced";
      readonly head: HttpRequestHead;
      readonly next: BodyStage;
    }
  | StageFailure;

/** The only stage that hands out body bytes. */
export interface BodyStage {
  readonly phase: "body";
  readonly head: HttpRequestHead;
  feed(bytes?: Uint8Array | string): BodyStep;
}

export type BodyStep =
  | (StagePending<BodyStage> & { readonly chunks: Uint8Array[] })
  | {
      readonly status: "advanced";
      /** Body bytes that arrived with the final fragment (streaming mode). */
      readonly chunks: Uint8Array[];
      readonly next: CompleteStage;
    }
  | StageFailure;

/** The only stage that hands out the finished request. */
export interface CompleteStage {
  readonly phase: "complete";
  readonly request: HttpRequest;
  /** Bytes past the end of this request, for the next parser. */
  takeRemaining(): Uint8Array;
}

/**
 * Shared by the stages of one request. Exactly one stage is live at a
 * time; a stage that has handed over to its successor (or has failed)
 * refuses further calls.
 */
class StageDriver {
  private live: object | null = null;
  private ticket = 0;

  constructor(readonly parser: RequestParser) {}

  handOver<S extends object>(stage: S): S {
    this.live = stage;
    return stage;
  }

  /** Run the parser for `stage` until `visit` returns a step. */
  drive<Step>(
    stage: object,
    bytes: Uint8Array | string | undefined,
    visit: (outcome: ParseOutcome) => Step | undefined,
  ): Step {
    if (this.live !== stage) {
      throw new ParserMisuseError(
        "This stage has been superseded; use the stage returned by its last step",
      );
    }
    this.ticket++;

    let outcome = this.parser.feed(bytes);
    while (true) {
      if (outcome.type === "failed") {
        this.live = null;
      }
      const step = visit(outcome);
      if (step !== undefined) return step;
      outcome = this.parser.feed();
    }
  }

  pending<Stage>(next: Stage): StagePending<Stage> {
    const ticket = this.ticket;
    return {
      status: "pending",
      next,
      end: () => {
        if (ticket !== this.ticket || this.live === null) {
          throw new ParserMisuseError(
            "end() belongs to a step that has since been superseded",
          );
        }
        this.live = null;
        this.ticket++;
        const outcome = this.parser.end();
        if (outcome.type !== "failed") {
          throw new ParserMisuseError(`end() reached ${outcome.type}`);
        }
        return failure(outcome.error);
      },
    };
  }
}

function failure(error: HttpParseError): StageFailure {
  return { status: "failed", error };
}

class RequestLineStageImpl implements RequestLineStage {
  readonly phase = "request-line";

  constructor(private readonly driver: StageDriver) {}

  feed(bytes?: Uint8Array | string): RequestLineStep {
    return this.driver.drive(this, bytes, (outcome): RequestLineStep | undefined => {
      switch (outcome.type) {
        case "need-more-input":
          return this.driver.pending<RequestLineStage>(this);
        case "failed":
          return failure(outcome.error);
        case "progress": {
          if (outcome.milestone.type !== "request-line") return undefined;
          const { method, target, version } = outcome.milestone;
          const requestLine: RequestLine = { method, target, version };
          return {
            status: "advanced",
            requestLine,
            next: this.driver.handOver(
              new HeaderStageImpl(this.driver, requestLine),
            ),
          };
        }
        case "done":
          throw new ParserMisuseError("Request completed before its request line");
      }
    });
  }
}

class HeaderStageImpl implements HeaderStage {
  readonly phase = "headers";

  constructor(
    private readonly driver: StageDriver,
    readonly requestLine: RequestLine,
  ) {}

  get headers(): ReadonlyHttpHeaders {
    return this.driver.parser.partialRequest.headers;
  }

  feed(bytes?: Uint8Array | string): HeaderStep {
    return this.driver.drive(this, bytes, (outcome): HeaderStep | undefined => {
      switch (outcome.type) {
        case "need-more-input":
          return this.driver.pending<HeaderStage>(this);
        case "failed":
          return failure(outcome.error);
        case "progress": {
          if (outcome.milestone.type !== "headers-complete") return undefined;
          const head: HttpRequestHead = {
            ...this.requestLine,
            headers: this.headers,
            framing: outcome.milestone.framing,
          };
          return {
            status: "advanced",
            head,
            next: this.driver.handOver(new BodyStageImpl(this.driver, head)),
          };
        }
        case "done":
          throw new ParserMisuseError("Request completed before its headers");
      }
    });
  }
}

class BodyStageImpl implements BodyStage {
  readonly phase = "body";

  constructor(
    private readonly driver: StageDriver,
    readonly head: HttpRequestHead,
  ) {}

  feed(bytes?: Uint8Array | string): BodyStep {
    const chunks: Uint8Array[] = [];
    return this.driver.drive(this, bytes, (outcome): BodyStep | undefined => {
      switch (outcome.type) {
        case "need-more-input":
          return { ...this.driver.pending<BodyStage>(this), chunks };
        case "failed":
          return failure(outcome.error);
        case "progress":
          if (outcome.milestone.type === "body-chunk") {
            chunks.push(outcome.milestone.data);
          }
          return undefined;
        case "done":
          return {
            status: "advanced",
            chunks,
            next: this.driver.handOver(
              new CompleteStageImpl(this.driver, outcome.request),
            ),
          };
      }
    });
  }
}

class CompleteStageImpl implements CompleteStage {
  readonly phase = "complete";

  constructor(
    private readonly driver: StageDriver,
    readonly request: HttpRequest,
  ) {}

  takeRemaining(): Uint8Array {
    return this.driver.parser.takeRemaining();
  }
}

/**
 * Start parsing a request through phase-scoped handles. Each handle only
 * offers what its phase allows: there is no way to reach body bytes
 * before the header section has closed, or the request before it is
 * complete.
 *
 * @example
 * let step = beginRequest().feed(bytes);
 * if (step.status === "advanced") {
 *   const headers = step.next.feed();
 * }
 */
export function beginRequest(options?: RequestParserOptions): RequestLineStage {
  const driver = new StageDriver(new RequestParser(options));
  return driver.handOver(new RequestLineStageImpl(driver));
}
