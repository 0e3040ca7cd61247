export interface ParserLimits {
  /** Longest request line accepted, CRLF excluded. Default: 8192 */
  maxRequestLineLength: number;
  /** Most header fields per request, trailer fields included. Default: 100 */
  maxHeaderCount: number;
  /** Longest single header line, CRLF excluded. Default: 8192 */
  maxSingleHeaderBytes: number;
  /** Largest header (or trailer) section, every CRLF included. Default: 16KB */
  maxHeaderSectionBytes: number;
  /** Largest decoded body. Default: 10MB */
  maxBodySize: number;
}

/**
 * `buffered` collects the body into `request.body.bytes`; `streaming`
 * hands each piece out as a `body-chunk` milestone and keeps nothing.
 */
export type BodyMode = "buffered" | "streaming";

export interface ParserConfig {
  limits: ParserLimits;
  bodyMode: BodyMode;
}

export function defaultLimits(): ParserLimits {
  return {
    maxRequestLineLength: 8 * 1024,
    maxHeaderCount: 100,
    maxSingleHeaderBytes: 8 * 1024,
    maxHeaderSectionBytes: 16 * 1024,
    maxBodySize: 10 * 1024 * 1024,
  };
}

export function defaultConfig(): ParserConfig {
  return {
    limits: defaultLimits(),
    bodyMode: "buffered",
  };
}

const LIMIT_KEYS = [
  "maxRequestLineLength",
  "maxHeaderCount",
  "maxSingleHeaderBytes",
  "maxHeaderSectionBytes",
  "maxBodySize",
] as const satisfies ReadonlyArray<keyof ParserLimits>;

/** Fill in defaults and reject anything that is not a positive safe integer. */
export function resolveLimits(overrides?: Partial<ParserLimits>): ParserLimits {
  const limits = { ...defaultLimits() };
  for (const key of LIMIT_KEYS) {
    const value = overrides?.[key];
    if (value === undefined) continue;
    if (!Number.isSafeInteger(value) || value <= 0) {
      throw new RangeError(`${key} must be a positive integer, got ${value}`);
    }
    limits[key] = value;
  }
  return limits;
}

export interface ParserConfigOptions {
  limits?: Partial<ParserLimits>;
  bodyMode?: BodyMode;
}

export function resolveConfig(options?: ParserConfigOptions): ParserConfig {
  return {
    limits: resolveLimits(options?.limits),
    bodyMode: options?.bodyMode ?? "buffered",
  };
}
