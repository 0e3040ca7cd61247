import type { HttpHeader } from "./headers.js";
import type { Cursor } from "./cursor.js";

export type BodyEvent =
  | { type: "data"; data: Uint8Array }
  | { type: "trailer"; header: HttpHeader }
  | { type: "end" };

/** Consumes body bytes for one framing strategy. */
export interface BodyReader {
  /** Decoded body bytes produced so far. */
  readonly received: number;
  /** Next event, or null when more input is needed. */
  read(cursor: Cursor): BodyEvent | null;
}
