import type { BodyEvent, BodyReader } from "./body-reader.js";
import type { Cursor } from "./cursor.js";

/**
 * Exactly `length` bytes. Never takes more: whatever follows belongs to
 * the next request on the connection and stays in the cursor.
 */
export class FixedLengthBodyReader implements BodyReader {
  private remaining: number;

  constructor(readonly length: number) {
    this.remaining = length;
  }

  get received(): number {
    return this.length - this.remaining;
  }

  read(cursor: Cursor): BodyEvent | null {
    if (this.remaining === 0) return { type: "end" };
    if (cursor.available === 0) return null;

    const data = cursor.take(this.remaining);
    this.remaining -= data.length;
    return { type: "data", data };
  }
}
