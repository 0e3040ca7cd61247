import { concat, EMPTY, indexOfCrlf } from "../utils/buffer.js";

/**
 * A view over the bytes that have been fed but not yet consumed.
 *
 * Bytes already handed out by `take()` are never overwritten: appending
 * allocates a fresh backing array, so earlier subarrays stay valid after
 * the cursor moves on.
 */
export class Cursor {
  private buffer: Uint8Array = EMPTY;
  private position = 0;
  private consumedBefore = 0;

  /** Number of buffered bytes not yet consumed. */
  get available(): number {
    return this.buffer.length - this.position;
  }

  /** Total bytes consumed since the cursor was created. */
  get consumed(): number {
    return this.consumedBefore + this.position;
  }

  append(bytes: Uint8Array): void {
    if (bytes.length === 0) return;
    if (this.available === 0) {
      this.consumedBefore += this.position;
      this.buffer = bytes;
      this.position = 0;
      return;
    }
    const pending = this.buffer.subarray(this.position);
    this.consumedBefore += this.position;
    this.buffer = concat([pending, bytes]);
    this.position = 0;
  }

  /** Byte at `offset` past the consumption point, or -1 when not buffered. */
  peek(offset = 0): number {
    const index = this.position + offset;
    return index < this.buffer.length ? this.buffer[index] : -1;
  }

  /** Offset of the first CRLF relative to the consumption point, or -1. */
  indexOfCrlf(from = 0): number {
    const index = indexOfCrlf(this.buffer, this.position + from);
    return index === -1 ? -1 : index - this.position;
  }

  /** Unconsumed bytes without consuming them. */
  view(length = this.available): Uint8Array {
    return this.buffer.subarray(this.position, this.position + length);
  }

  /** Consume up to `n` bytes and return them without copying. */
  take(n: number): Uint8Array {
    const end = Math.min(this.position + n, this.buffer.length);
    const out = this.buffer.subarray(this.position, end);
    this.position = end;
    return out;
  }

  skip(n: number): void {
    this.position = Math.min(this.position + n, this.buffer.length);
  }

  /** Copy of the unconsumed bytes. */
  remaining(): Uint8Array {
    return this.buffer.slice(this.position);
  }

  /** Drop the unconsumed bytes. */
  clear(): void {
    this.consumedBefore += this.position;
    this.buffer = EMPTY;
    this.position = 0;
  }
}
