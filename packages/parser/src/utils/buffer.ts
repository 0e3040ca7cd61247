const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const EMPTY = new Uint8Array(0);

export const CR = 0x0d;
export const LF = 0x0a;

export function concat(chunks: Uint8Array[]): Uint8Array {
  if (chunks.length === 1) return chunks[0];

  let total = 0;
  for (const chunk of chunks) {
    total += chunk.length;
  }

  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

export function fromString(text: string): Uint8Array {
  return encoder.encode(text);
}

export function decodeToString(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

/**
 * Decode bytes one-to-one into code points U+0000..U+00FF.
 * Unlike `TextDecoder("latin1")` (which is windows-1252) this never
 * remaps a byte, so the original bytes can always be recovered.
 */
export function decodeLatin1(bytes: Uint8Array): string {
  let out = "";
  for (let i = 0; i < bytes.length; i += 4096) {
    out += String.fromCharCode(...bytes.subarray(i, i + 4096));
  }
  return out;
}

/** Index of the first CRLF at or after `from`, or -1. */
export function indexOfCrlf(bytes: Uint8Array, from = 0): number {
  for (let i = bytes.indexOf(CR, from); i !== -1; i = bytes.indexOf(CR, i + 1)) {
    if (i + 1 >= bytes.length) return -1;
    if (bytes[i + 1] === LF) return i;
  }
  return -1;
}
