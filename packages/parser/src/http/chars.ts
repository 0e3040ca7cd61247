export const SP = 0x20;
export const HTAB = 0x09;
export const COLON = 0x3a;
export const SEMICOLON = 0x3b;

// tchar = "!" / "#" / "$" / "%" / "&" / "'" / "*" / "+" / "-" / "." /
//         "^" / "_" / "`" / "|" / "~" / DIGIT / ALPHA
const TCHAR = new Uint8Array(256);
for (let c = 0x30; c <= 0x39; c++) TCHAR[c] = 1;
for (let c = 0x41; c <= 0x5a; c++) TCHAR[c] = 1;
for (let c = 0x61; c <= 0x7a; c++) TCHAR[c] = 1;
for (const c of "!#$%&'*+-.^_`|~") TCHAR[c.charCodeAt(0)] = 1;

export function isTokenChar(byte: number): boolean {
  return TCHAR[byte] === 1;
}

/** Control characters: 0x00-0x1f and DEL. */
export function isCtl(byte: number): boolean {
  return byte < 0x20 || byte === 0x7f;
}

/** field-vchar, SP, HTAB and obs-text. */
export function isFieldValueChar(byte: number): boolean {
  return byte === HTAB || !isCtl(byte);
}

export function isWhitespace(byte: number): boolean {
  return byte === SP || byte === HTAB;
}

/** Value of a hex digit, or -1. */
export function hexValue(byte: number): number {
  if (byte >= 0x30 && byte <= 0x39) return byte - 0x30;
  if (byte >= 0x41 && byte <= 0x46) return byte - 0x41 + 10;
  if (byte >= 0x61 && byte <= 0x66) return byte - 0x61 + 10;
  return -1;
}
