// Shared helpers for byte, text and hash handling

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function utf8Encode(text: string): Uint8Array {
  return encoder.encode(text);
}

export function utf8Decode(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

/**
 * Lowercase hex rendering of a byte sequence.
 */
export function bytesToHex(bytes: Uint8Array): string {
  let out = "";
  for (const b of bytes) {
    out += b.toString(16).padStart(2, "0");
  }
  return out;
}

/**
 * Parse hex digits into bytes. Returns undefined on odd length or a non-hex
 * character.
 */
export function hexToBytes(hex: string): Uint8Array | undefined {
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
    return undefined;
  }
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = Number.parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

/**
 * Unsigned lexicographic byte comparison, shorter prefix first.
 */
export function compareBytes(left: Uint8Array, right: Uint8Array): number {
  const len = Math.min(left.length, right.length);
  for (let i = 0; i < len; i++) {
    const l = left[i] ?? 0;
    const r = right[i] ?? 0;
    if (l !== r) return l < r ? -1 : 1;
  }
  if (left.length === right.length) return 0;
  return left.length < right.length ? -1 : 1;
}

export function bytesEqual(left: Uint8Array, right: Uint8Array): boolean {
  return left.length === right.length && compareBytes(left, right) === 0;
}

export function compareNumbers(left: number | bigint, right: number | bigint): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Total order over doubles: -0 sorts before +0 and NaN after everything.
 */
export function compareDoubles(left: number, right: number): number {
  if (left < right) return -1;
  if (left > right) return 1;
  if (Number.isNaN(left) || Number.isNaN(right)) {
    if (Number.isNaN(left) && Number.isNaN(right)) return 0;
    return Number.isNaN(left) ? 1 : -1;
  }
  if (left === 0 && right === 0) {
    const l = Object.is(left, -0);
    const r = Object.is(right, -0);
    if (l === r) return 0;
    return l ? -1 : 1;
  }
  return 0;
}

/**
 * Read a big-endian two's complement integer of 1, 2, 4 or 8 bytes.
 */
export function readSignedBigEndian(bytes: Uint8Array): bigint {
  let result = 0n;
  for (const b of bytes) {
    result = (result << 8n) | BigInt(b);
  }
  return BigInt.asIntN(bytes.length * 8, result);
}

/**
 * Write a signed integer as big-endian two's complement bytes.
 */
export function writeSignedBigEndian(value: bigint, width: number): Uint8Array {
  const out = new Uint8Array(width);
  let v = BigInt.asUintN(width * 8, value);
  for (let i = width - 1; i >= 0; i--) {
    out[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  return out;
}

// ---------------------------------------------------------------------------
// Hashing (32-bit, stable across runs)
// ---------------------------------------------------------------------------

export function hashString(text: string): number {
  let h = 0;
  for (let i = 0; i < text.length; i++) {
    h = (Math.imul(h, 31) + text.charCodeAt(i)) | 0;
  }
  return h;
}

export function hashBigInt(value: bigint): number {
  const v = BigInt.asUintN(64, value);
  return Number(BigInt.asIntN(32, v ^ (v >> 32n)));
}

const hashView = new DataView(new ArrayBuffer(8));

export function hashDouble(value: number): number {
  hashView.setFloat64(0, value);
  return hashBigInt(hashView.getBigInt64(0));
}

export function hashBytes(bytes: Uint8Array): number {
  let h = 1;
  for (const b of bytes) {
    h = (Math.imul(h, 31) + b) | 0;
  }
  return h;
}

export function combineHash(...parts: number[]): number {
  let h = 17;
  for (const part of parts) {
    h = (Math.imul(h, 31) + part) | 0;
  }
  return h;
}

/**
 * Floor division and modulo for bigint (the built-in operators truncate).
 */
export function floorDiv(a: bigint, b: bigint): bigint {
  const q = a / b;
  return (a % b !== 0n && (a < 0n) !== (b < 0n)) ? q - 1n : q;
}

export function floorMod(a: bigint, b: bigint): bigint {
  return a - floorDiv(a, b) * b;
}

export function absBigInt(value: bigint): bigint {
  return value < 0n ? -value : value;
}

export function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

/**
 * Quote a string as a SQL character literal.
 */
export function quoteSQL(text: string): string {
  return `'${text.replaceAll("'", "''")}'`;
}
