import { decode as cborDecode, encode as cborEncode, rfc8949EncodeOptions } from "cborg";

import { InvalidValueError } from "./errors.js";
import type { Value, ValueObject } from "./types.js";

/**
 * Deterministic CBOR (RFC 8949 core deterministic encoding): map keys are
 * sorted, so equal values always encode to equal bytes.
 */
export function encodeCanonical(value: unknown): Uint8Array {
  return cborEncode(value, rfc8949EncodeOptions);
}

export function decodeCanonical(bytes: Uint8Array): unknown {
  return cborDecode(bytes);
}

export function bytesToHex(bytes: Uint8Array): string {
  let out = "";
  for (const b of bytes) out += b.toString(16).padStart(2, "0");
  return out;
}

export function hexToBytes(hex: string): Uint8Array {
  const clean = hex.startsWith("0x") || hex.startsWith("0X") ? hex.slice(2) : hex;
  if (clean.length % 2 !== 0) throw new Error(`hex must have even length, got: ${hex}`);
  if (!/^[0-9a-fA-F]*$/.test(clean)) throw new Error(`invalid hex: ${hex}`);
  const out = new Uint8Array(clean.length / 2);
  for (let i = 0; i < clean.length; i += 2) {
    out[i / 2] = Number.parseInt(clean.slice(i, i + 2), 16);
  }
  return out;
}

export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i += 1) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    if (x !== y) return x < y ? -1 : 1;
  }
  if (a.length === b.length) return 0;
  return a.length < b.length ? -1 : 1;
}

export function encodeValue(value: Value): Uint8Array {
  return encodeCanonical(value);
}

export function decodeValue(bytes: Uint8Array): Value {
  const decoded = decodeCanonical(bytes);
  assertValue(decoded, "value");
  return decoded;
}

/**
 * Stable string identity of a value (hex of its canonical encoding).
 */
export function valueKey(value: Value): string {
  return bytesToHex(encodeValue(value));
}

export function compareValues(a: Value, b: Value): number {
  return compareBytes(encodeValue(a), encodeValue(b));
}

export function valuesEqual(a: Value, b: Value): boolean {
  if (a === b) return true;
  return compareValues(a, b) === 0;
}

export function isValueObject(value: unknown): value is ValueObject {
  if (value === null || typeof value !== "object") return false;
  if (Array.isArray(value) || value instanceof Uint8Array) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isValue(value: unknown): value is Value {
  if (value === null) return true;
  switch (typeof value) {
    case "boolean":
    case "string":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (value instanceof Uint8Array) return true;
      if (Array.isArray(value)) return value.every((v) => isValue(v));
      if (!isValueObject(value)) return false;
      return Object.values(value).every((v) => isValue(v));
    default:
      return false;
  }
}

export function assertValue(value: unknown, field: string): asserts value is Value {
  if (!isValue(value)) throw new InvalidValueError(`${field} is not a plain data value`);
}

export function cloneValue<T extends Value>(value: T): T {
  return structuredClone(value);
}
