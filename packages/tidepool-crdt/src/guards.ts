import { isValue } from "./codec.js";
import { InvalidValueError } from "./errors.js";
import type { Stamp, Value } from "./types.js";
import { parseStampKey } from "./types.js";

// Shape checks for data that arrives from the wire or from disk.

export function isRecord(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object") return false;
  if (Array.isArray(value) || value instanceof Uint8Array) return false;
  return true;
}

export function expectRecord(value: unknown, what: string): Record<string, unknown> {
  if (!isRecord(value)) throw new InvalidValueError(`${what} must be an object`);
  return value;
}

export function expectString(value: unknown, what: string): string {
  if (typeof value !== "string") throw new InvalidValueError(`${what} must be a string`);
  return value;
}

export function expectNumber(value: unknown, what: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidValueError(`${what} must be a finite number`);
  }
  return value;
}

export function expectClock(value: unknown, what: string): number {
  const n = expectNumber(value, what);
  if (!Number.isSafeInteger(n) || n < 0) throw new InvalidValueError(`${what} must be a non-negative integer`);
  return n;
}

export function expectValue(value: unknown, what: string): Value {
  if (!isValue(value)) throw new InvalidValueError(`${what} is not a plain data value`);
  return value;
}

export function expectStamp(value: unknown, what: string): Stamp {
  const rec = expectRecord(value, what);
  return {
    clock: expectClock(rec.clock, `${what}.clock`),
    actor: expectString(rec.actor, `${what}.actor`),
  };
}

export function expectStampKey(value: unknown, what: string): string {
  const key = expectString(value, what);
  try {
    parseStampKey(key);
  } catch {
    throw new InvalidValueError(`${what} is not a valid element id: ${key}`);
  }
  return key;
}

export function expectArray(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) throw new InvalidValueError(`${what} must be an array`);
  return value;
}

export function mapRecord<T>(value: unknown, what: string, fn: (v: unknown, key: string) => T): Record<string, T> {
  const rec = expectRecord(value, what);
  const out: Record<string, T> = {};
  for (const [key, v] of Object.entries(rec)) out[key] = fn(v, key);
  return out;
}

export function expectTrueSet(value: unknown, what: string): Record<string, true> {
  return mapRecord<true>(value, what, (v, key) => {
    if (v !== true) throw new InvalidValueError(`${what}.${key} must be true`);
    return true;
  });
}
