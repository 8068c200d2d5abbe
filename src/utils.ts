import { jsonrepair } from 'jsonrepair';

import type { JsonValue } from './types.js';

export const isPlainObject = (value: unknown): value is Record<string, unknown> => (
  value !== null && typeof value === 'object' && !Array.isArray(value)
);

export const delay = (ms: number): Promise<void> => new Promise((resolve) => {
  if (ms <= 0) {
    resolve();
    return;
  }
  setTimeout(resolve, ms);
});

/**
 * Race `promise` against a timer. The timer is always cleared; the losing promise is abandoned, not cancelled.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error = () => new Error('timeout')): Promise<T> {
  let timeout: NodeJS.Timeout | undefined;
  const timerPromise = new Promise<never>((_, reject) => {
    timeout = setTimeout(() => {
      reject(onTimeout());
    }, timeoutMs);
  });
  try {
    return await Promise.race([promise, timerPromise]);
  } finally {
    if (timeout !== undefined) clearTimeout(timeout);
  }
}

const tryParseJson = (value: string): unknown => {
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
};

const stripSurroundingCodeFence = (value: string): string => {
  const match = /^```(?:json)?\s*([\s\S]*?)\s*```$/iu.exec(value);
  return match !== null ? match[1] : value;
};

/**
 * Parse tool-call arguments as produced by a model. Objects pass through; strings are parsed,
 * repaired with jsonrepair when needed. Anything that does not yield an object becomes `{}`.
 */
export const parseToolArguments = (raw: unknown): Record<string, unknown> => {
  if (isPlainObject(raw)) return raw;
  if (typeof raw !== 'string') return {};
  const text = stripSurroundingCodeFence(raw.trim());
  if (text.length === 0) return {};
  const direct = tryParseJson(text);
  if (isPlainObject(direct)) return direct;
  if (direct !== undefined) return {};
  try {
    const repaired = tryParseJson(jsonrepair(text));
    return isPlainObject(repaired) ? repaired : {};
  } catch {
    return {};
  }
};

export const isJsonValue = (value: unknown, seen: Set<unknown> = new Set()): value is JsonValue => {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object': {
      if (seen.has(value)) return false;
      seen.add(value);
      const ok = Array.isArray(value)
        ? value.every((item) => isJsonValue(item, seen))
        : Object.getPrototypeOf(value) === Object.prototype && Object.values(value).every((item) => isJsonValue(item, seen));
      seen.delete(value);
      return ok;
    }
    default:
      return false;
  }
};

export const isJsonObject = (value: unknown): value is { [key: string]: JsonValue } => (
  isPlainObject(value) && isJsonValue(value)
);

let warningSink: ((message: string) => void) | undefined;

export function setWarningSink(handler?: (message: string) => void): void {
  warningSink = handler;
}

// Non-fatal problems go through an injectable sink so the core stays silent by default
export function warn(message: string): void {
  const sink = warningSink;
  if (sink === undefined) {
    return;
  }
  try {
    sink(message);
  } catch {
    /* sink failures must not affect the caller */
  }
}
