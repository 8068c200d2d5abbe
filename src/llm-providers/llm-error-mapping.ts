import type { TurnStatus } from '../types.js';

import { isPlainObject } from '../utils.js';

export type LlmErrorKind =
  | 'rate_limit'
  | 'auth_error'
  | 'quota_exceeded'
  | 'model_error'
  | 'timeout'
  | 'network_error';

export type FailedTurnStatus = Exclude<TurnStatus, { type: 'success' }>;

export const LLM_ERROR_KIND_MEANINGS: Record<LlmErrorKind, { summary: string }> = {
  rate_limit: { summary: 'Too many requests; the caller may back off and retry.' },
  auth_error: { summary: 'Authentication or authorization failure.' },
  quota_exceeded: { summary: 'Quota or billing limit reached.' },
  model_error: { summary: 'Request rejected by the provider or model.' },
  timeout: { summary: 'Request timed out or was aborted.' },
  network_error: { summary: 'Network or transport failure, or a provider 5xx.' },
};

// Checked in this order; the first kind with a matching fragment wins
const MESSAGE_KIND_PATTERNS: [LlmErrorKind, string[]][] = [
  ['rate_limit', ['rate limit', 'ratelimit', 'rate_limit', 'too many requests', 'overload']],
  ['auth_error', ['authentication', 'unauthorized', 'invalid api key', 'unauthenticated', 'forbidden']],
  ['quota_exceeded', ['quota', 'billing', 'insufficient', 'payment required', 'credits']],
  ['model_error', ['model not found', 'unknown model', 'invalid model', 'unsupported model', 'invalid request']],
  ['timeout', ['timeout', 'timed out', 'deadline exceeded', 'aborted', 'etimedout', 'econnaborted']],
  ['network_error', ['network', 'connection', 'socket hang up', 'econnreset', 'econnrefused', 'enotfound', 'eai_again', 'fetch failed']],
];

const STATUS_KIND_MAP = new Map<number, LlmErrorKind>([
  [429, 'rate_limit'],
  [401, 'auth_error'],
  [403, 'auth_error'],
  [402, 'quota_exceeded'],
  [400, 'model_error'],
  [404, 'model_error'],
  [408, 'timeout'],
]);

const NAME_KIND_MAP = new Map<string, LlmErrorKind>([
  ['ratelimiterror', 'rate_limit'],
  ['authenticationerror', 'auth_error'],
  ['unauthorizederror', 'auth_error'],
  ['insufficientquotaerror', 'quota_exceeded'],
  ['ai_nosuchmodelerror', 'model_error'],
  ['ai_unsupportedmodelversionerror', 'model_error'],
  ['ai_invalidprompterror', 'model_error'],
  ['timeouterror', 'timeout'],
  ['aborterror', 'timeout'],
  ['fetcherror', 'network_error'],
]);

const NON_RETRYABLE_MODEL_NAMES = new Set(['ai_nosuchmodelerror', 'ai_unsupportedmodelversionerror']);

const normalize = (value: string | undefined): string | undefined =>
  typeof value === 'string' ? value.trim().toLowerCase() : undefined;

export const classifyLlmErrorKindFromMessage = (message: string | undefined): LlmErrorKind | undefined => {
  const normalized = normalize(message);
  if (normalized === undefined || normalized.length === 0) return undefined;
  const match = MESSAGE_KIND_PATTERNS.find(([, patterns]) => patterns.some((pattern) => normalized.includes(pattern)));
  return match?.[0];
};

export const classifyLlmErrorKind = (input: { status: number; name: string; code?: string; message?: string }): LlmErrorKind | undefined => {
  const statusKind = STATUS_KIND_MAP.get(input.status);
  if (statusKind !== undefined) return statusKind;
  const nameKey = normalize(input.name);
  const nameKind = nameKey !== undefined ? NAME_KIND_MAP.get(nameKey) : undefined;
  if (nameKind !== undefined) return nameKind;
  const codeKind = classifyLlmErrorKindFromMessage(input.code);
  if (codeKind !== undefined) return codeKind;
  const messageKind = classifyLlmErrorKindFromMessage(input.message);
  if (messageKind !== undefined) return messageKind;
  if (input.status >= 500) return 'network_error';
  return undefined;
};

interface ErrorFacts {
  status: number;
  name: string;
  code?: string;
  message: string;
  retryAfterMs?: number;
}

// RetryError wraps lastError, fetch failures wrap a cause; take the innermost record
const unwrap = (error: unknown): unknown => {
  let current = error;
  // eslint-disable-next-line functional/no-loop-statements
  for (let depth = 0; depth < 4; depth += 1) {
    if (!isPlainObject(current) && !(current instanceof Error)) break;
    if ('statusCode' in current && typeof current.statusCode === 'number') break;
    const next = 'lastError' in current ? current.lastError : current.cause;
    if (next === undefined || next === null) break;
    current = next;
  }
  return current;
};

const readNumber = (value: unknown): number | undefined => (typeof value === 'number' && Number.isFinite(value) ? value : undefined);
const readString = (value: unknown): string | undefined => (typeof value === 'string' && value.length > 0 ? value : undefined);

const readFacts = (error: unknown): ErrorFacts => {
  const primary = unwrap(error);
  const outerMessage = error instanceof Error ? error.message : undefined;
  if (!isPlainObject(primary) && !(primary instanceof Error)) {
    return { status: 0, name: '', message: outerMessage ?? String(primary) };
  }
  const rec: Record<string, unknown> = primary instanceof Error
    ? { ...primary, name: primary.name, message: primary.message }
    : primary;
  const headers = isPlainObject(rec.responseHeaders) ? rec.responseHeaders : undefined;
  const retryAfterSeconds = headers !== undefined ? Number(readString(headers['retry-after']) ?? Number.NaN) : Number.NaN;
  return {
    status: readNumber(rec.statusCode) ?? readNumber(rec.status) ?? 0,
    name: readString(rec.name) ?? '',
    code: readString(rec.code),
    message: readString(rec.message) ?? outerMessage ?? 'Unknown error',
    ...(Number.isFinite(retryAfterSeconds) ? { retryAfterMs: retryAfterSeconds * 1000 } : {}),
  };
};

/**
 * Map anything a provider call threw onto a failed TurnStatus.
 */
export function mapLlmError(error: unknown): FailedTurnStatus {
  if (error === null || error === undefined) return { type: 'invalid_response', message: 'Unknown error' };
  const facts = readFacts(error);
  const kind = classifyLlmErrorKind(facts);
  const message = facts.status > 0 ? `${String(facts.status)} ${facts.message}` : facts.message;
  switch (kind) {
    case 'rate_limit':
      return { type: 'rate_limit', message, ...(facts.retryAfterMs !== undefined ? { retryAfterMs: facts.retryAfterMs } : {}) };
    case 'auth_error':
      return { type: 'auth_error', message };
    case 'quota_exceeded':
      return { type: 'quota_exceeded', message };
    case 'model_error':
      return { type: 'model_error', message, retryable: !NON_RETRYABLE_MODEL_NAMES.has(normalize(facts.name) ?? '') && facts.status !== 404 };
    case 'timeout':
      return { type: 'timeout', message };
    case 'network_error':
      return { type: 'network_error', message, retryable: true };
    case undefined:
      return { type: 'invalid_response', message };
  }
}
