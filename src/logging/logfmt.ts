import type { StructuredLogEvent } from './structured-log-event.js';

interface FormatOptions {
  color?: boolean;
}

const ANSI_RESET = '\u001B[0m';

export const COLOR_BY_SEVERITY: Record<StructuredLogEvent['severity'], string> = {
  ERR: '\u001B[31m',
  WRN: '\u001B[33m',
  FIN: '\u001B[36m',
  VRB: '\u001B[90m',
  TRC: '\u001B[90m',
};

export function colorize(line: string, severity: StructuredLogEvent['severity']): string {
  return `${COLOR_BY_SEVERITY[severity]}${line}${ANSI_RESET}`;
}

// Fixed fields in output order; labels follow, then the message, then the stack of errors
const FIELDS: [string, (event: StructuredLogEvent) => string | undefined][] = [
  ['ts', (e) => e.isoTimestamp],
  ['level', (e) => e.severity.toLowerCase()],
  ['priority', (e) => String(e.priority)],
  ['type', (e) => e.type],
  ['direction', (e) => e.direction],
  ['iteration', (e) => (e.iteration !== undefined ? String(e.iteration) : undefined)],
  ['remote', (e) => e.remoteIdentifier],
  ['server', (e) => e.server],
  ['tool', (e) => e.tool],
  ['provider', (e) => e.provider],
  ['model', (e) => e.model],
];

function encodeValue(value: string): string {
  if (value === '') return '""';
  const oneLine = value.replace(/\n/g, '\\n').replace(/\r/g, '\\r');
  const escaped = oneLine.replace(/"/g, '\\"');
  return /\s|=|"/.test(oneLine) ? `"${escaped}"` : escaped;
}

export function formatLogfmt(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const pairs = new Map<string, string>();
  const push = (key: string, value: string | undefined): void => {
    if (value === undefined || value.length === 0 || pairs.has(key)) return;
    pairs.set(key, value);
  };

  FIELDS.forEach(([key, read]) => { push(key, read(event)); });
  Object.entries(event.labels).forEach(([key, value]) => { push(key, value); });
  push('message', event.message);
  if (event.severity === 'ERR') push('stack', event.stack);

  const line = Array.from(pairs, ([key, value]) => `${key}=${encodeValue(value)}`).join(' ');
  return options.color === true ? colorize(line, event.severity) : line;
}
