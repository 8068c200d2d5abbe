import type { StructuredLogEvent } from './structured-log-event.js';

import { colorize } from './logfmt.js';

interface FormatOptions {
  color?: boolean;
  verbose?: boolean;
}

export function formatConsole(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const time = event.isoTimestamp.slice(11, 23);
  const iteration = event.iteration !== undefined ? ` #${String(event.iteration)}` : '';
  const remote = event.remoteIdentifier !== undefined ? ` [${event.remoteIdentifier}]` : '';
  const arrow = event.direction === 'request' ? '→' : '←';
  let output = `${time} ${event.severity} ${event.type}${iteration} ${arrow}${remote} ${event.message}`;

  if (options.verbose === true) {
    const extras = Object.entries(event.labels).map(([key, value]) => `${key}=${value}`);
    if (extras.length > 0) output += ` (${extras.join(', ')})`;
  }
  if (options.color === true) {
    output = colorize(output, event.severity);
  }

  if (event.severity === 'ERR' && typeof event.stack === 'string' && event.stack.length > 0) {
    const stackLines = event.stack.split('\n').map((line) => `    ${line}`).join('\n');
    output += `\n${stackLines}`;
  }

  return output;
}
