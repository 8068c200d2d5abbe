import type { LogEntry, LogSeverity } from '../types.js';

import { formatConsole } from './console-format.js';
import { formatLogfmt } from './logfmt.js';
import { buildStructuredLogEvent, type StructuredLogEvent } from './structured-log-event.js';

export type LogFormat = 'logfmt' | 'json' | 'console' | 'none';

export interface StructuredLoggerOptions {
  format?: LogFormat;
  // Entries less severe than this are dropped (default VRB)
  minSeverity?: LogSeverity;
  labels?: Record<string, string>;
  color?: boolean;
  verbose?: boolean;
  writer?: (line: string) => void;
}

// Lower rank is more severe
const SEVERITY_RANK: Record<LogSeverity, number> = {
  ERR: 0,
  WRN: 1,
  FIN: 2,
  VRB: 3,
  TRC: 4,
};

export class StructuredLogger {
  private readonly labels: Record<string, string>;
  private readonly sink?: (event: StructuredLogEvent) => void;
  private readonly threshold: number;

  constructor(options: StructuredLoggerOptions = {}) {
    this.labels = options.labels ?? {};
    this.threshold = SEVERITY_RANK[options.minSeverity ?? 'VRB'];
    const writer = options.writer ?? defaultWriter;
    const color = options.color ?? false;
    const verbose = options.verbose ?? false;
    switch (options.format ?? 'logfmt') {
      case 'logfmt':
        this.sink = (event) => { writer(`${formatLogfmt(event, { color })}\n`); };
        break;
      case 'json':
        this.sink = (event) => { writer(`${JSON.stringify(buildJsonPayload(event))}\n`); };
        break;
      case 'console':
        this.sink = (event) => { writer(`${formatConsole(event, { color, verbose })}\n`); };
        break;
      case 'none':
        break;
    }
  }

  emit(entry: LogEntry): void {
    if (this.sink === undefined) return;
    if (SEVERITY_RANK[entry.severity] > this.threshold) return;
    this.sink(buildStructuredLogEvent(entry, { labels: this.labels }));
  }

  // Bound emitter for components that take an `onLog` callback
  get log(): (entry: LogEntry) => void {
    return (entry) => { this.emit(entry); };
  }
}

export function createStructuredLogger(options: StructuredLoggerOptions): StructuredLogger {
  return new StructuredLogger(options);
}

function defaultWriter(line: string): void {
  try {
    process.stderr.write(line);
  } catch {
    // stderr closed
  }
}

function buildJsonPayload(event: StructuredLogEvent): Record<string, unknown> {
  const entries: [string, unknown][] = [];
  const push = (key: string, value: unknown): void => {
    if (value === undefined) return;
    entries.push([key, value]);
  };

  push('ts', event.isoTimestamp);
  push('timestamp', event.timestamp);
  push('severity', event.severity);
  push('level', event.severity.toLowerCase());
  push('priority', event.priority);
  push('type', event.type);
  push('direction', event.direction);
  push('iteration', event.iteration);
  push('remote', event.remoteIdentifier);
  push('server', event.server);
  push('tool', event.tool);
  push('provider', event.provider);
  push('model', event.model);
  if (Object.keys(event.labels).length > 0) push('labels', event.labels);
  push('stack', event.stack);

  entries.push(['message', event.message]);

  return Object.fromEntries(entries);
}
