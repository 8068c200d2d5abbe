import type { LogEntry } from '../types.js';

export interface StructuredLogEvent {
  timestamp: number;
  isoTimestamp: string;
  severity: LogEntry['severity'];
  priority: number;
  message: string;
  type: LogEntry['type'];
  direction: LogEntry['direction'];
  iteration?: number;
  remoteIdentifier?: string;
  server?: string;
  tool?: string;
  provider?: string;
  model?: string;
  labels: Record<string, string>;
  stack?: string;
}

const PRIORITY_BY_SEVERITY: Record<LogEntry['severity'], number> = {
  ERR: 3,
  WRN: 4,
  FIN: 5,
  VRB: 6,
  TRC: 7,
};

const RESERVED_LABEL_KEYS = new Set([
  'severity',
  'type',
  'direction',
  'iteration',
  'remote',
  'server',
  'tool',
  'provider',
  'model',
]);

export interface BuildStructuredEventOptions {
  labels?: Record<string, string>;
}

export function buildStructuredLogEvent(
  entry: LogEntry,
  options: BuildStructuredEventOptions = {}
): StructuredLogEvent {
  const remote = parseRemoteIdentifier(entry.remoteIdentifier, entry.type);

  const labels: Record<string, string> = {};
  Object.entries(options.labels ?? {}).forEach(([key, value]) => {
    if (value.length > 0) labels[key] = value;
  });
  Object.entries(entry.details ?? {}).forEach(([key, value]) => {
    if (Object.prototype.hasOwnProperty.call(labels, key)) return;
    if (typeof value === 'string') {
      if (value.length > 0) labels[key] = value;
      return;
    }
    if (typeof value === 'number') {
      if (Number.isFinite(value)) labels[key] = String(value);
      return;
    }
    labels[key] = value ? 'true' : 'false';
  });

  const filteredLabels = Object.entries(labels).reduce<Record<string, string>>((acc, [key, value]) => {
    if (RESERVED_LABEL_KEYS.has(key)) return acc;
    acc[key] = value;
    return acc;
  }, {});

  return {
    timestamp: entry.timestamp,
    isoTimestamp: new Date(entry.timestamp).toISOString(),
    severity: entry.severity,
    priority: PRIORITY_BY_SEVERITY[entry.severity],
    message: entry.message,
    type: entry.type,
    direction: entry.direction,
    iteration: entry.iteration,
    remoteIdentifier: entry.remoteIdentifier.length > 0 ? entry.remoteIdentifier : undefined,
    ...remote,
    labels: filteredLabels,
    stack: entry.stack,
  };
}

function parseRemoteIdentifier(
  identifier: string,
  type: LogEntry['type'],
): { provider?: string; model?: string; server?: string; tool?: string } {
  if (identifier.length === 0) return {};
  const idx = identifier.indexOf(':');
  if (type === 'llm') {
    if (idx === -1) return { provider: identifier };
    return { provider: identifier.slice(0, idx), model: identifier.slice(idx + 1) };
  }
  if (type === 'mcp') {
    // 'mcp:<server>'
    return { server: identifier.startsWith('mcp:') ? identifier.slice(4) : identifier };
  }
  if (type === 'tool' && idx !== -1) {
    return { server: identifier.slice(0, idx), tool: identifier.slice(idx + 1) };
  }
  return {};
}
