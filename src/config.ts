import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { z } from 'zod';

import type { ServerDescriptor } from './types.js';

import { ConfigurationError } from './errors.js';

export const DEFAULT_MODEL = 'anthropic/claude-3.5-sonnet';
export const DEFAULT_OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';
export const DEFAULT_MAX_ITERATIONS = 10;
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;
export const DEFAULT_RETRY_ATTEMPTS = 2;
export const DEFAULT_RETRY_DELAY_MS = 2_000;
export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful assistant with access to tools from connected MCP servers. '
  + 'Use them when they help answer the user, and explain what you found.';

// Per transport: how long the handshake may take, and the default bound for each request afterwards
export const TRANSPORT_TIMEOUT_DEFAULTS = {
  sse: { connectTimeoutMs: 5_000, readTimeoutMs: 300_000 },
  'streamable-http': { connectTimeoutMs: 30_000, readTimeoutMs: 300_000 },
} as const;

const nonEmpty = z.string().min(1);
const timeoutMs = z.number().int().positive();

const StdioServerSchema = z.object({
  transport: z.literal('stdio'),
  command: nonEmpty,
  args: z.array(z.string()).default([]),
  env: z.record(z.string(), z.string()).default({}),
  cwd: nonEmpty.optional(),
});

const SseServerSchema = z.object({
  transport: z.literal('sse'),
  url: z.string().url(),
  headers: z.record(z.string(), z.string()).default({}),
  connectTimeoutMs: timeoutMs.optional(),
  readTimeoutMs: timeoutMs.optional(),
});

const StreamableHttpServerSchema = z.object({
  transport: z.literal('streamable-http'),
  url: z.string().url(),
  headers: z.record(z.string(), z.string()).default({}),
  connectTimeoutMs: timeoutMs.optional(),
  readTimeoutMs: timeoutMs.optional(),
  terminateOnClose: z.boolean().optional(),
});

const ServerConfigSchema = z.discriminatedUnion('transport', [
  StdioServerSchema,
  SseServerSchema,
  StreamableHttpServerSchema,
]);

const ServerNameSchema = z.string()
  .regex(/^[A-Za-z0-9_-]+$/, 'must contain only letters, digits, "_" or "-"')
  .refine((name) => !name.includes('__'), 'must not contain "__", which separates server and tool names');

export const ServerDescriptorSchema = z.intersection(
  z.object({ name: ServerNameSchema }),
  ServerConfigSchema,
);

const LlmSchema = z.object({
  provider: z.enum(['openrouter', 'openai', 'openai-compatible']).default('openrouter'),
  model: nonEmpty.default(DEFAULT_MODEL),
  baseUrl: z.string().url().optional(),
  apiKey: z.string().optional(),
  headers: z.record(z.string(), z.string()).optional(),
  // OpenAI only: which API the model is reached through
  openaiMode: z.enum(['chat', 'responses']).default('chat'),
});

const ConversationSchema = z.object({
  maxIterations: z.number().int().positive().default(DEFAULT_MAX_ITERATIONS),
  temperature: z.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
  systemPrompt: z.string().default(DEFAULT_SYSTEM_PROMPT),
  maxOutputTokens: z.number().int().positive().optional(),
  toolTimeoutMs: timeoutMs.default(DEFAULT_TOOL_TIMEOUT_MS),
});

const RegistrySchema = z.object({
  retryAttempts: z.number().int().min(0).default(DEFAULT_RETRY_ATTEMPTS),
  retryDelayMs: z.number().int().min(0).default(DEFAULT_RETRY_DELAY_MS),
  failFast: z.boolean().default(false),
});

const PersistenceSchema = z.object({
  dbPath: nonEmpty.optional(),
});

const LoggingSchema = z.object({
  format: z.enum(['logfmt', 'json', 'console', 'none']).default('logfmt'),
  level: z.enum(['ERR', 'WRN', 'FIN', 'VRB', 'TRC']).default('VRB'),
});

export const ConfigurationSchema = z.object({
  mcpServers: z.record(ServerNameSchema, ServerConfigSchema).default({}),
  llm: LlmSchema.default({}),
  conversation: ConversationSchema.default({}),
  registry: RegistrySchema.default({}),
  persistence: PersistenceSchema.default({}),
  logging: LoggingSchema.default({}),
});

export type Configuration = z.infer<typeof ConfigurationSchema>;
export type LlmConfig = Configuration['llm'];

const formatIssues = (error: z.ZodError): string[] => error.issues.map((issue) => {
  const where = issue.path.map((p) => String(p)).join('.');
  return where.length > 0 ? `${where}: ${issue.message}` : issue.message;
});

/**
 * Check that a descriptor carries everything its transport needs. Nothing is connected here.
 */
export function validateServerDescriptor(raw: unknown): ServerDescriptor {
  const parsed = ServerDescriptorSchema.safeParse(raw);
  if (!parsed.success) {
    const name = typeof raw === 'object' && raw !== null && 'name' in raw && typeof raw.name === 'string' ? raw.name : '<unnamed>';
    throw new ConfigurationError(`Invalid server descriptor '${name}'`, formatIssues(parsed.error));
  }
  return parsed.data;
}

export function serverDescriptorsFromConfig(config: Configuration): ServerDescriptor[] {
  return Object.entries(config.mcpServers).map(([name, server]) => ({ name, ...server }));
}

export function expandEnv(str: string, env: NodeJS.ProcessEnv = process.env): string {
  return str.replace(/\$\{([^}]+)\}/g, (_m: string, name: string) => {
    const value = env[name];
    if (value === undefined) {
      throw new ConfigurationError(`Environment variable '${name}' is not set`);
    }
    return value;
  });
}

function expandDeep(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') return expandEnv(obj, env);
  if (Array.isArray(obj)) return obj.map((v) => expandDeep(v, env));
  if (obj !== null && typeof obj === 'object') {
    return Object.entries(obj).reduce<Record<string, unknown>>((acc, [k, v]) => {
      acc[k] = expandDeep(v, env);
      return acc;
    }, {});
  }
  return obj;
}

export function parseConfiguration(json: unknown, env: NodeJS.ProcessEnv = process.env, source = 'configuration'): Configuration {
  const parsed = ConfigurationSchema.safeParse(expandDeep(json, env));
  if (!parsed.success) {
    throw new ConfigurationError(`Configuration validation failed in ${source}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

function resolveConfigPath(configPath?: string): string {
  if (typeof configPath === 'string' && configPath.length > 0) {
    if (!fs.existsSync(configPath)) throw new ConfigurationError(`Configuration file not found: ${configPath}`);
    return configPath;
  }
  const local = path.join(process.cwd(), '.mcp-hub.json');
  if (fs.existsSync(local)) return local;
  const home = path.join(os.homedir(), '.mcp-hub.json');
  if (fs.existsSync(home)) return home;
  throw new ConfigurationError('Configuration file not found. Create .mcp-hub.json or pass --config');
}

export function loadConfiguration(configPath?: string, env: NodeJS.ProcessEnv = process.env): Configuration {
  const resolved = resolveConfigPath(configPath);
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf-8');
  } catch (e) {
    throw new ConfigurationError(`Failed to read configuration file ${resolved}: ${e instanceof Error ? e.message : String(e)}`);
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ConfigurationError(`Invalid JSON in configuration file ${resolved}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseConfiguration(json, env, resolved);
}
