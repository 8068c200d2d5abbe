#!/usr/bin/env node
import { Command, Option } from 'commander';

import type { Configuration } from './config.js';
import type { ConversationStore } from './persistence.js';
import type { LogFn } from './types.js';
import type { CommanderError } from 'commander';

import { loadConfiguration, serverDescriptorsFromConfig } from './config.js';
import { ConversationEngine } from './conversation-engine.js';
import { isHubError } from './errors.js';
import { LLMClient } from './llm-client.js';
import { createStructuredLogger } from './logging/structured-logger.js';
import { SQLiteConversationStore } from './persistence.js';
import { ShutdownController } from './shutdown-controller.js';
import { SessionRegistry } from './tools/session-registry.js';
import { McpTransportConnector } from './tools/transport-connector.js';
import { setWarningSink } from './utils.js';
import { VERSION } from './version.js';

const shutdownController = new ShutdownController();

// Single exit path: run cleanup, then leave with the given code
let exiting = false;
async function exitAndShutdown(code: number, reason: string, logger?: LogFn): Promise<never> {
  if (!exiting) {
    exiting = true;
    if (code !== 0) {
      try { process.stderr.write(`mcp-hub: ${reason}\n`); } catch { /* stderr closed */ }
    }
    await shutdownController.shutdown({ logger });
  }
  process.exit(code);
}

const colorEnabled = (): boolean => process.stderr.isTTY && process.env.NO_COLOR === undefined;

setWarningSink((message) => {
  const line = colorEnabled() ? `\x1b[33m[warn] ${message}\x1b[0m` : `[warn] ${message}`;
  try { process.stderr.write(`${line}\n`); } catch { /* stderr closed */ }
});

interface Runtime {
  config: Configuration;
  registry: SessionRegistry;
  log: LogFn;
}

async function startRuntime(configPath: string | undefined): Promise<Runtime> {
  const config = loadConfiguration(configPath);
  const logger = createStructuredLogger({
    format: config.logging.format,
    minSeverity: config.logging.level,
    color: colorEnabled(),
  });
  const log = logger.log;
  const registry = new SessionRegistry({
    connector: new McpTransportConnector({ clientInfo: { name: 'mcp-hub', version: VERSION }, onLog: log }),
    onLog: log,
    defaultCallTimeoutMs: config.conversation.toolTimeoutMs,
  });
  shutdownController.register('registry', () => registry.closeAll());

  const results = await registry.addMany(serverDescriptorsFromConfig(config), config.registry.failFast, {
    retryAttempts: config.registry.retryAttempts,
    retryDelayMs: config.registry.retryDelayMs,
  });
  results.forEach((result, name) => {
    if (!result.ok) process.stderr.write(`server '${name}' unavailable: ${result.error.message}\n`);
  });
  return { config, registry, log };
}

function openStore(config: Configuration): ConversationStore | undefined {
  const dbPath = config.persistence.dbPath;
  if (dbPath === undefined) return undefined;
  const store = new SQLiteConversationStore({ path: dbPath });
  shutdownController.register('store', () => { store.close(); });
  return store;
}

const program = new Command();

program
  .name('mcp-hub')
  .description('Connect to MCP tool servers and chat with a model that can call their tools')
  .version(VERSION);

program.exitOverride((err: CommanderError) => {
  if (err.exitCode === 0) process.exit(0);
  void exitAndShutdown(err.exitCode, err.message);
});

program
  .command('servers')
  .description('Connect to every configured server and list its tools')
  .option('-c, --config <file>', 'configuration file (default: .mcp-hub.json)')
  .addOption(new Option('--json', 'print server info as JSON').default(false))
  .action(async (options: { config?: string; json: boolean }) => {
    const { registry } = await startRuntime(options.config);
    const infos = registry.listServers().flatMap((name) => {
      const info = registry.getServerInfo(name);
      return info !== undefined ? [info] : [];
    });
    if (options.json) {
      process.stdout.write(`${JSON.stringify(infos, null, 2)}\n`);
    } else {
      infos.forEach((info) => {
        process.stdout.write(`${info.name} (${info.transport}, ${String(info.toolCount)} tools)\n`);
        registry.listTools(info.name).forEach((tool) => {
          process.stdout.write(`  ${tool.name}${tool.description.length > 0 ? ` - ${tool.description}` : ''}\n`);
        });
      });
    }
    await exitAndShutdown(0, 'done');
  });

program
  .command('chat')
  .description('Send one message and print the answer')
  .argument('<message...>', 'user message')
  .option('-c, --config <file>', 'configuration file (default: .mcp-hub.json)')
  .option('-s, --session <id>', 'resume (or start) a stored session; requires persistence.dbPath')
  .addOption(new Option('--stream', 'print tokens as they arrive').default(false))
  .action(async (words: string[], options: { config?: string; session?: string; stream: boolean }) => {
    const { config, registry, log } = await startRuntime(options.config);
    const store = openStore(config);
    if (options.session !== undefined && store === undefined) {
      await exitAndShutdown(2, '--session needs persistence.dbPath in the configuration');
    }

    let session: { sessionId: string; store: ConversationStore } | undefined;
    if (store !== undefined) {
      const sessionId = options.session !== undefined && store.hasSession(options.session)
        ? options.session
        : store.createSession().id;
      if (sessionId !== options.session) process.stderr.write(`session: ${sessionId}\n`);
      session = { sessionId, store };
    }

    const engine = new ConversationEngine({
      registry,
      model: LLMClient.fromConfig(config.llm, { onLog: log }),
      systemPrompt: config.conversation.systemPrompt,
      maxIterations: config.conversation.maxIterations,
      temperature: config.conversation.temperature,
      maxOutputTokens: config.conversation.maxOutputTokens,
      toolTimeoutMs: config.conversation.toolTimeoutMs,
      abortSignal: shutdownController.signal,
      ...(session !== undefined ? { history: session.store.loadMessages(session.sessionId), store: session } : {}),
      onLog: log,
    });

    const message = words.join(' ');
    if (options.stream) {
      // Text streamed since the last tool activity; fallback answers arrive only with `done`
      let streamed = '';
      // eslint-disable-next-line functional/no-loop-statements
      for await (const event of engine.sendStreaming(message)) {
        switch (event.type) {
          case 'token':
            streamed += event.text;
            process.stdout.write(event.text);
            break;
          case 'tool_call_started':
            streamed = '';
            process.stderr.write(`\n→ ${event.name} ${JSON.stringify(event.arguments)}\n`);
            break;
          case 'tool_call_result':
            streamed = '';
            process.stderr.write(`← ${event.name} ${event.outcome.ok ? 'ok' : `failed: ${event.outcome.error}`} (${String(event.outcome.latencyMs)}ms)\n`);
            break;
          case 'done':
            process.stdout.write(event.content === streamed ? '\n' : `${event.content}\n`);
            break;
        }
      }
    } else {
      process.stdout.write(`${await engine.send(message)}\n`);
    }
    await exitAndShutdown(0, 'done');
  });

process.on('SIGINT', () => { void exitAndShutdown(130, 'interrupted'); });
process.on('SIGTERM', () => { void exitAndShutdown(143, 'terminated'); });

program.parseAsync().catch((error: unknown) => {
  const message = isHubError(error) ? `${error.name}: ${error.message}` : (error instanceof Error ? error.message : String(error));
  void exitAndShutdown(1, message);
});
