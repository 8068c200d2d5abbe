import type { LogFn } from './types.js';

export type ShutdownTask = () => Promise<void> | void;

/**
 * Owns the process-level teardown order. Tasks run in reverse registration order, one at a time,
 * so resources are released in the reverse of the order they were acquired.
 */
export class ShutdownController {
  private readonly abortController = new AbortController();
  private readonly tasks = new Map<string, ShutdownTask>();
  private shutdownPromise?: Promise<void>;

  public get signal(): AbortSignal {
    return this.abortController.signal;
  }

  public isStopping(): boolean {
    return this.shutdownPromise !== undefined;
  }

  public register(name: string, task: ShutdownTask): () => void {
    this.tasks.set(name, task);
    return () => {
      this.tasks.delete(name);
    };
  }

  public async shutdown(opts: { logger?: LogFn } = {}): Promise<void> {
    this.shutdownPromise ??= this.performShutdown(opts.logger);
    await this.shutdownPromise;
  }

  private async performShutdown(logger?: LogFn): Promise<void> {
    this.abortController.abort();
    const entries = Array.from(this.tasks.entries()).reverse();
    // eslint-disable-next-line functional/no-loop-statements
    for (const [name, task] of entries) {
      try {
        await task();
      } catch (error) {
        logger?.({
          timestamp: Date.now(),
          severity: 'WRN',
          direction: 'response',
          type: 'engine',
          remoteIdentifier: 'shutdown',
          message: `shutdown task '${name}' failed: ${error instanceof Error ? error.message : String(error)}`,
        });
      }
    }
  }
}
