import { describe, expect, it } from 'vitest';

import type { LogEntry } from '../../types.js';

import { ShutdownController } from '../../shutdown-controller.js';

describe('ShutdownController', () => {
  it('runs tasks in reverse registration order, once', async () => {
    const controller = new ShutdownController();
    const order: string[] = [];
    controller.register('registry', () => { order.push('registry'); });
    controller.register('store', async () => { order.push('store'); });

    await Promise.all([controller.shutdown(), controller.shutdown()]);

    expect(order).toEqual(['store', 'registry']);
    expect(controller.isStopping()).toBe(true);
    expect(controller.signal.aborted).toBe(true);
  });

  it('skips unregistered tasks', async () => {
    const controller = new ShutdownController();
    const order: string[] = [];
    const unregister = controller.register('temp', () => { order.push('temp'); });
    controller.register('store', () => { order.push('store'); });
    unregister();

    await controller.shutdown();

    expect(order).toEqual(['store']);
  });

  it('keeps going after a failing task and logs it', async () => {
    const controller = new ShutdownController();
    const logs: LogEntry[] = [];
    const order: string[] = [];
    controller.register('registry', () => { order.push('registry'); });
    controller.register('store', () => { throw new Error('database is locked'); });

    await controller.shutdown({ logger: (entry) => { logs.push(entry); } });

    expect(order).toEqual(['registry']);
    expect(logs.map((entry) => entry.message)).toEqual(["shutdown task 'store' failed: database is locked"]);
  });
});
