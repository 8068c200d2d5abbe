import { spawnSync } from 'node:child_process';
import { readFile } from 'node:fs/promises';

export interface KillProcessTreeOptions {
  gracefulMs?: number;
  logger?: (message: string) => void;
}

export interface KillProcessTreeResult {
  signalled: number[];
  forced: number[];
  stillRunning: number[];
}

const DEFAULT_GRACE_MS = 2000;
const POLL_INTERVAL_MS = 100;

/**
 * Terminate a stdio server and everything it spawned (package runners like npx or uvx fork the real server).
 * Children get SIGTERM first; anything alive after the grace period gets SIGKILL.
 */
export async function killProcessTree(pid: number, opts: KillProcessTreeOptions = {}): Promise<KillProcessTreeResult> {
  if (!Number.isInteger(pid) || pid <= 0) {
    return { signalled: [], forced: [], stillRunning: [] };
  }
  const gracefulMs = opts.gracefulMs ?? DEFAULT_GRACE_MS;
  const targets = process.platform === 'win32' ? [pid] : [...await collectDescendants(pid), pid];

  const signalled = targets.filter((target) => sendSignal(target, 'SIGTERM', opts.logger));
  await waitForExit(signalled, gracefulMs);

  const forced = signalled
    .filter((target) => isAlive(target))
    .filter((target) => sendSignal(target, 'SIGKILL', opts.logger));
  const stillRunning = targets.filter((target) => isAlive(target));
  return { signalled, forced, stillRunning };
}

async function collectDescendants(rootPid: number): Promise<number[]> {
  const seen = new Set<number>();
  const queue: number[] = [rootPid];
  const result: number[] = [];
  let parentMap: Map<number, number[]> | undefined;
  // eslint-disable-next-line functional/no-loop-statements -- breadth-first traversal
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    let children = process.platform === 'linux' ? await readProcChildren(current) : [];
    if (children.length === 0) {
      parentMap = parentMap ?? buildParentMapViaPs();
      children = parentMap.get(current) ?? [];
    }
    children.forEach((child) => {
      if (seen.has(child)) return;
      seen.add(child);
      result.push(child);
      queue.push(child);
    });
  }
  // Deepest first
  return result.reverse();
}

async function readProcChildren(pid: number): Promise<number[]> {
  try {
    const raw = await readFile(`/proc/${String(pid)}/task/${String(pid)}/children`, 'utf8');
    return raw.split(' ').map((token) => Number.parseInt(token, 10)).filter((n) => Number.isFinite(n) && n > 0);
  } catch {
    return [];
  }
}

function buildParentMapViaPs(): Map<number, number[]> {
  const map = new Map<number, number[]>();
  const result = spawnSync('ps', ['-o', 'pid=', '-o', 'ppid=', '-ax'], { encoding: 'utf8' });
  if (result.error !== undefined || typeof result.stdout !== 'string') return map;
  result.stdout.split('\n').forEach((line) => {
    const match = /^(\d+)\s+(\d+)$/.exec(line.trim());
    if (match === null) return;
    const childPid = Number.parseInt(match[1], 10);
    const parentPid = Number.parseInt(match[2], 10);
    map.set(parentPid, [...(map.get(parentPid) ?? []), childPid]);
  });
  return map;
}

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

function sendSignal(pid: number, signal: NodeJS.Signals, logger?: (message: string) => void): boolean {
  try {
    process.kill(pid, signal);
    return true;
  } catch (err) {
    if (errorCode(err) !== 'ESRCH') {
      logger?.(`killProcessTree: failed to send ${signal} to pid=${String(pid)}: ${err instanceof Error ? err.message : String(err)}`);
    }
    return false;
  }
}

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return errorCode(err) !== 'ESRCH';
  }
}

function waitForExit(pids: number[], timeoutMs: number): Promise<void> {
  if (pids.length === 0 || timeoutMs <= 0) return Promise.resolve();
  const maxChecks = Math.ceil(timeoutMs / POLL_INTERVAL_MS);
  let checks = 0;
  return new Promise((resolve) => {
    const timer = setInterval(() => {
      checks += 1;
      if (!pids.some((pid) => isAlive(pid)) || checks >= maxChecks) {
        clearInterval(timer);
        resolve();
      }
    }, POLL_INTERVAL_MS);
  });
}
