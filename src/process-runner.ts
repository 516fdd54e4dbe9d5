import { spawn, type ChildProcess } from 'node:child_process';
import { StringDecoder } from 'node:string_decoder';

export interface RunOptions {
  cwd: string;
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
}

export type ProcessExit =
  | { kind: 'exited'; code: number | null; stderr: string }
  | { kind: 'timeout'; stderr: string }
  | { kind: 'spawn-error'; message: string };

/**
 * A started external process.
 * `lines` yields stdout line by line as it arrives and ends when the process
 * does; `wait()` resolves once the process has exited (or failed to start).
 */
export interface AgentProcess {
  lines: AsyncIterable<string>;
  wait(): Promise<ProcessExit>;
}

export interface ProcessRunner {
  start(command: string, args: string[], options: RunOptions): AgentProcess;
}

const KILL_GRACE_MS = 3000;
const USE_PROCESS_GROUP = process.platform !== 'win32';

/** The parent environment minus the marker that makes the agent CLI refuse a nested run. */
export function agentEnv(base: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const env = { ...base };
  delete env.CLAUDECODE;
  return env;
}

/**
 * Signal the child's whole process group, so background jobs the agent
 * started go down with it.
 */
function signalTree(child: ChildProcess, signal: NodeJS.Signals): void {
  if (USE_PROCESS_GROUP && child.pid !== undefined) {
    try {
      process.kill(-child.pid, signal);
      return;
    } catch (err) {
      const code = err instanceof Error && 'code' in err ? String(err.code) : 'unknown';
      if (code === 'ESRCH') return;
      console.warn(`[executor] group ${signal} failed (${code}), signalling the child only`);
    }
  }
  child.kill(signal);
}

/**
 * Runs the agent with `child_process.spawn` in its own process group.
 * The only cancellation is the wall-clock timeout: SIGTERM to the group
 * first, SIGKILL after a grace period. Once timed out, the run settles as
 * soon as the direct child exits, even if a leftover process still holds
 * the output pipes.
 */
export class SpawnProcessRunner implements ProcessRunner {
  start(command: string, args: string[], options: RunOptions): AgentProcess {
    const { cwd, timeoutMs } = options;

    const child = spawn(command, args, {
      cwd,
      stdio: ['pipe', 'pipe', 'pipe'],
      env: options.env ?? agentEnv(),
      detached: USE_PROCESS_GROUP,
    });

    child.stdin.on('error', (err) => {
      console.error(`[executor] stdin error: ${err.message}`);
    });
    child.stdin.end();

    const stdoutDecoder = new StringDecoder('utf8');
    const stderrDecoder = new StringDecoder('utf8');
    let stderr = '';
    let buffer = '';
    let timedOut = false;

    const queue: Array<string | null> = [];
    let resolveWait: (() => void) | null = null;

    function enqueue(item: string | null): void {
      queue.push(item);
      if (resolveWait) {
        const r = resolveWait;
        resolveWait = null;
        r();
      }
    }

    function waitForItem(): Promise<void> {
      if (queue.length > 0) return Promise.resolve();
      return new Promise<void>((resolve) => {
        resolveWait = resolve;
      });
    }

    const timeoutTimer = setTimeout(() => {
      timedOut = true;
      signalTree(child, 'SIGTERM');
      // Runs even after the direct child is gone: group members may ignore SIGTERM.
      setTimeout(() => signalTree(child, 'SIGKILL'), KILL_GRACE_MS).unref();
    }, timeoutMs);

    child.stdout.on('data', (chunk: Buffer) => {
      buffer += stdoutDecoder.write(chunk);
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';
      for (const line of lines) {
        enqueue(line);
      }
    });

    child.stderr.on('data', (chunk: Buffer) => {
      stderr += stderrDecoder.write(chunk);
    });

    const exit = new Promise<ProcessExit>((resolve) => {
      let settled = false;
      function settle(result: ProcessExit): void {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutTimer);
        buffer += stdoutDecoder.end();
        stderr += stderrDecoder.end();
        if (buffer) {
          enqueue(buffer);
          buffer = '';
        }
        enqueue(null);
        resolve(result);
      }

      child.on('error', (err: NodeJS.ErrnoException) => {
        const message = err.code === 'ENOENT'
          ? `${command}: executable not found`
          : `Failed to start ${command}: ${err.message}`;
        settle({ kind: 'spawn-error', message });
      });

      child.on('exit', () => {
        if (!timedOut) return;
        child.stdout.destroy();
        child.stderr.destroy();
        settle({ kind: 'timeout', stderr });
      });

      child.on('close', (code) => {
        settle(timedOut ? { kind: 'timeout', stderr } : { kind: 'exited', code, stderr });
      });
    });

    async function* lines(): AsyncGenerator<string, void, unknown> {
      while (true) {
        await waitForItem();
        while (queue.length > 0) {
          const item = queue.shift();
          if (item === null || item === undefined) return;
          yield item;
        }
      }
    }

    return { lines: lines(), wait: () => exit };
  }
}
