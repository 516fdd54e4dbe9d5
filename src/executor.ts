import type { CallerId, CompactionResult, ExecutionResult, FailureReason, TaskRequest, ToolProgress } from './types.js';
import type { ProcessExit, ProcessRunner } from './process-runner.js';
import { SpawnProcessRunner } from './process-runner.js';
import { StreamParser, type ParsedStream } from './stream-parser.js';
import { generateErrorRef } from './errors.js';

export const NO_OUTPUT_SENTINEL = '(no textual output)';

export const DEFAULT_TIMEOUT_MS = 120_000;
export const DEFAULT_COMPACT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_TURNS = 10;
const HEALTH_CHECK_TIMEOUT_MS = 5000;

export interface ExecutorOptions {
  workspacePath: string;
  command?: string;
  timeoutMs?: number;
  compactTimeoutMs?: number;
  maxTurns?: number;
  runner?: ProcessRunner;
}

export type ExecuteInput = Omit<TaskRequest, 'callerId'> & {
  /** Only used to label log lines. */
  callerId?: CallerId;
  maxTurns?: number;
  /** Called once per tool call while the agent is still running. */
  onProgress?: (progress: ToolProgress) => void;
};

export interface HealthCheckResult {
  healthy: boolean;
  message: string;
  latencyMs: number;
}

/**
 * Runs the coding agent headless and normalizes its event stream.
 *
 * Nothing here throws past `execute` or `compact`: a timeout, a non-zero
 * exit and a failed spawn each come back as a failed result with a distinct
 * reason. Retrying is the caller's decision.
 */
export class TaskExecutor {
  private readonly workspacePath: string;
  private readonly command: string;
  private readonly timeoutMs: number;
  private readonly compactTimeoutMs: number;
  private readonly maxTurns: number;
  private readonly runner: ProcessRunner;

  constructor(options: ExecutorOptions) {
    this.workspacePath = options.workspacePath;
    this.command = options.command ?? 'claude';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.compactTimeoutMs = options.compactTimeoutMs ?? DEFAULT_COMPACT_TIMEOUT_MS;
    this.maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
    this.runner = options.runner ?? new SpawnProcessRunner();
  }

  buildArgs(input: ExecuteInput): string[] {
    const args = [
      '-p', input.prompt,
      '--output-format', 'stream-json',
      '--verbose',
      '--max-turns', String(input.maxTurns ?? this.maxTurns),
    ];
    if (input.resumeToken) {
      args.push('--resume', input.resumeToken);
    }
    return args;
  }

  async execute(input: ExecuteInput): Promise<ExecutionResult> {
    console.log(`[executor] running agent for ${input.callerId ?? 'anonymous'} (session: ${input.resumeToken ?? 'new'})`);
    const { parsed, exit } = await this.run(this.buildArgs(input), this.timeoutMs, input.onProgress);
    return toResult(parsed, exit, this.timeoutMs);
  }

  /**
   * Ask the agent to summarize its own context for `sessionId`.
   * Uses the shorter compaction timeout and a single turn.
   */
  async compact(sessionId: string): Promise<CompactionResult> {
    const args = this.buildArgs({ prompt: '/compact', resumeToken: sessionId, maxTurns: 1 });
    console.log(`[executor] compacting session ${sessionId}`);
    const { parsed, exit } = await this.run(args, this.compactTimeoutMs);
    const result = toResult(parsed, exit, this.compactTimeoutMs);
    if (result.error) {
      return { ok: false, error: result.error.message };
    }
    return { ok: true };
  }

  async healthCheck(): Promise<HealthCheckResult> {
    const startMs = Date.now();
    const proc = this.runner.start(this.command, ['--version'], {
      cwd: this.workspacePath,
      timeoutMs: HEALTH_CHECK_TIMEOUT_MS,
    });
    const lines: string[] = [];
    for await (const line of proc.lines) {
      lines.push(line);
    }
    const exit = await proc.wait();
    const latencyMs = Date.now() - startMs;

    switch (exit.kind) {
      case 'exited':
        return exit.code === 0
          ? { healthy: true, message: lines.join('\n').trim(), latencyMs }
          : { healthy: false, message: `Exit code ${exit.code}`, latencyMs };
      case 'timeout':
        return { healthy: false, message: 'Health check timed out', latencyMs };
      case 'spawn-error':
        return { healthy: false, message: exit.message, latencyMs };
    }
  }

  private async run(
    args: string[],
    timeoutMs: number,
    onProgress?: (progress: ToolProgress) => void,
  ): Promise<{ parsed: ParsedStream; exit: ProcessExit }> {
    const proc = this.runner.start(this.command, args, { cwd: this.workspacePath, timeoutMs });
    const parser = new StreamParser(onProgress);
    for await (const line of proc.lines) {
      parser.pushLine(line);
    }
    const exit = await proc.wait();
    return { parsed: parser.finish(), exit };
  }
}

function failure(parsed: ParsedStream, reason: FailureReason, message: string): ExecutionResult {
  const ref = generateErrorRef();
  console.error(`[executor] ref=${ref} ${reason}: ${message}`);
  return {
    ...baseResult(parsed),
    success: false,
    output: parsed.text,
    error: { reason, message },
  };
}

function baseResult(parsed: ParsedStream): Omit<ExecutionResult, 'success' | 'output'> {
  const base: Omit<ExecutionResult, 'success' | 'output'> = {
    toolsUsed: parsed.toolsUsed,
    modifiedFiles: parsed.modifiedFiles,
    events: parsed.events,
    skippedLines: parsed.skippedLines,
  };
  if (parsed.sessionId) base.sessionId = parsed.sessionId;
  if (parsed.usage) base.usage = parsed.usage;
  return base;
}

export function toResult(parsed: ParsedStream, exit: ProcessExit, timeoutMs: number): ExecutionResult {
  switch (exit.kind) {
    case 'spawn-error':
      return failure(parsed, 'spawn-error', exit.message);

    case 'timeout':
      return failure(parsed, 'timeout', `Agent timed out after ${timeoutMs / 1000} seconds`);

    case 'exited':
      if (exit.code !== 0) {
        const detail = exit.stderr.trim() || parsed.reportedError || `exit code ${exit.code}`;
        return failure(parsed, 'non-zero-exit', detail);
      }
      return {
        ...baseResult(parsed),
        success: true,
        output: parsed.text || NO_OUTPUT_SENTINEL,
      };
  }
}
