/**
 * In-process stand-ins for the agent process and the git workspace.
 */

import type { AgentProcess, ProcessExit, ProcessRunner, RunOptions } from '../../process-runner.js';
import type { CommitInfo, Repository, WorkingTreeDiff, WorkingTreeStatus } from '../../git.js';
import type { ApprovalState, RateLimitWindow, Session } from '../../types.js';
import { RepositoryError } from '../../errors.js';
import { TaskPipeline } from '../../pipeline.js';
import { TaskExecutor } from '../../executor.js';
import { SessionTracker } from '../../session.js';
import { ApprovalStateMachine } from '../../approval.js';
import { RateLimiter } from '../../rate-limiter.js';
import { MemoryStore } from '../../store.js';

export interface ScriptedRun {
  lines: string[];
  exit: ProcessExit;
  /** Called when the run starts, e.g. to dirty a fake repository. */
  onStart?: () => void;
}

export interface RecordedStart {
  command: string;
  args: string[];
  options: RunOptions;
}

/**
 * Replays queued runs in order. With an empty queue it falls back to
 * `defaultRun` or a clean exit with no output.
 */
export class FakeProcessRunner implements ProcessRunner {
  readonly starts: RecordedStart[] = [];
  private readonly queue: ScriptedRun[] = [];

  constructor(private readonly defaultRun?: () => ScriptedRun) {}

  enqueue(...runs: ScriptedRun[]): this {
    this.queue.push(...runs);
    return this;
  }

  start(command: string, args: string[], options: RunOptions): AgentProcess {
    this.starts.push({ command, args, options });
    const run = this.queue.shift() ?? this.defaultRun?.() ?? { lines: [], exit: { kind: 'exited', code: 0, stderr: '' } };
    run.onStart?.();

    async function* lines(): AsyncGenerator<string, void, unknown> {
      for (const line of run.lines) {
        yield line;
      }
    }
    return { lines: lines(), wait: async () => run.exit };
  }

  /** Args of the n-th start (0-based). */
  argsAt(index: number): string[] {
    const start = this.starts[index];
    if (!start) throw new Error(`no start #${index} recorded (have ${this.starts.length})`);
    return start.args;
  }
}

/** NDJSON lines for a successful agent turn. */
export function agentTurn(options: { sessionId?: string; text?: string; tools?: Array<{ name: string; input?: Record<string, unknown> }> } = {}): string[] {
  const sessionId = options.sessionId ?? 'sess-1';
  const lines = [JSON.stringify({ type: 'system', subtype: 'init', session_id: sessionId, model: 'test-model' })];
  const content: Array<Record<string, unknown>> = [];
  if (options.text !== undefined) content.push({ type: 'text', text: options.text });
  for (const tool of options.tools ?? []) {
    content.push({ type: 'tool_use', id: `tool-${tool.name}`, name: tool.name, input: tool.input ?? {} });
  }
  if (content.length > 0) {
    lines.push(JSON.stringify({ type: 'assistant', message: { content } }));
  }
  lines.push(JSON.stringify({
    type: 'result',
    subtype: 'success',
    session_id: sessionId,
    total_cost_usd: 0.01,
    duration_ms: 1200,
    usage: { input_tokens: 10, output_tokens: 20 },
  }));
  return lines;
}

export function ok(lines: string[], onStart?: () => void): ScriptedRun {
  return { lines, exit: { kind: 'exited', code: 0, stderr: '' }, onStart };
}

/**
 * Working tree modelled as a set of dirty paths plus a commit list.
 * `failNext` makes the next mutating operation throw a RepositoryError.
 */
export class FakeRepository implements Repository {
  readonly path = '/fake/workspace';
  readonly commits: CommitInfo[] = [];
  dirty = new Set<string>();
  discardCount = 0;
  failNext: string | null = null;
  private staged = false;

  touch(...files: string[]): void {
    for (const f of files) this.dirty.add(f);
  }

  async isRepository(): Promise<boolean> {
    return true;
  }

  async init(): Promise<void> {}

  async status(): Promise<WorkingTreeStatus> {
    const files = [...this.dirty];
    return {
      branch: 'main',
      isClean: files.length === 0,
      staged: this.staged ? files : [],
      modified: [],
      untracked: this.staged ? [] : files,
    };
  }

  async diff(): Promise<WorkingTreeDiff> {
    const files = [...this.dirty];
    return {
      hasChanges: files.length > 0,
      patch: files.map((f) => `+++ b/${f}`).join('\n'),
      filesChanged: files,
      insertions: files.length,
      deletions: 0,
    };
  }

  async stageAll(): Promise<void> {
    this.maybeFail();
    this.staged = true;
  }

  async commit(message: string): Promise<string> {
    this.maybeFail();
    if (this.dirty.size === 0) throw new RepositoryError('Nothing to commit');
    const hash = `c${String(this.commits.length + 1).padStart(6, '0')}`;
    const [subject, ...rest] = message.split('\n');
    this.commits.unshift({ hash, author: 'test', date: new Date().toISOString(), message: subject, body: rest.join('\n').trim() });
    this.dirty.clear();
    this.staged = false;
    return hash;
  }

  async discardChanges(): Promise<void> {
    this.maybeFail();
    this.dirty.clear();
    this.staged = false;
    this.discardCount += 1;
  }

  async log(count: number): Promise<CommitInfo[]> {
    return this.commits.slice(0, count);
  }

  private maybeFail(): void {
    if (this.failNext !== null) {
      const message = this.failNext;
      this.failNext = null;
      throw new RepositoryError(message);
    }
  }
}

export interface TestPipeline {
  pipeline: TaskPipeline;
  runner: FakeProcessRunner;
  repo: FakeRepository;
}

/**
 * A pipeline on in-memory stores. Unless a run is queued, every agent run
 * reports session `sess-1`, answers "done" and dirties `file.txt`.
 */
export function createTestPipeline(options: { threshold?: number; windows?: RateLimitWindow[] } = {}): TestPipeline {
  const repo = new FakeRepository();
  const runner = new FakeProcessRunner(() => ok(agentTurn({ sessionId: 'sess-1', text: 'done' }), () => repo.touch('file.txt')));
  const pipeline = new TaskPipeline({
    executor: new TaskExecutor({ workspacePath: repo.path, runner }),
    sessions: new SessionTracker(new MemoryStore<Session>(), options.threshold ?? 20),
    approvals: new ApprovalStateMachine(new MemoryStore<ApprovalState>(), repo),
    rateLimiter: new RateLimiter({ windows: options.windows ?? [{ name: 'minute', durationMs: 60_000, limit: 100 }] }),
    repository: repo,
  });
  return { pipeline, runner, repo };
}
