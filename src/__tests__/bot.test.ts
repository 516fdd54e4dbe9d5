import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  ProgressRelay,
  createHandlers,
  renderProgress,
  renderStatus,
  renderSubmitOutcome,
  renderTransition,
  renderWorkingTree,
  splitMessage,
} from '../bot.js';
import type { ExecutionResult, PendingChange, Session } from '../types.js';
import { agentTurn, createTestPipeline, ok } from './helpers/fakes.js';

const change: PendingChange = {
  id: 'change-42-1000',
  callerId: '42',
  prompt: 'add tests',
  createdAt: '2026-01-01T00:00:00.000Z',
  state: 'pending',
  sessionId: 'sess-1',
  toolsUsed: [],
  modifiedFiles: [],
};

const session: Session = {
  sessionId: 'sess-1',
  turnCount: 4,
  lastActivityAt: null,
  lastPrompt: null,
  compactedAt: null,
};

function result(overrides: Partial<ExecutionResult> = {}): ExecutionResult {
  return { success: true, output: 'All done.', toolsUsed: [], modifiedFiles: [], events: [], skippedLines: 0, ...overrides };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

describe('splitMessage', () => {
  it('returns a short message unchanged', () => {
    expect(splitMessage('hello')).toEqual(['hello']);
  });

  it('hard-splits at the limit when there is no newline', () => {
    const chunks = splitMessage('a'.repeat(5000));
    expect(chunks.map((c) => c.length)).toEqual([4096, 904]);
  });

  it('prefers splitting at a newline', () => {
    const first = 'a'.repeat(3000);
    const second = 'b'.repeat(2000);
    expect(splitMessage(`${first}\n${second}`)).toEqual([first, second]);
  });
});

describe('renderSubmitOutcome', () => {
  it('stays silent for a rate-limited request inside the notice cooldown', () => {
    const replies = renderSubmitOutcome({
      kind: 'rate-limited',
      decision: { admitted: false, window: 'minute', limit: 5, retryAfterMs: 1000, notice: null },
    });
    expect(replies).toEqual([]);
  });

  it('passes the rate-limit notice through', () => {
    const notice = 'Rate limit reached (5 per minute). Try again in 1 seconds.';
    const replies = renderSubmitOutcome({
      kind: 'rate-limited',
      decision: { admitted: false, window: 'minute', limit: 5, retryAfterMs: 1000, notice },
    });
    expect(replies).toEqual([{ text: notice }]);
  });

  it('offers the buttons again for an unresolved change', () => {
    expect(renderSubmitOutcome({ kind: 'pending-change', change })).toEqual([
      { text: 'Change change-42-1000 is still waiting for a decision. Approve or reject it first.', approvalFor: 'change-42-1000' },
    ]);
  });

  it('names the failure reason', () => {
    const replies = renderSubmitOutcome({
      kind: 'failed',
      result: result({ success: false, error: { reason: 'timeout', message: 'Agent timed out after 120 seconds' } }),
      session,
    });
    expect(replies).toEqual([{ text: 'Agent run failed (timeout): Agent timed out after 120 seconds' }]);
  });

  it('sends the output, then a details line with the approval buttons', () => {
    const replies = renderSubmitOutcome({
      kind: 'proposed',
      result: result({ toolsUsed: ['Write', 'Bash'], modifiedFiles: ['a.ts'] }),
      change,
      session,
      compaction: { ok: false, error: 'Agent timed out after 30 seconds' },
    });
    expect(replies).toEqual([
      { text: 'All done.' },
      {
        text: 'Turn 4 · tools: Write, Bash · files: a.ts · compaction failed: Agent timed out after 30 seconds',
        approvalFor: 'change-42-1000',
      },
    ]);
  });
});

describe('renderTransition', () => {
  it('describes each outcome', () => {
    expect(renderTransition({ kind: 'committed', change, commitHash: 'abc1234' })).toBe('Approved and committed as abc1234.');
    expect(renderTransition({ kind: 'approved-clean', change, message: 'no changes to persist' })).toBe('Approved: no changes to persist.');
    expect(renderTransition({ kind: 'rolled-back', change })).toBe('Rejected. Working tree reset to the last commit.');
    expect(renderTransition({ kind: 'rejected-clean', change })).toBe('Rejected. There was nothing to roll back.');
    expect(renderTransition({ kind: 'already-resolved', changeId: 'c1', state: 'rejected' })).toBe('Change c1 was already rejected.');
    expect(renderTransition({ kind: 'unknown', changeId: 'c2' })).toBe('No change c2 found.');
    expect(renderTransition({ kind: 'repository-error', change, error: 'index.lock exists' })).toBe(
      'Repository error, change is still pending: index.lock exists',
    );
  });
});

describe('renderStatus', () => {
  it('summarizes session, pending change, history and rate usage', () => {
    const text = renderStatus({
      session,
      compactionThreshold: 20,
      pending: null,
      history: [],
      approvedCount: 2,
      rejectedCount: 1,
      rateLimit: [
        { name: 'minute', used: 1, limit: 5 },
        { name: 'hour', used: 3, limit: 60 },
      ],
    });
    expect(text).toBe(
      [
        'Session: sess-1',
        'Turns since compaction: 4/20',
        'Pending change: none',
        'History: 2 approved, 1 rejected',
        'Rate: 1/5 per minute, 3/60 per hour',
      ].join('\n'),
    );
  });
});

describe('renderWorkingTree', () => {
  it('reports a clean tree', () => {
    expect(renderWorkingTree({ branch: 'main', isClean: true, staged: [], modified: [], untracked: [] })).toBe(
      'Branch: main\nWorking tree clean',
    );
  });

  it('lists the non-empty sections and caps each at ten files', () => {
    const untracked = Array.from({ length: 12 }, (_, i) => `new-${i}.txt`);
    const text = renderWorkingTree({ branch: 'dev', isClean: false, staged: [], modified: ['a.ts'], untracked });

    expect(text.split('\n')).toEqual([
      'Branch: dev',
      '',
      'Modified (1):',
      '  a.ts',
      '',
      'Untracked (12):',
      ...untracked.slice(0, 10).map((f) => `  ${f}`),
      '  ...and 2 more',
    ]);
  });
});

describe('renderProgress', () => {
  it('names the tool, its target and the step', () => {
    expect(renderProgress({ tool: 'Edit', detail: 'app.ts', step: 3 })).toBe('🔧 Edit: app.ts (step 3)');
    expect(renderProgress({ tool: 'Glob', step: 4 })).toBe('🔧 Glob (step 4)');
  });
});

describe('ProgressRelay', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('sends the first step at once and batches steps inside the interval', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const sent: string[] = [];
    const relay = new ProgressRelay(async (text) => {
      sent.push(text);
    }, 2000);

    relay.push({ tool: 'Read', detail: 'a.ts', step: 1 });
    relay.push({ tool: 'Edit', detail: 'a.ts', step: 2 });
    vi.setSystemTime(new Date('2026-01-01T00:00:02Z'));
    relay.push({ tool: 'Bash', step: 3 });
    await relay.settled();

    expect(sent).toEqual([
      'Working...\n\n🔧 Read: a.ts (step 1)',
      'Working...\n\n🔧 Read: a.ts (step 1)\n🔧 Edit: a.ts (step 2)\n🔧 Bash (step 3)',
    ]);
  });

  it('shows only the five most recent steps', async () => {
    const sent: string[] = [];
    const relay = new ProgressRelay(async (text) => {
      sent.push(text);
    }, 0);

    for (let step = 1; step <= 7; step++) relay.push({ tool: 'Read', step });
    await relay.settled();

    expect(sent).toHaveLength(7);
    expect(sent[6].split('\n').slice(2)).toEqual([3, 4, 5, 6, 7].map((n) => `🔧 Read (step ${n})`));
  });

  it('logs a failed update and keeps relaying', async () => {
    const sent: string[] = [];
    const relay = new ProgressRelay(async (text) => {
      if (sent.length === 0) {
        sent.push('failed');
        throw new Error('message to edit not found');
      }
      sent.push(text);
    }, 0);

    relay.push({ tool: 'Read', step: 1 });
    relay.push({ tool: 'Edit', step: 2 });
    await relay.settled();

    expect(console.warn).toHaveBeenCalledWith('[bot] progress update failed: message to edit not found');
    expect(sent).toEqual(['failed', 'Working...\n\n🔧 Read (step 1)\n🔧 Edit (step 2)']);
  });
});

describe('createHandlers', () => {
  it('runs a task and attaches the approval buttons', async () => {
    const { pipeline } = createTestPipeline();
    const handlers = createHandlers(pipeline);

    const replies = await handlers.text('42', 'create file.txt');

    expect(replies).toHaveLength(2);
    expect(replies[0]).toEqual({ text: 'done' });
    expect(replies[1].text).toBe('Turn 1');
    expect(replies[1].approvalFor).toMatch(/^change-42-\d+$/);
  });

  it('approves once and reports the repeat as already resolved', async () => {
    const { pipeline } = createTestPipeline();
    const handlers = createHandlers(pipeline);
    const [, details] = await handlers.text('42', 'create file.txt');
    const id = details.approvalFor ?? '';

    expect(await handlers.decision('42', 'approve', id)).toEqual([{ text: 'Approved and committed as c000001.' }]);
    expect(await handlers.decision('42', 'reject', id)).toEqual([{ text: `Change ${id} was already approved.` }]);
    expect(await handlers.log()).toEqual([{ text: 'c000001 Apply agent changes (test)' }]);
  });

  it('shows the pending change in the status', async () => {
    const { pipeline } = createTestPipeline();
    const handlers = createHandlers(pipeline);
    const [, details] = await handlers.text('42', 'create file.txt');

    const [status] = await handlers.status('42');
    expect(status.text.split('\n')).toEqual([
      'Session: sess-1',
      'Turns since compaction: 1/20',
      `Pending change: ${details.approvalFor} (create file.txt)`,
      'History: 0 approved, 0 rejected',
      'Rate: 1/100 per minute',
    ]);
  });

  it('clear drops the unresolved change', async () => {
    const { pipeline } = createTestPipeline();
    const handlers = createHandlers(pipeline);
    const [, details] = await handlers.text('42', 'create file.txt');

    expect(await handlers.clear('42')).toEqual([
      { text: `Session cleared. The next message starts a new conversation. Dropped unresolved change ${details.approvalFor}.` },
    ]);
    expect(await handlers.clear('42')).toEqual([{ text: 'Session cleared. The next message starts a new conversation.' }]);
  });

  it('answers commands that have nothing to work on', async () => {
    const { pipeline } = createTestPipeline();
    const handlers = createHandlers(pipeline);

    expect(await handlers.compact('42')).toEqual([{ text: 'No active session to compact.' }]);
    expect(await handlers.retry('42')).toEqual([{ text: 'Nothing to retry yet.' }]);
    expect(await handlers.diff()).toEqual([{ text: 'No uncommitted changes to tracked files.' }]);
    expect(await handlers.log()).toEqual([{ text: 'No commits yet.' }]);
  });

  it('relays tool calls from the agent run', async () => {
    const { pipeline, runner, repo } = createTestPipeline();
    runner.enqueue(ok(agentTurn({ text: 'done', tools: [{ name: 'Write', input: { file_path: 'a.ts' } }] }), () => repo.touch('a.ts')));
    const handlers = createHandlers(pipeline);
    const steps: string[] = [];

    await handlers.text('42', 'write a.ts', (progress) => steps.push(renderProgress(progress)));

    expect(steps).toEqual(['🔧 Write: a.ts (step 1)']);
  });

  it('shows the git status of the workspace', async () => {
    const { pipeline } = createTestPipeline();
    const handlers = createHandlers(pipeline);

    expect(await handlers.gitStatus()).toEqual([{ text: 'Branch: main\nWorking tree clean' }]);
    await handlers.text('42', 'create file.txt');
    expect(await handlers.gitStatus()).toEqual([{ text: 'Branch: main\n\nUntracked (1):\n  file.txt' }]);
  });

  it('shows the working tree diff', async () => {
    const { pipeline } = createTestPipeline();
    const handlers = createHandlers(pipeline);
    await handlers.text('42', 'create file.txt');

    expect(await handlers.diff()).toEqual([{ text: '1 file(s), +1 -0\n\n+++ b/file.txt' }]);
  });
});
