import type {
  ApprovalRecord,
  ApprovalState,
  CallerId,
  ChangeState,
  ExecutionResult,
  PendingChange,
} from './types.js';
import type { KeyValueStore } from './store.js';
import type { Repository, WorkingTreeDiff, WorkingTreeStatus } from './git.js';
import { KeyedMutex } from './mutex.js';
import { PendingChangeExistsError, RepositoryError, describeError } from './errors.js';

export const DEFAULT_HISTORY_LIMIT = 20;
const PROMPT_IN_COMMIT_MAX = 100;

/**
 * Result of an approve or reject call. Only `committed`, `approved-clean`,
 * `rolled-back` and `rejected-clean` moved the change out of `pending`.
 */
export type TransitionOutcome =
  | { kind: 'committed'; change: PendingChange; commitHash: string }
  | { kind: 'approved-clean'; change: PendingChange; message: string }
  | { kind: 'rolled-back'; change: PendingChange }
  | { kind: 'rejected-clean'; change: PendingChange }
  | { kind: 'already-resolved'; changeId: string; state: ChangeState }
  | { kind: 'unknown'; changeId: string }
  | { kind: 'repository-error'; change: PendingChange; error: string };

export function emptyApprovalState(): ApprovalState {
  return { pending: null, history: [] };
}

const CHANGE_STATES: readonly string[] = ['pending', 'approved', 'rejected'];

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isPendingChange(value: unknown): value is PendingChange {
  if (typeof value !== 'object' || value === null) return false;
  const c = value as Record<string, unknown>;
  return (
    typeof c.id === 'string' &&
    typeof c.callerId === 'string' &&
    typeof c.prompt === 'string' &&
    typeof c.createdAt === 'string' &&
    typeof c.state === 'string' &&
    CHANGE_STATES.includes(c.state) &&
    (c.sessionId === null || typeof c.sessionId === 'string') &&
    isStringArray(c.toolsUsed) &&
    isStringArray(c.modifiedFiles)
  );
}

function isApprovalRecord(value: unknown): value is ApprovalRecord {
  if (typeof value !== 'object' || value === null) return false;
  const r = value as Record<string, unknown>;
  return (
    typeof r.changeId === 'string' &&
    (r.state === 'approved' || r.state === 'rejected') &&
    typeof r.at === 'string' &&
    (r.commitHash === undefined || typeof r.commitHash === 'string')
  );
}

export function isApprovalState(value: unknown): value is ApprovalState {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const s = value as Record<string, unknown>;
  return (
    (s.pending === null || isPendingChange(s.pending)) &&
    Array.isArray(s.history) &&
    s.history.every(isApprovalRecord)
  );
}

export function buildCommitMessage(prompt: string): string {
  const oneLine = prompt.replace(/\s+/g, ' ').trim();
  const truncated = oneLine.length > PROMPT_IN_COMMIT_MAX
    ? `${oneLine.slice(0, PROMPT_IN_COMMIT_MAX - 3)}...`
    : oneLine;
  return `Apply agent changes\n\nPrompt: ${truncated}`;
}

/**
 * `change-<caller>-<ms>`, bumped past any id still in the caller's history so
 * a late signal for a resolved change never addresses a new one.
 */
function nextChangeId(callerId: CallerId, state: ApprovalState): string {
  const taken = new Set(state.history.map((r) => r.changeId));
  let stamp = Date.now();
  while (taken.has(`change-${callerId}-${stamp}`)) stamp++;
  return `change-${callerId}-${stamp}`;
}

export interface ApprovalOptions {
  historyLimit?: number;
}

/**
 * Safety gate between the agent's edits and the repository history.
 *
 * Each caller holds at most one `pending` change. Approving commits whatever
 * the working tree contains; rejecting throws it away. A transition names the
 * change it targets, and any id other than the caller's current pending one
 * is answered from history without touching the repository, so a duplicated
 * approval signal cannot commit or reset twice.
 */
export class ApprovalStateMachine {
  private readonly historyLimit: number;
  /** Serializes each caller's read-modify-write of their approval state. */
  private readonly callerLocks = new KeyedMutex<CallerId>();
  /** One workspace, one writer at a time. */
  private readonly repoLock = new KeyedMutex<string>();

  constructor(
    private readonly store: KeyValueStore<ApprovalState>,
    private readonly repository: Repository,
    options: ApprovalOptions = {},
  ) {
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
  }

  async getState(callerId: CallerId): Promise<ApprovalState> {
    return (await this.store.get(callerId)) ?? emptyApprovalState();
  }

  async getPending(callerId: CallerId): Promise<PendingChange | null> {
    return (await this.getState(callerId)).pending;
  }

  async history(callerId: CallerId): Promise<ApprovalRecord[]> {
    return (await this.getState(callerId)).history;
  }

  /**
   * Stage a successful execution as the caller's pending change.
   * Refuses while an earlier change is unresolved.
   */
  async propose(callerId: CallerId, prompt: string, result: ExecutionResult): Promise<PendingChange> {
    return this.callerLocks.run(callerId, async () => {
      const state = await this.getState(callerId);
      if (state.pending) {
        throw new PendingChangeExistsError(state.pending.id);
      }

      const change: PendingChange = {
        id: nextChangeId(callerId, state),
        callerId,
        prompt,
        createdAt: new Date().toISOString(),
        state: 'pending',
        sessionId: result.sessionId ?? null,
        toolsUsed: result.toolsUsed,
        modifiedFiles: result.modifiedFiles,
      };
      state.pending = change;
      await this.store.set(callerId, state);
      console.log(`[approval] caller=${callerId} proposed ${change.id}`);
      return change;
    });
  }

  async approve(callerId: CallerId, changeId: string): Promise<TransitionOutcome> {
    return this.transition(callerId, changeId, 'approved', async (change) => {
      const status = await this.repository.status();
      if (status.isClean) {
        return { kind: 'approved-clean', change, message: 'no changes to persist' };
      }
      await this.repository.stageAll();
      const commitHash = await this.repository.commit(buildCommitMessage(change.prompt));
      return { kind: 'committed', change, commitHash };
    });
  }

  async reject(callerId: CallerId, changeId: string): Promise<TransitionOutcome> {
    return this.transition(callerId, changeId, 'rejected', async (change) => {
      const status = await this.repository.status();
      if (status.isClean) {
        return { kind: 'rejected-clean', change };
      }
      await this.repository.discardChanges();
      return { kind: 'rolled-back', change };
    });
  }

  /**
   * Drop the pending slot without touching the repository or history.
   * Whatever the agent left in the working tree stays there.
   */
  async discard(callerId: CallerId): Promise<PendingChange | null> {
    return this.callerLocks.run(callerId, async () => {
      const state = await this.getState(callerId);
      const dropped = state.pending;
      if (!dropped) return null;
      state.pending = null;
      await this.store.set(callerId, state);
      console.log(`[approval] caller=${callerId} discarded ${dropped.id}`);
      return dropped;
    });
  }

  workingTreeStatus(): Promise<WorkingTreeStatus> {
    return this.repository.status();
  }

  workingTreeDiff(): Promise<WorkingTreeDiff> {
    return this.repository.diff();
  }

  // ── Private ──────────────────────────────────────────────────────

  private async transition(
    callerId: CallerId,
    changeId: string,
    target: 'approved' | 'rejected',
    apply: (change: PendingChange) => Promise<
      Extract<TransitionOutcome, { kind: 'committed' | 'approved-clean' | 'rolled-back' | 'rejected-clean' }>
    >,
  ): Promise<TransitionOutcome> {
    return this.callerLocks.run(callerId, async (): Promise<TransitionOutcome> => {
      const state = await this.getState(callerId);
      const change = state.pending;

      if (!change || change.id !== changeId) {
        return this.lookupResolved(state, changeId);
      }

      let outcome: Awaited<ReturnType<typeof apply>>;
      try {
        outcome = await this.repoLock.run(this.repository.path, () => apply(change));
      } catch (err) {
        if (!(err instanceof RepositoryError)) throw err;
        console.error(`[approval] caller=${callerId} ${target} of ${changeId} failed: ${err.message}`);
        return { kind: 'repository-error', change, error: describeError(err) };
      }

      const resolvedAt = new Date().toISOString();
      const resolved: PendingChange = { ...change, state: target, resolvedAt };
      const record: ApprovalRecord = { changeId, state: target, at: resolvedAt };
      if (outcome.kind === 'committed') record.commitHash = outcome.commitHash;

      state.pending = null;
      state.history = [...state.history, record].slice(-this.historyLimit);
      await this.store.set(callerId, state);

      console.log(`[approval] caller=${callerId} ${changeId} -> ${target} (${outcome.kind})`);
      return { ...outcome, change: resolved };
    });
  }

  private lookupResolved(state: ApprovalState, changeId: string): TransitionOutcome {
    // Newest record wins if an id somehow appears twice.
    const record = [...state.history].reverse().find((r) => r.changeId === changeId);
    if (record) {
      return { kind: 'already-resolved', changeId, state: record.state };
    }
    return { kind: 'unknown', changeId };
  }
}
