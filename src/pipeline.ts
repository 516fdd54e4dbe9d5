import type {
  ApprovalRecord,
  CallerId,
  CompactionResult,
  ExecutionResult,
  PendingChange,
  RateLimitDecision,
  Session,
  TaskRequest,
  ToolProgress,
  WindowUsage,
} from './types.js';
import type { HealthCheckResult, TaskExecutor } from './executor.js';
import type { SessionTracker } from './session.js';
import type { ApprovalStateMachine, TransitionOutcome } from './approval.js';
import type { RateLimiter } from './rate-limiter.js';
import type { CommitInfo, Repository, WorkingTreeDiff, WorkingTreeStatus } from './git.js';
import { KeyedMutex } from './mutex.js';

export type SubmitOutcome =
  | { kind: 'rate-limited'; decision: Extract<RateLimitDecision, { admitted: false }> }
  | { kind: 'pending-change'; change: PendingChange }
  | { kind: 'failed'; result: ExecutionResult; session: Session }
  | {
      kind: 'proposed';
      result: ExecutionResult;
      change: PendingChange;
      session: Session;
      /** Present when this turn crossed the compaction threshold. */
      compaction?: CompactionResult;
    };

export type CompactOutcome =
  | { kind: 'compacted'; session: Session }
  | { kind: 'no-session' }
  | { kind: 'failed'; error: string };

export interface CallerStatus {
  session: Session;
  compactionThreshold: number;
  pending: PendingChange | null;
  history: ApprovalRecord[];
  approvedCount: number;
  rejectedCount: number;
  rateLimit: WindowUsage[];
}

export interface SubmitOptions {
  /** Receives each tool call of the agent run as it happens. */
  onProgress?: (progress: ToolProgress) => void;
}

export interface PipelineDeps {
  executor: TaskExecutor;
  sessions: SessionTracker;
  approvals: ApprovalStateMachine;
  rateLimiter: RateLimiter;
  repository: Repository;
}

/**
 * The core's public surface: one call per user intent, one typed outcome per
 * call. Transports (Telegram, CLI) bind to these methods and render the
 * outcomes; nothing here knows about presentation.
 */
export class TaskPipeline {
  private readonly executor: TaskExecutor;
  private readonly sessions: SessionTracker;
  private readonly approvals: ApprovalStateMachine;
  private readonly rateLimiter: RateLimiter;
  private readonly repository: Repository;
  // One in-flight submission per caller.
  private readonly callerMutex = new KeyedMutex<CallerId>();

  constructor(deps: PipelineDeps) {
    this.executor = deps.executor;
    this.sessions = deps.sessions;
    this.approvals = deps.approvals;
    this.rateLimiter = deps.rateLimiter;
    this.repository = deps.repository;
  }

  async submitTask(callerId: CallerId, prompt: string, options: SubmitOptions = {}): Promise<SubmitOutcome> {
    const decision = this.rateLimiter.check(callerId);
    if (!decision.admitted) {
      return { kind: 'rate-limited', decision };
    }

    return this.callerMutex.run(callerId, async (): Promise<SubmitOutcome> => {
      const pending = await this.approvals.getPending(callerId);
      if (pending) {
        console.log(`[pipeline] caller=${callerId} blocked by unresolved ${pending.id}`);
        return { kind: 'pending-change', change: pending };
      }

      const { sessionToken, turnCount } = await this.sessions.resolve(callerId);
      console.log(`[pipeline] caller=${callerId} turn=${turnCount + 1} session=${sessionToken ?? 'new'}`);

      const request: TaskRequest = { callerId, prompt, resumeToken: sessionToken };
      const result = await this.executor.execute({ ...request, onProgress: options.onProgress });
      const { session, compactionDue } = await this.sessions.record(callerId, result, prompt);

      if (!result.success) {
        return { kind: 'failed', result, session };
      }

      const change = await this.approvals.propose(callerId, prompt, result);

      if (!compactionDue) {
        return { kind: 'proposed', result, change, session };
      }

      const compaction = await this.runCompaction(callerId, session);
      const after = await this.sessions.get(callerId);
      return { kind: 'proposed', result, change, session: after, compaction };
    });
  }

  approve(callerId: CallerId, changeId: string): Promise<TransitionOutcome> {
    return this.approvals.approve(callerId, changeId);
  }

  reject(callerId: CallerId, changeId: string): Promise<TransitionOutcome> {
    return this.approvals.reject(callerId, changeId);
  }

  async getStatus(callerId: CallerId): Promise<CallerStatus> {
    const [session, state] = await Promise.all([
      this.sessions.get(callerId),
      this.approvals.getState(callerId),
    ]);
    return {
      session,
      compactionThreshold: this.sessions.threshold,
      pending: state.pending,
      history: state.history,
      approvedCount: state.history.filter((r) => r.state === 'approved').length,
      rejectedCount: state.history.filter((r) => r.state === 'rejected').length,
      rateLimit: this.rateLimiter.usage(callerId),
    };
  }

  /**
   * Start a fresh agent conversation. With `discardPending` the unresolved
   * change slot is dropped too (the working tree is left as is).
   */
  async clearSession(
    callerId: CallerId,
    options: { discardPending?: boolean } = {},
  ): Promise<{ session: Session; discarded: PendingChange | null }> {
    return this.callerMutex.run(callerId, async () => {
      const session = await this.sessions.clear(callerId);
      const discarded = options.discardPending ? await this.approvals.discard(callerId) : null;
      return { session, discarded };
    });
  }

  async compactSession(callerId: CallerId): Promise<CompactOutcome> {
    return this.callerMutex.run(callerId, async (): Promise<CompactOutcome> => {
      const session = await this.sessions.get(callerId);
      if (!session.sessionId) {
        return { kind: 'no-session' };
      }
      const result = await this.executor.compact(session.sessionId);
      if (!result.ok) {
        return { kind: 'failed', error: result.error };
      }
      return { kind: 'compacted', session: await this.sessions.markCompacted(callerId) };
    });
  }

  /** Resubmit the caller's last prompt. Null when there is nothing to retry. */
  async retryLast(callerId: CallerId, options: SubmitOptions = {}): Promise<SubmitOutcome | null> {
    const { lastPrompt } = await this.sessions.get(callerId);
    if (!lastPrompt) return null;
    return this.submitTask(callerId, lastPrompt, options);
  }

  workingTree(): Promise<WorkingTreeStatus> {
    return this.approvals.workingTreeStatus();
  }

  diff(): Promise<WorkingTreeDiff> {
    return this.approvals.workingTreeDiff();
  }

  log(count = 10): Promise<CommitInfo[]> {
    return this.repository.log(count);
  }

  /** Whether the agent binary starts at all. */
  healthCheck(): Promise<HealthCheckResult> {
    return this.executor.healthCheck();
  }

  /** Periodic housekeeping: forget rate-limit state of idle callers. Returns how many. */
  sweepIdle(): number {
    return this.rateLimiter.sweep();
  }

  // ── Private ──────────────────────────────────────────────────────

  private async runCompaction(callerId: CallerId, session: Session): Promise<CompactionResult> {
    if (!session.sessionId) {
      // No agent context to shrink; start counting afresh.
      await this.sessions.markCompacted(callerId);
      return { ok: true };
    }

    const result = await this.executor.compact(session.sessionId);
    if (result.ok) {
      await this.sessions.markCompacted(callerId);
      console.log(`[pipeline] caller=${callerId} session compacted after ${session.turnCount} turns`);
    } else {
      console.warn(`[pipeline] caller=${callerId} compaction failed: ${result.error}`);
    }
    return result;
  }
}
