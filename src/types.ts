// ── Shared pipeline types ────────────────────────────────────────────
// This module is a leaf node: no imports from other project modules.

/**
 * Identifies whoever is talking to the pipeline (a Telegram chat id, a CLI
 * user name). Transports convert their native ids to strings.
 */
export type CallerId = string;

// ── Agent events ─────────────────────────────────────────────────────

/**
 * One parsed line of the agent's `stream-json` output.
 */
export interface AgentEvent {
  type: string;
  [key: string]: unknown;
}

// ── Execution ────────────────────────────────────────────────────────

/** One inbound request; lives only for the duration of a submission. */
export interface TaskRequest {
  callerId: CallerId;
  prompt: string;
  resumeToken?: string;
}

/**
 * One tool call the agent made, reported while the run is still going.
 * `step` counts tool calls from 1 within a run; `detail` names the file or
 * command when the input carries one.
 */
export interface ToolProgress {
  tool: string;
  detail?: string;
  step: number;
}

export type FailureReason = 'timeout' | 'non-zero-exit' | 'spawn-error';

export interface ExecutionError {
  reason: FailureReason;
  message: string;
}

/**
 * Token and cost figures reported by the agent's `system` and `result` events.
 */
export interface ExecutionUsage {
  model?: string;
  costUsd: number;
  inputTokens: number;
  outputTokens: number;
  durationMs: number;
}

/**
 * Normalized outcome of one agent invocation.
 * `modifiedFiles` is a hint taken from tool inputs; the repository is the
 * ground truth for what an approval commits.
 */
export interface ExecutionResult {
  success: boolean;
  output: string;
  sessionId?: string;
  toolsUsed: string[];
  modifiedFiles: string[];
  events: AgentEvent[];
  skippedLines: number;
  usage?: ExecutionUsage;
  error?: ExecutionError;
}

export type CompactionResult = { ok: true } | { ok: false; error: string };

// ── Sessions ─────────────────────────────────────────────────────────

export interface Session {
  sessionId: string | null;
  turnCount: number;
  lastActivityAt: string | null;
  lastPrompt: string | null;
  compactedAt: string | null;
}

// ── Approval ─────────────────────────────────────────────────────────

export type ChangeState = 'pending' | 'approved' | 'rejected';

export interface PendingChange {
  id: string;
  callerId: CallerId;
  prompt: string;
  createdAt: string;
  state: ChangeState;
  sessionId: string | null;
  toolsUsed: string[];
  modifiedFiles: string[];
  resolvedAt?: string;
}

export interface ApprovalRecord {
  changeId: string;
  state: Exclude<ChangeState, 'pending'>;
  at: string;
  commitHash?: string;
}

/**
 * Persisted approval state for one caller: the single pending slot plus a
 * bounded audit trail.
 */
export interface ApprovalState {
  pending: PendingChange | null;
  history: ApprovalRecord[];
}

// ── Rate limiting ────────────────────────────────────────────────────

export interface RateLimitWindow {
  name: string;
  durationMs: number;
  limit: number;
}

export type RateLimitDecision =
  | { admitted: true }
  | {
      admitted: false;
      window: string;
      limit: number;
      retryAfterMs: number;
      /** Human-readable explanation, or null while the notice cooldown runs. */
      notice: string | null;
    };

export interface WindowUsage {
  name: string;
  used: number;
  limit: number;
}
