import type { CallerId, ExecutionResult, Session } from './types.js';
import type { KeyValueStore } from './store.js';

export const DEFAULT_COMPACTION_THRESHOLD = 20;

export interface ResolvedSession {
  sessionToken?: string;
  turnCount: number;
}

export interface RecordResult {
  session: Session;
  /** The turn counter reached the compaction threshold. */
  compactionDue: boolean;
}

export function emptySession(): Session {
  return {
    sessionId: null,
    turnCount: 0,
    lastActivityAt: null,
    lastPrompt: null,
    compactedAt: null,
  };
}

export function isSession(value: unknown): value is Session {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const s = value as Record<string, unknown>;
  return (
    (s.sessionId === null || typeof s.sessionId === 'string') &&
    typeof s.turnCount === 'number' &&
    Number.isInteger(s.turnCount) &&
    s.turnCount >= 0 &&
    (s.lastActivityAt === null || typeof s.lastActivityAt === 'string') &&
    (s.lastPrompt === null || typeof s.lastPrompt === 'string') &&
    (s.compactedAt === null || typeof s.compactedAt === 'string')
  );
}

/**
 * Maps each caller to the agent's conversation token and a turn counter.
 *
 * The agent process issues session ids; the tracker only remembers the first
 * one it sees until the session is cleared. The counter drives compaction.
 */
export class SessionTracker {
  constructor(
    private readonly store: KeyValueStore<Session>,
    private readonly compactionThreshold = DEFAULT_COMPACTION_THRESHOLD,
  ) {
    if (!Number.isInteger(compactionThreshold) || compactionThreshold < 1) {
      throw new Error(`compactionThreshold must be a positive integer, got ${compactionThreshold}`);
    }
  }

  get threshold(): number {
    return this.compactionThreshold;
  }

  async get(callerId: CallerId): Promise<Session> {
    return (await this.store.get(callerId)) ?? emptySession();
  }

  async resolve(callerId: CallerId): Promise<ResolvedSession> {
    const session = await this.get(callerId);
    return session.sessionId
      ? { sessionToken: session.sessionId, turnCount: session.turnCount }
      : { turnCount: session.turnCount };
  }

  /**
   * Fold one execution into the caller's session.
   * Only successful executions count as a turn.
   */
  async record(callerId: CallerId, result: ExecutionResult, prompt: string): Promise<RecordResult> {
    const session = await this.get(callerId);

    if (result.sessionId && !session.sessionId) {
      session.sessionId = result.sessionId;
      console.log(`[session] caller=${callerId} bound to agent session ${result.sessionId}`);
    }
    if (result.success) {
      session.turnCount += 1;
    }
    session.lastActivityAt = new Date().toISOString();
    session.lastPrompt = prompt;

    await this.store.set(callerId, session);

    return { session, compactionDue: session.turnCount >= this.compactionThreshold };
  }

  async markCompacted(callerId: CallerId): Promise<Session> {
    const session = await this.get(callerId);
    session.turnCount = 0;
    session.compactedAt = new Date().toISOString();
    await this.store.set(callerId, session);
    return session;
  }

  /**
   * Forget the agent session and zero the counter.
   * Approval history is stored elsewhere and survives.
   */
  async clear(callerId: CallerId): Promise<Session> {
    const session = await this.get(callerId);
    const previous = session.sessionId;
    session.sessionId = null;
    session.turnCount = 0;
    await this.store.set(callerId, session);
    console.log(`[session] caller=${callerId} cleared (was ${previous ?? 'none'})`);
    return session;
  }
}
