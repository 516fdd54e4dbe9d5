import type { CallerId, RateLimitDecision, RateLimitWindow, WindowUsage } from './types.js';

export const DEFAULT_WINDOWS: readonly RateLimitWindow[] = [
  { name: 'minute', durationMs: 60_000, limit: 5 },
  { name: 'hour', durationMs: 60 * 60_000, limit: 60 },
  { name: 'day', durationMs: 24 * 60 * 60_000, limit: 300 },
];

export const DEFAULT_NOTICE_COOLDOWN_MS = 60_000;

export interface RateLimiterOptions {
  windows?: readonly RateLimitWindow[];
  /** Minimum gap between two human-readable denial notices for one caller. */
  noticeCooldownMs?: number;
}

interface CallerWindows {
  /** One timestamp list per configured window, same order as `windows`. */
  stamps: number[][];
  lastNoticeAt: number | null;
}

/**
 * Sliding-window rate limiter with several granularities per caller.
 *
 * Every `check` prunes timestamps that fell out of each window before
 * counting, so memory stays proportional to the busiest window's limit.
 * `check` is synchronous: pruning, counting and appending for one caller
 * cannot interleave with another request on the event loop.
 */
export class RateLimiter {
  private readonly windows: readonly RateLimitWindow[];
  private readonly noticeCooldownMs: number;
  private readonly callers = new Map<CallerId, CallerWindows>();

  constructor(options: RateLimiterOptions = {}) {
    const windows = options.windows ?? DEFAULT_WINDOWS;
    for (const w of windows) {
      if (!(w.durationMs > 0) || !Number.isInteger(w.limit) || w.limit < 1) {
        throw new Error(`Invalid rate limit window '${w.name}': need durationMs > 0 and an integer limit >= 1`);
      }
    }
    this.windows = windows;
    this.noticeCooldownMs = options.noticeCooldownMs ?? DEFAULT_NOTICE_COOLDOWN_MS;
  }

  check(callerId: CallerId): RateLimitDecision {
    const now = Date.now();
    const entry = this.prune(this.entryFor(callerId), now);

    let blocking: { window: RateLimitWindow; retryAfterMs: number } | null = null;
    for (let i = 0; i < this.windows.length; i++) {
      const window = this.windows[i];
      const stamps = entry.stamps[i];
      if (stamps.length < window.limit) continue;
      // Oldest surviving stamp decides when a slot frees up.
      const retryAfterMs = Math.max(0, stamps[0] + window.durationMs - now);
      if (!blocking || retryAfterMs > blocking.retryAfterMs) {
        blocking = { window, retryAfterMs };
      }
    }

    if (blocking === null) {
      for (const stamps of entry.stamps) {
        stamps.push(now);
      }
      return { admitted: true };
    }

    const { window, retryAfterMs } = blocking;
    let notice: string | null = null;
    if (entry.lastNoticeAt === null || now - entry.lastNoticeAt >= this.noticeCooldownMs) {
      entry.lastNoticeAt = now;
      const seconds = Math.ceil(retryAfterMs / 1000);
      notice = `Rate limit reached (${window.limit} per ${window.name}). Try again in ${seconds} seconds.`;
    }
    console.warn(`[rate-limit] caller=${callerId} denied by ${window.name} window, retry in ${retryAfterMs}ms`);

    return { admitted: false, window: window.name, limit: window.limit, retryAfterMs, notice };
  }

  usage(callerId: CallerId): WindowUsage[] {
    const entry = this.callers.get(callerId);
    const now = Date.now();
    return this.windows.map((w, i) => ({
      name: w.name,
      used: entry ? this.prune(entry, now).stamps[i].length : 0,
      limit: w.limit,
    }));
  }

  /** Drop every window and the notice stamp for `callerId`. */
  reset(callerId: CallerId): void {
    this.callers.delete(callerId);
  }

  /** Forget callers with no admissions left in any window; returns how many. */
  sweep(): number {
    const now = Date.now();
    let forgotten = 0;
    for (const [callerId, entry] of this.callers) {
      this.prune(entry, now);
      const idle = entry.stamps.every((s) => s.length === 0);
      const noticeExpired = entry.lastNoticeAt === null || now - entry.lastNoticeAt >= this.noticeCooldownMs;
      if (idle && noticeExpired) {
        this.callers.delete(callerId);
        forgotten += 1;
      }
    }
    return forgotten;
  }

  // ── Private ──────────────────────────────────────────────────────

  private entryFor(callerId: CallerId): CallerWindows {
    let entry = this.callers.get(callerId);
    if (!entry) {
      entry = { stamps: this.windows.map(() => []), lastNoticeAt: null };
      this.callers.set(callerId, entry);
    }
    return entry;
  }

  private prune(entry: CallerWindows, now: number): CallerWindows {
    entry.stamps = entry.stamps.map((stamps, i) => {
      const cutoff = now - this.windows[i].durationMs;
      return stamps.filter((t) => t > cutoff);
    });
    return entry;
  }
}
