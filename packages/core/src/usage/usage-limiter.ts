import { createChildLogger } from '@hemascope/shared/src/logger.js';

const log = createChildLogger('usage:limiter');

export const USAGE_WINDOW_MS = 24 * 60 * 60 * 1000;

export type UsageDecision =
  | { readonly allowed: true; readonly remaining: number }
  | { readonly allowed: false; readonly resetInMs: number; readonly message: string };

export interface UsageLimiter {
  check(userId: string): UsageDecision;
  /** Holds one slot for an analysis in flight; pair with `commit` or `release`. */
  reserve(userId: string): UsageDecision;
  commit(userId: string): void;
  release(userId: string): void;
}

export interface UsageLimiterConfig {
  readonly dailyLimit: number;
  readonly now?: () => number;
}

interface UsageEntry {
  readonly count: number;
  readonly lastAnalysisAt: number;
}

export function formatResetMessage(resetInMs: number): string {
  const totalMinutes = Math.max(0, Math.floor(resetInMs / 60_000));
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `Daily limit reached. Resets in ${String(hours)}h ${String(minutes)}m`;
}

/**
 * Counts successful analyses per user. The counter resets once 24 hours have
 * passed since the user's most recent analysis. Reserved slots count against
 * the limit until they are committed or released.
 */
export function createInMemoryUsageLimiter(config: UsageLimiterConfig): UsageLimiter {
  const now = config.now ?? Date.now;
  const entries = new Map<string, UsageEntry>();
  const pending = new Map<string, number>();

  const activeEntry = (userId: string, at: number): UsageEntry | undefined => {
    const entry = entries.get(userId);
    if (entry && at - entry.lastAnalysisAt >= USAGE_WINDOW_MS) {
      entries.delete(userId);
      return undefined;
    }
    return entry;
  };

  const decide = (userId: string): UsageDecision => {
    const at = now();
    const entry = activeEntry(userId, at);
    const used = (entry?.count ?? 0) + (pending.get(userId) ?? 0);

    if (used >= config.dailyLimit) {
      const resetInMs = entry ? USAGE_WINDOW_MS - (at - entry.lastAnalysisAt) : USAGE_WINDOW_MS;
      log.info({ userId, used, resetInMs }, 'Daily analysis limit reached');
      return { allowed: false, resetInMs, message: formatResetMessage(resetInMs) };
    }

    return { allowed: true, remaining: config.dailyLimit - used };
  };

  const releaseSlot = (userId: string): void => {
    const held = pending.get(userId) ?? 0;
    if (held <= 1) {
      pending.delete(userId);
    } else {
      pending.set(userId, held - 1);
    }
  };

  return {
    check: decide,

    reserve(userId: string): UsageDecision {
      const decision = decide(userId);
      if (decision.allowed) {
        pending.set(userId, (pending.get(userId) ?? 0) + 1);
      }
      return decision;
    },

    commit(userId: string): void {
      releaseSlot(userId);
      const at = now();
      const entry = activeEntry(userId, at);
      entries.set(userId, { count: (entry?.count ?? 0) + 1, lastAnalysisAt: at });
    },

    release: releaseSlot,
  };
}
