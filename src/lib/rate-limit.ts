/**
 * Per-session request budgets for the routes that call the oracle. Analysis and
 * investigation are budgeted separately: one upload costs a full extraction,
 * while questions are cheaper and more frequent. Both budgets are dropped when
 * the session is ended.
 */

export interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
}

interface WindowState {
  count: number;
  resetAt: number;
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  retryAfterMs: number;
}

export interface RateLimiter {
  check(key: string): RateLimitResult;
  /** Forget a key so its next request opens a fresh window */
  reset(key: string): void;
  destroy(): void;
}

export function createRateLimiter(config: RateLimitConfig): RateLimiter {
  const windows = new Map<string, WindowState>();

  const sweep = setInterval(() => {
    const now = Date.now();
    for (const [key, state] of windows) {
      if (state.resetAt <= now) windows.delete(key);
    }
  }, config.windowMs * 2);
  sweep.unref?.();

  return {
    check(key) {
      const now = Date.now();
      const state = windows.get(key);

      if (!state || state.resetAt <= now) {
        windows.set(key, { count: 1, resetAt: now + config.windowMs });
        return { allowed: true, remaining: config.maxRequests - 1, retryAfterMs: 0 };
      }

      if (state.count < config.maxRequests) {
        state.count++;
        return { allowed: true, remaining: config.maxRequests - state.count, retryAfterMs: 0 };
      }

      return { allowed: false, remaining: 0, retryAfterMs: state.resetAt - now };
    },

    reset(key) {
      windows.delete(key);
    },

    destroy() {
      clearInterval(sweep);
      windows.clear();
    },
  };
}

/** Uploads per session per minute */
export const analysisLimiter = createRateLimiter({ windowMs: 60_000, maxRequests: 20 });
/** Questions per session per minute */
export const questionLimiter = createRateLimiter({ windowMs: 60_000, maxRequests: 30 });

export const analysisKey = (sessionId: string) => `analyze:${sessionId}`;
export const questionKey = (sessionId: string) => `investigate:${sessionId}`;

export function releaseSessionLimits(sessionId: string): void {
  analysisLimiter.reset(analysisKey(sessionId));
  questionLimiter.reset(questionKey(sessionId));
}
