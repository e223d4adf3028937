import { AnalysisSession } from "@/analysis/pipeline";
import { createOracleClient } from "@/analysis/llm/client";
import { getConfig } from "@/lib/config";

interface RegistryEntry {
  session: AnalysisSession;
  lastSeenAt: number;
}

/**
 * Process-local map from session id to AnalysisSession. Sessions idle for
 * longer than `ttlMs` are swept; nothing is persisted.
 */
export class SessionRegistry {
  private entries = new Map<string, RegistryEntry>();
  private sweep: ReturnType<typeof setInterval>;

  constructor(
    private readonly createSession: () => AnalysisSession,
    private readonly ttlMs: number
  ) {
    this.sweep = setInterval(() => this.expireIdle(), Math.max(1_000, Math.floor(ttlMs / 2)));
    this.sweep.unref?.();
  }

  get(sessionId: string): AnalysisSession {
    const entry = this.entries.get(sessionId);
    if (entry) {
      entry.lastSeenAt = Date.now();
      return entry.session;
    }
    const session = this.createSession();
    this.entries.set(sessionId, { session, lastSeenAt: Date.now() });
    console.log(`[Session] Started ${sessionId}`);
    return session;
  }

  /** Existing session only; does not create one. */
  find(sessionId: string): AnalysisSession | null {
    const entry = this.entries.get(sessionId);
    if (!entry) return null;
    entry.lastSeenAt = Date.now();
    return entry.session;
  }

  end(sessionId: string): boolean {
    const entry = this.entries.get(sessionId);
    if (!entry) return false;
    entry.session.reset();
    this.entries.delete(sessionId);
    console.log(`[Session] Ended ${sessionId}`);
    return true;
  }

  size(): number {
    return this.entries.size;
  }

  expireIdle(now: number = Date.now()): number {
    let expired = 0;
    for (const [id, entry] of this.entries) {
      if (now - entry.lastSeenAt >= this.ttlMs) {
        entry.session.reset();
        this.entries.delete(id);
        expired++;
      }
    }
    if (expired > 0) console.log(`[Session] Expired ${expired} idle session(s)`);
    return expired;
  }

  destroy(): void {
    clearInterval(this.sweep);
    for (const entry of this.entries.values()) entry.session.reset();
    this.entries.clear();
  }
}

// globalThis singleton so dev-server module reloads keep live sessions
const globalForSessions = globalThis as unknown as {
  sessionRegistry: SessionRegistry | undefined;
};

/**
 * The shared registry. Built on first use from configuration, so a missing
 * credential surfaces here as a ConfigurationError.
 */
export function getSessionRegistry(): SessionRegistry {
  if (globalForSessions.sessionRegistry) return globalForSessions.sessionRegistry;

  const config = getConfig();
  const oracle = createOracleClient({
    provider: config.provider,
    apiKey: config.apiKey,
    models: config.models,
    timeoutMs: config.oracleTimeoutMs,
  });
  console.log(`[Session] Oracle provider: ${oracle.providerName()}`);

  const registry = new SessionRegistry(
    () =>
      new AnalysisSession({
        oracle,
        extractionLineLimit: config.extractionLineLimit,
        chatLineLimit: config.chatLineLimit,
        chatHistoryTurns: config.chatHistoryTurns,
      }),
    config.sessionTtlMs
  );
  globalForSessions.sessionRegistry = registry;
  return registry;
}
