import type { FileIdentity, FindingsReport } from "./types";

interface CacheSlot {
  identity: FileIdentity;
  pending: Promise<FindingsReport>;
  report: FindingsReport | null;
}

export interface CachedReport {
  identity: FileIdentity;
  report: FindingsReport;
}

/**
 * Holds the findings report for the file currently loaded in a session.
 *
 * At most one extraction runs per file identity: concurrent requests for the
 * identity in flight share its promise. A new identity replaces the slot and
 * fires `onInvalidate`. A failed computation empties the slot so the next
 * request retries.
 */
export class AnalysisCache {
  private slot: CacheSlot | null = null;

  constructor(private readonly onInvalidate: (previous: FileIdentity) => void = () => {}) {}

  getOrCompute(
    identity: FileIdentity,
    compute: () => Promise<FindingsReport>
  ): Promise<FindingsReport> {
    if (this.slot && this.slot.identity.key === identity.key) {
      return this.slot.report ? Promise.resolve(this.slot.report) : this.slot.pending;
    }

    this.invalidate();

    const pending: Promise<FindingsReport> = Promise.resolve()
      .then(compute)
      .then(
        (report) => {
          if (this.slot?.pending === pending) this.slot.report = report;
          return report;
        },
        (error: unknown) => {
          if (this.slot?.pending === pending) this.slot = null;
          throw error;
        }
      );

    this.slot = { identity, pending, report: null };
    return pending;
  }

  /** The completed report, if any. In-flight computations are not returned. */
  peek(): CachedReport | null {
    if (!this.slot?.report) return null;
    return { identity: this.slot.identity, report: this.slot.report };
  }

  invalidate(): void {
    if (!this.slot) return;
    const previous = this.slot.identity;
    this.slot = null;
    this.onInvalidate(previous);
  }
}
