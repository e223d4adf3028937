import type {
  FileIdentity,
  FindingsReport,
  InvestigationTurn,
  LogExcerpt,
  Oracle,
} from "./types";
import { AnalysisCache } from "./cache";
import { InvestigationSession } from "./investigation";
import {
  computeFileIdentity,
  createLogExcerpt,
  decodeLogBytes,
  narrowExcerpt,
  splitLogLines,
} from "./log-excerpt";
import { buildExtractionRequest } from "./llm/prompt";
import { normalizeReport } from "./llm/parser";
import { sanitizeFileName } from "@/lib/validations/upload";
import {
  DEFAULT_CHAT_HISTORY_TURNS,
  DEFAULT_CHAT_LINE_LIMIT,
  DEFAULT_EXTRACTION_LINE_LIMIT,
} from "@/lib/constants";

/**
 * Extraction pipeline:
 *
 *   uploaded bytes -> decoded lines -> LogExcerpt (bound A)
 *     -> extraction request -> oracle (model fallback chain)
 *     -> normalizer -> FindingsReport (cached per file identity)
 *
 * The report is advisory. Nothing here detects threats on its own; every
 * finding comes from the oracle and is only validated and reconciled locally.
 */

export async function runExtraction(
  oracle: Oracle,
  excerpt: LogExcerpt,
  maxLines: number = DEFAULT_EXTRACTION_LINE_LIMIT
): Promise<FindingsReport> {
  const request = buildExtractionRequest(excerpt, maxLines);
  const startedAt = Date.now();

  const raw = await oracle.invoke(
    request.systemInstruction,
    request.userPrompt,
    request.requireStructuredOutput
  );
  const report = normalizeReport(raw);

  console.log(
    `[Pipeline] Extraction found ${report.findings.length} findings in ${Math.min(excerpt.lines.length, maxLines)} lines (${Date.now() - startedAt}ms)`
  );
  return report;
}

export interface UploadedLog {
  name: string;
  bytes: Uint8Array;
}

export interface AnalysisOutcome {
  identity: FileIdentity;
  report: FindingsReport;
  /** True when the report was served without calling the oracle */
  cached: boolean;
  lossyDecoding: boolean;
}

export interface AnalysisSessionOptions {
  oracle: Oracle;
  extractionLineLimit?: number;
  chatLineLimit?: number;
  chatHistoryTurns?: number;
}

interface LoadedLog {
  identityKey: string;
  chatExcerpt: LogExcerpt;
}

/**
 * One user's analysis state: the current report, the log excerpt it was
 * built from, and the investigation history scoped to it.
 */
export class AnalysisSession {
  private readonly oracle: Oracle;
  private readonly extractionLineLimit: number;
  private readonly chatLineLimit: number;
  private readonly cache: AnalysisCache;
  private readonly investigation: InvestigationSession;
  private loaded: LoadedLog | null = null;

  constructor(options: AnalysisSessionOptions) {
    this.oracle = options.oracle;
    this.extractionLineLimit = options.extractionLineLimit ?? DEFAULT_EXTRACTION_LINE_LIMIT;
    this.chatLineLimit = options.chatLineLimit ?? DEFAULT_CHAT_LINE_LIMIT;
    this.investigation = new InvestigationSession(this.oracle, {
      maxLines: this.chatLineLimit,
      maxHistoryTurns: options.chatHistoryTurns ?? DEFAULT_CHAT_HISTORY_TURNS,
    });
    this.cache = new AnalysisCache((previous) => {
      console.log(`[Session] Report for "${sanitizeFileName(previous.name)}" superseded, clearing investigation history`);
      this.loaded = null;
      this.investigation.clear();
    });
  }

  async analyze(upload: UploadedLog): Promise<AnalysisOutcome> {
    const identity = computeFileIdentity(upload.name, upload.bytes);
    const decoded = decodeLogBytes(upload.bytes);
    const lines = splitLogLines(decoded.text);
    const excerpt = createLogExcerpt(lines, this.extractionLineLimit);

    let cached = true;
    const report = await this.cache.getOrCompute(identity, () => {
      cached = false;
      console.log(
        `[Pipeline] Analyzing "${sanitizeFileName(upload.name)}" (${excerpt.totalLines} lines${excerpt.truncated ? `, truncated to ${excerpt.lines.length}` : ""})`
      );
      return runExtraction(this.oracle, excerpt, this.extractionLineLimit);
    });

    if (this.cache.peek()?.identity.key === identity.key) {
      this.loaded = {
        identityKey: identity.key,
        chatExcerpt: narrowExcerpt(excerpt, Math.min(this.chatLineLimit, this.extractionLineLimit)),
      };
    }

    return { identity, report, cached, lossyDecoding: decoded.lossy };
  }

  current(): { identity: FileIdentity; report: FindingsReport } | null {
    return this.cache.peek();
  }

  /**
   * Ask about the current report. Returns null when no report is loaded;
   * oracle failures come back as an apology, never as a rejection.
   */
  async ask(question: string): Promise<string | null> {
    const current = this.cache.peek();
    if (!current || !this.loaded || this.loaded.identityKey !== current.identity.key) {
      return null;
    }
    return this.investigation.ask(question, this.loaded.chatExcerpt, current.report);
  }

  history(): readonly InvestigationTurn[] {
    return this.investigation.history();
  }

  /** Drop the report and its history, e.g. when the session ends. */
  reset(): void {
    this.cache.invalidate();
  }
}
