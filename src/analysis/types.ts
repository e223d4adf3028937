export type FindingStatus = "Observed" | "Allowed" | "Blocked";
export type RiskBand = "Informational" | "Warning" | "Critical";

export interface Finding {
  /** As extracted from the log; not guaranteed to be parseable */
  timestamp: string;
  attackerIp: string;
  /** Oracle-determined label, e.g. "Brute Force" or "SQL Injection" */
  attackType: string;
  /** Integer on the 0–10 scale */
  riskScore: number;
  status: FindingStatus;
  rawSnippet: string | null;
  explanation: string | null;
}

export interface ReportSummary {
  totalThreats: number;
  mostActiveIp: string;
  mostActiveIpCount: number;
  globalRiskScore: number;
}

export type MitigationSuggestions = Readonly<Record<string, readonly string[]>>;

export interface FindingsReport {
  readonly summary: Readonly<ReportSummary>;
  readonly findings: readonly Readonly<Finding>[];
  readonly educationalExplanation: string;
  readonly mitigationSuggestions: MitigationSuggestions;
}

export interface LogExcerpt {
  readonly lines: readonly string[];
  /** Line count of the decoded file before truncation */
  readonly totalLines: number;
  readonly truncated: boolean;
}

export interface FileIdentity {
  name: string;
  /** sha256 of the raw uploaded bytes */
  fingerprint: string;
  key: string;
}

export type InvestigationRole = "user" | "assistant";

export interface InvestigationTurn {
  role: InvestigationRole;
  text: string;
}

export interface OracleRequest {
  systemInstruction: string;
  userPrompt: string;
  requireStructuredOutput: boolean;
}

/** Anything that can answer an oracle request with raw text. */
export interface Oracle {
  invoke(
    systemInstruction: string,
    userPrompt: string,
    requireStructuredOutput: boolean
  ): Promise<string>;
}
