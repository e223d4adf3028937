import type { FindingStatus, RiskBand } from "@/analysis/types";

export const MAX_FILE_SIZE = 10 * 1024 * 1024; // 10MB
export const ALLOWED_EXTENSIONS = [".log", ".txt", ".csv"];

/** Bound A: lines sent to the oracle for full extraction */
export const DEFAULT_EXTRACTION_LINE_LIMIT = 5000;
/** Bound B: lines sent as context for investigation questions */
export const DEFAULT_CHAT_LINE_LIMIT = 2000;
export const DEFAULT_CHAT_HISTORY_TURNS = 10;
export const DEFAULT_ORACLE_TIMEOUT_MS = 120_000;
export const DEFAULT_SESSION_TTL_MS = 30 * 60_000;

export const MAX_QUESTION_LENGTH = 2000;

export const NOT_AVAILABLE = "N/A";

export const RISK_SCORE_MIN = 0;
export const RISK_SCORE_MAX = 10;

export const FINDING_STATUSES: readonly FindingStatus[] = ["Observed", "Allowed", "Blocked"];

/** Score used when the oracle answers with a categorical level instead of a number */
export const RISK_LEVEL_SCORES: Record<string, number> = {
  low: 3,
  medium: 6,
  high: 8,
  critical: 10,
};

export function riskBand(score: number): RiskBand {
  if (score >= 8) return "Critical";
  if (score >= 4) return "Warning";
  return "Informational";
}

export const MITIGATION_CHANNEL_ORDER = ["iptables", "ufw", "aws_sg"] as const;

export const MITIGATION_CHANNEL_LABELS: Record<string, string> = {
  iptables: "iptables",
  ufw: "UFW",
  aws_sg: "AWS Security Groups",
};

/** Channels whose entries are shell commands rather than prose */
export const SHELL_MITIGATION_CHANNELS = new Set(["iptables", "ufw"]);
