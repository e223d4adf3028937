import type {
  Finding,
  FindingStatus,
  FindingsReport,
  MitigationSuggestions,
  ReportSummary,
} from "@/analysis/types";
import { MalformedOutputError, errorMessage } from "@/analysis/errors";
import {
  FINDING_STATUSES,
  NOT_AVAILABLE,
  RISK_LEVEL_SCORES,
  RISK_SCORE_MAX,
  RISK_SCORE_MIN,
} from "@/lib/constants";

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const WRAPPING_FENCE = /^[\s\S]*?```(?:json)?\s*(\{[\s\S]*\})\s*```[\s\S]*$/i;

/**
 * Pull the JSON document out of a model reply. A reply that already parses is
 * returned as-is; otherwise a code fence is stripped only when it wraps the
 * outermost `{...}` span, so fences inside string values survive. Applying it
 * to its own output changes nothing.
 */
export function extractJSON(raw: string): string {
  const trimmed = raw.trim();
  if (parsesAsJSON(trimmed)) return trimmed;

  const fenced = trimmed.match(WRAPPING_FENCE);
  if (fenced) return fenced[1];

  const objectMatch = trimmed.match(/\{[\s\S]*\}/);
  if (objectMatch) return objectMatch[0];

  return trimmed;
}

function parsesAsJSON(candidate: string): boolean {
  try {
    JSON.parse(candidate);
    return true;
  } catch {
    return false;
  }
}

function text(value: unknown, fallback: string): string {
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value !== "string") return fallback;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : fallback;
}

function optionalText(value: unknown, maxLength: number): string | null {
  const result = text(value, "");
  return result ? result.substring(0, maxLength) : null;
}

function clampRisk(score: number): number {
  return Math.max(RISK_SCORE_MIN, Math.min(RISK_SCORE_MAX, Math.round(score)));
}

/**
 * Map an oracle risk value onto the 0–10 scale. Numbers and numeric strings
 * ("7", "7/10") are rounded and clamped; Low/Medium/High/Critical map through
 * RISK_LEVEL_SCORES; anything else scores 0.
 */
export function coerceRiskScore(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? clampRisk(value) : RISK_SCORE_MIN;
  }
  if (typeof value !== "string") return RISK_SCORE_MIN;

  const trimmed = value.trim().toLowerCase();
  const numeric = trimmed.match(/^(-?\d+(?:\.\d+)?)(?:\s*\/\s*10)?$/);
  if (numeric) return clampRisk(parseFloat(numeric[1]));

  return RISK_LEVEL_SCORES[trimmed] ?? RISK_SCORE_MIN;
}

export function coerceStatus(value: unknown): FindingStatus {
  if (typeof value === "string") {
    const wanted = value.trim().toLowerCase();
    const match = FINDING_STATUSES.find((status) => status.toLowerCase() === wanted);
    if (match) return match;
  }
  return "Observed";
}

function normalizeFinding(item: RawRecord): Finding {
  return Object.freeze({
    timestamp: text(item.timestamp, NOT_AVAILABLE),
    attackerIp: text(item.attacker_ip ?? item.source_ip ?? item.ip, NOT_AVAILABLE),
    attackType: text(item.attack_type, NOT_AVAILABLE),
    riskScore: coerceRiskScore(item.risk_score),
    status: coerceStatus(item.status),
    rawSnippet: optionalText(item.raw_snippet, 500),
    explanation: optionalText(item.explanation, 2000),
  });
}

function normalizeFindings(value: unknown): Finding[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new MalformedOutputError("Oracle output has a non-array \"findings\" field");
  }
  return value.filter(isRecord).map(normalizeFinding);
}

/** Most frequent attacker address among the findings; the first seen wins ties. */
function mostActiveAddress(findings: readonly Finding[]): { ip: string; count: number } {
  const counts = new Map<string, number>();
  for (const f of findings) {
    if (f.attackerIp === NOT_AVAILABLE) continue;
    counts.set(f.attackerIp, (counts.get(f.attackerIp) ?? 0) + 1);
  }
  let best = { ip: NOT_AVAILABLE, count: 0 };
  for (const [ip, count] of counts) {
    if (count > best.count) best = { ip, count };
  }
  return best;
}

function normalizeSummary(value: unknown, findings: readonly Finding[]): ReportSummary {
  const raw = isRecord(value) ? value : {};
  const totalThreats = findings.length;

  if (raw.total_threats !== undefined && raw.total_threats !== totalThreats) {
    console.warn(
      `[Parser] Oracle reported total_threats=${String(raw.total_threats)} but returned ${totalThreats} findings; using ${totalThreats}`
    );
  }

  const reportedIp = text(raw.most_active_ip, "");
  let mostActiveIp: string;
  let mostActiveIpCount: number;
  if (reportedIp && reportedIp !== NOT_AVAILABLE) {
    mostActiveIp = reportedIp;
    const reportedCount = raw.most_active_ip_count;
    mostActiveIpCount =
      typeof reportedCount === "number" && Number.isInteger(reportedCount) && reportedCount >= 0
        ? reportedCount
        : findings.filter((f) => f.attackerIp === reportedIp).length;
  } else {
    const derived = mostActiveAddress(findings);
    mostActiveIp = derived.ip;
    mostActiveIpCount = derived.count;
  }

  const globalRiskScore =
    raw.global_risk_score !== undefined && raw.global_risk_score !== null
      ? coerceRiskScore(raw.global_risk_score)
      : findings.reduce((max, f) => Math.max(max, f.riskScore), RISK_SCORE_MIN);

  return Object.freeze({ totalThreats, mostActiveIp, mostActiveIpCount, globalRiskScore });
}

function normalizeMitigations(value: unknown): MitigationSuggestions {
  const result: Record<string, readonly string[]> = {};
  if (!isRecord(value)) return Object.freeze(result);

  for (const [channel, entries] of Object.entries(value)) {
    const list: unknown[] = Array.isArray(entries) ? entries : [entries];
    const commands = list
      .filter((entry): entry is string => typeof entry === "string")
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
    if (commands.length > 0) result[channel] = Object.freeze(commands);
  }
  return Object.freeze(result);
}

/**
 * Turn raw oracle text into a FindingsReport.
 *
 * Two stages: a structured parse (after stripping code fences and prose), then
 * field-by-field defaulting. Only an unparseable document, a non-object root,
 * or a non-array `findings` field fail with MalformedOutputError. Summary
 * totals are always recomputed from the findings that survived.
 */
export function normalizeReport(rawResponse: string): FindingsReport {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJSON(rawResponse));
  } catch (error) {
    throw new MalformedOutputError(
      `Oracle output is not valid JSON: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  if (!isRecord(parsed)) {
    throw new MalformedOutputError("Oracle output is not a JSON object");
  }

  const findings = Object.freeze(normalizeFindings(parsed.findings));

  return Object.freeze({
    summary: normalizeSummary(parsed.summary_metrics ?? parsed.summary, findings),
    findings,
    educationalExplanation: text(parsed.educational_explanation, ""),
    mitigationSuggestions: normalizeMitigations(parsed.mitigation_suggestions),
  });
}
