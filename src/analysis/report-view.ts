import type { FindingStatus, FindingsReport, RiskBand } from "./types";
import {
  MITIGATION_CHANNEL_LABELS,
  MITIGATION_CHANNEL_ORDER,
  SHELL_MITIGATION_CHANNELS,
  riskBand,
} from "@/lib/constants";

export interface MetricCards {
  threatsDetected: number;
  mostActiveIp: string;
  mostActiveIpCount: number;
  /** e.g. "7/10" */
  globalRisk: string;
  riskBand: RiskBand;
}

export interface FindingRow {
  timestamp: string;
  attackerIp: string;
  attackType: string;
  risk: number;
  status: FindingStatus;
}

export interface AttackTypeCount {
  attackType: string;
  count: number;
}

export interface MitigationTab {
  channel: string;
  label: string;
  language: "bash" | "text";
  commands: readonly string[];
}

export interface ReportView {
  metrics: MetricCards;
  rows: FindingRow[];
  attackTypeDistribution: AttackTypeCount[];
  mitigationTabs: MitigationTab[];
  educationalExplanation: string;
}

/** Attack types by descending count; ties keep first-seen order. */
export function attackTypeDistribution(report: FindingsReport): AttackTypeCount[] {
  const counts = new Map<string, number>();
  for (const f of report.findings) {
    counts.set(f.attackType, (counts.get(f.attackType) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([attackType, count]) => ({ attackType, count }))
    .sort((a, b) => b.count - a.count);
}

function mitigationTabs(report: FindingsReport): MitigationTab[] {
  const suggestions = report.mitigationSuggestions;
  const known: readonly string[] = MITIGATION_CHANNEL_ORDER;
  const extra = Object.keys(suggestions).filter((channel) => !known.includes(channel));

  return [...known, ...extra].map((channel): MitigationTab => ({
    channel,
    label: MITIGATION_CHANNEL_LABELS[channel] ?? channel,
    language: SHELL_MITIGATION_CHANNELS.has(channel) ? "bash" : "text",
    commands: suggestions[channel] ?? [],
  }));
}

/**
 * Presentation-ready projection of a report for the dashboard: metric cards,
 * the findings table, the attack-type chart and mitigation tabs.
 */
export function buildReportView(report: FindingsReport): ReportView {
  const { summary } = report;
  return {
    metrics: {
      threatsDetected: summary.totalThreats,
      mostActiveIp: summary.mostActiveIp,
      mostActiveIpCount: summary.mostActiveIpCount,
      globalRisk: `${summary.globalRiskScore}/10`,
      riskBand: riskBand(summary.globalRiskScore),
    },
    rows: report.findings.map((f) => ({
      timestamp: f.timestamp,
      attackerIp: f.attackerIp,
      attackType: f.attackType,
      risk: f.riskScore,
      status: f.status,
    })),
    attackTypeDistribution: attackTypeDistribution(report),
    mitigationTabs: mitigationTabs(report),
    educationalExplanation: report.educationalExplanation,
  };
}
