import type {
  FindingsReport,
  InvestigationTurn,
  LogExcerpt,
  OracleRequest,
} from "@/analysis/types";
import {
  DEFAULT_CHAT_HISTORY_TURNS,
  DEFAULT_CHAT_LINE_LIMIT,
  DEFAULT_EXTRACTION_LINE_LIMIT,
} from "@/lib/constants";

export const EXTRACTION_PROMPT_VERSION = "2";

export const SYSTEM_PROMPT = `You are a senior security analyst specializing in digital forensics and log analysis (extraction protocol v${EXTRACTION_PROMPT_VERSION}).

Responsibilities:
1. Analyze the provided log data to identify suspicious security patterns such as brute force, SQL injection, XSS, scanning and privilege abuse.
2. Assign every finding a risk_score from 0 to 10:
   - 0-3: Informational
   - 4-7: Warning
   - 8-10: Critical
3. Frame findings as "suspicious patterns" or "potential attack indicators". Do not claim certainty.
4. Never invent IP addresses, timestamps or events that do not appear in the log data. Use "N/A" when a value is absent.
5. Explain findings in a way that teaches a junior analyst.

Respond with a single JSON object and nothing else, using exactly this schema:
{
  "summary_metrics": {
    "total_threats": number (integer),
    "most_active_ip": string,
    "most_active_ip_count": number (integer, occurrences of most_active_ip in the log),
    "global_risk_score": number (integer 0-10)
  },
  "findings": [
    {
      "timestamp": string (copied from the log),
      "attacker_ip": string,
      "attack_type": string,
      "risk_score": number (integer 0-10),
      "status": "Observed" | "Allowed" | "Blocked",
      "raw_snippet": string (short excerpt of the offending line),
      "explanation": string (one or two sentences)
    }
  ],
  "educational_explanation": string (markdown explaining the top threats),
  "mitigation_suggestions": {
    "iptables": [string],
    "ufw": [string],
    "aws_sg": [string (description of a security group rule)]
  }
}

If no suspicious patterns are found, return "findings": [] and a total_threats of 0.`;

export const INVESTIGATION_SYSTEM_PROMPT = `You are a security analyst answering questions about one uploaded log file.
You may only use the log excerpt and the findings report supplied in the message. You have no other knowledge for this task.`;

/** Reply the investigator is told to give for questions the log cannot answer. */
export const OUT_OF_CONTEXT_REPLY =
  "I can only answer questions about the uploaded log and its findings, and this log does not contain that information.";

export function buildExtractionRequest(
  excerpt: LogExcerpt,
  maxLines: number = DEFAULT_EXTRACTION_LINE_LIMIT
): OracleRequest {
  const lines = excerpt.lines.slice(0, maxLines);
  const coverage =
    excerpt.totalLines > lines.length
      ? `the first ${lines.length} of ${excerpt.totalLines} lines`
      : `${lines.length} lines`;

  const userPrompt = `Analyze the following log entries (${coverage}) based on the system instructions. Look for patterns across entries that might indicate coordinated attacks.

Log entries:
---
${lines.join("\n")}
---

Respond strictly with the JSON object described in the system instructions.`;

  return { systemInstruction: SYSTEM_PROMPT, userPrompt, requireStructuredOutput: true };
}

export interface InvestigationPromptInput {
  question: string;
  excerpt: LogExcerpt;
  report: FindingsReport;
  history: readonly InvestigationTurn[];
  maxLines?: number;
  maxHistoryTurns?: number;
}

function describeReport(report: FindingsReport): string {
  const { summary } = report;
  const findingLines = report.findings
    .map(
      (f, i) =>
        `${i + 1}. [${f.timestamp}] ${f.attackerIp} - ${f.attackType} (risk ${f.riskScore}/10, ${f.status})`
    )
    .join("\n");

  return `Total threats: ${summary.totalThreats}
Most active IP: ${summary.mostActiveIp} (${summary.mostActiveIpCount} occurrences)
Global risk score: ${summary.globalRiskScore}/10
Findings:
${findingLines || "(none)"}`;
}

export function buildInvestigationPrompt(input: InvestigationPromptInput): OracleRequest {
  const maxLines = input.maxLines ?? DEFAULT_CHAT_LINE_LIMIT;
  const maxHistoryTurns = input.maxHistoryTurns ?? DEFAULT_CHAT_HISTORY_TURNS;
  const lines = input.excerpt.lines.slice(0, maxLines);
  const recent = maxHistoryTurns > 0 ? input.history.slice(-maxHistoryTurns) : [];

  const conversation = recent.length
    ? `\nPREVIOUS CONVERSATION:\n${recent
        .map((turn) => `${turn.role === "user" ? "User" : "Analyst"}: ${turn.text}`)
        .join("\n")}\n`
    : "";

  const userPrompt = `LOG EXCERPT:
---
${lines.join("\n")}
---

FINDINGS REPORT:
${describeReport(input.report)}
${conversation}
USER QUESTION:
${input.question}

INSTRUCTIONS:
- Answer ONLY using the log excerpt and findings report above.
- Do not use general knowledge and do not state facts that are absent from that context.
- If the answer is not in the log data, reply exactly: "${OUT_OF_CONTEXT_REPLY}"
- Be educational and professional.`;

  return {
    systemInstruction: INVESTIGATION_SYSTEM_PROMPT,
    userPrompt,
    requireStructuredOutput: false,
  };
}
