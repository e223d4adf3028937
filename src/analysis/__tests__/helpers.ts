import type { FileIdentity, FindingsReport, LogExcerpt, Oracle } from "@/analysis/types";
import { OUT_OF_CONTEXT_REPLY, SYSTEM_PROMPT } from "@/analysis/llm/prompt";
import { normalizeReport } from "@/analysis/llm/parser";

export interface OracleCall {
  systemInstruction: string;
  userPrompt: string;
  requireStructuredOutput: boolean;
}

/** In-process oracle that records every call and answers from a script. */
export class ScriptedOracle implements Oracle {
  readonly calls: OracleCall[] = [];

  constructor(private readonly respond: (call: OracleCall) => string | Promise<string>) {}

  async invoke(
    systemInstruction: string,
    userPrompt: string,
    requireStructuredOutput: boolean
  ): Promise<string> {
    const call = { systemInstruction, userPrompt, requireStructuredOutput };
    this.calls.push(call);
    return this.respond(call);
  }
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function identity(name: string, fingerprint = "f0"): FileIdentity {
  return { name, fingerprint, key: `${name}:${fingerprint}` };
}

export function excerptOf(lines: string[]): LogExcerpt {
  return { lines, totalLines: lines.length, truncated: false };
}

export const SAMPLE_DOCUMENT = {
  summary_metrics: {
    total_threats: 1,
    most_active_ip: "10.0.0.5",
    most_active_ip_count: 50,
    global_risk_score: 8,
  },
  findings: [
    {
      timestamp: "2024-03-01T10:00:00Z",
      attacker_ip: "10.0.0.5",
      attack_type: "Brute Force",
      risk_score: 8,
      status: "Observed",
    },
  ],
  educational_explanation: "Repeated failed logins from one address.",
  mitigation_suggestions: {
    iptables: ["iptables -A INPUT -s 10.0.0.5 -j DROP"],
    ufw: ["ufw deny from 10.0.0.5"],
    aws_sg: ["Remove inbound access for 10.0.0.5/32"],
  },
};

export function sampleReport(): FindingsReport {
  return normalizeReport(JSON.stringify(SAMPLE_DOCUMENT));
}

const IPV4 = /\b\d{1,3}(?:\.\d{1,3}){3}\b/g;

function section(prompt: string, heading: string): string[] {
  const start = prompt.indexOf(`${heading}\n---\n`);
  if (start < 0) return [];
  const body = prompt.slice(start + heading.length + 5);
  return body.slice(0, body.indexOf("\n---")).split("\n");
}

/**
 * Stand-in for the remote model: flags addresses with five or more failed
 * logins as brute force, and answers questions only about addresses that
 * appear in the supplied excerpt.
 */
export function localAnalystOracle(): ScriptedOracle {
  return new ScriptedOracle((call) => {
    if (call.systemInstruction === SYSTEM_PROMPT) {
      const failures = new Map<string, number>();
      for (const line of section(call.userPrompt, "Log entries:")) {
        const ip = line.match(IPV4)?.[0];
        if (ip && /fail/i.test(line)) failures.set(ip, (failures.get(ip) ?? 0) + 1);
      }
      const findings = [...failures.entries()]
        .filter(([, count]) => count >= 5)
        .map(([ip, count]) => ({
          timestamp: "N/A",
          attacker_ip: ip,
          attack_type: "Brute Force",
          risk_score: 8,
          status: "Observed",
          explanation: `${count} failed logins`,
        }));
      const body = JSON.stringify({
        summary_metrics: { total_threats: findings.length },
        findings,
        educational_explanation: "Brute force means repeated guessing of credentials.",
        mitigation_suggestions: {},
      });
      return `Here is my analysis:\n\`\`\`json\n${body}\n\`\`\``;
    }

    const context = section(call.userPrompt, "LOG EXCERPT:").join("\n");
    const question = call.userPrompt.slice(call.userPrompt.indexOf("USER QUESTION:"));
    const asked = (question.match(IPV4) ?? []).find((ip) => context.includes(ip));
    if (!asked) return OUT_OF_CONTEXT_REPLY;
    const hits = context.split("\n").filter((line) => line.includes(asked)).length;
    return `${asked} appears in ${hits} log lines.`;
  });
}
