import type { FindingsReport, InvestigationTurn, LogExcerpt, Oracle } from "./types";
import { ChatFailureError, errorMessage } from "./errors";
import { buildInvestigationPrompt } from "./llm/prompt";
import { DEFAULT_CHAT_HISTORY_TURNS, DEFAULT_CHAT_LINE_LIMIT } from "@/lib/constants";

export const EMPTY_QUESTION_REPLY = "Please ask a question about the uploaded log.";

export function apologyFor(error: ChatFailureError): string {
  return `Sorry, I couldn't investigate that question right now. (${error.message})`;
}

export interface InvestigationLimits {
  maxLines?: number;
  maxHistoryTurns?: number;
}

/**
 * Answer one question from the log excerpt and findings report alone.
 * Never rejects: an oracle failure becomes an apology string.
 */
export async function investigate(
  oracle: Oracle,
  question: string,
  excerpt: LogExcerpt,
  report: FindingsReport,
  history: readonly InvestigationTurn[],
  limits: InvestigationLimits = {}
): Promise<string> {
  const trimmed = question.trim();
  if (!trimmed) return EMPTY_QUESTION_REPLY;

  const request = buildInvestigationPrompt({
    question: trimmed,
    excerpt,
    report,
    history,
    maxLines: limits.maxLines ?? DEFAULT_CHAT_LINE_LIMIT,
    maxHistoryTurns: limits.maxHistoryTurns ?? DEFAULT_CHAT_HISTORY_TURNS,
  });

  try {
    const answer = await oracle.invoke(
      request.systemInstruction,
      request.userPrompt,
      request.requireStructuredOutput
    );
    return answer.trim();
  } catch (error) {
    const failure = new ChatFailureError(errorMessage(error), { cause: error });
    console.error("[Investigate] Question could not be answered:", failure.message);
    return apologyFor(failure);
  }
}

/**
 * Conversation history for one findings report. Questions are answered one at
 * a time so turns are appended in the order they were asked.
 */
export class InvestigationSession {
  private turns: InvestigationTurn[] = [];
  private tail: Promise<void> = Promise.resolve();
  // bumped by clear() so answers to a superseded report are not recorded
  private generation = 0;

  constructor(
    private readonly oracle: Oracle,
    private readonly limits: InvestigationLimits = {}
  ) {}

  history(): readonly InvestigationTurn[] {
    return [...this.turns];
  }

  clear(): void {
    this.turns = [];
    this.generation++;
  }

  ask(question: string, excerpt: LogExcerpt, report: FindingsReport): Promise<string> {
    const generation = this.generation;
    const run = this.tail.then(async () => {
      const answer = await investigate(
        this.oracle,
        question,
        excerpt,
        report,
        this.turns,
        this.limits
      );
      const trimmed = question.trim();
      if (trimmed && generation === this.generation) {
        this.turns.push({ role: "user", text: trimmed }, { role: "assistant", text: answer });
      }
      return answer;
    });
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
