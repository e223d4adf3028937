import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import type { Oracle, OracleRequest } from "@/analysis/types";
import {
  MalformedOutputError,
  OracleUnavailableError,
  errorMessage,
  redactSecrets,
} from "@/analysis/errors";
import { DEFAULT_ORACLE_TIMEOUT_MS } from "@/lib/constants";

export type OracleProviderName = "anthropic" | "openai";

const MAX_OUTPUT_TOKENS = 8192;

/** Default fallback chains, fast tier first. */
export const DEFAULT_MODEL_CANDIDATES: Record<OracleProviderName, readonly ModelCandidate[]> = {
  anthropic: [
    { model: "claude-3-5-haiku-latest", tier: "fast" },
    { model: "claude-sonnet-4-20250514", tier: "general" },
  ],
  openai: [
    { model: "gpt-4o-mini", tier: "fast" },
    { model: "gpt-4o", tier: "general" },
  ],
};

export interface ModelCandidate {
  model: string;
  tier: "fast" | "general";
}

/** One vendor SDK behind a uniform completion call. */
export interface OracleProvider {
  providerName(): string;
  supportsStructuredOutput(): boolean;
  complete(model: string, request: OracleRequest): Promise<string>;
}

/**
 * "model_not_found" failures advance the fallback chain; everything else is
 * surfaced to the caller without a retry.
 */
export type OracleFailureKind = "model_not_found" | "fatal";

export function classifyOracleFailure(error: unknown): OracleFailureKind {
  if (error instanceof OracleTimeoutError) return "fatal";
  if (getErrorStatus(error) === 404) return "model_not_found";
  if (getErrorCode(error) === "model_not_found") return "model_not_found";
  const message = errorMessage(error);
  if (/model[^.]*(not[ _]found|does not exist)/i.test(message)) return "model_not_found";
  return "fatal";
}

function getErrorStatus(error: unknown): number | null {
  if (error && typeof error === "object") {
    if ("status" in error && typeof error.status === "number") return error.status;
    if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  }
  return null;
}

function getErrorCode(error: unknown): string | null {
  if (error && typeof error === "object" && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

class OracleTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Oracle call timed out after ${timeoutMs}ms`);
    this.name = "OracleTimeoutError";
  }
}

async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new OracleTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, expiry]);
  } finally {
    clearTimeout(timer);
  }
}

export interface OracleClientOptions {
  timeoutMs?: number;
  /** Credentials to scrub from any error message this client raises */
  secrets?: readonly string[];
}

/**
 * Invokes the oracle through an ordered list of model candidates.
 * A candidate reporting that its model does not exist hands the request to the
 * next one; the first success ends the chain.
 */
export class OracleClient implements Oracle {
  private readonly timeoutMs: number;
  private readonly secrets: readonly string[];

  constructor(
    private readonly provider: OracleProvider,
    private readonly candidates: readonly ModelCandidate[],
    options: OracleClientOptions = {}
  ) {
    if (candidates.length === 0) {
      throw new RangeError("OracleClient needs at least one model candidate");
    }
    this.timeoutMs = options.timeoutMs ?? DEFAULT_ORACLE_TIMEOUT_MS;
    this.secrets = options.secrets ?? [];
  }

  providerName(): string {
    return this.provider.providerName();
  }

  async invoke(
    systemInstruction: string,
    userPrompt: string,
    requireStructuredOutput: boolean
  ): Promise<string> {
    const request: OracleRequest = {
      systemInstruction,
      userPrompt,
      requireStructuredOutput:
        requireStructuredOutput && this.provider.supportsStructuredOutput(),
    };
    const tried: string[] = [];

    for (const candidate of this.candidates) {
      tried.push(candidate.model);
      let text: string;
      try {
        text = await withTimeout(this.provider.complete(candidate.model, request), this.timeoutMs);
      } catch (error: unknown) {
        const reason = redactSecrets(errorMessage(error), this.secrets);
        if (classifyOracleFailure(error) === "model_not_found") {
          console.warn(`[Oracle] Model ${candidate.model} unavailable (${reason}), trying next candidate`);
          continue;
        }
        console.error(`[Oracle] ${this.providerName()} call to ${candidate.model} failed: ${reason}`);
        throw new OracleUnavailableError(`Oracle request failed: ${reason}`, { cause: error });
      }

      if (text.trim().length === 0) {
        throw new MalformedOutputError(`Oracle model ${candidate.model} returned an empty response`);
      }
      console.log(`[Oracle] ${this.providerName()} answered with ${candidate.model} (${candidate.tier} tier)`);
      return text;
    }

    throw new OracleUnavailableError(
      `No oracle model candidate succeeded (tried ${tried.join(", ")})`
    );
  }
}

class AnthropicProvider implements OracleProvider {
  private client: Anthropic;

  constructor(apiKey: string, timeoutMs: number) {
    this.client = new Anthropic({ apiKey, maxRetries: 0, timeout: timeoutMs });
  }

  async complete(model: string, request: OracleRequest): Promise<string> {
    const message = await this.client.messages.create({
      model,
      max_tokens: MAX_OUTPUT_TOKENS,
      system: request.systemInstruction,
      messages: [{ role: "user", content: request.userPrompt }],
    });

    let text = "";
    for (const block of message.content) {
      if (block.type === "text") text += block.text;
    }
    return text;
  }

  supportsStructuredOutput(): boolean {
    return false;
  }

  providerName(): string {
    return "Anthropic Claude";
  }
}

class OpenAIProvider implements OracleProvider {
  private client: OpenAI;

  constructor(apiKey: string, timeoutMs: number) {
    this.client = new OpenAI({ apiKey, maxRetries: 0, timeout: timeoutMs });
  }

  async complete(model: string, request: OracleRequest): Promise<string> {
    const params: ChatCompletionCreateParamsNonStreaming = {
      model,
      max_tokens: MAX_OUTPUT_TOKENS,
      messages: [
        { role: "system", content: request.systemInstruction },
        { role: "user", content: request.userPrompt },
      ],
    };
    if (request.requireStructuredOutput) {
      params.response_format = { type: "json_object" };
    }

    const response = await this.client.chat.completions.create(params);
    return response.choices[0]?.message?.content || "";
  }

  supportsStructuredOutput(): boolean {
    return true;
  }

  providerName(): string {
    return "OpenAI";
  }
}

export interface OracleSettings {
  provider: OracleProviderName;
  apiKey: string;
  /** Overrides the provider's default candidate chain, in priority order */
  models?: readonly string[] | null;
  timeoutMs?: number;
}

export function createOracleProvider(
  provider: OracleProviderName,
  apiKey: string,
  timeoutMs: number = DEFAULT_ORACLE_TIMEOUT_MS
): OracleProvider {
  if (provider === "anthropic") {
    return new AnthropicProvider(apiKey, timeoutMs);
  }
  return new OpenAIProvider(apiKey, timeoutMs);
}

export function resolveModelCandidates(
  provider: OracleProviderName,
  models?: readonly string[] | null
): readonly ModelCandidate[] {
  if (!models || models.length === 0) return DEFAULT_MODEL_CANDIDATES[provider];
  return models.map((model, index): ModelCandidate => ({
    model,
    tier: index === 0 ? "fast" : "general",
  }));
}

export function createOracleClient(settings: OracleSettings): OracleClient {
  const timeoutMs = settings.timeoutMs ?? DEFAULT_ORACLE_TIMEOUT_MS;
  return new OracleClient(
    createOracleProvider(settings.provider, settings.apiKey, timeoutMs),
    resolveModelCandidates(settings.provider, settings.models),
    { timeoutMs, secrets: [settings.apiKey] }
  );
}
