import { z } from "zod/v4";
import { ConfigurationError } from "@/analysis/errors";
import type { OracleProviderName } from "@/analysis/llm/client";
import {
  DEFAULT_CHAT_HISTORY_TURNS,
  DEFAULT_CHAT_LINE_LIMIT,
  DEFAULT_EXTRACTION_LINE_LIMIT,
  DEFAULT_ORACLE_TIMEOUT_MS,
  DEFAULT_SESSION_TTL_MS,
} from "@/lib/constants";

export interface AppConfig {
  provider: OracleProviderName;
  apiKey: string;
  /** Ordered model candidates; null uses the provider's default chain */
  models: string[] | null;
  oracleTimeoutMs: number;
  extractionLineLimit: number;
  chatLineLimit: number;
  chatHistoryTurns: number;
  sessionTtlMs: number;
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  LLM_PROVIDER: z.enum(["anthropic", "openai"]).optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  ORACLE_MODELS: z.string().optional(),
  ORACLE_TIMEOUT_MS: positiveInt(DEFAULT_ORACLE_TIMEOUT_MS),
  EXTRACTION_LINE_LIMIT: positiveInt(DEFAULT_EXTRACTION_LINE_LIMIT),
  CHAT_LINE_LIMIT: positiveInt(DEFAULT_CHAT_LINE_LIMIT),
  CHAT_HISTORY_TURNS: z.coerce.number().int().nonnegative().default(DEFAULT_CHAT_HISTORY_TURNS),
  SESSION_TTL_MS: positiveInt(DEFAULT_SESSION_TTL_MS),
});

type Env = Record<string, string | undefined>;

/** Blank variables count as unset. */
function presentVariables(env: Env): Record<string, string> {
  const present: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key]?.trim();
    if (value) present[key] = value;
  }
  return present;
}

function resolveCredential(
  provider: OracleProviderName | undefined,
  anthropicKey: string | undefined,
  openaiKey: string | undefined
): { provider: OracleProviderName; apiKey: string } {
  if (provider === "anthropic") {
    if (!anthropicKey) throw new ConfigurationError("LLM_PROVIDER is anthropic but ANTHROPIC_API_KEY is not set");
    return { provider, apiKey: anthropicKey };
  }
  if (provider === "openai") {
    if (!openaiKey) throw new ConfigurationError("LLM_PROVIDER is openai but OPENAI_API_KEY is not set");
    return { provider, apiKey: openaiKey };
  }
  if (anthropicKey) return { provider: "anthropic", apiKey: anthropicKey };
  if (openaiKey) return { provider: "openai", apiKey: openaiKey };
  throw new ConfigurationError(
    "No oracle API key configured. Set ANTHROPIC_API_KEY or OPENAI_API_KEY."
  );
}

/**
 * Read and validate configuration. Errors name the offending variables but
 * never echo their values.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const result = z.safeParse(envSchema, presentVariables(env));
  if (!result.success) {
    const invalid = result.error.issues.map((i) => i.path.join(".")).join(", ");
    throw new ConfigurationError(`Invalid configuration: ${invalid || "check environment variables"}`);
  }

  const data = result.data;
  const { provider, apiKey } = resolveCredential(
    data.LLM_PROVIDER,
    data.ANTHROPIC_API_KEY,
    data.OPENAI_API_KEY
  );

  if (data.CHAT_LINE_LIMIT > data.EXTRACTION_LINE_LIMIT) {
    throw new ConfigurationError(
      "Invalid configuration: CHAT_LINE_LIMIT must not exceed EXTRACTION_LINE_LIMIT"
    );
  }

  const models = data.ORACLE_MODELS
    ? data.ORACLE_MODELS.split(",").map((m) => m.trim()).filter(Boolean)
    : [];

  return {
    provider,
    apiKey,
    models: models.length > 0 ? models : null,
    oracleTimeoutMs: data.ORACLE_TIMEOUT_MS,
    extractionLineLimit: data.EXTRACTION_LINE_LIMIT,
    chatLineLimit: data.CHAT_LINE_LIMIT,
    chatHistoryTurns: data.CHAT_HISTORY_TURNS,
    sessionTtlMs: data.SESSION_TTL_MS,
  };
}

let cachedConfig: AppConfig | null = null;
let failureReported = false;

/** Configuration resolved once per process; a failure is logged only the first time. */
export function getConfig(): AppConfig {
  if (cachedConfig) return cachedConfig;
  try {
    cachedConfig = loadConfig();
    return cachedConfig;
  } catch (error) {
    if (!failureReported && error instanceof ConfigurationError) {
      console.error(`[Config] ${error.message}`);
      failureReported = true;
    }
    throw error;
  }
}
