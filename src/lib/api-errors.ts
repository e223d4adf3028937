import { NextResponse } from "next/server";
import { isAnalysisError, type AnalysisErrorCode } from "@/analysis/errors";

const STATUS_BY_CODE: Record<AnalysisErrorCode, number> = {
  CONFIGURATION: 503,
  ORACLE_UNAVAILABLE: 502,
  MALFORMED_OUTPUT: 502,
  CHAT_FAILURE: 502,
};

const RETRYABLE: ReadonlySet<AnalysisErrorCode> = new Set(["ORACLE_UNAVAILABLE", "MALFORMED_OUTPUT"]);

/**
 * Map a pipeline failure to a JSON response. Typed errors keep their
 * (already redacted) message; anything else becomes a generic 500.
 */
export function errorResponse(error: unknown, tag: string): NextResponse {
  if (isAnalysisError(error)) {
    console.error(`[${tag}] ${error.name}: ${error.message}`);
    return NextResponse.json(
      { error: error.message, code: error.code, retryable: RETRYABLE.has(error.code) },
      { status: STATUS_BY_CODE[error.code] }
    );
  }

  console.error(`[${tag}] Unexpected error:`, error);
  return NextResponse.json({ error: "Internal server error" }, { status: 500 });
}

export function tooManyRequests(message: string, retryAfterMs: number): NextResponse {
  return NextResponse.json(
    { error: message },
    { status: 429, headers: { "Retry-After": String(Math.ceil(retryAfterMs / 1000)) } }
  );
}
