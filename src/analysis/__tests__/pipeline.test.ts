import { describe, it, expect, vi, beforeEach } from "vitest";
import { AnalysisSession, runExtraction } from "../pipeline";
import { MalformedOutputError, OracleUnavailableError } from "../errors";
import { OUT_OF_CONTEXT_REPLY, SYSTEM_PROMPT } from "../llm/prompt";
import {
  SAMPLE_DOCUMENT,
  ScriptedOracle,
  excerptOf,
  localAnalystOracle,
} from "./helpers";

// ── Helpers ──────────────────────────────────────────────
const encoder = new TextEncoder();

function upload(name: string, content: string) {
  return { name, bytes: encoder.encode(content) };
}

function sampleOracle() {
  return new ScriptedOracle((call) =>
    call.systemInstruction === SYSTEM_PROMPT ? JSON.stringify(SAMPLE_DOCUMENT) : "An answer."
  );
}

// ── Tests ────────────────────────────────────────────────
describe("runExtraction", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("sends a structured extraction request and normalizes the reply", async () => {
    const oracle = sampleOracle();

    const report = await runExtraction(oracle, excerptOf(["line"]));

    expect(oracle.calls[0].requireStructuredOutput).toBe(true);
    expect(report.summary.totalThreats).toBe(1);
    expect(report.findings[0].attackType).toBe("Brute Force");
  });

  it("propagates malformed output", async () => {
    const oracle = new ScriptedOracle(() => "I am unable to help with that.");

    await expect(runExtraction(oracle, excerptOf(["line"]))).rejects.toThrow(MalformedOutputError);
  });
});

describe("AnalysisSession", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("extracts once per file and serves repeats from the cache", async () => {
    const oracle = sampleOracle();
    const session = new AnalysisSession({ oracle });

    const first = await session.analyze(upload("access.log", "a\nb\n"));
    const second = await session.analyze(upload("access.log", "a\nb\n"));

    expect(oracle.calls).toHaveLength(1);
    expect(first.cached).toBe(false);
    expect(second.cached).toBe(true);
    expect(second.report).toBe(first.report);
  });

  it("re-extracts a same-named file with different content", async () => {
    const oracle = sampleOracle();
    const session = new AnalysisSession({ oracle });

    const first = await session.analyze(upload("access.log", "a\n"));
    const second = await session.analyze(upload("access.log", "b\n"));

    expect(oracle.calls).toHaveLength(2);
    expect(second.identity.fingerprint).not.toBe(first.identity.fingerprint);
  });

  it("clears the investigation history when a new file is analyzed", async () => {
    const session = new AnalysisSession({ oracle: sampleOracle() });

    await session.analyze(upload("first.log", "a\n"));
    await session.ask("What happened?");
    expect(session.history()).toHaveLength(2);

    await session.analyze(upload("second.log", "b\n"));
    expect(session.history()).toEqual([]);
  });

  it("keeps nothing after an oracle failure and succeeds on retry", async () => {
    let fail = true;
    const oracle = new ScriptedOracle(() => {
      if (fail) throw new OracleUnavailableError("Oracle request failed: timeout");
      return JSON.stringify(SAMPLE_DOCUMENT);
    });
    const session = new AnalysisSession({ oracle });

    await expect(session.analyze(upload("access.log", "a\n"))).rejects.toThrow(OracleUnavailableError);
    expect(session.current()).toBeNull();
    expect(await session.ask("anything?")).toBeNull();

    fail = false;
    const outcome = await session.analyze(upload("access.log", "a\n"));
    expect(outcome.cached).toBe(false);
    expect(session.current()?.report).toBe(outcome.report);
  });

  it("stores no report when the oracle output is malformed", async () => {
    const session = new AnalysisSession({ oracle: new ScriptedOracle(() => "no json here") });

    await expect(session.analyze(upload("access.log", "a\n"))).rejects.toThrow(MalformedOutputError);
    expect(session.current()).toBeNull();
  });

  it("bounds extraction and chat context separately", async () => {
    const oracle = sampleOracle();
    const session = new AnalysisSession({ oracle, extractionLineLimit: 4, chatLineLimit: 2 });
    const content = ["l1", "l2", "l3", "l4", "l5"].join("\n");

    await session.analyze(upload("access.log", content));
    await session.ask("What is on line l2?");

    expect(oracle.calls[0].userPrompt).toContain("l4");
    expect(oracle.calls[0].userPrompt).not.toContain("l5");
    expect(oracle.calls[1].userPrompt).toContain("---\nl1\nl2\n---");
  });

  it("decodes invalid UTF-8 with replacement characters", async () => {
    const session = new AnalysisSession({ oracle: sampleOracle() });

    const outcome = await session.analyze({ name: "binary.log", bytes: new Uint8Array([0x61, 0xff, 0x0a]) });

    expect(outcome.lossyDecoding).toBe(true);
  });

  it("ask returns null before any report exists", async () => {
    const oracle = sampleOracle();
    const session = new AnalysisSession({ oracle });

    expect(await session.ask("hello?")).toBeNull();
    expect(oracle.calls).toHaveLength(0);
  });

  it("reset drops the report and history", async () => {
    const session = new AnalysisSession({ oracle: sampleOracle() });
    await session.analyze(upload("access.log", "a\n"));
    await session.ask("q");

    session.reset();

    expect(session.current()).toBeNull();
    expect(session.history()).toEqual([]);
  });
});

describe("end-to-end with an in-process analyst", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  const bruteForceLog = Array(50).fill("10.0.0.5 - - POST /login (failed)").join("\n");

  it("classifies a burst of failed logins as brute force", async () => {
    const session = new AnalysisSession({ oracle: localAnalystOracle() });

    const { report } = await session.analyze(upload("auth.log", bruteForceLog));

    expect(report.findings.length).toBeGreaterThan(0);
    expect(report.summary.totalThreats).toBeGreaterThanOrEqual(1);
    expect(report.findings[0]).toMatchObject({ attackerIp: "10.0.0.5", attackType: "Brute Force" });
    expect(report.summary.mostActiveIp).toBe("10.0.0.5");
  });

  it("answers questions grounded in the log", async () => {
    const session = new AnalysisSession({ oracle: localAnalystOracle() });
    await session.analyze(upload("auth.log", bruteForceLog));

    expect(await session.ask("How often does 10.0.0.5 appear?")).toBe("10.0.0.5 appears in 50 log lines.");
  });

  it("declines questions the log cannot answer", async () => {
    const session = new AnalysisSession({ oracle: localAnalystOracle() });
    await session.analyze(upload("auth.log", bruteForceLog));

    const answer = await session.ask("What is the capital of France?");

    expect(answer).toBe(OUT_OF_CONTEXT_REPLY);
    expect(answer).not.toMatch(/paris/i);
  });
});
