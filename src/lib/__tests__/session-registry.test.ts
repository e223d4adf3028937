import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { SessionRegistry } from "../session-registry";
import { AnalysisSession } from "@/analysis/pipeline";
import { ScriptedOracle } from "@/analysis/__tests__/helpers";

describe("SessionRegistry", () => {
  let registry: SessionRegistry;
  const create = vi.fn(() => new AnalysisSession({ oracle: new ScriptedOracle(() => "{}") }));

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    create.mockClear();
    registry = new SessionRegistry(create, 1_000);
  });

  afterEach(() => {
    registry.destroy();
    vi.restoreAllMocks();
  });

  it("creates a session on first use and reuses it", () => {
    const first = registry.get("s1");
    const again = registry.get("s1");

    expect(again).toBe(first);
    expect(create).toHaveBeenCalledTimes(1);
    expect(registry.size()).toBe(1);
  });

  it("find does not create sessions", () => {
    expect(registry.find("missing")).toBeNull();
    expect(registry.size()).toBe(0);
  });

  it("end resets and removes the session", () => {
    const session = registry.get("s1");
    const reset = vi.spyOn(session, "reset");

    expect(registry.end("s1")).toBe(true);
    expect(reset).toHaveBeenCalledTimes(1);
    expect(registry.find("s1")).toBeNull();
    expect(registry.end("s1")).toBe(false);
  });

  it("expires sessions idle for the TTL", () => {
    registry.get("idle");
    const later = Date.now() + 1_000;

    expect(registry.expireIdle(later)).toBe(1);
    expect(registry.size()).toBe(0);
  });

  it("keeps sessions used within the TTL", () => {
    registry.get("busy");

    expect(registry.expireIdle(Date.now() + 500)).toBe(0);
    expect(registry.find("busy")).not.toBeNull();
  });
});
