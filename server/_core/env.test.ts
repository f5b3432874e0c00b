import { describe, expect, it } from "vitest";
import { parseEnv } from "./env";

describe("parseEnv", () => {
  it("fills defaults for an empty environment", () => {
    const env = parseEnv({});
    expect(env.BASE_CURRENCY).toBe("BRL");
    expect(env.FETCH_BATCH_DAYS).toBe(100);
    expect(env.MANAGEMENT_FEE_RATE).toBe(0.02);
    expect(env.MANAGEMENT_FEE_BASIS).toBe("nav_end");
    expect(env.OVERSELL_POLICY).toBe("reject");
    expect(env.BENCHMARK_SYMBOL).toBe("^BVSP");
    expect(env.DATABASE_URL).toBeUndefined();
  });

  it("coerces numeric variables", () => {
    const env = parseEnv({ FETCH_BATCH_DAYS: "30", PERFORMANCE_FEE_RATE: "0.15" });
    expect(env.FETCH_BATCH_DAYS).toBe(30);
    expect(env.PERFORMANCE_FEE_RATE).toBe(0.15);
  });

  it("names the offending variable", () => {
    expect(() => parseEnv({ OVERSELL_POLICY: "maybe" })).toThrow("[Env] Invalid configuration: OVERSELL_POLICY");
    expect(() => parseEnv({ RISK_FREE_RATE: "abc" })).toThrow("RISK_FREE_RATE");
  });
});
