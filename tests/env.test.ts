import { describe, it, expect, afterEach } from "vitest";
import { getEnv, resetEnv } from "@/lib/config/env";

const KEYS = ["DATABASE_PATH", "OUTLIER_THRESHOLD", "TOP_COUNTRIES_LIMIT", "SALES_CSV_PATH"] as const;
const saved = Object.fromEntries(KEYS.map((k) => [k, process.env[k]]));

afterEach(() => {
  for (const k of KEYS) {
    const value = saved[k];
    if (value === undefined) delete process.env[k];
    else process.env[k] = value;
  }
  resetEnv();
});

describe("getEnv", () => {
  it("fills in defaults", () => {
    for (const k of KEYS) delete process.env[k];
    resetEnv();
    const env = getEnv();
    expect(env.DATABASE_PATH).toBe("data/sales-analytics.db");
    expect(env.OUTLIER_THRESHOLD).toBe(10000);
    expect(env.TOP_COUNTRIES_LIMIT).toBe(10);
    expect(env.SALES_CSV_PATH).toBeUndefined();
  });

  it("coerces numeric settings", () => {
    process.env.OUTLIER_THRESHOLD = "2500";
    process.env.TOP_COUNTRIES_LIMIT = "5";
    resetEnv();
    expect(getEnv().OUTLIER_THRESHOLD).toBe(2500);
    expect(getEnv().TOP_COUNTRIES_LIMIT).toBe(5);
  });

  it("rejects a non-positive outlier threshold", () => {
    process.env.OUTLIER_THRESHOLD = "-1";
    resetEnv();
    expect(() => getEnv()).toThrow("OUTLIER_THRESHOLD must be a positive number");
  });
});
