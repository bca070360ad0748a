import { describe, it, expect } from "vitest";
import { formatCurrency, formatPercent, renderReport } from "@/lib/report/formatters";
import { runSalesPipeline } from "@/lib/pipeline/sales-pipeline";
import { makeRecord } from "./helpers";

describe("formatCurrency", () => {
  it("groups thousands and keeps two decimals", () => {
    expect(formatCurrency(24140.42)).toBe("24,140.42");
    expect(formatCurrency(1234567)).toBe("1,234,567.00");
    expect(formatCurrency(-5.5)).toBe("-5.50");
  });
});

describe("formatPercent", () => {
  it("prints n/a for a missing growth value", () => {
    expect(formatPercent(null)).toBe("n/a");
    expect(formatPercent(66.67)).toBe("66.67%");
  });
});

describe("renderReport", () => {
  it("prints one line per day and per country", () => {
    const { report } = runSalesPipeline([
      makeRecord({ invoiceTimestamp: "2024-01-01 10:00:00", quantity: 2, unitPrice: 10, country: "UK" }),
      makeRecord({ invoiceId: "2", invoiceTimestamp: "2024-01-02 10:00:00", quantity: 3, unitPrice: 10, country: "UK" }),
    ]);
    const lines = renderReport(report, 5);
    expect(lines).toContain("  2024-01-01  20.00  DoD n/a  cum 20.00  7d avg 20.00");
    expect(lines).toContain("  2024-01-02  30.00  DoD 50.00%  cum 50.00  7d avg 25.00");
    expect(lines).toContain("  #1 UK: 50.00 (Low), 1 customers, avg line 25.00");
    expect(lines).toContain("=== Top 5 Countries ===");
    expect(lines).toContain("  UK: 50.00 (100.00%)");
    expect(lines).toContain("  Rejected (InvalidStockCode): 0");
  });
});
