import { describe, it, expect } from "vitest";
import path from "path";
import { parseSalesFile } from "@/lib/parser/csv-parser";
import { runSalesPipeline } from "@/lib/pipeline/sales-pipeline";
import { cleanRecords } from "@/lib/analytics/cleaner";
import { makeRecord } from "./helpers";

const FIXTURE = path.join(__dirname, "fixtures", "sales-sample.csv");

function runFixture() {
  const { data, malformedCount, missingValues, warnings } = parseSalesFile(FIXTURE);
  return runSalesPipeline(data, { malformedCount, missingValues, warnings });
}

describe("runSalesPipeline", () => {
  it("accounts for every input row", () => {
    const { quality } = runFixture();
    expect(quality.inputCount).toBe(12);
    expect(quality.malformedCount).toBe(1);
    expect(quality.rejections).toEqual({
      MissingCustomerId: 1,
      NonPositiveMeasure: 1,
      InvalidTimestamp: 1,
      InvalidStockCode: 1,
    });
    expect(quality.duplicatesRemoved).toBe(1);
    expect(quality.cleanCount).toBe(6);
  });

  it("reports the loader's missing-value counts", () => {
    const { quality } = runFixture();
    expect(quality.missingValues).toEqual({
      invoiceId: 0,
      stockCode: 0,
      description: 0,
      quantity: 0,
      invoiceTimestamp: 0,
      unitPrice: 0,
      customerId: 1,
      country: 1,
    });
  });

  it("profiles missing values from the records when the loader gave none", () => {
    const result = runSalesPipeline([makeRecord({ description: null }), makeRecord({ invoiceId: "2" })]);
    expect(result.quality.missingValues.description).toBe(1);
    expect(result.quality.missingValues.customerId).toBe(0);
  });

  it("carries loader warnings through", () => {
    const result = runFixture();
    expect(result.warnings).toEqual(['Row 11: quantity: "twelve" is not an integer']);
    expect(result.validation.passed).toBe(true);
  });

  it("computes the daily series over present days", () => {
    const { report } = runFixture();
    expect(report.dailyRevenue).toEqual([
      { date: "2024-01-01", revenue: 46.74 },
      { date: "2024-01-02", revenue: 54.08 },
      { date: "2024-01-04", revenue: 39.6 },
      { date: "2024-01-05", revenue: 24000 },
    ]);
    expect(report.dayOverDay.map((d) => d.growthPct)).toEqual([null, 15.7, -26.78, 60506.06]);
    expect(report.cumulativeRevenue.map((d) => d.cumulativeRevenue)).toEqual([46.74, 100.82, 140.42, 24140.42]);
    expect(report.movingAverage7[0].movingAverage).toBe(46.74);
  });

  it("ranks countries and leaves out lines without a country", () => {
    const { report } = runFixture();
    expect(report.countrySummary.map((c) => [c.country, c.rank, c.totalRevenue])).toEqual([
      ["France", 1, 54.08],
      ["United Kingdom", 2, 46.74],
      ["Germany", 3, 39.6],
    ]);
    expect(report.countryContribution.map((c) => c.contributionPct)).toEqual([38.51, 33.29, 28.2]);
    expect(report.countrySales("United Kingdom")?.averageRevenue).toBe(15.58);
  });

  it("returns the cleaned records", () => {
    const { data } = parseSalesFile(FIXTURE);
    const result = runSalesPipeline(data);
    expect(result.cleanRecords).toEqual(cleanRecords(data));
  });

  it("handles an empty batch without failing", () => {
    const result = runSalesPipeline([]);
    expect(result.success).toBe(true);
    expect(result.report.dailyRevenue).toEqual([]);
    expect(result.report.countrySummary).toEqual([]);
    expect(result.report.countrySales("France")).toBeUndefined();
    expect(result.warnings).toEqual(["Empty input batch: no records to process"]);
    expect(result.validation.passed).toBe(true);
  });

  it("flags a batch where every record was rejected", () => {
    const result = runSalesPipeline([makeRecord({ customerId: null })]);
    expect(result.quality.cleanCount).toBe(0);
    expect(result.validation.passed).toBe(false);
    expect(result.success).toBe(false);
    expect(result.warnings).toEqual(["Data validation warning: Clean Records"]);
  });

  it("uses the configured outlier threshold", () => {
    const { data } = parseSalesFile(FIXTURE);
    expect(runSalesPipeline(data).quality.outliers).toEqual([]);
    const flagged = runSalesPipeline(data, { outlierThreshold: 1000 }).quality.outliers;
    expect(flagged.map((r) => r.invoiceId)).toEqual(["536374"]);
  });
});
