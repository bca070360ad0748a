import type { DataQualitySummary, SalesRecord } from "@/types/sales-data";
import type { PipelineOptions, PipelineResult, ValidationResult } from "@/types/pipeline";
import { cleanWithStats } from "../analytics/cleaner";
import { aggregate } from "../analytics/aggregator";
import {
  DEFAULT_OUTLIER_THRESHOLD,
  findDuplicateGroups,
  findOutliers,
  profileMissingValues,
} from "../analytics/quality";
import { createSalesReport, type SalesReport } from "../report/sales-report";

export interface SalesPipelineRun extends PipelineResult {
  report: SalesReport;
}

/**
 * Run clean → aggregate → report over one batch. Everything is computed
 * before the report is built, so callers never see a partial rollup set.
 */
export function runSalesPipeline(
  records: readonly SalesRecord[],
  options: PipelineOptions = {}
): SalesPipelineRun {
  const startTime = Date.now();
  const warnings = [...(options.warnings ?? [])];
  const malformedCount = options.malformedCount ?? 0;
  const outlierThreshold = options.outlierThreshold ?? DEFAULT_OUTLIER_THRESHOLD;

  if (records.length === 0) {
    console.warn("[sales-pipeline] Empty input batch, rollups will be empty");
    warnings.push("Empty input batch: no records to process");
  }

  // ── Profile raw input ──────────────────────────────────────
  const missingValues = options.missingValues ?? profileMissingValues(records);
  const duplicateGroups = findDuplicateGroups(records);

  // ── Clean ──────────────────────────────────────────────────
  const { records: cleanRecords, rejections, duplicatesRemoved } = cleanWithStats(records);
  const rejected = Object.values(rejections).reduce((a, b) => a + b, 0);
  console.log(
    `[sales-pipeline] Cleaned ${records.length} records → ${cleanRecords.length} ` +
    `(${rejected} rejected, ${duplicatesRemoved} duplicates removed)`
  );
  if (rejected > 0) {
    console.log(`[sales-pipeline] Rejections by reason: ${JSON.stringify(rejections)}`);
  }

  const outliers = findOutliers(cleanRecords, outlierThreshold);
  if (outliers.length > 0) {
    console.log(`[sales-pipeline] ${outliers.length} outlier lines (quantity or price > ${outlierThreshold})`);
  }

  // ── Aggregate ──────────────────────────────────────────────
  const rollups = aggregate(cleanRecords);
  console.log(
    `[sales-pipeline] Rollups: ${rollups.dailyRevenue.length} days, ` +
    `${rollups.countrySummary.length} countries, ${rollups.topCustomersByCountry.length} top-customer rows`
  );

  const quality: DataQualitySummary = {
    inputCount: records.length + malformedCount,
    malformedCount,
    rejections,
    duplicatesRemoved,
    cleanCount: cleanRecords.length,
    missingValues,
    duplicateGroups,
    outliers,
  };

  const validation = validateBatch(quality);
  if (!validation.passed) {
    const failed = validation.checks.filter((c) => c.status === "fail").map((c) => c.name);
    console.warn(`[sales-pipeline] Batch check failed: ${failed.join(", ")}`);
    warnings.push(`Data validation warning: ${failed.join(", ")}`);
  }

  const report = createSalesReport(rollups, quality);

  return {
    success: validation.passed,
    duration: Date.now() - startTime,
    cleanRecords,
    rollups,
    quality,
    warnings,
    validation,
    report,
  };
}

// ── Batch Validation ─────────────────────────────────────────

export function validateBatch(quality: DataQualitySummary): ValidationResult {
  const checks: ValidationResult["checks"] = [
    {
      name: "Input Records",
      count: quality.inputCount,
      status: quality.inputCount > 0 ? "ok" : "warn",
    },
    {
      name: "Malformed Rows",
      count: quality.malformedCount,
      status: quality.malformedCount === 0 ? "ok" : "warn",
    },
    {
      name: "Clean Records",
      count: quality.cleanCount,
      // every record rejected is a failure; an empty batch is not
      status: quality.cleanCount > 0 ? "ok" : quality.inputCount > 0 ? "fail" : "warn",
    },
    {
      name: "Duplicates Removed",
      count: quality.duplicatesRemoved,
      status: "ok",
    },
  ];

  return {
    passed: checks.every((c) => c.status !== "fail"),
    checks,
  };
}
