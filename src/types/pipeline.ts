import type { DataQualitySummary, MissingValueCounts, RollupSet, SalesRecord } from "./sales-data";

export interface ValidationCheck {
  name: string;
  count: number;
  status: "ok" | "warn" | "fail";
}

export interface ValidationResult {
  passed: boolean;
  checks: ValidationCheck[];
}

export interface PipelineOptions {
  /** Rows the loader could not parse; folded into the data-quality summary */
  malformedCount?: number;
  /** Missing cells counted by the loader on raw rows; profiled from the records when absent */
  missingValues?: MissingValueCounts;
  /** Warnings carried over from the loader */
  warnings?: string[];
  outlierThreshold?: number;
}

export interface PipelineResult {
  /** False when a batch check failed, e.g. every record was rejected */
  success: boolean;
  duration: number;
  cleanRecords: readonly SalesRecord[];
  rollups: RollupSet;
  quality: DataQualitySummary;
  warnings: string[];
  validation: ValidationResult;
}
