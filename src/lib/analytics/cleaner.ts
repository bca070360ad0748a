import type { RejectionCounts, SalesRecord } from "@/types/sales-data";
import { classifyRecord } from "./validator";
import { parseTimestamp } from "./date-utils";

export interface CleanResult {
  records: SalesRecord[];
  rejections: RejectionCounts;
  duplicatesRemoved: number;
}

export function emptyRejectionCounts(): RejectionCounts {
  return {
    MissingCustomerId: 0,
    NonPositiveMeasure: 0,
    InvalidTimestamp: 0,
    InvalidStockCode: 0,
  };
}

/**
 * Duplicate key: invoice, stock code, customer, timestamp, quantity.
 * The timestamp part is the parsed instant so "2024-01-01 10:00" and
 * "2024-01-01T10:00:00" collide.
 */
export function duplicateKey(record: SalesRecord): string {
  const ts = parseTimestamp(record.invoiceTimestamp);
  return JSON.stringify([
    record.invoiceId,
    record.stockCode,
    record.customerId,
    ts ? ts.getTime() : record.invoiceTimestamp,
    record.quantity,
  ]);
}

/**
 * Drop invalid records, then collapse duplicates keeping the first
 * occurrence. Survivors keep their input order.
 */
export function cleanWithStats(records: readonly SalesRecord[]): CleanResult {
  const rejections = emptyRejectionCounts();
  const seen = new Set<string>();
  const kept: SalesRecord[] = [];
  let duplicatesRemoved = 0;

  for (const record of records) {
    const verdict = classifyRecord(record);
    if (!verdict.valid) {
      rejections[verdict.reason]++;
      continue;
    }

    const key = duplicateKey(record);
    if (seen.has(key)) {
      duplicatesRemoved++;
      continue;
    }
    seen.add(key);
    kept.push(record);
  }

  return { records: kept, rejections, duplicatesRemoved };
}

export function cleanRecords(records: readonly SalesRecord[]): SalesRecord[] {
  return cleanWithStats(records).records;
}
