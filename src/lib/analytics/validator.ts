import type { Classification, SalesRecord } from "@/types/sales-data";
import { isValidTimestamp } from "./date-utils";

const ALL_ALPHA = /^[A-Za-z]+$/;

/** Letter-only stock codes ("POST", "DOT", "M") are postage and fee lines, not products. */
export function isAllAlpha(stockCode: string): boolean {
  return ALL_ALPHA.test(stockCode);
}

/**
 * Classify a record against the cleaning rules. First failing rule wins:
 * customer → measures → timestamp → stock code.
 */
export function classifyRecord(record: SalesRecord): Classification {
  if (record.customerId === null || record.customerId.trim() === "") {
    return { valid: false, reason: "MissingCustomerId" };
  }

  const { quantity, unitPrice } = record;
  if (!Number.isFinite(quantity) || !Number.isFinite(unitPrice) || quantity <= 0 || unitPrice <= 0) {
    return { valid: false, reason: "NonPositiveMeasure" };
  }

  if (!isValidTimestamp(record.invoiceTimestamp)) {
    return { valid: false, reason: "InvalidTimestamp" };
  }

  if (isAllAlpha(record.stockCode)) {
    return { valid: false, reason: "InvalidStockCode" };
  }

  return { valid: true };
}
