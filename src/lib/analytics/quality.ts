import type {
  DuplicateGroup,
  MissingValueCounts,
  SalesRecord,
} from "@/types/sales-data";

export const DEFAULT_OUTLIER_THRESHOLD = 10000;

function isMissing(value: string | number | null): boolean {
  if (value === null) return true;
  if (typeof value === "string") return value.trim() === "";
  return Number.isNaN(value);
}

/**
 * Null or blank values per column over records handed in directly. The CSV
 * loader counts on its raw rows instead, where rows it rejects still count.
 */
export function profileMissingValues(records: readonly SalesRecord[]): MissingValueCounts {
  const counts: MissingValueCounts = {
    invoiceId: 0,
    stockCode: 0,
    description: 0,
    quantity: 0,
    invoiceTimestamp: 0,
    unitPrice: 0,
    customerId: 0,
    country: 0,
  };

  for (const r of records) {
    if (isMissing(r.invoiceId)) counts.invoiceId++;
    if (isMissing(r.stockCode)) counts.stockCode++;
    if (isMissing(r.description)) counts.description++;
    if (isMissing(r.quantity)) counts.quantity++;
    if (isMissing(r.invoiceTimestamp)) counts.invoiceTimestamp++;
    if (isMissing(r.unitPrice)) counts.unitPrice++;
    if (isMissing(r.customerId)) counts.customerId++;
    if (isMissing(r.country)) counts.country++;
  }

  return counts;
}

/** Lines with an unusually large quantity or unit price. Reported only. */
export function findOutliers(
  records: readonly SalesRecord[],
  threshold = DEFAULT_OUTLIER_THRESHOLD
): SalesRecord[] {
  return records.filter((r) => r.quantity > threshold || r.unitPrice > threshold);
}

/**
 * Invoice lines sharing invoice, stock code and customer. This is a looser
 * key than the one used for removal, so a group here may hold lines that
 * differ in time or quantity and all survive cleaning.
 */
export function findDuplicateGroups(records: readonly SalesRecord[]): DuplicateGroup[] {
  const groups = new Map<string, DuplicateGroup>();

  for (const r of records) {
    const key = JSON.stringify([r.invoiceId, r.stockCode, r.customerId]);
    const group = groups.get(key);
    if (group) {
      group.count++;
    } else {
      groups.set(key, { invoiceId: r.invoiceId, stockCode: r.stockCode, customerId: r.customerId, count: 1 });
    }
  }

  return Array.from(groups.values()).filter((g) => g.count > 1);
}
