import type { SalesRecord } from "@/types/sales-data";

export function makeRecord(overrides: Partial<SalesRecord> = {}): SalesRecord {
  return {
    invoiceId: "536365",
    stockCode: "85123A",
    description: "WHITE HANGING HEART T-LIGHT HOLDER",
    quantity: 1,
    invoiceTimestamp: "2024-01-01 09:00:00",
    unitPrice: 1,
    customerId: "17850",
    country: "United Kingdom",
    ...overrides,
  };
}

/** One line per day with the given revenue (quantity 1 × price). */
export function dailySales(days: [string, number][], country = "United Kingdom"): SalesRecord[] {
  return days.map(([date, revenue], i) =>
    makeRecord({
      invoiceId: `INV${i + 1}`,
      invoiceTimestamp: `${date} 10:00:00`,
      unitPrice: revenue,
      country,
    })
  );
}
