import { describe, it, expect } from "vitest";
import { findDuplicateGroups, findOutliers, profileMissingValues } from "@/lib/analytics/quality";
import { makeRecord } from "./helpers";

describe("profileMissingValues", () => {
  it("counts null and blank values per column", () => {
    const counts = profileMissingValues([
      makeRecord({ description: null, customerId: null }),
      makeRecord({ customerId: "", country: null, invoiceTimestamp: "" }),
      makeRecord(),
    ]);
    expect(counts).toEqual({
      invoiceId: 0,
      stockCode: 0,
      description: 1,
      quantity: 0,
      invoiceTimestamp: 1,
      unitPrice: 0,
      customerId: 2,
      country: 1,
    });
  });
});

describe("findOutliers", () => {
  it("flags large quantities or prices above the threshold", () => {
    const big = makeRecord({ invoiceId: "big", quantity: 80995 });
    const pricey = makeRecord({ invoiceId: "pricey", unitPrice: 13541.33 });
    const edge = makeRecord({ invoiceId: "edge", quantity: 10000 });
    expect(findOutliers([big, pricey, edge, makeRecord()])).toEqual([big, pricey]);
    expect(findOutliers([big, pricey, edge], 50000)).toEqual([big]);
  });
});

describe("findDuplicateGroups", () => {
  it("groups lines by invoice, stock code and customer", () => {
    const groups = findDuplicateGroups([
      makeRecord({ invoiceId: "1", stockCode: "A1", quantity: 1 }),
      makeRecord({ invoiceId: "1", stockCode: "A1", quantity: 5 }),
      makeRecord({ invoiceId: "1", stockCode: "B2" }),
      makeRecord({ invoiceId: "1", stockCode: "A1", quantity: 1 }),
    ]);
    expect(groups).toEqual([{ invoiceId: "1", stockCode: "A1", customerId: "17850", count: 3 }]);
  });
});
