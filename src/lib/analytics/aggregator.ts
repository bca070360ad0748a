import type { RollupSet, SalesRecord } from "@/types/sales-data";
import {
  computeCumulativeRevenue,
  computeDailyRevenue,
  computeDayOverDay,
  computeMovingAverage,
} from "./daily-revenue";
import {
  computeCountryContribution,
  computeCountrySummary,
  computeTopCustomersByCountry,
} from "./country-sales";

/**
 * Build every rollup from cleaned records. Inputs are only read; each
 * rollup is a fresh array.
 */
export function aggregate(cleanRecords: readonly SalesRecord[]): RollupSet {
  const dailyRevenue = computeDailyRevenue(cleanRecords);

  return {
    dailyRevenue,
    dayOverDay: computeDayOverDay(dailyRevenue),
    cumulativeRevenue: computeCumulativeRevenue(dailyRevenue),
    movingAverage7: computeMovingAverage(dailyRevenue),
    countrySummary: computeCountrySummary(cleanRecords),
    countryContribution: computeCountryContribution(cleanRecords),
    topCustomersByCountry: computeTopCustomersByCountry(cleanRecords),
  };
}
