import type {
  CountryContributionRow,
  CountrySummaryRow,
  CumulativeRevenueRow,
  DailyRevenueRow,
  DataQualitySummary,
  DayOverDayRow,
  MovingAverageRow,
  RollupSet,
  TopCustomerRow,
} from "@/types/sales-data";

export interface SalesReport {
  readonly dailyRevenue: readonly Readonly<DailyRevenueRow>[];
  readonly dayOverDay: readonly Readonly<DayOverDayRow>[];
  readonly cumulativeRevenue: readonly Readonly<CumulativeRevenueRow>[];
  readonly movingAverage7: readonly Readonly<MovingAverageRow>[];
  readonly countrySummary: readonly Readonly<CountrySummaryRow>[];
  readonly countryContribution: readonly Readonly<CountryContributionRow>[];
  readonly topCustomersByCountry: readonly Readonly<TopCustomerRow>[];
  readonly dataQuality: Readonly<DataQualitySummary>;
  /**
   * Single-country lookup on the trimmed name. An exact match wins; otherwise
   * a case-insensitive match, if only one country has that spelling.
   */
  countrySales(countryName: string): Readonly<CountrySummaryRow> | undefined;
  /** Highest-revenue countries with their share of the total */
  topCountries(limit?: number): readonly Readonly<CountryContributionRow>[];
}

function freezeRows<T extends object>(rows: readonly T[]): readonly Readonly<T>[] {
  return Object.freeze(rows.map((row) => Object.freeze({ ...row })));
}

export function createSalesReport(rollups: RollupSet, quality: DataQualitySummary): SalesReport {
  const countrySummary = freezeRows(rollups.countrySummary);
  const countryContribution = freezeRows(rollups.countryContribution);

  const byName = new Map<string, Readonly<CountrySummaryRow>>();
  const byFoldedName = new Map<string, Readonly<CountrySummaryRow>[]>();
  for (const row of countrySummary) {
    byName.set(row.country, row);
    const folded = row.country.trim().toLowerCase();
    byFoldedName.set(folded, [...(byFoldedName.get(folded) ?? []), row]);
  }

  const dataQuality: Readonly<DataQualitySummary> = Object.freeze({
    ...quality,
    rejections: Object.freeze({ ...quality.rejections }),
    missingValues: Object.freeze({ ...quality.missingValues }),
    duplicateGroups: freezeRows(quality.duplicateGroups),
    outliers: freezeRows(quality.outliers),
  });

  return Object.freeze({
    dailyRevenue: freezeRows(rollups.dailyRevenue),
    dayOverDay: freezeRows(rollups.dayOverDay),
    cumulativeRevenue: freezeRows(rollups.cumulativeRevenue),
    movingAverage7: freezeRows(rollups.movingAverage7),
    countrySummary,
    countryContribution,
    topCustomersByCountry: freezeRows(rollups.topCustomersByCountry),
    dataQuality,
    countrySales(countryName: string) {
      const name = countryName.trim();
      const exact = byName.get(name);
      if (exact) return exact;
      // case-folded match only when it is unambiguous
      const candidates = byFoldedName.get(name.toLowerCase()) ?? [];
      return candidates.length === 1 ? candidates[0] : undefined;
    },
    topCountries(limit = 10) {
      return countryContribution.slice(0, Math.max(0, limit));
    },
  });
}
