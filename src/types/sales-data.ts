/**
 * One line of the flat sales table, in ingestion order.
 * `invoiceTimestamp` keeps the raw text so the validator can reject
 * values like "Unknown" that a date parser would otherwise guess at.
 */
export interface SalesRecord {
  invoiceId: string;
  stockCode: string;
  description: string | null;
  quantity: number;
  invoiceTimestamp: string;
  unitPrice: number;
  customerId: string | null;
  country: string | null;
}

export type RejectionReason =
  | "MissingCustomerId"
  | "NonPositiveMeasure"
  | "InvalidTimestamp"
  | "InvalidStockCode";

export const REJECTION_REASONS: readonly RejectionReason[] = [
  "MissingCustomerId",
  "NonPositiveMeasure",
  "InvalidTimestamp",
  "InvalidStockCode",
];

export type Classification = { valid: true } | { valid: false; reason: RejectionReason };

export type RejectionCounts = Record<RejectionReason, number>;

export type SalesTier = "High" | "Medium" | "Low";

// ── Rollup rows ──────────────────────────────────────────────

export interface DailyRevenueRow {
  /** yyyy-MM-dd */
  date: string;
  revenue: number;
}

export interface DayOverDayRow {
  date: string;
  revenue: number;
  previousRevenue: number | null;
  /** null on the first day, and when the previous day's revenue is 0 */
  growthPct: number | null;
}

export interface CumulativeRevenueRow {
  date: string;
  revenue: number;
  cumulativeRevenue: number;
}

export interface MovingAverageRow {
  date: string;
  revenue: number;
  movingAverage: number;
}

export interface CountrySummaryRow {
  country: string;
  totalCustomers: number;
  totalRevenue: number;
  /** Mean line value (quantity × unit price) */
  averageRevenue: number;
  tier: SalesTier;
  rank: number;
}

export interface CountryContributionRow {
  country: string;
  totalRevenue: number;
  contributionPct: number;
}

export interface TopCustomerRow {
  country: string;
  customerId: string;
  totalRevenue: number;
  rank: number;
}

export interface RollupSet {
  dailyRevenue: DailyRevenueRow[];
  dayOverDay: DayOverDayRow[];
  cumulativeRevenue: CumulativeRevenueRow[];
  movingAverage7: MovingAverageRow[];
  countrySummary: CountrySummaryRow[];
  countryContribution: CountryContributionRow[];
  topCustomersByCountry: TopCustomerRow[];
}

// ── Data quality ─────────────────────────────────────────────

export type SalesColumn = keyof SalesRecord;

export type MissingValueCounts = Record<SalesColumn, number>;

export interface DuplicateGroup {
  invoiceId: string;
  stockCode: string;
  customerId: string | null;
  count: number;
}

export interface DataQualitySummary {
  inputCount: number;
  malformedCount: number;
  rejections: RejectionCounts;
  duplicatesRemoved: number;
  cleanCount: number;
  missingValues: MissingValueCounts;
  duplicateGroups: readonly DuplicateGroup[];
  outliers: readonly SalesRecord[];
}
