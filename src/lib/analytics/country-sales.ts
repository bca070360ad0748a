import type {
  CountryContributionRow,
  CountrySummaryRow,
  SalesRecord,
  SalesTier,
  TopCustomerRow,
} from "@/types/sales-data";
import { fromCents, lineCents, roundHalfUp } from "./money";
import { denseRankDesc } from "./ranking";

export const HIGH_TIER_THRESHOLD = 10000;
export const MEDIUM_TIER_THRESHOLD = 5000;
export const TOP_CUSTOMER_RANKS = 3;

interface CountryBucket {
  country: string;
  cents: number;
  lines: number;
  customers: Map<string, number>;
}

/** Records without a country are left out of every country rollup. */
function countryBuckets(records: readonly SalesRecord[]): CountryBucket[] {
  const buckets = new Map<string, CountryBucket>();

  for (const r of records) {
    if (r.country === null || r.country.trim() === "") continue;
    let bucket = buckets.get(r.country);
    if (!bucket) {
      bucket = { country: r.country, cents: 0, lines: 0, customers: new Map() };
      buckets.set(r.country, bucket);
    }
    const cents = lineCents(r.quantity, r.unitPrice);
    bucket.cents += cents;
    bucket.lines++;
    const customer = r.customerId ?? "";
    bucket.customers.set(customer, (bucket.customers.get(customer) ?? 0) + cents);
  }

  return Array.from(buckets.values());
}

export function salesTier(totalRevenue: number): SalesTier {
  if (totalRevenue > HIGH_TIER_THRESHOLD) return "High";
  if (totalRevenue >= MEDIUM_TIER_THRESHOLD) return "Medium";
  return "Low";
}

const byCountry = (a: { country: string }, b: { country: string }) => a.country.localeCompare(b.country);

export function computeCountrySummary(records: readonly SalesRecord[]): CountrySummaryRow[] {
  const buckets = countryBuckets(records);

  return denseRankDesc(buckets, (b) => b.cents, byCountry).map(({ row, rank }) => {
    const totalRevenue = fromCents(row.cents);
    return {
      country: row.country,
      totalCustomers: row.customers.size,
      totalRevenue,
      averageRevenue: roundHalfUp(row.cents / row.lines / 100),
      tier: salesTier(totalRevenue),
      rank,
    };
  });
}

/** Share of the grand total across all countries, largest first. */
export function computeCountryContribution(records: readonly SalesRecord[]): CountryContributionRow[] {
  const buckets = countryBuckets(records);
  const grandCents = buckets.reduce((sum, b) => sum + b.cents, 0);

  return [...buckets]
    .sort((a, b) => b.cents - a.cents || byCountry(a, b))
    .map((b) => ({
      country: b.country,
      totalRevenue: fromCents(b.cents),
      contributionPct: grandCents === 0 ? 0 : roundHalfUp((b.cents / grandCents) * 100),
    }));
}

/**
 * Dense-ranked customers per country, ranks 1..3. Ties keep every tied
 * customer, so a country can return more than three rows.
 */
export function computeTopCustomersByCountry(
  records: readonly SalesRecord[],
  maxRank = TOP_CUSTOMER_RANKS
): TopCustomerRow[] {
  const rows: TopCustomerRow[] = [];

  const buckets = countryBuckets(records).sort(byCountry);
  for (const bucket of buckets) {
    const customers = Array.from(bucket.customers.entries()).map(([customerId, cents]) => ({
      customerId,
      cents,
    }));
    const ranked = denseRankDesc(customers, (c) => c.cents, (a, b) => a.customerId.localeCompare(b.customerId));
    for (const { row, rank } of ranked) {
      if (rank > maxRank) break;
      rows.push({
        country: bucket.country,
        customerId: row.customerId,
        totalRevenue: fromCents(row.cents),
        rank,
      });
    }
  }

  return rows;
}
