import type {
  CumulativeRevenueRow,
  DailyRevenueRow,
  DayOverDayRow,
  MovingAverageRow,
  SalesRecord,
} from "@/types/sales-data";
import { parseTimestamp, getDayKey } from "./date-utils";
import { fromCents, lineCents, roundHalfUp } from "./money";

export const MOVING_AVERAGE_WINDOW = 7;

interface DayBucket {
  date: string;
  cents: number;
}

/** Revenue per calendar day in cents, ascending by date. */
function dailyBuckets(records: readonly SalesRecord[]): DayBucket[] {
  const buckets = new Map<string, number>();

  for (const r of records) {
    const date = parseTimestamp(r.invoiceTimestamp);
    if (!date) continue;
    const key = getDayKey(date);
    buckets.set(key, (buckets.get(key) ?? 0) + lineCents(r.quantity, r.unitPrice));
  }

  return Array.from(buckets.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, cents]) => ({ date, cents }));
}

export function computeDailyRevenue(records: readonly SalesRecord[]): DailyRevenueRow[] {
  return dailyBuckets(records).map((d) => ({ date: d.date, revenue: fromCents(d.cents) }));
}

/**
 * Growth against the previous day *present* in the series. Missing calendar
 * days are not filled in, so a gap compares against the last day with sales.
 */
export function computeDayOverDay(daily: readonly DailyRevenueRow[]): DayOverDayRow[] {
  return daily.map((day, i) => {
    if (i === 0) {
      return { date: day.date, revenue: day.revenue, previousRevenue: null, growthPct: null };
    }
    const previousRevenue = daily[i - 1].revenue;
    const growthPct =
      previousRevenue === 0
        ? null
        : roundHalfUp(((day.revenue - previousRevenue) / previousRevenue) * 100);
    return { date: day.date, revenue: day.revenue, previousRevenue, growthPct };
  });
}

export function computeCumulativeRevenue(daily: readonly DailyRevenueRow[]): CumulativeRevenueRow[] {
  let runningCents = 0;
  return daily.map((day) => {
    runningCents += Math.round(day.revenue * 100);
    return { date: day.date, revenue: day.revenue, cumulativeRevenue: fromCents(runningCents) };
  });
}

/** Average over the current day and up to six preceding present days. */
export function computeMovingAverage(
  daily: readonly DailyRevenueRow[],
  window = MOVING_AVERAGE_WINDOW
): MovingAverageRow[] {
  return daily.map((day, i) => {
    const frame = daily.slice(Math.max(0, i - window + 1), i + 1);
    const sum = frame.reduce((acc, d) => acc + d.revenue, 0);
    return {
      date: day.date,
      revenue: day.revenue,
      movingAverage: roundHalfUp(sum / frame.length),
    };
  });
}
