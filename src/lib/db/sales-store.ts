import { z } from "zod";
import type { CountrySummaryRow } from "@/types/sales-data";
import type { PipelineResult } from "@/types/pipeline";
import { getDb, type SalesDatabase } from "./database";

const RecordCountsSchema = z.object({
  input: z.number(),
  malformed: z.number(),
  rejected: z.number(),
  duplicatesRemoved: z.number(),
  clean: z.number(),
});

export type RecordCounts = z.infer<typeof RecordCountsSchema>;

const StoredCountrySchema = z.object({
  country: z.string(),
  total_customers: z.number(),
  total_revenue: z.number(),
  average_revenue: z.number(),
  tier: z.enum(["High", "Medium", "Low"]),
  ranking: z.number(),
});

const StoredRunSchema = z.object({
  id: z.number(),
  source: z.string(),
  ran_at: z.string(),
  record_counts: z.string(),
  duration_ms: z.number().nullable(),
});

export interface StoredPipelineRun {
  id: number;
  source: string;
  ranAt: string;
  recordCounts: RecordCounts;
  durationMs: number | null;
}

function recordCounts(result: PipelineResult): RecordCounts {
  const q = result.quality;
  return {
    input: q.inputCount,
    malformed: q.malformedCount,
    rejected: Object.values(q.rejections).reduce((a, b) => a + b, 0),
    duplicatesRemoved: q.duplicatesRemoved,
    clean: q.cleanCount,
  };
}

/**
 * Persist one batch: run log, cleaned records and every rollup, in a single
 * transaction. Any failure rolls the whole batch back. Returns the run id.
 */
export function saveSalesBatch(
  result: PipelineResult,
  source: string,
  db: SalesDatabase = getDb()
): number {
  const insertRun = db.prepare(
    `INSERT INTO pipeline_runs (source, record_counts, duration_ms) VALUES (?, ?, ?)`
  );
  const insertRecord = db.prepare(
    `INSERT INTO sales_records (run_id, invoice_id, stock_code, description, quantity, invoice_timestamp, unit_price, customer_id, country)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
  );
  const insertDay = db.prepare(
    `INSERT INTO daily_revenue (run_id, day, revenue, previous_revenue, growth_pct, cumulative_revenue, moving_avg_7)
     VALUES (?, ?, ?, ?, ?, ?, ?)`
  );
  const insertCountry = db.prepare(
    `INSERT INTO country_summary (run_id, country, total_customers, total_revenue, average_revenue, tier, ranking, contribution_pct)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
  );
  const insertCustomer = db.prepare(
    `INSERT INTO top_customers (run_id, country, customer_id, total_revenue, ranking) VALUES (?, ?, ?, ?, ?)`
  );

  const { rollups } = result;
  const contribution = new Map(rollups.countryContribution.map((c): [string, number] => [c.country, c.contributionPct]));

  const save = db.transaction((): number => {
    const runId = Number(
      insertRun.run(source, JSON.stringify(recordCounts(result)), result.duration).lastInsertRowid
    );

    for (const r of result.cleanRecords) {
      insertRecord.run(
        runId,
        r.invoiceId,
        r.stockCode,
        r.description,
        r.quantity,
        r.invoiceTimestamp,
        r.unitPrice,
        r.customerId,
        r.country
      );
    }

    rollups.dailyRevenue.forEach((day, i) => {
      insertDay.run(
        runId,
        day.date,
        day.revenue,
        rollups.dayOverDay[i].previousRevenue,
        rollups.dayOverDay[i].growthPct,
        rollups.cumulativeRevenue[i].cumulativeRevenue,
        rollups.movingAverage7[i].movingAverage
      );
    });

    for (const c of rollups.countrySummary) {
      insertCountry.run(
        runId,
        c.country,
        c.totalCustomers,
        c.totalRevenue,
        c.averageRevenue,
        c.tier,
        c.rank,
        contribution.get(c.country) ?? 0
      );
    }

    for (const t of rollups.topCustomersByCountry) {
      insertCustomer.run(runId, t.country, t.customerId, t.totalRevenue, t.rank);
    }

    return runId;
  });

  const runId = save();
  console.log(
    `[sales-store] Saved run ${runId} from ${source}: ${result.cleanRecords.length} records, ` +
    `${rollups.dailyRevenue.length} days, ${rollups.countrySummary.length} countries`
  );
  return runId;
}

/**
 * Stored summary row for one country, from the given run or the latest
 * run that has it. Null when the country was never saved.
 */
export function getStoredCountrySales(
  country: string,
  runId?: number,
  db: SalesDatabase = getDb()
): CountrySummaryRow | null {
  const row =
    runId === undefined
      ? db
          .prepare(
            `SELECT country, total_customers, total_revenue, average_revenue, tier, ranking
             FROM country_summary WHERE country = ? ORDER BY run_id DESC LIMIT 1`
          )
          .get(country)
      : db
          .prepare(
            `SELECT country, total_customers, total_revenue, average_revenue, tier, ranking
             FROM country_summary WHERE country = ? AND run_id = ?`
          )
          .get(country, runId);

  if (row === undefined) return null;
  const r = StoredCountrySchema.parse(row);
  return {
    country: r.country,
    totalCustomers: r.total_customers,
    totalRevenue: r.total_revenue,
    averageRevenue: r.average_revenue,
    tier: r.tier,
    rank: r.ranking,
  };
}

export function getPipelineRuns(db: SalesDatabase = getDb()): StoredPipelineRun[] {
  const rows = db
    .prepare(`SELECT id, source, ran_at, record_counts, duration_ms FROM pipeline_runs ORDER BY id DESC`)
    .all();

  return rows.map((row) => {
    const r = StoredRunSchema.parse(row);
    return {
      id: r.id,
      source: r.source,
      ranAt: r.ran_at,
      recordCounts: RecordCountsSchema.parse(JSON.parse(r.record_counts)),
      durationMs: r.duration_ms,
    };
  });
}
