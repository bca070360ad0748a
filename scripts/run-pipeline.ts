/**
 * Clean a sales CSV and print its revenue rollups.
 *
 * Usage:
 *   npx tsx scripts/run-pipeline.ts [csv-path] [--country "United Kingdom"] [--persist]
 *
 * The CSV path falls back to SALES_CSV_PATH. --persist writes the batch
 * to the SQLite database at DATABASE_PATH.
 */

import * as dotenv from "dotenv";
dotenv.config();

import { existsSync } from "fs";
import { getEnv } from "../src/lib/config/env";
import { parseSalesFile } from "../src/lib/parser/csv-parser";
import { runSalesPipeline } from "../src/lib/pipeline/sales-pipeline";
import { formatCurrency, renderReport } from "../src/lib/report/formatters";
import { closeDb } from "../src/lib/db/database";
import { saveSalesBatch } from "../src/lib/db/sales-store";

interface CliArgs {
  csvPath?: string;
  country?: string;
  persist: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { persist: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--persist") args.persist = true;
    else if (arg === "--country") args.country = argv[++i];
    else if (!arg.startsWith("--")) args.csvPath = arg;
  }
  return args;
}

function main(): number {
  const env = getEnv();
  const args = parseArgs(process.argv.slice(2));
  const csvPath = args.csvPath ?? env.SALES_CSV_PATH;

  if (!csvPath) {
    console.error("[run-pipeline] No CSV given. Pass a path or set SALES_CSV_PATH.");
    return 1;
  }
  if (!existsSync(csvPath)) {
    console.error(`[run-pipeline] File not found: ${csvPath}`);
    return 1;
  }

  const { data, malformedCount, missingValues, warnings } = parseSalesFile(csvPath);
  const result = runSalesPipeline(data, {
    malformedCount,
    missingValues,
    warnings,
    outlierThreshold: env.OUTLIER_THRESHOLD,
  });

  for (const line of renderReport(result.report, env.TOP_COUNTRIES_LIMIT)) {
    console.log(line);
  }

  if (result.warnings.length > 0) {
    console.log(`\nWarnings (${result.warnings.length}):`);
    result.warnings.forEach((w) => console.log(`  - ${w}`));
  }

  if (args.country) {
    const row = result.report.countrySales(args.country);
    console.log(`\n=== Country: ${args.country} ===`);
    if (row) {
      console.log(
        `  Rank ${row.rank}, ${formatCurrency(row.totalRevenue)} total (${row.tier}), ` +
        `${row.totalCustomers} customers, avg line ${formatCurrency(row.averageRevenue)}`
      );
    } else {
      console.log("  No sales for this country");
    }
  }

  if (args.persist) {
    try {
      saveSalesBatch(result, csvPath);
    } finally {
      closeDb();
    }
  }

  console.log(`\nDone in ${result.duration}ms`);
  return 0;
}

try {
  process.exitCode = main();
} catch (err) {
  console.error(`[run-pipeline] Failed: ${err instanceof Error ? err.message : err}`);
  process.exitCode = 1;
}
