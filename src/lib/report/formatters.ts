import { REJECTION_REASONS } from "@/types/sales-data";
import type { SalesReport } from "./sales-report";

export function formatCurrency(value: number): string {
  const sign = value < 0 ? "-" : "";
  const [whole, cents] = Math.abs(value).toFixed(2).split(".");
  return `${sign}${whole.replace(/\B(?=(\d{3})+(?!\d))/g, ",")}.${cents}`;
}

/** Percentages are stored as 72.3, not 0.723 */
export function formatPercent(value: number | null): string {
  return value === null ? "n/a" : `${value.toFixed(2)}%`;
}

function section(title: string): string[] {
  return ["", `=== ${title} ===`];
}

/** Plain-text rendering of a report, one line per array entry. */
export function renderReport(report: SalesReport, topCountriesLimit = 10): string[] {
  const lines: string[] = [];
  const q = report.dataQuality;

  lines.push(...section("Data Quality"));
  lines.push(`  Input rows: ${q.inputCount}`);
  lines.push(`  Malformed rows: ${q.malformedCount}`);
  for (const reason of REJECTION_REASONS) {
    lines.push(`  Rejected (${reason}): ${q.rejections[reason]}`);
  }
  lines.push(`  Duplicates removed: ${q.duplicatesRemoved}`);
  lines.push(`  Clean records: ${q.cleanCount}`);
  lines.push(`  Outlier lines: ${q.outliers.length}`);

  lines.push(...section("Daily Revenue"));
  report.dayOverDay.forEach((day, i) => {
    const cumulative = report.cumulativeRevenue[i].cumulativeRevenue;
    const avg = report.movingAverage7[i].movingAverage;
    lines.push(
      `  ${day.date}  ${formatCurrency(day.revenue)}  DoD ${formatPercent(day.growthPct)}  ` +
      `cum ${formatCurrency(cumulative)}  7d avg ${formatCurrency(avg)}`
    );
  });

  lines.push(...section("Countries"));
  for (const c of report.countrySummary) {
    lines.push(
      `  #${c.rank} ${c.country}: ${formatCurrency(c.totalRevenue)} (${c.tier}), ` +
      `${c.totalCustomers} customers, avg line ${formatCurrency(c.averageRevenue)}`
    );
  }

  lines.push(...section(`Top ${topCountriesLimit} Countries`));
  for (const c of report.topCountries(topCountriesLimit)) {
    lines.push(`  ${c.country}: ${formatCurrency(c.totalRevenue)} (${formatPercent(c.contributionPct)})`);
  }

  lines.push(...section("Top Customers by Country"));
  for (const t of report.topCustomersByCountry) {
    lines.push(`  ${t.country} #${t.rank} ${t.customerId}: ${formatCurrency(t.totalRevenue)}`);
  }

  return lines;
}
