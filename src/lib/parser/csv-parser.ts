import Papa from "papaparse";
import { readFileSync } from "fs";
import { basename } from "path";
import { z } from "zod";
import type { MissingValueCounts, SalesColumn, SalesRecord } from "@/types/sales-data";
import { SalesRowSchema } from "./schemas";

/**
 * Column name aliases: maps normalized CSV headers to our schema field names.
 * Table dumps use "InvoiceNo", "CustomerID"; newer exports use
 * "Invoice", "Price", "Customer ID". All land on the same fields.
 */
const COLUMN_ALIASES: Record<string, string> = {
  invoiceno: "invoiceId",
  invoiceNo: "invoiceId",
  invoice: "invoiceId",
  invoiceNumber: "invoiceId",
  stockcode: "stockCode",
  invoicedate: "invoiceTimestamp",
  invoiceDate: "invoiceTimestamp",
  unitprice: "unitPrice",
  price: "unitPrice",
  customerid: "customerId",
};

const MAX_ROW_WARNINGS = 10;

/**
 * Normalize CSV column headers to camelCase keys, then apply aliases.
 * E.g., "invoice_no" -> "invoiceNo" -> "invoiceId"
 *       "CustomerID" -> "customerid" -> "customerId"
 *       "Customer ID" -> "customerId"
 *
 * Must be idempotent: PapaParse may call transformHeader twice.
 */
export function normalizeHeader(header: string): string {
  const trimmed = header.trim();

  if (/^[a-z][a-zA-Z0-9]*$/.test(trimmed)) {
    return COLUMN_ALIASES[trimmed] || trimmed;
  }

  const camelCase = trimmed
    .toLowerCase()
    .replace(/[^a-z0-9]+(.)/g, (_, char: string) => char.toUpperCase())
    .replace(/^[A-Z]/, (c) => c.toLowerCase());

  return COLUMN_ALIASES[camelCase] || camelCase;
}

export interface ParseResult<T> {
  data: T[];
  /** Rows that failed the schema and were dropped */
  malformedCount: number;
  /** Blank or absent cells per header, counted on the raw rows before the schema runs */
  missingByColumn: Record<string, number>;
  warnings: string[];
}

export interface SalesParseResult extends ParseResult<SalesRecord> {
  missingValues: MissingValueCounts;
}

/**
 * Parse CSV text and validate each row against a Zod schema.
 * Rows that fail are dropped and counted; the first few get a warning.
 */
export function parseCSVContent<T>(
  content: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  label = "input"
): ParseResult<T> {
  // Remove BOM if present
  const cleanContent = content.replace(/^\uFEFF/, "");

  const parsed = Papa.parse<Record<string, string>>(cleanContent, {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false,
    transformHeader: normalizeHeader,
  });

  if (parsed.data.length > 0) {
    const headers = Object.keys(parsed.data[0]);
    console.log(`[csv-parser] ${label} headers (${headers.length}): [${headers.join(", ")}]`);
    console.log(`[csv-parser] ${label} total rows: ${parsed.data.length}`);
  }

  const fields = parsed.meta.fields ?? [];
  const missingByColumn: Record<string, number> = {};
  for (const field of fields) missingByColumn[field] = 0;

  const data: T[] = [];
  const warnings: string[] = [];
  let malformedCount = 0;

  for (let i = 0; i < parsed.data.length; i++) {
    const row = parsed.data[i];
    for (const field of fields) {
      const cell = row[field];
      if (cell === undefined || cell.trim() === "") missingByColumn[field]++;
    }

    const result = schema.safeParse(row);

    if (result.success) {
      data.push(result.data);
    } else {
      malformedCount++;
      if (warnings.length < MAX_ROW_WARNINGS) {
        warnings.push(
          `Row ${i + 1}: ${result.error.issues.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ")}`
        );
      }
    }
  }

  if (malformedCount > 0) {
    console.warn(`[csv-parser] ${label}: dropped ${malformedCount} malformed rows`);
  }

  if (parsed.errors.length > 0) {
    warnings.push(
      ...parsed.errors.slice(0, 5).map((e) => `CSV parse error at row ${e.row}: ${e.message}`)
    );
  }

  return { data, malformedCount, missingByColumn, warnings };
}

export function parseCSV<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): ParseResult<T> {
  const fileContent = readFileSync(filePath, "utf8");
  return parseCSVContent(fileContent, schema, basename(filePath));
}

/** A column missing from the header is missing on every row. */
function withMissingValues(result: ParseResult<SalesRecord>): SalesParseResult {
  const rows = result.data.length + result.malformedCount;
  const count = (column: SalesColumn) => result.missingByColumn[column] ?? rows;
  return {
    ...result,
    missingValues: {
      invoiceId: count("invoiceId"),
      stockCode: count("stockCode"),
      description: count("description"),
      quantity: count("quantity"),
      invoiceTimestamp: count("invoiceTimestamp"),
      unitPrice: count("unitPrice"),
      customerId: count("customerId"),
      country: count("country"),
    },
  };
}

export function parseSalesCSV(content: string, label?: string): SalesParseResult {
  return withMissingValues(parseCSVContent(content, SalesRowSchema, label));
}

export function parseSalesFile(filePath: string): SalesParseResult {
  return withMissingValues(parseCSV(filePath, SalesRowSchema));
}
