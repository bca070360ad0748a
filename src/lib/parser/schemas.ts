import { z } from "zod";
import { roundHalfUp } from "../analytics/money";

/**
 * Zod schema for one sales CSV row.
 * Field names match the headers after normalizeHeader() + COLUMN_ALIASES.
 *
 * A row that fails here is malformed: it never reaches the validator.
 * Rows that parse but break a business rule (no customer, zero quantity,
 * bad timestamp text) pass through so the validator can count them.
 */

/** Empty or whitespace-only → null */
const nullableText = z
  .string()
  .optional()
  .transform((val) => {
    const trimmed = (val ?? "").trim();
    return trimmed === "" ? null : trimmed;
  });

const requiredText = (field: string) =>
  z.string({ required_error: `${field} is required` }).trim().min(1, `${field} is required`);

const integer = z
  .string()
  .or(z.number())
  .transform((val, ctx) => {
    const text = String(val).trim();
    if (!/^[+-]?\d+$/.test(text)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${text}" is not an integer` });
      return z.NEVER;
    }
    const num = parseInt(text, 10);
    if (!Number.isSafeInteger(num)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${text}" is out of range` });
      return z.NEVER;
    }
    return num;
  });

/** "£1,234.50", "$2.55" or "2.55" → 2.55, rounded to cents */
const money = z
  .string()
  .or(z.number())
  .transform((val, ctx) => {
    if (typeof val === "number") return roundHalfUp(val);
    const cleaned = val.replace(/[$£€,]/g, "").trim();
    const num = cleaned === "" ? NaN : Number(cleaned);
    if (!Number.isFinite(num)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${val}" is not a price` });
      return z.NEVER;
    }
    return roundHalfUp(num);
  });

export const SalesRowSchema = z.object({
  invoiceId: requiredText("invoiceId"),
  stockCode: requiredText("stockCode"),
  description: nullableText,
  quantity: integer,
  invoiceTimestamp: z.string().default("").transform((val) => val.trim()),
  unitPrice: money,
  customerId: nullableText,
  country: nullableText,
});
