/**
 * CSV Ingestion: portfolio files to typed records.
 *
 * Every file needs a header row; column names are matched case-insensitively.
 * A missing required column rejects the whole file. After that, each data row
 * yields its own RowResult, so one bad line never stops an import.
 *
 * Accepted cell formats:
 *   - dates: "YYYY-MM-DD", "YYYY-MM-DD HH:mm:ss", "DD/MM/YYYY"
 *   - numbers: "1234.56", "1234,56", "1.234,56", "1,234.56", optional "R$"/"US$" prefix
 */

import { createHash } from "node:crypto";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { ValidationError } from "./_core/errors";
import { parseFlexibleDate } from "./dates";
import { parseIndexer, parsePercentIndexed } from "./bondIndexation";
import type { NewCashFlow } from "./cashLedger";
import { feeRecordId } from "./feeEngine";
import {
  CURRENCIES,
  FUND_LEVEL,
  type AssetClass,
  type BondPosition,
  type CurrencyCode,
  type FeeRecord,
  type FuturesTrade,
  type Market,
  type RowResult,
  type Transaction,
} from "./types";

// ============================================================
// CELL PARSERS
// ============================================================

export function parseDecimal(text: string): number | null {
  let cleaned = text.trim().replace(/^(R\$|US\$|\$|€)\s*/, "").replace(/\s/g, "");
  if (cleaned === "") return null;
  // whichever separator comes last is the decimal one
  if (cleaned.lastIndexOf(",") > cleaned.lastIndexOf(".")) {
    cleaned = cleaned.replace(/\./g, "").replace(",", ".");
  } else {
    cleaned = cleaned.replace(/,/g, "");
  }
  if (!/^[-+]?\d*\.?\d+(e[-+]?\d+)?$/i.test(cleaned)) return null;
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

const TRUE_WORDS = new Set(["true", "1", "yes", "y", "sim", "s"]);
const FALSE_WORDS = new Set(["false", "0", "no", "n", "nao", "não", ""]);

const decimal = z.string().transform((text, ctx) => {
  const value = parseDecimal(text);
  if (value === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: "${text}"` });
    return z.NEVER;
  }
  return value;
});

const optionalDecimal = z
  .string()
  .optional()
  .transform((text, ctx) => {
    if (text === undefined || text.trim() === "") return null;
    const value = parseDecimal(text);
    if (value === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: "${text}"` });
      return z.NEVER;
    }
    return value;
  });

const date = z.string().transform((text, ctx) => {
  const value = parseFlexibleDate(text);
  if (value === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a date: "${text}"` });
    return z.NEVER;
  }
  return value;
});

const optionalDate = z
  .string()
  .optional()
  .transform((text, ctx) => {
    if (text === undefined || text.trim() === "") return null;
    const value = parseFlexibleDate(text);
    if (value === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a date: "${text}"` });
      return z.NEVER;
    }
    return value;
  });

const currency = (fallback: CurrencyCode) =>
  z
    .string()
    .optional()
    .transform(text => (text === undefined || text.trim() === "" ? fallback : text.trim().toUpperCase()))
    .pipe(z.enum(CURRENCIES));

const flag = z
  .string()
  .optional()
  .transform((text, ctx) => {
    const word = (text ?? "").trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return true;
    if (FALSE_WORDS.has(word)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a yes/no value: "${text}"` });
    return z.NEVER;
  });

const trimmedText = z.string().transform(s => s.trim());
const requiredText = z.string().trim().min(1, "must not be empty");

// ============================================================
// CSV PLUMBING
// ============================================================

const recordsSchema = z.array(z.record(z.string()));

function readRecords(csv: string, required: string[], label: string): Record<string, string>[] {
  let raw: unknown;
  try {
    raw = parse(csv, {
      columns: (header: string[]) => header.map(column => column.trim().toLowerCase()),
      skip_empty_lines: true,
      trim: true,
      bom: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new ValidationError(`[Ingestion] ${label}: unreadable CSV (${error instanceof Error ? error.message : String(error)})`);
  }
  const records = recordsSchema.parse(raw);

  const missing = required.filter(column => records.length > 0 && !(column in records[0]));
  if (missing.length > 0) {
    throw new ValidationError(`[Ingestion] ${label}: missing column(s) ${missing.join(", ")}`);
  }
  return records;
}

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message));
}

function mapRows<S extends z.ZodTypeAny, T>(
  records: Record<string, string>[],
  schema: S,
  build: (parsed: z.output<S>, row: number) => T | string[]
): RowResult<T>[] {
  return records.map((record, index) => {
    const row = index + 1;
    const parsed = schema.safeParse(record);
    if (!parsed.success) return { ok: false, row, errors: issuesOf(parsed.error) };
    const built = build(parsed.data, row);
    return Array.isArray(built) ? { ok: false, row, errors: built } : { ok: true, row, value: built };
  });
}

/**
 * Id derived from a row's content, so importing the same file twice yields the
 * same ids. Identical rows within one file are told apart by occurrence.
 */
export function rowIdentity(prefix: string, parts: Array<string | number | null | undefined>, seen: Map<string, number>): string {
  const digest = createHash("sha256")
    .update(parts.map(p => (p === null || p === undefined ? "" : String(p))).join("|"))
    .digest("hex")
    .slice(0, 16);
  const occurrence = seen.get(digest) ?? 0;
  seen.set(digest, occurrence + 1);
  return `${prefix}-${digest}-${occurrence}`;
}

function summarize<T>(label: string, results: RowResult<T>[]): RowResult<T>[] {
  const rejected = results.filter(r => !r.ok).length;
  if (rejected > 0) {
    console.warn(`[Ingestion] ${label}: ${results.length - rejected} row(s) accepted, ${rejected} rejected`);
  } else {
    console.log(`[Ingestion] ${label}: ${results.length} row(s) accepted`);
  }
  return results;
}

// ============================================================
// TRANSACTIONS (equity / crypto)
// ============================================================

const transactionRow = z.object({
  date,
  symbol: requiredText,
  price: decimal,
  signed_quantity: decimal,
  market: z.string().optional(),
  currency: z.string().optional(),
});

function parseMarket(text: string | undefined, fallback: Market): Market | null {
  const value = (text ?? "").trim().toLowerCase();
  if (value === "") return fallback;
  if (value === "national" || value === "br" || value === "nacional") return "national";
  if (value === "international" || value === "us" || value === "internacional") return "international";
  return null;
}

/**
 * Signed transaction log. Market defaults to national for equities and
 * international for crypto; currency defaults to BRL for national, USD otherwise.
 */
export function parseTransactionsCsv(csv: string, assetClass: AssetClass): RowResult<Transaction>[] {
  const label = `${assetClass} transactions`;
  const records = readRecords(csv, ["date", "symbol", "price", "signed_quantity"], label);
  const defaultMarket: Market = assetClass === "equity" ? "national" : "international";
  const seen = new Map<string, number>();

  return summarize(
    label,
    mapRows<typeof transactionRow, Transaction>(records, transactionRow, parsed => {
      const errors: string[] = [];
      const market = parseMarket(parsed.market, defaultMarket);
      if (market === null) errors.push(`market: unknown value "${parsed.market}"`);
      const currencyCode = currency(market === "national" ? "BRL" : "USD").safeParse(parsed.currency);
      if (!currencyCode.success) errors.push(`currency: unsupported "${parsed.currency}"`);
      if (parsed.signed_quantity === 0) errors.push("signed_quantity: must not be zero");
      if (parsed.price <= 0) errors.push("price: must be positive");
      if (errors.length > 0 || market === null || !currencyCode.success) return errors;

      const symbol = parsed.symbol.toUpperCase();
      return {
        id: rowIdentity(
          "tx",
          [assetClass, parsed.date, symbol, parsed.signed_quantity, parsed.price, currencyCode.data, market],
          seen
        ),
        assetClass,
        symbol,
        date: parsed.date,
        signedQuantity: parsed.signed_quantity,
        price: parsed.price,
        currency: currencyCode.data,
        market,
      };
    })
  );
}

// ============================================================
// FUTURES
// ============================================================

const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;

const expiryDate = z.string().transform((text, ctx) => {
  const compact = COMPACT_DATE.exec(text.trim());
  const value = parseFlexibleDate(compact ? `${compact[1]}-${compact[2]}-${compact[3]}` : text);
  if (value === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a date: "${text}"` });
    return z.NEVER;
  }
  return value;
});

const futuresRow = z.object({
  date,
  symbol: requiredText,
  exchange: requiredText,
  expiry: expiryDate,
  side: z
    .string()
    .transform(s => s.trim().toLowerCase())
    .pipe(z.enum(["long", "short"])),
  quantity: decimal,
  price: decimal,
  multiplier: optionalDecimal,
  currency: currency("USD"),
  commission: optionalDecimal,
  description: trimmedText.optional(),
});

/**
 * Futures fills. Expiry takes "YYYYMMDD" besides the usual date formats;
 * multiplier defaults to 1 and commission to 0.
 */
export function parseFuturesCsv(csv: string): RowResult<FuturesTrade>[] {
  const label = "futures";
  const records = readRecords(csv, ["date", "symbol", "exchange", "expiry", "side", "quantity", "price"], label);
  const seen = new Map<string, number>();

  return summarize(
    label,
    mapRows<typeof futuresRow, FuturesTrade>(records, futuresRow, parsed => {
      const errors: string[] = [];
      const multiplier = parsed.multiplier ?? 1;
      const commission = parsed.commission ?? 0;
      if (parsed.quantity === 0) errors.push("quantity: must not be zero");
      if (parsed.price <= 0) errors.push("price: must be positive");
      if (multiplier <= 0) errors.push("multiplier: must be positive");
      if (commission < 0) errors.push("commission: must not be negative");
      if (errors.length > 0) return errors;

      const symbol = parsed.symbol.toUpperCase();
      const exchange = parsed.exchange.toUpperCase();
      return {
        id: rowIdentity(
          "fut",
          [parsed.date, symbol, exchange, parsed.expiry, parsed.side, parsed.quantity, parsed.price, multiplier, parsed.currency, commission],
          seen
        ),
        date: parsed.date,
        symbol,
        exchange,
        expiry: parsed.expiry,
        side: parsed.side,
        quantity: parsed.quantity,
        price: parsed.price,
        multiplier,
        currency: parsed.currency,
        commission,
        description: parsed.description ?? "",
      };
    })
  );
}

// ============================================================
// BONDS
// ============================================================

const bondRow = z.object({
  title: requiredText,
  issuer: requiredText,
  quantity: decimal,
  unit_price: decimal,
  invested_value: decimal,
  indexer: requiredText,
  percent_indexed: requiredText,
  application_date: date,
  maturity_date: date,
  currency: currency("BRL"),
});

export function bondIssueId(title: string, issuer: string, issueDate: string, maturityDate: string): string {
  return [title, issuer, issueDate, maturityDate]
    .join("-")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-|-$/g, "");
}

export function parseBondsCsv(csv: string): RowResult<BondPosition>[] {
  const label = "bonds";
  const records = readRecords(
    csv,
    ["title", "issuer", "quantity", "unit_price", "invested_value", "indexer", "percent_indexed", "application_date", "maturity_date"],
    label
  );

  return summarize(
    label,
    mapRows<typeof bondRow, BondPosition>(records, bondRow, parsed => {
      const errors: string[] = [];
      const indexer = parseIndexer(parsed.indexer) ?? parseIndexer(parsed.percent_indexed);
      if (indexer === null) errors.push(`indexer: unknown value "${parsed.indexer}"`);
      const percentIndexed = parsePercentIndexed(parsed.percent_indexed);
      if (percentIndexed === null) errors.push(`percent_indexed: no rate in "${parsed.percent_indexed}"`);
      if (parsed.quantity <= 0) errors.push("quantity: must be positive");
      if (parsed.invested_value <= 0) errors.push("invested_value: must be positive");
      if (parsed.maturity_date <= parsed.application_date) errors.push("maturity_date: must be after application_date");
      if (errors.length > 0 || indexer === null || percentIndexed === null) return errors;

      return {
        issueId: bondIssueId(parsed.title, parsed.issuer, parsed.application_date, parsed.maturity_date),
        title: parsed.title,
        issuer: parsed.issuer,
        indexer,
        percentIndexed,
        quantity: parsed.quantity,
        unitPrice: parsed.unit_price,
        principal: parsed.invested_value,
        issueDate: parsed.application_date,
        maturityDate: parsed.maturity_date,
        currency: parsed.currency,
      };
    })
  );
}

// ============================================================
// CASH FLOWS
// ============================================================

const cashFlowRow = z.object({
  date,
  investor_id: requiredText,
  investor_name: trimmedText.optional(),
  type: z
    .string()
    .transform(s => s.trim().toLowerCase())
    .pipe(z.enum(["deposit", "withdrawal"])),
  amount: decimal,
  currency: currency("BRL"),
  amount_in_base_currency: optionalDecimal,
  description: trimmedText.optional(),
});

export function parseCashFlowsCsv(csv: string): RowResult<NewCashFlow>[] {
  const label = "cash flows";
  const records = readRecords(csv, ["date", "investor_id", "type", "amount"], label);
  const seen = new Map<string, number>();

  return summarize(
    label,
    mapRows<typeof cashFlowRow, NewCashFlow>(records, cashFlowRow, parsed => {
      if (parsed.amount <= 0) return ["amount: must be positive"];
      return {
        id: rowIdentity(
          "cf",
          [parsed.date, parsed.investor_id, parsed.type, parsed.amount, parsed.currency, parsed.amount_in_base_currency],
          seen
        ),
        date: parsed.date,
        investorId: parsed.investor_id,
        investorName: parsed.investor_name || undefined,
        type: parsed.type,
        amount: { amount: parsed.amount, currency: parsed.currency },
        amountInBase: parsed.amount_in_base_currency,
        description: parsed.description ?? "",
      };
    })
  );
}

// ============================================================
// FEE RECORDS
// ============================================================

const feeRow = z.object({
  date: optionalDate,
  investor_id: trimmedText.optional(),
  fee_type: z
    .string()
    .transform(s => s.trim().toLowerCase())
    .pipe(z.enum(["management", "performance"])),
  period_start: date,
  period_end: date,
  nav_start: optionalDecimal,
  nav_end: optionalDecimal,
  fee_rate: decimal,
  fee_amount: optionalDecimal,
  paid: flag,
  payment_date: optionalDate,
});

/**
 * Externally kept fee records. A record with an amount is "calculated", a paid
 * one is "paid", anything else "pending".
 */
export function parseFeeRecordsCsv(csv: string, feeCurrency: CurrencyCode): RowResult<FeeRecord>[] {
  const label = "fee records";
  const records = readRecords(csv, ["fee_type", "period_start", "period_end", "fee_rate"], label);

  return summarize(
    label,
    mapRows<typeof feeRow, FeeRecord>(records, feeRow, parsed => {
      const errors: string[] = [];
      if (parsed.period_end < parsed.period_start) errors.push("period_end: must not precede period_start");
      if (parsed.fee_rate < 0) errors.push("fee_rate: must not be negative");
      if (parsed.paid && parsed.fee_amount === null) errors.push("fee_amount: required for a paid record");
      if (errors.length > 0) return errors;

      const investorId = parsed.investor_id || FUND_LEVEL;
      const baseId = feeRecordId(parsed.fee_type, parsed.period_start, parsed.period_end);
      const status = parsed.paid ? "paid" : parsed.fee_amount !== null ? "calculated" : "pending";
      const calculatedOn = parsed.date ?? parsed.period_end;

      return {
        id: investorId === FUND_LEVEL ? baseId : `${baseId}-${investorId}`,
        periodStart: parsed.period_start,
        periodEnd: parsed.period_end,
        feeType: parsed.fee_type,
        status,
        navStart: parsed.nav_start,
        navEnd: parsed.nav_end,
        rate: parsed.fee_rate,
        amount: parsed.fee_amount ?? 0,
        currency: feeCurrency,
        paid: parsed.paid,
        paymentDate: parsed.paid ? parsed.payment_date ?? calculatedOn : null,
        calculatedAt: status === "pending" ? null : `${calculatedOn}T00:00:00.000Z`,
        investorId,
      };
    })
  );
}
