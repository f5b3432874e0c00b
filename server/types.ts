/**
 * Shared domain types for the fund ledger.
 *
 * Dates are ISO calendar dates ("YYYY-MM-DD"); they sort lexicographically.
 * Monetary amounts always travel with their currency.
 */

// ============================================================
// PRIMITIVES
// ============================================================

export const CURRENCIES = ["BRL", "USD", "EUR"] as const;
export type CurrencyCode = (typeof CURRENCIES)[number];

export type IsoDate = string;

export interface Money {
  amount: number;
  currency: CurrencyCode;
}

export type AssetClass = "equity" | "crypto";
export type Market = "national" | "international";

/** Per-row outcome of an import or batch operation. Bad rows never abort the batch. */
export type RowResult<T> =
  | { ok: true; row: number; value: T }
  | { ok: false; row: number; errors: string[] };

// ============================================================
// TRADING
// ============================================================

export interface Transaction {
  id: string;
  assetClass: AssetClass;
  symbol: string;
  date: IsoDate;
  signedQuantity: number; // > 0 buy, < 0 sell
  price: number;
  currency: CurrencyCode;
  market: Market;
}

export interface Position {
  symbol: string;
  assetClass: AssetClass;
  market: Market;
  currency: CurrencyCode;
  quantity: number; // negative when short
  avgCost: number;
  realizedPnl: number;
  totalInvested: number; // quantity * avgCost
  lastTradePrice: number;
  lastTradeDate: IsoDate;
}

// ============================================================
// FIXED INCOME
// ============================================================

export const INDEXERS = ["IPCA", "CDI", "SELIC", "PREFIXADO"] as const;
export type Indexer = (typeof INDEXERS)[number];
export type FloatingIndexer = Exclude<Indexer, "PREFIXADO">;

export interface BondPosition {
  issueId: string;
  title: string;
  issuer: string;
  indexer: Indexer;
  percentIndexed: number; // IPCA/PREFIXADO: annual % rate; CDI/SELIC: % of the reference rate
  quantity: number;
  unitPrice: number;
  principal: number;
  issueDate: IsoDate;
  maturityDate: IsoDate;
  currency: CurrencyCode;
}

/** Monthly reference rate, e.g. IPCA for "2024-03" = 0.16 (%). */
export interface IndexerRate {
  month: string; // YYYY-MM
  ratePct: number;
}

// ============================================================
// MARKET DATA
// ============================================================

export interface PriceBar {
  symbol: string;
  date: IsoDate;
  open: number;
  high: number;
  low: number;
  close: number;
  adjClose: number;
  volume: number;
  dividend: number;
  split: number; // ratio, 1 when no split
}

export interface SymbolMetadata {
  symbol: string;
  firstDate: IsoDate;
  lastDate: IsoDate;
  recordCount: number;
  lastUpdated: string; // ISO timestamp
  coveredFrom: IsoDate | null; // requested window already fetched
  coveredTo: IsoDate | null;
}

export type FuturesSide = "long" | "short";

/**
 * One futures fill. `quantity` > 0 opens contracts on `side`, < 0 closes them.
 */
export interface FuturesTrade {
  id: string;
  date: IsoDate;
  symbol: string; // root, e.g. "ES"
  exchange: string;
  expiry: IsoDate;
  side: FuturesSide;
  quantity: number;
  price: number;
  multiplier: number;
  currency: CurrencyCode;
  commission: number;
  description: string;
}

// ============================================================
// INVESTORS, CASH, FEES
// ============================================================

export type InvestorStatus = "active" | "inactive";

export interface InvestorAccount {
  investorId: string;
  name: string;
  status: InvestorStatus;
}

export type CashFlowType = "deposit" | "withdrawal";

export interface CashFlow {
  id: string;
  date: IsoDate;
  investorId: string;
  investorName: string;
  type: CashFlowType;
  amount: Money; // always positive; type gives the sign
  amountInBase: number | null;
  description: string;
}

export type FeeType = "management" | "performance";
export type FeeStatus = "pending" | "calculated" | "paid";

export interface FeeRecord {
  id: string;
  periodStart: IsoDate;
  periodEnd: IsoDate;
  feeType: FeeType;
  status: FeeStatus;
  navStart: number | null;
  navEnd: number | null;
  rate: number;
  amount: number;
  currency: CurrencyCode;
  paid: boolean;
  paymentDate: IsoDate | null;
  calculatedAt: string | null;
  investorId: string; // "FUND" for fund-level records
}

export const FUND_LEVEL = "FUND";

export interface FundState {
  highWaterMark: number | null;
  version: number;
}

export interface NAVSnapshot {
  date: IsoDate;
  currency: CurrencyCode;
  equityValue: number;
  cryptoValue: number;
  bondValue: number;
  portfolioValue: number;
  cashPosition: number;
  outstandingFees: number;
  nav: number;
  stale: boolean; // some price came from a fallback
  approximated: boolean; // some bond accrual or FX rate was approximated
}
