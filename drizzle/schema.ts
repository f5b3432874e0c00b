import {
  boolean,
  double,
  int,
  mysqlEnum,
  mysqlTable,
  primaryKey,
  text,
  timestamp,
  varchar,
} from "drizzle-orm/mysql-core";

// ============================================================
// Market Data Cache
// ============================================================

/**
 * Daily bars, one row per (symbol, date). Re-upserting identical data changes nothing.
 */
export const priceHistory = mysqlTable(
  "price_history",
  {
    symbol: varchar("symbol", { length: 32 }).notNull(),
    date: varchar("date", { length: 10 }).notNull(), // YYYY-MM-DD
    open: double("open").notNull(),
    high: double("high").notNull(),
    low: double("low").notNull(),
    close: double("close").notNull(),
    adjClose: double("adjClose").notNull(),
    volume: double("volume").notNull().default(0),
    dividend: double("dividend").notNull().default(0),
    split: double("split").notNull().default(1),
    createdAt: timestamp("createdAt").defaultNow().notNull(),
  },
  table => ({
    pk: primaryKey({ columns: [table.symbol, table.date] }),
  })
);

export type PriceHistoryRow = typeof priceHistory.$inferSelect;

export const symbolMetadata = mysqlTable("symbol_metadata", {
  symbol: varchar("symbol", { length: 32 }).primaryKey(),
  firstDate: varchar("firstDate", { length: 10 }).notNull(),
  lastDate: varchar("lastDate", { length: 10 }).notNull(),
  recordCount: int("recordCount").notNull().default(0),
  coveredFrom: varchar("coveredFrom", { length: 10 }), // requested window already fetched
  coveredTo: varchar("coveredTo", { length: 10 }),
  lastUpdated: varchar("lastUpdated", { length: 32 }).notNull(), // ISO timestamp
});

export type SymbolMetadataRow = typeof symbolMetadata.$inferSelect;

// ============================================================
// Ledgers
// ============================================================

export const transactions = mysqlTable("transactions", {
  id: varchar("id", { length: 64 }).primaryKey(),
  seq: int("seq").autoincrement().notNull().unique(), // ingestion order breaks same-date ties
  assetClass: mysqlEnum("assetClass", ["equity", "crypto"]).notNull(),
  symbol: varchar("symbol", { length: 32 }).notNull(),
  date: varchar("date", { length: 10 }).notNull(),
  signedQuantity: double("signedQuantity").notNull(),
  price: double("price").notNull(),
  currency: mysqlEnum("currency", ["BRL", "USD", "EUR"]).notNull(),
  market: mysqlEnum("market", ["national", "international"]).notNull(),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
});

export type TransactionRow = typeof transactions.$inferSelect;

export const futuresTrades = mysqlTable("futures_trades", {
  id: varchar("id", { length: 64 }).primaryKey(),
  seq: int("seq").autoincrement().notNull().unique(),
  date: varchar("date", { length: 10 }).notNull(),
  symbol: varchar("symbol", { length: 32 }).notNull(),
  exchange: varchar("exchange", { length: 32 }).notNull(),
  expiry: varchar("expiry", { length: 10 }).notNull(),
  side: mysqlEnum("side", ["long", "short"]).notNull(),
  quantity: double("quantity").notNull(),
  price: double("price").notNull(),
  multiplier: double("multiplier").notNull().default(1),
  currency: mysqlEnum("currency", ["BRL", "USD", "EUR"]).notNull(),
  commission: double("commission").notNull().default(0),
  description: text("description").notNull(),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
});

export type FuturesTradeRow = typeof futuresTrades.$inferSelect;

export const bonds = mysqlTable("bonds", {
  issueId: varchar("issueId", { length: 64 }).primaryKey(),
  title: varchar("title", { length: 128 }).notNull(),
  issuer: varchar("issuer", { length: 128 }).notNull(),
  indexer: mysqlEnum("indexer", ["IPCA", "CDI", "SELIC", "PREFIXADO"]).notNull(),
  percentIndexed: double("percentIndexed").notNull(),
  quantity: double("quantity").notNull(),
  unitPrice: double("unitPrice").notNull(),
  principal: double("principal").notNull(),
  issueDate: varchar("issueDate", { length: 10 }).notNull(),
  maturityDate: varchar("maturityDate", { length: 10 }).notNull(),
  currency: mysqlEnum("currency", ["BRL", "USD", "EUR"]).notNull().default("BRL"),
});

export type BondRow = typeof bonds.$inferSelect;

export const investors = mysqlTable("investors", {
  investorId: varchar("investorId", { length: 64 }).primaryKey(),
  name: varchar("name", { length: 128 }).notNull(),
  status: mysqlEnum("status", ["active", "inactive"]).notNull().default("active"),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
});

/**
 * Append-only. Corrections are new offsetting rows.
 */
export const cashFlows = mysqlTable("cash_flows", {
  id: varchar("id", { length: 64 }).primaryKey(),
  date: varchar("date", { length: 10 }).notNull(),
  investorId: varchar("investorId", { length: 64 }).notNull(),
  investorName: varchar("investorName", { length: 128 }).notNull(),
  type: mysqlEnum("type", ["deposit", "withdrawal"]).notNull(),
  amount: double("amount").notNull(),
  currency: mysqlEnum("currency", ["BRL", "USD", "EUR"]).notNull(),
  amountInBase: double("amountInBase"),
  description: text("description"),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
});

export type CashFlowRow = typeof cashFlows.$inferSelect;

// ============================================================
// Fees & NAV
// ============================================================

export const feeRecords = mysqlTable("fee_records", {
  id: varchar("id", { length: 64 }).primaryKey(),
  periodStart: varchar("periodStart", { length: 10 }).notNull(),
  periodEnd: varchar("periodEnd", { length: 10 }).notNull(),
  feeType: mysqlEnum("feeType", ["management", "performance"]).notNull(),
  status: mysqlEnum("status", ["pending", "calculated", "paid"]).notNull().default("pending"),
  navStart: double("navStart"),
  navEnd: double("navEnd"),
  rate: double("rate").notNull(),
  amount: double("amount").notNull().default(0),
  currency: mysqlEnum("currency", ["BRL", "USD", "EUR"]).notNull(),
  paid: boolean("paid").notNull().default(false),
  paymentDate: varchar("paymentDate", { length: 10 }),
  calculatedAt: varchar("calculatedAt", { length: 32 }),
  investorId: varchar("investorId", { length: 64 }).notNull().default("FUND"),
});

export type FeeRecordRow = typeof feeRecords.$inferSelect;

/**
 * Single row (id = 1). `version` guards high-water-mark updates.
 */
export const fundState = mysqlTable("fund_state", {
  id: int("id").primaryKey(),
  highWaterMark: double("highWaterMark"),
  version: int("version").notNull().default(0),
  updatedAt: timestamp("updatedAt").defaultNow().onUpdateNow().notNull(),
});

export const navSnapshots = mysqlTable("nav_snapshots", {
  date: varchar("date", { length: 10 }).primaryKey(),
  currency: mysqlEnum("currency", ["BRL", "USD", "EUR"]).notNull(),
  equityValue: double("equityValue").notNull(),
  cryptoValue: double("cryptoValue").notNull(),
  bondValue: double("bondValue").notNull(),
  portfolioValue: double("portfolioValue").notNull(),
  cashPosition: double("cashPosition").notNull(),
  outstandingFees: double("outstandingFees").notNull(),
  nav: double("nav").notNull(),
  stale: boolean("stale").notNull().default(false),
  approximated: boolean("approximated").notNull().default(false),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
});

export type NavSnapshotRow = typeof navSnapshots.$inferSelect;
