/**
 * MySQL-backed stores (drizzle-orm + mysql2).
 */

import { and, asc, count, desc, eq, gte, lt, lte, max, min, sql } from "drizzle-orm";
import {
  bonds,
  cashFlows,
  feeRecords,
  fundState,
  futuresTrades,
  investors,
  navSnapshots,
  priceHistory,
  symbolMetadata,
  transactions,
  type BondRow,
  type CashFlowRow,
  type FeeRecordRow,
  type FuturesTradeRow,
  type NavSnapshotRow,
  type PriceHistoryRow,
  type SymbolMetadataRow,
  type TransactionRow,
} from "../drizzle/schema";
import { ConcurrencyError } from "./_core/errors";
import type { Database } from "./db";
import type { LedgerStore, PriceStore, SymbolRange } from "./stores";
import type {
  AssetClass,
  BondPosition,
  CashFlow,
  FeeRecord,
  FundState,
  FuturesTrade,
  InvestorAccount,
  IsoDate,
  NAVSnapshot,
  PriceBar,
  SymbolMetadata,
  Transaction,
} from "./types";

const UPSERT_CHUNK = 500;
const FUND_STATE_ID = 1;

// ============================================================
// Row mapping
// ============================================================

function toBar(row: PriceHistoryRow): PriceBar {
  return {
    symbol: row.symbol,
    date: row.date,
    open: row.open,
    high: row.high,
    low: row.low,
    close: row.close,
    adjClose: row.adjClose,
    volume: row.volume,
    dividend: row.dividend,
    split: row.split,
  };
}

function toMetadata(row: SymbolMetadataRow): SymbolMetadata {
  return { ...row };
}

function toTransaction(row: TransactionRow): Transaction {
  return {
    id: row.id,
    assetClass: row.assetClass,
    symbol: row.symbol,
    date: row.date,
    signedQuantity: row.signedQuantity,
    price: row.price,
    currency: row.currency,
    market: row.market,
  };
}

function toFuturesTrade(row: FuturesTradeRow): FuturesTrade {
  return {
    id: row.id,
    date: row.date,
    symbol: row.symbol,
    exchange: row.exchange,
    expiry: row.expiry,
    side: row.side,
    quantity: row.quantity,
    price: row.price,
    multiplier: row.multiplier,
    currency: row.currency,
    commission: row.commission,
    description: row.description,
  };
}

function toBond(row: BondRow): BondPosition {
  return { ...row };
}

function toCashFlow(row: CashFlowRow): CashFlow {
  return {
    id: row.id,
    date: row.date,
    investorId: row.investorId,
    investorName: row.investorName,
    type: row.type,
    amount: { amount: row.amount, currency: row.currency },
    amountInBase: row.amountInBase,
    description: row.description ?? "",
  };
}

function toFeeRecord(row: FeeRecordRow): FeeRecord {
  return { ...row };
}

function toSnapshot(row: NavSnapshotRow): NAVSnapshot {
  return {
    date: row.date,
    currency: row.currency,
    equityValue: row.equityValue,
    cryptoValue: row.cryptoValue,
    bondValue: row.bondValue,
    portfolioValue: row.portfolioValue,
    cashPosition: row.cashPosition,
    outstandingFees: row.outstandingFees,
    nav: row.nav,
    stale: row.stale,
    approximated: row.approximated,
  };
}

function sameBar(a: PriceBar, b: PriceBar): boolean {
  return (
    a.open === b.open &&
    a.high === b.high &&
    a.low === b.low &&
    a.close === b.close &&
    a.adjClose === b.adjClose &&
    a.volume === b.volume &&
    a.dividend === b.dividend &&
    a.split === b.split
  );
}

// ============================================================
// Store
// ============================================================

export class DrizzleStore implements PriceStore, LedgerStore {
  constructor(private readonly db: Database) {}

  async upsertBars(bars: PriceBar[]): Promise<number> {
    const bySymbol = new Map<string, PriceBar[]>();
    for (const bar of bars) {
      const list = bySymbol.get(bar.symbol) ?? [];
      list.push(bar);
      bySymbol.set(bar.symbol, list);
    }

    let changed = 0;
    for (const [symbol, incoming] of Array.from(bySymbol.entries())) {
      const dates = incoming.map(b => b.date).sort();
      const existing = await this.getBars(symbol, dates[0], dates[dates.length - 1]);
      const byDate = new Map(existing.map(b => [b.date, b]));
      const dirty = incoming.filter(bar => {
        const current = byDate.get(bar.date);
        return !current || !sameBar(current, bar);
      });

      for (let i = 0; i < dirty.length; i += UPSERT_CHUNK) {
        const chunk = dirty.slice(i, i + UPSERT_CHUNK);
        await this.db
          .insert(priceHistory)
          .values(chunk)
          .onDuplicateKeyUpdate({
            set: {
              open: sql`values(${priceHistory.open})`,
              high: sql`values(${priceHistory.high})`,
              low: sql`values(${priceHistory.low})`,
              close: sql`values(${priceHistory.close})`,
              adjClose: sql`values(${priceHistory.adjClose})`,
              volume: sql`values(${priceHistory.volume})`,
              dividend: sql`values(${priceHistory.dividend})`,
              split: sql`values(${priceHistory.split})`,
            },
          });
      }
      changed += dirty.length;
    }
    return changed;
  }

  async getBars(symbol: string, start?: IsoDate, end?: IsoDate): Promise<PriceBar[]> {
    const conditions = [eq(priceHistory.symbol, symbol)];
    if (start) conditions.push(gte(priceHistory.date, start));
    if (end) conditions.push(lte(priceHistory.date, end));
    const rows = await this.db
      .select()
      .from(priceHistory)
      .where(and(...conditions))
      .orderBy(asc(priceHistory.date));
    return rows.map(toBar);
  }

  async latestBar(symbol: string, asOf: IsoDate): Promise<PriceBar | undefined> {
    const rows = await this.db
      .select()
      .from(priceHistory)
      .where(and(eq(priceHistory.symbol, symbol), lte(priceHistory.date, asOf)))
      .orderBy(desc(priceHistory.date))
      .limit(1);
    return rows.length > 0 ? toBar(rows[0]) : undefined;
  }

  async summarizeSymbol(symbol: string): Promise<SymbolRange | undefined> {
    const rows = await this.db
      .select({
        firstDate: min(priceHistory.date),
        lastDate: max(priceHistory.date),
        recordCount: count(),
      })
      .from(priceHistory)
      .where(eq(priceHistory.symbol, symbol));
    const row = rows[0];
    if (!row || !row.firstDate || !row.lastDate || row.recordCount === 0) return undefined;
    return { firstDate: row.firstDate, lastDate: row.lastDate, recordCount: row.recordCount };
  }

  async getMetadata(symbol: string): Promise<SymbolMetadata | undefined> {
    const rows = await this.db.select().from(symbolMetadata).where(eq(symbolMetadata.symbol, symbol)).limit(1);
    return rows.length > 0 ? toMetadata(rows[0]) : undefined;
  }

  async saveMetadata(metadata: SymbolMetadata): Promise<void> {
    const { symbol, ...rest } = metadata;
    await this.db.insert(symbolMetadata).values(metadata).onDuplicateKeyUpdate({ set: rest });
    console.log(`[Database] Metadata for ${symbol}: ${rest.firstDate}..${rest.lastDate} (${rest.recordCount} rows)`);
  }

  async listMetadata(): Promise<SymbolMetadata[]> {
    const rows = await this.db.select().from(symbolMetadata).orderBy(asc(symbolMetadata.symbol));
    return rows.map(toMetadata);
  }

  async deleteSymbol(symbol: string): Promise<number> {
    const result = await this.db.delete(priceHistory).where(eq(priceHistory.symbol, symbol));
    await this.db.delete(symbolMetadata).where(eq(symbolMetadata.symbol, symbol));
    return result[0].affectedRows;
  }

  async deleteBarsBefore(date: IsoDate): Promise<number> {
    const result = await this.db.delete(priceHistory).where(lt(priceHistory.date, date));
    return result[0].affectedRows;
  }

  async countBars(): Promise<number> {
    const rows = await this.db.select({ value: count() }).from(priceHistory);
    return rows[0]?.value ?? 0;
  }

  // ============================================================
  // Ledgers
  // ============================================================

  async appendTransaction(tx: Transaction): Promise<void> {
    await this.db.insert(transactions).values(tx);
  }

  async listTransactions(assetClass?: AssetClass): Promise<Transaction[]> {
    const query = this.db.select().from(transactions);
    const rows = assetClass
      ? await query.where(eq(transactions.assetClass, assetClass)).orderBy(asc(transactions.seq))
      : await query.orderBy(asc(transactions.seq));
    return rows.map(toTransaction);
  }

  async appendFuturesTrade(trade: FuturesTrade): Promise<void> {
    await this.db.insert(futuresTrades).values(trade);
  }

  async listFuturesTrades(): Promise<FuturesTrade[]> {
    const rows = await this.db.select().from(futuresTrades).orderBy(asc(futuresTrades.seq));
    return rows.map(toFuturesTrade);
  }

  async saveBond(bond: BondPosition): Promise<void> {
    const { issueId, ...rest } = bond;
    await this.db.insert(bonds).values(bond).onDuplicateKeyUpdate({ set: rest });
    console.log(`[Database] Bond ${issueId} saved`);
  }

  async listBonds(): Promise<BondPosition[]> {
    const rows = await this.db.select().from(bonds).orderBy(asc(bonds.maturityDate));
    return rows.map(toBond);
  }

  async saveInvestor(investor: InvestorAccount): Promise<void> {
    await this.db
      .insert(investors)
      .values(investor)
      .onDuplicateKeyUpdate({ set: { name: investor.name, status: investor.status } });
  }

  async listInvestors(): Promise<InvestorAccount[]> {
    const rows = await this.db.select().from(investors).orderBy(asc(investors.createdAt));
    return rows.map(row => ({ investorId: row.investorId, name: row.name, status: row.status }));
  }

  async appendCashFlow(flow: CashFlow): Promise<void> {
    await this.db.insert(cashFlows).values({
      id: flow.id,
      date: flow.date,
      investorId: flow.investorId,
      investorName: flow.investorName,
      type: flow.type,
      amount: flow.amount.amount,
      currency: flow.amount.currency,
      amountInBase: flow.amountInBase,
      description: flow.description,
    });
  }

  async listCashFlows(): Promise<CashFlow[]> {
    const rows = await this.db.select().from(cashFlows).orderBy(asc(cashFlows.date), asc(cashFlows.createdAt));
    return rows.map(toCashFlow);
  }

  async saveFeeRecord(record: FeeRecord): Promise<void> {
    const { id, ...rest } = record;
    await this.db.insert(feeRecords).values(record).onDuplicateKeyUpdate({ set: rest });
    console.log(`[Database] Fee record ${id} → ${record.status}`);
  }

  async listFeeRecords(): Promise<FeeRecord[]> {
    const rows = await this.db.select().from(feeRecords).orderBy(asc(feeRecords.periodEnd));
    return rows.map(toFeeRecord);
  }

  async getFundState(): Promise<FundState> {
    await this.db.insert(fundState).ignore().values({ id: FUND_STATE_ID, version: 0 });
    const rows = await this.db.select().from(fundState).where(eq(fundState.id, FUND_STATE_ID)).limit(1);
    const row = rows[0];
    return { highWaterMark: row?.highWaterMark ?? null, version: row?.version ?? 0 };
  }

  async compareAndSetFundState(expectedVersion: number, highWaterMark: number | null): Promise<FundState> {
    const result = await this.db
      .update(fundState)
      .set({ highWaterMark, version: expectedVersion + 1 })
      .where(and(eq(fundState.id, FUND_STATE_ID), eq(fundState.version, expectedVersion)));
    if (result[0].affectedRows === 0) {
      const current = await this.getFundState();
      throw new ConcurrencyError(
        `Fund state version is ${current.version}, expected ${expectedVersion}`,
        expectedVersion,
        current.version
      );
    }
    return { highWaterMark, version: expectedVersion + 1 };
  }

  async saveNavSnapshot(snapshot: NAVSnapshot): Promise<void> {
    const { date, ...rest } = snapshot;
    await this.db.insert(navSnapshots).values(snapshot).onDuplicateKeyUpdate({ set: rest });
    console.log(`[Database] NAV snapshot ${date}: ${snapshot.nav.toFixed(2)} ${snapshot.currency}`);
  }

  async getNavSnapshot(date: IsoDate): Promise<NAVSnapshot | undefined> {
    const rows = await this.db.select().from(navSnapshots).where(eq(navSnapshots.date, date)).limit(1);
    return rows.length > 0 ? toSnapshot(rows[0]) : undefined;
  }

  async deleteNavSnapshotsFrom(date: IsoDate): Promise<number> {
    const result = await this.db.delete(navSnapshots).where(gte(navSnapshots.date, date));
    return result[0].affectedRows;
  }
}
