/**
 * Persistence ports. `MemoryStore` backs tests and DB-less runs,
 * `DrizzleStore` backs MySQL.
 */

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

export interface SymbolRange {
  firstDate: IsoDate;
  lastDate: IsoDate;
  recordCount: number;
}

export interface PriceStore {
  /** Inserts or updates bars; returns how many rows actually changed. */
  upsertBars(bars: PriceBar[]): Promise<number>;
  getBars(symbol: string, start?: IsoDate, end?: IsoDate): Promise<PriceBar[]>;
  /** Latest bar with date <= asOf. */
  latestBar(symbol: string, asOf: IsoDate): Promise<PriceBar | undefined>;
  summarizeSymbol(symbol: string): Promise<SymbolRange | undefined>;
  getMetadata(symbol: string): Promise<SymbolMetadata | undefined>;
  saveMetadata(metadata: SymbolMetadata): Promise<void>;
  listMetadata(): Promise<SymbolMetadata[]>;
  /** Removes bars and metadata; returns deleted bar count. */
  deleteSymbol(symbol: string): Promise<number>;
  deleteBarsBefore(date: IsoDate): Promise<number>;
  countBars(): Promise<number>;
}

export interface LedgerStore {
  appendTransaction(tx: Transaction): Promise<void>;
  /** Ingestion order. */
  listTransactions(assetClass?: AssetClass): Promise<Transaction[]>;

  appendFuturesTrade(trade: FuturesTrade): Promise<void>;
  /** Ingestion order. */
  listFuturesTrades(): Promise<FuturesTrade[]>;

  saveBond(bond: BondPosition): Promise<void>;
  listBonds(): Promise<BondPosition[]>;

  saveInvestor(investor: InvestorAccount): Promise<void>;
  listInvestors(): Promise<InvestorAccount[]>;

  appendCashFlow(flow: CashFlow): Promise<void>;
  listCashFlows(): Promise<CashFlow[]>;

  saveFeeRecord(record: FeeRecord): Promise<void>;
  listFeeRecords(): Promise<FeeRecord[]>;

  getFundState(): Promise<FundState>;
  /** Writes the new HWM only if the stored version still equals `expectedVersion`. */
  compareAndSetFundState(expectedVersion: number, highWaterMark: number | null): Promise<FundState>;

  saveNavSnapshot(snapshot: NAVSnapshot): Promise<void>;
  getNavSnapshot(date: IsoDate): Promise<NAVSnapshot | undefined>;
  /** Drops committed snapshots dated on or after `date`; returns how many. */
  deleteNavSnapshotsFrom(date: IsoDate): Promise<number>;
}
