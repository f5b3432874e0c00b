import { ConcurrencyError } from "./_core/errors";
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

const BAR_FIELDS = ["open", "high", "low", "close", "adjClose", "volume", "dividend", "split"] as const;

function sameBar(a: PriceBar, b: PriceBar): boolean {
  return BAR_FIELDS.every(field => a[field] === b[field]);
}

/**
 * In-process store. Used when DATABASE_URL is unset and as the test stand-in for MySQL.
 * Everything handed out is a copy.
 */
export class MemoryStore implements PriceStore, LedgerStore {
  private bars = new Map<string, Map<IsoDate, PriceBar>>();
  private metadata = new Map<string, SymbolMetadata>();
  private transactions: Transaction[] = [];
  private futuresTrades: FuturesTrade[] = [];
  private bonds = new Map<string, BondPosition>();
  private investors = new Map<string, InvestorAccount>();
  private cashFlows: CashFlow[] = [];
  private feeRecords = new Map<string, FeeRecord>();
  private fundState: FundState = { highWaterMark: null, version: 0 };
  private navSnapshots = new Map<IsoDate, NAVSnapshot>();

  // ============================================================
  // Prices
  // ============================================================

  async upsertBars(bars: PriceBar[]): Promise<number> {
    let changed = 0;
    for (const bar of bars) {
      let series = this.bars.get(bar.symbol);
      if (!series) {
        series = new Map();
        this.bars.set(bar.symbol, series);
      }
      const existing = series.get(bar.date);
      if (existing && sameBar(existing, bar)) continue;
      series.set(bar.date, { ...bar });
      changed++;
    }
    return changed;
  }

  async getBars(symbol: string, start?: IsoDate, end?: IsoDate): Promise<PriceBar[]> {
    const series = this.bars.get(symbol);
    if (!series) return [];
    return Array.from(series.values())
      .filter(b => (!start || b.date >= start) && (!end || b.date <= end))
      .sort((a, b) => a.date.localeCompare(b.date))
      .map(b => ({ ...b }));
  }

  async latestBar(symbol: string, asOf: IsoDate): Promise<PriceBar | undefined> {
    const series = this.bars.get(symbol);
    if (!series) return undefined;
    let latest: PriceBar | undefined;
    for (const bar of series.values()) {
      if (bar.date <= asOf && (!latest || bar.date > latest.date)) latest = bar;
    }
    return latest ? { ...latest } : undefined;
  }

  async summarizeSymbol(symbol: string): Promise<SymbolRange | undefined> {
    const series = this.bars.get(symbol);
    if (!series || series.size === 0) return undefined;
    const dates = Array.from(series.keys()).sort();
    return { firstDate: dates[0], lastDate: dates[dates.length - 1], recordCount: dates.length };
  }

  async getMetadata(symbol: string): Promise<SymbolMetadata | undefined> {
    const meta = this.metadata.get(symbol);
    return meta ? { ...meta } : undefined;
  }

  async saveMetadata(metadata: SymbolMetadata): Promise<void> {
    this.metadata.set(metadata.symbol, { ...metadata });
  }

  async listMetadata(): Promise<SymbolMetadata[]> {
    return Array.from(this.metadata.values())
      .map(m => ({ ...m }))
      .sort((a, b) => a.symbol.localeCompare(b.symbol));
  }

  async deleteSymbol(symbol: string): Promise<number> {
    const deleted = this.bars.get(symbol)?.size ?? 0;
    this.bars.delete(symbol);
    this.metadata.delete(symbol);
    return deleted;
  }

  async deleteBarsBefore(date: IsoDate): Promise<number> {
    let deleted = 0;
    for (const series of this.bars.values()) {
      for (const day of Array.from(series.keys())) {
        if (day < date) {
          series.delete(day);
          deleted++;
        }
      }
    }
    return deleted;
  }

  async countBars(): Promise<number> {
    let count = 0;
    for (const series of this.bars.values()) count += series.size;
    return count;
  }

  // ============================================================
  // Ledgers
  // ============================================================

  async appendTransaction(tx: Transaction): Promise<void> {
    this.transactions.push({ ...tx });
  }

  async listTransactions(assetClass?: AssetClass): Promise<Transaction[]> {
    return this.transactions.filter(t => !assetClass || t.assetClass === assetClass).map(t => ({ ...t }));
  }
  async appendFuturesTrade(trade: FuturesTrade): Promise<void> {
    this.futuresTrades.push({ ...trade });
  }

  async listFuturesTrades(): Promise<FuturesTrade[]> {
    return this.futuresTrades.map(t => ({ ...t }));
  }


  async saveBond(bond: BondPosition): Promise<void> {
    this.bonds.set(bond.issueId, { ...bond });
  }

  async listBonds(): Promise<BondPosition[]> {
    return Array.from(this.bonds.values()).map(b => ({ ...b }));
  }

  async saveInvestor(investor: InvestorAccount): Promise<void> {
    this.investors.set(investor.investorId, { ...investor });
  }

  async listInvestors(): Promise<InvestorAccount[]> {
    return Array.from(this.investors.values()).map(i => ({ ...i }));
  }

  async appendCashFlow(flow: CashFlow): Promise<void> {
    this.cashFlows.push({ ...flow, amount: { ...flow.amount } });
  }

  async listCashFlows(): Promise<CashFlow[]> {
    return this.cashFlows.map(f => ({ ...f, amount: { ...f.amount } }));
  }

  async saveFeeRecord(record: FeeRecord): Promise<void> {
    this.feeRecords.set(record.id, { ...record });
  }

  async listFeeRecords(): Promise<FeeRecord[]> {
    return Array.from(this.feeRecords.values()).map(r => ({ ...r }));
  }

  async getFundState(): Promise<FundState> {
    return { ...this.fundState };
  }

  async compareAndSetFundState(expectedVersion: number, highWaterMark: number | null): Promise<FundState> {
    if (this.fundState.version !== expectedVersion) {
      throw new ConcurrencyError(
        `Fund state version is ${this.fundState.version}, expected ${expectedVersion}`,
        expectedVersion,
        this.fundState.version
      );
    }
    this.fundState = { highWaterMark, version: expectedVersion + 1 };
    return { ...this.fundState };
  }

  async saveNavSnapshot(snapshot: NAVSnapshot): Promise<void> {
    this.navSnapshots.set(snapshot.date, { ...snapshot });
  }

  async getNavSnapshot(date: IsoDate): Promise<NAVSnapshot | undefined> {
    const snapshot = this.navSnapshots.get(date);
    return snapshot ? { ...snapshot } : undefined;
  }

  async deleteNavSnapshotsFrom(date: IsoDate): Promise<number> {
    let deleted = 0;
    for (const day of Array.from(this.navSnapshots.keys())) {
      if (day >= date) {
        this.navSnapshots.delete(day);
        deleted++;
      }
    }
    return deleted;
  }
}
