/**
 * Portfolio Aggregator: the fund-level facade.
 *
 * Read models:
 *   - consolidatedSummary: value, P&L and allocation in any base currency
 *   - investorAllocations, feeSummary, performance, allPositions, topPerformers, bondReport, futuresReport
 *
 * Writes (imports, trades, bonds, cash flows, fees, NAV commits, price refresh)
 * run through the context's serialized writer and invalidate the NAV memo from
 * the earliest date they touch.
 */

import { randomUUID } from "node:crypto";
import { errorMessage, ValidationError } from "./_core/errors";
import type { AllocationSlice, BondSummary, MaturityBucket } from "./bondIndexation";
import type { NewCashFlow } from "./cashLedger";
import { isIsoDate, minDate, weekdaysBetween } from "./dates";
import type { FeeCalculation, FeeSummary } from "./feeEngine";
import {
  expiringContracts,
  futuresQuoteSymbol,
  type ContractPosition,
  type ContractValuation,
  type FuturesSummary,
} from "./futuresLedger";
import { fxSymbol } from "./fxRates";
import { parseBondsCsv, parseCashFlowsCsv, parseFeeRecordsCsv, parseFuturesCsv, parseTransactionsCsv } from "./ingestion";
import type { InvestorAllocation, ValuedBond, ValuedPosition } from "./navCalculator";
import {
  benchmarkComparison,
  benchmarkRelative,
  dailyReturns,
  drawdownEpisodes,
  monthlyReturns,
  riskMetrics,
  rollingMetrics,
  timeWeightedReturn,
  TRADING_DAYS_PER_YEAR,
  type ComparisonPoint,
  type DrawdownEpisode,
  type MonthlyReturn,
  type RelativeMetrics,
  type RiskMetrics,
  type RollingPoint,
  type SeriesPoint,
} from "./performanceAnalytics";
import type { PortfolioContext } from "./portfolioContext";
import { quoteCurrency, quoteSymbol } from "./positionLedger";
import { withRetry } from "./retry";
import type { BulkFetchReport } from "./timeSeriesCache";
import type {
  AssetClass,
  BondPosition,
  CashFlow,
  CurrencyCode,
  FeeRecord,
  FloatingIndexer,
  FuturesTrade,
  IsoDate,
  NAVSnapshot,
  Position,
  RowResult,
  Transaction,
} from "./types";

// ============================================================
// TYPES
// ============================================================

export type NewTransaction = Omit<Transaction, "id"> & { id?: string };
export type NewFuturesTrade = Omit<FuturesTrade, "id"> & { id?: string };

export interface ImportReport<T> {
  results: RowResult<T>[];
  accepted: number;
  rejected: number;
  skipped: number[]; // rows already imported by an earlier run
}

export type AssetBucket = "equity" | "crypto" | "bonds";

export interface ConsolidatedSummary {
  asOf: IsoDate;
  baseCurrency: CurrencyCode;
  totalValue: number; // positions + bonds
  cashPosition: number;
  outstandingFees: number;
  nav: number;
  totalCost: number;
  unrealizedPnl: number;
  realizedPnl: number;
  totalPnl: number;
  totalReturnPct: number;
  positionCount: number;
  bondCount: number;
  allocationByAssetClass: Record<AssetBucket, { value: number; pct: number }>;
  exchangeRates: Record<string, number>;
  stale: boolean;
  approximated: boolean;
}

export interface PerformanceReport {
  start: IsoDate;
  end: IsoDate;
  benchmarkSymbol: string;
  navSeries: SeriesPoint[];
  riskMetrics: RiskMetrics;
  timeWeightedReturn: number;
  drawdownEpisodes: DrawdownEpisode[];
  benchmarkComparison: ComparisonPoint[];
  alpha: RelativeMetrics;
  rolling: RollingPoint[];
  monthlyReturns: MonthlyReturn[];
  stale: boolean;
  approximated: boolean;
}

export interface TopPerformers {
  best: ValuedPosition[];
  worst: ValuedPosition[];
}

export interface BondReport {
  asOf: IsoDate;
  bonds: ValuedBond[];
  summary: BondSummary;
  byIndexer: Record<string, AllocationSlice>;
  byIssuer: Record<string, AllocationSlice>;
  maturitySchedule: MaturityBucket[];
}

export interface FuturesReport {
  asOf: IsoDate;
  baseCurrency: CurrencyCode;
  contracts: ContractValuation[]; // own currency
  summary: FuturesSummary; // base currency
  expiring: ContractValuation[];
  stale: boolean;
  approximated: boolean;
}

export interface RefreshReport {
  prices: BulkFetchReport;
  indexers: Partial<Record<FloatingIndexer, number | null>>; // months loaded, null = fallback in use
}

function toReport<T>(results: RowResult<T>[], skipped: number[] = []): ImportReport<T> {
  results.sort((a, b) => a.row - b.row);
  const accepted = results.filter(r => r.ok).length;
  if (skipped.length > 0) console.log(`[Import] ${skipped.length} row(s) already imported, skipped`);
  return { results, accepted, rejected: results.length - accepted, skipped: skipped.sort((a, b) => a - b) };
}

function earliestOf(current: IsoDate | undefined, date: IsoDate): IsoDate {
  return current === undefined ? date : minDate(current, date);
}

/** Move each external flow onto the first series date at or after it. */
function flowsOnSeriesDates(flows: Map<IsoDate, number>, dates: IsoDate[]): Map<IsoDate, number> {
  const bucketed = new Map<IsoDate, number>();
  if (dates.length === 0) return bucketed;
  for (const [date, amount] of Array.from(flows.entries())) {
    if (date <= dates[0]) continue;
    const target = dates.find(d => d >= date);
    if (target === undefined) continue;
    bucketed.set(target, (bucketed.get(target) ?? 0) + amount);
  }
  return bucketed;
}

// ============================================================
// AGGREGATOR
// ============================================================

export class PortfolioAggregator {
  constructor(private readonly ctx: PortfolioContext) {}

  // ============================================================
  // READ MODELS
  // ============================================================

  async consolidatedSummary(
    baseCurrency: CurrencyCode = this.ctx.config.baseCurrency,
    asOf: IsoDate = this.ctx.clock()
  ): Promise<ConsolidatedSummary> {
    const { fx } = this.ctx;
    const { snapshot, positions, bonds } = await this.ctx.nav.breakdown(asOf);
    let approximated = snapshot.approximated;

    const convert = async (amount: number, currency: CurrencyCode) => {
      const converted = await fx.convert({ amount, currency }, baseCurrency, asOf);
      approximated = approximated || converted.approximated;
      return converted.amount;
    };

    // closed positions still carry realized P&L; valuation skips them
    let realizedPnl = 0;
    for (const ledger of [this.ctx.equity, this.ctx.crypto]) {
      for (const position of ledger.positionsAsOf(asOf)) {
        realizedPnl += await convert(position.realizedPnl, position.currency);
      }
    }

    let unrealizedPnl = 0;
    let totalCost = 0;
    for (const p of positions) {
      unrealizedPnl += await convert(p.unrealizedPnl, p.currency);
      totalCost += await convert(p.costBasis, p.currency);
    }
    for (const b of bonds) {
      unrealizedPnl += await convert(b.pnl, b.currency);
      totalCost += await convert(b.principal, b.currency);
    }

    const equity = await convert(snapshot.equityValue, snapshot.currency);
    const crypto = await convert(snapshot.cryptoValue, snapshot.currency);
    const bondValue = await convert(snapshot.bondValue, snapshot.currency);
    const totalValue = equity + crypto + bondValue;
    const slice = (value: number) => ({ value, pct: totalValue > 0 ? (value / totalValue) * 100 : 0 });
    const totalPnl = unrealizedPnl + realizedPnl;

    const currencies = new Set<CurrencyCode>([snapshot.currency]);
    for (const p of positions) currencies.add(p.currency);
    for (const b of bonds) currencies.add(b.currency);

    return {
      asOf,
      baseCurrency,
      totalValue,
      cashPosition: await convert(snapshot.cashPosition, snapshot.currency),
      outstandingFees: await convert(snapshot.outstandingFees, snapshot.currency),
      nav: await convert(snapshot.nav, snapshot.currency),
      totalCost,
      unrealizedPnl,
      realizedPnl,
      totalPnl,
      totalReturnPct: totalCost > 0 ? (totalPnl / totalCost) * 100 : 0,
      positionCount: positions.length,
      bondCount: bonds.filter(b => !b.matured).length,
      allocationByAssetClass: { equity: slice(equity), crypto: slice(crypto), bonds: slice(bondValue) },
      exchangeRates: await fx.exchangeRates(baseCurrency, Array.from(currencies), asOf),
      stale: snapshot.stale,
      approximated,
    };
  }

  investorAllocations(asOf: IsoDate = this.ctx.clock()): Promise<InvestorAllocation[]> {
    return this.ctx.nav.allocateToInvestors(asOf);
  }

  feeSummary(start?: IsoDate, end?: IsoDate): Promise<FeeSummary> {
    return this.ctx.fees.feeSummary(start, end);
  }

  nav(asOf: IsoDate = this.ctx.clock()): Promise<NAVSnapshot> {
    return this.ctx.nav.nav(asOf);
  }

  /**
   * NAV series on the benchmark's trading days (weekdays when the benchmark has
   * no cached bars), with risk, drawdown and benchmark-relative statistics.
   * Dates before the fund holds anything are left out.
   */
  async performance(
    start: IsoDate,
    end: IsoDate,
    benchmarkSymbol: string = this.ctx.config.benchmarkSymbol,
    window: number = TRADING_DAYS_PER_YEAR
  ): Promise<PerformanceReport> {
    if (!isIsoDate(start) || !isIsoDate(end) || end < start) {
      throw new ValidationError(`Invalid performance range ${start}..${end}`);
    }
    const riskFreeRate = this.ctx.config.riskFreeRate;
    const benchmarkBars = await this.ctx.cache.getHistory(benchmarkSymbol, start, end);
    const dates = benchmarkBars.length > 0 ? benchmarkBars.map(b => b.date) : weekdaysBetween(start, end);

    const snapshots = await this.ctx.nav.history(dates);
    const firstActive = snapshots.findIndex(s => s.nav > 0);
    const active = firstActive >= 0 ? snapshots.slice(firstActive) : [];
    const navSeries = active.map(s => ({ date: s.date, value: s.nav }));
    const benchmarkSeries = benchmarkBars.map(b => ({ date: b.date, value: b.adjClose }));

    const flows = flowsOnSeriesDates(
      await this.ctx.cash.netFlowsByDate(),
      navSeries.map(p => p.date)
    );

    return {
      start,
      end,
      benchmarkSymbol,
      navSeries,
      riskMetrics: riskMetrics(navSeries, riskFreeRate),
      timeWeightedReturn: timeWeightedReturn(navSeries, flows),
      drawdownEpisodes: drawdownEpisodes(navSeries),
      benchmarkComparison: benchmarkComparison(navSeries, benchmarkSeries),
      alpha: benchmarkRelative(navSeries, benchmarkSeries, riskFreeRate),
      rolling: rollingMetrics(dailyReturns(navSeries), window, riskFreeRate),
      monthlyReturns: monthlyReturns(navSeries),
      stale: active.some(s => s.stale),
      approximated: active.some(s => s.approximated),
    };
  }

  /** Open positions, largest first. */
  async allPositions(asOf: IsoDate = this.ctx.clock()): Promise<ValuedPosition[]> {
    const { positions } = await this.ctx.nav.breakdown(asOf);
    return [...positions].sort((a, b) => b.marketValueBase - a.marketValueBase);
  }

  async topPerformers(n = 5, asOf: IsoDate = this.ctx.clock()): Promise<TopPerformers> {
    const ranked = [...(await this.ctx.nav.breakdown(asOf)).positions].sort((a, b) => b.returnPct - a.returnPct);
    return {
      best: ranked.slice(0, n),
      worst: ranked.slice(-n).reverse(),
    };
  }

  async bondReport(asOf: IsoDate = this.ctx.clock()): Promise<BondReport> {
    const { indexation } = this.ctx;
    const bonds = (await this.ctx.nav.breakdown(asOf)).bonds.map(b => ({ ...b, approximatedMonths: [...b.approximatedMonths] }));
    return {
      asOf,
      bonds,
      summary: indexation.summary(bonds),
      byIndexer: indexation.allocationBy(bonds, "indexer"),
      byIssuer: indexation.allocationBy(bonds, "issuer"),
      maturitySchedule: indexation.maturitySchedule(this.ctx.bonds(), asOf),
    };
  }

  cashFlowHistory(start?: IsoDate, end?: IsoDate): CashFlow[] {
    return this.ctx.cash.cashFlowHistory(start, end);
  }

  transactions(assetClass: AssetClass, symbol?: string): Transaction[] {
    return this.ctx.ledger(assetClass).transactions(symbol);
  }

  // ============================================================
  // TRANSACTIONS
  // ============================================================

  /** Store a transaction the ledger accepted; if storing fails the ledger drops it again. */
  private async persistTransaction(tx: Transaction): Promise<void> {
    try {
      await this.ctx.store.appendTransaction(tx);
    } catch (error) {
      this.ctx.ledger(tx.assetClass).revert(tx);
      console.error(`[Aggregator] Transaction ${tx.id} not stored, ledger rolled back: ${errorMessage(error)}`);
      throw error;
    }
  }

  recordTransaction(input: NewTransaction): Promise<Position> {
    return this.ctx.write("record transaction", async () => {
      if (!isIsoDate(input.date)) throw new ValidationError(`Invalid transaction date: ${input.date}`);
      const tx: Transaction = { ...input, id: input.id ?? randomUUID(), symbol: input.symbol.trim().toUpperCase() };
      const ledger = this.ctx.ledger(tx.assetClass);
      if (ledger.has(tx.id)) throw new ValidationError(`Transaction ${tx.id} is already recorded`);
      const applied = ledger.apply(tx);
      if (!applied.ok) throw new ValidationError(applied.errors.join("; "));
      await this.persistTransaction(tx);
      await this.ctx.nav.invalidateFrom(tx.date, true);
      return applied.value;
    });
  }

  /**
   * Rows are applied in trade-date order (file order within a date), so a sell
   * listed above the buy it closes still finds the position. Rows whose id an
   * earlier import already stored are skipped.
   */
  ingestTransactions(csv: string, assetClass: AssetClass): Promise<ImportReport<Position>> {
    return this.ctx.write(`import ${assetClass} transactions`, async () => {
      const ledger = this.ctx.ledger(assetClass);
      const results: RowResult<Position>[] = [];
      const skipped: number[] = [];
      const rows: Array<{ row: number; tx: Transaction }> = [];
      let earliest: IsoDate | undefined;

      for (const parsed of parseTransactionsCsv(csv, assetClass)) {
        if (parsed.ok) rows.push({ row: parsed.row, tx: parsed.value });
        else results.push(parsed);
      }
      rows.sort((a, b) => a.tx.date.localeCompare(b.tx.date) || a.row - b.row);

      try {
        for (const { row, tx } of rows) {
          if (ledger.has(tx.id)) {
            skipped.push(row);
            continue;
          }
          const applied = ledger.apply(tx);
          if (!applied.ok) {
            results.push({ ok: false, row, errors: applied.errors });
            continue;
          }
          await this.persistTransaction(tx);
          earliest = earliestOf(earliest, tx.date);
          results.push({ ok: true, row, value: applied.value });
        }
      } finally {
        if (earliest) await this.ctx.nav.invalidateFrom(earliest, true);
      }
      return toReport(results, skipped);
    });
  }

  // ============================================================
  // FUTURES
  // ============================================================

  /**
   * Open contracts marked to the cached `<root>=F` quote, totals converted to
   * the base currency, and the contracts expiring within `daysAhead` days.
   */
  async futuresReport(
    asOf: IsoDate = this.ctx.clock(),
    daysAhead = 30,
    baseCurrency: CurrencyCode = this.ctx.config.baseCurrency
  ): Promise<FuturesReport> {
    const { cache, fx, futures } = this.ctx;
    const contracts = await futures.valuate(asOf, async (_contract, quote, date) => {
      const bar = await cache.latestBar(quote, date);
      if (!bar) return undefined;
      const metadata = await cache.getMetadata(quote);
      const stale = metadata !== undefined && (metadata.coveredTo === null || metadata.coveredTo < date);
      return { price: bar.close, date: bar.date, stale };
    });

    let approximated = false;
    const convert = async (amount: number, currency: CurrencyCode) => {
      const converted = await fx.convert({ amount, currency }, baseCurrency, asOf);
      approximated = approximated || converted.approximated;
      return converted.amount;
    };

    // closed contracts still carry realized P&L and commissions
    let realizedPnl = 0;
    let commission = 0;
    for (const c of futures.positionsAsOf(asOf)) {
      realizedPnl += await convert(c.realizedPnl, c.currency);
      commission += await convert(c.commission, c.currency);
    }
    let unrealizedPnl = 0;
    let totalNotional = 0;
    for (const v of contracts) {
      unrealizedPnl += await convert(v.unrealizedPnl, v.currency);
      totalNotional += await convert(v.notional, v.currency);
    }
    const summary: FuturesSummary = {
      contracts: contracts.length,
      longContracts: contracts.filter(v => v.netSide === "long").length,
      shortContracts: contracts.filter(v => v.netSide === "short").length,
      totalNotional,
      unrealizedPnl,
      realizedPnl,
      commission,
      totalPnl: realizedPnl + unrealizedPnl - commission,
    };

    return {
      asOf,
      baseCurrency,
      contracts,
      summary,
      expiring: expiringContracts(contracts, daysAhead),
      stale: contracts.some(v => v.stale),
      approximated,
    };
  }

  futuresTransactions(): FuturesTrade[] {
    return this.ctx.futures.transactions();
  }

  private async persistFuturesTrade(trade: FuturesTrade): Promise<void> {
    try {
      await this.ctx.store.appendFuturesTrade(trade);
    } catch (error) {
      this.ctx.futures.revert(trade);
      console.error(`[Aggregator] Futures trade ${trade.id} not stored, ledger rolled back: ${errorMessage(error)}`);
      throw error;
    }
  }

  recordFuturesTrade(input: NewFuturesTrade): Promise<ContractPosition> {
    return this.ctx.write("record futures trade", async () => {
      if (!isIsoDate(input.date)) throw new ValidationError(`Invalid trade date: ${input.date}`);
      if (!isIsoDate(input.expiry)) throw new ValidationError(`Invalid expiry: ${input.expiry}`);
      const trade: FuturesTrade = {
        ...input,
        id: input.id ?? randomUUID(),
        symbol: input.symbol.trim().toUpperCase(),
        exchange: input.exchange.trim().toUpperCase(),
      };
      if (this.ctx.futures.has(trade.id)) throw new ValidationError(`Futures trade ${trade.id} is already recorded`);
      const applied = this.ctx.futures.apply(trade);
      if (!applied.ok) throw new ValidationError(applied.errors.join("; "));
      await this.persistFuturesTrade(trade);
      return applied.value;
    });
  }

  /** Same ordering and re-import rules as `ingestTransactions`. */
  ingestFuturesCsv(csv: string): Promise<ImportReport<ContractPosition>> {
    return this.ctx.write("import futures", async () => {
      const results: RowResult<ContractPosition>[] = [];
      const skipped: number[] = [];
      const rows: Array<{ row: number; trade: FuturesTrade }> = [];
      for (const parsed of parseFuturesCsv(csv)) {
        if (parsed.ok) rows.push({ row: parsed.row, trade: parsed.value });
        else results.push(parsed);
      }
      rows.sort((a, b) => a.trade.date.localeCompare(b.trade.date) || a.row - b.row);

      for (const { row, trade } of rows) {
        if (this.ctx.futures.has(trade.id)) {
          skipped.push(row);
          continue;
        }
        const applied = this.ctx.futures.apply(trade);
        if (!applied.ok) {
          results.push({ ok: false, row, errors: applied.errors });
          continue;
        }
        await this.persistFuturesTrade(trade);
        results.push({ ok: true, row, value: applied.value });
      }
      return toReport(results, skipped);
    });
  }

  // ============================================================
  // BONDS
  // ============================================================

  private bondErrors(bond: BondPosition): string[] {
    const errors: string[] = [];
    if (bond.issueId.trim() === "") errors.push("issueId: must not be empty");
    if (!isIsoDate(bond.issueDate)) errors.push(`issueDate: invalid date ${bond.issueDate}`);
    if (!isIsoDate(bond.maturityDate)) errors.push(`maturityDate: invalid date ${bond.maturityDate}`);
    if (bond.maturityDate <= bond.issueDate) errors.push("maturityDate: must be after issueDate");
    if (!(bond.principal > 0)) errors.push("principal: must be positive");
    if (!(bond.quantity > 0)) errors.push("quantity: must be positive");
    if (!Number.isFinite(bond.percentIndexed)) errors.push("percentIndexed: must be a number");
    return errors;
  }

  private async saveBond(bond: BondPosition): Promise<void> {
    await this.ctx.store.saveBond(bond);
    this.ctx.trackBond(bond);
  }

  addBond(bond: BondPosition): Promise<BondPosition> {
    return this.ctx.write("add bond", async () => {
      const errors = this.bondErrors(bond);
      if (errors.length > 0) throw new ValidationError(errors.join("; "));
      await this.saveBond(bond);
      await this.ctx.nav.invalidateFrom(bond.issueDate, true);
      return { ...bond };
    });
  }

  ingestBonds(csv: string): Promise<ImportReport<BondPosition>> {
    return this.ctx.write("import bonds", async () => {
      const results: RowResult<BondPosition>[] = [];
      let earliest: IsoDate | undefined;
      for (const parsed of parseBondsCsv(csv)) {
        if (!parsed.ok) {
          results.push(parsed);
          continue;
        }
        const errors = this.bondErrors(parsed.value);
        if (errors.length > 0) {
          results.push({ ok: false, row: parsed.row, errors });
          continue;
        }
        await this.saveBond(parsed.value);
        earliest = earliestOf(earliest, parsed.value.issueDate);
        results.push(parsed);
      }
      if (earliest) await this.ctx.nav.invalidateFrom(earliest, true);
      return toReport(results);
    });
  }

  // ============================================================
  // CASH FLOWS
  // ============================================================

  addCashFlow(input: NewCashFlow): Promise<CashFlow> {
    return this.ctx.write("add cash flow", async () => {
      const flow = await this.ctx.cash.addCashFlow(input);
      await this.ctx.nav.invalidateFrom(flow.date, true);
      return flow;
    });
  }

  ingestCashFlows(csv: string): Promise<ImportReport<CashFlow>> {
    return this.ctx.write("import cash flows", async () => {
      const results: RowResult<CashFlow>[] = [];
      const skipped: number[] = [];
      let earliest: IsoDate | undefined;
      for (const parsed of parseCashFlowsCsv(csv)) {
        if (!parsed.ok) {
          results.push(parsed);
          continue;
        }
        if (parsed.value.id !== undefined && this.ctx.cash.hasFlow(parsed.value.id)) {
          skipped.push(parsed.row);
          continue;
        }
        try {
          const flow = await this.ctx.cash.addCashFlow(parsed.value);
          earliest = earliestOf(earliest, flow.date);
          results.push({ ok: true, row: parsed.row, value: flow });
        } catch (error) {
          if (!(error instanceof ValidationError)) throw error;
          results.push({ ok: false, row: parsed.row, errors: [error.message] });
        }
      }
      if (earliest) await this.ctx.nav.invalidateFrom(earliest, true);
      return toReport(results, skipped);
    });
  }

  // ============================================================
  // FEES & NAV
  // ============================================================

  commitNav(date: IsoDate): Promise<NAVSnapshot> {
    return this.ctx.write("commit NAV", () => this.ctx.nav.commit(date));
  }

  scheduleFees(periodStart: IsoDate, periodEnd: IsoDate): Promise<FeeRecord[]> {
    return this.ctx.write("schedule fees", () => this.ctx.fees.schedule(periodStart, periodEnd));
  }

  /**
   * Fees for a period. NAVs come from committed snapshots unless given.
   */
  calculateFees(
    periodStart: IsoDate,
    periodEnd: IsoDate,
    navs: { navStart?: number; navEnd?: number } = {}
  ): Promise<FeeCalculation> {
    return this.ctx.write("calculate fees", async () => {
      const calculation = await this.ctx.fees.calculate({ periodStart, periodEnd, ...navs });
      await this.ctx.nav.invalidateFrom(periodEnd);
      return calculation;
    });
  }

  markFeePaid(feeRecordId: string, paymentDate: IsoDate): Promise<FeeRecord> {
    return this.ctx.write("mark fee paid", async () => {
      const record = await this.ctx.fees.markPaid(feeRecordId, paymentDate);
      await this.ctx.nav.invalidateFrom(minDate(record.periodEnd, paymentDate));
      return record;
    });
  }

  ingestFeeRecords(csv: string): Promise<ImportReport<FeeRecord>> {
    return this.ctx.write("import fee records", async () => {
      const results: RowResult<FeeRecord>[] = [];
      const skipped: number[] = [];
      let earliest: IsoDate | undefined;
      for (const parsed of parseFeeRecordsCsv(csv, this.ctx.config.fees.currency)) {
        if (!parsed.ok) {
          results.push(parsed);
          continue;
        }
        if (this.ctx.fees.hasRecord(parsed.value.id)) {
          skipped.push(parsed.row);
          continue;
        }
        try {
          const record = await this.ctx.fees.importRecord(parsed.value);
          earliest = earliestOf(earliest, record.periodEnd);
          results.push({ ok: true, row: parsed.row, value: record });
        } catch (error) {
          if (!(error instanceof ValidationError)) throw error;
          results.push({ ok: false, row: parsed.row, errors: [error.message] });
        }
      }
      if (earliest) await this.ctx.nav.invalidateFrom(earliest);
      return toReport(results, skipped);
    });
  }

  // ============================================================
  // MARKET DATA
  // ============================================================

  /** Quote symbols of every traded position, the FX pairs they need, and the benchmark. */
  trackedSymbols(): string[] {
    const base = this.ctx.config.baseCurrency;
    const symbols = new Set<string>([this.ctx.config.benchmarkSymbol]);
    const currencies = new Set<CurrencyCode>();
    for (const ledger of [this.ctx.equity, this.ctx.crypto]) {
      for (const position of ledger.positions()) {
        const quote = quoteSymbol(position.symbol, position.assetClass, position.market);
        symbols.add(quote);
        currencies.add(position.currency);
        currencies.add(quoteCurrency(quote, position.currency));
      }
    }
    for (const contract of this.ctx.futures.positionsAsOf(this.ctx.clock())) {
      symbols.add(futuresQuoteSymbol(contract.symbol));
      currencies.add(contract.currency);
    }
    for (const bond of this.ctx.bonds()) currencies.add(bond.currency);
    for (const flow of this.ctx.cash.cashFlowHistory()) currencies.add(flow.amount.currency);
    for (const currency of Array.from(currencies)) {
      if (currency !== base) symbols.add(fxSymbol(currency, base));
    }
    return Array.from(symbols).sort();
  }

  /**
   * Fill the price cache for [start, end] and reload the indexer series the
   * bonds need. Failed indexer loads leave the fixed fallback rates in effect.
   */
  refreshPrices(
    start: IsoDate,
    end: IsoDate,
    options: { symbols?: string[]; signal?: AbortSignal; forceRefresh?: boolean } = {}
  ): Promise<RefreshReport> {
    return this.ctx.write("refresh prices", async () => {
      const symbols = options.symbols ?? this.trackedSymbols();
      const prices = await this.ctx.cache.bulkFetch(symbols, start, end, {
        signal: options.signal,
        forceRefresh: options.forceRefresh,
      });

      const bonds = this.ctx.bonds();
      const indexers = new Set<FloatingIndexer>();
      for (const bond of bonds) {
        if (bond.indexer !== "PREFIXADO") indexers.add(bond.indexer);
      }
      const seriesStart = bonds.reduce((earliest, b) => minDate(earliest, b.issueDate), start);

      const loaded: RefreshReport["indexers"] = {};
      for (const indexer of Array.from(indexers).sort()) {
        const outcome = await withRetry(
          `${indexer} series`,
          () => this.ctx.indexerSource.fetchMonthlySeries(indexer, seriesStart, end),
          { config: this.ctx.config.cache.retry, sleep: this.ctx.config.cache.sleep, signal: options.signal, tag: "Indexers" }
        );
        if (outcome.ok) {
          this.ctx.indexation.setSeries(indexer, outcome.value);
          loaded[indexer] = outcome.value.length;
        } else {
          console.warn(`[Indexers] ${indexer}: using fallback rate (${outcome.errors.at(-1) ?? "no data"})`);
          loaded[indexer] = null;
        }
      }

      await this.ctx.nav.invalidateFrom(minDate(start, seriesStart));
      return { prices, indexers: loaded };
    });
  }
}
