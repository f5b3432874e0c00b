/**
 * NAV Calculator
 *
 *   nav = Σ position market value + Σ bond accrued value + cash − outstanding fees
 *
 * Everything is converted to the base currency at the as-of date. Snapshots are
 * memoized per date; an event dated D drops memoized snapshots on or after D.
 * `commit` persists a snapshot so fee periods can use it as a boundary.
 */

import type { BondIndexationEngine, BondValuation } from "./bondIndexation";
import type { CashLedger } from "./cashLedger";
import type { FeeEngine } from "./feeEngine";
import type { BarSource, FxRates } from "./fxRates";
import { quoteCurrency, type PositionLedger, type PositionValuation, type PriceLookup } from "./positionLedger";
import type { LedgerStore } from "./stores";
import type { BondPosition, CurrencyCode, IsoDate, NAVSnapshot, SymbolMetadata } from "./types";

/** Cached bars plus the coverage record of how far each symbol was fetched. */
export interface NavPriceSource extends BarSource {
  getMetadata(symbol: string): Promise<SymbolMetadata | undefined>;
}

export interface NavSources {
  baseCurrency: CurrencyCode;
  ledgers: PositionLedger[];
  bonds: () => BondPosition[];
  indexation: BondIndexationEngine;
  cash: CashLedger;
  fees: FeeEngine;
  prices: NavPriceSource;
  fx: FxRates;
  store: LedgerStore;
}

/** A position valuation with base-currency figures next to the native ones. */
export interface ValuedPosition extends PositionValuation {
  baseCurrency: CurrencyCode;
  marketValueBase: number;
  costBasisBase: number;
  unrealizedPnlBase: number;
  realizedPnlBase: number;
}

export interface ValuedBond extends BondValuation {
  currency: CurrencyCode;
  accruedValueBase: number;
}

export interface NavBreakdown {
  snapshot: NAVSnapshot;
  positions: ValuedPosition[];
  bonds: ValuedBond[];
}

export interface InvestorAllocation {
  investorId: string;
  name: string;
  stakePct: number;
  netContribution: number;
  investorNav: number;
  unrealizedGain: number;
  returnPct: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export class NAVCalculator {
  private materialized = new Map<IsoDate, NavBreakdown>();

  constructor(private readonly sources: NavSources) {}

  get baseCurrency(): CurrencyCode {
    return this.sources.baseCurrency;
  }

  /**
   * Full valuation for `asOf`, memoized until an event on or before `asOf`.
   */
  async breakdown(asOf: IsoDate): Promise<NavBreakdown> {
    const cached = this.materialized.get(asOf);
    if (cached) return cached;

    const { baseCurrency, fx } = this.sources;
    let approximated = false;

    const lookup: PriceLookup = async (position, quote, date) => {
      const bar = await this.sources.prices.latestBar(quote, date);
      if (!bar) return undefined;
      // a symbol the cache has fetched but not through `date` had its last refresh fail
      const metadata = await this.sources.prices.getMetadata(quote);
      const stale = metadata !== undefined && (metadata.coveredTo === null || metadata.coveredTo < date);
      const priceCurrency = quoteCurrency(quote, position.currency);
      if (priceCurrency === position.currency) return { price: bar.close, date: bar.date, stale };
      const converted = await fx.convert({ amount: bar.close, currency: priceCurrency }, position.currency, date);
      approximated = approximated || converted.approximated;
      return { price: converted.amount, date: bar.date, stale };
    };

    const toBase = async (amount: number, currency: CurrencyCode) => {
      const converted = await fx.convert({ amount, currency }, baseCurrency, asOf);
      approximated = approximated || converted.approximated;
      return converted.amount;
    };

    const positions: ValuedPosition[] = [];
    for (const ledger of this.sources.ledgers) {
      for (const valuation of await ledger.valuate(asOf, lookup)) {
        positions.push({
          ...valuation,
          baseCurrency,
          marketValueBase: await toBase(valuation.marketValue, valuation.currency),
          costBasisBase: await toBase(valuation.costBasis, valuation.currency),
          unrealizedPnlBase: await toBase(valuation.unrealizedPnl, valuation.currency),
          realizedPnlBase: await toBase(valuation.realizedPnl, valuation.currency),
        });
      }
    }

    const bondPositions = this.sources.bonds();
    const bonds: ValuedBond[] = [];
    for (const valuation of this.sources.indexation.valueAll(bondPositions, asOf)) {
      const currency = bondPositions.find(b => b.issueId === valuation.issueId)?.currency ?? baseCurrency;
      approximated = approximated || valuation.approximated;
      bonds.push({ ...valuation, currency, accruedValueBase: await toBase(valuation.accruedValue, currency) });
    }

    const equityValue = positions.filter(p => p.assetClass === "equity").reduce((sum, p) => sum + p.marketValueBase, 0);
    const cryptoValue = positions.filter(p => p.assetClass === "crypto").reduce((sum, p) => sum + p.marketValueBase, 0);
    const bondValue = bonds.reduce((sum, b) => sum + b.accruedValueBase, 0);
    const portfolioValue = equityValue + cryptoValue + bondValue;
    const cashPosition = await this.sources.cash.cashPosition(asOf);
    const outstandingFees = this.sources.fees.outstandingFees(asOf);

    const snapshot: NAVSnapshot = {
      date: asOf,
      currency: baseCurrency,
      equityValue,
      cryptoValue,
      bondValue,
      portfolioValue,
      cashPosition,
      outstandingFees,
      nav: portfolioValue + cashPosition - outstandingFees,
      stale: positions.some(p => p.stale),
      approximated,
    };

    const result = { snapshot, positions, bonds };
    this.materialized.set(asOf, result);
    return result;
  }

  async nav(asOf: IsoDate): Promise<NAVSnapshot> {
    return { ...(await this.breakdown(asOf)).snapshot };
  }

  /** Snapshots for each date, in the given order. */
  async history(dates: IsoDate[]): Promise<NAVSnapshot[]> {
    const snapshots: NAVSnapshot[] = [];
    for (const date of dates) snapshots.push(await this.nav(date));
    return snapshots;
  }

  /** Persist the snapshot for `asOf` as a fee-period boundary. */
  async commit(asOf: IsoDate): Promise<NAVSnapshot> {
    const snapshot = await this.nav(asOf);
    await this.sources.store.saveNavSnapshot(snapshot);
    console.log(`[NAV] Committed ${asOf}: ${snapshot.nav.toFixed(2)} ${snapshot.currency}`);
    return snapshot;
  }

  committed(date: IsoDate): Promise<NAVSnapshot | undefined> {
    return this.sources.store.getNavSnapshot(date);
  }

  /**
   * Drop memoized snapshots dated on or after `date`. With `dropCommitted`,
   * persisted boundary snapshots from that date go too.
   */
  async invalidateFrom(date: IsoDate, dropCommitted = false): Promise<void> {
    let dropped = 0;
    for (const key of Array.from(this.materialized.keys())) {
      if (key >= date) {
        this.materialized.delete(key);
        dropped++;
      }
    }
    if (dropCommitted) {
      const removed = await this.sources.store.deleteNavSnapshotsFrom(date);
      if (removed > 0) console.log(`[NAV] Dropped ${removed} committed snapshot(s) from ${date}`);
    }
    if (dropped > 0) console.log(`[NAV] Invalidated ${dropped} snapshot(s) from ${date}`);
  }

  invalidateAll(): void {
    this.materialized.clear();
  }

  /**
   * Split the fund NAV by stake. Cent rounding goes to the largest holder so the
   * allocations add up to the fund NAV.
   */
  async allocateToInvestors(asOf: IsoDate): Promise<InvestorAllocation[]> {
    const { nav } = await this.nav(asOf);
    const stakes = (await this.sources.cash.investorStakes(asOf)).filter(s => s.stakePct > 0);
    if (stakes.length === 0) return [];

    const fundNav = round2(nav);
    const rows = stakes.map(stake => {
      const investorNav = round2(fundNav * stake.stakePct);
      return {
        investorId: stake.investorId,
        name: stake.name,
        stakePct: stake.stakePct,
        netContribution: stake.netContribution,
        investorNav,
        unrealizedGain: 0,
        returnPct: 0,
      };
    });

    const remainder = round2(fundNav - rows.reduce((sum, r) => sum + r.investorNav, 0));
    if (remainder !== 0) {
      const largest = rows.reduce((best, r) => (r.stakePct > best.stakePct ? r : best), rows[0]);
      largest.investorNav = round2(largest.investorNav + remainder);
    }

    for (const row of rows) {
      row.unrealizedGain = round2(row.investorNav - row.netContribution);
      row.returnPct = row.netContribution > 0 ? (row.unrealizedGain / row.netContribution) * 100 : 0;
    }
    return rows;
  }
}
