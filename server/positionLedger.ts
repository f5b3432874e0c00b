/**
 * Position Ledger: weighted-average cost accounting for one asset class.
 *
 * Rules:
 *   - Buy:  avgCost' = (q·avg + buyQty·buyPrice) / (q + buyQty)
 *   - Sell: realized += sellQty·(sellPrice − avg); avgCost unchanged
 *   - A fully closed position keeps its avgCost for reference
 *
 * Every applied transaction leaves a checkpoint, so positions can be read as of
 * any past date. Back-dated transactions rebuild only their own symbol.
 */

import type { AssetClass, CurrencyCode, IsoDate, Market, Position, RowResult, Transaction } from "./types";

// ============================================================
// TYPES
// ============================================================

export type OversellPolicy = "reject" | "allow_short";

export interface PositionState {
  quantity: number;
  avgCost: number;
  realizedPnl: number;
}

export type TradeOutcome = { ok: true; state: PositionState } | { ok: false; error: string };

interface Checkpoint {
  tx: Transaction;
  state: PositionState;
}

export interface PriceQuote {
  price: number;
  date: IsoDate;
  stale?: boolean; // cached, but the cache has not been refreshed through the as-of date
}

/** Resolves a quote for the position's quote symbol, already in the position currency. */
export type PriceLookup = (position: Position, quoteSymbol: string, asOf: IsoDate) => Promise<PriceQuote | undefined>;

export interface PositionValuation {
  symbol: string;
  quoteSymbol: string;
  assetClass: AssetClass;
  currency: CurrencyCode;
  quantity: number;
  avgCost: number;
  currentPrice: number;
  priceDate: IsoDate;
  priceSource: "cache" | "last_trade";
  stale: boolean;
  marketValue: number;
  costBasis: number;
  unrealizedPnl: number;
  realizedPnl: number;
  totalPnl: number;
  returnPct: number; // unrealized over cost basis, in %
}

export interface LedgerSummary {
  assetClass: AssetClass;
  openPositions: number;
  marketValue: number;
  costBasis: number;
  unrealizedPnl: number;
  realizedPnl: number;
  totalPnl: number;
  returnPct: number;
}

const EPSILON = 1e-9;
const EMPTY_STATE: PositionState = { quantity: 0, avgCost: 0, realizedPnl: 0 };

// ============================================================
// PURE TRADE MATH
// ============================================================

/**
 * Apply one signed trade to a position state.
 */
export function applyTrade(
  state: PositionState,
  signedQuantity: number,
  price: number,
  policy: OversellPolicy = "reject"
): TradeOutcome {
  if (!Number.isFinite(signedQuantity) || Math.abs(signedQuantity) < EPSILON) {
    return { ok: false, error: "signed quantity must be non-zero" };
  }
  if (!Number.isFinite(price) || price <= 0) {
    return { ok: false, error: "price must be positive" };
  }

  const { quantity: q, avgCost: avg, realizedPnl } = state;

  if (signedQuantity > 0) {
    const buy = signedQuantity;
    if (q >= 0) {
      const quantity = q + buy;
      return { ok: true, state: { quantity, avgCost: (q * avg + buy * price) / quantity, realizedPnl } };
    }
    // Covering a short
    const cover = Math.min(buy, -q);
    const realized = realizedPnl + cover * (avg - price);
    const remaining = buy - cover;
    if (remaining > EPSILON) {
      return { ok: true, state: { quantity: remaining, avgCost: price, realizedPnl: realized } };
    }
    return { ok: true, state: { quantity: q + cover, avgCost: avg, realizedPnl: realized } };
  }

  const sell = -signedQuantity;
  if (q > EPSILON) {
    if (sell <= q + EPSILON) {
      const quantity = Math.abs(q - sell) < EPSILON ? 0 : q - sell;
      return { ok: true, state: { quantity, avgCost: avg, realizedPnl: realizedPnl + sell * (price - avg) } };
    }
    if (policy === "reject") {
      return { ok: false, error: `sell of ${sell} exceeds held quantity ${q}` };
    }
    const realized = realizedPnl + q * (price - avg);
    return { ok: true, state: { quantity: q - sell, avgCost: price, realizedPnl: realized } };
  }

  if (policy === "reject") {
    return { ok: false, error: `sell of ${sell} exceeds held quantity ${Math.max(q, 0)}` };
  }
  // Adding to a short (or opening one)
  const shortQty = -q;
  const quantity = q - sell;
  return { ok: true, state: { quantity, avgCost: (shortQty * avg + sell * price) / (shortQty + sell), realizedPnl } };
}

/**
 * Symbol used for price lookups: B3 listings get ".SA", crypto gets "-USD".
 */
export function quoteSymbol(symbol: string, assetClass: AssetClass, market: Market): string {
  const upper = symbol.trim().toUpperCase();
  if (assetClass === "crypto") {
    return upper.includes("-") ? upper : `${upper}-USD`;
  }
  if (market === "national" && !upper.includes(".")) {
    return `${upper}.SA`;
  }
  return upper;
}

/** Currency the quote symbol trades in. */
export function quoteCurrency(quote: string, fallback: CurrencyCode): CurrencyCode {
  if (quote.endsWith(".SA") || quote.endsWith("-BRL")) return "BRL";
  if (quote.endsWith("-USD")) return "USD";
  if (quote.endsWith("-EUR")) return "EUR";
  return fallback;
}

// ============================================================
// LEDGER
// ============================================================

export class PositionLedger {
  private history = new Map<string, Checkpoint[]>();

  constructor(
    readonly assetClass: AssetClass,
    private readonly policy: OversellPolicy = "reject"
  ) {}

  /**
   * Append one transaction. A back-dated one is inserted after existing same-date
   * entries and the symbol is rebuilt from that point; if the rebuild breaks a
   * later entry, nothing changes.
   */
  apply(tx: Transaction): RowResult<Position> {
    if (tx.assetClass !== this.assetClass) {
      return { ok: false, row: 0, errors: [`${tx.id}: asset class ${tx.assetClass} does not belong in the ${this.assetClass} ledger`] };
    }
    const entries = this.history.get(tx.symbol) ?? [];
    let index = entries.length;
    while (index > 0 && entries[index - 1].tx.date > tx.date) index--;

    const candidate = [...entries.slice(0, index), { tx, state: EMPTY_STATE }, ...entries.slice(index)];
    for (let i = index; i < candidate.length; i++) {
      const previous = i > 0 ? candidate[i - 1].state : EMPTY_STATE;
      const current = candidate[i].tx;
      const outcome = applyTrade(previous, current.signedQuantity, current.price, this.policy);
      if (!outcome.ok) {
        const reason = current === tx ? outcome.error : `would invalidate ${current.id} on ${current.date}: ${outcome.error}`;
        return { ok: false, row: 0, errors: [`${tx.id} ${tx.symbol} ${tx.date}: ${reason}`] };
      }
      candidate[i] = { tx: current, state: outcome.state };
    }

    if (index < entries.length) {
      console.log(`[Ledger] ${tx.symbol}: back-dated ${tx.date}, rebuilt ${candidate.length - index} checkpoint(s)`);
    }
    this.history.set(tx.symbol, candidate);
    const position = this.toPosition(candidate, candidate.length - 1);
    return { ok: true, row: 0, value: position };
  }

  /**
   * Take back a transaction `apply` accepted, e.g. when storing it failed. The
   * symbol's later checkpoints are rebuilt without it.
   */
  revert(tx: Transaction): void {
    const entries = this.history.get(tx.symbol) ?? [];
    const index = entries.findIndex(e => e.tx.id === tx.id);
    if (index < 0) return;
    const rebuilt = [...entries.slice(0, index), ...entries.slice(index + 1)];
    for (let i = index; i < rebuilt.length; i++) {
      const previous = i > 0 ? rebuilt[i - 1].state : EMPTY_STATE;
      const outcome = applyTrade(previous, rebuilt[i].tx.signedQuantity, rebuilt[i].tx.price, this.policy);
      // every later entry was valid before the reverted one was inserted
      if (outcome.ok) rebuilt[i] = { tx: rebuilt[i].tx, state: outcome.state };
    }
    if (rebuilt.length > 0) this.history.set(tx.symbol, rebuilt);
    else this.history.delete(tx.symbol);
    console.log(`[Ledger] ${tx.symbol}: reverted ${tx.id}`);
  }

  has(txId: string): boolean {
    for (const entries of Array.from(this.history.values())) {
      if (entries.some(e => e.tx.id === txId)) return true;
    }
    return false;
  }

  /**
   * Reset and apply a full log in date order (stable for same-date rows).
   * Rejected rows are reported and skipped.
   */
  replay(transactions: Transaction[]): RowResult<Position>[] {
    this.history.clear();
    const ordered = transactions
      .map((tx, row) => ({ tx, row }))
      .sort((a, b) => a.tx.date.localeCompare(b.tx.date) || a.row - b.row);
    return ordered.map(({ tx, row }) => ({ ...this.apply(tx), row }));
  }

  private toPosition(entries: Checkpoint[], index: number): Position {
    const { tx, state } = entries[index];
    return {
      symbol: tx.symbol,
      assetClass: tx.assetClass,
      market: tx.market,
      currency: tx.currency,
      quantity: state.quantity,
      avgCost: state.avgCost,
      realizedPnl: state.realizedPnl,
      totalInvested: state.quantity * state.avgCost,
      lastTradePrice: tx.price,
      lastTradeDate: tx.date,
    };
  }

  symbols(): string[] {
    return Array.from(this.history.keys()).sort();
  }

  position(symbol: string): Position | undefined {
    const entries = this.history.get(symbol);
    return entries && entries.length > 0 ? this.toPosition(entries, entries.length - 1) : undefined;
  }

  positionAsOf(symbol: string, asOf: IsoDate): Position | undefined {
    const entries = this.history.get(symbol);
    if (!entries) return undefined;
    let index = -1;
    for (let i = 0; i < entries.length && entries[i].tx.date <= asOf; i++) index = i;
    return index >= 0 ? this.toPosition(entries, index) : undefined;
  }

  /** Positions with at least one trade on or before `asOf` (closed ones included). */
  positionsAsOf(asOf: IsoDate): Position[] {
    return this.symbols()
      .map(symbol => this.positionAsOf(symbol, asOf))
      .filter((p): p is Position => p !== undefined);
  }

  positions(): Position[] {
    return this.symbols()
      .map(symbol => this.position(symbol))
      .filter((p): p is Position => p !== undefined);
  }

  /** Newest first. */
  transactions(symbol?: string): Transaction[] {
    const all: Transaction[] = [];
    for (const [key, entries] of Array.from(this.history.entries())) {
      if (symbol && key !== symbol) continue;
      all.push(...entries.map(e => e.tx));
    }
    return all.sort((a, b) => b.date.localeCompare(a.date));
  }

  /** Earliest trade date, used to bound price fetches. */
  firstTradeDate(): IsoDate | undefined {
    const dates = Array.from(this.history.values()).map(entries => entries[0]?.tx.date).filter((d): d is string => !!d);
    return dates.sort()[0];
  }

  // ============================================================
  // VALUATION
  // ============================================================

  /**
   * Mark open positions to market. A missing cached price falls back to the last
   * trade price on or before `asOf`; both that and a quote the lookup reports as
   * stale mark the row stale.
   */
  async valuate(asOf: IsoDate, lookup: PriceLookup): Promise<PositionValuation[]> {
    const rows: PositionValuation[] = [];
    for (const position of this.positionsAsOf(asOf)) {
      if (Math.abs(position.quantity) < EPSILON) continue;
      const quote = quoteSymbol(position.symbol, position.assetClass, position.market);
      const cached = await lookup(position, quote, asOf);
      const priceSource = cached ? "cache" : "last_trade";
      if (!cached) {
        console.warn(`[Ledger] No cached price for ${quote} on ${asOf}, using last trade ${position.lastTradePrice}`);
      } else if (cached.stale) {
        console.warn(`[Ledger] ${quote} not refreshed through ${asOf}, using cached ${cached.price} from ${cached.date}`);
      }
      const currentPrice = cached?.price ?? position.lastTradePrice;
      const marketValue = position.quantity * currentPrice;
      const costBasis = position.quantity * position.avgCost;
      const unrealizedPnl = position.quantity * (currentPrice - position.avgCost);
      rows.push({
        symbol: position.symbol,
        quoteSymbol: quote,
        assetClass: position.assetClass,
        currency: position.currency,
        quantity: position.quantity,
        avgCost: position.avgCost,
        currentPrice,
        priceDate: cached?.date ?? position.lastTradeDate,
        priceSource,
        stale: !cached || cached.stale === true,
        marketValue,
        costBasis,
        unrealizedPnl,
        realizedPnl: position.realizedPnl,
        totalPnl: unrealizedPnl + position.realizedPnl,
        returnPct: costBasis !== 0 ? (unrealizedPnl / Math.abs(costBasis)) * 100 : 0,
      });
    }
    return rows;
  }

  /** Totals in each position's own currency; callers convert before mixing currencies. */
  summarize(valuations: PositionValuation[], asOf: IsoDate): LedgerSummary {
    const realizedPnl = this.positionsAsOf(asOf).reduce((sum, p) => sum + p.realizedPnl, 0);
    const marketValue = valuations.reduce((sum, v) => sum + v.marketValue, 0);
    const costBasis = valuations.reduce((sum, v) => sum + v.costBasis, 0);
    const unrealizedPnl = valuations.reduce((sum, v) => sum + v.unrealizedPnl, 0);
    return {
      assetClass: this.assetClass,
      openPositions: valuations.length,
      marketValue,
      costBasis,
      unrealizedPnl,
      realizedPnl,
      totalPnl: unrealizedPnl + realizedPnl,
      returnPct: costBasis !== 0 ? (unrealizedPnl / Math.abs(costBasis)) * 100 : 0,
    };
  }
}
