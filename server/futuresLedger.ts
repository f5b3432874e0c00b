/**
 * Futures Ledger: contract positions with separate long and short legs.
 *
 * Each contract (root, expiry, exchange) keeps a weighted-average price per leg.
 * Closing a leg realizes (price − avg)·qty·multiplier for longs and the reverse
 * for shorts. Commissions accumulate per contract and come off total P&L.
 *
 * Futures P&L is reported beside the fund, not inside NAV: variation margin
 * settles through the broker cash account, which reaches NAV as cash.
 */

import { daysBetween } from "./dates";
import type { PriceQuote } from "./positionLedger";
import type { CurrencyCode, FuturesSide, FuturesTrade, IsoDate, RowResult } from "./types";

// ============================================================
// TYPES
// ============================================================

export interface Leg {
  quantity: number;
  avgPrice: number;
}

export interface ContractPosition {
  key: string;
  symbol: string;
  exchange: string;
  expiry: IsoDate;
  currency: CurrencyCode;
  multiplier: number;
  description: string;
  long: Leg;
  short: Leg;
  realizedPnl: number;
  commission: number;
  lastTradePrice: number;
  lastTradeDate: IsoDate;
}

export type NetSide = FuturesSide | "flat";

export type FuturesPriceLookup = (
  contract: ContractPosition,
  quoteSymbol: string,
  asOf: IsoDate
) => Promise<PriceQuote | undefined>;

export interface ContractValuation {
  key: string;
  symbol: string;
  quoteSymbol: string;
  exchange: string;
  expiry: IsoDate;
  currency: CurrencyCode;
  multiplier: number;
  longQuantity: number;
  shortQuantity: number;
  netQuantity: number;
  netSide: NetSide;
  avgEntryPrice: number;
  currentPrice: number;
  priceDate: IsoDate;
  priceSource: "cache" | "last_trade";
  stale: boolean;
  notional: number;
  unrealizedPnl: number;
  realizedPnl: number;
  commission: number;
  totalPnl: number; // realized + unrealized − commission
  daysToExpiry: number;
}

export interface FuturesSummary {
  contracts: number;
  longContracts: number;
  shortContracts: number;
  totalNotional: number;
  unrealizedPnl: number;
  realizedPnl: number;
  commission: number;
  totalPnl: number;
}

const EPSILON = 1e-9;

// ============================================================
// PURE CONTRACT MATH
// ============================================================

export function contractKey(trade: Pick<FuturesTrade, "symbol" | "expiry" | "exchange">): string {
  return `${trade.symbol}_${trade.expiry.replace(/-/g, "")}_${trade.exchange}`;
}

/** Yahoo continuous contract symbol, e.g. "ES" → "ES=F". */
export function futuresQuoteSymbol(symbol: string): string {
  const upper = symbol.trim().toUpperCase();
  return upper.includes("=") ? upper : `${upper}=F`;
}

export function tradeErrors(trade: FuturesTrade): string[] {
  const errors: string[] = [];
  if (!Number.isFinite(trade.quantity) || Math.abs(trade.quantity) < EPSILON) errors.push("quantity: must be non-zero");
  if (!Number.isFinite(trade.price) || trade.price <= 0) errors.push("price: must be positive");
  if (!Number.isFinite(trade.multiplier) || trade.multiplier <= 0) errors.push("multiplier: must be positive");
  if (!Number.isFinite(trade.commission) || trade.commission < 0) errors.push("commission: must not be negative");
  return errors;
}

function openContract(trade: FuturesTrade): ContractPosition {
  return {
    key: contractKey(trade),
    symbol: trade.symbol,
    exchange: trade.exchange,
    expiry: trade.expiry,
    currency: trade.currency,
    multiplier: trade.multiplier,
    description: trade.description,
    long: { quantity: 0, avgPrice: 0 },
    short: { quantity: 0, avgPrice: 0 },
    realizedPnl: 0,
    commission: 0,
    lastTradePrice: trade.price,
    lastTradeDate: trade.date,
  };
}

/**
 * Apply one fill to a contract. Returns the new state or why it cannot apply.
 */
export function applyFill(
  contract: ContractPosition,
  trade: FuturesTrade
): { ok: true; contract: ContractPosition } | { ok: false; error: string } {
  const errors = tradeErrors(trade);
  if (errors.length > 0) return { ok: false, error: errors.join("; ") };

  const leg = trade.side === "long" ? contract.long : contract.short;
  let next: Leg;
  let realized = 0;
  if (trade.quantity > 0) {
    const quantity = leg.quantity + trade.quantity;
    next = { quantity, avgPrice: (leg.quantity * leg.avgPrice + trade.quantity * trade.price) / quantity };
  } else {
    const close = -trade.quantity;
    if (close > leg.quantity + EPSILON) {
      return { ok: false, error: `closing ${close} ${trade.side} exceeds open ${leg.quantity}` };
    }
    const direction = trade.side === "long" ? 1 : -1;
    realized = direction * (trade.price - leg.avgPrice) * close * trade.multiplier;
    const quantity = Math.abs(leg.quantity - close) < EPSILON ? 0 : leg.quantity - close;
    next = { quantity, avgPrice: leg.avgPrice };
  }

  return {
    ok: true,
    contract: {
      ...contract,
      multiplier: trade.multiplier,
      description: trade.description || contract.description,
      long: trade.side === "long" ? next : contract.long,
      short: trade.side === "short" ? next : contract.short,
      realizedPnl: contract.realizedPnl + realized,
      commission: contract.commission + trade.commission,
      lastTradePrice: trade.price,
      lastTradeDate: trade.date,
    },
  };
}

export function netQuantity(contract: ContractPosition): number {
  return contract.long.quantity - contract.short.quantity;
}

export function netSide(contract: ContractPosition): NetSide {
  const net = netQuantity(contract);
  if (net > EPSILON) return "long";
  if (net < -EPSILON) return "short";
  return "flat";
}

/** Average price of the leg the contract is net on; 0 when flat. */
export function avgEntryPrice(contract: ContractPosition): number {
  const side = netSide(contract);
  if (side === "long") return contract.long.avgPrice;
  if (side === "short") return contract.short.avgPrice;
  return 0;
}

// ============================================================
// LEDGER
// ============================================================

export class FuturesLedger {
  private trades = new Map<string, FuturesTrade[]>();

  /**
   * Add one fill. A back-dated fill goes after existing same-date fills and the
   * contract is refolded; if that breaks a later close, nothing changes.
   */
  apply(trade: FuturesTrade): RowResult<ContractPosition> {
    const key = contractKey(trade);
    const existing = this.trades.get(key) ?? [];
    let index = existing.length;
    while (index > 0 && existing[index - 1].date > trade.date) index--;
    const candidate = [...existing.slice(0, index), trade, ...existing.slice(index)];

    const folded = fold(candidate);
    if (!folded.ok) {
      return { ok: false, row: 0, errors: [`${trade.id} ${key} ${trade.date}: ${folded.error}`] };
    }
    this.trades.set(key, candidate);
    return { ok: true, row: 0, value: folded.contract };
  }

  /** Take back a fill `apply` accepted. */
  revert(trade: FuturesTrade): void {
    const key = contractKey(trade);
    const remaining = (this.trades.get(key) ?? []).filter(t => t.id !== trade.id);
    if (remaining.length > 0) this.trades.set(key, remaining);
    else this.trades.delete(key);
    console.log(`[Futures] ${key}: reverted ${trade.id}`);
  }

  has(tradeId: string): boolean {
    return Array.from(this.trades.values()).some(list => list.some(t => t.id === tradeId));
  }

  /** Reset and apply a full log in date order; rejected fills are reported and skipped. */
  replay(trades: FuturesTrade[]): RowResult<ContractPosition>[] {
    this.trades.clear();
    return trades
      .map((trade, row) => ({ trade, row }))
      .sort((a, b) => a.trade.date.localeCompare(b.trade.date) || a.row - b.row)
      .map(({ trade, row }) => ({ ...this.apply(trade), row }));
  }

  keys(): string[] {
    return Array.from(this.trades.keys()).sort();
  }

  /** Contracts with at least one fill on or before `asOf`, flat ones included. */
  positionsAsOf(asOf: IsoDate): ContractPosition[] {
    const positions: ContractPosition[] = [];
    for (const key of this.keys()) {
      const fills = (this.trades.get(key) ?? []).filter(t => t.date <= asOf);
      const folded = fold(fills);
      if (folded.ok && fills.length > 0) positions.push(folded.contract);
    }
    return positions;
  }

  /** Newest first. */
  transactions(): FuturesTrade[] {
    return Array.from(this.trades.values())
      .flat()
      .sort((a, b) => b.date.localeCompare(a.date));
  }

  /**
   * Mark open contracts to market. A missing quote falls back to the last fill
   * price and marks the row stale.
   */
  async valuate(asOf: IsoDate, lookup: FuturesPriceLookup): Promise<ContractValuation[]> {
    const rows: ContractValuation[] = [];
    for (const contract of this.positionsAsOf(asOf)) {
      if (contract.long.quantity < EPSILON && contract.short.quantity < EPSILON) continue;
      const quote = futuresQuoteSymbol(contract.symbol);
      const cached = await lookup(contract, quote, asOf);
      if (!cached) {
        console.warn(`[Futures] No cached price for ${quote} on ${asOf}, using last fill ${contract.lastTradePrice}`);
      }
      const currentPrice = cached?.price ?? contract.lastTradePrice;
      const { long, short, multiplier } = contract;
      const unrealizedPnl =
        (currentPrice - long.avgPrice) * long.quantity * multiplier +
        (short.avgPrice - currentPrice) * short.quantity * multiplier;
      const net = netQuantity(contract);
      rows.push({
        key: contract.key,
        symbol: contract.symbol,
        quoteSymbol: quote,
        exchange: contract.exchange,
        expiry: contract.expiry,
        currency: contract.currency,
        multiplier,
        longQuantity: long.quantity,
        shortQuantity: short.quantity,
        netQuantity: net,
        netSide: netSide(contract),
        avgEntryPrice: avgEntryPrice(contract),
        currentPrice,
        priceDate: cached?.date ?? contract.lastTradeDate,
        priceSource: cached ? "cache" : "last_trade",
        stale: !cached || cached.stale === true,
        notional: currentPrice * Math.abs(net) * multiplier,
        unrealizedPnl,
        realizedPnl: contract.realizedPnl,
        commission: contract.commission,
        totalPnl: contract.realizedPnl + unrealizedPnl - contract.commission,
        daysToExpiry: daysBetween(asOf, contract.expiry),
      });
    }
    return rows;
  }

  /**
   * Totals in each contract's own currency. Realized P&L and commissions of
   * contracts closed by `asOf` are included.
   */
  summarize(valuations: ContractValuation[], asOf: IsoDate): FuturesSummary {
    const open = new Set(valuations.map(v => v.key));
    const closed = this.positionsAsOf(asOf).filter(c => !open.has(c.key));
    const realizedPnl =
      valuations.reduce((sum, v) => sum + v.realizedPnl, 0) + closed.reduce((sum, c) => sum + c.realizedPnl, 0);
    const commission =
      valuations.reduce((sum, v) => sum + v.commission, 0) + closed.reduce((sum, c) => sum + c.commission, 0);
    const unrealizedPnl = valuations.reduce((sum, v) => sum + v.unrealizedPnl, 0);
    return {
      contracts: valuations.length,
      longContracts: valuations.filter(v => v.netSide === "long").length,
      shortContracts: valuations.filter(v => v.netSide === "short").length,
      totalNotional: valuations.reduce((sum, v) => sum + v.notional, 0),
      unrealizedPnl,
      realizedPnl,
      commission,
      totalPnl: realizedPnl + unrealizedPnl - commission,
    };
  }
}

/** Contracts expiring within `daysAhead` days (already expired ones included), soonest first. */
export function expiringContracts(valuations: ContractValuation[], daysAhead = 30): ContractValuation[] {
  return valuations.filter(v => v.daysToExpiry <= daysAhead).sort((a, b) => a.daysToExpiry - b.daysToExpiry);
}

function fold(fills: FuturesTrade[]): { ok: true; contract: ContractPosition } | { ok: false; error: string } {
  if (fills.length === 0) return { ok: false, error: "no fills" };
  let contract = openContract(fills[0]);
  for (const fill of fills) {
    const outcome = applyFill(contract, fill);
    if (!outcome.ok) return { ok: false, error: `${fill.id} on ${fill.date}: ${outcome.error}` };
    contract = outcome.contract;
  }
  return { ok: true, contract };
}
