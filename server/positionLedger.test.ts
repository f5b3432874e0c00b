import { describe, it, expect } from "vitest";
import { applyTrade, PositionLedger, quoteSymbol, type PriceLookup } from "./positionLedger";
import type { Transaction } from "./types";

let seq = 0;
function tx(symbol: string, date: string, signedQuantity: number, price: number, overrides: Partial<Transaction> = {}): Transaction {
  seq++;
  return {
    id: `tx-${seq}`,
    assetClass: "equity",
    symbol,
    date,
    signedQuantity,
    price,
    currency: "BRL",
    market: "national",
    ...overrides,
  };
}

describe("applyTrade", () => {
  it("averages cost on buys", () => {
    const first = applyTrade({ quantity: 0, avgCost: 0, realizedPnl: 0 }, 100, 10);
    if (!first.ok) throw new Error(first.error);
    const second = applyTrade(first.state, 300, 20);
    if (!second.ok) throw new Error(second.error);
    expect(second.state.quantity).toBe(400);
    expect(second.state.avgCost).toBeCloseTo(17.5, 10);
  });

  it("rejects a zero quantity", () => {
    expect(applyTrade({ quantity: 10, avgCost: 1, realizedPnl: 0 }, 0, 5)).toEqual({
      ok: false,
      error: "signed quantity must be non-zero",
    });
  });

  it("rejects a non-positive price", () => {
    expect(applyTrade({ quantity: 10, avgCost: 1, realizedPnl: 0 }, 5, 0).ok).toBe(false);
  });
});

describe("PositionLedger", () => {
  it("books realized P&L on a partial sell and keeps the average cost", () => {
    const ledger = new PositionLedger("equity");
    ledger.apply(tx("BBAS3", "2024-01-10", 1500, 14.15));
    ledger.apply(tx("BBAS3", "2024-02-10", -100, 15.6));

    const position = ledger.position("BBAS3");
    expect(position?.quantity).toBe(1400);
    expect(position?.avgCost).toBeCloseTo(14.15, 10);
    expect(position?.realizedPnl).toBeCloseTo(145.0, 6);
  });

  it("gives the quantity-weighted mean cost regardless of buy order", () => {
    const buys: Array<[number, number]> = [
      [100, 10],
      [300, 20],
      [100, 40],
    ];
    const forward = new PositionLedger("equity");
    const backward = new PositionLedger("equity");
    buys.forEach(([qty, price]) => forward.apply(tx("VALE3", "2024-01-02", qty, price)));
    [...buys].reverse().forEach(([qty, price]) => backward.apply(tx("VALE3", "2024-01-02", qty, price)));

    expect(forward.position("VALE3")?.avgCost).toBeCloseTo(22, 10);
    expect(backward.position("VALE3")?.avgCost).toBeCloseTo(22, 10);
  });

  it("keeps the average cost when a position is fully closed", () => {
    const ledger = new PositionLedger("equity");
    ledger.apply(tx("WEGE3", "2024-01-02", 10, 5));
    ledger.apply(tx("WEGE3", "2024-01-03", -10, 6));

    expect(ledger.position("WEGE3")).toMatchObject({ quantity: 0, avgCost: 5, realizedPnl: 10, totalInvested: 0 });
  });

  it("rejects an oversell by default and leaves the position untouched", () => {
    const ledger = new PositionLedger("equity");
    ledger.apply(tx("ITUB4", "2024-01-02", 100, 30));

    const result = ledger.apply(tx("ITUB4", "2024-01-03", -150, 32));

    expect(result.ok).toBe(false);
    expect(ledger.position("ITUB4")).toMatchObject({ quantity: 100, avgCost: 30, realizedPnl: 0 });
  });

  it("opens and covers shorts under the allow_short policy", () => {
    const ledger = new PositionLedger("equity", "allow_short");
    ledger.apply(tx("PETR4", "2024-01-02", 100, 10));
    ledger.apply(tx("PETR4", "2024-01-03", -150, 12));

    expect(ledger.position("PETR4")).toMatchObject({ quantity: -50, avgCost: 12, realizedPnl: 200 });

    ledger.apply(tx("PETR4", "2024-01-04", 80, 11));
    expect(ledger.position("PETR4")).toMatchObject({ quantity: 30, avgCost: 11, realizedPnl: 250 });
  });

  it("rebuilds only the affected symbol for a back-dated transaction", () => {
    const ledger = new PositionLedger("equity");
    ledger.apply(tx("ABEV3", "2024-01-10", 100, 10));
    ledger.apply(tx("ABEV3", "2024-01-20", -50, 12));
    ledger.apply(tx("ABEV3", "2024-01-15", 100, 16));

    const position = ledger.position("ABEV3");
    expect(position?.quantity).toBe(150);
    expect(position?.avgCost).toBeCloseTo(13, 10);
    expect(position?.realizedPnl).toBeCloseTo(-50, 10);
    expect(ledger.positionAsOf("ABEV3", "2024-01-12")).toMatchObject({ quantity: 100, avgCost: 10 });
    expect(ledger.positionAsOf("ABEV3", "2024-01-01")).toBeUndefined();
  });

  it("refuses a back-dated sell that would break a later one", () => {
    const ledger = new PositionLedger("equity");
    ledger.apply(tx("RENT3", "2024-01-10", 100, 50));
    ledger.apply(tx("RENT3", "2024-01-20", -100, 55));

    const result = ledger.apply(tx("RENT3", "2024-01-15", -50, 52));

    expect(result.ok).toBe(false);
    expect(ledger.position("RENT3")).toMatchObject({ quantity: 0, realizedPnl: 500 });
    expect(ledger.transactions("RENT3")).toHaveLength(2);
  });

  it("replays a log in date order and reports bad rows", () => {
    const ledger = new PositionLedger("equity");
    const results = ledger.replay([
      tx("BBDC4", "2024-03-01", -50, 15),
      tx("BBDC4", "2024-01-01", 100, 10),
      tx("BBDC4", "2024-02-01", 0, 12),
    ]);

    expect(results.filter(r => !r.ok).map(r => r.row)).toEqual([2]);
    expect(ledger.position("BBDC4")).toMatchObject({ quantity: 50, realizedPnl: 250 });
  });

  it("refuses transactions from another asset class", () => {
    const ledger = new PositionLedger("crypto");
    expect(ledger.apply(tx("BTC", "2024-01-01", 1, 100)).ok).toBe(false);
  });

  it("values positions with cached prices and flags fallbacks as stale", async () => {
    const ledger = new PositionLedger("equity");
    ledger.apply(tx("PETR4", "2024-01-02", 100, 30));
    ledger.apply(tx("VALE3", "2024-01-02", 10, 60));
    const lookup: PriceLookup = async (_position, quote) =>
      quote === "PETR4.SA" ? { price: 33, date: "2024-01-05" } : undefined;

    const rows = await ledger.valuate("2024-01-05", lookup);

    const petr = rows.find(r => r.symbol === "PETR4");
    expect(petr).toMatchObject({ currentPrice: 33, priceSource: "cache", stale: false, marketValue: 3300 });
    expect(petr?.unrealizedPnl).toBeCloseTo(300, 10);
    expect(petr?.returnPct).toBeCloseTo(10, 10);
    const vale = rows.find(r => r.symbol === "VALE3");
    expect(vale).toMatchObject({ currentPrice: 60, priceSource: "last_trade", stale: true, priceDate: "2024-01-02" });

    const summary = ledger.summarize(rows, "2024-01-05");
    expect(summary.openPositions).toBe(2);
    expect(summary.marketValue).toBeCloseTo(3900, 10);
    expect(summary.unrealizedPnl).toBeCloseTo(300, 10);
  });

  it("skips closed positions and positions opened after the valuation date", async () => {
    const ledger = new PositionLedger("equity");
    ledger.apply(tx("MGLU3", "2024-01-02", 10, 5));
    ledger.apply(tx("MGLU3", "2024-01-03", -10, 6));
    ledger.apply(tx("LREN3", "2024-02-01", 10, 20));

    expect(await ledger.valuate("2024-01-15", async () => undefined)).toEqual([]);
  });

  it("marks a cached quote stale when the lookup says so", async () => {
    const ledger = new PositionLedger("equity");
    ledger.apply(tx("ITSA4", "2024-01-02", 100, 10));

    const [row] = await ledger.valuate("2024-03-01", async () => ({ price: 11, date: "2024-01-31", stale: true }));

    expect(row).toMatchObject({ currentPrice: 11, priceSource: "cache", stale: true, priceDate: "2024-01-31" });
  });

  it("reverts a back-dated transaction and rebuilds what followed it", () => {
    const ledger = new PositionLedger("equity");
    ledger.apply(tx("WEGE3", "2024-01-10", 100, 40));
    ledger.apply(tx("WEGE3", "2024-01-20", -50, 44));
    const backDated = tx("WEGE3", "2024-01-05", 100, 30);
    ledger.apply(backDated);
    expect(ledger.position("WEGE3")?.quantity).toBe(150);

    ledger.revert(backDated);

    expect(ledger.has(backDated.id)).toBe(false);
    expect(ledger.position("WEGE3")).toMatchObject({ quantity: 50, avgCost: 40 });
    expect(ledger.position("WEGE3")?.realizedPnl).toBeCloseTo(200, 10);
  });

  it("forgets a symbol whose only transaction is reverted", () => {
    const ledger = new PositionLedger("equity");
    const only = tx("RENT3", "2024-01-10", 10, 50);
    ledger.apply(only);

    ledger.revert(only);

    expect(ledger.position("RENT3")).toBeUndefined();
    expect(ledger.symbols()).toEqual([]);
  });
});

describe("quoteSymbol", () => {
  it("maps markets to quote symbols", () => {
    expect(quoteSymbol("petr4", "equity", "national")).toBe("PETR4.SA");
    expect(quoteSymbol("AAPL", "equity", "international")).toBe("AAPL");
    expect(quoteSymbol("BTC", "crypto", "international")).toBe("BTC-USD");
    expect(quoteSymbol("ETH-BRL", "crypto", "international")).toBe("ETH-BRL");
  });
});
