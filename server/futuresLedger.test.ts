import { describe, it, expect } from "vitest";
import {
  applyFill,
  contractKey,
  expiringContracts,
  futuresQuoteSymbol,
  FuturesLedger,
  type ContractPosition,
  type FuturesPriceLookup,
} from "./futuresLedger";
import type { FuturesTrade } from "./types";

let seq = 0;
function fill(
  symbol: string,
  date: string,
  side: "long" | "short",
  quantity: number,
  price: number,
  overrides: Partial<FuturesTrade> = {}
): FuturesTrade {
  seq++;
  return {
    id: `fut-${seq}`,
    date,
    symbol,
    exchange: "CME",
    expiry: symbol === "ES" ? "2024-03-15" : "2024-06-21",
    side,
    quantity,
    price,
    multiplier: symbol === "ES" ? 50 : 20,
    currency: "USD",
    commission: 0,
    description: "",
    ...overrides,
  };
}

function emptyContract(): ContractPosition {
  return {
    key: "CL_20240220_NYMEX",
    symbol: "CL",
    exchange: "NYMEX",
    expiry: "2024-02-20",
    currency: "USD",
    multiplier: 10,
    description: "",
    long: { quantity: 0, avgPrice: 0 },
    short: { quantity: 0, avgPrice: 0 },
    realizedPnl: 0,
    commission: 0,
    lastTradePrice: 0,
    lastTradeDate: "2024-01-01",
  };
}

describe("contract helpers", () => {
  it("keys a contract by root, compact expiry and exchange", () => {
    expect(contractKey({ symbol: "ES", expiry: "2024-03-15", exchange: "CME" })).toBe("ES_20240315_CME");
  });

  it("quotes the continuous contract", () => {
    expect(futuresQuoteSymbol("es")).toBe("ES=F");
    expect(futuresQuoteSymbol("ES=F")).toBe("ES=F");
  });

  it("realizes a short close as entry minus exit", () => {
    const opened = applyFill(emptyContract(), fill("CL", "2024-01-02", "short", 2, 100, { multiplier: 10 }));
    if (!opened.ok) throw new Error(opened.error);
    const closed = applyFill(opened.contract, fill("CL", "2024-01-03", "short", -1, 90, { multiplier: 10 }));
    if (!closed.ok) throw new Error(closed.error);
    expect(closed.contract.realizedPnl).toBeCloseTo(100, 10);
    expect(closed.contract.short).toEqual({ quantity: 1, avgPrice: 100 });
  });

  it("rejects closing more than the leg holds", () => {
    const opened = applyFill(emptyContract(), fill("CL", "2024-01-02", "long", 1, 75));
    if (!opened.ok) throw new Error(opened.error);
    expect(applyFill(opened.contract, fill("CL", "2024-01-03", "long", -2, 76))).toEqual({
      ok: false,
      error: "closing 2 long exceeds open 1",
    });
  });

  it("rejects a non-positive multiplier", () => {
    const outcome = applyFill(emptyContract(), fill("CL", "2024-01-02", "long", 1, 75, { multiplier: 0 }));
    expect(outcome).toEqual({ ok: false, error: "multiplier: must be positive" });
  });
});

describe("FuturesLedger", () => {
  const lookup: FuturesPriceLookup = async (_contract, quote, asOf) =>
    quote === "ES=F" ? { price: 4950, date: asOf } : undefined;

  function seeded(): { ledger: FuturesLedger; close: FuturesTrade } {
    const ledger = new FuturesLedger();
    const close = fill("ES", "2024-01-20", "long", -1, 5000, { commission: 2 });
    for (const trade of [
      fill("ES", "2024-01-02", "long", 2, 4800, { commission: 4 }),
      fill("NQ", "2024-01-05", "short", 1, 17000, { commission: 3 }),
      fill("ES", "2024-01-10", "long", 2, 4900, { commission: 4 }),
      close,
    ]) {
      const applied = ledger.apply(trade);
      if (!applied.ok) throw new Error(applied.errors.join("; "));
    }
    return { ledger, close };
  }

  it("averages each leg and realizes with the multiplier", () => {
    const { ledger } = seeded();
    const [es] = ledger.positionsAsOf("2024-01-31");
    expect(es.key).toBe("ES_20240315_CME");
    expect(es.long).toEqual({ quantity: 3, avgPrice: 4850 });
    expect(es.realizedPnl).toBeCloseTo(7500, 6);
    expect(es.commission).toBe(10);
  });

  it("marks open contracts to market", async () => {
    const { ledger } = seeded();
    const [es, nq] = await ledger.valuate("2024-01-31", lookup);

    expect(es).toMatchObject({
      quoteSymbol: "ES=F",
      netQuantity: 3,
      netSide: "long",
      avgEntryPrice: 4850,
      currentPrice: 4950,
      priceSource: "cache",
      stale: false,
      daysToExpiry: 44,
    });
    expect(es.unrealizedPnl).toBeCloseTo(15000, 6);
    expect(es.notional).toBeCloseTo(742500, 6);
    expect(es.totalPnl).toBeCloseTo(22490, 6);

    expect(nq).toMatchObject({
      netQuantity: -1,
      netSide: "short",
      avgEntryPrice: 17000,
      currentPrice: 17000,
      priceSource: "last_trade",
      stale: true,
      daysToExpiry: 142,
    });
    expect(nq.notional).toBeCloseTo(340000, 6);
    expect(nq.totalPnl).toBeCloseTo(-3, 6);
  });

  it("totals open and closed contracts", async () => {
    const { ledger } = seeded();
    ledger.apply(fill("CL", "2024-01-08", "long", 1, 70, { multiplier: 1000, expiry: "2024-02-20", commission: 5 }));
    ledger.apply(fill("CL", "2024-01-09", "long", -1, 72, { multiplier: 1000, expiry: "2024-02-20", commission: 5 }));
    const valuations = await ledger.valuate("2024-01-31", lookup);
    expect(valuations.map(v => v.symbol)).toEqual(["ES", "NQ"]);

    const summary = ledger.summarize(valuations, "2024-01-31");
    expect(summary).toMatchObject({ contracts: 2, longContracts: 1, shortContracts: 1, commission: 23 });
    expect(summary.totalNotional).toBeCloseTo(1082500, 6);
    expect(summary.unrealizedPnl).toBeCloseTo(15000, 6);
    expect(summary.realizedPnl).toBeCloseTo(9500, 6);
    expect(summary.totalPnl).toBeCloseTo(24477, 6);
  });

  it("lists contracts expiring within the window, soonest first", async () => {
    const { ledger } = seeded();
    const valuations = await ledger.valuate("2024-01-31", lookup);
    expect(expiringContracts(valuations).map(v => v.symbol)).toEqual([]);
    expect(expiringContracts(valuations, 60).map(v => v.symbol)).toEqual(["ES"]);
    expect(expiringContracts(valuations, 200).map(v => v.symbol)).toEqual(["ES", "NQ"]);
  });

  it("reads positions as of an earlier date", () => {
    const { ledger } = seeded();
    const early = ledger.positionsAsOf("2024-01-05");
    expect(early.map(c => c.symbol)).toEqual(["ES", "NQ"]);
    expect(early[0].long).toEqual({ quantity: 2, avgPrice: 4800 });
  });

  it("rejects a back-dated close that precedes the opening fill", () => {
    const { ledger } = seeded();
    const result = ledger.apply(fill("NQ", "2024-01-03", "short", -1, 16900));
    expect(result.ok).toBe(false);
    expect(ledger.positionsAsOf("2024-01-31")[1].short).toEqual({ quantity: 1, avgPrice: 17000 });
  });

  it("reverts a fill and refolds the contract", () => {
    const { ledger, close } = seeded();
    expect(ledger.has(close.id)).toBe(true);
    ledger.revert(close);
    expect(ledger.has(close.id)).toBe(false);
    const [es] = ledger.positionsAsOf("2024-01-31");
    expect(es.long).toEqual({ quantity: 4, avgPrice: 4850 });
    expect(es.realizedPnl).toBe(0);
  });

  it("replays a log in date order", () => {
    const ledger = new FuturesLedger();
    const results = ledger.replay([
      fill("ES", "2024-01-05", "long", -1, 4900),
      fill("ES", "2024-01-02", "long", 1, 4800),
    ]);
    expect(results.map(r => [r.row, r.ok])).toEqual([
      [1, true],
      [0, true],
    ]);
    expect(ledger.positionsAsOf("2024-01-31")[0].realizedPnl).toBeCloseTo(5000, 6);
  });
});
