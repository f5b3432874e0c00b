import { describe, it, expect, beforeEach } from "vitest";
import { BondIndexationEngine } from "./bondIndexation";
import { CashLedger } from "./cashLedger";
import { FeeEngine } from "./feeEngine";
import { FxRates } from "./fxRates";
import { MemoryStore } from "./memoryStore";
import { NAVCalculator } from "./navCalculator";
import { PositionLedger } from "./positionLedger";
import type { BondPosition, PriceBar } from "./types";

function bar(symbol: string, date: string, close: number): PriceBar {
  return { symbol, date, open: close, high: close, low: close, close, adjClose: close, volume: 0, dividend: 0, split: 1 };
}

function prefixed(issueId: string, principal: number): BondPosition {
  return {
    issueId,
    title: "CDB Pré",
    issuer: "Banco X",
    indexer: "PREFIXADO",
    percentIndexed: 0,
    quantity: 1,
    unitPrice: principal,
    principal,
    issueDate: "2024-01-02",
    maturityDate: "2030-01-02",
    currency: "BRL",
  };
}

describe("NAVCalculator", () => {
  let store: MemoryStore;
  let equity: PositionLedger;
  let crypto: PositionLedger;
  let cash: CashLedger;
  let fees: FeeEngine;
  let bonds: BondPosition[];
  let calculator: NAVCalculator;

  beforeEach(async () => {
    store = new MemoryStore();
    const fx = new FxRates(store);
    equity = new PositionLedger("equity");
    crypto = new PositionLedger("crypto");
    cash = new CashLedger(store, "BRL", fx);
    fees = new FeeEngine(store, { managementRate: 0.02, performanceRate: 0.2, managementFeeBasis: "nav_end", currency: "BRL", maxVersionRetries: 3 });
    bonds = [prefixed("CDB-1", 10000)];
    calculator = new NAVCalculator({
      baseCurrency: "BRL",
      ledgers: [equity, crypto],
      bonds: () => bonds,
      indexation: new BondIndexationEngine({ ipcaFallbackAnnual: 0.05, cdiFallbackAnnual: 0.1375, selicFallbackAnnual: 0.1175 }),
      cash,
      fees,
      prices: store,
      fx,
      store,
    });

    await cash.addCashFlow({ date: "2024-01-02", investorId: "inv-a", type: "deposit", amount: { amount: 60000, currency: "BRL" } });
    await cash.addCashFlow({ date: "2024-01-02", investorId: "inv-b", type: "deposit", amount: { amount: 40000, currency: "BRL" } });
    equity.apply({ id: "t1", assetClass: "equity", symbol: "PETR4", date: "2024-01-03", signedQuantity: 1000, price: 30, currency: "BRL", market: "national" });
    crypto.apply({ id: "t2", assetClass: "crypto", symbol: "BTC", date: "2024-01-03", signedQuantity: 0.1, price: 40000, currency: "USD", market: "international" });
    await store.upsertBars([bar("PETR4.SA", "2024-01-10", 33), bar("BTC-USD", "2024-01-10", 45000), bar("USDBRL=X", "2024-01-10", 5)]);
  });

  it("adds positions, bonds and cash in the base currency", async () => {
    const snapshot = await calculator.nav("2024-01-10");

    expect(snapshot.equityValue).toBe(33000);
    expect(snapshot.cryptoValue).toBeCloseTo(22500, 6);
    expect(snapshot.bondValue).toBe(10000);
    expect(snapshot.cashPosition).toBe(100000);
    expect(snapshot.outstandingFees).toBe(0);
    expect(snapshot.nav).toBeCloseTo(165500, 6);
    expect(snapshot.stale).toBe(false);
    expect(snapshot.approximated).toBe(false);
  });

  it("subtracts outstanding fees", async () => {
    await fees.calculate({ periodStart: "2024-01-02", periodEnd: "2024-01-10", navStart: 100000, navEnd: 100000 });

    const snapshot = await calculator.nav("2024-01-10");

    expect(snapshot.outstandingFees).toBeCloseTo(43.84, 2);
    expect(snapshot.nav).toBeCloseTo(165500 - 43.84, 6);
  });

  it("falls back to the last trade price and flags the snapshot stale", async () => {
    const snapshot = await calculator.nav("2024-01-05");

    expect(snapshot.equityValue).toBe(30000);
    expect(snapshot.stale).toBe(true);
  });

  it("flags a cached price stale past the date the cache was last refreshed through", async () => {
    await store.saveMetadata({
      symbol: "PETR4.SA",
      firstDate: "2024-01-10",
      lastDate: "2024-01-10",
      recordCount: 1,
      lastUpdated: "2024-01-10T18:00:00.000Z",
      coveredFrom: "2024-01-01",
      coveredTo: "2024-01-10",
    });

    expect((await calculator.nav("2024-01-10")).stale).toBe(false);
    const later = await calculator.nav("2024-01-12");
    expect(later.equityValue).toBe(33000);
    expect(later.stale).toBe(true);
  });

  it("keeps memoized snapshots until an earlier event invalidates them", async () => {
    await calculator.nav("2024-01-10");
    await cash.addCashFlow({ date: "2024-01-05", investorId: "inv-a", type: "deposit", amount: { amount: 5000, currency: "BRL" } });

    expect((await calculator.nav("2024-01-10")).cashPosition).toBe(100000);

    await calculator.invalidateFrom("2024-01-05");
    expect((await calculator.nav("2024-01-10")).cashPosition).toBe(105000);
  });

  it("commits snapshots and drops them on request", async () => {
    await calculator.commit("2024-01-10");
    expect((await calculator.committed("2024-01-10"))?.nav).toBeCloseTo(165500, 6);

    await calculator.invalidateFrom("2024-01-08", true);
    expect(await calculator.committed("2024-01-10")).toBeUndefined();
  });

  it("allocates the NAV by stake so the parts add up to the whole", async () => {
    const allocations = await calculator.allocateToInvestors("2024-01-10");

    expect(allocations.map(a => [a.investorId, a.investorNav])).toEqual([
      ["inv-a", 99300],
      ["inv-b", 66200],
    ]);
    expect(allocations[0].unrealizedGain).toBe(39300);
    expect(allocations[0].returnPct).toBeCloseTo(65.5, 10);
  });

  it("gives the rounding remainder to the largest holder", async () => {
    const freshStore = new MemoryStore();
    const fx = new FxRates(freshStore);
    const freshCash = new CashLedger(freshStore, "BRL", fx);
    for (const id of ["x", "y", "z"]) {
      await freshCash.addCashFlow({ date: "2024-01-02", investorId: id, type: "deposit", amount: { amount: 10000, currency: "BRL" } });
    }
    const thirds = new NAVCalculator({
      baseCurrency: "BRL",
      ledgers: [],
      bonds: () => [prefixed("CDB-2", 70000.01)],
      indexation: new BondIndexationEngine(),
      cash: freshCash,
      fees: new FeeEngine(freshStore),
      prices: freshStore,
      fx,
      store: freshStore,
    });

    const allocations = await thirds.allocateToInvestors("2024-01-10");
    const total = allocations.reduce((sum, a) => sum + a.investorNav, 0);

    expect(allocations.map(a => a.investorNav)).toEqual([33333.33, 33333.34, 33333.34]);
    expect(Math.abs(total - 100000.01)).toBeLessThan(0.01);
  });
});
