import { describe, it, expect, beforeEach } from "vitest";
import { ValidationError } from "./_core/errors";
import { CashLedger } from "./cashLedger";
import { FxRates } from "./fxRates";
import { MemoryStore } from "./memoryStore";

describe("CashLedger", () => {
  let store: MemoryStore;
  let ledger: CashLedger;

  beforeEach(() => {
    store = new MemoryStore();
    ledger = new CashLedger(store, "BRL", new FxRates(store));
  });

  async function seed() {
    await ledger.addCashFlow({ date: "2024-01-02", investorId: "inv-a", investorName: "Investor A", type: "deposit", amount: { amount: 60000, currency: "BRL" } });
    await ledger.addCashFlow({ date: "2024-01-02", investorId: "inv-b", investorName: "Investor B", type: "deposit", amount: { amount: 40000, currency: "BRL" } });
    await ledger.addCashFlow({ date: "2024-03-01", investorId: "inv-a", type: "withdrawal", amount: { amount: 10000, currency: "BRL" } });
  }

  it("sums deposits minus withdrawals up to the date", async () => {
    await seed();

    expect(await ledger.cashPosition("2024-01-01")).toBe(0);
    expect(await ledger.cashPosition("2024-02-01")).toBe(100000);
    expect(await ledger.cashPosition("2024-03-01")).toBe(90000);
  });

  it("computes stakes from net contributions", async () => {
    await seed();

    expect(await ledger.netContribution("inv-a", "2024-03-31")).toBe(50000);
    expect(await ledger.stakePct("inv-a", "2024-03-31")).toBeCloseTo(50000 / 90000, 12);
    expect(await ledger.stakePct("inv-b", "2024-01-31")).toBeCloseTo(0.4, 12);
    expect(await ledger.stakePct("unknown", "2024-01-31")).toBe(0);
  });

  it("auto-registers investors and persists every flow", async () => {
    await seed();

    expect(ledger.listInvestors().map(i => i.investorId).sort()).toEqual(["inv-a", "inv-b"]);
    expect(await store.listCashFlows()).toHaveLength(3);

    const reloaded = new CashLedger(store, "BRL");
    await reloaded.load();
    expect(await reloaded.cashPosition("2024-12-31")).toBe(90000);
  });

  it("rejects non-positive amounts and bad dates", async () => {
    await expect(
      ledger.addCashFlow({ date: "2024-01-02", investorId: "x", type: "deposit", amount: { amount: 0, currency: "BRL" } })
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(
      ledger.addCashFlow({ date: "02/01/2024", investorId: "x", type: "deposit", amount: { amount: 10, currency: "BRL" } })
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it("blocks deposits from inactive investors but allows withdrawals", async () => {
    await seed();
    await ledger.setStatus("inv-b", "inactive");

    await expect(
      ledger.addCashFlow({ date: "2024-04-01", investorId: "inv-b", type: "deposit", amount: { amount: 10, currency: "BRL" } })
    ).rejects.toThrow("inactive");
    const flow = await ledger.addCashFlow({ date: "2024-04-01", investorId: "inv-b", type: "withdrawal", amount: { amount: 5000, currency: "BRL" } });
    expect(flow.investorName).toBe("Investor B");
  });

  it("converts foreign flows with the stored base amount or the FX rate", async () => {
    await store.upsertBars([
      { symbol: "USDBRL=X", date: "2024-01-02", open: 5, high: 5, low: 5, close: 5, adjClose: 5, volume: 0, dividend: 0, split: 1 },
    ]);
    await ledger.addCashFlow({ date: "2024-01-02", investorId: "usd", type: "deposit", amount: { amount: 1000, currency: "USD" } });
    await ledger.addCashFlow({ date: "2024-01-03", investorId: "usd", type: "deposit", amount: { amount: 100, currency: "USD" }, amountInBase: 520 });

    expect(await ledger.cashPosition("2024-01-31")).toBe(5520);
  });

  it("returns a zero stake for everyone when the fund total is not positive", async () => {
    await ledger.addCashFlow({ date: "2024-01-02", investorId: "a", type: "withdrawal", amount: { amount: 100, currency: "BRL" } });

    const stakes = await ledger.investorStakes("2024-12-31");
    expect(stakes).toEqual([
      { investorId: "a", name: "a", status: "active", deposits: 0, withdrawals: 100, netContribution: -100, stakePct: 0 },
    ]);
  });

  it("filters history by investor and date", async () => {
    await seed();

    expect(ledger.investorHistory("inv-a", "2024-02-01").map(f => f.type)).toEqual(["withdrawal"]);
    expect(ledger.cashFlowHistory(undefined, "2024-01-31")).toHaveLength(2);
  });
});
