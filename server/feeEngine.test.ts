import { describe, it, expect, beforeEach } from "vitest";
import { ConcurrencyError, NotFoundError, PreconditionError, StateError } from "./_core/errors";
import { FeeEngine, feeRecordId, managementFee, performanceFee } from "./feeEngine";
import { MemoryStore } from "./memoryStore";
import type { FeeRecord, NAVSnapshot } from "./types";

const feeOptions = {
  managementRate: 0.02,
  performanceRate: 0.2,
  managementFeeBasis: "nav_end" as const,
  currency: "BRL" as const,
  maxVersionRetries: 3,
};

function snapshot(date: string, nav: number): NAVSnapshot {
  return {
    date,
    currency: "BRL",
    equityValue: nav,
    cryptoValue: 0,
    bondValue: 0,
    portfolioValue: nav,
    cashPosition: 0,
    outstandingFees: 0,
    nav,
    stale: false,
    approximated: false,
  };
}

describe("Fee formulas", () => {
  it("prorates the management fee by calendar days", () => {
    expect(managementFee(1_000_000, 0.02, 30)).toBeCloseTo(1643.84, 2);
  });

  it("charges performance only above the high-water mark", () => {
    expect(performanceFee(900_000, 1_000_000, 0.2)).toBe(0);
    expect(performanceFee(1_100_000, 1_000_000, 0.2)).toBe(20000);
  });
});

describe("FeeEngine.calculate", () => {
  let store: MemoryStore;
  let engine: FeeEngine;

  beforeEach(() => {
    store = new MemoryStore();
    engine = new FeeEngine(store, feeOptions);
  });

  it("charges 24,000 management and 40,000 performance on a 1.0M → 1.2M year", async () => {
    const result = await engine.calculate({
      periodStart: "2024-01-01",
      periodEnd: "2024-12-31",
      navStart: 1_000_000,
      navEnd: 1_200_000,
    });

    expect(result.days).toBe(365);
    expect(result.managementFee).toBe(24000);
    expect(result.performanceFee).toBe(40000);
    expect(result.totalFees).toBe(64000);
    expect(result.navAfterFees).toBe(1_136_000);
    expect(result.highWaterMark).toBe(1_200_000);
    expect(await engine.highWaterMark()).toBe(1_200_000);
  });

  it("can charge management on the opening NAV", async () => {
    const onStart = new FeeEngine(store, { ...feeOptions, managementFeeBasis: "nav_start" });

    const result = await onStart.calculate({
      periodStart: "2024-01-01",
      periodEnd: "2024-12-31",
      navStart: 1_000_000,
      navEnd: 1_200_000,
    });

    expect(result.managementFee).toBe(20000);
  });

  it("reads boundary NAVs from committed snapshots", async () => {
    await store.saveNavSnapshot(snapshot("2024-01-01", 500_000));
    await store.saveNavSnapshot(snapshot("2024-07-01", 550_000));

    const result = await engine.calculate({ periodStart: "2024-01-01", periodEnd: "2024-07-01" });

    expect(result.navStart).toBe(500_000);
    expect(result.navEnd).toBe(550_000);
    expect(result.performanceFee).toBe(10000);
  });

  it("refuses to run without a NAV at the period boundary", async () => {
    await store.saveNavSnapshot(snapshot("2024-01-01", 500_000));

    await expect(engine.calculate({ periodStart: "2024-01-01", periodEnd: "2024-07-01" })).rejects.toBeInstanceOf(
      PreconditionError
    );
    expect(engine.listRecords()).toEqual([]);
  });

  it("never lowers the high-water mark", async () => {
    await engine.calculate({ periodStart: "2024-01-01", periodEnd: "2024-06-30", navStart: 1_000_000, navEnd: 1_200_000 });

    const down = await engine.calculate({ periodStart: "2024-06-30", periodEnd: "2024-12-31", navStart: 1_200_000, navEnd: 1_100_000 });
    expect(down.performanceFee).toBe(0);
    expect(down.highWaterMark).toBe(1_200_000);

    const up = await engine.calculate({ periodStart: "2024-12-31", periodEnd: "2025-06-30", navStart: 1_100_000, navEnd: 1_300_000 });
    expect(up.previousHighWaterMark).toBe(1_200_000);
    expect(up.performanceFee).toBe(20000);
    expect(up.highWaterMark).toBe(1_300_000);
  });

  it("refuses to calculate the same period twice", async () => {
    const period = { periodStart: "2024-01-01", periodEnd: "2024-12-31", navStart: 1, navEnd: 1 };
    await engine.calculate(period);

    await expect(engine.calculate(period)).rejects.toBeInstanceOf(StateError);
  });

  it("re-reads fund state after a concurrent high-water-mark update", async () => {
    class RacingStore extends MemoryStore {
      raced = false;
      async compareAndSetFundState(expectedVersion: number, highWaterMark: number | null) {
        if (!this.raced) {
          this.raced = true;
          await super.compareAndSetFundState(expectedVersion, 1_100_000);
        }
        return super.compareAndSetFundState(expectedVersion, highWaterMark);
      }
    }
    const racing = new RacingStore();
    const racingEngine = new FeeEngine(racing, feeOptions);

    const result = await racingEngine.calculate({
      periodStart: "2024-01-01",
      periodEnd: "2024-12-31",
      navStart: 1_000_000,
      navEnd: 1_200_000,
    });

    expect(result.previousHighWaterMark).toBe(1_100_000);
    expect(result.performanceFee).toBe(20000);
    expect((await racing.getFundState()).version).toBe(2);
  });

  it("leaves the high-water mark alone when storing the records fails", async () => {
    class FailOnceStore extends MemoryStore {
      failNext = true;
      async saveFeeRecord(record: FeeRecord): Promise<void> {
        if (this.failNext) {
          this.failNext = false;
          throw new Error("write timeout");
        }
        return super.saveFeeRecord(record);
      }
    }
    const flaky = new FailOnceStore();
    const flakyEngine = new FeeEngine(flaky, feeOptions);
    const period = { periodStart: "2024-01-01", periodEnd: "2024-12-31", navStart: 1_000_000, navEnd: 1_200_000 };

    await expect(flakyEngine.calculate(period)).rejects.toThrow("write timeout");
    expect(await flakyEngine.highWaterMark()).toBeNull();
    expect(flakyEngine.listRecords().map(r => r.status)).toEqual(["pending", "pending"]);

    const retry = await flakyEngine.calculate(period);
    expect(retry.performanceFee).toBe(40000);
    expect(retry.managementFee).toBe(24000);
    expect(await flakyEngine.highWaterMark()).toBe(1_200_000);
  });

  it("surfaces a conflict once retries run out", async () => {
    class AlwaysStale extends MemoryStore {
      async compareAndSetFundState(expectedVersion: number): Promise<never> {
        throw new ConcurrencyError("stale", expectedVersion, expectedVersion + 1);
      }
    }
    const stuck = new FeeEngine(new AlwaysStale(), { ...feeOptions, maxVersionRetries: 2 });

    await expect(
      stuck.calculate({ periodStart: "2024-01-01", periodEnd: "2024-12-31", navStart: 1, navEnd: 2 })
    ).rejects.toBeInstanceOf(ConcurrencyError);
  });
});

describe("FeeEngine record lifecycle", () => {
  let store: MemoryStore;
  let engine: FeeEngine;

  beforeEach(async () => {
    store = new MemoryStore();
    engine = new FeeEngine(store, feeOptions);
    await engine.calculate({ periodStart: "2024-01-01", periodEnd: "2024-12-31", navStart: 1_000_000, navEnd: 1_200_000 });
  });

  it("marks a calculated fee paid exactly once", async () => {
    const id = feeRecordId("management", "2024-01-01", "2024-12-31");

    const paid = await engine.markPaid(id, "2025-01-10");
    expect(paid).toMatchObject({ status: "paid", paid: true, paymentDate: "2025-01-10" });

    await expect(engine.markPaid(id, "2025-01-11")).rejects.toBeInstanceOf(StateError);
    await expect(engine.markPaid("fee-missing", "2025-01-11")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("refuses to pay a pending record", async () => {
    const [pending] = await engine.schedule("2025-01-01", "2025-03-31");

    expect(pending.status).toBe("pending");
    await expect(engine.markPaid(pending.id, "2025-04-01")).rejects.toThrow("has not been calculated");
  });

  it("counts fees as outstanding until the payment date", async () => {
    await engine.markPaid(feeRecordId("management", "2024-01-01", "2024-12-31"), "2025-01-10");

    expect(engine.outstandingFees("2024-12-30")).toBe(0);
    expect(engine.outstandingFees("2024-12-31")).toBe(64000);
    expect(engine.outstandingFees("2025-01-09")).toBe(64000);
    expect(engine.outstandingFees("2025-01-10")).toBe(40000);
  });

  it("turns a scheduled period into calculated records", async () => {
    await engine.schedule("2025-01-01", "2025-03-31");

    const result = await engine.calculate({ periodStart: "2025-01-01", periodEnd: "2025-03-31", navStart: 1_136_000, navEnd: 1_136_000 });

    expect(result.records.map(r => r.status)).toEqual(["calculated", "calculated"]);
    expect(engine.listRecords()).toHaveLength(4);
  });

  it("summarizes totals, payments and counts", async () => {
    await engine.markPaid(feeRecordId("performance", "2024-01-01", "2024-12-31"), "2025-01-05");
    await engine.schedule("2025-01-01", "2025-03-31");

    const summary = await engine.feeSummary();

    expect(summary).toEqual({
      managementTotal: 24000,
      performanceTotal: 40000,
      totalFees: 64000,
      outstanding: 24000,
      paid: 40000,
      recordCount: 4,
      paidCount: 1,
      pendingCount: 2,
      highWaterMark: 1_200_000,
    });
  });

  it("reloads records from the store", async () => {
    const reloaded = new FeeEngine(store, feeOptions);
    await reloaded.load();

    expect(reloaded.outstandingFees("2024-12-31")).toBe(64000);
  });
});

describe("FeeEngine.importRecord", () => {
  it("restores the high-water mark from imported performance records", async () => {
    const store = new MemoryStore();
    const engine = new FeeEngine(store, feeOptions);

    await engine.importRecord({
      id: "imported-1",
      periodStart: "2023-01-01",
      periodEnd: "2023-12-31",
      feeType: "performance",
      status: "paid",
      navStart: 800_000,
      navEnd: 950_000,
      rate: 0.2,
      amount: 30000,
      currency: "BRL",
      paid: true,
      paymentDate: "2024-01-10",
      calculatedAt: null,
      investorId: "FUND",
    });

    expect(await engine.highWaterMark()).toBe(950_000);
    const next = await engine.calculate({ periodStart: "2024-01-01", periodEnd: "2024-12-31", navStart: 900_000, navEnd: 1_000_000 });
    expect(next.performanceFee).toBe(10000);
  });
});
