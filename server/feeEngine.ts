/**
 * Fee Engine: management and performance fees against a high-water mark.
 *
 * Record lifecycle: pending → calculated → paid. Nothing else.
 *
 *   management  = navBase · rate / 365 · days   (navBase: nav_end by default)
 *   performance = (navEnd − hwm) · rate          when navEnd > hwm
 *
 * The HWM starts at the first period's navStart and never decreases. It is
 * written with a version check; a concurrent writer forces a re-read and retry.
 * Records are stored before the HWM moves, so a failed save leaves the HWM
 * untouched and the period can be calculated again.
 */

import { ENV } from "./_core/env";
import { ConcurrencyError, errorMessage, NotFoundError, PreconditionError, StateError, ValidationError } from "./_core/errors";
import { daysBetween, isIsoDate } from "./dates";
import type { LedgerStore } from "./stores";
import { FUND_LEVEL, type CurrencyCode, type FeeRecord, type FeeType, type FundState, type IsoDate } from "./types";

// ============================================================
// TYPES
// ============================================================

export type ManagementFeeBasis = "nav_start" | "nav_end";

export interface FeeOptions {
  managementRate: number; // annual, 0.02 = 2%
  performanceRate: number; // 0.20 = 20%
  managementFeeBasis: ManagementFeeBasis;
  currency: CurrencyCode;
  maxVersionRetries: number;
}

export interface FeePeriodInput {
  periodStart: IsoDate;
  periodEnd: IsoDate;
  navStart?: number;
  navEnd?: number;
}

export interface FeeCalculation {
  periodStart: IsoDate;
  periodEnd: IsoDate;
  days: number;
  navStart: number;
  navEnd: number;
  managementFee: number;
  performanceFee: number;
  totalFees: number;
  navAfterFees: number;
  previousHighWaterMark: number;
  highWaterMark: number;
  records: FeeRecord[];
}

export interface FeeSummary {
  managementTotal: number;
  performanceTotal: number;
  totalFees: number;
  outstanding: number;
  paid: number;
  recordCount: number;
  paidCount: number;
  pendingCount: number;
  highWaterMark: number | null;
}

export function feeOptionsFromEnv(): FeeOptions {
  return {
    managementRate: ENV.MANAGEMENT_FEE_RATE,
    performanceRate: ENV.PERFORMANCE_FEE_RATE,
    managementFeeBasis: ENV.MANAGEMENT_FEE_BASIS,
    currency: ENV.BASE_CURRENCY,
    maxVersionRetries: 3,
  };
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function feeRecordId(feeType: FeeType, periodStart: IsoDate, periodEnd: IsoDate): string {
  return `fee-${feeType}-${periodStart}-${periodEnd}`;
}

export function managementFee(navBase: number, annualRate: number, days: number): number {
  return round2((navBase * annualRate * days) / 365);
}

export function performanceFee(navEnd: number, highWaterMark: number, rate: number): number {
  return navEnd > highWaterMark ? round2((navEnd - highWaterMark) * rate) : 0;
}

// ============================================================
// ENGINE
// ============================================================

export class FeeEngine {
  private records = new Map<string, FeeRecord>();
  private readonly options: FeeOptions;

  constructor(
    private readonly store: LedgerStore,
    options: Partial<FeeOptions> = {}
  ) {
    this.options = { ...feeOptionsFromEnv(), ...options };
  }

  async load(): Promise<void> {
    this.records = new Map((await this.store.listFeeRecords()).map(r => [r.id, r]));
    console.log(`[FeeEngine] Loaded ${this.records.size} fee record(s)`);
  }

  private validatePeriod(periodStart: IsoDate, periodEnd: IsoDate): void {
    if (!isIsoDate(periodStart) || !isIsoDate(periodEnd)) {
      throw new ValidationError(`Invalid fee period ${periodStart}..${periodEnd}`);
    }
    if (periodEnd <= periodStart) {
      throw new ValidationError(`Fee period must end after it starts (${periodStart}..${periodEnd})`);
    }
  }

  private periodRecords(periodStart: IsoDate, periodEnd: IsoDate): FeeRecord[] {
    return Array.from(this.records.values()).filter(r => r.periodStart === periodStart && r.periodEnd === periodEnd);
  }

  private blankRecord(feeType: FeeType, periodStart: IsoDate, periodEnd: IsoDate): FeeRecord {
    return {
      id: feeRecordId(feeType, periodStart, periodEnd),
      periodStart,
      periodEnd,
      feeType,
      status: "pending",
      navStart: null,
      navEnd: null,
      rate: feeType === "management" ? this.options.managementRate : this.options.performanceRate,
      amount: 0,
      currency: this.options.currency,
      paid: false,
      paymentDate: null,
      calculatedAt: null,
      investorId: FUND_LEVEL,
    };
  }

  /** Open a period with pending records. Re-scheduling a pending period is a no-op. */
  async schedule(periodStart: IsoDate, periodEnd: IsoDate): Promise<FeeRecord[]> {
    this.validatePeriod(periodStart, periodEnd);
    const existing = this.periodRecords(periodStart, periodEnd);
    if (existing.some(r => r.status !== "pending")) {
      throw new StateError(`Fee period ${periodStart}..${periodEnd} is already calculated`);
    }
    const scheduled: FeeRecord[] = [];
    for (const feeType of ["management", "performance"] as const) {
      const id = feeRecordId(feeType, periodStart, periodEnd);
      const record = this.records.get(id) ?? this.blankRecord(feeType, periodStart, periodEnd);
      if (!this.records.has(id)) {
        await this.store.saveFeeRecord(record);
        this.records.set(id, record);
      }
      scheduled.push({ ...record });
    }
    return scheduled;
  }

  async highWaterMark(): Promise<number | null> {
    return (await this.store.getFundState()).highWaterMark;
  }

  hasRecord(id: string): boolean {
    return this.records.has(id);
  }

  /**
   * Raise the HWM with a version check. `compute` sees the freshest state on every
   * try; `beforeCommit` runs ahead of each version write.
   */
  private async advanceHighWaterMark<T>(
    compute: (state: FundState) => { next: number | null; result: T },
    beforeCommit?: (result: T) => Promise<void>
  ): Promise<T> {
    let lastConflict: ConcurrencyError | undefined;
    for (let attempt = 0; attempt <= this.options.maxVersionRetries; attempt++) {
      const state = await this.store.getFundState();
      const { next, result } = compute(state);
      if (beforeCommit) await beforeCommit(result);
      try {
        await this.store.compareAndSetFundState(state.version, next);
        return result;
      } catch (error) {
        if (!(error instanceof ConcurrencyError)) throw error;
        lastConflict = error;
        console.warn(`[FeeEngine] Fund state changed underneath (attempt ${attempt + 1}), retrying`);
      }
    }
    throw lastConflict ?? new ConcurrencyError("Fund state update failed", -1, -1);
  }

  private async navAt(date: IsoDate, explicit: number | undefined, label: string): Promise<number> {
    const nav = explicit ?? (await this.store.getNavSnapshot(date))?.nav;
    if (nav === undefined || !Number.isFinite(nav)) {
      throw new PreconditionError(`NAV at ${label} (${date}) is not available; commit a NAV snapshot first`);
    }
    return nav;
  }

  async calculate(input: FeePeriodInput): Promise<FeeCalculation> {
    const { periodStart, periodEnd } = input;
    this.validatePeriod(periodStart, periodEnd);
    if (this.periodRecords(periodStart, periodEnd).some(r => r.status !== "pending")) {
      throw new StateError(`Fees for ${periodStart}..${periodEnd} were already calculated`);
    }

    const navStart = await this.navAt(periodStart, input.navStart, "period start");
    const navEnd = await this.navAt(periodEnd, input.navEnd, "period end");
    const days = daysBetween(periodStart, periodEnd);
    const navBase = this.options.managementFeeBasis === "nav_start" ? navStart : navEnd;
    const mgmt = managementFee(navBase, this.options.managementRate, days);

    const calculatedAt = new Date().toISOString();
    const build = (perf: number): FeeRecord[] =>
      ([["management", mgmt], ["performance", perf]] as const).map(([feeType, amount]): FeeRecord => ({
        ...(this.records.get(feeRecordId(feeType, periodStart, periodEnd)) ?? this.blankRecord(feeType, periodStart, periodEnd)),
        status: "calculated",
        navStart,
        navEnd,
        amount,
        calculatedAt,
      }));

    let records: FeeRecord[] = [];
    let outcome: { perf: number; previous: number; hwm: number };
    try {
      outcome = await this.advanceHighWaterMark(
        state => {
          const previousHwm = state.highWaterMark ?? navStart;
          const next = Math.max(previousHwm, navEnd);
          return {
            next,
            result: { perf: performanceFee(navEnd, previousHwm, this.options.performanceRate), previous: previousHwm, hwm: next },
          };
        },
        async ({ perf }) => {
          records = build(perf);
          for (const record of records) await this.store.saveFeeRecord(record);
        }
      );
    } catch (error) {
      await this.restorePeriod(periodStart, periodEnd);
      throw error;
    }
    const { perf, previous, hwm } = outcome;
    for (const record of records) this.records.set(record.id, record);

    console.log(
      `[FeeEngine] ${periodStart}..${periodEnd}: management ${mgmt.toFixed(2)}, performance ${perf.toFixed(2)}, HWM ${previous.toFixed(2)} → ${hwm.toFixed(2)}`
    );

    const totalFees = round2(mgmt + perf);
    return {
      periodStart,
      periodEnd,
      days,
      navStart,
      navEnd,
      managementFee: mgmt,
      performanceFee: perf,
      totalFees,
      navAfterFees: navEnd - totalFees,
      previousHighWaterMark: previous,
      highWaterMark: hwm,
      records: records.map(r => ({ ...r })),
    };
  }

  /** Put a period's stored records back to their state before a failed calculation. */
  private async restorePeriod(periodStart: IsoDate, periodEnd: IsoDate): Promise<void> {
    try {
      for (const feeType of ["management", "performance"] as const) {
        const id = feeRecordId(feeType, periodStart, periodEnd);
        const previous = this.records.get(id) ?? this.blankRecord(feeType, periodStart, periodEnd);
        await this.store.saveFeeRecord(previous);
        this.records.set(id, previous);
      }
    } catch (error) {
      console.error(`[FeeEngine] Could not restore ${periodStart}..${periodEnd} records: ${errorMessage(error)}`);
    }
  }

  async markPaid(feeRecordId: string, paymentDate: IsoDate): Promise<FeeRecord> {
    const record = this.records.get(feeRecordId);
    if (!record) throw new NotFoundError(`Fee record ${feeRecordId} not found`);
    if (!isIsoDate(paymentDate)) throw new ValidationError(`Invalid payment date: ${paymentDate}`);
    if (record.status === "paid") {
      throw new StateError(`Fee record ${feeRecordId} was already paid on ${record.paymentDate}`);
    }
    if (record.status === "pending") {
      throw new StateError(`Fee record ${feeRecordId} has not been calculated`);
    }
    const updated: FeeRecord = { ...record, status: "paid", paid: true, paymentDate };
    await this.store.saveFeeRecord(updated);
    this.records.set(updated.id, updated);
    return { ...updated };
  }

  /**
   * Load an externally kept record (e.g. from CSV). Paid/calculated performance
   * records raise the HWM to their navEnd.
   */
  async importRecord(record: FeeRecord): Promise<FeeRecord> {
    if (this.records.has(record.id)) {
      throw new ValidationError(`Fee record ${record.id} already exists`);
    }
    if (record.feeType === "performance" && record.status !== "pending" && record.navEnd !== null) {
      const navEnd = record.navEnd;
      await this.advanceHighWaterMark(state => ({
        next: state.highWaterMark === null ? navEnd : Math.max(state.highWaterMark, navEnd),
        result: undefined,
      }));
    }
    await this.store.saveFeeRecord(record);
    this.records.set(record.id, { ...record });
    return { ...record };
  }

  /** Calculated fees for periods ended by `asOf` that were not paid by then. */
  outstandingFees(asOf: IsoDate): number {
    let total = 0;
    for (const record of this.records.values()) {
      if (record.status === "pending" || record.periodEnd > asOf) continue;
      if (!record.paid || (record.paymentDate !== null && record.paymentDate > asOf)) total += record.amount;
    }
    return round2(total);
  }

  listRecords(): FeeRecord[] {
    return Array.from(this.records.values())
      .map(r => ({ ...r }))
      .sort((a, b) => a.periodEnd.localeCompare(b.periodEnd) || a.feeType.localeCompare(b.feeType));
  }

  async feeSummary(start?: IsoDate, end?: IsoDate): Promise<FeeSummary> {
    const records = this.listRecords().filter(r => (!start || r.periodEnd >= start) && (!end || r.periodEnd <= end));
    const calculated = records.filter(r => r.status !== "pending");
    const sum = (rows: FeeRecord[]) => round2(rows.reduce((total, r) => total + r.amount, 0));
    return {
      managementTotal: sum(calculated.filter(r => r.feeType === "management")),
      performanceTotal: sum(calculated.filter(r => r.feeType === "performance")),
      totalFees: sum(calculated),
      outstanding: sum(calculated.filter(r => !r.paid)),
      paid: sum(calculated.filter(r => r.paid)),
      recordCount: records.length,
      paidCount: records.filter(r => r.paid).length,
      pendingCount: records.filter(r => r.status === "pending").length,
      highWaterMark: await this.highWaterMark(),
    };
  }
}
