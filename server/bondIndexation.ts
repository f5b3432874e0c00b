/**
 * Bond Indexation Engine: accrued value of Brazilian fixed-income positions.
 *
 *   IPCA (NTN-B):   principal · Π(1 + ipca_m) · (1 + fixed)^years
 *   CDI / SELIC:    principal · Π(1 + ref_m · pct/100)
 *   PREFIXADO:      principal · (1 + rate)^years
 *
 * years = days / 365.25. Months count when their first day falls inside
 * [issueDate, valuationDate]. Accrual stops at maturity.
 * A month missing from the reference series uses a fixed annual fallback
 * and the valuation is flagged approximated.
 */

import { ENV } from "./_core/env";
import { daysBetween, minDate, monthKey, shiftDays } from "./dates";
import type { BondPosition, FloatingIndexer, Indexer, IndexerRate, IsoDate } from "./types";

// ============================================================
// TYPES
// ============================================================

export interface IndexationOptions {
  ipcaFallbackAnnual: number;
  cdiFallbackAnnual: number;
  selicFallbackAnnual: number;
}

export interface BondValuation {
  issueId: string;
  title: string;
  issuer: string;
  indexer: Indexer;
  percentIndexed: number;
  principal: number;
  accruedValue: number;
  pnl: number;
  pnlPct: number;
  valuationDate: IsoDate;
  yearsHeld: number;
  matured: boolean;
  daysToMaturity: number;
  approximated: boolean;
  approximatedMonths: string[];
}

export interface BondSummary {
  totalInvested: number;
  totalValue: number;
  totalPnl: number;
  totalPnlPct: number;
  activeCount: number;
  maturedCount: number;
  maturingIn30Days: number;
  maturingIn90Days: number;
  approximated: boolean;
}

export interface AllocationSlice {
  value: number;
  pct: number;
  count: number;
}

export interface MaturityBucket {
  month: string; // YYYY-MM
  count: number;
  principal: number;
  accruedValue: number;
}

export function indexationOptionsFromEnv(): IndexationOptions {
  return {
    ipcaFallbackAnnual: ENV.IPCA_FALLBACK_ANNUAL,
    cdiFallbackAnnual: ENV.CDI_FALLBACK_ANNUAL,
    selicFallbackAnnual: ENV.SELIC_FALLBACK_ANNUAL,
  };
}

// ============================================================
// PARSING
// ============================================================

/**
 * Last number in the text, decimal comma allowed: "IPCA + 5,5%" → 5.5, "110% CDI" → 110.
 */
export function parsePercentIndexed(text: string): number | null {
  const matches = text.match(/\d+(?:[.,]\d+)?/g);
  if (!matches || matches.length === 0) return null;
  const value = parseFloat(matches[matches.length - 1].replace(",", "."));
  return Number.isFinite(value) ? value : null;
}

export function parseIndexer(text: string): Indexer | null {
  const upper = text.trim().toUpperCase();
  if (upper.includes("IPCA") || upper.includes("NTN-B") || upper.includes("NTNB")) return "IPCA";
  if (upper.includes("SELIC") || upper.includes("LFT")) return "SELIC";
  if (upper.includes("CDI") || upper === "DI") return "CDI";
  if (upper.startsWith("PRE") || upper.includes("LTN") || upper.includes("NTN-F")) return "PREFIXADO";
  return null;
}

/** Months ("YYYY-MM") whose first day falls within [start, end]. */
export function monthsInRange(start: IsoDate, end: IsoDate): string[] {
  const months: string[] = [];
  let firstDay = start.endsWith("-01") ? start : `${monthKey(shiftDays(`${monthKey(start)}-28`, 4))}-01`;
  while (firstDay <= end) {
    months.push(monthKey(firstDay));
    firstDay = `${monthKey(shiftDays(firstDay, 31))}-01`;
  }
  return months;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

// ============================================================
// ENGINE
// ============================================================

export class BondIndexationEngine {
  private series = new Map<FloatingIndexer, Map<string, number>>();
  private readonly options: IndexationOptions;

  constructor(options: Partial<IndexationOptions> = {}) {
    this.options = { ...indexationOptionsFromEnv(), ...options };
  }

  /** Merge monthly rates into the reference series. */
  setSeries(indexer: FloatingIndexer, rates: IndexerRate[]): void {
    const current = this.series.get(indexer) ?? new Map<string, number>();
    for (const rate of rates) current.set(rate.month, rate.ratePct);
    this.series.set(indexer, current);
  }

  private fallbackMonthlyPct(indexer: FloatingIndexer): number {
    const annual =
      indexer === "IPCA"
        ? this.options.ipcaFallbackAnnual
        : indexer === "CDI"
          ? this.options.cdiFallbackAnnual
          : this.options.selicFallbackAnnual;
    return (Math.pow(1 + annual, 1 / 12) - 1) * 100;
  }

  /**
   * Compounded factor of the reference series over [start, end], scaled by
   * `share` (1 for IPCA, pct/100 for CDI and SELIC).
   */
  private compound(indexer: FloatingIndexer, start: IsoDate, end: IsoDate, share: number) {
    const rates = this.series.get(indexer);
    const missing: string[] = [];
    let factor = 1;
    for (const month of monthsInRange(start, end)) {
      let ratePct = rates?.get(month);
      if (ratePct === undefined) {
        missing.push(month);
        ratePct = this.fallbackMonthlyPct(indexer);
      }
      factor *= 1 + (ratePct / 100) * share;
    }
    return { factor, missing };
  }

  value(bond: BondPosition, asOf: IsoDate): BondValuation {
    const valuationDate = minDate(asOf, bond.maturityDate);
    const heldDays = Math.max(0, daysBetween(bond.issueDate, valuationDate));
    const yearsHeld = heldDays / 365.25;
    const rate = bond.percentIndexed / 100;

    let accruedValue = bond.principal;
    let approximatedMonths: string[] = [];

    if (heldDays > 0) {
      switch (bond.indexer) {
        case "IPCA": {
          const { factor, missing } = this.compound("IPCA", bond.issueDate, valuationDate, 1);
          accruedValue = bond.principal * factor * Math.pow(1 + rate, yearsHeld);
          approximatedMonths = missing;
          break;
        }
        case "CDI":
        case "SELIC": {
          const { factor, missing } = this.compound(bond.indexer, bond.issueDate, valuationDate, rate);
          accruedValue = bond.principal * factor;
          approximatedMonths = missing;
          break;
        }
        case "PREFIXADO":
          accruedValue = bond.principal * Math.pow(1 + rate, yearsHeld);
          break;
      }
    }

    const pnl = accruedValue - bond.principal;
    return {
      issueId: bond.issueId,
      title: bond.title,
      issuer: bond.issuer,
      indexer: bond.indexer,
      percentIndexed: bond.percentIndexed,
      principal: bond.principal,
      accruedValue,
      pnl,
      pnlPct: bond.principal > 0 ? (pnl / bond.principal) * 100 : 0,
      valuationDate,
      yearsHeld,
      matured: asOf >= bond.maturityDate,
      daysToMaturity: Math.max(0, daysBetween(asOf, bond.maturityDate)),
      approximated: approximatedMonths.length > 0,
      approximatedMonths,
    };
  }

  /** Bonds issued on or before `asOf`, matured ones included at their capped value. */
  valueAll(bonds: BondPosition[], asOf: IsoDate): BondValuation[] {
    return bonds.filter(b => b.issueDate <= asOf).map(b => this.value(b, asOf));
  }

  summary(valuations: BondValuation[]): BondSummary {
    const active = valuations.filter(v => !v.matured);
    const totalInvested = valuations.reduce((sum, v) => sum + v.principal, 0);
    const totalValue = valuations.reduce((sum, v) => sum + v.accruedValue, 0);
    const totalPnl = totalValue - totalInvested;
    return {
      totalInvested: round2(totalInvested),
      totalValue: round2(totalValue),
      totalPnl: round2(totalPnl),
      totalPnlPct: totalInvested > 0 ? (totalPnl / totalInvested) * 100 : 0,
      activeCount: active.length,
      maturedCount: valuations.length - active.length,
      maturingIn30Days: active.filter(v => v.daysToMaturity <= 30).length,
      maturingIn90Days: active.filter(v => v.daysToMaturity <= 90).length,
      approximated: valuations.some(v => v.approximated),
    };
  }

  allocationBy(valuations: BondValuation[], key: "indexer" | "issuer"): Record<string, AllocationSlice> {
    const active = valuations.filter(v => !v.matured);
    const total = active.reduce((sum, v) => sum + v.accruedValue, 0);
    const slices: Record<string, AllocationSlice> = {};
    for (const v of active) {
      const name = v[key];
      const slice = slices[name] ?? { value: 0, pct: 0, count: 0 };
      slice.value += v.accruedValue;
      slice.count += 1;
      slices[name] = slice;
    }
    for (const slice of Object.values(slices)) {
      slice.pct = total > 0 ? (slice.value / total) * 100 : 0;
    }
    return slices;
  }

  /** Active bonds grouped by maturity month, earliest first. */
  maturitySchedule(bonds: BondPosition[], asOf: IsoDate): MaturityBucket[] {
    const buckets = new Map<string, MaturityBucket>();
    for (const bond of bonds) {
      if (bond.maturityDate <= asOf || bond.issueDate > asOf) continue;
      const month = monthKey(bond.maturityDate);
      const bucket = buckets.get(month) ?? { month, count: 0, principal: 0, accruedValue: 0 };
      bucket.count += 1;
      bucket.principal += bond.principal;
      bucket.accruedValue += this.value(bond, asOf).accruedValue;
      buckets.set(month, bucket);
    }
    return Array.from(buckets.values()).sort((a, b) => a.month.localeCompare(b.month));
  }
}
