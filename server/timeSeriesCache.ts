/**
 * Time Series Cache: incremental historical price store.
 *
 * Fetch flow:
 *   1. Read SymbolMetadata and plan only the gaps outside the covered window
 *   2. Split each gap into sequential windows of `batchDays`
 *   3. Fetch every window with retry + backoff; a failed window never undoes stored ones
 *   4. Grow coverage over the contiguous run of successful windows
 *
 * Missing calendar days (weekends, holidays) are not errors.
 */

import { ENV } from "./_core/env";
import { errorMessage } from "./_core/errors";
import { minDate, shiftDays, today as systemToday } from "./dates";
import type { MarketDataGateway } from "./marketDataGateway";
import { RETRY_CONFIG, sleep as defaultSleep, withRetry, type RetryConfig, type SleepFn } from "./retry";
import type { PriceStore } from "./stores";
import type { IsoDate, PriceBar, SymbolMetadata } from "./types";

// ============================================================
// TYPES
// ============================================================

export interface CacheOptions {
  batchDays: number;
  batchDelayMs: number;
  symbolDelayMs: number;
  retry: RetryConfig;
  sleep: SleepFn;
  clock: () => IsoDate;
}

export interface DateRange {
  start: IsoDate;
  end: IsoDate;
  side: "initial" | "before" | "after";
}

export interface WindowResult {
  start: IsoDate;
  end: IsoDate;
  status: "stored" | "failed" | "cancelled";
  records: number;
  changed: number;
  attempts: number;
  error?: string;
}

export interface FetchReport {
  symbol: string;
  ranges: DateRange[];
  windows: WindowResult[];
  recordsStored: number;
  rowsChanged: number;
  failedWindows: number;
  skipped: boolean; // requested range already covered
  cancelled: boolean;
}

export interface BulkFetchReport {
  reports: FetchReport[];
  failedSymbols: string[];
  cancelled: boolean;
}

export interface CacheStats {
  totalRecords: number;
  symbolCount: number;
  symbols: SymbolMetadata[];
  firstDate: IsoDate | null;
  lastDate: IsoDate | null;
}

export interface LatestPrice {
  symbol: string;
  price: number;
  date: IsoDate;
}

export function cacheOptionsFromEnv(): CacheOptions {
  return {
    batchDays: ENV.FETCH_BATCH_DAYS,
    batchDelayMs: ENV.FETCH_BATCH_DELAY_MS,
    symbolDelayMs: ENV.FETCH_SYMBOL_DELAY_MS,
    retry: {
      ...RETRY_CONFIG,
      maxRetries: ENV.FETCH_MAX_RETRIES,
      baseDelayMs: ENV.FETCH_BACKOFF_BASE_MS,
      maxDelayMs: ENV.FETCH_BACKOFF_MAX_MS,
    },
    sleep: defaultSleep,
    clock: systemToday,
  };
}

// ============================================================
// PLANNING
// ============================================================

/**
 * Ranges of [start, end] not yet covered. Coverage is one contiguous window,
 * so at most one gap before it and one after it. Each gap runs up to the
 * covered edge, so a request away from the window fills the days in between.
 */
export function planMissingRanges(
  start: IsoDate,
  end: IsoDate,
  metadata: Pick<SymbolMetadata, "coveredFrom" | "coveredTo"> | undefined
): DateRange[] {
  if (start > end) return [];
  if (!metadata || !metadata.coveredFrom || !metadata.coveredTo) {
    return [{ start, end, side: "initial" }];
  }
  const ranges: DateRange[] = [];
  if (start < metadata.coveredFrom) {
    ranges.push({ start, end: shiftDays(metadata.coveredFrom, -1), side: "before" });
  }
  if (end > metadata.coveredTo) {
    ranges.push({ start: shiftDays(metadata.coveredTo, 1), end, side: "after" });
  }
  return ranges;
}

/** Inclusive windows of at most `batchDays` calendar days. */
export function splitIntoWindows(start: IsoDate, end: IsoDate, batchDays: number): Array<{ start: IsoDate; end: IsoDate }> {
  const size = Math.max(1, Math.floor(batchDays));
  const windows: Array<{ start: IsoDate; end: IsoDate }> = [];
  let current = start;
  while (current <= end) {
    const windowEnd = minDate(shiftDays(current, size - 1), end);
    windows.push({ start: current, end: windowEnd });
    current = shiftDays(windowEnd, 1);
  }
  return windows;
}

/**
 * New covered window after fetching `range`. Only successful windows that touch
 * the existing coverage (or the range start, for a first fetch) extend it.
 */
export function extendCoverage(
  coveredFrom: IsoDate | null,
  coveredTo: IsoDate | null,
  range: DateRange,
  windows: WindowResult[]
): { coveredFrom: IsoDate | null; coveredTo: IsoDate | null } {
  if (range.side === "before") {
    let from = coveredFrom;
    for (let i = windows.length - 1; i >= 0 && windows[i].status === "stored"; i--) {
      from = windows[i].start;
    }
    return { coveredFrom: from, coveredTo };
  }

  let to = range.side === "initial" ? null : coveredTo;
  let from = range.side === "initial" ? null : coveredFrom;
  for (const window of windows) {
    if (window.status !== "stored") break;
    if (from === null) from = window.start;
    to = window.end;
  }
  return { coveredFrom: from, coveredTo: to };
}

// ============================================================
// CACHE
// ============================================================

export class TimeSeriesCache {
  private readonly options: CacheOptions;

  constructor(
    private readonly store: PriceStore,
    private readonly gateway: MarketDataGateway,
    options: Partial<CacheOptions> = {}
  ) {
    this.options = { ...cacheOptionsFromEnv(), ...options };
  }

  /**
   * Fetch only what is missing for [start, end]. A repeat call over a covered
   * range touches neither the gateway nor the store.
   */
  async fetch(
    symbol: string,
    start: IsoDate,
    end: IsoDate,
    batchDays: number = this.options.batchDays,
    signal?: AbortSignal
  ): Promise<FetchReport> {
    const effectiveEnd = minDate(end, this.options.clock());
    const metadata = await this.store.getMetadata(symbol);
    const ranges = planMissingRanges(start, effectiveEnd, metadata);

    const report: FetchReport = {
      symbol,
      ranges,
      windows: [],
      recordsStored: 0,
      rowsChanged: 0,
      failedWindows: 0,
      skipped: ranges.length === 0,
      cancelled: false,
    };

    if (report.skipped) {
      console.log(`[Cache] ${symbol}: ${start}..${effectiveEnd} already cached`);
      return report;
    }

    let coveredFrom = metadata?.coveredFrom ?? null;
    let coveredTo = metadata?.coveredTo ?? null;

    for (const range of ranges) {
      const windows = splitIntoWindows(range.start, range.end, batchDays);
      console.log(`[Cache] ${symbol}: fetching ${range.start}..${range.end} in ${windows.length} window(s)`);
      const results: WindowResult[] = [];

      for (let i = 0; i < windows.length; i++) {
        if (signal?.aborted) {
          results.push({ ...windows[i], status: "cancelled", records: 0, changed: 0, attempts: 0 });
          report.cancelled = true;
          continue;
        }
        if (i > 0) await this.options.sleep(this.options.batchDelayMs, signal);
        results.push(await this.fetchWindow(symbol, windows[i].start, windows[i].end, signal));
      }

      for (const result of results) {
        if (result.status === "failed") report.failedWindows++;
        if (result.status === "cancelled") report.cancelled = true;
        report.recordsStored += result.records;
        report.rowsChanged += result.changed;
      }
      report.windows.push(...results);
      ({ coveredFrom, coveredTo } = extendCoverage(coveredFrom, coveredTo, range, results));
    }

    await this.refreshMetadata(symbol, coveredFrom, coveredTo);
    console.log(
      `[Cache] ${symbol}: ${report.recordsStored} bars received, ${report.rowsChanged} rows changed, ${report.failedWindows} failed window(s)`
    );
    return report;
  }

  private async fetchWindow(symbol: string, start: IsoDate, end: IsoDate, signal?: AbortSignal): Promise<WindowResult> {
    const outcome = await withRetry(
      `${symbol} ${start}..${end}`,
      () => this.gateway.fetchBars(symbol, start, end, signal),
      { config: this.options.retry, sleep: this.options.sleep, signal, tag: "Cache" }
    );
    if (!outcome.ok) {
      return {
        start,
        end,
        status: outcome.aborted ? "cancelled" : "failed",
        records: 0,
        changed: 0,
        attempts: outcome.attempts,
        error: outcome.errors[outcome.errors.length - 1],
      };
    }
    const bars = outcome.value.filter(b => b.date >= start && b.date <= end).map(b => ({ ...b, symbol }));
    const changed = await this.store.upsertBars(bars);
    return { start, end, status: "stored", records: bars.length, changed, attempts: outcome.attempts };
  }

  private async refreshMetadata(symbol: string, coveredFrom: IsoDate | null, coveredTo: IsoDate | null): Promise<void> {
    const range = await this.store.summarizeSymbol(symbol);
    const fallbackDate = coveredFrom ?? this.options.clock();
    await this.store.saveMetadata({
      symbol,
      firstDate: range?.firstDate ?? fallbackDate,
      lastDate: range?.lastDate ?? fallbackDate,
      recordCount: range?.recordCount ?? 0,
      lastUpdated: new Date().toISOString(),
      coveredFrom,
      coveredTo,
    });
  }

  /**
   * Fetch many symbols sequentially. One symbol failing never stops the rest;
   * an aborted signal stops between windows and keeps what was stored.
   */
  async bulkFetch(
    symbols: string[],
    start: IsoDate,
    end: IsoDate,
    options: { batchDays?: number; signal?: AbortSignal; forceRefresh?: boolean } = {}
  ): Promise<BulkFetchReport> {
    const reports: FetchReport[] = [];
    const failedSymbols: string[] = [];
    console.log(`[Cache] Bulk fetch: ${symbols.length} symbol(s) ${start}..${end}`);

    for (let i = 0; i < symbols.length; i++) {
      if (options.signal?.aborted) {
        console.warn(`[Cache] Bulk fetch cancelled before ${symbols[i]}`);
        return { reports, failedSymbols, cancelled: true };
      }
      if (i > 0) await this.options.sleep(this.options.symbolDelayMs, options.signal);

      const symbol = symbols[i];
      try {
        const report = options.forceRefresh
          ? await this.forceRefresh(symbol, start, end, options.batchDays, options.signal)
          : await this.fetch(symbol, start, end, options.batchDays, options.signal);
        reports.push(report);
        if (report.failedWindows > 0) failedSymbols.push(symbol);
        if (report.cancelled) return { reports, failedSymbols, cancelled: true };
      } catch (error) {
        console.error(`[Cache] ${symbol}: ${errorMessage(error)}`);
        failedSymbols.push(symbol);
      }
    }

    return { reports, failedSymbols, cancelled: false };
  }

  /** Drop everything cached for the symbol, then fetch the range again. */
  async forceRefresh(
    symbol: string,
    start: IsoDate,
    end: IsoDate,
    batchDays?: number,
    signal?: AbortSignal
  ): Promise<FetchReport> {
    const deleted = await this.store.deleteSymbol(symbol);
    console.log(`[Cache] ${symbol}: force refresh dropped ${deleted} cached bar(s)`);
    return this.fetch(symbol, start, end, batchDays, signal);
  }

  // ============================================================
  // READS
  // ============================================================

  getHistory(symbol: string, start?: IsoDate, end?: IsoDate): Promise<PriceBar[]> {
    return this.store.getBars(symbol, start, end);
  }

  latestBar(symbol: string, asOf: IsoDate): Promise<PriceBar | undefined> {
    return this.store.latestBar(symbol, asOf);
  }

  async latestPrice(symbol: string, asOf: IsoDate = this.options.clock()): Promise<LatestPrice | undefined> {
    const bar = await this.store.latestBar(symbol, asOf);
    return bar ? { symbol, price: bar.close, date: bar.date } : undefined;
  }

  getMetadata(symbol: string): Promise<SymbolMetadata | undefined> {
    return this.store.getMetadata(symbol);
  }

  async getDatabaseStats(): Promise<CacheStats> {
    const symbols = await this.store.listMetadata();
    const totalRecords = await this.store.countBars();
    const firstDates = symbols.map(s => s.firstDate).sort();
    const lastDates = symbols.map(s => s.lastDate).sort();
    return {
      totalRecords,
      symbolCount: symbols.length,
      symbols,
      firstDate: firstDates[0] ?? null,
      lastDate: lastDates[lastDates.length - 1] ?? null,
    };
  }

  /**
   * Delete bars older than `daysToKeep` days and shrink coverage to match.
   */
  async clearOldData(daysToKeep = 365): Promise<number> {
    const cutoff = shiftDays(this.options.clock(), -daysToKeep);
    const deleted = await this.store.deleteBarsBefore(cutoff);
    for (const meta of await this.store.listMetadata()) {
      const coveredFrom = meta.coveredFrom && meta.coveredFrom < cutoff ? cutoff : meta.coveredFrom;
      const coveredTo = meta.coveredTo && meta.coveredTo < cutoff ? null : meta.coveredTo;
      await this.refreshMetadata(meta.symbol, coveredTo ? coveredFrom : null, coveredTo);
    }
    console.log(`[Cache] Cleared ${deleted} bar(s) older than ${cutoff}`);
    return deleted;
  }
}
