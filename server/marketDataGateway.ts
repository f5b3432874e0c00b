/**
 * Market Data Gateway: daily OHLCV bars and Brazilian indexer series.
 *
 * Data sources:
 *   1. Yahoo Finance v8 chart API: equities (B3 ".SA"), crypto ("-USD"), FX ("USDBRL=X"), indices
 *   2. BCB SGS API: monthly IPCA (433), CDI (4391), SELIC (4390)
 *
 * The gateway is a thin transport: no retry, no caching. TimeSeriesCache owns both.
 */

import { z } from "zod";
import { ENV } from "./_core/env";
import { toBrDate, parseFlexibleDate } from "./dates";
import type { FloatingIndexer, IndexerRate, IsoDate, PriceBar } from "./types";

// ============================================================
// INTERFACES
// ============================================================

export interface MarketDataGateway {
  fetchBars(symbol: string, start: IsoDate, end: IsoDate, signal?: AbortSignal): Promise<PriceBar[]>;
}

export interface IndexerSource {
  fetchMonthlySeries(indexer: FloatingIndexer, start: IsoDate, end: IsoDate): Promise<IndexerRate[]>;
}

export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = "GatewayError";
  }
}

// ============================================================
// YAHOO FINANCE CHART API
// ============================================================

const nullableNumbers = z.array(z.number().nullable());

const chartSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z.array(
              z.object({
                open: nullableNumbers.optional(),
                high: nullableNumbers.optional(),
                low: nullableNumbers.optional(),
                close: nullableNumbers.optional(),
                volume: nullableNumbers.optional(),
              })
            ),
            adjclose: z.array(z.object({ adjclose: nullableNumbers.optional() })).optional(),
          }),
          events: z
            .object({
              dividends: z.record(z.object({ amount: z.number(), date: z.number() })).optional(),
              splits: z
                .record(z.object({ date: z.number(), numerator: z.number(), denominator: z.number() }))
                .optional(),
            })
            .optional(),
        })
      )
      .nullable(),
    error: z.object({ code: z.string(), description: z.string() }).nullable().optional(),
  }),
});

function epochToIsoDate(seconds: number): IsoDate {
  return new Date(seconds * 1000).toISOString().slice(0, 10);
}

function epochSeconds(date: IsoDate, endOfDay = false): number {
  const ms = Date.parse(`${date}T${endOfDay ? "23:59:59" : "00:00:00"}Z`);
  return Math.floor(ms / 1000);
}

/**
 * Turns one chart payload into bars. Days with a null close are skipped,
 * dividends and splits are folded into the bar of their date.
 */
export function parseChartResponse(symbol: string, payload: unknown): PriceBar[] {
  const parsed = chartSchema.safeParse(payload);
  if (!parsed.success) {
    throw new GatewayError(`Unexpected chart payload for ${symbol}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  const { chart } = parsed.data;
  if (chart.error) {
    throw new GatewayError(`${symbol}: ${chart.error.code} ${chart.error.description}`);
  }
  const result = chart.result?.[0];
  if (!result || !result.timestamp) return [];

  const quote = result.indicators.quote.at(0);
  const adjclose = result.indicators.adjclose?.[0]?.adjclose;

  const dividends = new Map<IsoDate, number>();
  for (const event of Object.values(result.events?.dividends ?? {})) {
    const day = epochToIsoDate(event.date);
    dividends.set(day, (dividends.get(day) ?? 0) + event.amount);
  }
  const splits = new Map<IsoDate, number>();
  for (const event of Object.values(result.events?.splits ?? {})) {
    if (event.denominator !== 0) {
      splits.set(epochToIsoDate(event.date), event.numerator / event.denominator);
    }
  }

  const bars = new Map<IsoDate, PriceBar>();
  result.timestamp.forEach((ts, i) => {
    const close = quote?.close?.[i];
    if (close === null || close === undefined) return;
    const date = epochToIsoDate(ts);
    bars.set(date, {
      symbol,
      date,
      open: quote?.open?.[i] ?? close,
      high: quote?.high?.[i] ?? close,
      low: quote?.low?.[i] ?? close,
      close,
      adjClose: adjclose?.[i] ?? close,
      volume: quote?.volume?.[i] ?? 0,
      dividend: dividends.get(date) ?? 0,
      split: splits.get(date) ?? 1,
    });
  });

  return Array.from(bars.values()).sort((a, b) => a.date.localeCompare(b.date));
}

function withTimeout(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  if (!signal) return timeout;
  const controller = new AbortController();
  const abort = () => controller.abort();
  signal.addEventListener("abort", abort, { once: true });
  timeout.addEventListener("abort", abort, { once: true });
  return controller.signal;
}

export class YahooChartGateway implements MarketDataGateway {
  constructor(
    private readonly baseUrl: string = ENV.YAHOO_CHART_URL,
    private readonly timeoutMs: number = ENV.FETCH_TIMEOUT_MS
  ) {}

  async fetchBars(symbol: string, start: IsoDate, end: IsoDate, signal?: AbortSignal): Promise<PriceBar[]> {
    const params = new URLSearchParams({
      period1: String(epochSeconds(start)),
      period2: String(epochSeconds(end, true)),
      interval: "1d",
      events: "div,split",
    });
    const url = `${this.baseUrl}/${encodeURIComponent(symbol)}?${params.toString()}`;
    const resp = await fetch(url, {
      signal: withTimeout(this.timeoutMs, signal),
      headers: { "User-Agent": "Mozilla/5.0" },
    });
    if (resp.status === 404) {
      // Unknown symbol or no data for the window
      return [];
    }
    if (!resp.ok) {
      throw new GatewayError(`[Yahoo] ${symbol}: HTTP ${resp.status}`, resp.status);
    }
    const bars = parseChartResponse(symbol, await resp.json());
    return bars.filter(b => b.date >= start && b.date <= end);
  }
}

// ============================================================
// BCB SGS API
// ============================================================

export const BCB_SERIES: Record<FloatingIndexer, number> = {
  IPCA: 433,
  CDI: 4391,
  SELIC: 4390,
};

const sgsSchema = z.array(z.object({ data: z.string(), valor: z.string() }));

export function parseSgsResponse(payload: unknown): IndexerRate[] {
  const parsed = sgsSchema.safeParse(payload);
  if (!parsed.success) {
    throw new GatewayError("Unexpected SGS payload");
  }
  const rates: IndexerRate[] = [];
  for (const point of parsed.data) {
    const date = parseFlexibleDate(point.data);
    const ratePct = parseFloat(point.valor.replace(",", "."));
    if (date && Number.isFinite(ratePct)) {
      rates.push({ month: date.slice(0, 7), ratePct });
    }
  }
  return rates.sort((a, b) => a.month.localeCompare(b.month));
}

export class BcbIndexerSource implements IndexerSource {
  constructor(
    private readonly baseUrl: string = ENV.BCB_SGS_URL,
    private readonly timeoutMs: number = ENV.FETCH_TIMEOUT_MS
  ) {}

  async fetchMonthlySeries(indexer: FloatingIndexer, start: IsoDate, end: IsoDate): Promise<IndexerRate[]> {
    const code = BCB_SERIES[indexer];
    const params = new URLSearchParams({
      formato: "json",
      dataInicial: toBrDate(start),
      dataFinal: toBrDate(end),
    });
    const url = `${this.baseUrl}/bcdata.sgs.${code}/dados?${params.toString()}`;
    const resp = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    if (!resp.ok) {
      throw new GatewayError(`[BCB] series ${code}: HTTP ${resp.status}`, resp.status);
    }
    const rates = parseSgsResponse(await resp.json());
    console.log(`[BCB] ${indexer} (${code}): ${rates.length} monthly points`);
    return rates;
  }
}
