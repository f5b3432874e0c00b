/**
 * Performance Analytics: risk and return statistics over a NAV series.
 *
 * Conventions:
 *   - Returns are decimals (0.01 = 1%), simple daily returns nav_t / nav_{t−1} − 1
 *   - Annualization uses 252 trading days; standard deviations are sample (n − 1)
 *   - Ratios with a zero denominator are 0; rolling windows not yet full are null
 */

import { monthKey } from "./dates";
import type { IsoDate } from "./types";

export const TRADING_DAYS_PER_YEAR = 252;
const ANNUALIZATION = Math.sqrt(TRADING_DAYS_PER_YEAR);

// ============================================================
// TYPES
// ============================================================

export interface SeriesPoint {
  date: IsoDate;
  value: number;
}

export interface ReturnPoint {
  date: IsoDate;
  value: number; // return since the previous point
}

export interface DrawdownEpisode {
  peakDate: IsoDate;
  peakValue: number;
  peakIndex: number;
  troughDate: IsoDate;
  troughValue: number;
  troughIndex: number;
  recoveryDate: IsoDate | null; // null = unrecovered
  recoveryIndex: number | null;
  depth: number; // (peak − trough) / peak
}

export interface RiskMetrics {
  observations: number;
  totalReturn: number;
  annualizedReturn: number;
  volatility: number;
  sharpe: number;
  sortino: number;
  maxDrawdown: number;
  calmar: number;
  var95: number;
  cvar95: number;
  var99: number;
  cvar99: number;
  winRate: number;
  bestDay: number;
  worstDay: number;
}

export interface RelativeMetrics {
  observations: number;
  alpha: number; // mean excess return, annualized
  beta: number;
  jensenAlpha: number;
  trackingError: number;
  informationRatio: number;
  correlation: number;
  winRate: number; // share of days beating the benchmark
}

export interface RollingPoint {
  date: IsoDate;
  return: number | null;
  volatility: number | null;
  sharpe: number | null;
}

export interface MonthlyReturn {
  month: string; // YYYY-MM
  return: number;
}

export interface AlignedSeries {
  dates: IsoDate[];
  portfolio: number[];
  benchmark: number[];
}

export interface ComparisonPoint {
  date: IsoDate;
  portfolio: number; // cumulative return
  benchmark: number;
  excess: number;
}

// ============================================================
// BASICS
// ============================================================

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function sampleStd(values: number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

function sampleCovariance(a: number[], b: number[]): number {
  const n = Math.min(a.length, b.length);
  if (n < 2) return 0;
  const meanA = mean(a.slice(0, n));
  const meanB = mean(b.slice(0, n));
  let sum = 0;
  for (let i = 0; i < n; i++) sum += (a[i] - meanA) * (b[i] - meanB);
  return sum / (n - 1);
}

/** Linear-interpolated percentile, p in [0, 100]. */
export function percentile(values: number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = (p / 100) * (sorted.length - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (rank - lo);
}

// ============================================================
// RETURNS
// ============================================================

export function dailyReturns(series: SeriesPoint[]): ReturnPoint[] {
  const returns: ReturnPoint[] = [];
  for (let i = 1; i < series.length; i++) {
    const previous = series[i - 1].value;
    if (previous <= 0) continue;
    returns.push({ date: series[i].date, value: series[i].value / previous - 1 });
  }
  return returns;
}

export function cumulativeReturn(returns: number[]): number {
  return returns.reduce((growth, r) => growth * (1 + r), 1) - 1;
}

export function annualizedReturn(returns: number[]): number {
  return mean(returns) * TRADING_DAYS_PER_YEAR;
}

export function volatility(returns: number[]): number {
  return sampleStd(returns) * ANNUALIZATION;
}

export function sharpeRatio(returns: number[], riskFreeRate = 0): number {
  const vol = volatility(returns);
  return vol > 0 ? (annualizedReturn(returns) - riskFreeRate) / vol : 0;
}

/** Like Sharpe, but only downside days count as risk. */
export function sortinoRatio(returns: number[], riskFreeRate = 0): number {
  const downside = sampleStd(returns.filter(r => r < 0)) * ANNUALIZATION;
  return downside > 0 ? (annualizedReturn(returns) - riskFreeRate) / downside : 0;
}

export function winRate(returns: number[]): number {
  return returns.length > 0 ? returns.filter(r => r > 0).length / returns.length : 0;
}

/**
 * Return with external cash flows neutralized: each day's flow is taken out of
 * the closing value before chaining.
 */
export function timeWeightedReturn(series: SeriesPoint[], flows: Map<IsoDate, number>): number {
  let growth = 1;
  for (let i = 1; i < series.length; i++) {
    const previous = series[i - 1].value;
    if (previous <= 0) continue;
    const flow = flows.get(series[i].date) ?? 0;
    growth *= (series[i].value - flow) / previous;
  }
  return growth - 1;
}

/** Last value of each calendar month against the previous month's last value. */
export function monthlyReturns(series: SeriesPoint[]): MonthlyReturn[] {
  if (series.length === 0) return [];
  const monthEnds = new Map<string, number>();
  for (const point of series) monthEnds.set(monthKey(point.date), point.value);

  const result: MonthlyReturn[] = [];
  let previous = series[0].value;
  for (const [month, value] of Array.from(monthEnds.entries())) {
    if (previous > 0) result.push({ month, return: value / previous - 1 });
    previous = value;
  }
  return result;
}

// ============================================================
// DRAWDOWN
// ============================================================

export function drawdownSeries(series: SeriesPoint[]): SeriesPoint[] {
  let peak = -Infinity;
  return series.map(point => {
    peak = Math.max(peak, point.value);
    return { date: point.date, value: peak > 0 ? point.value / peak - 1 : 0 };
  });
}

/**
 * Every peak-to-trough decline. An episode recovers on the first date the series
 * gets back to its prior peak.
 */
export function drawdownEpisodes(series: SeriesPoint[]): DrawdownEpisode[] {
  if (series.length === 0) return [];
  const episodes: DrawdownEpisode[] = [];
  let peakIndex = 0;
  let current: DrawdownEpisode | null = null;

  for (let i = 1; i < series.length; i++) {
    const { date, value } = series[i];
    const peak = series[peakIndex];
    if (value >= peak.value) {
      if (current) {
        current.recoveryDate = date;
        current.recoveryIndex = i;
        episodes.push(current);
        current = null;
      }
      peakIndex = i;
      continue;
    }
    if (!current) {
      current = {
        peakDate: peak.date,
        peakValue: peak.value,
        peakIndex,
        troughDate: date,
        troughValue: value,
        troughIndex: i,
        recoveryDate: null,
        recoveryIndex: null,
        depth: peak.value > 0 ? (peak.value - value) / peak.value : 0,
      };
    } else if (value < current.troughValue) {
      current.troughDate = date;
      current.troughValue = value;
      current.troughIndex = i;
      current.depth = current.peakValue > 0 ? (current.peakValue - value) / current.peakValue : 0;
    }
  }
  if (current) episodes.push(current);
  return episodes;
}

/** Deepest episode, or undefined when the series never falls below a peak. */
export function maxDrawdown(series: SeriesPoint[]): DrawdownEpisode | undefined {
  return drawdownEpisodes(series).reduce<DrawdownEpisode | undefined>(
    (worst, episode) => (!worst || episode.depth > worst.depth ? episode : worst),
    undefined
  );
}

export function calmarRatio(returns: number[], maxDrawdownDepth: number): number {
  return maxDrawdownDepth > 0 ? annualizedReturn(returns) / maxDrawdownDepth : 0;
}

// ============================================================
// TAIL RISK
// ============================================================

/** Historical VaR: the (1 − confidence) percentile of daily returns (a negative number for losses). */
export function valueAtRisk(returns: number[], confidence = 0.95): number {
  return percentile(returns, (1 - confidence) * 100);
}

/** Mean of the returns at or below VaR. */
export function conditionalVaR(returns: number[], confidence = 0.95): number {
  if (returns.length === 0) return 0;
  const threshold = valueAtRisk(returns, confidence);
  const tail = returns.filter(r => r <= threshold);
  return tail.length > 0 ? mean(tail) : threshold;
}

// ============================================================
// AGGREGATES
// ============================================================

export function riskMetrics(series: SeriesPoint[], riskFreeRate = 0): RiskMetrics {
  const returns = dailyReturns(series).map(r => r.value);
  const deepest = maxDrawdown(series)?.depth ?? 0;
  return {
    observations: returns.length,
    totalReturn: series.length > 1 && series[0].value > 0 ? series[series.length - 1].value / series[0].value - 1 : 0,
    annualizedReturn: annualizedReturn(returns),
    volatility: volatility(returns),
    sharpe: sharpeRatio(returns, riskFreeRate),
    sortino: sortinoRatio(returns, riskFreeRate),
    maxDrawdown: deepest,
    calmar: calmarRatio(returns, deepest),
    var95: valueAtRisk(returns, 0.95),
    cvar95: conditionalVaR(returns, 0.95),
    var99: valueAtRisk(returns, 0.99),
    cvar99: conditionalVaR(returns, 0.99),
    winRate: winRate(returns),
    bestDay: returns.length > 0 ? Math.max(...returns) : 0,
    worstDay: returns.length > 0 ? Math.min(...returns) : 0,
  };
}

/** Keep only dates present in both series. */
export function alignSeries(portfolio: SeriesPoint[], benchmark: SeriesPoint[]): AlignedSeries {
  const benchmarkByDate = new Map(benchmark.map(p => [p.date, p.value]));
  const aligned: AlignedSeries = { dates: [], portfolio: [], benchmark: [] };
  for (const point of portfolio) {
    const bench = benchmarkByDate.get(point.date);
    if (bench === undefined) continue;
    aligned.dates.push(point.date);
    aligned.portfolio.push(point.value);
    aligned.benchmark.push(bench);
  }
  return aligned;
}

function toReturns(values: number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < values.length; i++) {
    returns.push(values[i - 1] > 0 ? values[i] / values[i - 1] - 1 : 0);
  }
  return returns;
}

/**
 * Alpha, beta and friends from paired daily returns.
 */
export function relativeMetrics(portfolioReturns: number[], benchmarkReturns: number[], riskFreeRate = 0): RelativeMetrics {
  const n = Math.min(portfolioReturns.length, benchmarkReturns.length);
  const p = portfolioReturns.slice(0, n);
  const b = benchmarkReturns.slice(0, n);
  const excess = p.map((r, i) => r - b[i]);

  const benchVariance = sampleStd(b) ** 2;
  const covariance = sampleCovariance(p, b);
  const beta = benchVariance > 0 ? covariance / benchVariance : 0;
  const alpha = mean(excess) * TRADING_DAYS_PER_YEAR;
  const trackingError = sampleStd(excess) * ANNUALIZATION;
  const stdP = sampleStd(p);
  const stdB = sampleStd(b);

  return {
    observations: n,
    alpha,
    beta,
    jensenAlpha: annualizedReturn(p) - (riskFreeRate + beta * (annualizedReturn(b) - riskFreeRate)),
    trackingError,
    informationRatio: trackingError > 0 ? alpha / trackingError : 0,
    correlation: stdP > 0 && stdB > 0 ? covariance / (stdP * stdB) : 0,
    winRate: n > 0 ? excess.filter(e => e > 0).length / n : 0,
  };
}

/** Relative metrics of two price/NAV series after date alignment. */
export function benchmarkRelative(portfolio: SeriesPoint[], benchmark: SeriesPoint[], riskFreeRate = 0): RelativeMetrics {
  const aligned = alignSeries(portfolio, benchmark);
  return relativeMetrics(toReturns(aligned.portfolio), toReturns(aligned.benchmark), riskFreeRate);
}

export function benchmarkComparison(portfolio: SeriesPoint[], benchmark: SeriesPoint[]): ComparisonPoint[] {
  const aligned = alignSeries(portfolio, benchmark);
  if (aligned.dates.length === 0) return [];
  const p0 = aligned.portfolio[0];
  const b0 = aligned.benchmark[0];
  return aligned.dates.map((date, i) => {
    const portfolioCum = p0 > 0 ? aligned.portfolio[i] / p0 - 1 : 0;
    const benchmarkCum = b0 > 0 ? aligned.benchmark[i] / b0 - 1 : 0;
    return { date, portfolio: portfolioCum, benchmark: benchmarkCum, excess: portfolioCum - benchmarkCum };
  });
}

/**
 * Trailing-window return, volatility and Sharpe. Null until the window fills.
 */
export function rollingMetrics(returns: ReturnPoint[], window = TRADING_DAYS_PER_YEAR, riskFreeRate = 0): RollingPoint[] {
  return returns.map((point, i) => {
    if (i + 1 < window) return { date: point.date, return: null, volatility: null, sharpe: null };
    const slice = returns.slice(i + 1 - window, i + 1).map(r => r.value);
    return {
      date: point.date,
      return: cumulativeReturn(slice),
      volatility: volatility(slice),
      sharpe: sharpeRatio(slice, riskFreeRate),
    };
  });
}
