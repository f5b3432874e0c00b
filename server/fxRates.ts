/**
 * FX Rates: read-time currency conversion from cached "XXXYYY=X" bars.
 *
 * Lookup order: identity → direct pair → inverse pair → cross via BRL → fixed fallback.
 * A fallback rate marks the result approximated.
 */

import type { CurrencyCode, IsoDate, Money, PriceBar } from "./types";

export interface BarSource {
  latestBar(symbol: string, asOf: IsoDate): Promise<PriceBar | undefined>;
}

export type FxSource = "identity" | "direct" | "inverse" | "cross" | "fallback";

export interface FxQuote {
  from: CurrencyCode;
  to: CurrencyCode;
  rate: number;
  date: IsoDate | null;
  source: FxSource;
}

export interface Converted extends Money {
  rate: number;
  approximated: boolean;
}

// Used only when no bar exists for the pair
export const FALLBACK_RATES: Record<string, number> = {
  USDBRL: 5.0,
  EURBRL: 5.5,
};

export function fxSymbol(from: CurrencyCode, to: CurrencyCode): string {
  return `${from}${to}=X`;
}

export class FxRates {
  constructor(
    private readonly bars: BarSource,
    private readonly fallback: Record<string, number> = FALLBACK_RATES
  ) {}

  async quote(from: CurrencyCode, to: CurrencyCode, asOf: IsoDate): Promise<FxQuote> {
    if (from === to) return { from, to, rate: 1, date: asOf, source: "identity" };

    const direct = await this.bars.latestBar(fxSymbol(from, to), asOf);
    if (direct && direct.close > 0) {
      return { from, to, rate: direct.close, date: direct.date, source: "direct" };
    }
    const inverse = await this.bars.latestBar(fxSymbol(to, from), asOf);
    if (inverse && inverse.close > 0) {
      return { from, to, rate: 1 / inverse.close, date: inverse.date, source: "inverse" };
    }

    if (from !== "BRL" && to !== "BRL") {
      const fromBrl = await this.quote(from, "BRL", asOf);
      const toBrl = await this.quote(to, "BRL", asOf);
      const approximated = fromBrl.source === "fallback" || toBrl.source === "fallback";
      return {
        from,
        to,
        rate: fromBrl.rate / toBrl.rate,
        date: null,
        source: approximated ? "fallback" : "cross",
      };
    }

    const fixed = this.fallback[`${from}${to}`];
    if (fixed) return { from, to, rate: fixed, date: null, source: "fallback" };
    const fixedInverse = this.fallback[`${to}${from}`];
    if (fixedInverse) return { from, to, rate: 1 / fixedInverse, date: null, source: "fallback" };

    throw new Error(`[FX] No rate for ${from}/${to}`);
  }

  async convert(money: Money, to: CurrencyCode, asOf: IsoDate): Promise<Converted> {
    const quote = await this.quote(money.currency, to, asOf);
    if (quote.source === "fallback") {
      console.warn(`[FX] Using fallback ${money.currency}/${to} rate ${quote.rate} for ${asOf}`);
    }
    return {
      amount: money.amount * quote.rate,
      currency: to,
      rate: quote.rate,
      approximated: quote.source === "fallback",
    };
  }

  /** "USD/BRL" style table of every currency against `base`, plus inverses. */
  async exchangeRates(base: CurrencyCode, currencies: CurrencyCode[], asOf: IsoDate): Promise<Record<string, number>> {
    const rates: Record<string, number> = {};
    for (const currency of currencies) {
      if (currency === base) continue;
      const quote = await this.quote(currency, base, asOf);
      rates[`${currency}/${base}`] = quote.rate;
      rates[`${base}/${currency}`] = 1 / quote.rate;
    }
    return rates;
  }
}
