/**
 * Portfolio Context: everything one fund needs, wired explicitly.
 *
 * Holds the store, the price cache, the ledgers and the engines built on them.
 * Mutations go through `write`, which runs them one at a time in call order;
 * reads never wait on the queue.
 */

import { ENV } from "./_core/env";
import { errorMessage } from "./_core/errors";
import { BondIndexationEngine, indexationOptionsFromEnv, type IndexationOptions } from "./bondIndexation";
import { CashLedger } from "./cashLedger";
import { today } from "./dates";
import { getDb } from "./db";
import { DrizzleStore } from "./drizzleStore";
import { FeeEngine, feeOptionsFromEnv, type FeeOptions } from "./feeEngine";
import { FuturesLedger } from "./futuresLedger";
import { FALLBACK_RATES, FxRates } from "./fxRates";
import {
  BcbIndexerSource,
  YahooChartGateway,
  type IndexerSource,
  type MarketDataGateway,
} from "./marketDataGateway";
import { MemoryStore } from "./memoryStore";
import { NAVCalculator } from "./navCalculator";
import { PositionLedger, type OversellPolicy } from "./positionLedger";
import type { LedgerStore, PriceStore } from "./stores";
import { TimeSeriesCache, type CacheOptions } from "./timeSeriesCache";
import type { AssetClass, BondPosition, CurrencyCode, IsoDate } from "./types";

// ============================================================
// CONFIG
// ============================================================

export interface FundConfig {
  baseCurrency: CurrencyCode;
  oversellPolicy: OversellPolicy;
  riskFreeRate: number; // annual
  benchmarkSymbol: string;
  fees: FeeOptions;
  indexation: IndexationOptions;
  cache: Partial<CacheOptions>;
  fxFallback: Record<string, number>;
}

export function fundConfigFromEnv(): FundConfig {
  return {
    baseCurrency: ENV.BASE_CURRENCY,
    oversellPolicy: ENV.OVERSELL_POLICY,
    riskFreeRate: ENV.RISK_FREE_RATE,
    benchmarkSymbol: ENV.BENCHMARK_SYMBOL,
    fees: { ...feeOptionsFromEnv(), currency: ENV.BASE_CURRENCY },
    indexation: indexationOptionsFromEnv(),
    cache: {},
    fxFallback: { ...FALLBACK_RATES },
  };
}

export type FundStore = PriceStore & LedgerStore;

export interface ContextDeps {
  store: FundStore;
  gateway: MarketDataGateway;
  indexerSource: IndexerSource;
  config?: Partial<FundConfig>;
}

// ============================================================
// CONTEXT
// ============================================================

export class PortfolioContext {
  readonly config: FundConfig;
  readonly store: FundStore;
  readonly gateway: MarketDataGateway;
  readonly indexerSource: IndexerSource;
  readonly cache: TimeSeriesCache;
  readonly fx: FxRates;
  readonly equity: PositionLedger;
  readonly crypto: PositionLedger;
  readonly futures = new FuturesLedger();
  readonly indexation: BondIndexationEngine;
  readonly cash: CashLedger;
  readonly fees: FeeEngine;
  readonly nav: NAVCalculator;
  readonly clock: () => IsoDate;

  private readonly bondBook = new Map<string, BondPosition>();
  private queue: Promise<void> = Promise.resolve();
  private pendingWrites = 0;

  constructor(deps: ContextDeps) {
    const defaults = fundConfigFromEnv();
    const overrides = deps.config ?? {};
    const baseCurrency = overrides.baseCurrency ?? defaults.baseCurrency;
    this.config = {
      ...defaults,
      ...overrides,
      baseCurrency,
      fees: { ...defaults.fees, currency: baseCurrency, ...overrides.fees },
      indexation: { ...defaults.indexation, ...overrides.indexation },
    };

    this.clock = this.config.cache.clock ?? today;
    this.store = deps.store;
    this.gateway = deps.gateway;
    this.indexerSource = deps.indexerSource;
    this.cache = new TimeSeriesCache(this.store, this.gateway, this.config.cache);
    this.fx = new FxRates(this.cache, this.config.fxFallback);
    this.equity = new PositionLedger("equity", this.config.oversellPolicy);
    this.crypto = new PositionLedger("crypto", this.config.oversellPolicy);
    this.indexation = new BondIndexationEngine(this.config.indexation);
    this.cash = new CashLedger(this.store, baseCurrency, this.fx);
    this.fees = new FeeEngine(this.store, this.config.fees);
    this.nav = new NAVCalculator({
      baseCurrency,
      ledgers: [this.equity, this.crypto],
      bonds: () => this.bonds(),
      indexation: this.indexation,
      cash: this.cash,
      fees: this.fees,
      prices: this.cache,
      fx: this.fx,
      store: this.store,
    });
  }

  ledger(assetClass: AssetClass): PositionLedger {
    return assetClass === "equity" ? this.equity : this.crypto;
  }

  bonds(): BondPosition[] {
    return Array.from(this.bondBook.values()).map(b => ({ ...b }));
  }

  /** Keep a bond in the in-memory book. Callers persist it first. */
  trackBond(bond: BondPosition): void {
    this.bondBook.set(bond.issueId, { ...bond });
  }

  get queuedWrites(): number {
    return this.pendingWrites;
  }

  /**
   * Run a mutation after every previously queued one has settled. The caller
   * gets the mutation's own result or error; a failure does not block the queue.
   */
  write<T>(label: string, fn: () => Promise<T>): Promise<T> {
    this.pendingWrites++;
    const run = this.queue.then(fn);
    this.queue = run.then(
      () => {
        this.pendingWrites--;
      },
      error => {
        this.pendingWrites--;
        console.warn(`[Context] Write "${label}" failed: ${errorMessage(error)}`);
      }
    );
    return run;
  }

  /** Rebuild in-memory state from the store. */
  async load(): Promise<void> {
    for (const ledger of [this.equity, this.crypto]) {
      const results = ledger.replay(await this.store.listTransactions(ledger.assetClass));
      const rejected = results.filter(r => !r.ok);
      if (rejected.length > 0) {
        console.warn(`[Context] ${rejected.length} stored ${ledger.assetClass} transaction(s) could not be replayed`);
      }
    }
    const futures = this.futures.replay(await this.store.listFuturesTrades());
    const rejectedFutures = futures.filter(r => !r.ok).length;
    if (rejectedFutures > 0) console.warn(`[Context] ${rejectedFutures} stored futures trade(s) could not be replayed`);
    this.bondBook.clear();
    for (const bond of await this.store.listBonds()) this.trackBond(bond);
    await this.cash.load();
    await this.fees.load();
    this.nav.invalidateAll();
    console.log(
      `[Context] Loaded ${this.equity.symbols().length} equity, ${this.crypto.symbols().length} crypto, ${this.futures.keys().length} futures, ${this.bondBook.size} bond position(s)`
    );
  }
}

/**
 * Context backed by MySQL when DATABASE_URL is set, otherwise by the in-memory
 * store. Live Yahoo and BCB sources unless replaced.
 */
export async function createPortfolioContext(
  config: Partial<FundConfig> = {},
  sources: Partial<Pick<ContextDeps, "gateway" | "indexerSource">> = {}
): Promise<PortfolioContext> {
  const db = await getDb();
  if (!db) console.warn("[Context] No database configured, using in-memory store");
  const context = new PortfolioContext({
    store: db ? new DrizzleStore(db) : new MemoryStore(),
    gateway: sources.gateway ?? new YahooChartGateway(),
    indexerSource: sources.indexerSource ?? new BcbIndexerSource(),
    config,
  });
  await context.load();
  return context;
}
