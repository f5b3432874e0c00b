/**
 * Cash Ledger & Investor Registry.
 *
 * Cash flows are append-only: no edit, no delete. A correction is a new
 * offsetting entry. Stakes follow net contributions.
 */

import { randomUUID } from "node:crypto";
import { ValidationError, NotFoundError } from "./_core/errors";
import { isIsoDate } from "./dates";
import type { FxRates } from "./fxRates";
import type { LedgerStore } from "./stores";
import type { CashFlow, CashFlowType, CurrencyCode, InvestorAccount, InvestorStatus, IsoDate, Money } from "./types";

export interface NewCashFlow {
  id?: string;
  date: IsoDate;
  investorId: string;
  investorName?: string;
  type: CashFlowType;
  amount: Money;
  amountInBase?: number | null;
  description?: string;
}

export interface InvestorStake {
  investorId: string;
  name: string;
  status: InvestorStatus;
  deposits: number;
  withdrawals: number;
  netContribution: number;
  stakePct: number; // fraction, 0..1
}

export class CashLedger {
  private investors = new Map<string, InvestorAccount>();
  private flows: CashFlow[] = [];

  constructor(
    private readonly store: LedgerStore,
    readonly baseCurrency: CurrencyCode,
    private readonly fx?: FxRates
  ) {}

  async load(): Promise<void> {
    this.investors = new Map((await this.store.listInvestors()).map(i => [i.investorId, i]));
    this.flows = await this.store.listCashFlows();
    console.log(`[CashLedger] Loaded ${this.investors.size} investor(s), ${this.flows.length} cash flow(s)`);
  }

  // ============================================================
  // Investors
  // ============================================================

  async registerInvestor(investorId: string, name: string, status: InvestorStatus = "active"): Promise<InvestorAccount> {
    const id = investorId.trim();
    if (!id) throw new ValidationError("Investor id is required");
    if (this.investors.has(id)) throw new ValidationError(`Investor ${id} already exists`);
    const account: InvestorAccount = { investorId: id, name: name.trim() || id, status };
    await this.store.saveInvestor(account);
    this.investors.set(id, account);
    return { ...account };
  }

  async setStatus(investorId: string, status: InvestorStatus): Promise<InvestorAccount> {
    const current = this.investors.get(investorId);
    if (!current) throw new NotFoundError(`Investor ${investorId} not found`);
    const updated = { ...current, status };
    await this.store.saveInvestor(updated);
    this.investors.set(investorId, updated);
    return { ...updated };
  }

  investor(investorId: string): InvestorAccount | undefined {
    const account = this.investors.get(investorId);
    return account ? { ...account } : undefined;
  }

  listInvestors(): InvestorAccount[] {
    return Array.from(this.investors.values()).map(i => ({ ...i }));
  }

  // ============================================================
  // Cash flows
  // ============================================================

  /**
   * Append a flow. Unknown investors are registered from the flow's name;
   * inactive investors may withdraw but not deposit.
   */
  async addCashFlow(input: NewCashFlow): Promise<CashFlow> {
    if (!isIsoDate(input.date)) throw new ValidationError(`Invalid cash flow date: ${input.date}`);
    if (!Number.isFinite(input.amount.amount) || input.amount.amount <= 0) {
      throw new ValidationError(`Cash flow amount must be positive, got ${input.amount.amount}`);
    }

    let account = this.investors.get(input.investorId);
    if (!account) {
      account = await this.registerInvestor(input.investorId, input.investorName ?? input.investorId);
    }
    if (account.status === "inactive" && input.type === "deposit") {
      throw new ValidationError(`Investor ${account.investorId} is inactive and cannot deposit`);
    }

    const flow: CashFlow = {
      id: input.id ?? randomUUID(),
      date: input.date,
      investorId: account.investorId,
      investorName: input.investorName ?? account.name,
      type: input.type,
      amount: { ...input.amount },
      amountInBase: input.amountInBase ?? null,
      description: input.description ?? "",
    };
    await this.store.appendCashFlow(flow);
    this.flows.push(flow);
    console.log(`[CashLedger] ${flow.type} ${flow.amount.amount} ${flow.amount.currency} for ${flow.investorId} on ${flow.date}`);
    return { ...flow, amount: { ...flow.amount } };
  }

  hasFlow(id: string): boolean {
    return this.flows.some(f => f.id === id);
  }

  /** Signed amount in the base currency: deposits positive, withdrawals negative. */
  private async signedBase(flow: CashFlow): Promise<number> {
    let amount = flow.amount.amount;
    if (flow.amount.currency !== this.baseCurrency) {
      if (flow.amountInBase !== null) {
        amount = flow.amountInBase;
      } else if (this.fx) {
        amount = (await this.fx.convert(flow.amount, this.baseCurrency, flow.date)).amount;
      } else {
        throw new ValidationError(`No FX source to convert ${flow.amount.currency} flow ${flow.id}`);
      }
    }
    return flow.type === "deposit" ? amount : -amount;
  }

  async cashPosition(asOf: IsoDate): Promise<number> {
    let total = 0;
    for (const flow of this.flows) {
      if (flow.date <= asOf) total += await this.signedBase(flow);
    }
    return total;
  }

  async netContribution(investorId: string, asOf: IsoDate): Promise<number> {
    let total = 0;
    for (const flow of this.flows) {
      if (flow.investorId === investorId && flow.date <= asOf) total += await this.signedBase(flow);
    }
    return total;
  }

  /** Net contribution over the fund total; 0 for everyone when the total is not positive. */
  async stakePct(investorId: string, asOf: IsoDate): Promise<number> {
    const stakes = await this.investorStakes(asOf);
    return stakes.find(s => s.investorId === investorId)?.stakePct ?? 0;
  }

  async investorStakes(asOf: IsoDate): Promise<InvestorStake[]> {
    const rows = new Map<string, InvestorStake>();
    for (const account of this.investors.values()) {
      rows.set(account.investorId, {
        investorId: account.investorId,
        name: account.name,
        status: account.status,
        deposits: 0,
        withdrawals: 0,
        netContribution: 0,
        stakePct: 0,
      });
    }
    for (const flow of this.flows) {
      if (flow.date > asOf) continue;
      const row = rows.get(flow.investorId);
      if (!row) continue;
      const signed = await this.signedBase(flow);
      if (signed >= 0) row.deposits += signed;
      else row.withdrawals += -signed;
      row.netContribution += signed;
    }
    const all = Array.from(rows.values());
    const total = all.reduce((sum, r) => sum + r.netContribution, 0);
    for (const row of all) {
      row.stakePct = total > 0 ? row.netContribution / total : 0;
    }
    return all.sort((a, b) => b.netContribution - a.netContribution);
  }

  cashFlowHistory(start?: IsoDate, end?: IsoDate): CashFlow[] {
    return this.flows
      .filter(f => (!start || f.date >= start) && (!end || f.date <= end))
      .sort((a, b) => a.date.localeCompare(b.date))
      .map(f => ({ ...f, amount: { ...f.amount } }));
  }

  investorHistory(investorId: string, start?: IsoDate, end?: IsoDate): CashFlow[] {
    return this.cashFlowHistory(start, end).filter(f => f.investorId === investorId);
  }

  /** Net external flow per date in base currency, for time-weighted returns. */
  async netFlowsByDate(): Promise<Map<IsoDate, number>> {
    const byDate = new Map<IsoDate, number>();
    for (const flow of this.flows) {
      byDate.set(flow.date, (byDate.get(flow.date) ?? 0) + (await this.signedBase(flow)));
    }
    return byDate;
  }
}
