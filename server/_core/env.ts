import { z } from "zod";

const numberFromEnv = (fallback: number) =>
  z.coerce.number().finite().default(fallback);

const envSchema = z.object({
  DATABASE_URL: z.string().optional(),
  BASE_CURRENCY: z.enum(["BRL", "USD", "EUR"]).default("BRL"),
  YAHOO_CHART_URL: z.string().url().default("https://query1.finance.yahoo.com/v8/finance/chart"),
  BCB_SGS_URL: z.string().url().default("https://api.bcb.gov.br/dados/serie"),
  FETCH_BATCH_DAYS: numberFromEnv(100),
  FETCH_BATCH_DELAY_MS: numberFromEnv(500),
  FETCH_SYMBOL_DELAY_MS: numberFromEnv(1000),
  FETCH_MAX_RETRIES: numberFromEnv(3),
  FETCH_BACKOFF_BASE_MS: numberFromEnv(2000),
  FETCH_BACKOFF_MAX_MS: numberFromEnv(30000),
  FETCH_TIMEOUT_MS: numberFromEnv(15000),
  MANAGEMENT_FEE_RATE: numberFromEnv(0.02),
  PERFORMANCE_FEE_RATE: numberFromEnv(0.2),
  MANAGEMENT_FEE_BASIS: z.enum(["nav_start", "nav_end"]).default("nav_end"),
  RISK_FREE_RATE: numberFromEnv(0),
  OVERSELL_POLICY: z.enum(["reject", "allow_short"]).default("reject"),
  IPCA_FALLBACK_ANNUAL: numberFromEnv(0.05),
  CDI_FALLBACK_ANNUAL: numberFromEnv(0.1375),
  SELIC_FALLBACK_ANNUAL: numberFromEnv(0.1175),
  BENCHMARK_SYMBOL: z.string().default("^BVSP"),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`[Env] Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

export const ENV = parseEnv(process.env);
