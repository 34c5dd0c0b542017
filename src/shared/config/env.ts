import "dotenv/config";
import { z } from "zod";
import {
  defaultPipelineConfig,
  type DividendPipelineConfig,
} from "../../core/entities/pipelineConfig";

const supportedFactsProviders = ["mock", "sec-edgar"] as const;

export type FactsProviderName = (typeof supportedFactsProviders)[number];

const positiveNumber = z.coerce.number().positive();

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  FACTS_PROVIDER: z.enum(supportedFactsProviders).default("mock"),
  DIVIDEND_SYMBOLS: z.string().default("AAPL,MSFT,KO"),
  SEC_EDGAR_BASE_URL: z.string().default("https://data.sec.gov"),
  SEC_EDGAR_TICKERS_URL: z
    .string()
    .default("https://www.sec.gov/files/company_tickers.json"),
  SEC_EDGAR_USER_AGENT: z
    .string()
    .default("dividend-timeline/0.1 (contact: devnull@example.com)"),
  SEC_EDGAR_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  // SEC fair access allows 10 requests per second.
  SEC_EDGAR_MIN_INTERVAL_MS: z.coerce.number().int().nonnegative().default(100),
  DIVIDEND_MAX_REASONABLE: positiveNumber.default(
    defaultPipelineConfig.maxReasonableAmount,
  ),
  DIVIDEND_MIN_REASONABLE: positiveNumber.default(
    defaultPipelineConfig.minReasonableAmount,
  ),
  DIVIDEND_REVIEW_THRESHOLD: z.coerce
    .number()
    .min(0)
    .max(1)
    .default(defaultPipelineConfig.reviewThreshold),
  DIVIDEND_DEDUPE_TOLERANCE: positiveNumber.default(
    defaultPipelineConfig.dedupeToleranceMultiple,
  ),
  DIVIDEND_ANNUAL_RATIO_MIN: positiveNumber.default(
    defaultPipelineConfig.annualTotalRatioMin,
  ),
  DIVIDEND_ANNUAL_RATIO_MAX: positiveNumber.default(
    defaultPipelineConfig.annualTotalRatioMax,
  ),
  DIVIDEND_EXTREME_RATIO: positiveNumber.default(
    defaultPipelineConfig.extremeRatioCutoff,
  ),
  DIVIDEND_MAX_EVENTS_PER_YEAR: z.coerce
    .number()
    .int()
    .positive()
    .default(defaultPipelineConfig.maxEventsPerYear),
  // Comma-separated CIK=ceiling pairs, e.g. "0000018230=10".
  DIVIDEND_CEILING_OVERRIDES: z.string().default("0000018230=10"),
});

export type AppEnv = z.infer<typeof envSchema>;

export const env: AppEnv = envSchema.parse(process.env);

/**
 * Parses `CIK=ceiling` pairs; entries with a non-numeric CIK or ceiling are ignored.
 */
export const parseCeilingOverrides = (raw: string): Record<string, number> => {
  const overrides: Record<string, number> = {};

  for (const entry of raw.split(",")) {
    const [rawCik, rawCeiling] = entry.split("=").map((part) => part.trim());
    if (!rawCik || !rawCeiling || !/^\d{1,10}$/.test(rawCik)) {
      continue;
    }

    const ceiling = Number(rawCeiling);
    if (!Number.isFinite(ceiling) || ceiling <= 0) {
      continue;
    }

    overrides[rawCik.padStart(10, "0")] = ceiling;
  }

  return overrides;
};

/**
 * Builds the pipeline config from the environment once, for injection into every stage.
 */
export const pipelineConfigFromEnv = (
  appEnv: AppEnv = env,
): DividendPipelineConfig => ({
  ...defaultPipelineConfig,
  maxReasonableAmount: appEnv.DIVIDEND_MAX_REASONABLE,
  minReasonableAmount: appEnv.DIVIDEND_MIN_REASONABLE,
  reviewThreshold: appEnv.DIVIDEND_REVIEW_THRESHOLD,
  dedupeToleranceMultiple: appEnv.DIVIDEND_DEDUPE_TOLERANCE,
  annualTotalRatioMin: appEnv.DIVIDEND_ANNUAL_RATIO_MIN,
  annualTotalRatioMax: appEnv.DIVIDEND_ANNUAL_RATIO_MAX,
  extremeRatioCutoff: appEnv.DIVIDEND_EXTREME_RATIO,
  maxEventsPerYear: appEnv.DIVIDEND_MAX_EVENTS_PER_YEAR,
  entityCeilingOverrides: parseCeilingOverrides(
    appEnv.DIVIDEND_CEILING_OVERRIDES,
  ),
});

/**
 * Tickers or CIKs for `fetch` runs that name no symbol.
 */
export const dividendSymbols = (appEnv: AppEnv = env): string[] =>
  appEnv.DIVIDEND_SYMBOLS.split(",")
    .map((item) => item.trim().toUpperCase())
    .filter(Boolean);

/**
 * Resolves the configured company-facts adapter so the CLI can switch sources without code changes.
 */
export const factsProvider = (): FactsProviderName => env.FACTS_PROVIDER;
