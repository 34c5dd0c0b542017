import type { CompanyFactsProviderPort } from "../../core/ports/inboundPorts";
import {
  env,
  factsProvider,
  pipelineConfigFromEnv,
} from "../../shared/config/env";
import { HttpJsonClient } from "../../infra/http/httpJsonClient";
import {
  FileCompanyFactsProvider,
  sampleCompanyFactsUrl,
} from "../../infra/providers/file/fileCompanyFactsProvider";
import { SecCompanyFactsProvider } from "../../infra/providers/sec/secCompanyFactsProvider";
import { DividendBatchService } from "../services/dividendBatchService";
import { createDividendPipeline } from "./pipelineFactory";

/**
 * Resolves the configured facts adapter while preserving a bundled fixture for local development.
 */
const createFactsProvider = (): CompanyFactsProviderPort => {
  if (factsProvider() === "sec-edgar") {
    return new SecCompanyFactsProvider(
      env.SEC_EDGAR_BASE_URL,
      env.SEC_EDGAR_TICKERS_URL,
      env.SEC_EDGAR_USER_AGENT,
      env.SEC_EDGAR_TIMEOUT_MS,
      new HttpJsonClient({ minIntervalMs: env.SEC_EDGAR_MIN_INTERVAL_MS }),
    );
  }

  return new FileCompanyFactsProvider(sampleCompanyFactsUrl, "mock-edgar");
};

/**
 * Centralizes runtime wiring so every CLI command shares one composition root.
 */
export const createRuntime = () => {
  const pipelineConfig = pipelineConfigFromEnv();
  const factsProvider = createFactsProvider();
  const pipeline = createDividendPipeline(pipelineConfig);

  return {
    pipelineConfig,
    factsProvider,
    pipeline,
    batch: new DividendBatchService(factsProvider, pipeline),
  };
};
