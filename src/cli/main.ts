import { Command } from "commander";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import type { BatchRunReport } from "../core/entities/batch";
import type { ConfidencePenalty } from "../core/entities/dividend";
import type { CompanyFactsProviderPort } from "../core/ports/inboundPorts";
import type { DividendTimeline } from "../core/entities/timeline";
import { FileCompanyFactsProvider } from "../infra/providers/file/fileCompanyFactsProvider";
import { normalizeCik } from "../infra/providers/sec/companyFactsPayload";
import { dividendSymbols, env, factsProvider } from "../shared/config/env";
import { logger } from "../shared/logger/logger";

/**
 * Renders one penalty as `kind x<factor>` plus the measured quantity.
 */
export const describePenalty = (penalty: ConfidencePenalty): string => {
  const head = `${penalty.kind} x${penalty.factor}`;

  switch (penalty.kind) {
    case "amount_above_ceiling":
      return `${head} (amount=${penalty.amount}, ceiling=${penalty.ceiling})`;
    case "amount_below_floor":
      return `${head} (amount=${penalty.amount}, floor=${penalty.floor})`;
    case "far_above_median":
    case "above_median":
    case "below_median":
      return `${head} (ratio=${penalty.ratio})`;
    case "annual_period":
    case "semi_annual_period":
      return `${head} (days=${penalty.periodDays})`;
    case "annual_report_without_quarter":
      return `${head} (form=${penalty.form})`;
    case "entity_ceiling_exceeded":
      return `${head} (entity=${penalty.entityId}, ceiling=${penalty.ceiling})`;
    case "missing_fiscal_quarter":
      return head;
  }
};

/**
 * Formats a timeline into a compact terminal report for manual inspection.
 */
export const formatTimelineReport = (timeline: DividendTimeline): string => {
  const lines: string[] = [];
  const name = timeline.entityName ?? "unknown entity";
  const flagged = timeline.dividends.filter(
    (dividend) => dividend.needsReview,
  ).length;

  lines.push(
    `Dividend timeline for ${name}${timeline.entityId ? ` (CIK ${timeline.entityId})` : ""}`,
  );
  lines.push(
    `Dividends: ${timeline.dividends.length} (${flagged} flagged for review)`,
  );
  lines.push("");

  if (timeline.dividends.length === 0) {
    lines.push("- none");
  } else {
    timeline.dividends.forEach((dividend) => {
      const label = [dividend.sourceForm, dividend.fiscalPeriod]
        .filter(Boolean)
        .join(" ");
      lines.push(
        `${dividend.exDate}  ${dividend.amount.toFixed(4)}  ${dividend.confidence.toFixed(3)}  ${dividend.periodType}  ${dividend.sourceTag}${label ? ` [${label}]` : ""}`,
      );
    });
  }

  lines.push("");
  lines.push("Summary:");
  const summary = timeline.summary;
  if (summary.status === "empty") {
    lines.push("- no dividends found");
  } else {
    lines.push(
      `- amount: min=${summary.amountMin.toFixed(4)}, max=${summary.amountMax.toFixed(4)}, mean=${summary.amountMean.toFixed(4)}, median=${summary.amountMedian.toFixed(4)}`,
    );
    lines.push(
      `- confidence: mean=${summary.confidenceMean.toFixed(3)}, needsReview=${summary.needsReviewCount}`,
    );
    lines.push(`- dates: ${summary.dateRange.from} to ${summary.dateRange.to}`);
    if (summary.pattern && summary.coefficientOfVariation !== undefined) {
      lines.push(
        `- pattern: ${summary.pattern} (cv=${summary.coefficientOfVariation.toFixed(3)})`,
      );
    }
  }

  lines.push("");
  lines.push("Review:");
  const pending = timeline.review.filter(
    (decision) => decision.verdict !== "accepted",
  );
  if (pending.length === 0) {
    lines.push("- none");
  } else {
    pending.forEach((decision) => {
      const reasons = decision.candidate.confidenceReasons
        .map(describePenalty)
        .join("; ");
      lines.push(
        `- ${decision.candidate.exDate} ${decision.candidate.amount.toFixed(4)} ${decision.verdict} (${decision.rule}): ${reasons}`,
      );
    });
  }

  return lines.join("\n");
};

/**
 * One line per company plus batch totals.
 */
export const formatBatchReport = (report: BatchRunReport): string => {
  const { totals } = report;
  const lines = [
    `Batch: ${totals.companies} companies (${totals.success} success, ${totals.noData} no data, ${totals.noDividends} no dividends, ${totals.errors} errors)`,
    `Dividends: ${totals.dividends} (${totals.flagged} flagged for review)`,
  ];

  report.companies.forEach((company) => {
    lines.push(
      company.error
        ? `- ${company.symbol} ${company.status} (${company.error.code}): ${company.error.message}`
        : `- ${company.symbol} ${company.status} dividends=${company.dividendCount} flagged=${company.flaggedCount}`,
    );
  });

  return lines.join("\n");
};

type OutputOptions = { prettify?: boolean };

type Runtime = ReturnType<typeof createRuntime>;

const runAndReport = async (
  runtime: Runtime,
  provider: CompanyFactsProviderPort,
  symbol: string,
  entityId: string | undefined,
  opts: OutputOptions,
): Promise<void> => {
  const factsResult = await provider.fetchCompanyFacts({ symbol });
  if (factsResult.isErr()) {
    logger.error({ error: factsResult.error }, "Company facts unavailable");
    process.exitCode = 1;
    return;
  }

  if (!factsResult.value) {
    logger.info({ symbol }, "No company facts found");
    return;
  }

  const timeline = runtime.pipeline.run(
    factsResult.value.payload,
    entityId ?? factsResult.value.cik,
  );

  if (opts.prettify) {
    console.log(formatTimelineReport(timeline));
  } else {
    logger.info({ timeline }, "Dividend timeline");
  }
};

/**
 * Defines a single command surface so every run applies the same pipeline configuration.
 */
export const buildCli = () => {
  const cli = new Command();
  cli
    .name("dividend-timeline")
    .description("Extract confidence-scored dividend timelines from XBRL company facts");

  cli
    .command("extract")
    .description("Run the pipeline over a saved company-facts JSON file")
    .requiredOption("--file <path>", "Path to a companyfacts JSON document")
    .option("--cik <cik>", "Entity CIK used for per-entity overrides")
    .option("--prettify", "Render a human-friendly timeline report")
    .action(
      async (opts: { file: string; cik?: string; prettify?: boolean }) => {
        const entityId = opts.cik ? normalizeCik(opts.cik) : undefined;
        await runAndReport(
          createRuntime(),
          new FileCompanyFactsProvider(opts.file),
          opts.file,
          entityId,
          opts,
        );
      },
    );

  cli
    .command("fetch")
    .description(
      "Fetch company facts for each symbol from the configured provider and run the pipeline",
    )
    .option(
      "--symbol <symbols...>",
      "Ticker symbols or CIKs (defaults to DIVIDEND_SYMBOLS)",
    )
    .option("--prettify", "Render human-friendly timeline and batch reports")
    .action(async (opts: { symbol?: string[]; prettify?: boolean }) => {
      const runtime = createRuntime();
      const symbols = opts.symbol?.length ? opts.symbol : dividendSymbols();
      const report = await runtime.batch.run(symbols);

      if (opts.prettify) {
        report.companies.forEach((company) => {
          if (company.timeline) {
            console.log(`${formatTimelineReport(company.timeline)}\n`);
          }
        });
        console.log(formatBatchReport(report));
      } else {
        logger.info({ report }, "Dividend batch report");
      }

      if (report.totals.errors > 0) {
        process.exitCode = 1;
      }
    });

  cli
    .command("status")
    .description("Report effective configuration")
    .action(() => {
      const runtime = createRuntime();
      logger.info(
        {
          factsProvider: factsProvider(),
          symbols: dividendSymbols(),
          secBaseUrl: env.SEC_EDGAR_BASE_URL,
          secMinIntervalMs: env.SEC_EDGAR_MIN_INTERVAL_MS,
          pipeline: runtime.pipelineConfig,
        },
        "Runtime status",
      );
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
