import type { DividendCandidate } from "../../core/entities/dividend";
import type {
  DividendSummary,
  PaymentPattern,
  PopulatedDividendSummary,
} from "../../core/entities/summary";
import { mean, median, sampleStdDev } from "../../shared/utils/statistics";

const classifyPattern = (coefficientOfVariation: number): PaymentPattern => {
  if (coefficientOfVariation < 0.1) {
    return "very stable";
  }
  if (coefficientOfVariation < 0.3) {
    return "stable";
  }
  if (coefficientOfVariation < 0.5) {
    return "variable";
  }
  return "highly variable";
};

/**
 * Read-only descriptive statistics over a scored dividend timeline.
 */
export class SummaryStatisticsService {
  summarize(dividends: readonly DividendCandidate[]): DividendSummary {
    if (dividends.length === 0) {
      return { status: "empty", count: 0 };
    }

    const amounts = dividends.map((dividend) => dividend.amount);
    const exDates = dividends.map((dividend) => dividend.exDate).sort();
    const amountMean = mean(amounts);

    const summary: PopulatedDividendSummary = {
      status: "ok",
      count: dividends.length,
      amountMin: Math.min(...amounts),
      amountMax: Math.max(...amounts),
      amountMean,
      amountMedian: median(amounts),
      confidenceMean: mean(dividends.map((dividend) => dividend.confidence)),
      needsReviewCount: dividends.filter((dividend) => dividend.needsReview)
        .length,
      dateRange: {
        from: exDates[0] ?? "",
        to: exDates[exDates.length - 1] ?? "",
      },
    };

    if (amounts.length >= 2) {
      const amountStdev = sampleStdDev(amounts);
      const coefficientOfVariation =
        amountMean > 0 ? amountStdev / amountMean : 0;
      summary.amountStdev = amountStdev;
      summary.coefficientOfVariation = coefficientOfVariation;
      summary.pattern = classifyPattern(coefficientOfVariation);
    }

    return summary;
  }
}
