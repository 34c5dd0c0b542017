import type { DividendCandidate } from "../../core/entities/dividend";
import { familyPriorityOfTag } from "../../core/entities/dividendTags";
import type { DividendPipelineConfig } from "../../core/entities/pipelineConfig";

/**
 * Collapses candidates sharing an ex-date into one. Selection only; survivors are
 * returned as-is, in first-seen date order.
 */
export class DeduplicationService {
  constructor(private readonly config: DividendPipelineConfig) {}

  deduplicate(candidates: readonly DividendCandidate[]): DividendCandidate[] {
    const byExDate = new Map<string, DividendCandidate[]>();
    for (const candidate of candidates) {
      const group = byExDate.get(candidate.exDate);
      if (group) {
        group.push(candidate);
      } else {
        byExDate.set(candidate.exDate, [candidate]);
      }
    }

    const survivors: DividendCandidate[] = [];
    for (const group of byExDate.values()) {
      const survivor = this.selectSurvivor(group);
      if (survivor) {
        survivors.push(survivor);
      }
    }

    return survivors;
  }

  /**
   * Keeps amounts within the tolerance band over the group minimum, so a cumulative
   * figure reported beside the periodic one loses; then ranks by tag family and amount.
   */
  private selectSurvivor(
    group: readonly DividendCandidate[],
  ): DividendCandidate | undefined {
    if (group.length <= 1) {
      return group[0];
    }

    const minimum = Math.min(...group.map((candidate) => candidate.amount));
    const band = group.filter(
      (candidate) =>
        candidate.amount <= minimum * this.config.dedupeToleranceMultiple,
    );
    const admissible =
      band.length > 0
        ? band
        : group.filter((candidate) => candidate.amount === minimum).slice(0, 1);

    return [...admissible].sort(
      (left, right) =>
        familyPriorityOfTag(left.sourceTag) -
          familyPriorityOfTag(right.sourceTag) ||
        left.amount - right.amount,
    )[0];
  }
}
