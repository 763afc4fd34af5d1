import type {
  GroupAggregate,
  GroupedAggregates,
  GroupingKey,
  RankDirection,
  RankOutcome,
  Ranking,
} from "@/lib/bench-types";
import { InvalidPlanError, SchemaMismatchError } from "@/lib/errors";
import { compareKeys, compareKeysLexicographically, encodeKey } from "@/lib/grouping";

export interface SelectBestOptions {
  /** Outer keys the caller expects; any without candidates is reported as such. */
  outerKeys?: readonly GroupingKey[];
}

const beats = (
  candidate: GroupAggregate,
  current: GroupAggregate,
  direction: RankDirection,
): boolean => {
  const a = candidate.aggregate.mean;
  const b = current.aggregate.mean;
  if (a === b) return compareKeysLexicographically(candidate.key, current.key) < 0;
  return direction === "minimize" ? a < b : a > b;
};

/**
 * Picks, for every distinct value of `outerDimensions`, the group with the
 * lowest (or highest) mean. Equal means go to the lexicographically first
 * grouping key, compared by code unit, so `"1000"` wins over `"500"`.
 */
export function selectBest(
  grouped: GroupedAggregates,
  outerDimensions: readonly string[],
  direction: RankDirection,
  options: SelectBestOptions = {},
): Ranking {
  const missing = outerDimensions.filter((dimension) => !grouped.dimensions.includes(dimension));
  if (missing.length) throw new SchemaMismatchError("selectBest", missing);
  const positions = outerDimensions.map((dimension) => grouped.dimensions.indexOf(dimension));

  const buckets = new Map<string, { outerKey: GroupingKey; candidates: GroupAggregate[] }>();
  const bucketFor = (outerKey: GroupingKey) => {
    const encoded = encodeKey(outerKey);
    let bucket = buckets.get(encoded);
    if (!bucket) {
      bucket = { outerKey, candidates: [] };
      buckets.set(encoded, bucket);
    }
    return bucket;
  };

  for (const group of grouped.groups) {
    if (group.aggregate.count < 1) continue;
    bucketFor(positions.map((position) => group.key[position])).candidates.push(group);
  }
  for (const outerKey of options.outerKeys ?? []) {
    if (outerKey.length !== outerDimensions.length) {
      throw new InvalidPlanError(
        "selectBest",
        `outer key ${encodeKey(outerKey)} does not match ${outerDimensions.length} outer dimension(s)`,
      );
    }
    bucketFor([...outerKey]);
  }

  const outcomes: RankOutcome[] = [...buckets.values()]
    .sort((a, b) => compareKeys(a.outerKey, b.outerKey))
    .map(({ outerKey, candidates }): RankOutcome => {
      const [first, ...rest] = candidates;
      if (!first) return { status: "no-candidates", outerKey };

      const best = rest.reduce(
        (current, candidate) => (beats(candidate, current, direction) ? candidate : current),
        first,
      );
      return {
        status: "ranked",
        outerKey,
        entry: {
          outerKey,
          key: best.key,
          value: best.aggregate.mean,
          aggregate: best.aggregate,
          candidates: candidates.length,
        },
      };
    });

  return Object.freeze({
    dimensions: grouped.dimensions,
    outerDimensions: Object.freeze([...outerDimensions]),
    field: grouped.field,
    direction,
    outcomes: Object.freeze(outcomes),
  });
}

export function findRanked(ranking: Ranking, outerKey: GroupingKey): RankOutcome | undefined {
  const encoded = encodeKey(outerKey);
  return ranking.outcomes.find((outcome) => encodeKey(outcome.outerKey) === encoded);
}

/** The grouping-key values that are not part of the outer key, e.g. the winning implementation. */
export function winnerLabel(ranking: Ranking, outcome: RankOutcome): string | undefined {
  if (outcome.status !== "ranked") return undefined;
  return outcome.entry.key
    .filter((_, index) => !ranking.outerDimensions.includes(ranking.dimensions[index]))
    .join(" / ");
}
