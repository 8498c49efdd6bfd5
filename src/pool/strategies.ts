/**
 * Rotation strategies: pure selection over a snapshot of eligible credentials.
 *
 * Candidates arrive in stable pool order (token file order). Strategies never
 * mutate the snapshot; the round-robin cursor and the random source come in
 * through the context so selection is reproducible in tests.
 */

import type { RotationStrategyName } from "../config.js";
import type { CredentialRecord } from "./types.js";

export interface SelectionContext {
  /** Monotonic cursor value for this selection (round_robin). */
  cursor: number;
  /** Float source in [0, 1) (weighted). */
  random: () => number;
  dailyLimit: number;
}

export interface RotationStrategy {
  readonly name: RotationStrategyName;
  /** Whether the pool must advance the shared cursor before selecting. */
  readonly usesCursor: boolean;
  select(candidates: readonly CredentialRecord[], ctx: SelectionContext): CredentialRecord | null;
}

/** Hybrid filter: credentials under this share of the daily limit go first. */
export const HYBRID_USAGE_THRESHOLD = 0.8;

/** Never-used sorts first. */
function lastUsedKey(record: CredentialRecord): number {
  return record.lastUsedAt ?? -Infinity;
}

function pickLeastRecent(candidates: readonly CredentialRecord[]): CredentialRecord | null {
  let selected: CredentialRecord | null = null;
  for (const c of candidates) {
    if (!selected || lastUsedKey(c) < lastUsedKey(selected)) selected = c;
  }
  return selected;
}

const roundRobin: RotationStrategy = {
  name: "round_robin",
  usesCursor: true,
  select(candidates, ctx) {
    if (candidates.length === 0) return null;
    const index = ((ctx.cursor % candidates.length) + candidates.length) % candidates.length;
    return candidates[index] ?? null;
  },
};

const leastUsed: RotationStrategy = {
  name: "least_used",
  usesCursor: false,
  select(candidates) {
    let selected: CredentialRecord | null = null;
    for (const c of candidates) {
      if (!selected) {
        selected = c;
        continue;
      }
      const diff = c.dailyUsed - selected.dailyUsed;
      if (diff < 0 || (diff === 0 && lastUsedKey(c) < lastUsedKey(selected))) {
        selected = c;
      }
    }
    return selected;
  },
};

const leastRecent: RotationStrategy = {
  name: "least_recent",
  usesCursor: false,
  select: (candidates) => pickLeastRecent(candidates),
};

const weighted: RotationStrategy = {
  name: "weighted",
  usesCursor: false,
  select(candidates, ctx) {
    if (candidates.length === 0) return null;
    const weights = candidates.map((c) => 1 / (c.dailyUsed + 1));
    const total = weights.reduce((sum, w) => sum + w, 0);
    let r = ctx.random() * total;
    for (let i = 0; i < candidates.length; i++) {
      r -= weights[i] ?? 0;
      if (r < 0) return candidates[i] ?? null;
    }
    // Float rounding can leave r at ~0 after the last weight
    return candidates[candidates.length - 1] ?? null;
  },
};

const hybrid: RotationStrategy = {
  name: "hybrid",
  usesCursor: false,
  select(candidates, ctx) {
    const threshold = ctx.dailyLimit * HYBRID_USAGE_THRESHOLD;
    const light = candidates.filter((c) => c.dailyUsed < threshold);
    return pickLeastRecent(light.length > 0 ? light : candidates);
  },
};

const STRATEGIES: Record<RotationStrategyName, RotationStrategy> = {
  round_robin: roundRobin,
  least_used: leastUsed,
  least_recent: leastRecent,
  weighted,
  hybrid,
};

export function getStrategy(name: RotationStrategyName): RotationStrategy {
  return STRATEGIES[name];
}
