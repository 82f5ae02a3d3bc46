import type { TokenDistribution, TokenId } from '../models.js';
import { EmptyCandidateSetError } from '../utils/errorhandler.js';
import type { RandomSource } from '../utils/random.js';

/** Inverse-CDF draw using a single value from `rng`. Only tokens with mass can come back. */
export function sample(distribution: TokenDistribution, rng: RandomSource): TokenId {
  let total = 0;
  let lastWithMass = -1;
  distribution.forEach((p, id) => {
    if (Number.isFinite(p) && p > 0) {
      total += p;
      lastWithMass = id;
    }
  });

  if (lastWithMass < 0) {
    throw new EmptyCandidateSetError(distribution.length);
  }

  const target = rng.next() * total;
  let cumulative = 0;
  for (let id = 0; id <= lastWithMass; id++) {
    const p = distribution[id];
    if (!Number.isFinite(p) || p <= 0) continue;
    cumulative += p;
    if (target < cumulative) return id;
  }
  return lastWithMass;
}
