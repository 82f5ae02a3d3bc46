import type { TokenDistribution, TokenId } from '../models.js';
import { EmptyCandidateSetError, InvalidConfigError } from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';

const CUMULATIVE_EPSILON = 1e-12;

function mass(score: number): number {
  return Number.isFinite(score) && score > 0 ? score : 0;
}

function totalMass(scores: readonly number[]): number {
  let total = 0;
  for (const score of scores) total += mass(score);
  return total;
}

export function normalize(scores: readonly number[]): number[] {
  const total = totalMass(scores);
  if (total <= 0) {
    throw new EmptyCandidateSetError(scores.length);
  }
  return scores.map((score) => mass(score) / total);
}

export function uniform(size: number): number[] {
  return new Array<number>(size).fill(size > 0 ? 1 / size : 0);
}

/** Token ids with mass, highest first; equal scores keep vocabulary order. */
export function rankTokens(scores: readonly number[]): TokenId[] {
  const ids: TokenId[] = [];
  scores.forEach((score, id) => {
    if (mass(score) > 0) ids.push(id);
  });
  return ids.sort((a, b) => mass(scores[b]) - mass(scores[a]) || a - b);
}

export function assertFilterSettings(temperature: number, topK: number, topP: number) {
  if (!Number.isFinite(temperature) || temperature <= 0) {
    throw new InvalidConfigError('temperature', 'must be greater than 0', { value: temperature });
  }
  if (!Number.isInteger(topK) || topK < 0) {
    throw new InvalidConfigError('topK', 'must be a whole number of at least 0', { value: topK });
  }
  if (!Number.isFinite(topP) || topP <= 0 || topP > 1) {
    throw new InvalidConfigError('topP', 'must be greater than 0 and at most 1', { value: topP });
  }
}

/** Rescales log-scores by `1 / temperature`, i.e. p ∝ score^(1/temperature). */
export function applyTemperature(distribution: TokenDistribution, temperature: number): number[] {
  let maxLog = -Infinity;
  const logs = distribution.map((score) => {
    const value = mass(score);
    const log = value > 0 ? Math.log(value) : -Infinity;
    if (log > maxLog) maxLog = log;
    return log;
  });

  if (maxLog === -Infinity) {
    throw new EmptyCandidateSetError(distribution.length);
  }

  return normalize(logs.map((log) => (log === -Infinity ? 0 : Math.exp((log - maxLog) / temperature))));
}

export function topKFilter(probs: readonly number[], topK: number): number[] {
  if (topK <= 0 || topK >= probs.length) return normalize(probs);
  const keep = new Set(rankTokens(probs).slice(0, topK));
  return normalize(probs.map((p, id) => (keep.has(id) ? p : 0)));
}

export function topPFilter(probs: readonly number[], topP: number): number[] {
  if (topP >= 1) return normalize(probs);

  const total = totalMass(probs);
  const keep = new Set<TokenId>();
  let cumulative = 0;
  for (const id of rankTokens(probs)) {
    keep.add(id);
    cumulative += mass(probs[id]) / total;
    if (cumulative >= topP - CUMULATIVE_EPSILON) break;
  }
  return normalize(probs.map((p, id) => (keep.has(id) ? p : 0)));
}

/**
 * Temperature, then top-k, then nucleus truncation. The result is a normalized
 * distribution of the same length. A distribution with no mass left at any stage
 * becomes uniform over the whole vocabulary.
 */
export function filterDistribution(
  distribution: TokenDistribution,
  temperature: number,
  topK: number,
  topP: number
): number[] {
  assertFilterSettings(temperature, topK, topP);

  try {
    const scaled = applyTemperature(distribution, temperature);
    const narrowed = topKFilter(scaled, topK);
    return topPFilter(narrowed, topP);
  } catch (error) {
    if (error instanceof EmptyCandidateSetError) {
      logger.debug('Empty candidate set, falling back to uniform', { vocabSize: distribution.length });
      return uniform(distribution.length);
    }
    throw error;
  }
}
