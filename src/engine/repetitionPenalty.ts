import type { TokenDistribution, TokenId } from '../models.js';
import { InvalidConfigError } from '../utils/errorhandler.js';

export function recentTokens(history: readonly TokenId[], window = 0): Set<TokenId> {
  const start = window > 0 ? Math.max(0, history.length - window) : 0;
  return new Set(history.slice(start));
}

/**
 * Divides the score of every token seen in the trailing `window` of `history` by `penalty`.
 * Above 1 this discourages repeats, below 1 it favours them, and exactly 1 is a copy.
 * A penalty of 0 keeps only the repeated tokens, provided at least one of them has mass.
 */
export function penalize(
  distribution: TokenDistribution,
  history: readonly TokenId[],
  penalty: number,
  window = 0
): number[] {
  if (!Number.isFinite(penalty) || penalty < 0) {
    throw new InvalidConfigError('repetitionPenalty', 'must be 0 or greater', { value: penalty });
  }
  if (penalty === 1 || history.length === 0) return [...distribution];

  const seen = recentTokens(history, window);

  if (penalty === 0) {
    const anyRepeatHasMass = [...seen].some((id) => (distribution[id] ?? 0) > 0);
    if (!anyRepeatHasMass) return [...distribution];
    return distribution.map((score, id) => (seen.has(id) ? score : 0));
  }

  return distribution.map((score, id) => (seen.has(id) ? score / penalty : score));
}
