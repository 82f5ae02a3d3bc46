import type { DiceOutcome, DiceTier, DiceTierBounds } from '../models.js';
import { rollDie, type RandomSource } from '../utils/random.js';

export const D20_SIDES = 20;

export const DEFAULT_DICE_TIERS: DiceTierBounds = {
  criticalFailureMax: 1,
  failureMax: 9,
  successMax: 19,
};

export function tierForRoll(roll: number, tiers: DiceTierBounds = DEFAULT_DICE_TIERS): DiceTier {
  if (roll <= tiers.criticalFailureMax) return 'critical-failure';
  if (roll <= tiers.failureMax) return 'failure';
  if (roll <= tiers.successMax) return 'success';
  return 'critical-success';
}

export function resolveOutcome(
  enabled: boolean,
  rng: RandomSource,
  tiers: DiceTierBounds = DEFAULT_DICE_TIERS
): DiceOutcome | null {
  if (!enabled) return null;
  const roll = rollDie(rng, D20_SIDES);
  return { roll, tier: tierForRoll(roll, tiers) };
}

/**
 * Phrases `action` (a bare verb phrase such as "open the door") the way the roll went.
 * The model only ever learns the outcome through this sentence.
 */
export function frameAction(action: string, outcome: DiceOutcome | null): string {
  switch (outcome?.tier) {
    case 'critical-failure': return `You try to ${action}, but fail miserably.`;
    case 'failure':          return `You try to ${action}, but fail.`;
    case 'success':          return `You ${action}.`;
    case 'critical-success': return `You ${action} perfectly, better than you had hoped.`;
    default:                 return `You ${action}.`;
  }
}

export function describeOutcome(outcome: DiceOutcome): string {
  switch (outcome.tier) {
    case 'critical-failure': return `d20: ${outcome.roll} (critical failure)`;
    case 'failure':          return `d20: ${outcome.roll} (failure)`;
    case 'success':          return `d20: ${outcome.roll} (success)`;
    case 'critical-success': return `d20: ${outcome.roll} (critical success)`;
  }
}
