import { describe, expect, it } from 'vitest';
import { scriptedRandom } from '../testing/fakeModels.js';
import { createSeededRandom } from '../utils/random.js';
import { describeOutcome, frameAction, resolveOutcome, tierForRoll } from './rules.js';

describe('resolveOutcome', () => {
  it('returns nothing when dice are off', () => {
    let draws = 0;
    expect(resolveOutcome(false, { next: () => { draws++; return 0.5; } })).toBeNull();
    expect(draws).toBe(0);
  });

  it('rolls a d20 from one draw', () => {
    expect(resolveOutcome(true, scriptedRandom(0))).toEqual({ roll: 1, tier: 'critical-failure' });
    expect(resolveOutcome(true, scriptedRandom(0.07))).toEqual({ roll: 2, tier: 'failure' });
    expect(resolveOutcome(true, scriptedRandom(0.47))).toEqual({ roll: 10, tier: 'success' });
    expect(resolveOutcome(true, scriptedRandom(0.99))).toEqual({ roll: 20, tier: 'critical-success' });
  });

  it('gives the same outcome for the same seed', () => {
    const first = createSeededRandom('x');
    const second = createSeededRandom('x');

    for (let turn = 0; turn < 5; turn++) {
      expect(resolveOutcome(true, first)).toEqual(resolveOutcome(true, second));
    }
  });

  it('uses custom tier bounds', () => {
    const tiers = { criticalFailureMax: 2, failureMax: 10, successMax: 18 };
    expect(tierForRoll(2, tiers)).toBe('critical-failure');
    expect(tierForRoll(10, tiers)).toBe('failure');
    expect(tierForRoll(19, tiers)).toBe('critical-success');
  });
});

describe('tierForRoll', () => {
  it('splits 1-20 at the default bounds', () => {
    const tiers = Array.from({ length: 20 }, (_, index) => tierForRoll(index + 1));
    expect(tiers.filter((tier) => tier === 'critical-failure')).toHaveLength(1);
    expect(tiers.filter((tier) => tier === 'failure')).toHaveLength(8);
    expect(tiers.filter((tier) => tier === 'success')).toHaveLength(10);
    expect(tiers.filter((tier) => tier === 'critical-success')).toHaveLength(1);
  });
});

describe('frameAction', () => {
  it('phrases each tier', () => {
    expect(frameAction('open the door', { roll: 1, tier: 'critical-failure' })).toBe(
      'You try to open the door, but fail miserably.'
    );
    expect(frameAction('open the door', { roll: 5, tier: 'failure' })).toBe('You try to open the door, but fail.');
    expect(frameAction('open the door', { roll: 12, tier: 'success' })).toBe('You open the door.');
    expect(frameAction('open the door', { roll: 20, tier: 'critical-success' })).toBe(
      'You open the door perfectly, better than you had hoped.'
    );
    expect(frameAction('open the door', null)).toBe('You open the door.');
  });

  it('describes a roll for the player', () => {
    expect(describeOutcome({ roll: 20, tier: 'critical-success' })).toBe('d20: 20 (critical success)');
    expect(describeOutcome({ roll: 4, tier: 'failure' })).toBe('d20: 4 (failure)');
  });
});
