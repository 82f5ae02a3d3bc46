import { describe, expect, it } from 'vitest';
import { scriptedRandom } from '../testing/fakeModels.js';
import { createSeededRandom, deriveSeed, hash32, rollDie } from './random.js';

describe('createSeededRandom', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = createSeededRandom('test-seed');
    const b = createSeededRandom('test-seed');
    const first = Array.from({ length: 5 }, () => a.next());
    expect(Array.from({ length: 5 }, () => b.next())).toEqual(first);
    expect(first.every((value) => value >= 0 && value < 1)).toBe(true);
  });

  it('diverges for different seeds', () => {
    expect(createSeededRandom('north').next()).not.toBe(createSeededRandom('south').next());
  });

  it('accepts numeric seeds', () => {
    expect(createSeededRandom(42).next()).toBe(createSeededRandom(42).next());
  });
});

describe('helpers', () => {
  it('hashes strings to unsigned 32-bit values', () => {
    expect(hash32('')).toBe(2166136261);
    expect(hash32('a')).toBe(hash32('a'));
    expect(hash32('a')).toBeGreaterThanOrEqual(0);
  });

  it('derives child seeds from one draw', () => {
    expect(deriveSeed(scriptedRandom(0.5))).toBe(2147483648);
    expect(deriveSeed(scriptedRandom(0))).toBe(0);
  });

  it('keeps die rolls in range', () => {
    expect(rollDie(scriptedRandom(0), 20)).toBe(1);
    expect(rollDie(scriptedRandom(0.999999), 20)).toBe(20);
    expect(rollDie(scriptedRandom(0.5), 6)).toBe(4);
  });
});
