import { describe, expect, it } from 'vitest';
import { GenerationHistory } from './history.js';

describe('GenerationHistory', () => {
  it('starts from a copy of the prompt', () => {
    const prompt = [1, 2];
    const history = new GenerationHistory(prompt);
    history.append(3);

    expect(history.tokens).toEqual([1, 2, 3]);
    expect(prompt).toEqual([1, 2]);
  });

  it('hands out snapshots that do not track later appends', () => {
    const history = new GenerationHistory([1]);
    const snapshot = history.snapshot();
    history.append(2);

    expect(snapshot).toEqual([1]);
    expect(history.length).toBe(2);
  });
});
