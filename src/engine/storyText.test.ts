import { describe, expect, it } from 'vitest';
import {
  cleanResult,
  cutTrailingSentence,
  firstToSecondPerson,
  formatAction,
  formatSuggestion,
  similarity,
  storyVerdict,
  truncateSequences,
} from './storyText.js';

describe('formatAction', () => {
  it('continues the story on a blank line', () => {
    expect(formatAction('   ')).toEqual({ kind: 'continue' });
  });

  it('turns a leading quote into speech', () => {
    expect(formatAction('"Hello there."')).toEqual({ kind: 'say', text: 'You say "Hello there."' });
  });

  it('reduces anything else to a second-person verb phrase', () => {
    expect(formatAction('I open my bag.')).toEqual({ kind: 'do', verbPhrase: 'open your bag' });
    expect(formatAction('You Climb the tree!')).toEqual({ kind: 'do', verbPhrase: 'climb the tree' });
    expect(formatAction('look around')).toEqual({ kind: 'do', verbPhrase: 'look around' });
  });
});

describe('firstToSecondPerson', () => {
  it('swaps first-person words only', () => {
    expect(firstToSecondPerson("I think I'll give me my sword")).toBe("you think you'll give you your sword");
    expect(firstToSecondPerson('It is mine')).toBe('It is yours');
  });
});

describe('formatSuggestion', () => {
  it('keeps a bare phrase from the first line', () => {
    expect(formatSuggestion(' open the gate.\nThe gate is stuck.')).toBe('open the gate');
    expect(formatSuggestion('> climb up >')).toBe('climb up');
  });
});

describe('cutTrailingSentence', () => {
  it('drops an unfinished sentence', () => {
    expect(cutTrailingSentence('The door opens. You see a')).toBe('The door opens.');
  });

  it('keeps a closing quote', () => {
    expect(cutTrailingSentence('"Run!" she says')).toBe('"Run!"');
  });

  it('keeps text without any sentence end', () => {
    expect(cutTrailingSentence('no end here')).toBe('no end here');
  });
});

describe('cleanResult', () => {
  it('cuts where the model starts writing the next action', () => {
    expect(cleanResult('You wait. > You look around.')).toBe('You wait.');
    expect(cleanResult('You wait. > You look around.', true)).toBe('You wait. > You look around.');
  });

  it('strips markup and collapses blank lines', () => {
    expect(cleanResult('  the #cave\n\n\nis *dark*.  ')).toBe('the cave\nis dark.');
  });

  it('returns nothing for empty text', () => {
    expect(cleanResult('')).toBe('');
    expect(cleanResult('  ')).toBe('');
  });

  it('keeps text that opens with an action marker', () => {
    expect(cutTrailingSentence('> You open it. The room is')).toBe('> You open it.');
    expect(cleanResult('> You open it. The room is dark.')).toBe('> You open it. The room is dark.');
  });
});

describe('similarity', () => {
  it('compares word multisets', () => {
    expect(similarity('The wind howls.', 'the wind howls')).toBe(1);
    expect(similarity('the cat sat', 'the dog sat')).toBeCloseTo(2 / 3, 9);
    expect(similarity('', '')).toBe(1);
    expect(similarity('wind', '')).toBe(0);
  });
});

describe('storyVerdict', () => {
  it('spots endings', () => {
    expect(storyVerdict('The troll swings and you die.')).toBe('died');
    expect(storyVerdict('You have won the war.')).toBe('won');
    expect(storyVerdict('You won the duel, and the crowd cheers.')).toBe('won');
    expect(storyVerdict('The dragon dies.')).toBeNull();
  });
});

describe('truncateSequences', () => {
  it('trims the longest sequence from the front first', () => {
    const input = [[1, 2, 3, 4], [5, 6], [7]];
    expect(truncateSequences(input, 5)).toEqual([[3, 4], [5, 6], [7]]);
    expect(input[0]).toEqual([1, 2, 3, 4]);
  });

  it('prefers the earlier sequence on ties', () => {
    expect(truncateSequences([[1, 2], [3, 4]], 3)).toEqual([[2], [3, 4]]);
  });
});
