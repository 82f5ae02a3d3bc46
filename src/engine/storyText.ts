import type { StoryVerdict, TokenId } from '../models.js';

export type FormattedAction =
  | { kind: 'continue' }
  | { kind: 'say'; text: string }
  | { kind: 'do'; verbPhrase: string };

const FIRST_TO_SECOND: Record<string, string> = {
  "i'm": "you're",
  "i've": "you've",
  "i'll": "you'll",
  "i'd": "you'd",
  i: 'you',
  me: 'you',
  my: 'your',
  mine: 'yours',
  myself: 'yourself',
};

export function firstToSecondPerson(text: string): string {
  return text.replace(/\b(?:I'm|I've|I'll|I'd|I|[Mm]e|[Mm]y|[Mm]ine|[Mm]yself)\b/g, (word) => {
    return FIRST_TO_SECOND[word.toLowerCase()] ?? word;
  });
}

/** Turns what the player typed into something the story can carry. */
export function formatAction(raw: string): FormattedAction {
  const trimmed = raw.trim();
  if (!trimmed) return { kind: 'continue' };
  if (trimmed.startsWith('"')) return { kind: 'say', text: `You say ${trimmed}` };

  const phrase = firstToSecondPerson(
    trimmed
      .replace(/^(?:you|i)\s+/i, '')
      .replace(/[.!?]+$/, '')
      .trim()
  );
  return { kind: 'do', verbPhrase: phrase.charAt(0).toLowerCase() + phrase.slice(1) };
}

/** Suggestions come back as the words after "> You"; keep a bare verb phrase. */
export function formatSuggestion(text: string): string {
  return (text.split('\n')[0] ?? '')
    .replace(/^[\s>]+/, '')
    .replace(/[\s.!?>]+$/, '')
    .trim();
}

/**
 * Drops whatever follows the last complete sentence. Unless `allowAction` is set, text
 * from the first action marker on is dropped too, since that is the model playing the player.
 */
export function cutTrailingSentence(text: string, allowAction = false): string {
  let end = Math.max(text.lastIndexOf('.'), text.lastIndexOf('!'), text.lastIndexOf('?'));
  if (end <= 0) end = text.length - 1;

  if (!allowAction) {
    const marker = text.indexOf('>');
    if (marker > 0) end = Math.min(end, marker - 1);
  }

  if (text.charAt(end + 1) === '"') end += 1;
  return text.slice(0, end + 1);
}

export function cleanResult(raw: string, allowAction = false): string {
  const cut = cutTrailingSentence(raw, allowAction).trim();
  if (!cut) return '';

  const firstLetterCapitalized = cut.charAt(0) !== cut.charAt(0).toLowerCase();
  let result = cut
    .replace(/[#*]/g, '')
    .replace(/\n{2,}/g, '\n')
    .trim();
  if (!result) return '';
  if (!firstLetterCapitalized) {
    result = result.charAt(0).toLowerCase() + result.slice(1);
  }
  return result;
}

function words(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9']+/g) ?? [];
}

/** Word-overlap ratio in [0, 1]; 1 for identical word multisets. */
export function similarity(a: string, b: string): number {
  const left = words(a);
  const right = words(b);
  if (left.length === 0 && right.length === 0) return 1;
  if (left.length === 0 || right.length === 0) return 0;

  const counts = new Map<string, number>();
  for (const word of left) counts.set(word, (counts.get(word) ?? 0) + 1);

  let overlap = 0;
  for (const word of right) {
    const remaining = counts.get(word) ?? 0;
    if (remaining > 0) {
      overlap++;
      counts.set(word, remaining - 1);
    }
  }
  return (2 * overlap) / (left.length + right.length);
}

const DEATH_PATTERNS = [
  /\byou (?:have )?died\b/i,
  /\byou die\b/i,
  /\byou are (?:now )?dead\b/i,
  /\byou're (?:now )?dead\b/i,
  /\byou have been killed\b/i,
  /\byour life (?:ends|is over)\b/i,
];

const WIN_PATTERNS = [
  /\byou (?:have )?won\b/i,
  /\byou win\b/i,
  /\byou are victorious\b/i,
  /\byour quest is (?:complete|over)\b/i,
];

export function storyVerdict(result: string): StoryVerdict | null {
  if (WIN_PATTERNS.some((pattern) => pattern.test(result))) return 'won';
  if (DEATH_PATTERNS.some((pattern) => pattern.test(result))) return 'died';
  return null;
}

/** Shortens the longest sequence from its front until all of them fit in `maxLength` tokens. */
export function truncateSequences(sequences: TokenId[][], maxLength: number): TokenId[][] {
  const trimmed = sequences.map((sequence) => [...sequence]);
  let total = trimmed.reduce((sum, sequence) => sum + sequence.length, 0);
  while (total > maxLength) {
    let longest = trimmed[0];
    for (const sequence of trimmed) {
      if (sequence.length > longest.length) longest = sequence;
    }
    longest.shift();
    total--;
  }
  return trimmed;
}
