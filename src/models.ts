export type TokenId = number;
export type StoryId = string;

/** Score per token id; the index is the token id. Scores are non-negative and need not sum to 1. */
export type TokenDistribution = readonly number[];

export interface SamplingConfig {
  readonly temperature: number;
  readonly repetitionPenalty: number;
  readonly topK: number;
  readonly topP: number;
  readonly maxNewTokens: number;
  /** End-of-sequence is suppressed until this many tokens have been generated. */
  readonly minLength: number;
  /** Trailing history tokens the repetition penalty looks at; 0 means all of them. */
  readonly repetitionWindow: number;
}

export interface SuggestionConfig {
  readonly count: number;
  readonly sampling: SamplingConfig;
  /** Candidates shorter than this many characters after trimming are dropped. */
  readonly minLength: number;
}

export type DiceTier = 'critical-failure' | 'failure' | 'success' | 'critical-success';

export interface DiceTierBounds {
  readonly criticalFailureMax: number;
  readonly failureMax: number;
  readonly successMax: number;
}

export interface DiceOutcome {
  roll: number;
  tier: DiceTier;
}

export interface ActionCandidate {
  id: string;
  text: string;
  runIndex: number;
  params: {
    temperature: number;
    topK: number;
    topP: number;
    maxNewTokens: number;
    seed: number;
  };
}

export type StopReason = 'length' | 'end-of-sequence' | 'cancelled';

export interface DecodeResult {
  tokens: TokenId[];
  stopReason: StopReason;
}

export interface SuggestionResult {
  candidates: ActionCandidate[];
  requested: number;
  /** How many requested suggestions did not survive; 0 when the list is complete. */
  shortfall: number;
  cancelled: boolean;
}

export type StoryVerdict = 'won' | 'died';

export interface StorySnapshot {
  context: string;
  storyStart: string;
  actions: string[];
  results: string[];
  seed: string;
}

export interface SavedStory extends StorySnapshot {
  story_id: StoryId;
  created_at: number;
  updated_at: number;
}

export interface StoryPrompt {
  category: string;
  name: string;
  context: string;
  prompt: string;
}
