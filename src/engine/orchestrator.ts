import equal from 'fast-deep-equal';
import type { AppConfig } from '../config.js';
import type {
  DecodeResult,
  DiceOutcome,
  StorySnapshot,
  StoryVerdict,
  SuggestionResult,
  TokenId,
} from '../models.js';
import type { ModelCollaborator } from '../model/base.js';
import { OperationAbortedError, isRetryableError, withRetry } from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';
import { createSeededRandom, type RandomSource } from '../utils/random.js';
import { suggestActions } from './actionSuggestions.js';
import { createDecodingLoop } from './decodingLoop.js';
import { frameAction, resolveOutcome } from './rules.js';
import {
  cleanResult,
  formatAction,
  formatSuggestion,
  similarity,
  storyVerdict,
  truncateSequences,
} from './storyText.js';

const MAX_EMPTY_RETRIES = 20;
const ALLOW_ACTION_AFTER = 6;
const LOOP_SIMILARITY = 0.9;
const GENERATION_RETRIES = 2;
const GENERATION_RETRY_DELAY_MS = 250;
const SUGGESTION_CUE = '\n> You';

export interface StorySessionDeps {
  model: ModelCollaborator;
  config: AppConfig;
  rng: RandomSource;
  seed: string;
  /** Builds the random source for a restored story's seed. */
  createRandom?: (seed: string) => RandomSource;
  onToken?: (tokenId: TokenId, text: string) => void;
}

export interface TurnResult {
  /** The sentence spliced into the prompt for this turn; empty when the player just continued. */
  action: string;
  outcome: DiceOutcome | null;
  result: string;
  looped: boolean;
  verdict: StoryVerdict | null;
}

function turnText(action: string, result: string): string {
  return action ? `${action}${result}` : ` ${result}`;
}

function joinSentences(first: string, second: string): string {
  if (!first) return second;
  if (!second) return first;
  return `${first.trimEnd()} ${second.trimStart()}`;
}

export class StorySession {
  private context = '';
  private storyStart = '';
  private actions: string[] = [];
  private results: string[] = [];
  private config: AppConfig;
  private readonly model: ModelCollaborator;
  private rng: RandomSource;
  private currentSeed: string;
  private readonly createRandom: (seed: string) => RandomSource;
  private readonly onToken?: StorySessionDeps['onToken'];

  constructor(deps: StorySessionDeps) {
    this.model = deps.model;
    this.config = deps.config;
    this.rng = deps.rng;
    this.currentSeed = deps.seed;
    this.createRandom = deps.createRandom ?? createSeededRandom;
    this.onToken = deps.onToken;
  }

  get seed(): string {
    return this.currentSeed;
  }

  get started(): boolean {
    return this.storyStart.length > 0;
  }

  get turnCount(): number {
    return this.actions.length;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  /** Swaps in reloaded settings for the next turn. Returns false when nothing changed. */
  replaceConfig(next: AppConfig): boolean {
    if (equal(this.config, next)) return false;
    this.config = next;
    logger.info('Settings reloaded');
    return true;
  }

  async start(context: string, prompt: string, signal?: AbortSignal): Promise<string> {
    this.context = context;
    this.storyStart = '';
    this.actions = [];
    this.results = [];

    const result = await this.generate([context ? `${context}\n` : '', prompt], signal);
    this.storyStart = joinSentences(prompt, result);
    return this.storyStart;
  }

  restore(snapshot: StorySnapshot) {
    this.context = snapshot.context;
    this.storyStart = snapshot.storyStart;
    this.actions = [...snapshot.actions];
    this.results = [...snapshot.results];
    this.currentSeed = snapshot.seed;
    this.rng = this.createRandom(snapshot.seed);
  }

  snapshot(): StorySnapshot {
    return {
      context: this.context,
      storyStart: this.storyStart,
      actions: [...this.actions],
      results: [...this.results],
      seed: this.seed,
    };
  }

  async act(rawAction: string, signal?: AbortSignal): Promise<TurnResult> {
    const formatted = formatAction(rawAction);
    let action = '';
    let outcome: DiceOutcome | null = null;

    if (formatted.kind === 'do') {
      outcome = resolveOutcome(this.config.dice.enabled, this.rng, this.config.dice.tiers);
      action = frameAction(formatted.verbPhrase, outcome);
    } else if (formatted.kind === 'say') {
      action = formatted.text;
    }

    const actionLine = action ? `\n> ${action}\n` : '';
    const result = await this.generate(this.promptSegments(actionLine), signal);

    this.actions.push(actionLine);
    this.results.push(result);

    let looped = false;
    const count = this.results.length;
    if (count >= 2 && similarity(this.results[count - 1], this.results[count - 2]) > LOOP_SIMILARITY) {
      this.actions.pop();
      this.results.pop();
      looped = true;
      logger.info('Discarded a turn that repeated the previous one', { turn: count });
    }

    return {
      action,
      outcome,
      result,
      looped,
      verdict: looped ? null : storyVerdict(result),
    };
  }

  /** Drops the last turn. Returns the text now ending the story, or null when there is nothing to drop. */
  revert(): string | null {
    if (this.actions.length === 0) return null;
    this.actions.pop();
    this.results.pop();
    return this.results[this.results.length - 1] ?? this.storyStart;
  }

  async suggest(signal?: AbortSignal): Promise<SuggestionResult> {
    const { count, minLength, sampling } = this.config.suggestions;
    if (count === 0) {
      return { candidates: [], requested: 0, shortfall: 0, cancelled: false };
    }

    const prompt = this.encodePrompt(this.promptSegments(SUGGESTION_CUE));
    return suggestActions(this.model, prompt, count, { sampling, minLength }, {
      rng: this.rng,
      signal,
      formatCandidate: formatSuggestion,
    });
  }

  toString(): string {
    return this.storyStart + this.actions.map((action, index) => turnText(action, this.results[index] ?? '')).join('');
  }

  private promptSegments(tail: string): string[] {
    return [
      this.context ? `${this.context}\n` : '',
      this.storyStart,
      ...this.actions.map((action, index) => turnText(action, this.results[index] ?? '')),
      tail,
    ];
  }

  private encodePrompt(segments: readonly string[]): TokenId[] {
    const sequences = segments.map((segment) => this.model.encode(segment));
    return truncateSequences(sequences, this.config.historyMaxTokens).flat();
  }

  private async generate(segments: readonly string[], signal?: AbortSignal): Promise<string> {
    for (let attempt = 0; attempt <= MAX_EMPTY_RETRIES; attempt++) {
      const prompt = this.encodePrompt(attempt === 0 ? segments : [...segments, ` ${attempt}`]);
      const decoded = await withRetry(
        () => this.decodeOnce(prompt, signal),
        GENERATION_RETRIES,
        GENERATION_RETRY_DELAY_MS,
        (error) => isRetryableError(error) && !signal?.aborted
      );

      const text = this.model.decode(decoded.tokens);
      let result = cleanResult(text);
      if (!result && attempt > ALLOW_ACTION_AFTER) {
        result = cleanResult(text, true);
      }
      if (result) return result;

      logger.info('Model generated empty text, trying again', { attempt, raw: text });
    }

    logger.warn('Model generated empty text repeatedly', { attempts: MAX_EMPTY_RETRIES + 1 });
    return '';
  }

  private async decodeOnce(prompt: readonly TokenId[], signal?: AbortSignal): Promise<DecodeResult> {
    const loop = createDecodingLoop(this.model, this.config.sampling, this.rng, prompt);
    const decoded = await loop.run({ signal, onToken: this.onToken });
    if (decoded.stopReason === 'cancelled') {
      throw new OperationAbortedError(signal?.reason);
    }
    return decoded;
  }
}
