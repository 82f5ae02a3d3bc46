import type { DecodeResult, SamplingConfig, StopReason, TokenDistribution, TokenId } from '../models.js';
import type { ModelCollaborator } from '../model/base.js';
import {
  GenerationFailedError,
  OperationAbortedError,
  StoryError,
  abandonOnAbort,
} from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';
import type { RandomSource } from '../utils/random.js';
import { filterDistribution } from './distributionFilter.js';
import { GenerationHistory } from './history.js';
import { penalize } from './repetitionPenalty.js';
import { sample } from './sampler.js';

export type DecodingState = 'running' | 'extending' | 'stopped';

export interface DecodeOptions {
  signal?: AbortSignal;
  onToken?: (tokenId: TokenId, text: string) => void;
}

type StepOutcome = { kind: 'token'; token: TokenId } | { kind: 'end' };

export class DecodingLoop {
  private state: DecodingState = 'running';
  private generated = 0;
  private stopReason: StopReason | null = null;
  private endOfSequenceIds: TokenId[] | null = null;
  private readonly config: SamplingConfig;

  constructor(
    private readonly model: ModelCollaborator,
    config: SamplingConfig,
    private readonly rng: RandomSource,
    readonly history: GenerationHistory = new GenerationHistory()
  ) {
    this.config = Object.freeze({ ...config });
  }

  getState(): DecodingState {
    return this.state;
  }

  getStopReason(): StopReason | null {
    return this.stopReason;
  }

  async run(options: DecodeOptions = {}): Promise<DecodeResult> {
    if (this.state === 'stopped') {
      throw new StoryError('Decoding loop has already stopped', 'LOOP_STOPPED', undefined, {
        stopReason: this.stopReason,
      });
    }

    const { signal, onToken } = options;
    const tokens: TokenId[] = [];

    while (true) {
      if (signal?.aborted) return this.finish('cancelled', tokens);
      if (this.generated >= this.config.maxNewTokens) return this.finish('length', tokens);

      this.state = 'extending';
      let outcome: StepOutcome;
      try {
        outcome = await this.step(signal);
      } catch (error) {
        if (error instanceof OperationAbortedError) return this.finish('cancelled', tokens);
        this.state = 'stopped';
        throw error;
      }

      if (outcome.kind === 'end') return this.finish('end-of-sequence', tokens);

      tokens.push(outcome.token);
      this.state = 'running';
      onToken?.(outcome.token, this.model.decode([outcome.token]));
    }
  }

  private finish(reason: StopReason, tokens: TokenId[]): DecodeResult {
    this.state = 'stopped';
    this.stopReason = reason;
    logger.debug('Decoding stopped', { reason, generated: this.generated, model: this.model.name });
    return { tokens, stopReason: reason };
  }

  private async step(signal?: AbortSignal): Promise<StepOutcome> {
    const context = this.history.snapshot();
    const raw = await this.requestScores(context, signal);

    const scores = this.generated < this.config.minLength ? this.suppressEndOfSequence(raw) : [...raw];
    const penalized = penalize(scores, context, this.config.repetitionPenalty, this.config.repetitionWindow);
    const filtered = filterDistribution(penalized, this.config.temperature, this.config.topK, this.config.topP);
    const token = sample(filtered, this.rng);

    // Nothing is committed once cancellation has been requested
    if (signal?.aborted) throw new OperationAbortedError(signal.reason);

    if (this.model.isEndOfSequence(token)) return { kind: 'end' };

    this.history.append(token);
    this.generated++;
    return { kind: 'token', token };
  }

  private async requestScores(context: TokenId[], signal?: AbortSignal): Promise<TokenDistribution> {
    let raw: TokenDistribution;
    try {
      raw = await abandonOnAbort(this.model.scoreNextToken(context, signal), signal);
    } catch (error) {
      if (error instanceof OperationAbortedError) throw error;
      if (signal?.aborted) throw new OperationAbortedError(signal.reason);
      // A collaborator that classifies its own failure keeps that classification
      throw new GenerationFailedError(
        'Model failed to score the next token',
        { model: this.model.name, step: this.generated },
        error,
        error instanceof StoryError ? error.isRetryable : true
      );
    }

    if (!Array.isArray(raw) || raw.length !== this.model.vocabSize) {
      throw new GenerationFailedError('Model returned a distribution of the wrong size', {
        model: this.model.name,
        expected: this.model.vocabSize,
        received: Array.isArray(raw) ? raw.length : typeof raw,
      }, undefined, false);
    }
    if (raw.some((score) => typeof score !== 'number' || !Number.isFinite(score) || score < 0)) {
      throw new GenerationFailedError('Model returned a negative or non-numeric score', {
        model: this.model.name,
      }, undefined, false);
    }
    return raw;
  }

  private suppressEndOfSequence(raw: TokenDistribution): number[] {
    if (!this.endOfSequenceIds) {
      this.endOfSequenceIds = [];
      for (let id = 0; id < this.model.vocabSize; id++) {
        if (this.model.isEndOfSequence(id)) this.endOfSequenceIds.push(id);
      }
    }

    const suppressed = [...raw];
    for (const id of this.endOfSequenceIds) suppressed[id] = 0;
    // A model that puts all of its mass on ending is allowed to end
    return suppressed.some((score) => score > 0) ? suppressed : [...raw];
  }
}

export function createDecodingLoop(
  model: ModelCollaborator,
  config: SamplingConfig,
  rng: RandomSource,
  promptTokens: readonly TokenId[] = []
): DecodingLoop {
  return new DecodingLoop(model, config, rng, new GenerationHistory(promptTokens));
}
