import { nanoid } from 'nanoid';
import type { ActionCandidate, SuggestionConfig, SuggestionResult, TokenId } from '../models.js';
import type { ModelCollaborator } from '../model/base.js';
import { formatErrorForLogging } from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';
import { createSeededRandom, deriveSeed, type RandomSource } from '../utils/random.js';
import { createDecodingLoop } from './decodingLoop.js';

export interface SuggestOptions {
  rng: RandomSource;
  signal?: AbortSignal;
  /** How many runs may be in flight at once; defaults to all of them. */
  concurrency?: number;
  createRandom?: (seed: number) => RandomSource;
  formatCandidate?: (text: string) => string;
}

type RunOutcome =
  | { kind: 'text'; text: string }
  | { kind: 'cancelled' }
  | { kind: 'failed' };

export function firstLine(text: string): string {
  return (text.split('\n')[0] ?? '').trim();
}

/**
 * Runs `count` independent decodes from the same prompt, each with its own history and
 * random source, and keeps the ones long enough to show. Candidates come back in run order.
 */
export async function suggestActions(
  model: ModelCollaborator,
  promptTokens: readonly TokenId[],
  count: number,
  perAction: Pick<SuggestionConfig, 'sampling' | 'minLength'>,
  options: SuggestOptions
): Promise<SuggestionResult> {
  const { signal, createRandom = createSeededRandom, formatCandidate = firstLine } = options;
  const seeds = Array.from({ length: count }, () => deriveSeed(options.rng));
  const outcomes: (RunOutcome | undefined)[] = new Array(count).fill(undefined);

  const runOnce = async (runIndex: number): Promise<RunOutcome> => {
    const loop = createDecodingLoop(model, perAction.sampling, createRandom(seeds[runIndex]), promptTokens);
    try {
      const result = await loop.run({ signal });
      if (result.stopReason === 'cancelled') return { kind: 'cancelled' };
      return { kind: 'text', text: formatCandidate(model.decode(result.tokens)) };
    } catch (error) {
      logger.warn('Action suggestion run failed', formatErrorForLogging(error, { runIndex }));
      return { kind: 'failed' };
    }
  };

  let nextRun = 0;
  const workerCount = Math.max(1, Math.min(options.concurrency ?? count, count));
  const workers = Array.from({ length: count > 0 ? workerCount : 0 }, async () => {
    while (nextRun < count) {
      if (signal?.aborted) return;
      const runIndex = nextRun++;
      outcomes[runIndex] = await runOnce(runIndex);
    }
  });
  await Promise.all(workers);

  const candidates: ActionCandidate[] = [];
  outcomes.forEach((outcome, runIndex) => {
    if (outcome?.kind !== 'text') return;
    if (outcome.text.trim().length < perAction.minLength) {
      logger.debug('Dropping short action suggestion', { runIndex, text: outcome.text });
      return;
    }
    candidates.push({
      id: nanoid(8),
      text: outcome.text,
      runIndex,
      params: {
        temperature: perAction.sampling.temperature,
        topK: perAction.sampling.topK,
        topP: perAction.sampling.topP,
        maxNewTokens: perAction.sampling.maxNewTokens,
        seed: seeds[runIndex],
      },
    });
  });

  const shortfall = count - candidates.length;
  if (shortfall > 0) {
    logger.info('Fewer action suggestions than requested', { requested: count, received: candidates.length });
  }

  return {
    candidates,
    requested: count,
    shortfall,
    cancelled: signal?.aborted ?? false,
  };
}
