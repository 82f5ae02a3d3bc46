import { z } from 'zod';
import type { TokenDistribution, TokenId } from '../models.js';
import { CircuitBreaker, OperationAbortedError, StoryError, withTimeout } from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';
import type { ModelCollaborator } from './base.js';
import { WordTokenizer } from './tokenizer.js';

const vocabResponseSchema = z.object({
  tokens: z.array(z.string()).min(1),
  eos_token_ids: z.array(z.number().int().nonnegative()).default([]),
  model_name: z.string().optional(),
});

const nextDistResponseSchema = z.object({
  scores: z.array(z.number().nonnegative()),
});

export interface RemoteModelOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
  breaker?: CircuitBreaker;
}

export class ModelServiceError extends StoryError {
  constructor(message: string, status?: number, context?: Record<string, unknown>) {
    super(
      message,
      'MODEL_SERVICE_ERROR',
      'The model service did not answer properly.',
      { status, ...context },
      status === undefined || status >= 500 || status === 429
    );
    this.name = 'ModelServiceError';
  }
}

/**
 * Client for a model served over HTTP:
 *   GET  {baseUrl}/vocab      -> { tokens: string[], eos_token_ids: number[] }
 *   POST {baseUrl}/next_dist  { context: number[] } -> { scores: number[] }
 */
export class RemoteModel implements ModelCollaborator {
  readonly name: string;
  private readonly endOfSequence: Set<TokenId>;

  private constructor(
    private readonly tokenizer: WordTokenizer,
    eosTokenIds: readonly TokenId[],
    private readonly options: Required<RemoteModelOptions>,
    modelName?: string
  ) {
    this.name = modelName ? `remote:${modelName}` : 'remote';
    this.endOfSequence = new Set(eosTokenIds);
    if (tokenizer.endOfTextId !== undefined) this.endOfSequence.add(tokenizer.endOfTextId);
  }

  static async connect(options: RemoteModelOptions): Promise<RemoteModel> {
    const resolved: Required<RemoteModelOptions> = {
      baseUrl: options.baseUrl.replace(/\/$/, ''),
      timeoutMs: options.timeoutMs,
      fetchImpl: options.fetchImpl ?? fetch,
      breaker: options.breaker ?? new CircuitBreaker(),
    };

    const body = await requestJson(resolved, '/vocab', { method: 'GET' });
    const parsed = vocabResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ModelServiceError('Malformed vocabulary response', undefined, {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }

    logger.info('Connected to model service', {
      baseUrl: resolved.baseUrl,
      vocabSize: parsed.data.tokens.length,
      model: parsed.data.model_name,
    });
    return new RemoteModel(
      new WordTokenizer(parsed.data.tokens),
      parsed.data.eos_token_ids,
      resolved,
      parsed.data.model_name
    );
  }

  get vocabSize(): number {
    return this.tokenizer.size;
  }

  async scoreNextToken(context: readonly TokenId[], signal?: AbortSignal): Promise<TokenDistribution> {
    const body = await this.options.breaker.execute(() =>
      requestJson(
        this.options,
        '/next_dist',
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ context }),
        },
        signal
      )
    );

    const parsed = nextDistResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ModelServiceError('Malformed distribution response', undefined, {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    return parsed.data.scores;
  }

  isEndOfSequence(tokenId: TokenId): boolean {
    return this.endOfSequence.has(tokenId);
  }

  encode(text: string): TokenId[] {
    return this.tokenizer.encode(text);
  }

  decode(tokens: readonly TokenId[]): string {
    return this.tokenizer.decode(tokens);
  }
}

async function requestJson(
  options: Required<RemoteModelOptions>,
  path: string,
  init: { method: string; headers?: Record<string, string>; body?: string },
  signal?: AbortSignal
): Promise<unknown> {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(signal?.reason);
  signal?.addEventListener('abort', forwardAbort, { once: true });

  try {
    const response = await withTimeout(
      options.fetchImpl(`${options.baseUrl}${path}`, { ...init, signal: controller.signal }),
      options.timeoutMs,
      `Model service did not answer ${path} within ${options.timeoutMs}ms`
    );
    if (!response.ok) {
      throw new ModelServiceError(`Model service responded with ${response.status}`, response.status, { path });
    }
    const body: unknown = await response.json();
    return body;
  } catch (error) {
    if (error instanceof StoryError) throw error;
    if (signal?.aborted) throw new OperationAbortedError(signal.reason);
    throw new ModelServiceError(`Model service request to ${path} failed`, undefined, {
      path,
      error: error instanceof Error ? error.message : String(error),
    });
  } finally {
    signal?.removeEventListener('abort', forwardAbort);
    controller.abort();
  }
}
