import type { TokenDistribution, TokenId } from '../models.js';
import { OperationAbortedError } from '../utils/errorhandler.js';
import type { ModelCollaborator } from './base.js';
import { WordTokenizer } from './tokenizer.js';

export interface NgramOptions {
  /** Add-k smoothing on the unigram fallback. */
  smoothing?: number;
  /** Weight of the bigram estimate against the unigram one. */
  bigramWeight?: number;
  /** Pieces that end a generation besides the end-of-text marker. */
  stopPieces?: string[];
}

const DEFAULT_STOP_PIECES = ['>', ' >'];

/**
 * Interpolated bigram model trained in-process on the story corpus. Small and
 * predictable; it stands in for a neural model when none is configured.
 */
export class NgramModel implements ModelCollaborator {
  readonly name = 'ngram';
  private readonly unigrams: number[];
  private unigramTotal = 0;
  private readonly bigrams = new Map<TokenId, Map<TokenId, number>>();
  private readonly bigramTotals = new Map<TokenId, number>();
  private readonly stopIds = new Set<TokenId>();
  private readonly smoothing: number;
  private readonly bigramWeight: number;

  constructor(readonly tokenizer: WordTokenizer, documents: readonly string[], options: NgramOptions = {}) {
    this.smoothing = options.smoothing ?? 0.01;
    this.bigramWeight = options.bigramWeight ?? 0.9;
    this.unigrams = new Array<number>(tokenizer.size).fill(0);

    if (tokenizer.endOfTextId !== undefined) this.stopIds.add(tokenizer.endOfTextId);
    for (const piece of options.stopPieces ?? DEFAULT_STOP_PIECES) {
      const id = tokenizer.idOf(piece);
      if (id !== undefined) this.stopIds.add(id);
    }

    for (const document of documents) this.train(document);
  }

  static fromTexts(documents: readonly string[], options: NgramOptions = {}): NgramModel {
    return new NgramModel(WordTokenizer.fromCorpus(documents), documents, options);
  }

  get vocabSize(): number {
    return this.tokenizer.size;
  }

  private train(document: string) {
    const eos = this.tokenizer.endOfTextId;
    const ids = this.tokenizer.encode(document);
    if (eos !== undefined) ids.push(eos);

    let previous = eos;
    for (const id of ids) {
      this.unigrams[id] += 1;
      this.unigramTotal += 1;
      if (previous !== undefined) {
        const row = this.bigrams.get(previous) ?? new Map<TokenId, number>();
        row.set(id, (row.get(id) ?? 0) + 1);
        this.bigrams.set(previous, row);
        this.bigramTotals.set(previous, (this.bigramTotals.get(previous) ?? 0) + 1);
      }
      previous = id;
    }
  }

  async scoreNextToken(context: readonly TokenId[], signal?: AbortSignal): Promise<TokenDistribution> {
    if (signal?.aborted) throw new OperationAbortedError(signal.reason);

    const previous = context.length > 0 ? context[context.length - 1] : this.tokenizer.endOfTextId;
    const row = previous === undefined ? undefined : this.bigrams.get(previous);
    const rowTotal = previous === undefined ? 0 : this.bigramTotals.get(previous) ?? 0;
    const vocabSize = this.vocabSize;
    const unigramDenominator = this.unigramTotal + this.smoothing * vocabSize;

    return this.unigrams.map((count, id) => {
      if (id === this.tokenizer.unknownId) return 0;
      const unigram = (count + this.smoothing) / unigramDenominator;
      if (!row || rowTotal === 0) return unigram;
      const bigram = (row.get(id) ?? 0) / rowTotal;
      return this.bigramWeight * bigram + (1 - this.bigramWeight) * unigram;
    });
  }

  isEndOfSequence(tokenId: TokenId): boolean {
    return this.stopIds.has(tokenId);
  }

  encode(text: string): TokenId[] {
    return this.tokenizer.encode(text);
  }

  decode(tokens: readonly TokenId[]): string {
    return this.tokenizer.decode(tokens);
  }
}
