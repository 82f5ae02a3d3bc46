import type { TokenDistribution, TokenId } from '../models.js';

/**
 * Anything that can score the next token for a context. Local and remote backends
 * implement this; the decoding loop only ever sees this shape.
 */
export interface ModelCollaborator {
  readonly name: string;
  readonly vocabSize: number;
  scoreNextToken(context: readonly TokenId[], signal?: AbortSignal): Promise<TokenDistribution>;
  isEndOfSequence(tokenId: TokenId): boolean;
  encode(text: string): TokenId[];
  decode(tokens: readonly TokenId[]): string;
}
