import type { TokenId } from '../models.js';

/** Append-only token record of one generation, prompt tokens included. */
export class GenerationHistory {
  private readonly items: TokenId[];

  constructor(seed: readonly TokenId[] = []) {
    this.items = [...seed];
  }

  get length(): number {
    return this.items.length;
  }

  get tokens(): readonly TokenId[] {
    return this.items;
  }

  append(tokenId: TokenId) {
    this.items.push(tokenId);
  }

  snapshot(): TokenId[] {
    return [...this.items];
  }
}
