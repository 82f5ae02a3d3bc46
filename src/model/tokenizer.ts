import type { TokenId } from '../models.js';

export const UNKNOWN_TOKEN = '<unk>';
export const END_OF_TEXT = '<eos>';

const PIECE_PATTERN = / ?[A-Za-z']+| ?\d+| ?[^\sA-Za-z\d]|\n|[ \t]/g;

/** Splits text into word and punctuation pieces, each carrying at most one leading space. */
export function splitPieces(text: string): string[] {
  return text.replace(/\r\n?/g, '\n').match(PIECE_PATTERN) ?? [];
}

export class WordTokenizer {
  private readonly ids = new Map<string, TokenId>();
  private readonly specials: Set<TokenId>;
  readonly unknownId: TokenId | undefined;
  readonly endOfTextId: TokenId | undefined;

  constructor(readonly vocabulary: readonly string[]) {
    vocabulary.forEach((piece, id) => {
      if (!this.ids.has(piece)) this.ids.set(piece, id);
    });
    this.unknownId = this.ids.get(UNKNOWN_TOKEN);
    this.endOfTextId = this.ids.get(END_OF_TEXT);
    this.specials = new Set(
      [this.unknownId, this.endOfTextId].filter((id): id is TokenId => id !== undefined)
    );
  }

  static fromCorpus(texts: readonly string[]): WordTokenizer {
    const vocabulary = [UNKNOWN_TOKEN, END_OF_TEXT];
    const seen = new Set(vocabulary);
    for (const text of texts) {
      for (const piece of splitPieces(text)) {
        if (seen.has(piece)) continue;
        seen.add(piece);
        vocabulary.push(piece);
      }
    }
    return new WordTokenizer(vocabulary);
  }

  get size(): number {
    return this.vocabulary.length;
  }

  idOf(piece: string): TokenId | undefined {
    return this.ids.get(piece);
  }

  pieceOf(id: TokenId): string | undefined {
    return this.vocabulary[id];
  }

  encode(text: string): TokenId[] {
    const tokens: TokenId[] = [];
    for (const piece of splitPieces(text)) {
      const id = this.ids.get(piece) ?? this.ids.get(piece.trimStart()) ?? this.unknownId;
      if (id !== undefined) tokens.push(id);
    }
    return tokens;
  }

  decode(tokens: readonly TokenId[]): string {
    let text = '';
    for (const id of tokens) {
      if (this.specials.has(id)) continue;
      text += this.vocabulary[id] ?? '';
    }
    return text;
  }
}
