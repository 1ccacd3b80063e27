import { InvalidCardCodeError } from '../util/errors.js';

export type Rank = 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14; // 11=J,12=Q,13=K,14=A
export type Suit = string;
export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
}

export const STANDARD_SUITS: readonly Suit[] = ['C', 'D', 'H', 'S'];

const RANK_BY_SYMBOL = new Map<string, Rank>([
  ['2', 2], ['3', 3], ['4', 4], ['5', 5], ['6', 6], ['7', 7], ['8', 8], ['9', 9],
  ['T', 10], ['J', 11], ['Q', 12], ['K', 13], ['A', 14],
]);

const SYMBOL_BY_RANK = new Map<Rank, string>(
  Array.from(RANK_BY_SYMBOL.entries(), ([symbol, rank]) => [rank, symbol]),
);

export interface ParseCardOptions {
  strictSuits?: boolean;
}

export function rankFromSymbol(symbol: string): Rank | null {
  return RANK_BY_SYMBOL.get(symbol) ?? null;
}

export function rankSymbol(rank: Rank): string {
  return SYMBOL_BY_RANK.get(rank) ?? String(rank);
}

/**
 * Parses a two-character code such as `AH` or `9c`: rank symbol first, suit second.
 * The suit is kept verbatim unless `strictSuits` limits it to C, D, H and S.
 */
export function parseCard(code: string, opts: ParseCardOptions = {}): Card {
  // code points, so a suit outside the BMP still counts as one character
  const chars = Array.from(code);
  if (chars.length !== 2) {
    throw new InvalidCardCodeError(code, 'expected exactly two characters');
  }
  const [rankChar, suit] = chars;
  const rank = rankFromSymbol(rankChar);
  if (rank === null) {
    throw new InvalidCardCodeError(code, `unknown rank "${rankChar}"`);
  }
  if (suit.trim() === '') {
    throw new InvalidCardCodeError(code, 'missing suit');
  }
  if (opts.strictSuits && !STANDARD_SUITS.includes(suit)) {
    throw new InvalidCardCodeError(code, `unknown suit "${suit}"`);
  }
  return { rank, suit };
}

export function formatCard(card: Card): string {
  return `${rankSymbol(card.rank)}${card.suit}`;
}
