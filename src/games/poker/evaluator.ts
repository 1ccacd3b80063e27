import { rankSymbol, type Card, type Rank } from '../../cards/Card.js';
import { InvalidHandError } from '../../util/errors.js';
import type { Hand, Outcome, RankCategory, RankCount, RankedHand } from './types.js';

export const HAND_SIZE = 5;

export const CATEGORY_ORDER: Record<RankCategory, number> = {
  high_card: 0,
  pair: 1,
  two_pair: 2,
  three_of_a_kind: 3,
  straight: 4,
  flush: 5,
  full_house: 6,
  four_of_a_kind: 7,
  straight_flush: 8,
  royal_flush: 9,
};

const CATEGORY_LABEL: Record<RankCategory, string> = {
  high_card: 'high card',
  pair: 'pair',
  two_pair: 'two pair',
  three_of_a_kind: 'three of a kind',
  straight: 'straight',
  flush: 'flush',
  full_house: 'full house',
  four_of_a_kind: 'four of a kind',
  straight_flush: 'straight flush',
  royal_flush: 'royal flush',
};

function byRankDesc(a: Card, b: Card) { return b.rank - a.rank; }

export function sortHand(hand: Hand): Card[] {
  if (hand.length !== HAND_SIZE) throw new InvalidHandError(hand.length);
  return [...hand].sort(byRankDesc);
}

// Ordered by count, then rank, both descending: a full house lists the triple
// first, two pair lists the higher pair first.
export function rankCounts(hand: Hand): RankCount[] {
  const counts = new Map<Rank, number>();
  for (const c of hand) counts.set(c.rank, (counts.get(c.rank) ?? 0) + 1);
  return Array.from(counts, ([rank, count]) => ({ rank, count })).sort((a, b) => {
    if (b.count !== a.count) return b.count - a.count;
    return b.rank - a.rank;
  });
}

function ranksWithCount(counts: RankCount[], n: number): Rank[] {
  return counts.filter((c) => c.count === n).map((c) => c.rank);
}

export function isFlush(sorted: Card[]): boolean {
  return sorted.every((c) => c.suit === sorted[0].suit);
}

// Ace always plays high: A-2-3-4-5 is not a straight.
export function isStraight(sorted: Card[]): boolean {
  for (let i = 0; i < sorted.length - 1; i++) {
    if (sorted[i].rank !== sorted[i + 1].rank + 1) return false;
  }
  return true;
}

function categorize(sorted: Card[], counts: RankCount[]): RankCategory {
  const flush = isFlush(sorted);
  const straight = isStraight(sorted);
  const top = counts[0].count;
  const second = counts.length > 1 ? counts[1].count : 0;

  if (flush && straight) return sorted[0].rank === 14 ? 'royal_flush' : 'straight_flush';
  if (top === 4) return 'four_of_a_kind';
  if (top === 3 && second === 2) return 'full_house';
  if (flush) return 'flush';
  if (straight) return 'straight';
  if (top === 3) return 'three_of_a_kind';
  if (ranksWithCount(counts, 2).length === 2) return 'two_pair';
  if (top === 2) return 'pair';
  return 'high_card';
}

function tiebreak(category: RankCategory, sorted: Card[], counts: RankCount[]): number[] {
  const all = sorted.map((c) => c.rank);
  switch (category) {
    case 'four_of_a_kind':
      return [ranksWithCount(counts, 4)[0], ranksWithCount(counts, 1)[0]];
    case 'full_house':
      return [ranksWithCount(counts, 3)[0], ranksWithCount(counts, 2)[0]];
    case 'three_of_a_kind':
      return [ranksWithCount(counts, 3)[0], ...all];
    case 'two_pair': {
      const [high, low] = ranksWithCount(counts, 2);
      return [high, low, ranksWithCount(counts, 1)[0]];
    }
    case 'pair':
      return [ranksWithCount(counts, 2)[0], ...all];
    default:
      return all;
  }
}

export function evaluateHand(hand: Hand): RankedHand {
  const cards = sortHand(hand);
  const counts = rankCounts(cards);
  const category = categorize(cards, counts);
  return { category, cards, counts, rank: tiebreak(category, cards, counts) };
}

export function classifyHand(hand: Hand): RankCategory {
  return evaluateHand(hand).category;
}

export function compareRankedHands(a: RankedHand, b: RankedHand): number {
  if (a.category !== b.category) return CATEGORY_ORDER[a.category] - CATEGORY_ORDER[b.category];
  // same category, so both vectors have the same length
  for (let i = 0; i < a.rank.length; i++) {
    if (a.rank[i] !== b.rank[i]) return a.rank[i] - b.rank[i];
  }
  return 0;
}

export function outcomeOf(diff: number): Outcome {
  if (diff > 0) return 'first_wins';
  if (diff < 0) return 'second_wins';
  return 'tie';
}

export function compareHands(first: Hand, second: Hand): Outcome {
  return outcomeOf(compareRankedHands(evaluateHand(first), evaluateHand(second)));
}

function plural(rank: Rank) { return `${rankSymbol(rank)}s`; }

export function describeHand(ranked: RankedHand): string {
  const label = CATEGORY_LABEL[ranked.category];
  const [primary, secondary] = ranked.counts.map((c) => c.rank);
  switch (ranked.category) {
    case 'royal_flush':
      return label;
    case 'full_house':
      return `${label}, ${plural(primary)} over ${plural(secondary)}`;
    case 'two_pair':
      return `${label}, ${plural(primary)} and ${plural(secondary)}`;
    case 'four_of_a_kind':
    case 'three_of_a_kind':
    case 'pair':
      return `${label}, ${plural(primary)}`;
    default:
      return `${label}, ${rankSymbol(ranked.cards[0].rank)} high`;
  }
}
