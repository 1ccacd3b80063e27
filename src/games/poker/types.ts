import type { Card, Rank } from '../../cards/Card.js';

export type Hand = readonly Card[];

export type RankCategory =
  | 'high_card'
  | 'pair'
  | 'two_pair'
  | 'three_of_a_kind'
  | 'straight'
  | 'flush'
  | 'full_house'
  | 'four_of_a_kind'
  | 'straight_flush'
  | 'royal_flush';

export interface RankCount {
  rank: Rank;
  count: number;
}

export interface RankedHand {
  category: RankCategory;
  cards: Card[]; // sorted high to low
  counts: RankCount[];
  rank: number[]; // for tiebreakers
}

export type Outcome = 'first_wins' | 'second_wins' | 'tie';

export interface Deal {
  first: Card[];
  second: Card[];
}
