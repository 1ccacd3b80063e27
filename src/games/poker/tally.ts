import type { Logger } from 'pino';
import { formatCard } from '../../cards/Card.js';
import type { MalformedPolicy, TiePolicy } from '../../config/index.js';
import { UserError } from '../../util/errors.js';
import { compareRankedHands, describeHand, evaluateHand, outcomeOf } from './evaluator.js';
import { parseLine } from './lines.js';
import type { Deal, Outcome } from './types.js';

export interface SkippedLine {
  lineNumber: number;
  reason: string;
}

export interface Tally {
  player1: number;
  player2: number;
  ties: number;
  lines: number; // lines compared, blank and skipped ones excluded
  skipped: SkippedLine[];
}

export interface TallyOptions {
  tiePolicy?: TiePolicy;
  onMalformed?: MalformedPolicy;
  strictSuits?: boolean;
  logger?: Logger;
}

export function emptyTally(): Tally {
  return { player1: 0, player2: 0, ties: 0, lines: 0, skipped: [] };
}

export function recordOutcome(tally: Tally, outcome: Outcome, tiePolicy: TiePolicy = 'separate'): Tally {
  const next = { ...tally, lines: tally.lines + 1 };
  switch (outcome) {
    case 'first_wins':
      return { ...next, player1: next.player1 + 1 };
    case 'second_wins':
      return { ...next, player2: next.player2 + 1 };
    case 'tie':
      if (tiePolicy === 'player1') return { ...next, player1: next.player1 + 1 };
      if (tiePolicy === 'player2') return { ...next, player2: next.player2 + 1 };
      return { ...next, ties: next.ties + 1 };
  }
}

export type LineResult =
  | { kind: 'blank' }
  | { kind: 'compared'; outcome: Outcome }
  | { kind: 'skipped'; skip: SkippedLine };

/** Scores one input line. Line numbers start at 1. */
export function scoreLine(line: string, lineNumber: number, opts: TallyOptions = {}): LineResult {
  const log = opts.logger;
  let deal: Deal | null;
  try {
    deal = parseLine(line, { lineNumber, strictSuits: opts.strictSuits });
  } catch (e) {
    if (opts.onMalformed !== 'skip' || !(e instanceof UserError)) throw e;
    log?.warn({ msg: 'line_skipped', line: lineNumber, reason: e.message });
    return { kind: 'skipped', skip: { lineNumber, reason: e.message } };
  }
  if (!deal) return { kind: 'blank' };

  const first = evaluateHand(deal.first);
  const second = evaluateHand(deal.second);
  const outcome = outcomeOf(compareRankedHands(first, second));
  log?.debug({
    msg: 'line_compared',
    line: lineNumber,
    player1: { cards: first.cards.map(formatCard).join(' '), hand: describeHand(first) },
    player2: { cards: second.cards.map(formatCard).join(' '), hand: describeHand(second) },
    outcome,
  });
  return { kind: 'compared', outcome };
}

// Counters are replaced per line; skipped lines accumulate in one list owned by the fold.
function createFold(opts: TallyOptions) {
  let tally = emptyTally();
  const skipped: SkippedLine[] = [];
  let lineNumber = 0;

  function add(line: string) {
    const result = scoreLine(line, ++lineNumber, opts);
    if (result.kind === 'compared') tally = recordOutcome(tally, result.outcome, opts.tiePolicy);
    else if (result.kind === 'skipped') skipped.push(result.skip);
  }

  function finish(): Tally {
    return { ...tally, skipped };
  }

  return { add, finish };
}

export function tallyLines(lines: Iterable<string>, opts: TallyOptions = {}): Tally {
  const fold = createFold(opts);
  for (const line of lines) fold.add(line);
  return fold.finish();
}

export async function tallyStream(lines: AsyncIterable<string>, opts: TallyOptions = {}): Promise<Tally> {
  const fold = createFold(opts);
  for await (const line of lines) fold.add(line);
  return fold.finish();
}
