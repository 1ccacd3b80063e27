import { parseCard, type ParseCardOptions } from '../../cards/Card.js';
import { InvalidCardCodeError, MalformedLineError } from '../../util/errors.js';
import { HAND_SIZE } from './evaluator.js';
import type { Deal } from './types.js';

export const CARDS_PER_LINE = HAND_SIZE * 2;

export interface ParseLineOptions extends ParseCardOptions {
  lineNumber?: number;
}

/**
 * Reads one input line into the two hands it deals. The first five codes are
 * player 1's hand, the last five player 2's.
 *
 * @returns `null` for a blank line
 * @throws MalformedLineError when the line does not hold exactly ten codes
 * @throws InvalidCardCodeError when a code cannot be parsed
 */
export function parseLine(line: string, opts: ParseLineOptions = {}): Deal | null {
  const lineNumber = opts.lineNumber ?? 1;
  const trimmed = line.trim();
  if (trimmed === '') return null;

  const tokens = trimmed.split(/\s+/);
  if (tokens.length !== CARDS_PER_LINE) {
    throw new MalformedLineError(lineNumber, tokens.length, CARDS_PER_LINE);
  }

  const cards = tokens.map((token) => {
    try {
      return parseCard(token, opts);
    } catch (e) {
      if (e instanceof InvalidCardCodeError) {
        throw new InvalidCardCodeError(e.code, e.reason, lineNumber);
      }
      throw e;
    }
  });
  return { first: cards.slice(0, HAND_SIZE), second: cards.slice(HAND_SIZE) };
}
