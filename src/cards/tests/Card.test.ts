import { describe, test, expect } from '@jest/globals';
import { formatCard, parseCard, rankFromSymbol } from '../Card.js';
import { InvalidCardCodeError } from '../../util/errors.js';

describe('parseCard', () => {
  test('face cards map to 10..14', () => {
    expect(parseCard('TD')).toEqual({ rank: 10, suit: 'D' });
    expect(parseCard('JD').rank).toBe(11);
    expect(parseCard('QD').rank).toBe(12);
    expect(parseCard('KD').rank).toBe(13);
    expect(parseCard('AH')).toEqual({ rank: 14, suit: 'H' });
  });

  test('digits keep their value and the suit is kept verbatim', () => {
    expect(parseCard('2c')).toEqual({ rank: 2, suit: 'c' });
    expect(parseCard('9♠')).toEqual({ rank: 9, suit: '♠' });
  });

  test('unknown rank symbols are rejected', () => {
    expect(() => parseCard('1H')).toThrow(InvalidCardCodeError);
    expect(() => parseCard('aH')).toThrow('invalid card code "aH": unknown rank "a"');
  });

  test('codes must be exactly two characters', () => {
    expect(() => parseCard('10H')).toThrow('invalid card code "10H": expected exactly two characters');
    expect(() => parseCard('A')).toThrow(InvalidCardCodeError);
    expect(() => parseCard('')).toThrow(InvalidCardCodeError);
  });

  test('any suit passes unless strictSuits is on', () => {
    expect(parseCard('AX').suit).toBe('X');
    expect(() => parseCard('AX', { strictSuits: true })).toThrow('invalid card code "AX": unknown suit "X"');
    expect(parseCard('AS', { strictSuits: true })).toEqual({ rank: 14, suit: 'S' });
  });

  test('error carries the code and reason', () => {
    try {
      parseCard('ZZ');
      throw new Error('expected parseCard to throw');
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidCardCodeError);
      if (e instanceof InvalidCardCodeError) {
        expect(e.code).toBe('ZZ');
        expect(e.reason).toBe('unknown rank "Z"');
        expect(e.lineNumber).toBeUndefined();
        expect(e.name).toBe('InvalidCardCodeError');
      }
    }
  });
});

describe('card helpers', () => {
  test('rankFromSymbol', () => {
    expect(rankFromSymbol('7')).toBe(7);
    expect(rankFromSymbol('X')).toBeNull();
  });

  test('formatCard renders the two-character code', () => {
    expect(formatCard({ rank: 10, suit: 'H' })).toBe('TH');
    expect(formatCard(parseCard('9s'))).toBe('9s');
    expect(formatCard(parseCard('AC'))).toBe('AC');
  });
});
