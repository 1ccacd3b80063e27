import { describe, test, expect } from '@jest/globals';
import { parseCliArgs } from '../args.js';
import { UsageError } from '../../util/errors.js';

describe('parseCliArgs', () => {
  test('no arguments reads stdin with no overrides', () => {
    expect(parseCliArgs([])).toEqual({ help: false, overrides: {} });
  });

  test('file and every option', () => {
    const args = parseCliArgs(['hands.txt', '--ties=Player2', '--on-malformed', 'skip', '--strict-suits', '--no-color', '--log-level=debug']);
    expect(args).toEqual({
      file: 'hands.txt',
      help: false,
      overrides: { tiePolicy: 'player2', onMalformed: 'skip', strictSuits: true, pretty: false, logLevel: 'debug' },
    });
  });

  test('"-" is a file argument meaning stdin', () => {
    expect(parseCliArgs(['-']).file).toBe('-');
  });

  test('help', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
    expect(parseCliArgs(['--help']).help).toBe(true);
  });

  test('unknown options', () => {
    expect(() => parseCliArgs(['--bogus'])).toThrow(UsageError);
    expect(() => parseCliArgs(['--bogus=1'])).toThrow('unknown option --bogus');
    expect(() => parseCliArgs(['-x'])).toThrow('unknown option -x');
  });

  test('value options need a value', () => {
    expect(() => parseCliArgs(['--ties'])).toThrow('option --ties needs a value');
    expect(() => parseCliArgs(['--ties='])).toThrow('option --ties needs a value');
  });

  test('only one file', () => {
    expect(() => parseCliArgs(['a.txt', 'b.txt'])).toThrow('unexpected argument b.txt');
  });
});
