import type { TiePolicy } from '../config/index.js';
import type { Tally } from '../games/poker/tally.js';
import { isCi, isTestEnv } from '../util/env.js';
import { getPalette, type Palette } from './theme.js';

export interface Output {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export function isInteractive(stream: Output) {
  return !!stream.isTTY && !isCi();
}

export function formatSummary(tally: Tally, tiePolicy: TiePolicy): string[] {
  const lines = [`Player 1: ${tally.player1}`, `Player 2: ${tally.player2}`];
  if (tiePolicy === 'separate') lines.push(`Ties: ${tally.ties}`);
  if (tally.skipped.length > 0) lines.push(`Skipped: ${tally.skipped.length}`);
  return lines;
}

export function createUi(out: Output, err: Output, pretty: boolean) {
  const palette: Palette = getPalette(!pretty || !isInteractive(out));
  const errPalette: Palette = getPalette(!pretty || !isInteractive(err));

  function say(msg: string, style: 'info' | 'warn' | 'error' | 'dim' = 'info') {
    // Keep Jest runs clean
    if (isTestEnv() && err === process.stderr) return;
    err.write(`${errPalette[style](msg)}\n`);
  }

  function summary(tally: Tally, tiePolicy: TiePolicy) {
    for (const line of formatSummary(tally, tiePolicy)) {
      const [label, value] = line.split(': ');
      out.write(`${palette.bold(`${label}:`)} ${palette.info(value)}\n`);
    }
    for (const s of tally.skipped) say(`line ${s.lineNumber} skipped: ${s.reason}`, 'warn');
  }

  function print(text: string) {
    out.write(`${text}\n`);
  }

  return { say, summary, print };
}

export type Ui = ReturnType<typeof createUi>;
