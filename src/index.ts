#!/usr/bin/env node
import fs from 'node:fs';
import path from 'node:path';
import readline from 'node:readline';
import { config as loadDotenv } from 'dotenv';
import { USAGE, parseCliArgs, type CliArgs } from './cli/args.js';
import { createUi, isInteractive, type Output } from './cli/ui.js';
import { loadConfig, type AppConfig } from './config/index.js';
import { tallyStream } from './games/poker/tally.js';
import { createLogger } from './log.js';
import { ConfigError, UsageError, UserError, normalizeError } from './util/errors.js';

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  stdin?: NodeJS.ReadableStream;
  stdout?: Output;
  stderr?: Output;
}

export const EXIT_OK = 0;
export const EXIT_INPUT = 1;
export const EXIT_USAGE = 2;

function exitCodeFor(err: unknown) {
  return err instanceof UsageError || err instanceof ConfigError ? EXIT_USAGE : EXIT_INPUT;
}

export async function run(argv: string[], opts: RunOptions = {}): Promise<number> {
  const stdout = opts.stdout ?? process.stdout;
  const stderr = opts.stderr ?? process.stderr;
  const cwd = opts.cwd ?? process.cwd();

  let setup: { args: CliArgs; cfg: AppConfig };
  try {
    const args = parseCliArgs(argv);
    setup = { args, cfg: loadConfig({ cwd, env: opts.env, overrides: args.overrides }) };
  } catch (e) {
    createUi(stdout, stderr, true).say(normalizeError(e).message, 'error');
    if (e instanceof UsageError) stderr.write(`${USAGE}\n`);
    return exitCodeFor(e);
  }
  const { args, cfg } = setup;

  const ui = createUi(stdout, stderr, cfg.pretty);
  if (args.help) {
    ui.print(USAGE);
    return EXIT_OK;
  }

  const log = createLogger({ level: cfg.logLevel, pretty: cfg.pretty && isInteractive(stderr) });
  const file = args.file && args.file !== '-' ? path.resolve(cwd, args.file) : undefined;
  if (file && !fs.existsSync(file)) {
    ui.say(`cannot read input file ${file}`, 'error');
    log.error({ msg: 'input_missing', file });
    return EXIT_INPUT;
  }

  const input = file ? fs.createReadStream(file, 'utf8') : opts.stdin ?? process.stdin;
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  const started = Date.now();
  log.debug({ msg: 'run_start', input: file ?? 'stdin', config: cfg });
  try {
    const tally = await tallyStream(rl, { ...cfg, logger: log });
    log.info({
      msg: 'run_complete',
      lines: tally.lines,
      player1: tally.player1,
      player2: tally.player2,
      ties: tally.ties,
      skipped: tally.skipped.length,
      ms: Date.now() - started,
    });
    ui.summary(tally, cfg.tiePolicy);
    return EXIT_OK;
  } catch (e) {
    const info = normalizeError(e);
    if (e instanceof UserError) {
      ui.say(info.message, 'error');
      log.error({ msg: 'run_aborted', error: info.message });
    } else {
      ui.say(`unexpected failure: ${info.message}`, 'error');
      log.error({ msg: 'run_failed', error: info });
    }
    return exitCodeFor(e);
  } finally {
    // the loop closes rl on exit; a file stream still needs its descriptor released
    if (input instanceof fs.ReadStream) input.destroy();
  }
}

if (require.main === module) {
  loadDotenv({ override: false });
  run(process.argv.slice(2))
    .then((code) => { process.exitCode = code; })
    .catch((err) => {
      console.error(normalizeError(err).stack || String(err));
      process.exitCode = EXIT_INPUT;
    });
}
