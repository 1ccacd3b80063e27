import { UsageError } from '../util/errors.js';

export const USAGE = `Usage: showdown [file] [options]

Reads lines of ten card codes (five per player) from file, or stdin when file
is omitted or "-", and prints how many lines each player won.

Options:
  --ties=<separate|player1|player2>   where tied lines are counted (default: separate)
  --on-malformed=<abort|skip>         stop at a bad line or skip it (default: abort)
  --strict-suits                      only accept C, D, H and S as suits
  --log-level=<level>                 fatal, error, warn, info, debug, trace or silent
  --no-color                          plain output
  -h, --help                          show this help`;

export interface CliArgs {
  file?: string;
  help: boolean;
  overrides: Record<string, unknown>;
}

// flag -> config key, for flags that take a value
const VALUE_FLAGS: Record<string, string> = {
  '--ties': 'tiePolicy',
  '--on-malformed': 'onMalformed',
  '--log-level': 'logLevel',
};

/** Values are left as strings; `loadConfig` validates them. */
export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { help: false, overrides: {} };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '-h' || arg === '--help') {
      args.help = true;
      continue;
    }
    if (arg === '--strict-suits') {
      args.overrides.strictSuits = true;
      continue;
    }
    if (arg === '--no-color') {
      args.overrides.pretty = false;
      continue;
    }
    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const flag = eq === -1 ? arg : arg.slice(0, eq);
      const key = Object.prototype.hasOwnProperty.call(VALUE_FLAGS, flag) ? VALUE_FLAGS[flag] : undefined;
      if (!key) throw new UsageError(`unknown option ${flag}`);
      let value: string | undefined = eq === -1 ? argv[++i] : arg.slice(eq + 1);
      if (value === undefined || value === '') throw new UsageError(`option ${flag} needs a value`);
      value = value.toLowerCase();
      args.overrides[key] = value;
      continue;
    }
    if (arg !== '-' && arg.startsWith('-')) throw new UsageError(`unknown option ${arg}`);
    if (args.file !== undefined) throw new UsageError(`unexpected argument ${arg}`);
    args.file = arg;
  }
  return args;
}
