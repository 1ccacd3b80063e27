import chalk from 'chalk';

export type Palette = {
  info: (s: string) => string;
  warn: (s: string) => string;
  error: (s: string) => string;
  dim: (s: string) => string;
  bold: (s: string) => string;
};

export function getPalette(noColor: boolean): Palette {
  const c = new chalk.Instance({ level: noColor ? 0 : 3 });
  return {
    info: c.cyan,
    warn: c.yellow,
    error: c.red,
    dim: c.gray,
    bold: c.bold,
  };
}
