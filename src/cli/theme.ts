import chalk from 'chalk';

export type Palette = {
  info: (s: string) => string;
  success: (s: string) => string;
  warn: (s: string) => string;
  error: (s: string) => string;
  dim: (s: string) => string;
  value: (s: string) => string;
};

const base = (noColor: boolean) => new chalk.Instance({ level: noColor ? 0 : 3 });

export function getPalette(noColor: boolean): Palette {
  const c = base(noColor);
  const theme = (process.env.CLI_THEME || 'neo').toLowerCase();
  if (theme === 'mono') {
    return {
      info: c.white,
      success: c.white,
      warn: c.white,
      error: c.white,
      dim: c.gray,
      value: c.bold,
    };
  }
  if (theme === 'solarized') {
    return {
      info: c.cyan,
      success: c.green,
      warn: c.yellow,
      error: c.red,
      dim: c.gray,
      value: c.bold.blue,
    };
  }
  // neo (default)
  return {
    info: c.cyan,
    success: c.green,
    warn: c.yellow,
    error: c.red,
    dim: c.gray,
    value: c.bold.cyanBright,
  };
}
