import chalk from 'chalk';

export type Palette = {
  info: (s: string) => string;
  success: (s: string) => string;
  warn: (s: string) => string;
  error: (s: string) => string;
  dim: (s: string) => string;
  bold: (s: string) => string;
};

export function wantsNoColor(argv: readonly string[] = process.argv): boolean {
  return !!process.env.NO_COLOR || argv.includes('--no-color');
}

export function getPalette(noColor = wantsNoColor()): Palette {
  const c = new chalk.Instance({ level: noColor ? 0 : 3 });
  const theme = (process.env.CLI_THEME || 'neo').toLowerCase();
  if (theme === 'mono') {
    return {
      info: c.white,
      success: c.white,
      warn: c.white,
      error: c.white,
      dim: c.gray,
      bold: c.bold,
    };
  }
  // neo (default)
  return {
    info: c.cyan,
    success: c.green,
    warn: c.yellow,
    error: c.red,
    dim: c.gray,
    bold: c.bold,
  };
}
