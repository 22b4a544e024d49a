import chalk from 'chalk';

export type Palette = {
  info: (s: string) => string;
  success: (s: string) => string;
  warn: (s: string) => string;
  error: (s: string) => string;
  dim: (s: string) => string;
  redSuit: (s: string) => string;
  blackSuit: (s: string) => string;
};

export function colorDisabled(argv: readonly string[] = process.argv) {
  return !!process.env.NO_COLOR || argv.includes('--no-color');
}

export function getPalette(noColor = colorDisabled()): Palette {
  const c = new chalk.Instance({ level: noColor ? 0 : 3 });
  const theme = (process.env.CLI_THEME || 'felt').toLowerCase();
  if (theme === 'mono') {
    return {
      info: c.white,
      success: c.white,
      warn: c.white,
      error: c.white,
      dim: c.gray,
      redSuit: c.white,
      blackSuit: c.white,
    };
  }
  // felt (default): green table, red/white suits
  return {
    info: c.cyan,
    success: c.green,
    warn: c.yellow,
    error: c.red,
    dim: c.gray,
    redSuit: c.redBright,
    blackSuit: c.whiteBright,
  };
}
