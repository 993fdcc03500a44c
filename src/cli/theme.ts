import chalk from 'chalk';

type Paint = (s: string) => string;

export type Palette = {
  gradient: [string, string];
  info: Paint;
  success: Paint;
  warn: Paint;
  error: Paint;
  dim: Paint;
  title: Paint;
};

export function colorDisabled(): boolean {
  const v = process.env.NO_COLOR;
  return (!!v && v !== '0') || process.argv.includes('--no-color');
}

export function getPalette(noColor = colorDisabled(), theme = process.env.CLI_THEME || 'neo'): Palette {
  const c = new chalk.Instance({ level: noColor ? 0 : 3 });
  switch (theme.toLowerCase()) {
    case 'mono':
      return {
        gradient: ['#777777', '#bbbbbb'],
        info: c.white,
        success: c.white,
        warn: c.white,
        error: c.white,
        dim: c.gray,
        title: c.bold,
      };
    case 'solarized':
      return {
        gradient: ['#268bd2', '#2aa198'],
        info: c.cyan,
        success: c.green,
        warn: c.yellow,
        error: c.red,
        dim: c.gray,
        title: c.bold.blue,
      };
    default:
      // neo: felt green into gold
      return {
        gradient: ['#0b6623', '#d4af37'],
        info: c.cyan,
        success: c.green,
        warn: c.yellow,
        error: c.red,
        dim: c.gray,
        title: c.bold.cyan,
      };
  }
}
