import chalk from 'chalk';

export type Palette = {
  label: (s: string) => string;
  value: (s: string) => string;
  error: (s: string) => string;
  dim: (s: string) => string;
};

export function getPalette(color: boolean): Palette {
  const c = new chalk.Instance({ level: color ? 3 : 0 });
  return {
    label: c.cyan,
    value: c.bold,
    error: c.red,
    dim: c.gray,
  };
}
