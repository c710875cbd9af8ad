import chalk from 'chalk';

/** Styling used by the renderers. Pass `new chalk.Instance({ level: 0 })` for plain text. */
export type Colors = chalk.Chalk;

export const defaultColors: Colors = chalk;

export function plainColors(): Colors {
    return new chalk.Instance({ level: 0 });
}
