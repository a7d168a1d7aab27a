export type Theme = {
  error: (s: string) => string;
};

export const theme: Theme = {
  error: (s) => `\x1b[31m${s}\x1b[0m`,
};

const identity = (s: string) => s;

export const plainTheme: Theme = {
  error: identity,
};

export function themeFor(colors: boolean): Theme {
  return colors ? theme : plainTheme;
}
