/**
 * Output sink shared by the CLI and every command.
 *
 * Commands never touch `console` or `process` directly; tests swap in a
 * capturing runtime.
 */

export type RuntimeEnv = {
  /** Write a line to stdout. */
  log: (message: string) => void;
  /** Write a line to stderr. */
  error: (message: string) => void;
  /** Whether stderr supports ANSI colors. Only `[ERROR]` lines are colored. */
  colors: boolean;
};

function supportsColor(): boolean {
  if (process.env.NO_COLOR !== undefined) return false;
  if (process.env.FORCE_COLOR !== undefined) return process.env.FORCE_COLOR !== "0";
  return Boolean(process.stderr.isTTY);
}

export const defaultRuntime: RuntimeEnv = {
  log: (message) => {
    process.stdout.write(`${message}\n`);
  },
  error: (message) => {
    process.stderr.write(`${message}\n`);
  },
  colors: supportsColor(),
};
