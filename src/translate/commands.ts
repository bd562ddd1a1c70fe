export type CommandInput = string | readonly string[];

/**
 * Accepts either a list of command lines or an indented multi-line script such as
 *
 *     enable
 *       configure
 *         daemon sleeper
 *
 * and returns the lines in order, each trimmed when the input was a script.
 */
export function splitCommands(commands: CommandInput): string[] {
  if (typeof commands === 'string') {
    return commands
      .trim()
      .split(/\r?\n/)
      .map((line) => line.trim());
  }
  return [...commands];
}
