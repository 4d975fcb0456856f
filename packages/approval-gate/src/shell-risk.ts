/**
 * ledgergate approval gate — Shell Reversibility
 *
 * Advisory classification of shell commands. A command is treated as
 * irreversible when it contains any destructive verb, case-insensitively.
 * The result is shown to the reviewer; the gate never blocks on it.
 */

/** Substrings that mark a command as irreversible. 'rm ' keeps its trailing space. */
export const IRREVERSIBLE_PATTERNS: ReadonlyArray<string> = ['rm ', 'delete', 'drop', 'truncate', 'format'];

export function isReversibleCommand(command: string): boolean {
  const lowered = command.toLowerCase();
  return !IRREVERSIBLE_PATTERNS.some((p) => lowered.includes(p));
}
