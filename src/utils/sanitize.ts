/**
 * Escaping and validation helpers for text that crosses the tmux boundary
 */

/**
 * Escape a string for safe use in shell commands
 * Uses single quotes which prevent all expansions in bash
 */
export function escapeShellArg(arg: string): string {
  // If the string is empty, return empty quotes
  if (arg.length === 0) {
    return "''";
  }

  // Check if escaping is needed
  if (/[^a-zA-Z0-9_\-./]/.test(arg)) {
    // Use single quotes and escape single quotes by ending quote, adding escaped quote, starting new quote
    return `'${arg.replace(/'/g, "'\\''")}'`;
  }

  // No escaping needed for safe characters
  return arg;
}

/**
 * Escape one argv entry for the tmux command parser.
 *
 * tmux treats an argument ending in `;` as a command separator and turns a
 * trailing `\;` into a plain `;`. Inserting a backslash before the final
 * semicolon keeps it as data.
 */
export function escapeTmuxArgument(arg: string): string {
  if (!arg.endsWith(';')) {
    return arg;
  }
  return `${arg.slice(0, -1)}\\;`;
}

/**
 * Inverse of escapeTmuxArgument: the value tmux hands to the command.
 * Returns null when the argument would be read as a command separator.
 */
export function parseTmuxArgument(arg: string): string | null {
  if (!arg.endsWith(';')) {
    return arg;
  }

  const body = arg.slice(0, -1);
  if (body.endsWith('\\')) {
    return `${body.slice(0, -1)};`;
  }
  return null;
}

/**
 * Find the first control byte that a terminal would act on instead of
 * displaying. Tab and line feed are allowed. Returns -1 when none.
 */
export function findControlByte(text: string): number {
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if ((code < 32 && code !== 9 && code !== 10) || code === 127) {
      return i;
    }
  }
  return -1;
}

/**
 * Signal names travel through a shell command line and the tmux argv
 */
export function isSafeSignalName(name: string): boolean {
  return /^[A-Za-z0-9_.-]{1,128}$/.test(name);
}
