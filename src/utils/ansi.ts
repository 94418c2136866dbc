/**
 * Terminal control sequence stripping for captured pane text
 */

// eslint-disable-next-line no-control-regex
const CURSOR_FORWARD = /\x1B\[(\d*)C/g;
// CSI, OSC (BEL or ST terminated) and two-byte escapes
// eslint-disable-next-line no-control-regex
const ESCAPE_SEQUENCE = /\x1B(?:\[[0-9;?<=>!]*[ -/]*[@-~]|\][^\x07\x1B]*(?:\x07|\x1B\\)|[@-Z\\-_])/g;
// eslint-disable-next-line no-control-regex
const STRAY_CONTROL = /[\x00-\x08\x0B-\x1F\x7F]/g;

/**
 * Strip ANSI escape codes from a single line.
 * Cursor-forward moves become spaces so column layout survives.
 */
export function stripAnsiLine(line: string): string {
  return line
    .replace(CURSOR_FORWARD, (_match, count: string) => ' '.repeat(parseInt(count, 10) || 1))
    .replace(ESCAPE_SEQUENCE, '')
    .replace(STRAY_CONTROL, '');
}

/**
 * Strip every line independently; count and order are unchanged
 */
export function stripAnsiLines(lines: readonly string[]): string[] {
  return lines.map(stripAnsiLine);
}
