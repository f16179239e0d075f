/**
 * Console output helpers shared by the CLI commands.
 *
 * Everything here writes user-facing text to stdout; diagnostics go through
 * the stderr logger instead.
 */

export const SYMBOLS = {
  check: '\u2714',    // checkmark
  cross: '\u2718',    // cross
  warn: '\u26A0',     // warning sign
  arrow: '\u2192',    // right arrow
  bullet: '\u2022',   // bullet
  ellipsis: '\u2026', // ellipsis
  line: '\u2500',     // horizontal line
} as const;

export function banner(version: string): void {
  console.log();
  console.log(`  keyscribe v${version} ${SYMBOLS.bullet} media to markdown`);
  console.log(`  ${SYMBOLS.line.repeat(40)}`);
  console.log();
}

export function step(message: string): void {
  console.log(`  ${SYMBOLS.arrow} ${message}`);
}

export function success(message: string): void {
  console.log(`  ${SYMBOLS.check} ${message}`);
}

export function warn(message: string): void {
  console.log(`  ${SYMBOLS.warn} ${message}`);
}

export function fail(message: string): void {
  console.log(`  ${SYMBOLS.cross} ${message}`);
}
