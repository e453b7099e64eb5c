/**
 * Value following `flag` in an argv list. A missing value, or another
 * `--flag` in its place, reads as undefined.
 */
export function flagValue(argv: string[], flag: string): string | undefined {
  const idx = argv.indexOf(flag);
  const value = idx !== -1 && idx + 1 < argv.length ? argv[idx + 1] : undefined;
  return value !== undefined && !value.startsWith('--') ? value : undefined;
}
