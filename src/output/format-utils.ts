/**
 * Shared formatting utilities for markdown and terminal output.
 */

/**
 * Compact number with a T/B/M/K suffix and one decimal; values under a
 * thousand keep two decimals. The sign goes before the prefix.
 *
 *   3498272000 → "$3.5B", -62800000 → "-$62.8M", 4.22 → "$4.22"
 */
export function formatCompact(value: number | null | undefined, prefix: string = '$', suffix: string = ''): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return 'N/A';

  const negative = value < 0;
  const abs = Math.abs(value);

  let formatted: string;
  if (abs >= 1e12) formatted = `${(abs / 1e12).toFixed(1)}T`;
  else if (abs >= 1e9) formatted = `${(abs / 1e9).toFixed(1)}B`;
  else if (abs >= 1e6) formatted = `${(abs / 1e6).toFixed(1)}M`;
  else if (abs >= 1e3) formatted = `${(abs / 1e3).toFixed(1)}K`;
  else formatted = abs.toFixed(2);

  return `${negative ? '-' : ''}${prefix}${formatted}${suffix}`;
}

/** Signed percent with one decimal: 9.3 → "+9.3%" */
export function formatSignedPct(value: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(1)}%`;
}

/** Pad a string to a minimum length, accounting for ANSI escape sequences */
export function padRight(str: string, len: number): string {
  const stripped = str.replace(/\x1b\[[0-9;]*m/g, '');
  const padding = Math.max(0, len - stripped.length);
  return str + ' '.repeat(padding);
}

/** Year of a YYYY-MM-DD date as a fiscal-year label: "FY2024" */
export function fiscalYearLabel(periodEnd: string): string {
  return `FY${periodEnd.slice(0, 4)}`;
}
