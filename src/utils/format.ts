/**
 * Hover value format: three significant digits with locale separators
 */
export function formatValue(value: number, locale = 'en-US'): string {
  return new Intl.NumberFormat(locale, { maximumSignificantDigits: 3 }).format(value);
}

// Axis tick labels keep their decimals but get thousands separators
export function formatTick(value: number, locale = 'en-US'): string {
  return new Intl.NumberFormat(locale).format(value);
}

export function formatRounded(value: number, locale = 'en-US'): string {
  return new Intl.NumberFormat(locale, { maximumFractionDigits: 0 }).format(value);
}

export function formatDifference(delta: number, locale = 'en-US'): string {
  const sign = delta > 0 ? '+' : '';
  return `${sign}${formatRounded(delta, locale)}`;
}

export function formatHoverLabel(
  year: string,
  value: number,
  unitName: string | undefined,
  locale = 'en-US',
): string {
  const label = `${year}: ${formatValue(value, locale)}`;
  return unitName ? `${label} ${unitName}` : label;
}
