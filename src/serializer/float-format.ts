/**
 * Fixed-precision float text with trailing zeros trimmed:
 * 12.50 → "12.5", 12.00 → "12", 0.00 → "0".
 */
export function formatFloat(value: number, precision = 2): string {
  let text = value.toFixed(precision);
  if (!text.includes('.')) {
    return text;
  }
  let end = text.length;
  while (text[end - 1] === '0') end--;
  if (text[end - 1] === '.') end--;
  text = text.slice(0, end);
  return text;
}

export function formatInt(value: number): string {
  return Math.trunc(value).toString();
}
