/**
 * Parse a Steam market price string into a number.
 *
 * Currency symbols and labels vary by currency ("$1.23", "1,23€", "£0.03",
 * "CDN$ 1,234.56", "1.234,56€", "5,--€", "12 345,67 pуб."). The last
 * separator is the decimal point unless it is the only kind present and either
 * repeats or is followed by exactly three digits after a non-zero whole part,
 * in which case it groups thousands.
 */
export function parseMarketPrice(raw: string): number | null {
  let cleaned = raw.replace(/[^\d.,]/g, "");
  // "5,--€" leaves a dangling separator
  cleaned = cleaned.replace(/[.,]+$/, "");
  if (!/\d/.test(cleaned)) return null;

  const lastDot = cleaned.lastIndexOf(".");
  const lastComma = cleaned.lastIndexOf(",");
  const decimalIndex = Math.max(lastDot, lastComma);

  let normalized: string;
  if (decimalIndex === -1) {
    normalized = cleaned;
  } else {
    const separator = cleaned[decimalIndex];
    const fraction = cleaned.slice(decimalIndex + 1);
    const separatorCount = cleaned.split(separator).length - 1;
    const onlyOneKind = lastDot === -1 || lastComma === -1;
    const whole = cleaned.slice(0, decimalIndex).replace(/[.,]/g, "");
    // "0,125€" is never a thousands group
    const zeroWhole = /^0*$/.test(whole);

    if (onlyOneKind && (separatorCount > 1 || (fraction.length === 3 && !zeroWhole))) {
      normalized = cleaned.replace(/[.,]/g, "");
    } else {
      normalized = `${whole}.${fraction}`;
    }
  }

  const value = Number.parseFloat(normalized);
  return Number.isFinite(value) ? value : null;
}
