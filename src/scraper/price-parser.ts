/**
 * Listing price normalization
 *
 * Turns display text such as "18 500 €", "€18,500.00" or "18.500,50 EUR"
 * into integer minor units (cents). Anything unparseable yields null.
 */

// First run of digits with the separators a display price may contain
const NUMBER_RUN = /\d[\d\s.,']*/;

export function parsePrice(text: string | null | undefined): number | null {
  if (!text) return null;

  const match = text.match(NUMBER_RUN);
  if (!match) return null;

  // Whitespace and apostrophes are only ever thousands separators
  let digits = match[0].replace(/[\s']/g, '');
  digits = digits.replace(/[.,]+$/, '');
  if (digits.length === 0) return null;

  const lastSeparator = Math.max(digits.lastIndexOf('.'), digits.lastIndexOf(','));
  let integerPart = digits;
  let fractionPart = '';

  if (lastSeparator !== -1) {
    const tail = digits.slice(lastSeparator + 1);
    // One or two trailing digits mark a decimal separator, three mark thousands
    if (tail.length <= 2) {
      integerPart = digits.slice(0, lastSeparator);
      fractionPart = tail;
    }
  }

  integerPart = integerPart.replace(/[.,]/g, '');
  if (integerPart.length === 0) integerPart = '0';

  const cents = Number(integerPart) * 100 + Number(fractionPart.padEnd(2, '0'));
  return Number.isSafeInteger(cents) ? cents : null;
}

/**
 * Format minor units for log lines and CLI output
 */
export function formatPrice(cents: number | null): string {
  if (cents === null) return 'n/a';
  const whole = Math.floor(cents / 100);
  const fraction = cents % 100;
  return fraction === 0 ? `${whole}` : `${whole}.${String(fraction).padStart(2, '0')}`;
}
