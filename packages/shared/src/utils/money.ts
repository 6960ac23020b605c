/** Largest amount a `numeric(12,2)` column holds. */
export const MAX_AMOUNT_CENTS = 999_999_999_999;

/** Up to ten integer digits and two fraction digits, matching `numeric(12,2)`. */
export const DECIMAL_AMOUNT = /^\d{1,10}(\.\d{1,2})?$/;

const DECIMAL = /^(\d+)(?:\.(\d{1,2}))?$/;

/** Parses a decimal string such as "19.99" into integer cents. */
export const toCents = (amount: string): number => {
  const match = DECIMAL.exec(amount.trim());
  if (!match) {
    throw new RangeError(`Not a decimal amount: "${amount}"`);
  }
  const whole = match[1];
  if (whole.length > 10) {
    throw new RangeError(`Amount out of range: "${amount}"`);
  }
  const fraction = (match[2] ?? '').padEnd(2, '0');
  return Number(whole) * 100 + Number(fraction);
};

export const formatCents = (cents: number): string => {
  const whole = Math.floor(cents / 100);
  const fraction = String(cents % 100).padStart(2, '0');
  return `${whole}.${fraction}`;
};
