// Amounts travel as 2-decimal numbers but are summed in integer cents so that
// section totals and their detail rows always agree.

export const toCents = (amount: number): number => Math.round(amount * 100);

export const fromCents = (cents: number): number => (cents === 0 ? 0 : cents / 100);

export const roundAmount = (amount: number): number => fromCents(toCents(amount));

export const sumAmounts = (amounts: Iterable<number>): number => {
  let cents = 0;
  for (const amount of amounts) {
    cents += toCents(amount);
  }

  return fromCents(cents);
};

export const addAmounts = (...amounts: number[]): number => sumAmounts(amounts);

export const subtractAmounts = (minuend: number, subtrahend: number): number =>
  fromCents(toCents(minuend) - toCents(subtrahend));

/** Coerces a loosely typed ledger amount into a signed decimal; absent values count as zero. */
export const coerceAmount = (value: number | string | null | undefined): number => {
  if (value === null || value === undefined || value === '') {
    return 0;
  }

  const numeric = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(numeric) ? roundAmount(numeric) : 0;
};
