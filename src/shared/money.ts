export function formatMoney(value: number): string {
  const safe = Number.isFinite(value) ? value : 0;
  return safe.toFixed(2);
}

export function toCents(value: number): number {
  return Math.round(value * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

/** Snaps a float amount to whole cents. */
export function roundMoney(value: number): number {
  return fromCents(toCents(value));
}

export function lineTotal(quantity: number, price: number): number {
  return roundMoney(quantity * price);
}

// Summed in cents so 3 x 0.10 stays 0.30.
export function sumLineTotals(lines: Array<{ quantity: number; price: number }>): number {
  return fromCents(lines.reduce((sum, line) => sum + toCents(line.quantity * line.price), 0));
}

export function sumMoney(values: number[]): number {
  return fromCents(values.reduce((sum, value) => sum + toCents(value), 0));
}
