export const CURRENCY = '$';

export function roundMoney(n: number): number {
  return Math.round((n + Number.EPSILON) * 100) / 100;
}

/** `$1,234.50`, negatives as `-$5.00` */
export function formatMoney(n: number): string {
  const abs = Math.abs(roundMoney(n)).toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
  return n < 0 && roundMoney(n) !== 0 ? `-${CURRENCY}${abs}` : `${CURRENCY}${abs}`;
}
