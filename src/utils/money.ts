// Prices come out of NUMERIC(10,2) columns as decimal strings. Arithmetic on
// them is done in integer cents.

export const toCents = (amount: string | number | null | undefined): number => {
  if (amount === null || amount === undefined || amount === '') {
    return 0;
  }
  const value = typeof amount === 'number' ? amount : Number(amount);
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.round(value * 100);
};

export const formatCents = (cents: number): string => {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const whole = Math.floor(abs / 100);
  const fraction = (abs % 100).toString().padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
};
