const formatters = new Map<string, Intl.NumberFormat>();

export const formatMinorUnits = (amount: number, currency = 'USD'): string => {
  let formatter = formatters.get(currency);
  if (!formatter) {
    formatter = new Intl.NumberFormat('en-US', { style: 'currency', currency });
    formatters.set(currency, formatter);
  }

  return formatter.format(amount / 100);
};

export const formatPercent = (value: number): string => `${value.toFixed(1)}%`;
