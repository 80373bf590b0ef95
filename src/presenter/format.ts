const currency = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export const formatCurrency = (amount: number) => `$${currency.format(amount)}`;

export const formatPercent = (percent: number) => `${percent.toFixed(1)}%`;
