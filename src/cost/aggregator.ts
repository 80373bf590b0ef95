import type { CostRecord, DailySummary, Report, ServiceSummary } from '@/types';
import { isBillable } from './threshold';

type Total = { name: string; cost: number };

/**
 * Sums `cost` per key, keeping keys in first-appearance order, then drops the
 * totals that fall to or below the threshold after summing.
 */
const sumBy = (records: readonly CostRecord[], keyOf: (r: CostRecord) => string): Total[] => {
  const totals = new Map<string, number>();
  for (const r of records) {
    const key = keyOf(r);
    totals.set(key, (totals.get(key) ?? 0) + r.cost);
  }
  return [...totals].map(([name, cost]) => ({ name, cost })).filter((t) => isBillable(t.cost));
};

// Array.prototype.sort is stable, so ties keep first-appearance order.
const byCostDesc = (a: Total, b: Total) => b.cost - a.cost;

const percentOf = (part: number, whole: number) => (whole === 0 ? 0 : (part / whole) * 100);

/** Share of a usage type within its service, in percent. */
export const usageShare = (usageCost: number, serviceCost: number) =>
  percentOf(usageCost, serviceCost);

export const aggregate = (input: readonly CostRecord[]): Report => {
  const records = input.filter((r) => isBillable(r.cost));

  const serviceTotals = sumBy(records, (r) => r.service).sort(byCostDesc);
  const totalCost = serviceTotals.reduce((sum, s) => sum + s.cost, 0);

  const services: ServiceSummary[] = serviceTotals.map((s) => ({
    name: s.name,
    cost: s.cost,
    percentage: percentOf(s.cost, totalCost),
    usageTypes: sumBy(
      records.filter((r) => r.service === s.name),
      (r) => r.usageType
    ).sort(byCostDesc),
  }));

  return { totalCost, services, dailyCosts: dailyCosts(records) };
};

const dailyCosts = (records: readonly CostRecord[]): DailySummary[] => {
  const byDate = new Map<string, CostRecord[]>();
  for (const r of records) {
    const day = byDate.get(r.date);
    if (day) {
      day.push(r);
    } else {
      byDate.set(r.date, [r]);
    }
  }

  return [...byDate.keys()]
    .sort()
    .map((date) => ({ date, services: sumBy(byDate.get(date) ?? [], (r) => r.service) }));
};
