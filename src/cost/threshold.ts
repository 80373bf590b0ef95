// Anything at or below one cent is treated as zero, at every grouping level.
export const MIN_COST = 0.01;

export const isBillable = (cost: number) => Number.isFinite(cost) && cost > MIN_COST;
