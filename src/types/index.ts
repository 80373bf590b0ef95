export type CostRecord = {
  readonly date: string;
  readonly service: string;
  readonly usageType: string;
  readonly cost: number;
};

export type UsageTypeCost = {
  name: string;
  cost: number;
};

export type ServiceSummary = {
  name: string;
  cost: number;
  percentage: number;
  usageTypes: UsageTypeCost[];
};

type DailyServiceCost = {
  name: string;
  cost: number;
};

export type DailySummary = {
  date: string;
  services: DailyServiceCost[];
};

export type Report = {
  totalCost: number;
  services: ServiceSummary[];
  dailyCosts: DailySummary[];
};

export type ReportWindow = {
  start: string;
  end: string;
};

export type ReportOutcome =
  | { kind: 'report'; window: ReportWindow; report: Report }
  | { kind: 'empty'; window: ReportWindow }
  | { kind: 'failed'; window: ReportWindow; error: Error };

export type OutputMode = 'human' | 'json';

export type ReportConfig = {
  mode: OutputMode;
  days: number;
  region: string;
  color: boolean;
};
