import type { CostRecord, ReportConfig, ReportOutcome, ReportWindow } from '@/types';
import pc from 'picocolors';
import { aggregate } from '../cost/aggregator';
import { type CostExplorerApi, fetchCostRecords } from '../cost/fetcher';
import { describeError, FetchError } from '../errors';
import type { OutputWriter } from '../output/writer';
import { present, presentHeader } from '../presenter';
import moment = require('moment');

const dateFormat = 'YYYY-MM-DD';

export type ReportDeps = {
  client: CostExplorerApi;
  writer: OutputWriter;
  now?: () => Date;
};

export const reportWindow = (days: number, now: Date = new Date()): ReportWindow => ({
  start: moment(now).subtract(days, 'days').format(dateFormat),
  end: moment(now).format(dateFormat),
});

/**
 * Fetches, aggregates and presents one report. In human mode the period
 * header is printed before the fetch starts. Resolves with the exit code:
 * 0 when a report (or an empty result) was printed, 1 when fetching failed.
 */
export const runReport = async (config: ReportConfig, deps: ReportDeps): Promise<number> => {
  const { client, writer, now = () => new Date() } = deps;
  const window = reportWindow(config.days, now());
  const colors = pc.createColors(config.color && pc.isColorSupported);

  if (config.mode === 'human') {
    presentHeader(window, colors, writer);
    writer.error(colors.cyan('Fetching AWS cost data...'));
  }

  const outcome = await collect(client, window, writer);
  present(outcome, { mode: config.mode, colors }, writer);

  return outcome.kind === 'failed' ? 1 : 0;
};

const collect = async (
  client: CostExplorerApi,
  window: ReportWindow,
  writer: OutputWriter
): Promise<ReportOutcome> => {
  let records: CostRecord[];
  try {
    records = await fetchCostRecords(client, window.start, window.end);
  } catch (err) {
    const error =
      err instanceof FetchError ? err : new FetchError(describeError(err), { cause: err });
    writer.error(error.message);
    return { kind: 'failed', window, error };
  }

  if (records.length === 0) {
    return { kind: 'empty', window };
  }
  return { kind: 'report', window, report: aggregate(records) };
};
