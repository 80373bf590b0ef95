import type { CostRecord } from '@/types';
import * as AWS from 'aws-sdk';
import { describeError, FetchError } from '../errors';
import { isBillable } from './threshold';

const METRIC = 'UnblendedCost';
const UNKNOWN_USAGE_TYPE = 'N/A';

/**
 * The slice of the Cost Explorer client the fetcher depends on.
 * `AWS.CostExplorer` satisfies it; tests pass an in-process fake.
 */
export interface CostExplorerApi {
  getCostAndUsage(params: AWS.CostExplorer.GetCostAndUsageRequest): {
    promise(): Promise<AWS.CostExplorer.GetCostAndUsageResponse>;
  };
}

// Cost Explorer only answers in us-east-1.
export const DEFAULT_REGION = 'us-east-1';

export const createCostExplorerClient = (region: string = DEFAULT_REGION): CostExplorerApi =>
  new AWS.CostExplorer({ region });

/**
 * Fetches daily unblended cost grouped by service and usage type for
 * `[startDate, endDate)`, following every result page, and flattens it into
 * one record per (date, service, usage type).
 *
 * Rejects with {@link FetchError} on any client error; no partial result is returned.
 */
export const fetchCostRecords = async (
  client: CostExplorerApi,
  startDate: string,
  endDate: string
): Promise<CostRecord[]> => {
  if (startDate > endDate) {
    throw new FetchError(`Invalid date range: ${startDate} is after ${endDate}`);
  }

  const records: CostRecord[] = [];
  let nextPageToken: string | undefined;

  do {
    let page: AWS.CostExplorer.GetCostAndUsageResponse;
    try {
      page = await client
        .getCostAndUsage({
          TimePeriod: {
            Start: startDate,
            End: endDate,
          },
          Granularity: 'DAILY',
          Metrics: [METRIC],
          GroupBy: [
            { Type: 'DIMENSION', Key: 'SERVICE' },
            { Type: 'DIMENSION', Key: 'USAGE_TYPE' },
          ],
          NextPageToken: nextPageToken,
        })
        .promise();
    } catch (err) {
      throw new FetchError(`Failed to fetch cost data: ${describeError(err)}`, { cause: err });
    }

    records.push(...flatten(page.ResultsByTime ?? []));
    nextPageToken = page.NextPageToken || undefined;
  } while (nextPageToken);

  return records;
};

const flatten = (results: AWS.CostExplorer.ResultByTime[]): CostRecord[] =>
  results.flatMap((r) => {
    const date = r.TimePeriod?.Start ?? '';
    return (r.Groups ?? [])
      .map((g) => ({
        date,
        service: g.Keys?.[0] ?? '',
        usageType: g.Keys?.[1] ?? UNKNOWN_USAGE_TYPE,
        cost: Number.parseFloat(g.Metrics?.[METRIC]?.Amount || 'NaN'),
      }))
      .filter((record) => isBillable(record.cost));
  });
