import { Command, InvalidArgumentError } from 'commander';
import { DEFAULT_DAYS, loadConfig, parseDays, type RawOptions } from './config';
import { type CostExplorerApi, createCostExplorerClient } from './cost/fetcher';
import { runReport } from './handler';
import { consoleWriter, type OutputWriter } from './output/writer';

export type ProgramDeps = {
  run?: typeof runReport;
  createClient?: (region: string) => CostExplorerApi;
  writer?: OutputWriter;
  env?: NodeJS.ProcessEnv;
  exit?: (code: number) => void;
};

const toDays = (value: string) => {
  try {
    return parseDays(value);
  } catch {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
};

export const createProgram = (deps: ProgramDeps = {}) => {
  const {
    run = runReport,
    createClient = createCostExplorerClient,
    writer = consoleWriter,
    env = process.env,
    exit = (code) => {
      process.exitCode = code;
    },
  } = deps;

  return new Command()
    .name('aws-cost-breakdown')
    .description('AWS cost breakdown by service and usage type')
    .version('1.0.0')
    .option('--json', 'output in JSON format')
    .option('-d, --days <days>', 'number of trailing days to analyze', toDays, DEFAULT_DAYS)
    .option(
      '-r, --region <region>',
      'Cost Explorer region (default: $COST_EXPLORER_REGION or us-east-1)'
    )
    .option('--no-color', 'disable colored output')
    .action(async (options: RawOptions) => {
      const config = loadConfig(options, env);
      exit(await run(config, { client: createClient(config.region), writer }));
    });
};
