import { Command, CommanderError } from 'commander';
import { describeError, isAppError } from './errors.js';
import { loadSettings } from './config/settings.js';
import {
  DATA_DIR,
  DEFAULT_BASE_URL,
  ERROR_LOG,
  SERVICE_RANGE_END,
  SERVICE_RANGE_START
} from './config/constants.js';
import { createAppLogger, type AppLogger } from './services/logger.service.js';
import ExchangeClient, { type FetchLike } from './services/exchangeClient.service.js';
import StorageService from './services/storage.service.js';
import QueryRunner from './services/queryRunner.service.js';

type CliOptions = {
  from?: string;
  to?: string;
  date?: string;
  latest?: boolean;
  startDate?: string;
  endDate?: string;
  numDates?: string;
  baseUrl?: string;
  apiKey?: string;
  dataDir?: string;
  logFile?: string;
  warnOutsideRange?: boolean;
  quietLog?: boolean;
};

export interface CliDeps {
  fetch?: FetchLike;
  print?: (line: string) => void;
  printError?: (line: string) => void;
}

export function buildProgram(): Command {
  return new Command()
    .name('fx-rate-fetcher')
    .description('Query the currency exchange service and save the JSON responses.')
    .option('--from <currency>', 'Currency to convert FROM (e.g., USD, EUR, RON)')
    .option('--to <currency>', 'Currency to convert TO (e.g., USD, EUR, RON)')
    .option('--date <date>', 'Date in YYYY-MM-DD')
    .option('--latest', 'Ask for the latest available rate instead of --date')
    .option('--start-date <date>', 'Batch mode: start date (YYYY-MM-DD)')
    .option('--end-date <date>', 'Batch mode: end date (YYYY-MM-DD)')
    .option('--num-dates <count>', 'Batch mode: number of evenly spaced dates (>=2)')
    .option('--base-url <url>', `Service base URL (default ${DEFAULT_BASE_URL}, env API_BASE_URL)`)
    .option('--api-key <key>', "API key sent as form field 'key' (default from env API_KEY)")
    .option('--data-dir <dir>', `Directory for saved responses (default ${DATA_DIR}, env DATA_DIR)`)
    .option('--log-file <file>', `Log file (default ${ERROR_LOG}, env ERROR_LOG)`)
    .option(
      '--warn-outside-range',
      `Warn when a date is outside ${SERVICE_RANGE_START}..${SERVICE_RANGE_END}`
    )
    .option('--quiet-log', 'Do not echo log lines to stderr')
    .exitOverride();
}

/** Runs the command line and resolves to the process exit code. */
export async function run(args: string[], deps: CliDeps = {}): Promise<number> {
  const print = deps.print ?? (line => console.log(line));
  const printError = deps.printError ?? (line => console.error(line));

  const program = buildProgram().configureOutput({
    writeErr: text => printError(text.trimEnd())
  });
  try {
    program.parse(args, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }
  const options = program.opts<CliOptions>();

  const settings = loadSettings({
    baseUrl: options.baseUrl,
    apiKey: options.apiKey,
    dataDir: options.dataDir,
    logFile: options.logFile,
    warnOutsideRange: options.warnOutsideRange,
    logToConsole: options.quietLog ? false : undefined
  });
  if (settings.isErr()) {
    printError(`✗ ${settings.error.message}`);
    return 1;
  }
  const config = settings.value;

  let appLogger: AppLogger;
  try {
    appLogger = createAppLogger({
      file: config.logFile,
      console: config.logToConsole,
      level: config.logLevel
    });
  } catch (error) {
    printError(`✗ Could not open log file ${config.logFile}: ${describeError(error)}`);
    return 1;
  }
  const { logger, close } = appLogger;

  try {
    const client = new ExchangeClient(logger, {
      apiKey: config.apiKey,
      timeoutMs: config.timeoutMs,
      fetch: deps.fetch
    });
    const storage = new StorageService(logger, config.dataDir);
    const runner = new QueryRunner(logger, client, storage, {
      baseUrl: config.baseUrl,
      warnOutsideRange: config.warnOutsideRange,
      print
    });

    if (options.startDate || options.endDate || options.numDates) {
      const batch = await runner.runBatch({
        from: options.from,
        to: options.to,
        startDate: options.startDate,
        endDate: options.endDate,
        numDates: options.numDates
      });
      if (batch.isErr()) {
        printError(`✗ ${batch.error.message}`);
        return 1;
      }
      return 0;
    }

    const single = await runner.runSingle({
      from: options.from,
      to: options.to,
      date: options.date,
      latest: options.latest
    });
    if (single.isErr()) {
      printError(`✗ ${single.error.error.message}`);
      return 1;
    }
    return 0;
  } catch (error) {
    if (isAppError(error)) {
      logger.error(error.message);
      printError(`✗ ${error.message}`);
    } else {
      logger.error({ err: error }, `Unexpected failure: ${describeError(error)}`);
      printError(`✗ Unexpected failure: ${describeError(error)}`);
    }
    return 1;
  } finally {
    close();
  }
}
