import type { Logger } from 'pino';
import { err, ok, type Result } from 'neverthrow';
import { InvalidArgumentError, type AppError } from '../errors.js';
import { SERVICE_RANGE_END, SERVICE_RANGE_START } from '../config/constants.js';
import type {
  BatchInput,
  BatchSummary,
  QueryFailure,
  QueryInput,
  QueryStage,
  QuerySuccess,
  RateQuery
} from '../types/index.js';
import type ExchangeClient from './exchangeClient.service.js';
import type StorageService from './storage.service.js';
import { buildUrl } from './requestBuilder.service.js';
import { evenlySpacedDates } from './dateSampler.service.js';
import {
  formatDate,
  isWithinServiceRange,
  parseDate,
  parseDateCount,
  validateCurrency
} from './validator.service.js';

export interface QueryRunnerOptions {
  baseUrl: string;
  warnOutsideRange?: boolean;
  /** Receives the user-facing progress lines. Defaults to console.log. */
  print?: (line: string) => void;
}

function attempt<T>(fn: () => T): Result<T, InvalidArgumentError> {
  try {
    return ok(fn());
  } catch (error) {
    if (error instanceof InvalidArgumentError) return err(error);
    throw error;
  }
}

function describeQuery(query: Pick<RateQuery, 'from' | 'to' | 'date'>): string {
  return `${query.from}/${query.to} ${query.date ?? 'latest'}`;
}

/**
 * Runs queries through validating -> requesting -> persisting -> done.
 * A failing stage ends that query in `failed`; whether the process goes on
 * is left to the caller (single mode stops, batch mode moves to the next date).
 */
class QueryRunner {
  private logger: Logger;
  private client: ExchangeClient;
  private storage: StorageService;
  private baseUrl: string;
  private warnOutsideRange: boolean;
  private print: (line: string) => void;

  constructor(
    logger: Logger,
    client: ExchangeClient,
    storage: StorageService,
    options: QueryRunnerOptions
  ) {
    this.logger = logger;
    this.client = client;
    this.storage = storage;
    this.baseUrl = options.baseUrl;
    this.warnOutsideRange = options.warnOutsideRange ?? false;
    this.print = options.print ?? (line => console.log(line));
  }

  private enter(label: string, stage: QueryStage): void {
    this.logger.debug(`${label}: ${stage}`);
  }

  private fail(
    label: string,
    stage: QueryFailure['stage'],
    error: AppError,
    date?: string
  ): Result<never, QueryFailure> {
    this.enter(label, 'failed');
    this.logger.error(`${label} failed while ${stage}: ${error.message}`);
    return err({ stage, error, date });
  }

  private warnIfOutOfRange(date: Date): void {
    if (!this.warnOutsideRange || isWithinServiceRange(date)) return;
    const message = `${formatDate(date)} is outside the suggested test range ${SERVICE_RANGE_START}..${SERVICE_RANGE_END}`;
    this.print(`⚠️  ${message}`);
    this.logger.warn(message);
  }

  private validate(input: QueryInput): Result<RateQuery, InvalidArgumentError> {
    return attempt<RateQuery>(() => {
      const from = validateCurrency(input.from, 'From');
      const to = validateCurrency(input.to, 'To');
      if (input.date === undefined) {
        return Object.freeze({ from, to });
      }
      const date = parseDate(input.date);
      this.warnIfOutOfRange(date);
      return Object.freeze({ from, to, date: formatDate(date) });
    });
  }

  async runOne(input: QueryInput): Promise<Result<QuerySuccess, QueryFailure>> {
    let label = describeQuery({ from: input.from ?? '?', to: input.to ?? '?', date: input.date });

    this.enter(label, 'validating');
    const validated = this.validate(input);
    if (validated.isErr()) {
      return this.fail(label, 'validating', validated.error, input.date);
    }
    const query = validated.value;
    label = describeQuery(query);

    this.enter(label, 'requesting');
    const url = buildUrl(this.baseUrl, query.from, query.to, query.date);
    this.print(`→ Requesting: ${url}`);
    this.logger.info(`Requesting ${url}`);
    const reply = await this.client.call(url);
    if (reply.isErr()) {
      return this.fail(label, 'requesting', reply.error, query.date);
    }

    this.enter(label, 'persisting');
    const { data } = reply.value.envelope;
    const date = query.date ?? data.date;
    const saved = this.storage.save(reply.value.body, query.from, query.to, date);
    if (saved.isErr()) {
      return this.fail(label, 'persisting', saved.error, date);
    }

    this.enter(label, 'done');
    this.print(`✅ Saved to ${saved.value}`);
    this.logger.info(`Saved ${query.from}/${query.to} ${date} (rate ${data.rate}) to ${saved.value}`);
    return ok({ query, url, path: saved.value, rate: data.rate });
  }

  async runSingle(input: QueryInput): Promise<Result<QuerySuccess, QueryFailure>> {
    if (!(input.from && input.to && (input.date || input.latest))) {
      const failure: QueryFailure = {
        stage: 'validating',
        error: new InvalidArgumentError('Provide --from, --to, and --date (YYYY-MM-DD)')
      };
      this.logger.error(failure.error.message);
      return err(failure);
    }
    if (input.date && input.latest) {
      const failure: QueryFailure = {
        stage: 'validating',
        error: new InvalidArgumentError('Use either --date or --latest, not both.'),
        date: input.date
      };
      this.logger.error(failure.error.message);
      return err(failure);
    }
    return this.runOne({ from: input.from, to: input.to, date: input.latest ? undefined : input.date });
  }

  /**
   * Checks every batch argument and samples the dates before the first
   * request goes out. Per-date failures are reported and skipped.
   */
  async runBatch(input: BatchInput): Promise<Result<BatchSummary, InvalidArgumentError>> {
    const { startDate, endDate, numDates } = input;
    if (!(input.from && input.to && startDate && endDate && numDates)) {
      const error = new InvalidArgumentError(
        'For batch mode provide --from, --to, --start-date, --end-date, --num-dates'
      );
      this.logger.error(error.message);
      return err(error);
    }

    const plan = attempt(() => {
      const from = validateCurrency(input.from, 'From');
      const to = validateCurrency(input.to, 'To');
      const start = parseDate(startDate, 'start-date');
      const end = parseDate(endDate, 'end-date');
      const dates = evenlySpacedDates(start, end, parseDateCount(numDates));
      return { from, to, start, end, dates: dates.map(formatDate) };
    });
    if (plan.isErr()) {
      this.logger.error(plan.error.message);
      return err(plan.error);
    }

    const { from, to, start, end, dates } = plan.value;
    const header = `Batch: ${from}/${to} ${formatDate(start)}..${formatDate(end)} in ${dates.length} steps`;
    this.print(header);
    this.logger.info(header);

    const summary: BatchSummary = { from, to, attempted: dates, succeeded: [], failed: [] };
    for (const date of dates) {
      const result = await this.runOne({ from, to, date });
      if (result.isOk()) {
        summary.succeeded.push(result.value);
      } else {
        summary.failed.push(result.error);
        this.print(`❌ ${date}: ${result.error.error.message}`);
      }
    }

    this.logger.info(
      `Batch finished: ${summary.succeeded.length} saved, ${summary.failed.length} failed`
    );
    return ok(summary);
  }
}

export default QueryRunner;
