// Type definitions
import type { AppError } from '../errors.js';

export interface RateData {
  from: string;
  to: string;
  rate: number;
  date: string;
}

export interface RateEnvelope {
  error: string;
  data: RateData | null;
}

export type JsonObject = { [key: string]: unknown };

/** A successful service answer: the validated envelope and the body exactly as it was parsed. */
export interface RateReply {
  envelope: RateEnvelope & { data: RateData };
  body: JsonObject;
}

/** `date` absent asks the service for its latest rate. */
export interface RateQuery {
  readonly from: string;
  readonly to: string;
  readonly date?: string;
}

export type QueryStage = 'validating' | 'requesting' | 'persisting' | 'done' | 'failed';

export interface QueryInput {
  from?: string;
  to?: string;
  date?: string;
  latest?: boolean;
}

export interface BatchInput {
  from?: string;
  to?: string;
  startDate?: string;
  endDate?: string;
  numDates?: string;
}

export interface QuerySuccess {
  query: RateQuery;
  url: string;
  path: string;
  rate: number;
}

export interface QueryFailure {
  /** Stage the query was in when it failed. */
  stage: Exclude<QueryStage, 'done' | 'failed'>;
  error: AppError;
  date?: string;
}

export interface BatchSummary {
  from: string;
  to: string;
  attempted: string[];
  succeeded: QuerySuccess[];
  failed: QueryFailure[];
}
