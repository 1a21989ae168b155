import { z } from 'zod';
import { err, ok, type Result } from 'neverthrow';
import { InvalidArgumentError } from '../errors.js';
import {
  DATA_DIR,
  DEFAULT_API_KEY,
  DEFAULT_BASE_URL,
  ERROR_LOG,
  LOG_LEVEL,
  REQUEST_TIMEOUT_MS
} from './constants.js';

export const settingsSchema = z.object({
  baseUrl: z.string().url(),
  apiKey: z.string().min(1),
  dataDir: z.string().min(1),
  logFile: z.string().min(1),
  timeoutMs: z.number().int().positive(),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
  logToConsole: z.boolean(),
  warnOutsideRange: z.boolean()
});

export type Settings = z.infer<typeof settingsSchema>;

export const defaultSettings = {
  baseUrl: DEFAULT_BASE_URL,
  apiKey: DEFAULT_API_KEY,
  dataDir: DATA_DIR,
  logFile: ERROR_LOG,
  timeoutMs: REQUEST_TIMEOUT_MS,
  logLevel: LOG_LEVEL,
  logToConsole: true,
  warnOutsideRange: false
};

/**
 * Merges command-line overrides over the environment defaults.
 * Keys whose override is `undefined` keep their default.
 */
export function loadSettings(
  overrides: { [K in keyof Settings]?: Settings[K] | undefined } = {}
): Result<Settings, InvalidArgumentError> {
  const given = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const parsed = settingsSchema.safeParse({ ...defaultSettings, ...given });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    return err(new InvalidArgumentError(`Invalid configuration: ${details}`));
  }
  return ok(parsed.data);
}
