import { mkdirSync, writeFileSync } from 'fs';
import path from 'path';
import type { Logger } from 'pino';
import { err, ok, type Result } from 'neverthrow';
import { PersistenceError, describeError } from '../errors.js';
import type { JsonObject } from '../types/index.js';
import { buildFileName } from './requestBuilder.service.js';

class StorageService {
  private dataDir: string;
  private logger: Logger;

  constructor(logger: Logger, dataDir: string) {
    this.logger = logger;
    this.dataDir = dataDir;
  }

  /** Writes the body to `{FROM}_{TO}_{DATE}.json`, replacing any earlier file for the same triple. */
  save(body: JsonObject, from: string, to: string, date: string): Result<string, PersistenceError> {
    const filePath = path.join(this.dataDir, buildFileName(from, to, date));
    try {
      mkdirSync(this.dataDir, { recursive: true });
      // JSON.stringify leaves non-ASCII characters unescaped
      writeFileSync(filePath, JSON.stringify(body, null, 2), 'utf-8');
    } catch (error) {
      return err(
        new PersistenceError(`Could not write ${filePath}: ${describeError(error)}`, { cause: error })
      );
    }
    this.logger.debug(`Wrote ${filePath}`);
    return ok(filePath);
  }
}

export default StorageService;
