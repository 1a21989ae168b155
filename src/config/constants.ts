// Configuration constants
import path from 'path';

export const DEFAULT_BASE_URL = process.env.API_BASE_URL || 'http://localhost:8080';
export const DEFAULT_API_KEY = process.env.API_KEY || 'EXAMPLE_API_KEY';

export const DATA_DIR = path.resolve(process.env.DATA_DIR || 'data');
export const ERROR_LOG = path.resolve(process.env.ERROR_LOG || 'error.log');

export const REQUEST_TIMEOUT_MS = parseInt(process.env.REQUEST_TIMEOUT_MS || '15000', 10);

export const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

// Window the service has data for. Dates outside it are only warned about.
export const SERVICE_RANGE_START = '2025-01-01';
export const SERVICE_RANGE_END = '2025-09-15';
