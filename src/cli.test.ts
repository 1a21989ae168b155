import { after, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { run } from './cli.js';
import { createRateServiceStub, injectFetch } from './testing/rateServiceStub.js';

const root = mkdtempSync(path.join(os.tmpdir(), 'fx-cli-'));
const app = createRateServiceStub({
  apiKey: 'test-key',
  rates: {
    'USD_EUR_2025-06-01': 1.08,
    'USD_EUR_2025-09-15': 1.17,
    'USD_EUR_2025-10-01': 1.16,
    'EUR_RON_2025-03-01': 4.97,
    'EUR_RON_2025-03-03': 4.98
  }
});
let counter = 0;

after(async () => {
  await app.close();
  rmSync(root, { recursive: true, force: true });
});

async function cli(...args: string[]) {
  const dir = path.join(root, `run-${++counter}`);
  const out: string[] = [];
  const errors: string[] = [];
  const code = await run(
    [
      '--base-url', 'http://rates.test',
      '--api-key', 'test-key',
      '--data-dir', path.join(dir, 'data'),
      '--log-file', path.join(dir, 'error.log'),
      '--quiet-log',
      ...args
    ],
    {
      fetch: injectFetch(app),
      print: line => out.push(line),
      printError: line => errors.push(line)
    }
  );
  return { code, out, errors, dataDir: path.join(dir, 'data'), logFile: path.join(dir, 'error.log') };
}

describe('cli', () => {
  it('saves a single query and exits 0', async () => {
    const { code, out, errors, dataDir } = await cli('--from', 'usd', '--to', 'eur', '--date', '2025-06-01');

    assert.equal(code, 0);
    assert.deepEqual(errors, []);
    const file = path.join(dataDir, 'USD_EUR_2025-06-01.json');
    assert.deepEqual(JSON.parse(readFileSync(file, 'utf-8')), {
      error: '',
      data: { from: 'USD', to: 'EUR', rate: 1.08, date: '2025-06-01' }
    });
    assert.deepEqual(out, [
      '→ Requesting: http://rates.test/?from=USD&to=EUR&date=2025-06-01',
      `✅ Saved to ${file}`
    ]);
  });

  it('exits 1 when the single query fails', async () => {
    const { code, errors, dataDir, logFile } = await cli('--from', 'USD', '--to', 'EUR', '--date', '2025-06-02');

    assert.equal(code, 1);
    assert.deepEqual(errors, ['✗ Service error: No rate for USD/EUR on 2025-06-02']);
    assert.equal(existsSync(dataDir), false);
    assert.match(readFileSync(logFile, 'utf-8'), /\[ERROR\] USD\/EUR 2025-06-02 failed while requesting/);
  });

  it('asks for the latest rate and names the file after its date', async () => {
    const { code, out, errors, dataDir } = await cli('--from', 'USD', '--to', 'EUR', '--latest');

    assert.equal(code, 0);
    assert.deepEqual(errors, []);
    const file = path.join(dataDir, 'USD_EUR_2025-09-15.json');
    assert.deepEqual(out, ['→ Requesting: http://rates.test/?from=USD&to=EUR', `✅ Saved to ${file}`]);
    assert.equal(JSON.parse(readFileSync(file, 'utf-8')).data.rate, 1.17);
  });

  it('warns about a date outside the service window when asked', async () => {
    const { code, out } = await cli('--from', 'USD', '--to', 'EUR', '--date', '2025-10-01', '--warn-outside-range');

    assert.equal(code, 0);
    assert.equal(out[0], '⚠️  2025-10-01 is outside the suggested test range 2025-01-01..2025-09-15');
    assert.equal(out[1], '→ Requesting: http://rates.test/?from=USD&to=EUR&date=2025-10-01');
  });

  it('exits 1 when the log file cannot be opened', async () => {
    const dir = path.join(root, 'blocked');
    mkdirSync(dir, { recursive: true });
    const blocker = path.join(dir, 'blocker');
    writeFileSync(blocker, 'a regular file');
    const logFile = path.join(blocker, 'error.log');

    const { code, out, errors, dataDir } = await cli(
      '--log-file', logFile,
      '--from', 'USD', '--to', 'EUR', '--date', '2025-06-01'
    );

    assert.equal(code, 1);
    assert.deepEqual(out, []);
    assert.equal(errors.length, 1);
    assert.ok(errors[0].startsWith(`✗ Could not open log file ${logFile}: `), errors[0]);
    assert.equal(existsSync(dataDir), false);
  });

  it('exits 1 when single-mode arguments are missing', async () => {
    const { code, errors } = await cli('--from', 'USD', '--to', 'EUR');

    assert.equal(code, 1);
    assert.deepEqual(errors, ['✗ Provide --from, --to, and --date (YYYY-MM-DD)']);
  });

  it('exits 0 from a batch with failed dates', async () => {
    const { code, out, dataDir } = await cli(
      '--from', 'EUR', '--to', 'RON',
      '--start-date', '2025-03-01', '--end-date', '2025-03-03', '--num-dates', '3'
    );

    assert.equal(code, 0);
    assert.deepEqual(readdirSync(dataDir).sort(), ['EUR_RON_2025-03-01.json', 'EUR_RON_2025-03-03.json']);
    assert.ok(out.includes('❌ 2025-03-02: Service error: No rate for EUR/RON on 2025-03-02'));
  });

  it('exits 1 on incomplete batch arguments', async () => {
    const { code, errors, dataDir } = await cli('--from', 'EUR', '--to', 'RON', '--num-dates', '3');

    assert.equal(code, 1);
    assert.deepEqual(errors, ['✗ For batch mode provide --from, --to, --start-date, --end-date, --num-dates']);
    assert.equal(existsSync(dataDir), false);
  });

  it('rejects an invalid base URL', async () => {
    const { code, errors } = await cli('--base-url', 'nowhere', '--from', 'USD', '--to', 'EUR', '--date', '2025-06-01');

    assert.equal(code, 1);
    assert.deepEqual(errors, ['✗ Invalid configuration: baseUrl: Invalid url']);
  });

  it('hands unknown options back to commander', async () => {
    const { code, errors } = await cli('--bogus');

    assert.equal(code, 1);
    assert.equal(errors.length, 1);
    assert.match(errors[0], /^error: unknown option '--bogus'/);
  });
});
