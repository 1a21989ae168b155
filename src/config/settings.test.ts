import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { defaultSettings, loadSettings } from './settings.js';

describe('loadSettings', () => {
  it('uses the environment defaults when nothing is overridden', () => {
    const settings = loadSettings()._unsafeUnwrap();
    assert.equal(settings.baseUrl, defaultSettings.baseUrl);
    assert.equal(settings.apiKey, defaultSettings.apiKey);
    assert.equal(settings.logToConsole, true);
    assert.equal(settings.warnOutsideRange, false);
  });

  it('ignores overrides left undefined', () => {
    const settings = loadSettings({ baseUrl: undefined, apiKey: 'test-key' })._unsafeUnwrap();
    assert.equal(settings.baseUrl, defaultSettings.baseUrl);
    assert.equal(settings.apiKey, 'test-key');
  });

  it('applies command-line overrides', () => {
    const settings = loadSettings({
      baseUrl: 'http://rates.test:9000/',
      dataDir: '/tmp/out',
      warnOutsideRange: true,
      logToConsole: false
    })._unsafeUnwrap();
    assert.equal(settings.baseUrl, 'http://rates.test:9000/');
    assert.equal(settings.dataDir, '/tmp/out');
    assert.equal(settings.warnOutsideRange, true);
    assert.equal(settings.logToConsole, false);
  });

  it('rejects a base URL that is not a URL', () => {
    const error = loadSettings({ baseUrl: 'not a url' })._unsafeUnwrapErr();
    assert.equal(error.code, 'INVALID_ARGUMENT');
    assert.equal(error.message, 'Invalid configuration: baseUrl: Invalid url');
  });

  it('rejects an empty API key', () => {
    const error = loadSettings({ apiKey: '' })._unsafeUnwrapErr();
    assert.match(error.message, /^Invalid configuration: apiKey: /);
  });
});
