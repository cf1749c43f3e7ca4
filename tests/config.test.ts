import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';
import { after, before, describe, it } from 'node:test';

import { DEFAULTS, configFromEnv, configFromJson, loadConfig, parseBool, parseCsv } from '../src/config.js';

import { makeWorkspace, removeWorkspace } from './helpers.js';

let dir: string;

before(async () => {
  dir = await makeWorkspace('termpilot-config-');
});

after(async () => {
  await removeWorkspace(dir);
});

describe('loadConfig', () => {
  it('uses defaults when the file is missing', async () => {
    const { config, configPath } = await loadConfig({ configPath: path.join(dir, 'missing.json'), env: {} });
    assert.deepEqual(config, DEFAULTS);
    assert.equal(configPath, path.join(dir, 'missing.json'));
  });

  it('layers file < env < cli', async () => {
    const file = path.join(dir, 'layered.json');
    await fs.writeFile(
      file,
      JSON.stringify({ model: 'file-model', endpoint: 'http://file:1/v1', max_iterations: 7, verbose: true })
    );
    const { config } = await loadConfig({
      configPath: file,
      env: { TERMPILOT_MODEL: 'env-model', TERMPILOT_MAX_ITERATIONS: '9' },
      cli: { model: 'cli-model' },
    });
    assert.equal(config.model, 'cli-model');
    assert.equal(config.max_iterations, 9);
    assert.equal(config.endpoint, 'http://file:1/v1');
    assert.equal(config.verbose, true);
    assert.equal(config.temperature, DEFAULTS.temperature);
  });

  it('ignores undefined cli values', async () => {
    const { config } = await loadConfig({
      configPath: path.join(dir, 'missing.json'),
      env: { TERMPILOT_MODEL: 'env-model' },
      cli: { model: undefined },
    });
    assert.equal(config.model, 'env-model');
  });

  it('fails on unparseable JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '{');
    await assert.rejects(
      () => loadConfig({ configPath: file, env: {} }),
      (e: unknown) => e instanceof Error && e.message.startsWith(`failed to load config ${file}: `)
    );
  });

  it('rejects out-of-range values', async () => {
    await assert.rejects(
      () => loadConfig({ configPath: path.join(dir, 'missing.json'), env: {}, cli: { max_iterations: 0 } }),
      /config: max_iterations must be a positive integer \(got 0\)/
    );
    await assert.rejects(
      () => loadConfig({ configPath: path.join(dir, 'missing.json'), env: { TERMPILOT_ENDPOINT: 'ftp://x' } }),
      /config: endpoint must be an http\(s\) URL/
    );
  });
});

describe('configFromJson', () => {
  it('skips keys of the wrong type', () => {
    assert.deepEqual(
      configFromJson({ model: 3, temperature: 0.5, context_file_names: ['A.md', 1], no_confirm: true }, 'test'),
      { temperature: 0.5, no_confirm: true }
    );
  });

  it('requires an object', () => {
    assert.throws(() => configFromJson([1], 'cfg.json'), /cfg\.json: config must be a JSON object/);
  });
});

describe('configFromEnv', () => {
  it('reads TERMPILOT_* and falls back to OPENAI_API_KEY', () => {
    assert.deepEqual(
      configFromEnv({
        OPENAI_API_KEY: 'test-secret',
        TERMPILOT_NO_CONFIRM: 'yes',
        TERMPILOT_GLOBAL_CONTEXTS: 'style, ops',
        TERMPILOT_TEMPERATURE: 'warm',
      }),
      { api_key: 'test-secret', no_confirm: true, global_contexts: ['style', 'ops'] }
    );
  });
});

describe('parsers', () => {
  it('parseBool accepts the usual spellings', () => {
    assert.equal(parseBool('ON'), true);
    assert.equal(parseBool('0'), false);
    assert.equal(parseBool('maybe'), undefined);
  });

  it('parseCsv drops blanks', () => {
    assert.deepEqual(parseCsv(' a, ,b '), ['a', 'b']);
    assert.equal(parseCsv(' , '), undefined);
  });
});
