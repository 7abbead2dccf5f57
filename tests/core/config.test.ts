import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { ConfigManager, parseConfig } from '../../src/core/config.js';
import { readJsonOrJsoncFile } from '../../src/utils/fs.js';
import { ConfigError } from '../../src/utils/errors.js';

const DEFAULTS = {
  cacheMaxAgeMinutes: 60,
  checkOnBattery: true,
  checkOnMobile: false,
  retryUntrusted: true
};

describe('parseConfig', () => {
  it('merges known keys over the defaults and ignores the rest', () => {
    assert.deepEqual(
      parseConfig({ cacheMaxAgeMinutes: 5, checkOnMobile: true, theme: 'dark' }, 'test'),
      { ...DEFAULTS, cacheMaxAgeMinutes: 5, checkOnMobile: true }
    );
  });

  it('rejects values of the wrong type', () => {
    assert.throws(() => parseConfig({ cacheMaxAgeMinutes: -1 }, 'test'), /'cacheMaxAgeMinutes' must be a non-negative number/);
    assert.throws(() => parseConfig({ retryUntrusted: 'yes' }, 'test'), /'retryUntrusted' must be true or false/);
    assert.throws(() => parseConfig([], 'test'), ConfigError);
  });
});

describe('ConfigManager', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pkupdates-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes a commented default config on first load', async () => {
    const manager = new ConfigManager({ config: dir, state: dir });
    assert.deepEqual(await manager.load(), DEFAULTS);

    const path = join(dir, 'config.jsonc');
    assert.match(await readFile(path, 'utf8'), /\/\/ Allow automatic checks on battery power/);
    assert.deepEqual(await readJsonOrJsoncFile(path), DEFAULTS);
  });

  it('reads config.json when there is no config.jsonc', async () => {
    await writeFile(join(dir, 'config.json'), JSON.stringify({ checkOnBattery: false }));
    const manager = new ConfigManager({ config: dir, state: dir });

    assert.deepEqual(await manager.load(), { ...DEFAULTS, checkOnBattery: false });
  });

  it('fails on an invalid config file', async () => {
    await writeFile(join(dir, 'config.jsonc'), '{ "cacheMaxAgeMinutes": "soon" }');
    const manager = new ConfigManager({ config: dir, state: dir });

    await assert.rejects(manager.load(), /'cacheMaxAgeMinutes' must be a non-negative number/);
  });

  it('loads once and keeps the result', async () => {
    const manager = new ConfigManager({ config: dir, state: dir });
    const first = await manager.load();
    await writeFile(join(dir, 'config.jsonc'), '{ "checkOnMobile": true }');

    assert.equal(await manager.load(), first);
    assert.equal((await new ConfigManager({ config: dir, state: dir }).load()).checkOnMobile, true);
  });
});
