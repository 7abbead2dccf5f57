/**
 * Tests for ExecutionContext module
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { createExecutionContext } from '../../src/core/execution-context.js';

describe('ExecutionContext', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'pkupdates-ctx-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('createExecutionContext', () => {
    it('resolves directories under the given home and loads the config', async () => {
      const home = join(testDir, 'home');
      const context = await createExecutionContext({ home });

      assert.deepEqual(context.directories, { config: home, state: home });
      assert.equal(context.config.cacheMaxAgeMinutes, 60);
      assert.ok(existsSync(join(home, 'config.jsonc')));
    });

    it('is non-interactive unless asked', async () => {
      const home = join(testDir, 'home');
      assert.equal((await createExecutionContext({ home })).interactive, false);
      assert.equal((await createExecutionContext({ home, interactive: true })).interactive, true);
    });
  });
});
