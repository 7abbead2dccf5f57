import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { openSession, resolveBackendPath, runOperation } from '../../src/cli/session.js';
import { DaemonError } from '../../src/utils/errors.js';
import { createTestContext } from '../helpers/recording-ports.js';
import { SAMPLE_MANIFEST } from '../helpers/session.js';

describe('update sessions', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pkupdates-session-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('finds backend.json in the pkupdates directory by default', async () => {
    await writeFile(join(dir, 'backend.json'), JSON.stringify(SAMPLE_MANIFEST));
    const ctx = createTestContext({ directories: { config: dir, state: dir } });

    assert.equal(await resolveBackendPath(ctx), join(dir, 'backend.json'));
  });

  it('fails with a hint when there is no backend', async () => {
    const ctx = createTestContext({ directories: { config: dir, state: dir } });

    await assert.rejects(resolveBackendPath(ctx, join(dir, 'missing.json')), (error: unknown) =>
      error instanceof DaemonError && error.message.includes('Hint: pass --backend <file>')
    );
  });

  it('runs a check over the manifest backend', async () => {
    const backend = join(dir, 'custom.json');
    await writeFile(backend, JSON.stringify(SAMPLE_MANIFEST));
    const ctx = createTestContext({ directories: { config: dir, state: dir } });
    const session = await openSession(ctx, backend);
    try {
      const result = await runOperation(session.coordinator, 'check', () => session.coordinator.checkUpdates(true, true));

      assert.deepEqual(result, { success: true, errors: [] });
      assert.equal(session.coordinator.count, 3);
      assert.notEqual(session.coordinator.lastRefreshTimestamp(), -1);
    } finally {
      session.close();
    }
  });
});
