import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ManifestDaemon } from '../../../src/core/daemon/manifest-daemon.js';
import { parseBackendManifest } from '../../../src/core/daemon/manifest.js';
import type { DaemonEvent, DaemonTransaction } from '../../../src/core/daemon/types.js';

const BASH = 'bash;5.2;x86_64;main';
const DRIVER = 'driver;550;x86_64;nonfree';
const KERNEL = 'kernel;6.1;x86_64;main';

function createDaemon(overrides: Record<string, unknown> = {}): ManifestDaemon {
  return new ManifestDaemon(parseBackendManifest({
    updates: [
      { id: BASH, info: 'security', summary: 'GNU shell' },
      { id: DRIVER, info: 'normal', summary: 'Graphics driver', untrusted: true },
      { id: KERNEL, info: 'important', summary: 'Linux kernel', restart: 'system' }
    ],
    details: {
      [BASH]: { updateText: 'Fixes a parser bug', bugzillaUrls: ['https://bugs.example/42'] }
    },
    eulas: [{ eulaId: 'driver-eula', packageId: DRIVER, vendor: 'Example Corp', licenseText: 'Terms' }],
    ...overrides
  }));
}

/** Collect events until the transaction finishes */
function collect(tx: DaemonTransaction): Promise<DaemonEvent[]> {
  return new Promise(resolve => {
    const events: DaemonEvent[] = [];
    tx.listen(event => {
      events.push(event);
      if (event.type === 'finished') {
        resolve(events);
      }
    });
  });
}

function exitOf(events: DaemonEvent[]): string | undefined {
  const last = events[events.length - 1];
  return last?.type === 'finished' ? last.exit : undefined;
}

describe('ManifestDaemon', () => {
  it('refreshes the cache with progress', async () => {
    const daemon = createDaemon();
    const tx = daemon.refreshCache(true);
    const events = await collect(tx);

    assert.equal(tx.tid, '/1_refresh-cache');
    assert.deepEqual(
      events.flatMap(e => (e.type === 'status' ? [[e.status, e.percentage]] : [])),
      [['refresh-cache', 0], ['download-repository', 50], ['refresh-cache', 100]]
    );
    assert.equal(exitOf(events), 'success');
  });

  it('loads the cache when the refresh is not forced', async () => {
    const events = await collect(createDaemon().refreshCache(false));
    assert.deepEqual(events[0], { type: 'status', status: 'loading-cache', percentage: 0 });
  });

  it('fails every refresh when the manifest says so', async () => {
    const daemon = createDaemon({ refreshError: { code: 'no-network', details: 'offline' } });
    const events = await collect(daemon.refreshCache(true));

    assert.deepEqual(events.map(e => e.type), ['status', 'error', 'finished']);
    assert.deepEqual(events[1], { type: 'error', code: 'no-network', details: 'offline' });
    assert.equal(exitOf(events), 'failed');
  });

  it('lists pending updates in manifest order', async () => {
    const events = await collect(createDaemon().getUpdates());

    assert.deepEqual(events[0], { type: 'status', status: 'query', percentage: 101 });
    assert.deepEqual(
      events.flatMap(e => (e.type === 'package' ? [[e.info, e.packageId]] : [])),
      [['security', BASH], ['normal', DRIVER], ['important', KERNEL]]
    );
  });

  it('describes an update, falling back to its summary', async () => {
    const daemon = createDaemon();
    const bash = (await collect(daemon.getUpdateDetail(BASH))).find(e => e.type === 'update-detail');
    const kernel = (await collect(daemon.getUpdateDetail(KERNEL))).find(e => e.type === 'update-detail');

    assert.deepEqual(bash, {
      type: 'update-detail',
      packageId: BASH,
      updateText: 'Fixes a parser bug',
      vendorUrls: [],
      bugzillaUrls: ['https://bugs.example/42'],
      cveUrls: [],
      restart: 'none',
      changelog: undefined
    });
    assert.ok(kernel?.type === 'update-detail');
    assert.equal(kernel.updateText, 'Linux kernel');
    assert.equal(kernel.restart, 'system');
  });

  it('fails details for an unknown package', async () => {
    const events = await collect(createDaemon().getUpdateDetail('nope;1;noarch;main'));
    assert.deepEqual(events[0], { type: 'error', code: 'unknown', details: 'No update information for nope;1;noarch;main' });
    assert.equal(exitOf(events), 'failed');
  });

  it('rejects installing packages it does not know', async () => {
    const events = await collect(createDaemon().updatePackages(['nope;1;noarch;main'], { simulate: false, onlyTrusted: true }));
    assert.deepEqual(events[0], { type: 'error', code: 'dep-resolution-failed', details: 'Packages not found: nope;1;noarch;main' });
    assert.equal(exitOf(events), 'failed');
  });

  it('asks for license agreements until they are accepted', async () => {
    const daemon = createDaemon();
    const blocked = await collect(daemon.updatePackages([DRIVER], { simulate: false, onlyTrusted: false }));

    assert.deepEqual(blocked.map(e => e.type), ['status', 'eula-required', 'error', 'finished']);
    assert.deepEqual(blocked[1], {
      type: 'eula-required',
      eulaId: 'driver-eula',
      packageId: DRIVER,
      vendor: 'Example Corp',
      licenseText: 'Terms'
    });
    assert.equal(exitOf(blocked), 'eula-required');

    assert.equal(exitOf(await collect(daemon.acceptEula('driver-eula'))), 'success');
    assert.equal(daemon.isEulaAccepted('driver-eula'), true);

    const installed = await collect(daemon.updatePackages([DRIVER], { simulate: false, onlyTrusted: false }));
    assert.equal(exitOf(installed), 'success');
  });

  it('fails to accept an unknown agreement', async () => {
    const events = await collect(createDaemon().acceptEula('other-eula'));
    assert.equal(exitOf(events), 'failed');
  });

  it('needs untrusted packages allowed for untrusted updates', async () => {
    const daemon = createDaemon();
    await collect(daemon.acceptEula('driver-eula'));

    const events = await collect(daemon.updatePackages([DRIVER], { simulate: true, onlyTrusted: true }));
    assert.equal(exitOf(events), 'need-untrusted');
  });

  it('simulates without installing', async () => {
    const daemon = createDaemon();
    const events = await collect(daemon.updatePackages([BASH], { simulate: true, onlyTrusted: true }));

    assert.deepEqual(events[1], { type: 'package', info: 'updating', packageId: BASH, summary: 'GNU shell' });
    assert.equal(exitOf(events), 'success');
    assert.deepEqual(daemon.pendingUpdateIds, [BASH, DRIVER, KERNEL]);
  });

  it('installs updates, reports restarts and drops them from the list', async () => {
    const daemon = createDaemon();
    const events = await collect(daemon.updatePackages([BASH, KERNEL], { simulate: false, onlyTrusted: true }));

    assert.deepEqual(
      events.flatMap(e => (e.type === 'status' ? [[e.status, e.percentage]] : [])),
      [['download', 0], ['update', 50], ['update', 100]]
    );
    assert.deepEqual(events.filter(e => e.type === 'require-restart'), [
      { type: 'require-restart', restart: 'system', packageId: KERNEL }
    ]);
    assert.equal(exitOf(events), 'success');
    assert.deepEqual(daemon.pendingUpdateIds, [DRIVER]);
  });

  it('ends a cancelled transaction before the rest of its steps play', async () => {
    const daemon = createDaemon();
    const tx = daemon.getUpdates();
    await tx.cancel();
    const events = await collect(tx);

    assert.deepEqual(events[0], { type: 'error', code: 'transaction-cancelled', details: 'The transaction was cancelled' });
    assert.equal(events.length, 2);
    assert.equal(exitOf(events), 'cancelled');
  });
});
