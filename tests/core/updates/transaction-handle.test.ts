import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { DaemonEvent } from '../../../src/core/daemon/types.js';
import { HandleConflictError, HandleRegistry } from '../../../src/core/updates/transaction-handle.js';
import { FakeTransaction } from '../../helpers/fake-daemon.js';

function createRegistry() {
  const seen: DaemonEvent[] = [];
  const registry = new HandleRegistry(task => task());
  return { registry, seen };
}

describe('TransactionHandle', () => {
  it('forwards events while valid and drops them once closed', () => {
    const { registry, seen } = createRegistry();
    const tx = new FakeTransaction('/t_1', 'get-updates', {});
    const handle = registry.open('updates', tx, (_h, event) => seen.push(event));

    tx.status('query', 10);
    registry.close(handle);
    tx.finish();

    assert.deepEqual(seen, [{ type: 'status', status: 'query', percentage: 10 }]);
    assert.equal(handle.isValid, false);
    assert.equal(registry.isOpen('updates'), false);
  });

  it('delivers events buffered before the handle listened', () => {
    const { registry, seen } = createRegistry();
    const tx = new FakeTransaction('/t_1', 'refresh-cache', { force: true });
    tx.status('refresh-cache', 5);

    registry.open('cache', tx, (_h, event) => seen.push(event));

    assert.equal(seen.length, 1);
  });

  it('exposes the transaction id and role', () => {
    const { registry } = createRegistry();
    const handle = registry.open('detail', new FakeTransaction('/t_9', 'get-update-detail', {}), () => undefined);
    assert.equal(handle.tid, '/t_9');
    assert.equal(handle.role, 'get-update-detail');
    assert.equal(handle.kind, 'detail');
  });

  it('cancels the transaction once', async () => {
    const { registry } = createRegistry();
    const tx = new FakeTransaction('/t_1', 'update-packages', {});
    const handle = registry.open('install', tx, () => undefined);

    await handle.cancel();
    assert.equal(tx.cancelled, true);
    assert.equal(handle.isValid, false);

    tx.cancelled = false;
    await handle.cancel();
    assert.equal(tx.cancelled, false);
  });
});

describe('HandleRegistry', () => {
  it('allows one live handle per kind', () => {
    const { registry } = createRegistry();
    registry.open('install', new FakeTransaction('/t_1', 'update-packages', {}), () => undefined);

    assert.throws(
      () => registry.open('install', new FakeTransaction('/t_2', 'update-packages', {}), () => undefined),
      HandleConflictError
    );
  });

  it('reopens a kind after take and lists open kinds', () => {
    const { registry } = createRegistry();
    const first = registry.open('cache', new FakeTransaction('/t_1', 'refresh-cache', {}), () => undefined);
    registry.open('detail', new FakeTransaction('/t_2', 'get-update-detail', {}), () => undefined);

    assert.deepEqual(registry.openKinds(), ['cache', 'detail']);
    assert.equal(registry.take('cache'), first);
    assert.equal(registry.take('cache'), undefined);
    assert.deepEqual(registry.openKinds(), ['detail']);

    registry.open('cache', new FakeTransaction('/t_3', 'refresh-cache', {}), () => undefined);
    assert.equal(registry.get('cache')?.tid, '/t_3');
  });

  it('ignores closing a handle that was already replaced', () => {
    const { registry } = createRegistry();
    const stale = registry.open('detail', new FakeTransaction('/t_1', 'get-update-detail', {}), () => undefined);
    registry.take('detail');
    const current = registry.open('detail', new FakeTransaction('/t_2', 'get-update-detail', {}), () => undefined);

    registry.close(stale);

    assert.equal(registry.get('detail'), current);
  });
});
