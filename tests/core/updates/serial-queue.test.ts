import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SerialQueue } from '../../../src/core/updates/serial-queue.js';

describe('SerialQueue', () => {
  it('runs a task posted from inside another task after it returns', () => {
    const order: string[] = [];
    const queue = new SerialQueue(() => undefined);

    queue.post(() => {
      order.push('outer start');
      queue.post(() => order.push('inner'));
      order.push('outer end');
    });

    assert.deepEqual(order, ['outer start', 'outer end', 'inner']);
  });

  it('reports a failing task and keeps draining', () => {
    const errors: unknown[] = [];
    const order: string[] = [];
    const queue = new SerialQueue(error => errors.push(error));

    queue.post(() => {
      queue.post(() => order.push('after'));
      throw new Error('boom');
    });

    assert.equal(errors.length, 1);
    assert.ok(errors[0] instanceof Error);
    assert.deepEqual(order, ['after']);
    assert.equal(queue.isDraining, false);
  });

  it('calls onIdle once per drain', () => {
    let idle = 0;
    const queue = new SerialQueue(() => undefined, () => { idle++; });

    queue.post(() => {
      queue.post(() => undefined);
      queue.post(() => undefined);
    });
    assert.equal(idle, 1);

    queue.post(() => undefined);
    assert.equal(idle, 2);
  });

  it('queues a task posted from onIdle and goes idle again after it', () => {
    const order: string[] = [];
    let idle = 0;
    const queue: SerialQueue = new SerialQueue(() => undefined, () => {
      idle++;
      order.push(`idle ${idle}`);
      if (idle === 1) {
        queue.post(() => order.push('from idle'));
        order.push('idle returned');
      }
    });

    queue.post(() => order.push('task'));

    assert.deepEqual(order, ['task', 'idle 1', 'idle returned', 'from idle', 'idle 2']);
    assert.equal(queue.isDraining, false);
  });

  it('reports draining while a task runs', () => {
    const queue = new SerialQueue(() => undefined);
    let seen = false;
    queue.post(() => { seen = queue.isDraining; });
    assert.equal(seen, true);
  });
});
