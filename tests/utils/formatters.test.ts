import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { formatBytes, formatRelativeTime, plural } from '../../src/utils/formatters.js';

const NOW = Date.UTC(2024, 2, 10, 12, 0, 0);
const MINUTE = 60_000;

describe('plural', () => {
  it('picks the form and substitutes the count', () => {
    assert.equal(plural(1, '1 new update', '%1 new updates'), '1 new update');
    assert.equal(plural(0, '1 new update', '%1 new updates'), '0 new updates');
    assert.equal(plural(12, '1 new update', '%1 new updates'), '12 new updates');
  });
});

describe('formatBytes', () => {
  it('uses binary units', () => {
    assert.equal(formatBytes(0), '0 B');
    assert.equal(formatBytes(1023), '1023 B');
    assert.equal(formatBytes(1536), '1.5 KiB');
    assert.equal(formatBytes(5 * 1024 ** 3), '5.0 GiB');
  });
});

describe('formatRelativeTime', () => {
  it('describes recent instants', () => {
    assert.equal(formatRelativeTime(NOW - 30_000, NOW), 'just now');
    assert.equal(formatRelativeTime(NOW - MINUTE, NOW), '1 minute ago');
    assert.equal(formatRelativeTime(NOW - 45 * MINUTE, NOW), '45 minutes ago');
    assert.equal(formatRelativeTime(NOW - 60 * MINUTE, NOW), '1 hour ago');
  });

  it('switches to days and then to a date', () => {
    assert.equal(formatRelativeTime(NOW - 24 * 60 * MINUTE, NOW), 'yesterday');
    assert.equal(formatRelativeTime(NOW - 3 * 24 * 60 * MINUTE, NOW), '3 days ago');
    assert.equal(formatRelativeTime(NOW - 10 * 24 * 60 * MINUTE, NOW), '2024-02-29');
  });
});
