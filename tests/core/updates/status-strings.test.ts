import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { describePackageInfo, describeStatus } from '../../../src/core/updates/status-strings.js';

describe('describeStatus', () => {
  it('names daemon states', () => {
    assert.equal(describeStatus('refresh-cache'), 'Refreshing software cache');
    assert.equal(describeStatus('waiting-for-lock'), 'Waiting for package manager lock');
  });

  it('adds the remaining download size and speed', () => {
    assert.equal(
      describeStatus('download', 2048, 1_048_576),
      'Downloading packages (1.0 MiB remaining at 2.0 KiB/s)'
    );
    assert.equal(describeStatus('download', undefined, 512), 'Downloading packages (512 B remaining)');
    assert.equal(describeStatus('download'), 'Downloading packages');
  });
});

describe('describePackageInfo', () => {
  it('uses the present tense for progress states', () => {
    assert.equal(describePackageInfo('downloading'), 'Downloading');
    assert.equal(describePackageInfo('updating'), 'Updating');
  });

  it('falls back for enumeration categories', () => {
    assert.equal(describePackageInfo('security'), 'Processing');
  });
});
