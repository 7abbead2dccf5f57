import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import pico from 'picocolors';
import { fetchUpdateDetail, renderDetail } from '../../src/commands/details.js';
import { DaemonError } from '../../src/utils/errors.js';
import { BASH, createTestSession, KERNEL } from '../helpers/session.js';

describe('fetchUpdateDetail', () => {
  it('resolves with the detail of a known update', async () => {
    const session = createTestSession();
    try {
      const detail = await fetchUpdateDetail(session.coordinator, BASH);

      assert.equal(detail.updateText, 'Fixes a parser bug');
      assert.deepEqual(detail.urls, ['https://cve.example/CVE-0000-0001']);
      assert.equal(detail.restart, 'none');
    } finally {
      session.close();
    }
  });

  it('rejects for an unknown update', async () => {
    const session = createTestSession();
    try {
      await assert.rejects(
        fetchUpdateDetail(session.coordinator, 'nope;1;noarch;main'),
        (error: unknown) =>
          error instanceof DaemonError && error.message === 'Update error: No update information for nope;1;noarch;main'
      );
    } finally {
      session.close();
    }
  });

  it('rejects a request replaced by a newer one and answers the newer one', async () => {
    const session = createTestSession();
    try {
      const first = fetchUpdateDetail(session.coordinator, BASH);
      const second = fetchUpdateDetail(session.coordinator, KERNEL);

      await assert.rejects(
        first,
        (error: unknown) =>
          error instanceof DaemonError && error.message === `Update error: Detail request for ${BASH} was replaced`
      );
      assert.equal((await second).updateText, 'Linux kernel');
    } finally {
      session.close();
    }
  });
});

describe('renderDetail', () => {
  it('adds restart notes, links and the changelog', () => {
    assert.deepEqual(
      renderDetail({
        type: 'update-detail',
        packageId: KERNEL,
        updateText: 'New kernel',
        urls: ['https://vendor.example/kernel'],
        restart: 'system',
        changelog: '- fixed things'
      }),
      [
        'New kernel',
        '',
        pico.yellow('A system restart is required'),
        '',
        'More information:',
        '  https://vendor.example/kernel',
        '',
        'Changes:',
        '- fixed things'
      ]
    );
  });

  it('marks a missing description', () => {
    assert.deepEqual(
      renderDetail({ type: 'update-detail', packageId: KERNEL, updateText: '', urls: [], restart: 'none' }),
      [pico.dim('No description provided')]
    );
  });
});
