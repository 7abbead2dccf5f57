import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { loadBackendManifest, parseBackendManifest } from '../../../src/core/daemon/manifest.js';
import { ValidationError } from '../../../src/utils/errors.js';

describe('parseBackendManifest', () => {
  it('fills in defaults for omitted fields and lists', () => {
    const manifest = parseBackendManifest({
      updates: [{ id: 'bash;5.2;x86_64;main', info: 'bugfix' }]
    });

    assert.deepEqual(manifest, {
      updates: [{ id: 'bash;5.2;x86_64;main', info: 'bugfix', summary: '', untrusted: false, restart: 'none' }],
      details: {},
      eulas: [],
      refreshError: undefined
    });
  });

  it('reads details, agreements and a refresh failure', () => {
    const manifest = parseBackendManifest({
      details: {
        'bash;5.2;x86_64;main': { updateText: 'Fixes', cveUrls: ['https://cve.example/1'], restart: 'session' }
      },
      eulas: [{ eulaId: 'eula-1', packageId: 'bash;5.2;x86_64;main', vendor: 'Example Corp' }],
      refreshError: { code: 'no-network' }
    });

    assert.deepEqual(manifest.details['bash;5.2;x86_64;main'], {
      updateText: 'Fixes',
      vendorUrls: [],
      bugzillaUrls: [],
      cveUrls: ['https://cve.example/1'],
      restart: 'session',
      changelog: undefined
    });
    assert.equal(manifest.eulas[0].licenseText, '');
    assert.deepEqual(manifest.refreshError, { code: 'no-network', details: '' });
  });

  it('rejects a non-object document', () => {
    assert.throws(() => parseBackendManifest([]), ValidationError);
  });

  it('rejects an unknown update category', () => {
    assert.throws(
      () => parseBackendManifest({ updates: [{ id: 'a;1;noarch;main', info: 'updating' }] }),
      /updates\[0\]\.info must be one of/
    );
  });

  it('rejects duplicate update ids', () => {
    assert.throws(
      () => parseBackendManifest({
        updates: [
          { id: 'a;1;noarch;main', info: 'low' },
          { id: 'a;1;noarch;main', info: 'security' }
        ]
      }),
      /duplicate update id: a;1;noarch;main/
    );
  });

  it('rejects malformed url lists and refresh codes', () => {
    assert.throws(
      () => parseBackendManifest({ details: { x: { vendorUrls: [1] } } }),
      /details\["x"\]\.vendorUrls must be a list of strings/
    );
    assert.throws(
      () => parseBackendManifest({ refreshError: { code: 'offline' } }),
      /refreshError\.code must be one of/
    );
  });
});

describe('loadBackendManifest', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pkupdates-manifest-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('accepts comments in the manifest file', async () => {
    const path = join(dir, 'backend.json');
    await writeFile(path, `{
      // one pending update
      "updates": [{ "id": "vim;9.0;x86_64;main", "info": "enhancement", "summary": "Editor" }]
    }`);

    const manifest = await loadBackendManifest(path);
    assert.equal(manifest.updates[0].summary, 'Editor');
  });
});
