import { readJsonOrJsoncFile } from '../../utils/fs.js';
import { ValidationError } from '../../utils/errors.js';
import type { DaemonErrorCode, PackageInfo, RestartKind } from './types.js';

/**
 * Backend manifest: the state a ManifestDaemon replays. Written by hand (or
 * by tests) as JSON/JSONC.
 *
 * {
 *   "updates": [{ "id": "bash;5.2-1;x86_64;main", "info": "security", "summary": "GNU shell" }],
 *   "details": { "bash;5.2-1;x86_64;main": { "updateText": "Fixes CVE-…", "cveUrls": ["…"] } },
 *   "eulas": [{ "eulaId": "…", "packageId": "…", "vendor": "…", "licenseText": "…" }],
 *   "refreshError": { "code": "no-network", "details": "…" }
 * }
 */

export interface ManifestUpdate {
  id: string;
  info: PackageInfo;
  summary: string;
  /** Only installable with the trusted-only restriction lifted */
  untrusted: boolean;
  restart: RestartKind;
}

export interface ManifestDetail {
  updateText: string;
  vendorUrls: string[];
  bugzillaUrls: string[];
  cveUrls: string[];
  restart?: RestartKind;
  changelog?: string;
}

export interface ManifestEula {
  eulaId: string;
  packageId: string;
  vendor: string;
  licenseText: string;
}

export interface ManifestFailure {
  code: DaemonErrorCode;
  details: string;
}

export interface BackendManifest {
  updates: ManifestUpdate[];
  details: Record<string, ManifestDetail>;
  eulas: ManifestEula[];
  /** Makes every cache refresh fail */
  refreshError?: ManifestFailure;
}

const ENUMERATION_INFOS: readonly PackageInfo[] = [
  'low', 'normal', 'bugfix', 'enhancement', 'important', 'security', 'blocked'
];

const RESTART_KINDS: readonly RestartKind[] = [
  'none', 'application', 'session', 'system', 'security-session', 'security-system'
];

const ERROR_CODES: readonly DaemonErrorCode[] = [
  'no-network', 'cannot-fetch-sources', 'not-authorized', 'not-supported', 'permission-denied',
  'cannot-get-lock', 'lock-required', 'transaction-cancelled', 'gpg-failure', 'bad-gpg-signature',
  'missing-gpg-signature', 'no-license-agreement', 'package-download-failed', 'dep-resolution-failed',
  'internal-error', 'unknown'
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function oneOf<T extends string>(allowed: readonly T[], value: unknown): value is T {
  return allowed.some(candidate => candidate === value);
}

function requireString(value: unknown, where: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(`${where} must be a non-empty string`);
  }
  return value;
}

function optionalString(value: unknown, where: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`${where} must be a string`);
  }
  return value;
}

function stringList(value: unknown, where: string): string[] {
  if (value === undefined) return [];
  if (!Array.isArray(value) || value.some(item => typeof item !== 'string')) {
    throw new ValidationError(`${where} must be a list of strings`);
  }
  return value.map(item => String(item));
}

function restartKind(value: unknown, where: string): RestartKind | undefined {
  if (value === undefined) return undefined;
  if (!oneOf(RESTART_KINDS, value)) {
    throw new ValidationError(`${where} must be one of: ${RESTART_KINDS.join(', ')}`);
  }
  return value;
}

function parseUpdate(raw: unknown, index: number): ManifestUpdate {
  const where = `updates[${index}]`;
  if (!isRecord(raw)) {
    throw new ValidationError(`${where} must be an object`);
  }
  const { info, untrusted } = raw;
  if (!oneOf(ENUMERATION_INFOS, info)) {
    throw new ValidationError(`${where}.info must be one of: ${ENUMERATION_INFOS.join(', ')}`);
  }
  if (untrusted !== undefined && typeof untrusted !== 'boolean') {
    throw new ValidationError(`${where}.untrusted must be true or false`);
  }
  return {
    id: requireString(raw.id, `${where}.id`),
    info,
    summary: optionalString(raw.summary, `${where}.summary`) ?? '',
    untrusted: untrusted ?? false,
    restart: restartKind(raw.restart, `${where}.restart`) ?? 'none'
  };
}

function parseDetail(raw: unknown, packageId: string): ManifestDetail {
  const where = `details["${packageId}"]`;
  if (!isRecord(raw)) {
    throw new ValidationError(`${where} must be an object`);
  }
  return {
    updateText: optionalString(raw.updateText, `${where}.updateText`) ?? '',
    vendorUrls: stringList(raw.vendorUrls, `${where}.vendorUrls`),
    bugzillaUrls: stringList(raw.bugzillaUrls, `${where}.bugzillaUrls`),
    cveUrls: stringList(raw.cveUrls, `${where}.cveUrls`),
    restart: restartKind(raw.restart, `${where}.restart`),
    changelog: optionalString(raw.changelog, `${where}.changelog`)
  };
}

function parseEula(raw: unknown, index: number): ManifestEula {
  const where = `eulas[${index}]`;
  if (!isRecord(raw)) {
    throw new ValidationError(`${where} must be an object`);
  }
  return {
    eulaId: requireString(raw.eulaId, `${where}.eulaId`),
    packageId: requireString(raw.packageId, `${where}.packageId`),
    vendor: optionalString(raw.vendor, `${where}.vendor`) ?? '',
    licenseText: optionalString(raw.licenseText, `${where}.licenseText`) ?? ''
  };
}

function parseFailure(raw: unknown): ManifestFailure | undefined {
  if (raw === undefined) return undefined;
  const code = isRecord(raw) ? raw.code : undefined;
  if (!isRecord(raw) || !oneOf(ERROR_CODES, code)) {
    throw new ValidationError(`refreshError.code must be one of: ${ERROR_CODES.join(', ')}`);
  }
  return { code, details: optionalString(raw.details, 'refreshError.details') ?? '' };
}

/**
 * Validate an already parsed manifest document.
 */
export function parseBackendManifest(raw: unknown): BackendManifest {
  if (!isRecord(raw)) {
    throw new ValidationError('backend manifest must be an object');
  }

  const updatesRaw = raw.updates ?? [];
  if (!Array.isArray(updatesRaw)) {
    throw new ValidationError('updates must be a list');
  }
  const updates = updatesRaw.map(parseUpdate);
  const seen = new Set<string>();
  for (const update of updates) {
    if (seen.has(update.id)) {
      throw new ValidationError(`duplicate update id: ${update.id}`);
    }
    seen.add(update.id);
  }

  const detailsRaw = raw.details ?? {};
  if (!isRecord(detailsRaw)) {
    throw new ValidationError('details must be an object keyed by package id');
  }
  const details: Record<string, ManifestDetail> = {};
  for (const [packageId, detail] of Object.entries(detailsRaw)) {
    details[packageId] = parseDetail(detail, packageId);
  }

  const eulasRaw = raw.eulas ?? [];
  if (!Array.isArray(eulasRaw)) {
    throw new ValidationError('eulas must be a list');
  }

  return {
    updates,
    details,
    eulas: eulasRaw.map(parseEula),
    refreshError: parseFailure(raw.refreshError)
  };
}

export async function loadBackendManifest(path: string): Promise<BackendManifest> {
  return parseBackendManifest(await readJsonOrJsoncFile(path));
}
