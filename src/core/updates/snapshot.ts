import type { CatalogSnapshot } from './update-catalog.js';
import type { Percentage } from './progress-tracker.js';
import { formatRelativeTime, plural } from '../../utils/formatters.js';

export type Activity = 'idle' | 'checking-cache' | 'enumerating-updates' | 'installing-updates';

export type CheckOutcome = 'never-checked' | 'failed' | 'succeeded';

export type StatusIconHint = 'update-none' | 'update-low' | 'update-medium' | 'update-high';

/**
 * Everything a presentation layer reads. A new frozen object is published
 * on every change; fields are never mutated in place.
 */
export interface UpdatesSnapshot {
  readonly activity: Activity;
  readonly isActive: boolean;
  readonly lastCheckOutcome: CheckOutcome;
  readonly count: number;
  readonly importantCount: number;
  readonly securityCount: number;
  readonly isSystemUpToDate: boolean;
  readonly statusIconHint: StatusIconHint;
  /** Overall summary line */
  readonly message: string;
  readonly percentage: Percentage;
  /** Epoch ms of the last successful check */
  readonly lastCheckTimestamp: number | undefined;
  /** "Last update: …" line, based on the last cache refresh */
  readonly timestamp: string;
  /** What is happening right now, or the last classified error */
  readonly statusMessage: string;
  /** id → summary */
  readonly packages: Readonly<Record<string, string>>;
  readonly isNetworkOnline: boolean;
  readonly isNetworkMobile: boolean;
  readonly isOnBattery: boolean;
}

export type SnapshotField = keyof UpdatesSnapshot;

export const SNAPSHOT_FIELDS: readonly SnapshotField[] = [
  'activity',
  'isActive',
  'lastCheckOutcome',
  'count',
  'importantCount',
  'securityCount',
  'isSystemUpToDate',
  'statusIconHint',
  'message',
  'percentage',
  'lastCheckTimestamp',
  'timestamp',
  'statusMessage',
  'packages',
  'isNetworkOnline',
  'isNetworkMobile',
  'isOnBattery'
];

export interface SnapshotInput {
  activity: Activity;
  lastCheckOutcome: CheckOutcome;
  catalog: CatalogSnapshot;
  percentage: Percentage;
  statusMessage: string;
  lastCheckTimestamp: number | undefined;
  lastRefreshTimestamp: number | undefined;
  isNetworkOnline: boolean;
  isNetworkMobile: boolean;
  isOnBattery: boolean;
  now: number;
}

export function statusIconHint(catalog: CatalogSnapshot): StatusIconHint {
  if (catalog.securityCount > 0) return 'update-high';
  if (catalog.importantCount > 0) return 'update-medium';
  if (catalog.count > 0) return 'update-low';
  return 'update-none';
}

export function summaryMessage(input: Pick<SnapshotInput, 'activity' | 'catalog' | 'isNetworkOnline' | 'lastCheckOutcome'>): string {
  const { activity, catalog } = input;

  switch (activity) {
    case 'checking-cache':
      return 'Checking updates';
    case 'enumerating-updates':
      return 'Getting updates';
    case 'installing-updates':
      return 'Installing updates';
    case 'idle':
      break;
  }

  if (!catalog.isUpToDate) {
    const headline = plural(catalog.count, 'You have 1 new update', 'You have %1 new updates');
    const extra: string[] = [];
    if (catalog.securityCount > 0) {
      extra.push(plural(catalog.securityCount, '1 security update', '%1 security updates'));
    }
    if (catalog.importantCount > 0) {
      extra.push(plural(catalog.importantCount, '1 important update', '%1 important updates'));
    }
    return extra.length === 0 ? headline : `${headline}\n(including ${extra.join(' and ')})`;
  }

  if (!input.isNetworkOnline) {
    return 'Your system is offline';
  }
  if (input.lastCheckOutcome === 'failed') {
    return 'Last check failed';
  }
  return 'Your system is up to date';
}

export function timestampText(lastRefreshTimestamp: number | undefined, now: number): string {
  return lastRefreshTimestamp === undefined
    ? 'Last update: never'
    : `Last update: ${formatRelativeTime(lastRefreshTimestamp, now)}`;
}

export function buildUpdatesSnapshot(input: SnapshotInput): UpdatesSnapshot {
  const { catalog } = input;
  return Object.freeze({
    activity: input.activity,
    isActive: input.activity !== 'idle',
    lastCheckOutcome: input.lastCheckOutcome,
    count: catalog.count,
    importantCount: catalog.importantCount,
    securityCount: catalog.securityCount,
    isSystemUpToDate: catalog.isUpToDate,
    statusIconHint: statusIconHint(catalog),
    message: summaryMessage(input),
    percentage: input.percentage,
    lastCheckTimestamp: input.lastCheckTimestamp,
    timestamp: timestampText(input.lastRefreshTimestamp, input.now),
    statusMessage: input.statusMessage,
    packages: catalog.packages,
    isNetworkOnline: input.isNetworkOnline,
    isNetworkMobile: input.isNetworkMobile,
    isOnBattery: input.isOnBattery
  });
}

/** Fields whose values differ; `packages` compares by reference. */
export function changedFields(previous: UpdatesSnapshot, next: UpdatesSnapshot): SnapshotField[] {
  return SNAPSHOT_FIELDS.filter(field => !Object.is(previous[field], next[field]));
}
