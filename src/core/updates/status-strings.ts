import type { PackageInfo, TransactionStatus } from '../daemon/types.js';
import { formatBytes } from '../../utils/formatters.js';

/**
 * Human-readable text for daemon status codes and per-package progress.
 */

const STATUS_TEXT: Record<TransactionStatus, string> = {
  'wait': 'Waiting in queue',
  'setup': 'Setting up',
  'running': 'Running',
  'query': 'Querying',
  'info': 'Getting information',
  'refresh-cache': 'Refreshing software cache',
  'download': 'Downloading packages',
  'download-repository': 'Downloading repository information',
  'download-packagelist': 'Downloading list of packages',
  'loading-cache': 'Loading cache',
  'dep-resolve': 'Resolving dependencies',
  'sig-check': 'Checking signatures',
  'test-commit': 'Testing changes',
  'commit': 'Committing changes',
  'install': 'Installing packages',
  'update': 'Updating packages',
  'remove': 'Removing packages',
  'cleanup': 'Cleaning up packages',
  'obsolete': 'Obsoleting packages',
  'waiting-for-lock': 'Waiting for package manager lock',
  'waiting-for-auth': 'Waiting for authentication',
  'request': 'Requesting data',
  'cancel': 'Cancelling',
  'finished': 'Finished'
};

const INFO_PRESENT: Partial<Record<PackageInfo, string>> = {
  'downloading': 'Downloading',
  'updating': 'Updating',
  'installing': 'Installing',
  'removing': 'Removing',
  'cleanup': 'Cleaning up',
  'obsoleting': 'Obsoleting',
  'reinstalling': 'Reinstalling',
  'downgrading': 'Downgrading',
  'preparing': 'Preparing',
  'decompressing': 'Decompressing',
  'finished': 'Finished'
};

export function describeStatus(status: TransactionStatus, speed?: number, downloadSizeRemaining?: number): string {
  const text = STATUS_TEXT[status];
  if (status !== 'download' || !downloadSizeRemaining) {
    return text;
  }
  const remaining = formatBytes(downloadSizeRemaining);
  return speed
    ? `${text} (${remaining} remaining at ${formatBytes(speed)}/s)`
    : `${text} (${remaining} remaining)`;
}

export function describePackageInfo(info: PackageInfo): string {
  return INFO_PRESENT[info] ?? 'Processing';
}
