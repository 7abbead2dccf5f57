/**
 * Package Daemon Contract
 *
 * The system package-manager daemon is an external service. Every call
 * starts one transaction; the transaction reports back through a stream of
 * typed events and always ends with exactly one `finished` event (an
 * `error` event, when present, precedes it).
 *
 * Implementations:
 *   - ManifestDaemon: replays a JSON backend manifest (CLI, tests)
 *   - an RPC client for a real daemon, supplied by the embedding application
 */

// ============================================================================
// Enumerations
// ============================================================================

export type TransactionRole =
  | 'refresh-cache'
  | 'get-updates'
  | 'get-update-detail'
  | 'update-packages'
  | 'accept-eula';

/** Per-package classification reported by the daemon. */
export type PackageInfo =
  // enumeration
  | 'low'
  | 'normal'
  | 'bugfix'
  | 'enhancement'
  | 'important'
  | 'security'
  | 'blocked'
  // installation progress
  | 'downloading'
  | 'updating'
  | 'installing'
  | 'removing'
  | 'cleanup'
  | 'obsoleting'
  | 'reinstalling'
  | 'downgrading'
  | 'preparing'
  | 'decompressing'
  | 'finished';

export type TransactionStatus =
  | 'wait'
  | 'setup'
  | 'running'
  | 'query'
  | 'info'
  | 'refresh-cache'
  | 'download'
  | 'download-repository'
  | 'download-packagelist'
  | 'loading-cache'
  | 'dep-resolve'
  | 'sig-check'
  | 'test-commit'
  | 'commit'
  | 'install'
  | 'update'
  | 'remove'
  | 'cleanup'
  | 'obsolete'
  | 'waiting-for-lock'
  | 'waiting-for-auth'
  | 'request'
  | 'cancel'
  | 'finished';

export type TransactionExit =
  | 'success'
  | 'failed'
  | 'cancelled'
  | 'key-required'
  | 'eula-required'
  | 'need-untrusted';

export type RestartKind = 'none' | 'application' | 'session' | 'system' | 'security-session' | 'security-system';

/** Error codes the daemon reports; anything unlisted arrives as 'unknown'. */
export type DaemonErrorCode =
  | 'no-network'
  | 'cannot-fetch-sources'
  | 'not-authorized'
  | 'not-supported'
  | 'permission-denied'
  | 'cannot-get-lock'
  | 'lock-required'
  | 'transaction-cancelled'
  | 'gpg-failure'
  | 'bad-gpg-signature'
  | 'missing-gpg-signature'
  | 'no-license-agreement'
  | 'package-download-failed'
  | 'dep-resolution-failed'
  | 'internal-error'
  | 'unknown';

export interface TransactionFlags {
  onlyTrusted: boolean;
  simulate: boolean;
}

export interface RepoSignature {
  packageId: string;
  repoName: string;
  keyUrl: string;
  keyUserId: string;
  keyId: string;
  keyFingerprint: string;
  keyTimestamp: string;
  type: 'gpg' | 'unknown';
}

// ============================================================================
// Transaction Events
// ============================================================================

export type DaemonEvent =
  | {
    type: 'status';
    status: TransactionStatus;
    /** 0..100, or undefined when the daemon cannot tell */
    percentage?: number;
    /** bytes per second */
    speed?: number;
    downloadSizeRemaining?: number;
  }
  | { type: 'package'; info: PackageInfo; packageId: string; summary: string }
  | { type: 'error'; code: DaemonErrorCode; details: string }
  | { type: 'eula-required'; eulaId: string; packageId: string; vendor: string; licenseText: string }
  | { type: 'repo-signature-required'; signature: RepoSignature }
  | { type: 'require-restart'; restart: RestartKind; packageId: string }
  | {
    type: 'update-detail';
    packageId: string;
    updateText: string;
    vendorUrls: string[];
    bugzillaUrls: string[];
    cveUrls: string[];
    restart: RestartKind;
    changelog?: string;
  }
  | { type: 'finished'; exit: TransactionExit; runtimeMs: number };

export type DaemonEventListener = (event: DaemonEvent) => void;

// ============================================================================
// Daemon Interface
// ============================================================================

export interface DaemonTransaction {
  /** Daemon-assigned transaction id, for logging */
  readonly tid: string;
  readonly role: TransactionRole;

  /**
   * Register the single consumer of this transaction's events.
   * Events emitted before a listener is attached are buffered.
   */
  listen(listener: DaemonEventListener): void;

  /** Ask the daemon to cancel; it still ends the transaction with `finished`. */
  cancel(): Promise<void>;
}

export interface PackageDaemon {
  refreshCache(force: boolean): DaemonTransaction;
  getUpdates(): DaemonTransaction;
  getUpdateDetail(packageId: string): DaemonTransaction;
  updatePackages(packageIds: readonly string[], flags: TransactionFlags): DaemonTransaction;
  acceptEula(eulaId: string): DaemonTransaction;
}
