import type { Logger, PkUpdatesConfig } from '../../types/index.js';
import { CHECK_STAGE_SPLIT, CONFIG_DEFAULTS } from '../../constants/index.js';
import { logger as rootLogger } from '../../utils/logger.js';
import { formatPackageLabel, packageArch, packageData, packageName, packageVersion } from '../../utils/package-id.js';
import type {
  DaemonErrorCode,
  DaemonEvent,
  DaemonTransaction,
  PackageDaemon,
  RestartKind,
  TransactionExit
} from '../daemon/types.js';
import type { SystemState, SystemStatePort } from '../ports/system-state.js';
import { MemoryTimestampStore, type TimestampStore } from '../timestamp-store.js';
import { EulaNegotiator, type EulaRequest } from './eula-negotiator.js';
import type { UpdatesListener, UpdatesNotification, UpdatesNotificationType } from './notifications.js';
import {
  FULL_RANGE,
  normalizePercentage,
  ProgressTracker,
  remapStageProgress,
  type Percentage,
  type StageRange
} from './progress-tracker.js';
import { SerialQueue } from './serial-queue.js';
import {
  buildUpdatesSnapshot,
  changedFields,
  type Activity,
  type CheckOutcome,
  type UpdatesSnapshot
} from './snapshot.js';
import { describePackageInfo, describeStatus } from './status-strings.js';
import { HandleRegistry, type HandleKind, type TransactionHandle } from './transaction-handle.js';
import { categorize, EMPTY_CATALOG, UpdateCatalog, type CatalogSnapshot, type PackageEntry } from './update-catalog.js';
import { createUpdateError, fromDaemonError, type UpdateError } from './update-errors.js';

export interface InstallRequest {
  readonly packageIds: readonly string[];
  readonly simulate: boolean;
  readonly allowUntrusted: boolean;
}

export interface CoordinatorState {
  activity: Activity;
  lastCheckOutcome: CheckOutcome;
  lastCheckTimestamp: number | undefined;
  percentage: Percentage;
  statusText: string;
  /** Set while an install waits on license agreements, until the attempt ends */
  pendingInstallRequest: InstallRequest | undefined;
  deferredCheckRequested: boolean;
}

export interface TransactionCoordinatorOptions {
  daemon: PackageDaemon;
  systemState: SystemStatePort;
  timestampStore?: TimestampStore;
  config?: Partial<PkUpdatesConfig>;
  /** Epoch milliseconds */
  clock?: () => number;
  logger?: Logger;
}

interface CheckRequest {
  force: boolean;
  manual: boolean;
}

interface ActiveCheck extends CheckRequest {
  /** Whether this pass refreshes the cache before enumerating */
  refreshesCache: boolean;
  enumerateRange: StageRange;
  error?: UpdateError;
}

interface InstallAttempt {
  /** The caller's request, resubmitted verbatim after license agreements */
  readonly request: InstallRequest;
  /** Flags of the pass currently (or last) sent to the daemon */
  simulate: boolean;
  allowUntrusted: boolean;
  eulaReported: boolean;
  suspended: boolean;
  error?: UpdateError;
}

type DaemonCall = { transaction: DaemonTransaction } | { error: string };

const CACHE_RANGE: StageRange = { start: 0, end: CHECK_STAGE_SPLIT };
const ENUMERATE_AFTER_REFRESH_RANGE: StageRange = { start: CHECK_STAGE_SPLIT, end: 100 };
const CHECK_HANDLES: HandleKind[] = ['cache', 'updates'];
const INSTALL_HANDLES: HandleKind[] = ['install', 'eula'];

function isNotificationOf<T extends UpdatesNotificationType>(
  notification: UpdatesNotification,
  type: T
): notification is Extract<UpdatesNotification, { type: T }> {
  return notification.type === type;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Drives the package daemon through update checks, installs and license
 * negotiation, and publishes the aggregate state as immutable snapshots.
 *
 * All commands and daemon events run on one serial queue, so handlers never
 * interleave. Commands are fire-and-forget; outcomes arrive as notifications
 * (`done` fires exactly once per check or install attempt).
 */
export class TransactionCoordinator {
  static packageName = packageName;
  static packageVersion = packageVersion;
  static packageArch = packageArch;
  static packageData = packageData;

  private readonly daemon: PackageDaemon;
  private readonly timestampStore: TimestampStore;
  private readonly config: PkUpdatesConfig;
  private readonly clock: () => number;
  private readonly log: Logger;

  private readonly queue: SerialQueue;
  private readonly handles: HandleRegistry;
  private readonly catalog = new UpdateCatalog();
  private readonly progress = new ProgressTracker();
  private readonly eula: EulaNegotiator;
  private readonly listeners = new Set<UpdatesListener>();
  private readonly unsubscribeSystemState: () => void;

  private committed: CatalogSnapshot = EMPTY_CATALOG;
  private activity: Activity = 'idle';
  private lastCheckOutcome: CheckOutcome = 'never-checked';
  private checkedAt: number | undefined;
  private lastUpdateCount = 0;
  private check: ActiveCheck | undefined;
  private coalescedCheck: CheckRequest | undefined;
  private deferredCheck: CheckRequest | undefined;
  private install: InstallAttempt | undefined;
  private pendingInstallRequest: InstallRequest | undefined;
  private detailPackageId: string | undefined;
  private system: SystemState;
  private current: UpdatesSnapshot;

  constructor(options: TransactionCoordinatorOptions) {
    this.daemon = options.daemon;
    this.timestampStore = options.timestampStore ?? new MemoryTimestampStore();
    this.config = { ...CONFIG_DEFAULTS, ...options.config };
    this.clock = options.clock ?? Date.now;
    this.log = options.logger ?? rootLogger.child('updates');

    this.queue = new SerialQueue(
      error => this.log.error('Unhandled error while processing an update event', error),
      () => this.publish()
    );
    this.handles = new HandleRegistry(task => this.queue.post(task));
    this.eula = new EulaNegotiator(request => this.notify({ type: 'eula-required', request: { ...request } }));

    this.system = options.systemState.current();
    this.current = this.buildSnapshot();
    this.unsubscribeSystemState = options.systemState.subscribe((state, previous) => {
      this.queue.post(() => this.onSystemStateChanged(state, previous));
    });
  }

  // ==========================================================================
  // Read-only surface
  // ==========================================================================

  get snapshot(): UpdatesSnapshot {
    return this.current;
  }

  get catalogSnapshot(): CatalogSnapshot {
    return this.committed;
  }

  get state(): CoordinatorState {
    return {
      activity: this.activity,
      lastCheckOutcome: this.lastCheckOutcome,
      lastCheckTimestamp: this.checkedAt,
      percentage: this.progress.effectivePercentage(),
      statusText: this.progress.statusText(),
      pendingInstallRequest: this.pendingInstallRequest,
      deferredCheckRequested: this.deferredCheck !== undefined
    };
  }

  get pendingEulas(): ReadonlyArray<Readonly<EulaRequest>> {
    return this.eula.pending;
  }

  get count(): number { return this.current.count; }
  get importantCount(): number { return this.current.importantCount; }
  get securityCount(): number { return this.current.securityCount; }
  get isSystemUpToDate(): boolean { return this.current.isSystemUpToDate; }
  get statusIconHint(): string { return this.current.statusIconHint; }
  get message(): string { return this.current.message; }
  get percentage(): Percentage { return this.current.percentage; }
  get lastCheckTimestamp(): number | undefined { return this.current.lastCheckTimestamp; }
  get timestamp(): string { return this.current.timestamp; }
  get statusMessage(): string { return this.current.statusMessage; }
  get packages(): Readonly<Record<string, string>> { return this.current.packages; }
  get isActive(): boolean { return this.current.isActive; }
  get isNetworkOnline(): boolean { return this.current.isNetworkOnline; }
  get isNetworkMobile(): boolean { return this.current.isNetworkMobile; }
  get isOnBattery(): boolean { return this.current.isOnBattery; }

  /**
   * Time of the last successful cache refresh in epoch milliseconds, -1 if never.
   */
  lastRefreshTimestamp(): number {
    return this.timestampStore.get() ?? -1;
  }

  subscribe(listener: UpdatesListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  on<T extends UpdatesNotificationType>(
    type: T,
    listener: (notification: Extract<UpdatesNotification, { type: T }>) => void
  ): () => void {
    return this.subscribe(notification => {
      if (isNotificationOf(notification, type)) {
        listener(notification);
      }
    });
  }

  // ==========================================================================
  // Commands
  // ==========================================================================

  /**
   * Refresh the cache (unless fresh enough and not forced) and enumerate updates.
   *
   * @param force refresh the daemon cache even if it is recent
   * @param manual the check was explicitly requested by the user
   */
  checkUpdates(force: boolean = true, manual: boolean = false): void {
    this.queue.post(() => this.startCheck(force, manual));
  }

  /**
   * Install the given updates. A simulated pass (the default) resolves the
   * transaction first and is followed by the real one.
   */
  installUpdates(packageIds: readonly string[], simulate: boolean = true, allowUntrusted: boolean = false): void {
    this.queue.post(() => this.startInstall(packageIds, simulate, allowUntrusted));
  }

  getUpdateDetails(packageId: string): void {
    this.queue.post(() => this.fetchDetails(packageId));
  }

  /**
   * Run a check that was deferred for lack of network (or by the power and
   * mobile-data policy), if it can run now.
   */
  doDelayedCheckUpdates(): void {
    this.queue.post(() => this.runDeferredCheck());
  }

  /**
   * Answer the license agreement currently surfaced. Responses for any other
   * agreement are ignored.
   */
  eulaAgreementResult(eulaId: string, agreed: boolean): void {
    this.queue.post(() => this.resolveEula(eulaId, agreed));
  }

  /** Stop listening to sensors and cancel every open transaction. */
  dispose(): void {
    this.unsubscribeSystemState();
    for (const kind of this.handles.openKinds()) {
      const handle = this.handles.take(kind);
      if (handle) {
        this.cancelHandle(handle);
      }
    }
    this.listeners.clear();
  }

  // ==========================================================================
  // Check flow
  // ==========================================================================

  private startCheck(force: boolean, manual: boolean): void {
    if (this.check || this.install) {
      // Newest flags win; a manual request also makes the running pass report its errors
      this.coalescedCheck = { force, manual };
      if (manual && this.check) {
        this.check.manual = true;
      }
      this.log.debug('Coalescing update check with the operation in progress', { force, manual });
      return;
    }

    const blocked = this.checkBlockedReason(manual);
    if (blocked) {
      this.deferredCheck = { force, manual };
      this.log.info(`Update check delayed: ${blocked}`);
      return;
    }
    this.deferredCheck = undefined;

    const lastRefresh = this.timestampStore.get();
    const cacheIsFresh = !force
      && lastRefresh !== undefined
      && this.clock() - lastRefresh < this.config.cacheMaxAgeMinutes * 60_000;

    this.check = { force, manual, refreshesCache: !cacheIsFresh, enumerateRange: FULL_RANGE };
    if (cacheIsFresh) {
      this.log.debug('Software cache is recent, skipping refresh');
      this.openEnumeration(FULL_RANGE);
    } else {
      this.openCacheRefresh(force);
    }
  }

  private checkBlockedReason(manual: boolean): string | undefined {
    if (!this.system.networkOnline) {
      return 'network is offline';
    }
    if (manual) {
      return undefined;
    }
    if (this.system.onBattery && !this.config.checkOnBattery) {
      return 'running on battery';
    }
    if (this.system.networkMobile && !this.config.checkOnMobile) {
      return 'on a mobile connection';
    }
    return undefined;
  }

  private runDeferredCheck(): void {
    const deferred = this.deferredCheck;
    if (!deferred) {
      return;
    }
    const blocked = this.checkBlockedReason(deferred.manual);
    if (blocked) {
      this.log.debug(`Delayed update check still waiting: ${blocked}`);
      return;
    }
    this.log.info('Running delayed update check');
    this.startCheck(deferred.force, deferred.manual);
  }

  private openCacheRefresh(force: boolean): void {
    const call = this.callDaemon(() => this.daemon.refreshCache(force));
    if ('error' in call) {
      this.failCheck(createUpdateError('generic', 'check', call.error));
      return;
    }
    const handle = this.handles.open('cache', call.transaction, (h, event) => this.onCacheEvent(h, event));
    this.log.debug('Refreshing software cache', { tid: handle.tid, force });
    this.activity = 'checking-cache';
    this.progress.reset(describeStatus('refresh-cache'));
  }

  private openEnumeration(range: StageRange): void {
    const check = this.check;
    if (!check) {
      return;
    }
    const call = this.callDaemon(() => this.daemon.getUpdates());
    if ('error' in call) {
      this.failCheck(createUpdateError('generic', 'check', call.error));
      return;
    }
    check.enumerateRange = range;
    this.catalog.beginPass();
    const handle = this.handles.open('updates', call.transaction, (h, event) => this.onUpdatesEvent(h, event));
    this.log.debug('Getting updates', { tid: handle.tid });
    this.activity = 'enumerating-updates';
    this.progress.onStageProgress(range.start);
    this.progress.onStatus(describeStatus('query'));
  }

  private onCacheEvent(handle: TransactionHandle, event: DaemonEvent): void {
    const check = this.check;
    if (!check) {
      return;
    }
    switch (event.type) {
      case 'status':
        this.applyStatus(event, CACHE_RANGE);
        break;
      case 'error':
        this.recordCheckError(check, event.code, event.details);
        break;
      case 'repo-signature-required':
        this.notify({ type: 'repo-signature-required', signature: event.signature });
        check.error ??= createUpdateError('repository-signature-required', 'check', event.signature.repoName);
        break;
      case 'finished':
        this.handles.close(handle);
        this.log.debug(`Cache refresh finished: ${event.exit}`, { tid: handle.tid, runtimeMs: event.runtimeMs });
        if (event.exit === 'success') {
          this.recordRefresh();
          this.openEnumeration(ENUMERATE_AFTER_REFRESH_RANGE);
        } else {
          this.failCheck(check.error ?? createUpdateError('generic', 'check', `Refreshing the software cache failed (${event.exit})`));
        }
        break;
      default:
        this.log.debug(`Ignoring '${event.type}' event during cache refresh`);
    }
  }

  private onUpdatesEvent(handle: TransactionHandle, event: DaemonEvent): void {
    const check = this.check;
    if (!check) {
      return;
    }
    switch (event.type) {
      case 'status':
        this.applyStatus(event, check.enumerateRange);
        break;
      case 'package': {
        const category = categorize(event.info);
        if (!category) {
          this.log.debug(`Skipping blocked update ${event.packageId}`);
          break;
        }
        const entry: PackageEntry = { id: event.packageId, summary: event.summary, category };
        this.catalog.record(entry);
        break;
      }
      case 'error':
        this.recordCheckError(check, event.code, event.details);
        break;
      case 'repo-signature-required':
        this.notify({ type: 'repo-signature-required', signature: event.signature });
        check.error ??= createUpdateError('repository-signature-required', 'check', event.signature.repoName);
        break;
      case 'finished':
        this.handles.close(handle);
        this.log.debug(`Getting updates finished: ${event.exit}`, { tid: handle.tid, runtimeMs: event.runtimeMs });
        if (event.exit === 'success') {
          this.completeCheck();
        } else {
          this.failCheck(check.error ?? createUpdateError('generic', 'check', `Getting updates failed (${event.exit})`));
        }
        break;
      default:
        this.log.debug(`Ignoring '${event.type}' event while getting updates`);
    }
  }

  private recordCheckError(check: ActiveCheck, code: DaemonErrorCode, details: string): void {
    if (code === 'bad-gpg-signature') {
      this.log.warn(`Repository signature problem: ${details}`);
      return;
    }
    this.log.warn(`Daemon error during update check: ${code}`, { details });
    check.error ??= fromDaemonError('check', code, details);
  }

  private recordRefresh(): void {
    this.timestampStore.set(this.clock()).catch((error: unknown) => {
      this.log.warn('Failed to store the cache refresh time', error);
    });
  }

  private completeCheck(): void {
    const check = this.check;
    this.check = undefined;

    this.committed = this.catalog.commit();
    this.lastCheckOutcome = 'succeeded';
    this.checkedAt = this.clock();
    this.activity = 'idle';
    this.progress.reset();
    this.log.info(`Update check finished: ${this.committed.count} updates available`);

    this.emitUpdatesChanged();
    if (this.committed.count !== this.lastUpdateCount) {
      this.lastUpdateCount = this.committed.count;
      if (this.committed.count > 0) {
        this.notify({
          type: 'new-updates',
          count: this.committed.count,
          securityCount: this.committed.securityCount,
          importantCount: this.committed.importantCount
        });
      }
    }
    this.notify({ type: 'done', operation: 'check', success: true });
    this.runCoalescedCheck(check, false);
  }

  private failCheck(error: UpdateError): void {
    const check = this.check;
    this.check = undefined;
    for (const kind of CHECK_HANDLES) {
      const handle = this.handles.take(kind);
      if (handle) {
        this.cancelHandle(handle);
      }
    }

    this.lastCheckOutcome = 'failed';
    this.activity = 'idle';

    if (error.kind === 'network-unavailable' && check && !check.manual) {
      this.deferredCheck = { force: check.force, manual: false };
      this.progress.reset('Waiting for network');
      this.log.info('Automatic update check failed without network, will retry once online');
    } else {
      this.progress.reset(error.message);
      this.log.warn(`Update check failed: ${error.message}`);
      this.notify({ type: 'error', error });
    }

    this.emitUpdatesChanged();
    this.notify({ type: 'done', operation: 'check', success: false });
    this.runCoalescedCheck(check, true);
  }

  private runCoalescedCheck(finished: ActiveCheck | undefined, failed: boolean): void {
    const next = this.coalescedCheck;
    if (!next) {
      return;
    }
    this.coalescedCheck = undefined;
    const forcedRefreshRan = finished !== undefined && finished.refreshesCache && finished.force;
    if (failed || (next.force && !forcedRefreshRan)) {
      this.queue.post(() => this.startCheck(next.force, next.manual));
    } else {
      this.log.debug('Coalesced update check satisfied by the finished pass');
    }
  }

  // ==========================================================================
  // Install flow
  // ==========================================================================

  private startInstall(packageIds: readonly string[], simulate: boolean, allowUntrusted: boolean): void {
    const request: InstallRequest = Object.freeze({
      packageIds: Object.freeze([...packageIds]),
      simulate,
      allowUntrusted
    });

    if (request.packageIds.length === 0) {
      this.rejectInstall(createUpdateError('generic', 'install', 'No packages selected'));
      return;
    }
    if (this.install || this.check) {
      this.rejectInstall(createUpdateError('locked-or-busy', 'install', 'Another update operation is in progress'));
      return;
    }

    this.install = { request, simulate, allowUntrusted, eulaReported: false, suspended: false };
    this.activity = 'installing-updates';
    this.log.info('Installing updates', { packageIds: request.packageIds, simulate, allowUntrusted });
    this.runInstallPass(simulate, allowUntrusted);
  }

  private rejectInstall(error: UpdateError): void {
    this.log.warn(`Install request rejected: ${error.message}`);
    this.notify({ type: 'error', error });
    this.notify({ type: 'done', operation: 'install', success: false });
  }

  private runInstallPass(simulate: boolean, allowUntrusted: boolean): void {
    const attempt = this.install;
    if (!attempt) {
      return;
    }
    attempt.simulate = simulate;
    attempt.allowUntrusted = allowUntrusted;
    attempt.eulaReported = false;
    attempt.suspended = false;
    attempt.error = undefined;

    const call = this.callDaemon(() =>
      this.daemon.updatePackages(attempt.request.packageIds, { simulate, onlyTrusted: !allowUntrusted })
    );
    if ('error' in call) {
      this.finishInstall(createUpdateError('generic', 'install', call.error));
      return;
    }
    const handle = this.handles.open('install', call.transaction, (h, event) => this.onInstallEvent(h, event));
    this.log.debug('Update transaction started', { tid: handle.tid, simulate, allowUntrusted });
    this.progress.reset(describeStatus(simulate ? 'dep-resolve' : 'update'));
  }

  private onInstallEvent(handle: TransactionHandle, event: DaemonEvent): void {
    const attempt = this.install;
    if (!attempt) {
      return;
    }
    switch (event.type) {
      case 'status':
        this.applyStatus(event, FULL_RANGE);
        break;
      case 'package':
        this.progress.onStatus(`${describePackageInfo(event.info)} ${formatPackageLabel(event.packageId)}`);
        break;
      case 'require-restart':
        this.onRequireRestart(event.restart, event.packageId);
        break;
      case 'repo-signature-required':
        this.notify({ type: 'repo-signature-required', signature: event.signature });
        attempt.error ??= createUpdateError(
          'repository-signature-required',
          'install',
          `${event.signature.repoName} (${event.signature.keyId})`
        );
        break;
      case 'eula-required':
        attempt.eulaReported = true;
        this.pendingInstallRequest ??= attempt.request;
        this.log.info(`License agreement ${event.eulaId} required for ${event.packageId}`);
        this.eula.enqueue({
          eulaId: event.eulaId,
          packageId: event.packageId,
          vendor: event.vendor,
          licenseText: event.licenseText
        });
        break;
      case 'error':
        if (event.code === 'no-license-agreement') {
          this.log.debug('Install blocked on license agreements', { details: event.details });
        } else if (event.code === 'bad-gpg-signature') {
          this.log.warn(`Repository signature problem: ${event.details}`);
        } else {
          this.log.warn(`Daemon error during install: ${event.code}`, { details: event.details });
          attempt.error ??= fromDaemonError('install', event.code, event.details);
        }
        break;
      case 'finished':
        this.handles.close(handle);
        this.log.debug(`Update transaction finished: ${event.exit}`, { tid: handle.tid, runtimeMs: event.runtimeMs });
        this.onInstallFinished(attempt, event.exit);
        break;
      default:
        this.log.debug(`Ignoring '${event.type}' event during install`);
    }
  }

  private onInstallFinished(attempt: InstallAttempt, exit: TransactionExit): void {
    if (exit === 'eula-required' && !attempt.eulaReported) {
      this.finishInstall(createUpdateError('eula-required', 'install', 'The daemon requires a license agreement it did not name'));
      return;
    }
    if (attempt.eulaReported && exit !== 'success') {
      attempt.suspended = true;
      this.progress.reset('Waiting for license agreement');
      this.log.info('Install suspended until license agreements are resolved', { pending: this.eula.size });
      this.resumeInstallIfReady();
      return;
    }

    switch (exit) {
      case 'success':
        if (attempt.simulate) {
          this.log.debug('Simulation succeeded, running the update for real');
          this.runInstallPass(false, attempt.allowUntrusted);
          return;
        }
        this.finishInstall(undefined);
        return;
      case 'need-untrusted':
        if (this.config.retryUntrusted && !attempt.allowUntrusted) {
          this.log.info('Update needs untrusted packages, retrying without the trusted-only restriction');
          this.runInstallPass(false, true);
          return;
        }
        this.finishInstall(attempt.error ?? createUpdateError('repository-signature-required', 'install', 'The updates require untrusted packages'));
        return;
      default:
        this.finishInstall(attempt.error ?? createUpdateError('generic', 'install', `Installing updates failed (${exit})`));
    }
  }

  private onRequireRestart(restart: RestartKind, packageId: string): void {
    this.log.debug(`Restart '${restart}' required by ${packageId}`);
    if (restart === 'system' || restart === 'security-system') {
      this.notify({ type: 'restart-required', restart: 'system', packageId });
    } else if (restart === 'session' || restart === 'security-session') {
      this.notify({ type: 'restart-required', restart: 'session', packageId });
    }
  }

  private resumeInstallIfReady(): void {
    const attempt = this.install;
    const request = this.pendingInstallRequest;
    if (!attempt?.suspended || !request || this.eula.size > 0 || this.handles.isOpen('eula')) {
      return;
    }
    this.log.info('License agreements accepted, resubmitting install', { packageIds: request.packageIds });
    this.runInstallPass(request.simulate, request.allowUntrusted);
  }

  private resolveEula(eulaId: string, agreed: boolean): void {
    const attempt = this.install;
    const head = this.eula.head;
    if (!attempt || !head || head.eulaId !== eulaId || this.handles.isOpen('eula')) {
      this.log.debug(`Ignoring response for license agreement ${eulaId}: not awaiting a decision`);
      return;
    }

    if (!agreed) {
      const discarded = this.eula.declineAll();
      this.log.info(`License agreement ${eulaId} declined, abandoning install`, { discarded: discarded.length });
      this.finishInstall(
        createUpdateError('license-declined', 'install', `${head.vendor} license for ${packageName(head.packageId)}`),
        false
      );
      return;
    }

    const call = this.callDaemon(() => this.daemon.acceptEula(eulaId));
    if ('error' in call) {
      this.finishInstall(createUpdateError('generic', 'install', call.error));
      return;
    }
    const handle = this.handles.open('eula', call.transaction, (h, event) => this.onEulaEvent(h, event, eulaId));
    this.log.debug(`Accepting license agreement ${eulaId}`, { tid: handle.tid });
    this.progress.reset('Accepting license agreement');
  }

  private onEulaEvent(handle: TransactionHandle, event: DaemonEvent, eulaId: string): void {
    const attempt = this.install;
    if (!attempt) {
      return;
    }
    switch (event.type) {
      case 'status':
        this.applyStatus(event, FULL_RANGE);
        break;
      case 'error':
        this.log.warn(`Daemon error accepting license agreement: ${event.code}`, { details: event.details });
        attempt.error ??= fromDaemonError('install', event.code, event.details);
        break;
      case 'finished':
        this.handles.close(handle);
        if (event.exit === 'success') {
          this.log.info(`License agreement ${eulaId} accepted`);
          this.eula.resolveHead(true);
          if (attempt.suspended && this.eula.size > 0) {
            this.progress.reset('Waiting for license agreement');
          }
          this.resumeInstallIfReady();
        } else {
          this.finishInstall(attempt.error ?? createUpdateError('generic', 'install', `Accepting license agreement ${eulaId} failed (${event.exit})`));
        }
        break;
      default:
        this.log.debug(`Ignoring '${event.type}' event while accepting a license agreement`);
    }
  }

  /**
   * End the install attempt. Without an error it succeeded.
   */
  private finishInstall(error: UpdateError | undefined, recheck: boolean = true): void {
    const attempt = this.install;
    if (!attempt) {
      return;
    }
    this.install = undefined;
    for (const kind of INSTALL_HANDLES) {
      const handle = this.handles.take(kind);
      if (handle) {
        this.cancelHandle(handle);
      }
    }
    this.eula.clear();
    this.pendingInstallRequest = undefined;
    this.activity = 'idle';

    if (error) {
      this.progress.reset(error.message);
      this.log.warn(`Installing updates failed: ${error.message}`);
      this.notify({ type: 'error', error });
    } else {
      this.progress.reset('Updates installed');
      this.log.info(`Installed ${attempt.request.packageIds.length} updates`);
      this.notify({ type: 'updates-installed', packageIds: [...attempt.request.packageIds] });
    }
    this.notify({ type: 'done', operation: 'install', success: !error });

    // The catalog is stale either way: the user may also have updated by other means
    const followUp = this.coalescedCheck;
    this.coalescedCheck = undefined;
    if (recheck || followUp) {
      this.queue.post(() => this.startCheck(followUp?.force ?? false, followUp?.manual ?? false));
    }
  }

  // ==========================================================================
  // Details
  // ==========================================================================

  private fetchDetails(packageId: string): void {
    const previous = this.handles.take('detail');
    const replaced = this.detailPackageId;
    this.detailPackageId = undefined;
    if (previous) {
      this.log.debug('Replacing the pending update detail request');
      this.cancelHandle(previous);
      if (replaced !== undefined) {
        this.notify({
          type: 'error',
          packageId: replaced,
          error: createUpdateError('generic', 'detail', `Detail request for ${replaced} was replaced`)
        });
      }
    }

    const call = this.callDaemon(() => this.daemon.getUpdateDetail(packageId));
    if ('error' in call) {
      this.notify({ type: 'error', packageId, error: createUpdateError('generic', 'detail', call.error) });
      return;
    }

    this.detailPackageId = packageId;

    let delivered = false;
    let failure: UpdateError | undefined;
    this.handles.open('detail', call.transaction, (handle, event) => {
      switch (event.type) {
        case 'update-detail':
          delivered = true;
          this.notify({
            type: 'update-detail',
            packageId: event.packageId,
            updateText: event.updateText,
            urls: [...event.vendorUrls, ...event.bugzillaUrls, ...event.cveUrls],
            restart: event.restart,
            changelog: event.changelog
          });
          break;
        case 'error':
          failure ??= fromDaemonError('detail', event.code, event.details);
          break;
        case 'finished':
          this.handles.close(handle);
          this.detailPackageId = undefined;
          if (!delivered) {
            // Callers awaiting a detail always get exactly one answer
            const error = failure ?? createUpdateError('generic', 'detail', `No details for ${packageId} (${event.exit})`);
            this.log.warn(`Getting update details failed: ${error.message}`);
            this.notify({ type: 'error', packageId, error });
          }
          break;
        default:
          break;
      }
    });
  }

  // ==========================================================================
  // Shared plumbing
  // ==========================================================================

  private onSystemStateChanged(state: SystemState, previous: SystemState): void {
    this.system = state;
    if (state.networkOnline !== previous.networkOnline || state.networkMobile !== previous.networkMobile) {
      this.log.debug('Network state changed', { online: state.networkOnline, mobile: state.networkMobile });
      this.notify({ type: 'network-state-changed', online: state.networkOnline, mobile: state.networkMobile });
    }
    if (state.onBattery !== previous.onBattery) {
      this.notify({ type: 'battery-state-changed', onBattery: state.onBattery });
    }
    this.runDeferredCheck();
  }

  private applyStatus(event: Extract<DaemonEvent, { type: 'status' }>, range: StageRange): void {
    if (event.status === 'finished') {
      return;
    }
    this.progress.onStageProgress(remapStageProgress(normalizePercentage(event.percentage), range));
    this.progress.onStatus(describeStatus(event.status, event.speed, event.downloadSizeRemaining));
  }

  private callDaemon(start: () => DaemonTransaction): DaemonCall {
    try {
      return { transaction: start() };
    } catch (error) {
      this.log.error('Daemon call failed', error);
      return { error: errorMessage(error) };
    }
  }

  private cancelHandle(handle: TransactionHandle): void {
    handle.cancel().catch((error: unknown) => {
      this.log.warn(`Failed to cancel ${handle.kind} transaction`, error);
    });
  }

  private buildSnapshot(): UpdatesSnapshot {
    return buildUpdatesSnapshot({
      activity: this.activity,
      lastCheckOutcome: this.lastCheckOutcome,
      catalog: this.committed,
      percentage: this.progress.effectivePercentage(),
      statusMessage: this.progress.statusText(),
      lastCheckTimestamp: this.checkedAt,
      lastRefreshTimestamp: this.timestampStore.get(),
      isNetworkOnline: this.system.networkOnline,
      isNetworkMobile: this.system.networkMobile,
      isOnBattery: this.system.onBattery,
      now: this.clock()
    });
  }

  private publish(): void {
    const next = this.buildSnapshot();
    const fields = changedFields(this.current, next);
    if (fields.length === 0) {
      return;
    }
    this.current = next;
    for (const field of fields) {
      this.deliver({ type: 'property-changed', field, snapshot: next });
    }
  }

  private emitUpdatesChanged(): void {
    this.publish();
    this.deliver({ type: 'updates-changed', snapshot: this.current });
  }

  private notify(notification: UpdatesNotification): void {
    this.publish();
    this.deliver(notification);
  }

  private deliver(notification: UpdatesNotification): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(notification);
      } catch (error) {
        this.log.error(`Update listener failed on '${notification.type}'`, error);
      }
    }
  }
}
