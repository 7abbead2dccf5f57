import { logger } from '../../utils/logger.js';
import { loadBackendManifest, type BackendManifest, type ManifestEula, type ManifestUpdate } from './manifest.js';
import type {
  DaemonEvent,
  DaemonEventListener,
  DaemonTransaction,
  PackageDaemon,
  TransactionFlags,
  TransactionRole
} from './types.js';

const log = logger.child('manifest-daemon');

/** Percentage the daemon reports when it cannot tell */
const UNKNOWN_PERCENTAGE = 101;

type Step = DaemonEvent | (() => void);

class ManifestTransaction implements DaemonTransaction {
  private listener?: DaemonEventListener;
  private readonly buffered: DaemonEvent[] = [];
  private readonly startedAt = Date.now();
  private ended = false;

  constructor(
    readonly tid: string,
    readonly role: TransactionRole
  ) {}

  get isFinished(): boolean {
    return this.ended;
  }

  listen(listener: DaemonEventListener): void {
    this.listener = listener;
    for (const event of this.buffered.splice(0, this.buffered.length)) {
      listener(event);
    }
  }

  async cancel(): Promise<void> {
    if (this.ended) {
      return;
    }
    log.debug(`Cancelling ${this.tid}`);
    this.emit({ type: 'error', code: 'transaction-cancelled', details: 'The transaction was cancelled' });
    this.finish('cancelled');
  }

  emit(event: DaemonEvent): void {
    if (this.ended) {
      return;
    }
    if (event.type === 'finished') {
      this.ended = true;
    }
    if (this.listener) {
      this.listener(event);
    } else {
      this.buffered.push(event);
    }
  }

  finish(exit: Extract<DaemonEvent, { type: 'finished' }>['exit']): void {
    this.emit({ type: 'finished', exit, runtimeMs: Date.now() - this.startedAt });
  }
}

/**
 * In-process PackageDaemon that replays a backend manifest.
 *
 * Each transaction plays its events one per event-loop turn, so callers see
 * the same asynchronous delivery a real daemon gives. Installing packages
 * removes them from the manifest's update list; accepting a license
 * agreement is remembered for the daemon's lifetime.
 */
export class ManifestDaemon implements PackageDaemon {
  private readonly updates: Map<string, ManifestUpdate>;
  private readonly acceptedEulas = new Set<string>();
  private nextTid = 1;

  constructor(private readonly manifest: BackendManifest) {
    this.updates = new Map(manifest.updates.map(update => [update.id, update]));
  }

  static async fromFile(path: string): Promise<ManifestDaemon> {
    log.debug(`Loading backend manifest: ${path}`);
    return new ManifestDaemon(await loadBackendManifest(path));
  }

  /** Ids still pending as updates */
  get pendingUpdateIds(): string[] {
    return [...this.updates.keys()];
  }

  isEulaAccepted(eulaId: string): boolean {
    return this.acceptedEulas.has(eulaId);
  }

  refreshCache(force: boolean): DaemonTransaction {
    const failure = this.manifest.refreshError;
    return this.play('refresh-cache', tx => {
      if (failure) {
        return [
          { type: 'status', status: 'refresh-cache', percentage: 0 },
          { type: 'error', code: failure.code, details: failure.details },
          () => tx.finish('failed')
        ];
      }
      return [
        { type: 'status', status: force ? 'refresh-cache' : 'loading-cache', percentage: 0 },
        { type: 'status', status: 'download-repository', percentage: 50 },
        { type: 'status', status: 'refresh-cache', percentage: 100 },
        () => tx.finish('success')
      ];
    });
  }

  getUpdates(): DaemonTransaction {
    return this.play('get-updates', tx => [
      { type: 'status', status: 'query', percentage: UNKNOWN_PERCENTAGE },
      ...[...this.updates.values()].map((update): DaemonEvent => ({
        type: 'package',
        info: update.info,
        packageId: update.id,
        summary: update.summary
      })),
      () => tx.finish('success')
    ]);
  }

  getUpdateDetail(packageId: string): DaemonTransaction {
    return this.play('get-update-detail', tx => {
      const update = this.updates.get(packageId);
      const detail = this.manifest.details[packageId];
      if (!update && !detail) {
        return [
          { type: 'error', code: 'unknown', details: `No update information for ${packageId}` },
          () => tx.finish('failed')
        ];
      }
      return [
        { type: 'status', status: 'info', percentage: UNKNOWN_PERCENTAGE },
        {
          type: 'update-detail',
          packageId,
          updateText: detail?.updateText || update?.summary || '',
          vendorUrls: detail?.vendorUrls ?? [],
          bugzillaUrls: detail?.bugzillaUrls ?? [],
          cveUrls: detail?.cveUrls ?? [],
          restart: detail?.restart ?? update?.restart ?? 'none',
          changelog: detail?.changelog
        },
        () => tx.finish('success')
      ];
    });
  }

  updatePackages(packageIds: readonly string[], flags: TransactionFlags): DaemonTransaction {
    return this.play('update-packages', tx => {
      const unknown = packageIds.filter(id => !this.updates.has(id));
      if (unknown.length > 0) {
        return [
          { type: 'error', code: 'dep-resolution-failed', details: `Packages not found: ${unknown.join(', ')}` },
          () => tx.finish('failed')
        ];
      }

      const targets = packageIds.flatMap(id => {
        const update = this.updates.get(id);
        return update ? [update] : [];
      });

      const missingEulas = this.requiredEulas(targets);
      if (missingEulas.length > 0) {
        return [
          { type: 'status', status: 'dep-resolve', percentage: UNKNOWN_PERCENTAGE },
          ...missingEulas.map((eula): DaemonEvent => ({ type: 'eula-required', ...eula })),
          { type: 'error', code: 'no-license-agreement', details: 'License agreements must be accepted first' },
          () => tx.finish('eula-required')
        ];
      }

      if (flags.onlyTrusted && targets.some(update => update.untrusted)) {
        return [
          { type: 'status', status: 'sig-check', percentage: UNKNOWN_PERCENTAGE },
          () => tx.finish('need-untrusted')
        ];
      }

      if (flags.simulate) {
        return [
          { type: 'status', status: 'dep-resolve', percentage: UNKNOWN_PERCENTAGE },
          ...targets.map((update): DaemonEvent => ({
            type: 'package',
            info: 'updating',
            packageId: update.id,
            summary: update.summary
          })),
          () => tx.finish('success')
        ];
      }

      return [
        { type: 'status', status: 'download', percentage: 0 },
        ...targets.flatMap((update, index): Step[] => {
          const steps: Step[] = [
            { type: 'package', info: 'updating', packageId: update.id, summary: update.summary },
            { type: 'status', status: 'update', percentage: Math.round(((index + 1) / targets.length) * 100) }
          ];
          if (update.restart !== 'none') {
            steps.push({ type: 'require-restart', restart: update.restart, packageId: update.id });
          }
          return steps;
        }),
        () => {
          for (const update of targets) {
            this.updates.delete(update.id);
          }
          log.debug(`Installed ${targets.length} updates`, { tid: tx.tid });
          tx.finish('success');
        }
      ];
    });
  }

  acceptEula(eulaId: string): DaemonTransaction {
    return this.play('accept-eula', tx => {
      if (!this.manifest.eulas.some(eula => eula.eulaId === eulaId)) {
        return [
          { type: 'error', code: 'unknown', details: `Unknown license agreement: ${eulaId}` },
          () => tx.finish('failed')
        ];
      }
      return [
        { type: 'status', status: 'request', percentage: UNKNOWN_PERCENTAGE },
        () => {
          this.acceptedEulas.add(eulaId);
          tx.finish('success');
        }
      ];
    });
  }

  private requiredEulas(targets: readonly ManifestUpdate[]): ManifestEula[] {
    const ids = new Set(targets.map(update => update.id));
    return this.manifest.eulas.filter(eula => ids.has(eula.packageId) && !this.acceptedEulas.has(eula.eulaId));
  }

  /**
   * Start a transaction whose steps are computed on the first turn, then
   * played one per turn until it finishes or is cancelled.
   */
  private play(role: TransactionRole, script: (tx: ManifestTransaction) => Step[]): ManifestTransaction {
    const tx = new ManifestTransaction(`/${this.nextTid++}_${role}`, role);
    log.debug(`Starting ${tx.tid}`);

    const runStep = (steps: Step[]): void => {
      const step = steps.shift();
      if (!step || tx.isFinished) {
        return;
      }
      if (typeof step === 'function') {
        step();
      } else {
        tx.emit(step);
      }
      setImmediate(runStep, steps);
    };

    setImmediate(() => runStep(script(tx)));
    return tx;
  }
}
