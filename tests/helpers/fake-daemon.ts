/**
 * Scriptable PackageDaemon for coordinator tests. Transactions never emit
 * on their own; tests push events synchronously with the helpers below.
 */

import type {
  DaemonErrorCode,
  DaemonEvent,
  DaemonEventListener,
  DaemonTransaction,
  PackageDaemon,
  PackageInfo,
  RepoSignature,
  RestartKind,
  TransactionExit,
  TransactionFlags,
  TransactionRole,
  TransactionStatus
} from '../../src/core/daemon/types.js';
import { LogLevel, type Logger } from '../../src/types/index.js';

export interface TransactionRequest {
  force?: boolean;
  packageIds?: string[];
  flags?: TransactionFlags;
  packageId?: string;
  eulaId?: string;
}

export class FakeTransaction implements DaemonTransaction {
  cancelled = false;
  private listener?: DaemonEventListener;
  private readonly buffered: DaemonEvent[] = [];

  constructor(
    readonly tid: string,
    readonly role: TransactionRole,
    readonly request: TransactionRequest
  ) {}

  listen(listener: DaemonEventListener): void {
    this.listener = listener;
    for (const event of this.buffered.splice(0)) {
      listener(event);
    }
  }

  async cancel(): Promise<void> {
    this.cancelled = true;
  }

  emit(event: DaemonEvent): this {
    if (this.listener) {
      this.listener(event);
    } else {
      this.buffered.push(event);
    }
    return this;
  }

  status(status: TransactionStatus, percentage?: number): this {
    return this.emit({ type: 'status', status, percentage });
  }

  pkg(info: PackageInfo, packageId: string, summary: string = ''): this {
    return this.emit({ type: 'package', info, packageId, summary });
  }

  error(code: DaemonErrorCode, details: string = ''): this {
    return this.emit({ type: 'error', code, details });
  }

  eula(eulaId: string, packageId: string, vendor: string = 'Example Corp', licenseText: string = 'Terms'): this {
    return this.emit({ type: 'eula-required', eulaId, packageId, vendor, licenseText });
  }

  restart(restart: RestartKind, packageId: string): this {
    return this.emit({ type: 'require-restart', restart, packageId });
  }

  signature(signature: RepoSignature): this {
    return this.emit({ type: 'repo-signature-required', signature });
  }

  finish(exit: TransactionExit = 'success'): this {
    return this.emit({ type: 'finished', exit, runtimeMs: 5 });
  }
}

export class FakeDaemon implements PackageDaemon {
  readonly transactions: FakeTransaction[] = [];
  /** Thrown by the next daemon call instead of starting a transaction */
  failNextCall?: Error;

  refreshCache(force: boolean): DaemonTransaction {
    return this.start('refresh-cache', { force });
  }

  getUpdates(): DaemonTransaction {
    return this.start('get-updates', {});
  }

  getUpdateDetail(packageId: string): DaemonTransaction {
    return this.start('get-update-detail', { packageId });
  }

  updatePackages(packageIds: readonly string[], flags: TransactionFlags): DaemonTransaction {
    return this.start('update-packages', { packageIds: [...packageIds], flags: { ...flags } });
  }

  acceptEula(eulaId: string): DaemonTransaction {
    return this.start('accept-eula', { eulaId });
  }

  all(role: TransactionRole): FakeTransaction[] {
    return this.transactions.filter(tx => tx.role === role);
  }

  last(role: TransactionRole): FakeTransaction {
    const matching = this.all(role);
    const tx = matching[matching.length - 1];
    if (!tx) {
      throw new Error(`No '${role}' transaction was started`);
    }
    return tx;
  }

  private start(role: TransactionRole, request: TransactionRequest): FakeTransaction {
    if (this.failNextCall) {
      const error = this.failNextCall;
      this.failNextCall = undefined;
      throw error;
    }
    const tx = new FakeTransaction(`/fake_${this.transactions.length + 1}`, role, request);
    this.transactions.push(tx);
    return tx;
  }
}

/** Logger that keeps lines in memory instead of printing them */
export class MemoryLogger implements Logger {
  readonly lines: Array<{ level: LogLevel; message: string }> = [];

  debug(message: string): void {
    this.lines.push({ level: LogLevel.DEBUG, message });
  }

  info(message: string): void {
    this.lines.push({ level: LogLevel.INFO, message });
  }

  warn(message: string): void {
    this.lines.push({ level: LogLevel.WARN, message });
  }

  error(message: string): void {
    this.lines.push({ level: LogLevel.ERROR, message });
  }
}
