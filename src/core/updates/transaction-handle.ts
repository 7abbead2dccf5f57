import type { DaemonEvent, DaemonTransaction, TransactionRole } from '../daemon/types.js';

/**
 * Kinds of daemon work the coordinator tracks. At most one live handle per
 * kind exists at any time.
 */
export type HandleKind = 'cache' | 'updates' | 'install' | 'detail' | 'eula';

export type HandleEventHandler = (handle: TransactionHandle, event: DaemonEvent) => void;

/**
 * Owned wrapper around one in-flight daemon transaction.
 *
 * Events are forwarded through `post` (the coordinator's serial queue) and
 * dropped once the handle is no longer valid, so a transaction that was
 * closed, cancelled or replaced can never touch coordinator state again.
 */
export class TransactionHandle {
  private valid = true;

  constructor(
    readonly kind: HandleKind,
    private readonly transaction: DaemonTransaction,
    post: (task: () => void) => void,
    onEvent: HandleEventHandler
  ) {
    transaction.listen((event) => {
      post(() => {
        if (this.valid) {
          onEvent(this, event);
        }
      });
    });
  }

  get isValid(): boolean {
    return this.valid;
  }

  get tid(): string {
    return this.transaction.tid;
  }

  get role(): TransactionRole {
    return this.transaction.role;
  }

  /** Stop delivering events. The daemon transaction itself is left alone. */
  invalidate(): void {
    this.valid = false;
  }

  /**
   * Invalidate the handle and ask the daemon to cancel the transaction.
   * Resolves immediately for a handle that is already invalid.
   */
  async cancel(): Promise<void> {
    if (!this.valid) {
      return;
    }
    this.valid = false;
    await this.transaction.cancel();
  }
}

export class HandleConflictError extends Error {
  constructor(kind: HandleKind) {
    super(`A '${kind}' transaction is already open`);
    this.name = 'HandleConflictError';
  }
}

/**
 * Tracks the live handle of each kind.
 */
export class HandleRegistry {
  private readonly handles = new Map<HandleKind, TransactionHandle>();

  constructor(private readonly post: (task: () => void) => void) {}

  open(kind: HandleKind, transaction: DaemonTransaction, onEvent: HandleEventHandler): TransactionHandle {
    if (this.isOpen(kind)) {
      throw new HandleConflictError(kind);
    }
    const handle = new TransactionHandle(kind, transaction, this.post, onEvent);
    this.handles.set(kind, handle);
    return handle;
  }

  get(kind: HandleKind): TransactionHandle | undefined {
    const handle = this.handles.get(kind);
    return handle?.isValid ? handle : undefined;
  }

  isOpen(kind: HandleKind): boolean {
    return this.get(kind) !== undefined;
  }

  /** Invalidate and forget a handle, if it is still the registered one. */
  close(handle: TransactionHandle): void {
    handle.invalidate();
    if (this.handles.get(handle.kind) === handle) {
      this.handles.delete(handle.kind);
    }
  }

  /**
   * Forget the handle and return it for cancellation by the caller.
   */
  take(kind: HandleKind): TransactionHandle | undefined {
    const handle = this.get(kind);
    this.handles.delete(kind);
    return handle;
  }

  openKinds(): HandleKind[] {
    return [...this.handles.entries()]
      .filter(([, handle]) => handle.isValid)
      .map(([kind]) => kind);
  }
}
