/**
 * System State Port
 *
 * Network and power sensors, consumed as plain booleans. The embedding
 * application feeds these from whatever it watches (NetworkManager, UPower,
 * a mobile OS API); the coordinator only reads and subscribes.
 */

export interface SystemState {
  networkOnline: boolean;
  /** Metered / mobile connection; only meaningful while online */
  networkMobile: boolean;
  onBattery: boolean;
}

export type SystemStateListener = (state: SystemState, previous: SystemState) => void;

export interface SystemStatePort {
  current(): SystemState;
  /** Returns an unsubscribe function */
  subscribe(listener: SystemStateListener): () => void;
}

/**
 * In-process SystemStatePort whose values are pushed by the owner.
 */
export class StaticSystemState implements SystemStatePort {
  private state: SystemState;
  private readonly listeners = new Set<SystemStateListener>();

  constructor(initial: Partial<SystemState> = {}) {
    this.state = {
      networkOnline: initial.networkOnline ?? true,
      networkMobile: initial.networkMobile ?? false,
      onBattery: initial.onBattery ?? false
    };
  }

  current(): SystemState {
    return { ...this.state };
  }

  subscribe(listener: SystemStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  update(changes: Partial<SystemState>): void {
    const previous = this.state;
    const next = { ...previous, ...changes };
    if (
      next.networkOnline === previous.networkOnline &&
      next.networkMobile === previous.networkMobile &&
      next.onBattery === previous.onBattery
    ) {
      return;
    }
    this.state = next;
    for (const listener of [...this.listeners]) {
      listener({ ...next }, { ...previous });
    }
  }
}
