export type EulaDecision = 'pending' | 'accepted' | 'declined';

export interface EulaRequest {
  readonly eulaId: string;
  readonly packageId: string;
  readonly vendor: string;
  readonly licenseText: string;
  decision: EulaDecision;
}

export type EulaRequestInput = Omit<EulaRequest, 'decision'>;

/**
 * First-in-first-out queue of license agreements an install attempt is
 * waiting on. Only the head is ever surfaced; surfacing happens when a
 * request becomes the head (on enqueue into an empty queue, or when the
 * previous head is resolved).
 */
export class EulaNegotiator {
  private readonly queue: EulaRequest[] = [];

  constructor(private readonly surface: (request: Readonly<EulaRequest>) => void) {}

  get head(): Readonly<EulaRequest> | undefined {
    return this.queue[0];
  }

  get size(): number {
    return this.queue.length;
  }

  get pending(): ReadonlyArray<Readonly<EulaRequest>> {
    return [...this.queue];
  }

  has(eulaId: string): boolean {
    return this.queue.some(request => request.eulaId === eulaId);
  }

  /**
   * Append a request. A daemon repeating an agreement that is already
   * queued is ignored. Returns whether the request was added.
   */
  enqueue(input: EulaRequestInput): boolean {
    if (this.has(input.eulaId)) {
      return false;
    }
    const request: EulaRequest = { ...input, decision: 'pending' };
    this.queue.push(request);
    if (this.queue.length === 1) {
      this.surface(request);
    }
    return true;
  }

  /**
   * Record the decision for the head, pop it, and surface the next one.
   */
  resolveHead(agreed: boolean): EulaRequest | undefined {
    const resolved = this.queue.shift();
    if (!resolved) {
      return undefined;
    }
    resolved.decision = agreed ? 'accepted' : 'declined';
    const next = this.queue[0];
    if (next) {
      this.surface(next);
    }
    return resolved;
  }

  /**
   * Decline the head and drop everything behind it; nothing further is surfaced.
   */
  declineAll(): EulaRequest[] {
    const discarded = this.clear();
    for (const request of discarded) {
      request.decision = 'declined';
    }
    return discarded;
  }

  /** Discard every queued request without surfacing anything. */
  clear(): EulaRequest[] {
    return this.queue.splice(0, this.queue.length);
  }
}
