import { LimitExceededError, type LimitExceededReason } from '../types/errors.js';
import type { AttributeValue, PropagationLimits, WriteResult } from '../types/knowledge-base.js';
import { logThought } from '../utils/logger.js';

export const DEFAULT_PROPAGATION_LIMITS: PropagationLimits = {
  recursionLimit: 1,
  propagationLimit: Infinity,
  maxChainLength: 100_000,
  maxPendingNotifications: 1_000_000,
};

/**
 * Budget a queued notification runs under: how many hops it is from the external
 * write that started the chain, and how often each element already appears in its
 * lineage. Immutable; every hop derives a new one.
 */
export class PropagationBudget {
  static readonly root = new PropagationBudget(0, new Map());

  readonly hops: number;
  readonly #depths: ReadonlyMap<string, number>;

  private constructor(hops: number, depths: ReadonlyMap<string, number>) {
    this.hops = hops;
    this.#depths = depths;
  }

  depthOf(target: string): number {
    return this.#depths.get(target) ?? 0;
  }

  remaining(limit: number): number {
    return Math.max(0, limit - this.hops);
  }

  descend(target: string): PropagationBudget {
    const depths = new Map(this.#depths);
    depths.set(target, this.depthOf(target) + 1);
    return new PropagationBudget(this.hops + 1, depths);
  }
}

interface PendingNotification {
  target: string;
  budget: PropagationBudget;
  run: () => void;
}

/**
 * Gates attribute writes and drains the notifications they cause.
 *
 * The first write made outside a chain applies its value, queues its notification
 * and drains the queue before returning; writes made by callbacks while draining
 * only apply and queue. Callbacks therefore never nest on the call stack.
 */
export class PropagationController {
  readonly #limits: PropagationLimits;
  #queue: PendingNotification[] = [];
  #head = 0;
  #current: PropagationBudget | null = null;
  #draining = false;
  #suppressed = false;
  #droppedInChain = 0;

  constructor(limits: Partial<PropagationLimits> = {}) {
    this.#limits = {
      recursionLimit: normalizeLimit(limits.recursionLimit, DEFAULT_PROPAGATION_LIMITS.recursionLimit),
      propagationLimit: normalizeLimit(limits.propagationLimit, DEFAULT_PROPAGATION_LIMITS.propagationLimit),
      maxChainLength: normalizeLimit(limits.maxChainLength, DEFAULT_PROPAGATION_LIMITS.maxChainLength),
      maxPendingNotifications: normalizeLimit(
        limits.maxPendingNotifications,
        DEFAULT_PROPAGATION_LIMITS.maxPendingNotifications,
      ),
    };
  }

  get limits(): Readonly<PropagationLimits> {
    return this.#limits;
  }

  setRecursionLimit(limit: number): void {
    this.#limits.recursionLimit = normalizeLimit(limit, this.#limits.recursionLimit);
  }

  setPropagationLimit(limit: number): void {
    this.#limits.propagationLimit = normalizeLimit(limit, this.#limits.propagationLimit);
  }

  get suppressed(): boolean {
    return this.#suppressed;
  }

  /** Hops of the notification currently running; 0 between external writes. */
  get inFlight(): number {
    return this.#current?.hops ?? 0;
  }

  get pending(): number {
    return this.#queue.length - this.#head;
  }

  /**
   * Runs `fn` with notifications switched off. The flag is not a stack: leaving any
   * scope, nested or not, turns it back off, also when `fn` throws.
   */
  dontPropagate<T>(fn: () => T): T {
    this.#suppressed = true;
    try {
      return fn();
    } finally {
      this.#suppressed = false;
    }
  }

  /**
   * Applies one attribute write to `target` if the current budget allows it.
   * `apply` stores the value and returns the previous one; `notify` runs the
   * element's watches later, in queue order.
   */
  write(
    target: string,
    apply: () => AttributeValue | undefined,
    notify: (previous: AttributeValue | undefined) => void,
  ): WriteResult {
    const budget = this.#current ?? PropagationBudget.root;
    const rejection = this.#check(target, budget);
    if (rejection) {
      if (this.#draining) this.#droppedInChain += 1;
      return { applied: false, error: new LimitExceededError(rejection, target) };
    }

    const previous = apply();
    if (!this.#suppressed) {
      this.#queue.push({ target, budget: budget.descend(target), run: () => notify(previous) });
    }
    if (!this.#draining && this.pending > 0) {
      this.#drain();
    }
    return { applied: true, previous };
  }

  #check(target: string, budget: PropagationBudget): LimitExceededReason | null {
    if (budget.hops > this.#limits.propagationLimit) return 'propagation_limit';
    if (budget.depthOf(target) > this.#limits.recursionLimit) return 'recursion_limit';
    if (budget.hops >= this.#limits.maxChainLength) return 'chain_ceiling';
    if (!this.#suppressed && this.pending >= this.#limits.maxPendingNotifications) return 'queue_ceiling';
    return null;
  }

  #drain(): void {
    this.#draining = true;
    let target = '';
    try {
      while (this.#head < this.#queue.length) {
        const next = this.#queue[this.#head];
        this.#head += 1;
        target = next.target;
        this.#current = next.budget;
        next.run();
      }
      if (this.#droppedInChain > 0) {
        void logThought(`[Propagation] Chain settled; ${this.#droppedInChain} write(s) dropped by limits.`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      void logThought(
        `[Propagation] Chain aborted by a callback on '${target}' (${message}); ${this.pending} notification(s) discarded.`,
      );
      throw error;
    } finally {
      this.#queue = [];
      this.#head = 0;
      this.#current = null;
      this.#draining = false;
      this.#droppedInChain = 0;
    }
  }
}

function normalizeLimit(value: number | undefined, fallback: number): number {
  if (value === undefined || Number.isNaN(value)) {
    return fallback;
  }
  return value === Infinity ? Infinity : Math.max(0, Math.floor(value));
}
