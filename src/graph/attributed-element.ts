import type { PropagationController } from '../services/propagation-controller.js';
import type { AttributeRecord, AttributeValue, WatchId, WriteResult } from '../types/knowledge-base.js';
import type { AttributeMap } from './graph-store.js';

interface WatchEntry<T> {
  id: number;
  fn: (element: T, previous: AttributeValue | undefined) => void;
}

/**
 * Live view over one attribute map in the graph store, plus the watches registered
 * on it. Every `set` goes through the knowledge base's propagation controller.
 */
export abstract class AttributedElement {
  protected readonly propagation: PropagationController;
  readonly #watches: Map<string, WatchEntry<this>[]> = new Map();
  #nextWatchId = 0;

  protected constructor(propagation: PropagationController) {
    this.propagation = propagation;
  }

  /** Identity used for per-element recursion depth. */
  abstract get key(): string;

  protected abstract get attributes(): AttributeMap;

  /** Runs after the watches of a propagated write. */
  protected afterWatches(_attribute: string, _value: AttributeValue, _previous: AttributeValue | undefined): void {}

  get attrs(): AttributeRecord {
    return Object.fromEntries(this.attributes);
  }

  get(attribute: string): AttributeValue | undefined {
    return this.attributes.get(attribute);
  }

  has(attribute: string): boolean {
    return this.attributes.has(attribute);
  }

  set(attribute: string, value: AttributeValue): WriteResult {
    return this.propagation.write(
      this.key,
      () => {
        const attributes = this.attributes;
        const previous = attributes.get(attribute);
        attributes.set(attribute, value);
        return previous;
      },
      (previous) => this.#notify(attribute, value, previous),
    );
  }

  /** Adds `delta` to a numeric attribute, treating a missing one as 0. */
  increment(attribute: string, delta = 1): WriteResult {
    const current = this.attributes.get(attribute) ?? 0;
    if (typeof current !== 'number') {
      throw new TypeError(`Attribute '${attribute}' of ${String(this)} is not numeric.`);
    }
    return this.set(attribute, current + delta);
  }

  /** Merges attributes without running watches or rules. */
  update(attributes: AttributeRecord): void {
    const target = this.attributes;
    for (const [name, value] of Object.entries(attributes)) {
      target.set(name, value);
    }
  }

  delete(attribute: string): boolean {
    return this.attributes.delete(attribute);
  }

  watch(attribute: string, fn: (element: this, previous: AttributeValue | undefined) => void): WatchId {
    const id = this.#nextWatchId;
    this.#nextWatchId += 1;
    const entries = this.#watches.get(attribute) ?? [];
    entries.push({ id, fn });
    this.#watches.set(attribute, entries);
    return { attribute, id };
  }

  /** Removes one watch, or every watch on an attribute. Returns how many were removed. */
  removeWatch(target: string | WatchId): number {
    if (typeof target === 'string') {
      const removed = this.#watches.get(target)?.length ?? 0;
      this.#watches.delete(target);
      return removed;
    }
    const entries = this.#watches.get(target.attribute);
    if (!entries) {
      return 0;
    }
    const index = entries.findIndex((entry) => entry.id === target.id);
    if (index === -1) {
      return 0;
    }
    entries.splice(index, 1);
    return 1;
  }

  watchCount(attribute: string): number {
    return this.#watches.get(attribute)?.length ?? 0;
  }

  #notify(attribute: string, value: AttributeValue, previous: AttributeValue | undefined): void {
    // snapshot: a watch may register or remove watches while running
    const entries = [...(this.#watches.get(attribute) ?? [])];
    for (const entry of entries) {
      entry.fn(this, previous);
    }
    this.afterWatches(attribute, value, previous);
  }
}
