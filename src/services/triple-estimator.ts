import { ModelNotReadyError } from '../types/errors.js';
import type { IdTables } from '../types/knowledge-base.js';

/**
 * Scores how plausible a triple is. Implementations usually wrap an embedding model
 * trained on `kb.toTriples(true)` with the ids from `kb.idTables()`.
 */
export interface TripleEstimator {
  estimate(subject: string, predicate: string, object: string, ids: IdTables): number;
}

export function clampProbability(value: number): number {
  if (Number.isNaN(value)) {
    throw new ModelNotReadyError('Triple estimator returned NaN.');
  }
  return Math.min(1, Math.max(0, value));
}

/**
 * Estimator backed by a fixed score table, keyed `subject|predicate|object`.
 * Unlisted triples score `fallback`.
 */
export class ScoreTableEstimator implements TripleEstimator {
  readonly #scores: Map<string, number>;
  readonly #fallback: number;

  constructor(scores: Iterable<[subject: string, predicate: string, object: string, score: number]>, fallback = 0) {
    this.#scores = new Map();
    for (const [subject, predicate, object, score] of scores) {
      this.#scores.set(scoreKey(subject, predicate, object), score);
    }
    this.#fallback = fallback;
  }

  estimate(subject: string, predicate: string, object: string): number {
    return this.#scores.get(scoreKey(subject, predicate, object)) ?? this.#fallback;
  }
}

function scoreKey(subject: string, predicate: string, object: string): string {
  return `${subject}|${predicate}|${object}`;
}
