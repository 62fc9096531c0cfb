import type { LimitExceededError } from './errors.js';

/** Reference to a host object stored as an attribute; the engine never inspects it. */
export interface OpaqueHandle<T = unknown> {
  readonly kind: 'handle';
  readonly ref: T;
}

export type ScalarValue = string | number | boolean;

export type AttributeValue = ScalarValue | OpaqueHandle;

export type AttributeRecord = Record<string, AttributeValue>;

export type WriteResult =
  | { applied: true; previous: AttributeValue | undefined }
  | { applied: false; error: LimitExceededError };

export interface WatchId {
  attribute: string;
  id: number;
}

export type NeighborDirection = 'out' | 'in';

export interface PredicateDescriptor {
  pred: string;
}

export interface Neighbor {
  name: string;
  predicates: PredicateDescriptor[];
}

export type Triple = [subject: string, predicate: string, object: string];

export type TripleWithData = [
  subject: string,
  predicate: string,
  object: string,
  subjectAttributes: AttributeRecord,
  edgeAttributes: AttributeRecord,
  objectAttributes: AttributeRecord,
  isNegative: boolean,
];

/** Variable name to rendered value, or `true` for a proof that bound nothing. */
export type QueryAnswer = Record<string, string> | true;

export type RuleId = number | `~${number}`;

export interface PathStep {
  pred: string;
  node: string;
}

export interface IdTables {
  entities: Map<string, number>;
  relations: Map<string, number>;
}

export interface PropagationLimits {
  recursionLimit: number;
  propagationLimit: number;
  maxChainLength: number;
  maxPendingNotifications: number;
}

export interface ResolutionLimits {
  minIterations: number;
  growthExponent: number;
}

export interface KnowledgeBaseOptions {
  propagation: PropagationLimits;
  resolution: ResolutionLimits;
}

export function handle<T>(ref: T): OpaqueHandle<T> {
  return { kind: 'handle', ref };
}
