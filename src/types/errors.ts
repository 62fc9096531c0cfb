export type KnowledgeBaseErrorKind =
  | 'SyntaxError'
  | 'UnknownEntity'
  | 'UnknownRelation'
  | 'UnknownRule'
  | 'LimitExceeded'
  | 'ModelNotReady';

export abstract class KnowledgeBaseError extends Error {
  abstract readonly kind: KnowledgeBaseErrorKind;
}

export class StatementSyntaxError extends KnowledgeBaseError {
  readonly kind = 'SyntaxError';
  readonly source: string;

  constructor(message: string, source: string) {
    super(`${message}: '${source}'`);
    this.name = 'StatementSyntaxError';
    this.source = source;
  }
}

export class UnknownEntityError extends KnowledgeBaseError {
  readonly kind = 'UnknownEntity';
  readonly entity: string;

  constructor(entity: string) {
    super(`Unknown entity '${entity}'.`);
    this.name = 'UnknownEntityError';
    this.entity = entity;
  }
}

export class UnknownRelationError extends KnowledgeBaseError {
  readonly kind = 'UnknownRelation';
  readonly subject: string;
  readonly predicate: string;
  readonly object: string;

  constructor(subject: string, predicate: string, object: string) {
    super(`Unknown relation ${predicate}(${subject}, ${object}).`);
    this.name = 'UnknownRelationError';
    this.subject = subject;
    this.predicate = predicate;
    this.object = object;
  }
}

export class UnknownRuleError extends KnowledgeBaseError {
  readonly kind = 'UnknownRule';
  readonly reference: number | string;

  constructor(reference: number | string) {
    super(`No rule stored under ${typeof reference === 'number' ? `index ${reference}` : `'${reference}'`}.`);
    this.name = 'UnknownRuleError';
    this.reference = reference;
  }
}

export type LimitExceededReason =
  | 'propagation_limit'
  | 'recursion_limit'
  | 'chain_ceiling'
  | 'queue_ceiling';

/**
 * Describes a dropped attribute write. Returned inside a failed {@link WriteResult};
 * cyclic graphs hit these limits in normal operation, so it is never thrown.
 */
export class LimitExceededError extends KnowledgeBaseError {
  readonly kind = 'LimitExceeded';
  readonly reason: LimitExceededReason;
  readonly target: string;

  constructor(reason: LimitExceededReason, target: string) {
    super(`Write to '${target}' dropped (${reason.replace('_', ' ')}).`);
    this.name = 'LimitExceededError';
    this.reason = reason;
    this.target = target;
  }
}

export class ModelNotReadyError extends KnowledgeBaseError {
  readonly kind = 'ModelNotReady';

  constructor(message = 'No triple estimator is attached to this knowledge base.') {
    super(message);
    this.name = 'ModelNotReadyError';
  }
}
