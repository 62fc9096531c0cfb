export { KnowledgeBase } from './services/knowledge-base.js';
export { PropagationController, PropagationBudget, DEFAULT_PROPAGATION_LIMITS } from './services/propagation-controller.js';
export { ScoreTableEstimator, clampProbability, type TripleEstimator } from './services/triple-estimator.js';
export { GraphStore, type AttributeMap } from './graph/graph-store.js';
export { AttributedElement } from './graph/attributed-element.js';
export { GraphNode, type NewNeighborCallback } from './graph/node.js';
export { GraphEdge } from './graph/edge.js';
export { Term, LIST_PREDICATE, cons, listOf, nil } from './logic/term.js';
export { parseStatement, parseTerm, type ParsedStatement } from './logic/statement-parser.js';
export { unify, substitute, type Bindings } from './logic/unify.js';
export { solve, iterationBudget, DEFAULT_RESOLUTION_LIMITS, type Clause, type ClauseSource } from './logic/resolution.js';
export { Rule, type RuleChangeHook, type RuleHost } from './logic/rule.js';
export { RuleBook } from './logic/rule-book.js';
export {
  DEFAULT_CONFIG,
  getConfigValue,
  readConfig,
  reloadConfigSync,
  resolveKnowledgeBaseOptions,
  type DeepPartial,
  type FactGraphConfig,
} from './config/config-loader.js';
export * from './types/errors.js';
export * from './types/knowledge-base.js';
