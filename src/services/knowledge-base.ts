import { resolveKnowledgeBaseOptions, type DeepPartial } from '../config/config-loader.js';
import { GraphEdge } from '../graph/edge.js';
import { GraphStore } from '../graph/graph-store.js';
import { GraphNode } from '../graph/node.js';
import { solve } from '../logic/resolution.js';
import { RuleBook } from '../logic/rule-book.js';
import { Rule, type RuleHost } from '../logic/rule.js';
import { parseStatement, parseTerm, splitTopLevel, stripWhitespace } from '../logic/statement-parser.js';
import type { Term } from '../logic/term.js';
import {
  ModelNotReadyError,
  StatementSyntaxError,
  UnknownEntityError,
  UnknownRelationError,
  UnknownRuleError,
} from '../types/errors.js';
import type {
  AttributeRecord,
  IdTables,
  KnowledgeBaseOptions,
  Neighbor,
  NeighborDirection,
  PathStep,
  QueryAnswer,
  ResolutionLimits,
  RuleId,
  Triple,
  TripleWithData,
} from '../types/knowledge-base.js';
import { logThought } from '../utils/logger.js';
import { PropagationController } from './propagation-controller.js';
import { clampProbability, type TripleEstimator } from './triple-estimator.js';

const NEGATIVE_PREFIX = '~';
const NEGATIVE_ID = /^~\d+$/;

/**
 * Facts, rules and a property graph that stay in sync.
 *
 * Storing a statement adds a rule for the resolution engine and materializes its
 * arguments as graph entities (two-argument facts also become edges). Node and edge
 * attributes are reactive: writes run watches and the change hooks of affected rules
 * through one {@link PropagationController}.
 */
export class KnowledgeBase implements RuleHost {
  readonly graph: GraphStore = new GraphStore();
  readonly propagation: PropagationController;

  readonly #rules: RuleBook = new RuleBook();
  readonly #negatives: Array<Term | undefined> = [];
  readonly #nodes: Map<string, GraphNode> = new Map();
  readonly #edges: Map<string, GraphEdge> = new Map();
  readonly #resolution: ResolutionLimits;
  #estimator: TripleEstimator | null = null;

  constructor(options: DeepPartial<KnowledgeBaseOptions> = {}) {
    const resolved = resolveKnowledgeBaseOptions(options);
    this.propagation = new PropagationController(resolved.propagation);
    this.#resolution = resolved.resolution;
  }

  // ── Statements ───────────────────────────────────────────────────────────────

  /**
   * Stores a fact, an inference rule or a `~negative` example and returns its id.
   * Storing a statement already present returns the existing id and only merges the
   * given attributes.
   */
  store(
    statement: string,
    nodeAttributes: readonly AttributeRecord[] = [],
    edgeAttributes: AttributeRecord = {},
  ): RuleId {
    const parsed = parseStatement(statement);
    const { truthiness } = edgeAttributes;
    if (parsed.negative || (typeof truthiness === 'number' && truthiness < 0)) {
      if (parsed.goals.length > 0) {
        throw new StatementSyntaxError('Negative examples must be facts', statement);
      }
      return this.#storeNegative(parsed.head);
    }

    const isFact = parsed.goals.length === 0;
    const hasEdgeAttributes = Object.keys(edgeAttributes).length > 0;
    if (hasEdgeAttributes && !isFact) {
      throw new StatementSyntaxError('Cannot set edge attributes on an inference rule', statement);
    }
    if (hasEdgeAttributes && parsed.head.arity !== 2) {
      throw new StatementSyntaxError('Edge attributes need a two-argument fact', statement);
    }
    if (nodeAttributes.length > parsed.head.arity) {
      throw new StatementSyntaxError(
        `Got ${nodeAttributes.length} node attribute record(s) for ${parsed.head.arity} argument(s)`,
        statement,
      );
    }

    const rule = new Rule(this, parsed.head, parsed.goals);
    let index = this.#rules.indexOf(rule.definition);
    if (index === undefined) {
      index = this.#rules.add(rule);
      this.#materialize(parsed.head, isFact);
      void logThought(`[KnowledgeBase] Stored ${isFact ? 'fact' : 'rule'} #${index}: ${rule.definition}`);
    }

    const names = parsed.head.args.map(String);
    nodeAttributes.forEach((attributes, position) => this.node(names[position]).update(attributes));
    if (hasEdgeAttributes) {
      this.edge(names[0], parsed.head.pred, names[1]).update(edgeAttributes);
    }
    return index;
  }

  /**
   * Removes a rule or a negative example. Other ids stay valid. Deleting a
   * two-argument fact also removes its edge; entities are kept. Text that is not
   * exactly `~N` matches nothing.
   */
  delete(id: RuleId | string): boolean {
    if (typeof id === 'string') {
      if (!NEGATIVE_ID.test(id)) {
        return false;
      }
      const position = Number(id.slice(NEGATIVE_PREFIX.length));
      if (this.#negatives[position] === undefined) {
        return false;
      }
      this.#negatives[position] = undefined;
      return true;
    }

    const rule = this.#rules.remove(id);
    if (!rule) {
      return false;
    }
    if (rule.isFact && rule.head.arity === 2) {
      const [subject, object] = rule.head.args.map(String);
      const key = GraphEdge.keyOf(subject, rule.head.pred, object);
      this.graph.removeRelation(subject, rule.head.pred, object);
      this.#edges.get(key)?.detach();
      this.#edges.delete(key);
    }
    void logThought(`[KnowledgeBase] Deleted #${id}: ${rule.definition}`);
    return true;
  }

  /** Looks a rule up by index or by its rendered head, e.g. `winner(X)`. */
  rule(reference: number | string): Rule {
    const rule =
      typeof reference === 'number'
        ? this.#rules.at(reference)
        : this.#rules.findByHead(String(parseTerm(reference)));
    if (!rule) {
      throw new UnknownRuleError(reference);
    }
    return rule;
  }

  get rules(): Rule[] {
    return [...this.#rules];
  }

  get negativeExamples(): string[] {
    return this.#negatives.filter((term): term is Term => term !== undefined).map(String);
  }

  /**
   * Proves a goal, or a comma-separated conjunction of goals, and returns a lazy
   * sequence of answers. The text is parsed before anything runs.
   */
  query(statement: string): Generator<QueryAnswer, void, undefined> {
    const source = stripWhitespace(statement);
    if (source.includes(':-')) {
      throw new StatementSyntaxError('Queries cannot contain rules', statement);
    }
    const goals = splitTopLevel(source, ',').map(parseTerm);
    return solve(goals, this.#rules, this.#resolution);
  }

  // ── Propagation ──────────────────────────────────────────────────────────────

  setRecursionLimit(limit: number): void {
    this.propagation.setRecursionLimit(limit);
  }

  setPropagationLimit(limit: number): void {
    this.propagation.setPropagationLimit(limit);
  }

  dontPropagate<T>(fn: () => T): T {
    return this.propagation.dontPropagate(fn);
  }

  // ── Graph ────────────────────────────────────────────────────────────────────

  hasEntity(name: string): boolean {
    return this.graph.hasEntity(name);
  }

  node(name: string): GraphNode {
    let node = this.#nodes.get(name);
    if (!node) {
      if (!this.graph.hasEntity(name)) {
        throw new UnknownEntityError(name);
      }
      node = new GraphNode(this, name);
      this.#nodes.set(name, node);
    }
    return node;
  }

  edge(subject: string, predicate: string, object: string): GraphEdge {
    const key = GraphEdge.keyOf(subject, predicate, object);
    let edge = this.#edges.get(key);
    if (!edge) {
      if (!this.graph.hasRelation(subject, predicate, object)) {
        throw new UnknownRelationError(subject, predicate, object);
      }
      edge = new GraphEdge(this, subject, predicate, object);
      this.#edges.set(key, edge);
    }
    return edge;
  }

  *nodes(filter?: (node: GraphNode) => boolean): Generator<GraphNode> {
    for (const name of this.graph.entities()) {
      const node = this.node(name);
      if (!filter || filter(node)) {
        yield node;
      }
    }
  }

  *edges(filter?: (edge: GraphEdge) => boolean): Generator<GraphEdge> {
    for (const [subject, predicate, object] of this.graph.relations()) {
      const edge = this.edge(subject, predicate, object);
      if (!filter || filter(edge)) {
        yield edge;
      }
    }
  }

  neighbors(name: string, direction: NeighborDirection = 'out'): Neighbor[] {
    return this.graph.neighbors(name, direction);
  }

  /** Merges attributes into a node without propagation. */
  attr(name: string, attributes: AttributeRecord): void {
    this.node(name).update(attributes);
  }

  /** Merges attributes into an edge without propagation. */
  edgeAttr(subject: string, predicate: string, object: string, attributes: AttributeRecord): void {
    this.edge(subject, predicate, object).update(attributes);
  }

  deleteEdgeAttr(subject: string, predicate: string, object: string, attributes: readonly string[]): void {
    const edge = this.edge(subject, predicate, object);
    for (const attribute of attributes) {
      edge.delete(attribute);
    }
  }

  *filter(predicate: (node: GraphNode) => boolean, candidates?: Iterable<GraphNode | string>): Generator<GraphNode> {
    if (!candidates) {
      yield* this.nodes(predicate);
      return;
    }
    for (const candidate of candidates) {
      const node = typeof candidate === 'string' ? this.node(candidate) : candidate;
      if (predicate(node)) {
        yield node;
      }
    }
  }

  /**
   * Breadth-first search for paths from `start` to `target`, following edges
   * backwards when `reverse` is set. Every path of at most `maxDepth` steps is
   * yielded, cycles included, shortest first.
   */
  *bfs(start: string, target: string, maxDepth = 10, reverse = false): Generator<PathStep[]> {
    const direction: NeighborDirection = reverse ? 'in' : 'out';
    const frontier: Array<{ name: string; depth: number; path: PathStep[] }> = [{ name: start, depth: 0, path: [] }];
    for (let head = 0; head < frontier.length; head += 1) {
      const { name, depth, path } = frontier[head];
      if (depth >= maxDepth) {
        return;
      }
      for (const neighbor of this.graph.neighbors(name, direction)) {
        for (const { pred } of neighbor.predicates) {
          const step: PathStep[] = [...path, { pred, node: neighbor.name }];
          if (neighbor.name === target) {
            yield step;
          } else {
            frontier.push({ name: neighbor.name, depth: depth + 1, path: step });
          }
        }
      }
    }
  }

  /** Predicates of the arity-1 facts about `name`. */
  typesOf(name: string): string[] {
    const types = new Set<string>();
    for (const rule of this.#rules) {
      if (rule.isFact && rule.head.arity === 1 && String(rule.head.args[0]) === name) {
        types.add(rule.head.pred);
      }
    }
    return [...types];
  }

  /** Inference rules with a goal whose predicate is one of the node's types. */
  rulesAffecting(node: GraphNode): Rule[] {
    const types = node.types;
    if (types.length === 0) {
      return [];
    }
    return this.rules.filter((rule) => !rule.isFact && types.some((type) => rule.references(type)));
  }

  // ── Triples ──────────────────────────────────────────────────────────────────

  toTriples(withData?: false): Triple[];
  toTriples(withData: true): TripleWithData[];
  toTriples(withData = false): Triple[] | TripleWithData[] {
    const facts = this.rules.filter((rule) => rule.isFact && rule.head.arity === 2);
    if (!withData) {
      return facts.map((rule): Triple => {
        const [subject, object] = rule.head.args.map(String);
        return [subject, rule.head.pred, object];
      });
    }
    const negatives = new Set(this.negativeExamples);
    return facts.map((rule): TripleWithData => {
      const [subject, object] = rule.head.args.map(String);
      const edge = this.edge(subject, rule.head.pred, object);
      const truthiness = edge.get('truthiness');
      const isNegative = (typeof truthiness === 'number' && truthiness < 0) || negatives.has(rule.definition);
      return [
        subject,
        rule.head.pred,
        object,
        this.node(subject).attrs,
        edge.attrs,
        this.node(object).attrs,
        isNegative,
      ];
    });
  }

  fromTriples(triples: Iterable<Triple>): void {
    for (const [subject, predicate, object] of triples) {
      this.store(`${predicate}(${subject}, ${object})`);
    }
  }

  /** Stores every answer of `predicate(X, Y)` not already stored as a fact. Returns how many were added. */
  solidify(predicate: string): number {
    const answers = [...this.query(`${predicate}(X, Y)`)];
    let added = 0;
    for (const answer of answers) {
      if (answer === true) {
        continue;
      }
      const statement = `${predicate}(${answer.X}, ${answer.Y})`;
      if (this.#rules.indexOf(String(parseTerm(statement))) === undefined) {
        this.store(statement);
        added += 1;
      }
    }
    return added;
  }

  /**
   * Dense ids for an embedding model: subjects of the stored triples first, then
   * objects not seen yet, then the terms of negative examples. Relations are numbered
   * in order of first appearance.
   */
  idTables(): IdTables {
    const entities = new Map<string, number>();
    const relations = new Map<string, number>();
    const assign = (table: Map<string, number>, key: string): void => {
      if (!table.has(key)) {
        table.set(key, table.size);
      }
    };

    const triples = this.toTriples();
    for (const [subject] of triples) assign(entities, subject);
    for (const [, predicate] of triples) assign(relations, predicate);
    for (const [, , object] of triples) assign(entities, object);
    for (const term of this.#negatives) {
      if (!term) continue;
      assign(relations, term.pred);
      for (const arg of term.args) assign(entities, String(arg));
    }
    return { entities, relations };
  }

  attachEstimator(estimator: TripleEstimator | null): void {
    this.#estimator = estimator;
  }

  estimateTripleProbability(subject: string, predicate: string, object: string): number {
    if (!this.#estimator) {
      throw new ModelNotReadyError();
    }
    return clampProbability(this.#estimator.estimate(subject, predicate, object, this.idTables()));
  }

  // ── Internals ────────────────────────────────────────────────────────────────

  #storeNegative(head: Term): RuleId {
    const rendered = String(head);
    let position = this.#negatives.findIndex((term) => term !== undefined && String(term) === rendered);
    if (position === -1) {
      position = this.#negatives.length;
      this.#negatives.push(head);
      void logThought(`[KnowledgeBase] Stored negative example ~${position}: ${rendered}`);
    }
    return `${NEGATIVE_PREFIX}${position}`;
  }

  #materialize(head: Term, isFact: boolean): void {
    const names = head.args.map(String);
    const created = new Set<string>();
    for (const name of names) {
      if (this.graph.addEntity(name)) {
        created.add(name);
      }
    }
    if (isFact && names.length === 2) {
      this.graph.addRelation(names[0], head.pred, names[1]);
    }
    if (this.propagation.suppressed || created.size === 0) {
      return;
    }
    for (let i = 0; i < names.length; i += 1) {
      for (let j = i + 1; j < names.length; j += 1) {
        if (created.has(names[i])) this.#nodes.get(names[j])?.notifyNewNeighbor(names[i]);
        if (created.has(names[j])) this.#nodes.get(names[i])?.notifyNewNeighbor(names[j]);
      }
    }
  }
}
