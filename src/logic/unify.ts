import { Term } from './term.js';

/** Variable name to bound term. Each clause in a proof owns its own environment. */
export type Bindings = Map<string, Term>;

/** `term` matches a whole source term against a dest term; `arg` a single argument pair. */
interface UnifyStep {
  readonly kind: 'term' | 'arg';
  readonly src: Term;
  readonly dest: Term;
}

/**
 * Unifies `src` (read under `srcEnv`) into `dest` (read and written under `destEnv`).
 *
 * Only `destEnv` is mutated, and only on the path to success. An unbound source
 * variable matches anything without binding. No occurs check is performed.
 * Arguments are visited depth-first, left to right, from an explicit stack.
 */
export function unify(src: Term, srcEnv: Bindings, dest: Term, destEnv: Bindings): boolean {
  const steps: UnifyStep[] = [{ kind: 'term', src, dest }];

  for (let step = steps.pop(); step !== undefined; step = steps.pop()) {
    if (step.kind === 'term') {
      if (step.src.pred !== step.dest.pred || step.src.args.length !== step.dest.args.length) {
        return false;
      }
      for (let i = step.src.args.length - 1; i >= 0; i -= 1) {
        steps.push({ kind: 'arg', src: step.src.args[i], dest: step.dest.args[i] });
      }
      continue;
    }

    const srcVal = resolve(step.src, srcEnv);
    if (srcVal === undefined) {
      continue;
    }
    if (step.dest.isVariable) {
      const destVal = destEnv.get(step.dest.pred);
      if (destVal === undefined) {
        destEnv.set(step.dest.pred, srcVal);
      } else {
        steps.push({ kind: 'term', src: srcVal, dest: destVal });
      }
    } else {
      steps.push({ kind: 'term', src: srcVal, dest: step.dest });
    }
  }

  return true;
}

/** Value of `term` under `env`; `undefined` for an unbound variable. */
export function resolve(term: Term, env: Bindings): Term | undefined {
  if (term.isVariable) {
    return env.get(term.pred);
  }
  return substitute(term, env);
}

/** Replaces every bound variable inside `term`; unbound ones are left as they are. */
export function substitute(term: Term, env: Bindings): Term {
  if (term.isVariable) {
    return env.get(term.pred) ?? term;
  }
  if (term.isGround) {
    return term;
  }

  // post-order rebuild; only compound subterms that hold a variable are copied
  const rebuilt = new Map<Term, Term>();
  const stack: Term[] = [term];
  while (stack.length > 0) {
    const current = stack[stack.length - 1];
    if (rebuilt.has(current)) {
      stack.pop();
      continue;
    }
    const pending = current.args.filter((arg) => !arg.isVariable && !arg.isGround && !rebuilt.has(arg));
    if (pending.length > 0) {
      stack.push(...pending);
      continue;
    }
    stack.pop();
    rebuilt.set(
      current,
      new Term(
        current.pred,
        current.args.map((arg) => (arg.isVariable ? (env.get(arg.pred) ?? arg) : (rebuilt.get(arg) ?? arg))),
      ),
    );
  }
  return rebuilt.get(term) ?? term;
}
