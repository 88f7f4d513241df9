/**
 * @file closure.ts
 * @description Lambda lifting of a single subterm. An open subterm found
 * under binders becomes a new top-level constant taking the local variables
 * and exactly the binders it refers to, and the subterm is replaced by that
 * constant applied to them.
 */

import {
    Term, Theory, Binder, GeneratedDefinition, FreeTerm, Free, Bound, mkApps, mkEq, funTs
} from './types';
import { looseBounds, substBounds, freeVars, constNames } from './pattern';
import { typeOf } from './unification';
import { defineConst } from './globals';
import { HostRejection } from './errors';
import { variantName, consoleLog } from './state';
import { printTerm } from './utils';

export interface ClosureResult {
    theory: Theory;
    /** The constant applied to the local variables and bound references it closes over. */
    replacement: Term;
    def: GeneratedDefinition;
}

/**
 * Defines `name` as the closure of `t` over the binders of `env` that `t`
 * refers to, and returns the term that replaces `t` at its position.
 * Members of `locals` occurring in `t` become leading parameters, in
 * occurrence order; any other free variable makes the definition fail.
 * @param env Enclosing binders, outermost first; `Bound i` refers to `env[env.length - 1 - i]`.
 * @throws HostRejection when `t` refers past `env`, or when the definition is rejected.
 */
export function buildClosure(
    theory: Theory,
    env: readonly Binder[],
    name: string,
    t: Term,
    locals: readonly FreeTerm[] = []
): ClosureResult {
    const n = env.length;
    const loose = looseBounds(t);
    const dangling = loose.find(i => i >= n);
    if (dangling !== undefined) {
        throw new HostRejection(`Subterm ${printTerm(t)} refers to bound variable ${dangling} outside its environment`);
    }

    const used = new Set<string>([name, ...theory.consts.keys()]);
    freeVars(t).forEach(v => used.add(v.name));
    constNames(t).forEach(c => used.add(c));
    const fixed: FreeTerm[] = env.map(b => Free(variantName(b.name, used), b.type));

    // Bound i ↦ the fixed variable of position n-1-i.
    const body = substBounds([...fixed].reverse(), t);

    const localNames = new Set(locals.map(v => v.name));
    const captured = freeVars(t).filter(v => localNames.has(v.name));
    const positions = loose.map(i => n - 1 - i).sort((x, y) => x - y);
    const params = [...captured, ...positions.map(p => fixed[p])];

    const bodyType = typeOf(body);
    const head = Free(name, funTs(params.map(p => p.type), bodyType));
    const eq = mkEq(mkApps(head, params), body, bodyType);
    const defined = defineConst(theory, eq);

    const replacement = mkApps(defined.constant, [...captured, ...positions.map(p => Bound(n - 1 - p))]);
    consoleLog(`buildClosure> ${name} over [${params.map(p => p.name).join(', ')}]: ${printTerm(body)}`);

    return {
        theory: defined.theory,
        replacement,
        def: {
            name,
            constant: defined.constant,
            params: params.map((p): Binder => ({ name: p.name, type: p.type })),
            body,
            fact: defined.def,
        },
    };
}
