/**
 * @file reduction.ts
 * @description Beta and eta normalization of terms.
 */

import { Term, Lam, App } from './types';
import { MAX_STACK_DEPTH } from './constants';
import { substBounds, incrBoundVars, looseBounds } from './pattern';

export function isBetaRedex(t: Term): t is Term & { tag: 'App', func: Term & { tag: 'Lam' } } {
    return t.tag === 'App' && t.func.tag === 'Lam';
}

/**
 * Full beta normalization (normal order).
 * @param term The term to normalize.
 * @param stackDepth Recursion depth.
 */
export function betaNorm(term: Term, stackDepth = 0): Term {
    if (stackDepth > MAX_STACK_DEPTH) throw new Error(`betaNorm stack depth exceeded`);
    switch (term.tag) {
        case 'Lam': return Lam(term.paramName, term.paramType, betaNorm(term.body, stackDepth + 1));
        case 'App': {
            const func = betaNorm(term.func, stackDepth + 1);
            if (func.tag === 'Lam') {
                return betaNorm(substBounds([term.arg], func.body), stackDepth + 1);
            }
            return App(func, betaNorm(term.arg, stackDepth + 1));
        }
        default: return term;
    }
}

/**
 * Eta contraction everywhere: `λx. f x` becomes `f` when x is not free in f.
 */
export function etaContract(term: Term): Term {
    switch (term.tag) {
        case 'Lam': {
            const body = etaContract(term.body);
            if (body.tag === 'App' && body.arg.tag === 'Bound' && body.arg.index === 0 && !looseBounds(body.func).includes(0)) {
                return incrBoundVars(body.func, -1);
            }
            return Lam(term.paramName, term.paramType, body);
        }
        case 'App': return App(etaContract(term.func), etaContract(term.arg));
        default: return term;
    }
}

export const betaEtaNorm = (term: Term): Term => etaContract(betaNorm(term));

export function isBetaNormal(term: Term): boolean {
    switch (term.tag) {
        case 'Lam': return isBetaNormal(term.body);
        case 'App': return term.func.tag !== 'Lam' && isBetaNormal(term.func) && isBetaNormal(term.arg);
        default: return true;
    }
}
