/**
 * @file pattern.ts
 * @description De Bruijn bookkeeping, substitution, instantiation and
 * first-order pattern matching for terms.
 */

import {
    Term, Ty, Instantiation, FreeTerm, SchTerm, Const, Free, Sch, Bound, Lam, App,
    schKey, stripApps
} from './types';
import { areAlphaEqual } from './structural';
import { matchTypes, substType, typeOf } from './unification';
import { MAX_STACK_DEPTH } from './constants';

export const emptyInstantiation = (): Instantiation => ({ terms: new Map(), types: new Map() });

/**
 * Collects the loose bound-variable indices of a term, relative to the term's
 * own position (index 0 is the innermost enclosing binder).
 * @returns The indices in ascending order.
 */
export function looseBounds(t: Term): number[] {
    const acc = new Set<number>();
    const walk = (u: Term, lev: number) => {
        switch (u.tag) {
            case 'Bound': if (u.index >= lev) acc.add(u.index - lev); break;
            case 'Lam': walk(u.body, lev + 1); break;
            case 'App': walk(u.func, lev); walk(u.arg, lev); break;
            default: break;
        }
    };
    walk(t, 0);
    return [...acc].sort((a, b) => a - b);
}

export function hasLooseBounds(t: Term, below = Infinity): boolean {
    return looseBounds(t).some(i => i < below);
}

/**
 * Shifts the loose bound variables (those at or above `lev`) by `inc`.
 */
export function incrBoundVars(t: Term, inc: number, lev = 0): Term {
    if (inc === 0) return t;
    switch (t.tag) {
        case 'Bound': return t.index >= lev ? Bound(t.index + inc) : t;
        case 'Lam': return Lam(t.paramName, t.paramType, incrBoundVars(t.body, inc, lev + 1));
        case 'App': return App(incrBoundVars(t.func, inc, lev), incrBoundVars(t.arg, inc, lev));
        default: return t;
    }
}

/**
 * Instantiates loose bound variables: `Bound i` becomes `args[i]`; loose
 * indices past the end of `args` are lowered accordingly.
 */
export function substBounds(args: readonly Term[], t: Term, lev = 0): Term {
    if (args.length === 0) return t;
    switch (t.tag) {
        case 'Bound': {
            if (t.index < lev) return t;
            const j = t.index - lev;
            if (j < args.length) return incrBoundVars(args[j], lev);
            return Bound(t.index - args.length);
        }
        case 'Lam': return Lam(t.paramName, t.paramType, substBounds(args, t.body, lev + 1));
        case 'App': return App(substBounds(args, t.func, lev), substBounds(args, t.arg, lev));
        default: return t;
    }
}

const sameVariable = (a: Term, v: FreeTerm | SchTerm): boolean =>
    v.tag === 'Free'
        ? a.tag === 'Free' && a.name === v.name
        : a.tag === 'Sch' && a.name === v.name && a.index === v.index;

/**
 * Turns `t` into the body of a new binder for `v`: occurrences of `v` become
 * references to that binder and loose bound variables move one level out.
 */
export function abstractOver(v: FreeTerm | SchTerm, t: Term, lev = 0): Term {
    if (sameVariable(t, v)) return Bound(lev);
    switch (t.tag) {
        case 'Bound': return t.index >= lev ? Bound(t.index + 1) : t;
        case 'Lam': return Lam(t.paramName, t.paramType, abstractOver(v, t.body, lev + 1));
        case 'App': return App(abstractOver(v, t.func, lev), abstractOver(v, t.arg, lev));
        default: return t;
    }
}

/**
 * Free variables in left-to-right occurrence order, each once.
 */
export function freeVars(t: Term): FreeTerm[] {
    const seen = new Set<string>();
    const acc: FreeTerm[] = [];
    const walk = (u: Term) => {
        switch (u.tag) {
            case 'Free': if (!seen.has(u.name)) { seen.add(u.name); acc.push(u); } break;
            case 'Lam': walk(u.body); break;
            case 'App': walk(u.func); walk(u.arg); break;
            default: break;
        }
    };
    walk(t);
    return acc;
}

/**
 * Schematic variables in left-to-right occurrence order, each once.
 */
export function schematicVars(t: Term): SchTerm[] {
    const seen = new Set<string>();
    const acc: SchTerm[] = [];
    const walk = (u: Term) => {
        switch (u.tag) {
            case 'Sch': {
                const key = schKey(u.name, u.index);
                if (!seen.has(key)) { seen.add(key); acc.push(u); }
                break;
            }
            case 'Lam': walk(u.body); break;
            case 'App': walk(u.func); walk(u.arg); break;
            default: break;
        }
    };
    walk(t);
    return acc;
}

export function maxSchIndex(t: Term): number {
    return schematicVars(t).reduce((m, v) => Math.max(m, v.index), -1);
}

export function constNames(t: Term, acc: Set<string> = new Set()): Set<string> {
    switch (t.tag) {
        case 'Const': acc.add(t.name); break;
        case 'Lam': constNames(t.body, acc); break;
        case 'App': constNames(t.func, acc); constNames(t.arg, acc); break;
        default: break;
    }
    return acc;
}

export function occursFree(name: string, t: Term): boolean {
    return freeVars(t).some(v => v.name === name);
}

/**
 * Rebuilds a term bottom-up with `f` applied to every leaf variable/constant;
 * `f` returns undefined to keep the leaf.
 */
export function mapLeaves(t: Term, f: (leaf: Term) => Term | undefined): Term {
    switch (t.tag) {
        case 'Lam': return Lam(t.paramName, t.paramType, mapLeaves(t.body, f));
        case 'App': return App(mapLeaves(t.func, f), mapLeaves(t.arg, f));
        default: return f(t) ?? t;
    }
}

export function mapTypes(t: Term, f: (ty: Ty) => Ty): Term {
    switch (t.tag) {
        case 'Const': return Const(t.name, f(t.type));
        case 'Free': return Free(t.name, f(t.type));
        case 'Sch': return Sch(t.name, t.index, f(t.type));
        case 'Bound': return t;
        case 'Lam': return Lam(t.paramName, f(t.paramType), mapTypes(t.body, f));
        case 'App': return App(mapTypes(t.func, f), mapTypes(t.arg, f));
    }
}

/**
 * Applies an instantiation: type variables first, then schematic variables.
 * Replacement terms are closed, so no index shifting is needed.
 */
export function instantiateTerm(t: Term, inst: Instantiation): Term {
    const typed = inst.types.size === 0 ? t : mapTypes(t, ty => substType(ty, inst.types));
    if (inst.terms.size === 0) return typed;
    return mapLeaves(typed, leaf => leaf.tag === 'Sch' ? inst.terms.get(schKey(leaf.name, leaf.index)) : undefined);
}

/**
 * Syntactic head used to index patterns: constants and free variables by
 * name, binders and bound references by kind. Schematic heads are flexible
 * and return null.
 */
export function headKey(t: Term): string | null {
    const { head } = stripApps(t);
    switch (head.tag) {
        case 'Const': return `C:${head.name}`;
        case 'Free': return `F:${head.name}`;
        case 'Bound': return 'B';
        case 'Lam': return 'L';
        case 'Sch': return null;
        case 'App': return null;
    }
}

/**
 * First-order matching of `pattern` against `obj`. Only schematic variables
 * and type variables of the pattern are bound; the object term is rigid.
 * Non-linear variables require alpha-equivalent instances. A schematic variable
 * may bind a term that refers to binders enclosing the match position, but
 * never to one of the pattern's own binders.
 * @param pattern The pattern term.
 * @param obj The term to match against.
 * @param inst Instantiation to extend.
 * @param outerBinderTypes Types of binders enclosing `obj`, innermost first.
 * @returns The extended instantiation, or null if the terms do not match.
 */
export function matchTerm(
    pattern: Term,
    obj: Term,
    inst: Instantiation = emptyInstantiation(),
    outerBinderTypes: readonly Ty[] = []
): Instantiation | null {
    const go = (p: Term, o: Term, current: Instantiation, binderTypes: readonly Ty[], depth: number): Instantiation | null => {
        if (depth > MAX_STACK_DEPTH) throw new Error(`matchTerm stack depth exceeded`);
        const k = binderTypes.length - outerBinderTypes.length;

        if (p.tag === 'Sch') {
            if (hasLooseBounds(o, k)) return null;
            const lowered = incrBoundVars(o, -k);
            const key = schKey(p.name, p.index);
            const existing = current.terms.get(key);
            if (existing !== undefined) {
                return areAlphaEqual(existing, lowered) ? current : null;
            }
            const types = matchTypes(p.type, typeOf(lowered, outerBinderTypes), current.types);
            if (!types) return null;
            const terms = new Map(current.terms);
            terms.set(key, lowered);
            return { terms, types };
        }

        switch (p.tag) {
            case 'Const':
            case 'Free': {
                if (o.tag !== p.tag || o.name !== p.name) return null;
                const types = matchTypes(p.type, o.type, current.types);
                return types ? { terms: current.terms, types } : null;
            }
            case 'Bound':
                return o.tag === 'Bound' && o.index === p.index ? current : null;
            case 'Lam': {
                if (o.tag !== 'Lam') return null;
                const types = matchTypes(p.paramType, o.paramType, current.types);
                if (!types) return null;
                return go(p.body, o.body, { terms: current.terms, types }, [o.paramType, ...binderTypes], depth + 1);
            }
            case 'App': {
                if (o.tag !== 'App') return null;
                const s1 = go(p.func, o.func, current, binderTypes, depth + 1);
                if (!s1) return null;
                return go(p.arg, o.arg, s1, binderTypes, depth + 1);
            }
        }
    };
    return go(pattern, obj, inst, outerBinderTypes, 0);
}
