/**
 * @file unification.ts
 * @description Type substitution, first-order type matching and unification,
 * and type computation for de Bruijn terms.
 */

import { Term, Ty, TyCon, destFunT } from './types';
import { typesEqual } from './structural';
import { HostRejection } from './errors';
import { printTerm, printType } from './utils';

export type TySubst = Map<string, Ty>;

/**
 * Applies a type substitution simultaneously, as produced by `matchTypes`.
 */
export function substType(ty: Ty, subst: ReadonlyMap<string, Ty>): Ty {
    if (subst.size === 0) return ty;
    if (ty.tag === 'TyVar') return subst.get(ty.name) ?? ty;
    if (ty.args.length === 0) return ty;
    return TyCon(ty.name, ty.args.map(a => substType(a, subst)));
}

/**
 * Applies a triangular substitution, as produced by `unifyTypes`, following
 * chains of bindings.
 */
export function resolveType(ty: Ty, subst: ReadonlyMap<string, Ty>): Ty {
    if (subst.size === 0) return ty;
    if (ty.tag === 'TyVar') {
        const bound = subst.get(ty.name);
        return bound !== undefined ? resolveType(bound, subst) : ty;
    }
    if (ty.args.length === 0) return ty;
    return TyCon(ty.name, ty.args.map(a => resolveType(a, subst)));
}

export function typeVarsOf(ty: Ty, acc: Set<string> = new Set()): Set<string> {
    if (ty.tag === 'TyVar') acc.add(ty.name);
    else ty.args.forEach(a => typeVarsOf(a, acc));
    return acc;
}

export function typeVarsOfTerm(t: Term, acc: Set<string> = new Set()): Set<string> {
    switch (t.tag) {
        case 'Const': case 'Free': case 'Sch': typeVarsOf(t.type, acc); break;
        case 'Lam': typeVarsOf(t.paramType, acc); typeVarsOfTerm(t.body, acc); break;
        case 'App': typeVarsOfTerm(t.func, acc); typeVarsOfTerm(t.arg, acc); break;
        case 'Bound': break;
    }
    return acc;
}

/**
 * Matches a type pattern against a type: only variables of `pattern` are
 * bound, `obj` is rigid.
 * @returns The extended substitution, or null when the types do not match.
 */
export function matchTypes(pattern: Ty, obj: Ty, subst: ReadonlyMap<string, Ty>): TySubst | null {
    if (pattern.tag === 'TyVar') {
        const existing = subst.get(pattern.name);
        if (existing !== undefined) return typesEqual(existing, obj) ? new Map(subst) : null;
        const extended = new Map(subst);
        extended.set(pattern.name, obj);
        return extended;
    }
    if (obj.tag !== 'TyCon' || obj.name !== pattern.name || obj.args.length !== pattern.args.length) return null;
    let current: TySubst | null = new Map(subst);
    for (let i = 0; i < pattern.args.length && current; i++) {
        current = matchTypes(pattern.args[i], obj.args[i], current);
    }
    return current;
}

function occursIn(name: string, ty: Ty, subst: ReadonlyMap<string, Ty>): boolean {
    const resolved = resolveType(ty, subst);
    if (resolved.tag === 'TyVar') return resolved.name === name;
    return resolved.args.some(a => occursIn(name, a, subst));
}

/**
 * Unifies two types with occurs check.
 * @returns The extended substitution, or null when the types clash.
 */
export function unifyTypes(a: Ty, b: Ty, subst: ReadonlyMap<string, Ty>): TySubst | null {
    const ra = resolveType(a, subst);
    const rb = resolveType(b, subst);
    if (ra.tag === 'TyVar' && rb.tag === 'TyVar' && ra.name === rb.name) return new Map(subst);
    if (ra.tag === 'TyVar') {
        if (occursIn(ra.name, rb, subst)) return null;
        const extended = new Map(subst);
        extended.set(ra.name, rb);
        return extended;
    }
    if (rb.tag === 'TyVar') return unifyTypes(rb, ra, subst);
    if (ra.name !== rb.name || ra.args.length !== rb.args.length) return null;
    let current: TySubst | null = new Map(subst);
    for (let i = 0; i < ra.args.length && current; i++) {
        current = unifyTypes(ra.args[i], rb.args[i], current);
    }
    return current;
}

/**
 * Computes the type of a term.
 * @param t The term.
 * @param boundTypes Types of the enclosing binders, innermost first.
 * @throws HostRejection on ill-typed applications or dangling de Bruijn indices.
 */
export function typeOf(t: Term, boundTypes: readonly Ty[] = []): Ty {
    switch (t.tag) {
        case 'Const': case 'Free': case 'Sch': return t.type;
        case 'Bound': {
            const ty = boundTypes[t.index];
            if (ty === undefined) throw new HostRejection(`Loose bound variable ${t.index} has no binder`);
            return ty;
        }
        case 'Lam': {
            const bodyTy = typeOf(t.body, [t.paramType, ...boundTypes]);
            return TyCon('fun', [t.paramType, bodyTy]);
        }
        case 'App': {
            const fty = typeOf(t.func, boundTypes);
            const argTy = typeOf(t.arg, boundTypes);
            const fun = destFunT(fty);
            if (!fun) {
                throw new HostRejection(`Type error: '${printTerm(t.func)}' of type ${printType(fty)} is not a function`);
            }
            if (!typesEqual(fun.dom, argTy)) {
                throw new HostRejection(`Type error: '${printTerm(t.func)}' expects ${printType(fun.dom)} but '${printTerm(t.arg)}' has type ${printType(argTy)}`);
            }
            return fun.cod;
        }
    }
}
