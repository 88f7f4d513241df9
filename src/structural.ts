/**
 * @file structural.ts
 * @description Structural equality and canonical keys for types and terms.
 * Terms use de Bruijn indices, so structural equality ignoring binder names
 * is alpha-equivalence.
 */

import { Term, Ty } from './types';
import { MAX_STACK_DEPTH } from './constants';

export function typesEqual(a: Ty, b: Ty): boolean {
    if (a.tag === 'TyVar' || b.tag === 'TyVar') {
        return a.tag === b.tag && a.name === b.name;
    }
    if (a.name !== b.name || a.args.length !== b.args.length) return false;
    return a.args.every((arg, i) => typesEqual(arg, b.args[i]));
}

export function tyKey(ty: Ty): string {
    if (ty.tag === 'TyVar') return `'${ty.name}`;
    if (ty.args.length === 0) return ty.name;
    return `(${ty.args.map(tyKey).join(',')})${ty.name}`;
}

/**
 * Canonical string of a term; two terms have the same key iff they are
 * alpha-equivalent (including their type annotations).
 */
export function termKey(t: Term): string {
    switch (t.tag) {
        case 'Const': return `C:${t.name}:${tyKey(t.type)}`;
        case 'Free': return `F:${t.name}:${tyKey(t.type)}`;
        case 'Sch': return `S:${t.name}.${t.index}:${tyKey(t.type)}`;
        case 'Bound': return `B${t.index}`;
        case 'Lam': return `L(${tyKey(t.paramType)})[${termKey(t.body)}]`;
        case 'App': return `A(${termKey(t.func)},${termKey(t.arg)})`;
    }
}

/**
 * Checks if two terms are alpha-equivalent without any reduction.
 * @param t1 The first term.
 * @param t2 The second term.
 * @param depth Recursion depth.
 */
export function areAlphaEqual(t1: Term, t2: Term, depth = 0): boolean {
    if (depth > MAX_STACK_DEPTH) throw new Error(`Alpha-equivalence check depth exceeded (depth: ${depth})`);
    if (t1 === t2) return true;

    switch (t1.tag) {
        case 'Const':
        case 'Free':
            return t2.tag === t1.tag && t1.name === t2.name && typesEqual(t1.type, t2.type);
        case 'Sch':
            return t2.tag === 'Sch' && t1.name === t2.name && t1.index === t2.index && typesEqual(t1.type, t2.type);
        case 'Bound':
            return t2.tag === 'Bound' && t1.index === t2.index;
        case 'Lam':
            return t2.tag === 'Lam' && typesEqual(t1.paramType, t2.paramType) && areAlphaEqual(t1.body, t2.body, depth + 1);
        case 'App':
            return t2.tag === 'App' && areAlphaEqual(t1.func, t2.func, depth + 1) && areAlphaEqual(t1.arg, t2.arg, depth + 1);
    }
}
