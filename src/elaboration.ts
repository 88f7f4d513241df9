/**
 * @file elaboration.ts
 * @description Turns the parser's untyped pre-terms into well-typed kernel
 * terms. Types are inferred Hindley-Milner style: every constant occurrence
 * gets a fresh instance of its declared type, free and schematic variables
 * with the same name share one type, and leftover inference variables become
 * ordinary type variables `'a`, `'b`, ...
 */

import {
    Term, Ty, Theory, TyVar, Const, Free, Sch, Bound, Lam, App, funT, natT, DUMMY_NAME, schKey
} from './types';
import { TySubst, substType, resolveType, unifyTypes, typeVarsOf } from './unification';
import { mapTypes } from './pattern';
import { UserInputError, HostRejection } from './errors';
import { printType } from './utils';
import { consoleLog } from './state';

// Pre-terms

export type PreTerm =
    | { tag: 'PConst', name: string }
    | { tag: 'PFree', name: string }
    | { tag: 'PSch', name: string, index: number }
    | { tag: 'PDummy' }
    | { tag: 'PNum', digits: string }
    | { tag: 'PBound', index: number }
    | { tag: 'PLam', name: string, type: Ty | undefined, body: PreTerm }
    | { tag: 'PApp', func: PreTerm, arg: PreTerm }
    | { tag: 'PTyped', term: PreTerm, type: Ty };

export const PConst = (name: string): PreTerm => ({ tag: 'PConst', name });
export const PFree = (name: string): PreTerm => ({ tag: 'PFree', name });
export const PSch = (name: string, index = 0): PreTerm => ({ tag: 'PSch', name, index });
export const PDummy = (): PreTerm => ({ tag: 'PDummy' });
export const PNum = (digits: string): PreTerm => ({ tag: 'PNum', digits });
export const PBound = (index: number): PreTerm => ({ tag: 'PBound', index });
export const PLam = (name: string, type: Ty | undefined, body: PreTerm): PreTerm => ({ tag: 'PLam', name, type, body });
export const PApp = (func: PreTerm, arg: PreTerm): PreTerm => ({ tag: 'PApp', func, arg });
export const PTyped = (term: PreTerm, type: Ty): PreTerm => ({ tag: 'PTyped', term, type });

export const pApps = (head: PreTerm, args: PreTerm[]): PreTerm => args.reduce((acc, a) => PApp(acc, a), head);

export interface ElaborationOptions {
    /** Type the whole term must have. */
    expected?: Ty;
    /** Fixed types of free variables. */
    freeTypes?: ReadonlyMap<string, Ty>;
}

interface InferState {
    subst: TySubst;
    counter: number;
    dummies: number;
    frees: Map<string, Ty>;
    schs: Map<string, Ty>;
}

const INFERENCE_PREFIX = '?';

function freshTy(st: InferState): Ty {
    return TyVar(`${INFERENCE_PREFIX}${st.counter++}`);
}

function unify(st: InferState, a: Ty, b: Ty, where: string): void {
    const next = unifyTypes(a, b, st.subst);
    if (!next) {
        throw new HostRejection(
            `Type unification failed at ${where}: ${printType(resolveType(a, st.subst))} vs ${printType(resolveType(b, st.subst))}`
        );
    }
    st.subst = next;
}

/** Renames the type variables of a declared constant type apart. */
function instantiateScheme(st: InferState, ty: Ty): Ty {
    const renaming: TySubst = new Map();
    for (const name of typeVarsOf(ty)) renaming.set(name, freshTy(st));
    return substType(ty, renaming);
}

function infer(theory: Theory, p: PreTerm, binders: readonly Ty[], st: InferState): { term: Term, type: Ty } {
    switch (p.tag) {
        case 'PConst': {
            const declared = theory.consts.get(p.name);
            if (declared === undefined) throw new UserInputError(`Unknown constant: ${p.name}`);
            const type = instantiateScheme(st, declared);
            return { term: Const(p.name, type), type };
        }
        case 'PFree': {
            let type = st.frees.get(p.name);
            if (type === undefined) {
                type = freshTy(st);
                st.frees.set(p.name, type);
            }
            return { term: Free(p.name, type), type };
        }
        case 'PSch': {
            const key = schKey(p.name, p.index);
            let type = st.schs.get(key);
            if (type === undefined) {
                type = freshTy(st);
                st.schs.set(key, type);
            }
            return { term: Sch(p.name, p.index, type), type };
        }
        case 'PDummy': {
            const type = freshTy(st);
            return { term: Sch(DUMMY_NAME, st.dummies++, type), type };
        }
        case 'PNum':
            return { term: Const(p.digits, natT), type: natT };
        case 'PBound': {
            const type = binders[p.index];
            if (type === undefined) throw new UserInputError(`Dangling bound variable ${p.index}`);
            return { term: Bound(p.index), type };
        }
        case 'PLam': {
            const paramType = p.type ?? freshTy(st);
            const body = infer(theory, p.body, [paramType, ...binders], st);
            return { term: Lam(p.name, paramType, body.term), type: funT(paramType, body.type) };
        }
        case 'PApp': {
            const func = infer(theory, p.func, binders, st);
            const arg = infer(theory, p.arg, binders, st);
            const result = freshTy(st);
            unify(st, func.type, funT(arg.type, result), 'application');
            return { term: App(func.term, arg.term), type: result };
        }
        case 'PTyped': {
            const inner = infer(theory, p.term, binders, st);
            unify(st, inner.type, p.type, 'type constraint');
            return inner;
        }
    }
}

function letterName(i: number): string {
    const letter = String.fromCharCode(97 + (i % 26));
    return i < 26 ? letter : `${letter}${Math.floor(i / 26)}`;
}

/**
 * Infers the types of a pre-term and returns the fully typed kernel term.
 * @throws UserInputError for unknown constants.
 * @throws HostRejection when the term cannot be typed.
 */
export function inferTypes(theory: Theory, pre: PreTerm, options: ElaborationOptions = {}): Term {
    const st: InferState = {
        subst: new Map(),
        counter: 0,
        dummies: 0,
        frees: new Map(options.freeTypes ?? []),
        schs: new Map(),
    };
    const { term, type } = infer(theory, pre, [], st);
    if (options.expected) unify(st, type, options.expected, 'top level');

    const resolved = mapTypes(term, ty => resolveType(ty, st.subst));

    // Leftover inference variables become fresh user-level type variables.
    const userNames = new Set<string>();
    const leftovers: string[] = [];
    const scan = (ty: Ty) => {
        for (const name of typeVarsOf(ty)) {
            if (name.startsWith(INFERENCE_PREFIX)) {
                if (!leftovers.includes(name)) leftovers.push(name);
            } else {
                userNames.add(name);
            }
        }
        return ty;
    };
    mapTypes(resolved, scan);
    if (leftovers.length === 0) return resolved;

    const renaming: TySubst = new Map();
    let next = 0;
    for (const name of leftovers) {
        let candidate = letterName(next++);
        while (userNames.has(candidate)) candidate = letterName(next++);
        renaming.set(name, TyVar(candidate));
    }
    consoleLog(`inferTypes: generalized ${leftovers.length} type variable(s)`);
    return mapTypes(resolved, ty => substType(ty, renaming));
}
