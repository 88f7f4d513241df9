/**
 * @file kernel.ts
 * @description Inference rules. These are the only functions that build `Thm`
 * values; each one checks its side conditions and throws `HostRejection`
 * when they fail.
 */

import {
    Term, Thm, Theory, Instantiation, FreeTerm, Free, Sch, Lam,
    destEq, mkEq, mkApps, stripImps, listImps, isBoolT, schKey, isDummy, DUMMY_NAME
} from './types';
import { areAlphaEqual, termKey } from './structural';
import { typeOf, substType } from './unification';
import {
    abstractOver, substBounds, freeVars, schematicVars, instantiateTerm, mapLeaves, emptyInstantiation
} from './pattern';
import { betaNorm, isBetaRedex } from './reduction';
import { HostRejection } from './errors';
import { printTerm } from './utils';
import { variantName } from './state';

const mkThm = (hyps: readonly Term[], prop: Term): Thm => ({ hyps, prop });

function unionHyps(a: readonly Term[], b: readonly Term[]): Term[] {
    const keys = new Set(a.map(termKey));
    return [...a, ...b.filter(h => !keys.has(termKey(h)))];
}

function destEqThm(th: Thm, rule: string) {
    const eq = destEq(th.prop);
    if (!eq) throw new HostRejection(`${rule}: not an equation: ${printTerm(th.prop)}`);
    return eq;
}

export function axiomThm(theory: Theory, name: string): Thm {
    const prop = theory.axioms.get(name);
    if (prop === undefined) throw new HostRejection(`Unknown axiom: ${name}`);
    return mkThm([], prop);
}

/** ⊢ t = t */
export function reflexive(t: Term): Thm {
    return mkThm([], mkEq(t, t, typeOf(t)));
}

export function symmetric(th: Thm): Thm {
    const { lhs, rhs, type } = destEqThm(th, 'symmetric');
    return mkThm(th.hyps, mkEq(rhs, lhs, type));
}

export function transitive(th1: Thm, th2: Thm): Thm {
    const eq1 = destEqThm(th1, 'transitive');
    const eq2 = destEqThm(th2, 'transitive');
    if (!areAlphaEqual(eq1.rhs, eq2.lhs)) {
        throw new HostRejection(`transitive: middle terms differ: ${printTerm(eq1.rhs)} vs ${printTerm(eq2.lhs)}`);
    }
    return mkThm(unionHyps(th1.hyps, th2.hyps), mkEq(eq1.lhs, eq2.rhs, eq1.type));
}

/** f = g, x = y ⊢ f x = g y */
export function combination(thF: Thm, thX: Thm): Thm {
    const f = destEqThm(thF, 'combination');
    const x = destEqThm(thX, 'combination');
    const lhs = mkApps(f.lhs, [x.lhs]);
    const rhs = mkApps(f.rhs, [x.rhs]);
    return mkThm(unionHyps(thF.hyps, thX.hyps), mkEq(lhs, rhs, typeOf(lhs)));
}

/** l = r ⊢ (λv. l) = (λv. r), provided v is not free in the hypotheses. */
export function abstraction(v: FreeTerm, th: Thm): Thm {
    const { lhs, rhs } = destEqThm(th, 'abstraction');
    if (th.hyps.some(h => freeVars(h).some(f => f.name === v.name))) {
        throw new HostRejection(`abstraction: variable ${v.name} is free in the hypotheses`);
    }
    const l = Lam(v.name, v.type, abstractOver(v, lhs));
    const r = Lam(v.name, v.type, abstractOver(v, rhs));
    return mkThm(th.hyps, mkEq(l, r, typeOf(l)));
}

/** ⊢ (λx. b) a = b[a/x] */
export function betaConversion(t: Term): Thm {
    if (!isBetaRedex(t)) throw new HostRejection(`betaConversion: not a beta redex: ${printTerm(t)}`);
    return mkThm([], mkEq(t, substBounds([t.arg], t.func.body), typeOf(t)));
}

/** A = B, A ⊢ B */
export function eqMP(thEq: Thm, thA: Thm): Thm {
    const { lhs, rhs, type } = destEqThm(thEq, 'eqMP');
    if (!isBoolT(type)) throw new HostRejection(`eqMP: equation is not between propositions`);
    if (!areAlphaEqual(lhs, thA.prop)) {
        throw new HostRejection(`eqMP: ${printTerm(thA.prop)} does not match ${printTerm(lhs)}`);
    }
    return mkThm(unionHyps(thEq.hyps, thA.hyps), rhs);
}

/** A ==> B, A ⊢ B */
export function impliesElim(thImp: Thm, thA: Thm): Thm {
    return dischargePremise(thImp, 0, thA);
}

/**
 * Removes the premise at position `index` of `th` using a proof of it; the
 * other premises stay in their order.
 */
export function dischargePremise(th: Thm, index: number, thA: Thm): Thm {
    const { prems, concl } = stripImps(th.prop);
    const premise = prems[index];
    if (premise === undefined) {
        throw new HostRejection(`dischargePremise: theorem has no premise ${index}: ${printTerm(th.prop)}`);
    }
    if (!areAlphaEqual(premise, thA.prop)) {
        throw new HostRejection(`dischargePremise: ${printTerm(thA.prop)} does not match premise ${printTerm(premise)}`);
    }
    const rest = prems.filter((_, i) => i !== index);
    return mkThm(unionHyps(th.hyps, thA.hyps), listImps(rest, concl));
}

/**
 * Instantiates schematic and type variables. Each replacement must have the
 * (instantiated) type of the variable it replaces.
 */
export function instantiateThm(th: Thm, inst: Instantiation): Thm {
    for (const v of schematicVars(th.prop)) {
        const replacement = inst.terms.get(schKey(v.name, v.index));
        if (replacement === undefined) continue;
        const expected = substType(v.type, inst.types);
        const actual = typeOf(replacement);
        if (termKey(Sch(v.name, v.index, expected)) !== termKey(Sch(v.name, v.index, actual))) {
            throw new HostRejection(`instantiateThm: ill-typed instantiation of ?${v.name} with ${printTerm(replacement)}`);
        }
    }
    const prop = instantiateTerm(th.prop, inst);
    if (!isBoolT(typeOf(prop))) throw new HostRejection(`instantiateThm: result is not a proposition`);
    return mkThm(th.hyps.map(h => instantiateTerm(h, inst)), prop);
}

export function betaNormThm(th: Thm): Thm {
    return mkThm(th.hyps, betaNorm(th.prop));
}

/**
 * Turns fixed free variables into schematic ones. A variable that is free in
 * a hypothesis cannot be generalized.
 */
export function generalizeThm(th: Thm, names: readonly string[]): Thm {
    if (names.length === 0) return th;
    const wanted = new Set(names);
    for (const h of th.hyps) {
        const clash = freeVars(h).find(v => wanted.has(v.name));
        if (clash) throw new HostRejection(`generalizeThm: ${clash.name} is free in the hypotheses`);
    }
    const taken = new Map<string, number>();
    for (const v of schematicVars(th.prop)) {
        taken.set(v.name, Math.max(taken.get(v.name) ?? -1, v.index));
    }
    const prop = mapLeaves(th.prop, leaf => {
        if (leaf.tag !== 'Free' || !wanted.has(leaf.name)) return undefined;
        return Sch(leaf.name, (taken.get(leaf.name) ?? -1) + 1, leaf.type);
    });
    return mkThm(th.hyps, prop);
}

/** Shifts every schematic index by `k`, renaming the theorem's variables apart. */
export function incrIndexes(th: Thm, k: number): Thm {
    if (k <= 0) return th;
    const shift = (t: Term) => mapLeaves(t, leaf => leaf.tag === 'Sch' ? Sch(leaf.name, leaf.index + k, leaf.type) : undefined);
    return mkThm(th.hyps.map(shift), shift(th.prop));
}

/**
 * Renumbers schematic variables: a name that occurs with a single index gets
 * index 0; names shared by several variables (and dummies) are numbered in
 * occurrence order.
 */
export function zeroVarIndexes(th: Thm): Thm {
    const vars = schematicVars(th.prop);
    const counts = new Map<string, number>();
    vars.forEach(v => counts.set(v.name, (counts.get(v.name) ?? 0) + 1));
    const next = new Map<string, number>();
    const inst = emptyInstantiation();
    for (const v of vars) {
        const index = counts.get(v.name) === 1 && !isDummy(v) ? 0 : (next.get(v.name) ?? 0);
        next.set(v.name, index + 1);
        if (index !== v.index) inst.terms.set(schKey(v.name, v.index), Sch(v.name, index, v.type));
    }
    if (inst.terms.size === 0) return th;
    const rename = (t: Term) => mapLeaves(t, leaf => leaf.tag === 'Sch' ? inst.terms.get(schKey(leaf.name, leaf.index)) : undefined);
    return mkThm(th.hyps.map(rename), rename(th.prop));
}

// Variable import and export

export interface ImportedThm {
    thm: Thm;
    /** Original variable name (with `.index` when non-zero) → its fresh free variable. */
    frees: Map<string, FreeTerm>;
}

/**
 * Replaces the schematic variables of a theorem by fresh free variables,
 * avoiding the theorem's own free variables and the theory's constants.
 */
export function importThm(theory: Theory, th: Thm): ImportedThm {
    const used = new Set<string>([...theory.consts.keys()]);
    freeVars(th.prop).forEach(v => used.add(v.name));
    th.hyps.forEach(h => freeVars(h).forEach(v => used.add(v.name)));

    const frees = new Map<string, FreeTerm>();
    const inst = emptyInstantiation();
    for (const v of schematicVars(th.prop)) {
        const base = v.name === DUMMY_NAME ? 'uu' : v.name;
        const fresh = Free(variantName(base, used), v.type);
        const key = v.index === 0 && v.name !== DUMMY_NAME ? v.name : `${v.name}.${v.index}`;
        frees.set(key, fresh);
        inst.terms.set(schKey(v.name, v.index), fresh);
    }
    return { thm: instantiateThm(th, inst), frees };
}

/**
 * Inverse of `importThm`: generalizes the given free variables and normalizes
 * the schematic indices.
 */
export function exportThm(th: Thm, frees: Iterable<FreeTerm>): Thm {
    return zeroVarIndexes(generalizeThm(th, [...frees].map(v => v.name)));
}
