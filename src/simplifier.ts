/**
 * @file simplifier.ts
 * @description Equational rewriting that produces theorems. Terms are
 * normalized bottom-up with beta reduction and unconditional rewrite rules;
 * every step goes through the inference rules of kernel.ts.
 */

import { Term, Thm, Theory, TacticResult, FreeTerm, Free, destEq, stripImps, isTrueConst, schKey } from './types';
import { areAlphaEqual } from './structural';
import { matchTerm, schematicVars, freeVars, substBounds, constNames } from './pattern';
import { isBetaRedex } from './reduction';
import {
    reflexive, transitive, combination, abstraction, betaConversion, instantiateThm, eqMP, symmetric, axiomThm
} from './kernel';
import { HostRejection } from './errors';
import { MAX_REWRITE_STEPS } from './constants';
import { consoleLog, variantName } from './state';
import { printTerm } from './utils';

export const EQ_TRUE_AXIOM = 'eq_true';
export const TRUE_I_AXIOM = 'TrueI';

interface RewriteRule {
    thm: Thm;
    lhs: Term;
}

/**
 * Keeps the theorems usable as left-to-right rewrite rules: unconditional
 * equations whose left side is not a bare schematic variable and whose right
 * side introduces no new schematic variables.
 */
export function toRewriteRules(rules: readonly Thm[]): RewriteRule[] {
    const result: RewriteRule[] = [];
    for (const thm of rules) {
        if (stripImps(thm.prop).prems.length > 0) continue;
        const eq = destEq(thm.prop);
        if (!eq || eq.lhs.tag === 'Sch') continue;
        const lhsVars = new Set(schematicVars(eq.lhs).map(v => schKey(v.name, v.index)));
        if (schematicVars(eq.rhs).some(v => !lhsVars.has(schKey(v.name, v.index)))) continue;
        result.push({ thm, lhs: eq.lhs });
    }
    return result;
}

const isReflexive = (th: Thm): boolean => {
    const eq = destEq(th.prop);
    return eq !== null && areAlphaEqual(eq.lhs, eq.rhs);
};

const rhsOf = (th: Thm): Term => {
    const eq = destEq(th.prop);
    if (!eq) throw new HostRejection(`Not an equation: ${printTerm(th.prop)}`);
    return eq.rhs;
};

/**
 * Builds a conversion: a function from a term `t` to a theorem `⊢ t = t'`
 * where `t'` is the normal form of `t` under beta reduction and `rules`.
 * @throws HostRejection after `MAX_REWRITE_STEPS` rewrite steps.
 */
export function rewriteConv(theory: Theory, rules: readonly Thm[]): (t: Term) => Thm {
    const rewriteRules = toRewriteRules(rules);
    return (t: Term) => {
        let steps = 0;
        const used = new Set<string>(theory.consts.keys());
        freeVars(t).forEach(v => used.add(v.name));
        constNames(t).forEach(c => used.add(c));
        rules.forEach(r => freeVars(r.prop).forEach(v => used.add(v.name)));

        const step = (): void => {
            if (++steps > MAX_REWRITE_STEPS) {
                throw new HostRejection(`Simplifier exceeded ${MAX_REWRITE_STEPS} rewrite steps on ${printTerm(t)}`);
            }
        };

        // One rewrite at the root, if any applies.
        const rewriteRoot = (u: Term): Thm | null => {
            if (isBetaRedex(u)) return betaConversion(u);
            for (const rule of rewriteRules) {
                const inst = matchTerm(rule.lhs, u);
                if (!inst) continue;
                const th = instantiateThm(rule.thm, inst);
                if (areAlphaEqual(rhsOf(th), u)) continue;
                return th;
            }
            return null;
        };

        // Normalizes the immediate subterms of `u`.
        const convChildren = (u: Term): Thm => {
            switch (u.tag) {
                case 'App': {
                    const thF = conv(u.func);
                    const thX = conv(u.arg);
                    return isReflexive(thF) && isReflexive(thX) ? reflexive(u) : combination(thF, thX);
                }
                case 'Lam': {
                    const v: FreeTerm = Free(variantName(u.paramName, used), u.paramType);
                    const inner = conv(substBounds([v], u.body));
                    return isReflexive(inner) ? reflexive(u) : abstraction(v, inner);
                }
                default:
                    return reflexive(u);
            }
        };

        const conv = (u: Term): Thm => {
            let acc = convChildren(u);
            for (;;) {
                const root = rewriteRoot(rhsOf(acc));
                if (!root) return acc;
                step();
                const next = convChildren(rhsOf(root));
                acc = transitive(transitive(acc, root), next);
            }
        };

        const result = conv(t);
        if (steps > 0) consoleLog(`rewriteConv: ${steps} step(s): ${printTerm(rhsOf(result))}`);
        return result;
    };
}

/** Rewrites the proposition of a theorem. */
export function simplifyThm(theory: Theory, rules: readonly Thm[], th: Thm): Thm {
    const eq = rewriteConv(theory, rules)(th.prop);
    return isReflexive(eq) ? th : eqMP(eq, th);
}

/** Base rules of the simplifier available in `theory`. */
export function baseSimpRules(theory: Theory): Thm[] {
    return theory.axioms.has(EQ_TRUE_AXIOM) ? [axiomThm(theory, EQ_TRUE_AXIOM)] : [];
}

/**
 * Closes `goal` by rewriting it to `True`, or to an instance of one of the
 * unconditional non-equational `rules`.
 */
export function proveBySimp(theory: Theory, rules: readonly Thm[], goal: Term): TacticResult {
    const eq = rewriteConv(theory, [...rules, ...baseSimpRules(theory)])(goal);
    const simplified = rhsOf(eq);
    const back = symmetric(eq);

    if (isTrueConst(simplified) && theory.axioms.has(TRUE_I_AXIOM)) {
        return { ok: true, thm: eqMP(back, axiomThm(theory, TRUE_I_AXIOM)) };
    }
    for (const fact of rules) {
        if (stripImps(fact.prop).prems.length > 0) continue;
        const inst = matchTerm(fact.prop, simplified);
        if (!inst) continue;
        return { ok: true, thm: eqMP(back, instantiateThm(fact, inst)) };
    }
    return { ok: false, reason: `Simplification left the goal ${printTerm(simplified)}` };
}
