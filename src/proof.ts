/**
 * @file proof.ts
 * @description Tactics: context-parameterized proof procedures that either
 * close a goal with a theorem or fail with a reason. They never modify the
 * theory they run in.
 */

import { Term, Thm, Theory, Tactic, TacticResult, stripImps, isTrueConst, destEq } from './types';
import { areAlphaEqual } from './structural';
import { matchTerm, maxSchIndex } from './pattern';
import { incrIndexes, instantiateThm, betaNormThm, impliesElim, eqMP, symmetric, axiomThm } from './kernel';
import { proveBySimp, rewriteConv, baseSimpRules, TRUE_I_AXIOM } from './simplifier';
import { getFacts } from './globals';
import { MAX_RESOLUTION_DEPTH } from './constants';
import { consoleLog } from './state';
import { printTerm } from './utils';

export const succeed = (thm: Thm): TacticResult => ({ ok: true, thm });
export const fail = (reason: string): TacticResult => ({ ok: false, reason });

/** Proves `True`. */
export const trueTac: Tactic = (theory, goal) => {
    if (!isTrueConst(goal)) return fail(`Goal is not True: ${printTerm(goal)}`);
    if (!theory.axioms.has(TRUE_I_AXIOM)) return fail(`Theory ${theory.name} has no ${TRUE_I_AXIOM}`);
    return succeed(axiomThm(theory, TRUE_I_AXIOM));
};

/** Tries each tactic in turn and returns the first success. */
export function firstTac(...tactics: Tactic[]): Tactic {
    return (theory, goal) => {
        const reasons: string[] = [];
        for (const tac of tactics) {
            const result = tac(theory, goal);
            if (result.ok) return result;
            reasons.push(result.reason);
        }
        return fail(reasons.length ? reasons.join('; ') : 'No tactic to try');
    };
}

/** Closes the goal with an instance of an unconditional theorem. */
export function thmsTac(thms: readonly Thm[]): Tactic {
    return (_theory, goal) => {
        for (const th of thms) {
            if (stripImps(th.prop).prems.length > 0) continue;
            const inst = matchTerm(th.prop, goal);
            if (inst) return succeed(instantiateThm(th, inst));
        }
        return fail(`No theorem matches ${printTerm(goal)}`);
    };
}

/** Closes the goal with an instance of a named fact. */
export function factTac(name: string): Tactic {
    return (theory, goal) => thmsTac(getFacts(theory, name))(theory, goal);
}

export function simpTac(rules: readonly Thm[]): Tactic {
    return (theory, goal) => proveBySimp(theory, rules, goal);
}

/**
 * Simplifies the goal first and runs `tactic` on the result; a goal that
 * simplifies to True is closed directly.
 */
export function thenSimpTac(rules: readonly Thm[], tactic: Tactic): Tactic {
    return (theory, goal) => {
        const eq = rewriteConv(theory, [...rules, ...baseSimpRules(theory)])(goal);
        const parts = destEq(eq.prop);
        if (!parts) return fail(`Simplifier returned a non-equation`);
        const result = firstTac(trueTac, tactic)(theory, parts.rhs);
        if (!result.ok) return result;
        return succeed(eqMP(symmetric(eq), result.thm));
    };
}

/**
 * Backward resolution: a rule `P1 ==> … ==> Pn ==> C` closes a goal that is an
 * instance of `C` once every instantiated premise is proved, recursively by
 * the same rules or by `fallback`.
 */
export function resolveTac(rules: readonly Thm[], maxDepth: number = MAX_RESOLUTION_DEPTH, fallback?: Tactic): Tactic {
    const prove = (theory: Theory, goal: Term, depth: number): TacticResult => {
        if (depth > maxDepth) return fail(`Resolution depth ${maxDepth} exceeded on ${printTerm(goal)}`);
        const shift = maxSchIndex(goal) + 1;
        for (const rule of rules) {
            const renamed = incrIndexes(rule, shift);
            const { concl } = stripImps(renamed.prop);
            const inst = matchTerm(concl, goal);
            if (!inst) continue;

            let th = betaNormThm(instantiateThm(renamed, inst));
            let closed = true;
            for (const premise of stripImps(th.prop).prems) {
                let sub = prove(theory, premise, depth + 1);
                if (!sub.ok && fallback) sub = fallback(theory, premise);
                if (!sub.ok) {
                    closed = false;
                    break;
                }
                th = impliesElim(th, sub.thm);
            }
            if (closed && areAlphaEqual(th.prop, goal)) {
                consoleLog(`resolveTac: closed ${printTerm(goal)}`);
                return succeed(th);
            }
        }
        return fail(`No rule resolves ${printTerm(goal)}`);
    };
    return (theory, goal) => prove(theory, goal, 0);
}

/**
 * Verification-condition solver: resolution with the theory's `solve` and
 * `recIntro` rules plus `extra`, with simplification by `extra` as the
 * fallback for goals no rule resolves.
 */
export function vcSolveTac(extra: readonly Thm[] = []): Tactic {
    return (theory, goal) => {
        const rules = [...theory.ruleSets.solve, ...theory.ruleSets.recIntro, ...extra];
        const leaf = firstTac(trueTac, thmsTac(extra), simpTac(extra));
        return firstTac(resolveTac(rules, MAX_RESOLUTION_DEPTH, leaf), leaf)(theory, goal);
    };
}
