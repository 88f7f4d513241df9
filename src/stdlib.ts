/**
 * @file stdlib.ts
 * @description The base theory: logical constants, the pairing and set
 * vocabulary used by extraction patterns, and the two axioms the simplifier
 * needs to close goals. Also includes the system reset.
 */

import { Theory, Ty, TyVar, boolT, funTs, prodT, setT, Const, Sch, mkEq } from './types';
import { emptyTheory, declareConst, addAxiom } from './globals';
import { EQ_TRUE_AXIOM, TRUE_I_AXIOM } from './simplifier';
import { resetState } from './state';

const a = TyVar('a');
const b = TyVar('b');

/** Constant declarations of the base theory, in declaration order. */
export const BASE_CONSTANTS: ReadonlyArray<[string, Ty]> = [
    ['=', funTs([a, a], boolT)],
    ['==>', funTs([boolT, boolT], boolT)],
    ['True', boolT],
    ['Pair', funTs([a, b], prodT(a, b))],
    ['member', funTs([a, setT(a)], boolT)],
    ['plus', funTs([a, a], a)],
    ['less_eq', funTs([a, a], boolT)],
];

/**
 * Creates a fresh base theory: every constant of `BASE_CONSTANTS`, the axiom
 * `TrueI: True` and the rewrite rule `eq_true: (?x = ?x) = True`.
 */
export function createBaseTheory(name = 'Base'): Theory {
    let theory = emptyTheory(name);
    for (const [constName, ty] of BASE_CONSTANTS) {
        theory = declareConst(theory, constName, ty);
    }
    const x = Sch('x', 0, a);
    theory = addAxiom(theory, TRUE_I_AXIOM, Const('True', boolT));
    theory = addAxiom(theory, EQ_TRUE_AXIOM, mkEq(mkEq(x, x, a), Const('True', boolT), boolT));
    return theory;
}

/**
 * Resets flags and the verbose channel, then returns a fresh base theory.
 * This is the entry point tests use to start from a clean environment.
 */
export function resetBase(name?: string): Theory {
    resetState();
    return createBaseTheory(name);
}
