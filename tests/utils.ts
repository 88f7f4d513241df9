/**
 * @file tests/utils.ts
 * @description Assertion helpers and theory fixtures shared by the tests.
 */

import { Theory, Thm, Discharge } from '../src/types';
import { declareConst, addAxiom, getFact } from '../src/globals';
import { parseType, readProp, readTerm } from '../src/parser';
import { resetBase } from '../src/stdlib';
import { registerExtraction } from '../src/extraction_rules';
import { addRule } from '../src/rule_sets';
import { vcSolveTac } from '../src/proof';
import { printThm } from '../src/utils';
import { setFlag } from '../src/state';

// Helper function to assert equality for test cases
export function assertEqual(actual: string, expected: string, message: string) {
    if (actual !== expected) {
        console.error(`Assertion Failed: ${message}`);
        console.error(`Expected: ${expected}`);
        console.error(`Actual:   ${actual}`);
        throw new Error(`Assertion Failed: ${message}\nExpected: ${expected}\nActual:   ${actual}`);
    }
}

export function assert(condition: boolean, message: string) {
    if (!condition) {
        console.error(`Assertion Failed: ${message}`);
        throw new Error(`Assertion Failed: ${message}`);
    }
}

/** Runs `fn` and returns the error it throws; fails when it returns normally. */
export function expectError(fn: () => unknown, message: string): Error {
    try {
        fn();
    } catch (e) {
        if (e instanceof Error) return e;
        throw new Error(`${message}: thrown value is not an Error`);
    }
    throw new Error(`${message}: expected an error`);
}

export const showThm = (th: Thm): string => printThm(th);

export function withConsts(theory: Theory, decls: ReadonlyArray<[string, string]>): Theory {
    return decls.reduce((t, [name, ty]) => declareConst(t, name, parseType(ty)), theory);
}

export function withAxioms(theory: Theory, axioms: ReadonlyArray<[string, string]>): Theory {
    return axioms.reduce((t, [name, src]) => addAxiom(t, name, readProp(t, src)), theory);
}

/** A fresh base theory; warnings are collected by the callers, not echoed. */
export function baseTheory(): Theory {
    const theory = resetBase('Test');
    setFlag('quietWarnings', true);
    return theory;
}

/**
 * Fixed-point combinator with its transfer rule, monotonicity facts for the
 * recursion bodies used in the tests, and two source equations:
 * `f` with one recursion and `k` with a recursion nested in another.
 */
export function recursionTheory(): Theory {
    let theory = withConsts(baseTheory(), [
        ['REC', "(('a ⇒ 'b) ⇒ 'a ⇒ 'b) ⇒ 'a ⇒ 'b"],
        ['mono', "(('a ⇒ 'b) ⇒ 'a ⇒ 'b) ⇒ bool"],
        ['body', '(nat ⇒ nat) ⇒ nat ⇒ nat'],
        ['inner', '(nat ⇒ nat) ⇒ nat ⇒ nat'],
        ['step', '(nat ⇒ nat) ⇒ (nat ⇒ nat) ⇒ nat ⇒ nat'],
        ['f', 'nat ⇒ nat'],
        ['k', 'nat ⇒ nat'],
    ]);
    theory = withAxioms(theory, [
        ['REC_transfer', '?c = REC ?B ==> mono ?B ==> ?c ?x = ?B ?c ?x'],
        ['mono_body', 'mono (λg x. body g x)'],
        ['mono_inner', 'mono (λh y. inner h y)'],
        ['mono_step', 'mono (λg x. step (REC (λh y. inner h y)) g x)'],
        ['f_eq', 'f ?x = REC (λg x. body g x) ?x'],
        ['k_eq', 'k ?x = REC (λg x. step (REC (λh y. inner h y)) g x) ?x'],
    ]);
    return theory;
}

/** `recursionTheory` with the monotonicity facts as solver rules and the `nres` mode. */
export function nresTheory(discharge: Discharge = vcSolveTac()): Theory {
    let theory = recursionTheory();
    theory = addRule(theory, 'solve',
        getFact(theory, 'mono_body'), getFact(theory, 'mono_inner'), getFact(theory, 'mono_step'));
    return registerExtraction(theory, 'nres', {
        pattern: readTerm(theory, 'REC ?B'),
        derivation: getFact(theory, 'REC_transfer'),
        discharge,
    });
}
