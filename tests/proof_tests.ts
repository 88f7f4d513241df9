/**
 * @file tests/proof_tests.ts
 * @description Tests for tactics: resolution, simplification-based closing and
 * the verification-condition solver.
 */
import { Theory, Thm } from '../src/types';
import { getFact } from '../src/globals';
import { readProp } from '../src/parser';
import { trueTac, firstTac, thmsTac, factTac, thenSimpTac, resolveTac, vcSolveTac, fail } from '../src/proof';
import { addRule } from '../src/rule_sets';
import { assert, assertEqual, baseTheory, withConsts, withAxioms, showThm } from './utils';
import { describe, it, beforeEach } from 'node:test';

describe('Tactics', () => {
    let theory: Theory;
    let ev0: Thm;
    let evSS: Thm;
    let add0: Thm;

    beforeEach(() => {
        theory = withConsts(baseTheory(), [['ev', 'nat ⇒ bool']]);
        theory = withAxioms(theory, [
            ['ev0', 'ev 0'],
            ['evSS', 'ev ?n ==> ev (?n + 2)'],
            ['add0', '?n + 0 = ?n'],
        ]);
        ev0 = getFact(theory, 'ev0');
        evSS = getFact(theory, 'evSS');
        add0 = getFact(theory, 'add0');
    });

    it('should prove True and nothing else with trueTac', () => {
        const ok = trueTac(theory, readProp(theory, 'True'));
        assert(ok.ok, 'True is proved');
        const bad = trueTac(theory, readProp(theory, 'ev 0'));
        assert(!bad.ok, 'ev 0 is not True');
        if (!bad.ok) assertEqual(bad.reason, 'Goal is not True: ev 0', 'trueTac reason');
    });

    it('should join the reasons of every failed alternative', () => {
        const result = firstTac(() => fail('first'), () => fail('second'))(theory, readProp(theory, 'ev 1'));
        assert(!result.ok, 'both alternatives fail');
        if (!result.ok) assertEqual(result.reason, 'first; second', 'joined reasons');
    });

    it('should close goals with instances of facts', () => {
        const result = thmsTac([evSS, ev0])(theory, readProp(theory, 'ev 0'));
        assert(result.ok, 'ev 0 by ev0');
        const named = factTac('ev0')(theory, readProp(theory, 'ev 0'));
        assert(named.ok, 'ev 0 by name');
    });

    it('should resolve goals backwards through premises', () => {
        const result = resolveTac([ev0, evSS])(theory, readProp(theory, 'ev (0 + 2 + 2)'));
        assert(result.ok, 'ev (0 + 2 + 2) resolved');
        if (result.ok) assertEqual(showThm(result.thm), 'ev (0 + 2 + 2)', 'resolved goal');
    });

    it('should fail when no rule resolves the goal', () => {
        const result = resolveTac([ev0, evSS])(theory, readProp(theory, 'ev 1'));
        assert(!result.ok, 'ev 1 is not provable');
        if (!result.ok) assertEqual(result.reason, 'No rule resolves ev 1', 'resolution failure');
    });

    it('should respect the resolution depth', () => {
        const result = resolveTac([ev0, evSS], 1)(theory, readProp(theory, 'ev (0 + 2 + 2)'));
        assert(!result.ok, 'two steps need depth 2');
    });

    it('should simplify before running a tactic', () => {
        const result = thenSimpTac([add0], factTac('ev0'))(theory, readProp(theory, 'ev (0 + 0)'));
        assert(result.ok, 'ev (0 + 0) closed');
        if (result.ok) assertEqual(showThm(result.thm), 'ev (0 + 0)', 'simplified goal');
    });

    it('should solve verification conditions with the solve rules', () => {
        const goal = readProp(theory, 'ev (0 + 2)');
        assert(!vcSolveTac()(theory, goal).ok, 'no rules registered');
        const withRules = addRule(theory, 'solve', ev0, evSS);
        const result = vcSolveTac()(withRules, goal);
        assert(result.ok, 'solved by registered rules');
        if (result.ok) assertEqual(showThm(result.thm), 'ev (0 + 2)', 'solved goal');
    });

    it('should fall back to simplification with extra facts', () => {
        const withRules = addRule(theory, 'solve', evSS);
        const result = vcSolveTac([add0, ev0])(withRules, readProp(theory, 'ev (0 + 0 + 2)'));
        assert(result.ok, 'premise ev (0 + 0) closed by simplification');
    });
});
