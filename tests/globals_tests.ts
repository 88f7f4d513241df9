/**
 * @file tests/globals_tests.ts
 * @description Tests for declarations, fact collections, the definitional
 * principle and theory merging.
 */
import { Theory, Thm, natT, funT } from '../src/types';
import {
    declareConst, addAxiom, noteFacts, getFact, getFacts, codeEquations, defineConst, mergeTheories, constType
} from '../src/globals';
import { readProp, readTerm } from '../src/parser';
import { mergeModeRegistries } from '../src/extraction_rules';
import { mergeConclusionPatterns } from '../src/patterns';
import { mergeRuleSets } from '../src/rule_sets';
import { typesEqual } from '../src/structural';
import { UserInputError, HostRejection } from '../src/errors';
import { assert, assertEqual, baseTheory, withConsts, withAxioms, expectError, showThm } from './utils';
import { describe, it, beforeEach } from 'node:test';

const merge = { extraction: mergeModeRegistries, patterns: mergeConclusionPatterns, ruleSets: mergeRuleSets };

describe('Theory context', () => {
    let theory: Theory;
    let one: Thm;
    let two: Thm;

    beforeEach(() => {
        theory = withAxioms(withConsts(baseTheory(), [['P', 'nat ⇒ bool']]), [
            ['p1', 'P 1'],
            ['p2', 'P 2'],
        ]);
        one = getFact(theory, 'p1');
        two = getFact(theory, 'p2');
    });

    describe('Declarations', () => {
        it('should leave the original theory untouched', () => {
            const extended = declareConst(theory, 'q', natT);
            assert(extended.consts.has('q'), 'q declared');
            assert(!theory.consts.has('q'), 'original theory unchanged');
            assert(extended.version === theory.version + 1, 'version bumped');
        });

        it('should reject duplicate constants and non-propositional axioms', () => {
            const dup = expectError(() => declareConst(theory, 'P', natT), 'duplicate');
            assert(dup instanceof HostRejection, `expected HostRejection, got ${dup.name}`);
            const ax = expectError(() => addAxiom(theory, 'bad', readTerm(theory, '1 + 1')), 'non-bool axiom');
            assert(ax instanceof HostRejection, `expected HostRejection, got ${ax.name}`);
            assertEqual(ax.message, 'Axiom bad is not a proposition: 1 + 1', 'axiom message');
        });
    });

    describe('Facts', () => {
        it('should select members of a collection', () => {
            const th = noteFacts(theory, 'pair', [one, two]);
            assertEqual(showThm(getFact(th, 'pair(2)')), 'P 2', 'second member');
            assert(getFacts(th, 'pair').length === 2, 'collection size');
        });

        it('should report bad fact references as UserInputError', () => {
            const th = noteFacts(theory, 'pair', [one, two]);
            for (const ref of ['pair', 'pair(3)', 'nothing']) {
                const err = expectError(() => getFact(th, ref), ref);
                assert(err instanceof UserInputError, `${ref}: expected UserInputError, got ${err.name}`);
            }
        });

        it('should collect code equations by tag in note order', () => {
            let th = noteFacts(theory, 'b.code', [two], ['code']);
            th = noteFacts(th, 'plain', [one]);
            th = noteFacts(th, 'a.code', [one], ['code', 'simp']);
            assertEqual(codeEquations(th).map(showThm).join('; '), 'P 2; P 1', 'code equations');
        });
    });

    describe('Definitions', () => {
        it('should define a constant by an equation', () => {
            const { theory: th, constant, def } = defineConst(theory, readProp(theory, 'double (x :: nat) = x + x'));
            assertEqual(showThm(def), 'double ?x = ?x + ?x', 'definition axiom');
            assert(constant.name === 'double', 'constant name');
            const declared = constType(th, 'double');
            assert(declared !== undefined && typesEqual(declared, funT(natT, natT)), 'constant type');
            assertEqual(showThm(getFact(th, 'double_def')), 'double ?x = ?x + ?x', 'definition fact');
            assert(!theory.consts.has('double'), 'original theory unchanged');
        });

        it('should reject definitions that violate the definitional principle', () => {
            const cases: Array<[string, string]> = [
                ['h x = h x + 1', 'Circular definition of h'],
                ['h x = x + y', 'Extra variables on rhs of definition h: y'],
                ['h 0 = 1', 'Argument 0 of definition h is not a variable'],
                ['h x x = x', 'Duplicate argument x in definition h'],
                ["(e :: bool) = ((λ(u :: 'a). u) = (λu. u))", "Extra type variables on rhs of definition e: 'a"],
                ['P 1 = P 2', 'Head of definition is not a free variable: P 1'],
                ['True', 'Definition is not an equation: True'],
            ];
            for (const [src, message] of cases) {
                const err = expectError(() => defineConst(theory, readProp(theory, src)), src);
                assert(err instanceof HostRejection, `${src}: expected HostRejection, got ${err.name}`);
                assertEqual(err.message, message, src);
            }
        });
    });

    describe('Merging', () => {
        it('should unite declarations and let the right side shadow facts', () => {
            const left = noteFacts(declareConst(theory, 'q', natT), 'shared', [one]);
            const right = noteFacts(declareConst(theory, 'r', natT), 'shared', [two]);
            const merged = mergeTheories(left, right, merge);
            assert(merged.consts.has('q') && merged.consts.has('r'), 'both constants');
            assertEqual(showThm(getFact(merged, 'shared')), 'P 2', 'right fact wins');
        });

        it('should reject a constant declared with two types', () => {
            const left = declareConst(theory, 'q', natT);
            const right = declareConst(theory, 'q', funT(natT, natT));
            const err = expectError(() => mergeTheories(left, right, merge), 'type clash');
            assert(err instanceof HostRejection, `expected HostRejection, got ${err.name}`);
        });
    });
});
