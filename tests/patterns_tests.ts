/**
 * @file tests/patterns_tests.ts
 * @description Tests for conclusion-pattern normalization and the pattern and
 * rule-set registries.
 */
import { Theory, Sch, Const, boolT, natT, funT, setT, mkApps } from '../src/types';
import { schematicVars } from '../src/pattern';
import { getFact } from '../src/globals';
import { readTerm } from '../src/parser';
import {
    tryNormalizePattern, normalizePattern, patternHoles, addConclusionPattern, deleteConclusionPattern,
    conclusionPatterns, mergeConclusionPatterns
} from '../src/patterns';
import { addRule, deleteRule, rulesOf, mergeRuleSets } from '../src/rule_sets';
import { printTerm, printType } from '../src/utils';
import { typeOf } from '../src/unification';
import { UserInputError } from '../src/errors';
import { assert, assertEqual, baseTheory, withConsts, withAxioms, expectError, showThm } from './utils';
import { describe, it, beforeEach } from 'node:test';

describe('Registries', () => {
    let theory: Theory;

    beforeEach(() => {
        theory = withConsts(baseTheory(), [['P', 'nat ⇒ bool'], ['F', 'nat ⇒ nat']]);
        theory = withAxioms(theory, [['p0', 'P 0'], ['p1', 'P 1']]);
    });

    describe('Pattern normalization', () => {
        it('should beta-eta normalize patterns', () => {
            assertEqual(printTerm(normalizePattern(readTerm(theory, '(λx. P x) ?y'))), 'P ?y', 'beta');
            assertEqual(printTerm(normalizePattern(readTerm(theory, '?Q (λx. F x) 1'))), '?Q F 1', 'eta');
        });

        it('should read a pattern of unknown type as a proposition', () => {
            const p = normalizePattern(readTerm(theory, '?P'));
            assertEqual(printType(typeOf(p)), 'bool', 'pattern type');
        });

        it('should renumber dummies in occurrence order', () => {
            const member = Const('member', funT(natT, funT(setT(natT), boolT)));
            const raw = mkApps(member, [Sch('_', 7, natT), Sch('_', 3, setT(natT))]);
            const p = tryNormalizePattern(raw);
            assert(p !== null, 'pattern normalized');
            const indices = p === null ? [] : schematicVars(p).map(v => v.index);
            assertEqual(indices.join(','), '0,1', 'dummy indices');
        });

        it('should reject patterns that are not propositions', () => {
            assert(tryNormalizePattern(readTerm(theory, 'F ?x')) === null, 'nat pattern');
            const err = expectError(() => normalizePattern(readTerm(theory, 'F ?x')), 'nat pattern');
            assert(err instanceof UserInputError, `expected UserInputError, got ${err.name}`);
            assertEqual(err.message, 'Pattern is not a proposition: F ?x', 'message');
        });

        it('should list named holes but not dummies', () => {
            const holes = patternHoles(normalizePattern(readTerm(theory, '(_, ?f) ∈ ?R')));
            assertEqual(holes.map(h => h.name).join(', '), 'f, R', 'holes');
        });
    });

    describe('Conclusion patterns', () => {
        it('should add patterns once, in registration order', () => {
            let th = addConclusionPattern(theory, readTerm(theory, '(?f, _) ∈ _'));
            th = addConclusionPattern(th, readTerm(theory, 'P ?n'));
            const version = th.version;
            th = addConclusionPattern(th, readTerm(theory, '(?f, _) ∈ _'));
            assertEqual(conclusionPatterns(th).map(printTerm).join('; '), '(?f, _) ∈ _; P ?n', 'registry');
            assert(th.version === version, 'duplicate leaves the theory as it was');
        });

        it('should delete patterns and ignore missing ones', () => {
            let th = addConclusionPattern(theory, readTerm(theory, 'P ?n'));
            th = deleteConclusionPattern(th, readTerm(theory, 'P ?n'));
            assert(conclusionPatterns(th).length === 0, 'pattern deleted');
            assert(deleteConclusionPattern(th, readTerm(theory, 'P ?n')) === th, 'missing pattern');
        });

        it('should merge registries as a list union', () => {
            const a = [normalizePattern(readTerm(theory, 'P ?n'))];
            const b = [normalizePattern(readTerm(theory, '(?f, _) ∈ _')), normalizePattern(readTerm(theory, 'P ?n'))];
            assertEqual(mergeConclusionPatterns(a, b).map(printTerm).join('; '), 'P ?n; (?f, _) ∈ _', 'merged');
        });
    });

    describe('Rule sets', () => {
        it('should add rules without duplicates', () => {
            let th = addRule(theory, 'solve', getFact(theory, 'p0'), getFact(theory, 'p1'));
            th = addRule(th, 'solve', getFact(theory, 'p0'));
            assertEqual(rulesOf(th, 'solve').map(showThm).join('; '), 'P 0; P 1', 'solve rules');
            assert(rulesOf(th, 'recIntro').length === 0, 'recIntro untouched');
        });

        it('should delete rules and ignore missing ones', () => {
            let th = addRule(theory, 'recIntro', getFact(theory, 'p0'));
            th = deleteRule(th, 'recIntro', getFact(theory, 'p0'));
            assert(rulesOf(th, 'recIntro').length === 0, 'rule deleted');
            assert(deleteRule(th, 'recIntro', getFact(theory, 'p1')) === th, 'missing rule');
        });

        it('should merge rule sets per collection', () => {
            const a = addRule(theory, 'solve', getFact(theory, 'p0')).ruleSets;
            const b = addRule(addRule(theory, 'solve', getFact(theory, 'p1'), getFact(theory, 'p0')), 'recIntro', getFact(theory, 'p1')).ruleSets;
            const merged = mergeRuleSets(a, b);
            assertEqual(merged.solve.map(showThm).join('; '), 'P 0; P 1', 'merged solve');
            assertEqual(merged.recIntro.map(showThm).join('; '), 'P 1', 'merged recIntro');
        });
    });
});
