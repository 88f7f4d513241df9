/**
 * @file tests/commands_tests.ts
 * @description Tests for the user-level commands.
 */
import { Theory } from '../src/types';
import { getFact, getFacts, noteFacts, codeEquations } from '../src/globals';
import {
    concreteDefinitionCmd, prepareCodeThmsCmd, addPatternCmd, deletePatternCmd, solveRuleCmd, recIntroRuleCmd,
    declareExtractionCmd
} from '../src/commands';
import { extractionModes } from '../src/extraction_rules';
import { conclusionPatterns } from '../src/patterns';
import { rulesOf } from '../src/rule_sets';
import { vcSolveTac } from '../src/proof';
import { printTerm } from '../src/utils';
import { UserInputError } from '../src/errors';
import { assert, assertEqual, nresTheory, recursionTheory, withAxioms, expectError, showThm } from './utils';
import { describe, it, beforeEach } from 'node:test';

describe('Commands', () => {
    let theory: Theory;

    beforeEach(() => {
        theory = withAxioms(nresTheory(), [['impl_ref', '(REC (λg x. body g x), ?S) ∈ ?R']]);
    });

    describe('prepareCodeThmsCmd', () => {
        it('should derive basenames from the defined constants', () => {
            const { theory: th, results, warnings } = prepareCodeThmsCmd(theory, { modes: ['nres'], thms: ['f_eq', 'k_eq'] });
            assertEqual(results.map(r => showThm(r.equation)).join('; '), 'f ?x = f_0 ?x; k ?x = k_1 ?x', 'equations');
            assert(warnings.length === 0, 'no warnings');
            assert(getFacts(th, 'f.code').length === 2 && getFacts(th, 'k.code').length === 3, 'code facts');
            assert(codeEquations(th).length === 5, 'all code equations tagged');
        });

        it('should flatten fact collections', () => {
            const th = noteFacts(theory, 'sources', [getFact(theory, 'f_eq'), getFact(theory, 'k_eq')]);
            const { results } = prepareCodeThmsCmd(th, { thms: ['sources'] });
            assertEqual(results.map(r => r.defs.map(d => d.name).join(' ')).join('; '), 'f_0; k_0 k_1', 'generated names');
        });

        it('should use an explicit basename for a single theorem', () => {
            const { theory: th, results } = prepareCodeThmsCmd(theory, { basename: 'fast', thms: ['f_eq'] });
            assertEqual(showThm(results[0].equation), 'f ?x = fast_0 ?x', 'equation');
            assert(th.consts.has('fast_0'), 'fast_0 declared');
        });

        it('should reject an explicit basename for several theorems', () => {
            const err = expectError(() => prepareCodeThmsCmd(theory, { basename: 'both', thms: ['f_eq', 'k_eq'] }), 'basename');
            assert(err instanceof UserInputError, `expected UserInputError, got ${err.name}`);
            assertEqual(err.message, 'An explicit basename needs exactly one theorem, got 2', 'message');
        });

        it('should reject theorems without a constant head', () => {
            const err = expectError(() => prepareCodeThmsCmd(theory, { thms: ['mono_body'] }), 'no head');
            assert(err instanceof UserInputError, `expected UserInputError, got ${err.name}`);
            assertEqual(err.message, 'Cannot derive a basename from mono (λg x. body g x)', 'message');
        });

        it('should leave the theory untouched when a later theorem fails', () => {
            const err = expectError(() => prepareCodeThmsCmd(theory, { thms: ['f_eq', 'mono_body'] }), 'second fails');
            assert(err instanceof UserInputError, `expected UserInputError, got ${err.name}`);
            assert(!theory.consts.has('f_0'), 'no constant leaked');
        });
    });

    describe('concreteDefinitionCmd', () => {
        it('should resolve the source fact and patterns by name and source', () => {
            const { theory: th, result } = concreteDefinitionCmd(theory, {
                name: 'impl',
                uses: 'impl_ref',
                is: ['(?f, _) ∈ _'],
                prepareCode: ['nres'],
            });
            assertEqual(showThm(result.refined), '(impl, ?S) ∈ ?R', 'refined theorem');
            assertEqual(getFacts(th, 'impl.code').map(showThm).join('; '),
                'impl = impl_0; impl_0 ?x = body impl_0 ?x', 'impl.code');
        });

        it('should fall back to the registered patterns', () => {
            const withPattern = addPatternCmd(theory, '(?f, _) ∈ _').theory;
            const { result } = concreteDefinitionCmd(withPattern, { name: 'impl', uses: 'impl_ref' });
            assertEqual(showThm(result.def), 'impl = REC (λg x. body g x)', 'definition');
            assert(result.extraction === undefined, 'no extraction without prepareCode');
        });
    });

    describe('Registry commands', () => {
        it('should add and delete conclusion patterns', () => {
            let th = addPatternCmd(theory, '(?f, _) ∈ _').theory;
            assertEqual(conclusionPatterns(th).map(printTerm).join('; '), '(?f, _) ∈ _', 'added');
            th = deletePatternCmd(th, '(?f, _) ∈ _').theory;
            assert(conclusionPatterns(th).length === 0, 'deleted');
        });

        it('should add and delete solver rules by fact name', () => {
            let th = recIntroRuleCmd(theory, 'REC_transfer').theory;
            assert(rulesOf(th, 'recIntro').length === 1, 'recIntro rule added');
            th = recIntroRuleCmd(th, 'REC_transfer', { del: true }).theory;
            assert(rulesOf(th, 'recIntro').length === 0, 'recIntro rule deleted');
            th = solveRuleCmd(th, 'mono_body', { del: true }).theory;
            assert(rulesOf(th, 'solve').length === 2, 'solve rule deleted');
        });

        it('should declare extraction modes from facts', () => {
            let th = recursionTheory();
            th = solveRuleCmd(th, 'mono_body').theory;
            th = declareExtractionCmd(th, {
                mode: 'rec',
                pattern: 'REC ?B',
                derivation: 'REC_transfer',
                discharge: vcSolveTac(),
            }).theory;
            assertEqual(extractionModes(th).join(', '), 'rec', 'modes');
            const { results } = prepareCodeThmsCmd(th, { modes: ['rec'], thms: ['f_eq'] });
            assertEqual(results[0].codeEquations.map(showThm).join('; '), 'f_0 ?x = body f_0 ?x', 'code equations');
        });

        it('should reject unknown facts', () => {
            const err = expectError(() => solveRuleCmd(theory, 'missing'), 'unknown fact');
            assert(err instanceof UserInputError, `expected UserInputError, got ${err.name}`);
        });
    });
});
