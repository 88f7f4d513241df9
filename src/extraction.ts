/**
 * @file extraction.ts
 * @description Extraction of recursion equations. The right-hand side of a
 * source equation is traversed, matching subterms are lifted to new
 * constants, the rewritten equation is re-proved from the source, and every
 * new constant gets a code equation derived from its rule's derivation.
 */

import { Term, Thm, Theory, Discharge, MatchedDefinition, Warning, destEq, mkEq, stripImps } from './types';
import { resolveModes } from './extraction_rules';
import { extractSubterms } from './traversal';
import { noteFacts } from './globals';
import {
    importThm, exportThm, incrIndexes, instantiateThm, betaNormThm, impliesElim, dischargePremise
} from './kernel';
import { matchTerm, maxSchIndex } from './pattern';
import { proveBySimp } from './simplifier';
import { firstTac, thenSimpTac } from './proof';
import { UserInputError, HostRejection } from './errors';
import { emitWarning, consoleLog } from './state';
import { printTerm } from './utils';
import { DEFS_SUFFIX, CODE_SUFFIX, CODE_TAG } from './constants';

export interface ExtractionRequest {
    /** Mode names; empty selects every registered mode. */
    modes: readonly string[];
    basename: string;
    thm: Thm;
}

export interface ExtractionResult {
    theory: Theory;
    defs: MatchedDefinition[];
    /** The source equation with the extracted constants in place. */
    equation: Thm;
    codeEquations: Thm[];
    warnings: Warning[];
}

/**
 * Proves one side condition: directly with the discharge procedure, then
 * after rewriting with `rules`.
 */
function dischargeSideCondition(theory: Theory, discharge: Discharge, rules: readonly Thm[], goal: Term): Thm | null {
    const result = firstTac(discharge, thenSimpTac(rules, discharge))(theory, goal);
    if (result.ok) return result.thm;
    consoleLog(`dischargeSideCondition: ${result.reason}`);
    return null;
}

/**
 * Derives the code equation of one generated definition from its rule's
 * derivation. Side conditions that cannot be discharged stay as premises.
 */
function deriveCodeEquation(
    theory: Theory,
    def: MatchedDefinition,
    rules: readonly Thm[],
    warnings: Warning[]
): Thm {
    const derivation = incrIndexes(def.rule.derivation, maxSchIndex(def.fact.prop) + 1);
    const [first] = stripImps(derivation.prop).prems;
    const inst = first !== undefined ? matchTerm(first, def.fact.prop) : null;
    if (!inst) {
        throw new HostRejection(`Derivation ${printTerm(def.rule.derivation.prop)} does not apply to ${printTerm(def.fact.prop)}`);
    }
    let th = impliesElim(betaNormThm(instantiateThm(derivation, inst)), betaNormThm(def.fact));

    const unresolved: Term[] = [];
    let i = 0;
    for (;;) {
        const premise = stripImps(th.prop).prems[i];
        if (premise === undefined) break;
        const proof = dischargeSideCondition(theory, def.rule.discharge, rules, premise);
        if (proof) {
            th = dischargePremise(th, i, proof);
        } else {
            unresolved.push(premise);
            i++;
        }
    }
    if (unresolved.length > 0) {
        emitWarning(warnings, 'unresolved-side-conditions',
            `Could not discharge side conditions of ${def.name}: ${unresolved.map(printTerm).join(', ')}`);
    }
    return exportThm(th, []);
}

/**
 * Runs extraction over the right-hand side of `thm` and records the results
 * as `<basename>.defs` and `<basename>.code` (tagged for code generation).
 * @throws UserInputError when `thm` is not an equation or a mode is unknown.
 * @throws HostRejection when the rewritten equation or a derivation cannot be proved.
 */
export function extractRecursionEqs(theory: Theory, request: ExtractionRequest): ExtractionResult {
    const { basename } = request;
    const ruleSet = resolveModes(theory, request.modes);
    const imported = importThm(theory, request.thm);
    const eq = destEq(imported.thm.prop);
    if (!eq) throw new UserInputError(`Not an equation: ${printTerm(request.thm.prop)}`);

    const traversal = extractSubterms(theory, ruleSet, basename, eq.rhs, [...imported.frees.values()]);
    const defs = traversal.defs;
    let current = noteFacts(traversal.theory, `${basename}.${DEFS_SUFFIX}`, defs.map(d => d.fact));

    // Exactly the source equation and the new definitions.
    const rules = [imported.thm, ...defs.map(d => d.fact)];
    const goal = mkEq(eq.lhs, traversal.term, eq.type);
    const proved = proveBySimp(current, rules, goal);
    if (!proved.ok) {
        throw new HostRejection(`Failed to prove extracted equation ${printTerm(goal)}: ${proved.reason}`);
    }
    const equation = exportThm(proved.thm, imported.frees.values());

    const warnings: Warning[] = [];
    const codeEquations = defs.map(d => deriveCodeEquation(current, d, rules, warnings));

    current = noteFacts(current, `${basename}.${CODE_SUFFIX}`, [equation, ...codeEquations], [CODE_TAG]);
    consoleLog(`extractRecursionEqs> ${basename}: ${defs.length} definition(s)`);
    return { theory: current, defs, equation, codeEquations, warnings };
}
