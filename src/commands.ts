/**
 * @file commands.ts
 * @description User-level commands. They take plain data (names and source
 * strings), resolve it against the theory and call the extraction engine.
 * Every command returns the new theory and the warnings it produced.
 */

import { Thm, Theory, Warning, Discharge, RuleSetName, destEq, stripApps } from './types';
import { getFact, getFacts } from './globals';
import { readTerm } from './parser';
import { concreteDefinition, ConcreteDefinitionResult } from './concrete_definition';
import { extractRecursionEqs, ExtractionResult } from './extraction';
import { registerExtraction } from './extraction_rules';
import { addConclusionPattern, deleteConclusionPattern } from './patterns';
import { addRule, deleteRule } from './rule_sets';
import { UserInputError } from './errors';
import { printTerm } from './utils';

export interface CommandResult {
    theory: Theory;
    warnings: Warning[];
}

export interface ConcreteDefinitionCommand {
    name: string;
    attributes?: string[];
    /** Variable names of the source fact. */
    params?: string[];
    /** Name of the source fact. */
    uses: string;
    /** Conclusion patterns in surface syntax; the registry is used when absent. */
    is?: string[];
    /** Extraction modes; extraction runs when present (an empty list selects all modes). */
    prepareCode?: string[];
}

export function concreteDefinitionCmd(
    theory: Theory,
    cmd: ConcreteDefinitionCommand
): CommandResult & { result: ConcreteDefinitionResult } {
    const result = concreteDefinition(theory, {
        name: cmd.name,
        attributes: cmd.attributes,
        params: cmd.params,
        thm: getFact(theory, cmd.uses),
        patterns: cmd.is?.map(src => readTerm(theory, src)),
        extractModes: cmd.prepareCode,
    });
    return { theory: result.theory, warnings: result.warnings, result };
}

export interface PrepareCodeCommand {
    modes?: string[];
    basename?: string;
    /** Fact names; collections contribute every member. */
    thms: string[];
}

function defaultBasename(thm: Thm): string {
    const eq = destEq(thm.prop);
    const head = eq ? stripApps(eq.lhs).head : null;
    if (!head || head.tag !== 'Const') {
        throw new UserInputError(`Cannot derive a basename from ${printTerm(thm.prop)}`);
    }
    return head.name;
}

export function prepareCodeThmsCmd(
    theory: Theory,
    cmd: PrepareCodeCommand
): CommandResult & { results: ExtractionResult[] } {
    const thms = cmd.thms.flatMap(name => [...getFacts(theory, name)]);
    if (cmd.basename !== undefined && thms.length > 1) {
        throw new UserInputError(`An explicit basename needs exactly one theorem, got ${thms.length}`);
    }
    let current = theory;
    const warnings: Warning[] = [];
    const results: ExtractionResult[] = [];
    for (const thm of thms) {
        const result = extractRecursionEqs(current, {
            modes: cmd.modes ?? [],
            basename: cmd.basename ?? defaultBasename(thm),
            thm,
        });
        current = result.theory;
        warnings.push(...result.warnings);
        results.push(result);
    }
    return { theory: current, warnings, results };
}

export function addPatternCmd(theory: Theory, source: string): CommandResult {
    return { theory: addConclusionPattern(theory, readTerm(theory, source)), warnings: [] };
}

export function deletePatternCmd(theory: Theory, source: string): CommandResult {
    return { theory: deleteConclusionPattern(theory, readTerm(theory, source)), warnings: [] };
}

function ruleCmd(set: RuleSetName) {
    return (theory: Theory, factName: string, options: { del?: boolean } = {}): CommandResult => {
        const thms = [...getFacts(theory, factName)];
        const updated = options.del ? deleteRule(theory, set, ...thms) : addRule(theory, set, ...thms);
        return { theory: updated, warnings: [] };
    };
}

export const solveRuleCmd = ruleCmd('solve');
export const recIntroRuleCmd = ruleCmd('recIntro');

export interface DeclareExtractionCommand {
    mode: string;
    /** Pattern in surface syntax. */
    pattern: string;
    /** Name of the derivation fact. */
    derivation: string;
    discharge: Discharge;
}

export function declareExtractionCmd(theory: Theory, cmd: DeclareExtractionCommand): CommandResult {
    const rule = {
        pattern: readTerm(theory, cmd.pattern),
        derivation: getFact(theory, cmd.derivation),
        discharge: cmd.discharge,
    };
    return { theory: registerExtraction(theory, cmd.mode, rule), warnings: [] };
}
