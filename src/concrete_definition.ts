/**
 * @file concrete_definition.ts
 * @description Concrete definitions: a subterm of a theorem's conclusion,
 * located by a conclusion pattern, becomes a new constant, and the theorem is
 * restated with that constant in place of the subterm.
 */

import {
    Term, Thm, Theory, FreeTerm, ConstTerm, Warning, Free, mkApps, mkEq, funTs, stripImps, schKey
} from './types';
import { matchTerm, freeVars, emptyInstantiation } from './pattern';
import { typeOf } from './unification';
import { importThm, exportThm, instantiateThm, symmetric } from './kernel';
import { defineConst, noteFacts } from './globals';
import { simplifyThm } from './simplifier';
import { tryNormalizePattern, patternHoles } from './patterns';
import { extractRecursionEqs, ExtractionResult } from './extraction';
import { UserInputError } from './errors';
import { emitWarning, consoleLog } from './state';
import { printTerm } from './utils';
import { DEF_SUFFIX, REFINE_SUFFIX } from './constants';

export interface ConcreteDefinitionRequest {
    name: string;
    /** Tags for the `<name>.refine` fact. */
    attributes?: readonly string[];
    /** Variables of `thm` to take as parameters; defaults to the free variables of the body. */
    params?: readonly string[];
    thm: Thm;
    /** Conclusion patterns to try in order; defaults to the theory's registry. */
    patterns?: readonly Term[];
    /** When given, extraction runs on the new definition with these modes. */
    extractModes?: readonly string[];
}

export interface ConcreteDefinitionResult {
    theory: Theory;
    constant: ConstTerm;
    params: FreeTerm[];
    body: Term;
    def: Thm;
    refined: Thm;
    extraction?: ExtractionResult;
    warnings: Warning[];
}

function findBody(concl: Term, patterns: readonly Term[], warnings: Warning[]): Term {
    for (const raw of patterns) {
        const pattern = tryNormalizePattern(raw);
        const holes = pattern ? patternHoles(pattern) : [];
        if (!pattern || holes.length === 0) {
            emitWarning(warnings, 'invalid-pattern', `Ignoring pattern without a hole or not a proposition: ${printTerm(raw)}`);
            continue;
        }
        const inst = matchTerm(pattern, concl);
        if (!inst) continue;
        const hole = holes[0];
        if (holes.length > 1) {
            emitWarning(warnings, 'ambiguous-pattern',
                `Pattern ${printTerm(pattern)} has ${holes.length} holes, using ?${hole.name}`);
        }
        const body = inst.terms.get(schKey(hole.name, hole.index));
        if (body !== undefined) return body;
    }
    throw new UserInputError(`Conclusion does not match any extraction pattern: ${printTerm(concl)}`);
}

/**
 * Defines `name` from the subterm of `thm` located by the first matching
 * pattern and notes `<name>.def` and `<name>.refine`.
 * @throws UserInputError for unknown parameters or when no pattern matches.
 * @throws HostRejection when the definition is rejected.
 */
export function concreteDefinition(theory: Theory, request: ConcreteDefinitionRequest): ConcreteDefinitionResult {
    const { name } = request;
    const warnings: Warning[] = [];
    const imported = importThm(theory, request.thm);

    const explicitParams = (request.params ?? []).map(p => {
        const v = imported.frees.get(p);
        if (!v) throw new UserInputError(`No such variable: ${p}`);
        return v;
    });

    const { concl } = stripImps(imported.thm.prop);
    const body = findBody(concl, request.patterns ?? theory.conclusionPatterns, warnings);
    const params = explicitParams.length > 0 ? explicitParams : freeVars(body);

    const bodyType = typeOf(body);
    const head = Free(name, funTs(params.map(p => p.type), bodyType));
    const defined = defineConst(theory, mkEq(mkApps(head, params), body, bodyType));
    let current = noteFacts(defined.theory, `${name}.${DEF_SUFFIX}`, [defined.def]);

    // `body = name p1 … pn` over the fixed variables of the imported theorem
    const inst = emptyInstantiation();
    params.forEach(p => inst.terms.set(schKey(p.name, 0), p));
    const fold = symmetric(instantiateThm(defined.def, inst));
    const refined = exportThm(simplifyThm(current, [fold], imported.thm), imported.frees.values());
    current = noteFacts(current, `${name}.${REFINE_SUFFIX}`, [refined], request.attributes ?? []);
    consoleLog(`concreteDefinition> ${printTerm(defined.def.prop)}`);

    let extraction: ExtractionResult | undefined;
    if (request.extractModes) {
        extraction = extractRecursionEqs(current, { modes: request.extractModes, basename: name, thm: defined.def });
        current = extraction.theory;
        warnings.push(...extraction.warnings);
    }

    return {
        theory: current,
        constant: defined.constant,
        params,
        body,
        def: defined.def,
        refined,
        extraction,
        warnings,
    };
}
