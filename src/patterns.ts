/**
 * @file patterns.ts
 * @description The conclusion-pattern registry used by concrete definitions
 * to locate the subterm to define. Patterns are stored normalized and without
 * duplicates, in registration order.
 */

import { Term, Theory, SchTerm, Sch, boolT, isBoolT, isDummy, DUMMY_NAME, schKey } from './types';
import { termKey } from './structural';
import { typeOf, substType } from './unification';
import { mapTypes, mapLeaves, schematicVars } from './pattern';
import { betaEtaNorm } from './reduction';
import { updateTheory } from './globals';
import { UserInputError } from './errors';
import { printTerm } from './utils';

/**
 * Normal form of a pattern, or null when the pattern is not a proposition.
 * A pattern whose type is a type variable is read as a proposition; dummy
 * variables are renumbered in occurrence order.
 */
export function tryNormalizePattern(t: Term): Term | null {
    let p = betaEtaNorm(t);
    const ty = typeOf(p);
    if (ty.tag === 'TyVar') {
        p = mapTypes(p, u => substType(u, new Map([[ty.name, boolT]])));
    } else if (!isBoolT(ty)) {
        return null;
    }
    const dummies = new Map<string, SchTerm>();
    for (const v of schematicVars(p)) {
        if (isDummy(v)) dummies.set(schKey(v.name, v.index), Sch(DUMMY_NAME, dummies.size, v.type));
    }
    if (dummies.size === 0) return p;
    return mapLeaves(p, leaf => leaf.tag === 'Sch' ? dummies.get(schKey(leaf.name, leaf.index)) : undefined);
}

/**
 * @throws UserInputError when the pattern is not a proposition.
 */
export function normalizePattern(t: Term): Term {
    const p = tryNormalizePattern(t);
    if (!p) throw new UserInputError(`Pattern is not a proposition: ${printTerm(t)}`);
    return p;
}

/** The named schematic variables of a pattern, in occurrence order. */
export function patternHoles(p: Term): SchTerm[] {
    return schematicVars(p).filter(v => !isDummy(v));
}

export function conclusionPatterns(theory: Theory): readonly Term[] {
    return theory.conclusionPatterns;
}

/** List union keyed by the normalized pattern. */
export function mergeConclusionPatterns(a: readonly Term[], b: readonly Term[]): Term[] {
    const keys = new Set(a.map(termKey));
    return [...a, ...b.filter(p => {
        const key = termKey(p);
        if (keys.has(key)) return false;
        keys.add(key);
        return true;
    })];
}

export function addConclusionPattern(theory: Theory, pattern: Term): Theory {
    const p = normalizePattern(pattern);
    const conclusionPatterns = mergeConclusionPatterns(theory.conclusionPatterns, [p]);
    if (conclusionPatterns.length === theory.conclusionPatterns.length) return theory;
    return updateTheory(theory, { conclusionPatterns });
}

export function deleteConclusionPattern(theory: Theory, pattern: Term): Theory {
    const key = termKey(normalizePattern(pattern));
    const conclusionPatterns = theory.conclusionPatterns.filter(p => termKey(p) !== key);
    if (conclusionPatterns.length === theory.conclusionPatterns.length) {
        console.warn(`Pattern not registered: ${printTerm(pattern)}`);
        return theory;
    }
    return updateTheory(theory, { conclusionPatterns });
}
