/**
 * @file rule_sets.ts
 * @description The `recIntro` and `solve` rule collections consumed by the
 * verification-condition solver.
 */

import { Thm, Theory, RuleSetName, RuleSets } from './types';
import { updateTheory, thmKey } from './globals';
import { printThm } from './utils';

function unionThms(a: readonly Thm[], b: readonly Thm[]): Thm[] {
    const keys = new Set(a.map(thmKey));
    const result = [...a];
    for (const th of b) {
        const key = thmKey(th);
        if (!keys.has(key)) {
            keys.add(key);
            result.push(th);
        }
    }
    return result;
}

export function rulesOf(theory: Theory, set: RuleSetName): readonly Thm[] {
    return theory.ruleSets[set];
}

export function addRule(theory: Theory, set: RuleSetName, ...thms: Thm[]): Theory {
    const updated = unionThms(theory.ruleSets[set], thms);
    if (updated.length === theory.ruleSets[set].length) return theory;
    return updateTheory(theory, { ruleSets: { ...theory.ruleSets, [set]: updated } });
}

export function deleteRule(theory: Theory, set: RuleSetName, ...thms: Thm[]): Theory {
    const keys = new Set(thms.map(thmKey));
    const updated = theory.ruleSets[set].filter(th => !keys.has(thmKey(th)));
    if (updated.length === theory.ruleSets[set].length) {
        console.warn(`No such ${set} rule: ${thms.map(printThm).join(', ')}`);
        return theory;
    }
    return updateTheory(theory, { ruleSets: { ...theory.ruleSets, [set]: updated } });
}

export function mergeRuleSets(a: RuleSets, b: RuleSets): RuleSets {
    return {
        recIntro: unionThms(a.recIntro, b.recIntro),
        solve: unionThms(a.solve, b.solve),
    };
}
