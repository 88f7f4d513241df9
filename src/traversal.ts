/**
 * @file traversal.ts
 * @description Bottom-up extraction over a term. Each node is rebuilt from its
 * already processed children and then tested against the rule set; a match
 * is lifted to a new constant and replaced, and the replacement is not
 * examined again.
 */

import { Term, Theory, Binder, FreeTerm, ExtractionRuleSet, MatchedDefinition, Lam, App } from './types';
import { findMatchingRule } from './extraction_rules';
import { buildClosure } from './closure';
import { MAX_STACK_DEPTH } from './constants';
import { consoleLog, getFlag } from './state';
import { printTerm } from './utils';

export interface TraversalResult {
    theory: Theory;
    term: Term;
    /** Generated definitions in creation order. */
    defs: MatchedDefinition[];
}

/**
 * Replaces every subterm matching a rule of `rules` by a fresh constant named
 * `<basename>_<n>`, numbering from 0 in post-order (function before argument).
 * The new constants also take the members of `locals` their subterm mentions.
 */
export function extractSubterms(
    theory: Theory,
    rules: ExtractionRuleSet,
    basename: string,
    t: Term,
    locals: readonly FreeTerm[] = []
): TraversalResult {
    let current = theory;
    const defs: MatchedDefinition[] = [];

    const visit = (u: Term, env: Binder[], depth: number): Term => {
        if (depth > MAX_STACK_DEPTH) throw new Error(`extractSubterms stack depth exceeded`);

        let rebuilt: Term;
        switch (u.tag) {
            case 'App':
                rebuilt = App(visit(u.func, env, depth + 1), visit(u.arg, env, depth + 1));
                break;
            case 'Lam':
                rebuilt = Lam(u.paramName, u.paramType, visit(u.body, [...env, { name: u.paramName, type: u.paramType }], depth + 1));
                break;
            default:
                rebuilt = u;
        }

        const binderTypes = env.map(b => b.type).reverse();
        const match = findMatchingRule(rules, rebuilt, binderTypes);
        if (!match) return rebuilt;

        const name = `${basename}_${defs.length}`;
        const closure = buildClosure(current, env, name, rebuilt, locals);
        current = closure.theory;
        defs.push({ ...closure.def, rule: match.rule });
        if (getFlag('traceExtraction')) {
            console.log(`extract> ${name}: ${printTerm(closure.def.body)}`);
        }
        consoleLog(`extractSubterms: replaced by ${printTerm(closure.replacement)}`);
        return closure.replacement;
    };

    const term = visit(t, [], 0);
    return { theory: current, term, defs };
}
