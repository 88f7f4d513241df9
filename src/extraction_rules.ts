/**
 * @file extraction_rules.ts
 * @description Registry of extraction rules, grouped by mode name. A rule set
 * is an ordered list of rules without duplicate patterns plus an index from
 * the syntactic head of each pattern to the rules that carry it.
 */

import {
    Term, Ty, Theory, ExtractionRule, ExtractionRuleSet, ModeRegistry, Instantiation, destEq, stripImps
} from './types';
import { termKey } from './structural';
import { headKey, matchTerm } from './pattern';
import { updateTheory } from './globals';
import { UserInputError } from './errors';
import { consoleLog } from './state';
import { printTerm } from './utils';

/** Bucket for patterns with a schematic head: they are candidates for every term. */
const FLEX_KEY = '*';

export const emptyRuleSet: ExtractionRuleSet = { rules: [], keys: [], index: new Map() };

function buildIndex(rules: readonly ExtractionRule[]): Map<string, number[]> {
    const index = new Map<string, number[]>();
    rules.forEach((rule, i) => {
        const key = headKey(rule.pattern) ?? FLEX_KEY;
        const bucket = index.get(key);
        if (bucket) bucket.push(i);
        else index.set(key, [i]);
    });
    return index;
}

function fromRules(rules: ExtractionRule[]): ExtractionRuleSet {
    return { rules, keys: rules.map(r => termKey(r.pattern)), index: buildIndex(rules) };
}

/**
 * Adds a rule. A rule whose pattern is already present replaces the old one
 * at its position; otherwise it is appended.
 */
export function insertRule(set: ExtractionRuleSet, rule: ExtractionRule): ExtractionRuleSet {
    const key = termKey(rule.pattern);
    const pos = set.keys.indexOf(key);
    const rules = [...set.rules];
    if (pos >= 0) rules[pos] = rule;
    else rules.push(rule);
    return fromRules(rules);
}

/** List union: rules of `b` whose pattern is not in `a` are appended. */
export function unionRuleSets(a: ExtractionRuleSet, b: ExtractionRuleSet): ExtractionRuleSet {
    const rules = [...a.rules];
    const seen = new Set(a.keys);
    b.rules.forEach((rule, i) => {
        if (!seen.has(b.keys[i])) {
            seen.add(b.keys[i]);
            rules.push(rule);
        }
    });
    return fromRules(rules);
}

/** Rules that may match `t`, in registration order. */
export function candidates(set: ExtractionRuleSet, t: Term): ExtractionRule[] {
    const key = headKey(t);
    const positions = [...(key !== null ? set.index.get(key) ?? [] : []), ...(set.index.get(FLEX_KEY) ?? [])];
    return positions.sort((x, y) => x - y).map(i => set.rules[i]);
}

/**
 * The first rule (in registration order) whose pattern matches `t`.
 * @param binderTypes Types of the binders enclosing `t`, innermost first.
 */
export function findMatchingRule(
    set: ExtractionRuleSet,
    t: Term,
    binderTypes: readonly Ty[] = []
): { rule: ExtractionRule, inst: Instantiation } | null {
    for (const rule of candidates(set, t)) {
        const inst = matchTerm(rule.pattern, t, undefined, binderTypes);
        if (inst) return { rule, inst };
    }
    return null;
}

/**
 * Registers `rule` under `mode`.
 * @throws UserInputError if the derivation's first premise is not an equation.
 */
export function registerExtraction(theory: Theory, mode: string, rule: ExtractionRule): Theory {
    const { prems } = stripImps(rule.derivation.prop);
    if (prems.length === 0 || !destEq(prems[0])) {
        throw new UserInputError(`Derivation for mode ${mode} must start with an equation premise: ${printTerm(rule.derivation.prop)}`);
    }
    const extraction = new Map(theory.extraction);
    extraction.set(mode, insertRule(theory.extraction.get(mode) ?? emptyRuleSet, rule));
    consoleLog(`registerExtraction> ${mode}: ${printTerm(rule.pattern)}`);
    return updateTheory(theory, { extraction });
}

export function extractionModes(theory: Theory): string[] {
    return [...theory.extraction.keys()];
}

/**
 * Union of the rule sets of `modes`, in the given order; an empty list selects
 * every registered mode.
 * @throws UserInputError for an unknown mode or when no rule is selected.
 */
export function resolveModes(theory: Theory, modes: readonly string[]): ExtractionRuleSet {
    const names = modes.length === 0 ? extractionModes(theory) : modes;
    let result = emptyRuleSet;
    for (const mode of names) {
        const set = theory.extraction.get(mode);
        if (!set) throw new UserInputError(`Unknown extraction mode: ${mode}`);
        result = unionRuleSets(result, set);
    }
    if (result.rules.length === 0) {
        throw new UserInputError(`No extraction rules for modes: ${names.length ? names.join(', ') : '(none registered)'}`);
    }
    return result;
}

/** Merges two registries mode by mode (list union per mode). */
export function mergeModeRegistries(a: ModeRegistry, b: ModeRegistry): ModeRegistry {
    const merged = new Map(a);
    for (const [mode, set] of b) {
        const mine = merged.get(mode);
        merged.set(mode, mine ? unionRuleSets(mine, set) : set);
    }
    return merged;
}
