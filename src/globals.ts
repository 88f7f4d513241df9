/**
 * @file globals.ts
 * @description The theory context: constant declarations, axioms, named fact
 * collections and the definitional principle. Every function returns a new
 * theory value and leaves its argument untouched.
 */

import {
    Term, Ty, Thm, Theory, FactEntry, ConstTerm, Const, Sch, FreeTerm,
    destEq, mkEq, mkApps, stripApps, isBoolT, RuleSets
} from './types';
import { termKey, typesEqual } from './structural';
import { typeOf, typeVarsOf, typeVarsOfTerm } from './unification';
import { freeVars, mapLeaves, occursFree } from './pattern';
import { UserInputError, HostRejection } from './errors';
import { consoleLog } from './state';
import { printTerm, printType } from './utils';
import { DEF_SUFFIX, CODE_TAG } from './constants';

const emptyRuleSets: RuleSets = { recIntro: [], solve: [] };

export function emptyTheory(name: string): Theory {
    return {
        name,
        version: 0,
        consts: new Map(),
        axioms: new Map(),
        facts: new Map(),
        extraction: new Map(),
        conclusionPatterns: [],
        ruleSets: emptyRuleSets,
    };
}

/** Returns a copy of `theory` with the given fields replaced and the version bumped. */
export function updateTheory(theory: Theory, changes: Partial<Omit<Theory, 'name' | 'version'>>): Theory {
    return { ...theory, ...changes, version: theory.version + 1 };
}

export function constType(theory: Theory, name: string): Ty | undefined {
    return theory.consts.get(name);
}

/**
 * Declares a new constant.
 * @throws HostRejection if the name is already taken.
 */
export function declareConst(theory: Theory, name: string, type: Ty): Theory {
    if (theory.consts.has(name)) throw new HostRejection(`Constant ${name} is already declared`);
    const consts = new Map(theory.consts);
    consts.set(name, type);
    consoleLog(`declareConst> ${name} :: ${printType(type)}`);
    return updateTheory(theory, { consts });
}

/**
 * Asserts a proposition as an axiom and notes it as a fact of the same name.
 */
export function addAxiom(theory: Theory, name: string, prop: Term): Theory {
    if (theory.axioms.has(name)) throw new HostRejection(`Axiom ${name} already exists`);
    if (!isBoolT(typeOf(prop))) throw new HostRejection(`Axiom ${name} is not a proposition: ${printTerm(prop)}`);
    const axioms = new Map(theory.axioms);
    axioms.set(name, prop);
    return noteFacts(updateTheory(theory, { axioms }), name, [{ hyps: [], prop }]);
}

/**
 * Stores a named collection of theorems, replacing any previous one.
 */
export function noteFacts(theory: Theory, name: string, thms: readonly Thm[], tags: readonly string[] = []): Theory {
    const facts = new Map(theory.facts);
    facts.set(name, { name, thms, tags });
    consoleLog(`noteFacts> ${name}: ${thms.length} theorem(s)${tags.length ? ` [${tags.join(', ')}]` : ''}`);
    return updateTheory(theory, { facts });
}

export function getFacts(theory: Theory, name: string): readonly Thm[] {
    const entry = theory.facts.get(name);
    if (!entry) throw new UserInputError(`Unknown fact: ${name}`);
    return entry.thms;
}

/**
 * Looks up a single theorem. `name(i)` selects the i-th (1-based) member of a
 * collection.
 */
export function getFact(theory: Theory, ref: string): Thm {
    const selector = /^(.*)\((\d+)\)$/.exec(ref);
    const name = selector ? selector[1] : ref;
    const thms = getFacts(theory, name);
    if (selector) {
        const thm = thms[Number(selector[2]) - 1];
        if (!thm) throw new UserInputError(`Fact ${name} has no member ${selector[2]}`);
        return thm;
    }
    if (thms.length !== 1) throw new UserInputError(`Fact ${name} is a collection of ${thms.length} theorems`);
    return thms[0];
}

export function factsTagged(theory: Theory, tag: string): FactEntry[] {
    return [...theory.facts.values()].filter(f => f.tags.includes(tag));
}

/** All theorems tagged for the code generator, in note order. */
export function codeEquations(theory: Theory, tag: string = CODE_TAG): Thm[] {
    return factsTagged(theory, tag).flatMap(f => [...f.thms]);
}

/**
 * Defines a constant by an equation `c x1 … xn = rhs` whose head `c` is a free
 * variable. The result is the theory extended by `c` and the axiom `c_def`:
 * `c ?x1 … ?xn = rhs[?xi/xi]`.
 * @throws HostRejection when the equation violates the definitional principle.
 */
export function defineConst(theory: Theory, eq: Term): { theory: Theory, constant: ConstTerm, def: Thm } {
    const parts = destEq(eq);
    if (!parts) throw new HostRejection(`Definition is not an equation: ${printTerm(eq)}`);
    const { head, args } = stripApps(parts.lhs);
    if (head.tag !== 'Free') throw new HostRejection(`Head of definition is not a free variable: ${printTerm(parts.lhs)}`);
    const name = head.name;
    if (theory.consts.has(name)) throw new HostRejection(`Constant ${name} is already declared`);

    const params: FreeTerm[] = [];
    for (const arg of args) {
        if (arg.tag !== 'Free') throw new HostRejection(`Argument ${printTerm(arg)} of definition ${name} is not a variable`);
        if (params.some(p => p.name === arg.name)) throw new HostRejection(`Duplicate argument ${arg.name} in definition ${name}`);
        if (arg.name === name) throw new HostRejection(`Argument ${arg.name} clashes with the defined name`);
        params.push(arg);
    }
    if (occursFree(name, parts.rhs)) throw new HostRejection(`Circular definition of ${name}`);

    const extra = freeVars(parts.rhs).filter(v => !params.some(p => p.name === v.name));
    if (extra.length > 0) {
        throw new HostRejection(`Extra variables on rhs of definition ${name}: ${extra.map(v => v.name).join(', ')}`);
    }
    const lhsTyVars = typeVarsOf(head.type);
    const extraTyVars = [...typeVarsOfTerm(parts.rhs)].filter(a => !lhsTyVars.has(a));
    if (extraTyVars.length > 0) {
        throw new HostRejection(`Extra type variables on rhs of definition ${name}: ${extraTyVars.map(a => `'${a}`).join(', ')}`);
    }
    if (!typesEqual(typeOf(parts.lhs), typeOf(parts.rhs))) {
        throw new HostRejection(`Ill-typed definition of ${name}`);
    }

    const withConst = declareConst(theory, name, head.type);
    const constant = Const(name, head.type);

    // Replace the parameters by schematic variables of the same names.
    const schArgs = params.map(p => Sch(p.name, 0, p.type));
    const rhs = mapLeaves(parts.rhs, leaf => {
        const i = leaf.tag === 'Free' ? params.findIndex(p => p.name === leaf.name) : -1;
        return i >= 0 ? schArgs[i] : undefined;
    });
    const prop = mkEq(mkApps(constant, schArgs), rhs, parts.type);

    const axiomName = `${name}_${DEF_SUFFIX}`;
    const extended = addAxiom(withConst, axiomName, prop);
    const def: Thm = { hyps: [], prop };
    consoleLog(`defineConst> ${printTerm(prop)}`);
    return { theory: extended, constant, def };
}

/**
 * Combines two theories that extend a common ancestor: declarations, axioms and
 * facts are united (facts of `right` shadow those of `left` by name);
 * registries are merged by the given functions.
 * @throws HostRejection when a constant is declared with two different types.
 */
export function mergeTheories(
    left: Theory,
    right: Theory,
    merge: {
        extraction: (a: Theory['extraction'], b: Theory['extraction']) => Theory['extraction'],
        patterns: (a: readonly Term[], b: readonly Term[]) => Term[],
        ruleSets: (a: RuleSets, b: RuleSets) => RuleSets,
    }
): Theory {
    for (const [name, ty] of right.consts) {
        const mine = left.consts.get(name);
        if (mine !== undefined && !typesEqual(mine, ty)) {
            throw new HostRejection(`Cannot merge theories: constant ${name} has types ${printType(mine)} and ${printType(ty)}`);
        }
    }
    const consts = new Map([...left.consts, ...right.consts]);
    const axioms = new Map([...left.axioms, ...right.axioms]);
    const facts = new Map([...left.facts, ...right.facts]);
    return {
        name: left.name,
        version: Math.max(left.version, right.version) + 1,
        consts,
        axioms,
        facts,
        extraction: merge.extraction(left.extraction, right.extraction),
        conclusionPatterns: merge.patterns(left.conclusionPatterns, right.conclusionPatterns),
        ruleSets: merge.ruleSets(left.ruleSets, right.ruleSets),
    };
}

/** Canonical identity of a theorem, used for deduplication. */
export const thmKey = (th: Thm): string => termKey(th.prop);
