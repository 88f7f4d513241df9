/**
 * @file types.ts
 * @description Defines the core data structures of the kernel: simple types,
 * de Bruijn terms, theorems, theory contexts and the registries that the
 * extraction engine keeps inside a theory.
 */

// Types

export type Ty =
    | { tag: 'TyVar', name: string }
    | { tag: 'TyCon', name: string, args: Ty[] };

export const TyVar = (name: string): Ty & { tag: 'TyVar' } => ({ tag: 'TyVar', name });
export const TyCon = (name: string, args: Ty[] = []): Ty & { tag: 'TyCon' } => ({ tag: 'TyCon', name, args });

export const boolT: Ty = TyCon('bool');
export const natT: Ty = TyCon('nat');
export const funT = (dom: Ty, cod: Ty): Ty => TyCon('fun', [dom, cod]);
export const funTs = (doms: Ty[], cod: Ty): Ty => doms.reduceRight<Ty>((acc, d) => funT(d, acc), cod);
export const setT = (elem: Ty): Ty => TyCon('set', [elem]);
export const prodT = (a: Ty, b: Ty): Ty => TyCon('prod', [a, b]);

export function destFunT(ty: Ty): { dom: Ty, cod: Ty } | null {
    if (ty.tag === 'TyCon' && ty.name === 'fun' && ty.args.length === 2) {
        return { dom: ty.args[0], cod: ty.args[1] };
    }
    return null;
}

export function isBoolT(ty: Ty): boolean {
    return ty.tag === 'TyCon' && ty.name === 'bool' && ty.args.length === 0;
}

// Terms

export type Term =
    | { tag: 'Const', name: string, type: Ty }
    | { tag: 'Free', name: string, type: Ty }
    // Schematic variable: the placeholder that matching and instantiation act on.
    | { tag: 'Sch', name: string, index: number, type: Ty }
    // de Bruijn reference: 0 is the innermost enclosing binder.
    | { tag: 'Bound', index: number }
    | { tag: 'Lam', paramName: string, paramType: Ty, body: Term }
    | { tag: 'App', func: Term, arg: Term };

export type ConstTerm = Term & { tag: 'Const' };
export type FreeTerm = Term & { tag: 'Free' };
export type SchTerm = Term & { tag: 'Sch' };

export const Const = (name: string, type: Ty): ConstTerm => ({ tag: 'Const', name, type });
export const Free = (name: string, type: Ty): FreeTerm => ({ tag: 'Free', name, type });
export const Sch = (name: string, index: number, type: Ty): SchTerm => ({ tag: 'Sch', name, index, type });
export const Bound = (index: number): Term & { tag: 'Bound' } => ({ tag: 'Bound', index });
export const Lam = (paramName: string, paramType: Ty, body: Term): Term & { tag: 'Lam' } =>
    ({ tag: 'Lam', paramName, paramType, body });
export const App = (func: Term, arg: Term): Term & { tag: 'App' } => ({ tag: 'App', func, arg });

/** The name under which a schematic variable is looked up in an instantiation. */
export const schKey = (name: string, index: number): string => `${name}.${index}`;

/** Dummy variables (`_` in patterns) are anonymous schematic variables. */
export const DUMMY_NAME = '_';
export const isDummy = (t: Term): boolean => t.tag === 'Sch' && t.name === DUMMY_NAME;

export const mkApps = (head: Term, args: Term[]): Term => args.reduce<Term>((acc, a) => App(acc, a), head);

export function stripApps(t: Term): { head: Term, args: Term[] } {
    const args: Term[] = [];
    let current = t;
    while (current.tag === 'App') {
        args.unshift(current.arg);
        current = current.func;
    }
    return { head: current, args };
}

// Logical vocabulary shared by the kernel, the simplifier and the printer.

export const EQ = '=';
export const IMP = '==>';
export const TRUE = 'True';

export const mkEq = (lhs: Term, rhs: Term, ty: Ty): Term =>
    mkApps(Const(EQ, funTs([ty, ty], boolT)), [lhs, rhs]);

export function destEq(t: Term): { lhs: Term, rhs: Term, type: Ty } | null {
    const { head, args } = stripApps(t);
    if (head.tag !== 'Const' || head.name !== EQ || args.length !== 2) return null;
    const fty = destFunT(head.type);
    if (!fty) return null;
    return { lhs: args[0], rhs: args[1], type: fty.dom };
}

export const mkImp = (prem: Term, concl: Term): Term =>
    mkApps(Const(IMP, funTs([boolT, boolT], boolT)), [prem, concl]);

export const listImps = (prems: Term[], concl: Term): Term =>
    prems.reduceRight<Term>((acc, p) => mkImp(p, acc), concl);

export function stripImps(t: Term): { prems: Term[], concl: Term } {
    const prems: Term[] = [];
    let current = t;
    for (;;) {
        const { head, args } = stripApps(current);
        if (head.tag === 'Const' && head.name === IMP && args.length === 2) {
            prems.push(args[0]);
            current = args[1];
            continue;
        }
        return { prems, concl: current };
    }
}

export const isTrueConst = (t: Term): boolean => t.tag === 'Const' && t.name === TRUE;

// Theorems

/**
 * A proved proposition. Values are only produced by the inference rules in
 * kernel.ts; everything else treats them as immutable artifacts.
 */
export interface Thm {
    readonly hyps: readonly Term[];
    readonly prop: Term;
}

export interface Instantiation {
    terms: Map<string, Term>; // keyed by schKey
    types: Map<string, Ty>;   // keyed by type variable name
}

// Proof procedures

export type TacticResult =
    | { ok: true, thm: Thm }
    | { ok: false, reason: string };

/** A context-parameterized proof procedure: closes `goal` or fails without side effects. */
export type Tactic = (theory: Theory, goal: Term) => TacticResult;
export type Discharge = Tactic;

// Extraction registries

export interface ExtractionRule {
    pattern: Term;
    /** `?c = <pattern instance> ==> side conditions ==> ?c … = replacement` */
    derivation: Thm;
    discharge: Discharge;
}

export interface ExtractionRuleSet {
    readonly rules: readonly ExtractionRule[];
    readonly keys: readonly string[];
    /** Syntactic head key → positions in `rules`; '*' collects flexible heads. */
    readonly index: ReadonlyMap<string, readonly number[]>;
}

export type ModeRegistry = ReadonlyMap<string, ExtractionRuleSet>;

export interface Binder {
    name: string;
    type: Ty;
}

export interface GeneratedDefinition {
    name: string;
    constant: ConstTerm;
    params: Binder[];
    body: Term;
    fact: Thm;
}

export interface MatchedDefinition extends GeneratedDefinition {
    rule: ExtractionRule;
}

export type RuleSetName = 'recIntro' | 'solve';

export interface RuleSets {
    readonly recIntro: readonly Thm[];
    readonly solve: readonly Thm[];
}

// Theory context

export interface FactEntry {
    readonly name: string;
    readonly thms: readonly Thm[];
    readonly tags: readonly string[];
}

/**
 * The session state. Every operation returns a new value; a command that fails
 * simply never returns one, so nothing it did is observable.
 */
export interface Theory {
    readonly name: string;
    readonly version: number;
    readonly consts: ReadonlyMap<string, Ty>;
    readonly axioms: ReadonlyMap<string, Term>;
    readonly facts: ReadonlyMap<string, FactEntry>;
    readonly extraction: ModeRegistry;
    readonly conclusionPatterns: readonly Term[];
    readonly ruleSets: RuleSets;
}

export type WarningKind = 'ambiguous-pattern' | 'invalid-pattern' | 'unresolved-side-conditions';

export interface Warning {
    kind: WarningKind;
    message: string;
}
