/**
 * @file parser.ts
 * @description Reader for the surface syntax of types and terms, built with
 * parsimmon. Identifiers resolve to bound variables, declared constants or
 * free variables, in that order; the result goes through type inference.
 */

import * as P from 'parsimmon';
import { Term, Ty, Theory, TyVar, TyCon, funT, prodT, boolT } from './types';
import {
    PreTerm, PConst, PFree, PSch, PDummy, PNum, PBound, PLam, PTyped, pApps, inferTypes, ElaborationOptions
} from './elaboration';
import { UserInputError } from './errors';

// Helper to create a parser that consumes trailing whitespace
function token<T>(parser: P.Parser<T>): P.Parser<T> {
    return parser.skip(P.optWhitespace);
}

const sym = (s: string) => token(P.string(s));

const IDENT = /[a-zA-Z][a-zA-Z0-9_']*/;

/** Surface operators and the constants they stand for. */
const RELATIONS: ReadonlyArray<[P.Parser<string>, string]> = [
    [token(P.regexp(/=(?![=>])/)), '='],
    [sym('∈'), 'member'],
    [sym('≤'), 'less_eq'],
];

interface BinderSpec {
    name: string;
    type: Ty | undefined;
}

interface TypeLanguage {
    Type: Ty;
    TyFun: Ty;
    TyProd: Ty;
    TyPostfix: Ty;
    TyAtom: Ty;
}

const typeLanguage = P.createLanguage<TypeLanguage>({
    Type: r => r.TyFun,
    TyFun: r => P.seq(r.TyProd, P.alt(sym('⇒'), sym('=>')).then(r.TyFun).atMost(1))
        .map(([dom, rest]) => rest.length === 0 ? dom : funT(dom, rest[0])),
    TyProd: r => P.seq(r.TyPostfix, sym('×').then(r.TyProd).atMost(1))
        .map(([a, rest]) => rest.length === 0 ? a : prodT(a, rest[0])),
    TyPostfix: r => P.seq(r.TyAtom, token(P.regexp(IDENT)).many())
        .map(([base, ctors]) => ctors.reduce<Ty>((acc, c) => TyCon(c, [acc]), base)),
    TyAtom: r => P.alt(
        token(P.regexp(/'([a-zA-Z][a-zA-Z0-9_]*)/, 1)).map(name => TyVar(name)),
        token(P.regexp(IDENT)).map(name => TyCon(name)),
        r.Type.wrap(sym('('), sym(')'))
    ),
});

interface TermLanguage {
    Top: PreTerm;
    Expr: PreTerm;
    Lam: PreTerm;
    Imp: PreTerm;
    Rel: PreTerm;
    Sum: PreTerm;
    App: PreTerm;
    Atom: PreTerm;
    Parens: PreTerm;
    SchVar: PreTerm;
    Dummy: PreTerm;
    Num: PreTerm;
    Var: PreTerm;
    Identifier: string;
    Binder: BinderSpec;
}

// The list of bound variables (outermost first) is passed down so that
// identifiers under a binder resolve to de Bruijn references.
function buildParser(theory: Theory, boundVars: string[]): P.TypedLanguage<TermLanguage> {
    const lang = P.createLanguage<TermLanguage>({
        Top: r => P.seq(r.Expr, sym('::').then(typeLanguage.Type).atMost(1))
            .map(([t, ty]) => ty.length === 0 ? t : PTyped(t, ty[0])),

        Expr: r => P.alt(r.Lam, r.Imp),

        Imp: r => P.seq(r.Rel, sym('==>').then(P.alt(r.Lam, r.Imp)).atMost(1))
            .map(([prem, rest]) => rest.length === 0 ? prem : pApps(PConst('==>'), [prem, rest[0]])),

        Rel: r => P.seq(
            r.Sum,
            P.seq(P.alt(...RELATIONS.map(([op, name]) => op.map(() => name))), r.Sum).atMost(1)
        ).map(([lhs, rest]) => rest.length === 0 ? lhs : pApps(PConst(rest[0][0]), [lhs, rest[0][1]])),

        Sum: r => P.seq(r.App, sym('+').then(r.App).many())
            .map(([first, rest]) => rest.reduce((acc, t) => pApps(PConst('plus'), [acc, t]), first)),

        App: r => P.seq(r.Atom, r.Atom.many()).map(([h, args]) => pApps(h, args)),

        Atom: r => P.alt(r.Parens, r.SchVar, r.Dummy, r.Num, r.Var),

        // `(t)`, `(t :: ty)` or the pair `(a, b)`
        Parens: r => P.seq(r.Top, sym(',').then(r.Top).atMost(1))
            .wrap(sym('('), sym(')'))
            .map(([a, rest]) => rest.length === 0 ? a : pApps(PConst('Pair'), [a, rest[0]])),

        SchVar: () => token(P.regexp(/\?([a-zA-Z][a-zA-Z0-9_']*)(?:\.(\d+))?/))
            .map(text => {
                const dot = text.indexOf('.');
                return dot < 0 ? PSch(text.slice(1)) : PSch(text.slice(1, dot), Number(text.slice(dot + 1)));
            }),

        Dummy: () => token(P.regexp(/_(?![a-zA-Z0-9_'])/)).map(() => PDummy()),

        Num: () => token(P.regexp(/[0-9]+/)).map(digits => PNum(digits)),

        Identifier: () => token(P.regexp(IDENT)),

        Var: r => r.Identifier.map(name => {
            const pos = boundVars.lastIndexOf(name);
            if (pos >= 0) return PBound(boundVars.length - 1 - pos);
            return theory.consts.has(name) ? PConst(name) : PFree(name);
        }),

        Binder: r => P.alt(
            P.seq(r.Identifier.skip(sym('::')), typeLanguage.Type)
                .wrap(sym('('), sym(')'))
                .map(([name, type]): BinderSpec => ({ name, type })),
            r.Identifier.map((name): BinderSpec => ({ name, type: undefined }))
        ),

        Lam: r => P.seq(
            P.alt(sym('λ'), sym('\\')),
            r.Binder.atLeast(1),
            sym('.')
        ).chain(([_lam, binders]) => {
            const bodyParser = buildParser(theory, [...boundVars, ...binders.map(b => b.name)]).Top;
            return bodyParser.map(body =>
                binders.reduceRight<PreTerm>((acc, b) => PLam(b.name, b.type, acc), body)
            );
        }),
    });
    return lang;
}

/**
 * Parses a type such as `('a ⇒ 'b) ⇒ 'a set`.
 * @throws UserInputError on syntax errors.
 */
export function parseType(source: string): Ty {
    const result = P.optWhitespace.then(typeLanguage.Type).parse(source);
    if (result.status) return result.value;
    throw new UserInputError(`Parsing failed: ${P.formatError(source, result)}`);
}

/**
 * Parses a term without type inference.
 * @throws UserInputError on syntax errors.
 */
export function parseToPreTerm(theory: Theory, source: string): PreTerm {
    const result = P.optWhitespace.then(buildParser(theory, []).Top).parse(source);
    if (result.status) return result.value;
    throw new UserInputError(`Parsing failed: ${P.formatError(source, result)}`);
}

/**
 * Reads and type-checks a term in the context of `theory`.
 */
export function readTerm(theory: Theory, source: string, options: ElaborationOptions = {}): Term {
    return inferTypes(theory, parseToPreTerm(theory, source), options);
}

/** Reads a proposition: a term of type bool. */
export function readProp(theory: Theory, source: string, options: ElaborationOptions = {}): Term {
    return readTerm(theory, source, { ...options, expected: boolT });
}
