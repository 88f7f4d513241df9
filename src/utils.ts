/**
 * @file utils.ts
 *
 * Pretty-printing of types, terms and theorems.
 */

import { Term, Ty, Thm, stripApps, isDummy } from './types';
import { getFlag } from './state';

const PRINT_TERM_MAX_STACK_DEPTH = 200;

interface InfixSpec { symbol: string, prec: number, assoc: 'left' | 'right' | 'none' }

export const INFIX_OPERATORS: ReadonlyMap<string, InfixSpec> = new Map<string, InfixSpec>([
    ['==>', { symbol: '==>', prec: 1, assoc: 'right' }],
    ['=', { symbol: '=', prec: 5, assoc: 'none' }],
    ['member', { symbol: '∈', prec: 5, assoc: 'none' }],
    ['less_eq', { symbol: '≤', prec: 5, assoc: 'none' }],
    ['plus', { symbol: '+', prec: 6, assoc: 'left' }],
]);

const APP_PREC = 10;
const ATOM_PREC = 11;

export function printType(ty: Ty, prec = 0): string {
    if (ty.tag === 'TyVar') return `'${ty.name}`;
    if (ty.name === 'fun' && ty.args.length === 2) {
        const s = `${printType(ty.args[0], 1)} ⇒ ${printType(ty.args[1], 0)}`;
        return prec > 0 ? `(${s})` : s;
    }
    if (ty.name === 'prod' && ty.args.length === 2) {
        const s = `${printType(ty.args[0], 3)} × ${printType(ty.args[1], 2)}`;
        return prec > 2 ? `(${s})` : s;
    }
    if (ty.args.length === 0) return ty.name;
    if (ty.args.length === 1) return `${printType(ty.args[0], 3)} ${ty.name}`;
    return `(${ty.args.map(a => printType(a, 0)).join(', ')}) ${ty.name}`;
}

function collectNames(t: Term, acc: Set<string>): Set<string> {
    switch (t.tag) {
        case 'Const': case 'Free': acc.add(t.name); break;
        case 'Lam': collectNames(t.body, acc); break;
        case 'App': collectNames(t.func, acc); collectNames(t.arg, acc); break;
        default: break;
    }
    return acc;
}

/**
 * Pretty-prints a term. Bound variables get display names that clash neither
 * with each other nor with the free variables and constants of the term.
 * @param term The term to print.
 */
export function printTerm(term: Term): string {
    return printAt(term, [], 0, collectNames(term, new Set()), 0);
}

export function printThm(thm: Thm): string {
    const prop = printTerm(thm.prop);
    return thm.hyps.length === 0 ? prop : `${thm.hyps.map(printTerm).join(', ')} ⊢ ${prop}`;
}

function annotate(name: string, ty: Ty): string {
    return getFlag('printTypes') ? `(${name} :: ${printType(ty)})` : name;
}

function printAt(t: Term, bound: string[], prec: number, taken: Set<string>, stackDepth: number): string {
    if (stackDepth > PRINT_TERM_MAX_STACK_DEPTH) return "<print_depth_exceeded>";
    const next = stackDepth + 1;

    switch (t.tag) {
        case 'Const': return annotate(t.name, t.type);
        case 'Free': return annotate(t.name, t.type);
        case 'Sch':
            if (isDummy(t)) return '_';
            return t.index === 0 ? `?${t.name}` : `?${t.name}.${t.index}`;
        case 'Bound': return bound[t.index] ?? `<loose:${t.index}>`;
        case 'Lam': {
            const names: string[] = [];
            let scope = bound;
            let current: Term = t;
            while (current.tag === 'Lam') {
                let display = current.paramName;
                let suffix = 1;
                while (taken.has(display) || scope.includes(display)) {
                    display = `${current.paramName}_${suffix++}`;
                }
                names.push(display);
                scope = [display, ...scope];
                current = current.body;
            }
            const s = `λ${names.join(' ')}. ${printAt(current, scope, 0, taken, next)}`;
            return prec > 0 ? `(${s})` : s;
        }
        case 'App': {
            const { head, args } = stripApps(t);
            if (head.tag === 'Const' && args.length === 2) {
                if (head.name === 'Pair') {
                    return `(${printAt(args[0], bound, 0, taken, next)}, ${printAt(args[1], bound, 0, taken, next)})`;
                }
                const op = INFIX_OPERATORS.get(head.name);
                if (op) {
                    const left = printAt(args[0], bound, op.assoc === 'left' ? op.prec : op.prec + 1, taken, next);
                    const right = printAt(args[1], bound, op.assoc === 'right' ? op.prec : op.prec + 1, taken, next);
                    const s = `${left} ${op.symbol} ${right}`;
                    return prec > op.prec ? `(${s})` : s;
                }
            }
            const parts = [head, ...args].map(p => printAt(p, bound, ATOM_PREC, taken, next));
            const s = parts.join(' ');
            return prec > APP_PREC ? `(${s})` : s;
        }
    }
}
