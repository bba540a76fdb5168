/**
 * Structural analysis of terms: depth, sort inference and type checking.
 */

import { OPERATORS } from '../types/index.js';
import type { Sort, Term } from '../types/index.js';

/**
 * Tree depth, counting a leaf as 0.
 */
export function termDepth(term: Term): number {
    if (term.kind !== 'op') return 0;
    let deepest = 0;
    for (const child of term.children) {
        deepest = Math.max(deepest, termDepth(child));
    }
    return deepest + 1;
}

export function termSize(term: Term): number {
    if (term.kind !== 'op') return 1;
    return term.children.reduce((sum, child) => sum + termSize(child), 1);
}

/**
 * Sort the term evaluates to, read off its root only.
 */
export function sortOf(term: Term): Sort {
    switch (term.kind) {
        case 'int':
        case 'var':
            return 'Int';
        case 'bool':
            return 'Bool';
        case 'op':
            return OPERATORS[term.op].resultSort;
    }
}

/**
 * Check every operation for arity and operand sorts.
 * Returns one message per violation; an empty list means well-typed.
 */
export function typeErrors(term: Term, path: string = 'root'): string[] {
    if (term.kind !== 'op') return [];

    const info = OPERATORS[term.op];
    const errors: string[] = [];

    if (term.children.length !== info.arity) {
        errors.push(`${path}: ${term.op} expects ${info.arity} operands, got ${term.children.length}`);
    }

    term.children.forEach((child, i) => {
        const childPath = `${path}.${i}`;
        const actual = sortOf(child);
        if (actual !== info.operandSort) {
            errors.push(`${childPath}: ${term.op} expects ${info.operandSort}, got ${actual}`);
        }
        errors.push(...typeErrors(child, childPath));
    });

    return errors;
}

export function isWellTyped(term: Term, expected?: Sort): boolean {
    if (expected !== undefined && sortOf(term) !== expected) return false;
    return typeErrors(term).length === 0;
}

/**
 * Names of free variables in order of first occurrence.
 */
export function collectVariables(terms: readonly Term[]): string[] {
    const seen = new Set<string>();
    const visit = (term: Term): void => {
        if (term.kind === 'var') {
            seen.add(term.name);
        } else if (term.kind === 'op') {
            term.children.forEach(visit);
        }
    };
    terms.forEach(visit);
    return [...seen];
}

/**
 * Structural equality.
 */
export function termsEqual(a: Term, b: Term): boolean {
    switch (a.kind) {
        case 'int':
            return b.kind === 'int' && b.value === a.value;
        case 'bool':
            return b.kind === 'bool' && b.value === a.value;
        case 'var':
            return b.kind === 'var' && b.name === a.name;
        case 'op':
            return b.kind === 'op'
                && b.op === a.op
                && b.children.length === a.children.length
                && a.children.every((child, i) => termsEqual(child, b.children[i]));
    }
}
