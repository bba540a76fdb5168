import { OPERATORS } from '../types/index.js';
import type { Term } from '../types/index.js';
import { collectVariables } from './analysis.js';

/**
 * Print a term as an SMT-LIB s-expression.
 * Negative literals use the unary minus form, e.g. `(- 5)`.
 */
export function termToString(term: Term): string {
    switch (term.kind) {
        case 'int':
            return term.value < 0n ? `(- ${-term.value})` : term.value.toString();
        case 'bool':
            return term.value ? 'true' : 'false';
        case 'var':
            return term.name;
        case 'op':
            return `(${OPERATORS[term.op].symbol} ${term.children.map(termToString).join(' ')})`;
    }
}

/**
 * Build a standalone SMT-LIB script asserting every term, suitable for
 * replaying a finding against any solver binary.
 */
export function toSmtLibScript(terms: readonly Term[], logic: string): string {
    const lines = [`(set-logic ${logic})`];
    for (const name of collectVariables(terms)) {
        lines.push(`(declare-const ${name} Int)`);
    }
    for (const term of terms) {
        lines.push(`(assert ${termToString(term)})`);
    }
    lines.push('(check-sat)');
    return lines.join('\n');
}
