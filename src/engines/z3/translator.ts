import type { Term } from '../../types/index.js';
import { createAdapterError } from '../../types/index.js';
import { sortOf } from '../../term/analysis.js';
import { Z3Context, Z3Bool, Z3Arith } from './types.js';

/**
 * Translates terms into Z3 expressions, one method per result sort.
 * Integer variables are declared on first use and reused afterwards.
 */
export class Z3Translator {
    private readonly ctx: Z3Context;

    // Symbol table
    private readonly constants: Map<string, Z3Arith> = new Map();

    constructor(ctx: Z3Context) {
        this.ctx = ctx;
    }

    translateBool(term: Term): Z3Bool {
        switch (term.kind) {
            case 'bool':
                return this.ctx.Bool.val(term.value);
            case 'op': {
                const [left, right] = term.children;
                switch (term.op) {
                    case 'gt': return this.ctx.GT(this.translateArith(left), this.translateArith(right));
                    case 'lt': return this.ctx.LT(this.translateArith(left), this.translateArith(right));
                    case 'eq': return this.ctx.Eq(this.translateArith(left), this.translateArith(right));
                    case 'and': return this.ctx.And(this.translateBool(left), this.translateBool(right));
                    case 'or': return this.ctx.Or(this.translateBool(left), this.translateBool(right));
                    case 'xor': return this.ctx.Xor(this.translateBool(left), this.translateBool(right));
                }
                break;
            }
        }
        throw this.sortMismatch(term, 'Bool');
    }

    translateArith(term: Term): Z3Arith {
        switch (term.kind) {
            case 'int':
                return this.ctx.Int.val(term.value);
            case 'var':
                return this.translateVariable(term.name);
            case 'op': {
                const [left, right] = term.children;
                switch (term.op) {
                    case 'add': return this.ctx.Sum(this.translateArith(left), this.translateArith(right));
                    case 'sub': return this.ctx.Sub(this.translateArith(left), this.translateArith(right));
                    case 'mul': return this.ctx.Product(this.translateArith(left), this.translateArith(right));
                }
                break;
            }
        }
        throw this.sortMismatch(term, 'Int');
    }

    private translateVariable(name: string): Z3Arith {
        let constant = this.constants.get(name);
        if (!constant) {
            constant = this.ctx.Int.const(name);
            this.constants.set(name, constant);
        }
        return constant;
    }

    private sortMismatch(term: Term, expected: string) {
        return createAdapterError('z3', `expected a ${expected} term, got ${sortOf(term)}`, {
            kind: term.kind,
        });
    }
}
