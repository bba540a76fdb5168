/**
 * Evaluator Solver Adapter
 *
 * Decides ground constraint sets by evaluating them exactly. Generated
 * terms without variables have a single interpretation, so the set is
 * satisfiable iff every assertion evaluates to true. Serves as the reference
 * oracle for differential runs.
 */

import type { Term } from '../../types/index.js';
import { createGenerationError } from '../../types/index.js';
import { SolverAdapter, SatOutcome, SAT, UNSAT, UNKNOWN } from '../interface.js';

export type Value = bigint | boolean;

/**
 * Thrown when a term references a variable with no binding.
 */
export class UnboundVariableError extends Error {
    constructor(readonly variable: string) {
        super(`Unbound variable: ${variable}`);
        this.name = 'UnboundVariableError';
    }
}

export function evaluate(term: Term, env: ReadonlyMap<string, bigint> = new Map()): Value {
    switch (term.kind) {
        case 'int':
        case 'bool':
            return term.value;
        case 'var': {
            const value = env.get(term.name);
            if (value === undefined) throw new UnboundVariableError(term.name);
            return value;
        }
        case 'op': {
            const [left, right] = term.children.map(child => evaluate(child, env));
            switch (term.op) {
                case 'add': return int(left, term.op) + int(right, term.op);
                case 'sub': return int(left, term.op) - int(right, term.op);
                case 'mul': return int(left, term.op) * int(right, term.op);
                case 'gt': return int(left, term.op) > int(right, term.op);
                case 'lt': return int(left, term.op) < int(right, term.op);
                case 'eq': return int(left, term.op) === int(right, term.op);
                case 'and': return bool(left, term.op) && bool(right, term.op);
                case 'or': return bool(left, term.op) || bool(right, term.op);
                case 'xor': return bool(left, term.op) !== bool(right, term.op);
            }
        }
    }
}

function int(value: Value | undefined, op: string): bigint {
    if (typeof value !== 'bigint') {
        throw createGenerationError(`${op} expects an Int operand`, { got: String(value) });
    }
    return value;
}

function bool(value: Value | undefined, op: string): boolean {
    if (typeof value !== 'boolean') {
        throw createGenerationError(`${op} expects a Bool operand`, { got: String(value) });
    }
    return value;
}

export class EvaluatorSolverAdapter implements SolverAdapter {
    readonly name = 'eval';

    private assertions: Term[] = [];

    assertFormula(term: Term): void {
        this.assertions.push(term);
    }

    async checkSat(): Promise<SatOutcome> {
        let open = false;
        for (const term of this.assertions) {
            try {
                if (evaluate(term) === false) return UNSAT;
            } catch (e) {
                // Free variables need a real search
                if (!(e instanceof UnboundVariableError)) throw e;
                open = true;
            }
        }
        return open ? UNKNOWN : SAT;
    }

    reset(): void {
        this.assertions = [];
    }
}

export function createEvaluatorAdapter(): EvaluatorSolverAdapter {
    return new EvaluatorSolverAdapter();
}
