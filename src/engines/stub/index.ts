/**
 * Stub Solver Adapter
 *
 * Deterministic backend for exercising the driver: answers from a fixed
 * outcome, a script, or a responder function instead of solving anything.
 */

import type { Term } from '../../types/index.js';
import { SolverAdapter, SatOutcome, SAT, UNKNOWN } from '../interface.js';

/**
 * Computes the answer for the n-th check (1-based) from the current assertions.
 */
export type StubResponder = (call: number, assertions: readonly Term[]) => SatOutcome;

export type StubBehaviour = SatOutcome | readonly SatOutcome[] | StubResponder;

export class StubSolverAdapter implements SolverAdapter {
    readonly name = 'stub';

    private readonly responder: StubResponder;
    private assertions: Term[] = [];
    private calls = 0;
    private resets = 0;

    constructor(behaviour: StubBehaviour = SAT) {
        this.responder = toResponder(behaviour);
    }

    assertFormula(term: Term): void {
        this.assertions.push(term);
    }

    async checkSat(): Promise<SatOutcome> {
        this.calls++;
        return this.responder(this.calls, this.assertions);
    }

    reset(): void {
        this.assertions = [];
        this.resets++;
    }

    get asserted(): readonly Term[] {
        return this.assertions;
    }

    get checkCount(): number {
        return this.calls;
    }

    get resetCount(): number {
        return this.resets;
    }
}

function toResponder(behaviour: StubBehaviour): StubResponder {
    if (typeof behaviour === 'function') {
        return behaviour;
    }
    if (isOutcomeList(behaviour)) {
        // Past the end of the script every check is inconclusive
        return (call) => behaviour[call - 1] ?? UNKNOWN;
    }
    return () => behaviour;
}

function isOutcomeList(behaviour: SatOutcome | readonly SatOutcome[]): behaviour is readonly SatOutcome[] {
    return Array.isArray(behaviour);
}

export function createStubAdapter(behaviour?: StubBehaviour): StubSolverAdapter {
    return new StubSolverAdapter(behaviour);
}
