/**
 * Solver Adapter Interface
 *
 * Narrow interface for pluggable solver backends. The fuzz driver only ever
 * talks to a backend through these three operations.
 */

import type { Term } from '../types/index.js';

export type SatStatus = 'sat' | 'unsat' | 'unknown' | 'error';

/**
 * Classified result of a satisfiability check
 */
export type SatOutcome =
    | { status: 'sat' }
    | { status: 'unsat' }
    | { status: 'unknown' }
    | { status: 'error'; reason: string };

export const SAT: SatOutcome = { status: 'sat' };
export const UNSAT: SatOutcome = { status: 'unsat' };
export const UNKNOWN: SatOutcome = { status: 'unknown' };

export function errorOutcome(reason: string): SatOutcome {
    return { status: 'error', reason };
}

export function outcomeToString(outcome: SatOutcome): string {
    return outcome.status === 'error' ? `error(${outcome.reason})` : outcome.status;
}

/**
 * Solver backend.
 *
 * `assertFormula` adds to the accumulated constraint set, `reset` clears it.
 * `checkSat` may be called repeatedly without reasserting.
 */
export interface SolverAdapter {
    /** Unique name of the backend */
    readonly name: string;

    assertFormula(term: Term): void;

    checkSat(): Promise<SatOutcome>;

    reset(): void;

    /** Ask a running `checkSat` to give up and answer early */
    interrupt?(): void;
}

/**
 * An adapter holding native resources that must be released.
 */
export interface ClosableSolverAdapter extends SolverAdapter {
    close(): Promise<void>;
}

export function isClosable(adapter: SolverAdapter): adapter is ClosableSolverAdapter {
    return 'close' in adapter && typeof adapter.close === 'function';
}
