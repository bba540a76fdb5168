/**
 * Shared test fixtures.
 */
import { RandomSource } from '../src/random/source.js';
import { SolverAdapter, SatOutcome, SAT, UNKNOWN } from '../src/engines/interface.js';
import type { Term } from '../src/types/index.js';

/**
 * Random source replaying fixed draws, so a test can spell out exactly which
 * branch the generator takes.
 */
export class ScriptedRandom implements RandomSource {
    readonly seed = 0;

    constructor(private ints: number[] = [], private bools: boolean[] = []) {}

    next(): number {
        throw new Error('next() is not scripted');
    }

    nextIntInRange(min: number, max: number): number {
        const value = this.ints.shift();
        if (value === undefined) throw new Error(`no scripted int left for [${min}, ${max}]`);
        if (value < min || value > max) throw new Error(`scripted int ${value} outside [${min}, ${max}]`);
        return value;
    }

    nextBool(): boolean {
        const value = this.bools.shift();
        if (value === undefined) throw new Error('no scripted bool left');
        return value;
    }

    get exhausted(): boolean {
        return this.ints.length === 0 && this.bools.length === 0;
    }
}

export interface FaultyAdapterOptions {
    failAssert?: boolean;
    failReset?: boolean;
    hangCheck?: boolean;
    /** Check answers only after this many milliseconds */
    slowCheckMs?: number;
    /** interrupt() makes a running check answer unknown at once */
    interruptible?: boolean;
    outcome?: SatOutcome;
}

/**
 * Adapter that fails in configurable places.
 */
export class FaultyAdapter implements SolverAdapter {
    readonly name = 'faulty';
    asserted: Term[] = [];
    checks = 0;
    interrupts = 0;
    /** reset() calls made while a check was still running */
    resetsWhileChecking = 0;

    private finish: ((outcome: SatOutcome) => void) | null = null;

    constructor(private readonly options: FaultyAdapterOptions = {}) {}

    assertFormula(term: Term): void {
        if (this.options.failAssert) throw new Error('malformed formula');
        this.asserted.push(term);
    }

    checkSat(): Promise<SatOutcome> {
        this.checks++;
        if (this.options.hangCheck) return new Promise<SatOutcome>(() => undefined);
        const outcome = this.options.outcome ?? SAT;
        const delay = this.options.slowCheckMs;
        if (delay === undefined) return Promise.resolve(outcome);

        return new Promise<SatOutcome>((resolve) => {
            const timer = setTimeout(() => finish(outcome), delay);
            const finish = (answer: SatOutcome) => {
                clearTimeout(timer);
                this.finish = null;
                resolve(answer);
            };
            this.finish = finish;
        });
    }

    interrupt(): void {
        this.interrupts++;
        if (this.options.interruptible) this.finish?.(UNKNOWN);
    }

    reset(): void {
        if (this.finish) this.resetsWhileChecking++;
        if (this.options.failReset) throw new Error('reset exploded');
        this.asserted = [];
    }
}

/**
 * Run `fn` and return what it threw.
 */
export function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (e) {
        return e;
    }
    throw new Error('expected the call to throw');
}
