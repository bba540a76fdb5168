import { init } from 'z3-solver';
import type { Term } from '../../types/index.js';
import { createAdapterError, createEngineError, describeError } from '../../types/index.js';
import {
    ClosableSolverAdapter,
    SatOutcome,
    SAT,
    UNSAT,
    UNKNOWN,
    errorOutcome,
} from '../interface.js';
import { Z3Translator } from './translator.js';
import { Z3Context, Z3Solver } from './types.js';

export interface Z3AdapterOptions {
    /** Per-check limit handed to Z3's own `timeout` parameter */
    timeoutMs?: number;
    /** SMT-LIB logic; Z3 picks one when unset */
    logic?: string;
}

interface Z3Runtime {
    ctx: Z3Context;
    em: unknown;
}

let runtime: Promise<Z3Runtime> | null = null;

/**
 * Load the Z3 WebAssembly module once per process.
 */
async function loadZ3(): Promise<Z3Runtime> {
    if (!runtime) {
        runtime = init()
            .then(({ Context, em }) => ({ ctx: Context('main'), em }))
            .catch((e: unknown) => {
                runtime = null;
                throw createEngineError(`Failed to initialize Z3: ${describeError(e)}`);
            });
    }
    return runtime;
}

/**
 * Stop the worker threads Z3 spawned so the process can exit.
 * Every adapter must be closed before calling this.
 */
export async function shutdownZ3(): Promise<void> {
    if (!runtime) return;
    const { em } = await runtime;
    runtime = null;
    if (typeof em === 'object' && em !== null && 'PThread' in em) {
        const threads = em.PThread;
        if (typeof threads === 'object' && threads !== null
            && 'terminateAllThreads' in threads && typeof threads.terminateAllThreads === 'function') {
            threads.terminateAllThreads();
        }
    }
}

export class Z3SolverAdapter implements ClosableSolverAdapter {
    readonly name = 'z3';

    private solver: Z3Solver | null;
    private readonly ctx: Z3Context;
    private readonly translator: Z3Translator;
    private readonly options: Z3AdapterOptions;

    constructor(ctx: Z3Context, options: Z3AdapterOptions = {}) {
        this.options = options;
        this.ctx = ctx;
        this.solver = new ctx.Solver(options.logic);
        // Persistent translator keeps variable declarations across assertions
        this.translator = new Z3Translator(ctx);
        this.applyParams();
    }

    assertFormula(term: Term): void {
        const solver = this.requireSolver();
        try {
            solver.add(this.translator.translateBool(term));
        } catch (e) {
            throw createAdapterError(this.name, `assert failed: ${describeError(e)}`);
        }
    }

    async checkSat(): Promise<SatOutcome> {
        const solver = this.requireSolver();
        try {
            const check = await solver.check();
            switch (check) {
                case 'sat': return SAT;
                case 'unsat': return UNSAT;
                default: return UNKNOWN;
            }
        } catch (e) {
            return errorOutcome(`Z3 Error: ${describeError(e)}`);
        }
    }

    reset(): void {
        this.requireSolver().reset();
        this.applyParams();
    }

    /**
     * Interrupts every check running in the shared context; a pending
     * `checkSat` then answers unknown.
     */
    interrupt(): void {
        if (this.solver) this.ctx.interrupt();
    }

    async close(): Promise<void> {
        this.solver = null;
    }

    private applyParams(): void {
        if (this.solver && this.options.timeoutMs !== undefined) {
            this.solver.set('timeout', this.options.timeoutMs);
        }
    }

    private requireSolver(): Z3Solver {
        if (!this.solver) throw createAdapterError(this.name, 'solver closed');
        return this.solver;
    }
}

export async function createZ3Adapter(options: Z3AdapterOptions = {}): Promise<Z3SolverAdapter> {
    const { ctx } = await loadZ3();
    return new Z3SolverAdapter(ctx, options);
}
