/**
 * Fuzz Driver
 *
 * Runs a campaign: for each test case, generate boolean constraints, assert
 * them on the adapter, check satisfiability, record the outcome and reset.
 * Solver failures are recorded as outcomes and never stop the campaign.
 */

import type { Term } from '../types/index.js';
import { createTimeoutError, describeError } from '../types/index.js';
import { createRandomSource } from '../random/source.js';
import { ExpressionGenerator } from '../generator/expression.js';
import { termToString } from '../term/printer.js';
import { SolverAdapter, SatOutcome, errorOutcome } from '../engines/interface.js';
import { CampaignConfig, parseCampaignConfig } from './config.js';

/**
 * Comparison of the backend under test against the oracle.
 * `inconclusive` when either side is unknown or failed.
 */
export type Verdict = 'agree' | 'mismatch' | 'inconclusive';

export interface FuzzResult {
    /** 0-based test case index */
    index: number;
    terms: readonly Term[];
    /** SMT-LIB text of each term */
    formulas: string[];
    outcome: SatOutcome;
    oracle?: SatOutcome;
    verdict?: Verdict;
    /** Set when the adapter could not be reset after this case */
    resetError?: string;
    timeMs: number;
}

export interface CampaignOptions {
    /** Second backend fed the same constraints */
    oracle?: SolverAdapter;
    /** Called after each test case with the number completed so far */
    onProgress?: (completed: number, total: number) => void;
}

export function compareOutcomes(actual: SatOutcome, expected: SatOutcome): Verdict {
    const decided = (o: SatOutcome) => o.status === 'sat' || o.status === 'unsat';
    if (!decided(actual) || !decided(expected)) return 'inconclusive';
    return actual.status === expected.status ? 'agree' : 'mismatch';
}

/**
 * A single pass over the configured test cases. Iterating it a second time
 * yields nothing; replay by starting a new campaign with the same seed.
 */
export class FuzzCampaign implements AsyncIterable<FuzzResult> {
    readonly config: CampaignConfig;
    /** Seed in use, drawn from system entropy when the config has none */
    readonly seed: number;

    private readonly generator: ExpressionGenerator;
    private readonly results: AsyncGenerator<FuzzResult, void, undefined>;
    /** Checks that outlived their timeout, per adapter */
    private readonly pending = new Map<SolverAdapter, Promise<SatOutcome>>();

    constructor(
        private readonly adapter: SolverAdapter,
        config: CampaignConfig,
        private readonly options: CampaignOptions = {}
    ) {
        this.config = config;
        const random = createRandomSource(config.seed);
        this.seed = random.seed;
        this.generator = new ExpressionGenerator(random, {
            maxDepth: config.maxDepth,
            booleanMaxDepth: config.booleanMaxDepth,
            intRange: config.intRange,
            variables: config.variables,
        });
        this.results = this.iterate();
    }

    [Symbol.asyncIterator](): AsyncGenerator<FuzzResult, void, undefined> {
        return this.results;
    }

    private async *iterate(): AsyncGenerator<FuzzResult, void, undefined> {
        const { numTests, constraintsPerTest } = this.config;

        for (let index = 0; index < numTests; index++) {
            const startTime = Date.now();

            const terms: Term[] = [];
            for (let i = 0; i < constraintsPerTest; i++) {
                terms.push(this.generator.generateBooleanExpr());
            }

            const result: FuzzResult = {
                index,
                terms,
                formulas: terms.map(termToString),
                outcome: await this.check(this.adapter, terms),
                timeMs: 0,
            };

            if (this.options.oracle) {
                result.oracle = await this.check(this.options.oracle, terms);
                result.verdict = compareOutcomes(result.outcome, result.oracle);
            }

            const resetError = await this.resetAll();
            if (resetError) result.resetError = resetError;

            result.timeMs = Date.now() - startTime;
            this.options.onProgress?.(index + 1, numTests);
            yield result;
        }
    }

    private async check(adapter: SolverAdapter, terms: readonly Term[]): Promise<SatOutcome> {
        try {
            if (this.pending.has(adapter)) {
                if (!(await this.settle(adapter))) {
                    return errorOutcome(`${adapter.name}: previous check still running`);
                }
                adapter.reset();
            }
            for (const term of terms) {
                adapter.assertFormula(term);
            }
            return await this.withTimeout(adapter, adapter.checkSat());
        } catch (e) {
            return errorOutcome(describeError(e));
        }
    }

    private async withTimeout(adapter: SolverAdapter, check: Promise<SatOutcome>): Promise<SatOutcome> {
        const limit = this.config.timeoutMs;
        if (limit === undefined) return check;

        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<null>((resolve) => {
            timer = setTimeout(() => resolve(null), limit);
        });
        try {
            const outcome = await Promise.race([check, timeout]);
            if (outcome) return outcome;
        } finally {
            clearTimeout(timer);
        }

        // The backend is still working: stop it before anything else touches it
        adapter.interrupt?.();
        this.pending.set(adapter, check);
        return errorOutcome(createTimeoutError(limit, 'checkSat').message);
    }

    /**
     * Wait, at most one more timeout period, for a check abandoned by a
     * timeout to finish. False when it is still running.
     */
    private async settle(adapter: SolverAdapter): Promise<boolean> {
        const running = this.pending.get(adapter);
        if (!running) return true;

        let timer: NodeJS.Timeout | undefined;
        const grace = new Promise<boolean>((resolve) => {
            timer = setTimeout(() => resolve(false), this.config.timeoutMs ?? 0);
        });
        try {
            const done = await Promise.race([running.then(() => true, () => true), grace]);
            if (done) this.pending.delete(adapter);
            return done;
        } finally {
            clearTimeout(timer);
        }
    }

    private async resetAll(): Promise<string | undefined> {
        const failures: string[] = [];
        for (const adapter of [this.adapter, this.options.oracle]) {
            if (!adapter) continue;
            if (!(await this.settle(adapter))) {
                const reason = `${adapter.name}: check still running after timeout, reset skipped`;
                console.warn(`Failed to reset solver adapter ${reason}`);
                failures.push(reason);
                continue;
            }
            try {
                adapter.reset();
            } catch (e) {
                const reason = `${adapter.name}: ${describeError(e)}`;
                console.warn(`Failed to reset solver adapter ${reason}`);
                failures.push(reason);
            }
        }
        return failures.length > 0 ? failures.join('; ') : undefined;
    }
}

/**
 * Validate the configuration and prepare a campaign. Invalid parameters
 * throw here, before anything is generated or asserted.
 */
export function runFuzzCampaign(
    adapter: SolverAdapter,
    config: unknown,
    options?: CampaignOptions
): FuzzCampaign {
    return new FuzzCampaign(adapter, parseCampaignConfig(config), options);
}

/**
 * Drain a campaign into an array.
 */
export async function collectCampaign(campaign: AsyncIterable<FuzzResult>): Promise<FuzzResult[]> {
    const results: FuzzResult[] = [];
    for await (const result of campaign) {
        results.push(result);
    }
    return results;
}
