#!/usr/bin/env node
import chalk from 'chalk';
import { parseCliArgs, CliOptions } from './cliArgs.js';
import { DEFAULTS, FuzzException } from './types/index.js';
import { createAdapterRegistry } from './engines/registry.js';
import { SolverAdapter, isClosable, outcomeToString, SatOutcome } from './engines/interface.js';
import { shutdownZ3 } from './engines/z3/index.js';
import { runFuzzCampaign, FuzzResult } from './fuzz/driver.js';
import { summarizeCampaign } from './fuzz/summary.js';
import { toSmtLibScript } from './term/printer.js';

const VERSION = '0.1.0';
const HELP = `
smtfuzz v${VERSION}

Usage:
  smtfuzz run [options]     Generate constraints and check them on a solver

Options:
  --engine=<name>      Backend under test (stub, eval, z3; default z3)
  --oracle=<name>      Reference backend for differential checks (e.g. eval)
  --tests=<n>          Number of test cases (default ${DEFAULTS.numTests})
  --constraints=<k>    Constraints asserted per test case (default ${DEFAULTS.constraintsPerTest})
  --depth=<d>          Arithmetic depth cap (default ${DEFAULTS.maxDepth})
  --bool-depth=<b>     Boolean depth cap (default ${DEFAULTS.booleanMaxDepth})
  --range=<min:max>    Integer literal range (default ${DEFAULTS.intRange.min}:${DEFAULTS.intRange.max})
  --vars=<x,y>         Integer variables leaves may use
  --seed=<s>           Seed for a reproducible run
  --timeout=<ms>       Limit per satisfiability check
  --script             Print an SMT-LIB script for every test case
  --json               Print results as JSON lines
  --help, -h           Show this help
  --version, -v        Show version

Examples:
  smtfuzz run --engine=z3 --oracle=eval --seed=42
  smtfuzz run --tests=100 --depth=3 --vars=x,y --json
`;

function colorOutcome(outcome: SatOutcome): string {
    const text = outcomeToString(outcome);
    switch (outcome.status) {
        case 'sat': return chalk.green(text);
        case 'unsat': return chalk.yellow(text);
        case 'unknown': return chalk.gray(text);
        case 'error': return chalk.red(text);
    }
}

function printResult(result: FuzzResult, options: CliOptions): void {
    if (options.json) {
        console.log(JSON.stringify({
            index: result.index,
            formulas: result.formulas,
            outcome: result.outcome,
            oracle: result.oracle,
            verdict: result.verdict,
            resetError: result.resetError,
            timeMs: result.timeMs,
        }));
        return;
    }

    console.log(chalk.bold(`Test Case ${result.index + 1}:`));
    result.formulas.forEach((formula, i) => {
        console.log(`  Constraint ${i}: ${formula}`);
    });
    console.log(`  Satisfiability: ${colorOutcome(result.outcome)}`);
    if (result.oracle) {
        console.log(`  Oracle: ${colorOutcome(result.oracle)}`);
    }
    if (result.verdict === 'mismatch') {
        console.log(chalk.red.bold('  MISMATCH - backend and oracle disagree'));
    }
    if (result.resetError) {
        console.log(chalk.red(`  Reset failed: ${result.resetError}`));
    }
    if (options.script) {
        console.log(chalk.dim(toSmtLibScript(result.terms, DEFAULTS.logic).replace(/^/gm, '    ')));
    }
    console.log(`  Time: ${result.timeMs}ms\n`);
}

async function closeAdapter(adapter: SolverAdapter | undefined): Promise<void> {
    if (adapter && isClosable(adapter)) {
        await adapter.close();
    }
}

async function main(): Promise<number> {
    const options = parseCliArgs(process.argv.slice(2));

    if (options.help || !options.command) {
        console.log(HELP);
        return 0;
    }
    if (options.version) {
        console.log(VERSION);
        return 0;
    }
    if (options.command !== 'run') {
        console.error(`Unknown command: ${options.command}`);
        console.log(HELP);
        return 1;
    }

    const registry = createAdapterRegistry();
    const timeoutMs = typeof options.campaign.timeoutMs === 'number' ? options.campaign.timeoutMs : undefined;

    let adapter: SolverAdapter | undefined;
    let oracle: SolverAdapter | undefined;
    try {
        adapter = await registry.create(options.engine, { timeoutMs, logic: DEFAULTS.logic });
        if (options.oracle) {
            oracle = await registry.create(options.oracle, { timeoutMs, logic: DEFAULTS.logic });
        }

        const campaign = runFuzzCampaign(adapter, options.campaign, { oracle });
        if (!options.json) {
            console.log(chalk.bold.blue(`smtfuzz v${VERSION}`));
            console.log(chalk.dim(`Engine: ${adapter.name}${oracle ? `, oracle: ${oracle.name}` : ''}`));
            console.log(chalk.dim(`Seed: ${campaign.seed}\n`));
        }

        const results: FuzzResult[] = [];
        for await (const result of campaign) {
            printResult(result, options);
            results.push(result);
        }

        const summary = summarizeCampaign(results);
        if (!options.json) {
            const { sat, unsat, unknown, error } = summary.byStatus;
            console.log(chalk.bold(`Completed ${summary.total} test cases in ${summary.timeMs}ms`));
            console.log(`  sat: ${sat}, unsat: ${unsat}, unknown: ${unknown}, error: ${error}`);
            if (summary.mismatches.length > 0) {
                console.log(chalk.red(`  Mismatches at test cases: ${summary.mismatches.map(i => i + 1).join(', ')}`));
            }
            console.log(chalk.dim(`  Replay with --seed=${campaign.seed}`));
        }
        return summary.mismatches.length > 0 ? 1 : 0;
    } finally {
        await closeAdapter(adapter);
        await closeAdapter(oracle);
        await shutdownZ3();
    }
}

main().then(code => {
    process.exitCode = code;
}).catch((e: unknown) => {
    if (e instanceof FuzzException) {
        console.error(chalk.red(`Error: ${e.message}`));
        if (e.error.suggestion) console.error(chalk.dim(e.error.suggestion));
    } else {
        console.error(chalk.red('Error:'), e);
    }
    process.exitCode = 1;
});
