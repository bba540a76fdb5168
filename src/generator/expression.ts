/**
 * Expression Generator
 *
 * Builds random, well-typed terms of bounded depth. Arithmetic and boolean
 * terms have separate depth caps; arithmetic operands of a comparison start
 * their own count at depth 0.
 */

import {
    DEFAULTS,
    ARITHMETIC_OPERATORS,
    COMPARISON_OPERATORS,
    CONNECTIVE_OPERATORS,
    createConfigurationError,
} from '../types/index.js';
import type { GeneratorOptions, IntRange, Term } from '../types/index.js';
import { RandomSource, pick } from '../random/source.js';
import {
    createBool,
    createInt,
    createOperation,
    createVariable,
} from '../term/factory.js';

export interface ResolvedGeneratorOptions {
    maxDepth: number;
    booleanMaxDepth: number;
    intRange: IntRange;
    variables: readonly string[];
}

export function resolveGeneratorOptions(options: GeneratorOptions = {}): ResolvedGeneratorOptions {
    const resolved = {
        maxDepth: options.maxDepth ?? DEFAULTS.maxDepth,
        booleanMaxDepth: options.booleanMaxDepth ?? DEFAULTS.booleanMaxDepth,
        intRange: options.intRange ?? { ...DEFAULTS.intRange },
        variables: options.variables ?? [],
    };

    const issues: string[] = [];
    if (!Number.isInteger(resolved.maxDepth) || resolved.maxDepth < 0) {
        issues.push(`maxDepth must be a non-negative integer, got ${resolved.maxDepth}`);
    }
    if (!Number.isInteger(resolved.booleanMaxDepth) || resolved.booleanMaxDepth < 0) {
        issues.push(`booleanMaxDepth must be a non-negative integer, got ${resolved.booleanMaxDepth}`);
    }
    const { min, max } = resolved.intRange;
    if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max)) {
        issues.push(`intRange bounds must be safe integers, got [${min}, ${max}]`);
    } else if (min > max) {
        issues.push(`intRange.min (${resolved.intRange.min}) exceeds intRange.max (${resolved.intRange.max})`);
    }
    if (issues.length > 0) {
        throw createConfigurationError('Invalid generator options', issues);
    }
    return resolved;
}

export class ExpressionGenerator {
    readonly options: ResolvedGeneratorOptions;

    constructor(private readonly random: RandomSource, options: GeneratorOptions = {}) {
        this.options = resolveGeneratorOptions(options);
    }

    generateInteger(): Term {
        const { min, max } = this.options.intRange;
        return createInt(this.random.nextIntInRange(min, max));
    }

    generateBoolean(): Term {
        return createBool(this.random.nextBool());
    }

    /**
     * Arithmetic-typed term. Past `maxDepth` always a leaf; below the root a
     * leaf with probability 1/3.
     */
    generateArithmetic(currentDepth: number = 0): Term {
        if (currentDepth > this.options.maxDepth
            || (currentDepth > 0 && this.random.nextIntInRange(0, 2) === 0)) {
            return this.generateArithmeticLeaf();
        }

        const left = this.generateArithmetic(currentDepth + 1);
        const right = this.generateArithmetic(currentDepth + 1);
        return createOperation(pick(this.random, ARITHMETIC_OPERATORS), left, right);
    }

    /**
     * Boolean-typed term. Past `booleanMaxDepth` (or on a fair coin below the
     * root) a literal or a comparison; otherwise a connective.
     */
    generateBooleanExpr(currentDepth: number = 0): Term {
        if (currentDepth > this.options.booleanMaxDepth
            || (currentDepth > 0 && this.random.nextBool())) {
            if (this.random.nextBool()) {
                return this.generateBoolean();
            }
            const left = this.generateArithmetic();
            const right = this.generateArithmetic();
            return createOperation(pick(this.random, COMPARISON_OPERATORS), left, right);
        }

        const left = this.generateBooleanExpr(currentDepth + 1);
        const right = this.generateBooleanExpr(currentDepth + 1);
        return createOperation(pick(this.random, CONNECTIVE_OPERATORS), left, right);
    }

    private generateArithmeticLeaf(): Term {
        const { variables } = this.options;
        if (variables.length > 0 && this.random.nextBool()) {
            return createVariable(pick(this.random, variables));
        }
        return this.generateInteger();
    }
}
