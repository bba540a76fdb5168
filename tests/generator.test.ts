import fc from 'fast-check';
import { ExpressionGenerator, resolveGeneratorOptions } from '../src/generator/expression.js';
import { createRandomSource } from '../src/random/source.js';
import { termDepth, sortOf, isWellTyped, typeErrors } from '../src/term/analysis.js';
import { termToString } from '../src/term/printer.js';
import {
    COMPARISON_OPERATORS,
    CONNECTIVE_OPERATORS,
    FuzzException,
} from '../src/types/index.js';
import type { Term, OperatorKind } from '../src/types/index.js';
import { ScriptedRandom, captureError } from './fixtures.js';

const seedArb = fc.integer({ min: 0, max: 0xffffffff });
const depthArb = fc.integer({ min: 0, max: 4 });

function isComparison(op: OperatorKind): boolean {
    return COMPARISON_OPERATORS.some(c => c === op);
}

function isConnective(op: OperatorKind): boolean {
    return CONNECTIVE_OPERATORS.some(c => c === op);
}

/**
 * Every comparison has arithmetic children, every connective boolean ones.
 */
function checkBooleanShape(term: Term): void {
    if (term.kind !== 'op') return;
    if (isComparison(term.op)) {
        term.children.forEach(child => expect(sortOf(child)).toBe('Int'));
    } else if (isConnective(term.op)) {
        term.children.forEach(child => {
            expect(sortOf(child)).toBe('Bool');
            checkBooleanShape(child);
        });
    }
}

describe('ExpressionGenerator.generateArithmetic', () => {
    test('depth never exceeds maxDepth + 1', () => {
        fc.assert(fc.property(seedArb, depthArb, (seed, maxDepth) => {
            const generator = new ExpressionGenerator(createRandomSource(seed), { maxDepth });
            for (let i = 0; i < 10; i++) {
                const term = generator.generateArithmetic();
                expect(termDepth(term)).toBeLessThanOrEqual(maxDepth + 1);
                expect(sortOf(term)).toBe('Int');
                expect(typeErrors(term)).toEqual([]);
            }
        }));
    });

    test('maxDepth 0 always yields one operation over two literals', () => {
        const generator = new ExpressionGenerator(createRandomSource(1), { maxDepth: 0 });
        for (let i = 0; i < 20; i++) {
            const term = generator.generateArithmetic();
            expect(termDepth(term)).toBe(1);
        }
    });

    test('starting past the cap gives a literal', () => {
        const generator = new ExpressionGenerator(createRandomSource(2), { maxDepth: 2 });
        expect(generator.generateArithmetic(3).kind).toBe('int');
    });

    test('literals stay inside intRange', () => {
        const generator = new ExpressionGenerator(createRandomSource(5), {
            maxDepth: 0,
            intRange: { min: 7, max: 7 },
        });
        const term = generator.generateArithmetic();
        expect(term.kind).toBe('op');
        if (term.kind === 'op') {
            expect(term.children).toEqual([{ kind: 'int', value: 7n }, { kind: 'int', value: 7n }]);
        }
    });

    test('follows the random draws exactly', () => {
        // leaf 1: variable? yes -> pick y; leaf 2: variable? no -> 5; operator -> mul
        const random = new ScriptedRandom([1, 5, 2], [true, false]);
        const generator = new ExpressionGenerator(random, { maxDepth: 0, variables: ['x', 'y'] });
        expect(termToString(generator.generateArithmetic())).toBe('(* y 5)');
        expect(random.exhausted).toBe(true);
    });

    test('uses no variable draw when no variables are configured', () => {
        const random = new ScriptedRandom([-3, 4, 0]);
        const generator = new ExpressionGenerator(random, { maxDepth: 0 });
        expect(termToString(generator.generateArithmetic())).toBe('(+ (- 3) 4)');
        expect(random.exhausted).toBe(true);
    });

    test('stops below the root on a 1-in-3 draw', () => {
        // root -> left at depth 1: draw 0 stops with literal 9; right: draw 1 continues,
        // its children at depth 2 > maxDepth are literals 1 and 2, operator sub; root operator add
        const random = new ScriptedRandom([0, 9, 1, 1, 2, 1, 0]);
        const generator = new ExpressionGenerator(random, { maxDepth: 1 });
        expect(termToString(generator.generateArithmetic())).toBe('(+ 9 (- 1 2))');
        expect(random.exhausted).toBe(true);
    });
});

describe('ExpressionGenerator.generateBooleanExpr', () => {
    test('is always well-typed', () => {
        fc.assert(fc.property(seedArb, depthArb, depthArb, (seed, maxDepth, booleanMaxDepth) => {
            const generator = new ExpressionGenerator(createRandomSource(seed), { maxDepth, booleanMaxDepth });
            for (let i = 0; i < 10; i++) {
                const term = generator.generateBooleanExpr();
                expect(isWellTyped(term, 'Bool')).toBe(true);
                checkBooleanShape(term);
                expect(termDepth(term)).toBeLessThanOrEqual(booleanMaxDepth + maxDepth + 3);
            }
        }));
    });

    test('booleanMaxDepth 0 gives a connective over leaves or comparisons', () => {
        const generator = new ExpressionGenerator(createRandomSource(17), { booleanMaxDepth: 0 });
        for (let i = 0; i < 20; i++) {
            const term = generator.generateBooleanExpr();
            expect(term.kind).toBe('op');
            if (term.kind !== 'op') continue;
            expect(isConnective(term.op)).toBe(true);
            for (const child of term.children) {
                const leafOrComparison = child.kind === 'bool' || (child.kind === 'op' && isComparison(child.op));
                expect(leafOrComparison).toBe(true);
            }
        }
    });

    test('follows the random draws exactly', () => {
        const random = new ScriptedRandom(
            // comparison: left arith (3, -4, add), right arith (2, 2, sub), lt; root xor
            [3, -4, 0, 2, 2, 1, 1, 2],
            // left: stop, literal, value false; right: stop, comparison
            [true, true, false, true, false]
        );
        const generator = new ExpressionGenerator(random, { maxDepth: 0, booleanMaxDepth: 1 });
        expect(termToString(generator.generateBooleanExpr())).toBe('(xor false (< (+ 3 (- 4)) (- 2 2)))');
        expect(random.exhausted).toBe(true);
    });

    test('same seed yields the same terms', () => {
        const a = new ExpressionGenerator(createRandomSource(42), { maxDepth: 3 });
        const b = new ExpressionGenerator(createRandomSource(42), { maxDepth: 3 });
        for (let i = 0; i < 25; i++) {
            expect(termToString(a.generateBooleanExpr())).toBe(termToString(b.generateBooleanExpr()));
        }
    });
});

describe('resolveGeneratorOptions', () => {
    test('fills in defaults', () => {
        expect(resolveGeneratorOptions()).toEqual({
            maxDepth: 2,
            booleanMaxDepth: 1,
            intRange: { min: -100, max: 100 },
            variables: [],
        });
    });

    test('rejects negative depths and inverted ranges', () => {
        const error = captureError(() => resolveGeneratorOptions({
            maxDepth: -1,
            intRange: { min: 4, max: 3 },
        }));
        expect(error).toBeInstanceOf(FuzzException);
        expect(error).toMatchObject({
            error: {
                code: 'CONFIGURATION_ERROR',
                details: {
                    issues: [
                        'maxDepth must be a non-negative integer, got -1',
                        'intRange.min (4) exceeds intRange.max (3)',
                    ],
                },
            },
        });
    });

    test('rejects integer bounds beyond the safe range', () => {
        const error = captureError(() => resolveGeneratorOptions({
            intRange: { min: 0, max: 2 ** 60 },
        }));
        expect(error).toMatchObject({
            error: {
                code: 'CONFIGURATION_ERROR',
                details: { issues: [`intRange bounds must be safe integers, got [0, ${2 ** 60}]`] },
            },
        });
    });
});
