import { parseCampaignConfig } from '../src/fuzz/config.js';
import { runFuzzCampaign } from '../src/fuzz/driver.js';
import { StubSolverAdapter } from '../src/engines/stub/index.js';
import { FuzzException } from '../src/types/index.js';
import { captureError } from './fixtures.js';

function issuesOf(input: unknown): unknown {
    const error = captureError(() => parseCampaignConfig(input));
    expect(error).toBeInstanceOf(FuzzException);
    return error instanceof FuzzException ? error.error.details?.issues : undefined;
}

describe('parseCampaignConfig', () => {
    test('applies defaults', () => {
        expect(parseCampaignConfig({})).toEqual({
            numTests: 5,
            constraintsPerTest: 3,
            maxDepth: 2,
            booleanMaxDepth: 1,
            intRange: { min: -100, max: 100 },
            variables: [],
        });
    });

    test('keeps explicit values', () => {
        const config = parseCampaignConfig({
            numTests: 10,
            constraintsPerTest: 1,
            maxDepth: 0,
            booleanMaxDepth: 3,
            seed: 42,
            intRange: { min: -5, max: 5 },
            variables: ['x', 'y_1'],
            timeoutMs: 500,
        });
        expect(config).toEqual({
            numTests: 10,
            constraintsPerTest: 1,
            maxDepth: 0,
            booleanMaxDepth: 3,
            seed: 42,
            intRange: { min: -5, max: 5 },
            variables: ['x', 'y_1'],
            timeoutMs: 500,
        });
    });

    test('lists every rejected field', () => {
        expect(issuesOf({ numTests: 0, maxDepth: -2 })).toEqual([
            'numTests: numTests must be greater than 0',
            'maxDepth: maxDepth must not be negative',
        ]);
    });

    test('rejects fractional counts', () => {
        expect(issuesOf({ constraintsPerTest: 1.5 })).toEqual([
            'constraintsPerTest: constraintsPerTest must be an integer',
        ]);
    });

    test('rejects non-numbers', () => {
        expect(issuesOf({ numTests: 'many' })).toEqual(['numTests: numTests must be a number']);
    });

    test('rejects an inverted integer range', () => {
        expect(issuesOf({ intRange: { min: 5, max: 1 } })).toEqual([
            'intRange: intRange.min must not exceed intRange.max',
        ]);
    });

    test('rejects integer bounds beyond the safe range', () => {
        expect(issuesOf({ intRange: { min: -(2 ** 60), max: 2 ** 60 } })).toEqual([
            'intRange.min: intRange.min must be a safe integer',
            'intRange.max: intRange.max must be a safe integer',
        ]);
    });

    test.each([-1, 2 ** 32])('rejects seed %p outside the unsigned 32-bit range', (seed) => {
        expect(issuesOf({ seed })).toEqual(['seed: seed must be an unsigned 32-bit integer']);
    });

    test('accepts the largest unsigned 32-bit seed', () => {
        expect(parseCampaignConfig({ seed: 0xffffffff }).seed).toBe(4294967295);
    });

    test('rejects variable names that are not simple symbols', () => {
        expect(issuesOf({ variables: ['1x'] })).toEqual([
            'variables.0: variable names must be SMT-LIB simple symbols',
        ]);
    });

    test('rejects unknown keys', () => {
        const error = captureError(() => parseCampaignConfig({ depth: 3 }));
        expect(error).toMatchObject({ error: { code: 'CONFIGURATION_ERROR' } });
    });

    test('message names the problem', () => {
        expect(() => parseCampaignConfig({ numTests: -1 })).toThrow(
            'Invalid campaign configuration: numTests: numTests must be greater than 0'
        );
    });
});

describe('runFuzzCampaign configuration', () => {
    test('rejects an unsafe integer range before anything is checked', () => {
        const stub = new StubSolverAdapter();
        const error = captureError(() => runFuzzCampaign(stub, {
            seed: 0,
            numTests: 5,
            constraintsPerTest: 1,
            intRange: { min: 0, max: 2 ** 60 },
        }));
        expect(error).toMatchObject({ error: { code: 'CONFIGURATION_ERROR' } });
        expect(stub.checkCount).toBe(0);
    });

    test('rejects a seed that would wrap around', () => {
        const error = captureError(() => runFuzzCampaign(new StubSolverAdapter(), { seed: 2 ** 32 }));
        expect(error).toMatchObject({ error: { code: 'CONFIGURATION_ERROR' } });
    });
});
