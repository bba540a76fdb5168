export interface IntRange {
    min: number;
    max: number;
}

export interface GeneratorOptions {
    /** Depth after which arithmetic terms always end in a leaf */
    maxDepth?: number;
    /** Depth after which boolean terms always end in a leaf or comparison */
    booleanMaxDepth?: number;
    /** Inclusive range of generated integer literals */
    intRange?: IntRange;
    /** Names of integer variables that leaves may reference */
    variables?: readonly string[];
}

export const DEFAULTS = {
    maxDepth: 2,
    booleanMaxDepth: 1,
    intRange: { min: -100, max: 100 },
    numTests: 5,
    constraintsPerTest: 3,
    logic: 'QF_NIA',
} as const;
