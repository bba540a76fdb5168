/**
 * Shared type definitions for smtfuzz
 */

// Re-export error types
export {
    FuzzException,
    createConfigurationError,
    createGenerationError,
    createAdapterError,
    createEngineError,
    createTimeoutError,
    serializeFuzzError,
    describeError,
} from './errors.js';

export type {
    FuzzErrorCode,
    FuzzError,
} from './errors.js';

// Re-export term types
export {
    OPERATORS,
    ARITHMETIC_OPERATORS,
    COMPARISON_OPERATORS,
    CONNECTIVE_OPERATORS,
} from './term.js';

export type {
    Sort,
    ArithmeticOperator,
    ComparisonOperator,
    ConnectiveOperator,
    OperatorKind,
    IntLiteral,
    BoolLiteral,
    Variable,
    Operation,
    Term,
    OperatorInfo,
} from './term.js';

export type {
    IntRange,
    GeneratorOptions,
} from './options.js';

export { DEFAULTS } from './options.js';
