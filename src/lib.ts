/**
 * smtfuzz - Library Entry Point
 *
 * Exports the generator, solver adapters and fuzz driver for use in other
 * projects. The CLI lives in cli.ts and is not exported.
 */

// Types and Interfaces
export * from './types/index.js';

// Random source
export { createRandomSource, Mulberry32Source, pick } from './random/source.js';
export type { RandomSource } from './random/source.js';

// Terms
export * from './term/index.js';

// Generator
export { ExpressionGenerator, resolveGeneratorOptions } from './generator/expression.js';
export type { ResolvedGeneratorOptions } from './generator/expression.js';

// Solver adapters
export * from './engines/index.js';
export { Z3SolverAdapter, createZ3Adapter, shutdownZ3 } from './engines/z3/index.js';
export type { Z3AdapterOptions } from './engines/z3/index.js';

// Driver
export * from './fuzz/index.js';
