export * from './interface.js';
export * from './registry.js';
export { StubSolverAdapter, createStubAdapter } from './stub/index.js';
export type { StubBehaviour, StubResponder } from './stub/index.js';
export { EvaluatorSolverAdapter, createEvaluatorAdapter, evaluate, UnboundVariableError } from './evaluator/index.js';
export type { Value } from './evaluator/index.js';
