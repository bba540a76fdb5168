import type { Context, Solver, Bool, Arith } from 'z3-solver';

export type Z3Context = Context<'main'>;
export type Z3Solver = Solver<'main'>;
export type Z3Bool = Bool<'main'>;
export type Z3Arith = Arith<'main'>;
