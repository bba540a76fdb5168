/**
 * Term model for generated constraints.
 *
 * A small SMT-style language: integer and boolean literals, integer
 * variables, and binary operations over them.
 */

export type Sort = 'Int' | 'Bool';

export type ArithmeticOperator = 'add' | 'sub' | 'mul';
export type ComparisonOperator = 'gt' | 'lt' | 'eq';
export type ConnectiveOperator = 'and' | 'or' | 'xor';

export type OperatorKind = ArithmeticOperator | ComparisonOperator | ConnectiveOperator;

export interface IntLiteral {
    readonly kind: 'int';
    readonly value: bigint;
}

export interface BoolLiteral {
    readonly kind: 'bool';
    readonly value: boolean;
}

export interface Variable {
    readonly kind: 'var';
    readonly name: string;
    readonly sort: 'Int';
}

export interface Operation {
    readonly kind: 'op';
    readonly op: OperatorKind;
    readonly children: readonly Term[];
}

export type Term = IntLiteral | BoolLiteral | Variable | Operation;

export interface OperatorInfo {
    arity: number;
    /** Sort every operand must have */
    operandSort: Sort;
    resultSort: Sort;
    /** SMT-LIB function symbol */
    symbol: string;
}

export const OPERATORS: Readonly<Record<OperatorKind, OperatorInfo>> = {
    add: { arity: 2, operandSort: 'Int', resultSort: 'Int', symbol: '+' },
    sub: { arity: 2, operandSort: 'Int', resultSort: 'Int', symbol: '-' },
    mul: { arity: 2, operandSort: 'Int', resultSort: 'Int', symbol: '*' },
    gt: { arity: 2, operandSort: 'Int', resultSort: 'Bool', symbol: '>' },
    lt: { arity: 2, operandSort: 'Int', resultSort: 'Bool', symbol: '<' },
    eq: { arity: 2, operandSort: 'Int', resultSort: 'Bool', symbol: '=' },
    and: { arity: 2, operandSort: 'Bool', resultSort: 'Bool', symbol: 'and' },
    or: { arity: 2, operandSort: 'Bool', resultSort: 'Bool', symbol: 'or' },
    xor: { arity: 2, operandSort: 'Bool', resultSort: 'Bool', symbol: 'xor' },
};

export const ARITHMETIC_OPERATORS: readonly ArithmeticOperator[] = ['add', 'sub', 'mul'];
export const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ['gt', 'lt', 'eq'];
export const CONNECTIVE_OPERATORS: readonly ConnectiveOperator[] = ['and', 'or', 'xor'];
