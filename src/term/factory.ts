import type {
    Term,
    IntLiteral,
    BoolLiteral,
    Variable,
    Operation,
    OperatorKind,
} from '../types/index.js';

export function createInt(value: number | bigint): IntLiteral {
    return { kind: 'int', value: BigInt(value) };
}

export function createBool(value: boolean): BoolLiteral {
    return { kind: 'bool', value };
}

export function createVariable(name: string): Variable {
    return { kind: 'var', name, sort: 'Int' };
}

export function createOperation(op: OperatorKind, left: Term, right: Term): Operation {
    return { kind: 'op', op, children: [left, right] };
}

export function createAdd(left: Term, right: Term): Operation {
    return createOperation('add', left, right);
}

export function createSub(left: Term, right: Term): Operation {
    return createOperation('sub', left, right);
}

export function createMul(left: Term, right: Term): Operation {
    return createOperation('mul', left, right);
}

export function createGt(left: Term, right: Term): Operation {
    return createOperation('gt', left, right);
}

export function createLt(left: Term, right: Term): Operation {
    return createOperation('lt', left, right);
}

export function createEq(left: Term, right: Term): Operation {
    return createOperation('eq', left, right);
}

export function createAnd(left: Term, right: Term): Operation {
    return createOperation('and', left, right);
}

export function createOr(left: Term, right: Term): Operation {
    return createOperation('or', left, right);
}

export function createXor(left: Term, right: Term): Operation {
    return createOperation('xor', left, right);
}
