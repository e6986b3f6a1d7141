import type { Datum } from '../../common/types.js';
import { type ColumnType, ScalarType, columnType, formatColumnType, isNumericType } from '../../common/datatype.js';
import { PlanErrorKind, planError } from '../../common/errors.js';
import { createScalarFunction } from '../registration.js';
import type { ArgTypeValidator } from '../function.js';
import { compareDatums } from '../../util/comparison.js';

function anyNullable(argTypes: readonly ColumnType[]): boolean {
	return argTypes.some(t => t.nullable);
}

/** All arguments share one scalar type */
const sameTypeArgs: ArgTypeValidator = (argTypes) => {
	const first = argTypes[0];
	const other = argTypes.find(t => t.scalarType !== first.scalarType);
	return other ? `operands must share a type, got ${argTypes.map(formatColumnType).join(' and ')}` : undefined;
};

/** All arguments share one numeric type */
const numericArgs: ArgTypeValidator = (argTypes) => {
	const bad = argTypes.find(t => !isNumericType(t.scalarType));
	if (bad) return `expected a numeric operand, got ${formatColumnType(bad)}`;
	return sameTypeArgs(argTypes);
};

const boolArgs: ArgTypeValidator = (argTypes) => {
	const bad = argTypes.find(t => t.scalarType !== ScalarType.Bool);
	return bad ? `expected a bool operand, got ${formatColumnType(bad)}` : undefined;
};

/** Result carries the operand type; nullable when any operand is */
function operandType(argTypes: readonly ColumnType[]): ColumnType {
	return columnType(argTypes[0].scalarType, anyNullable(argTypes));
}

function boolResult(argTypes: readonly ColumnType[]): ColumnType {
	return columnType(ScalarType.Bool, anyNullable(argTypes));
}

type Arithmetic = {
	int: (a: bigint, b: bigint) => bigint;
	float: (a: number, b: number) => number;
};

function arithmetic(op: Arithmetic): (a: Datum, b: Datum) => Datum {
	return (a, b) => {
		if (a === null || b === null) return null;
		if (typeof a === 'bigint' && typeof b === 'bigint') {
			return op.int(a, b);
		}
		return op.float(Number(a), Number(b));
	};
}

function comparison(name: string, symbol: string, test: (cmp: number) => boolean) {
	return createScalarFunction(
		{
			name,
			numArgs: 2,
			rendering: { style: 'infix', symbol },
			validateArgTypes: sameTypeArgs,
			inferReturnType: boolResult,
		},
		(a: Datum, b: Datum): Datum => (a === null || b === null) ? null : test(compareDatums(a, b))
	);
}

function binaryNumeric(name: string, symbol: string, op: Arithmetic) {
	const apply = arithmetic(op);
	return createScalarFunction(
		{
			name,
			numArgs: 2,
			rendering: { style: 'infix', symbol },
			validateArgTypes: numericArgs,
			inferReturnType: operandType,
		},
		(a: Datum, b: Datum): Datum => apply(a, b)
	);
}

function divisionByZero(name: string): never {
	return planError(PlanErrorKind.Evaluation, `Division by zero in ${name}`, { function: name });
}

// --- comparisons ---
export const eqFunc = comparison('eq', '=', cmp => cmp === 0);
export const neqFunc = comparison('neq', '!=', cmp => cmp !== 0);
export const ltFunc = comparison('lt', '<', cmp => cmp < 0);
export const lteFunc = comparison('lte', '<=', cmp => cmp <= 0);
export const gtFunc = comparison('gt', '>', cmp => cmp > 0);
export const gteFunc = comparison('gte', '>=', cmp => cmp >= 0);

// --- arithmetic ---
export const addFunc = binaryNumeric('add', '+', { int: (a, b) => a + b, float: (a, b) => a + b });
export const subFunc = binaryNumeric('sub', '-', { int: (a, b) => a - b, float: (a, b) => a - b });
export const mulFunc = binaryNumeric('mul', '*', { int: (a, b) => a * b, float: (a, b) => a * b });
export const divFunc = binaryNumeric('div', '/', {
	int: (a, b) => b === 0n ? divisionByZero('div') : a / b,
	float: (a, b) => a / b,
});
export const modFunc = binaryNumeric('mod', '%', {
	int: (a, b) => b === 0n ? divisionByZero('mod') : a % b,
	float: (a, b) => a % b,
});

// --- boolean connectives (three-valued) ---
export const andFunc = createScalarFunction(
	{
		name: 'and',
		numArgs: -1,
		minArgs: 2,
		rendering: { style: 'infix', symbol: '&&' },
		validateArgTypes: boolArgs,
		inferReturnType: boolResult,
	},
	(...args: Datum[]): Datum => {
		if (args.some(a => a === false)) return false;
		return args.some(a => a === null) ? null : true;
	}
);

export const orFunc = createScalarFunction(
	{
		name: 'or',
		numArgs: -1,
		minArgs: 2,
		rendering: { style: 'infix', symbol: '||' },
		validateArgTypes: boolArgs,
		inferReturnType: boolResult,
	},
	(...args: Datum[]): Datum => {
		if (args.some(a => a === true)) return true;
		return args.some(a => a === null) ? null : false;
	}
);

export const notFunc = createScalarFunction(
	{
		name: 'not',
		numArgs: 1,
		rendering: { style: 'prefix', symbol: '!' },
		validateArgTypes: boolArgs,
		inferReturnType: boolResult,
	},
	(a: Datum): Datum => a === null ? null : !a
);

// --- numeric unary ---
export const negFunc = createScalarFunction(
	{
		name: 'neg',
		numArgs: 1,
		rendering: { style: 'prefix', symbol: '-' },
		validateArgTypes: numericArgs,
		inferReturnType: operandType,
	},
	(a: Datum): Datum => {
		if (a === null) return null;
		return typeof a === 'bigint' ? -a : -Number(a);
	}
);

export const absFunc = createScalarFunction(
	{
		name: 'abs',
		numArgs: 1,
		validateArgTypes: numericArgs,
		inferReturnType: operandType,
	},
	(a: Datum): Datum => {
		if (a === null) return null;
		if (typeof a === 'bigint') return a < 0n ? -a : a;
		return Math.abs(Number(a));
	}
);

// --- null handling ---
export const isNullFunc = createScalarFunction(
	{
		name: 'isnull',
		numArgs: 1,
		inferReturnType: () => columnType(ScalarType.Bool),
	},
	(a: Datum): Datum => a === null
);

export const coalesceFunc = createScalarFunction(
	{
		name: 'coalesce',
		numArgs: -1,
		validateArgTypes: sameTypeArgs,
		inferReturnType: (argTypes) => columnType(argTypes[0].scalarType, argTypes.every(t => t.nullable)),
	},
	(...args: Datum[]): Datum => args.find(a => a !== null) ?? null
);
