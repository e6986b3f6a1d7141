import type { ColumnType } from '../common/datatype.js';
import type { Datum } from '../common/types.js';

/** Reference implementation of a scalar function. */
export type ScalarFunc = (...args: Datum[]) => Datum;

/** Reference implementation of an aggregate over the values of one group. */
export type AggregateFunc = (values: readonly Datum[]) => Datum;

/**
 * How a call renders in explain output:
 * - infix: `(a + b)`, variadic `(a && b && c)`
 * - prefix: `!a`
 * - call: `isnull(a)`
 */
export type FunctionRendering =
	| { readonly style: 'infix'; readonly symbol: string }
	| { readonly style: 'prefix'; readonly symbol: string }
	| { readonly style: 'call' };

/**
 * Returns a description of the problem when the argument types are not
 * accepted, otherwise undefined.
 */
export type ArgTypeValidator = (argTypes: readonly ColumnType[]) => string | undefined;

export interface ScalarFunctionSchema {
	readonly name: string;
	/** Minimum number of arguments */
	readonly minArgs: number;
	/** Maximum number of arguments, or -1 for unbounded */
	readonly maxArgs: number;
	readonly rendering: FunctionRendering;
	readonly validateArgTypes: ArgTypeValidator;
	readonly inferReturnType: (argTypes: readonly ColumnType[]) => ColumnType;
	readonly implementation: ScalarFunc;
}

export interface AggregateFunctionSchema {
	readonly name: string;
	readonly validateArgType: (argType: ColumnType) => string | undefined;
	readonly inferReturnType: (argType: ColumnType) => ColumnType;
	readonly implementation: AggregateFunc;
}
