import { type ColumnType, type RowSchema, fitsIntegerType } from '../common/datatype.js';
import { PlanErrorKind, planError } from '../common/errors.js';
import type { Datum, Row } from '../common/types.js';
import type { FunctionRegistry } from '../func/registration.js';
import { type ScalarExpr, ScalarKind } from '../planner/nodes/scalar.js';

interface TypedDatum {
	readonly value: Datum;
	/** Unknown when a column's type was not supplied */
	readonly type: ColumnType | undefined;
}

/**
 * Raise an `Evaluation` error when an integer result falls outside the range
 * of the type it was inferred to have.
 */
export function checkResultRange(value: Datum, type: ColumnType, func: string): Datum {
	if (typeof value === 'bigint' && !fitsIntegerType(value, type.scalarType)) {
		return planError(PlanErrorKind.Evaluation, `${func}: ${value} overflows ${type.scalarType}`, { function: func });
	}
	return value;
}

/**
 * Evaluate a scalar expression against one input row. With the row's schema,
 * every call's result is checked against the range of its inferred type.
 */
export function evaluateScalar(expr: ScalarExpr, row: Row, functions: FunctionRegistry, schema?: RowSchema): Datum {
	return evaluate(expr, row, functions, schema).value;
}

function evaluate(expr: ScalarExpr, row: Row, functions: FunctionRegistry, schema: RowSchema | undefined): TypedDatum {
	switch (expr.kind) {
		case ScalarKind.Literal:
			return { value: expr.value, type: expr.type };
		case ScalarKind.Column: {
			if (expr.index < 0 || expr.index >= row.length) {
				return planError(PlanErrorKind.Evaluation, `Column #${expr.index} is outside a row of ${row.length} value(s)`, { column: expr.index });
			}
			return { value: row[expr.index], type: schema?.[expr.index] };
		}
		case ScalarKind.Call: {
			const func = functions.getScalar(expr.func);
			if (!func) {
				return planError(PlanErrorKind.UnknownFunction, `Unknown function ${expr.func}`, { function: expr.func });
			}
			const args = expr.args.map(arg => evaluate(arg, row, functions, schema));
			const value = func.implementation(...args.map(arg => arg.value));
			const argTypes = args.map(arg => arg.type);
			if (!argTypes.every((t): t is ColumnType => t !== undefined)) {
				return { value, type: undefined };
			}
			const type = func.inferReturnType(argTypes);
			return { value: checkResultRange(value, type, expr.func), type };
		}
	}
}
