import { type ColumnType, type RowSchema, coerceDatum, columnType, defaultLiteralType, formatColumnType } from '../../common/datatype.js';
import { PlanErrorKind, planError } from '../../common/errors.js';
import type { Datum } from '../../common/types.js';
import type { FunctionRegistry } from '../../func/registration.js';
import { type ScalarExpr, call, column, literal } from '../nodes/scalar.js';
import type { LiteralForm, ScalarForm } from './request.js';

export interface TypedScalar {
	readonly expr: ScalarExpr;
	readonly type: ColumnType;
}

/**
 * Where the expression sits, for error messages (e.g. "Map expression 2").
 */
export interface ScalarContext {
	readonly owner: string;
	readonly registry: FunctionRegistry;
}

function describeForm(form: ScalarForm): string {
	switch (form.type) {
		case 'column': return `#${form.index}`;
		case 'call': return form.func;
		case 'literal': return formatLiteralValue(form.value);
	}
}

function formatLiteralValue(value: Datum): string {
	return typeof value === 'string' ? JSON.stringify(value) : String(value);
}

/**
 * Type a literal form. An explicit type tag must accept the value; otherwise
 * the type follows from the value itself.
 */
export function typeLiteral(form: LiteralForm, ctx: ScalarContext): TypedScalar {
	if (form.scalarType === undefined) {
		return { expr: literal(form.value, defaultLiteralType(form.value)), type: defaultLiteralType(form.value) };
	}
	const type = columnType(form.scalarType, form.value === null);
	const value = coerceDatum(form.value, type);
	if (value === undefined) {
		planError(
			PlanErrorKind.TypeMismatch,
			`Literal ${formatLiteralValue(form.value)} is not a valid ${form.scalarType} in ${ctx.owner}`,
			{ token: formatLiteralValue(form.value), type: form.scalarType },
			form.loc
		);
	}
	return { expr: literal(value, type), type };
}

/**
 * Validate and type a scalar form against the columns available to it.
 */
export function buildScalar(form: ScalarForm, schema: RowSchema, ctx: ScalarContext): TypedScalar {
	switch (form.type) {
		case 'literal':
			return typeLiteral(form, ctx);

		case 'column': {
			const type = schema[form.index];
			if (!Number.isInteger(form.index) || form.index < 0 || type === undefined) {
				planError(
					PlanErrorKind.ColumnOutOfRange,
					`Column reference #${form.index} is out of range in ${ctx.owner} (arity ${schema.length})`,
					{ column: form.index, arity: schema.length },
					form.loc
				);
			}
			return { expr: column(form.index), type };
		}

		case 'call': {
			const schemaFn = ctx.registry.getScalar(form.func);
			if (!schemaFn) {
				planError(PlanErrorKind.UnknownFunction, `Unknown function ${form.func} in ${ctx.owner}`, { function: form.func }, form.loc);
			}
			const count = form.args.length;
			if (count < schemaFn.minArgs || (schemaFn.maxArgs >= 0 && count > schemaFn.maxArgs)) {
				const expected = schemaFn.maxArgs < 0
					? `at least ${schemaFn.minArgs}`
					: schemaFn.minArgs === schemaFn.maxArgs ? `${schemaFn.minArgs}` : `${schemaFn.minArgs}-${schemaFn.maxArgs}`;
				planError(
					PlanErrorKind.ArityMismatch,
					`Function ${form.func} expects ${expected} argument(s), got ${count} in ${ctx.owner}`,
					{ function: form.func, arguments: count },
					form.loc
				);
			}
			const args = form.args.map(arg => buildScalar(arg, schema, ctx));
			const argTypes = args.map(a => a.type);
			const problem = schemaFn.validateArgTypes(argTypes);
			if (problem !== undefined) {
				planError(
					PlanErrorKind.TypeMismatch,
					`Invalid arguments to ${form.func} in ${ctx.owner}: ${problem}`,
					{ function: form.func, types: argTypes.map(formatColumnType).join(', ') },
					form.loc
				);
			}
			return {
				expr: call(form.func, args.map(a => a.expr)),
				type: schemaFn.inferReturnType(argTypes),
			};
		}
	}
}

/**
 * Place a form inside a Constant row: only literals are accepted, and the
 * value is coerced into the schema column's type.
 */
export function buildConstantCell(form: ScalarForm, type: ColumnType, ctx: { owner: string }): Datum {
	if (form.type !== 'literal') {
		const token = describeForm(form);
		return planError(
			PlanErrorKind.InvalidLiteralContext,
			`${form.type === 'column' ? 'Column reference' : 'Function call'} ${token} is not allowed in ${ctx.owner}; only literals are accepted`,
			{ token },
			form.loc
		);
	}
	if (form.scalarType !== undefined && form.scalarType !== type.scalarType) {
		planError(
			PlanErrorKind.TypeMismatch,
			`Literal tagged ${form.scalarType} does not match column type ${formatColumnType(type)} in ${ctx.owner}`,
			{ token: formatLiteralValue(form.value), type: formatColumnType(type) },
			form.loc
		);
	}
	const value = coerceDatum(form.value, type);
	if (value === undefined) {
		return planError(
			PlanErrorKind.TypeMismatch,
			`Literal ${formatLiteralValue(form.value)} does not fit column type ${formatColumnType(type)} in ${ctx.owner}`,
			{ token: formatLiteralValue(form.value), type: formatColumnType(type) },
			form.loc
		);
	}
	return value;
}
