import type { Datum, ColumnRef, Row } from '../common/types.js';
import type { FunctionRegistry } from '../func/registration.js';
import { type ScalarExpr, ScalarKind } from '../planner/nodes/scalar.js';
import type { ColumnOrder } from '../planner/nodes/relation.js';

/**
 * Render a datum as it appears in plan text: `1`, `1.5`, `"text"`, `true`, `null`.
 * Integral floats keep a fractional part so they read back as floats.
 */
export function formatDatum(value: Datum): string {
	if (value === null) return 'null';
	if (typeof value === 'string') return JSON.stringify(value);
	if (typeof value === 'number' && Number.isInteger(value) && Math.abs(value) < 1e21) {
		return Object.is(value, -0) ? '-0.0' : `${value}.0`;
	}
	return String(value);
}

export function formatColumnRef(col: ColumnRef): string {
	return `#${col}`;
}

/** `(#0, #2)` */
export function formatColumnList(cols: readonly ColumnRef[]): string {
	return `(${cols.map(formatColumnRef).join(', ')})`;
}

/** `(1, 2, 3)` */
export function formatRow(row: Row): string {
	return `(${row.map(formatDatum).join(', ')})`;
}

/**
 * Convert a scalar expression to its plan text. Calls render according to
 * the function's registered style; unregistered functions render as calls.
 */
export function formatScalar(expr: ScalarExpr, functions: FunctionRegistry): string {
	switch (expr.kind) {
		case ScalarKind.Literal:
			return formatDatum(expr.value);
		case ScalarKind.Column:
			return formatColumnRef(expr.index);
		case ScalarKind.Call: {
			const args = expr.args.map(arg => formatScalar(arg, functions));
			const rendering = functions.getScalar(expr.func)?.rendering ?? { style: 'call' };
			switch (rendering.style) {
				case 'infix':
					return `(${args.join(` ${rendering.symbol} `)})`;
				case 'prefix':
					return `${rendering.symbol}${args[0]}`;
				case 'call':
					return `${expr.func}(${args.join(', ')})`;
			}
		}
	}
}

/**
 * Convert multiple scalar expressions to a comma-separated string.
 */
export function formatScalarList(exprs: readonly ScalarExpr[], functions: FunctionRegistry): string {
	return exprs.map(expr => formatScalar(expr, functions)).join(', ');
}

/** Sort key for display, e.g. `#0 asc` */
export function formatSortKey(order: ColumnOrder): string {
	return `${formatColumnRef(order.column)} ${order.desc ? 'desc' : 'asc'}`;
}
