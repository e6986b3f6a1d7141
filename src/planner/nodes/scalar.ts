import type { ColumnType } from '../../common/datatype.js';
import type { ColumnRef, Datum } from '../../common/types.js';

export enum ScalarKind {
	Literal = 'Literal',
	Column = 'Column',
	Call = 'Call',
}

export interface LiteralExpr {
	readonly kind: ScalarKind.Literal;
	readonly value: Datum;
	readonly type: ColumnType;
}

export interface ColumnExpr {
	readonly kind: ScalarKind.Column;
	readonly index: ColumnRef;
}

export interface CallExpr {
	readonly kind: ScalarKind.Call;
	/** Function identifier, resolved against the function registry */
	readonly func: string;
	readonly args: readonly ScalarExpr[];
}

/**
 * Scalar expression evaluated against one row of a relation node's input.
 */
export type ScalarExpr = LiteralExpr | ColumnExpr | CallExpr;

export function literal(value: Datum, type: ColumnType): LiteralExpr {
	return { kind: ScalarKind.Literal, value, type };
}

export function column(index: ColumnRef): ColumnExpr {
	return { kind: ScalarKind.Column, index };
}

export function call(func: string, args: readonly ScalarExpr[]): CallExpr {
	return { kind: ScalarKind.Call, func, args };
}

/**
 * Collect every column referenced by the expression, in first-seen order.
 */
export function referencedColumns(expr: ScalarExpr, into: ColumnRef[] = []): ColumnRef[] {
	switch (expr.kind) {
		case ScalarKind.Literal:
			break;
		case ScalarKind.Column:
			if (!into.includes(expr.index)) into.push(expr.index);
			break;
		case ScalarKind.Call:
			for (const arg of expr.args) referencedColumns(arg, into);
			break;
	}
	return into;
}

/** The column index when the expression is a bare column reference. */
export function asColumn(expr: ScalarExpr): ColumnRef | undefined {
	return expr.kind === ScalarKind.Column ? expr.index : undefined;
}
