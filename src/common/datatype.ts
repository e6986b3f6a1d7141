import type { Datum } from './types.js';

/**
 * Scalar column types understood by the plan model.
 */
export enum ScalarType {
	Bool = 'bool',
	Int32 = 'int32',
	Int64 = 'int64',
	Float32 = 'float32',
	Float64 = 'float64',
	String = 'string',
}

export interface ColumnType {
	readonly scalarType: ScalarType;
	readonly nullable: boolean;
}

/** Ordered column types of a relation. */
export type RowSchema = readonly ColumnType[];

const INT32_MIN = -(2n ** 31n);
const INT32_MAX = 2n ** 31n - 1n;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const SCALAR_TYPES: ReadonlySet<string> = new Set(Object.values(ScalarType));

export function isScalarType(name: string): name is ScalarType {
	return SCALAR_TYPES.has(name);
}

export function columnType(scalarType: ScalarType, nullable = false): ColumnType {
	return { scalarType, nullable };
}

export function isIntegerType(type: ScalarType): boolean {
	return type === ScalarType.Int32 || type === ScalarType.Int64;
}

export function isFloatType(type: ScalarType): boolean {
	return type === ScalarType.Float32 || type === ScalarType.Float64;
}

export function isNumericType(type: ScalarType): boolean {
	return isIntegerType(type) || isFloatType(type);
}

/** Whether an integer lies in the range of `type`; other types take any integer. */
export function fitsIntegerType(value: bigint, type: ScalarType): boolean {
	switch (type) {
		case ScalarType.Int32:
			return value >= INT32_MIN && value <= INT32_MAX;
		case ScalarType.Int64:
			return value >= INT64_MIN && value <= INT64_MAX;
		default:
			return true;
	}
}

/**
 * Format a column type, e.g. `int64` or `int64?` when nullable.
 */
export function formatColumnType(type: ColumnType): string {
	return type.nullable ? `${type.scalarType}?` : type.scalarType;
}

/**
 * Coerce a literal value into the representation of `type`, or return undefined
 * when the value does not belong to the type. Integers may be placed into float
 * columns; nothing else crosses type families.
 */
export function coerceDatum(value: Datum, type: ColumnType): Datum | undefined {
	if (value === null) {
		return type.nullable ? null : undefined;
	}
	switch (type.scalarType) {
		case ScalarType.Bool:
			return typeof value === 'boolean' ? value : undefined;
		case ScalarType.Int32:
		case ScalarType.Int64:
			return typeof value === 'bigint' && fitsIntegerType(value, type.scalarType) ? value : undefined;
		case ScalarType.Float32:
		case ScalarType.Float64:
			if (typeof value === 'number') return value;
			return typeof value === 'bigint' ? Number(value) : undefined;
		case ScalarType.String:
			return typeof value === 'string' ? value : undefined;
	}
}

/**
 * The type a literal has when nothing in its context constrains it.
 */
export function defaultLiteralType(value: Datum): ColumnType {
	if (value === null) return columnType(ScalarType.Int64, true);
	if (typeof value === 'boolean') return columnType(ScalarType.Bool);
	if (typeof value === 'bigint') return columnType(ScalarType.Int64);
	if (typeof value === 'number') return columnType(ScalarType.Float64);
	return columnType(ScalarType.String);
}
