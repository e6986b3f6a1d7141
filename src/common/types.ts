/**
 * A single typed value. Integer types carry bigint, float types carry number.
 */
export type Datum = null | boolean | bigint | number | string;

/**
 * Represents a row of data.
 */
export type Row = readonly Datum[];

/**
 * Zero-based index into the current node's output row.
 */
export type ColumnRef = number;

/**
 * Stable identifier of a relation node: its position in the plan arena.
 */
export type NodeId = number;

/** Line/column of a request form, when it came from the plan DSL. */
export interface SourceLocation {
	readonly line: number;
	readonly column: number;
}
