import type { Datum, Row } from '../common/types.js';

/**
 * Binary collation: lexicographical comparison of strings by code unit.
 */
export function compareStrings(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Total order over datums used by ordering operators.
 * Nulls sort after every non-null value; integers and floats compare
 * numerically, with NaN above every other number and equal only to itself;
 * values of different families order as bool < number < string.
 */
export function compareDatums(a: Datum, b: Datum): number {
	if (a === null || b === null) {
		if (a === b) return 0;
		return a === null ? 1 : -1;
	}

	const classA = familyRank(a);
	const classB = familyRank(b);
	if (classA !== classB) return classA - classB;

	if (typeof a === 'boolean' && typeof b === 'boolean') {
		return a === b ? 0 : a ? 1 : -1;
	}
	if (typeof a === 'string' && typeof b === 'string') {
		return compareStrings(a, b);
	}
	if (typeof a === 'bigint' && typeof b === 'bigint') {
		return a < b ? -1 : a > b ? 1 : 0;
	}
	const numA = Number(a);
	const numB = Number(b);
	const nanA = Number.isNaN(numA);
	const nanB = Number.isNaN(numB);
	if (nanA || nanB) return nanA === nanB ? 0 : nanA ? 1 : -1;
	return numA < numB ? -1 : numA > numB ? 1 : 0;
}

function familyRank(value: Datum): number {
	switch (typeof value) {
		case 'boolean': return 0;
		case 'bigint':
		case 'number': return 1;
		default: return 2;
	}
}

/**
 * Stable identity key for a datum, distinguishing values of different
 * representations (e.g. `1n` and `1`).
 */
export function datumKey(value: Datum): string {
	if (value === null) return 'n';
	switch (typeof value) {
		case 'boolean': return value ? 'b1' : 'b0';
		case 'bigint': return `i${value.toString()}`;
		case 'number': return `f${value}`;
		default: return `s${JSON.stringify(value)}`;
	}
}

/** Identity key for a tuple of datums. */
export function rowKey(row: Row): string {
	return row.map(datumKey).join('|');
}
