import type { Datum } from '../../common/types.js';
import { type ColumnType, ScalarType, columnType, formatColumnType, isNumericType } from '../../common/datatype.js';
import { createAggregateFunction } from '../registration.js';
import { compareDatums } from '../../util/comparison.js';

function nonNull(values: readonly Datum[]): Datum[] {
	return values.filter(v => v !== null);
}

/** Result keeps the input's scalar type; absent for a group of nulls */
function sameTypeNullable(argType: ColumnType): ColumnType {
	return columnType(argType.scalarType, true);
}

function extreme(sign: 1 | -1) {
	return (values: readonly Datum[]): Datum => {
		let best: Datum = null;
		for (const value of nonNull(values)) {
			if (best === null || sign * compareDatums(value, best) > 0) {
				best = value;
			}
		}
		return best;
	};
}

export const sumFunc = createAggregateFunction(
	{
		name: 'sum',
		validateArgType: (argType) => isNumericType(argType.scalarType) ? undefined : `sum expects a numeric input, got ${formatColumnType(argType)}`,
		inferReturnType: sameTypeNullable,
	},
	(values) => {
		const present = nonNull(values);
		if (present.length === 0) return null;
		if (present.every((v): v is bigint => typeof v === 'bigint')) {
			return present.reduce((acc, v) => acc + v, 0n);
		}
		return present.reduce<number>((acc, v) => acc + Number(v), 0);
	}
);

export const countFunc = createAggregateFunction(
	{
		name: 'count',
		inferReturnType: () => columnType(ScalarType.Int64),
	},
	(values) => BigInt(nonNull(values).length)
);

export const minFunc = createAggregateFunction(
	{
		name: 'min',
		inferReturnType: sameTypeNullable,
	},
	extreme(-1)
);

export const maxFunc = createAggregateFunction(
	{
		name: 'max',
		inferReturnType: sameTypeNullable,
	},
	extreme(1)
);

const boolInput = (name: string) => (argType: ColumnType): string | undefined =>
	argType.scalarType === ScalarType.Bool ? undefined : `${name} expects a bool input, got ${formatColumnType(argType)}`;

export const anyFunc = createAggregateFunction(
	{
		name: 'any',
		validateArgType: boolInput('any'),
		inferReturnType: () => columnType(ScalarType.Bool, true),
	},
	(values) => {
		const present = nonNull(values);
		return present.length === 0 ? null : present.some(v => v === true);
	}
);

export const allFunc = createAggregateFunction(
	{
		name: 'all',
		validateArgType: boolInput('all'),
		inferReturnType: () => columnType(ScalarType.Bool, true),
	},
	(values) => {
		const present = nonNull(values);
		return present.length === 0 ? null : present.every(v => v === true);
	}
);
