import type { Datum } from '../../common/types.js';
import { ScalarType, columnType, fitsIntegerType, formatColumnType, isIntegerType, isNumericType } from '../../common/datatype.js';
import { PlanErrorKind, planError } from '../../common/errors.js';
import { createScalarFunction } from '../registration.js';
import type { ScalarFunctionSchema } from '../function.js';

function castName(from: ScalarType, to: ScalarType): string {
	return `cast_${from}_to_${to}`;
}

function toInteger(value: bigint | number, to: ScalarType, name: string): bigint {
	let result: bigint;
	if (typeof value === 'number') {
		if (!Number.isFinite(value)) {
			return planError(PlanErrorKind.Evaluation, `${name}: ${value} has no integer value`, { function: name });
		}
		result = BigInt(Math.round(value));
	} else {
		result = value;
	}
	if (!fitsIntegerType(result, to)) {
		return planError(PlanErrorKind.Evaluation, `${name}: ${result} out of range for ${to}`, { function: name });
	}
	return result;
}

function convert(value: Datum, to: ScalarType, name: string): Datum {
	if (value === null) return null;
	if (to === ScalarType.String) {
		return typeof value === 'string' ? value : String(value);
	}
	if (typeof value !== 'bigint' && typeof value !== 'number') {
		return planError(PlanErrorKind.Evaluation, `${name}: cannot convert ${String(value)}`, { function: name });
	}
	if (isIntegerType(to)) return toInteger(value, to, name);
	const asNumber = Number(value);
	return to === ScalarType.Float32 ? Math.fround(asNumber) : asNumber;
}

function createCast(from: ScalarType, to: ScalarType): ScalarFunctionSchema {
	const name = castName(from, to);
	return createScalarFunction(
		{
			name,
			numArgs: 1,
			validateArgTypes: (argTypes) => argTypes[0].scalarType === from
				? undefined
				: `expected ${from}, got ${formatColumnType(argTypes[0])}`,
			inferReturnType: (argTypes) => columnType(to, argTypes[0].nullable),
		},
		(value: Datum): Datum => convert(value, to, name)
	);
}

/**
 * Explicit casts: between every pair of numeric types, and from every
 * type to string. Named `cast_<from>_to_<to>`.
 */
export function createCastFunctions(): ScalarFunctionSchema[] {
	const all = Object.values(ScalarType);
	const casts: ScalarFunctionSchema[] = [];
	for (const from of all) {
		for (const to of all) {
			if (from === to) continue;
			const numeric = isNumericType(from) && isNumericType(to);
			if (numeric || to === ScalarType.String) {
				casts.push(createCast(from, to));
			}
		}
	}
	return casts;
}
