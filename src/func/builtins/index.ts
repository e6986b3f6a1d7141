import {
	eqFunc, neqFunc, ltFunc, lteFunc, gtFunc, gteFunc,
	addFunc, subFunc, mulFunc, divFunc, modFunc,
	andFunc, orFunc, notFunc, negFunc, absFunc,
	isNullFunc, coalesceFunc,
} from './scalar.js';
import { sumFunc, countFunc, minFunc, maxFunc, anyFunc, allFunc } from './aggregate.js';
import { createCastFunctions } from './cast.js';
import type { AggregateFunctionSchema, ScalarFunctionSchema } from '../function.js';
import { FunctionRegistry } from '../registration.js';

// Combine all built-in scalar function definitions into a single array
export const BUILTIN_SCALAR_FUNCTIONS: readonly ScalarFunctionSchema[] = [
	// Comparisons
	eqFunc,
	neqFunc,
	ltFunc,
	lteFunc,
	gtFunc,
	gteFunc,
	// Arithmetic
	addFunc,
	subFunc,
	mulFunc,
	divFunc,
	modFunc,
	negFunc,
	absFunc,
	// Boolean
	andFunc,
	orFunc,
	notFunc,
	// Null handling
	isNullFunc,
	coalesceFunc,
	// Explicit casts
	...createCastFunctions(),
];

export const BUILTIN_AGGREGATE_FUNCTIONS: readonly AggregateFunctionSchema[] = [
	sumFunc,
	countFunc,
	minFunc,
	maxFunc,
	anyFunc,
	allFunc,
];

/**
 * A fresh registry holding every builtin function.
 */
export function createBuiltinRegistry(): FunctionRegistry {
	const registry = new FunctionRegistry();
	for (const schema of BUILTIN_SCALAR_FUNCTIONS) registry.registerScalar(schema);
	for (const schema of BUILTIN_AGGREGATE_FUNCTIONS) registry.registerAggregate(schema);
	return registry;
}
