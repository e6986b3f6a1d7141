import { createLogger } from '../common/logger.js';
import { PlanErrorKind, planError } from '../common/errors.js';
import type {
	AggregateFunc,
	AggregateFunctionSchema,
	ArgTypeValidator,
	FunctionRendering,
	ScalarFunc,
	ScalarFunctionSchema,
} from './function.js';
import type { ColumnType } from '../common/datatype.js';

const log = createLogger('func:registration');

/**
 * Configuration options for scalar functions
 */
interface ScalarFuncOptions {
	/** Function identifier as it appears in plans */
	name: string;
	/** Number of arguments, or -1 for a variable number */
	numArgs: number;
	/** Lower bound when numArgs is -1 (default 1) */
	minArgs?: number;
	rendering?: FunctionRendering;
	validateArgTypes?: ArgTypeValidator;
	inferReturnType: (argTypes: readonly ColumnType[]) => ColumnType;
}

/**
 * Configuration options for aggregate functions
 */
interface AggregateFuncOptions {
	name: string;
	validateArgType?: (argType: ColumnType) => string | undefined;
	inferReturnType: (argType: ColumnType) => ColumnType;
}

/**
 * Creates a function schema for a scalar function.
 *
 * @param options Configuration options for the function
 * @param jsFunc The reference implementation, used by the group-operator evaluator
 */
export function createScalarFunction(options: ScalarFuncOptions, jsFunc: ScalarFunc): ScalarFunctionSchema {
	const variadic = options.numArgs < 0;
	return {
		name: options.name,
		minArgs: variadic ? (options.minArgs ?? 1) : options.numArgs,
		maxArgs: variadic ? -1 : options.numArgs,
		rendering: options.rendering ?? { style: 'call' },
		validateArgTypes: options.validateArgTypes ?? (() => undefined),
		inferReturnType: options.inferReturnType,
		implementation: jsFunc,
	};
}

/**
 * Creates a function schema for an aggregate function.
 */
export function createAggregateFunction(options: AggregateFuncOptions, jsFunc: AggregateFunc): AggregateFunctionSchema {
	return {
		name: options.name,
		validateArgType: options.validateArgType ?? (() => undefined),
		inferReturnType: options.inferReturnType,
		implementation: jsFunc,
	};
}

/**
 * Function identifiers known to a construction. Lookups are by exact name.
 */
export class FunctionRegistry {
	private readonly scalars = new Map<string, ScalarFunctionSchema>();
	private readonly aggregates = new Map<string, AggregateFunctionSchema>();

	registerScalar(schema: ScalarFunctionSchema): this {
		if (this.scalars.has(schema.name)) {
			planError(PlanErrorKind.DuplicateDefinition, `Scalar function ${schema.name} is already registered`, { name: schema.name });
		}
		this.scalars.set(schema.name, schema);
		log('Registered scalar function %s', schema.name);
		return this;
	}

	registerAggregate(schema: AggregateFunctionSchema): this {
		if (this.aggregates.has(schema.name)) {
			planError(PlanErrorKind.DuplicateDefinition, `Aggregate function ${schema.name} is already registered`, { name: schema.name });
		}
		this.aggregates.set(schema.name, schema);
		log('Registered aggregate function %s', schema.name);
		return this;
	}

	getScalar(name: string): ScalarFunctionSchema | undefined {
		return this.scalars.get(name);
	}

	getAggregate(name: string): AggregateFunctionSchema | undefined {
		return this.aggregates.get(name);
	}

	/** Copy of this registry that can be extended without touching the original. */
	clone(): FunctionRegistry {
		const copy = new FunctionRegistry();
		for (const schema of this.scalars.values()) copy.registerScalar(schema);
		for (const schema of this.aggregates.values()) copy.registerAggregate(schema);
		return copy;
	}
}
