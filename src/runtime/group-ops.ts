import { createLogger } from '../common/logger.js';
import { PlanErrorKind, planError } from '../common/errors.js';
import type { RowSchema } from '../common/datatype.js';
import type { Datum, Row } from '../common/types.js';
import type { FunctionRegistry } from '../func/registration.js';
import type { ReduceNode, TopKNode } from '../planner/nodes/relation.js';
import { compareDatums, datumKey, rowKey } from '../util/comparison.js';
import { checkResultRange, evaluateScalar } from './scalar.js';

const log = createLogger('runtime:group');

export type ReduceParams = Pick<ReduceNode, 'groupKey' | 'aggregates'>;
export type TopKParams = Pick<TopKNode, 'groupKey' | 'order' | 'limit' | 'offset'>;

interface Group<T> {
	readonly key: Row;
	readonly members: T[];
}

/** Partition items by key, groups in order of first appearance. */
function groupBy<T>(items: readonly T[], keyOf: (item: T) => Row): Group<T>[] {
	const groups = new Map<string, Group<T>>();
	for (const item of items) {
		const key = keyOf(item);
		const id = rowKey(key);
		let group = groups.get(id);
		if (!group) {
			group = { key, members: [] };
			groups.set(id, group);
		}
		group.members.push(item);
	}
	return [...groups.values()];
}

function distinctValues(values: readonly Datum[]): Datum[] {
	const seen = new Set<string>();
	return values.filter(value => {
		const id = datumKey(value);
		if (seen.has(id)) return false;
		seen.add(id);
		return true;
	});
}

/**
 * Reduce a multiset of rows: one output row per distinct group key (in order
 * of first appearance), holding the key values followed by each aggregate.
 * With no aggregates this is Distinct over the group key. Given the input
 * schema, key and aggregate results are range-checked against their types.
 */
export function evaluateReduce(params: ReduceParams, rows: readonly Row[], functions: FunctionRegistry, inputSchema?: RowSchema): Row[] {
	const aggregates = params.aggregates.map(agg => {
		const schema = functions.getAggregate(agg.func);
		if (!schema) {
			return planError(PlanErrorKind.UnknownFunction, `Unknown aggregate function ${agg.func}`, { function: agg.func });
		}
		const inputType = inputSchema?.[agg.input];
		return {
			...agg,
			implementation: schema.implementation,
			resultType: inputType && schema.inferReturnType(inputType),
		};
	});

	const groups = groupBy(rows, row => params.groupKey.map(expr => evaluateScalar(expr, row, functions, inputSchema)));
	const output = groups.map(group => {
		const values = aggregates.map(agg => {
			const inputs = group.members.map(row => row[agg.input]);
			const value = agg.implementation(agg.distinct ? distinctValues(inputs) : inputs);
			return agg.resultType ? checkResultRange(value, agg.resultType, agg.func) : value;
		});
		return [...group.key, ...values];
	});

	log('Reduce: %d row(s) into %d group(s)', rows.length, output.length);
	return output;
}

/**
 * Per group (empty group key: one global group), order rows by the order
 * columns, skip `offset` rows and keep at most `limit`. Groups are emitted in
 * order of first appearance. Rows with equal sort keys have no defined
 * relative order.
 */
export function evaluateTopK(params: TopKParams, rows: readonly Row[]): Row[] {
	const compare = (a: Row, b: Row): number => {
		for (const { column, desc } of params.order) {
			const cmp = compareDatums(a[column], b[column]);
			if (cmp !== 0) return desc ? -cmp : cmp;
		}
		return 0;
	};

	const end = params.limit === undefined ? undefined : params.offset + params.limit;
	const output: Row[] = [];
	for (const group of groupBy(rows, row => params.groupKey.map(col => row[col]))) {
		const ordered = [...group.members].sort(compare);
		output.push(...ordered.slice(params.offset, end));
	}

	log('TopK: %d row(s) in, %d out', rows.length, output.length);
	return output;
}
