import { expect } from 'chai';
import { evaluateReduce, evaluateTopK } from '../src/runtime/group-ops.js';
import { evaluateScalar } from '../src/runtime/scalar.js';
import { createBuiltinRegistry } from '../src/func/builtins/index.js';
import { call, column, literal } from '../src/planner/nodes/scalar.js';
import { ScalarType, columnType } from '../src/common/datatype.js';
import { PlanErrorKind } from '../src/common/errors.js';
import type { Row } from '../src/common/types.js';
import { expectPlanError } from './helpers.js';

describe('Group operators', () => {
	const functions = createBuiltinRegistry();
	const int64 = columnType(ScalarType.Int64);

	describe('evaluateReduce', () => {
		const rows: Row[] = [[1n, 10n], [2n, 5n], [1n, 10n], [1n, null], [2n, 7n]];

		it('aggregates each group in order of first appearance', () => {
			const out = evaluateReduce({
				groupKey: [column(0)],
				aggregates: [
					{ func: 'sum', input: 1, distinct: false },
					{ func: 'count', input: 1, distinct: true },
				],
			}, rows, functions);
			expect(out).to.deep.equal([[1n, 20n, 1n], [2n, 12n, 2n]]);
		});

		it('acts as Distinct without aggregates', () => {
			const out = evaluateReduce({ groupKey: [column(1)], aggregates: [] }, rows, functions);
			expect(out).to.deep.equal([[10n], [5n], [null], [7n]]);
		});

		it('groups by computed keys', () => {
			const out = evaluateReduce({
				groupKey: [call('mod', [column(1), literal(2n, int64)])],
				aggregates: [{ func: 'max', input: 0, distinct: false }],
			}, [[1n, 4n], [2n, 3n], [3n, 6n]], functions);
			expect(out).to.deep.equal([[0n, 3n], [1n, 2n]]);
		});

		it('yields null for an aggregate over only nulls', () => {
			const out = evaluateReduce({
				groupKey: [],
				aggregates: [
					{ func: 'min', input: 0, distinct: false },
					{ func: 'count', input: 0, distinct: false },
				],
			}, [[null], [null]], functions);
			expect(out).to.deep.equal([[null, 0n]]);
		});

		it('raises when a sum overflows its input type', () => {
			const params = { groupKey: [], aggregates: [{ func: 'sum', input: 0, distinct: false }] };
			const input: Row[] = [[2n ** 31n - 1n], [1n]];
			const err = expectPlanError(
				() => evaluateReduce(params, input, functions, [columnType(ScalarType.Int32)]),
				PlanErrorKind.Evaluation
			);
			expect(err.message).to.equal('sum: 2147483648 overflows int32');
			expect(evaluateReduce(params, input, functions, [int64])).to.deep.equal([[2n ** 31n]]);
		});

		it('produces no rows for empty input', () => {
			expect(evaluateReduce({ groupKey: [], aggregates: [] }, [], functions)).to.deep.equal([]);
		});

		it('raises evaluation errors from key expressions', () => {
			expectPlanError(
				() => evaluateReduce({ groupKey: [call('div', [column(0), literal(0n, int64)])], aggregates: [] }, [[1n]], functions),
				PlanErrorKind.Evaluation
			);
		});
	});

	describe('evaluateTopK', () => {
		const rows: Row[] = [[5n, 'a'], [2n, 'a'], [4n, 'b'], [3n, 'a'], [9n, 'b'], [7n, 'a']];

		it('keeps the first rows of each group', () => {
			const out = evaluateTopK({ groupKey: [1], order: [{ column: 0, desc: false }], limit: 3, offset: 0 }, rows);
			expect(out).to.deep.equal([[2n, 'a'], [3n, 'a'], [5n, 'a'], [4n, 'b'], [9n, 'b']]);
		});

		it('applies offset before limit', () => {
			const out = evaluateTopK({ groupKey: [1], order: [{ column: 0, desc: true }], limit: 1, offset: 1 }, rows);
			expect(out).to.deep.equal([[5n, 'a'], [4n, 'b']]);
		});

		it('treats an empty group key as one group', () => {
			const out = evaluateTopK({ groupKey: [], order: [{ column: 0, desc: false }], limit: 2, offset: 0 }, rows);
			expect(out).to.deep.equal([[2n, 'a'], [3n, 'a']]);
		});

		it('places nulls last ascending and first descending', () => {
			const input: Row[] = [[1n], [null], [3n]];
			expect(evaluateTopK({ groupKey: [], order: [{ column: 0, desc: false }], limit: undefined, offset: 0 }, input))
				.to.deep.equal([[1n], [3n], [null]]);
			expect(evaluateTopK({ groupKey: [], order: [{ column: 0, desc: true }], limit: 2, offset: 0 }, input))
				.to.deep.equal([[null], [3n]]);
		});

		it('orders NaN above every other number', () => {
			const input: Row[] = [[3], [NaN], [1], [null], [2]];
			expect(evaluateTopK({ groupKey: [], order: [{ column: 0, desc: false }], limit: undefined, offset: 0 }, input))
				.to.deep.equal([[1], [2], [3], [NaN], [null]]);
			expect(evaluateTopK({ groupKey: [], order: [{ column: 0, desc: true }], limit: 3, offset: 1 }, input))
				.to.deep.equal([[NaN], [3], [2]]);
		});

		it('returns everything past the offset when unbounded', () => {
			const out = evaluateTopK({ groupKey: [], order: [{ column: 0, desc: false }], limit: undefined, offset: 4 }, rows);
			expect(out).to.deep.equal([[7n, 'a'], [9n, 'b']]);
		});

		it('breaks ties on later order columns', () => {
			const input: Row[] = [[1n, 'b'], [0n, 'z'], [1n, 'a']];
			const out = evaluateTopK({ groupKey: [], order: [{ column: 0, desc: true }, { column: 1, desc: false }], limit: 2, offset: 0 }, input);
			expect(out).to.deep.equal([[1n, 'a'], [1n, 'b']]);
		});

		it('keeps nothing with a zero limit', () => {
			expect(evaluateTopK({ groupKey: [1], order: [], limit: 0, offset: 0 }, rows)).to.deep.equal([]);
		});
	});

	describe('evaluateScalar', () => {
		it('evaluates nested calls with three-valued logic', () => {
			const expr = call('and', [call('gt', [column(0), literal(1n, int64)]), call('isnull', [column(1)])]);
			expect(evaluateScalar(expr, [2n, null], functions)).to.equal(true);
			expect(evaluateScalar(expr, [0n, null], functions)).to.equal(false);
			expect(evaluateScalar(expr, [null, null], functions)).to.equal(null);
		});

		it('promotes mixed integer and float arithmetic to float', () => {
			expect(evaluateScalar(call('add', [column(0), column(1)]), [1n, 0.5], functions)).to.equal(1.5);
		});
	});
});
