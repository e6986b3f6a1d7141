import { expect } from 'chai';
import { JoinLayout } from '../src/planner/join/layout.js';
import { canonicalizeEquivalences } from '../src/planner/join/equivalences.js';
import { planDeltaQuery, probeKey, validateDeltaQuery } from '../src/planner/join/delta-query.js';
import { PlanErrorKind } from '../src/common/errors.js';
import { buildPlanFromText } from '../src/parser/index.js';
import { RelationKind } from '../src/planner/nodes/relation.js';
import { expectPlanError } from './helpers.js';

describe('Join planner', () => {
	describe('JoinLayout', () => {
		it('maps concatenated columns to inputs', () => {
			const layout = new JoinLayout([2, 0, 3]);
			expect(layout.arity).to.equal(5);
			expect(layout.offsets).to.deep.equal([0, 2, 2]);
			expect(layout.inputOf(1)).to.equal(0);
			expect(layout.inputOf(2)).to.equal(2);
			expect(layout.localColumn(4)).to.equal(2);
			expect(layout.globalColumn(2, 1)).to.equal(3);
		});
	});

	describe('canonicalizeEquivalences', () => {
		const layout = new JoinLayout([2, 2, 2]);

		it('sorts members, merges overlapping classes and orders classes', () => {
			expect(canonicalizeEquivalences([[3, 0], [2, 1], [1, 4]], layout)).to.deep.equal([[0, 3], [1, 2, 4]]);
		});

		it('drops duplicate members', () => {
			expect(canonicalizeEquivalences([[2, 0, 2]], layout)).to.deep.equal([[0, 2]]);
		});

		it('rejects a class within one input', () => {
			const err = expectPlanError(() => canonicalizeEquivalences([[0, 1]], layout), PlanErrorKind.MalformedConstraint);
			expect(err.message).to.equal('Join constraint 0 (#0 = #1) must reference columns of at least two inputs');
		});

		it('rejects a column beyond the join arity', () => {
			const err = expectPlanError(() => canonicalizeEquivalences([[0, 6]], layout), PlanErrorKind.MalformedConstraint);
			expect(err.detail).to.deep.equal({ constraint: 0, column: 6, arity: 6 });
		});
	});

	describe('planDeltaQuery', () => {
		it('gives a single input one rule without steps', () => {
			expect(planDeltaQuery(new JoinLayout([3]), [])).to.deep.equal([{ source: 0, steps: [] }]);
		});

		it('probes the other input of a two-way join on the equated column', () => {
			const layout = new JoinLayout([2, 2]);
			expect(planDeltaQuery(layout, [[0, 3]])).to.deep.equal([
				{ source: 0, steps: [{ input: 1, key: [1] }] },
				{ source: 1, steps: [{ input: 0, key: [0] }] },
			]);
		});

		it('prefers the widest key, then the lowest input', () => {
			const layout = new JoinLayout([2, 2, 2]);
			// a.0 = b.0 = c.0, a.1 = c.1
			expect(planDeltaQuery(layout, [[0, 2, 4], [1, 5]])).to.deep.equal([
				{ source: 0, steps: [{ input: 2, key: [0, 1] }, { input: 1, key: [0] }] },
				{ source: 1, steps: [{ input: 0, key: [0] }, { input: 2, key: [0, 1] }] },
				{ source: 2, steps: [{ input: 0, key: [0, 1] }, { input: 1, key: [0] }] },
			]);
		});

		it('visits every other input exactly once', () => {
			const layout = new JoinLayout([1, 1, 1, 1]);
			const rules = planDeltaQuery(layout, [[0, 1], [1, 2], [2, 3]]);
			expect(rules).to.have.length(4);
			for (const rule of rules) {
				const visited = rule.steps.map(s => s.input).sort();
				expect(visited).to.deep.equal([0, 1, 2, 3].filter(i => i !== rule.source));
			}
		});

		it('fails on a disconnected constraint graph', () => {
			const layout = new JoinLayout([2, 2, 2]);
			const err = expectPlanError(() => planDeltaQuery(layout, [[0, 2]]), PlanErrorKind.NoValidJoinStrategy);
			expect(err.detail).to.deep.equal({ input: 0, unreachable: [2] });
		});

		it('computes probe keys from bound columns only', () => {
			const layout = new JoinLayout([2, 2, 2]);
			const classes = [[1, 2], [3, 4]];
			expect(probeKey(2, new Set([0]), classes, layout)).to.deep.equal([]);
			expect(probeKey(2, new Set([0, 1]), classes, layout)).to.deep.equal([0]);
		});
	});

	describe('validateDeltaQuery', () => {
		const layout = new JoinLayout([2, 2]);
		const classes = [[0, 3]];

		it('accepts a consistent descriptor', () => {
			const rules = validateDeltaQuery(
				{ type: 'delta_query', rules: [[{ input: 1, key: [1] }], [{ input: 0, key: [0] }]] },
				layout,
				classes
			);
			expect(rules).to.deep.equal([
				{ source: 0, steps: [{ input: 1, key: [1] }] },
				{ source: 1, steps: [{ input: 0, key: [0] }] },
			]);
		});

		it('rejects a missing rule', () => {
			expectPlanError(
				() => validateDeltaQuery({ type: 'delta_query', rules: [[{ input: 1, key: [1] }]] }, layout, classes),
				PlanErrorKind.NoValidJoinStrategy
			);
		});

		it('rejects a key column that is not constrained', () => {
			const err = expectPlanError(
				() => validateDeltaQuery({ type: 'delta_query', rules: [[{ input: 1, key: [0] }], [{ input: 0, key: [0] }]] }, layout, classes),
				PlanErrorKind.NoValidJoinStrategy
			);
			expect(err.message).to.equal('Delta rule for input 0 keys input 1 on #0, which is not constrained to any bound column');
		});

		it('rejects a key column outside the probed input', () => {
			expectPlanError(
				() => validateDeltaQuery({ type: 'delta_query', rules: [[{ input: 1, key: [2] }], [{ input: 0, key: [0] }]] }, layout, classes),
				PlanErrorKind.ColumnOutOfRange
			);
		});

		it('rejects probing the changed input itself', () => {
			expectPlanError(
				() => validateDeltaQuery({ type: 'delta_query', rules: [[{ input: 0, key: [0] }], [{ input: 0, key: [0] }]] }, layout, classes),
				PlanErrorKind.NoValidJoinStrategy
			);
		});

		it('rejects an empty key', () => {
			expectPlanError(
				() => validateDeltaQuery({ type: 'delta_query', rules: [[{ input: 1, key: [] }], [{ input: 0, key: [0] }]] }, layout, classes),
				PlanErrorKind.NoValidJoinStrategy
			);
		});
	});

	describe('in construction', () => {
		it('keeps an explicit delta query', () => {
			const graph = buildPlanFromText(`
				(defsource x [int64 int64])
				(join [(get x) (get x)] [[#0 #3]] (delta_query [[[1 [#1]]] [[0 [#0]]]]))`);
			const join = graph.node(graph.results[0].root);
			expect(join.kind).to.equal(RelationKind.Join);
			if (join.kind !== RelationKind.Join) return;
			expect(join.implementation).to.deep.equal({
				type: 'delta_query',
				rules: [
					{ source: 0, steps: [{ input: 1, key: [1] }] },
					{ source: 1, steps: [{ input: 0, key: [0] }] },
				],
			});
			expect(join.demand).to.equal(undefined);
		});

		it('honours an unplanned descriptor even when planning is on', () => {
			const graph = buildPlanFromText(`
				(defsource x [int64])
				(join [(get x) (get x)] [] unplanned)`);
			const join = graph.node(graph.results[0].root);
			expect(join.kind === RelationKind.Join && join.implementation).to.deep.equal({ type: 'unplanned' });
		});

		it('rejects a cross product when planning', () => {
			expectPlanError(
				() => buildPlanFromText('(defsource x [int64]) (join [(get x) (get x)] [])'),
				PlanErrorKind.NoValidJoinStrategy
			);
		});

		it('rejects equating columns of different types', () => {
			expectPlanError(
				() => buildPlanFromText('(defsource x [int64 string]) (join [(get x) (get x)] [[#1 #2]])'),
				PlanErrorKind.TypeMismatch
			);
		});

		it('rejects a join without inputs', () => {
			expectPlanError(() => buildPlanFromText('(join [] [])'), PlanErrorKind.ArityMismatch);
		});

		it('rejects demand beyond the join arity', () => {
			expectPlanError(
				() => buildPlanFromText('(defsource x [int64]) (join [(get x) (get x)] [[#0 #1]] (demand [#2]))'),
				PlanErrorKind.ColumnOutOfRange
			);
		});
	});
});
