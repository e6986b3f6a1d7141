import { expect } from 'chai';
import { buildPlanFromText } from '../src/parser/index.js';
import { buildPlan } from '../src/planner/building/builder.js';
import { explainPlan } from '../src/core/explain.js';
import type { PlannerConfig } from '../src/core/options.js';
import { ScalarType, columnType } from '../src/common/datatype.js';

function explain(text: string, config?: PlannerConfig): string {
	return explainPlan(buildPlanFromText(text, config), config);
}

const lines = (...l: string[]) => l.join('\n');

describe('Explain', () => {
	it('renders a constant as one block', () => {
		expect(explain('(constant [[1 2 3] [4 5 6]] [int64 int64 int64])')).to.equal(lines(
			'%0 =',
			'| Constant (1, 2, 3) (4, 5, 6)',
		));
	});

	it('renders an empty constant without rows', () => {
		expect(explain('(constant [] [int64])')).to.equal('%0 =\n| Constant');
	});

	it('renders literal values', () => {
		expect(explain('(constant [[1.5 2 "a\\"b" true null]] [float64 float64 string bool int64?])')).to.equal(lines(
			'%0 =',
			'| Constant (1.5, 2.0, "a\\"b", true, null)',
		));
	});

	it('renders a Let value once and references it by label', () => {
		expect(explain('(let x (constant [[1]] [int64]) (get x))')).to.equal(lines(
			'%0 = Let l0 =',
			'| Constant (1)',
			'',
			'%1 =',
			'| Get %0 (l0)',
		));
	});

	it('appends operators above a Let to the body block', () => {
		const text = `
			(defsource x [int64])
			(map (let t (get x) (get t)) [(lit 1 int64)])`;
		expect(explain(text)).to.equal(lines(
			'%0 = Let l0 =',
			'| Get x',
			'',
			'%1 =',
			'| Get %0 (l0)',
			'| Map 1',
		));
	});

	it('numbers nested Let labels in emission order', () => {
		const text = `
			(defsource x [int64])
			(let a (get x) (let b (negate (get a)) (union [(get a) (get b)])))`;
		expect(explain(text)).to.equal(lines(
			'%0 = Let l0 =',
			'| Get x',
			'',
			'%1 = Let l1 =',
			'| Get %0 (l0)',
			'| Negate',
			'',
			'%2 =',
			'| Get %0 (l0)',
			'',
			'%3 =',
			'| Get %1 (l1)',
			'',
			'%4 =',
			'| Union %2 %3',
		));
	});

	it('labels a Let nested in a Let value before the outer one', () => {
		const text = `
			(defsource x [int64])
			(let a (let b (get x) (get b)) (get a))`;
		expect(explain(text)).to.equal(lines(
			'%0 = Let l0 =',
			'| Get x',
			'',
			'%1 = Let l1 =',
			'| Get %0 (l0)',
			'',
			'%2 =',
			'| Get %1 (l1)',
		));
	});

	it('keeps a chain of single-input operators in one block', () => {
		const text = `
			(defsource y [int64 int64 string])
			(filter (map (get y) [(add #0 #1)]) [(gt #3 (lit 10 int64))])`;
		expect(explain(text)).to.equal(lines(
			'%0 =',
			'| Get y',
			'| Map (#0 + #1)',
			'| Filter (#3 > 10)',
		));
	});

	it('renders ArrangeBy key-sets deduplicated, preserving repeated columns', () => {
		const text = `
			(defsource x [int64 int64])
			(arrange_by (get x) [[#0 #0] [#1] [#0 #0]])`;
		expect(explain(text)).to.equal(lines(
			'%0 =',
			'| Get x',
			'| ArrangeBy (#0, #0) (#1)',
		));
	});

	describe('Join', () => {
		const twoWay = `
			(defsource x [int64 int64])
			(join [(get x) (get x)] [[#0 #3]] (demand [#0 #3]))`;

		it('renders a two-way equijoin with one delta rule per input', () => {
			expect(explain(twoWay)).to.equal(lines(
				'%0 =',
				'| Get x',
				'',
				'%1 =',
				'| Get x',
				'',
				'%2 =',
				'| Join %0 %1 (= #0 #3)',
				'| | implementation = DeltaQuery',
				'| |   delta %0 %1.(#1)',
				'| |   delta %1 %0.(#0)',
				'| | demand = (#0, #3)',
			));
		});

		it('omits demand when disabled', () => {
			expect(explain(twoWay, { explain_demand: false })).to.equal(lines(
				'%0 =',
				'| Get x',
				'',
				'%1 =',
				'| Get x',
				'',
				'%2 =',
				'| Join %0 %1 (= #0 #3)',
				'| | implementation = DeltaQuery',
				'| |   delta %0 %1.(#1)',
				'| |   delta %1 %0.(#0)',
			));
		});

		it('leaves joins unplanned when planning is off', () => {
			expect(explain(twoWay, { plan_joins: false })).to.equal(lines(
				'%0 =',
				'| Get x',
				'',
				'%1 =',
				'| Get x',
				'',
				'%2 =',
				'| Join %0 %1 (= #0 #3)',
				'| | implementation = Unplanned',
				'| | demand = (#0, #3)',
			));
		});

		it('renders a three-way chain join', () => {
			const text = `
				(defsource a [int64 int64])
				(defsource b [int64 int64])
				(defsource c [int64 int64])
				(join [(get a) (get b) (get c)] [[#1 #2] [#3 #4]])`;
			expect(explain(text)).to.equal(lines(
				'%0 =',
				'| Get a',
				'',
				'%1 =',
				'| Get b',
				'',
				'%2 =',
				'| Get c',
				'',
				'%3 =',
				'| Join %0 %1 %2 (= #1 #2) (= #3 #4)',
				'| | implementation = DeltaQuery',
				'| |   delta %0 %1.(#0) %2.(#0)',
				'| |   delta %1 %0.(#1) %2.(#0)',
				'| |   delta %2 %1.(#1) %0.(#1)',
			));
		});

		it('produces identical text for reordered constraints', () => {
			const a = explain(`
				(defsource x [int64 int64])
				(join [(get x) (get x) (get x)] [[#0 #2] [#4 #2]])`);
			const b = explain(`
				(defsource x [int64 int64])
				(join [(get x) (get x) (get x)] [[#2 #4] [#2 #0]])`);
			expect(a).to.equal(b);
			expect(a.split('\n')[10]).to.equal('| Join %0 %1 %2 (= #0 #2 #4)');
		});
	});

	describe('group operators', () => {
		const source = '(defsource y [int64 int64 int64])';

		it('renders an empty aggregate list as Distinct', () => {
			expect(explain(`${source} (distinct (get y) [#2])`)).to.equal(lines(
				'%0 =',
				'| Get y',
				'| Distinct group=(#2)',
			));
		});

		it('renders Reduce with one line per aggregate', () => {
			expect(explain(`${source} (reduce (get y) [#0] [(sum #1) (count #2 distinct)])`)).to.equal(lines(
				'%0 =',
				'| Get y',
				'| Reduce group=(#0)',
				'| | agg sum(#1)',
				'| | agg count(distinct #2)',
			));
		});

		it('renders TopK parameters', () => {
			expect(explain(`${source} (top_k (get y) [#1] [#0] 5 1)`)).to.equal(lines(
				'%0 =',
				'| Get y',
				'| TopK group=(#1) order=(#0 asc) limit=5 offset=1',
			));
		});

		it('omits an unbounded TopK limit', () => {
			expect(explain(`${source} (top_k (get y) [] [(#2 desc) #0] null 2)`)).to.equal(lines(
				'%0 =',
				'| Get y',
				'| TopK group=() order=(#2 desc, #0 asc) offset=2',
			));
		});
	});

	it('renders scalar call styles', () => {
		const text = `
			(defsource x [bool bool bool int64?])
			(map (get x) [(and #0 #1 #2) (not #0) (isnull #3) (cast_int64_to_float64 #3) (neg #3)])`;
		expect(explain(text).split('\n')[2]).to.equal(
			'| Map (#0 && #1 && #2), !#0, isnull(#3), cast_int64_to_float64(#3), -#3'
		);
	});

	it('appends types after each operator when enabled', () => {
		const text = `
			(defsource x [int64 int64?])
			(project (get x) [#1])`;
		expect(explain(text, { explain_types: true })).to.equal(lines(
			'%0 =',
			'| Get x',
			'| | types = (int64, int64?)',
			'| Project (#1)',
			'| | types = (int64?)',
		));
	});

	it('continues block numbering across results', () => {
		expect(explain('(defsource x [int64]) (get x) (negate (get x))')).to.equal(lines(
			'%0 =',
			'| Get x',
			'',
			'%1 =',
			'| Get x',
			'| Negate',
		));
	});

	it('labels named view results and references them by name', () => {
		const text = `
			(defsource x [int64])
			(defview v (filter (get x) [(eq #0 1)]))
			(map (get v) [(neg #0)])`;
		expect(explain(text)).to.equal(lines(
			'%0 = View v =',
			'| Get x',
			'| Filter (#0 = 1)',
			'',
			'%1 =',
			'| Get v',
			'| Map -#0',
		));
	});

	it('describes a view before a result that reads it ahead of its definition', () => {
		const text = `
			(defsource x [int64])
			(get v)
			(defview v (filter (get x) [(gt #0 1)]))`;
		expect(explain(text)).to.equal(lines(
			'%0 = View v =',
			'| Get x',
			'| Filter (#0 > 1)',
			'',
			'%1 =',
			'| Get v',
		));
	});

	it('renders Union inputs as preceding blocks', () => {
		const text = '(defsource x [int64]) (threshold (union [(get x) (negate (get x))]))';
		expect(explain(text)).to.equal(lines(
			'%0 =',
			'| Get x',
			'',
			'%1 =',
			'| Get x',
			'| Negate',
			'',
			'%2 =',
			'| Union %0 %1',
			'| Threshold',
		));
	});

	it('is empty for a request with only declarations', () => {
		expect(explain('(defsource x [int64])')).to.equal('');
	});

	it('is byte-identical across runs and builds', () => {
		const request = {
			forms: [
				{ type: 'source' as const, name: 'x', columns: [columnType(ScalarType.Int64), columnType(ScalarType.Int64)] },
				{
					type: 'query' as const,
					expr: {
						op: 'join' as const,
						inputs: [{ op: 'get' as const, name: 'x' }, { op: 'get' as const, name: 'x' }],
						equivalences: [[3, 0]],
						demand: [3, 0, 3],
					},
				},
			],
		};
		const graph = buildPlan(request);
		const first = explainPlan(graph);
		expect(explainPlan(graph)).to.equal(first);
		expect(explainPlan(buildPlan(request))).to.equal(first);
		expect(first.split('\n').slice(-1)[0]).to.equal('| | demand = (#0, #3)');
	});
});
