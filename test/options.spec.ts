import { expect } from 'chai';
import { EXPLAIN_TYPES, PLAN_JOINS, PlannerOptionsManager, type OptionChangeEvent } from '../src/core/options.js';
import { PlanErrorKind } from '../src/common/errors.js';
import { expectPlanError } from './helpers.js';

describe('PlannerOptionsManager', () => {
	it('starts from the defaults', () => {
		expect(new PlannerOptionsManager().getAllOptions()).to.deep.equal({
			plan_joins: true,
			explain_demand: true,
			explain_types: false,
		});
	});

	it('applies a config record', () => {
		const options = new PlannerOptionsManager({ plan_joins: false, explain_types: true });
		expect(options.getOption(PLAN_JOINS)).to.equal(false);
		expect(options.getOption(EXPLAIN_TYPES)).to.equal(true);
	});

	it('resolves aliases and keys case-insensitively', () => {
		const options = new PlannerOptionsManager();
		options.setOption('typed', 'on');
		options.setOption('PLAN_JOINS', 0);
		expect(options.getOption('explain_types')).to.equal(true);
		expect(options.getOption('planjoins')).to.equal(false);
	});

	it('rejects unknown options and unconvertible values', () => {
		const options = new PlannerOptionsManager();
		expectPlanError(() => options.setOption('fast_mode', true), PlanErrorKind.InvalidArgument);
		expectPlanError(() => options.getOption('fast_mode'), PlanErrorKind.InvalidArgument);
		expectPlanError(() => options.setOption(PLAN_JOINS, 'maybe'), PlanErrorKind.InvalidArgument);
	});

	it('registers further switches and rejects duplicates', () => {
		const options = new PlannerOptionsManager();
		options.registerOption('trace_rules', { defaultValue: false, aliases: ['trace'] });
		options.setOption('TRACE', 'yes');
		expect(options.getOption('trace_rules')).to.equal(true);
		expectPlanError(() => options.registerOption(PLAN_JOINS, { defaultValue: false }), PlanErrorKind.Internal);
		expectPlanError(() => options.registerOption('trace_all', { defaultValue: false, aliases: ['typed'] }), PlanErrorKind.Internal);
	});

	it('notifies a listener on change only', () => {
		const options = new PlannerOptionsManager();
		const events: OptionChangeEvent[] = [];
		options.onChange(EXPLAIN_TYPES, event => events.push(event));
		options.setOption(EXPLAIN_TYPES, true);
		options.setOption(EXPLAIN_TYPES, 'yes');
		options.setOption(EXPLAIN_TYPES, false);
		expect(events).to.deep.equal([
			{ key: 'explain_types', oldValue: false, newValue: true },
			{ key: 'explain_types', oldValue: true, newValue: false },
		]);
	});
});
