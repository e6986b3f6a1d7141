import { createLogger } from '../../common/logger.js';
import { PlanErrorKind, planError } from '../../common/errors.js';
import type { ColumnRef, SourceLocation } from '../../common/types.js';
import type { DeltaRule, DeltaStep } from '../nodes/relation.js';
import type { DeltaQueryDescriptor } from '../building/request.js';
import type { JoinLayout } from './layout.js';

const log = createLogger('planner:join');

/**
 * Key for probing `input` once the inputs in `bound` are available: every
 * column of `input` in every class that also holds a bound column, in class
 * order. Empty when no class connects `input` to the bound set.
 */
export function probeKey(
	input: number,
	bound: ReadonlySet<number>,
	equivalences: readonly (readonly ColumnRef[])[],
	layout: JoinLayout
): ColumnRef[] {
	const key: ColumnRef[] = [];
	for (const cls of equivalences) {
		if (!cls.some(col => bound.has(layout.inputOf(col)))) continue;
		for (const col of cls) {
			if (layout.inputOf(col) === input) {
				key.push(layout.localColumn(col));
			}
		}
	}
	return key;
}

/**
 * Build one delta rule per input. Starting from the changed input, each step
 * probes the unvisited input with the widest key over the columns bound so
 * far (lowest input index on ties). A step without any key would be a cross
 * product, so a disconnected constraint graph fails instead.
 */
export function planDeltaQuery(
	layout: JoinLayout,
	equivalences: readonly (readonly ColumnRef[])[],
	loc?: SourceLocation
): DeltaRule[] {
	const rules: DeltaRule[] = [];
	for (let source = 0; source < layout.inputCount; source++) {
		const bound = new Set<number>([source]);
		const steps: DeltaStep[] = [];

		while (bound.size < layout.inputCount) {
			let best: DeltaStep | undefined;
			for (let input = 0; input < layout.inputCount; input++) {
				if (bound.has(input)) continue;
				const key = probeKey(input, bound, equivalences, layout);
				if (key.length > 0 && (!best || key.length > best.key.length)) {
					best = { input, key };
				}
			}

			if (!best) {
				const unreachable: number[] = [];
				for (let input = 0; input < layout.inputCount; input++) {
					if (!bound.has(input)) unreachable.push(input);
				}
				return planError(
					PlanErrorKind.NoValidJoinStrategy,
					`Join has no valid incremental strategy: a change to input ${source} cannot reach input(s) ${unreachable.join(', ')} through equality constraints`,
					{ input: source, unreachable },
					loc
				);
			}

			steps.push(best);
			bound.add(best.input);
		}

		log('Delta rule for input %d: %s', source, steps.map(s => `${s.input}(${s.key.join(',')})`).join(' '));
		rules.push({ source, steps });
	}
	return rules;
}

/**
 * Check a caller-supplied delta query: one rule per input in input order,
 * each visiting every other input once, each step keyed on columns that are
 * constrained equal to columns already bound.
 */
export function validateDeltaQuery(
	descriptor: DeltaQueryDescriptor,
	layout: JoinLayout,
	equivalences: readonly (readonly ColumnRef[])[],
	loc?: SourceLocation
): DeltaRule[] {
	const n = layout.inputCount;
	if (descriptor.rules.length !== n) {
		planError(
			PlanErrorKind.NoValidJoinStrategy,
			`Delta query supplies ${descriptor.rules.length} rule(s) for a join of ${n} input(s)`,
			{ rules: descriptor.rules.length, inputs: n },
			loc
		);
	}

	return descriptor.rules.map((path, source): DeltaRule => {
		const bound = new Set<number>([source]);
		const steps = path.map((step, stepIndex): DeltaStep => {
			const { input, key } = step;
			if (!Number.isInteger(input) || input < 0 || input >= n || bound.has(input)) {
				planError(
					PlanErrorKind.NoValidJoinStrategy,
					`Delta rule for input ${source} step ${stepIndex} probes input ${input}, which is out of range or already bound`,
					{ input: source, step: stepIndex, probe: input },
					loc
				);
			}
			if (key.length === 0) {
				planError(
					PlanErrorKind.NoValidJoinStrategy,
					`Delta rule for input ${source} probes input ${input} without a key`,
					{ input: source, step: stepIndex, probe: input },
					loc
				);
			}
			for (const col of key) {
				if (!Number.isInteger(col) || col < 0 || col >= layout.inputArities[input]) {
					planError(
						PlanErrorKind.ColumnOutOfRange,
						`Delta rule for input ${source} keys input ${input} on #${col}, outside its arity ${layout.inputArities[input]}`,
						{ input: source, step: stepIndex, column: col },
						loc
					);
				}
				const global = layout.globalColumn(input, col);
				const constrained = equivalences.some(cls =>
					cls.includes(global) && cls.some(other => bound.has(layout.inputOf(other))));
				if (!constrained) {
					planError(
						PlanErrorKind.NoValidJoinStrategy,
						`Delta rule for input ${source} keys input ${input} on #${col}, which is not constrained to any bound column`,
						{ input: source, step: stepIndex, column: col },
						loc
					);
				}
			}
			bound.add(input);
			return { input, key: [...key] };
		});

		if (bound.size !== n) {
			planError(
				PlanErrorKind.NoValidJoinStrategy,
				`Delta rule for input ${source} visits ${bound.size - 1} of ${n - 1} other input(s)`,
				{ input: source },
				loc
			);
		}
		return { source, steps };
	});
}
