import { PlanErrorKind, planError } from '../../common/errors.js';
import type { ColumnRef, SourceLocation } from '../../common/types.js';
import type { JoinLayout } from './layout.js';

/**
 * Validate declared equality classes and bring them into canonical form:
 * members sorted and deduplicated, overlapping classes merged, classes
 * ordered by their smallest member. Equivalent declarations (reordered
 * classes or members) produce identical output.
 */
export function canonicalizeEquivalences(
	declared: readonly (readonly ColumnRef[])[],
	layout: JoinLayout,
	loc?: SourceLocation
): ColumnRef[][] {
	declared.forEach((cls, index) => {
		for (const col of cls) {
			if (!Number.isInteger(col) || col < 0 || col >= layout.arity) {
				planError(
					PlanErrorKind.MalformedConstraint,
					`Join constraint ${index} references #${col}, outside the join arity ${layout.arity}`,
					{ constraint: index, column: col, arity: layout.arity },
					loc
				);
			}
		}
		const inputs = new Set(cls.map(col => layout.inputOf(col)));
		if (inputs.size < 2) {
			planError(
				PlanErrorKind.MalformedConstraint,
				`Join constraint ${index} (${cls.map(c => `#${c}`).join(' = ')}) must reference columns of at least two inputs`,
				{ constraint: index, columns: cls },
				loc
			);
		}
	});

	const merged: Set<ColumnRef>[] = [];
	for (const cls of declared) {
		const combined = new Set<ColumnRef>(cls);
		for (let i = merged.length - 1; i >= 0; i--) {
			const existing = merged[i];
			if (cls.some(col => existing.has(col))) {
				for (const col of existing) combined.add(col);
				merged.splice(i, 1);
			}
		}
		merged.push(combined);
	}

	return merged
		.map(set => [...set].sort((a, b) => a - b))
		.sort((a, b) => a[0] - b[0]);
}
