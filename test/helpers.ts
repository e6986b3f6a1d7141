import { expect } from 'chai';
import { PlanError, type PlanErrorKind } from '../src/common/errors.js';

/**
 * Run `fn`, assert it throws a PlanError of `kind`, and return the error.
 */
export function expectPlanError(fn: () => unknown, kind: PlanErrorKind): PlanError {
	try {
		fn();
	} catch (error) {
		expect(error).to.be.instanceOf(PlanError);
		if (!(error instanceof PlanError)) throw error;
		expect(error.kind).to.equal(kind);
		return error;
	}
	return expect.fail(`Expected a ${kind} error`);
}
