import type { ColumnRef } from '../../common/types.js';

/**
 * Maps columns of a join's concatenated row back to (input, local column).
 */
export class JoinLayout {
	/** offsets[i] is the first concatenated column of input i */
	readonly offsets: readonly number[];
	readonly arity: number;

	constructor(readonly inputArities: readonly number[]) {
		const offsets: number[] = [];
		let total = 0;
		for (const a of inputArities) {
			offsets.push(total);
			total += a;
		}
		this.offsets = offsets;
		this.arity = total;
	}

	get inputCount(): number {
		return this.inputArities.length;
	}

	/** Input owning a concatenated column; columns must be < arity */
	inputOf(col: ColumnRef): number {
		let input = 0;
		for (let i = 0; i < this.offsets.length; i++) {
			if (this.inputArities[i] > 0 && this.offsets[i] <= col) input = i;
		}
		return input;
	}

	localColumn(col: ColumnRef): ColumnRef {
		return col - this.offsets[this.inputOf(col)];
	}

	globalColumn(input: number, local: ColumnRef): ColumnRef {
		return this.offsets[input] + local;
	}
}
