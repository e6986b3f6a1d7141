import type { ColumnRef, NodeId } from '../common/types.js';
import { createLogger } from '../common/logger.js';

const log = createLogger('planner:arrangements');

/**
 * The relation an arrangement indexes. Lets, views and ArrangeBy are looked
 * through, so every consumer of the same underlying relation lands on the
 * same target.
 */
export type ArrangementTarget =
	| { readonly type: 'source'; readonly name: string }
	| { readonly type: 'node'; readonly node: NodeId };

/** Who asked for an arrangement. */
export type ArrangementConsumer =
	| { readonly kind: 'arrange_by'; readonly node: NodeId }
	| { readonly kind: 'join'; readonly node: NodeId; readonly rule: number; readonly step: number }
	| { readonly kind: 'reduce'; readonly node: NodeId }
	| { readonly kind: 'top_k'; readonly node: NodeId };

export interface ArrangementEntry {
	/** Sequential in first-request order */
	readonly id: number;
	readonly target: ArrangementTarget;
	readonly key: readonly ColumnRef[];
}

export function targetKey(target: ArrangementTarget): string {
	return target.type === 'source' ? `source:${target.name}` : `node:${target.node}`;
}

function keySetKey(key: readonly ColumnRef[]): string {
	return key.join(',');
}

/** Read-only access to the arrangements of a finished plan. */
export interface ArrangementLookup {
	/** Every entry, in first-request order. */
	entries(): readonly ArrangementEntry[];
	/** Entries for one relation, in first-request order. */
	entriesFor(target: ArrangementTarget): readonly ArrangementEntry[];
	consumersOf(entry: ArrangementEntry | number): readonly ArrangementConsumer[];
	readonly size: number;
}

/**
 * Deduplicates the key-sets requested for indexed access to each relation.
 * Entries and consumer lists are kept in request order; Map iteration order
 * is insertion order, which keeps enumeration deterministic.
 */
export class ArrangementRegistry implements ArrangementLookup {
	private readonly entryList: ArrangementEntry[] = [];
	private readonly byTarget = new Map<string, Map<string, ArrangementEntry>>();
	private readonly consumerLists = new Map<number, ArrangementConsumer[]>();

	/**
	 * Record a request, returning the shared entry for (target, key).
	 */
	request(target: ArrangementTarget, key: readonly ColumnRef[], consumer: ArrangementConsumer): ArrangementEntry {
		const tKey = targetKey(target);
		let keys = this.byTarget.get(tKey);
		if (!keys) {
			keys = new Map();
			this.byTarget.set(tKey, keys);
		}

		const kKey = keySetKey(key);
		let entry = keys.get(kKey);
		if (!entry) {
			entry = { id: this.entryList.length, target, key: [...key] };
			keys.set(kKey, entry);
			this.entryList.push(entry);
			this.consumerLists.set(entry.id, []);
			log('New arrangement %d on %s keyed (%s)', entry.id, tKey, kKey);
		} else {
			log('Reusing arrangement %d on %s keyed (%s) for %s', entry.id, tKey, kKey, consumer.kind);
		}
		this.consumerLists.get(entry.id)?.push(consumer);
		return entry;
	}

	entries(): readonly ArrangementEntry[] {
		return [...this.entryList];
	}

	entriesFor(target: ArrangementTarget): readonly ArrangementEntry[] {
		const keys = this.byTarget.get(targetKey(target));
		return keys ? [...keys.values()] : [];
	}

	consumersOf(entry: ArrangementEntry | number): readonly ArrangementConsumer[] {
		const id = typeof entry === 'number' ? entry : entry.id;
		return [...(this.consumerLists.get(id) ?? [])];
	}

	get size(): number {
		return this.entryList.length;
	}

	/** A frozen lookup over this registry; it offers no way to add requests. */
	lookup(): ArrangementLookup {
		const sizeOf = () => this.size;
		return Object.freeze({
			entries: () => this.entries(),
			entriesFor: (target: ArrangementTarget) => this.entriesFor(target),
			consumersOf: (entry: ArrangementEntry | number) => this.consumersOf(entry),
			get size() {
				return sizeOf();
			},
		});
	}
}
