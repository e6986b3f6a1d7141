import type { RowSchema } from '../common/datatype.js';
import type { NodeId } from '../common/types.js';
import { PlanErrorKind, planError } from '../common/errors.js';
import { type RelationNode, RelationKind } from './nodes/relation.js';
import type { ArrangementLookup, ArrangementTarget } from './arrangements.js';
import type { FunctionRegistry } from '../func/registration.js';

export interface SourceDefinition {
	readonly name: string;
	readonly schema: RowSchema;
}

/** A top-level result; named results are the views other forms can `Get`. */
export interface PlanResult {
	readonly name: string | undefined;
	readonly root: NodeId;
}

/**
 * A finished plan: an arena of relation nodes addressed by id, the sources
 * they read, the top-level results, and the arrangements requested while
 * building. Never modified after construction.
 */
export class PlanGraph {
	constructor(
		readonly nodes: readonly RelationNode[],
		/** Declared sources in declaration order */
		readonly sources: ReadonlyMap<string, SourceDefinition>,
		/** Top-level results in textual order */
		readonly results: readonly PlanResult[],
		readonly arrangements: ArrangementLookup,
		/** Functions the scalar expressions were resolved against */
		readonly functions: FunctionRegistry,
	) {}

	node(id: NodeId): RelationNode {
		const node = this.nodes[id];
		if (!node) {
			planError(PlanErrorKind.Internal, `No node with id ${id}`, { node: id });
		}
		return node;
	}

	arity(id: NodeId): number {
		return this.node(id).schema.length;
	}

	schema(id: NodeId): RowSchema {
		return this.node(id).schema;
	}

	/** The result registered under a view name. */
	view(name: string): PlanResult | undefined {
		return this.results.find(r => r.name === name);
	}

	/**
	 * The relation whose arrangements serve node `id`: Gets of views and
	 * Let-bound names resolve to their definitions, ArrangeBy to its input.
	 */
	arrangementTarget(id: NodeId): ArrangementTarget {
		return resolveArrangementTarget(this.nodes, id);
	}
}

export function resolveArrangementTarget(nodes: readonly RelationNode[], id: NodeId): ArrangementTarget {
	let current = id;
	for (;;) {
		const node = nodes[current];
		if (node?.kind === RelationKind.ArrangeBy) {
			current = node.input;
		} else if (node?.kind === RelationKind.Get) {
			const target = node.target;
			if (target.type === 'source') return { type: 'source', name: target.name };
			current = target.type === 'view' ? target.node : target.value;
		} else {
			return { type: 'node', node: current };
		}
	}
}
