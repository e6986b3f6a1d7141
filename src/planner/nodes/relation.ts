import type { RowSchema } from '../../common/datatype.js';
import type { ColumnRef, NodeId, Row } from '../../common/types.js';
import type { ScalarExpr } from './scalar.js';

export enum RelationKind {
	Constant = 'Constant',
	Get = 'Get',
	Let = 'Let',
	Map = 'Map',
	Filter = 'Filter',
	Project = 'Project',
	ArrangeBy = 'ArrangeBy',
	Join = 'Join',
	Reduce = 'Reduce',
	TopK = 'TopK',
	Negate = 'Negate',
	Threshold = 'Threshold',
	Union = 'Union',
}

interface NodeBase {
	/** Position in the plan arena; assigned in construction order */
	readonly id: NodeId;
	/** Output column types; its length is the node's arity */
	readonly schema: RowSchema;
}

export interface ConstantNode extends NodeBase {
	readonly kind: RelationKind.Constant;
	readonly rows: readonly Row[];
}

/**
 * What a Get reads: a declared source, a named view (top-level result), or
 * the value of an enclosing Let. Resolution happens at construction time.
 */
export type GetTarget =
	| { readonly type: 'source'; readonly name: string }
	| { readonly type: 'view'; readonly name: string; readonly node: NodeId }
	| { readonly type: 'local'; readonly name: string; readonly value: NodeId };

export interface GetNode extends NodeBase {
	readonly kind: RelationKind.Get;
	readonly target: GetTarget;
}

export interface LetNode extends NodeBase {
	readonly kind: RelationKind.Let;
	readonly name: string;
	readonly value: NodeId;
	readonly body: NodeId;
}

export interface MapNode extends NodeBase {
	readonly kind: RelationKind.Map;
	readonly input: NodeId;
	readonly scalars: readonly ScalarExpr[];
}

export interface FilterNode extends NodeBase {
	readonly kind: RelationKind.Filter;
	readonly input: NodeId;
	/** Conjunction of boolean predicates */
	readonly predicates: readonly ScalarExpr[];
}

export interface ProjectNode extends NodeBase {
	readonly kind: RelationKind.Project;
	readonly input: NodeId;
	readonly outputs: readonly ColumnRef[];
}

export interface ArrangeByNode extends NodeBase {
	readonly kind: RelationKind.ArrangeBy;
	readonly input: NodeId;
	/** Distinct key-sets; a key-set may repeat a column */
	readonly keys: readonly (readonly ColumnRef[])[];
}

/** One probe of a delta rule: look up `input` through its arrangement on `key`. */
export interface DeltaStep {
	readonly input: number;
	/** Columns local to the probed input */
	readonly key: readonly ColumnRef[];
}

/** How a change to input `source` is joined against arranged copies of the others. */
export interface DeltaRule {
	readonly source: number;
	readonly steps: readonly DeltaStep[];
}

export type JoinImplementation =
	| { readonly type: 'unplanned' }
	| { readonly type: 'delta_query'; readonly rules: readonly DeltaRule[] };

export interface JoinNode extends NodeBase {
	readonly kind: RelationKind.Join;
	readonly inputs: readonly NodeId[];
	/** Canonical equivalence classes over the concatenated input columns */
	readonly equivalences: readonly (readonly ColumnRef[])[];
	/** Output columns required downstream; undefined means all of them */
	readonly demand: readonly ColumnRef[] | undefined;
	readonly implementation: JoinImplementation;
}

export interface AggregateExpr {
	readonly func: string;
	readonly input: ColumnRef;
	readonly distinct: boolean;
}

/** Reduce with no aggregates is a Distinct over the group key. */
export interface ReduceNode extends NodeBase {
	readonly kind: RelationKind.Reduce;
	readonly input: NodeId;
	readonly groupKey: readonly ScalarExpr[];
	readonly aggregates: readonly AggregateExpr[];
}

export interface ColumnOrder {
	readonly column: ColumnRef;
	readonly desc: boolean;
}

export interface TopKNode extends NodeBase {
	readonly kind: RelationKind.TopK;
	readonly input: NodeId;
	readonly groupKey: readonly ColumnRef[];
	readonly order: readonly ColumnOrder[];
	/** Undefined means unbounded */
	readonly limit: number | undefined;
	readonly offset: number;
}

export interface NegateNode extends NodeBase {
	readonly kind: RelationKind.Negate;
	readonly input: NodeId;
}

export interface ThresholdNode extends NodeBase {
	readonly kind: RelationKind.Threshold;
	readonly input: NodeId;
}

export interface UnionNode extends NodeBase {
	readonly kind: RelationKind.Union;
	readonly inputs: readonly NodeId[];
}

export type RelationNode =
	| ConstantNode
	| GetNode
	| LetNode
	| MapNode
	| FilterNode
	| ProjectNode
	| ArrangeByNode
	| JoinNode
	| ReduceNode
	| TopKNode
	| NegateNode
	| ThresholdNode
	| UnionNode;

/** Nodes with a single relational input that keep it in the same explain block. */
export type UnaryRelationNode =
	| MapNode
	| FilterNode
	| ProjectNode
	| ArrangeByNode
	| ReduceNode
	| TopKNode
	| NegateNode
	| ThresholdNode;

export function isUnaryNode(node: RelationNode): node is UnaryRelationNode {
	switch (node.kind) {
		case RelationKind.Map:
		case RelationKind.Filter:
		case RelationKind.Project:
		case RelationKind.ArrangeBy:
		case RelationKind.Reduce:
		case RelationKind.TopK:
		case RelationKind.Negate:
		case RelationKind.Threshold:
			return true;
		case RelationKind.Constant:
		case RelationKind.Get:
		case RelationKind.Let:
		case RelationKind.Join:
		case RelationKind.Union:
			return false;
	}
}

/**
 * Relational children of a node, in the order they are described.
 */
export function childrenOf(node: RelationNode): readonly NodeId[] {
	switch (node.kind) {
		case RelationKind.Constant:
		case RelationKind.Get:
			return [];
		case RelationKind.Let:
			return [node.value, node.body];
		case RelationKind.Join:
		case RelationKind.Union:
			return node.inputs;
		default:
			return [node.input];
	}
}

export function arity(node: RelationNode): number {
	return node.schema.length;
}
