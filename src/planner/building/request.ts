import type { ColumnType, ScalarType } from '../../common/datatype.js';
import type { Datum, SourceLocation } from '../../common/types.js';

/**
 * Construction request: the structured input the SQL compiler (or the plan
 * DSL parser) hands to the builder. Forms name their sub-forms positionally;
 * nothing here is validated until `buildPlan` runs.
 */
export interface ConstructionRequest {
	readonly forms: readonly TopLevelForm[];
}

export type TopLevelForm = SourceForm | ViewForm | QueryForm;

export interface SourceForm {
	readonly type: 'source';
	readonly name: string;
	readonly columns: readonly ColumnType[];
	readonly loc?: SourceLocation;
}

/** Named result; other forms may `get` it by name, before or after its definition */
export interface ViewForm {
	readonly type: 'view';
	readonly name: string;
	readonly expr: RelationForm;
	readonly loc?: SourceLocation;
}

export interface QueryForm {
	readonly type: 'query';
	readonly expr: RelationForm;
	readonly loc?: SourceLocation;
}

// --- scalar forms ---

export type ScalarForm = LiteralForm | ColumnForm | CallForm;

export interface LiteralForm {
	readonly type: 'literal';
	readonly value: Datum;
	/** Explicit type tag; inferred from the value (or the Constant schema) when absent */
	readonly scalarType?: ScalarType;
	readonly loc?: SourceLocation;
}

export interface ColumnForm {
	readonly type: 'column';
	readonly index: number;
	readonly loc?: SourceLocation;
}

export interface CallForm {
	readonly type: 'call';
	readonly func: string;
	readonly args: readonly ScalarForm[];
	readonly loc?: SourceLocation;
}

// --- relational forms ---

export type RelationForm =
	| ConstantForm
	| GetForm
	| LetForm
	| MapForm
	| FilterForm
	| ProjectForm
	| ArrangeByForm
	| JoinForm
	| ReduceForm
	| TopKForm
	| NegateForm
	| ThresholdForm
	| UnionForm;

interface FormBase {
	readonly loc?: SourceLocation;
}

export interface ConstantForm extends FormBase {
	readonly op: 'constant';
	/** Rows may only contain literals; anything else is rejected */
	readonly rows: readonly (readonly ScalarForm[])[];
	readonly schema: readonly ColumnType[];
}

export interface GetForm extends FormBase {
	readonly op: 'get';
	readonly name: string;
}

export interface LetForm extends FormBase {
	readonly op: 'let';
	readonly name: string;
	readonly value: RelationForm;
	readonly body: RelationForm;
}

export interface MapForm extends FormBase {
	readonly op: 'map';
	readonly input: RelationForm;
	readonly scalars: readonly ScalarForm[];
}

export interface FilterForm extends FormBase {
	readonly op: 'filter';
	readonly input: RelationForm;
	readonly predicates: readonly ScalarForm[];
}

export interface ProjectForm extends FormBase {
	readonly op: 'project';
	readonly input: RelationForm;
	readonly outputs: readonly number[];
}

export interface ArrangeByForm extends FormBase {
	readonly op: 'arrange_by';
	readonly input: RelationForm;
	readonly keys: readonly (readonly number[])[];
}

/** Per changed input (in input order), the ordered probes of the other inputs */
export interface DeltaQueryDescriptor {
	readonly type: 'delta_query';
	readonly rules: readonly (readonly { readonly input: number; readonly key: readonly number[] }[])[];
}

export type JoinImplementationDescriptor = { readonly type: 'unplanned' } | DeltaQueryDescriptor;

export interface JoinForm extends FormBase {
	readonly op: 'join';
	readonly inputs: readonly RelationForm[];
	/** Column groups over the concatenated input rows that must be equal */
	readonly equivalences: readonly (readonly number[])[];
	readonly demand?: readonly number[];
	/** Absent: the planner chooses (unless planning is disabled) */
	readonly implementation?: JoinImplementationDescriptor;
}

export interface AggregateForm {
	readonly func: string;
	readonly input: number;
	readonly distinct?: boolean;
	readonly loc?: SourceLocation;
}

export interface ReduceForm extends FormBase {
	readonly op: 'reduce';
	readonly input: RelationForm;
	readonly groupKey: readonly ScalarForm[];
	/** Empty: a Distinct over the group key */
	readonly aggregates: readonly AggregateForm[];
}

export interface OrderForm {
	readonly column: number;
	readonly desc?: boolean;
}

export interface TopKForm extends FormBase {
	readonly op: 'top_k';
	readonly input: RelationForm;
	readonly groupKey: readonly number[];
	readonly order: readonly OrderForm[];
	readonly limit?: number;
	readonly offset?: number;
}

export interface NegateForm extends FormBase {
	readonly op: 'negate';
	readonly input: RelationForm;
}

export interface ThresholdForm extends FormBase {
	readonly op: 'threshold';
	readonly input: RelationForm;
}

export interface UnionForm extends FormBase {
	readonly op: 'union';
	readonly inputs: readonly RelationForm[];
}
