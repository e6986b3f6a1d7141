import { createLogger } from '../../common/logger.js';
import { PlanErrorKind, planError } from '../../common/errors.js';
import { type ColumnType, type RowSchema, formatColumnType, ScalarType } from '../../common/datatype.js';
import type { ColumnRef, NodeId, SourceLocation } from '../../common/types.js';
import { type PlannerConfig, PlannerOptionsManager, PLAN_JOINS, resolveOptions } from '../../core/options.js';
import type { FunctionRegistry } from '../../func/registration.js';
import { createBuiltinRegistry } from '../../func/builtins/index.js';
import { ArrangementRegistry } from '../arrangements.js';
import { PlanGraph, type PlanResult, type SourceDefinition, resolveArrangementTarget } from '../plan-graph.js';
import {
	type AggregateExpr,
	type ColumnOrder,
	type DeltaRule,
	type GetTarget,
	type JoinImplementation,
	type RelationNode,
	RelationKind,
} from '../nodes/relation.js';
import { type ScalarExpr, asColumn } from '../nodes/scalar.js';
import { JoinLayout } from '../join/layout.js';
import { canonicalizeEquivalences } from '../join/equivalences.js';
import { planDeltaQuery, validateDeltaQuery } from '../join/delta-query.js';
import { buildConstantCell, buildScalar, type ScalarContext } from './scalar.js';
import type {
	ArrangeByForm,
	ConstantForm,
	ConstructionRequest,
	FilterForm,
	GetForm,
	JoinForm,
	LetForm,
	MapForm,
	ProjectForm,
	ReduceForm,
	RelationForm,
	TopKForm,
	UnionForm,
	ViewForm,
} from './request.js';

const log = createLogger('build');
const errorLog = log.extend('error');

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** Node under construction: everything but the id, which the arena assigns. */
type PendingNode = DistributiveOmit<RelationNode, 'id'>;

interface LetBinding {
	readonly name: string;
	readonly value: NodeId;
	readonly parent: LetBinding | undefined;
}

/** Names visible to a form: enclosing Let bindings, and the Lets whose value is being built. */
interface BuildScope {
	readonly lets: LetBinding | undefined;
	readonly defining: ReadonlySet<string>;
}

const ROOT_SCOPE: BuildScope = { lets: undefined, defining: new Set() };

function lookupLet(binding: LetBinding | undefined, name: string): LetBinding | undefined {
	for (let b = binding; b; b = b.parent) {
		if (b.name === name) return b;
	}
	return undefined;
}

function checkColumn(col: ColumnRef, arity: number, owner: string, loc?: SourceLocation): void {
	if (!Number.isInteger(col) || col < 0 || col >= arity) {
		planError(
			PlanErrorKind.ColumnOutOfRange,
			`Column reference #${col} is out of range in ${owner} (arity ${arity})`,
			{ column: col, arity },
			loc
		);
	}
}

function checkCount(value: number | undefined, what: string, loc?: SourceLocation): void {
	if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
		planError(PlanErrorKind.InvalidArgument, `TopK ${what} must be a non-negative integer, got ${value}`, { [what]: value }, loc);
	}
}

/**
 * Builds and validates a plan graph from a construction request, bottom-up.
 * Each instance builds one request; the graph is only handed out once the
 * whole request has validated.
 */
export class PlanBuilder {
	private readonly nodes: RelationNode[] = [];
	private readonly sources = new Map<string, SourceDefinition>();
	private readonly viewForms = new Map<string, ViewForm>();
	private readonly viewRoots = new Map<string, NodeId>();
	/** Views being built, outermost first */
	private readonly viewStack: string[] = [];
	private readonly arrangements = new ArrangementRegistry();
	private readonly planJoins: boolean;

	constructor(
		private readonly registry: FunctionRegistry,
		options: PlannerOptionsManager,
	) {
		this.planJoins = options.getOption(PLAN_JOINS);
	}

	build(request: ConstructionRequest): PlanGraph {
		// Declarations first so that forms may refer to names defined later in the text
		for (const form of request.forms) {
			if (form.type === 'query') continue;
			if (this.sources.has(form.name) || this.viewForms.has(form.name)) {
				planError(PlanErrorKind.DuplicateDefinition, `${form.name} is already defined`, { name: form.name }, form.loc);
			}
			if (form.type === 'source') {
				this.sources.set(form.name, { name: form.name, schema: [...form.columns] });
				log('Declared source %s (%s)', form.name, form.columns.map(formatColumnType).join(', '));
			} else {
				this.viewForms.set(form.name, form);
			}
		}

		const results: PlanResult[] = [];
		for (const form of request.forms) {
			switch (form.type) {
				case 'source':
					break;
				case 'view':
					results.push({ name: form.name, root: this.ensureView(form.name, form.loc) });
					break;
				case 'query':
					results.push({ name: undefined, root: this.buildRelation(form.expr, ROOT_SCOPE) });
					break;
			}
		}

		log('Built %d node(s), %d result(s), %d arrangement(s)', this.nodes.length, results.length, this.arrangements.size);
		return new PlanGraph(this.nodes, this.sources, results, this.arrangements.lookup(), this.registry);
	}

	private add(pending: PendingNode): NodeId {
		const id = this.nodes.length;
		const node: RelationNode = { ...pending, id };
		this.nodes.push(node);
		log('Node %d: %s (arity %d)', id, node.kind, node.schema.length);
		return id;
	}

	private schemaOf(id: NodeId): RowSchema {
		return this.nodes[id].schema;
	}

	private scalarContext(owner: string): ScalarContext {
		return { owner, registry: this.registry };
	}

	private ensureView(name: string, loc?: SourceLocation): NodeId {
		const built = this.viewRoots.get(name);
		if (built !== undefined) return built;

		const form = this.viewForms.get(name);
		if (!form) {
			return planError(PlanErrorKind.Internal, `View ${name} is not declared`, { name }, loc);
		}
		if (this.viewStack.includes(name)) {
			const cycle = [...this.viewStack.slice(this.viewStack.indexOf(name)), name];
			return planError(PlanErrorKind.CyclicReference, `View ${name} depends on itself: ${cycle.join(' -> ')}`, { name, cycle: cycle.join(' -> ') }, loc);
		}

		this.viewStack.push(name);
		const root = this.buildRelation(form.expr, ROOT_SCOPE);
		this.viewStack.pop();
		this.viewRoots.set(name, root);
		log('View %s is node %d', name, root);
		return root;
	}

	private buildRelation(form: RelationForm, scope: BuildScope): NodeId {
		switch (form.op) {
			case 'constant': return this.buildConstant(form);
			case 'get': return this.buildGet(form, scope);
			case 'let': return this.buildLet(form, scope);
			case 'map': return this.buildMap(form, scope);
			case 'filter': return this.buildFilter(form, scope);
			case 'project': return this.buildProject(form, scope);
			case 'arrange_by': return this.buildArrangeBy(form, scope);
			case 'join': return this.buildJoin(form, scope);
			case 'reduce': return this.buildReduce(form, scope);
			case 'top_k': return this.buildTopK(form, scope);
			case 'union': return this.buildUnion(form, scope);
			case 'negate': {
				const input = this.buildRelation(form.input, scope);
				return this.add({ kind: RelationKind.Negate, input, schema: this.schemaOf(input) });
			}
			case 'threshold': {
				const input = this.buildRelation(form.input, scope);
				return this.add({ kind: RelationKind.Threshold, input, schema: this.schemaOf(input) });
			}
		}
	}

	private buildConstant(form: ConstantForm): NodeId {
		const width = form.schema.length;
		const rows = form.rows.map((row, r) => {
			if (row.length !== width) {
				planError(
					PlanErrorKind.ArityMismatch,
					`Constant row ${r} has ${row.length} value(s), expected ${width}`,
					{ row: r, width: row.length, arity: width },
					form.loc
				);
			}
			return row.map((cell, c) => buildConstantCell(cell, form.schema[c], { owner: `Constant row ${r}` }));
		});
		return this.add({ kind: RelationKind.Constant, rows, schema: [...form.schema] });
	}

	private buildGet(form: GetForm, scope: BuildScope): NodeId {
		const { name } = form;
		let target: GetTarget;
		let schema: RowSchema;

		const binding = lookupLet(scope.lets, name);
		const source = this.sources.get(name);
		if (binding) {
			target = { type: 'local', name, value: binding.value };
			schema = this.schemaOf(binding.value);
		} else if (scope.defining.has(name)) {
			return planError(PlanErrorKind.CyclicReference, `Let ${name} refers to itself in its own value`, { name }, form.loc);
		} else if (this.viewForms.has(name)) {
			const root = this.ensureView(name, form.loc);
			target = { type: 'view', name, node: root };
			schema = this.schemaOf(root);
		} else if (source) {
			target = { type: 'source', name };
			schema = source.schema;
		} else {
			return planError(PlanErrorKind.UnresolvedReference, `Unresolved reference: ${name}`, { name }, form.loc);
		}

		return this.add({ kind: RelationKind.Get, target, schema });
	}

	private buildLet(form: LetForm, scope: BuildScope): NodeId {
		const defining = new Set(scope.defining);
		defining.add(form.name);
		const value = this.buildRelation(form.value, { lets: scope.lets, defining });

		const body = this.buildRelation(form.body, {
			lets: { name: form.name, value, parent: scope.lets },
			defining: scope.defining,
		});
		return this.add({ kind: RelationKind.Let, name: form.name, value, body, schema: this.schemaOf(body) });
	}

	private buildMap(form: MapForm, scope: BuildScope): NodeId {
		const input = this.buildRelation(form.input, scope);
		// Each expression sees the input columns followed by the outputs before it
		const schema: ColumnType[] = [...this.schemaOf(input)];
		const scalars = form.scalars.map((scalar, i) => {
			const typed = buildScalar(scalar, schema, this.scalarContext(`Map expression ${i}`));
			schema.push(typed.type);
			return typed.expr;
		});
		return this.add({ kind: RelationKind.Map, input, scalars, schema });
	}

	private buildFilter(form: FilterForm, scope: BuildScope): NodeId {
		const input = this.buildRelation(form.input, scope);
		const schema = this.schemaOf(input);
		const predicates = form.predicates.map((predicate, i) => {
			const typed = buildScalar(predicate, schema, this.scalarContext(`Filter predicate ${i}`));
			if (typed.type.scalarType !== ScalarType.Bool) {
				planError(
					PlanErrorKind.TypeMismatch,
					`Filter predicate ${i} has type ${formatColumnType(typed.type)}, expected bool`,
					{ predicate: i, type: formatColumnType(typed.type) },
					predicate.loc ?? form.loc
				);
			}
			return typed.expr;
		});
		return this.add({ kind: RelationKind.Filter, input, predicates, schema });
	}

	private buildProject(form: ProjectForm, scope: BuildScope): NodeId {
		const input = this.buildRelation(form.input, scope);
		const inputSchema = this.schemaOf(input);
		for (const col of form.outputs) checkColumn(col, inputSchema.length, 'Project', form.loc);
		return this.add({
			kind: RelationKind.Project,
			input,
			outputs: [...form.outputs],
			schema: form.outputs.map(col => inputSchema[col]),
		});
	}

	private buildArrangeBy(form: ArrangeByForm, scope: BuildScope): NodeId {
		const input = this.buildRelation(form.input, scope);
		const schema = this.schemaOf(input);
		const seen = new Set<string>();
		const keys: ColumnRef[][] = [];
		for (const key of form.keys) {
			for (const col of key) checkColumn(col, schema.length, 'ArrangeBy', form.loc);
			const id = key.join(',');
			if (seen.has(id)) continue;
			seen.add(id);
			keys.push([...key]);
		}

		const node = this.add({ kind: RelationKind.ArrangeBy, input, keys, schema });
		const target = resolveArrangementTarget(this.nodes, input);
		for (const key of keys) {
			this.arrangements.request(target, key, { kind: 'arrange_by', node });
		}
		return node;
	}

	private buildJoin(form: JoinForm, scope: BuildScope): NodeId {
		if (form.inputs.length === 0) {
			planError(PlanErrorKind.ArityMismatch, 'Join requires at least one input', {}, form.loc);
		}
		const inputs = form.inputs.map(input => this.buildRelation(input, scope));
		const schema = inputs.flatMap(input => this.schemaOf(input));
		const layout = new JoinLayout(inputs.map(input => this.schemaOf(input).length));

		const equivalences = canonicalizeEquivalences(form.equivalences, layout, form.loc);
		for (const cls of equivalences) {
			const first = schema[cls[0]];
			for (const col of cls) {
				if (schema[col].scalarType !== first.scalarType) {
					planError(
						PlanErrorKind.TypeMismatch,
						`Join constraint equates #${cls[0]} (${formatColumnType(first)}) with #${col} (${formatColumnType(schema[col])})`,
						{ columns: cls },
						form.loc
					);
				}
			}
		}

		let demand: ColumnRef[] | undefined;
		if (form.demand) {
			for (const col of form.demand) checkColumn(col, layout.arity, 'Join demand', form.loc);
			demand = [...new Set(form.demand)].sort((a, b) => a - b);
		}

		let implementation: JoinImplementation;
		const descriptor = form.implementation;
		if (descriptor?.type === 'delta_query') {
			implementation = { type: 'delta_query', rules: validateDeltaQuery(descriptor, layout, equivalences, form.loc) };
		} else if (descriptor?.type === 'unplanned' || !this.planJoins) {
			implementation = { type: 'unplanned' };
		} else {
			implementation = { type: 'delta_query', rules: planDeltaQuery(layout, equivalences, form.loc) };
		}

		const node = this.add({ kind: RelationKind.Join, inputs, equivalences, demand, implementation, schema });
		if (implementation.type === 'delta_query') {
			this.requestProbeArrangements(node, inputs, implementation.rules);
		}
		return node;
	}

	private requestProbeArrangements(node: NodeId, inputs: readonly NodeId[], rules: readonly DeltaRule[]): void {
		rules.forEach((rule, r) => {
			rule.steps.forEach((step, s) => {
				const target = resolveArrangementTarget(this.nodes, inputs[step.input]);
				this.arrangements.request(target, step.key, { kind: 'join', node, rule: r, step: s });
			});
		});
	}

	private buildReduce(form: ReduceForm, scope: BuildScope): NodeId {
		const input = this.buildRelation(form.input, scope);
		const inputSchema = this.schemaOf(input);

		const keyTypes: ColumnType[] = [];
		const groupKey: ScalarExpr[] = form.groupKey.map((key, i) => {
			const typed = buildScalar(key, inputSchema, this.scalarContext(`Reduce group key ${i}`));
			keyTypes.push(typed.type);
			return typed.expr;
		});

		const aggTypes: ColumnType[] = [];
		const aggregates: AggregateExpr[] = form.aggregates.map((agg, i) => {
			const schemaFn = this.registry.getAggregate(agg.func);
			if (!schemaFn) {
				return planError(PlanErrorKind.UnknownFunction, `Unknown aggregate function ${agg.func}`, { function: agg.func }, agg.loc ?? form.loc);
			}
			checkColumn(agg.input, inputSchema.length, `Reduce aggregate ${i}`, agg.loc ?? form.loc);
			const argType = inputSchema[agg.input];
			const problem = schemaFn.validateArgType(argType);
			if (problem !== undefined) {
				planError(PlanErrorKind.TypeMismatch, `Invalid input to aggregate ${agg.func}: ${problem}`, { function: agg.func, column: agg.input }, agg.loc ?? form.loc);
			}
			aggTypes.push(schemaFn.inferReturnType(argType));
			return { func: agg.func, input: agg.input, distinct: agg.distinct ?? false };
		});

		const node = this.add({ kind: RelationKind.Reduce, input, groupKey, aggregates, schema: [...keyTypes, ...aggTypes] });

		const keyColumns: ColumnRef[] = [];
		for (const key of groupKey) {
			const col = asColumn(key);
			if (col === undefined) break;
			keyColumns.push(col);
		}
		if (keyColumns.length > 0 && keyColumns.length === groupKey.length) {
			this.arrangements.request(resolveArrangementTarget(this.nodes, input), keyColumns, { kind: 'reduce', node });
		}
		return node;
	}

	private buildTopK(form: TopKForm, scope: BuildScope): NodeId {
		const input = this.buildRelation(form.input, scope);
		const schema = this.schemaOf(input);
		for (const col of form.groupKey) checkColumn(col, schema.length, 'TopK group key', form.loc);
		for (const item of form.order) checkColumn(item.column, schema.length, 'TopK order', form.loc);
		checkCount(form.limit, 'limit', form.loc);
		checkCount(form.offset, 'offset', form.loc);

		const order: ColumnOrder[] = form.order.map(item => ({ column: item.column, desc: item.desc ?? false }));
		const node = this.add({
			kind: RelationKind.TopK,
			input,
			groupKey: [...form.groupKey],
			order,
			limit: form.limit,
			offset: form.offset ?? 0,
			schema,
		});
		if (form.groupKey.length > 0) {
			this.arrangements.request(resolveArrangementTarget(this.nodes, input), form.groupKey, { kind: 'top_k', node });
		}
		return node;
	}

	private buildUnion(form: UnionForm, scope: BuildScope): NodeId {
		if (form.inputs.length === 0) {
			planError(PlanErrorKind.ArityMismatch, 'Union requires at least one input', {}, form.loc);
		}
		const inputs = form.inputs.map(input => this.buildRelation(input, scope));
		const first = this.schemaOf(inputs[0]);
		const schema: ColumnType[] = [...first];

		inputs.forEach((input, i) => {
			const other = this.schemaOf(input);
			if (other.length !== first.length) {
				planError(
					PlanErrorKind.ArityMismatch,
					`Union input ${i} has arity ${other.length}, expected ${first.length}`,
					{ input: i, arity: other.length },
					form.loc
				);
			}
			other.forEach((type, c) => {
				if (type.scalarType !== first[c].scalarType) {
					planError(
						PlanErrorKind.TypeMismatch,
						`Union input ${i} column #${c} has type ${formatColumnType(type)}, expected ${formatColumnType(first[c])}`,
						{ input: i, column: c },
						form.loc
					);
				}
				if (type.nullable) schema[c] = { scalarType: schema[c].scalarType, nullable: true };
			});
		});

		return this.add({ kind: RelationKind.Union, inputs, schema });
	}
}

/**
 * Build a validated plan graph from a construction request.
 *
 * @param options Planner options (a manager, or a plain config record)
 * @param registry Function registry; defaults to the builtins
 * @throws PlanError when any part of the request is invalid; no partial graph is produced
 */
export function buildPlan(
	request: ConstructionRequest,
	options?: PlannerOptionsManager | PlannerConfig,
	registry: FunctionRegistry = createBuiltinRegistry()
): PlanGraph {
	try {
		return new PlanBuilder(registry, resolveOptions(options)).build(request);
	} catch (error) {
		errorLog('Construction failed: %O', error);
		throw error;
	}
}
