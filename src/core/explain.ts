import { createLogger } from '../common/logger.js';
import { formatColumnType } from '../common/datatype.js';
import { PlanErrorKind, planError } from '../common/errors.js';
import type { NodeId } from '../common/types.js';
import type { PlanGraph, PlanResult } from '../planner/plan-graph.js';
import {
	type GetTarget,
	type JoinNode,
	type RelationNode,
	type UnaryRelationNode,
	childrenOf,
	isUnaryNode,
	RelationKind,
} from '../planner/nodes/relation.js';
import {
	formatColumnList,
	formatColumnRef,
	formatRow,
	formatScalarList,
	formatSortKey,
} from '../util/plan-formatter.js';
import { EXPLAIN_DEMAND, EXPLAIN_TYPES, type PlannerConfig, PlannerOptionsManager, resolveOptions } from './options.js';

const log = createLogger('explain');

interface Block {
	readonly header: string;
	readonly lines: string[];
}

interface LetLabel {
	readonly label: string;
	readonly block: number;
}

/**
 * Lays a plan graph out as numbered blocks. A chain of single-input
 * operators stays in one block; Join and Union inputs become preceding
 * blocks; a Let emits its value as a labelled block and continues with its
 * body. Block ids and Let labels are assigned in emission order.
 */
class PlanExplainer {
	private readonly blocks: Block[] = [];
	private readonly lets = new Map<NodeId, LetLabel>();
	private readonly explainedResults = new Set<PlanResult>();
	private nextLabel = 0;
	private readonly showDemand: boolean;
	private readonly showTypes: boolean;

	constructor(private readonly graph: PlanGraph, options: PlannerOptionsManager) {
		this.showDemand = options.getOption(EXPLAIN_DEMAND);
		this.showTypes = options.getOption(EXPLAIN_TYPES);
	}

	explain(): string {
		for (const result of this.graph.results) {
			this.describeResult(result);
		}
		log('Explained %d result(s) in %d block(s)', this.graph.results.length, this.blocks.length);
		return this.blocks.map(b => [b.header, ...b.lines].join('\n')).join('\n\n');
	}

	/** Views a result reads are described before the result itself. */
	private describeResult(result: PlanResult): void {
		if (this.explainedResults.has(result)) return;
		this.explainedResults.add(result);
		for (const name of this.referencedViews(result.root)) {
			const view = this.graph.view(name);
			if (view) this.describeResult(view);
		}
		const name = result.name;
		this.describe(result.root, name === undefined ? undefined : () => `View ${name}`);
	}

	private referencedViews(root: NodeId): string[] {
		const names: string[] = [];
		const seen = new Set<NodeId>();
		const visit = (id: NodeId): void => {
			if (seen.has(id)) return;
			seen.add(id);
			const node = this.graph.node(id);
			if (node.kind === RelationKind.Get && node.target.type === 'view' && !names.includes(node.target.name)) {
				names.push(node.target.name);
			}
			childrenOf(node).forEach(visit);
		};
		visit(root);
		return names;
	}

	/**
	 * Describe `id` and everything below it; `suffix` holds the lines of
	 * operators above a Let, which land in the Let body's block. The header
	 * is resolved when the block is emitted.
	 * @returns the block id holding the node's output
	 */
	private describe(id: NodeId, header?: () => string, suffix: readonly string[] = []): number {
		const chain: UnaryRelationNode[] = [];
		let base: RelationNode = this.graph.node(id);
		while (isUnaryNode(base)) {
			chain.push(base);
			base = this.graph.node(base.input);
		}
		const chainLines = chain.reverse().flatMap(node => this.withTypes(node, this.unaryLines(node)));
		chainLines.push(...suffix);

		if (base.kind === RelationKind.Let) {
			let label = '';
			const block = this.describe(base.value, () => {
				label = `l${this.nextLabel++}`;
				return `Let ${label}`;
			});
			this.lets.set(base.value, { label, block });
			return this.describe(base.body, header, chainLines);
		}

		let baseLines: string[];
		switch (base.kind) {
			case RelationKind.Constant:
				baseLines = [`| Constant${base.rows.map(row => ` ${formatRow(row)}`).join('')}`];
				break;
			case RelationKind.Get:
				baseLines = [`| Get ${this.getTargetText(base.target)}`];
				break;
			case RelationKind.Join: {
				const inputBlocks = base.inputs.map(input => this.describe(input));
				baseLines = this.joinLines(base, inputBlocks);
				break;
			}
			case RelationKind.Union: {
				const inputBlocks = base.inputs.map(input => this.describe(input));
				baseLines = [`| Union ${inputBlocks.map(b => `%${b}`).join(' ')}`];
				break;
			}
			default:
				return planError(PlanErrorKind.Internal, `Node ${id} has no block base`, { node: id });
		}

		const k = this.blocks.length;
		this.blocks.push({
			header: header === undefined ? `%${k} =` : `%${k} = ${header()} =`,
			lines: [...this.withTypes(base, baseLines), ...chainLines],
		});
		return k;
	}

	private getTargetText(target: GetTarget): string {
		if (target.type !== 'local') return target.name;
		const binding = this.lets.get(target.value);
		if (!binding) {
			return planError(PlanErrorKind.Internal, `Let-bound value ${target.value} of ${target.name} was not described`, { node: target.value });
		}
		return `%${binding.block} (${binding.label})`;
	}

	private joinLines(node: JoinNode, inputBlocks: readonly number[]): string[] {
		const predicates = node.equivalences.map(cls => ` (= ${cls.map(formatColumnRef).join(' ')})`).join('');
		const lines = [`| Join ${inputBlocks.map(b => `%${b}`).join(' ')}${predicates}`];

		const impl = node.implementation;
		if (impl.type === 'unplanned') {
			lines.push('| | implementation = Unplanned');
		} else {
			lines.push('| | implementation = DeltaQuery');
			for (const rule of impl.rules) {
				const steps = rule.steps.map(step => ` %${inputBlocks[step.input]}.${formatColumnList(step.key)}`).join('');
				lines.push(`| |   delta %${inputBlocks[rule.source]}${steps}`);
			}
		}

		if (node.demand && this.showDemand) {
			lines.push(`| | demand = ${formatColumnList(node.demand)}`);
		}
		return lines;
	}

	private unaryLines(node: UnaryRelationNode): string[] {
		const functions = this.graph.functions;
		switch (node.kind) {
			case RelationKind.Map:
				return [`| Map ${formatScalarList(node.scalars, functions)}`];
			case RelationKind.Filter:
				return [`| Filter ${formatScalarList(node.predicates, functions)}`];
			case RelationKind.Project:
				return [`| Project ${formatColumnList(node.outputs)}`];
			case RelationKind.ArrangeBy:
				return [`| ArrangeBy${node.keys.map(key => ` ${formatColumnList(key)}`).join('')}`];
			case RelationKind.Reduce: {
				const group = `group=(${formatScalarList(node.groupKey, functions)})`;
				if (node.aggregates.length === 0) {
					return [`| Distinct ${group}`];
				}
				return [
					`| Reduce ${group}`,
					...node.aggregates.map(agg =>
						`| | agg ${agg.func}(${agg.distinct ? 'distinct ' : ''}${formatColumnRef(agg.input)})`),
				];
			}
			case RelationKind.TopK: {
				const parts = [
					`group=${formatColumnList(node.groupKey)}`,
					`order=(${node.order.map(formatSortKey).join(', ')})`,
				];
				if (node.limit !== undefined) parts.push(`limit=${node.limit}`);
				parts.push(`offset=${node.offset}`);
				return [`| TopK ${parts.join(' ')}`];
			}
			case RelationKind.Negate:
				return ['| Negate'];
			case RelationKind.Threshold:
				return ['| Threshold'];
		}
	}

	private withTypes(node: RelationNode, lines: string[]): string[] {
		if (this.showTypes) {
			lines.push(`| | types = (${node.schema.map(formatColumnType).join(', ')})`);
		}
		return lines;
	}
}

/**
 * Render a plan graph as canonical explain text. Identical graphs and
 * options always produce byte-identical text; there is no trailing newline.
 */
export function explainPlan(graph: PlanGraph, options?: PlannerOptionsManager | PlannerConfig): string {
	return new PlanExplainer(graph, resolveOptions(options)).explain();
}
