export * from './parser.js';
export * from './lexer.js';

import { parsePlanRequest } from './parser.js';
import { buildPlan } from '../planner/building/builder.js';
import type { PlanGraph } from '../planner/plan-graph.js';
import type { PlannerConfig, PlannerOptionsManager } from '../core/options.js';
import type { FunctionRegistry } from '../func/registration.js';

/**
 * Parse plan DSL text and build the plan graph it describes
 * @param text DSL source
 * @returns the validated plan graph
 */
export function buildPlanFromText(
	text: string,
	options?: PlannerOptionsManager | PlannerConfig,
	registry?: FunctionRegistry
): PlanGraph {
	return buildPlan(parsePlanRequest(text), options, registry);
}
