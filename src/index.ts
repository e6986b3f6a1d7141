/**
 * deltaplan - plan IR, delta-query join planning and canonical explain
 * output for incrementally-maintained SQL views.
 */

// Construction
export { buildPlan, PlanBuilder } from './planner/building/builder.js';
export type {
	ConstructionRequest,
	TopLevelForm,
	SourceForm,
	ViewForm,
	QueryForm,
	RelationForm,
	ScalarForm,
	AggregateForm,
	OrderForm,
	DeltaQueryDescriptor,
	JoinImplementationDescriptor,
} from './planner/building/request.js';
export { PlanGraph } from './planner/plan-graph.js';
export type { PlanResult, SourceDefinition } from './planner/plan-graph.js';

// Plan model
export { RelationKind, childrenOf, isUnaryNode, arity } from './planner/nodes/relation.js';
export type {
	RelationNode,
	ConstantNode,
	GetNode,
	GetTarget,
	LetNode,
	MapNode,
	FilterNode,
	ProjectNode,
	ArrangeByNode,
	JoinNode,
	JoinImplementation,
	DeltaRule,
	DeltaStep,
	ReduceNode,
	AggregateExpr,
	TopKNode,
	ColumnOrder,
	NegateNode,
	ThresholdNode,
	UnionNode,
	UnaryRelationNode,
} from './planner/nodes/relation.js';
export { ScalarKind, literal, column, call, referencedColumns, asColumn } from './planner/nodes/scalar.js';
export type { ScalarExpr, LiteralExpr, ColumnExpr, CallExpr } from './planner/nodes/scalar.js';

// Join planning and arrangements
export { JoinLayout } from './planner/join/layout.js';
export { canonicalizeEquivalences } from './planner/join/equivalences.js';
export { planDeltaQuery, validateDeltaQuery, probeKey } from './planner/join/delta-query.js';
export { ArrangementRegistry, targetKey } from './planner/arrangements.js';
export type { ArrangementEntry, ArrangementLookup, ArrangementTarget, ArrangementConsumer } from './planner/arrangements.js';

// Explain
export { explainPlan } from './core/explain.js';
export { formatDatum, formatScalar } from './util/plan-formatter.js';

// Options
export { PlannerOptionsManager, PLAN_JOINS, EXPLAIN_DEMAND, EXPLAIN_TYPES } from './core/options.js';
export type { PlannerConfig, OptionValue, OptionChangeEvent, OptionChangeListener } from './core/options.js';

// Plan DSL
export { Parser, parsePlanRequest, Lexer, TokenType, buildPlanFromText } from './parser/index.js';
export type { Token } from './parser/lexer.js';

// Reference evaluation of scalar and group operators
export { evaluateScalar } from './runtime/scalar.js';
export { evaluateReduce, evaluateTopK } from './runtime/group-ops.js';
export type { ReduceParams, TopKParams } from './runtime/group-ops.js';

// Types and errors
export { ScalarType, columnType, formatColumnType, coerceDatum, defaultLiteralType } from './common/datatype.js';
export type { ColumnType, RowSchema } from './common/datatype.js';
export type { Datum, Row, ColumnRef, NodeId, SourceLocation } from './common/types.js';
export { PlanError, PlanErrorKind, ParseError, isPlanError } from './common/errors.js';

// Functions
export { FunctionRegistry, createScalarFunction, createAggregateFunction } from './func/registration.js';
export { createBuiltinRegistry, BUILTIN_SCALAR_FUNCTIONS, BUILTIN_AGGREGATE_FUNCTIONS } from './func/builtins/index.js';
export type { ScalarFunctionSchema, AggregateFunctionSchema, FunctionRendering } from './func/function.js';

// Logging
export { enableLogging, disableLogging, isLoggingEnabled } from './common/logger.js';
