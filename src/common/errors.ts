import type { Token } from '../parser/lexer.js';
import type { SourceLocation } from './types.js';

/**
 * Distinguishable failure kinds. Every failure raised while building,
 * planning or rendering a plan carries exactly one of these.
 */
export enum PlanErrorKind {
	/** `Get` of a name that is neither a Let binding, a view nor a source */
	UnresolvedReference = 'UnresolvedReference',
	/** A column reference at or beyond the current arity */
	ColumnOutOfRange = 'ColumnOutOfRange',
	/** A column reference where only a literal is accepted */
	InvalidLiteralContext = 'InvalidLiteralContext',
	/** A join equality class touching fewer than two inputs, or an out-of-range column */
	MalformedConstraint = 'MalformedConstraint',
	/** No fully constrained delta rule exists for some join input */
	NoValidJoinStrategy = 'NoValidJoinStrategy',
	/** The requested graph is not acyclic */
	CyclicReference = 'CyclicReference',
	TypeMismatch = 'TypeMismatch',
	ArityMismatch = 'ArityMismatch',
	UnknownFunction = 'UnknownFunction',
	DuplicateDefinition = 'DuplicateDefinition',
	InvalidArgument = 'InvalidArgument',
	Syntax = 'Syntax',
	Evaluation = 'Evaluation',
	Internal = 'Internal',
}

/** Offending node, column or name attached to a failure. */
export type PlanErrorDetail = Readonly<Record<string, string | number | readonly number[]>>;

/**
 * Base class for every failure raised by the library.
 * Provides the failure kind, location information and offending context.
 */
export class PlanError extends Error {
	public readonly kind: PlanErrorKind;
	public readonly detail: PlanErrorDetail;
	public cause?: Error;
	public line?: number;
	public column?: number;

	constructor(message: string, kind: PlanErrorKind, detail: PlanErrorDetail = {}, cause?: Error, line?: number, column?: number) {
		super(message);
		this.kind = kind;
		this.detail = detail;
		this.name = 'PlanError';
		this.cause = cause;
		this.line = line;
		this.column = column;

		// Enhance message with location if available
		if (line !== undefined && column !== undefined) {
			this.message = `${message} (at line ${line}, column ${column})`;
		}

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, PlanError);
		}
	}
}

/**
 * Error raised by the plan DSL lexer and parser; carries the offending token
 */
export class ParseError extends PlanError {
	public readonly token: Token;

	constructor(message: string, token: Token) {
		super(message, PlanErrorKind.Syntax, { token: token.lexeme }, undefined, token.startLine, token.startColumn);
		this.token = token;
		this.name = 'ParseError';
		Object.setPrototypeOf(this, ParseError.prototype);
	}
}

/**
 * Throw a PlanError with optional location information taken from a request form
 * @returns Never (always throws)
 */
export function planError(
	kind: PlanErrorKind,
	message: string,
	detail?: PlanErrorDetail,
	loc?: SourceLocation
): never {
	throw new PlanError(message, kind, detail, undefined, loc?.line, loc?.column);
}

export function isPlanError(error: unknown, kind?: PlanErrorKind): error is PlanError {
	return error instanceof PlanError && (kind === undefined || error.kind === kind);
}
