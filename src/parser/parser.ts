import { createLogger } from '../common/logger.js';
import { ParseError } from '../common/errors.js';
import { type ColumnType, columnType, isScalarType } from '../common/datatype.js';
import type { Datum, SourceLocation } from '../common/types.js';
import { Lexer, type Token, TokenType } from './lexer.js';
import type {
	AggregateForm,
	ConstructionRequest,
	DeltaQueryDescriptor,
	JoinForm,
	JoinImplementationDescriptor,
	OrderForm,
	RelationForm,
	ScalarForm,
	TopLevelForm,
} from '../planner/building/request.js';

const log = createLogger('parser');

function locOf(token: Token): SourceLocation {
	return { line: token.startLine, column: token.startColumn };
}

/**
 * Recursive-descent parser for the plan DSL. Produces an unvalidated
 * construction request; all semantic checks happen in the builder.
 */
export class Parser {
	private tokens: Token[] = [];
	private current = 0;

	/**
	 * Initialize the parser with tokens from DSL text
	 * @returns this parser instance for chaining
	 */
	initialize(text: string): Parser {
		const lexer = new Lexer(text);
		this.tokens = lexer.scanTokens();
		this.current = 0;

		const errorToken = this.tokens.find(t => t.type === TokenType.ERROR);
		if (errorToken) {
			throw new ParseError(errorToken.lexeme, errorToken);
		}
		return this;
	}

	/**
	 * Parse every top-level form in the text.
	 */
	parseRequest(text: string): ConstructionRequest {
		this.initialize(text);
		const forms: TopLevelForm[] = [];
		while (!this.isAtEnd()) {
			forms.push(this.topLevelForm());
		}
		log('Parsed %d top-level form(s)', forms.length);
		return { forms };
	}

	private topLevelForm(): TopLevelForm {
		const open = this.peek();
		if (this.check(TokenType.LPAREN) && this.checkNext(1, TokenType.IDENTIFIER)) {
			const keyword = this.tokens[this.current + 1].lexeme;
			if (keyword === 'defsource') {
				this.advance();
				this.advance();
				const name = this.consumeIdentifier('Expected source name');
				const columns = this.list(() => this.columnType());
				this.consume(TokenType.RPAREN, "Expected ')' after source columns");
				return { type: 'source', name, columns, loc: locOf(open) };
			}
			if (keyword === 'defview') {
				this.advance();
				this.advance();
				const name = this.consumeIdentifier('Expected view name');
				const expr = this.relation();
				this.consume(TokenType.RPAREN, "Expected ')' after view definition");
				return { type: 'view', name, expr, loc: locOf(open) };
			}
		}
		return { type: 'query', expr: this.relation(), loc: locOf(open) };
	}

	private columnType(): ColumnType {
		const token = this.consume(TokenType.IDENTIFIER, 'Expected a column type');
		const nullable = token.lexeme.endsWith('?');
		const name = nullable ? token.lexeme.slice(0, -1) : token.lexeme;
		if (!isScalarType(name)) {
			throw this.error(token, `Unknown type ${token.lexeme}`);
		}
		return columnType(name, nullable);
	}

	private relation(): RelationForm {
		const open = this.consume(TokenType.LPAREN, 'Expected a relational expression');
		const opToken = this.consume(TokenType.IDENTIFIER, 'Expected an operator name');
		const loc = locOf(open);
		let form: RelationForm;

		switch (opToken.lexeme) {
			case 'constant': {
				const rows = this.list(() => this.list(() => this.scalar()));
				const schema = this.list(() => this.columnType());
				form = { op: 'constant', rows, schema, loc };
				break;
			}
			case 'get':
				form = { op: 'get', name: this.consumeIdentifier('Expected a name after get'), loc };
				break;
			case 'let': {
				const name = this.consumeIdentifier('Expected a name after let');
				const value = this.relation();
				const body = this.relation();
				form = { op: 'let', name, value, body, loc };
				break;
			}
			case 'map':
				form = { op: 'map', input: this.relation(), scalars: this.list(() => this.scalar()), loc };
				break;
			case 'filter':
				form = { op: 'filter', input: this.relation(), predicates: this.list(() => this.scalar()), loc };
				break;
			case 'project':
				form = { op: 'project', input: this.relation(), outputs: this.columnList(), loc };
				break;
			case 'arrange_by':
				form = { op: 'arrange_by', input: this.relation(), keys: this.list(() => this.columnList()), loc };
				break;
			case 'join':
				form = this.join(loc);
				break;
			case 'reduce': {
				const input = this.relation();
				const groupKey = this.list(() => this.scalar());
				const aggregates = this.list(() => this.aggregate());
				form = { op: 'reduce', input, groupKey, aggregates, loc };
				break;
			}
			case 'distinct':
				form = { op: 'reduce', input: this.relation(), groupKey: this.list(() => this.scalar()), aggregates: [], loc };
				break;
			case 'top_k':
				form = this.topK(loc);
				break;
			case 'negate':
				form = { op: 'negate', input: this.relation(), loc };
				break;
			case 'threshold':
				form = { op: 'threshold', input: this.relation(), loc };
				break;
			case 'union':
				form = { op: 'union', inputs: this.list(() => this.relation()), loc };
				break;
			default:
				throw this.error(opToken, `Unknown operator ${opToken.lexeme}`);
		}

		this.consume(TokenType.RPAREN, `Expected ')' to close ${opToken.lexeme}`);
		return form;
	}

	private join(loc: SourceLocation): JoinForm {
		const inputs = this.list(() => this.relation());
		const equivalences = this.list(() => this.columnList());
		let demand: number[] | undefined;
		let implementation: JoinImplementationDescriptor | undefined;

		while (!this.check(TokenType.RPAREN)) {
			if (this.check(TokenType.IDENTIFIER) && this.peek().lexeme === 'unplanned') {
				this.advance();
				implementation = { type: 'unplanned' };
				continue;
			}
			this.consume(TokenType.LPAREN, "Expected a join clause or ')'");
			const clause = this.consume(TokenType.IDENTIFIER, 'Expected demand or delta_query');
			if (clause.lexeme === 'demand') {
				demand = this.columnList();
			} else if (clause.lexeme === 'delta_query') {
				implementation = this.deltaQuery();
			} else {
				throw this.error(clause, `Unknown join clause ${clause.lexeme}`);
			}
			this.consume(TokenType.RPAREN, `Expected ')' to close ${clause.lexeme}`);
		}

		return { op: 'join', inputs, equivalences, demand, implementation, loc };
	}

	/** `[[[1 [#1]]] [[0 [#0]]]]`: per changed input, its probe steps */
	private deltaQuery(): DeltaQueryDescriptor {
		const rules = this.list(() => this.list(() => {
			this.consume(TokenType.LBRACKET, "Expected '[' to start a delta step");
			const input = this.integer('Expected the probed input index');
			const key = this.columnList();
			this.consume(TokenType.RBRACKET, "Expected ']' to close a delta step");
			return { input, key };
		}));
		return { type: 'delta_query', rules };
	}

	private topK(loc: SourceLocation): RelationForm {
		const input = this.relation();
		const groupKey = this.columnList();
		const order = this.list(() => this.orderItem());
		let limit: number | undefined;
		let offset: number | undefined;

		if (!this.check(TokenType.RPAREN)) {
			if (this.check(TokenType.IDENTIFIER) && this.peek().lexeme === 'null') {
				this.advance();
			} else {
				limit = this.integer('Expected a limit or null');
			}
			if (!this.check(TokenType.RPAREN)) {
				offset = this.integer('Expected an offset');
			}
		}
		return { op: 'top_k', input, groupKey, order, limit, offset, loc };
	}

	/** `#0` or `(#0 desc)` */
	private orderItem(): OrderForm {
		if (this.match(TokenType.LPAREN)) {
			const column = this.column();
			const dir = this.consume(TokenType.IDENTIFIER, 'Expected asc or desc');
			if (dir.lexeme !== 'asc' && dir.lexeme !== 'desc') {
				throw this.error(dir, `Expected asc or desc, got ${dir.lexeme}`);
			}
			this.consume(TokenType.RPAREN, "Expected ')' after sort direction");
			return { column, desc: dir.lexeme === 'desc' };
		}
		return { column: this.column() };
	}

	/** `(sum #1)` or `(count #2 distinct)` */
	private aggregate(): AggregateForm {
		const open = this.consume(TokenType.LPAREN, 'Expected an aggregate');
		const func = this.consumeIdentifier('Expected an aggregate function name');
		const input = this.column();
		let distinct = false;
		if (this.check(TokenType.IDENTIFIER) && this.peek().lexeme === 'distinct') {
			this.advance();
			distinct = true;
		}
		this.consume(TokenType.RPAREN, "Expected ')' after aggregate");
		return { func, input, distinct, loc: locOf(open) };
	}

	private scalar(): ScalarForm {
		const token = this.peek();
		const loc = locOf(token);

		switch (token.type) {
			case TokenType.COLUMN:
				return { type: 'column', index: this.column(), loc };
			case TokenType.INTEGER:
			case TokenType.FLOAT:
			case TokenType.STRING:
				return { type: 'literal', value: this.literalValue(), loc };
			case TokenType.IDENTIFIER:
				return { type: 'literal', value: this.literalValue(), loc };
			case TokenType.LPAREN: {
				this.advance();
				const func = this.consumeIdentifier('Expected a function name');
				if (func === 'lit') {
					const value = this.literalValue();
					const typeToken = this.consume(TokenType.IDENTIFIER, 'Expected a literal type');
					if (!isScalarType(typeToken.lexeme)) {
						throw this.error(typeToken, `Unknown type ${typeToken.lexeme}`);
					}
					this.consume(TokenType.RPAREN, "Expected ')' after literal type");
					return { type: 'literal', value, scalarType: typeToken.lexeme, loc };
				}
				const args: ScalarForm[] = [];
				while (!this.check(TokenType.RPAREN)) {
					if (this.isAtEnd()) throw this.error(this.peek(), `Expected ')' to close ${func}`);
					args.push(this.scalar());
				}
				this.advance();
				return { type: 'call', func, args, loc };
			}
			default:
				throw this.error(token, `Expected a scalar expression, got '${token.lexeme}'`);
		}
	}

	private literalValue(): Datum {
		if (this.isAtEnd()) {
			throw this.error(this.peek(), 'Expected a literal, found end of input');
		}
		const token = this.advance();
		switch (token.type) {
			case TokenType.INTEGER:
			case TokenType.FLOAT:
			case TokenType.STRING:
				if (token.literal === undefined) {
					throw this.error(token, `Malformed literal ${token.lexeme}`);
				}
				return token.literal;
			case TokenType.IDENTIFIER:
				if (token.lexeme === 'true') return true;
				if (token.lexeme === 'false') return false;
				if (token.lexeme === 'null') return null;
				break;
			default:
				break;
		}
		throw this.error(token, `Expected a literal, got '${token.lexeme}'`);
	}

	private column(): number {
		const token = this.consume(TokenType.COLUMN, 'Expected a column reference');
		if (typeof token.literal !== 'number') {
			throw this.error(token, `Malformed column reference ${token.lexeme}`);
		}
		return token.literal;
	}

	private columnList(): number[] {
		return this.list(() => this.column());
	}

	private integer(message: string): number {
		const token = this.consume(TokenType.INTEGER, message);
		if (typeof token.literal !== 'bigint') {
			throw this.error(token, message);
		}
		return Number(token.literal);
	}

	/** `[item item ...]` */
	private list<T>(item: () => T): T[] {
		this.consume(TokenType.LBRACKET, "Expected '['");
		const items: T[] = [];
		while (!this.check(TokenType.RBRACKET)) {
			if (this.isAtEnd()) throw this.error(this.peek(), "Expected ']'");
			items.push(item());
		}
		this.advance();
		return items;
	}

	private consumeIdentifier(message: string): string {
		return this.consume(TokenType.IDENTIFIER, message).lexeme;
	}

	private match(...types: TokenType[]): boolean {
		for (const type of types) {
			if (this.check(type)) {
				this.advance();
				return true;
			}
		}
		return false;
	}

	private consume(type: TokenType, message: string): Token {
		if (this.check(type)) {
			return this.advance();
		}
		const found = this.peek();
		throw this.error(found, found.type === TokenType.EOF ? `${message}, found end of input` : `${message}, found '${found.lexeme}'`);
	}

	private check(type: TokenType): boolean {
		if (this.isAtEnd()) return type === TokenType.EOF;
		return this.peek().type === type;
	}

	private checkNext(n: number, type: TokenType): boolean {
		if (this.current + n >= this.tokens.length) return false;
		return this.tokens[this.current + n].type === type;
	}

	private advance(): Token {
		if (!this.isAtEnd()) this.current++;
		return this.previous();
	}

	private isAtEnd(): boolean {
		return this.peek().type === TokenType.EOF;
	}

	private peek(): Token {
		return this.tokens[this.current];
	}

	private previous(): Token {
		return this.tokens[this.current - 1];
	}

	private error(token: Token, message: string): ParseError {
		return new ParseError(message, token);
	}
}

/**
 * Parse plan DSL text into a construction request.
 * @throws ParseError with the line and column of the offending token
 */
export function parsePlanRequest(text: string): ConstructionRequest {
	return new Parser().parseRequest(text);
}
