import type { Datum } from '../common/types.js';

export enum TokenType {
	// Literals
	INTEGER = 'INTEGER',
	FLOAT = 'FLOAT',
	STRING = 'STRING',
	/** `#3` */
	COLUMN = 'COLUMN',
	IDENTIFIER = 'IDENTIFIER',

	// Punctuation
	LPAREN = 'LPAREN',
	RPAREN = 'RPAREN',
	LBRACKET = 'LBRACKET',
	RBRACKET = 'RBRACKET',

	// Special
	EOF = 'EOF',
	ERROR = 'ERROR',
}

export interface Token {
	type: TokenType;
	lexeme: string;
	/** bigint for INTEGER, number for FLOAT and COLUMN, string for STRING */
	literal?: Datum;
	startLine: number;
	startColumn: number;
	startOffset: number;
	endLine: number;
	endColumn: number;
	endOffset: number;
}

/**
 * Lexer for the plan DSL: s-expressions with `[...]` lists, `#n` column
 * references and `;` comments to end of line.
 */
export class Lexer {
	private source: string;
	private tokens: Token[] = [];
	private start = 0;
	private current = 0;
	private line = 1;
	private column = 1;
	private startLine = 1;
	private startColumn = 1;

	constructor(source: string) {
		this.source = source;
	}

	/**
	 * Scans the input and returns all tokens, ending with EOF.
	 */
	scanTokens(): Token[] {
		while (!this.isAtEnd()) {
			this.start = this.current;
			this.startLine = this.line;
			this.startColumn = this.column;
			this.scanToken();
		}

		this.tokens.push({
			type: TokenType.EOF,
			lexeme: '',
			startLine: this.line,
			startColumn: this.column,
			startOffset: this.source.length,
			endLine: this.line,
			endColumn: this.column,
			endOffset: this.source.length,
		});

		return this.tokens;
	}

	private isAtEnd(): boolean {
		return this.current >= this.source.length;
	}

	private scanToken(): void {
		const c = this.advance();

		switch (c) {
			case '(': this.addToken(TokenType.LPAREN); break;
			case ')': this.addToken(TokenType.RPAREN); break;
			case '[': this.addToken(TokenType.LBRACKET); break;
			case ']': this.addToken(TokenType.RBRACKET); break;
			case '"': this.string(); break;
			case ';':
				while (this.peek() !== '\n' && !this.isAtEnd()) {
					this.advance();
				}
				break;
			case '#':
				if (this.isDigit(this.peek())) {
					while (this.isDigit(this.peek())) this.advance();
					this.addToken(TokenType.COLUMN, Number(this.source.substring(this.start + 1, this.current)));
				} else {
					this.addErrorToken('Expected digits after #');
				}
				break;
			case '-':
				if (this.isDigit(this.peek())) {
					this.number();
				} else {
					this.addErrorToken('Unexpected character: -');
				}
				break;
			case ' ':
			case '\r':
			case '\t':
			case '\n':
			case ',':
				// Whitespace; commas are accepted as separators
				break;

			default:
				if (this.isDigit(c)) {
					this.number();
				} else if (this.isAlpha(c)) {
					this.identifier();
				} else {
					this.addErrorToken(`Unexpected character: ${c}`);
				}
				break;
		}
	}

	private advance(): string {
		const char = this.source.charAt(this.current);
		this.current++;
		if (char === '\n') {
			this.line++;
			this.column = 1;
		} else {
			this.column++;
		}
		return char;
	}

	private peek(): string {
		if (this.isAtEnd()) return '\0';
		return this.source.charAt(this.current);
	}

	private peekNext(): string {
		if (this.current + 1 >= this.source.length) return '\0';
		return this.source.charAt(this.current + 1);
	}

	private string(): void {
		let value = '';
		let escaping = false;

		while ((!this.isAtEnd() && this.peek() !== '"') || escaping) {
			if (escaping) {
				const c = this.peek();
				switch (c) {
					case 'n': value += '\n'; break;
					case 'r': value += '\r'; break;
					case 't': value += '\t'; break;
					default: value += c; break;
				}
				escaping = false;
			} else if (this.peek() === '\\') {
				escaping = true;
			} else {
				value += this.peek();
			}
			this.advance();
		}

		if (this.isAtEnd()) {
			this.addErrorToken('Unterminated string.');
			return;
		}

		// Consume the closing quote
		this.advance();
		this.addToken(TokenType.STRING, value);
	}

	private number(): void {
		let isFloat = false;
		while (this.isDigit(this.peek())) this.advance();

		if (this.peek() === '.' && this.isDigit(this.peekNext())) {
			isFloat = true;
			this.advance();
			while (this.isDigit(this.peek())) this.advance();
		}

		if (this.peek() === 'e' || this.peek() === 'E') {
			isFloat = true;
			this.advance();
			if (this.peek() === '+' || this.peek() === '-') this.advance();
			if (!this.isDigit(this.peek())) {
				this.addErrorToken('Invalid number literal: expected digits after exponent.');
				return;
			}
			while (this.isDigit(this.peek())) this.advance();
		}

		const lexeme = this.source.substring(this.start, this.current);
		if (isFloat) {
			this.addToken(TokenType.FLOAT, parseFloat(lexeme));
		} else {
			this.addToken(TokenType.INTEGER, BigInt(lexeme));
		}
	}

	private identifier(): void {
		while (this.isAlphaNumeric(this.peek())) this.advance();
		// Nullable type names: int64?
		if (this.peek() === '?') this.advance();
		this.addToken(TokenType.IDENTIFIER);
	}

	private isDigit(c: string): boolean {
		return c >= '0' && c <= '9';
	}

	private isAlpha(c: string): boolean {
		return (c >= 'a' && c <= 'z') || (c >= 'A' && c <= 'Z') || c === '_';
	}

	private isAlphaNumeric(c: string): boolean {
		return this.isAlpha(c) || this.isDigit(c);
	}

	private addToken(type: TokenType, literal?: Datum): void {
		this.tokens.push({
			type,
			lexeme: this.source.substring(this.start, this.current),
			literal,
			startLine: this.startLine,
			startColumn: this.startColumn,
			startOffset: this.start,
			endLine: this.line,
			endColumn: this.column - 1,
			endOffset: this.current,
		});
	}

	private addErrorToken(message: string): void {
		this.tokens.push({
			type: TokenType.ERROR,
			lexeme: message,
			startLine: this.startLine,
			startColumn: this.startColumn,
			startOffset: this.start,
			endLine: this.line,
			endColumn: this.column - 1,
			endOffset: this.current,
		});
	}
}
