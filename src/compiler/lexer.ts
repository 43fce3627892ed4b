import { DiagnosticList } from "./errors"
import { type Token, TokenKind, keywordKind } from "./token"

export class Lexer {
	private source: string
	private pos = 0
	private line = 1
	private column = 1
	private tokens: Token[] = []
	// Newlines inside () and [] do not end statements
	private groupDepth = 0
	readonly errors: DiagnosticList

	constructor(source: string, maxDiagnostics?: number) {
		this.source = source
		this.errors = new DiagnosticList("tokenize", maxDiagnostics)
	}

	tokenize(): Token[] {
		while (this.pos < this.source.length) {
			this.skipWhitespaceAndComments()
			if (this.pos >= this.source.length) break

			const ch = this.peek()

			if (ch === "\n") {
				if (this.groupDepth === 0) {
					this.push(TokenKind.Newline, "\n", this.line, this.column, 1)
				}
				this.advance()
				continue
			}

			if (isDigit(ch)) {
				this.readNumber()
				continue
			}

			if (ch === '"' || ch === "'") {
				this.readString(ch)
				continue
			}

			if (isIdentStart(this.peekCodePoint())) {
				this.readIdentOrKeyword()
				continue
			}

			this.readOperatorOrDelimiter()
		}

		this.push(TokenKind.EOF, "", this.line, this.column, 0)
		return this.tokens
	}

	private peek(): string {
		return this.pos < this.source.length ? this.source.charAt(this.pos) : "\0"
	}

	private peekNext(): string {
		return this.pos + 1 < this.source.length ? this.source.charAt(this.pos + 1) : "\0"
	}

	/** The whole code point at the cursor, so letters outside the BMP read as one character. */
	private peekCodePoint(): string {
		const cp = this.source.codePointAt(this.pos)
		return cp === undefined ? "\0" : String.fromCodePoint(cp)
	}

	/** Consume one code point. Columns count UTF-16 units, like every other token. */
	private advanceCodePoint(): string {
		const ch = this.peekCodePoint()
		for (let i = 0; i < ch.length; i++) this.advance()
		return ch
	}

	private advance(): string {
		const ch = this.source.charAt(this.pos)
		this.pos++
		if (ch === "\n") {
			this.line++
			this.column = 1
		} else {
			this.column++
		}
		return ch
	}

	private push(kind: TokenKind, value: string, line: number, column: number, length: number) {
		this.tokens.push({ kind, value, line, column, length })
	}

	private skipWhitespaceAndComments() {
		while (this.pos < this.source.length) {
			const ch = this.peek()

			// Spaces and tabs only (newlines are tokens)
			if (ch === " " || ch === "\t" || ch === "\r") {
				this.advance()
				continue
			}

			// Line comment
			if (ch === "/" && this.peekNext() === "/") {
				while (this.pos < this.source.length && this.peek() !== "\n") {
					this.advance()
				}
				continue
			}

			// Block comment, may span lines
			if (ch === "/" && this.peekNext() === "*") {
				const line = this.line
				const column = this.column
				this.advance()
				this.advance()
				let closed = false
				while (this.pos < this.source.length) {
					if (this.peek() === "*" && this.peekNext() === "/") {
						this.advance()
						this.advance()
						closed = true
						break
					}
					this.advance()
				}
				if (!closed) {
					this.errors.error({ line, column, length: 2 }, "unterminated block comment")
				}
				continue
			}

			break
		}
	}

	private readNumber() {
		const startLine = this.line
		const startCol = this.column
		let value = ""

		while (this.pos < this.source.length && isDigit(this.peek())) {
			value += this.advance()
		}

		// `1.` is a number followed by a dot; only `1.5` is fractional
		if (this.peek() === "." && isDigit(this.peekNext())) {
			value += this.advance()
			while (this.pos < this.source.length && isDigit(this.peek())) {
				value += this.advance()
			}
		}

		this.push(TokenKind.Number, value, startLine, startCol, value.length)
	}

	private readString(quote: string) {
		const startLine = this.line
		const startCol = this.column
		const startPos = this.pos
		this.advance() // opening quote
		let value = ""
		let terminated = false

		while (this.pos < this.source.length) {
			const ch = this.peek()
			if (ch === quote) {
				this.advance()
				terminated = true
				break
			}
			if (ch === "\n") break
			if (ch === "\\") {
				const escLine = this.line
				const escCol = this.column
				this.advance()
				if (this.pos >= this.source.length || this.peek() === "\n") break
				const esc = this.advance()
				const decoded = ESCAPES.get(esc)
				if (decoded === undefined) {
					this.errors.error(
						{ line: escLine, column: escCol, length: 2 },
						`invalid escape sequence '\\${esc}' in string literal`,
						"valid escapes are \\n \\t \\r \\0 \\\\ \\\" and \\'",
					)
				} else {
					value += decoded
				}
				continue
			}
			value += this.advance()
		}

		if (!terminated) {
			this.errors.error(
				{ line: startLine, column: startCol, length: this.pos - startPos },
				"unterminated string literal",
				`add a closing ${quote} before the end of the line`,
			)
		}

		this.push(TokenKind.String, value, startLine, startCol, this.pos - startPos)
	}

	private readIdentOrKeyword() {
		const startLine = this.line
		const startCol = this.column
		let value = ""

		while (this.pos < this.source.length && isIdentPart(this.peekCodePoint())) {
			value += this.advanceCodePoint()
		}

		const kw = keywordKind(value)
		if (kw === TokenKind.Native) {
			this.readNative(startLine, startCol)
			return
		}
		this.push(kw ?? TokenKind.Ident, value, startLine, startCol, value.length)
	}

	/**
	 * Capture `native { ... }` as one token holding the text between the
	 * braces. Braces inside target-language strings and comments do not count.
	 */
	private readNative(startLine: number, startCol: number) {
		while (this.peek() === " " || this.peek() === "\t" || this.peek() === "\r" || this.peek() === "\n") {
			this.advance()
		}
		if (this.peek() !== "{") {
			this.errors.error(
				{ line: startLine, column: startCol, length: 6 },
				"expected '{' after 'native'",
			)
			return
		}
		this.advance()
		const bodyStart = this.pos
		let depth = 1

		while (this.pos < this.source.length) {
			const ch = this.peek()
			if (ch === "'" || ch === '"' || ch === "`") {
				this.skipRawString(ch)
				continue
			}
			if (ch === "/" && this.peekNext() === "/") {
				while (this.pos < this.source.length && this.peek() !== "\n") this.advance()
				continue
			}
			if (ch === "/" && this.peekNext() === "*") {
				this.advance()
				this.advance()
				while (this.pos < this.source.length && !(this.peek() === "*" && this.peekNext() === "/")) {
					this.advance()
				}
				if (this.pos < this.source.length) {
					this.advance()
					this.advance()
				}
				continue
			}
			if (ch === "{") depth++
			if (ch === "}") {
				depth--
				if (depth === 0) {
					const body = this.source.slice(bodyStart, this.pos)
					this.advance()
					this.push(TokenKind.Native, body, startLine, startCol, 6)
					return
				}
			}
			this.advance()
		}

		this.errors.error(
			{ line: startLine, column: startCol, length: 6 },
			"unterminated native block",
			"add a closing '}'",
		)
	}

	private skipRawString(quote: string) {
		this.advance()
		while (this.pos < this.source.length && this.peek() !== quote) {
			if (this.peek() === "\\") this.advance()
			if (this.pos < this.source.length) this.advance()
		}
		if (this.pos < this.source.length) this.advance()
	}

	private readOperatorOrDelimiter() {
		const ch = this.peek()
		const next = this.peekNext()
		const startLine = this.line
		const startCol = this.column

		// Two-character operators
		const two = ch + next
		const twoCharOp = TWO_CHAR_OPS.get(two)
		if (twoCharOp !== undefined) {
			this.advance()
			this.advance()
			this.push(twoCharOp, two, startLine, startCol, 2)
			return
		}

		// Single-character operators/delimiters
		const oneCharOp = ONE_CHAR_OPS.get(ch)
		if (oneCharOp !== undefined) {
			this.advance()
			if (oneCharOp === TokenKind.LParen || oneCharOp === TokenKind.LBracket) {
				this.groupDepth++
			} else if (
				(oneCharOp === TokenKind.RParen || oneCharOp === TokenKind.RBracket) &&
				this.groupDepth > 0
			) {
				this.groupDepth--
			} else if (oneCharOp === TokenKind.LBrace || oneCharOp === TokenKind.RBrace) {
				// A brace always starts or ends a block, so any unclosed group is abandoned
				this.groupDepth = 0
			}
			this.push(oneCharOp, ch, startLine, startCol, 1)
			return
		}

		const bad = this.advanceCodePoint()
		this.errors.error({ line: startLine, column: startCol, length: bad.length }, `invalid character '${bad}'`)
	}
}

/** Tokenize `source`, returning the token stream and any lexical diagnostics. */
export function tokenize(
	source: string,
	maxDiagnostics?: number,
): { tokens: Token[]; errors: DiagnosticList } {
	const lexer = new Lexer(source, maxDiagnostics)
	const tokens = lexer.tokenize()
	return { tokens, errors: lexer.errors }
}

const ESCAPES: ReadonlyMap<string, string> = new Map([
	["n", "\n"],
	["t", "\t"],
	["r", "\r"],
	["0", "\0"],
	["\\", "\\"],
	['"', '"'],
	["'", "'"],
])

const TWO_CHAR_OPS: ReadonlyMap<string, TokenKind> = new Map([
	["+=", TokenKind.PlusAssign],
	["-=", TokenKind.MinusAssign],
	["*=", TokenKind.StarAssign],
	["/=", TokenKind.SlashAssign],
	["==", TokenKind.Eq],
	["!=", TokenKind.NotEq],
	["<=", TokenKind.LtEq],
	[">=", TokenKind.GtEq],
	["&&", TokenKind.And],
	["||", TokenKind.Or],
])

const ONE_CHAR_OPS: ReadonlyMap<string, TokenKind> = new Map([
	["+", TokenKind.Plus],
	["-", TokenKind.Minus],
	["*", TokenKind.Star],
	["/", TokenKind.Slash],
	["%", TokenKind.Percent],
	["=", TokenKind.Assign],
	["<", TokenKind.Lt],
	[">", TokenKind.Gt],
	["!", TokenKind.Not],
	["(", TokenKind.LParen],
	[")", TokenKind.RParen],
	["{", TokenKind.LBrace],
	["}", TokenKind.RBrace],
	["[", TokenKind.LBracket],
	["]", TokenKind.RBracket],
	[",", TokenKind.Comma],
	[".", TokenKind.Dot],
	[":", TokenKind.Colon],
	[";", TokenKind.Semicolon],
])

function isDigit(ch: string): boolean {
	return ch >= "0" && ch <= "9"
}

// Letters of any script; every name that passes is also a valid JavaScript identifier
const IDENT_START = /^[\p{L}_]$/u
const IDENT_PART = /^[\p{L}\p{Mn}\p{Mc}\p{Nd}_]$/u

function isIdentStart(ch: string): boolean {
	return IDENT_START.test(ch)
}

function isIdentPart(ch: string): boolean {
	return IDENT_PART.test(ch)
}
