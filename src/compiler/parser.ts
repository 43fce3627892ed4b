import type {
	AssignOp,
	AssignStmt,
	BinaryOp,
	Block,
	Expr,
	FieldDecl,
	ForStmt,
	GameDecl,
	HandlerDecl,
	IfStmt,
	MethodDecl,
	NativeBlock,
	Param,
	Program,
	ReturnStmt,
	SceneBody,
	SceneDecl,
	Setting,
	Span,
	SpriteDecl,
	Stmt,
	WhileStmt,
} from "./ast"
import { DiagnosticList } from "./errors"
import type { Token } from "./token"
import { TokenKind, describeKind } from "./token"

// Operator precedence levels (lowest to highest)
const PREC_OR = 1
const PREC_AND = 2
const PREC_EQUALITY = 3
const PREC_COMPARISON = 4
const PREC_ADD = 5
const PREC_MUL = 6

function binaryPrecedence(kind: TokenKind): number {
	switch (kind) {
		case TokenKind.Or:
			return PREC_OR
		case TokenKind.And:
			return PREC_AND
		case TokenKind.Eq:
		case TokenKind.NotEq:
			return PREC_EQUALITY
		case TokenKind.Lt:
		case TokenKind.Gt:
		case TokenKind.LtEq:
		case TokenKind.GtEq:
			return PREC_COMPARISON
		case TokenKind.Plus:
		case TokenKind.Minus:
			return PREC_ADD
		case TokenKind.Star:
		case TokenKind.Slash:
		case TokenKind.Percent:
			return PREC_MUL
		default:
			return 0
	}
}

function tokenToBinaryOp(kind: TokenKind): BinaryOp | null {
	switch (kind) {
		case TokenKind.Plus:
			return "+"
		case TokenKind.Minus:
			return "-"
		case TokenKind.Star:
			return "*"
		case TokenKind.Slash:
			return "/"
		case TokenKind.Percent:
			return "%"
		case TokenKind.Eq:
			return "=="
		case TokenKind.NotEq:
			return "!="
		case TokenKind.Lt:
			return "<"
		case TokenKind.Gt:
			return ">"
		case TokenKind.LtEq:
			return "<="
		case TokenKind.GtEq:
			return ">="
		case TokenKind.And:
			return "and"
		case TokenKind.Or:
			return "or"
		default:
			return null
	}
}

function tokenToAssignOp(kind: TokenKind): AssignOp | null {
	switch (kind) {
		case TokenKind.Assign:
			return "="
		case TokenKind.PlusAssign:
			return "+="
		case TokenKind.MinusAssign:
			return "-="
		case TokenKind.StarAssign:
			return "*="
		case TokenKind.SlashAssign:
			return "/="
		default:
			return null
	}
}

// Tokens that start a declaration; error recovery stops in front of them.
const SYNC_KINDS = new Set<TokenKind>([
	TokenKind.Game,
	TokenKind.Sprite,
	TokenKind.Scene,
	TokenKind.On,
	TokenKind.Fn,
])

// Top-level declarations end recovery even inside a skipped block.
const DECLARATION_KINDS = new Set<TokenKind>([TokenKind.Game, TokenKind.Sprite, TokenKind.Scene])

/** Thrown to unwind out of a construct after its syntax error has been recorded. */
class ParseAbort extends Error {
	constructor(message: string) {
		super(message)
		this.name = "ParseAbort"
	}
}

export class Parser {
	private tokens: Token[]
	private pos = 0
	private errors: DiagnosticList

	constructor(tokens: Token[], maxDiagnostics?: number) {
		this.tokens = tokens
		this.errors = new DiagnosticList("parse", maxDiagnostics)
	}

	parse(): { program: Program; errors: DiagnosticList } {
		const span = this.span()
		const games: GameDecl[] = []
		const sprites: SpriteDecl[] = []
		const scenes: SceneDecl[] = []
		const natives: NativeBlock[] = []

		while (!this.isAtEnd()) {
			this.skipSeparators()
			if (this.isAtEnd()) break

			const start = this.pos
			try {
				switch (this.peekKind()) {
					case TokenKind.Game:
						games.push(this.parseGameDecl())
						break
					case TokenKind.Sprite:
						sprites.push(this.parseSpriteDecl())
						break
					case TokenKind.Scene:
						scenes.push(this.parseSceneDecl())
						break
					case TokenKind.Native:
						natives.push(this.parseNativeBlock())
						break
					default:
						throw this.error(
							`unexpected ${describeToken(this.peek())}, expected 'game', 'sprite', 'scene' or 'native'`,
						)
				}
			} catch (e) {
				this.recoverFrom(e, start)
			}
		}

		const program: Program = { kind: "Program", games, sprites, scenes, natives, span }
		return { program, errors: this.errors }
	}

	// --- Token helpers ---

	private peek(): Token {
		return this.tokens[this.pos] ?? this.endToken()
	}

	private peekKind(): TokenKind {
		return this.peek().kind
	}

	private peekAt(offset: number): Token {
		return this.tokens[this.pos + offset] ?? this.endToken()
	}

	private endToken(): Token {
		const last = this.tokens[this.tokens.length - 1]
		return { kind: TokenKind.EOF, value: "", line: last?.line ?? 1, column: last?.column ?? 1, length: 0 }
	}

	private advance(): Token {
		const tok = this.peek()
		if (this.pos < this.tokens.length) {
			this.pos++
		}
		return tok
	}

	private expect(kind: TokenKind): Token {
		const tok = this.peek()
		if (tok.kind !== kind) {
			throw this.error(`expected ${describeKind(kind)}, got ${describeToken(tok)}`)
		}
		return this.advance()
	}

	private check(kind: TokenKind): boolean {
		return this.peekKind() === kind
	}

	private match(kind: TokenKind): Token | null {
		if (this.check(kind)) {
			return this.advance()
		}
		return null
	}

	private isAtEnd(): boolean {
		return this.peekKind() === TokenKind.EOF
	}

	private span(): Span {
		const tok = this.peek()
		return { line: tok.line, column: tok.column, length: tok.length }
	}

	private skipNewlines(): void {
		while (this.check(TokenKind.Newline)) {
			this.advance()
		}
	}

	private skipSeparators(): void {
		while (this.check(TokenKind.Newline) || this.check(TokenKind.Semicolon)) {
			this.advance()
		}
	}

	/** A statement or member ends at a newline, a `;`, or the enclosing `}`. */
	private endStatement(): void {
		if (this.check(TokenKind.Newline) || this.check(TokenKind.Semicolon)) {
			this.skipSeparators()
			return
		}
		if (this.check(TokenKind.RBrace) || this.isAtEnd()) return
		throw this.error(`expected end of statement, got ${describeToken(this.peek())}`)
	}

	private error(message: string, hint?: string): ParseAbort {
		this.errors.error(this.span(), message, hint)
		return new ParseAbort(message)
	}

	private recoverFrom(e: unknown, startPos: number): void {
		if (!(e instanceof ParseAbort)) throw e
		this.recover(startPos)
	}

	private recover(startPos: number): void {
		// Skip to the next statement boundary. Always make progress, so a
		// construct that failed on its first token cannot loop forever.
		if (this.pos === startPos && !this.isAtEnd()) {
			this.advance()
		}
		// Blocks opened by the failed construct are skipped whole, so their
		// closing braces do not end the enclosing body.
		let depth = this.openBracesSince(startPos)
		while (!this.isAtEnd()) {
			const kind = this.peekKind()
			if (DECLARATION_KINDS.has(kind)) return
			if (kind === TokenKind.LBrace) {
				depth++
			} else if (kind === TokenKind.RBrace) {
				if (depth === 0) return
				depth--
			} else if (depth === 0) {
				if (kind === TokenKind.Newline || kind === TokenKind.Semicolon) {
					this.skipSeparators()
					return
				}
				if (SYNC_KINDS.has(kind)) return
			}
			this.advance()
		}
	}

	private openBracesSince(startPos: number): number {
		let depth = 0
		for (const tok of this.tokens.slice(startPos, this.pos)) {
			if (tok.kind === TokenKind.LBrace) depth++
			else if (tok.kind === TokenKind.RBrace && depth > 0) depth--
		}
		return depth
	}

	// --- Top-level declarations ---

	private parseGameDecl(): GameDecl {
		const span = this.span()
		this.expect(TokenKind.Game)
		const name = this.check(TokenKind.Ident) ? this.advance().value : ""
		this.skipNewlines()
		this.expect(TokenKind.LBrace)

		const settings: Setting[] = []
		this.skipSettingSeparators()
		while (!this.check(TokenKind.RBrace) && !this.isAtEnd()) {
			const start = this.pos
			try {
				const keySpan = this.span()
				const key = this.expect(TokenKind.Ident).value
				this.expect(TokenKind.Assign)
				const value = this.parseExpr()
				settings.push({ key, value, span: keySpan })
				if (!this.check(TokenKind.Comma)) {
					this.endStatement()
				}
			} catch (e) {
				this.recoverFrom(e, start)
			}
			this.skipSettingSeparators()
		}

		this.expect(TokenKind.RBrace)
		this.endStatement()
		return { kind: "GameDecl", name, settings, span }
	}

	private skipSettingSeparators(): void {
		while (
			this.check(TokenKind.Newline) ||
			this.check(TokenKind.Semicolon) ||
			this.check(TokenKind.Comma)
		) {
			this.advance()
		}
	}

	private parseSpriteDecl(): SpriteDecl {
		const span = this.span()
		this.expect(TokenKind.Sprite)
		const name = this.expect(TokenKind.Ident)
		this.skipNewlines()
		this.expect(TokenKind.LBrace)

		const fields: FieldDecl[] = []
		const handlers: HandlerDecl[] = []
		const methods: MethodDecl[] = []
		const natives: NativeBlock[] = []

		this.skipSeparators()
		while (!this.check(TokenKind.RBrace) && !this.isAtEnd()) {
			const start = this.pos
			try {
				switch (this.peekKind()) {
					case TokenKind.Ident:
						fields.push(this.parseFieldDecl())
						break
					case TokenKind.On:
						handlers.push(this.parseHandlerDecl())
						break
					case TokenKind.Fn:
						methods.push(this.parseMethodDecl())
						break
					case TokenKind.Native:
						natives.push(this.parseNativeBlock())
						break
					default:
						throw this.error(
							`unexpected ${describeToken(this.peek())} in sprite '${name.value}'`,
							"sprites contain fields (name = value), handlers (on event(...) { }) and methods (fn name(...) { })",
						)
				}
			} catch (e) {
				this.recoverFrom(e, start)
			}
			this.skipSeparators()
		}

		this.expect(TokenKind.RBrace)
		this.endStatement()
		return {
			kind: "SpriteDecl",
			name: name.value,
			fields,
			handlers,
			methods,
			natives,
			span: { line: name.line, column: name.column, length: name.length },
		}
	}

	private parseSceneDecl(): SceneDecl {
		this.expect(TokenKind.Scene)
		const name = this.expect(TokenKind.Ident)
		this.skipNewlines()
		this.expect(TokenKind.LBrace)

		const fields: FieldDecl[] = []
		let update: SceneBody | null = null
		let draw: SceneBody | null = null

		this.skipSeparators()
		while (!this.check(TokenKind.RBrace) && !this.isAtEnd()) {
			const start = this.pos
			try {
				const tok = this.peek()
				const isBody =
					tok.kind === TokenKind.Ident &&
					(tok.value === "update" || tok.value === "draw") &&
					this.peekAt(1).kind !== TokenKind.Assign

				if (isBody) {
					const body = this.parseSceneBody()
					if ((body.which === "update" ? update : draw) !== null) {
						this.errors.error(body.span, `duplicate '${body.which}' block in scene '${name.value}'`)
					} else if (body.which === "update") {
						update = body
					} else {
						draw = body
					}
				} else if (tok.kind === TokenKind.Ident) {
					fields.push(this.parseFieldDecl())
				} else {
					throw this.error(
						`unexpected ${describeToken(tok)} in scene '${name.value}'`,
						"scenes contain fields (name = value) and 'update { }' / 'draw { }' blocks",
					)
				}
			} catch (e) {
				this.recoverFrom(e, start)
			}
			this.skipSeparators()
		}

		this.expect(TokenKind.RBrace)
		this.endStatement()
		return {
			kind: "SceneDecl",
			name: name.value,
			fields,
			update,
			draw,
			span: { line: name.line, column: name.column, length: name.length },
		}
	}

	private parseSceneBody(): SceneBody {
		const span = this.span()
		const which = this.advance().value === "update" ? "update" : "draw"
		this.skipNewlines()
		const body = this.parseBlock()
		this.endStatement()
		return { kind: "SceneBody", which, body, span }
	}

	private parseFieldDecl(): FieldDecl {
		const span = this.span()
		const name = this.expect(TokenKind.Ident).value
		if (!this.check(TokenKind.Assign)) {
			throw this.error(
				`expected '=' after field name '${name}', got ${describeToken(this.peek())}`,
				"fields need an initial value, e.g. speed = 5",
			)
		}
		this.advance()
		const init = this.parseExpr()
		this.endStatement()
		return { kind: "FieldDecl", name, init, span }
	}

	private parseHandlerDecl(): HandlerDecl {
		this.expect(TokenKind.On)
		const span = this.span()
		const event = this.expect(TokenKind.Ident).value
		const params = this.parseParamList()
		this.skipNewlines()
		const body = this.parseBlock()
		this.endStatement()
		return { kind: "HandlerDecl", event, params, body, span }
	}

	private parseMethodDecl(): MethodDecl {
		this.expect(TokenKind.Fn)
		const span = this.span()
		const name = this.expect(TokenKind.Ident).value
		const params = this.parseParamList()
		this.skipNewlines()
		const body = this.parseBlock()
		this.endStatement()
		return { kind: "MethodDecl", name, params, body, span }
	}

	private parseNativeBlock(): NativeBlock {
		const span = this.span()
		const code = this.expect(TokenKind.Native).value
		this.endStatement()
		return { kind: "NativeBlock", code, span }
	}

	private parseParamList(): Param[] {
		this.expect(TokenKind.LParen)
		const params: Param[] = []
		if (!this.check(TokenKind.RParen)) {
			params.push(this.parseParam())
			while (this.match(TokenKind.Comma)) {
				params.push(this.parseParam())
			}
		}
		this.expect(TokenKind.RParen)
		return params
	}

	private parseParam(): Param {
		const span = this.span()
		const name = this.expect(TokenKind.Ident).value
		return { name, span }
	}

	// --- Block and statements ---

	private parseBlock(): Block {
		const span = this.span()
		this.expect(TokenKind.LBrace)
		this.skipSeparators()

		const stmts: Stmt[] = []
		while (!this.check(TokenKind.RBrace) && !this.isAtEnd()) {
			const start = this.pos
			try {
				stmts.push(this.parseStmt())
			} catch (e) {
				this.recoverFrom(e, start)
			}
			this.skipSeparators()
		}

		this.expect(TokenKind.RBrace)
		return { kind: "Block", stmts, span }
	}

	private parseStmt(): Stmt {
		switch (this.peekKind()) {
			case TokenKind.If: {
				const stmt = this.parseIfStmt()
				this.endStatement()
				return stmt
			}
			case TokenKind.While:
				return this.parseWhileStmt()
			case TokenKind.For:
				return this.parseForStmt()
			case TokenKind.Return:
				return this.parseReturnStmt()
			case TokenKind.Native: {
				const span = this.span()
				const code = this.advance().value
				this.endStatement()
				return { kind: "NativeStmt", code, span }
			}
			default:
				return this.parseExprOrAssignStmt()
		}
	}

	private parseIfStmt(): IfStmt {
		const span = this.span()
		this.expect(TokenKind.If)
		const condition = this.parseExpr()
		this.skipNewlines()
		const then = this.parseBlock()

		let else_: Block | IfStmt | null = null
		const beforeNewlines = this.pos
		this.skipNewlines()
		if (this.match(TokenKind.Else)) {
			this.skipNewlines()
			if (this.check(TokenKind.If)) {
				else_ = this.parseIfStmt()
			} else {
				else_ = this.parseBlock()
			}
		} else {
			// Leave the newline for endStatement()
			this.pos = beforeNewlines
		}
		return { kind: "IfStmt", condition, then, else_, span }
	}

	private parseWhileStmt(): WhileStmt {
		const span = this.span()
		this.expect(TokenKind.While)
		const condition = this.parseExpr()
		this.skipNewlines()
		const body = this.parseBlock()
		this.endStatement()
		return { kind: "WhileStmt", condition, body, span }
	}

	private parseForStmt(): ForStmt {
		const span = this.span()
		this.expect(TokenKind.For)
		const varTok = this.expect(TokenKind.Ident)
		const variable = {
			kind: "Ident" as const,
			name: varTok.value,
			span: { line: varTok.line, column: varTok.column, length: varTok.length },
		}
		if (!this.check(TokenKind.In)) {
			throw this.error(
				`expected 'in' after loop variable '${varTok.value}', got ${describeToken(this.peek())}`,
				"loops are written: for item in list { ... }",
			)
		}
		this.advance()
		const iterable = this.parseExpr()
		this.skipNewlines()
		const body = this.parseBlock()
		this.endStatement()
		return { kind: "ForStmt", variable, iterable, body, span }
	}

	private parseReturnStmt(): ReturnStmt {
		const span = this.span()
		this.expect(TokenKind.Return)

		if (
			this.check(TokenKind.Newline) ||
			this.check(TokenKind.Semicolon) ||
			this.check(TokenKind.RBrace) ||
			this.isAtEnd()
		) {
			this.endStatement()
			return { kind: "ReturnStmt", value: null, span }
		}

		const value = this.parseExpr()
		this.endStatement()
		return { kind: "ReturnStmt", value, span }
	}

	private parseExprOrAssignStmt(): Stmt {
		const span = this.span()
		const expr = this.parseExpr()

		const assignOp = tokenToAssignOp(this.peekKind())
		if (assignOp) {
			if (expr.kind !== "Ident" && expr.kind !== "MemberExpr" && expr.kind !== "IndexExpr") {
				throw this.error(
					`cannot assign to this expression`,
					"only names, fields (a.b) and elements (a[i]) can be assigned",
				)
			}
			this.advance()
			const value = this.parseExpr()
			this.endStatement()
			const stmt: AssignStmt = { kind: "AssignStmt", target: expr, op: assignOp, value, span }
			return stmt
		}

		this.endStatement()
		return { kind: "ExprStmt", expr, span }
	}

	// --- Expression parsing (precedence climbing) ---

	private parseExpr(): Expr {
		return this.parseBinary(0)
	}

	private parseBinary(minPrec: number): Expr {
		let left = this.parseUnary()

		while (true) {
			const prec = binaryPrecedence(this.peekKind())
			if (prec <= minPrec) break

			const op = tokenToBinaryOp(this.peekKind())
			if (!op) break

			this.advance()
			const right = this.parseBinary(prec)
			left = {
				kind: "BinaryExpr",
				op,
				left,
				right,
				span: left.span,
			}
		}

		return left
	}

	private parseUnary(): Expr {
		const span = this.span()

		if (this.match(TokenKind.Minus)) {
			const operand = this.parseUnary()
			return { kind: "UnaryExpr", op: "-", operand, span }
		}

		if (this.match(TokenKind.Not)) {
			const operand = this.parseUnary()
			return { kind: "UnaryExpr", op: "not", operand, span }
		}

		return this.parsePostfix()
	}

	private parsePostfix(): Expr {
		let expr = this.parsePrimary()

		while (true) {
			if (this.check(TokenKind.Dot)) {
				this.advance()
				const member = this.expect(TokenKind.Ident)
				expr = {
					kind: "MemberExpr",
					object: expr,
					member: member.value,
					span: { line: member.line, column: member.column, length: member.length },
				}
			} else if (this.check(TokenKind.LBracket)) {
				this.advance()
				const index = this.parseExpr()
				this.expect(TokenKind.RBracket)
				expr = { kind: "IndexExpr", object: expr, index, span: expr.span }
			} else if (this.check(TokenKind.LParen)) {
				const args = this.parseArgs()
				expr = { kind: "CallExpr", callee: expr, args, span: expr.span }
			} else {
				break
			}
		}

		return expr
	}

	private parseArgs(): Expr[] {
		this.expect(TokenKind.LParen)
		const args: Expr[] = []
		if (!this.check(TokenKind.RParen)) {
			args.push(this.parseExpr())
			while (this.match(TokenKind.Comma)) {
				args.push(this.parseExpr())
			}
		}
		this.expect(TokenKind.RParen)
		return args
	}

	private parsePrimary(): Expr {
		const span = this.span()

		switch (this.peekKind()) {
			case TokenKind.Number: {
				const tok = this.advance()
				return { kind: "NumberLiteral", value: Number(tok.value), span }
			}

			case TokenKind.String: {
				const tok = this.advance()
				return { kind: "StringLiteral", value: tok.value, span }
			}

			case TokenKind.True:
				this.advance()
				return { kind: "BoolLiteral", value: true, span }

			case TokenKind.False:
				this.advance()
				return { kind: "BoolLiteral", value: false, span }

			case TokenKind.Ident: {
				const name = this.advance().value
				return { kind: "Ident", name, span }
			}

			case TokenKind.LParen:
				return this.parseGroupOrTuple(span)

			case TokenKind.LBracket:
				return this.parseListLiteral(span)

			default:
				throw this.error(`unexpected ${describeToken(this.peek())} in expression`)
		}
	}

	/** `(expr)` groups; `(a, b)` and `(a,)` build a tuple. */
	private parseGroupOrTuple(span: Span): Expr {
		this.expect(TokenKind.LParen)
		const first = this.parseExpr()
		if (!this.check(TokenKind.Comma)) {
			this.expect(TokenKind.RParen)
			return first
		}

		const elements: Expr[] = [first]
		while (this.match(TokenKind.Comma)) {
			if (this.check(TokenKind.RParen)) break
			elements.push(this.parseExpr())
		}
		this.expect(TokenKind.RParen)
		return { kind: "TupleExpr", elements, span }
	}

	private parseListLiteral(span: Span): Expr {
		this.expect(TokenKind.LBracket)
		const elements: Expr[] = []
		if (!this.check(TokenKind.RBracket)) {
			elements.push(this.parseExpr())
			while (this.match(TokenKind.Comma)) {
				if (this.check(TokenKind.RBracket)) break
				elements.push(this.parseExpr())
			}
		}
		this.expect(TokenKind.RBracket)
		return { kind: "ListExpr", elements, span }
	}
}

function describeToken(tok: Token): string {
	switch (tok.kind) {
		case TokenKind.Ident:
			return `identifier '${tok.value}'`
		case TokenKind.Number:
			return `number ${tok.value}`
		case TokenKind.String:
			return "string literal"
		case TokenKind.Newline:
		case TokenKind.EOF:
		case TokenKind.Native:
			return describeKind(tok.kind)
		default:
			return `'${tok.value}'`
	}
}

export function parse(
	tokens: Token[],
	maxDiagnostics?: number,
): { program: Program; errors: DiagnosticList } {
	const parser = new Parser(tokens, maxDiagnostics)
	return parser.parse()
}
