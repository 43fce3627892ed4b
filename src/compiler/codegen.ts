// JavaScript codegen. Turns an analyzed tree into a program that drives a
// GameHost: one class per sprite and scene, plus the frame loop.

import type { AnalysisResult, SceneInfo, SpriteInfo } from "./analyzer"
import { EVENT_SIGNATURES } from "./analyzer"
import type {
	AssignStmt,
	BinaryExpr,
	Block,
	BodyOwner,
	CallExpr,
	Expr,
	FieldDecl,
	Ident,
	IfStmt,
	Param,
	Program,
	Stmt,
} from "./ast"
import { DEFAULT_COMPILE_OPTIONS, INDENT, type OutputFormat } from "./defaults"
import { CodeGenError } from "./errors"
import type { Resolution } from "./scope"
import { LIST } from "./types"

export interface CodegenOptions {
	readonly format: OutputFormat
	readonly filename: string
}

export function codegen(
	program: Program,
	analysis: AnalysisResult,
	options: Partial<CodegenOptions> = {},
): string {
	const gen = new JsCodegen(program, analysis, {
		format: options.format ?? DEFAULT_COMPILE_OPTIONS.format,
		filename: options.filename ?? DEFAULT_COMPILE_OPTIONS.filename,
	})
	return gen.generate()
}

export { codegen as generate }

// --- Operator precedence (JavaScript) ---

const PREC_ASSIGN = 2
const PREC_OR = 3
const PREC_AND = 4
const PREC_EQUALITY = 8
const PREC_RELATIONAL = 9
const PREC_ADD = 11
const PREC_MUL = 12
const PREC_UNARY = 14
const PREC_POSTFIX = 17
const PREC_PRIMARY = 20

const BINARY_OPS: ReadonlyMap<string, { js: string; prec: number }> = new Map([
	["or", { js: "||", prec: PREC_OR }],
	["and", { js: "&&", prec: PREC_AND }],
	["==", { js: "===", prec: PREC_EQUALITY }],
	["!=", { js: "!==", prec: PREC_EQUALITY }],
	["<", { js: "<", prec: PREC_RELATIONAL }],
	[">", { js: ">", prec: PREC_RELATIONAL }],
	["<=", { js: "<=", prec: PREC_RELATIONAL }],
	[">=", { js: ">=", prec: PREC_RELATIONAL }],
	["+", { js: "+", prec: PREC_ADD }],
	["-", { js: "-", prec: PREC_ADD }],
	["*", { js: "*", prec: PREC_MUL }],
	["/", { js: "/", prec: PREC_MUL }],
	["%", { js: "%", prec: PREC_MUL }],
])

// Runtime helpers, emitted only when a builtin or list operator needs them
const HELPERS: ReadonlyMap<string, readonly string[]> = new Map([
	[
		"$range",
		[
			"const $range = (start, stop, step = 1) => {",
			"  if (stop === undefined) [start, stop] = [0, start];",
			"  const out = [];",
			"  if (step > 0) for (let i = start; i < stop; i += step) out.push(i);",
			"  else if (step < 0) for (let i = start; i > stop; i += step) out.push(i);",
			"  return out;",
			"};",
		],
	],
	["$str", ["const $str = (value) => String(value);"]],
	["$int", ["const $int = (value) => Math.trunc(Number(value));"]],
	["$float", ["const $float = (value) => Number(value);"]],
	["$len", ["const $len = (value) => value.length;"]],
	["$randint", ["const $randint = (lo, hi) => lo + Math.floor(Math.random() * (hi - lo + 1));"]],
	[
		"$concat",
		[
			"const $concat = (a, b) => {",
			'  if (!Array.isArray(a) || !Array.isArray(b)) throw new TypeError("can only add a list to a list");',
			"  return [...a, ...b];",
			"};",
		],
	],
	[
		"$equals",
		[
			"const $equals = (a, b) => {",
			"  if (!Array.isArray(a) || !Array.isArray(b)) return a === b;",
			"  return a.length === b.length && a.every((v, i) => $equals(v, b[i]));",
			"};",
		],
	],
])

interface Emitted {
	readonly code: string
	readonly prec: number
}

class JsCodegen {
	private program: Program
	private analysis: AnalysisResult
	private options: CodegenOptions
	private out: string[] = []
	private depth = 0
	private usedHelpers = new Set<string>()

	constructor(program: Program, analysis: AnalysisResult, options: CodegenOptions) {
		this.program = program
		this.analysis = analysis
		this.options = options
	}

	generate(): string {
		// Classes first: helper usage is only known after the bodies are emitted
		const classes = this.capture(() => {
			this.emitEntityBase()
			for (const sprite of this.analysis.sprites.values()) {
				this.emitSprite(sprite)
			}
			for (const scene of this.analysis.scenes.values()) {
				this.emitScene(scene)
			}
		})
		const loop = this.capture(() => this.emitMainLoop())
		const prelude = this.capture(() => this.emitPrelude())

		const body = [...prelude, ...classes, ...loop]
		const natives = this.program.natives.flatMap((n) => reindent(n.code, ""))
		const header = `// Compiled from ${this.options.filename} by gamec.`

		if (this.options.format === "function") {
			return `${[header, ...natives, ...body].join("\n")}\n`
		}
		const lines = [
			header,
			...natives,
			"export async function main(host) {",
			...body.map((l) => (l === "" ? l : INDENT + l)),
			"}",
		]
		return `${lines.join("\n")}\n`
	}

	// --- Output helpers ---

	private line(text: string): void {
		this.out.push(text === "" ? "" : INDENT.repeat(this.depth) + text)
	}

	private indented(fn: () => void): void {
		this.depth++
		fn()
		this.depth--
	}

	private capture(fn: () => void): string[] {
		const saved = this.out
		const savedDepth = this.depth
		this.out = []
		this.depth = 0
		fn()
		const captured = this.out
		this.out = saved
		this.depth = savedDepth
		return captured
	}

	// --- Prelude ---

	private emitPrelude(): void {
		this.line(`const $settings = ${JSON.stringify(this.analysis.settings)};`)
		this.line("const $screen = host.init($settings);")
		this.line("const $live = new Set();")
		this.line("let $running = true;")
		if (this.analysis.scenes.size > 1) {
			this.line("let $activeScene = 0;")
		}
		for (const [name, lines] of HELPERS) {
			if (!this.usedHelpers.has(name)) continue
			for (const l of lines) this.line(l)
		}
		this.line("")
	}

	private emitEntityBase(): void {
		this.line("class $Entity {")
		this.indented(() => {
			this.line("constructor() {")
			this.indented(() => this.line("$live.add(this);"))
			this.line("}")
			this.line("draw() {")
			this.indented(() => this.line("host.drawEntity($screen, this);"))
			this.line("}")
			this.line("destroy() {")
			this.indented(() => this.line("$live.delete(this);"))
			this.line("}")
		})
		this.line("}")
		this.line("")
	}

	// --- Sprites and scenes ---

	private emitSprite(sprite: SpriteInfo): void {
		const decl = sprite.decl
		this.line(`class ${decl.name} extends $Entity {`)
		this.indented(() => {
			this.line("constructor() {")
			this.indented(() => {
				this.line("super();")
				this.emitFieldInits(decl.fields)
			})
			this.line("}")

			for (const [event, handler] of sprite.handlers) {
				this.emitMethod(`on_${event}`, handler.params, handler)
			}
			for (const method of decl.methods) {
				this.emitMethod(method.name, method.params, method)
			}
			for (const native of decl.natives) {
				for (const l of reindent(native.code, INDENT.repeat(this.depth))) this.out.push(l)
			}
		})
		this.line("}")
		this.line("")
	}

	private emitScene(scene: SceneInfo): void {
		const decl = scene.decl
		this.line(`class ${decl.name} {`)
		this.indented(() => {
			if (decl.fields.length > 0) {
				this.line("constructor() {")
				this.indented(() => this.emitFieldInits(decl.fields))
				this.line("}")
			}
			if (decl.update) this.emitMethod("update", [], decl.update)
			if (decl.draw) this.emitMethod("draw", [], decl.draw)
		})
		this.line("}")
		this.line("")
	}

	private emitFieldInits(fields: readonly FieldDecl[]): void {
		for (const field of fields) {
			this.line(`this.${field.name} = ${this.expr(field.init, PREC_ASSIGN)};`)
		}
	}

	private emitMethod(name: string, params: readonly Param[], owner: BodyOwner): void {
		const locals = this.analysis.locals.get(owner)
		if (!locals) {
			throw new CodeGenError(`body of '${name}' was not analyzed`, owner.span)
		}
		this.line(`${name}(${params.map((p) => p.name).join(", ")}) {`)
		this.indented(() => {
			if (locals.length > 0) {
				this.line(`let ${locals.map((l) => l.name).join(", ")};`)
			}
			this.emitStmts(owner.body)
		})
		this.line("}")
	}

	// --- Frame loop ---

	private emitMainLoop(): void {
		const scenes = [...this.analysis.scenes.values()]
		for (const scene of scenes) {
			this.line(`const $scene${scene.index} = new ${scene.name}();`)
		}
		if (scenes.length > 0) this.line("")

		this.line("while ($running) {")
		this.indented(() => {
			this.emitEventDispatch()
			this.line("if (!$running) break;")
			this.emitScenePhase(scenes, "update")
			this.line("$screen.fill($settings.background);")
			this.emitScenePhase(scenes, "draw")
			this.line("host.present($screen);")
			this.line("await host.nextFrame($settings.fps);")
		})
		this.line("}")
		this.line("host.shutdown();")
	}

	private emitEventDispatch(): void {
		this.line("for (const $event of host.pollEvents()) {")
		this.indented(() => {
			this.line('if ($event.type === "quit") {')
			this.indented(() => this.line("$running = false;"))

			for (const [event, fields] of EVENT_SIGNATURES) {
				const targets = [...this.analysis.sprites.values()].filter((s) => s.handlers.has(event))
				if (targets.length === 0) continue

				const args = fields.map((f) => `$event.${f}`).join(", ")
				this.line(`} else if ($event.type === ${JSON.stringify(event)}) {`)
				this.indented(() => {
					// Copy: handlers may create or destroy entities
					this.line("for (const $entity of [...$live]) {")
					this.indented(() => {
						for (const sprite of targets) {
							this.line(`if ($entity instanceof ${sprite.name}) $entity.on_${event}(${args});`)
						}
					})
					this.line("}")
				})
			}
			this.line("}")
		})
		this.line("}")
	}

	/** One scene: call unconditionally. Several: dispatch on the active index. */
	private emitScenePhase(scenes: readonly SceneInfo[], phase: "update" | "draw"): void {
		const active = scenes.filter((s) => s.decl[phase] !== null)
		if (active.length === 0) return

		if (scenes.length === 1) {
			this.line(`$scene0.${phase}();`)
			return
		}

		active.forEach((scene, i) => {
			const keyword = i === 0 ? "if" : "} else if"
			this.line(`${keyword} ($activeScene === ${scene.index}) {`)
			this.indented(() => this.line(`$scene${scene.index}.${phase}();`))
		})
		this.line("}")
	}

	// --- Statements ---

	private emitStmts(block: Block): void {
		for (const stmt of block.stmts) {
			this.emitStmt(stmt)
		}
	}

	private emitStmt(stmt: Stmt): void {
		switch (stmt.kind) {
			case "AssignStmt":
				this.emitAssign(stmt)
				break
			case "IfStmt":
				this.emitIf(stmt, "if")
				this.line("}")
				break
			case "WhileStmt":
				this.line(`while (${this.expr(stmt.condition, 0)}) {`)
				this.indented(() => this.emitStmts(stmt.body))
				this.line("}")
				break
			case "ForStmt":
				this.line(`for (${this.ident(stmt.variable)} of ${this.expr(stmt.iterable, PREC_ASSIGN)}) {`)
				this.indented(() => this.emitStmts(stmt.body))
				this.line("}")
				break
			case "ReturnStmt":
				this.line(stmt.value ? `return ${this.expr(stmt.value, 0)};` : "return;")
				break
			case "ExprStmt":
				this.line(`${this.expr(stmt.expr, 0)};`)
				break
			case "NativeStmt":
				for (const l of reindent(stmt.code, INDENT.repeat(this.depth))) this.out.push(l)
				break
		}
	}

	private emitAssign(stmt: AssignStmt): void {
		const target = stmt.target.kind === "Ident" ? this.ident(stmt.target) : this.expr(stmt.target, PREC_POSTFIX)
		if (stmt.op === "+=" && this.isList(stmt.value)) {
			this.usedHelpers.add("$concat")
			this.line(`${target} = $concat(${target}, ${this.expr(stmt.value, PREC_ASSIGN)});`)
			return
		}
		this.line(`${target} ${stmt.op} ${this.expr(stmt.value, PREC_ASSIGN)};`)
	}

	/** Emits the `if` chain; the caller closes the final brace. */
	private emitIf(stmt: IfStmt, keyword: string): void {
		this.line(`${keyword} (${this.expr(stmt.condition, 0)}) {`)
		this.indented(() => this.emitStmts(stmt.then))
		const else_ = stmt.else_
		if (!else_) return
		if (else_.kind === "IfStmt") {
			this.emitIf(else_, "} else if")
			return
		}
		this.line("} else {")
		this.indented(() => this.emitStmts(else_))
	}

	// --- Expressions ---

	/** Emit `e`, parenthesized when it binds looser than `minPrec`. */
	private expr(e: Expr, minPrec: number): string {
		const { code, prec } = this.emitExpr(e)
		return prec < minPrec ? `(${code})` : code
	}

	private emitExpr(e: Expr): Emitted {
		switch (e.kind) {
			case "NumberLiteral":
				return { code: String(e.value), prec: PREC_PRIMARY }
			case "StringLiteral":
				return { code: JSON.stringify(e.value), prec: PREC_PRIMARY }
			case "BoolLiteral":
				return { code: String(e.value), prec: PREC_PRIMARY }

			case "Ident":
				return { code: this.ident(e), prec: PREC_PRIMARY }

			case "BinaryExpr": {
				if (this.involvesList(e)) return this.emitListOp(e)
				const op = BINARY_OPS.get(e.op)
				if (!op) throw new CodeGenError(`unsupported operator '${e.op}'`, e.span)
				// Left-associative: the right operand needs strictly tighter binding
				const left = this.expr(e.left, op.prec)
				const right = this.expr(e.right, op.prec + 1)
				return { code: `${left} ${op.js} ${right}`, prec: op.prec }
			}

			case "UnaryExpr": {
				const js = e.op === "-" ? "-" : "!"
				const operand =
					e.operand.kind === "UnaryExpr"
						? `(${this.expr(e.operand, 0)})`
						: this.expr(e.operand, PREC_UNARY)
				return { code: `${js}${operand}`, prec: PREC_UNARY }
			}

			case "CallExpr":
				return this.emitCall(e)

			case "MemberExpr": {
				// `1.x` would lex as a malformed number
				const object =
					e.object.kind === "NumberLiteral"
						? `(${this.expr(e.object, 0)})`
						: this.expr(e.object, PREC_POSTFIX)
				return { code: `${object}.${e.member}`, prec: PREC_POSTFIX }
			}

			case "IndexExpr":
				return {
					code: `${this.expr(e.object, PREC_POSTFIX)}[${this.expr(e.index, 0)}]`,
					prec: PREC_POSTFIX,
				}

			case "TupleExpr":
			case "ListExpr":
				return { code: `[${this.args(e.elements)}]`, prec: PREC_PRIMARY }
		}
	}

	/** `+` and equality on a known list work on elements, not on JavaScript's coercions. */
	private involvesList(e: BinaryExpr): boolean {
		if (e.op !== "+" && e.op !== "==" && e.op !== "!=") return false
		return this.isList(e.left) || this.isList(e.right)
	}

	private isList(e: Expr): boolean {
		return this.analysis.exprTypes.get(e) === LIST
	}

	private emitListOp(e: BinaryExpr): Emitted {
		const helper = e.op === "+" ? "$concat" : "$equals"
		this.usedHelpers.add(helper)
		const call = `${helper}(${this.expr(e.left, PREC_ASSIGN)}, ${this.expr(e.right, PREC_ASSIGN)})`
		return e.op === "!=" ? { code: `!${call}`, prec: PREC_UNARY } : { code: call, prec: PREC_POSTFIX }
	}

	private args(exprs: readonly Expr[]): string {
		return exprs.map((a) => this.expr(a, PREC_ASSIGN)).join(", ")
	}

	private emitCall(call: CallExpr): Emitted {
		const callee = call.callee
		if (callee.kind !== "Ident") {
			return { code: `${this.expr(callee, PREC_POSTFIX)}(${this.args(call.args)})`, prec: PREC_POSTFIX }
		}

		const res = this.resolution(callee)
		switch (res.kind) {
			case "builtin": {
				const emit = res.builtin.emit
				switch (emit.kind) {
					case "call": {
						const helper = emit.target.startsWith("$") ? emit.target : null
						if (helper) this.usedHelpers.add(helper)
						const args = [...emit.prefix, ...call.args.map((a) => this.expr(a, PREC_ASSIGN))]
						return { code: `${emit.target}(${args.join(", ")})`, prec: PREC_POSTFIX }
					}
					case "value":
						return { code: `${emit.target}(${this.args(call.args)})`, prec: PREC_POSTFIX }
					case "quit":
						return { code: "$running = false", prec: PREC_ASSIGN }
					case "switch_scene":
						return this.emitSwitchScene(call)
				}
			}
			case "global":
				if (res.symbol.kind === "EntityTemplate") {
					return { code: `new ${callee.name}(${this.args(call.args)})`, prec: PREC_POSTFIX }
				}
				throw new CodeGenError(`cannot call scene '${callee.name}'`, callee.span)
			case "local":
			case "field":
				return { code: `${this.ident(callee)}(${this.args(call.args)})`, prec: PREC_POSTFIX }
			case "unresolved":
				throw new CodeGenError(`unresolved identifier '${callee.name}'`, callee.span)
		}
	}

	private emitSwitchScene(call: CallExpr): Emitted {
		const [arg] = call.args
		const res = arg?.kind === "Ident" ? this.resolution(arg) : undefined
		const scene = res?.kind === "global" ? this.analysis.scenes.get(res.symbol.name) : undefined
		if (!scene) {
			throw new CodeGenError("switch_scene needs a scene name", call.span)
		}
		if (this.analysis.scenes.size === 1) {
			return { code: "void 0", prec: PREC_UNARY }
		}
		return { code: `$activeScene = ${scene.index}`, prec: PREC_ASSIGN }
	}

	// --- Identifiers ---

	private resolution(ident: Ident): Resolution {
		const res = this.analysis.resolutions.get(ident)
		if (!res) {
			throw new CodeGenError(`identifier '${ident.name}' has no resolution`, ident.span)
		}
		return res
	}

	/** Name as the target sees it, qualified exactly as the analyzer classified it. */
	private ident(ident: Ident): string {
		const res = this.resolution(ident)
		switch (res.kind) {
			case "local":
				return ident.name
			case "field":
				return `this.${ident.name}`
			case "global":
				if (res.symbol.kind !== "EntityTemplate") {
					throw new CodeGenError(`scene '${ident.name}' used as a value`, ident.span)
				}
				return ident.name
			case "builtin": {
				const emit = res.builtin.emit
				if (emit.kind !== "value") {
					throw new CodeGenError(`builtin '${ident.name}' used as a value`, ident.span)
				}
				return emit.target
			}
			case "unresolved":
				throw new CodeGenError(`unresolved identifier '${ident.name}'`, ident.span)
		}
	}
}

/**
 * Strip the common leading whitespace from a raw block and indent it to
 * `indent`. Blank first and last lines (the ones next to the braces) are
 * dropped; everything else is kept as written. Lines that continue a
 * template literal are part of its value and stay untouched.
 */
export function reindent(code: string, indent: string): string[] {
	// JavaScript reads CRLF inside a template literal as LF
	const lines = code.split("\n").map((l) => (l.endsWith("\r") ? l.slice(0, -1) : l))
	while (lines.length > 0 && (lines[0] ?? "").trim() === "") lines.shift()
	while (lines.length > 0 && (lines[lines.length - 1] ?? "").trim() === "") lines.pop()
	const literal = templateContinuations(lines)

	let common: number | null = null
	for (const [i, l] of lines.entries()) {
		if (literal.has(i) || l.trim() === "") continue
		const lead = l.length - l.trimStart().length
		common = common === null ? lead : Math.min(common, lead)
	}
	const strip = common ?? 0
	return lines.map((l, i) => {
		if (literal.has(i)) return l
		return l.trim() === "" ? "" : indent + l.slice(strip)
	})
}

/** Indexes of the lines that begin inside a template literal. */
function templateContinuations(lines: readonly string[]): Set<number> {
	const inside = new Set<number>()
	let quote: string | null = null
	let blockComment = false
	lines.forEach((line, index) => {
		if (quote === "`") inside.add(index)
		for (let i = 0; i < line.length; i++) {
			const ch = line[i]
			if (blockComment) {
				if (ch === "*" && line[i + 1] === "/") {
					blockComment = false
					i++
				}
			} else if (quote !== null) {
				if (ch === "\\") i++
				else if (ch === quote) quote = null
			} else if (ch === "/" && line[i + 1] === "/") {
				break
			} else if (ch === "/" && line[i + 1] === "*") {
				blockComment = true
				i++
			} else if (ch === "'" || ch === '"' || ch === "`") {
				quote = ch
			}
		}
	})
	return inside
}
