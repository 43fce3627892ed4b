// Scope resolver and semantic validator, run as one pass over the tree.
// Pass 1 declares sprites, scenes and their members; pass 2 walks every body
// and classifies each identifier occurrence.

import type { Color, GameSettings } from "../../spec/host"
import type {
	AssignStmt,
	BinaryOp,
	Block,
	BodyOwner,
	CallExpr,
	Expr,
	FieldDecl,
	GameDecl,
	HandlerDecl,
	Ident,
	Param,
	Program,
	SceneDecl,
	Span,
	SpriteDecl,
	Stmt,
} from "./ast"
import { BUILTINS, INHERITED_METHODS, describeArity } from "./builtins"
import { DEFAULT_SETTINGS } from "./defaults"
import { DiagnosticList } from "./errors"
import { Frame, type Resolution, type SymbolInfo, isReservedName, suggestName } from "./scope"
import {
	BOOLEAN,
	LIST,
	NUMBER,
	SPRITE,
	STRING,
	UNKNOWN,
	type ValueType,
	clearlyDiffer,
	mayBe,
	typeToString,
} from "./types"

// --- Public interfaces ---

export interface SpriteInfo {
	readonly name: string
	readonly decl: SpriteDecl
	readonly frame: Frame
	/** Handlers by event kind, first declaration wins. */
	readonly handlers: ReadonlyMap<string, HandlerDecl>
}

export interface SceneInfo {
	readonly name: string
	readonly decl: SceneDecl
	readonly frame: Frame
	/** Position used by the active-scene index. */
	readonly index: number
}

export interface AnalysisResult {
	/** Classification of every identifier occurrence, keyed by node. */
	readonly resolutions: Map<Ident, Resolution>
	/** Locals each body declares, in first-assignment order. */
	readonly locals: Map<BodyOwner, SymbolInfo[]>
	readonly exprTypes: Map<Expr, ValueType>
	readonly sprites: Map<string, SpriteInfo>
	readonly scenes: Map<string, SceneInfo>
	readonly settings: GameSettings
	readonly errors: DiagnosticList
}

// --- Event registry ---

/** Event kind → the parameters its handler receives, in order. */
export const EVENT_SIGNATURES: ReadonlyMap<string, readonly string[]> = new Map([
	["keydown", ["key"]],
	["keyup", ["key"]],
	["mousedown", ["button", "x", "y"]],
	["mouseup", ["button", "x", "y"]],
	["mousemove", ["x", "y"]],
])

const SETTING_KEYS: ReadonlyMap<string, "string" | "number" | "color"> = new Map([
	["title", "string"],
	["width", "number"],
	["height", "number"],
	["fps", "number"],
	["background", "color"],
])

// Field names that would clash with members of the generated classes
const RESERVED_SPRITE_MEMBERS = new Set(["constructor", "destroy"])
const RESERVED_SCENE_MEMBERS = new Set(["constructor", "update", "draw"])

// --- Entry point ---

export function analyze(program: Program, maxDiagnostics?: number): AnalysisResult {
	const a = new Analyzer(maxDiagnostics)
	return a.analyze(program)
}

// --- Analyzer ---

interface FieldInitContext {
	readonly frame: Frame
	readonly initialized: Set<string>
}

class Analyzer {
	private errors: DiagnosticList
	private resolutions = new Map<Ident, Resolution>()
	private locals = new Map<BodyOwner, SymbolInfo[]>()
	private exprTypes = new Map<Expr, ValueType>()
	private sprites = new Map<string, SpriteInfo>()
	private scenes = new Map<string, SceneInfo>()
	private global = new Frame("global", null, "")
	private frame: Frame = this.global
	private currentBody: BodyOwner | null = null
	private fieldInit: FieldInitContext | null = null
	private settings: GameSettings = DEFAULT_SETTINGS

	constructor(maxDiagnostics?: number) {
		this.errors = new DiagnosticList("analyze", maxDiagnostics)
	}

	analyze(program: Program): AnalysisResult {
		this.registerBuiltins()
		this.pass1(program)
		this.pass2(program)
		return {
			resolutions: this.resolutions,
			locals: this.locals,
			exprTypes: this.exprTypes,
			sprites: this.sprites,
			scenes: this.scenes,
			settings: this.settings,
			errors: this.errors,
		}
	}

	private registerBuiltins(): void {
		for (const [name, info] of BUILTINS) {
			this.global.declare(name, "Builtin", null, { builtin: info })
		}
	}

	// --- Pass 1: collect declarations ---

	private pass1(program: Program): void {
		this.foldSettings(program.games)

		// Sprites and scenes share the global namespace
		for (const sprite of program.sprites) {
			if (!this.declareGlobal(sprite.name, "EntityTemplate", sprite.span, "sprite")) continue
			const frame = new Frame("sprite", this.global, sprite.name)
			this.sprites.set(sprite.name, {
				name: sprite.name,
				decl: sprite,
				frame,
				handlers: new Map(),
			})
		}

		for (const scene of program.scenes) {
			if (!this.declareGlobal(scene.name, "SceneTemplate", scene.span, "scene")) continue
			this.scenes.set(scene.name, {
				name: scene.name,
				decl: scene,
				frame: new Frame("scene", this.global, scene.name),
				index: this.scenes.size,
			})
		}

		for (const info of this.sprites.values()) {
			this.collectSpriteMembers(info)
		}
		for (const info of this.scenes.values()) {
			this.collectSceneMembers(info)
		}

		if (program.scenes.length === 0 && (program.sprites.length > 0 || program.games.length > 0)) {
			this.errors.warning(
				program.span,
				"program declares no scene; nothing will be updated or drawn",
				"add a scene with update { } and draw { } blocks",
			)
		}
	}

	/** Returns false when the name could not be declared. */
	private declareGlobal(
		name: string,
		kind: "EntityTemplate" | "SceneTemplate",
		span: Span,
		noun: string,
	): boolean {
		if (isReservedName(name)) {
			this.errors.error(span, `'${name}' cannot be used as a ${noun} name`, "the name is reserved")
			return false
		}
		const { symbol, duplicate } = this.global.declare(name, kind, span)
		if (!duplicate) return true

		if (symbol.kind === "Builtin") {
			this.errors.error(span, `${noun} '${name}' conflicts with the builtin '${name}'`)
		} else {
			const prev = symbol.span
			this.errors.error(
				span,
				`duplicate declaration of '${name}'`,
				prev ? `'${name}' was first declared at line ${prev.line}` : undefined,
			)
		}
		return false
	}

	private collectSpriteMembers(info: SpriteInfo): void {
		const { decl, frame } = info
		for (const [name, arity] of INHERITED_METHODS) {
			frame.declare(name, "Method", null, { arity })
		}

		for (const field of decl.fields) {
			if (field.name === "draw" || RESERVED_SPRITE_MEMBERS.has(field.name) || field.name.startsWith("on_")) {
				this.errors.error(
					field.span,
					`'${field.name}' cannot be used as a field name in sprite '${decl.name}'`,
					field.name === "draw" || field.name === "destroy"
						? `every sprite has a '${field.name}()' method`
						: undefined,
				)
				continue
			}
			this.declareMember(frame, field.name, "Field", field.span)
		}

		for (const method of decl.methods) {
			this.checkParams(method.params)
			if (RESERVED_SPRITE_MEMBERS.has(method.name) || method.name.startsWith("on_")) {
				this.errors.error(method.span, `'${method.name}' cannot be used as a method name`)
				continue
			}
			if (isReservedName(method.name)) {
				this.errors.error(method.span, `'${method.name}' cannot be used as a method name`, "the name is reserved")
				continue
			}
			const existing = frame.own(method.name)
			if (existing && existing.span === null) {
				// Overrides an inherited method
				frame.redeclare(method.name, "Method", method.span, method.params.length)
				continue
			}
			this.declareMember(frame, method.name, "Method", method.span, method.params.length)
		}

		const handlers = new Map<string, HandlerDecl>()
		for (const handler of decl.handlers) {
			this.checkParams(handler.params)
			const expected = EVENT_SIGNATURES.get(handler.event)
			if (!expected) {
				const suggestion = suggestName(handler.event, EVENT_SIGNATURES.keys())
				this.errors.error(
					handler.span,
					`unknown event '${handler.event}'`,
					suggestion
						? `did you mean '${suggestion}'?`
						: `known events are ${[...EVENT_SIGNATURES.keys()].join(", ")}`,
				)
				continue
			}
			if (handler.params.length !== expected.length) {
				this.errors.error(
					handler.span,
					`handler for '${handler.event}' takes ${expected.length} parameter${expected.length === 1 ? "" : "s"} (${expected.join(", ")}), got ${handler.params.length}`,
				)
			}
			if (handlers.has(handler.event)) {
				this.errors.error(handler.span, `duplicate handler for '${handler.event}' in sprite '${decl.name}'`)
				continue
			}
			handlers.set(handler.event, handler)
		}
		this.sprites.set(info.name, { ...info, handlers })
	}

	private collectSceneMembers(info: SceneInfo): void {
		for (const field of info.decl.fields) {
			if (RESERVED_SCENE_MEMBERS.has(field.name)) {
				this.errors.error(field.span, `'${field.name}' cannot be used as a field name in scene '${info.name}'`)
				continue
			}
			this.declareMember(info.frame, field.name, "Field", field.span)
		}
	}

	private declareMember(
		frame: Frame,
		name: string,
		kind: "Field" | "Method",
		span: Span,
		arity?: number,
	): void {
		const { symbol, duplicate } = frame.declare(name, kind, span, arity === undefined ? {} : { arity })
		if (duplicate) {
			this.errors.error(
				span,
				`duplicate declaration of '${name}' in '${frame.owner}'`,
				symbol.span ? `'${name}' was first declared at line ${symbol.span.line}` : undefined,
			)
		}
	}

	private checkParams(params: readonly Param[]): void {
		const seen = new Set<string>()
		for (const param of params) {
			if (isReservedName(param.name)) {
				this.errors.error(param.span, `'${param.name}' cannot be used as a parameter name`)
			}
			if (seen.has(param.name)) {
				this.errors.error(param.span, `duplicate parameter '${param.name}'`)
			}
			seen.add(param.name)
		}
	}

	// --- Game settings ---

	private foldSettings(games: readonly GameDecl[]): void {
		const [game, ...extra] = games
		for (const dup of extra) {
			this.errors.error(dup.span, "only one 'game' block is allowed")
		}
		if (!game) return

		let settings: GameSettings = { ...DEFAULT_SETTINGS, title: game.name || DEFAULT_SETTINGS.title }
		const seen = new Set<string>()
		for (const setting of game.settings) {
			this.analyzeExpr(setting.value)
			if (seen.has(setting.key)) {
				this.errors.error(setting.span, `duplicate game setting '${setting.key}'`)
				continue
			}
			seen.add(setting.key)

			const expected = SETTING_KEYS.get(setting.key)
			if (!expected) {
				this.errors.warning(
					setting.span,
					`unknown game setting '${setting.key}' is ignored`,
					`known settings are ${[...SETTING_KEYS.keys()].join(", ")}`,
				)
				continue
			}

			const value = constantValue(setting.value)
			switch (expected) {
				case "string":
					if (typeof value !== "string") {
						this.errors.error(setting.span, `game setting '${setting.key}' must be a constant string`)
					} else {
						settings = { ...settings, title: value }
					}
					break
				case "number":
					if (typeof value !== "number" || value <= 0) {
						this.errors.error(setting.span, `game setting '${setting.key}' must be a positive constant number`)
					} else if (setting.key === "width") {
						settings = { ...settings, width: value }
					} else if (setting.key === "height") {
						settings = { ...settings, height: value }
					} else {
						settings = { ...settings, fps: value }
					}
					break
				case "color": {
					const color = asColor(value)
					if (!color) {
						this.errors.error(
							setting.span,
							`game setting '${setting.key}' must be a color`,
							"write colors as (red, green, blue) with each channel 0-255",
						)
					} else {
						settings = { ...settings, background: color }
					}
					break
				}
			}
		}
		this.settings = settings
	}

	// --- Pass 2: bodies ---

	private pass2(program: Program): void {
		for (const sprite of program.sprites) {
			const info = this.sprites.get(sprite.name)
			// Duplicates were reported in pass 1; still check their bodies
			const frame = info && info.decl === sprite ? info.frame : new Frame("sprite", this.global, sprite.name)
			this.analyzeFieldInits(sprite.fields, frame)
			for (const handler of sprite.handlers) {
				this.analyzeBody(handler, handler.params, frame, `on ${handler.event}`)
			}
			for (const method of sprite.methods) {
				this.analyzeBody(method, method.params, frame, method.name)
			}
		}

		for (const scene of program.scenes) {
			const info = this.scenes.get(scene.name)
			const frame = info && info.decl === scene ? info.frame : new Frame("scene", this.global, scene.name)
			this.analyzeFieldInits(scene.fields, frame)
			if (scene.update) this.analyzeBody(scene.update, [], frame, "update")
			if (scene.draw) this.analyzeBody(scene.draw, [], frame, "draw")
		}
	}

	private analyzeFieldInits(fields: readonly FieldDecl[], frame: Frame): void {
		const context: FieldInitContext = { frame, initialized: new Set() }
		this.frame = frame
		this.fieldInit = context
		for (const field of fields) {
			this.analyzeExpr(field.init)
			context.initialized.add(field.name)
		}
		this.fieldInit = null
		this.frame = this.global
	}

	private analyzeBody(owner: BodyOwner, params: readonly Param[], parent: Frame, label: string): void {
		const frame = new Frame("body", parent, label)
		for (const param of params) {
			frame.declare(param.name, "Parameter", param.span)
		}
		this.frame = frame
		this.currentBody = owner
		this.locals.set(owner, [])
		this.analyzeBlock(owner.body)
		this.currentBody = null
		this.frame = this.global
	}

	private analyzeBlock(block: Block): void {
		for (const stmt of block.stmts) {
			this.analyzeStmt(stmt)
		}
	}

	private analyzeStmt(stmt: Stmt): void {
		switch (stmt.kind) {
			case "AssignStmt":
				this.analyzeAssign(stmt)
				break
			case "IfStmt": {
				this.analyzeExpr(stmt.condition)
				this.analyzeBlock(stmt.then)
				if (stmt.else_) {
					if (stmt.else_.kind === "IfStmt") {
						this.analyzeStmt(stmt.else_)
					} else {
						this.analyzeBlock(stmt.else_)
					}
				}
				break
			}
			case "WhileStmt":
				this.analyzeExpr(stmt.condition)
				this.analyzeBlock(stmt.body)
				break
			case "ForStmt":
				this.analyzeExpr(stmt.iterable)
				this.resolveTarget(stmt.variable, true)
				this.analyzeBlock(stmt.body)
				break
			case "ReturnStmt":
				if (stmt.value) this.analyzeExpr(stmt.value)
				break
			case "ExprStmt":
				this.analyzeExpr(stmt.expr)
				break
			case "NativeStmt":
				break
		}
	}

	private analyzeAssign(stmt: AssignStmt): void {
		// The value is evaluated before the target exists: `x = x + 1` reads x first
		const valueType = this.analyzeExpr(stmt.value)
		const target = stmt.target

		if (target.kind === "Ident") {
			this.resolveTarget(target, stmt.op === "=")
			if (stmt.op !== "=" && stmt.op !== "+=") {
				this.requireNumber(valueType, stmt.op.charAt(0), stmt.value.span)
			}
			return
		}

		this.analyzeExpr(target.object)
		if (target.kind === "IndexExpr") {
			this.analyzeExpr(target.index)
		}
	}

	// --- Identifier resolution ---

	/**
	 * Classify an assignment target. A plain `=` to an unknown name declares a
	 * local in the current body; compound assignment needs an existing binding.
	 */
	private resolveTarget(ident: Ident, mayDeclare: boolean): void {
		const symbol = this.frame.lookup(ident.name)

		if (!symbol) {
			if (!mayDeclare || !this.currentBody) {
				this.reportUndefined(ident)
				return
			}
			if (isReservedName(ident.name)) {
				this.errors.error(ident.span, `'${ident.name}' cannot be used as a variable name`)
			}
			const { symbol: local } = this.frame.declare(ident.name, "LocalVariable", ident.span)
			this.locals.get(this.currentBody)?.push(local)
			this.resolutions.set(ident, { kind: "local", symbol: local, declares: true })
			return
		}

		switch (symbol.frame.kind) {
			case "body":
				this.resolutions.set(ident, { kind: "local", symbol, declares: false })
				return
			case "sprite":
			case "scene":
				if (symbol.kind === "Method") {
					this.errors.error(ident.span, `cannot assign to method '${ident.name}'`)
				}
				this.resolutions.set(ident, { kind: "field", symbol })
				return
			case "global":
				this.errors.error(
					ident.span,
					`cannot assign to ${describeSymbol(symbol)}`,
					"choose a different variable name",
				)
				this.resolutions.set(ident, globalResolution(symbol))
				return
		}
	}

	/** Classify a read. Returns the symbol, or undefined when unresolved. */
	private resolveRead(ident: Ident): SymbolInfo | undefined {
		const symbol = this.frame.lookup(ident.name)
		if (!symbol) {
			this.reportUndefined(ident)
			return undefined
		}

		switch (symbol.frame.kind) {
			case "body":
				this.resolutions.set(ident, { kind: "local", symbol, declares: false })
				break
			case "sprite":
			case "scene":
				if (
					this.fieldInit &&
					this.fieldInit.frame === symbol.frame &&
					symbol.kind === "Field" &&
					!this.fieldInit.initialized.has(symbol.name)
				) {
					this.errors.warning(
						ident.span,
						`field '${ident.name}' is read before it is initialized`,
						"fields are initialized in declaration order",
					)
				}
				this.resolutions.set(ident, { kind: "field", symbol })
				break
			case "global":
				this.resolutions.set(ident, globalResolution(symbol))
				break
		}
		return symbol
	}

	private reportUndefined(ident: Ident): void {
		const suggestion = suggestName(ident.name, this.frame.visibleNames())
		this.errors.error(
			ident.span,
			`undefined reference '${ident.name}'`,
			suggestion ? `did you mean '${suggestion}'?` : undefined,
		)
		this.resolutions.set(ident, { kind: "unresolved" })
	}

	// --- Expressions ---

	private analyzeExpr(expr: Expr): ValueType {
		const type = this.inferExpr(expr)
		this.exprTypes.set(expr, type)
		return type
	}

	private inferExpr(expr: Expr): ValueType {
		switch (expr.kind) {
			case "NumberLiteral":
				return NUMBER
			case "StringLiteral":
				return STRING
			case "BoolLiteral":
				return BOOLEAN

			case "Ident": {
				const symbol = this.resolveRead(expr)
				if (!symbol) return UNKNOWN
				if (symbol.builtin) {
					if (symbol.builtin.callable) {
						this.errors.error(expr.span, `builtin function '${expr.name}' must be called`, `write ${expr.name}(...)`)
					}
					return symbol.builtin.returns
				}
				if (symbol.kind === "SceneTemplate") {
					this.errors.error(
						expr.span,
						`scene '${expr.name}' cannot be used as a value`,
						`use switch_scene(${expr.name}) to change scenes`,
					)
				}
				return UNKNOWN
			}

			case "BinaryExpr":
				return this.inferBinary(expr.op, this.analyzeExpr(expr.left), this.analyzeExpr(expr.right), expr.span)

			case "UnaryExpr": {
				const operand = this.analyzeExpr(expr.operand)
				if (expr.op === "-") {
					this.requireNumber(operand, "-", expr.span)
					return NUMBER
				}
				return BOOLEAN
			}

			case "CallExpr":
				return this.analyzeCall(expr)

			case "MemberExpr":
				this.analyzeExpr(expr.object)
				return UNKNOWN

			case "IndexExpr":
				this.analyzeExpr(expr.object)
				this.analyzeExpr(expr.index)
				return UNKNOWN

			case "TupleExpr":
			case "ListExpr":
				for (const el of expr.elements) this.analyzeExpr(el)
				return LIST
		}
	}

	private inferBinary(op: BinaryOp, left: ValueType, right: ValueType, span: Span): ValueType {
		switch (op) {
			case "+":
				if ((left === STRING && right === NUMBER) || (left === NUMBER && right === STRING)) {
					this.errors.error(span, "cannot add a string and a number", "convert the number with str(...)")
					return STRING
				}
				if (left === BOOLEAN || right === BOOLEAN) {
					this.errors.error(span, "operator '+' cannot be applied to a boolean")
					return UNKNOWN
				}
				if (left === LIST || right === LIST) {
					if (clearlyDiffer(left, right)) {
						const other = left === LIST ? right : left
						this.errors.error(span, `cannot add a list and a ${typeToString(other)}`)
					}
					return LIST
				}
				if (left === right) return left === SPRITE ? UNKNOWN : left
				return UNKNOWN
			case "-":
			case "*":
			case "/":
			case "%":
				if (this.requireNumber(left, op, span)) {
					this.requireNumber(right, op, span)
				}
				return NUMBER
			case "<":
			case ">":
			case "<=":
			case ">=":
				if (left === BOOLEAN || right === BOOLEAN) {
					this.errors.error(span, `operator '${op}' cannot compare booleans`)
				} else if (clearlyDiffer(left, right)) {
					this.errors.error(
						span,
						`cannot compare ${typeToString(left)} with ${typeToString(right)} using '${op}'`,
					)
				}
				return BOOLEAN
			case "==":
			case "!=":
				if (clearlyDiffer(left, right)) {
					this.errors.warning(
						span,
						`comparing ${typeToString(left)} with ${typeToString(right)} is always ${op === "==" ? "false" : "true"}`,
					)
				}
				return BOOLEAN
			default:
				// and / or yield one of their operands
				return left === right ? left : UNKNOWN
		}
	}

	/** Report a known non-number operand. Returns false when one was reported. */
	private requireNumber(type: ValueType, op: string, span: Span): boolean {
		if (mayBe(type, NUMBER)) return true
		this.errors.error(span, `operator '${op}' needs a number, got ${typeToString(type)}`)
		return false
	}

	private analyzeCall(call: CallExpr): ValueType {
		const callee = call.callee

		if (callee.kind !== "Ident") {
			this.analyzeExpr(callee)
			for (const arg of call.args) this.analyzeExpr(arg)
			return UNKNOWN
		}

		const symbol = this.resolveRead(callee)
		const builtin = symbol?.builtin
		if (builtin?.emit.kind === "switch_scene") {
			this.checkArity(call, builtin.minArgs, builtin.maxArgs, `'${callee.name}' expects ${describeArity(builtin)}`)
			this.analyzeSceneArg(call)
			return UNKNOWN
		}

		for (const arg of call.args) this.analyzeExpr(arg)
		if (!symbol) return UNKNOWN

		if (builtin) {
			if (!builtin.callable) {
				this.errors.error(callee.span, `'${callee.name}' is not a function`)
				return UNKNOWN
			}
			this.checkArity(call, builtin.minArgs, builtin.maxArgs, `'${callee.name}' expects ${describeArity(builtin)}`)
			return builtin.returns
		}

		switch (symbol.kind) {
			case "EntityTemplate":
				if (call.args.length > 0) {
					this.errors.error(
						callee.span,
						`sprite '${callee.name}' takes no arguments`,
						"create the sprite first, then assign its fields",
					)
				}
				return SPRITE
			case "SceneTemplate":
				this.errors.error(
					callee.span,
					`scene '${callee.name}' cannot be called`,
					`use switch_scene(${callee.name}) to change scenes`,
				)
				return UNKNOWN
			case "Method":
				if (symbol.arity !== undefined) {
					this.checkArity(
						call,
						symbol.arity,
						symbol.arity,
						`method '${callee.name}' expects ${symbol.arity} argument${symbol.arity === 1 ? "" : "s"}`,
					)
				}
				return UNKNOWN
			default:
				return UNKNOWN
		}
	}

	private checkArity(call: CallExpr, min: number, max: number, message: string): void {
		const n = call.args.length
		if (n < min || n > max) {
			this.errors.error(call.callee.span, `${message}, got ${n}`)
		}
	}

	/** `switch_scene(Name)`: the argument must name a scene. */
	private analyzeSceneArg(call: CallExpr): void {
		const [arg] = call.args
		if (!arg) return
		if (arg.kind !== "Ident") {
			this.analyzeExpr(arg)
			this.errors.error(arg.span, "switch_scene expects a scene name")
			return
		}
		const symbol = this.frame.lookup(arg.name)
		if (!symbol || symbol.kind !== "SceneTemplate") {
			const suggestion = suggestName(arg.name, this.scenes.keys())
			this.errors.error(
				arg.span,
				`'${arg.name}' is not a scene`,
				suggestion ? `did you mean '${suggestion}'?` : undefined,
			)
			this.resolutions.set(arg, { kind: "unresolved" })
			return
		}
		this.resolutions.set(arg, { kind: "global", symbol })
		if (this.scenes.size === 1) {
			this.errors.warning(call.callee.span, "switch_scene has no effect in a program with one scene")
		}
	}
}

// --- Helpers ---

function globalResolution(symbol: SymbolInfo): Resolution {
	return symbol.builtin ? { kind: "builtin", builtin: symbol.builtin } : { kind: "global", symbol }
}

function describeSymbol(symbol: SymbolInfo): string {
	switch (symbol.kind) {
		case "EntityTemplate":
			return `sprite '${symbol.name}'`
		case "SceneTemplate":
			return `scene '${symbol.name}'`
		case "Builtin":
			return `builtin '${symbol.name}'`
		default:
			return `'${symbol.name}'`
	}
}

type Constant = number | string | boolean | readonly Constant[]

/** Fold a literal expression, or undefined when it is not constant. */
export function constantValue(expr: Expr): Constant | undefined {
	switch (expr.kind) {
		case "NumberLiteral":
		case "StringLiteral":
		case "BoolLiteral":
			return expr.value
		case "UnaryExpr": {
			const inner = constantValue(expr.operand)
			if (expr.op === "-" && typeof inner === "number") return -inner
			if (expr.op === "not" && typeof inner === "boolean") return !inner
			return undefined
		}
		case "TupleExpr":
		case "ListExpr": {
			const values: Constant[] = []
			for (const el of expr.elements) {
				const v = constantValue(el)
				if (v === undefined) return undefined
				values.push(v)
			}
			return values
		}
		default:
			return undefined
	}
}

function asColor(value: Constant | undefined): Color | undefined {
	if (typeof value !== "object" || value.length !== 3) return undefined
	const [r, g, b] = value
	if (!isChannel(r) || !isChannel(g) || !isChannel(b)) return undefined
	return [r, g, b]
}

function isChannel(v: Constant | undefined): v is number {
	return typeof v === "number" && Number.isInteger(v) && v >= 0 && v <= 255
}
