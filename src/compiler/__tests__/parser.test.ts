import { describe, expect, it } from "vitest"
import type { Block, Expr, Program, SceneDecl, Stmt } from "../ast"
import type { DiagnosticList } from "../errors"
import { Lexer } from "../lexer"
import { parse } from "../parser"

function parseSource(source: string): { program: Program; errors: DiagnosticList } {
	const tokens = new Lexer(source).tokenize()
	return parse(tokens)
}

function parseValid(source: string): Program {
	const { program, errors } = parseSource(source)
	if (errors.hasErrors()) {
		const msgs = errors.errors.map((e) => `${e.line}:${e.column}: ${e.message}`).join("\n")
		throw new Error(`Expected no errors but got:\n${msgs}`)
	}
	return program
}

function errorMessages(source: string): string[] {
	return parseSource(source).errors.errors.map((e) => e.message)
}

function onlyScene(program: Program): SceneDecl {
	const [scene] = program.scenes
	if (!scene) throw new Error("expected a scene")
	return scene
}

/** Statements of the single scene's update block. */
function updateStmts(body: string): Stmt[] {
	const scene = onlyScene(parseValid(`scene Main {\n\tupdate {\n${body}\n\t}\n}`))
	if (!scene.update) throw new Error("expected an update block")
	return scene.update.body.stmts
}

function stmtAt(stmts: readonly Stmt[], index: number): Stmt {
	const stmt = stmts[index]
	if (!stmt) throw new Error(`no statement at ${index}`)
	return stmt
}

/** Value of the assignment at `index`. */
function assignedValue(stmts: readonly Stmt[], index: number): Expr {
	const stmt = stmtAt(stmts, index)
	if (stmt.kind !== "AssignStmt") throw new Error(`expected an assignment, got ${stmt.kind}`)
	return stmt.value
}

function firstStmt(block: Block): Stmt {
	return stmtAt(block.stmts, 0)
}

describe("declarations", () => {
	it("parses a game block with comma-separated settings", () => {
		const program = parseValid('game Pong { width = 640, height = 480\n title = "Pong!" }')
		expect(program.games).toHaveLength(1)
		expect(program.games[0]?.name).toBe("Pong")
		expect(program.games[0]?.settings.map((s) => s.key)).toEqual(["width", "height", "title"])
	})

	it("parses sprite fields, handlers and methods", () => {
		const program = parseValid(`sprite Ball {
	x = 0
	y = 0
	on keydown(key) { x = 1 }
	fn move(dx, dy) {
		x += dx
		y += dy
	}
}`)
		const ball = program.sprites[0]
		expect(ball?.name).toBe("Ball")
		expect(ball?.fields.map((f) => f.name)).toEqual(["x", "y"])
		expect(ball?.handlers.map((h) => h.event)).toEqual(["keydown"])
		expect(ball?.handlers[0]?.params.map((p) => p.name)).toEqual(["key"])
		expect(ball?.methods.map((m) => m.name)).toEqual(["move"])
		expect(ball?.methods[0]?.params.map((p) => p.name)).toEqual(["dx", "dy"])
		expect(ball?.methods[0]?.body.stmts).toHaveLength(2)
	})

	it("accepts the entity alias and a brace on the next line", () => {
		const program = parseValid("entity Coin\n{\n\tvalue = 5\n}")
		expect(program.sprites[0]?.name).toBe("Coin")
	})

	it("parses scene fields with update and draw blocks", () => {
		const scene = onlyScene(
			parseValid(`scene Main {
	score = 0
	update { score += 1 }
	draw { draw_text(str(score), 10, 10, (255, 255, 255)) }
}`),
		)
		expect(scene.fields.map((f) => f.name)).toEqual(["score"])
		expect(scene.update?.body.stmts[0]?.kind).toBe("AssignStmt")
		expect(scene.draw?.body.stmts[0]?.kind).toBe("ExprStmt")
	})

	it("treats update followed by '=' as a field", () => {
		const scene = onlyScene(parseValid("scene Main { update = 1 }"))
		expect(scene.fields.map((f) => f.name)).toEqual(["update"])
		expect(scene.update).toBeNull()
	})

	it("reports a duplicate update block", () => {
		expect(errorMessages("scene Main {\n\tupdate { }\n\tupdate { }\n}")).toEqual([
			"duplicate 'update' block in scene 'Main'",
		])
	})

	it("keeps top-level native blocks", () => {
		const program = parseValid("native {\n  function helper() { return 1 }\n}")
		expect(program.natives).toHaveLength(1)
		expect(program.natives[0]?.code).toBe("\n  function helper() { return 1 }\n")
	})

	it("requires an initial value for fields", () => {
		expect(errorMessages("sprite A {\n\tspeed\n}")).toEqual([
			"expected '=' after field name 'speed', got end of line",
		])
	})
})

describe("statements", () => {
	it("parses for-in over a range call", () => {
		const stmts = updateStmts("\t\tfor v in range(a, b) { }")
		const loop = stmtAt(stmts, 0)
		expect(loop.kind).toBe("ForStmt")
		if (loop.kind !== "ForStmt") return
		expect(loop.variable.name).toBe("v")
		expect(loop.iterable.kind).toBe("CallExpr")
		if (loop.iterable.kind !== "CallExpr") return
		expect(loop.iterable.args).toHaveLength(2)
		expect(loop.body.stmts).toEqual([])
	})

	it("requires 'in' after the loop variable", () => {
		const messages = errorMessages("scene Main {\n\tupdate {\n\t\tfor v range(3) { }\n\t}\n}")
		expect(messages[0]).toBe("expected 'in' after loop variable 'v', got identifier 'range'")
	})

	it("parses if / else if / else across lines", () => {
		const stmts = updateStmts("\t\tif a { }\n\t\telse if b { }\n\t\telse { }")
		const stmt = stmtAt(stmts, 0)
		if (stmt.kind !== "IfStmt") throw new Error("expected if")
		expect(stmt.else_?.kind).toBe("IfStmt")
		if (stmt.else_?.kind !== "IfStmt") return
		expect(stmt.else_.else_?.kind).toBe("Block")
	})

	it("parses while and return", () => {
		const stmts = updateStmts("\t\twhile x < 3 { x += 1 }\n\t\treturn")
		expect(stmts.map((s) => s.kind)).toEqual(["WhileStmt", "ReturnStmt"])
	})

	it("parses compound assignment operators", () => {
		const stmts = updateStmts("\t\tx += 1\n\t\tx -= 1\n\t\tx *= 2\n\t\tx /= 2")
		expect(stmts.map((s) => (s.kind === "AssignStmt" ? s.op : s.kind))).toEqual(["+=", "-=", "*=", "/="])
	})

	it("separates statements with semicolons", () => {
		const stmts = updateStmts("\t\tx = 1; y = 2")
		expect(stmts).toHaveLength(2)
	})

	it("parses member and index assignment targets", () => {
		const stmts = updateStmts("\t\tball.x = 1\n\t\titems[0] = 2")
		const kinds = stmts.map((s) => (s.kind === "AssignStmt" ? s.target.kind : s.kind))
		expect(kinds).toEqual(["MemberExpr", "IndexExpr"])
	})

	it("keeps native statements", () => {
		const stmts = updateStmts("\t\tnative { debugger }")
		const stmt = stmtAt(stmts, 0)
		expect(stmt.kind).toBe("NativeStmt")
		if (stmt.kind === "NativeStmt") expect(stmt.code).toBe(" debugger ")
	})

	it("lets call arguments span lines", () => {
		const stmts = updateStmts("\t\tprint(1,\n\t\t\t2)")
		expect(stmts).toHaveLength(1)
	})
})

describe("expressions", () => {
	it("binds multiplication tighter than addition", () => {
		const value = assignedValue(updateStmts("\t\tx = 1 + 2 * 3"), 0)
		if (value.kind !== "BinaryExpr") throw new Error("expected binary")
		expect(value.op).toBe("+")
		expect(value.left.kind).toBe("NumberLiteral")
		expect(value.right.kind === "BinaryExpr" && value.right.op).toBe("*")
	})

	it("binds and tighter than or", () => {
		const value = assignedValue(updateStmts("\t\tx = a or b and c"), 0)
		if (value.kind !== "BinaryExpr") throw new Error("expected binary")
		expect(value.op).toBe("or")
		expect(value.right.kind === "BinaryExpr" && value.right.op).toBe("and")
	})

	it("is left-associative", () => {
		const value = assignedValue(updateStmts("\t\tx = 10 - 4 - 3"), 0)
		if (value.kind !== "BinaryExpr") throw new Error("expected binary")
		expect(value.left.kind === "BinaryExpr" && value.left.op).toBe("-")
		expect(value.right.kind).toBe("NumberLiteral")
	})

	it("parses unary operators", () => {
		const stmts = updateStmts("\t\tx = -a\n\t\ty = not b\n\t\tz = !c")
		expect(stmts.map((s) => (s.kind === "AssignStmt" && s.value.kind === "UnaryExpr" ? s.value.op : null))).toEqual([
			"-",
			"not",
			"not",
		])
	})

	it("distinguishes groups from tuples", () => {
		const stmts = updateStmts("\t\ta = (1)\n\t\tb = (1, 2)\n\t\tc = (1,)")
		expect(assignedValue(stmts, 0).kind).toBe("NumberLiteral")
		const pair = assignedValue(stmts, 1)
		expect(pair.kind === "TupleExpr" && pair.elements.length).toBe(2)
		const single = assignedValue(stmts, 2)
		expect(single.kind === "TupleExpr" && single.elements.length).toBe(1)
	})

	it("parses list literals", () => {
		const value = assignedValue(updateStmts("\t\tl = [1, 2, 3]"), 0)
		expect(value.kind === "ListExpr" && value.elements.length).toBe(3)
	})

	it("chains member access, indexing and calls", () => {
		const value = assignedValue(updateStmts("\t\tr = a.b[0](1)"), 0)
		if (value.kind !== "CallExpr") throw new Error("expected call")
		expect(value.callee.kind).toBe("IndexExpr")
		if (value.callee.kind !== "IndexExpr") return
		expect(value.callee.object.kind).toBe("MemberExpr")
	})

	it("parses number, string and boolean literals", () => {
		const stmts = updateStmts('\t\ta = 2.5\n\t\tb = "hi"\n\t\tc = true')
		const a = assignedValue(stmts, 0)
		expect(a.kind === "NumberLiteral" && a.value).toBe(2.5)
		const b = assignedValue(stmts, 1)
		expect(b.kind === "StringLiteral" && b.value).toBe("hi")
		const c = assignedValue(stmts, 2)
		expect(c.kind === "BoolLiteral" && c.value).toBe(true)
	})
})

describe("errors and recovery", () => {
	it("rejects assignment to a call", () => {
		expect(errorMessages("scene Main {\n\tupdate {\n\t\tf() = 3\n\t}\n}")).toEqual([
			"cannot assign to this expression",
		])
	})

	it("reports trailing tokens on a statement", () => {
		expect(errorMessages("scene Main {\n\tupdate {\n\t\tx = 1 2\n\t}\n}")).toEqual([
			"expected end of statement, got number 2",
		])
	})

	it("reports unexpected top-level tokens", () => {
		expect(errorMessages("foo")).toEqual([
			"unexpected identifier 'foo', expected 'game', 'sprite', 'scene' or 'native'",
		])
	})

	it("reports several independent errors in one run", () => {
		const { program, errors } = parseSource(`scene Main {
	update {
		x = = 1
		y = )
		z = 3
	}
}`)
		expect(errors.errors.map((e) => [e.line, e.message])).toEqual([
			[3, "unexpected '=' in expression"],
			[4, "unexpected ')' in expression"],
		])
		const update = onlyScene(program).update
		expect(update && firstStmt(update.body).kind).toBe("AssignStmt")
		expect(update?.body.stmts).toHaveLength(1)
	})

	it("skips the whole block of a statement with a bad header", () => {
		const { program, errors } = parseSource(`sprite A {
	x = 1
	on keydown(key) {
		if {
			y = 1
		}
		x = 2
	}
	fn m() { }
}`)
		expect(errors.errors.map((e) => [e.line, e.message])).toEqual([[4, "unexpected '{' in expression"]])
		const sprite = program.sprites[0]
		expect(sprite?.fields.map((f) => f.name)).toEqual(["x"])
		expect(sprite?.methods.map((m) => m.name)).toEqual(["m"])
		expect(sprite?.handlers[0]?.body.stmts).toHaveLength(1)
	})

	it("keeps parsing the body after a broken loop condition", () => {
		const { program, errors } = parseSource("scene Main {\n\tupdate {\n\t\twhile x + { y = 1 }\n\t\tz = 2\n\t}\n}")
		expect(errors.errors.map((e) => e.message)).toEqual(["unexpected '{' in expression"])
		const update = onlyScene(program).update
		expect(update?.body.stmts).toHaveLength(1)
		expect(update && firstStmt(update.body).kind).toBe("AssignStmt")
	})

	it("recovers at the next declaration", () => {
		const { program, errors } = parseSource("sprite { }\nsprite Good { x = 1 }")
		expect(errors.hasErrors()).toBe(true)
		expect(program.sprites.map((s) => s.name)).toEqual(["Good"])
	})

	it("records the phase on every diagnostic", () => {
		const { errors } = parseSource("foo")
		expect(errors.diagnostics.every((d) => d.phase === "parse")).toBe(true)
	})
})
