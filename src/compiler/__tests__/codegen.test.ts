import { describe, expect, it } from "vitest"
import { analyze } from "../analyzer"
import type { AnalysisResult } from "../analyzer"
import type { Program } from "../ast"
import { codegen, reindent } from "../codegen"
import type { OutputFormat } from "../defaults"
import { CodeGenError } from "../errors"
import { Lexer } from "../lexer"
import { parse } from "../parser"

function analyzeValid(source: string): { program: Program; analysis: AnalysisResult } {
	const tokens = new Lexer(source).tokenize()
	const { program, errors: parseErrors } = parse(tokens)
	if (parseErrors.hasErrors()) {
		const msgs = parseErrors.errors.map((e) => `${e.line}:${e.column} ${e.message}`).join("\n")
		throw new Error(`Parse errors:\n${msgs}`)
	}
	const analysis = analyze(program)
	if (analysis.errors.hasErrors()) {
		const msgs = analysis.errors.errors.map((e) => `${e.line}:${e.column} ${e.message}`).join("\n")
		throw new Error(`Analysis errors:\n${msgs}`)
	}
	return { program, analysis }
}

function generate(source: string, format: OutputFormat = "function"): string {
	const { program, analysis } = analyzeValid(source)
	return codegen(program, analysis, { format })
}

/** Output lines with indentation removed. */
function trimmedLines(source: string): string[] {
	return generate(source)
		.split("\n")
		.map((l) => l.trim())
}

function inUpdate(body: string, extra = ""): string {
	return `${extra}\nscene Main {\n\tupdate {\n${body}\n\t}\n}`
}

/** The `count` trimmed lines starting at the first line equal to `first`. */
function linesFrom(lines: readonly string[], first: string, count: number): string[] {
	const start = lines.indexOf(first)
	if (start < 0) throw new Error(`line not found: ${first}`)
	return lines.slice(start, start + count)
}

describe("program layout", () => {
	it("emits the complete program for a minimal scene", () => {
		const output = generate("scene Main {\n\tupdate {\n\t\tquit()\n\t}\n}")
		expect(output).toBe(
			[
				"// Compiled from <input> by gamec.",
				'const $settings = {"title":"Game","width":800,"height":600,"fps":60,"background":[0,0,0]};',
				"const $screen = host.init($settings);",
				"const $live = new Set();",
				"let $running = true;",
				"",
				"class $Entity {",
				"  constructor() {",
				"    $live.add(this);",
				"  }",
				"  draw() {",
				"    host.drawEntity($screen, this);",
				"  }",
				"  destroy() {",
				"    $live.delete(this);",
				"  }",
				"}",
				"",
				"class Main {",
				"  update() {",
				"    $running = false;",
				"  }",
				"}",
				"",
				"const $scene0 = new Main();",
				"",
				"while ($running) {",
				"  for (const $event of host.pollEvents()) {",
				'    if ($event.type === "quit") {',
				"      $running = false;",
				"    }",
				"  }",
				"  if (!$running) break;",
				"  $scene0.update();",
				"  $screen.fill($settings.background);",
				"  host.present($screen);",
				"  await host.nextFrame($settings.fps);",
				"}",
				"host.shutdown();",
				"",
			].join("\n"),
		)
	})

	it("wraps module output in an exported main function", () => {
		const lines = generate("scene Main { }", "module").split("\n")
		expect(lines[0]).toBe("// Compiled from <input> by gamec.")
		expect(lines[1]).toBe("export async function main(host) {")
		expect(lines[2]).toBe('  const $settings = {"title":"Game","width":800,"height":600,"fps":60,"background":[0,0,0]};')
		expect(lines[lines.length - 2]).toBe("}")
		expect(lines[lines.length - 1]).toBe("")
	})

	it("names the source file in the header", () => {
		const { program, analysis } = analyzeValid("scene Main { }")
		const output = codegen(program, analysis, { filename: "pong.game" })
		expect(output.startsWith("// Compiled from pong.game by gamec.\n")).toBe(true)
	})

	it("serializes folded settings", () => {
		const lines = trimmedLines("game Demo { width = 320 }\nscene Main { }")
		expect(lines).toContain('const $settings = {"title":"Demo","width":320,"height":600,"fps":60,"background":[0,0,0]};')
	})

	it("places top-level native blocks before main", () => {
		const lines = generate("native {\n  function helper() { return 1 }\n}\nscene Main { }", "module").split("\n")
		expect(lines[1]).toBe("function helper() { return 1 }")
		expect(lines[2]).toBe("export async function main(host) {")
	})

	it("is deterministic", () => {
		const source = inUpdate("\t\tx = range(3)\n\t\tprint(x)", "sprite A {\n\ton keyup(k) { }\n}")
		expect(generate(source)).toBe(generate(source))
	})
})

describe("sprites", () => {
	const source = `sprite Player {
	x = 0
	on keydown(key) {
		x = x + 1
		y = x
	}
}
scene Main { update { } }`

	it("qualifies fields with this and declares locals up front", () => {
		const lines = trimmedLines(source)
		expect(linesFrom(lines, "on_keydown(key) {", 5)).toEqual([
			"on_keydown(key) {",
			"let y;",
			"this.x = this.x + 1;",
			"y = this.x;",
			"}",
		])
	})

	it("emits a class that registers itself and initializes fields", () => {
		const lines = trimmedLines(source)
		expect(linesFrom(lines, "class Player extends $Entity {", 5)).toEqual([
			"class Player extends $Entity {",
			"constructor() {",
			"super();",
			"this.x = 0;",
			"}",
		])
	})

	it("dispatches input to every live instance of handling sprites", () => {
		const lines = trimmedLines(`sprite Paddle {
	on mousedown(b, x, y) { }
}
sprite Ball {
	on mousedown(button, px, py) { }
}
scene Main { }`)
		expect(linesFrom(lines, '} else if ($event.type === "mousedown") {', 5)).toEqual([
			'} else if ($event.type === "mousedown") {',
			"for (const $entity of [...$live]) {",
			"if ($entity instanceof Paddle) $entity.on_mousedown($event.button, $event.x, $event.y);",
			"if ($entity instanceof Ball) $entity.on_mousedown($event.button, $event.x, $event.y);",
			"}",
		])
		expect(lines).not.toContain('} else if ($event.type === "keydown") {')
	})

	it("calls own methods and inherited methods through this", () => {
		const lines = trimmedLines(`sprite A {
	x = 1
	fn reset() { x = 0 }
	on keyup(k) {
		reset()
		destroy()
	}
}
scene Main { }`)
		expect(lines).toContain("this.reset();")
		expect(lines).toContain("this.destroy();")
		expect(lines).toContain("reset() {")
	})

	it("constructs sprites with new", () => {
		const lines = trimmedLines("sprite Ball { }\nscene Main {\n\tball = Ball()\n\tdraw { ball.draw() }\n}")
		expect(lines).toContain("this.ball = new Ball();")
		expect(lines).toContain("this.ball.draw();")
	})

	it("keeps native members at class level", () => {
		const output = generate("sprite A {\n\tnative {\n\t\tspeed() { return 2 }\n\t}\n}\nscene Main { }")
		expect(output).toContain("\n  speed() { return 2 }\n")
	})

	it("emits return values", () => {
		expect(trimmedLines("sprite A {\n\tfn f() { return 1 }\n}\nscene Main { }")).toContain("return 1;")
	})
})

describe("scenes", () => {
	it("dispatches update and draw on the active scene index", () => {
		const output = generate(`scene Title {
	update { switch_scene(Play) }
	draw { draw_text("press", 10, 10, (255, 255, 255)) }
}
scene Play {
	update { }
}`)
		expect(output).toContain("let $activeScene = 0;\n")
		expect(output).toContain(
			[
				"  if ($activeScene === 0) {",
				"    $scene0.update();",
				"  } else if ($activeScene === 1) {",
				"    $scene1.update();",
				"  }",
				"  $screen.fill($settings.background);",
				"  if ($activeScene === 0) {",
				"    $scene0.draw();",
				"  }",
				"  host.present($screen);",
			].join("\n"),
		)
		expect(output).toContain("    $activeScene = 1;\n")
		expect(output).toContain("const $scene0 = new Title();\nconst $scene1 = new Play();\n")
	})

	it("turns switch_scene into a no-op with one scene", () => {
		const lines = trimmedLines(inUpdate("\t\tswitch_scene(Main)"))
		expect(lines).toContain("void 0;")
		expect(lines).not.toContain("let $activeScene = 0;")
	})

	it("emits a constructor only for scenes with fields", () => {
		const lines = trimmedLines("scene Main {\n\tscore = 0\n}")
		expect(linesFrom(lines, "class Main {", 4)).toEqual(["class Main {", "constructor() {", "this.score = 0;", "}"])
	})
})

describe("statements", () => {
	it("emits if / else if / else chains", () => {
		const lines = trimmedLines(
			inUpdate("\t\ta = 0\n\t\tif a > 1 { b = 1 } else if a < 0 { b = 2 } else { b = 3 }"),
		)
		expect(linesFrom(lines, "if (a > 1) {", 7)).toEqual([
			"if (a > 1) {",
			"b = 1;",
			"} else if (a < 0) {",
			"b = 2;",
			"} else {",
			"b = 3;",
			"}",
		])
		expect(lines).toContain("let a, b;")
	})

	it("emits while loops and compound assignment", () => {
		const lines = trimmedLines(inUpdate("\t\ta = 0\n\t\twhile a < 3 { a += 1 }"))
		expect(linesFrom(lines, "while (a < 3) {", 3)).toEqual(["while (a < 3) {", "a += 1;", "}"])
	})

	it("emits for-of loops over locals and fields", () => {
		const lines = trimmedLines(`scene Main {
	total = 0
	i = 0
	update {
		for n in range(3) { total = total + n }
		for i in range(2) { }
	}
}`)
		expect(lines).toContain("let n;")
		expect(lines).toContain("for (n of $range(3)) {")
		expect(lines).toContain("this.total = this.total + n;")
		expect(lines).toContain("for (this.i of $range(2)) {")
	})

	it("reindents native statements to the surrounding level", () => {
		const output = generate(
			"scene Main {\n\tupdate {\n\t\tnative {\n\t\t\tconst t = 1\n\t\t\thost.log(t)\n\t\t}\n\t}\n}",
		)
		expect(output).toContain("\n    const t = 1\n    host.log(t)\n")
	})
})

describe("expressions", () => {
	it("maps operators and keeps only needed parentheses", () => {
		const lines = trimmedLines(
			inUpdate(
				[
					"\t\ta = 1",
					"\t\tb = not (a == 2) and a != 3 or a <= 4",
					"\t\tc = (a - 1) * 2",
					"\t\td = a - (1 - 2)",
					"\t\te = a - 1 - 2",
					"\t\tf = -(-a)",
					"\t\tg = -a * 2",
				].join("\n"),
			),
		)
		expect(linesFrom(lines, "let a, b, c, d, e, f, g;", 8)).toEqual([
			"let a, b, c, d, e, f, g;",
			"a = 1;",
			"b = !(a === 2) && a !== 3 || a <= 4;",
			"c = (a - 1) * 2;",
			"d = a - (1 - 2);",
			"e = a - 1 - 2;",
			"f = -(-a);",
			"g = -a * 2;",
		])
	})

	it("quotes strings and turns tuples and lists into arrays", () => {
		const lines = trimmedLines(inUpdate("\t\ts = 'say \"hi\"'\n\t\tp = (1, 2)\n\t\tl = [1, 2, 3]"))
		expect(lines).toContain('s = "say \\"hi\\"";')
		expect(lines).toContain("p = [1, 2];")
		expect(lines).toContain("l = [1, 2, 3];")
	})

	it("concatenates and compares known lists through helpers", () => {
		const lines = trimmedLines(
			inUpdate(
				[
					"\t\ta = [1, 2] + [3]",
					"\t\tb = (1, 2) == (1, 2)",
					"\t\tc = a != [1]",
					"\t\ta += [4]",
					"\t\td = a + 1",
					"\t\te = [1] + [2] + [3]",
				].join("\n"),
			),
		)
		expect(linesFrom(lines, "let a, b, c, d, e;", 7)).toEqual([
			"let a, b, c, d, e;",
			"a = $concat([1, 2], [3]);",
			"b = $equals([1, 2], [1, 2]);",
			"c = !$equals(a, [1]);",
			"a = $concat(a, [4]);",
			"d = a + 1;",
			"e = $concat($concat([1], [2]), [3]);",
		])
		expect(lines).toContain("const $concat = (a, b) => {")
		expect(lines).toContain("const $equals = (a, b) => {")
	})

	it("emits builtins through the host and runtime helpers", () => {
		const output = generate(
			inUpdate(
				[
					"\t\tr = range(3)",
					"\t\tdraw_rect(0, 0, 10, 10, (255, 0, 0))",
					"\t\tw = screen_width",
					"\t\tm = max(1, 2, 3)",
					'\t\tprint("hi", 1)',
					'\t\tk = key_pressed("left")',
				].join("\n"),
			),
		)
		const lines = output.split("\n").map((l) => l.trim())
		expect(lines).toContain("r = $range(3);")
		expect(lines).toContain("host.drawRect($screen, 0, 0, 10, 10, [255, 0, 0]);")
		expect(lines).toContain("w = $screen.width;")
		expect(lines).toContain("m = Math.max(1, 2, 3);")
		expect(lines).toContain('host.log("hi", 1);')
		expect(lines).toContain('k = host.isKeyPressed("left");')
		expect(lines).toContain("const $range = (start, stop, step = 1) => {")
		expect(output).not.toContain("const $str")
	})

	it("emits only the helpers a program uses", () => {
		const lines = trimmedLines(inUpdate("\t\ts = str(1)"))
		expect(lines).toContain("const $str = (value) => String(value);")
		expect(lines).not.toContain("const $range = (start, stop, step = 1) => {")
	})
})

describe("stage contract", () => {
	it("throws CodeGenError for an identifier without a resolution", () => {
		const { program, analysis } = analyzeValid("scene Main {\n\tupdate { x = 1 }\n}")
		analysis.resolutions.clear()
		expect(() => codegen(program, analysis)).toThrow(CodeGenError)
		expect(() => codegen(program, analysis)).toThrow("identifier 'x' has no resolution")
	})
})

describe("reindent", () => {
	it("strips common indentation and drops blank edge lines", () => {
		expect(reindent("\n    a\n      b\n\n    c\n", "  ")).toEqual(["  a", "    b", "", "  c"])
	})

	it("handles CRLF line endings", () => {
		expect(reindent("\r\n\tx\r\n", "")).toEqual(["x"])
	})

	it("leaves the continuation lines of a template literal as written", () => {
		expect(reindent("\n\t\tconst s = `a\n  b\n\t\tc`\n\t\tlog(s)\n", "  ")).toEqual([
			"  const s = `a",
			"  b",
			"\t\tc`",
			"  log(s)",
		])
	})

	it("ignores backticks in comments and other strings", () => {
		expect(reindent("\t// `x\n\ty = '`'\n\tz = 1", "")).toEqual(["// `x", "y = '`'", "z = 1"])
	})
})
