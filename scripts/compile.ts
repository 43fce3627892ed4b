/**
 * Compile a game source file through the full pipeline: tokenize → parse → analyze → codegen.
 *
 * Usage:
 *   tsx scripts/compile.ts [path/to/file.game]
 *
 * If no path is given, compiles the bundled pong example.
 */
import { readFileSync } from "node:fs"
import { type BodyOwner, analyze, compile, formatDiagnostics, parse, tokenize } from "../src/compiler"

function ownerLabel(owner: BodyOwner): string {
	switch (owner.kind) {
		case "HandlerDecl":
			return `on ${owner.event}`
		case "MethodDecl":
			return `${owner.name}()`
		case "SceneBody":
			return owner.which
	}
}

const filePath = process.argv[2]
const filename = filePath ?? "pong.game"
const source = readFileSync(filePath ?? new URL("../games/pong.game", import.meta.url), "utf-8")
console.log(filePath ? `Compiling: ${filePath}\n` : "Compiling: built-in pong example\n")

// Stage 1: Tokenize
console.log("=== Tokenizing ===")
const { tokens } = tokenize(source)
console.log(`${tokens.length} tokens produced`)

// Stage 2: Parse
console.log("\n=== Parsing ===")
const { program } = parse(tokens)
console.log(`  Game blocks: ${program.games.map((g) => g.name).join(", ") || "(none)"}`)
console.log(`  Sprites: ${program.sprites.map((s) => s.name).join(", ") || "(none)"}`)
console.log(`  Scenes: ${program.scenes.map((s) => s.name).join(", ") || "(none)"}`)
console.log(`  Native blocks: ${program.natives.length}`)

// Stage 3: Analyze
console.log("\n=== Analyzing ===")
const analysis = analyze(program)
console.log(`  Settings: ${JSON.stringify(analysis.settings)}`)
for (const [name, sprite] of analysis.sprites) {
	const members = [...[...sprite.handlers.keys()].map((e) => `on ${e}`), ...sprite.decl.methods.map((m) => `${m.name}()`)]
	console.log(`  sprite ${name}: ${members.join(", ") || "(no members)"}`)
}
for (const [owner, locals] of analysis.locals) {
	if (locals.length === 0) continue
	console.log(`  locals in ${ownerLabel(owner)}: ${locals.map((l) => l.name).join(", ")}`)
}

// Stage 4: Generate
console.log("\n=== Generating ===")
const result = compile(source, { filename })
if (result.errors.diagnostics.length > 0) {
	console.log(formatDiagnostics(result.errors.diagnostics, source, filename))
}
if (!result.success) process.exitCode = 1

if (result.output !== undefined) {
	console.log(result.output)
}
console.log("\nDone.")
