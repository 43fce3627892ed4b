/**
 * Bridge between the compiler and a running game.
 *
 * Compiles game source to JavaScript, evaluates it against a GameHost,
 * and returns a GameModule whose run() drives the frame loop.
 */
import type { CompileResult as CompileOutcome } from "../../spec/compiler"
import type { GameHost, GameModule } from "../../spec/host"
import { type AnalysisResult, analyze } from "./analyzer"
import { codegen } from "./codegen"
import type { GameDebugLog } from "./debug-log"
import { type CompileOptions, DEFAULT_COMPILE_OPTIONS } from "./defaults"
import { CodeGenError, DiagnosticList, formatDiagnostics } from "./errors"
import { tokenize } from "./lexer"
import { parse } from "./parser"

export interface CompileResult extends CompileOutcome {
	readonly errors: DiagnosticList
	readonly analysis?: AnalysisResult
}

/**
 * Compile game source through tokenize → parse → analyze → codegen.
 *
 * Every stage runs even after an earlier one reports errors, so one call
 * returns every problem. Errors block code generation unless
 * `emitOnError` is set.
 */
export function compile(source: string, options: Partial<CompileOptions> = {}): CompileResult {
	const opts: CompileOptions = { ...DEFAULT_COMPILE_OPTIONS, ...options }
	const allErrors = new DiagnosticList("codegen", Number.POSITIVE_INFINITY)

	const { tokens, errors: lexErrors } = tokenize(source, opts.maxDiagnostics)
	allErrors.append(lexErrors)

	const { program, errors: parseErrors } = parse(tokens, opts.maxDiagnostics)
	allErrors.append(parseErrors)

	const analysis = analyze(program, opts.maxDiagnostics)
	allErrors.append(analysis.errors)

	if (allErrors.hasErrors() && !opts.emitOnError) {
		return { success: false, errors: allErrors, analysis }
	}

	let output: string
	try {
		output = codegen(program, analysis, { format: opts.format, filename: opts.filename })
	} catch (e) {
		if (!(e instanceof CodeGenError)) throw e
		allErrors.error(
			{ line: Math.max(1, e.line), column: Math.max(1, e.column) },
			`internal compiler error: ${e.message}`,
		)
		return { success: false, errors: allErrors, analysis }
	}

	return { success: !allErrors.hasErrors(), errors: allErrors, output, analysis }
}

/**
 * Bind a program compiled with `format: "function"` to a host.
 *
 * @param output - generated JavaScript body
 * @param debugLog - optional collector for host calls and runtime errors
 */
export function instantiate(output: string, host: GameHost, debugLog?: GameDebugLog): GameModule {
	const entry = new Function("host", `return (async () => {\n${output}})()`)
	const bound = debugLog ? traceHost(host, debugLog) : host

	return {
		async run() {
			const pending: unknown = Reflect.apply(entry, undefined, [bound])
			if (!(pending instanceof Promise)) {
				throw new Error("compiled program did not return a promise")
			}
			try {
				await pending
			} catch (e) {
				debugLog?.trap("main", e)
				throw e
			}
		},
	}
}

/** Forward every host call, recording it in the debug log. Frame pacing calls are not recorded. */
function traceHost(host: GameHost, log: GameDebugLog): GameHost {
	return {
		init(settings) {
			log.hostCall("init", [settings])
			return host.init(settings)
		},
		pollEvents() {
			const events = host.pollEvents()
			if (events.length > 0) log.hostCall("pollEvents", [], events)
			return events
		},
		isKeyPressed(key) {
			const result = host.isKeyPressed(key)
			log.hostCall("isKeyPressed", [key], result)
			return result
		},
		drawEntity(surface, entity) {
			log.hostCall("drawEntity", [entity])
			host.drawEntity(surface, entity)
		},
		drawText(surface, text, x, y, color, size) {
			log.hostCall("drawText", size === undefined ? [text, x, y, color] : [text, x, y, color, size])
			host.drawText(surface, text, x, y, color, size)
		},
		drawRect(surface, x, y, width, height, color) {
			log.hostCall("drawRect", [x, y, width, height, color])
			host.drawRect(surface, x, y, width, height, color)
		},
		drawCircle(surface, x, y, radius, color) {
			log.hostCall("drawCircle", [x, y, radius, color])
			host.drawCircle(surface, x, y, radius, color)
		},
		collides(a, b) {
			const result = host.collides(a, b)
			log.hostCall("collides", [a, b], result)
			return result
		},
		log(...values) {
			log.hostCall("log", values)
			host.log(...values)
		},
		present(surface) {
			host.present(surface)
		},
		nextFrame(fps) {
			return host.nextFrame(fps)
		},
		shutdown() {
			log.hostCall("shutdown", [])
			host.shutdown()
		},
	}
}

/** Compile game source and bind it to a host in one step. */
export function compileAndInstantiate(
	source: string,
	host: GameHost,
	debugLog?: GameDebugLog,
): {
	module: GameModule
	errors: DiagnosticList
} {
	const result = compile(source, { format: "function" })
	if (!result.success || result.output === undefined) {
		throw new CompileError(result.errors, source)
	}
	const module = instantiate(result.output, host, debugLog)
	return { module, errors: result.errors }
}

export class CompileError extends Error {
	readonly compileErrors: DiagnosticList
	constructor(errors: DiagnosticList, source: string) {
		super(`Compilation failed:\n${formatDiagnostics(errors.errors, source)}`)
		this.name = "CompileError"
		this.compileErrors = errors
	}
}
