import type { Diagnostic, DiagnosticSink, Phase, Severity, SourceLocation } from "../../spec/compiler"
import { DEFAULT_COMPILE_OPTIONS } from "./defaults"

export type { Diagnostic, Phase, Severity, SourceLocation } from "../../spec/compiler"

/**
 * Append-only diagnostic collector shared by one compiler stage.
 *
 * Bounded: after `limit` entries it records a single "too many diagnostics"
 * error and silently drops everything that follows.
 */
export class DiagnosticList implements DiagnosticSink {
	readonly diagnostics: Diagnostic[] = []
	private readonly phase: Phase
	private readonly limit: number
	private truncated = false

	constructor(phase: Phase, limit: number = DEFAULT_COMPILE_OPTIONS.maxDiagnostics) {
		this.phase = phase
		this.limit = limit
	}

	error(at: SourceLocation, message: string, hint?: string): void {
		this.push("error", at, message, hint)
	}

	warning(at: SourceLocation, message: string, hint?: string): void {
		this.push("warning", at, message, hint)
	}

	/** Copy another stage's diagnostics, keeping their phase. Not subject to the limit. */
	append(other: DiagnosticList): void {
		this.diagnostics.push(...other.diagnostics)
	}

	hasErrors(): boolean {
		return this.diagnostics.some((d) => d.severity === "error")
	}

	get errors(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.severity === "error")
	}

	get warnings(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.severity === "warning")
	}

	get isTruncated(): boolean {
		return this.truncated
	}

	private push(severity: Severity, at: SourceLocation, message: string, hint?: string): void {
		if (this.truncated) return
		if (this.diagnostics.length >= this.limit) {
			this.truncated = true
			this.diagnostics.push({
				severity: "error",
				phase: this.phase,
				message: `too many diagnostics in ${this.phase} stage; stopping after ${this.limit}`,
				line: at.line,
				column: at.column,
				length: 1,
			})
			return
		}
		const diagnostic: Diagnostic = {
			severity,
			phase: this.phase,
			message,
			line: at.line,
			column: at.column,
			length: Math.max(1, at.length ?? 1),
		}
		this.diagnostics.push(hint === undefined ? diagnostic : { ...diagnostic, hint })
	}
}

/**
 * Raised by the code generator when it meets a tree it cannot represent.
 * This is a broken stage contract, not a user mistake.
 */
export class CodeGenError extends Error {
	readonly line: number
	readonly column: number

	constructor(message: string, at?: SourceLocation) {
		super(message)
		this.name = "CodeGenError"
		this.line = at?.line ?? 0
		this.column = at?.column ?? 0
	}
}

// ─── Formatting ───────────────────────────────────────────────────────────────

/**
 * Render one diagnostic with a source excerpt:
 *
 *     error: undefined reference 'speed'
 *      --> pong.game:4:9
 *       |
 *     4 |     x = speed
 *       |         ^^^^^
 *       = help: declare it as a field first
 */
export function formatDiagnostic(d: Diagnostic, source: string, filename: string): string {
	const gutter = " ".repeat(String(d.line).length)
	const out = [`${d.severity}: ${d.message}`, `${gutter}--> ${filename}:${d.line}:${d.column}`]

	const lines = source.split("\n")
	const text = d.line >= 1 && d.line <= lines.length ? lines[d.line - 1] : undefined
	if (text !== undefined) {
		const lineText = text.endsWith("\r") ? text.slice(0, -1) : text
		const start = Math.min(Math.max(d.column - 1, 0), lineText.length)
		// Keep tabs so the carets line up with the excerpt
		const pad = lineText.slice(0, start).replace(/[^\t]/g, " ")
		const width = Math.max(1, Math.min(d.length, lineText.length - start))
		out.push(`${gutter} |`)
		out.push(`${d.line} | ${lineText}`)
		out.push(`${gutter} | ${pad}${"^".repeat(width)}`)
	}

	if (d.hint) {
		out.push(`${gutter} = help: ${d.hint}`)
	}
	return out.join("\n")
}

const PHASE_ORDER: readonly Phase[] = ["tokenize", "parse", "analyze", "codegen"]

/** Format every diagnostic, grouped by stage, followed by a count summary. */
export function formatDiagnostics(
	diagnostics: readonly Diagnostic[],
	source: string,
	filename: string = DEFAULT_COMPILE_OPTIONS.filename,
): string {
	if (diagnostics.length === 0) return ""

	const ordered = PHASE_ORDER.flatMap((phase) => diagnostics.filter((d) => d.phase === phase))
	const blocks = ordered.map((d) => formatDiagnostic(d, source, filename))
	blocks.push(summarize(diagnostics))
	return `${blocks.join("\n\n")}\n`
}

function summarize(diagnostics: readonly Diagnostic[]): string {
	const errors = diagnostics.filter((d) => d.severity === "error").length
	const warnings = diagnostics.length - errors
	const parts: string[] = []
	if (errors > 0) parts.push(plural(errors, "error"))
	if (warnings > 0) parts.push(plural(warnings, "warning"))
	return `${parts.join(" and ")} generated`
}

function plural(count: number, noun: string): string {
	return `${count} ${noun}${count === 1 ? "" : "s"}`
}
