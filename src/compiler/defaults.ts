import type { CompileOptions } from "../../spec/compiler"
import type { GameSettings } from "../../spec/host"

export type { CompileOptions, OutputFormat } from "../../spec/compiler"

export const DEFAULT_COMPILE_OPTIONS: CompileOptions = {
	filename: "<input>",
	format: "module",
	maxDiagnostics: 100,
	emitOnError: false,
}

export const DEFAULT_SETTINGS: GameSettings = {
	title: "Game",
	width: 800,
	height: 600,
	fps: 60,
	background: [0, 0, 0],
}

/** Spaces per indentation level in generated code. */
export const INDENT = "  "
