// Names every program can use without declaring them.

import { BOOLEAN, LIST, NUMBER, STRING, UNKNOWN, type ValueType } from "./types"

/**
 * How a builtin appears in generated code.
 *
 * - `value`: the name is replaced by `target`.
 * - `call`: `target(...prefix, ...args)`.
 * - `switch_scene` and `quit` change loop state and are emitted by the generator itself.
 */
export type BuiltinEmit =
	| { readonly kind: "value"; readonly target: string }
	| { readonly kind: "call"; readonly target: string; readonly prefix: readonly string[] }
	| { readonly kind: "switch_scene" }
	| { readonly kind: "quit" }

export interface BuiltinInfo {
	readonly name: string
	readonly callable: boolean
	readonly minArgs: number
	readonly maxArgs: number
	readonly returns: ValueType
	readonly emit: BuiltinEmit
}

const MANY = Number.POSITIVE_INFINITY
const SCREEN = ["$screen"] as const

// [name, minArgs, maxArgs, returns, target, prefix]
const FUNCTION_REGISTRY: readonly [string, number, number, ValueType, string, readonly string[]][] = [
	// Conversions and sequences (runtime helpers)
	["range", 1, 3, LIST, "$range", []],
	["str", 1, 1, STRING, "$str", []],
	["int", 1, 1, NUMBER, "$int", []],
	["float", 1, 1, NUMBER, "$float", []],
	["len", 1, 1, NUMBER, "$len", []],
	["randint", 2, 2, NUMBER, "$randint", []],
	// Math
	["abs", 1, 1, NUMBER, "Math.abs", []],
	["min", 2, MANY, NUMBER, "Math.min", []],
	["max", 2, MANY, NUMBER, "Math.max", []],
	["sqrt", 1, 1, NUMBER, "Math.sqrt", []],
	["floor", 1, 1, NUMBER, "Math.floor", []],
	["ceil", 1, 1, NUMBER, "Math.ceil", []],
	["round", 1, 1, NUMBER, "Math.round", []],
	["sin", 1, 1, NUMBER, "Math.sin", []],
	["cos", 1, 1, NUMBER, "Math.cos", []],
	["atan2", 2, 2, NUMBER, "Math.atan2", []],
	["random", 0, 0, NUMBER, "Math.random", []],
	// Host
	["print", 1, MANY, UNKNOWN, "host.log", []],
	["collides", 2, 2, BOOLEAN, "host.collides", []],
	["key_pressed", 1, 1, BOOLEAN, "host.isKeyPressed", []],
	["draw_text", 4, 5, UNKNOWN, "host.drawText", SCREEN],
	["draw_rect", 5, 5, UNKNOWN, "host.drawRect", SCREEN],
	["draw_circle", 4, 4, UNKNOWN, "host.drawCircle", SCREEN],
]

function buildRegistry(): Map<string, BuiltinInfo> {
	const registry = new Map<string, BuiltinInfo>()
	const add = (info: BuiltinInfo) => registry.set(info.name, info)

	const value = (name: string, returns: ValueType, target: string) =>
		add({ name, callable: false, minArgs: 0, maxArgs: 0, returns, emit: { kind: "value", target } })

	value("screen", UNKNOWN, "$screen")
	value("screen_width", NUMBER, "$screen.width")
	value("screen_height", NUMBER, "$screen.height")

	for (const [name, minArgs, maxArgs, returns, target, prefix] of FUNCTION_REGISTRY) {
		add({ name, callable: true, minArgs, maxArgs, returns, emit: { kind: "call", target, prefix } })
	}

	add({
		name: "switch_scene",
		callable: true,
		minArgs: 1,
		maxArgs: 1,
		returns: UNKNOWN,
		emit: { kind: "switch_scene" },
	})
	add({ name: "quit", callable: true, minArgs: 0, maxArgs: 0, returns: UNKNOWN, emit: { kind: "quit" } })
	return registry
}

export const BUILTINS: ReadonlyMap<string, BuiltinInfo> = buildRegistry()

/** Methods every sprite instance has before it declares any of its own. */
export const INHERITED_METHODS: ReadonlyMap<string, number> = new Map([
	["draw", 0],
	["destroy", 0],
])

export function describeArity(info: BuiltinInfo): string {
	if (info.minArgs === info.maxArgs) {
		return `${info.minArgs} argument${info.minArgs === 1 ? "" : "s"}`
	}
	if (info.maxArgs === MANY) {
		return `at least ${info.minArgs} argument${info.minArgs === 1 ? "" : "s"}`
	}
	return `${info.minArgs} to ${info.maxArgs} arguments`
}
