// Lookup frames used by the analyzer.
//
// Frames form a chain through `parent`: global → sprite or scene → body.
// Blocks inside a body (if/while/for) never push a frame.

import type { Span } from "./ast"
import type { BuiltinInfo } from "./builtins"
import reserved from "./reserved-names.json"

export type SymbolKind =
	| "EntityTemplate"
	| "SceneTemplate"
	| "Field"
	| "Method"
	| "LocalVariable"
	| "Parameter"
	| "Builtin"

export type FrameKind = "global" | "sprite" | "scene" | "body"

export interface SymbolInfo {
	readonly name: string
	readonly kind: SymbolKind
	readonly frame: Frame
	/** Null for builtins and inherited methods. */
	readonly span: Span | null
	/** Parameter count, for methods. */
	readonly arity?: number
	readonly builtin?: BuiltinInfo
}

/**
 * Classification of one identifier occurrence. The code generator emits
 * names from this and nothing else.
 */
export type Resolution =
	| { readonly kind: "local"; readonly symbol: SymbolInfo; readonly declares: boolean }
	| { readonly kind: "field"; readonly symbol: SymbolInfo }
	| { readonly kind: "global"; readonly symbol: SymbolInfo }
	| { readonly kind: "builtin"; readonly builtin: BuiltinInfo }
	| { readonly kind: "unresolved" }

export class Frame {
	readonly kind: FrameKind
	readonly parent: Frame | null
	/** Sprite, scene or body name, for messages. */
	readonly owner: string
	private readonly symbols = new Map<string, SymbolInfo>()

	constructor(kind: FrameKind, parent: Frame | null, owner: string) {
		this.kind = kind
		this.parent = parent
		this.owner = owner
	}

	/** Add a symbol. Returns the existing one instead when the name is taken. */
	declare(
		name: string,
		kind: SymbolKind,
		span: Span | null,
		extra: { arity?: number; builtin?: BuiltinInfo } = {},
	): { symbol: SymbolInfo; duplicate: boolean } {
		const existing = this.symbols.get(name)
		if (existing) return { symbol: existing, duplicate: true }
		const symbol: SymbolInfo = { name, kind, frame: this, span, ...extra }
		this.symbols.set(name, symbol)
		return { symbol, duplicate: false }
	}

	/** Replace a symbol, used when a sprite overrides an inherited method. */
	redeclare(name: string, kind: SymbolKind, span: Span, arity: number): SymbolInfo {
		const symbol: SymbolInfo = { name, kind, frame: this, span, arity }
		this.symbols.set(name, symbol)
		return symbol
	}

	own(name: string): SymbolInfo | undefined {
		return this.symbols.get(name)
	}

	/** Innermost-to-outermost search. */
	lookup(name: string): SymbolInfo | undefined {
		let frame: Frame | null = this
		while (frame) {
			const symbol = frame.own(name)
			if (symbol) return symbol
			frame = frame.parent
		}
		return undefined
	}

	/** Every name visible from this frame, innermost first. */
	visibleNames(): string[] {
		const names: string[] = []
		let frame: Frame | null = this
		while (frame) {
			names.push(...frame.symbols.keys())
			frame = frame.parent
		}
		return names
	}
}

const RESERVED_NAMES: ReadonlySet<string> = new Set([...reserved.keywords, ...reserved.globals])

/** Names that would collide with the generated program's own syntax or globals. */
export function isReservedName(name: string): boolean {
	return RESERVED_NAMES.has(name)
}

/** Closest candidate by edit distance, for "did you mean" hints. */
export function suggestName(name: string, candidates: Iterable<string>): string | undefined {
	if (name.length < 3) return undefined
	let best: string | undefined
	let bestDistance = Math.floor(name.length / 3) + 1
	for (const candidate of candidates) {
		const d = editDistance(name, candidate)
		if (d > 0 && d < bestDistance) {
			best = candidate
			bestDistance = d
		}
	}
	return best
}

function editDistance(a: string, b: string): number {
	let prev = Array.from({ length: b.length + 1 }, (_, i) => i)
	for (let i = 1; i <= a.length; i++) {
		const row = [i]
		for (let j = 1; j <= b.length; j++) {
			const cost = a[i - 1] === b[j - 1] ? 0 : 1
			row.push(Math.min((prev[j] ?? 0) + 1, (row[j - 1] ?? 0) + 1, (prev[j - 1] ?? 0) + cost))
		}
		prev = row
	}
	return prev[b.length] ?? 0
}
