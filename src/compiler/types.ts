// Advisory value types. The language is dynamically typed; these only let
// the analyzer flag combinations that can never be right, like "a" - 1.

export type ValueType = "number" | "string" | "boolean" | "list" | "sprite" | "unknown"

export const NUMBER: ValueType = "number"
export const STRING: ValueType = "string"
export const BOOLEAN: ValueType = "boolean"
export const LIST: ValueType = "list"
export const SPRITE: ValueType = "sprite"
export const UNKNOWN: ValueType = "unknown"

export function isKnown(t: ValueType): boolean {
	return t !== UNKNOWN
}

/** True when `t` is either unknown or exactly `expected`. */
export function mayBe(t: ValueType, expected: ValueType): boolean {
	return t === UNKNOWN || t === expected
}

/** Both sides known and different. */
export function clearlyDiffer(a: ValueType, b: ValueType): boolean {
	return isKnown(a) && isKnown(b) && a !== b
}

export function typeToString(t: ValueType): string {
	return t === SPRITE ? "sprite instance" : t
}
