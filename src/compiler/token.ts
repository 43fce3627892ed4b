export enum TokenKind {
	// Literals
	Number = "Number",
	String = "String",
	True = "True",
	False = "False",

	// Identifiers
	Ident = "Ident",

	// Keywords
	Game = "Game",
	Sprite = "Sprite",
	Scene = "Scene",
	On = "On",
	Fn = "Fn",
	If = "If",
	Else = "Else",
	While = "While",
	For = "For",
	In = "In",
	Return = "Return",

	// Raw target text captured from `native { ... }`
	Native = "Native",

	// Operators
	Plus = "Plus",
	Minus = "Minus",
	Star = "Star",
	Slash = "Slash",
	Percent = "Percent",
	Assign = "Assign",
	PlusAssign = "PlusAssign",
	MinusAssign = "MinusAssign",
	StarAssign = "StarAssign",
	SlashAssign = "SlashAssign",
	Eq = "Eq",
	NotEq = "NotEq",
	Lt = "Lt",
	Gt = "Gt",
	LtEq = "LtEq",
	GtEq = "GtEq",
	And = "And", // `and` or `&&`
	Or = "Or", // `or` or `||`
	Not = "Not", // `not` or `!`

	// Delimiters
	LParen = "LParen",
	RParen = "RParen",
	LBrace = "LBrace",
	RBrace = "RBrace",
	LBracket = "LBracket",
	RBracket = "RBracket",
	Comma = "Comma",
	Dot = "Dot",
	Colon = "Colon",
	Semicolon = "Semicolon",

	// Special
	Newline = "Newline",
	EOF = "EOF",
}

export interface Token {
	readonly kind: TokenKind
	readonly value: string
	readonly line: number
	readonly column: number
	/** Length of the token's source text, in characters. */
	readonly length: number
}

const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map([
	["game", TokenKind.Game],
	["program", TokenKind.Game],
	["sprite", TokenKind.Sprite],
	["entity", TokenKind.Sprite],
	["scene", TokenKind.Scene],
	["on", TokenKind.On],
	["fn", TokenKind.Fn],
	["if", TokenKind.If],
	["else", TokenKind.Else],
	["while", TokenKind.While],
	["for", TokenKind.For],
	["in", TokenKind.In],
	["return", TokenKind.Return],
	["and", TokenKind.And],
	["or", TokenKind.Or],
	["not", TokenKind.Not],
	["true", TokenKind.True],
	["false", TokenKind.False],
	["native", TokenKind.Native],
])

export function keywordKind(word: string): TokenKind | undefined {
	return KEYWORDS.get(word)
}

/** Human-readable form of a token kind, used in syntax error messages. */
export function describeKind(kind: TokenKind): string {
	return TOKEN_TEXT.get(kind) ?? kind.toLowerCase()
}

const TOKEN_TEXT: ReadonlyMap<TokenKind, string> = new Map([
	[TokenKind.Number, "number"],
	[TokenKind.String, "string"],
	[TokenKind.Ident, "identifier"],
	[TokenKind.Native, "native block"],
	[TokenKind.Assign, "'='"],
	[TokenKind.LParen, "'('"],
	[TokenKind.RParen, "')'"],
	[TokenKind.LBrace, "'{'"],
	[TokenKind.RBrace, "'}'"],
	[TokenKind.LBracket, "'['"],
	[TokenKind.RBracket, "']'"],
	[TokenKind.Comma, "','"],
	[TokenKind.Dot, "'.'"],
	[TokenKind.Colon, "':'"],
	[TokenKind.Semicolon, "';'"],
	[TokenKind.In, "'in'"],
	[TokenKind.Newline, "end of line"],
	[TokenKind.EOF, "end of input"],
])
